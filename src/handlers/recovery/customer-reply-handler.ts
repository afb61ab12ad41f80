/**
 * Customer Reply Handler
 *
 * Applies an inbound SMS reply to the customer's active recovery item.
 * 409 asks the provider to redeliver (item busy, or the same message mid-flight).
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { Logger } from '../../services/core/Logger';
import { RecoveryProcessor } from '../../services/recovery/RecoveryProcessor';
import { LockContentionError } from '../../types/RecoveryErrors';
import { CustomerReplySchema, parseJsonBody } from './handler-schemas';
import { jsonResponse, validationErrorResponse } from './http-responses';
import { getRecoveryRuntime } from './recovery-runtime';

export type CustomerReplyHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

export function createHandler(processor: RecoveryProcessor, logger: Logger): CustomerReplyHandler {
  return async (event) => {
    const parsed = CustomerReplySchema.safeParse(parseJsonBody(event.body));
    if (!parsed.success) {
      return validationErrorResponse(parsed.error);
    }

    try {
      const result = await processor.handleCustomerReply(parsed.data);
      if (result.kind === 'in_progress') {
        return jsonResponse(409, { status: 'in_progress' });
      }
      return jsonResponse(200, result);
    } catch (error) {
      if (error instanceof LockContentionError) {
        logger.info('Reply deferred: item busy', { tenantId: parsed.data.tenant_id });
        return jsonResponse(409, { status: 'busy' });
      }
      logger.error('Customer reply handling failed', { tenantId: parsed.data.tenant_id, error });
      return jsonResponse(500, { error: 'Internal server error' });
    }
  };
}

let cached: CustomerReplyHandler | undefined;

export const handler: CustomerReplyHandler = (event) => {
  if (!cached) {
    cached = createHandler(getRecoveryRuntime().processor, new Logger('CustomerReplyHandler'));
  }
  return cached(event);
};
