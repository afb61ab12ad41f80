/**
 * Inbound Event Handler
 *
 * Receives provider events (a missed inbound call) and opens one recovery case
 * per (tenant, provider, external_id). Redeliveries answer 200 duplicate.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { Logger } from '../../services/core/Logger';
import { TraceService } from '../../services/core/TraceService';
import { RecoveryIntakeService } from '../../services/recovery/RecoveryIntakeService';
import { InboundEventSchema, parseJsonBody } from './handler-schemas';
import { jsonResponse, validationErrorResponse } from './http-responses';
import { getRecoveryRuntime } from './recovery-runtime';

export type InboundEventHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

export function createHandler(
  intake: RecoveryIntakeService,
  traceService: TraceService,
  logger: Logger
): InboundEventHandler {
  return async (event) => {
    const parsed = InboundEventSchema.safeParse(parseJsonBody(event.body));
    if (!parsed.success) {
      logger.warn('Rejected inbound event', { issues: parsed.error.issues.length });
      return validationErrorResponse(parsed.error);
    }

    const input = parsed.data;
    const context = traceService.createContext(input.tenant_id);
    logger.setContext(context);

    try {
      const result = await intake.ingest(input, context.traceId);
      switch (result.kind) {
        case 'queued':
          return jsonResponse(201, {
            status: 'queued',
            item_id: result.item.item_id,
            sla_deadline: result.item.sla_deadline,
          });
        case 'duplicate':
          return jsonResponse(200, { status: 'duplicate', first_processed_at: result.first_processed_at });
        case 'in_progress':
          return jsonResponse(409, { status: 'in_progress' });
      }
    } catch (error) {
      logger.error('Inbound event ingestion failed', {
        provider: input.provider,
        externalId: input.external_id,
        error,
      });
      return jsonResponse(500, { error: 'Internal server error' });
    }
  };
}

let cached: InboundEventHandler | undefined;

export const handler: InboundEventHandler = (event) => {
  if (!cached) {
    const runtime = getRecoveryRuntime();
    cached = createHandler(runtime.intake, runtime.traceService, new Logger('InboundEventHandler'));
  }
  return cached(event);
};
