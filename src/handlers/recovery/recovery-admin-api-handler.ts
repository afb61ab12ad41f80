/**
 * Recovery Admin API Handler
 *
 *   GET  /tenants/{tenantId}/recovery/status
 *   POST /tenants/{tenantId}/recovery/items/{itemId}/process
 *   POST /tenants/{tenantId}/recovery/items/{itemId}/escalate
 *   GET  /tenants/{tenantId}/recovery/breakers
 *   POST /tenants/{tenantId}/recovery/breakers/{service}/reset
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { Logger } from '../../services/core/Logger';
import { QueueProcessor } from '../../services/queue/QueueProcessor';
import { RecoveryProcessor } from '../../services/recovery/RecoveryProcessor';
import { CircuitBreakerRegistry } from '../../services/resilience/CircuitBreakerRegistry';
import { ManualEscalationSchema, parseJsonBody } from './handler-schemas';
import { jsonResponse, validationErrorResponse } from './http-responses';
import { getRecoveryRuntime } from './recovery-runtime';

export interface AdminApiDeps {
  queue: QueueProcessor;
  processor: RecoveryProcessor;
  breakers: CircuitBreakerRegistry;
  logger: Logger;
}

export type AdminApiHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

export function createHandler(deps: AdminApiDeps): AdminApiHandler {
  const { queue, processor, breakers, logger } = deps;

  return async (event) => {
    const tenantId = event.pathParameters?.tenantId;
    if (!tenantId) {
      return jsonResponse(400, { error: 'tenantId path parameter is required' });
    }
    const itemId = event.pathParameters?.itemId;
    const service = event.pathParameters?.service;
    const route = `${event.httpMethod} ${event.resource}`;

    try {
      switch (route) {
        case 'GET /tenants/{tenantId}/recovery/status':
          return jsonResponse(200, await queue.getStatus(tenantId));

        case 'POST /tenants/{tenantId}/recovery/items/{itemId}/process': {
          if (!itemId) break;
          const result = await queue.processSingleItem(tenantId, itemId);
          if (result.kind === 'not_found') {
            return jsonResponse(404, { error: 'Item not found' });
          }
          return jsonResponse(result.kind === 'skipped' ? 409 : 200, result);
        }

        case 'POST /tenants/{tenantId}/recovery/items/{itemId}/escalate': {
          if (!itemId) break;
          const body = ManualEscalationSchema.safeParse(parseJsonBody(event.body));
          if (!body.success) {
            return validationErrorResponse(body.error);
          }
          const result = await processor.escalateManually(tenantId, itemId, body.data.reason);
          if (result.kind === 'not_found') {
            return jsonResponse(404, { error: 'Item not found' });
          }
          return jsonResponse(result.kind === 'skipped' ? 409 : 200, result);
        }

        case 'GET /tenants/{tenantId}/recovery/breakers':
          return jsonResponse(200, { breakers: breakers.getAllStates(tenantId) });

        case 'POST /tenants/{tenantId}/recovery/breakers/{service}/reset': {
          if (!service) break;
          const reset = breakers.reset(service, tenantId);
          logger.info('Breaker reset requested', { tenantId, service, reset });
          return reset
            ? jsonResponse(200, { reset: true, breaker: breakers.get(service, tenantId)?.snapshot() })
            : jsonResponse(404, { error: `No breaker for service ${service}` });
        }

        default:
          break;
      }
      return jsonResponse(404, { error: `No route for ${route}` });
    } catch (error) {
      logger.error('Admin request failed', { tenantId, route, error });
      return jsonResponse(500, { error: 'Internal server error' });
    }
  };
}

let cached: AdminApiHandler | undefined;

export const handler: AdminApiHandler = (event) => {
  if (!cached) {
    const runtime = getRecoveryRuntime();
    cached = createHandler({
      queue: runtime.queue,
      processor: runtime.processor,
      breakers: runtime.breakers,
      logger: new Logger('RecoveryAdminApiHandler'),
    });
  }
  return cached(event);
};
