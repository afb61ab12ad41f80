import { EventSource } from './CommonTypes';

/**
 * Standard event envelope for recovery lifecycle events
 * Uses camelCase in code; EventBridge Detail will serialize as-is
 */
export interface EventEnvelope {
  traceId: string;
  tenantId: string;
  source: EventSource;
  eventType: RecoveryEventType;
  ts: string;
  payload: Record<string, unknown>;
  metadata?: {
    correlationId?: string;
    causationId?: string;
  };
}

/**
 * Event type registry
 */
export enum RecoveryEventType {
  RECOVERY_ITEM_QUEUED = 'RECOVERY_ITEM_QUEUED',
  RECOVERY_ATTEMPT_RECORDED = 'RECOVERY_ATTEMPT_RECORDED',
  RECOVERY_ITEM_RECOVERED = 'RECOVERY_ITEM_RECOVERED',
  RECOVERY_ITEM_ESCALATED = 'RECOVERY_ITEM_ESCALATED',
  RECOVERY_ITEM_FAILED = 'RECOVERY_ITEM_FAILED',
}

/**
 * Anything that can take lifecycle events. EventPublisher is the production sink.
 */
export interface RecoveryEventSink {
  publish(event: EventEnvelope): Promise<void>;
}

export const EVENT_SOURCE_NAMESPACE = 'missed-call-recovery';

/**
 * Helper to create namespaced event source
 */
export function createEventSource(source: EventSource): string {
  return `${EVENT_SOURCE_NAMESPACE}.${source}`;
}
