/**
 * Builds lifecycle envelopes for queue items and hands them to the sink.
 * A publish failure is logged; the state change it describes is already durable.
 */

import { Logger } from '../core/Logger';
import { TraceService } from '../core/TraceService';
import { Clock, EventSource, systemClock } from '../../types/CommonTypes';
import { RecoveryEventSink, RecoveryEventType } from '../../types/EventTypes';
import type { RecoveryQueueItem } from '../../types/RecoveryTypes';

export class RecoveryEventEmitter {
  constructor(
    private readonly sink: RecoveryEventSink,
    private readonly traceService: TraceService,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  async emit(
    eventType: RecoveryEventType,
    source: EventSource,
    item: RecoveryQueueItem,
    payload: Record<string, unknown> = {},
    traceId?: string
  ): Promise<void> {
    const context = this.traceService.createContext(item.tenant_id, item.item_id, traceId);
    try {
      await this.sink.publish({
        traceId: context.traceId,
        tenantId: item.tenant_id,
        source,
        eventType,
        ts: new Date(this.clock()).toISOString(),
        payload: {
          item_id: item.item_id,
          status: item.status,
          priority: item.priority,
          ...payload,
        },
      });
    } catch (error) {
      this.logger.error('Lifecycle event not published', {
        tenantId: item.tenant_id,
        itemId: item.item_id,
        eventType,
        error,
      });
    }
  }

  /** Picks the terminal event for an item that just left the active set. */
  async emitTerminal(source: EventSource, item: RecoveryQueueItem, traceId?: string): Promise<void> {
    switch (item.status) {
      case 'recovered':
        return this.emit(RecoveryEventType.RECOVERY_ITEM_RECOVERED, source, item, { resolved_at: item.resolved_at }, traceId);
      case 'escalated':
        return this.emit(
          RecoveryEventType.RECOVERY_ITEM_ESCALATED,
          source,
          item,
          { reason: item.escalation_reason, escalated_at: item.escalated_at },
          traceId
        );
      case 'failed':
        return this.emit(RecoveryEventType.RECOVERY_ITEM_FAILED, source, item, { reason: item.escalation_reason }, traceId);
      default:
        return;
    }
  }
}
