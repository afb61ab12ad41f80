/**
 * Queue Tick Handler
 *
 * EventBridge schedules invoke this with detail {tick: 'process' | 'sla' | 'purge'}.
 * Each invocation runs exactly one tick; failures are rethrown for Lambda retry.
 */

import { Logger } from '../../services/core/Logger';
import { IdempotencyLedgerService } from '../../services/idempotency/IdempotencyLedgerService';
import { QueueProcessor } from '../../services/queue/QueueProcessor';
import { ValidationError } from '../../types/RecoveryErrors';
import type { ProcessTickStats, SweepTickStats } from '../../types/RecoveryTypes';
import { QueueTickSchema } from './handler-schemas';
import { getRecoveryRuntime } from './recovery-runtime';

interface ScheduledEventEnvelope {
  source?: string;
  'detail-type'?: string;
  detail?: unknown;
}

export type QueueTickResult =
  | { tick: 'process'; stats: ProcessTickStats }
  | { tick: 'sla'; stats: SweepTickStats }
  | { tick: 'purge'; deleted: number };

export type QueueTickHandler = (event: ScheduledEventEnvelope) => Promise<QueueTickResult>;

export function createHandler(
  queue: QueueProcessor,
  ledger: IdempotencyLedgerService,
  logger: Logger
): QueueTickHandler {
  return async (event) => {
    const parsed = QueueTickSchema.safeParse(event.detail);
    if (!parsed.success) {
      throw new ValidationError(`Invalid tick event: ${parsed.error.message}`, 'INVALID_TICK_EVENT');
    }

    const { tick } = parsed.data;
    logger.info('Queue tick invoked', { tick });
    switch (tick) {
      case 'process':
        return { tick, stats: await queue.runProcessTick() };
      case 'sla':
        return { tick, stats: await queue.runSlaTick() };
      case 'purge':
        return { tick, deleted: await ledger.purgeExpired() };
    }
  };
}

let cached: QueueTickHandler | undefined;

export const handler: QueueTickHandler = (event) => {
  if (!cached) {
    const runtime = getRecoveryRuntime();
    cached = createHandler(runtime.queue, runtime.ledger, new Logger('QueueTickHandler'));
  }
  return cached(event);
};
