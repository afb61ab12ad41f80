/**
 * Queue Processor
 *
 * Owns the two independent loops (due-item processing and the SLA sweep), the
 * operator's single-item trigger and the read-only status view.
 */

import { Logger } from '../core/Logger';
import { CircuitBreakerRegistry } from '../resilience/CircuitBreakerRegistry';
import { RecoveryProcessor } from '../recovery/RecoveryProcessor';
import { ScheduledTask } from './ScheduledTask';
import { Clock, systemClock } from '../../types/CommonTypes';
import type { CircuitBreakerSnapshot } from '../../types/CircuitBreakerTypes';
import type {
  ProcessItemResult,
  ProcessTickStats,
  RecoveryQueueRepository,
  RecoveryStatus,
  SweepTickStats,
} from '../../types/RecoveryTypes';

export interface QueueProcessorOptions {
  processIntervalMs: number;
  slaCheckIntervalMs: number;
}

export const DEFAULT_QUEUE_PROCESSOR_OPTIONS: QueueProcessorOptions = {
  processIntervalMs: 60_000,
  slaCheckIntervalMs: 300_000,
};

export interface QueueStatus {
  tenant_id: string;
  running: boolean;
  process_interval_ms: number;
  sla_check_interval_ms: number;
  counts: Record<RecoveryStatus, number>;
  sla_violations: number;
  circuit_breakers: CircuitBreakerSnapshot[];
  checked_at: string;
}

export class QueueProcessor {
  private readonly processTask: ScheduledTask;
  private readonly slaTask: ScheduledTask;

  constructor(
    private readonly processor: RecoveryProcessor,
    private readonly repository: RecoveryQueueRepository,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly logger: Logger,
    private readonly options: QueueProcessorOptions = DEFAULT_QUEUE_PROCESSOR_OPTIONS,
    private readonly clock: Clock = systemClock
  ) {
    this.processTask = new ScheduledTask(
      { name: 'process-due-items', intervalMs: options.processIntervalMs, run: () => this.runProcessTick() },
      logger
    );
    this.slaTask = new ScheduledTask(
      { name: 'sla-sweep', intervalMs: options.slaCheckIntervalMs, run: () => this.runSlaTick() },
      logger
    );
  }

  start(): void {
    this.processTask.start();
    this.slaTask.start();
  }

  async stop(): Promise<void> {
    await Promise.all([this.processTask.stop(), this.slaTask.stop()]);
  }

  isRunning(): boolean {
    return this.processTask.isRunning() || this.slaTask.isRunning();
  }

  runProcessTick(): Promise<ProcessTickStats> {
    return this.processor.processDueItems();
  }

  runSlaTick(): Promise<SweepTickStats> {
    return this.processor.sweepSla();
  }

  processSingleItem(tenantId: string, itemId: string): Promise<ProcessItemResult> {
    this.logger.info('Manual processing requested', { tenantId, itemId });
    return this.processor.processItem(tenantId, itemId, 'manual');
  }

  async getStatus(tenantId: string): Promise<QueueStatus> {
    const nowIso = new Date(this.clock()).toISOString();
    const [counts, slaViolations] = await Promise.all([
      this.repository.countByStatus(tenantId),
      this.repository.countSlaViolations(tenantId, nowIso),
    ]);
    return {
      tenant_id: tenantId,
      running: this.isRunning(),
      process_interval_ms: this.options.processIntervalMs,
      sla_check_interval_ms: this.options.slaCheckIntervalMs,
      counts,
      sla_violations: slaViolations,
      circuit_breakers: this.breakers.getAllStates(tenantId),
      checked_at: nowIso,
    };
  }
}
