/**
 * Recovery Processor
 *
 * Applies state machine transitions to queue items. Every mutation happens under
 * the item lock and is saved with a version check. Lock contention is a skip,
 * never an error; store I/O errors propagate and abort the caller's tick.
 */

import { Logger } from '../core/Logger';
import { DistributedLockService } from '../lock/DistributedLockService';
import { IdempotencyLedgerService } from '../idempotency/IdempotencyLedgerService';
import { RecoveryEventEmitter } from '../events/RecoveryEventEmitter';
import { ComplianceGate, isOptOutMessage } from './ComplianceGate';
import { OutreachService } from './OutreachService';
import { TenantSettingsSource } from './SlaConfigService';
import {
  BackoffOptions,
  DEFAULT_BACKOFF,
  applyAttemptOutcome,
  checkEligibility,
  deadlineBreach,
  decideReply,
  escalate,
  isTerminal,
  transition,
  waitingStatusFor,
} from './RecoveryStateMachine';
import { createLimiter } from '../../utils/concurrency-limiter';
import { Clock, EventSource, systemClock } from '../../types/CommonTypes';
import { RecoveryEventType } from '../../types/EventTypes';
import { LockContentionError } from '../../types/RecoveryErrors';
import type {
  AttemptOutcome,
  CustomerReplyInput,
  EscalationReason,
  ProcessItemResult,
  ProcessTickStats,
  ProcessTrigger,
  RecoveryAttempt,
  RecoveryQueueItem,
  RecoveryQueueRepository,
  ReplyResult,
  SweepItemResult,
  SweepTickStats,
} from '../../types/RecoveryTypes';

export interface RecoveryProcessorOptions {
  batchSize: number;
  concurrency: number;
  /** A processing claim older than this belongs to a crashed worker. */
  processingTimeoutMs: number;
  lockTimeoutSeconds: number;
  backoff: BackoffOptions;
}

export const DEFAULT_PROCESSOR_OPTIONS: RecoveryProcessorOptions = {
  batchSize: 50,
  concurrency: 5,
  processingTimeoutMs: 15 * 60_000,
  lockTimeoutSeconds: 300,
  backoff: DEFAULT_BACKOFF,
};

export interface RecoveryProcessorDeps {
  repository: RecoveryQueueRepository;
  locks: DistributedLockService;
  ledger: IdempotencyLedgerService;
  outreach: OutreachService;
  compliance: ComplianceGate;
  settings: TenantSettingsSource;
  events: RecoveryEventEmitter;
  logger: Logger;
  clock?: Clock;
}

export type ManualEscalationReason = Extract<EscalationReason, 'human_takeover' | 'operator_request'>;

export function itemLockKey(itemId: string): string {
  return `recovery_item:${itemId}`;
}

function attemptRecord(item: RecoveryQueueItem, outcome: AttemptOutcome, attemptedAt: string): RecoveryAttempt {
  const base: RecoveryAttempt = {
    tenant_id: item.tenant_id,
    item_id: item.item_id,
    attempt_number: item.retry_count + 1,
    method: 'sms',
    outcome: outcome.kind,
    success: outcome.kind === 'sent',
    customer_engaged: false,
    attempted_at: attemptedAt,
  };
  switch (outcome.kind) {
    case 'sent':
      return {
        ...base,
        message_id: outcome.message_id,
        content_ref: `${outcome.drafted_by}:${outcome.message_id}`,
        confidence_score: outcome.confidence,
      };
    case 'compliance_blocked':
      return { ...base, blocked_reason: outcome.reason };
    case 'circuit_open':
      return { ...base, error: `circuit open; retry after ${outcome.retry_after_ms}ms` };
    case 'transport_failure':
    case 'unrecoverable':
      return { ...base, error: outcome.error };
  }
}

export class RecoveryProcessor {
  private readonly repository: RecoveryQueueRepository;
  private readonly locks: DistributedLockService;
  private readonly ledger: IdempotencyLedgerService;
  private readonly outreach: OutreachService;
  private readonly compliance: ComplianceGate;
  private readonly settings: TenantSettingsSource;
  private readonly events: RecoveryEventEmitter;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: RecoveryProcessorDeps, private readonly options: RecoveryProcessorOptions = DEFAULT_PROCESSOR_OPTIONS) {
    this.repository = deps.repository;
    this.locks = deps.locks;
    this.ledger = deps.ledger;
    this.outreach = deps.outreach;
    this.compliance = deps.compliance;
    this.settings = deps.settings;
    this.events = deps.events;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * One outreach attempt for one item. Scheduled ticks and the operator
   * re-trigger share this path; `manual` only skips the next_attempt_at wait.
   */
  async processItem(tenantId: string, itemId: string, trigger: ProcessTrigger = 'scheduled'): Promise<ProcessItemResult> {
    const locked = await this.locks.withLock(
      tenantId,
      itemLockKey(itemId),
      () => this.processLocked(tenantId, itemId, trigger),
      this.options.lockTimeoutSeconds
    );
    if (!locked.acquired) {
      this.logger.debug('Item locked by another worker; skipping', { tenantId, itemId });
      return { kind: 'skipped', reason: 'lock_contention' };
    }
    return locked.value;
  }

  /**
   * Deadline enforcement for one item. Re-reads under the lock, so a racing
   * worker that already escalated leaves nothing to do.
   */
  async sweepItem(tenantId: string, itemId: string): Promise<SweepItemResult> {
    const locked = await this.locks.withLock(
      tenantId,
      itemLockKey(itemId),
      async (): Promise<SweepItemResult> => {
        const item = await this.repository.getItem(tenantId, itemId);
        if (!item) {
          return { kind: 'not_found' };
        }
        const nowMs = this.clock();
        const reason = deadlineBreach(item, nowMs) ?? this.processingTimeout(item, nowMs);
        if (!reason) {
          return { kind: 'noop', status: item.status };
        }
        return this.forceEscalation(item, reason, 'sweep');
      },
      this.options.lockTimeoutSeconds
    );
    return locked.acquired ? locked.value : { kind: 'skipped', reason: 'lock_contention' };
  }

  async escalateManually(tenantId: string, itemId: string, reason: ManualEscalationReason): Promise<SweepItemResult> {
    const locked = await this.locks.withLock(
      tenantId,
      itemLockKey(itemId),
      async (): Promise<SweepItemResult> => {
        const item = await this.repository.getItem(tenantId, itemId);
        if (!item) {
          return { kind: 'not_found' };
        }
        if (isTerminal(item.status)) {
          return { kind: 'noop', status: item.status };
        }
        return this.forceEscalation(item, reason, 'operator');
      },
      this.options.lockTimeoutSeconds
    );
    return locked.acquired ? locked.value : { kind: 'skipped', reason: 'lock_contention' };
  }

  /**
   * Replies are de-duplicated by provider message id. A reply that cannot get
   * the item lock throws, so the ledger forgets it and the provider redelivers.
   */
  async handleCustomerReply(input: CustomerReplyInput): Promise<ReplyResult> {
    const result = await this.ledger.runOnce(input.tenant_id, input.provider, `reply:${input.message_id}`, () =>
      this.applyReply(input)
    );
    switch (result.kind) {
      case 'processed':
        return result.value;
      case 'duplicate':
        return { kind: 'duplicate' };
      case 'in_progress':
        return { kind: 'in_progress' };
    }
  }

  async processDueItems(): Promise<ProcessTickStats> {
    const nowIso = new Date(this.clock()).toISOString();
    const candidates = await this.repository.findDueItems(nowIso, this.options.batchSize);
    const stats: ProcessTickStats = { candidates: candidates.length, attempted: 0, escalated: 0, skipped: 0, not_due: 0 };

    const limit = createLimiter(this.options.concurrency);
    const settled = await Promise.allSettled(
      candidates.map((item) => limit(() => this.processItem(item.tenant_id, item.item_id, 'scheduled')))
    );

    const failures = this.tally(settled, (result) => {
      switch (result.kind) {
        case 'attempted':
          stats.attempted++;
          break;
        case 'escalated':
          stats.escalated++;
          break;
        case 'skipped':
          stats.skipped++;
          break;
        case 'not_due':
          stats.not_due++;
          break;
        default:
          break;
      }
    });
    this.raiseFirst(failures, 'process');

    this.logger.info('Process tick complete', { ...stats });
    return stats;
  }

  async sweepSla(): Promise<SweepTickStats> {
    const nowMs = this.clock();
    const [overdue, stale] = await Promise.all([
      this.repository.findSweepCandidates(new Date(nowMs).toISOString(), this.options.batchSize),
      this.repository.findStaleProcessing(
        new Date(nowMs - this.options.processingTimeoutMs).toISOString(),
        this.options.batchSize
      ),
    ]);

    const unique = new Map<string, RecoveryQueueItem>();
    for (const item of [...overdue, ...stale]) {
      unique.set(`${item.tenant_id}:${item.item_id}`, item);
    }
    const stats: SweepTickStats = { candidates: unique.size, escalated: 0, skipped: 0 };

    const limit = createLimiter(this.options.concurrency);
    const settled = await Promise.allSettled(
      [...unique.values()].map((item) => limit(() => this.sweepItem(item.tenant_id, item.item_id)))
    );
    const failures = this.tally(settled, (result) => {
      if (result.kind === 'escalated') stats.escalated++;
      if (result.kind === 'skipped') stats.skipped++;
    });
    this.raiseFirst(failures, 'sla');

    this.logger.info('SLA sweep complete', { ...stats });
    return stats;
  }

  private async processLocked(tenantId: string, itemId: string, trigger: ProcessTrigger): Promise<ProcessItemResult> {
    const item = await this.repository.getItem(tenantId, itemId);
    if (!item) {
      return { kind: 'not_found' };
    }

    const nowMs = this.clock();
    const breach = deadlineBreach(item, nowMs);
    if (breach) {
      return this.forceEscalation(item, breach, 'recovery');
    }

    const eligibility = checkEligibility(item, nowMs, trigger === 'manual');
    if (!eligibility.eligible) {
      if (eligibility.reason === 'not_due') {
        return { kind: 'not_due', status: item.status, next_attempt_at: item.next_attempt_at };
      }
      return { kind: 'noop', status: item.status };
    }

    const { sla, business_name } = await this.settings.getSettings(tenantId);
    const nowIso = new Date(nowMs).toISOString();
    const claimed = transition(item, 'processing', nowIso);
    if (!(await this.repository.saveItem(claimed, item.version))) {
      return { kind: 'skipped', reason: 'stale_write' };
    }

    const gate = this.compliance.check(claimed, sla.business_hours, nowMs);
    const outcome: AttemptOutcome = gate.allowed
      ? await this.outreach.attempt(claimed, { tenant_id: tenantId, business_name, sla })
      : { kind: 'compliance_blocked', reason: gate.reason, retry_at: gate.retryAt };

    const afterMs = this.clock();
    const afterIso = new Date(afterMs).toISOString();
    const { next, escalationReason } = applyAttemptOutcome(claimed, outcome, sla, afterMs, this.options.backoff);

    let saved: boolean;
    try {
      await this.repository.appendAttempt(attemptRecord(claimed, outcome, afterIso));
      saved = await this.repository.saveItem(next, claimed.version);
    } catch (err: unknown) {
      await this.releaseClaim(next, claimed.version, outcome, err);
      throw err;
    }
    if (!saved) {
      this.logger.warn('Item changed while attempt was in flight; attempt recorded, state not saved', {
        tenantId,
        itemId,
        outcome: outcome.kind,
      });
      return { kind: 'skipped', reason: 'stale_write' };
    }

    this.logger.info('Outreach attempt recorded', {
      tenantId,
      itemId,
      trigger,
      outcome: outcome.kind,
      status: next.status,
      retryCount: next.retry_count,
      nextAttemptAt: next.next_attempt_at,
    });
    await this.events.emit(RecoveryEventType.RECOVERY_ATTEMPT_RECORDED, 'recovery', next, {
      outcome: outcome.kind,
      retry_count: next.retry_count,
    });
    if (isTerminal(next.status)) {
      await this.events.emitTerminal('recovery', next);
    }

    return escalationReason
      ? { kind: 'escalated', reason: escalationReason }
      : { kind: 'attempted', outcome: outcome.kind, status: next.status };
  }

  private async applyReply(input: CustomerReplyInput): Promise<ReplyResult> {
    const active = await this.repository.findActiveByPhone(input.tenant_id, input.customer_phone);
    if (!active) {
      this.logger.info('Reply with no active recovery item', { tenantId: input.tenant_id });
      return { kind: 'no_active_item' };
    }

    const locked = await this.locks.withLock(
      input.tenant_id,
      itemLockKey(active.item_id),
      () => this.applyReplyLocked(input, active.item_id),
      this.options.lockTimeoutSeconds
    );
    if (!locked.acquired) {
      throw new LockContentionError(itemLockKey(active.item_id), input.tenant_id);
    }
    return locked.value;
  }

  private async applyReplyLocked(input: CustomerReplyInput, itemId: string): Promise<ReplyResult> {
    const item = await this.repository.getItem(input.tenant_id, itemId);
    if (!item || isTerminal(item.status)) {
      return { kind: 'no_active_item' };
    }

    const { sla } = await this.settings.getSettings(input.tenant_id);
    const optOut = isOptOutMessage(input.body);
    const evaluation =
      optOut || item.ai_rescue_attempted ? await this.outreach.evaluateReply(item, input.body) : null;
    const decision = evaluation
      ? decideReply(evaluation, sla)
      : { kind: 'escalated' as const, reason: 'reply_before_outreach' as const };

    const nowMs = this.clock();
    const nowIso = new Date(nowMs).toISOString();
    // An abandoned processing claim is released back to its waiting state first.
    const waiting = item.status === 'processing' ? transition(item, waitingStatusFor(item), nowIso) : item;
    const responded: RecoveryQueueItem = { ...waiting, customer_responded: true, opted_out: item.opted_out || optOut };
    const next =
      decision.kind === 'recovered'
        ? transition(responded, 'recovered', nowIso, { resolved_at: nowIso })
        : escalate(responded, decision.reason, nowIso);

    await this.repository.appendAttempt({
      tenant_id: item.tenant_id,
      item_id: item.item_id,
      attempt_number: item.retry_count + 1,
      method: 'inbound_reply',
      outcome: decision.kind === 'recovered' ? 'reply_resolved' : 'reply_escalated',
      message_id: input.message_id,
      content_ref: `reply:${input.message_id}`,
      confidence_score: evaluation?.kind === 'scored' ? evaluation.confidence : undefined,
      success: decision.kind === 'recovered',
      customer_engaged: true,
      error: evaluation?.kind === 'unavailable' ? evaluation.error : undefined,
      attempted_at: nowIso,
      responded_at: nowIso,
    });
    if (!(await this.repository.saveItem(next, item.version))) {
      throw new LockContentionError(itemLockKey(item.item_id), item.tenant_id);
    }

    this.logger.info('Customer reply applied', {
      tenantId: item.tenant_id,
      itemId: item.item_id,
      status: next.status,
      reason: next.escalation_reason,
    });
    await this.events.emitTerminal('recovery', next);

    return decision.kind === 'recovered'
      ? { kind: 'recovered', item_id: item.item_id }
      : { kind: 'escalated', item_id: item.item_id, reason: decision.reason };
  }

  /**
   * A store write failed after the processing claim. The outcome already
   * happened, so the item is moved to the state it implies rather than left in
   * processing for the sweep to escalate. The caller rethrows either way.
   */
  private async releaseClaim(
    next: RecoveryQueueItem,
    claimedVersion: number,
    outcome: AttemptOutcome,
    cause: unknown
  ): Promise<void> {
    const meta = { tenantId: next.tenant_id, itemId: next.item_id, outcome: outcome.kind, cause: String(cause) };
    try {
      const saved = await this.repository.saveItem(next, claimedVersion);
      this.logger.warn('Attempt not fully recorded; processing claim released', { ...meta, saved, status: next.status });
    } catch (err: unknown) {
      this.logger.error('Processing claim could not be released', { ...meta, error: String(err) });
    }
  }

  private processingTimeout(item: RecoveryQueueItem, nowMs: number): EscalationReason | null {
    if (item.status !== 'processing') {
      return null;
    }
    const startedMs = Date.parse(item.processing_started_at ?? item.updated_at);
    return nowMs - startedMs >= this.options.processingTimeoutMs ? 'processing_timeout' : null;
  }

  private async forceEscalation(
    item: RecoveryQueueItem,
    reason: EscalationReason,
    source: EventSource
  ): Promise<{ kind: 'escalated'; reason: EscalationReason } | { kind: 'skipped'; reason: 'stale_write' }> {
    const next = escalate(item, reason, new Date(this.clock()).toISOString());
    if (!(await this.repository.saveItem(next, item.version))) {
      return { kind: 'skipped', reason: 'stale_write' };
    }
    this.logger.warn('Recovery item escalated', {
      tenantId: item.tenant_id,
      itemId: item.item_id,
      reason,
      previousStatus: item.status,
      retryCount: item.retry_count,
    });
    await this.events.emitTerminal(source, next);
    return { kind: 'escalated', reason };
  }

  private tally<T>(settled: PromiseSettledResult<T>[], onResult: (value: T) => void): unknown[] {
    const failures: unknown[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        onResult(outcome.value);
      } else {
        failures.push(outcome.reason);
      }
    }
    return failures;
  }

  private raiseFirst(failures: unknown[], tick: 'process' | 'sla'): void {
    if (failures.length === 0) {
      return;
    }
    this.logger.error('Tick aborted by store failure', { tick, failures: failures.length, error: failures[0] });
    throw failures[0];
  }
}
