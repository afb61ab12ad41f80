/**
 * Recovery State Machine
 *
 * Pure transition rules for RecoveryQueueItem. Nothing here performs I/O; the
 * processor loads, locks and persists, and asks these functions what comes next.
 *
 *   queued ─▶ processing ─▶ ai_rescue_pending ─▶ recovered
 *     │           │  ▲              │
 *     │           │  └──────────────┘ (follow-up)
 *     ▼           ▼
 *   escalated ◀── (any non-terminal)      processing ─▶ failed
 */

import { InvalidTransitionError } from '../../types/RecoveryErrors';
import {
  AttemptOutcome,
  CustomerType,
  EscalationReason,
  NewRecoveryItemInput,
  RecoveryPriority,
  RecoveryQueueItem,
  RecoveryStatus,
  ReplyEvaluation,
  SLAConfig,
  TERMINAL_STATUSES,
} from '../../types/RecoveryTypes';

const ALLOWED_TRANSITIONS: Record<RecoveryStatus, readonly RecoveryStatus[]> = {
  queued: ['processing', 'escalated'],
  processing: ['queued', 'ai_rescue_pending', 'escalated', 'failed'],
  ai_rescue_pending: ['processing', 'recovered', 'escalated'],
  recovered: [],
  escalated: [],
  failed: [],
};

const WAITING_STATUSES: readonly RecoveryStatus[] = ['queued', 'ai_rescue_pending'];

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
  randomFn: () => number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 60_000,
  maxDelayMs: 60 * 60_000,
  jitterRatio: 0.2,
  randomFn: Math.random,
};

const MINUTE_MS = 60_000;

export function isTerminal(status: RecoveryStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: RecoveryStatus, to: RecoveryStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Returns the next version of the item. Version is bumped here so the caller
 * can save with the previous version as its expectation.
 */
export function transition(
  item: RecoveryQueueItem,
  to: RecoveryStatus,
  nowIso: string,
  changes: Partial<RecoveryQueueItem> = {}
): RecoveryQueueItem {
  if (!canTransition(item.status, to)) {
    throw new InvalidTransitionError(item.item_id, item.status, to);
  }
  return {
    ...item,
    ...changes,
    status: to,
    processing_started_at: to === 'processing' ? changes.processing_started_at ?? nowIso : undefined,
    updated_at: nowIso,
    version: item.version + 1,
  };
}

export function escalate(item: RecoveryQueueItem, reason: EscalationReason, nowIso: string): RecoveryQueueItem {
  return transition(item, 'escalated', nowIso, { escalation_reason: reason, escalated_at: nowIso });
}

/** 0–1 prior calls: a new customer, worth a faster response. */
export function deriveCustomerProfile(priorContactCount?: number): {
  customer_type: CustomerType;
  priority: RecoveryPriority;
} {
  if (priorContactCount === undefined) {
    return { customer_type: 'unknown', priority: 'medium' };
  }
  return priorContactCount <= 1
    ? { customer_type: 'new', priority: 'high' }
    : { customer_type: 'existing', priority: 'medium' };
}

export function createRecoveryItem(
  input: NewRecoveryItemInput,
  sla: SLAConfig,
  itemId: string,
  nowMs: number
): RecoveryQueueItem {
  const nowIso = new Date(nowMs).toISOString();
  const profile = deriveCustomerProfile(input.prior_contact_count);
  return {
    tenant_id: input.tenant_id,
    item_id: itemId,
    provider: input.provider,
    external_id: input.external_id,
    customer_phone: input.customer_phone,
    customer_type: profile.customer_type,
    priority: profile.priority,
    status: 'queued',
    sla_deadline: new Date(nowMs + sla.response_time_minutes * MINUTE_MS).toISOString(),
    escalation_deadline: new Date(nowMs + sla.escalation_time_minutes * MINUTE_MS).toISOString(),
    retry_count: 0,
    max_retries: sla.max_retries,
    transport_failure_count: 0,
    compliance_block_count: 0,
    next_attempt_at: nowIso,
    messages_sent: 0,
    ai_rescue_attempted: false,
    customer_responded: false,
    consent_status: input.consent_status ?? 'pending',
    opted_out: false,
    business_hours_override: input.business_hours_override ?? false,
    customer_timezone: input.customer_timezone,
    version: 1,
    created_at: nowIso,
    updated_at: nowIso,
  };
}

export type Eligibility =
  | { eligible: true }
  | { eligible: false; reason: 'terminal' | 'not_waiting' | 'not_due' | 'retry_budget_exhausted' };

/**
 * Fast-tick eligibility. `force` (operator re-trigger) ignores next_attempt_at only.
 */
export function checkEligibility(item: RecoveryQueueItem, nowMs: number, force = false): Eligibility {
  if (isTerminal(item.status)) {
    return { eligible: false, reason: 'terminal' };
  }
  if (!WAITING_STATUSES.includes(item.status)) {
    return { eligible: false, reason: 'not_waiting' };
  }
  if (item.retry_count >= item.max_retries) {
    return { eligible: false, reason: 'retry_budget_exhausted' };
  }
  if (!force && Date.parse(item.next_attempt_at) > nowMs) {
    return { eligible: false, reason: 'not_due' };
  }
  return { eligible: true };
}

/**
 * The escalation deadline applies to every non-terminal item. The SLA (first
 * response) deadline only matters until a first message has gone out.
 */
export function deadlineBreach(item: RecoveryQueueItem, nowMs: number): EscalationReason | null {
  if (isTerminal(item.status)) {
    return null;
  }
  if (Date.parse(item.escalation_deadline) <= nowMs) {
    return 'escalation_deadline_passed';
  }
  if (!item.ai_rescue_attempted && Date.parse(item.sla_deadline) <= nowMs) {
    return 'sla_deadline_passed';
  }
  return null;
}

/**
 * The deadline the sweep index sorts by: whichever of the two can fire next.
 */
export function sweepDeadline(item: RecoveryQueueItem): string {
  return item.ai_rescue_attempted ? item.escalation_deadline : item.sla_deadline;
}

/**
 * Exponential backoff with proportional jitter: base * 2^(failures-1), capped.
 */
export function computeBackoffMs(failureNumber: number, options: BackoffOptions = DEFAULT_BACKOFF): number {
  const exponent = Math.max(0, failureNumber - 1);
  const backoff = Math.min(options.maxDelayMs, options.baseDelayMs * Math.pow(2, exponent));
  const ratio = Math.min(1, Math.max(0, options.jitterRatio));
  const random = Math.min(1, Math.max(0, options.randomFn()));
  return backoff + Math.floor(backoff * ratio * random);
}

/** Delay after the Nth sent message; the last configured delay repeats. */
export function followUpDelayMs(sla: SLAConfig, messagesSent: number): number {
  const delays = sla.follow_up_delays_minutes;
  const index = Math.min(Math.max(messagesSent - 1, 0), delays.length - 1);
  return (delays[index] ?? 0) * MINUTE_MS;
}

/** A processing item goes back to the waiting state it was claimed from. */
export function waitingStatusFor(item: RecoveryQueueItem): RecoveryStatus {
  return item.messages_sent > 0 ? 'ai_rescue_pending' : 'queued';
}

export interface OutcomeTransition {
  next: RecoveryQueueItem;
  escalationReason?: EscalationReason;
}

/**
 * Applies one attempt outcome to an item in `processing`.
 */
export function applyAttemptOutcome(
  item: RecoveryQueueItem,
  outcome: AttemptOutcome,
  sla: SLAConfig,
  nowMs: number,
  backoff: BackoffOptions = DEFAULT_BACKOFF
): OutcomeTransition {
  const nowIso = new Date(nowMs).toISOString();
  const retryCount = item.retry_count + 1;

  switch (outcome.kind) {
    case 'sent': {
      const messagesSent = item.messages_sent + 1;
      return {
        next: transition(item, 'ai_rescue_pending', nowIso, {
          retry_count: retryCount,
          messages_sent: messagesSent,
          ai_rescue_attempted: true,
          last_attempt_at: nowIso,
          next_attempt_at: new Date(nowMs + followUpDelayMs(sla, messagesSent)).toISOString(),
        }),
      };
    }

    case 'unrecoverable':
      return {
        next: escalate({ ...item, retry_count: retryCount, last_attempt_at: nowIso }, 'unrecoverable_error', nowIso),
        escalationReason: 'unrecoverable_error',
      };

    case 'transport_failure':
    case 'circuit_open': {
      const transportFailures = item.transport_failure_count + 1;
      const counted = {
        ...item,
        retry_count: retryCount,
        transport_failure_count: transportFailures,
        last_attempt_at: nowIso,
      };
      if (retryCount >= item.max_retries) {
        return exhausted(counted, nowIso);
      }
      const retryAfterMs = outcome.kind === 'circuit_open' ? outcome.retry_after_ms : 0;
      const delayMs = Math.max(computeBackoffMs(transportFailures, backoff), retryAfterMs);
      return {
        next: transition(counted, waitingStatusFor(item), nowIso, {
          next_attempt_at: new Date(nowMs + delayMs).toISOString(),
        }),
      };
    }

    case 'compliance_blocked': {
      const counted = {
        ...item,
        retry_count: retryCount,
        compliance_block_count: item.compliance_block_count + 1,
        opted_out: item.opted_out || outcome.reason === 'opted_out',
        last_attempt_at: nowIso,
      };
      if (retryCount >= item.max_retries) {
        return exhausted(counted, nowIso);
      }
      const nextAttemptAt =
        outcome.retry_at ??
        new Date(nowMs + computeBackoffMs(counted.compliance_block_count, backoff)).toISOString();
      return {
        next: transition(counted, waitingStatusFor(item), nowIso, { next_attempt_at: nextAttemptAt }),
      };
    }
  }
}

/**
 * Budget spent. When the customer was never reachable (only compliance blocks,
 * nothing sent) the item fails; otherwise a human takes over.
 */
function exhausted(item: RecoveryQueueItem, nowIso: string): OutcomeTransition {
  if (item.messages_sent === 0 && item.transport_failure_count === 0) {
    return {
      next: transition(item, 'failed', nowIso, { escalation_reason: 'retry_budget_exhausted' }),
    };
  }
  return { next: escalate(item, 'retry_budget_exhausted', nowIso), escalationReason: 'retry_budget_exhausted' };
}

export type ReplyDecision =
  | { kind: 'recovered' }
  | { kind: 'escalated'; reason: EscalationReason };

/**
 * Resolved with enough confidence recovers; anything else goes to a human.
 */
export function decideReply(evaluation: ReplyEvaluation, sla: SLAConfig): ReplyDecision {
  switch (evaluation.kind) {
    case 'opt_out':
      return { kind: 'escalated', reason: 'opt_out' };
    case 'unavailable':
      return { kind: 'escalated', reason: 'low_confidence_reply' };
    case 'scored':
      if (evaluation.intent === 'negative') {
        return { kind: 'escalated', reason: 'negative_reply' };
      }
      if (evaluation.intent === 'resolved' && evaluation.confidence >= sla.ai_confidence_threshold) {
        return { kind: 'recovered' };
      }
      return { kind: 'escalated', reason: 'low_confidence_reply' };
  }
}
