/**
 * Unit tests for the recovery state machine (pure functions).
 */

import {
  DEFAULT_BACKOFF,
  applyAttemptOutcome,
  canTransition,
  checkEligibility,
  computeBackoffMs,
  deadlineBreach,
  decideReply,
  deriveCustomerProfile,
  escalate,
  followUpDelayMs,
  isTerminal,
  sweepDeadline,
  transition,
  waitingStatusFor,
} from '../../../services/recovery/RecoveryStateMachine';
import { DEFAULT_SLA_CONFIG } from '../../../config/slaConfig';
import { InvalidTransitionError } from '../../../types/RecoveryErrors';
import type { RecoveryQueueItem, RecoveryStatus } from '../../../types/RecoveryTypes';
import { MINUTE, MONDAY_10AM_UTC as T0, makeItem } from '../../__mocks__/recovery-fixtures';

const sla = DEFAULT_SLA_CONFIG;
const noJitter = { ...DEFAULT_BACKOFF, randomFn: () => 0 };
const iso = (ms: number): string => new Date(ms).toISOString();

function claimed(overrides: Partial<RecoveryQueueItem> = {}): RecoveryQueueItem {
  return transition(makeItem(overrides), 'processing', iso(T0));
}

describe('RecoveryStateMachine', () => {
  describe('transitions', () => {
    it('allows the documented edges only', () => {
      expect(canTransition('queued', 'processing')).toBe(true);
      expect(canTransition('queued', 'escalated')).toBe(true);
      expect(canTransition('queued', 'recovered')).toBe(false);
      expect(canTransition('processing', 'failed')).toBe(true);
      expect(canTransition('ai_rescue_pending', 'recovered')).toBe(true);
      expect(canTransition('ai_rescue_pending', 'failed')).toBe(false);
      expect(canTransition('escalated', 'queued')).toBe(false);
    });

    it('treats recovered, escalated and failed as terminal', () => {
      const live: RecoveryStatus[] = ['queued', 'processing', 'ai_rescue_pending'];
      expect(live.map(isTerminal)).toEqual([false, false, false]);
      expect(isTerminal('recovered')).toBe(true);
      expect(isTerminal('escalated')).toBe(true);
      expect(isTerminal('failed')).toBe(true);
    });

    it('bumps the version and stamps processing_started_at on claim', () => {
      const item = makeItem();
      const next = transition(item, 'processing', '2024-01-15T10:01:00.000Z');

      expect(next.version).toBe(item.version + 1);
      expect(next.status).toBe('processing');
      expect(next.processing_started_at).toBe('2024-01-15T10:01:00.000Z');
      expect(next.updated_at).toBe('2024-01-15T10:01:00.000Z');
    });

    it('clears processing_started_at when leaving processing', () => {
      const next = transition(claimed(), 'queued', iso(T0 + MINUTE));

      expect(next.processing_started_at).toBeUndefined();
    });

    it('throws on an illegal transition', () => {
      const done = escalate(makeItem(), 'operator_request', iso(T0));

      expect(() => transition(done, 'processing', iso(T0))).toThrow(InvalidTransitionError);
      expect(() => transition(done, 'processing', iso(T0))).toThrow(
        'Invalid recovery transition for item item-1: escalated -> processing'
      );
    });

    it('escalate records reason and time', () => {
      const next = escalate(makeItem(), 'human_takeover', iso(T0));

      expect(next).toEqual(
        expect.objectContaining({ status: 'escalated', escalation_reason: 'human_takeover', escalated_at: iso(T0) })
      );
    });
  });

  describe('createRecoveryItem', () => {
    it('derives deadlines, budget and profile from the SLA', () => {
      const item = makeItem();

      expect(item).toEqual(
        expect.objectContaining({
          status: 'queued',
          sla_deadline: '2024-01-15T12:00:00.000Z',
          escalation_deadline: '2024-01-17T10:00:00.000Z',
          next_attempt_at: '2024-01-15T10:00:00.000Z',
          retry_count: 0,
          max_retries: 3,
          messages_sent: 0,
          customer_type: 'new',
          priority: 'high',
          consent_status: 'granted',
          version: 1,
        })
      );
    });

    it('profiles callers by prior contact count', () => {
      expect(deriveCustomerProfile(undefined)).toEqual({ customer_type: 'unknown', priority: 'medium' });
      expect(deriveCustomerProfile(1)).toEqual({ customer_type: 'new', priority: 'high' });
      expect(deriveCustomerProfile(4)).toEqual({ customer_type: 'existing', priority: 'medium' });
    });
  });

  describe('checkEligibility', () => {
    it('accepts a due waiting item', () => {
      expect(checkEligibility(makeItem(), T0)).toEqual({ eligible: true });
    });

    it('rejects items that are not due unless forced', () => {
      const later = makeItem({ next_attempt_at: iso(T0 + 10 * MINUTE) });

      expect(checkEligibility(later, T0)).toEqual({ eligible: false, reason: 'not_due' });
      expect(checkEligibility(later, T0, true)).toEqual({ eligible: true });
    });

    it('rejects terminal, processing and budget-exhausted items even when forced', () => {
      expect(checkEligibility(makeItem({ status: 'recovered' }), T0, true)).toEqual({ eligible: false, reason: 'terminal' });
      expect(checkEligibility(makeItem({ status: 'processing' }), T0, true)).toEqual({ eligible: false, reason: 'not_waiting' });
      expect(checkEligibility(makeItem({ retry_count: 3 }), T0, true)).toEqual({
        eligible: false,
        reason: 'retry_budget_exhausted',
      });
    });
  });

  describe('deadlineBreach', () => {
    it('fires the SLA deadline before any message was sent', () => {
      const item = makeItem();

      expect(deadlineBreach(item, T0 + 119 * MINUTE)).toBeNull();
      expect(deadlineBreach(item, T0 + 120 * MINUTE)).toBe('sla_deadline_passed');
    });

    it('ignores the SLA deadline once outreach happened', () => {
      const item = makeItem({ status: 'ai_rescue_pending', ai_rescue_attempted: true, messages_sent: 1 });

      expect(deadlineBreach(item, T0 + 600 * MINUTE)).toBeNull();
      expect(deadlineBreach(item, T0 + 2880 * MINUTE)).toBe('escalation_deadline_passed');
    });

    it('prefers the escalation deadline when both have passed', () => {
      expect(deadlineBreach(makeItem(), T0 + 3000 * MINUTE)).toBe('escalation_deadline_passed');
    });

    it('never fires for terminal items', () => {
      expect(deadlineBreach(makeItem({ status: 'failed' }), T0 + 3000 * MINUTE)).toBeNull();
    });

    it('indexes the sweep on the deadline that can fire next', () => {
      expect(sweepDeadline(makeItem())).toBe('2024-01-15T12:00:00.000Z');
      expect(sweepDeadline(makeItem({ ai_rescue_attempted: true }))).toBe('2024-01-17T10:00:00.000Z');
    });
  });

  describe('computeBackoffMs', () => {
    it('doubles from the base delay and caps at the maximum', () => {
      expect(computeBackoffMs(1, noJitter)).toBe(60_000);
      expect(computeBackoffMs(2, noJitter)).toBe(120_000);
      expect(computeBackoffMs(3, noJitter)).toBe(240_000);
      expect(computeBackoffMs(10, noJitter)).toBe(3_600_000);
    });

    it('adds at most jitterRatio of the delay', () => {
      expect(computeBackoffMs(1, { ...DEFAULT_BACKOFF, randomFn: () => 1 })).toBe(72_000);
      expect(computeBackoffMs(2, { ...DEFAULT_BACKOFF, randomFn: () => 0.5 })).toBe(132_000);
    });
  });

  describe('followUpDelayMs', () => {
    it('uses the configured delays and repeats the last one', () => {
      expect(followUpDelayMs(sla, 1)).toBe(120 * MINUTE);
      expect(followUpDelayMs(sla, 2)).toBe(600 * MINUTE);
      expect(followUpDelayMs(sla, 3)).toBe(1440 * MINUTE);
      expect(followUpDelayMs(sla, 7)).toBe(1440 * MINUTE);
    });
  });

  describe('applyAttemptOutcome', () => {
    const now = T0 + MINUTE;

    it('moves a sent first contact to ai_rescue_pending and schedules the follow-up', () => {
      const item = claimed();
      const { next, escalationReason } = applyAttemptOutcome(
        item,
        { kind: 'sent', message_id: 'msg-1', content: 'hi', drafted_by: 'template' },
        sla,
        now,
        noJitter
      );

      expect(escalationReason).toBeUndefined();
      expect(next).toEqual(
        expect.objectContaining({
          status: 'ai_rescue_pending',
          retry_count: 1,
          messages_sent: 1,
          ai_rescue_attempted: true,
          last_attempt_at: iso(now),
          next_attempt_at: iso(now + 120 * MINUTE),
          version: item.version + 1,
        })
      );
      expect(next.processing_started_at).toBeUndefined();
    });

    it('spaces later follow-ups by their own delay', () => {
      const item = transition(
        makeItem({ status: 'ai_rescue_pending', messages_sent: 1, retry_count: 1, ai_rescue_attempted: true }),
        'processing',
        iso(T0)
      );
      const { next } = applyAttemptOutcome(item, { kind: 'sent', message_id: 'msg-2', content: 'hi', drafted_by: 'ai' }, sla, now);

      expect(next.messages_sent).toBe(2);
      expect(next.next_attempt_at).toBe(iso(now + 600 * MINUTE));
    });

    it('backs off a transport failure and returns to the waiting state', () => {
      const { next } = applyAttemptOutcome(claimed(), { kind: 'transport_failure', error: 'timeout' }, sla, now, noJitter);

      expect(next).toEqual(
        expect.objectContaining({
          status: 'queued',
          retry_count: 1,
          transport_failure_count: 1,
          next_attempt_at: iso(now + 60_000),
        })
      );
    });

    it('returns follow-up failures to ai_rescue_pending', () => {
      const item = transition(
        makeItem({ status: 'ai_rescue_pending', messages_sent: 1, retry_count: 1, ai_rescue_attempted: true }),
        'processing',
        iso(T0)
      );
      const { next } = applyAttemptOutcome(item, { kind: 'transport_failure', error: 'timeout' }, sla, now, noJitter);

      expect(next.status).toBe('ai_rescue_pending');
    });

    it('waits at least the breaker retry-after on circuit_open', () => {
      const { next } = applyAttemptOutcome(claimed(), { kind: 'circuit_open', retry_after_ms: 300_000 }, sla, now, noJitter);

      expect(next.status).toBe('queued');
      expect(next.transport_failure_count).toBe(1);
      expect(next.next_attempt_at).toBe(iso(now + 300_000));
    });

    it('escalates when transport failures exhaust the budget', () => {
      const { next, escalationReason } = applyAttemptOutcome(
        claimed({ retry_count: 2, transport_failure_count: 2 }),
        { kind: 'transport_failure', error: 'timeout' },
        sla,
        now,
        noJitter
      );

      expect(escalationReason).toBe('retry_budget_exhausted');
      expect(next).toEqual(
        expect.objectContaining({ status: 'escalated', retry_count: 3, escalation_reason: 'retry_budget_exhausted' })
      );
    });

    it('fails an item whose budget was spent only on compliance blocks', () => {
      const { next, escalationReason } = applyAttemptOutcome(
        claimed({ retry_count: 2, compliance_block_count: 2 }),
        { kind: 'compliance_blocked', reason: 'consent_denied' },
        sla,
        now,
        noJitter
      );

      expect(escalationReason).toBeUndefined();
      expect(next).toEqual(
        expect.objectContaining({ status: 'failed', compliance_block_count: 3, escalation_reason: 'retry_budget_exhausted' })
      );
    });

    it('reschedules a quiet-hours block at the next opening', () => {
      const { next } = applyAttemptOutcome(
        claimed(),
        { kind: 'compliance_blocked', reason: 'quiet_hours', retry_at: '2024-01-16T09:00:00.000Z' },
        sla,
        now,
        noJitter
      );

      expect(next).toEqual(
        expect.objectContaining({
          status: 'queued',
          retry_count: 1,
          compliance_block_count: 1,
          transport_failure_count: 0,
          next_attempt_at: '2024-01-16T09:00:00.000Z',
        })
      );
    });

    it('marks the item opted out on an opt-out block', () => {
      const { next } = applyAttemptOutcome(claimed(), { kind: 'compliance_blocked', reason: 'opted_out' }, sla, now, noJitter);

      expect(next.opted_out).toBe(true);
      expect(next.next_attempt_at).toBe(iso(now + 60_000));
    });

    it('escalates an unrecoverable error immediately', () => {
      const { next, escalationReason } = applyAttemptOutcome(
        claimed(),
        { kind: 'unrecoverable', error: 'invalid number' },
        sla,
        now
      );

      expect(escalationReason).toBe('unrecoverable_error');
      expect(next.status).toBe('escalated');
      expect(next.retry_count).toBe(1);
    });
  });

  describe('waitingStatusFor', () => {
    it('returns queued before any message and ai_rescue_pending after', () => {
      expect(waitingStatusFor(makeItem())).toBe('queued');
      expect(waitingStatusFor(makeItem({ messages_sent: 2 }))).toBe('ai_rescue_pending');
    });
  });

  describe('decideReply', () => {
    it('recovers a confident resolved reply', () => {
      expect(decideReply({ kind: 'scored', intent: 'resolved', confidence: 0.7 }, sla)).toEqual({ kind: 'recovered' });
    });

    it('escalates everything else with the matching reason', () => {
      expect(decideReply({ kind: 'scored', intent: 'resolved', confidence: 0.69 }, sla)).toEqual({
        kind: 'escalated',
        reason: 'low_confidence_reply',
      });
      expect(decideReply({ kind: 'scored', intent: 'unclear', confidence: 0.99 }, sla)).toEqual({
        kind: 'escalated',
        reason: 'low_confidence_reply',
      });
      expect(decideReply({ kind: 'scored', intent: 'negative', confidence: 0.99 }, sla)).toEqual({
        kind: 'escalated',
        reason: 'negative_reply',
      });
      expect(decideReply({ kind: 'opt_out' }, sla)).toEqual({ kind: 'escalated', reason: 'opt_out' });
      expect(decideReply({ kind: 'unavailable', error: 'timeout' }, sla)).toEqual({
        kind: 'escalated',
        reason: 'low_confidence_reply',
      });
    });
  });
});
