/**
 * Scenario tests for RecoveryProcessor over in-memory stores: locking, deadlines,
 * degradation under collaborator outages and customer replies.
 */

import { RecoveryProcessor, DEFAULT_PROCESSOR_OPTIONS, itemLockKey } from '../../../services/recovery/RecoveryProcessor';
import { ComplianceGate } from '../../../services/recovery/ComplianceGate';
import { OutreachService } from '../../../services/recovery/OutreachService';
import { CircuitBreakerRegistry } from '../../../services/resilience/CircuitBreakerRegistry';
import { DistributedLockService } from '../../../services/lock/DistributedLockService';
import { IdempotencyLedgerService } from '../../../services/idempotency/IdempotencyLedgerService';
import { RecoveryEventEmitter } from '../../../services/events/RecoveryEventEmitter';
import { DEFAULT_BACKOFF } from '../../../services/recovery/RecoveryStateMachine';
import { TraceService } from '../../../services/core/TraceService';
import { Logger } from '../../../services/core/Logger';
import { RecoveryEventType } from '../../../types/EventTypes';
import { LockContentionError, TransientDeliveryError } from '../../../types/RecoveryErrors';
import type { CustomerReplyInput, ProcessItemResult, RecoveryQueueItem } from '../../../types/RecoveryTypes';
import {
  FakeClock,
  FakeDraftingService,
  FakeMessagingGateway,
  InMemoryIdempotencyStore,
  InMemoryLockStore,
  InMemoryRecoveryQueueRepository,
  RecordingEventSink,
  StaticSettingsSource,
} from '../../__mocks__/in-memory-stores';
import { MINUTE, MONDAY_10AM_UTC as T0, makeItem } from '../../__mocks__/recovery-fixtures';

const logger = new Logger('RecoveryProcessorTest');
const iso = (ms: number): string => new Date(ms).toISOString();

describe('RecoveryProcessor', () => {
  let clock: FakeClock;
  let repository: InMemoryRecoveryQueueRepository;
  let lockStore: InMemoryLockStore;
  let locks: DistributedLockService;
  let idempotencyStore: InMemoryIdempotencyStore;
  let gateway: FakeMessagingGateway;
  let drafting: FakeDraftingService;
  let sink: RecordingEventSink;
  let processor: RecoveryProcessor;

  beforeEach(() => {
    clock = new FakeClock(T0);
    repository = new InMemoryRecoveryQueueRepository();
    lockStore = new InMemoryLockStore();
    locks = new DistributedLockService(lockStore, logger, 300, clock.now);
    idempotencyStore = new InMemoryIdempotencyStore();
    gateway = new FakeMessagingGateway();
    drafting = new FakeDraftingService();
    sink = new RecordingEventSink();
    const breakers = new CircuitBreakerRegistry(logger, { failureThreshold: 5, recoveryTimeoutMs: 60_000 }, clock.now);

    processor = new RecoveryProcessor(
      {
        repository,
        locks,
        ledger: new IdempotencyLedgerService(idempotencyStore, logger, undefined, clock.now),
        outreach: new OutreachService(gateway, drafting, breakers, logger),
        compliance: new ComplianceGate(logger),
        settings: new StaticSettingsSource(),
        events: new RecoveryEventEmitter(sink, new TraceService(), logger, clock.now),
        logger,
        clock: clock.now,
      },
      { ...DEFAULT_PROCESSOR_OPTIONS, backoff: { ...DEFAULT_BACKOFF, randomFn: () => 0 } }
    );
  });

  describe('processItem', () => {
    it('sends the first contact and records the attempt', async () => {
      repository.put(makeItem());

      const result = await processor.processItem('tenant-1', 'item-1');

      expect(result).toEqual({ kind: 'attempted', outcome: 'sent', status: 'ai_rescue_pending' });
      expect(repository.peek('tenant-1', 'item-1')).toEqual(
        expect.objectContaining({
          status: 'ai_rescue_pending',
          version: 3,
          retry_count: 1,
          messages_sent: 1,
          ai_rescue_attempted: true,
          next_attempt_at: iso(T0 + 120 * MINUTE),
        })
      );
      expect(repository.attempts).toEqual([
        {
          tenant_id: 'tenant-1',
          item_id: 'item-1',
          attempt_number: 1,
          method: 'sms',
          outcome: 'sent',
          success: true,
          customer_engaged: false,
          attempted_at: iso(T0),
          message_id: 'msg-1',
          content_ref: 'ai:msg-1',
          confidence_score: 0.9,
        },
      ]);
      expect(sink.types()).toEqual([RecoveryEventType.RECOVERY_ATTEMPT_RECORDED]);
      expect(sink.events[0]?.payload).toEqual({
        item_id: 'item-1',
        status: 'ai_rescue_pending',
        priority: 'high',
        outcome: 'sent',
        retry_count: 1,
      });
      expect(lockStore.entries.size).toBe(0);
    });

    it('returns not_found for an unknown item', async () => {
      await expect(processor.processItem('tenant-1', 'missing')).resolves.toEqual({ kind: 'not_found' });
    });

    it('waits for next_attempt_at unless triggered manually', async () => {
      repository.put(makeItem({ next_attempt_at: iso(T0 + 10 * MINUTE) }));

      await expect(processor.processItem('tenant-1', 'item-1')).resolves.toEqual({
        kind: 'not_due',
        status: 'queued',
        next_attempt_at: iso(T0 + 10 * MINUTE),
      });
      expect(gateway.requests).toHaveLength(0);

      await expect(processor.processItem('tenant-1', 'item-1', 'manual')).resolves.toEqual({
        kind: 'attempted',
        outcome: 'sent',
        status: 'ai_rescue_pending',
      });
    });

    it('skips an item another worker holds the lock for', async () => {
      repository.put(makeItem());
      await locks.acquire('tenant-1', itemLockKey('item-1'), 60);

      await expect(processor.processItem('tenant-1', 'item-1')).resolves.toEqual({
        kind: 'skipped',
        reason: 'lock_contention',
      });
      expect(repository.saveCalls).toBe(0);
      expect(gateway.requests).toHaveLength(0);
    });

    it('leaves terminal items alone', async () => {
      repository.put(makeItem({ status: 'recovered' }));

      await expect(processor.processItem('tenant-1', 'item-1', 'manual')).resolves.toEqual({ kind: 'noop', status: 'recovered' });
    });

    it('escalates instead of sending once the SLA deadline has passed', async () => {
      repository.put(makeItem());
      clock.advance(120 * MINUTE);

      const result = await processor.processItem('tenant-1', 'item-1', 'manual');

      expect(result).toEqual({ kind: 'escalated', reason: 'sla_deadline_passed' });
      expect(gateway.requests).toHaveLength(0);
      expect(repository.peek('tenant-1', 'item-1')).toEqual(
        expect.objectContaining({ status: 'escalated', escalation_reason: 'sla_deadline_passed', escalated_at: iso(clock.nowMs) })
      );
      expect(sink.types()).toEqual([RecoveryEventType.RECOVERY_ITEM_ESCALATED]);
      expect(sink.events[0]?.source).toBe('recovery');
      expect(sink.events[0]?.payload).toEqual(expect.objectContaining({ reason: 'sla_deadline_passed' }));
    });

    it('records a quiet-hours block and reschedules at the opening', async () => {
      const sevenAm = Date.parse('2024-01-15T07:00:00.000Z');
      repository.put(makeItem({}, sevenAm));
      clock.nowMs = Date.parse('2024-01-15T08:00:00.000Z');

      const result = await processor.processItem('tenant-1', 'item-1');

      expect(result).toEqual({ kind: 'attempted', outcome: 'compliance_blocked', status: 'queued' });
      expect(gateway.requests).toHaveLength(0);
      expect(repository.peek('tenant-1', 'item-1')?.next_attempt_at).toBe('2024-01-15T09:00:00.000Z');
      expect(repository.attempts[0]).toEqual(
        expect.objectContaining({ outcome: 'compliance_blocked', blocked_reason: 'quiet_hours', success: false })
      );
    });

    it('degrades to retries when the SMS gateway is down, then stops calling it', async () => {
      gateway.failNext(new TransientDeliveryError('gateway timeout'), 5);
      for (let i = 1; i <= 6; i++) {
        repository.put(makeItem({ item_id: `item-${i}`, external_id: `call-${i}` }));
      }

      const results: ProcessItemResult[] = [];
      for (let i = 1; i <= 6; i++) {
        results.push(await processor.processItem('tenant-1', `item-${i}`));
      }

      expect(results.slice(0, 5).every((r) => r.kind === 'attempted' && r.outcome === 'transport_failure')).toBe(true);
      expect(results[5]).toEqual({ kind: 'attempted', outcome: 'circuit_open', status: 'queued' });
      expect(gateway.requests).toHaveLength(5);
      expect(repository.peek('tenant-1', 'item-6')).toEqual(
        expect.objectContaining({
          status: 'queued',
          retry_count: 1,
          transport_failure_count: 1,
          next_attempt_at: iso(T0 + 60_000),
        })
      );
      expect(repository.attempts[5]?.error).toBe('circuit open; retry after 60000ms');
    });

    it('escalates when the budget is spent on transport failures', async () => {
      gateway.failNext(new TransientDeliveryError('gateway timeout'), 3);
      repository.put(makeItem({ retry_count: 2, transport_failure_count: 2 }));

      await expect(processor.processItem('tenant-1', 'item-1')).resolves.toEqual({
        kind: 'escalated',
        reason: 'retry_budget_exhausted',
      });
      expect(sink.types()).toEqual([
        RecoveryEventType.RECOVERY_ATTEMPT_RECORDED,
        RecoveryEventType.RECOVERY_ITEM_ESCALATED,
      ]);
    });
  });

  describe('store failures after the processing claim', () => {
    it('moves the item on from processing when the attempt row cannot be written', async () => {
      repository.put(makeItem());
      jest.spyOn(repository, 'appendAttempt').mockRejectedValueOnce(new Error('ddb unavailable'));

      await expect(processor.processItem('tenant-1', 'item-1')).rejects.toThrow('ddb unavailable');

      expect(repository.peek('tenant-1', 'item-1')).toEqual(
        expect.objectContaining({
          status: 'ai_rescue_pending',
          version: 3,
          retry_count: 1,
          next_attempt_at: iso(T0 + 120 * MINUTE),
        })
      );
      expect(repository.attempts).toEqual([]);
      expect(lockStore.entries.size).toBe(0);

      clock.advance(20 * MINUTE);
      await expect(processor.sweepSla()).resolves.toEqual({ candidates: 0, escalated: 0, skipped: 0 });
      expect(repository.peek('tenant-1', 'item-1')?.status).toBe('ai_rescue_pending');
    });

    it('leaves the item in processing only when the release write fails too', async () => {
      repository.put(makeItem());
      jest.spyOn(repository, 'appendAttempt').mockRejectedValueOnce(new Error('ddb unavailable'));
      const realSave = repository.saveItem.bind(repository);
      jest
        .spyOn(repository, 'saveItem')
        .mockImplementationOnce(realSave)
        .mockRejectedValueOnce(new Error('ddb unavailable'));

      await expect(processor.processItem('tenant-1', 'item-1')).rejects.toThrow('ddb unavailable');

      expect(repository.peek('tenant-1', 'item-1')?.status).toBe('processing');
      expect(lockStore.entries.size).toBe(0);
    });

    it('rejects an attempt number that was already recorded', async () => {
      repository.put(makeItem());
      repository.attempts.push({
        tenant_id: 'tenant-1',
        item_id: 'item-1',
        attempt_number: 1,
        method: 'sms',
        outcome: 'transport_failure',
        success: false,
        customer_engaged: false,
        attempted_at: iso(T0 - MINUTE),
      });

      await expect(processor.processItem('tenant-1', 'item-1')).rejects.toMatchObject({
        name: 'ConditionalCheckFailedException',
      });
      expect(repository.attempts).toHaveLength(1);
      expect(repository.peek('tenant-1', 'item-1')?.retry_count).toBe(1);
    });
  });

  describe('processDueItems', () => {
    it('processes due items only and tallies the results', async () => {
      repository.put(makeItem({ item_id: 'a' }));
      repository.put(makeItem({ item_id: 'b', priority: 'low' }));
      repository.put(makeItem({ item_id: 'c', next_attempt_at: iso(T0 + MINUTE) }));

      const stats = await processor.processDueItems();

      expect(stats).toEqual({ candidates: 2, attempted: 2, escalated: 0, skipped: 0, not_due: 0 });
      expect(gateway.requests).toHaveLength(2);
    });

    it('rethrows a store failure after the rest of the batch settles', async () => {
      repository.put(makeItem({ item_id: 'a' }));
      repository.put(makeItem({ item_id: 'b' }));
      jest.spyOn(repository, 'getItem').mockRejectedValueOnce(new Error('ddb unavailable'));

      await expect(processor.processDueItems()).rejects.toThrow('ddb unavailable');
      expect(gateway.requests).toHaveLength(1);
      expect(lockStore.entries.size).toBe(0);
    });
  });

  describe('sweepSla', () => {
    it('escalates an overdue item exactly once under concurrent sweeps', async () => {
      repository.put(makeItem());
      clock.advance(121 * MINUTE);

      const [first, second] = await Promise.all([processor.sweepSla(), processor.sweepSla()]);

      expect(first.escalated + second.escalated).toBe(1);
      expect(repository.peek('tenant-1', 'item-1')?.status).toBe('escalated');
      expect(sink.types()).toEqual([RecoveryEventType.RECOVERY_ITEM_ESCALATED]);
      expect(sink.events[0]?.source).toBe('sweep');
    });

    it('does not escalate an item already contacted before its escalation deadline', async () => {
      repository.put(makeItem({ status: 'ai_rescue_pending', ai_rescue_attempted: true, messages_sent: 1 }));
      clock.advance(600 * MINUTE);

      await expect(processor.sweepSla()).resolves.toEqual({ candidates: 0, escalated: 0, skipped: 0 });
    });

    it('escalates items stuck in processing past the timeout', async () => {
      const started = T0 - 16 * MINUTE;
      repository.put(makeItem({ status: 'processing', processing_started_at: iso(started) }, started));

      await expect(processor.sweepSla()).resolves.toEqual({ candidates: 1, escalated: 1, skipped: 0 });
      expect(repository.peek('tenant-1', 'item-1')).toEqual(
        expect.objectContaining({ status: 'escalated', escalation_reason: 'processing_timeout' })
      );
    });

    it('reports candidates it could not lock as skipped', async () => {
      repository.put(makeItem());
      clock.advance(121 * MINUTE);
      await locks.acquire('tenant-1', itemLockKey('item-1'), 60);

      await expect(processor.sweepSla()).resolves.toEqual({ candidates: 1, escalated: 0, skipped: 1 });
    });
  });

  describe('escalateManually', () => {
    it('hands a live item to a human', async () => {
      repository.put(makeItem());

      await expect(processor.escalateManually('tenant-1', 'item-1', 'human_takeover')).resolves.toEqual({
        kind: 'escalated',
        reason: 'human_takeover',
      });
      expect(sink.events[0]?.source).toBe('operator');
    });

    it('is a no-op for terminal items and reports missing ones', async () => {
      repository.put(makeItem({ status: 'failed' }));

      await expect(processor.escalateManually('tenant-1', 'item-1', 'operator_request')).resolves.toEqual({
        kind: 'noop',
        status: 'failed',
      });
      await expect(processor.escalateManually('tenant-1', 'nope', 'operator_request')).resolves.toEqual({
        kind: 'not_found',
      });
    });
  });

  describe('handleCustomerReply', () => {
    const reply: CustomerReplyInput = {
      tenant_id: 'tenant-1',
      provider: 'twilio',
      message_id: 'SM-1',
      customer_phone: '+15550001111',
      body: 'Yes, tomorrow morning works',
    };
    const contacted = (): RecoveryQueueItem =>
      makeItem({
        status: 'ai_rescue_pending',
        retry_count: 1,
        messages_sent: 1,
        ai_rescue_attempted: true,
        next_attempt_at: iso(T0 + 120 * MINUTE),
      });

    it('recovers the item on a confident positive reply', async () => {
      repository.put(contacted());
      clock.advance(5 * MINUTE);

      await expect(processor.handleCustomerReply(reply)).resolves.toEqual({ kind: 'recovered', item_id: 'item-1' });
      expect(repository.peek('tenant-1', 'item-1')).toEqual(
        expect.objectContaining({ status: 'recovered', customer_responded: true, resolved_at: iso(T0 + 5 * MINUTE), version: 2 })
      );
      expect(repository.attempts).toEqual([
        expect.objectContaining({
          attempt_number: 2,
          method: 'inbound_reply',
          outcome: 'reply_resolved',
          message_id: 'SM-1',
          confidence_score: 0.95,
          success: true,
          customer_engaged: true,
        }),
      ]);
      expect(sink.types()).toEqual([RecoveryEventType.RECOVERY_ITEM_RECOVERED]);
    });

    it('applies a redelivered reply only once', async () => {
      repository.put(contacted());

      await processor.handleCustomerReply(reply);
      await expect(processor.handleCustomerReply(reply)).resolves.toEqual({ kind: 'duplicate' });
      expect(drafting.scoreRequests).toHaveLength(1);
      expect(repository.attempts).toHaveLength(1);
    });

    it('escalates a reply that arrives before any outreach without scoring it', async () => {
      repository.put(makeItem());

      await expect(processor.handleCustomerReply(reply)).resolves.toEqual({
        kind: 'escalated',
        item_id: 'item-1',
        reason: 'reply_before_outreach',
      });
      expect(drafting.scoreRequests).toHaveLength(0);
    });

    it('escalates and marks opt-out on STOP', async () => {
      repository.put(contacted());

      await expect(processor.handleCustomerReply({ ...reply, body: 'STOP' })).resolves.toEqual({
        kind: 'escalated',
        item_id: 'item-1',
        reason: 'opt_out',
      });
      expect(repository.peek('tenant-1', 'item-1')?.opted_out).toBe(true);
      expect(drafting.scoreRequests).toHaveLength(0);
    });

    it('escalates when the scorer is unavailable', async () => {
      drafting.score = new TransientDeliveryError('scoring timeout');
      repository.put(contacted());

      await expect(processor.handleCustomerReply(reply)).resolves.toEqual({
        kind: 'escalated',
        item_id: 'item-1',
        reason: 'low_confidence_reply',
      });
      expect(repository.attempts[0]?.error).toBe('scoring timeout');
    });

    it('releases an abandoned processing claim before applying the reply', async () => {
      repository.put({ ...contacted(), status: 'processing', processing_started_at: iso(T0), version: 4 });

      await expect(processor.handleCustomerReply(reply)).resolves.toEqual({ kind: 'recovered', item_id: 'item-1' });
      expect(repository.peek('tenant-1', 'item-1')).toEqual(
        expect.objectContaining({ status: 'recovered', version: 6, processing_started_at: undefined })
      );
    });

    it('reports replies from numbers with no active item', async () => {
      await expect(processor.handleCustomerReply(reply)).resolves.toEqual({ kind: 'no_active_item' });
    });

    it('throws on lock contention and lets the redelivery through later', async () => {
      repository.put(contacted());
      const held = await locks.acquire('tenant-1', itemLockKey('item-1'), 60);
      if (!held) throw new Error('expected lock');

      await expect(processor.handleCustomerReply(reply)).rejects.toBeInstanceOf(LockContentionError);
      expect(idempotencyStore.get({ tenant_id: 'tenant-1', provider: 'twilio', external_id: 'reply:SM-1' })).toBeUndefined();

      await locks.release(held);
      await expect(processor.handleCustomerReply(reply)).resolves.toEqual({ kind: 'recovered', item_id: 'item-1' });
    });
  });
});
