/**
 * Idempotency Ledger Service
 *
 * At-most-one successful handling per (tenant, provider, external_id).
 * `begin` is one atomic upsert against the store; the pre-existing row decides
 * the disposition. A handler that throws gets its row removed (`forget`) so a
 * redelivery is treated as first-time again.
 */

import { Logger } from '../core/Logger';
import { Clock, systemClock } from '../../types/CommonTypes';
import {
  BeginResult,
  DEFAULT_IDEMPOTENCY_LEDGER_CONFIG,
  IdempotencyKey,
  IdempotencyLedgerConfig,
  IdempotencyStore,
  RunOnceResult,
} from '../../types/IdempotencyTypes';

export class IdempotencyLedgerService {
  constructor(
    private readonly store: IdempotencyStore,
    private readonly logger: Logger,
    private readonly config: IdempotencyLedgerConfig = DEFAULT_IDEMPOTENCY_LEDGER_CONFIG,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Record a delivery and classify it. Store errors propagate: an I/O failure
   * must never be read as "not a duplicate".
   */
  async begin(tenantId: string, provider: string, externalId: string): Promise<BeginResult> {
    const key: IdempotencyKey = { tenant_id: tenantId, provider, external_id: externalId };
    const nowMs = this.clock();
    const nowIso = new Date(nowMs).toISOString();

    const previous = await this.store.recordDelivery(key, nowIso);

    if (!previous) {
      this.logger.debug('Idempotency key claimed (first delivery)', { tenantId, provider, externalId });
      return { duplicate: false, disposition: 'first', first_processed_at: null, attempts: 1 };
    }

    const attempts = previous.attempts + 1;

    if (previous.first_processed_at) {
      this.logger.info('Duplicate delivery ignored', {
        tenantId,
        provider,
        externalId,
        firstProcessedAt: previous.first_processed_at,
        attempts,
      });
      return {
        duplicate: true,
        disposition: 'duplicate',
        first_processed_at: previous.first_processed_at,
        attempts,
      };
    }

    const claimedAtMs = Date.parse(previous.claimed_at);
    const abandoned =
      Number.isNaN(claimedAtMs) || nowMs - claimedAtMs >= this.config.inProgressTimeoutMs;
    if (abandoned && (await this.store.reclaim(key, previous.claimed_at, nowIso))) {
      this.logger.warn('Reclaimed abandoned idempotency claim', {
        tenantId,
        provider,
        externalId,
        previousClaimAt: previous.claimed_at,
      });
      return { duplicate: false, disposition: 'first', first_processed_at: null, attempts };
    }

    this.logger.info('Delivery already in progress elsewhere', { tenantId, provider, externalId, attempts });
    return { duplicate: true, disposition: 'in_progress', first_processed_at: null, attempts };
  }

  async markProcessed(tenantId: string, provider: string, externalId: string): Promise<void> {
    const nowIso = new Date(this.clock()).toISOString();
    const marked = await this.store.markProcessed(
      { tenant_id: tenantId, provider, external_id: externalId },
      nowIso
    );
    if (!marked) {
      this.logger.warn('Idempotency key not marked (already processed or purged)', {
        tenantId,
        provider,
        externalId,
      });
    }
  }

  async forget(tenantId: string, provider: string, externalId: string): Promise<void> {
    const removed = await this.store.remove({ tenant_id: tenantId, provider, external_id: externalId });
    this.logger.info('Idempotency key forgotten for retry', { tenantId, provider, externalId, removed });
  }

  /**
   * begin → handler → markProcessed, or forget when the handler throws.
   */
  async runOnce<T>(
    tenantId: string,
    provider: string,
    externalId: string,
    handler: () => Promise<T>
  ): Promise<RunOnceResult<T>> {
    const begin = await this.begin(tenantId, provider, externalId);
    if (begin.disposition === 'duplicate') {
      return { kind: 'duplicate', first_processed_at: begin.first_processed_at };
    }
    if (begin.disposition === 'in_progress') {
      return { kind: 'in_progress' };
    }

    let value: T;
    try {
      value = await handler();
    } catch (handlerError) {
      try {
        await this.forget(tenantId, provider, externalId);
      } catch (forgetError) {
        this.logger.error('Failed to forget idempotency key after handler error', {
          tenantId,
          provider,
          externalId,
          error: forgetError,
        });
      }
      throw handlerError;
    }

    await this.markProcessed(tenantId, provider, externalId);
    return { kind: 'processed', value };
  }

  /**
   * Delete rows not seen within the retention window, completed or not.
   */
  async purgeExpired(retentionDays: number = this.config.retentionDays): Promise<number> {
    const cutoffIso = new Date(this.clock() - retentionDays * 86_400_000).toISOString();
    const deleted = await this.store.purgeSeenBefore(cutoffIso);
    this.logger.info('Purged idempotency keys', { deleted, retentionDays, cutoff: cutoffIso });
    return deleted;
  }
}
