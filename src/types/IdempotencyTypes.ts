/**
 * Idempotency ledger types.
 */

export interface IdempotencyKey {
  tenant_id: string;
  provider: string;
  external_id: string;
}

export interface IdempotencyRecord extends IdempotencyKey {
  first_processed_at: string | null;
  last_seen_at: string;
  claimed_at: string;
  attempts: number;
}

/**
 * first: caller owns the key and must run its handler.
 * duplicate: a previous delivery completed; skip all side effects.
 * in_progress: another delivery holds an unexpired claim; skip.
 */
export type IdempotencyDisposition = 'first' | 'duplicate' | 'in_progress';

export interface BeginResult {
  duplicate: boolean;
  disposition: IdempotencyDisposition;
  first_processed_at: string | null;
  attempts: number;
}

export type RunOnceResult<T> =
  | { kind: 'processed'; value: T }
  | { kind: 'duplicate'; first_processed_at: string | null }
  | { kind: 'in_progress' };

/**
 * Storage port. `recordDelivery` must be a single atomic upsert.
 */
export interface IdempotencyStore {
  /** Upsert last_seen_at/attempts; returns the row as it was before, or null if newly inserted. */
  recordDelivery(key: IdempotencyKey, nowIso: string): Promise<IdempotencyRecord | null>;
  /** Compare-and-set the claim of an unfinished row. */
  reclaim(key: IdempotencyKey, expectedClaimedAt: string, nowIso: string): Promise<boolean>;
  /** Sets first_processed_at once; false if already set or the row is gone. */
  markProcessed(key: IdempotencyKey, nowIso: string): Promise<boolean>;
  /** Deletes an unfinished row; false if it was already completed or absent. */
  remove(key: IdempotencyKey): Promise<boolean>;
  purgeSeenBefore(cutoffIso: string): Promise<number>;
}

export interface IdempotencyLedgerConfig {
  /** Claims older than this are treated as abandoned by a crashed handler. */
  inProgressTimeoutMs: number;
  retentionDays: number;
}

export const DEFAULT_IDEMPOTENCY_LEDGER_CONFIG: IdempotencyLedgerConfig = {
  inProgressTimeoutMs: 5 * 60 * 1000,
  retentionDays: 90,
};
