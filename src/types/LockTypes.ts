/**
 * Distributed lease lock types.
 */

export interface LockEntry {
  tenant_id: string;
  resource_key: string;
  owner_token: string;
  expires_at_ms: number;
}

/**
 * Coordination store port. Every method is a single atomic conditional operation.
 */
export interface LockStore {
  /** Writes the entry only if no unexpired entry exists for (tenant, resource). */
  putIfAvailable(entry: LockEntry, nowMs: number): Promise<boolean>;
  deleteIfOwner(tenantId: string, resourceKey: string, ownerToken: string): Promise<boolean>;
  extendIfOwner(
    tenantId: string,
    resourceKey: string,
    ownerToken: string,
    expiresAtMs: number,
    nowMs: number
  ): Promise<boolean>;
  get(tenantId: string, resourceKey: string): Promise<LockEntry | null>;
}

export type WithLockResult<T> = { acquired: false } | { acquired: true; value: T };

export const DEFAULT_LOCK_TIMEOUT_SECONDS = 300;
