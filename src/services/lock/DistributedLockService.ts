/**
 * Distributed Lock Service
 *
 * Tenant-scoped mutual exclusion with lease expiry. Each acquisition gets a
 * fresh owner token; release and extend only act for the current owner.
 * Acquisition never blocks: a held lock is reported, not waited on.
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/Logger';
import { Clock, systemClock } from '../../types/CommonTypes';
import { ValidationError } from '../../types/RecoveryErrors';
import { DEFAULT_LOCK_TIMEOUT_SECONDS, LockStore, WithLockResult } from '../../types/LockTypes';

export interface LockHandle {
  tenantId: string;
  resourceKey: string;
  ownerToken: string;
  expiresAtMs: number;
}

export class DistributedLockService {
  constructor(
    private readonly store: LockStore,
    private readonly logger: Logger,
    private readonly defaultTimeoutSeconds: number = DEFAULT_LOCK_TIMEOUT_SECONDS,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Returns a handle when acquired, null when another owner holds an unexpired lease.
   * Store errors propagate.
   */
  async acquire(
    tenantId: string,
    resourceKey: string,
    timeoutSeconds: number = this.defaultTimeoutSeconds
  ): Promise<LockHandle | null> {
    if (!(timeoutSeconds > 0)) {
      throw new ValidationError(`Lock timeout must be positive, got ${timeoutSeconds}`, 'INVALID_LOCK_TIMEOUT');
    }
    const nowMs = this.clock();
    const handle: LockHandle = {
      tenantId,
      resourceKey,
      ownerToken: uuidv4(),
      expiresAtMs: nowMs + timeoutSeconds * 1000,
    };

    const acquired = await this.store.putIfAvailable(
      {
        tenant_id: tenantId,
        resource_key: resourceKey,
        owner_token: handle.ownerToken,
        expires_at_ms: handle.expiresAtMs,
      },
      nowMs
    );

    if (!acquired) {
      this.logger.debug('Lock held by another owner', { tenantId, resourceKey });
      return null;
    }
    return handle;
  }

  /**
   * Deletes the lease only if this handle still owns it. False when the lease
   * expired and was taken over (or already released).
   */
  async release(handle: LockHandle): Promise<boolean> {
    const released = await this.store.deleteIfOwner(handle.tenantId, handle.resourceKey, handle.ownerToken);
    if (!released) {
      this.logger.warn('Lock release ignored: not the current owner', {
        tenantId: handle.tenantId,
        resourceKey: handle.resourceKey,
      });
    }
    return released;
  }

  /** Resets the lease to expire newTimeoutSeconds from now; fails once it has lapsed. */
  async extend(handle: LockHandle, newTimeoutSeconds: number): Promise<boolean> {
    if (!(newTimeoutSeconds > 0)) {
      throw new ValidationError(`Lock timeout must be positive, got ${newTimeoutSeconds}`, 'INVALID_LOCK_TIMEOUT');
    }
    const nowMs = this.clock();
    const expiresAtMs = nowMs + newTimeoutSeconds * 1000;
    const extended = await this.store.extendIfOwner(
      handle.tenantId,
      handle.resourceKey,
      handle.ownerToken,
      expiresAtMs,
      nowMs
    );
    if (extended) {
      handle.expiresAtMs = expiresAtMs;
    }
    return extended;
  }

  async isHeld(tenantId: string, resourceKey: string): Promise<boolean> {
    const entry = await this.store.get(tenantId, resourceKey);
    return !!entry && entry.expires_at_ms > this.clock();
  }

  /**
   * Runs fn under the lock and always attempts release, also when fn throws.
   */
  async withLock<T>(
    tenantId: string,
    resourceKey: string,
    fn: () => Promise<T>,
    timeoutSeconds?: number
  ): Promise<WithLockResult<T>> {
    const handle = await this.acquire(tenantId, resourceKey, timeoutSeconds);
    if (!handle) {
      return { acquired: false };
    }
    try {
      const value = await fn();
      return { acquired: true, value };
    } finally {
      await this.releaseQuietly(handle);
    }
  }

  private async releaseQuietly(handle: LockHandle): Promise<void> {
    try {
      await this.release(handle);
    } catch (error) {
      this.logger.error('Lock release failed; lease will expire', {
        tenantId: handle.tenantId,
        resourceKey: handle.resourceKey,
        error,
      });
    }
  }
}
