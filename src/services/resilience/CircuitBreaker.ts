/**
 * Circuit Breaker
 *
 * In-process breaker for one (tenant, service) pair.
 * CLOSED: calls pass; counted failures accumulate until the threshold opens it.
 * OPEN: calls are rejected until recoveryTimeoutMs has passed since the last failure,
 * then exactly one caller is admitted as the HALF_OPEN probe.
 * HALF_OPEN: the probe decides; success closes, failure reopens and restarts the timer.
 *
 * Every state change bumps a generation number. A call settles the breaker only
 * if it finishes in the generation it was admitted under, so a slow call from
 * the closed period cannot decide a half-open trial.
 */

import { Logger } from '../core/Logger';
import { Clock, systemClock } from '../../types/CommonTypes';
import {
  AllowRequestResult,
  CircuitBreakerConfig,
  CircuitBreakerSnapshot,
  CircuitState,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
} from '../../types/CircuitBreakerTypes';
import { isRetryableError } from '../../types/RecoveryErrors';

/** Decides whether an error counts against the dependency. */
export type FailurePredicate = (error: unknown) => boolean;

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private probeInFlight = false;
  private generation = 0;

  private totalCalls = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private totalRejections = 0;

  constructor(
    readonly serviceName: string,
    readonly tenantId: string,
    private readonly logger: Logger,
    readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly isFailure: FailurePredicate = isRetryableError,
    private readonly clock: Clock = systemClock
  ) {}

  get key(): string {
    return `${this.tenantId}:${this.serviceName}`;
  }

  allowRequest(): AllowRequestResult {
    const now = this.clock();

    if (this.state === 'closed') {
      this.totalCalls++;
      return { allowed: true, state: 'closed', generation: this.generation };
    }

    if (this.state === 'open') {
      const elapsed = now - (this.lastFailureTime ?? now);
      if (elapsed >= this.config.recoveryTimeoutMs) {
        this.moveTo('half_open');
        this.probeInFlight = true;
        this.totalCalls++;
        this.logger.info('Circuit half-open; admitting probe', { breaker: this.key, tenantId: this.tenantId });
        return { allowed: true, state: 'half_open', probe: true, generation: this.generation };
      }
      this.totalRejections++;
      return {
        allowed: false,
        state: 'open',
        retryAfterMs: this.config.recoveryTimeoutMs - elapsed,
      };
    }

    if (this.probeInFlight) {
      this.totalRejections++;
      return { allowed: false, state: 'half_open', retryAfterMs: this.config.recoveryTimeoutMs };
    }
    this.probeInFlight = true;
    this.totalCalls++;
    return { allowed: true, state: 'half_open', probe: true, generation: this.generation };
  }

  recordSuccess(generation: number = this.generation): void {
    this.totalSuccesses++;
    if (generation !== this.generation) {
      return;
    }
    this.successCount++;
    if (this.state === 'half_open') {
      this.close();
    }
  }

  /**
   * Errors rejected by the failure predicate prove the dependency answered, so
   * they settle a probe the same way a success does.
   */
  recordFailure(error: unknown, generation: number = this.generation): void {
    const counted = this.isFailure(error);
    if (counted) {
      this.totalFailures++;
    }
    if (generation !== this.generation) {
      return;
    }
    if (!counted) {
      if (this.state === 'half_open') {
        this.close();
      }
      return;
    }

    this.failureCount++;
    this.lastFailureTime = this.clock();

    if (this.state === 'half_open') {
      this.moveTo('open');
      this.probeInFlight = false;
      this.logger.warn('Circuit reopened after probe failure', { breaker: this.key, tenantId: this.tenantId });
      return;
    }

    if (this.state === 'closed' && this.failureCount >= this.config.failureThreshold) {
      this.moveTo('open');
      this.logger.warn('Circuit opened', {
        breaker: this.key,
        tenantId: this.tenantId,
        failureCount: this.failureCount,
      });
    }
  }

  reset(): void {
    this.close();
    this.successCount = 0;
    this.lastFailureTime = null;
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      name: this.serviceName,
      tenant_id: this.tenantId,
      state: this.state,
      failure_count: this.failureCount,
      success_count: this.successCount,
      last_failure_time: this.lastFailureTime === null ? null : new Date(this.lastFailureTime).toISOString(),
      total_calls: this.totalCalls,
      total_failures: this.totalFailures,
      total_successes: this.totalSuccesses,
      total_rejections: this.totalRejections,
      failure_rate: this.totalCalls === 0 ? 0 : this.totalFailures / this.totalCalls,
    };
  }

  private close(): void {
    if (this.state !== 'closed') {
      this.logger.info('Circuit closed', { breaker: this.key, tenantId: this.tenantId });
      this.moveTo('closed');
    }
    this.failureCount = 0;
    this.probeInFlight = false;
  }

  private moveTo(next: CircuitState): void {
    this.state = next;
    this.generation++;
  }
}
