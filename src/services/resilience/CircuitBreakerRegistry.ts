/**
 * Circuit Breaker Registry
 *
 * Owns one breaker per (tenant, service). Passed by reference to whoever calls
 * collaborators; one tenant's failures never trip another tenant's breaker.
 */

import { Logger } from '../core/Logger';
import { Clock, systemClock } from '../../types/CommonTypes';
import {
  CircuitBreakerConfig,
  CircuitBreakerSnapshot,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
} from '../../types/CircuitBreakerTypes';
import { CircuitBreaker, FailurePredicate } from './CircuitBreaker';

export interface BreakerOptions extends Partial<CircuitBreakerConfig> {
  isFailure?: FailurePredicate;
}

export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly logger: Logger,
    private readonly defaults: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Existing breakers keep the settings they were created with.
   */
  getOrCreate(serviceName: string, tenantId: string, options: BreakerOptions = {}): CircuitBreaker {
    const key = `${tenantId}:${serviceName}`;
    const existing = this.breakers.get(key);
    if (existing) {
      return existing;
    }
    const { isFailure, ...overrides } = options;
    const breaker = new CircuitBreaker(
      serviceName,
      tenantId,
      this.logger,
      { ...this.defaults, ...overrides },
      isFailure,
      this.clock
    );
    this.breakers.set(key, breaker);
    this.logger.debug('Circuit breaker created', { breaker: key, tenantId });
    return breaker;
  }

  get(serviceName: string, tenantId: string): CircuitBreaker | undefined {
    return this.breakers.get(`${tenantId}:${serviceName}`);
  }

  getAllStates(tenantId?: string): CircuitBreakerSnapshot[] {
    const snapshots: CircuitBreakerSnapshot[] = [];
    for (const breaker of this.breakers.values()) {
      if (tenantId === undefined || breaker.tenantId === tenantId) {
        snapshots.push(breaker.snapshot());
      }
    }
    return snapshots;
  }

  /** Operator reset. False when no such breaker exists. */
  reset(serviceName: string, tenantId: string): boolean {
    const breaker = this.get(serviceName, tenantId);
    if (!breaker) {
      return false;
    }
    breaker.reset();
    this.logger.info('Circuit breaker reset by operator', { breaker: breaker.key, tenantId });
    return true;
  }

  resetAll(): number {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
    this.logger.info('All circuit breakers reset', { count: this.breakers.size });
    return this.breakers.size;
  }
}
