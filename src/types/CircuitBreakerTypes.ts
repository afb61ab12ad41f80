/**
 * Circuit breaker state and resilience types.
 */

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeoutMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60_000,
};

export interface CircuitBreakerSnapshot {
  name: string;
  tenant_id: string;
  state: CircuitState;
  failure_count: number;
  success_count: number;
  last_failure_time: string | null;
  total_calls: number;
  total_failures: number;
  total_successes: number;
  total_rejections: number;
  failure_rate: number;
}

export interface AllowRequestResult {
  allowed: boolean;
  state: CircuitState;
  /** Set when this caller holds the single half-open trial. */
  probe?: boolean;
  /**
   * State generation the call was admitted under. Outcomes reported with an
   * older generation only update the totals.
   */
  generation?: number;
  retryAfterMs?: number;
}

export type BreakerCallResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'rejected'; state: CircuitState; retryAfterMs: number }
  | { kind: 'failure'; error: unknown };
