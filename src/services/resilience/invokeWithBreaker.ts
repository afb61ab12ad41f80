/**
 * Single choke point for collaborator calls. Rejections and failures come back
 * as values; the caller decides the state transition.
 */

import { BreakerCallResult } from '../../types/CircuitBreakerTypes';
import type { CircuitBreaker } from './CircuitBreaker';

export async function invokeWithBreaker<T>(
  breaker: CircuitBreaker,
  fn: () => Promise<T>
): Promise<BreakerCallResult<T>> {
  const allow = breaker.allowRequest();
  if (!allow.allowed) {
    return {
      kind: 'rejected',
      state: allow.state,
      retryAfterMs: allow.retryAfterMs ?? breaker.config.recoveryTimeoutMs,
    };
  }

  try {
    const value = await fn();
    breaker.recordSuccess(allow.generation);
    return { kind: 'success', value };
  } catch (error) {
    breaker.recordFailure(error, allow.generation);
    return { kind: 'failure', error };
  }
}
