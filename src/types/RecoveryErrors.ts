/**
 * Recovery Errors - typed errors with error_class, error_code and retryable flags.
 *
 * Collaborator adapters throw these; the outreach layer and the breaker read
 * `retryable` to decide whether a failure counts against the dependency.
 */

export type RecoveryErrorClass =
  | 'VALIDATION'
  | 'CONFIGURATION'
  | 'STATE'
  | 'DOWNSTREAM'
  | 'CIRCUIT_OPEN'
  | 'CONTENTION'
  | 'UNKNOWN';

/**
 * Base recovery error
 */
export class RecoveryError extends Error {
  constructor(
    message: string,
    public readonly error_class: RecoveryErrorClass,
    public readonly error_code?: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ValidationError extends RecoveryError {
  constructor(message: string, errorCode?: string) {
    super(message, 'VALIDATION', errorCode || 'VALIDATION_FAILED', false);
  }
}

export class ConfigurationError extends RecoveryError {
  constructor(message: string) {
    super(message, 'CONFIGURATION', 'CONFIGURATION_INVALID', false);
  }
}

export class InvalidTransitionError extends RecoveryError {
  constructor(itemId: string, from: string, to: string) {
    super(`Invalid recovery transition for item ${itemId}: ${from} -> ${to}`, 'STATE', 'INVALID_TRANSITION', false);
  }
}

/**
 * Raised by callers that need an exception where the breaker returned `rejected`.
 */
export class CircuitOpenError extends RecoveryError {
  constructor(
    public readonly breakerKey: string,
    public readonly retryAfterMs: number
  ) {
    super(
      `Circuit breaker ${breakerKey} is open; retry after ${retryAfterMs}ms`,
      'CIRCUIT_OPEN',
      'CIRCUIT_OPEN',
      true
    );
  }
}

/**
 * Downstream failures worth retrying (timeouts, 5xx, 429, network).
 */
export class TransientDeliveryError extends RecoveryError {
  constructor(message: string, errorCode?: string) {
    super(message, 'DOWNSTREAM', errorCode || 'DOWNSTREAM_ERROR', true);
  }
}

/**
 * Downstream rejected the request itself (bad number, 4xx). Not retried and not a dependency failure.
 */
export class PermanentDeliveryError extends RecoveryError {
  constructor(message: string, errorCode?: string) {
    super(message, 'DOWNSTREAM', errorCode || 'DOWNSTREAM_REJECTED', false);
  }
}

export class LockContentionError extends RecoveryError {
  constructor(resourceKey: string, tenantId: string) {
    super(`Lock held by another worker: ${tenantId}:${resourceKey}`, 'CONTENTION', 'LOCK_CONTENTION', true);
  }
}

export class IdempotencyInProgressError extends RecoveryError {
  constructor(provider: string, externalId: string) {
    super(
      `Event ${provider}:${externalId} is being processed by another delivery`,
      'CONTENTION',
      'IDEMPOTENCY_IN_PROGRESS',
      true
    );
  }
}

/**
 * True when an error is one of ours and marked retryable. Unknown errors are
 * treated as retryable downstream failures.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RecoveryError) {
    return error.retryable;
  }
  return true;
}
