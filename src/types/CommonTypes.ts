/**
 * Common types used across the recovery core
 */

export interface TraceContext {
  traceId: string;
  tenantId: string;
  itemId?: string;
}

export interface TenantScoped {
  tenant_id: string;
}

/**
 * Millisecond wall clock. Injected everywhere time matters so ticks,
 * leases and deadlines can be driven deterministically.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export type EventSource = 'ingestion' | 'recovery' | 'sweep' | 'operator' | 'system';
