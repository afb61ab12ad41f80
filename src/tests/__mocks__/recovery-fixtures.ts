import { DEFAULT_SLA_CONFIG } from '../../config/slaConfig';
import { createRecoveryItem } from '../../services/recovery/RecoveryStateMachine';
import type { RecoveryQueueItem, SLAConfig } from '../../types/RecoveryTypes';

/** Monday 2024-01-15 10:00 UTC: inside the default business hours. */
export const MONDAY_10AM_UTC = Date.parse('2024-01-15T10:00:00.000Z');

export const MINUTE = 60_000;

/**
 * A queued item created at `createdAtMs` with the default SLA (120 min response,
 * 2880 min escalation, 3 retries).
 */
export function makeItem(
  overrides: Partial<RecoveryQueueItem> = {},
  createdAtMs: number = MONDAY_10AM_UTC,
  sla: SLAConfig = DEFAULT_SLA_CONFIG
): RecoveryQueueItem {
  const base = createRecoveryItem(
    {
      tenant_id: 'tenant-1',
      provider: 'twilio',
      external_id: 'call-1',
      customer_phone: '+15550001111',
      prior_contact_count: 0,
      consent_status: 'granted',
    },
    sla,
    'item-1',
    createdAtMs
  );
  return { ...base, ...overrides };
}
