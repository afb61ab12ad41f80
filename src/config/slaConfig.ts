/**
 * Tenant SLA configuration: defaults, validation and merging of stored overrides.
 */

import { z } from 'zod';
import type { SLAConfig } from '../types/RecoveryTypes';

export const DEFAULT_SLA_CONFIG: SLAConfig = {
  response_time_minutes: 120,
  escalation_time_minutes: 2880,
  max_retries: 3,
  business_hours: {
    start: '09:00',
    end: '17:00',
    days: [1, 2, 3, 4, 5],
    timezone: 'UTC',
  },
  ai_enabled: true,
  ai_confidence_threshold: 0.7,
  follow_up_delays_minutes: [120, 600, 1440],
};

const HH_MM = /^([01]\d|2[0-3]):[0-5]\d$/;

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const BusinessHoursSchema = z.object({
  start: z.string().regex(HH_MM, 'start must be HH:mm'),
  end: z.string().regex(HH_MM, 'end must be HH:mm'),
  days: z.array(z.number().int().min(1).max(7)).min(1, 'at least one business day is required'),
  timezone: z.string().refine(isValidTimeZone, { message: 'unknown IANA timezone' }),
});

const SLAConfigObject = z.object({
  response_time_minutes: z.number().int().positive(),
  escalation_time_minutes: z.number().int().positive(),
  max_retries: z.number().int().min(1).max(20),
  business_hours: BusinessHoursSchema,
  ai_enabled: z.boolean(),
  ai_confidence_threshold: z.number().min(0).max(1),
  follow_up_delays_minutes: z.array(z.number().int().positive()).min(1),
});

export const SLAConfigSchema = SLAConfigObject
  .refine((c) => c.escalation_time_minutes >= c.response_time_minutes, {
    message: 'escalation_time_minutes must be >= response_time_minutes',
    path: ['escalation_time_minutes'],
  })
  .refine((c) => c.business_hours.start < c.business_hours.end, {
    message: 'business_hours.start must be before business_hours.end',
    path: ['business_hours'],
  });

/** Shape of what a tenant row may carry: any subset, business_hours field-by-field. */
export const SLAConfigOverridesSchema = SLAConfigObject.extend({
  business_hours: BusinessHoursSchema.partial(),
}).partial();


export type SlaConfigResolution =
  | { valid: true; config: SLAConfig }
  | { valid: false; config: SLAConfig; errors: string[] };

/**
 * Overlay stored overrides on the defaults. Anything invalid, including a merged
 * result that breaks a cross-field rule, yields the defaults plus the reasons.
 */
export function resolveSlaConfig(stored: unknown, defaults: SLAConfig = DEFAULT_SLA_CONFIG): SlaConfigResolution {
  if (stored === undefined || stored === null) {
    return { valid: true, config: defaults };
  }

  const overrides = SLAConfigOverridesSchema.safeParse(stored);
  if (!overrides.success) {
    return { valid: false, config: defaults, errors: formatIssues(overrides.error) };
  }

  const merged = SLAConfigSchema.safeParse({
    ...defaults,
    ...overrides.data,
    business_hours: { ...defaults.business_hours, ...overrides.data.business_hours },
  });
  if (!merged.success) {
    return { valid: false, config: defaults, errors: formatIssues(merged.error) };
  }
  return { valid: true, config: merged.data };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
