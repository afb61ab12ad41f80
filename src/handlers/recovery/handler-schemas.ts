/**
 * Recovery handler input schemas. No env or side effects, so tests can import them directly.
 */

import { z } from 'zod';
import { isValidTimeZone } from '../../config/slaConfig';

const E164 = /^\+[1-9]\d{6,14}$/;

export const InboundEventSchema = z.object({
  tenant_id: z.string().min(1, 'tenant_id is required'),
  provider: z.string().min(1, 'provider is required'),
  external_id: z.string().min(1, 'external_id is required'),
  customer_phone: z.string().regex(E164, 'customer_phone must be E.164'),
  prior_contact_count: z.number().int().min(0).optional(),
  consent_status: z.enum(['pending', 'granted', 'denied', 'withdrawn']).optional(),
  customer_timezone: z.string().refine(isValidTimeZone, { message: 'unknown IANA timezone' }).optional(),
  business_hours_override: z.boolean().optional(),
}).strict();

export const CustomerReplySchema = z.object({
  tenant_id: z.string().min(1, 'tenant_id is required'),
  provider: z.string().min(1, 'provider is required'),
  message_id: z.string().min(1, 'message_id is required'),
  customer_phone: z.string().regex(E164, 'customer_phone must be E.164'),
  body: z.string().max(1600),
}).strict();

export const QueueTickSchema = z.object({
  tick: z.enum(['process', 'sla', 'purge']),
});

export const ManualEscalationSchema = z.object({
  reason: z.enum(['human_takeover', 'operator_request']).default('operator_request'),
}).strict();

/** Parses a JSON request body; malformed JSON reads as undefined so the schema reports it. */
export function parseJsonBody(body: string | null): unknown {
  if (!body) {
    return {};
  }
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}
