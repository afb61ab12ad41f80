/**
 * Compliance Gate
 *
 * Runs before every outreach attempt: opt-out, consent and quiet hours.
 * A block is a normal decision, never an exception, and never reaches a breaker.
 */

import { Logger } from '../core/Logger';
import { isValidTimeZone } from '../../config/slaConfig';
import type { BusinessHours, ComplianceDecision, RecoveryQueueItem } from '../../types/RecoveryTypes';

const OPT_OUT_KEYWORDS = new Set(['STOP', 'STOPALL', 'UNSUBSCRIBE', 'CANCEL', 'END', 'QUIT', 'OPTOUT', 'OPT OUT']);

const SLOT_MS = 15 * 60_000;
const SEARCH_HORIZON_MS = 8 * 24 * 60 * 60_000;

const WEEKDAY_NUMBERS: Record<string, number> = {
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
  Sun: 7,
};

/** Whole-message keyword match, case and punctuation insensitive. */
export function isOptOutMessage(text: string): boolean {
  const normalized = text
    .trim()
    .toUpperCase()
    .replace(/[^A-Z ]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  return OPT_OUT_KEYWORDS.has(normalized);
}

interface LocalTime {
  weekday: number;
  minutes: number;
}

function toMinutes(hhmm: string): number {
  const [hours, minutes] = hhmm.split(':').map(Number);
  return (hours ?? 0) * 60 + (minutes ?? 0);
}

export class ComplianceGate {
  private readonly formatters = new Map<string, Intl.DateTimeFormat>();

  constructor(private readonly logger: Logger) {}

  check(item: RecoveryQueueItem, businessHours: BusinessHours, nowMs: number): ComplianceDecision {
    if (item.opted_out) {
      return { allowed: false, reason: 'opted_out' };
    }
    if (item.consent_status === 'denied' || item.consent_status === 'withdrawn') {
      return { allowed: false, reason: 'consent_denied' };
    }
    if (item.business_hours_override) {
      return { allowed: true };
    }

    const timeZone = this.resolveTimeZone(item, businessHours);
    if (this.isWithinBusinessHours(businessHours, timeZone, nowMs)) {
      return { allowed: true };
    }

    const opening = this.nextOpening(businessHours, timeZone, nowMs);
    return {
      allowed: false,
      reason: 'quiet_hours',
      retryAt: opening === null ? undefined : new Date(opening).toISOString(),
    };
  }

  isWithinBusinessHours(hours: BusinessHours, timeZone: string, atMs: number): boolean {
    const local = this.localTime(timeZone, atMs);
    return (
      hours.days.includes(local.weekday) &&
      local.minutes >= toMinutes(hours.start) &&
      local.minutes < toMinutes(hours.end)
    );
  }

  /**
   * First 15-minute slot boundary inside business hours, searched up to 8 days ahead.
   */
  nextOpening(hours: BusinessHours, timeZone: string, fromMs: number): number | null {
    let candidate = Math.ceil(fromMs / SLOT_MS) * SLOT_MS;
    const horizon = fromMs + SEARCH_HORIZON_MS;
    while (candidate <= horizon) {
      if (this.isWithinBusinessHours(hours, timeZone, candidate)) {
        return candidate;
      }
      candidate += SLOT_MS;
    }
    return null;
  }

  private resolveTimeZone(item: RecoveryQueueItem, businessHours: BusinessHours): string {
    const customerZone = item.customer_timezone;
    if (customerZone && isValidTimeZone(customerZone)) {
      return customerZone;
    }
    if (customerZone) {
      this.logger.warn('Unknown customer timezone; using tenant timezone', {
        tenantId: item.tenant_id,
        itemId: item.item_id,
        customerTimezone: customerZone,
      });
    }
    return businessHours.timezone;
  }

  private localTime(timeZone: string, atMs: number): LocalTime {
    let formatter = this.formatters.get(timeZone);
    if (!formatter) {
      formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        weekday: 'short',
        hour: '2-digit',
        minute: '2-digit',
        hourCycle: 'h23',
      });
      this.formatters.set(timeZone, formatter);
    }

    let weekday = 1;
    let hour = 0;
    let minute = 0;
    for (const part of formatter.formatToParts(new Date(atMs))) {
      if (part.type === 'weekday') weekday = WEEKDAY_NUMBERS[part.value] ?? 1;
      if (part.type === 'hour') hour = Number(part.value);
      if (part.type === 'minute') minute = Number(part.value);
    }
    return { weekday, minutes: hour * 60 + minute };
  }
}
