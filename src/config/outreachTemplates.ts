/**
 * Fallback SMS copy used when AI drafting is off, unavailable or not confident.
 * Selected by how many messages were already sent and by customer type.
 */

import type { CustomerType } from '../types/RecoveryTypes';

const FIRST_CONTACT: Record<CustomerType, string> = {
  new:
    'Hi! Sorry we missed your call to {business}. Reply with your address, a good time to talk, ' +
    'or any question and we will get back to you within 2 hours.',
  existing:
    'Hi! Sorry we missed your call to {business}, and thanks for reaching out again. ' +
    'Reply with a good time to talk or any question and we will get back to you within 2 hours.',
  unknown:
    'Hi! Sorry we missed your call to {business}. How can we help? Reply here and we will get back to you shortly.',
};

const FOLLOW_UPS: readonly string[] = [
  'Hi! {business} is still happy to help. Reply with your address and we will send over a quick quote.',
  'Hi! {business} has openings this week. Reply with your address for a free quote, it takes 30 seconds.',
  'Hi! Last note from {business}: reply with your address for a free quote. Reply STOP and we will not text again.',
];

const FALLBACK = 'Hi! {business} is here to help. Reply with your address for a free quote.';

export const DEFAULT_BUSINESS_NAME = 'our team';

/**
 * @param sentCount messages already delivered for this item (0 for the first contact)
 */
export function renderOutreachTemplate(
  sentCount: number,
  customerType: CustomerType,
  businessName: string = DEFAULT_BUSINESS_NAME
): string {
  const template =
    sentCount <= 0 ? FIRST_CONTACT[customerType] : FOLLOW_UPS[sentCount - 1] ?? FALLBACK;
  return template.split('{business}').join(businessName);
}
