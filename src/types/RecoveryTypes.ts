/**
 * Recovery queue types: items, attempts, SLA configuration and attempt outcomes.
 */

import { TenantScoped } from './CommonTypes';

export type RecoveryStatus =
  | 'queued'
  | 'processing'
  | 'ai_rescue_pending'
  | 'recovered'
  | 'escalated'
  | 'failed';

export const RECOVERY_STATUSES: readonly RecoveryStatus[] = [
  'queued',
  'processing',
  'ai_rescue_pending',
  'recovered',
  'escalated',
  'failed',
];

export const TERMINAL_STATUSES: readonly RecoveryStatus[] = ['recovered', 'escalated', 'failed'];

export type RecoveryPriority = 'high' | 'medium' | 'low';

export type CustomerType = 'new' | 'existing' | 'unknown';

export type ConsentStatus = 'pending' | 'granted' | 'denied' | 'withdrawn';

export type EscalationReason =
  | 'sla_deadline_passed'
  | 'escalation_deadline_passed'
  | 'processing_timeout'
  | 'retry_budget_exhausted'
  | 'unrecoverable_error'
  | 'low_confidence_reply'
  | 'negative_reply'
  | 'opt_out'
  | 'reply_before_outreach'
  | 'human_takeover'
  | 'operator_request';

export interface RecoveryQueueItem extends TenantScoped {
  item_id: string;
  provider: string;
  external_id: string;
  customer_phone: string;
  customer_type: CustomerType;
  priority: RecoveryPriority;

  status: RecoveryStatus;
  sla_deadline: string;
  escalation_deadline: string;

  retry_count: number;
  max_retries: number;
  transport_failure_count: number;
  compliance_block_count: number;
  last_attempt_at?: string;
  next_attempt_at: string;
  /** Set while status is processing; the sweep uses it to find abandoned claims */
  processing_started_at?: string;

  /** Outreach messages accepted by the gateway so far */
  messages_sent: number;
  ai_rescue_attempted: boolean;
  customer_responded: boolean;

  // Compliance
  consent_status: ConsentStatus;
  opted_out: boolean;
  business_hours_override: boolean;
  customer_timezone?: string;

  escalation_reason?: EscalationReason;
  escalated_at?: string;
  resolved_at?: string;

  version: number;
  created_at: string;
  updated_at: string;
}

export type AttemptMethod = 'sms' | 'inbound_reply';

export type AttemptOutcomeKind =
  | 'sent'
  | 'transport_failure'
  | 'circuit_open'
  | 'compliance_blocked'
  | 'unrecoverable'
  | 'reply_resolved'
  | 'reply_escalated';

/**
 * Append-only record of one outreach try or one evaluated reply.
 */
export interface RecoveryAttempt extends TenantScoped {
  item_id: string;
  attempt_number: number;
  method: AttemptMethod;
  outcome: AttemptOutcomeKind;
  content_ref?: string;
  message_id?: string;
  confidence_score?: number;
  success: boolean;
  customer_engaged: boolean;
  blocked_reason?: ComplianceBlockReason;
  error?: string;
  attempted_at: string;
  responded_at?: string;
}

export interface BusinessHours {
  /** HH:mm, inclusive */
  start: string;
  /** HH:mm, exclusive */
  end: string;
  /** ISO weekday numbers, 1 = Monday … 7 = Sunday */
  days: number[];
  timezone: string;
}

export interface SLAConfig {
  response_time_minutes: number;
  escalation_time_minutes: number;
  max_retries: number;
  business_hours: BusinessHours;
  ai_enabled: boolean;
  ai_confidence_threshold: number;
  /** Delay before follow-up N+1 after the Nth message was sent */
  follow_up_delays_minutes: number[];
}

export type ComplianceBlockReason = 'opted_out' | 'consent_denied' | 'quiet_hours';

export type ComplianceDecision =
  | { allowed: true }
  | { allowed: false; reason: ComplianceBlockReason; retryAt?: string };

/**
 * Explicit result of one outreach attempt. The state machine, not exception
 * handlers, decides the transition that follows.
 */
export type AttemptOutcome =
  | { kind: 'sent'; message_id: string; content: string; confidence?: number; drafted_by: 'ai' | 'template' }
  | { kind: 'transport_failure'; error: string }
  | { kind: 'circuit_open'; retry_after_ms: number }
  | { kind: 'compliance_blocked'; reason: ComplianceBlockReason; retry_at?: string }
  | { kind: 'unrecoverable'; error: string };

export type ReplyIntent = 'resolved' | 'negative' | 'unclear';

export type ReplyEvaluation =
  | { kind: 'opt_out' }
  | { kind: 'scored'; intent: ReplyIntent; confidence: number }
  | { kind: 'unavailable'; error: string };

export interface NewRecoveryItemInput extends TenantScoped {
  provider: string;
  external_id: string;
  customer_phone: string;
  /** Previous calls from this number to this tenant, if known */
  prior_contact_count?: number;
  consent_status?: ConsentStatus;
  customer_timezone?: string;
  business_hours_override?: boolean;
}

export type ProcessTrigger = 'scheduled' | 'manual';

/** Per-tenant settings the recovery flow reads from the tenants table. */
export interface TenantRecoverySettings {
  tenant_id: string;
  business_name: string;
  sla: SLAConfig;
}

export type ProcessItemResult =
  | { kind: 'skipped'; reason: 'lock_contention' | 'stale_write' }
  | { kind: 'not_found' }
  | { kind: 'noop'; status: RecoveryStatus }
  | { kind: 'not_due'; status: RecoveryStatus; next_attempt_at: string }
  | { kind: 'escalated'; reason: EscalationReason }
  | { kind: 'attempted'; outcome: AttemptOutcomeKind; status: RecoveryStatus };

export type SweepItemResult =
  | { kind: 'skipped'; reason: 'lock_contention' | 'stale_write' }
  | { kind: 'not_found' }
  | { kind: 'noop'; status: RecoveryStatus }
  | { kind: 'escalated'; reason: EscalationReason };

export interface CustomerReplyInput extends TenantScoped {
  provider: string;
  /** Provider message id; the ledger key for this reply */
  message_id: string;
  customer_phone: string;
  body: string;
}

export type ReplyResult =
  | { kind: 'duplicate' }
  | { kind: 'in_progress' }
  | { kind: 'no_active_item' }
  | { kind: 'recovered'; item_id: string }
  | { kind: 'escalated'; item_id: string; reason: EscalationReason };

export type IngestResult =
  | { kind: 'queued'; item: RecoveryQueueItem }
  | { kind: 'duplicate'; first_processed_at: string | null }
  | { kind: 'in_progress' };

export interface ProcessTickStats {
  candidates: number;
  attempted: number;
  escalated: number;
  skipped: number;
  not_due: number;
}

export interface SweepTickStats {
  candidates: number;
  escalated: number;
  skipped: number;
}

/**
 * Persistence port for queue items and their attempts.
 */
export interface RecoveryQueueRepository {
  /** False when an item with the same id already exists. */
  createItem(item: RecoveryQueueItem): Promise<boolean>;
  getItem(tenantId: string, itemId: string): Promise<RecoveryQueueItem | null>;
  /** Conditional on the stored version; false when another writer got there first. */
  saveItem(item: RecoveryQueueItem, expectedVersion: number): Promise<boolean>;
  appendAttempt(attempt: RecoveryAttempt): Promise<void>;
  listAttempts(tenantId: string, itemId: string): Promise<RecoveryAttempt[]>;
  /** Eligible items across tenants: queued/ai_rescue_pending, due, retry budget left. */
  findDueItems(nowIso: string, limit: number): Promise<RecoveryQueueItem[]>;
  /** Non-terminal items whose applicable deadline is at or before now. */
  findSweepCandidates(nowIso: string, limit: number): Promise<RecoveryQueueItem[]>;
  /** Non-terminal items stuck in processing since before the cutoff. */
  findStaleProcessing(cutoffIso: string, limit: number): Promise<RecoveryQueueItem[]>;
  findActiveByPhone(tenantId: string, customerPhone: string): Promise<RecoveryQueueItem | null>;
  countByStatus(tenantId: string): Promise<Record<RecoveryStatus, number>>;
  countSlaViolations(tenantId: string, nowIso: string): Promise<number>;
}
