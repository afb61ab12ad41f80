/**
 * DynamoDB recovery queue repository.
 *
 * Recovery table layout:
 *   Item     pk TENANT#<tenant>                  sk ITEM#<item_id>
 *   Attempt  pk TENANT#<tenant>#ITEM#<item_id>   sk ATTEMPT#<000001>
 *
 * Non-terminal items carry three index keys, dropped once terminal:
 *   gsi1  STATUS#<status> / next_attempt_at (waiting) or processing_started_at (processing)
 *   gsi2  ACTIVE / sweep deadline
 *   gsi3  TENANT#<tenant>#PHONE#<phone> / created_at
 */

import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  QueryCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { Logger } from '../core/Logger';
import { isConditionalCheckFailed } from '../../utils/dynamo-errors';
import { keySegment, tenantPartition } from '../../utils/dynamo-keys';
import { isTerminal, sweepDeadline } from './RecoveryStateMachine';
import {
  RECOVERY_STATUSES,
  RecoveryAttempt,
  RecoveryPriority,
  RecoveryQueueItem,
  RecoveryQueueRepository,
  RecoveryStatus,
} from '../../types/RecoveryTypes';

export const STATUS_INDEX = 'gsi1-status-index';
export const SWEEP_INDEX = 'gsi2-sweep-index';
export const PHONE_INDEX = 'gsi3-phone-index';

const ACTIVE_PARTITION = 'ACTIVE';

const PRIORITY_RANK: Record<RecoveryPriority, number> = { high: 0, medium: 1, low: 2 };

const RecoveryQueueItemSchema = z.object({
  tenant_id: z.string(),
  item_id: z.string(),
  provider: z.string(),
  external_id: z.string(),
  customer_phone: z.string(),
  customer_type: z.enum(['new', 'existing', 'unknown']),
  priority: z.enum(['high', 'medium', 'low']),
  status: z.enum(['queued', 'processing', 'ai_rescue_pending', 'recovered', 'escalated', 'failed']),
  sla_deadline: z.string(),
  escalation_deadline: z.string(),
  retry_count: z.number(),
  max_retries: z.number(),
  transport_failure_count: z.number(),
  compliance_block_count: z.number(),
  last_attempt_at: z.string().optional(),
  next_attempt_at: z.string(),
  processing_started_at: z.string().optional(),
  messages_sent: z.number(),
  ai_rescue_attempted: z.boolean(),
  customer_responded: z.boolean(),
  consent_status: z.enum(['pending', 'granted', 'denied', 'withdrawn']),
  opted_out: z.boolean(),
  business_hours_override: z.boolean(),
  customer_timezone: z.string().optional(),
  escalation_reason: z
    .enum([
      'sla_deadline_passed',
      'escalation_deadline_passed',
      'processing_timeout',
      'retry_budget_exhausted',
      'unrecoverable_error',
      'low_confidence_reply',
      'negative_reply',
      'opt_out',
      'reply_before_outreach',
      'human_takeover',
      'operator_request',
    ])
    .optional(),
  escalated_at: z.string().optional(),
  resolved_at: z.string().optional(),
  version: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
});

const RecoveryAttemptSchema = z.object({
  tenant_id: z.string(),
  item_id: z.string(),
  attempt_number: z.number(),
  method: z.enum(['sms', 'inbound_reply']),
  outcome: z.enum([
    'sent',
    'transport_failure',
    'circuit_open',
    'compliance_blocked',
    'unrecoverable',
    'reply_resolved',
    'reply_escalated',
  ]),
  content_ref: z.string().optional(),
  message_id: z.string().optional(),
  confidence_score: z.number().optional(),
  success: z.boolean(),
  customer_engaged: z.boolean(),
  blocked_reason: z.enum(['opted_out', 'consent_denied', 'quiet_hours']).optional(),
  error: z.string().optional(),
  attempted_at: z.string(),
  responded_at: z.string().optional(),
});

function itemKey(tenantId: string, itemId: string): { pk: string; sk: string } {
  return { pk: tenantPartition(tenantId), sk: `ITEM#${keySegment(itemId)}` };
}

function attemptPk(tenantId: string, itemId: string): string {
  return `${tenantPartition(tenantId)}#ITEM#${keySegment(itemId)}`;
}

function phonePartition(tenantId: string, phone: string): string {
  return `${tenantPartition(tenantId)}#PHONE#${keySegment(phone)}`;
}

/** Row to write: the item plus keys; index keys only while the item is live. */
function toRow(item: RecoveryQueueItem): Record<string, unknown> {
  const row: Record<string, unknown> = { ...item, ...itemKey(item.tenant_id, item.item_id) };
  if (isTerminal(item.status)) {
    return row;
  }
  row.gsi1pk = `STATUS#${item.status}`;
  row.gsi1sk =
    item.status === 'processing' ? item.processing_started_at ?? item.updated_at : item.next_attempt_at;
  row.gsi2pk = ACTIVE_PARTITION;
  row.gsi2sk = sweepDeadline(item);
  row.gsi3pk = phonePartition(item.tenant_id, item.customer_phone);
  row.gsi3sk = item.created_at;
  return row;
}

export function compareByPriorityThenAge(a: RecoveryQueueItem, b: RecoveryQueueItem): number {
  const rank = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  return rank !== 0 ? rank : a.created_at.localeCompare(b.created_at);
}

export class DynamoRecoveryQueueRepository implements RecoveryQueueRepository {
  constructor(
    private readonly dynamoClient: DynamoDBDocumentClient,
    private readonly tableName: string,
    private readonly logger: Logger
  ) {}

  async createItem(item: RecoveryQueueItem): Promise<boolean> {
    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: toRow(item),
          ConditionExpression: 'attribute_not_exists(pk)',
        })
      );
      return true;
    } catch (e) {
      if (isConditionalCheckFailed(e)) {
        return false;
      }
      throw e;
    }
  }

  async getItem(tenantId: string, itemId: string): Promise<RecoveryQueueItem | null> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: itemKey(tenantId, itemId),
        ConsistentRead: true,
      })
    );
    return result.Item ? this.parseItem(result.Item) : null;
  }

  async saveItem(item: RecoveryQueueItem, expectedVersion: number): Promise<boolean> {
    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: toRow(item),
          ConditionExpression: 'attribute_exists(pk) AND #version = :expected',
          ExpressionAttributeNames: { '#version': 'version' },
          ExpressionAttributeValues: { ':expected': expectedVersion },
        })
      );
      return true;
    } catch (e: unknown) {
      if (isConditionalCheckFailed(e)) {
        this.logger.warn('Stale write rejected', {
          tenantId: item.tenant_id,
          itemId: item.item_id,
          expectedVersion,
        });
        return false;
      }
      throw e;
    }
  }

  async appendAttempt(attempt: RecoveryAttempt): Promise<void> {
    await this.dynamoClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: {
          ...attempt,
          pk: attemptPk(attempt.tenant_id, attempt.item_id),
          sk: `ATTEMPT#${String(attempt.attempt_number).padStart(6, '0')}`,
        },
        ConditionExpression: 'attribute_not_exists(pk)',
      })
    );
  }

  async listAttempts(tenantId: string, itemId: string): Promise<RecoveryAttempt[]> {
    const rows = await this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
      ExpressionAttributeValues: { ':pk': attemptPk(tenantId, itemId), ':prefix': 'ATTEMPT#' },
    });
    const attempts: RecoveryAttempt[] = [];
    for (const row of rows) {
      const parsed = RecoveryAttemptSchema.safeParse(row);
      if (parsed.success) {
        attempts.push(parsed.data);
      } else {
        this.logger.warn('Skipping malformed attempt row', { tenantId, itemId });
      }
    }
    return attempts;
  }

  async findDueItems(nowIso: string, limit: number): Promise<RecoveryQueueItem[]> {
    const due: RecoveryQueueItem[] = [];
    for (const status of ['queued', 'ai_rescue_pending'] as const) {
      const rows = await this.queryAll(
        {
          TableName: this.tableName,
          IndexName: STATUS_INDEX,
          KeyConditionExpression: 'gsi1pk = :pk AND gsi1sk <= :now',
          FilterExpression: 'retry_count < max_retries',
          ExpressionAttributeValues: { ':pk': `STATUS#${status}`, ':now': nowIso },
        },
        limit
      );
      due.push(...this.parseItems(rows));
    }
    return due.sort(compareByPriorityThenAge).slice(0, limit);
  }

  async findSweepCandidates(nowIso: string, limit: number): Promise<RecoveryQueueItem[]> {
    const rows = await this.queryAll(
      {
        TableName: this.tableName,
        IndexName: SWEEP_INDEX,
        KeyConditionExpression: 'gsi2pk = :pk AND gsi2sk <= :now',
        ExpressionAttributeValues: { ':pk': ACTIVE_PARTITION, ':now': nowIso },
      },
      limit
    );
    return this.parseItems(rows);
  }

  async findStaleProcessing(cutoffIso: string, limit: number): Promise<RecoveryQueueItem[]> {
    const rows = await this.queryAll(
      {
        TableName: this.tableName,
        IndexName: STATUS_INDEX,
        KeyConditionExpression: 'gsi1pk = :pk AND gsi1sk < :cutoff',
        ExpressionAttributeValues: { ':pk': 'STATUS#processing', ':cutoff': cutoffIso },
      },
      limit
    );
    return this.parseItems(rows);
  }

  async findActiveByPhone(tenantId: string, customerPhone: string): Promise<RecoveryQueueItem | null> {
    const result = await this.dynamoClient.send(
      new QueryCommand({
        TableName: this.tableName,
        IndexName: PHONE_INDEX,
        KeyConditionExpression: 'gsi3pk = :pk',
        ExpressionAttributeValues: { ':pk': phonePartition(tenantId, customerPhone) },
        ScanIndexForward: false,
        Limit: 1,
      })
    );
    const row = result.Items?.[0];
    return row ? this.parseItem(row) : null;
  }

  async countByStatus(tenantId: string): Promise<Record<RecoveryStatus, number>> {
    const counts: Record<RecoveryStatus, number> = {
      queued: 0,
      processing: 0,
      ai_rescue_pending: 0,
      recovered: 0,
      escalated: 0,
      failed: 0,
    };
    const rows = await this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
      ProjectionExpression: '#status',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: { ':pk': tenantPartition(tenantId), ':prefix': 'ITEM#' },
    });
    for (const row of rows) {
      const status = RECOVERY_STATUSES.find((s) => s === row.status);
      if (status) {
        counts[status]++;
      }
    }
    return counts;
  }

  /** Items still waiting on a first response (queued or processing) past their SLA deadline. */
  async countSlaViolations(tenantId: string, nowIso: string): Promise<number> {
    const rows = await this.queryAll({
      TableName: this.tableName,
      KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
      FilterExpression: '#status IN (:queued, :processing) AND sla_deadline < :now',
      ProjectionExpression: 'item_id',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: {
        ':pk': tenantPartition(tenantId),
        ':prefix': 'ITEM#',
        ':queued': 'queued',
        ':processing': 'processing',
        ':now': nowIso,
      },
    });
    return rows.length;
  }

  /**
   * Follows LastEvaluatedKey until exhausted or `max` rows survived the filter.
   */
  private async queryAll(input: QueryCommandInput, max = Number.POSITIVE_INFINITY): Promise<Record<string, unknown>[]> {
    const rows: Record<string, unknown>[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;
    do {
      const page = await this.dynamoClient.send(
        new QueryCommand({ ...input, ExclusiveStartKey: exclusiveStartKey })
      );
      rows.push(...(page.Items ?? []));
      exclusiveStartKey = page.LastEvaluatedKey;
    } while (exclusiveStartKey && rows.length < max);
    return rows.slice(0, max);
  }

  private parseItems(rows: Record<string, unknown>[]): RecoveryQueueItem[] {
    const items: RecoveryQueueItem[] = [];
    for (const row of rows) {
      const item = this.parseItem(row);
      if (item) {
        items.push(item);
      }
    }
    return items;
  }

  private parseItem(row: Record<string, unknown>): RecoveryQueueItem | null {
    const parsed = RecoveryQueueItemSchema.safeParse(row);
    if (!parsed.success) {
      this.logger.error('Malformed recovery item row', {
        pk: typeof row.pk === 'string' ? row.pk : undefined,
        sk: typeof row.sk === 'string' ? row.sk : undefined,
        issues: parsed.error.issues.map((i) => i.path.join('.')),
      });
      return null;
    }
    return parsed.data;
  }
}
