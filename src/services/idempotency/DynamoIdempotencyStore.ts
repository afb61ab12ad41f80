/**
 * DynamoDB-backed idempotency store.
 *
 * Row: pk TENANT#<tenant>, sk PROVIDER#<provider>#EXTERNAL#<external_id>, each
 * segment escaped by keySegment.
 * All rows share gsi1pk IDEMPOTENCY with gsi1sk = last_seen_at so the retention
 * purge can range-query by age. `ttl` is a backstop only; purge is authoritative.
 */

import {
  DeleteCommand,
  DynamoDBDocumentClient,
  QueryCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { Logger } from '../core/Logger';
import { epochSeconds, isConditionalCheckFailed } from '../../utils/dynamo-errors';
import { keySegment, tenantPartition } from '../../utils/dynamo-keys';
import {
  DEFAULT_IDEMPOTENCY_LEDGER_CONFIG,
  IdempotencyKey,
  IdempotencyRecord,
  IdempotencyStore,
} from '../../types/IdempotencyTypes';

export const IDEMPOTENCY_GSI_NAME = 'gsi1-last-seen-index';
const GSI_PARTITION = 'IDEMPOTENCY';

function keyOf(key: IdempotencyKey): { pk: string; sk: string } {
  return {
    pk: tenantPartition(key.tenant_id),
    sk: `PROVIDER#${keySegment(key.provider)}#EXTERNAL#${keySegment(key.external_id)}`,
  };
}

function toRecord(item: Record<string, unknown>): IdempotencyRecord | null {
  const {
    tenant_id,
    provider,
    external_id,
    first_processed_at,
    last_seen_at,
    claimed_at,
    attempts,
  } = item;
  if (
    typeof tenant_id !== 'string' ||
    typeof provider !== 'string' ||
    typeof external_id !== 'string' ||
    typeof last_seen_at !== 'string'
  ) {
    return null;
  }
  return {
    tenant_id,
    provider,
    external_id,
    first_processed_at: typeof first_processed_at === 'string' ? first_processed_at : null,
    last_seen_at,
    claimed_at: typeof claimed_at === 'string' ? claimed_at : last_seen_at,
    attempts: typeof attempts === 'number' ? attempts : 1,
  };
}

export class DynamoIdempotencyStore implements IdempotencyStore {
  constructor(
    private readonly dynamoClient: DynamoDBDocumentClient,
    private readonly tableName: string,
    private readonly logger: Logger,
    private readonly retentionDays: number = DEFAULT_IDEMPOTENCY_LEDGER_CONFIG.retentionDays
  ) {}

  /**
   * One UpdateItem: creates the row or bumps last_seen_at/attempts, returning the old image.
   * claimed_at is only written on insert.
   */
  async recordDelivery(key: IdempotencyKey, nowIso: string): Promise<IdempotencyRecord | null> {
    const result = await this.dynamoClient.send(
      new UpdateCommand({
        TableName: this.tableName,
        Key: keyOf(key),
        UpdateExpression:
          'SET tenant_id = :tenant, provider = :provider, external_id = :external, ' +
          'last_seen_at = :now, claimed_at = if_not_exists(claimed_at, :now), ' +
          'attempts = if_not_exists(attempts, :zero) + :one, ' +
          'gsi1pk = :gsi1pk, gsi1sk = :now, #ttl = :ttl',
        ExpressionAttributeNames: { '#ttl': 'ttl' },
        ExpressionAttributeValues: {
          ':tenant': key.tenant_id,
          ':provider': key.provider,
          ':external': key.external_id,
          ':now': nowIso,
          ':zero': 0,
          ':one': 1,
          ':gsi1pk': GSI_PARTITION,
          ':ttl': this.ttlFor(nowIso),
        },
        ReturnValues: 'ALL_OLD',
      })
    );

    if (!result.Attributes) {
      return null;
    }
    const previous = toRecord(result.Attributes);
    if (!previous) {
      this.logger.warn('Malformed idempotency row treated as existing claim', { ...key });
      return {
        ...key,
        first_processed_at: null,
        last_seen_at: nowIso,
        claimed_at: nowIso,
        attempts: 0,
      };
    }
    return previous;
  }

  async reclaim(key: IdempotencyKey, expectedClaimedAt: string, nowIso: string): Promise<boolean> {
    return this.conditional(() =>
      this.dynamoClient.send(new UpdateCommand({
        TableName: this.tableName,
        Key: keyOf(key),
        UpdateExpression: 'SET claimed_at = :now',
        ConditionExpression:
          'attribute_exists(pk) AND attribute_not_exists(first_processed_at) AND claimed_at = :expected',
        ExpressionAttributeValues: { ':now': nowIso, ':expected': expectedClaimedAt },
      }))
    );
  }

  async markProcessed(key: IdempotencyKey, nowIso: string): Promise<boolean> {
    return this.conditional(() =>
      this.dynamoClient.send(new UpdateCommand({
        TableName: this.tableName,
        Key: keyOf(key),
        UpdateExpression: 'SET first_processed_at = :now',
        ConditionExpression: 'attribute_exists(pk) AND attribute_not_exists(first_processed_at)',
        ExpressionAttributeValues: { ':now': nowIso },
      }))
    );
  }

  async remove(key: IdempotencyKey): Promise<boolean> {
    return this.conditional(() =>
      this.dynamoClient.send(new DeleteCommand({
        TableName: this.tableName,
        Key: keyOf(key),
        ConditionExpression: 'attribute_exists(pk) AND attribute_not_exists(first_processed_at)',
      }))
    );
  }

  /**
   * Pages through the age index and deletes each row still older than the cutoff.
   * The delete re-checks last_seen_at so a row seen again mid-purge survives.
   */
  async purgeSeenBefore(cutoffIso: string): Promise<number> {
    let deleted = 0;
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const page = await this.dynamoClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: IDEMPOTENCY_GSI_NAME,
          KeyConditionExpression: 'gsi1pk = :gsi1pk AND gsi1sk < :cutoff',
          ExpressionAttributeValues: { ':gsi1pk': GSI_PARTITION, ':cutoff': cutoffIso },
          ProjectionExpression: 'pk, sk',
          ExclusiveStartKey: exclusiveStartKey,
        })
      );

      for (const row of page.Items ?? []) {
        const { pk, sk } = row;
        if (typeof pk !== 'string' || typeof sk !== 'string') {
          continue;
        }
        const removed = await this.conditional(() =>
          this.dynamoClient.send(new DeleteCommand({
            TableName: this.tableName,
            Key: { pk, sk },
            ConditionExpression: 'last_seen_at < :cutoff',
            ExpressionAttributeValues: { ':cutoff': cutoffIso },
          }))
        );
        if (removed) {
          deleted++;
        }
      }

      exclusiveStartKey = page.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return deleted;
  }

  private ttlFor(nowIso: string): number {
    return epochSeconds(Date.parse(nowIso) + (this.retentionDays + 1) * 86_400_000);
  }

  private async conditional(write: () => Promise<unknown>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (err: unknown) {
      if (isConditionalCheckFailed(err)) {
        return false;
      }
      throw err;
    }
  }
}
