/**
 * DynamoDB lease store for the distributed lock.
 *
 * Row: pk TENANT#<tenant>, sk LOCK#<resource_key>. A lease is live while
 * expires_at_ms > now; an expired row may be overwritten by the next acquirer.
 * `ttl` lets DynamoDB reap abandoned rows eventually.
 */

import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { epochSeconds, isConditionalCheckFailed } from '../../utils/dynamo-errors';
import { tenantPartition } from '../../utils/dynamo-keys';
import { LockEntry, LockStore } from '../../types/LockTypes';

const TTL_GRACE_SECONDS = 3600;

function keyOf(tenantId: string, resourceKey: string): { pk: string; sk: string } {
  return { pk: tenantPartition(tenantId), sk: `LOCK#${resourceKey}` };
}

export class DynamoLockStore implements LockStore {
  constructor(
    private readonly dynamoClient: DynamoDBDocumentClient,
    private readonly tableName: string
  ) {}

  async putIfAvailable(entry: LockEntry, nowMs: number): Promise<boolean> {
    try {
      await this.dynamoClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            ...keyOf(entry.tenant_id, entry.resource_key),
            tenant_id: entry.tenant_id,
            resource_key: entry.resource_key,
            owner_token: entry.owner_token,
            expires_at_ms: entry.expires_at_ms,
            ttl: epochSeconds(entry.expires_at_ms) + TTL_GRACE_SECONDS,
          },
          ConditionExpression: 'attribute_not_exists(pk) OR expires_at_ms <= :now',
          ExpressionAttributeValues: { ':now': nowMs },
        })
      );
      return true;
    } catch (e: unknown) {
      if (isConditionalCheckFailed(e)) {
        return false;
      }
      throw e;
    }
  }

  async deleteIfOwner(tenantId: string, resourceKey: string, ownerToken: string): Promise<boolean> {
    try {
      await this.dynamoClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: keyOf(tenantId, resourceKey),
          ConditionExpression: 'owner_token = :token',
          ExpressionAttributeValues: { ':token': ownerToken },
        })
      );
      return true;
    } catch (e: unknown) {
      if (isConditionalCheckFailed(e)) {
        return false;
      }
      throw e;
    }
  }

  async extendIfOwner(
    tenantId: string,
    resourceKey: string,
    ownerToken: string,
    expiresAtMs: number,
    nowMs: number
  ): Promise<boolean> {
    try {
      await this.dynamoClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: keyOf(tenantId, resourceKey),
          UpdateExpression: 'SET expires_at_ms = :expires, #ttl = :ttl',
          ConditionExpression: 'owner_token = :token AND expires_at_ms > :now',
          ExpressionAttributeNames: { '#ttl': 'ttl' },
          ExpressionAttributeValues: {
            ':expires': expiresAtMs,
            ':ttl': epochSeconds(expiresAtMs) + TTL_GRACE_SECONDS,
            ':token': ownerToken,
            ':now': nowMs,
          },
        })
      );
      return true;
    } catch (e: unknown) {
      if (isConditionalCheckFailed(e)) {
        return false;
      }
      throw e;
    }
  }

  async get(tenantId: string, resourceKey: string): Promise<LockEntry | null> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: keyOf(tenantId, resourceKey),
        ConsistentRead: true,
      })
    );
    const item = result.Item;
    if (
      !item ||
      typeof item.owner_token !== 'string' ||
      typeof item.expires_at_ms !== 'number'
    ) {
      return null;
    }
    return {
      tenant_id: tenantId,
      resource_key: resourceKey,
      owner_token: item.owner_token,
      expires_at_ms: item.expires_at_ms,
    };
  }
}
