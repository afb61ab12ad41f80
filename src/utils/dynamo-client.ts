import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { getAWSClientConfig } from './aws-client-config';

/**
 * Document client shared by every store. Optional item fields are left out of
 * writes rather than rejected.
 */
export function createDocumentClient(region?: string): DynamoDBDocumentClient {
  const client = new DynamoDBClient(getAWSClientConfig(region));
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: { removeUndefinedValues: true },
  });
}
