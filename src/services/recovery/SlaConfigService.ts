/**
 * SLA Config Service
 *
 * Reads per-tenant recovery settings from the tenants table (partition key
 * tenantId). Stored SLA overrides are validated and merged over the defaults;
 * an invalid row falls back to defaults with a warning.
 */

import { DynamoDBDocumentClient, GetCommand } from '@aws-sdk/lib-dynamodb';
import { Logger } from '../core/Logger';
import { DEFAULT_SLA_CONFIG, resolveSlaConfig } from '../../config/slaConfig';
import { DEFAULT_BUSINESS_NAME } from '../../config/outreachTemplates';
import type { TenantRecoverySettings } from '../../types/RecoveryTypes';

export interface TenantSettingsSource {
  getSettings(tenantId: string): Promise<TenantRecoverySettings>;
}

export class SlaConfigService implements TenantSettingsSource {
  constructor(
    private dynamoClient: DynamoDBDocumentClient,
    private tenantsTableName: string,
    private logger: Logger
  ) {}

  async getSettings(tenantId: string): Promise<TenantRecoverySettings> {
    const result = await this.dynamoClient.send(
      new GetCommand({
        TableName: this.tenantsTableName,
        Key: { tenantId },
      })
    );

    if (!result.Item) {
      return { tenant_id: tenantId, business_name: DEFAULT_BUSINESS_NAME, sla: DEFAULT_SLA_CONFIG };
    }

    const resolution = resolveSlaConfig(result.Item.sla_config);
    if (!resolution.valid) {
      this.logger.warn('Invalid tenant SLA config; using defaults', { tenantId, errors: resolution.errors });
    }

    const name = result.Item.name;
    return {
      tenant_id: tenantId,
      business_name: typeof name === 'string' && name.trim() !== '' ? name : DEFAULT_BUSINESS_NAME,
      sla: resolution.config,
    };
  }
}
