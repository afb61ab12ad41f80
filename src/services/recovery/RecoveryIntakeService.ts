/**
 * Recovery Intake Service
 *
 * Turns an inbound provider event into exactly one queue item. The ledger key is
 * (tenant, provider, external_id); a redelivered event never creates a second case.
 * The item id is derived from the same triple, so even a redelivery that gets
 * past the ledger (a claim reclaimed after markProcessed failed) finds the item
 * already written.
 */

import { v5 as uuidv5 } from 'uuid';
import { Logger } from '../core/Logger';
import { IdempotencyLedgerService } from '../idempotency/IdempotencyLedgerService';
import { RecoveryEventEmitter } from '../events/RecoveryEventEmitter';
import { TenantSettingsSource } from './SlaConfigService';
import { createRecoveryItem } from './RecoveryStateMachine';
import { Clock, systemClock } from '../../types/CommonTypes';
import { RecoveryEventType } from '../../types/EventTypes';
import type {
  IngestResult,
  NewRecoveryItemInput,
  RecoveryQueueItem,
  RecoveryQueueRepository,
} from '../../types/RecoveryTypes';

const ITEM_ID_NAMESPACE = '3b1f6a52-8c4e-5d7a-9f20-6e4c1b8d2a70';

export function recoveryItemId(input: Pick<NewRecoveryItemInput, 'tenant_id' | 'provider' | 'external_id'>): string {
  return uuidv5(JSON.stringify([input.tenant_id, input.provider, input.external_id]), ITEM_ID_NAMESPACE);
}

type CreateOutcome = { created: true; item: RecoveryQueueItem } | { created: false; existing: RecoveryQueueItem | null };

export class RecoveryIntakeService {
  constructor(
    private readonly ledger: IdempotencyLedgerService,
    private readonly repository: RecoveryQueueRepository,
    private readonly settings: TenantSettingsSource,
    private readonly events: RecoveryEventEmitter,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
    private readonly newItemId: (input: NewRecoveryItemInput) => string = recoveryItemId
  ) {}

  async ingest(input: NewRecoveryItemInput, traceId?: string): Promise<IngestResult> {
    const result = await this.ledger.runOnce(input.tenant_id, input.provider, input.external_id, () =>
      this.createItem(input)
    );

    switch (result.kind) {
      case 'processed': {
        const outcome = result.value;
        if (!outcome.created) {
          return { kind: 'duplicate', first_processed_at: outcome.existing?.created_at ?? null };
        }
        await this.events.emit(RecoveryEventType.RECOVERY_ITEM_QUEUED, 'ingestion', outcome.item, {}, traceId);
        return { kind: 'queued', item: outcome.item };
      }
      case 'duplicate':
        return { kind: 'duplicate', first_processed_at: result.first_processed_at };
      case 'in_progress':
        return { kind: 'in_progress' };
    }
  }

  private async createItem(input: NewRecoveryItemInput): Promise<CreateOutcome> {
    const { sla } = await this.settings.getSettings(input.tenant_id);
    const item = createRecoveryItem(input, sla, this.newItemId(input), this.clock());
    if (!(await this.repository.createItem(item))) {
      this.logger.warn('Recovery item already exists for event; not creating another', {
        tenantId: item.tenant_id,
        itemId: item.item_id,
        provider: item.provider,
      });
      return { created: false, existing: await this.repository.getItem(item.tenant_id, item.item_id) };
    }
    this.logger.info('Recovery item queued', {
      tenantId: item.tenant_id,
      itemId: item.item_id,
      provider: item.provider,
      priority: item.priority,
      slaDeadline: item.sla_deadline,
    });
    return { created: true, item };
  }
}
