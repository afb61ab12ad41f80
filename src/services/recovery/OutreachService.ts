/**
 * Outreach Service
 *
 * Talks to the SMS gateway and the AI drafting collaborator, each behind its
 * own per-tenant breaker, and reports what happened as an AttemptOutcome or
 * ReplyEvaluation value.
 */

import { Logger } from '../core/Logger';
import { CircuitBreakerRegistry } from '../resilience/CircuitBreakerRegistry';
import { invokeWithBreaker } from '../resilience/invokeWithBreaker';
import { isOptOutMessage } from './ComplianceGate';
import { renderOutreachTemplate } from '../../config/outreachTemplates';
import { isRetryableError } from '../../types/RecoveryErrors';
import type { IMessagingGateway } from '../../adapters/IMessagingGateway';
import type { IDraftingService } from '../../adapters/IDraftingService';
import type {
  AttemptOutcome,
  RecoveryQueueItem,
  ReplyEvaluation,
  TenantRecoverySettings,
} from '../../types/RecoveryTypes';

export const SMS_GATEWAY_SERVICE = 'sms_gateway';
export const AI_DRAFTING_SERVICE = 'ai_drafting';

interface DraftedMessage {
  content: string;
  confidence?: number;
  drafted_by: 'ai' | 'template';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class OutreachService {
  constructor(
    private readonly gateway: IMessagingGateway,
    private readonly drafting: IDraftingService,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly logger: Logger
  ) {}

  async attempt(item: RecoveryQueueItem, settings: TenantRecoverySettings): Promise<AttemptOutcome> {
    const message = await this.draft(item, settings);
    const breaker = this.breakers.getOrCreate(SMS_GATEWAY_SERVICE, item.tenant_id);

    const result = await invokeWithBreaker(breaker, () =>
      this.gateway.sendSms({
        tenant_id: item.tenant_id,
        to: item.customer_phone,
        body: message.content,
        idempotency_key: `${item.tenant_id}:${item.item_id}:${item.retry_count + 1}`,
      })
    );

    switch (result.kind) {
      case 'success':
        return {
          kind: 'sent',
          message_id: result.value.message_id,
          content: message.content,
          confidence: message.confidence,
          drafted_by: message.drafted_by,
        };
      case 'rejected':
        this.logger.info('SMS send rejected by open circuit', {
          tenantId: item.tenant_id,
          itemId: item.item_id,
          retryAfterMs: result.retryAfterMs,
        });
        return { kind: 'circuit_open', retry_after_ms: result.retryAfterMs };
      case 'failure':
        return isRetryableError(result.error)
          ? { kind: 'transport_failure', error: describe(result.error) }
          : { kind: 'unrecoverable', error: describe(result.error) };
    }
  }

  /**
   * STOP-class keywords never reach the scorer.
   */
  async evaluateReply(item: RecoveryQueueItem, replyText: string): Promise<ReplyEvaluation> {
    if (isOptOutMessage(replyText)) {
      return { kind: 'opt_out' };
    }

    const breaker = this.breakers.getOrCreate(AI_DRAFTING_SERVICE, item.tenant_id);
    const result = await invokeWithBreaker(breaker, () =>
      this.drafting.scoreReply({ tenant_id: item.tenant_id, item_id: item.item_id, reply_text: replyText })
    );

    switch (result.kind) {
      case 'success':
        return { kind: 'scored', intent: result.value.intent, confidence: result.value.confidence };
      case 'rejected':
        return { kind: 'unavailable', error: `scoring circuit ${result.state}` };
      case 'failure':
        return { kind: 'unavailable', error: describe(result.error) };
    }
  }

  private async draft(item: RecoveryQueueItem, settings: TenantRecoverySettings): Promise<DraftedMessage> {
    const template = (): DraftedMessage => ({
      content: renderOutreachTemplate(item.messages_sent, item.customer_type, settings.business_name),
      drafted_by: 'template',
    });

    if (!settings.sla.ai_enabled) {
      return template();
    }

    const breaker = this.breakers.getOrCreate(AI_DRAFTING_SERVICE, item.tenant_id);
    const result = await invokeWithBreaker(breaker, () =>
      this.drafting.draftMessage({
        tenant_id: item.tenant_id,
        item_id: item.item_id,
        customer_type: item.customer_type,
        message_number: item.messages_sent + 1,
        business_name: settings.business_name,
      })
    );

    if (result.kind !== 'success') {
      this.logger.warn('AI draft unavailable; using template', {
        tenantId: item.tenant_id,
        itemId: item.item_id,
        reason: result.kind,
      });
      return template();
    }
    if (result.value.confidence < settings.sla.ai_confidence_threshold) {
      this.logger.info('AI draft below confidence threshold; using template', {
        tenantId: item.tenant_id,
        itemId: item.item_id,
        confidence: result.value.confidence,
      });
      return template();
    }
    return { content: result.value.content, confidence: result.value.confidence, drafted_by: 'ai' };
  }
}
