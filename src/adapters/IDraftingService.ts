import type { CustomerType, ReplyIntent } from '../types/RecoveryTypes';

export interface DraftRequest {
  tenant_id: string;
  item_id: string;
  customer_type: CustomerType;
  /** 1 for the first contact, 2 for the first follow-up, ... */
  message_number: number;
  business_name: string;
}

export interface DraftResult {
  content: string;
  confidence: number;
}

export interface ScoreReplyRequest {
  tenant_id: string;
  item_id: string;
  reply_text: string;
}

export interface ReplyScore {
  intent: ReplyIntent;
  confidence: number;
}

/**
 * AI drafting and reply-scoring collaborator. Only ever called through a breaker.
 */
export interface IDraftingService {
  draftMessage(request: DraftRequest): Promise<DraftResult>;
  scoreReply(request: ScoreReplyRequest): Promise<ReplyScore>;
}
