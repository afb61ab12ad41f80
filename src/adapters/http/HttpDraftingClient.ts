/**
 * AI drafting / reply scoring over HTTP.
 */

import axios from 'axios';
import { z } from 'zod';
import {
  DraftRequest,
  DraftResult,
  IDraftingService,
  ReplyScore,
  ScoreReplyRequest,
} from '../IDraftingService';
import { PermanentDeliveryError } from '../../types/RecoveryErrors';
import { toDeliveryError } from './http-errors';

const DraftResponseSchema = z.object({
  content: z.string().min(1),
  confidence: z.number().min(0).max(1),
});

const ScoreResponseSchema = z.object({
  intent: z.enum(['resolved', 'negative', 'unclear']),
  confidence: z.number().min(0).max(1),
});

export interface HttpDraftingClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export class HttpDraftingClient implements IDraftingService {
  constructor(private readonly options: HttpDraftingClientOptions) {}

  async draftMessage(request: DraftRequest): Promise<DraftResult> {
    const data = await this.post('/drafts', request, 'Draft request');
    const parsed = DraftResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new PermanentDeliveryError('Drafting response malformed', 'INVALID_DRAFT_RESPONSE');
    }
    return parsed.data;
  }

  async scoreReply(request: ScoreReplyRequest): Promise<ReplyScore> {
    const data = await this.post('/reply-scores', request, 'Reply scoring');
    const parsed = ScoreResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new PermanentDeliveryError('Reply scoring response malformed', 'INVALID_SCORE_RESPONSE');
    }
    return parsed.data;
  }

  private async post(path: string, body: object, operation: string): Promise<unknown> {
    try {
      const response = await axios.post(`${this.options.baseUrl}${path}`, body, {
        timeout: this.options.timeoutMs,
        headers: {
          'Content-Type': 'application/json',
          ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {}),
        },
      });
      return response.data;
    } catch (error) {
      throw toDeliveryError(error, operation);
    }
  }
}
