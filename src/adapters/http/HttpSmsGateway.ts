/**
 * SMS gateway over HTTP.
 *
 * POST {baseUrl}/messages with {to, body}; tenant and idempotency key travel
 * as headers. The provider answers {message_id} (or {id}).
 */

import axios from 'axios';
import { z } from 'zod';
import { IMessagingGateway, SendSmsRequest, SendSmsResult } from '../IMessagingGateway';
import { PermanentDeliveryError } from '../../types/RecoveryErrors';
import { toDeliveryError } from './http-errors';

const SendSmsResponseSchema = z.union([
  z.object({ message_id: z.string().min(1) }),
  z.object({ id: z.string().min(1) }).transform((r) => ({ message_id: r.id })),
]);

export interface HttpSmsGatewayOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

export class HttpSmsGateway implements IMessagingGateway {
  constructor(private readonly options: HttpSmsGatewayOptions) {}

  async sendSms(request: SendSmsRequest): Promise<SendSmsResult> {
    let data: unknown;
    try {
      const response = await axios.post(
        `${this.options.baseUrl}/messages`,
        { to: request.to, body: request.body },
        {
          timeout: this.options.timeoutMs,
          headers: {
            'Content-Type': 'application/json',
            'X-Tenant-Id': request.tenant_id,
            'Idempotency-Key': request.idempotency_key,
            ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {}),
          },
        }
      );
      data = response.data;
    } catch (error) {
      throw toDeliveryError(error, 'SMS send');
    }

    const parsed = SendSmsResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new PermanentDeliveryError('SMS gateway response missing message id', 'INVALID_GATEWAY_RESPONSE');
    }
    return parsed.data;
  }
}
