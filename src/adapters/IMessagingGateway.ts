/**
 * Outbound SMS gateway. Implementations throw TransientDeliveryError for
 * failures worth retrying and PermanentDeliveryError when the request itself
 * was refused.
 */
export interface SendSmsRequest {
  tenant_id: string;
  to: string;
  body: string;
  /** Forwarded to the provider so a retried request is not sent twice. */
  idempotency_key: string;
}

export interface SendSmsResult {
  message_id: string;
}

export interface IMessagingGateway {
  sendSms(request: SendSmsRequest): Promise<SendSmsResult>;
}
