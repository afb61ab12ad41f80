import { EventBridgeClient, PutEventsCommand } from '@aws-sdk/client-eventbridge';
import { EventEnvelope, RecoveryEventSink, createEventSource } from '../../types/EventTypes';
import { Logger } from '../core/Logger';
import { getAWSClientConfig } from '../../utils/aws-client-config';

/**
 * EventPublisher - Publish recovery lifecycle events to EventBridge
 */
export class EventPublisher implements RecoveryEventSink {
  private eventBridgeClient: EventBridgeClient;
  private logger: Logger;
  private eventBusName: string;

  constructor(logger: Logger, eventBusName: string, region?: string, client?: EventBridgeClient) {
    this.logger = logger;
    this.eventBusName = eventBusName;
    this.eventBridgeClient = client ?? new EventBridgeClient(getAWSClientConfig(region));
  }

  /**
   * Publish single event to EventBridge
   */
  async publish(event: EventEnvelope): Promise<void> {
    try {
      const namespacedSource = createEventSource(event.source);

      const command = new PutEventsCommand({
        Entries: [
          {
            Source: namespacedSource,
            DetailType: event.eventType,
            Detail: JSON.stringify(event),
            EventBusName: this.eventBusName,
          },
        ],
      });

      const result = await this.eventBridgeClient.send(command);

      if (result.FailedEntryCount && result.FailedEntryCount > 0) {
        const error = result.Entries?.[0]?.ErrorMessage || 'Unknown error';
        throw new Error(`Failed to publish event: ${error}`);
      }

      this.logger.debug('Event published', {
        eventType: event.eventType,
        traceId: event.traceId,
        tenantId: event.tenantId,
        source: namespacedSource,
      });
    } catch (error) {
      this.logger.error('Failed to publish event', {
        eventType: event.eventType,
        traceId: event.traceId,
        tenantId: event.tenantId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
