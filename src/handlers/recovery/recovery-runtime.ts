/**
 * Wires the recovery core from runtime configuration. Lambda handlers and the
 * long-running worker (src/index.ts) share this composition.
 */

import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { Logger } from '../../services/core/Logger';
import { TraceService } from '../../services/core/TraceService';
import { EventPublisher } from '../../services/events/EventPublisher';
import { RecoveryEventEmitter } from '../../services/events/RecoveryEventEmitter';
import { DynamoIdempotencyStore } from '../../services/idempotency/DynamoIdempotencyStore';
import { IdempotencyLedgerService } from '../../services/idempotency/IdempotencyLedgerService';
import { DynamoLockStore } from '../../services/lock/DynamoLockStore';
import { DistributedLockService } from '../../services/lock/DistributedLockService';
import { CircuitBreakerRegistry } from '../../services/resilience/CircuitBreakerRegistry';
import { ComplianceGate } from '../../services/recovery/ComplianceGate';
import { DynamoRecoveryQueueRepository } from '../../services/recovery/DynamoRecoveryQueueRepository';
import { OutreachService } from '../../services/recovery/OutreachService';
import { RecoveryIntakeService } from '../../services/recovery/RecoveryIntakeService';
import { DEFAULT_PROCESSOR_OPTIONS, RecoveryProcessor } from '../../services/recovery/RecoveryProcessor';
import { SlaConfigService } from '../../services/recovery/SlaConfigService';
import { QueueProcessor } from '../../services/queue/QueueProcessor';
import { HttpSmsGateway } from '../../adapters/http/HttpSmsGateway';
import { HttpDraftingClient } from '../../adapters/http/HttpDraftingClient';
import { RuntimeConfig, loadRuntimeConfig } from '../../config/runtimeConfig';
import { createDocumentClient } from '../../utils/dynamo-client';

export interface RecoveryRuntime {
  config: RuntimeConfig;
  logger: Logger;
  traceService: TraceService;
  ledger: IdempotencyLedgerService;
  locks: DistributedLockService;
  breakers: CircuitBreakerRegistry;
  intake: RecoveryIntakeService;
  processor: RecoveryProcessor;
  queue: QueueProcessor;
}

export function createRecoveryRuntime(
  config: RuntimeConfig,
  dynamoClient: DynamoDBDocumentClient = createDocumentClient(config.region)
): RecoveryRuntime {
  const logger = new Logger('RecoveryCore');
  const traceService = new TraceService();

  const ledger = new IdempotencyLedgerService(
    new DynamoIdempotencyStore(dynamoClient, config.tables.idempotency, logger, config.idempotency.retentionDays),
    logger,
    config.idempotency
  );
  const locks = new DistributedLockService(
    new DynamoLockStore(dynamoClient, config.tables.coordination),
    logger,
    config.lockTimeoutSeconds
  );
  const breakers = new CircuitBreakerRegistry(logger, config.circuitBreaker);
  const repository = new DynamoRecoveryQueueRepository(dynamoClient, config.tables.recovery, logger);
  const settings = new SlaConfigService(dynamoClient, config.tables.tenants, logger);
  const events = new RecoveryEventEmitter(
    new EventPublisher(logger, config.eventBusName, config.region),
    traceService,
    logger
  );
  const outreach = new OutreachService(
    new HttpSmsGateway(config.smsGateway),
    new HttpDraftingClient(config.drafting),
    breakers,
    logger
  );

  const processor = new RecoveryProcessor(
    {
      repository,
      locks,
      ledger,
      outreach,
      compliance: new ComplianceGate(logger),
      settings,
      events,
      logger,
    },
    {
      ...DEFAULT_PROCESSOR_OPTIONS,
      batchSize: config.queue.batchSize,
      concurrency: config.queue.concurrency,
      processingTimeoutMs: config.queue.processingTimeoutMs,
      lockTimeoutSeconds: config.lockTimeoutSeconds,
    }
  );

  return {
    config,
    logger,
    traceService,
    ledger,
    locks,
    breakers,
    intake: new RecoveryIntakeService(ledger, repository, settings, events, logger),
    processor,
    queue: new QueueProcessor(processor, repository, breakers, logger, {
      processIntervalMs: config.queue.processIntervalMs,
      slaCheckIntervalMs: config.queue.slaCheckIntervalMs,
    }),
  };
}

let runtime: RecoveryRuntime | undefined;

/** Built on first use so importing a handler module never reads the environment. */
export function getRecoveryRuntime(): RecoveryRuntime {
  if (!runtime) {
    runtime = createRecoveryRuntime(loadRuntimeConfig());
  }
  return runtime;
}
