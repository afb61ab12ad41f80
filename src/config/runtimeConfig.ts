/**
 * Process configuration from environment variables, validated once at startup.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/RecoveryErrors';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const RuntimeEnvSchema = z.object({
  AWS_REGION: z.string().min(1).default('us-east-1'),
  RECOVERY_TABLE_NAME: z.string().min(1),
  IDEMPOTENCY_TABLE_NAME: z.string().min(1),
  COORDINATION_TABLE_NAME: z.string().min(1),
  TENANTS_TABLE_NAME: z.string().min(1),
  EVENT_BUS_NAME: z.string().min(1),

  SMS_GATEWAY_BASE_URL: z.string().url(),
  SMS_GATEWAY_API_KEY: z.string().min(1).optional(),
  SMS_GATEWAY_TIMEOUT_MS: positiveInt(10_000),
  DRAFTING_BASE_URL: z.string().url(),
  DRAFTING_API_KEY: z.string().min(1).optional(),
  DRAFTING_TIMEOUT_MS: positiveInt(15_000),

  PROCESS_INTERVAL_SECONDS: positiveInt(60),
  SLA_CHECK_INTERVAL_SECONDS: positiveInt(300),
  PROCESS_BATCH_SIZE: positiveInt(50),
  PROCESS_CONCURRENCY: positiveInt(5),
  PROCESSING_TIMEOUT_SECONDS: positiveInt(900),
  LOCK_TIMEOUT_SECONDS: positiveInt(300),
  CIRCUIT_FAILURE_THRESHOLD: positiveInt(5),
  CIRCUIT_RECOVERY_TIMEOUT_SECONDS: positiveInt(60),
  IDEMPOTENCY_TTL_DAYS: positiveInt(90),
  IDEMPOTENCY_IN_PROGRESS_TIMEOUT_SECONDS: positiveInt(300),
});

export interface RuntimeConfig {
  region: string;
  tables: {
    recovery: string;
    idempotency: string;
    coordination: string;
    tenants: string;
  };
  eventBusName: string;
  smsGateway: { baseUrl: string; apiKey?: string; timeoutMs: number };
  drafting: { baseUrl: string; apiKey?: string; timeoutMs: number };
  queue: {
    processIntervalMs: number;
    slaCheckIntervalMs: number;
    batchSize: number;
    concurrency: number;
    processingTimeoutMs: number;
  };
  lockTimeoutSeconds: number;
  circuitBreaker: { failureThreshold: number; recoveryTimeoutMs: number };
  idempotency: { retentionDays: number; inProgressTimeoutMs: number };
}

/**
 * @throws ConfigurationError naming every missing or malformed variable
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid runtime configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    region: e.AWS_REGION,
    tables: {
      recovery: e.RECOVERY_TABLE_NAME,
      idempotency: e.IDEMPOTENCY_TABLE_NAME,
      coordination: e.COORDINATION_TABLE_NAME,
      tenants: e.TENANTS_TABLE_NAME,
    },
    eventBusName: e.EVENT_BUS_NAME,
    smsGateway: { baseUrl: e.SMS_GATEWAY_BASE_URL, apiKey: e.SMS_GATEWAY_API_KEY, timeoutMs: e.SMS_GATEWAY_TIMEOUT_MS },
    drafting: { baseUrl: e.DRAFTING_BASE_URL, apiKey: e.DRAFTING_API_KEY, timeoutMs: e.DRAFTING_TIMEOUT_MS },
    queue: {
      processIntervalMs: e.PROCESS_INTERVAL_SECONDS * 1000,
      slaCheckIntervalMs: e.SLA_CHECK_INTERVAL_SECONDS * 1000,
      batchSize: e.PROCESS_BATCH_SIZE,
      concurrency: e.PROCESS_CONCURRENCY,
      processingTimeoutMs: e.PROCESSING_TIMEOUT_SECONDS * 1000,
    },
    lockTimeoutSeconds: e.LOCK_TIMEOUT_SECONDS,
    circuitBreaker: {
      failureThreshold: e.CIRCUIT_FAILURE_THRESHOLD,
      recoveryTimeoutMs: e.CIRCUIT_RECOVERY_TIMEOUT_SECONDS * 1000,
    },
    idempotency: {
      retentionDays: e.IDEMPOTENCY_TTL_DAYS,
      inProgressTimeoutMs: e.IDEMPOTENCY_IN_PROGRESS_TIMEOUT_SECONDS * 1000,
    },
  };
}
