/**
 * Missed-Call Recovery Core
 *
 * Long-running worker: loads .env, builds the runtime and runs both queue loops
 * until SIGINT/SIGTERM. Serverless deployments use the handlers in
 * src/handlers/recovery instead, with queue-tick-handler on a schedule.
 */

import { config } from 'dotenv';
import { getRecoveryRuntime } from './handlers/recovery/recovery-runtime';
import { ScheduledTask } from './services/queue/ScheduledTask';

// Load environment variables
config();

async function main(): Promise<void> {
  const runtime = getRecoveryRuntime();
  const { queue, logger } = runtime;

  const purge = new ScheduledTask(
    { name: 'idempotency-purge', intervalMs: 24 * 60 * 60_000, run: () => runtime.ledger.purgeExpired() },
    logger
  );

  queue.start();
  purge.start();
  logger.info('Recovery worker started', {
    processIntervalMs: runtime.config.queue.processIntervalMs,
    slaCheckIntervalMs: runtime.config.queue.slaCheckIntervalMs,
  });

  const shutdown = (signal: string): void => {
    logger.info('Recovery worker stopping', { signal });
    Promise.all([queue.stop(), purge.stop()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Recovery worker did not stop cleanly', { error });
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

// Run main function if this file is executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Recovery worker failed to start:', error);
    process.exit(1);
  });
}

export { main };
