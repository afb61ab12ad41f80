/**
 * Scheduled Task
 *
 * Repeats an async job on a fixed delay measured from the end of the previous
 * run, so runs never overlap. A failing run is logged and the loop carries on.
 * stop() cancels the pending timer and waits for an in-flight run to finish.
 */

import { Logger } from '../core/Logger';

export interface ScheduledTaskOptions {
  name: string;
  intervalMs: number;
  /** Delay before the first run after start(). */
  initialDelayMs?: number;
  run: () => Promise<unknown>;
}

export class ScheduledTask {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private active = false;

  constructor(
    private readonly options: ScheduledTaskOptions,
    private readonly logger: Logger
  ) {
    if (!(options.intervalMs > 0)) {
      throw new Error(`intervalMs must be positive for task ${options.name}`);
    }
  }

  get name(): string {
    return this.options.name;
  }

  get intervalMs(): number {
    return this.options.intervalMs;
  }

  isRunning(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.logger.info('Scheduled task started', { task: this.options.name, intervalMs: this.options.intervalMs });
    this.schedule(this.options.initialDelayMs ?? 0);
  }

  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.info('Scheduled task stopped', { task: this.options.name });
  }

  /**
   * Runs the job now. If a run is already in flight, joins it instead.
   */
  runOnce(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.execute().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().then(() => {
        if (this.active) {
          this.schedule(this.options.intervalMs);
        }
      });
    }, delayMs);
  }

  private async execute(): Promise<void> {
    const startedAt = Date.now();
    try {
      await this.options.run();
      this.logger.debug('Scheduled task run complete', {
        task: this.options.name,
        durationMs: Date.now() - startedAt,
      });
    } catch (error) {
      this.logger.error('Scheduled task run failed', {
        task: this.options.name,
        durationMs: Date.now() - startedAt,
        error,
      });
    }
  }
}
