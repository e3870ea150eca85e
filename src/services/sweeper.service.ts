import { Cron } from 'croner';
import type { LinkStore } from '../store/link-store';
import type { Clock } from '../types';
import { type Logger, createLogger } from '../utils/logger';

export interface SweeperOptions {
  /** Cron expression, e.g. '0 3 * * *' for daily at 03:00 */
  schedule: string;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Periodic bulk delete of expired links.
 *
 * Only keeps storage bounded: the resolver enforces expiry on its own.
 * The delete is set-based, so several instances may sweep at once.
 */
export class ExpirationSweeper {
  private job: Cron | null = null;
  private clock: Clock;
  private logger: Logger;

  constructor(
    private store: LinkStore,
    private options: SweeperOptions
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger('sweeper');
  }

  /**
   * Delete every link that expired before now.
   * @returns number of links removed
   */
  async sweep(): Promise<number> {
    const startedAt = this.clock();
    const removed = await this.store.deleteExpiredBefore(startedAt);
    this.logger.info('Expired links swept', { removed, durationMs: this.clock() - startedAt });
    return removed;
  }

  start(): void {
    if (this.job) {
      this.logger.warn('Sweeper already running');
      return;
    }

    // protect: a slow sweep is never overlapped by the next tick
    this.job = new Cron(this.options.schedule, { protect: true }, () => this.runSafe());
    this.logger.info('Sweeper scheduled', {
      schedule: this.options.schedule,
      nextRun: this.job.nextRun()?.toISOString() ?? null,
    });
  }

  stop(): void {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    this.logger.info('Sweeper stopped');
  }

  isRunning(): boolean {
    return this.job !== null;
  }

  private async runSafe(): Promise<void> {
    try {
      await this.sweep();
    } catch (error) {
      this.logger.error('Sweep failed, will retry on next run', { error });
    }
  }
}
