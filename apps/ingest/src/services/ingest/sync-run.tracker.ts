// =====================================================
// Sync Run Tracker
// =====================================================
// Audit lifecycle for one sync run:
//   in_progress -> completed | failed  (exactly once)
// The row is opened before anything is fetched and is the
// single record of how the run ended.

import type {
  SyncRun,
  SyncRunClosure,
  SyncRunCounters,
  SyncType,
} from '@scoutline/shared-types';
import { logger } from '../../utils/logger';
import { SyncRunClosedError, errorMessage } from '../../utils/errors';
import type { SyncRunRepository } from './store';

export const MAX_SAMPLED_ERRORS = 10;

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

export class SyncRunTracker {
  private readonly counters: SyncRunCounters = {
    recordsFetched: 0,
    recordsInserted: 0,
    recordsUpdated: 0,
    recordsFailed: 0,
  };
  private readonly errors: string[] = [];
  private closedRun: SyncRun | null = null;

  private constructor(
    private readonly repository: SyncRunRepository,
    private readonly run: SyncRun,
    private readonly clock: Clock
  ) {}

  /**
   * Open an in_progress run.
   */
  static async start(
    repository: SyncRunRepository,
    syncType: SyncType,
    clock: Clock = systemClock
  ): Promise<SyncRunTracker> {
    const run = await repository.create(syncType, clock());
    logger.info(`[SyncRunTracker] Started sync run ${run.id} for ${syncType}`);
    return new SyncRunTracker(repository, run, clock);
  }

  /**
   * Open a run, execute `fn`, and close the run according to how
   * `fn` ends. A thrown error closes the run as failed and is then
   * rethrown.
   */
  static async track<T>(
    repository: SyncRunRepository,
    syncType: SyncType,
    fn: (tracker: SyncRunTracker) => Promise<T>,
    clock: Clock = systemClock
  ): Promise<{ result: T; run: SyncRun }> {
    const tracker = await SyncRunTracker.start(repository, syncType, clock);

    let result: T;
    try {
      result = await fn(tracker);
    } catch (error) {
      await tracker.failQuietly(error);
      throw error;
    }

    try {
      const run = tracker.closedRun ?? (await tracker.complete());
      return { result, run };
    } catch (error) {
      await tracker.failQuietly(error);
      throw error;
    }
  }

  get id(): number {
    return this.run.id;
  }

  get isClosed(): boolean {
    return this.closedRun !== null;
  }

  get sampledErrors(): readonly string[] {
    return this.errors;
  }

  snapshot(): SyncRunCounters {
    return { ...this.counters };
  }

  // ===========================================
  // Counters
  // ===========================================

  recordFetched(count: number): void {
    this.assertOpen();
    this.counters.recordsFetched += count;
  }

  recordCreated(): void {
    this.assertOpen();
    this.counters.recordsInserted++;
  }

  recordUpdated(): void {
    this.assertOpen();
    this.counters.recordsUpdated++;
  }

  recordFailure(error: unknown): void {
    this.assertOpen();
    this.counters.recordsFailed++;
    if (this.errors.length < MAX_SAMPLED_ERRORS) {
      this.errors.push(errorMessage(error));
    }
  }

  /**
   * Persist the counters so far without closing the run.
   */
  async checkpoint(): Promise<void> {
    this.assertOpen();
    await this.repository.saveProgress(this.run.id, this.snapshot());
  }

  // ===========================================
  // Closure
  // ===========================================

  async complete(): Promise<SyncRun> {
    return this.close('completed', null);
  }

  async fail(error: unknown): Promise<SyncRun> {
    return this.close('failed', errorMessage(error));
  }

  private async close(status: SyncRunClosure['status'], message: string | null): Promise<SyncRun> {
    this.assertOpen();

    const completedAt = this.clock();
    const elapsedMs = Math.max(0, completedAt.getTime() - this.run.startedAt.getTime());

    const closed = await this.repository.close(this.run.id, {
      ...this.counters,
      status,
      completedAt,
      durationSeconds: Math.floor(elapsedMs / 1000),
      errorMessage: message,
      metadata: { errors: [...this.errors] },
    });
    this.closedRun = closed;

    const summary =
      `Sync run ${closed.id} ${status} ` +
      `(fetched=${closed.recordsFetched}, inserted=${closed.recordsInserted}, ` +
      `updated=${closed.recordsUpdated}, failed=${closed.recordsFailed}) in ${closed.durationSeconds}s`;

    if (status === 'failed') {
      logger.error(`[SyncRunTracker] ${summary}: ${message}`);
    } else {
      logger.info(`[SyncRunTracker] ${summary}`);
    }

    return closed;
  }

  /**
   * Best-effort failed closure for a run that is still open.
   */
  private async failQuietly(error: unknown): Promise<void> {
    if (this.isClosed) return;
    await this.fail(error).catch((closeError: unknown) => {
      logger.error(`[SyncRunTracker] Could not close sync run ${this.id} as failed:`, closeError);
    });
  }

  private assertOpen(): void {
    if (this.closedRun) {
      throw new SyncRunClosedError(this.run.id);
    }
  }
}
