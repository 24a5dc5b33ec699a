// =====================================================
// Ingest Pipeline Service
// =====================================================
// Sequences fetch -> map -> upsert for each entity type
// under a tracked sync run. Record-level failures are
// counted and skipped; run-level failures close the run as
// failed and propagate.

import * as Sentry from '@sentry/node';
import type { Competition, SyncRun, SyncType, UpsertOutcome } from '@scoutline/shared-types';
import { logger } from '../../utils/logger';
import {
  AppError,
  ConfigError,
  InvalidRecordError,
  OrchestrationError,
  UpsertError,
  toError,
} from '../../utils/errors';
import { sleep } from '../scouting-api';
import type { RawPlayer, Sleeper } from '../scouting-api';
import type { CompetitionSource } from './competition-source';
import { mapCompetition, mapPlayer } from './mappers';
import { readInteger } from './mappers/fields';
import type { CountryMap, IngestStore, IngestWriter } from './store';
import { SyncRunTracker } from './sync-run.tracker';
import type { Clock } from './sync-run.tracker';

// ===========================================
// Types
// ===========================================

export interface PlayersFetcher {
  fetchPlayers(offset: number, limit: number): Promise<RawPlayer[]>;
}

export interface IngestPipelineOptions {
  pageSize: number;
  commitBatchSize: number;
  pageDelayMs: number;
}

export interface IngestPipelineDeps {
  store: IngestStore;
  players: PlayersFetcher;
  competitions: CompetitionSource;
  options?: IngestPipelineOptions;
  clock?: Clock;
  sleeper?: Sleeper;
}

export interface IngestPlayersOptions {
  maxRecords?: number | null;
}

export interface PipelineRunOptions {
  competitionsOnly?: boolean;
  playersOnly?: boolean;
  maxPlayers?: number | null;
}

export interface PipelineRunResult {
  competitions: SyncRun | null;
  players: SyncRun | null;
}

interface RecordOutcome {
  outcome: UpsertOutcome;
}

export const DEFAULT_PIPELINE_OPTIONS: IngestPipelineOptions = {
  pageSize: 10000, // API returns up to 10k per request
  commitBatchSize: 100,
  pageDelayMs: 500,
};

// ===========================================
// Helper Functions
// ===========================================

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, size);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}

/**
 * Errors that already describe a run-level failure pass through;
 * anything else is wrapped.
 */
function toRunError(syncType: SyncType, error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const cause = toError(error);
  return new OrchestrationError(`${syncType} ingestion failed: ${cause.message}`, cause);
}

// ===========================================
// Ingest Pipeline Service
// ===========================================

export class IngestPipelineService {
  private readonly store: IngestStore;
  private readonly players: PlayersFetcher;
  private readonly competitions: CompetitionSource;
  private readonly options: IngestPipelineOptions;
  private readonly clock: Clock | undefined;
  private readonly sleeper: Sleeper;

  constructor(deps: IngestPipelineDeps) {
    this.store = deps.store;
    this.players = deps.players;
    this.competitions = deps.competitions;
    this.options = deps.options ?? DEFAULT_PIPELINE_OPTIONS;
    // A zero page size would never advance the offset
    if (!Number.isInteger(this.options.pageSize) || this.options.pageSize < 1) {
      throw new ConfigError(`pageSize must be a positive integer, got ${this.options.pageSize}`);
    }
    if (!Number.isInteger(this.options.commitBatchSize) || this.options.commitBatchSize < 1) {
      throw new ConfigError(`commitBatchSize must be a positive integer, got ${this.options.commitBatchSize}`);
    }
    this.clock = deps.clock;
    this.sleeper = deps.sleeper ?? sleep;
  }

  // ===========================================
  // Public Methods
  // ===========================================

  /**
   * Run the requested entity types in order: competitions first,
   * so players can resolve their competition.
   */
  async run(options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const result: PipelineRunResult = { competitions: null, players: null };

    if (!options.playersOnly) {
      logger.info('[IngestPipeline] Ingesting competitions...');
      result.competitions = await this.ingestCompetitions();
    }

    if (!options.competitionsOnly) {
      logger.info('[IngestPipeline] Ingesting players...');
      if (options.maxPlayers) {
        logger.info(`[IngestPipeline] Max players to fetch: ${options.maxPlayers}`);
      }
      result.players = await this.ingestPlayers({ maxRecords: options.maxPlayers });
    }

    return result;
  }

  /**
   * Ingest the competition list: countries once for the whole
   * batch, then each competition with its teams.
   */
  async ingestCompetitions(): Promise<SyncRun> {
    return this.runTracked('competitions', async (tracker) => {
      const raw = await this.competitions.load();
      tracker.recordFetched(raw.length);
      logger.info(`[IngestPipeline] Loaded ${raw.length} competitions from ${this.competitions.description}`);

      const mapped: Competition[] = [];
      for (const record of raw) {
        try {
          mapped.push(mapCompetition(record));
        } catch (error) {
          this.recordFailure(tracker, 'competition', readInteger(record, 'Id'), error);
        }
      }

      const countryMap = await this.store.withBatch((writer) => writer.upsertCountries(mapped));

      for (const batch of chunk(mapped, this.options.commitBatchSize)) {
        await this.writeBatch(
          tracker,
          batch,
          (competition) => competition.externalId,
          (writer, competition) => this.writeCompetition(writer, competition, countryMap),
          'competition'
        );
      }
      await tracker.checkpoint();
    });
  }

  /**
   * Page through players until an empty page or the record ceiling.
   */
  async ingestPlayers(options: IngestPlayersOptions = {}): Promise<SyncRun> {
    const maxRecords = options.maxRecords ?? null;
    const { pageSize, commitBatchSize, pageDelayMs } = this.options;

    return this.runTracked('players', async (tracker) => {
      let offset = 0;
      let processed = 0;

      while (true) {
        if (maxRecords !== null && processed >= maxRecords) {
          logger.info(`[IngestPipeline] Reached max records limit: ${maxRecords}`);
          break;
        }

        const page = await this.players.fetchPlayers(offset, pageSize);
        if (page.length === 0) {
          logger.info('[IngestPipeline] No more players to fetch');
          break;
        }

        tracker.recordFetched(page.length);

        const budget = maxRecords === null ? page.length : maxRecords - processed;
        const records = page.slice(0, budget);

        for (const batch of chunk(records, commitBatchSize)) {
          await this.writeBatch(
            tracker,
            batch,
            (raw) => readInteger(raw, 'TR_ID'),
            (writer, raw) => this.writePlayer(writer, raw),
            'player'
          );
          processed += batch.length;
        }

        await tracker.checkpoint();
        const counters = tracker.snapshot();
        logger.info(
          `[IngestPipeline] Progress: ${processed}/${counters.recordsFetched} players processed ` +
            `(inserted: ${counters.recordsInserted}, updated: ${counters.recordsUpdated}, failed: ${counters.recordsFailed})`
        );

        offset += pageSize;

        // Rate limiting between pages
        await this.sleeper(pageDelayMs);
      }

      logger.info(`[IngestPipeline] Finished players: ${processed} processed`);
    });
  }

  // ===========================================
  // Private Methods
  // ===========================================

  private async runTracked(syncType: SyncType, fn: (tracker: SyncRunTracker) => Promise<void>): Promise<SyncRun> {
    try {
      const { run } = await SyncRunTracker.track(
        this.store.syncRuns,
        syncType,
        async (tracker) => {
          try {
            await fn(tracker);
          } catch (error) {
            throw toRunError(syncType, error);
          }
        },
        this.clock
      );
      return run;
    } catch (error) {
      logger.error(`[IngestPipeline] ${syncType} ingestion failed:`, error);
      Sentry.captureException(error, { tags: { sync_type: syncType } });
      throw error;
    }
  }

  /**
   * Write one sub-batch in its own transaction. Outcomes are only
   * counted once the batch has committed; if the commit itself
   * fails, the records that had been written are counted as failed.
   */
  private async writeBatch<T>(
    tracker: SyncRunTracker,
    batch: readonly T[],
    externalIdOf: (item: T) => number | null,
    write: (writer: IngestWriter, item: T) => Promise<UpsertOutcome>,
    entity: string
  ): Promise<void> {
    const written: Array<RecordOutcome & { externalId: number | null }> = [];

    try {
      await this.store.withBatch(async (writer) => {
        for (const item of batch) {
          try {
            const outcome = await write(writer, item);
            written.push({ outcome, externalId: externalIdOf(item) });
          } catch (error) {
            this.recordFailure(tracker, entity, externalIdOf(item), error);
          }
        }
      });
    } catch (error) {
      logger.error(`[IngestPipeline] Commit of ${entity} batch failed; ${written.length} writes rolled back`, error);
      for (const { externalId } of written) {
        this.recordFailure(tracker, entity, externalId, error);
      }
      return;
    }

    for (const { outcome } of written) {
      if (outcome === 'created') {
        tracker.recordCreated();
      } else {
        tracker.recordUpdated();
      }
    }
  }

  private async writeCompetition(
    writer: IngestWriter,
    competition: Competition,
    countryMap: CountryMap
  ): Promise<UpsertOutcome> {
    const { outcome } = await writer.upsertCompetition(competition, countryMap);
    return outcome;
  }

  private async writePlayer(writer: IngestWriter, raw: RawPlayer): Promise<UpsertOutcome> {
    return writer.upsertPlayer(mapPlayer(raw));
  }

  private recordFailure(tracker: SyncRunTracker, entity: string, externalId: number | null, error: unknown): void {
    const failure =
      error instanceof InvalidRecordError || error instanceof UpsertError
        ? error
        : new UpsertError(entity, externalId, toError(error));

    logger.error(`[IngestPipeline] ${entity} ${externalId ?? '<unknown>'} skipped: ${toError(error).message}`);
    tracker.recordFailure(failure);
  }
}
