// =====================================================
// Ingest Store Contracts
// =====================================================
// Repository seam between the pipeline and the database.
// Production uses PostgreSQL (pg-ingest.store.ts); tests use
// an in-memory implementation of the same contracts.

import type {
  Competition,
  Player,
  SyncRun,
  SyncRunClosure,
  SyncRunCounters,
  SyncType,
  UpsertOutcome,
} from '@scoutline/shared-types';

/** External country id -> internal country id */
export type CountryMap = Map<number, number>;

export interface CompetitionUpsertResult {
  outcome: UpsertOutcome;
  competitionId: number;
}

/**
 * Writes inside one sub-batch transaction. Every record write is
 * isolated: when it throws, only that record's statements have been
 * rolled back and the writer stays usable for the next record.
 */
export interface IngestWriter {
  upsertCountries(competitions: Competition[]): Promise<CountryMap>;
  upsertCompetition(competition: Competition, countryMap: CountryMap): Promise<CompetitionUpsertResult>;
  upsertPlayer(player: Player): Promise<UpsertOutcome>;
}

export interface SyncRunRepository {
  create(syncType: SyncType, startedAt: Date): Promise<SyncRun>;
  saveProgress(id: number, counters: SyncRunCounters): Promise<void>;
  close(id: number, closure: SyncRunClosure): Promise<SyncRun>;
  findRecent(limit: number, syncType?: SyncType): Promise<SyncRun[]>;
}

export interface IngestStore {
  readonly syncRuns: SyncRunRepository;

  /**
   * Run `fn` in one transaction. Commits when it resolves,
   * rolls back and rethrows when it rejects.
   */
  withBatch<T>(fn: (writer: IngestWriter) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
