// =====================================================
// In-Memory Ingest Store
// =====================================================
// Implements the store contracts over plain maps, with the
// same semantics as the PostgreSQL store: batches commit or
// roll back as a unit, and a failed record write leaves no
// trace inside its batch.

import type {
  Competition,
  Player,
  SyncRun,
  SyncRunClosure,
  SyncRunCounters,
  SyncType,
  UpsertOutcome,
} from '@scoutline/shared-types';
import type {
  CompetitionUpsertResult,
  CountryMap,
  IngestStore,
  IngestWriter,
  SyncRunRepository,
} from '../../src/services/ingest/store';
import { extractCountries } from '../../src/services/ingest/mappers';
import { SyncRunClosedError } from '../../src/utils/errors';

export interface CountryRow {
  id: number;
  externalId: number;
  name: string;
}

export interface CompetitionRow extends Competition {
  id: number;
  countryId: number | null;
  lastSyncedAt: Date;
}

export interface TeamRow {
  id: number;
  externalId: number;
  competitionId: number;
}

export interface PlayerRow extends Player {
  id: number;
  competitionId: number | null;
  lastSyncedAt: Date;
}

export interface MemoryTables {
  countries: Map<number, CountryRow>;
  competitions: Map<number, CompetitionRow>;
  teams: Map<number, TeamRow>;
  players: Map<number, PlayerRow>;
  nextId: number;
}

function emptyTables(): MemoryTables {
  return {
    countries: new Map(),
    competitions: new Map(),
    teams: new Map(),
    players: new Map(),
    nextId: 1,
  };
}

function cloneTables(tables: MemoryTables): MemoryTables {
  return {
    countries: new Map([...tables.countries].map(([k, v]) => [k, { ...v }])),
    competitions: new Map([...tables.competitions].map(([k, v]) => [k, { ...v }])),
    teams: new Map([...tables.teams].map(([k, v]) => [k, { ...v }])),
    players: new Map([...tables.players].map(([k, v]) => [k, { ...v }])),
    nextId: tables.nextId,
  };
}

// ===========================================
// Writer
// ===========================================

class MemoryWriter implements IngestWriter {
  constructor(
    private readonly tables: MemoryTables,
    private readonly store: InMemoryIngestStore
  ) {}

  async upsertCountries(competitions: Competition[]): Promise<CountryMap> {
    const countryMap: CountryMap = new Map();

    for (const country of extractCountries(competitions)) {
      const existing = this.tables.countries.get(country.externalId);
      const id = existing?.id ?? this.tables.nextId++;
      this.tables.countries.set(country.externalId, { id, externalId: country.externalId, name: country.name });
      countryMap.set(country.externalId, id);
    }

    return countryMap;
  }

  async upsertCompetition(competition: Competition, countryMap: CountryMap): Promise<CompetitionUpsertResult> {
    this.store.assertWritable('competition', competition.externalId);

    const existing = this.tables.competitions.get(competition.externalId);
    const id = existing?.id ?? this.tables.nextId++;
    const countryId =
      competition.externalCountryId !== null ? countryMap.get(competition.externalCountryId) ?? null : null;

    this.tables.competitions.set(competition.externalId, {
      ...competition,
      id,
      countryId,
      lastSyncedAt: this.store.now(),
    });

    for (const teamId of competition.teamIds) {
      const team = this.tables.teams.get(teamId);
      this.tables.teams.set(teamId, { id: team?.id ?? this.tables.nextId++, externalId: teamId, competitionId: id });
    }

    return { outcome: existing ? 'updated' : 'created', competitionId: id };
  }

  async upsertPlayer(player: Player): Promise<UpsertOutcome> {
    this.store.assertWritable('player', player.externalId);

    const competitionId =
      player.externalCompetitionId !== null
        ? this.tables.competitions.get(player.externalCompetitionId)?.id ?? null
        : null;

    const existing = this.tables.players.get(player.externalId);
    this.tables.players.set(player.externalId, {
      ...player,
      id: existing?.id ?? this.tables.nextId++,
      competitionId,
      lastSyncedAt: this.store.now(),
    });

    return existing ? 'updated' : 'created';
  }
}

// ===========================================
// Sync Runs
// ===========================================

export class InMemorySyncRunRepository implements SyncRunRepository {
  readonly runs = new Map<number, SyncRun>();
  readonly progress: Array<{ id: number; counters: SyncRunCounters }> = [];
  private nextId = 1;

  async create(syncType: SyncType, startedAt: Date): Promise<SyncRun> {
    const run: SyncRun = {
      id: this.nextId++,
      syncType,
      status: 'in_progress',
      startedAt,
      completedAt: null,
      durationSeconds: null,
      recordsFetched: 0,
      recordsInserted: 0,
      recordsUpdated: 0,
      recordsFailed: 0,
      errorMessage: null,
      metadata: null,
    };
    this.runs.set(run.id, run);
    return { ...run };
  }

  async saveProgress(id: number, counters: SyncRunCounters): Promise<void> {
    const run = this.runs.get(id);
    if (run && run.status === 'in_progress') {
      this.runs.set(id, { ...run, ...counters });
      this.progress.push({ id, counters: { ...counters } });
    }
  }

  async close(id: number, closure: SyncRunClosure): Promise<SyncRun> {
    const run = this.runs.get(id);
    if (!run || run.status !== 'in_progress') {
      throw new SyncRunClosedError(id);
    }
    const closed: SyncRun = { ...run, ...closure };
    this.runs.set(id, closed);
    return { ...closed };
  }

  async findRecent(limit: number, syncType?: SyncType): Promise<SyncRun[]> {
    return [...this.runs.values()]
      .filter((run) => syncType === undefined || run.syncType === syncType)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime() || b.id - a.id)
      .slice(0, limit);
  }

  get(id: number): SyncRun | undefined {
    return this.runs.get(id);
  }
}

// ===========================================
// Store
// ===========================================

export class InMemoryIngestStore implements IngestStore {
  readonly syncRuns = new InMemorySyncRunRepository();
  tables: MemoryTables = emptyTables();

  /** Committed / rolled back batch counts */
  commits = 0;
  rollbacks = 0;

  /** Record writes that should fail, by "<entity>:<externalId>" */
  private readonly failingWrites = new Set<string>();
  private failNextCommit = false;
  private clockValue = new Date('2026-01-01T00:00:00Z');

  failWrite(entity: 'competition' | 'player', externalId: number): void {
    this.failingWrites.add(`${entity}:${externalId}`);
  }

  failCommitOnce(): void {
    this.failNextCommit = true;
  }

  setNow(date: Date): void {
    this.clockValue = date;
  }

  now(): Date {
    return this.clockValue;
  }

  assertWritable(entity: string, externalId: number): void {
    if (this.failingWrites.has(`${entity}:${externalId}`)) {
      throw new Error(`simulated write failure for ${entity} ${externalId}`);
    }
  }

  async withBatch<T>(fn: (writer: IngestWriter) => Promise<T>): Promise<T> {
    const working = cloneTables(this.tables);

    let result: T;
    try {
      result = await fn(new MemoryWriter(working, this));
    } catch (error) {
      this.rollbacks++;
      throw error;
    }

    if (this.failNextCommit) {
      this.failNextCommit = false;
      this.rollbacks++;
      throw new Error('simulated commit failure');
    }

    this.tables = working;
    this.commits++;
    return result;
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  player(externalId: number): PlayerRow | undefined {
    return this.tables.players.get(externalId);
  }

  competition(externalId: number): CompetitionRow | undefined {
    return this.tables.competitions.get(externalId);
  }
}
