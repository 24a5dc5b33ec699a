// =====================================================
// PostgreSQL Ingest Store
// =====================================================
// INSERT ... ON CONFLICT (external_id) DO UPDATE for every
// entity; `xmax = 0` on the returned row tells a fresh insert
// from an overwrite. Sync runs are written outside the batch
// transactions so they stay visible when a batch rolls back.

import type {
  Competition,
  Player,
  SyncRun,
  SyncRunClosure,
  SyncRunCounters,
  SyncRunMetadata,
  SyncRunStatus,
  SyncType,
  UpsertOutcome,
} from '@scoutline/shared-types';
import { query, withSavepoint, withTransaction } from '../../../lib/db';
import type { ConnectionPool, Queryable } from '../../../lib/db';
import { logger } from '../../../utils/logger';
import { SyncRunClosedError } from '../../../utils/errors';
import { extractCountries } from '../mappers';
import type {
  CompetitionUpsertResult,
  CountryMap,
  IngestStore,
  IngestWriter,
  SyncRunRepository,
} from './ingest-store';

// ===========================================
// Row Types
// ===========================================

interface UpsertedRow {
  id: number;
  inserted: boolean;
}

interface CountryRow {
  id: number;
  external_id: number;
}

export interface SyncRunRow {
  id: number;
  sync_type: SyncType;
  status: SyncRunStatus;
  started_at: Date;
  completed_at: Date | null;
  duration_seconds: number | null;
  records_fetched: number;
  records_inserted: number;
  records_updated: number;
  records_failed: number;
  error_message: string | null;
  metadata: SyncRunMetadata | null;
}

export function toSyncRun(row: SyncRunRow): SyncRun {
  return {
    id: row.id,
    syncType: row.sync_type,
    status: row.status,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    durationSeconds: row.duration_seconds,
    recordsFetched: row.records_fetched,
    recordsInserted: row.records_inserted,
    recordsUpdated: row.records_updated,
    recordsFailed: row.records_failed,
    errorMessage: row.error_message,
    metadata: row.metadata,
  };
}

// ===========================================
// Player Column Mapping
// ===========================================

type PlayerColumn = [column: string, value: (player: Player) => unknown];

export const PLAYER_COLUMNS: PlayerColumn[] = [
  ['external_id', (p) => p.externalId],
  ['wyscout_id', (p) => p.wyscoutId],
  ['trmarkt_id', (p) => p.trmarktId],
  ['name', (p) => p.name],
  ['birth_date', (p) => p.birthDate],
  ['parent_team_id', (p) => p.parentTeamId],
  ['current_team_id', (p) => p.currentTeamId],
  ['parent_team', (p) => p.parentTeam],
  ['current_team', (p) => p.currentTeam],
  ['team_history', (p) => p.teamHistory],
  ['country', (p) => p.country],
  ['country_id', (p) => p.countryId],
  ['external_competition_id', (p) => p.externalCompetitionId],
  ['competition', (p) => p.competition],
  ['division_level', (p) => p.divisionLevel],
  ['competition_name_mapped', (p) => p.competitionNameMapped],
  ['parent_country', (p) => p.parentCountry],
  ['parent_country_id', (p) => p.parentCountryId],
  ['parent_competition', (p) => p.parentCompetition],
  ['parent_division_level', (p) => p.parentDivisionLevel],
  ['nationality1', (p) => p.nationality1],
  ['nationality1_country_id', (p) => p.nationality1CountryId],
  ['nationality2', (p) => p.nationality2],
  ['nationality2_country_id', (p) => p.nationality2CountryId],
  ['first_position', (p) => p.firstPosition],
  ['second_position', (p) => p.secondPosition],
  ['first_position_full', (p) => p.firstPositionFull],
  ['second_position_full', (p) => p.secondPositionFull],
  ['playing_style', (p) => p.playingStyle],
  ['preferred_foot', (p) => p.preferredFoot],
  ['contract_expiry', (p) => p.contractExpiry],
  ['agency', (p) => p.agency],
  ['agency_verified', (p) => p.agencyVerified],
  ['estimated_salary', (p) => p.estimatedSalary],
  ['shortlisted', (p) => p.shortlisted],
  ['current_club_recent_mins_perc', (p) => p.currentClubRecentMinsPerc],
  ['gbe_score', (p) => p.gbe.score],
  ['gbe_result', (p) => p.gbe.result],
  ['gbe_int_app_pts', (p) => p.gbe.intAppPts],
  ['gbe_dom_mins_pts', (p) => p.gbe.domMinsPts],
  ['gbe_cont_mins_pts', (p) => p.gbe.contMinsPts],
  ['gbe_league_pos_pts', (p) => p.gbe.leaguePosPts],
  ['gbe_cont_prog_pts', (p) => p.gbe.contProgPts],
  ['gbe_league_std_pts', (p) => p.gbe.leagueStdPts],
  ['xtv', (p) => p.xtv],
  ['xtv_change_6m_perc', (p) => p.xtvChange6mPerc],
  ['xtv_change_12m_perc', (p) => p.xtvChange12mPerc],
  ['xtv_history', (p) => p.xtvHistory],
  ['base_value', (p) => p.baseValue],
  ['base_value_history', (p) => p.baseValueHistory],
  ['rating', (p) => p.rating],
  ['potential', (p) => p.potential],
  ['available_sale', (p) => p.availability.sale],
  ['available_asking_price', (p) => p.availability.askingPrice],
  ['available_sell_on', (p) => p.availability.sellOn],
  ['available_loan', (p) => p.availability.loan],
  ['available_monthly_loan_fee', (p) => p.availability.monthlyLoanFee],
  ['available_currency', (p) => p.availability.currency],
  ['raw_payload', (p) => p.rawPayload],
];

// competition_id is resolved at write time and appended last
const PLAYER_INSERT_COLUMNS = [...PLAYER_COLUMNS.map(([column]) => column), 'competition_id'];

export const UPSERT_PLAYER_SQL = `
  insert into players (${PLAYER_INSERT_COLUMNS.join(', ')}, last_synced_at)
  values (${PLAYER_INSERT_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')}, now())
  on conflict (external_id) do update
  set ${PLAYER_INSERT_COLUMNS.filter((column) => column !== 'external_id')
    .map((column) => `${column} = excluded.${column}`)
    .join(',\n      ')},
      updated_at = now(),
      last_synced_at = now()
  returning id, (xmax = 0) as inserted
`;

const UPSERT_COUNTRY_SQL = `
  insert into countries (external_id, name)
  values ($1, $2)
  on conflict (external_id) do update
  set name = excluded.name,
      updated_at = now()
  returning id, external_id
`;

const UPSERT_COMPETITION_SQL = `
  insert into competitions (
    external_id, name, country_id, external_country_id, country_name,
    division_level, teams, avg_team_rating, avg_starter_rating, last_synced_at
  )
  values ($1, $2, $3, $4, $5, $6, $7, $8, $9, now())
  on conflict (external_id) do update
  set name = excluded.name,
      country_id = excluded.country_id,
      external_country_id = excluded.external_country_id,
      country_name = excluded.country_name,
      division_level = excluded.division_level,
      teams = excluded.teams,
      avg_team_rating = excluded.avg_team_rating,
      avg_starter_rating = excluded.avg_starter_rating,
      updated_at = now(),
      last_synced_at = now()
  returning id, (xmax = 0) as inserted
`;

const UPSERT_TEAMS_SQL = `
  insert into teams (external_id, competition_id, last_synced_at)
  select team_id, $2, now() from unnest($1::integer[]) as team_id
  on conflict (external_id) do update
  set competition_id = excluded.competition_id,
      updated_at = now(),
      last_synced_at = now()
`;

const FIND_COMPETITION_ID_SQL = 'select id from competitions where external_id = $1';

const SYNC_RUN_COLUMNS = `
  id, sync_type, status, started_at, completed_at, duration_seconds,
  records_fetched, records_inserted, records_updated, records_failed,
  error_message, metadata
`;

function outcomeOf(row: UpsertedRow): UpsertOutcome {
  return row.inserted ? 'created' : 'updated';
}

function firstRow<T>(rows: T[], statement: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new Error(`${statement} returned no row`);
  }
  return row;
}

// ===========================================
// Writer (one transaction)
// ===========================================

export class PgIngestWriter implements IngestWriter {
  constructor(private readonly client: Queryable) {}

  async upsertCountries(competitions: Competition[]): Promise<CountryMap> {
    const countries = extractCountries(competitions);
    const countryMap: CountryMap = new Map();

    for (const country of countries) {
      const { rows } = await query<CountryRow>(this.client, UPSERT_COUNTRY_SQL, [country.externalId, country.name]);
      const row = firstRow(rows, 'country upsert');
      countryMap.set(row.external_id, row.id);
    }

    logger.info(`[IngestStore] Upserted ${countries.length} countries`);
    return countryMap;
  }

  async upsertCompetition(competition: Competition, countryMap: CountryMap): Promise<CompetitionUpsertResult> {
    const countryId =
      competition.externalCountryId !== null ? countryMap.get(competition.externalCountryId) ?? null : null;

    return withSavepoint(this.client, 'competition_upsert', async () => {
      const { rows } = await query<UpsertedRow>(this.client, UPSERT_COMPETITION_SQL, [
        competition.externalId,
        competition.name,
        countryId,
        competition.externalCountryId,
        competition.countryName,
        competition.divisionLevel,
        competition.teams,
        competition.avgTeamRating,
        competition.avgStarterRating,
      ]);
      const row = firstRow(rows, 'competition upsert');

      if (competition.teamIds.length > 0) {
        await query(this.client, UPSERT_TEAMS_SQL, [competition.teamIds, row.id]);
      }

      return { outcome: outcomeOf(row), competitionId: row.id };
    });
  }

  async upsertPlayer(player: Player): Promise<UpsertOutcome> {
    return withSavepoint(this.client, 'player_upsert', async () => {
      const competitionId = await this.findCompetitionId(player.externalCompetitionId);
      const values = [...PLAYER_COLUMNS.map(([, value]) => value(player)), competitionId];

      const { rows } = await query<UpsertedRow>(this.client, UPSERT_PLAYER_SQL, values);
      return outcomeOf(firstRow(rows, 'player upsert'));
    });
  }

  private async findCompetitionId(externalCompetitionId: number | null): Promise<number | null> {
    if (externalCompetitionId === null) return null;

    const { rows } = await query<{ id: number }>(this.client, FIND_COMPETITION_ID_SQL, [externalCompetitionId]);
    return rows[0]?.id ?? null;
  }
}

// ===========================================
// Sync Run Repository
// ===========================================

export class PgSyncRunRepository implements SyncRunRepository {
  constructor(private readonly db: Queryable) {}

  async create(syncType: SyncType, startedAt: Date): Promise<SyncRun> {
    const { rows } = await query<SyncRunRow>(
      this.db,
      `insert into sync_runs (sync_type, status, started_at)
       values ($1, 'in_progress', $2)
       returning ${SYNC_RUN_COLUMNS}`,
      [syncType, startedAt]
    );
    return toSyncRun(firstRow(rows, 'sync run insert'));
  }

  async saveProgress(id: number, counters: SyncRunCounters): Promise<void> {
    await query(
      this.db,
      `update sync_runs
       set records_fetched = $2, records_inserted = $3, records_updated = $4, records_failed = $5
       where id = $1 and status = 'in_progress'`,
      [id, counters.recordsFetched, counters.recordsInserted, counters.recordsUpdated, counters.recordsFailed]
    );
  }

  async close(id: number, closure: SyncRunClosure): Promise<SyncRun> {
    const { rows } = await query<SyncRunRow>(
      this.db,
      `update sync_runs
       set status = $2,
           records_fetched = $3,
           records_inserted = $4,
           records_updated = $5,
           records_failed = $6,
           error_message = $7,
           completed_at = $8,
           duration_seconds = $9,
           metadata = $10
       where id = $1 and status = 'in_progress'
       returning ${SYNC_RUN_COLUMNS}`,
      [
        id,
        closure.status,
        closure.recordsFetched,
        closure.recordsInserted,
        closure.recordsUpdated,
        closure.recordsFailed,
        closure.errorMessage,
        closure.completedAt,
        closure.durationSeconds,
        JSON.stringify(closure.metadata),
      ]
    );

    const [row] = rows;
    if (row === undefined) {
      throw new SyncRunClosedError(id);
    }
    return toSyncRun(row);
  }

  async findRecent(limit: number, syncType?: SyncType): Promise<SyncRun[]> {
    const { rows } = syncType
      ? await query<SyncRunRow>(
          this.db,
          `select ${SYNC_RUN_COLUMNS} from sync_runs where sync_type = $2 order by started_at desc, id desc limit $1`,
          [limit, syncType]
        )
      : await query<SyncRunRow>(
          this.db,
          `select ${SYNC_RUN_COLUMNS} from sync_runs order by started_at desc, id desc limit $1`,
          [limit]
        );
    return rows.map(toSyncRun);
  }
}

// ===========================================
// Store
// ===========================================

export class PgIngestStore implements IngestStore {
  readonly syncRuns: SyncRunRepository;

  constructor(private readonly pool: ConnectionPool) {
    this.syncRuns = new PgSyncRunRepository(pool);
  }

  async withBatch<T>(fn: (writer: IngestWriter) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, (client) => fn(new PgIngestWriter(client)));
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('[IngestStore] Database pool closed');
  }
}
