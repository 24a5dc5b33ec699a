#!/usr/bin/env tsx
// =====================================================
// Scoutline Ingest - Entry Point
// =====================================================
// Run with: npm run ingest -- [--competitions-only | --players-only] [--max-players n]

import 'dotenv/config';
import './instrument';
import * as Sentry from '@sentry/node';
import { config, validateConfig } from './config';
import { formatSyncRun, parseCliArgs, USAGE } from './cli';
import { createPool } from './lib/db';
import { applySchema } from './lib/migrate';
import { logger } from './utils/logger';
import { ConfigError, errorMessage } from './utils/errors';
import { createScoutingApi } from './services/scouting-api';
import {
  ApiCompetitionSource,
  FileCompetitionSource,
  IngestPipelineService,
  PgIngestStore,
} from './services/ingest';
import type { CompetitionSource } from './services/ingest';

export async function main(args: readonly string[]): Promise<void> {
  const options = parseCliArgs(args);

  if (options.help) {
    console.log(USAGE);
    return;
  }

  const pool = createPool(config.databaseUrl);
  const store = new PgIngestStore(pool);

  try {
    if (options.migrate) {
      await applySchema(pool);
    }

    if (options.history !== null) {
      const runs = await store.syncRuns.findRecent(options.history);
      for (const run of runs) {
        console.log(formatSyncRun(run));
      }
      return;
    }

    const missing = validateConfig();
    const needsApi = !options.competitionsOnly || config.ingest.competitionsSource === 'api';
    if (needsApi && missing.length > 0) {
      throw new ConfigError(`Missing environment variables: ${missing.join(', ')}`);
    }

    // One session per process, owned here and shared with the client
    const { client } = createScoutingApi(config.scoutingApi);
    const competitions: CompetitionSource =
      config.ingest.competitionsSource === 'api'
        ? new ApiCompetitionSource(client)
        : new FileCompetitionSource(config.ingest.competitionsFile);

    const pipeline = new IngestPipelineService({
      store,
      players: client,
      competitions,
      options: config.ingest,
    });

    logger.info('='.repeat(60));
    logger.info('Starting scouting data ingestion');
    logger.info('='.repeat(60));

    const result = await pipeline.run({
      competitionsOnly: options.competitionsOnly,
      playersOnly: options.playersOnly,
      maxPlayers: options.maxPlayers,
    });

    for (const run of [result.competitions, result.players]) {
      if (run) logger.info(formatSyncRun(run));
    }
    logger.info('Data ingestion completed successfully');
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  void main(process.argv.slice(2)).catch(async (error: unknown) => {
    logger.error(`Data ingestion failed: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    await Sentry.flush(2000);
    process.exitCode = 1;
  });
}
