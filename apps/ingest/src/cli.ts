// =====================================================
// Command Line Arguments
// =====================================================

import { ERROR_CODES } from '@scoutline/shared-types';
import type { SyncRun } from '@scoutline/shared-types';
import { AppError } from './utils/errors';

export const TEST_MODE_MAX_PLAYERS = 100;
export const DEFAULT_HISTORY_LIMIT = 10;

export interface CliOptions {
  competitionsOnly: boolean;
  playersOnly: boolean;
  maxPlayers: number | null;
  migrate: boolean;
  history: number | null;
  help: boolean;
}

export const USAGE = `Usage: scoutline-ingest [options]

Options:
  --competitions-only   Only ingest competitions (skip players)
  --players-only        Only ingest players (skip competitions)
  --max-players <n>     Maximum number of players to ingest (default: all)
  --test                Test mode: ingest at most ${TEST_MODE_MAX_PLAYERS} players
  --migrate             Apply db/schema.sql before syncing
  --history [n]         Print the latest n sync runs and exit (default: ${DEFAULT_HISTORY_LIMIT})
  -h, --help            Show this help`;

function usageError(message: string): AppError {
  return new AppError(`${message}\n\n${USAGE}`, ERROR_CODES.VALIDATION_ERROR);
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = value !== undefined && /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (isNaN(parsed) || parsed <= 0) {
    throw usageError(`${flag} expects a positive integer, got "${value ?? ''}"`);
  }
  return parsed;
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    competitionsOnly: false,
    playersOnly: false,
    maxPlayers: null,
    migrate: false,
    history: null,
    help: false,
  };
  let testMode = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--competitions-only') {
      options.competitionsOnly = true;
    } else if (arg === '--players-only') {
      options.playersOnly = true;
    } else if (arg === '--max-players') {
      options.maxPlayers = parsePositiveInt(arg, args[i + 1]);
      i++;
    } else if (arg === '--test') {
      testMode = true;
    } else if (arg === '--migrate') {
      options.migrate = true;
    } else if (arg === '--history') {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        options.history = parsePositiveInt(arg, next);
        i++;
      } else {
        options.history = DEFAULT_HISTORY_LIMIT;
      }
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw usageError(`Unknown option: ${arg}`);
    }
  }

  if (options.competitionsOnly && options.playersOnly) {
    throw usageError('--competitions-only and --players-only cannot be combined');
  }

  if (testMode) {
    options.maxPlayers = TEST_MODE_MAX_PLAYERS;
  }

  return options;
}

// ===========================================
// Sync Run History
// ===========================================

export function formatSyncRun(run: SyncRun): string {
  const duration = run.durationSeconds === null ? '-' : `${run.durationSeconds}s`;
  const line =
    `#${run.id} ${run.syncType.padEnd(12)} ${run.status.padEnd(11)} ` +
    `started=${run.startedAt.toISOString()} duration=${duration} ` +
    `fetched=${run.recordsFetched} inserted=${run.recordsInserted} ` +
    `updated=${run.recordsUpdated} failed=${run.recordsFailed}`;

  return run.errorMessage ? `${line} error="${run.errorMessage}"` : line;
}
