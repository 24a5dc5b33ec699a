// =====================================================
// Competition Source
// =====================================================
// Competitions come from a pre-fetched reference file (or
// a single unpaginated API call), never from the paged flow.

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import { ERROR_CODES } from '@scoutline/shared-types';
import { AppError, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { RawCompetition, ScoutingApiClient } from '../scouting-api';

// Only the envelope is enforced here; field values are the mapper's job
export const competitionSeedSchema = z.array(
  z
    .object({
      Id: z.unknown(),
      CompetitionName: z.unknown().optional(),
      Country: z.unknown().optional(),
      CountryId: z.unknown().optional(),
      DivisionLevel: z.unknown().optional(),
      AvgTeamRating: z.unknown().optional(),
      AvgStarterRating: z.unknown().optional(),
      Teams: z.unknown().optional(),
    })
    .passthrough()
);

export interface CompetitionSource {
  readonly description: string;
  load(): Promise<RawCompetition[]>;
}

export class FileCompetitionSource implements CompetitionSource {
  readonly description: string;
  private readonly filePath: string;

  constructor(filePath: string, baseDir: string = process.cwd()) {
    this.filePath = resolve(baseDir, filePath);
    this.description = `file ${this.filePath}`;
  }

  async load(): Promise<RawCompetition[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(this.filePath, 'utf8'));
    } catch (error) {
      throw new AppError(
        `Could not read competitions file ${this.filePath}: ${toError(error).message}`,
        ERROR_CODES.VALIDATION_ERROR,
        false,
        toError(error)
      );
    }

    const result = competitionSeedSchema.safeParse(parsed);
    if (!result.success) {
      throw new AppError(
        `Competitions file ${this.filePath} is not a list of competition records: ${result.error.issues[0]?.message ?? 'invalid'}`,
        ERROR_CODES.VALIDATION_ERROR
      );
    }

    logger.info(`[CompetitionSource] Loaded ${result.data.length} competitions from ${this.filePath}`);
    return result.data;
  }
}

export class ApiCompetitionSource implements CompetitionSource {
  readonly description = 'scouting API /competitions';

  constructor(private readonly client: ScoutingApiClient) {}

  load(): Promise<RawCompetition[]> {
    return this.client.fetchCompetitions();
  }
}
