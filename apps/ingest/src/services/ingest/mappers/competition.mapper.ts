// =====================================================
// Competition Mapper
// =====================================================

import { Competition, Country } from '@scoutline/shared-types';
import type { RawCompetition } from '../../scouting-api/types';
import { InvalidRecordError } from '../../../utils/errors';
import {
  isRecord,
  parseNested,
  readInteger,
  readNumber,
  readString,
  toCanonicalJson,
  toNumber,
} from './fields';

/**
 * Team ids from a competition's Teams payload. Entries are either
 * objects carrying TR_id or bare ids; anything else is skipped.
 */
export function extractTeamIds(teams: unknown): number[] {
  const parsed = parseNested(teams);
  if (!Array.isArray(parsed)) return [];

  const ids = new Set<number>();
  for (const entry of parsed) {
    const id = isRecord(entry) ? toNumber(entry.TR_id ?? entry.TR_ID) : toNumber(entry);
    if (id !== null && Number.isInteger(id)) {
      ids.add(id);
    }
  }
  return [...ids];
}

// An empty Teams payload carries nothing worth storing
function teamsJson(teams: unknown): string | null {
  const json = toCanonicalJson(teams);
  return json === '[]' || json === '{}' ? null : json;
}

export function mapCompetition(raw: RawCompetition): Competition {
  const externalId = readInteger(raw, 'Id');
  if (externalId === null) {
    throw new InvalidRecordError('Id', 'Competition record has no integer Id');
  }

  return {
    externalId,
    name: readString(raw, 'CompetitionName'),
    externalCountryId: readInteger(raw, 'CountryId'),
    countryName: readString(raw, 'Country'),
    divisionLevel: readInteger(raw, 'DivisionLevel'),
    teams: teamsJson(raw.Teams),
    teamIds: extractTeamIds(raw.Teams),
    avgTeamRating: readNumber(raw, 'AvgTeamRating'),
    avgStarterRating: readNumber(raw, 'AvgStarterRating'),
  };
}

/**
 * Unique countries referenced by a batch of competitions.
 * The last name seen for a country id wins.
 */
export function extractCountries(competitions: Competition[]): Country[] {
  const countries = new Map<number, string>();

  for (const competition of competitions) {
    if (competition.externalCountryId !== null && competition.countryName) {
      countries.set(competition.externalCountryId, competition.countryName);
    }
  }

  return [...countries].map(([externalId, name]) => ({ externalId, name }));
}
