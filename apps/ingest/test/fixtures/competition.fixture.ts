// =====================================================
// Competition Fixtures
// =====================================================

import type { RawCompetition } from '../../src/services/scouting-api';

export function buildRawCompetition(overrides: RawCompetition = {}): RawCompetition {
  return {
    Id: 1001,
    CompetitionName: 'Northland Premier',
    Country: 'Northland',
    CountryId: 10,
    DivisionLevel: 1,
    AvgTeamRating: 64.3,
    AvgStarterRating: 66.1,
    Teams: [
      { TR_id: 310, Name: 'Harbour Town' },
      { TR_id: 311, Name: 'Riverside Athletic' },
    ],
    ...overrides,
  };
}

export const rawCompetitions: RawCompetition[] = [
  buildRawCompetition(),
  buildRawCompetition({
    Id: 1002,
    CompetitionName: 'Northland Championship',
    DivisionLevel: 2,
    Teams: '[{"TR_id": 320}]',
  }),
  buildRawCompetition({
    Id: 2001,
    CompetitionName: 'Southmark League',
    Country: 'Southmark',
    CountryId: 20,
    AvgTeamRating: null,
    AvgStarterRating: null,
    Teams: null,
  }),
];
