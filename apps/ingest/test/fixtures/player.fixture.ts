// =====================================================
// Player Fixtures
// =====================================================

import type { RawPlayer } from '../../src/services/scouting-api';

export function buildRawPlayer(overrides: RawPlayer = {}): RawPlayer {
  return {
    TR_ID: 5001,
    wyscout_id: 88001,
    trmarkt_id: 77001,
    Name: 'Test Player',
    BirthDate: '1995-06-26T00:00:00',
    ParentTeamId: 310,
    CurrentTeamId: 310,
    ParentTeam: 'Harbour Town',
    CurrentTeam: 'Harbour Town',
    TeamHistory: '[{"team":"Harbour Town","from":"2020-07-01"}]',
    Country: 'Northland',
    CountryId: 10,
    CompetitionId: 1001,
    Competition: 'Northland Premier',
    DivisionLevel: 1,
    CompetitionName_Mapped: 'Northland Premier',
    ParentCountry: 'Northland',
    ParentCountryId: 10,
    ParentCompetition: 'Northland Premier',
    ParentDivisionLevel: 1,
    Nationality1: 'Northland',
    Nationality1CountryId: 10,
    Nationality2: null,
    Nationality2CountryId: null,
    FirstPosition: 'CB',
    SecondPosition: 'DM',
    PlayingStyle: 'Ball-Playing Defender',
    PreferredFoot: 'Right',
    ContractExpiry: '2027-06-30T00:00:00',
    Agency: 'Test Agency',
    AgencyVerified: 'True',
    EstimatedSalary: '10k-20k',
    Shortlisted: null,
    CurrentClubRecentMinsPerc: 82.5,
    GBEScore: 12,
    GBEResult: 'Pass',
    GBEIntAppPts: 4,
    GBEDomMinsPts: 3,
    GBEContMinsPts: 2,
    GBELeaguePosPts: 1,
    GBEContProgPts: 1,
    GBELeagueStdPts: 1,
    xTV: 2.4,
    xTVChange6mPerc: 5.5,
    xTVChange12mPerc: -1.25,
    xTVHistory: [{ date: '2026-01-01', value: 2.4 }],
    BaseValue: 1.8,
    BaseValueHistory: null,
    Rating: 71.2,
    Potential: 78,
    AvailableSale: true,
    AvailableAskingPrice: 3,
    AvailableSellOn: null,
    AvailableLoan: false,
    AvailableMonthlyLoanFee: null,
    AvailableCurrency: 'EUR',
    ...overrides,
  };
}

/**
 * A page of players with consecutive TR_IDs starting at `firstId`.
 */
export function buildPlayerPage(count: number, firstId: number = 1): RawPlayer[] {
  return Array.from({ length: count }, (_, i) => ({
    TR_ID: firstId + i,
    Name: `Player ${firstId + i}`,
    CompetitionId: 1001,
  }));
}
