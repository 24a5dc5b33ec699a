// =====================================================
// Scouting Domain Types
// =====================================================
// Normalized records as they are written to the store.
// Dates are date-only strings (YYYY-MM-DD); JSON columns
// hold canonical JSON text.

export type PositionCode = 'GK' | 'CB' | 'LB' | 'RB' | 'DM' | 'CM' | 'AM' | 'W' | 'F';

export type UpsertOutcome = 'created' | 'updated';

export interface Country {
  externalId: number;
  name: string;
}

export interface Competition {
  externalId: number;
  name: string | null;
  externalCountryId: number | null;
  countryName: string | null;
  divisionLevel: number | null;
  teams: string | null;
  teamIds: number[];
  avgTeamRating: number | null;
  avgStarterRating: number | null;
}

export interface GbeMetrics {
  score: number | null;
  result: string | null;
  intAppPts: number | null;
  domMinsPts: number | null;
  contMinsPts: number | null;
  leaguePosPts: number | null;
  contProgPts: number | null;
  leagueStdPts: number | null;
}

export interface PlayerAvailability {
  sale: boolean | null;
  askingPrice: number | null;
  sellOn: number | null;
  loan: boolean | null;
  monthlyLoanFee: number | null;
  currency: string | null;
}

export interface Player {
  externalId: number;
  wyscoutId: number | null;
  trmarktId: number | null;
  name: string | null;
  birthDate: string | null;

  // Clubs
  parentTeamId: number | null;
  currentTeamId: number | null;
  parentTeam: string | null;
  currentTeam: string | null;
  teamHistory: string | null;

  // Competition context
  country: string | null;
  countryId: number | null;
  externalCompetitionId: number | null;
  competition: string | null;
  divisionLevel: number | null;
  competitionNameMapped: string | null;
  parentCountry: string | null;
  parentCountryId: number | null;
  parentCompetition: string | null;
  parentDivisionLevel: number | null;

  // Nationality
  nationality1: string | null;
  nationality1CountryId: number | null;
  nationality2: string | null;
  nationality2CountryId: number | null;

  // Positions
  firstPosition: string | null;
  secondPosition: string | null;
  firstPositionFull: string | null;
  secondPositionFull: string | null;
  playingStyle: string | null;
  preferredFoot: string | null;

  // Contract and agency
  contractExpiry: string | null;
  agency: string | null;
  agencyVerified: boolean | null;
  estimatedSalary: string | null;
  shortlisted: string | null;
  currentClubRecentMinsPerc: number | null;

  gbe: GbeMetrics;

  // Valuation
  xtv: number | null;
  xtvChange6mPerc: number | null;
  xtvChange12mPerc: number | null;
  xtvHistory: string | null;
  baseValue: number | null;
  baseValueHistory: string | null;
  rating: number | null;
  potential: number | null;

  availability: PlayerAvailability;

  // Full source record, kept for reprocessing
  rawPayload: string;
}
