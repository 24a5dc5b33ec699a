// =====================================================
// Player Mapper
// =====================================================
// Maps a raw player record (upstream field names) to the
// normalized Player written by the store.

import { Player } from '@scoutline/shared-types';
import type { RawPlayer } from '../../scouting-api/types';
import { InvalidRecordError } from '../../../utils/errors';
import { mapPosition } from './position';
import {
  readInteger,
  readNumber,
  readString,
  toBoolean,
  toCanonicalJson,
  toDateOnly,
} from './fields';

export function mapPlayer(raw: RawPlayer): Player {
  const externalId = readInteger(raw, 'TR_ID');
  if (externalId === null || externalId <= 0) {
    throw new InvalidRecordError('TR_ID', 'Player record has no valid TR_ID');
  }

  const firstPosition = readString(raw, 'FirstPosition');
  const secondPosition = readString(raw, 'SecondPosition');

  return {
    externalId,
    wyscoutId: readInteger(raw, 'wyscout_id'),
    trmarktId: readInteger(raw, 'trmarkt_id'),
    name: readString(raw, 'Name'),
    birthDate: toDateOnly(raw.BirthDate),

    parentTeamId: readInteger(raw, 'ParentTeamId'),
    currentTeamId: readInteger(raw, 'CurrentTeamId'),
    parentTeam: readString(raw, 'ParentTeam'),
    currentTeam: readString(raw, 'CurrentTeam'),
    teamHistory: toCanonicalJson(raw.TeamHistory),

    country: readString(raw, 'Country'),
    countryId: readInteger(raw, 'CountryId'),
    externalCompetitionId: readInteger(raw, 'CompetitionId'),
    competition: readString(raw, 'Competition'),
    divisionLevel: readInteger(raw, 'DivisionLevel'),
    competitionNameMapped: readString(raw, 'CompetitionName_Mapped'),
    parentCountry: readString(raw, 'ParentCountry'),
    parentCountryId: readInteger(raw, 'ParentCountryId'),
    parentCompetition: readString(raw, 'ParentCompetition'),
    parentDivisionLevel: readInteger(raw, 'ParentDivisionLevel'),

    nationality1: readString(raw, 'Nationality1'),
    nationality1CountryId: readInteger(raw, 'Nationality1CountryId'),
    nationality2: readString(raw, 'Nationality2'),
    nationality2CountryId: readInteger(raw, 'Nationality2CountryId'),

    firstPosition,
    secondPosition,
    firstPositionFull: mapPosition(firstPosition),
    secondPositionFull: mapPosition(secondPosition),
    playingStyle: readString(raw, 'PlayingStyle'),
    preferredFoot: readString(raw, 'PreferredFoot'),

    contractExpiry: toDateOnly(raw.ContractExpiry),
    agency: readString(raw, 'Agency'),
    agencyVerified: toBoolean(raw.AgencyVerified),
    estimatedSalary: readString(raw, 'EstimatedSalary'),
    shortlisted: readString(raw, 'Shortlisted'),
    currentClubRecentMinsPerc: readNumber(raw, 'CurrentClubRecentMinsPerc'),

    gbe: {
      score: readInteger(raw, 'GBEScore'),
      result: readString(raw, 'GBEResult'),
      intAppPts: readInteger(raw, 'GBEIntAppPts'),
      domMinsPts: readInteger(raw, 'GBEDomMinsPts'),
      contMinsPts: readInteger(raw, 'GBEContMinsPts'),
      leaguePosPts: readInteger(raw, 'GBELeaguePosPts'),
      contProgPts: readInteger(raw, 'GBEContProgPts'),
      leagueStdPts: readInteger(raw, 'GBELeagueStdPts'),
    },

    xtv: readNumber(raw, 'xTV'),
    xtvChange6mPerc: readNumber(raw, 'xTVChange6mPerc'),
    xtvChange12mPerc: readNumber(raw, 'xTVChange12mPerc'),
    xtvHistory: toCanonicalJson(raw.xTVHistory),
    baseValue: readNumber(raw, 'BaseValue'),
    baseValueHistory: toCanonicalJson(raw.BaseValueHistory),
    rating: readNumber(raw, 'Rating'),
    potential: readNumber(raw, 'Potential'),

    availability: {
      sale: toBoolean(raw.AvailableSale),
      askingPrice: readNumber(raw, 'AvailableAskingPrice'),
      sellOn: readNumber(raw, 'AvailableSellOn'),
      loan: toBoolean(raw.AvailableLoan),
      monthlyLoanFee: readNumber(raw, 'AvailableMonthlyLoanFee'),
      currency: readString(raw, 'AvailableCurrency'),
    },

    rawPayload: JSON.stringify(raw),
  };
}
