export { mapPosition, POSITION_NAMES } from './position';
export { mapCompetition, extractCountries, extractTeamIds } from './competition.mapper';
export { mapPlayer } from './player.mapper';
export { toBoolean, toCanonicalJson, toDateOnly } from './fields';
