// =====================================================
// Position Codes
// =====================================================

import { PositionCode } from '@scoutline/shared-types';

export const POSITION_NAMES: Readonly<Record<PositionCode, string>> = {
  GK: 'Goalkeeper',
  CB: 'Centre-Back',
  LB: 'Left-Back',
  RB: 'Right-Back',
  DM: 'Defensive-Midfield',
  CM: 'Central-Midfield',
  AM: 'Attacking-Midfield',
  W: 'Winger',
  F: 'Forward',
};

function isPositionCode(code: string): code is PositionCode {
  return Object.prototype.hasOwnProperty.call(POSITION_NAMES, code);
}

/**
 * Expand a short position code. Codes outside the table are
 * returned unchanged; an empty code maps to null.
 */
export function mapPosition(code: string | null | undefined): string | null {
  if (!code) return null;
  return isPositionCode(code) ? POSITION_NAMES[code] : code;
}
