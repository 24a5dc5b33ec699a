// =====================================================
// Scouting API Contracts
// =====================================================

// POST /login?email=&password=
export interface LoginRequest {
  email: string;
  password: string;
}

export interface LoginResponse {
  token: string;
}

// GET /players?position=&amount=
// `position` is an opaque pagination offset, not a playing position.
export interface PlayersPageRequest {
  position: number;
  amount: number;
}

// Error codes
export const ERROR_CODES = {
  // Upstream API
  AUTH_FAILED: 'AUTH_001',
  FETCH_FAILED: 'FETCH_001',
  FETCH_INVALID_RESPONSE: 'FETCH_002',

  // Records
  INVALID_RECORD: 'RECORD_001',
  UPSERT_FAILED: 'RECORD_002',

  // Runs
  SYNC_RUN_CLOSED: 'SYNC_001',
  ORCHESTRATION_FAILED: 'SYNC_002',

  // Generic errors
  CONFIG_INVALID: 'CONFIG_001',
  VALIDATION_ERROR: 'VALIDATION_001',
  INTERNAL_ERROR: 'INTERNAL_001',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
