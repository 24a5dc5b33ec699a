// =====================================================
// Scouting API Types
// =====================================================

import type { AxiosAdapter } from 'axios';

/**
 * A record as returned by the API, keyed by the upstream field
 * names (TR_ID, FirstPosition, BirthDate, TeamHistory, ...).
 * Mappers validate the fields they read.
 */
export type RawRecord = Record<string, unknown>;

export type RawCompetition = RawRecord;
export type RawPlayer = RawRecord;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  retryableStatusCodes: number[];
  retryableMethods: HttpMethod[];
}

export interface ApiCredentials {
  email: string;
  password: string;
}

export interface HttpOptions {
  baseUrl: string;
  timeoutMs: number;
  retry?: Partial<RetryConfig>;
  // Replaces the network transport (used by tests)
  adapter?: AxiosAdapter;
}
