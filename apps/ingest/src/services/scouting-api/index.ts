// =====================================================
// Scouting API - Public Exports
// =====================================================

import type { AppConfig } from '../../config';
import { ApiSession } from './session';
import { ScoutingApiClient } from './scouting-api.client';
import type { HttpOptions } from './types';

export * from './errors';
export * from './types';
export { ApiSession } from './session';
export { ScoutingApiClient } from './scouting-api.client';
export { DEFAULT_RETRY_CONFIG, executeWithRetry, calculateBackoffDelay, sleep } from './retry';
export type { Sleeper } from './retry';

/**
 * Build a session and a client that shares it. Login and bulk
 * fetches get separate timeouts.
 */
export function createScoutingApi(
  apiConfig: AppConfig['scoutingApi'],
  overrides: Pick<HttpOptions, 'adapter'> = {}
): { session: ApiSession; client: ScoutingApiClient } {
  const retry = {
    maxRetries: apiConfig.maxRetries,
    initialDelayMs: apiConfig.initialRetryDelayMs,
  };

  const session = new ApiSession(
    { email: apiConfig.email, password: apiConfig.password },
    { baseUrl: apiConfig.baseUrl, timeoutMs: apiConfig.loginTimeoutMs, retry, ...overrides }
  );

  const client = new ScoutingApiClient(session, {
    baseUrl: apiConfig.baseUrl,
    timeoutMs: apiConfig.fetchTimeoutMs,
    retry,
    ...overrides,
  });

  return { session, client };
}
