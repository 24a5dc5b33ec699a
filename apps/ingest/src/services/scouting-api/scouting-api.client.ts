// =====================================================
// Scouting API Client
// =====================================================
// HTTP client for the scouting data provider with bearer
// authentication and retry with exponential backoff.
// The client fetches one page per call; callers own the
// pagination loop.

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { PlayersPageRequest } from '@scoutline/shared-types';
import { logger } from '../../utils/logger';
import { AppError, toError } from '../../utils/errors';
import { FetchError } from './errors';
import { DEFAULT_RETRY_CONFIG, executeWithRetry, Sleeper, sleep } from './retry';
import { ApiSession } from './session';
import { HttpOptions, RawCompetition, RawPlayer, RawRecord, RetryConfig } from './types';

const recordListSchema = z.array(z.record(z.unknown()));

export class ScoutingApiClient {
  private readonly client: AxiosInstance;
  private readonly retryConfig: RetryConfig;

  constructor(
    private readonly session: ApiSession,
    options: HttpOptions,
    private readonly sleeper: Sleeper = sleep
  ) {
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      adapter: options.adapter,
      headers: {
        Accept: 'application/json',
      },
    });
  }

  // ===========================================
  // Public API Methods
  // ===========================================

  /**
   * Fetch the full competition list (single request, not paginated)
   */
  async fetchCompetitions(): Promise<RawCompetition[]> {
    logger.info('[ScoutingAPI] Fetching competitions...');
    const competitions = await this.getList('/competitions');
    logger.info(`[ScoutingAPI] Fetched ${competitions.length} competitions`);
    return competitions;
  }

  /**
   * Fetch one page of players. An empty page means there are no more.
   */
  async fetchPlayers(offset: number, limit: number): Promise<RawPlayer[]> {
    const params: PlayersPageRequest = { position: offset, amount: limit };

    logger.info(`[ScoutingAPI] Fetching players (offset=${offset}, limit=${limit})...`);
    const players = await this.getList('/players', params);
    logger.info(`[ScoutingAPI] Fetched ${players.length} players`);
    return players;
  }

  // ===========================================
  // Private Methods
  // ===========================================

  private async getList(endpoint: string, params?: PlayersPageRequest): Promise<RawRecord[]> {
    // AuthError from the session propagates unchanged
    const headers = await this.session.headers();

    let data: unknown;
    try {
      const response = await executeWithRetry(
        'GET',
        endpoint,
        () => this.client.get<unknown>(endpoint, { params, headers }),
        this.retryConfig,
        this.sleeper
      );
      data = response.data;
    } catch (error) {
      throw this.wrapError(endpoint, error);
    }

    const parsed = recordListSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn(`[ScoutingAPI] Unexpected response format from ${endpoint}`);
      throw new FetchError(
        endpoint,
        Array.isArray(data) ? 'list contains non-object entries' : 'response body is not a list',
        null,
        undefined,
        true
      );
    }

    return parsed.data;
  }

  private wrapError(endpoint: string, error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      const statusCode = error.response?.status ?? null;
      const details = statusCode ? `status ${statusCode}` : error.code ?? error.message;
      logger.error(`[ScoutingAPI] Request to ${endpoint} failed: ${details}`);
      return new FetchError(endpoint, details, statusCode, error);
    }

    return new FetchError(endpoint, toError(error).message, null, toError(error));
  }
}
