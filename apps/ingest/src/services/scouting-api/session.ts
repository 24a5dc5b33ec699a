// =====================================================
// Scouting API Session
// =====================================================
// Owns the bearer token for one process. The orchestrator
// creates the session and hands it to the client; nothing
// here is global.

import axios, { AxiosInstance } from 'axios';
import type { LoginRequest, LoginResponse } from '@scoutline/shared-types';
import { logger } from '../../utils/logger';
import { toError } from '../../utils/errors';
import { AuthError } from './errors';
import { DEFAULT_RETRY_CONFIG, executeWithRetry, Sleeper, sleep } from './retry';
import { ApiCredentials, HttpOptions, RetryConfig } from './types';

function isLoginResponse(data: unknown): data is LoginResponse {
  return (
    typeof data === 'object' &&
    data !== null &&
    'token' in data &&
    typeof data.token === 'string' &&
    data.token.length > 0
  );
}

export class ApiSession {
  private readonly http: AxiosInstance;
  private readonly retryConfig: RetryConfig;
  private token: string | null = null;
  private pending: Promise<string> | null = null;

  constructor(
    private readonly credentials: ApiCredentials,
    options: HttpOptions,
    private readonly sleeper: Sleeper = sleep
  ) {
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      adapter: options.adapter,
      headers: {
        Accept: 'application/json',
      },
    });
  }

  get isAuthenticated(): boolean {
    return this.token !== null;
  }

  /**
   * Log in and cache the token in memory.
   */
  async authenticate(): Promise<string> {
    logger.info('[ApiSession] Authenticating with scouting API...');

    const params: LoginRequest = {
      email: this.credentials.email,
      password: this.credentials.password,
    };

    let data: unknown;
    try {
      const response = await executeWithRetry(
        'POST',
        '/login',
        () => this.http.post<unknown>('/login', undefined, { params }),
        this.retryConfig,
        this.sleeper
      );
      data = response.data;
    } catch (error) {
      const statusCode = axios.isAxiosError(error) ? error.response?.status ?? null : null;
      logger.error(`[ApiSession] Authentication failed (status ${statusCode ?? 'n/a'})`);
      throw new AuthError(
        statusCode
          ? `Login rejected with status ${statusCode}`
          : `Login request failed: ${toError(error).message}`,
        statusCode,
        toError(error)
      );
    }

    if (!isLoginResponse(data)) {
      throw new AuthError('Login response did not contain a token');
    }

    this.token = data.token;
    logger.info('[ApiSession] Authentication successful');
    return data.token;
  }

  /**
   * Authorization headers, logging in on first use.
   * Concurrent first callers share a single login request.
   */
  async headers(): Promise<Record<string, string>> {
    const token = this.token ?? (await this.acquireToken());
    return { Authorization: `Bearer ${token}` };
  }

  private acquireToken(): Promise<string> {
    if (!this.pending) {
      this.pending = this.authenticate().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }
}
