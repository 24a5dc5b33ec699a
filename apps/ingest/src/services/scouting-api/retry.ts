// =====================================================
// Retry With Exponential Backoff
// =====================================================

import axios, { AxiosError, AxiosResponse } from 'axios';
import { logger } from '../../utils/logger';
import { HttpMethod, RetryConfig } from './types';

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000, // Cap at 30 seconds
  retryableStatusCodes: [429, 500, 502, 503, 504],
  retryableMethods: ['GET', 'POST'],
};

export type Sleeper = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate exponential backoff delay with jitter
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * 0.1 * exponentialDelay; // Up to 10% jitter
  return Math.min(exponentialDelay + jitter, config.maxDelayMs);
}

function retryAfterMs(error: AxiosError): number | null {
  const header: unknown = error.response?.headers['retry-after'];
  if (typeof header !== 'string') return null;

  const seconds = parseInt(header, 10);
  return isNaN(seconds) ? null : seconds * 1000;
}

export function isRetryable(error: unknown, method: HttpMethod, config: RetryConfig): error is AxiosError {
  if (!axios.isAxiosError(error)) return false;
  if (!config.retryableMethods.includes(method)) return false;

  // No response: the connection dropped or timed out before an answer
  if (!error.response) return error.code !== AxiosError.ERR_CANCELED;

  return config.retryableStatusCodes.includes(error.response.status);
}

/**
 * Run an HTTP operation, retrying transient statuses and transport
 * failures up to `maxRetries` times. The last error is rethrown
 * unchanged once retries are exhausted or the failure is not retryable.
 */
export async function executeWithRetry<T>(
  method: HttpMethod,
  label: string,
  operation: () => Promise<AxiosResponse<T>>,
  config: RetryConfig,
  sleeper: Sleeper = sleep
): Promise<AxiosResponse<T>> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error, method, config) || attempt >= config.maxRetries) {
        throw error;
      }

      const statusCode = error.response?.status;
      const delay =
        statusCode === 429
          ? Math.min(retryAfterMs(error) ?? calculateBackoffDelay(attempt, config), config.maxDelayMs)
          : calculateBackoffDelay(attempt, config);

      const reason = statusCode !== undefined ? `status ${statusCode}` : error.code ?? error.message;
      logger.warn(
        `[ScoutingAPI] ${method} ${label} failed with ${reason}. ` +
          `Retrying in ${Math.round(delay)}ms (attempt ${attempt + 1}/${config.maxRetries})`
      );
      await sleeper(delay);
    }
  }
}
