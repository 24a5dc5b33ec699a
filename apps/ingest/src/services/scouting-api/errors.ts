// =====================================================
// Scouting API Errors
// =====================================================

import { ERROR_CODES } from '@scoutline/shared-types';
import { AppError } from '../../utils/errors';

/**
 * Login rejected, unreachable, or answered without a token.
 * Fatal to the run that needed it.
 */
export class AuthError extends AppError {
  public readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, originalError?: Error) {
    super(message, ERROR_CODES.AUTH_FAILED, false, originalError);
    this.statusCode = statusCode;
    this.name = 'AuthError';
  }
}

/**
 * A fetch failed after client-level retries, or returned something
 * other than a list of records. Fatal to the current entity type.
 */
export class FetchError extends AppError {
  public readonly endpoint: string;
  public readonly statusCode: number | null;

  constructor(
    endpoint: string,
    details: string,
    statusCode: number | null = null,
    originalError?: Error,
    invalidResponse: boolean = false
  ) {
    super(
      `Failed to fetch ${endpoint}: ${details}`,
      invalidResponse ? ERROR_CODES.FETCH_INVALID_RESPONSE : ERROR_CODES.FETCH_FAILED,
      false,
      originalError
    );
    this.endpoint = endpoint;
    this.statusCode = statusCode;
    this.name = 'FetchError';
  }
}
