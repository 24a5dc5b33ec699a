// =====================================================
// Custom Error Classes
// =====================================================

import { ErrorCode, ERROR_CODES } from '@scoutline/shared-types';

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ERROR_CODES.INTERNAL_ERROR,
    retryable: boolean = false,
    originalError?: Error
  ) {
    super(message);
    this.code = code;
    this.retryable = retryable;
    this.originalError = originalError;
    this.name = 'AppError';

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, ERROR_CODES.CONFIG_INVALID);
    this.name = 'ConfigError';
  }
}

/**
 * A single source record could not be used (e.g. no external id).
 * Isolated to that record; the run continues.
 */
export class InvalidRecordError extends AppError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, ERROR_CODES.INVALID_RECORD);
    this.field = field;
    this.name = 'InvalidRecordError';
  }
}

/**
 * Writing one record failed. Isolated to that record; the run continues.
 */
export class UpsertError extends AppError {
  public readonly entity: string;
  public readonly externalId: number | null;

  constructor(entity: string, externalId: number | null, originalError?: Error) {
    super(
      `Failed to upsert ${entity} ${externalId ?? '<unknown>'}: ${originalError?.message ?? 'unknown error'}`,
      ERROR_CODES.UPSERT_FAILED,
      true,
      originalError
    );
    this.entity = entity;
    this.externalId = externalId;
    this.name = 'UpsertError';
  }
}

/**
 * Uncategorized failure escaping the fetch/map/upsert loop. Fatal to the run.
 */
export class OrchestrationError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(message, ERROR_CODES.ORCHESTRATION_FAILED, false, originalError);
    this.name = 'OrchestrationError';
  }
}

export class SyncRunClosedError extends AppError {
  public readonly syncRunId: number;

  constructor(syncRunId: number) {
    super(`Sync run ${syncRunId} is already closed`, ERROR_CODES.SYNC_RUN_CLOSED);
    this.syncRunId = syncRunId;
    this.name = 'SyncRunClosedError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
