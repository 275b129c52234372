/**
 * errors.ts
 * Application error types, each carrying the HTTP status the API answers with
 */

import { StatusCodes } from 'http-status-codes';

export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number = StatusCodes.INTERNAL_SERVER_ERROR) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
  }
}

/**
 * The catalog file is missing, cannot be decoded, or lacks required columns.
 * Never replaced by an empty catalog.
 */
export class CatalogUnavailableError extends AppError {
  readonly catalogPath: string;

  constructor(catalogPath: string, reason: string) {
    super(`Catalog unavailable (${catalogPath}): ${reason}`, StatusCodes.SERVICE_UNAVAILABLE);
    this.name = 'CatalogUnavailableError';
    this.catalogPath = catalogPath;
  }
}

export class RecommendationTimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Recommendation exceeded ${timeoutMs}ms`, StatusCodes.GATEWAY_TIMEOUT);
    this.name = 'RecommendationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, StatusCodes.BAD_REQUEST);
    this.name = 'ValidationError';
  }
}
