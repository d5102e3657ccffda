/**
 * Error types raised across module boundaries.
 * Each restores its prototype so `instanceof` checks work after transpilation.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
    this.name = 'ConfigError';
  }
}

/**
 * A column the transform depends on is absent from every record of a batch,
 * so the value could not even be looked up.
 */
export class MissingColumnError extends Error {
  public readonly column: string;

  constructor(column: string) {
    super(`Column "${column}" is missing from every record in the batch`);
    this.column = column;
    Object.setPrototypeOf(this, MissingColumnError.prototype);
    this.name = 'MissingColumnError';
  }
}

export class StoreError extends Error {
  public readonly code?: string;

  constructor(message: string, code?: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    Object.setPrototypeOf(this, StoreError.prototype);
    this.name = 'StoreError';
  }
}

/**
 * Insert rejected by a primary key or unique constraint.
 */
export class UniqueViolationError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, UNIQUE_VIOLATION, options);
    Object.setPrototypeOf(this, UniqueViolationError.prototype);
    this.name = 'UniqueViolationError';
  }
}

export class StravaApiError extends Error {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super(message, options);
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, StravaApiError.prototype);
    this.name = 'StravaApiError';
  }
}

/** PostgreSQL SQLSTATE for unique_violation. */
export const UNIQUE_VIOLATION = '23505';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
