import { DATABASE } from '../constants';

/**
 * Base class for every error raised by the data-access layer
 */
export class DataAccessError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DataAccessError';
  }
}

/**
 * An operation targeted a key with no matching row
 */
export class NotFoundError extends DataAccessError {
  constructor(
    public readonly entity: string,
    public readonly id: number
  ) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export interface ValidationErrorDetails {
  entity?: string;
  constraint?: string;
  code?: string;
  cause?: unknown;
}

/**
 * A write was rejected: unknown attribute, or a uniqueness, not-null,
 * foreign-key or data constraint enforced by the storage engine
 */
export class ValidationError extends DataAccessError {
  public readonly entity: string | undefined;
  public readonly constraint: string | undefined;
  public readonly code: string | undefined;

  constructor(message: string, details: ValidationErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ValidationError';
    this.entity = details.entity;
    this.constraint = details.constraint;
    this.code = details.code;
  }
}

/**
 * Storage unreachable, or a transaction boundary failed to commit/rollback
 */
export class ConnectionError extends DataAccessError {
  public readonly code: string | undefined;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConnectionError';
    this.code = readStringProperty(cause, 'code');
  }
}

/**
 * A session was used outside its lifecycle (begin twice, commit without
 * a transaction, any call after close)
 */
export class SessionStateError extends DataAccessError {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

function readStringProperty(value: unknown, property: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(property in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, property);
  return typeof field === 'string' ? field : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isConnectionFailure(error: unknown): boolean {
  const code = readStringProperty(error, 'code');
  if (code !== undefined) {
    if (code.startsWith(DATABASE.SQLSTATE_CONNECTION_CLASS)) {
      return true;
    }
    if (DATABASE.SQLSTATE_SERVER_UNAVAILABLE.some(state => state === code)) {
      return true;
    }
    if (DATABASE.SOCKET_ERROR_CODES.some(errno => errno === code)) {
      return true;
    }
  }
  return DATABASE.CONNECTION_LOST_PATTERN.test(errorMessage(error));
}

export function isConstraintViolation(error: unknown): boolean {
  const code = readStringProperty(error, 'code');
  if (
    code !== undefined &&
    code.length === 5 &&
    (code.startsWith(DATABASE.SQLSTATE_INTEGRITY_CLASS) ||
      code.startsWith(DATABASE.SQLSTATE_DATA_EXCEPTION_CLASS))
  ) {
    return true;
  }
  return DATABASE.CONSTRAINT_VIOLATION_PATTERN.test(errorMessage(error));
}

/**
 * Map a driver error onto the data-access taxonomy.
 * Errors already in the taxonomy, and errors it does not recognize, are
 * returned unchanged.
 */
export function translateDatabaseError(error: unknown): unknown {
  if (error instanceof DataAccessError) {
    return error;
  }

  if (isConstraintViolation(error)) {
    const details: ValidationErrorDetails = { cause: error };
    const table = readStringProperty(error, 'table');
    const constraint = readStringProperty(error, 'constraint');
    const code = readStringProperty(error, 'code');
    if (table !== undefined) details.entity = table;
    if (constraint !== undefined) details.constraint = constraint;
    if (code !== undefined) details.code = code;
    return new ValidationError(errorMessage(error), details);
  }

  if (isConnectionFailure(error)) {
    return new ConnectionError(errorMessage(error), error);
  }

  return error;
}
