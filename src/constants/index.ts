/**
 * Application Constants
 *
 * This file contains internal constants that do not require external configuration.
 * For values that should be configurable via environment variables, use config/index.ts
 */

// ============================================================================
// Table Constants
// ============================================================================
export const TABLES = {
  CLASS: 'class',
  COURSE: 'course',
  COURSE_USER: 'course_user',
  VENUE: 'venue',
} as const;

// ============================================================================
// Database Constants
// ============================================================================
export const DATABASE = {
  /** Query text is cut to this many characters in logs */
  LOG_QUERY_MAX_LENGTH: 100,

  /** Largest value a SERIAL (int4) key column holds */
  MAX_SERIAL_KEY: 2147483647,

  /** SQLSTATE class 23: integrity constraint violation (not-null, FK, unique, check) */
  SQLSTATE_INTEGRITY_CLASS: '23',

  /** SQLSTATE class 22: data exception (value too long, invalid input syntax) */
  SQLSTATE_DATA_EXCEPTION_CLASS: '22',

  /** SQLSTATE class 08: connection exception */
  SQLSTATE_CONNECTION_CLASS: '08',

  /** admin_shutdown, crash_shutdown, cannot_connect_now */
  SQLSTATE_SERVER_UNAVAILABLE: ['57P01', '57P02', '57P03'],

  /** Socket-level errno codes surfaced by the driver */
  SOCKET_ERROR_CODES: [
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'ETIMEDOUT',
    'EPIPE',
    'EHOSTUNREACH',
  ],

  /** Driver messages raised without a code when the connection is lost */
  CONNECTION_LOST_PATTERN:
    /connection terminated|timeout exceeded when trying to connect|client has encountered a connection error|connection error/i,

  /** Postgres message shape for constraint violations */
  CONSTRAINT_VIOLATION_PATTERN: /violates (?:foreign key|unique|not-null|check) constraint/i,
} as const;

// ============================================================================
// HTTP Constants
// ============================================================================
export const HTTP = {
  /** API version prefix */
  API_VERSION: '/v1',

  /** Default page size for list endpoints */
  DEFAULT_PAGE_SIZE: 100,

  /** Maximum page size for list endpoints */
  MAX_PAGE_SIZE: 1000,
} as const;
