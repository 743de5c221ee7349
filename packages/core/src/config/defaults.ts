/**
 * Default constants for Waypoint checkpoint stores
 */

/**
 * Checkpoint Store Configuration
 */
export const CHECKPOINT_DEFAULTS = {
  /** Namespace used when a config does not name one */
  NAMESPACE: '' as const,

  /** Keep the caller's checkpoint id so a repeated put upserts in place */
  ID_POLICY: 'preserve' as const,

  /** Format version written into new checkpoint bodies */
  FORMAT_VERSION: 1 as const,

  /** Width of the zero-padded counter in a version string */
  VERSION_COUNTER_WIDTH: 32 as const,
} as const;

/**
 * Embedded (SQLite) backend
 */
export const SQLITE_DEFAULTS = {
  PATH: ':memory:' as const,
  WAL: true as const,
} as const;

/**
 * Networked (PostgreSQL) backend
 */
export const POSTGRES_DEFAULTS = {
  PIPELINE: false as const,
} as const;

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** Default log level */
  LEVEL: 'info' as const,

  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production',
} as const;
