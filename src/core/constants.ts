/**
 * Application Constants
 *
 * Centralized location for the limits and defaults used across the tool.
 */

/**
 * Accepted reference time range (in seconds)
 */
export const REF_TIME_LIMITS = {
  /** Anything faster is treated as a typo rather than a segment time */
  MIN_SECONDS: 0.05,

  /** One hour */
  MAX_SECONDS: 3600,
} as const;

/**
 * Time unit defaults
 */
export const TIME_DEFAULTS = {
  /** The game clock runs at 20 ticks per second */
  TICKS_PER_SECOND: 20,
} as const;

/**
 * Post-write verification
 */
export const VERIFICATION = {
  /** Maximum difference between the intended and stored time_played */
  TOLERANCE: 1e-6,
} as const;

/**
 * Audit file naming
 */
export const AUDIT_FILES = {
  PREVIEW_PREFIX: 'cheated_runs_preview',
  FIXED_PREFIX: 'cheated_runs_fixed',
  /** Suffixes tried when a timestamped name is already taken */
  MAX_SAME_SECOND: 99,
} as const;
