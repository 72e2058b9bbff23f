/**
 * Validation Utilities
 *
 * Turns raw operator input (argv or prompt answers) into typed values
 * before any database work starts.
 */

import { REF_TIME_LIMITS } from '../core/constants.js';
import { ValidationError } from '../errors/index.js';

export { ValidationError } from '../errors/index.js';

/**
 * Input as it arrives from the command line or a prompt
 */
export interface RawAdjustmentInput {
  fromCpId: string | number;
  toCpId: string | number;
  refTimeSeconds: string | number;
}

export interface AdjustmentInput {
  fromCpId: number;
  toCpId: number;
  refTimeSeconds: number;
}

function parseNumber(raw: string | number): number {
  if (typeof raw === 'number') return raw;
  const trimmed = raw.trim();
  // Number('') is 0, which would slip past the range checks
  return trimmed === '' ? NaN : Number(trimmed);
}

/**
 * Parses a checkpoint id
 *
 * @param field - Field name used in the error message
 * @throws ValidationError unless the value is a positive integer
 */
export function parseCheckpointId(raw: string | number, field: string): number {
  const value = parseNumber(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer, got "${raw}"`, field);
  }
  if (value <= 0) {
    throw new ValidationError(`${field} must be positive, got ${value}`, field);
  }
  return value;
}

/**
 * Parses a reference time in seconds
 *
 * @throws ValidationError unless the value lies in [0.05, 3600]
 */
export function parseRefTime(raw: string | number): number {
  const field = 'ref_time';
  const value = parseNumber(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a number, got "${raw}"`, field);
  }
  if (value < REF_TIME_LIMITS.MIN_SECONDS) {
    throw new ValidationError(
      `${field} must be >= ${REF_TIME_LIMITS.MIN_SECONDS} seconds, got ${value}`,
      field
    );
  }
  if (value > REF_TIME_LIMITS.MAX_SECONDS) {
    throw new ValidationError(
      `${field} must be <= ${REF_TIME_LIMITS.MAX_SECONDS} seconds (1 hour), got ${value}`,
      field
    );
  }
  return value;
}

/**
 * Validates a full adjustment request
 *
 * Checks run in field order and stop at the first failure.
 */
export function validateInput(raw: RawAdjustmentInput): AdjustmentInput {
  const fromCpId = parseCheckpointId(raw.fromCpId, 'from_cp_id');
  const toCpId = parseCheckpointId(raw.toCpId, 'to_cp_id');

  if (fromCpId === toCpId) {
    throw new ValidationError('from_cp_id and to_cp_id must be different', 'to_cp_id');
  }

  const refTimeSeconds = parseRefTime(raw.refTimeSeconds);
  return { fromCpId, toCpId, refTimeSeconds };
}
