/**
 * Audit Log
 *
 * The CSV journal of an adjustment. The fixed file written after a live run
 * is the only input a revert needs, so its columns are a stable contract.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { AUDIT_FILES } from '../core/constants.js';
import { NotFoundError, ValidationError, toError } from '../errors/index.js';
import type { AdjustmentInput } from '../util/validation.js';
import { formatTicks, ticksToSeconds } from '../util/timeFormat.js';
import type { RunAdjustment } from './adjustment.js';

export const AUDIT_COLUMNS = [
  'run_id',
  'player_id',
  'player_name',
  'mapid',
  'map_name',
  'fps',
  'from_cp_id',
  'to_cp_id',
  'cp_id',
  'old_time_played',
  'old_time_formatted',
  'new_time_played',
  'new_time_formatted',
  'adjustment_seconds'
] as const;

export type AuditKind = 'preview' | 'fixed';

export interface AuditRecord {
  runId: number;
  playerId: number;
  playerName: string;
  mapid: number;
  mapName: string;
  fps: number;
  fromCpId: number;
  toCpId: number;
  cpId: number;
  oldTimePlayed: number;
  oldTimeFormatted: string;
  newTimePlayed: number;
  newTimeFormatted: string;
  adjustmentSeconds: number;
}

/**
 * Orders records by fps, then by new time (run and checkpoint break ties)
 */
export function sortAuditRecords(records: AuditRecord[]): AuditRecord[] {
  return [...records].sort((a, b) =>
    a.fps - b.fps ||
    a.newTimePlayed - b.newTimePlayed ||
    a.runId - b.runId ||
    a.cpId - b.cpId
  );
}

/**
 * Builds one sorted record per adjusted row
 */
export function buildAuditRecords(
  adjustments: RunAdjustment[],
  input: AdjustmentInput,
  ticksPerSecond: number
): AuditRecord[] {
  const records = adjustments.flatMap(({ run, rows }) =>
    rows.map(row => ({
      runId: run.runId,
      playerId: run.playerId,
      playerName: run.playerName,
      mapid: run.mapid,
      mapName: run.mapName,
      fps: run.fps,
      fromCpId: input.fromCpId,
      toCpId: input.toCpId,
      cpId: row.cpId,
      oldTimePlayed: row.oldTimePlayed,
      oldTimeFormatted: formatTicks(row.oldTimePlayed, ticksPerSecond),
      newTimePlayed: row.newTimePlayed,
      newTimeFormatted: formatTicks(row.newTimePlayed, ticksPerSecond),
      adjustmentSeconds: ticksToSeconds(row.adjustment, ticksPerSecond)
    }))
  );
  return sortAuditRecords(records);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Builds a timestamped file name, e.g. cheated_runs_fixed_20240131_235959.csv,
 * or cheated_runs_fixed_20240131_235959_2.csv for a later file in the same second
 */
export function auditFileName(kind: AuditKind, now: Date, sequence = 0): string {
  const prefix = kind === 'preview' ? AUDIT_FILES.PREVIEW_PREFIX : AUDIT_FILES.FIXED_PREFIX;
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const suffix = sequence > 0 ? `_${sequence}` : '';
  return `${prefix}_${date}_${time}${suffix}.csv`;
}

/**
 * Renders records as CSV text with a header row
 */
export function serializeAuditRecords(records: AuditRecord[]): string {
  const rows = records.map(record => ({
    run_id: record.runId,
    player_id: record.playerId,
    player_name: record.playerName,
    mapid: record.mapid,
    map_name: record.mapName,
    fps: record.fps,
    from_cp_id: record.fromCpId,
    to_cp_id: record.toCpId,
    cp_id: record.cpId,
    old_time_played: record.oldTimePlayed,
    old_time_formatted: record.oldTimeFormatted,
    new_time_played: record.newTimePlayed,
    new_time_formatted: record.newTimeFormatted,
    adjustment_seconds: record.adjustmentSeconds.toFixed(2)
  }));
  return stringify(rows, { header: true, columns: [...AUDIT_COLUMNS] });
}

function isFileExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Writes records to a new `<dir>/<timestamped name>`
 *
 * Existing files are never overwritten; a name already taken gets a numeric suffix.
 *
 * @returns the path written
 */
export function writeAuditFile(dir: string, kind: AuditKind, records: AuditRecord[], now: Date): string {
  const content = serializeAuditRecords(records);
  for (let sequence = 0; ; sequence++) {
    const filePath = join(dir, auditFileName(kind, now, sequence));
    try {
      writeFileSync(filePath, content, { encoding: 'utf-8', flag: 'wx' });
      return filePath;
    } catch (err) {
      if (isFileExists(err) && sequence < AUDIT_FILES.MAX_SAME_SECOND) continue;
      throw err;
    }
  }
}

function numberColumn(schema: z.ZodNumber) {
  return z.string().trim().min(1, 'is empty').pipe(schema);
}

const id = z.coerce.number().int().positive();
const time = z.coerce.number().finite().nonnegative();

const auditRowSchema = z.object({
  run_id: numberColumn(id),
  player_id: numberColumn(z.coerce.number().int()),
  player_name: z.string(),
  mapid: numberColumn(id),
  map_name: z.string(),
  fps: numberColumn(z.coerce.number().finite()),
  from_cp_id: numberColumn(id),
  to_cp_id: numberColumn(id),
  cp_id: numberColumn(id),
  old_time_played: numberColumn(time),
  old_time_formatted: z.string(),
  new_time_played: numberColumn(time),
  new_time_formatted: z.string(),
  adjustment_seconds: numberColumn(z.coerce.number().finite())
});

/**
 * Parses CSV text written by serializeAuditRecords
 *
 * @throws ValidationError on a missing column, a malformed value, or no records
 */
export function parseAuditRecords(content: string): AuditRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(content, { columns: true, skip_empty_lines: true });
  } catch (err) {
    throw new ValidationError(`Malformed audit file: ${toError(err).message}`, 'csv');
  }
  const rows = z.array(z.record(z.string())).parse(parsed);

  if (rows.length === 0) {
    throw new ValidationError('No data found in audit file', 'csv');
  }

  return rows.map((raw, index) => {
    const result = auditRowSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const column = issue ? issue.path.join('.') : 'row';
      // +2: header line, then 1-based numbering
      throw new ValidationError(
        `Invalid audit record on line ${index + 2}: ${column} ${issue?.message ?? 'is invalid'}`,
        column
      );
    }
    const row = result.data;
    return {
      runId: row.run_id,
      playerId: row.player_id,
      playerName: row.player_name,
      mapid: row.mapid,
      mapName: row.map_name,
      fps: row.fps,
      fromCpId: row.from_cp_id,
      toCpId: row.to_cp_id,
      cpId: row.cp_id,
      oldTimePlayed: row.old_time_played,
      oldTimeFormatted: row.old_time_formatted,
      newTimePlayed: row.new_time_played,
      newTimeFormatted: row.new_time_formatted,
      adjustmentSeconds: row.adjustment_seconds
    };
  });
}

/**
 * Reads an audit file from disk
 *
 * @throws NotFoundError if the file does not exist
 */
export function readAuditFile(filePath: string): AuditRecord[] {
  if (!existsSync(filePath)) {
    throw new NotFoundError(`File '${filePath}' not found`, 'file');
  }
  return parseAuditRecords(readFileSync(filePath, 'utf-8'));
}
