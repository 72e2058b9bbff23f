/**
 * Run Repository
 *
 * Finds runs that crossed a checkpoint segment too quickly.
 */

import type { Queryable } from '../client.js';
import type { Logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { CheckpointStatisticRow, SegmentRun, SegmentRunRow } from '../types.js';

/**
 * Gets finished runs on `mapid` whose time from `fromCpId` to `toCpId`
 * is positive but shorter than `maxSegmentTicks`
 */
export async function findSegmentRuns(
  db: Queryable,
  logger: Logger,
  params: { fromCpId: number; toCpId: number; mapid: number; maxSegmentTicks: number }
): Promise<SegmentRun[]> {
  // "end" is reserved in PostgreSQL, hence seg_start/seg_end.
  // $4 is cast so a fractional bound is not coerced to an integer time_played column.
  const query = `
    SELECT
      seg_start.run_id,
      seg_start.time_played AS start_time,
      seg_end.time_played AS end_time,
      pr.mapid,
      pr.playername,
      pr.player_id,
      pr.fps
    FROM checkpoint_statistics seg_start
    JOIN checkpoint_statistics seg_end ON seg_start.run_id = seg_end.run_id
    JOIN player_runs pr ON seg_start.run_id = pr.run_id
    WHERE seg_start.cp_id = $1
      AND seg_end.cp_id = $2
      AND pr.mapid = $3
      AND seg_end.time_played > seg_start.time_played
      AND (seg_end.time_played - seg_start.time_played) < $4::double precision
      AND pr.finished_map = 1
  `;

  try {
    const result = await db.query(query, [
      params.fromCpId,
      params.toCpId,
      params.mapid,
      params.maxSegmentTicks
    ]);
    const rows: SegmentRunRow[] = result.rows;
    return rows.map(row => ({
      runId: Number(row.run_id),
      startTime: Number(row.start_time),
      endTime: Number(row.end_time),
      mapid: Number(row.mapid),
      playerId: Number(row.player_id),
      playerName: row.playername,
      fps: Number(row.fps)
    }));
  } catch (err) {
    const error = toError(err);
    logger.error({ err, ...params }, 'Failed to find segment runs');
    throw new DatabaseError(`Failed to find segment runs: ${error.message}`, 'findSegmentRuns', error);
  }
}

/**
 * Gets a run's total time: the time_played at its finishing checkpoint
 *
 * @returns null when the run has no statistic on a finishing checkpoint
 */
export async function getFinalCheckpointTime(
  db: Queryable,
  logger: Logger,
  runId: number,
  mapid: number
): Promise<number | null> {
  const query = `
    SELECT cs.time_played
    FROM checkpoint_statistics cs
    JOIN checkpoints c ON cs.cp_id = c.cp_id
    WHERE cs.run_id = $1
      AND c.mapid = $2
      AND c.isend = 1
    ORDER BY cs.time_played DESC
    LIMIT 1
  `;

  try {
    const result = await db.query(query, [runId, mapid]);
    const rows: Pick<CheckpointStatisticRow, 'time_played'>[] = result.rows;
    const row = rows[0];
    return row ? Number(row.time_played) : null;
  } catch (err) {
    const error = toError(err);
    logger.error({ err, runId, mapid }, 'Failed to get final checkpoint time');
    throw new DatabaseError(`Failed to get final checkpoint time: ${error.message}`, 'getFinalCheckpointTime', error);
  }
}
