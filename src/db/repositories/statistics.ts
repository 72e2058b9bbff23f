/**
 * Checkpoint Statistics Repository
 *
 * Reads and writes time_played, the only column this tool changes.
 */

import type { Queryable } from '../client.js';
import type { Logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { CheckpointStatistic, CheckpointStatisticRow } from '../types.js';

/**
 * Gets a run's statistics rows for the given checkpoints, ordered by time
 */
export async function getStatistics(
  db: Queryable,
  logger: Logger,
  runId: number,
  cpIds: number[]
): Promise<CheckpointStatistic[]> {
  const query = `
    SELECT cp_id, time_played
    FROM checkpoint_statistics
    WHERE run_id = $1 AND cp_id = ANY($2::int[])
    ORDER BY time_played
  `;

  try {
    const result = await db.query(query, [runId, cpIds]);
    const rows: CheckpointStatisticRow[] = result.rows;
    return rows.map(row => ({
      runId,
      cpId: Number(row.cp_id),
      timePlayed: Number(row.time_played)
    }));
  } catch (err) {
    const error = toError(err);
    logger.error({ err, runId }, 'Failed to read checkpoint statistics');
    throw new DatabaseError(`Failed to read checkpoint statistics: ${error.message}`, 'getStatistics', error);
  }
}

/**
 * Overwrites one row's time_played
 *
 * @returns number of rows updated (0 when the row does not exist)
 */
export async function setTimePlayed(
  db: Queryable,
  logger: Logger,
  runId: number,
  cpId: number,
  timePlayed: number
): Promise<number> {
  const query = `
    UPDATE checkpoint_statistics
    SET time_played = $3
    WHERE run_id = $1 AND cp_id = $2
  `;

  try {
    const result = await db.query(query, [runId, cpId, timePlayed]);
    return result.rowCount ?? 0;
  } catch (err) {
    const error = toError(err);
    logger.error({ err, runId, cpId }, 'Failed to update time_played');
    throw new DatabaseError(`Failed to update time_played: ${error.message}`, 'setTimePlayed', error);
  }
}

/**
 * Checks whether the connected role may UPDATE checkpoint_statistics
 *
 * A failed check is logged and treated as granted; the update itself
 * will fail loudly if it is not.
 */
export async function hasUpdatePrivilege(db: Queryable, logger: Logger): Promise<boolean> {
  const query = `
    SELECT has_table_privilege(current_user, 'checkpoint_statistics', 'UPDATE') AS allowed
  `;

  try {
    const result = await db.query(query);
    const rows: Array<{ allowed: boolean }> = result.rows;
    return rows[0]?.allowed === true;
  } catch (err) {
    logger.warn({ err }, 'Could not verify UPDATE privileges');
    return true;
  }
}
