/**
 * Checkpoint Repository
 *
 * Read-only lookups on checkpoints, their connections and map names.
 */

import type { Queryable } from '../client.js';
import type { Logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { Checkpoint, CheckpointConnectionRow, CheckpointRow, MapRow } from '../types.js';

/**
 * Gets the checkpoints among `cpIds` that exist
 */
export async function findCheckpoints(
  db: Queryable,
  logger: Logger,
  cpIds: number[]
): Promise<Checkpoint[]> {
  const query = 'SELECT cp_id, mapid FROM checkpoints WHERE cp_id = ANY($1::int[])';

  try {
    const result = await db.query(query, [cpIds]);
    const rows: CheckpointRow[] = result.rows;
    return rows.map(row => ({ cpId: Number(row.cp_id), mapid: Number(row.mapid) }));
  } catch (err) {
    const error = toError(err);
    logger.error({ err, cpIds }, 'Failed to look up checkpoints');
    throw new DatabaseError(`Failed to look up checkpoints: ${error.message}`, 'findCheckpoints', error);
  }
}

/**
 * Gets the direct successors of a checkpoint on a map
 */
export async function getChildCheckpoints(
  db: Queryable,
  logger: Logger,
  cpId: number,
  mapid: number
): Promise<number[]> {
  const query = `
    SELECT child_cp_id
    FROM checkpoint_connections
    WHERE cp_id = $1 AND mapid = $2
  `;

  try {
    const result = await db.query(query, [cpId, mapid]);
    const rows: CheckpointConnectionRow[] = result.rows;
    return rows.map(row => Number(row.child_cp_id));
  } catch (err) {
    const error = toError(err);
    logger.error({ err, cpId, mapid }, 'Failed to load checkpoint connections');
    throw new DatabaseError(`Failed to load checkpoint connections: ${error.message}`, 'getChildCheckpoints', error);
  }
}

/**
 * Gets a map's display name
 *
 * Names are cosmetic, so a failed lookup is logged and reported as missing.
 */
export async function getMapName(db: Queryable, logger: Logger, mapid: number): Promise<string | null> {
  try {
    const result = await db.query('SELECT mapname FROM mapids WHERE mapid = $1', [mapid]);
    const rows: MapRow[] = result.rows;
    return rows[0]?.mapname ?? null;
  } catch (err) {
    logger.warn({ err, mapid }, 'Failed to look up map name');
    return null;
  }
}
