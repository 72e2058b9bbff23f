/**
 * Checkpoint Pair Resolver
 *
 * Confirms a from/to checkpoint pair exists on a single map and walks the
 * map's checkpoint graph.
 */

import type { Logger } from '../core/logger.js';
import type { StoreSession } from '../db/store.js';
import { ConsistencyError, NotFoundError } from '../errors/index.js';

export interface ResolvedPair {
  mapid: number;
  /** Whether to_cp_id can be reached from from_cp_id via checkpoint_connections */
  reachable: boolean;
}

/**
 * Breadth-first walk from `startCpId`, stopping early once `stopAt` returns true
 *
 * @returns every visited checkpoint, including the start
 */
async function walk(
  store: StoreSession,
  startCpId: number,
  mapid: number,
  stopAt: (cpId: number) => boolean = () => false
): Promise<{ visited: Set<number>; stopped: boolean }> {
  const visited = new Set<number>();
  const queue = [startCpId];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);
    if (stopAt(current)) return { visited, stopped: true };

    for (const child of await store.getChildCheckpoints(current, mapid)) {
      if (!visited.has(child)) queue.push(child);
    }
  }

  return { visited, stopped: false };
}

/**
 * Resolves the map of a checkpoint pair
 *
 * @throws NotFoundError if either checkpoint does not exist
 * @throws ConsistencyError if the checkpoints are on different maps
 */
export async function resolveCheckpointPair(
  store: StoreSession,
  logger: Logger,
  fromCpId: number,
  toCpId: number
): Promise<ResolvedPair> {
  const found = await store.findCheckpoints([fromCpId, toCpId]);
  const from = found.find(cp => cp.cpId === fromCpId);
  const to = found.find(cp => cp.cpId === toCpId);

  if (!from || !to) {
    const missing: string[] = [];
    if (!from) missing.push(`from_cp_id ${fromCpId}`);
    if (!to) missing.push(`to_cp_id ${toCpId}`);
    throw new NotFoundError(`Checkpoint(s) not found: ${missing.join(', ')}`, 'checkpoint');
  }

  if (from.mapid !== to.mapid) {
    throw new ConsistencyError(
      `Checkpoints are on different maps: ` +
      `from_cp_id ${fromCpId} on map ${from.mapid}, ` +
      `to_cp_id ${toCpId} on map ${to.mapid}`
    );
  }

  const { stopped: reachable } = await walk(store, fromCpId, from.mapid, cp => cp === toCpId);
  if (!reachable) {
    logger.warn(
      { fromCpId, toCpId, mapid: from.mapid },
      'to_cp_id is not reachable from from_cp_id via checkpoint_connections; this may indicate a data issue'
    );
  }

  return { mapid: from.mapid, reachable };
}

/**
 * Gets `toCpId` and every checkpoint that follows it on the map
 */
export async function getFollowingCheckpoints(
  store: StoreSession,
  toCpId: number,
  mapid: number
): Promise<Set<number>> {
  const { visited } = await walk(store, toCpId, mapid);
  return visited;
}
