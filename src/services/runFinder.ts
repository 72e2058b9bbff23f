/**
 * Affected-Run Finder
 *
 * Collects the runs that crossed a checkpoint segment faster than the
 * reference time, together with the statistics rows an adjustment would touch.
 */

import type { Logger } from '../core/logger.js';
import type { StoreSession } from '../db/store.js';
import type { CheckpointStatistic } from '../db/types.js';
import { getFollowingCheckpoints } from './checkpointResolver.js';

export interface AffectedRun {
  runId: number;
  playerId: number;
  playerName: string;
  mapid: number;
  mapName: string;
  fps: number;
  /** Ticks spent between the from and to checkpoints */
  segmentTicks: number;
  /** time_played at the run's finishing checkpoint */
  finalTime: number;
  /** Rows for to_cp_id and every checkpoint after it, ordered by time */
  rows: CheckpointStatistic[];
}

export interface RunSearch {
  fromCpId: number;
  toCpId: number;
  mapid: number;
  refTicks: number;
}

/**
 * Finds the runs to adjust, ordered by fps, then by final time
 *
 * Runs without a finishing checkpoint are skipped with a warning.
 */
export async function findAffectedRuns(
  store: StoreSession,
  logger: Logger,
  search: RunSearch
): Promise<AffectedRun[]> {
  const candidates = await store.findSegmentRuns({
    fromCpId: search.fromCpId,
    toCpId: search.toCpId,
    mapid: search.mapid,
    maxSegmentTicks: search.refTicks
  });

  if (candidates.length === 0) return [];

  const following = [...await getFollowingCheckpoints(store, search.toCpId, search.mapid)];
  const mapNames = new Map<number, string>();
  const affected: AffectedRun[] = [];

  for (const run of candidates) {
    let mapName = mapNames.get(run.mapid);
    if (mapName === undefined) {
      mapName = (await store.getMapName(run.mapid)) ?? 'Unknown';
      mapNames.set(run.mapid, mapName);
    }

    const finalTime = await store.getFinalCheckpointTime(run.runId, run.mapid);
    if (finalTime === null) {
      logger.warn(
        { runId: run.runId, mapid: run.mapid },
        'Skipping run: no finishing checkpoint (isend=1) recorded, data integrity issue'
      );
      continue;
    }

    const rows = await store.getStatistics(run.runId, following);

    affected.push({
      runId: run.runId,
      playerId: run.playerId,
      playerName: run.playerName,
      mapid: run.mapid,
      mapName,
      fps: run.fps,
      segmentTicks: run.endTime - run.startTime,
      finalTime,
      rows
    });
  }

  affected.sort((a, b) => a.fps - b.fps || a.finalTime - b.finalTime || a.runId - b.runId);

  logger.debug({ candidates: candidates.length, affected: affected.length }, 'Affected runs collected');
  return affected;
}
