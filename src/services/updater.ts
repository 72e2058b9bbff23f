/**
 * Transactional Updater
 *
 * Writes time_played values in one transaction and reads every row back
 * before committing. Any mismatch rolls the whole batch back.
 */

import type { Logger } from '../core/logger.js';
import type { AdjustmentStore, StoreSession } from '../db/store.js';
import { ConsistencyError, NotFoundError } from '../errors/index.js';

export interface TimeUpdate {
  runId: number;
  cpId: number;
  timePlayed: number;
  /** When set, the stored value must equal this before it is overwritten */
  expectedCurrent?: number;
}

function groupByRun(updates: TimeUpdate[]): Map<number, TimeUpdate[]> {
  const byRun = new Map<number, TimeUpdate[]>();
  for (const update of updates) {
    const group = byRun.get(update.runId) ?? [];
    group.push(update);
    byRun.set(update.runId, group);
  }
  return byRun;
}

async function readBack(tx: StoreSession, runId: number, group: TimeUpdate[]): Promise<Map<number, number>> {
  const rows = await tx.getStatistics(runId, group.map(u => u.cpId));
  return new Map(rows.map(row => [row.cpId, row.timePlayed]));
}

async function checkCurrent(tx: StoreSession, runId: number, group: TimeUpdate[], tolerance: number): Promise<void> {
  const guarded = group.filter(u => u.expectedCurrent !== undefined);
  if (guarded.length === 0) return;

  const current = await readBack(tx, runId, guarded);
  for (const update of guarded) {
    const stored = current.get(update.cpId);
    if (stored === undefined) {
      throw new NotFoundError(
        `No checkpoint_statistics row for run ${runId}, cp ${update.cpId}`,
        'checkpoint_statistics'
      );
    }
    if (update.expectedCurrent !== undefined && Math.abs(stored - update.expectedCurrent) > tolerance) {
      throw new ConsistencyError(
        `Pre-update verification failed for run ${runId}, cp ${update.cpId}: ` +
        `expected ${update.expectedCurrent}, found ${stored} (data changed since it was read)`
      );
    }
  }
}

async function verify(tx: StoreSession, runId: number, group: TimeUpdate[], tolerance: number): Promise<void> {
  const stored = await readBack(tx, runId, group);
  for (const update of group) {
    const actual = stored.get(update.cpId);
    if (actual === undefined || Math.abs(actual - update.timePlayed) > tolerance) {
      throw new ConsistencyError(
        `Post-update verification failed for run ${runId}, cp ${update.cpId}: ` +
        `expected ${update.timePlayed}, got ${actual ?? 'no row'}`
      );
    }
  }
}

/**
 * Applies every update atomically
 *
 * `beforeCommit` runs after every row is verified, inside the transaction;
 * if it throws, nothing is committed.
 *
 * @returns number of rows written
 * @throws NotFoundError if a row to update does not exist
 * @throws ConsistencyError if a stored value differs from the expected one
 * before or after the write
 */
export async function applyTimeUpdates(
  store: AdjustmentStore,
  logger: Logger,
  updates: TimeUpdate[],
  tolerance: number,
  beforeCommit?: () => void | Promise<void>
): Promise<number> {
  if (updates.length === 0) {
    await beforeCommit?.();
    return 0;
  }

  const byRun = groupByRun(updates);

  const written = await store.transaction(async (tx) => {
    let count = 0;
    for (const [runId, group] of byRun) {
      await checkCurrent(tx, runId, group, tolerance);

      for (const update of group) {
        const affected = await tx.setTimePlayed(runId, update.cpId, update.timePlayed);
        if (affected === 0) {
          throw new NotFoundError(
            `No checkpoint_statistics row for run ${runId}, cp ${update.cpId}`,
            'checkpoint_statistics'
          );
        }
        count += affected;
      }

      await verify(tx, runId, group, tolerance);
      logger.debug({ runId, rows: group.length }, 'Run updated and verified');
    }
    await beforeCommit?.();
    return count;
  });

  logger.info({ rows: written, runs: byRun.size }, 'Transaction committed');
  return written;
}
