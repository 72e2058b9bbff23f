/**
 * Revert Engine
 *
 * Replays an audit file backwards: every recorded row gets its
 * old_time_played back. Values are written verbatim, never recomputed.
 */

import type { Logger } from '../core/logger.js';
import type { AdjustmentStore } from '../db/store.js';
import type { AuditRecord } from './auditLog.js';
import { applyTimeUpdates, type TimeUpdate } from './updater.js';

export interface RevertResult {
  runs: number;
  rows: number;
}

/**
 * Turns audit records into the updates that undo them
 *
 * A row listed twice keeps the first old value, which is the earliest one.
 */
export function revertUpdates(records: AuditRecord[]): TimeUpdate[] {
  const seen = new Set<string>();
  const updates: TimeUpdate[] = [];
  for (const record of records) {
    const key = `${record.runId}:${record.cpId}`;
    if (seen.has(key)) continue;
    seen.add(key);
    updates.push({ runId: record.runId, cpId: record.cpId, timePlayed: record.oldTimePlayed });
  }
  return updates;
}

/**
 * Restores every recorded row in a single verified transaction
 *
 * Re-applying the same records is a no-op that still verifies.
 *
 * @throws NotFoundError if a recorded row no longer exists; nothing is changed
 */
export async function revertRecords(
  store: AdjustmentStore,
  logger: Logger,
  records: AuditRecord[],
  tolerance: number
): Promise<RevertResult> {
  const updates = revertUpdates(records);
  const rows = await applyTimeUpdates(store, logger, updates, tolerance);
  const runs = new Set(updates.map(u => u.runId)).size;

  for (const record of records) {
    logger.debug(
      { runId: record.runId, cpId: record.cpId, player: record.playerName, restored: record.oldTimePlayed },
      'Row reverted'
    );
  }

  return { runs, rows };
}
