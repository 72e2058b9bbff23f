/**
 * Adjustment Calculator
 *
 * Decides the corrected time_played of every affected row. The arithmetic is
 * an operator rule, so it sits behind AdjustmentPolicy and can be swapped.
 */

import { ConsistencyError } from '../errors/index.js';
import type { AffectedRun } from './runFinder.js';

export interface AdjustmentContext {
  oldTimePlayed: number;
  fps: number;
  /** Reference segment time, in ticks */
  refTicks: number;
  /** Segment time the run actually recorded, in ticks */
  segmentTicks: number;
}

export interface AdjustmentPolicy {
  readonly name: string;
  /**
   * Must be pure: the same context always yields the same time
   */
  newTimePlayed(ctx: AdjustmentContext): number;
}

/**
 * Adds the segment time a run skipped, rounded up to whole ticks, so the
 * segment takes at least the reference time. Runs at or above the reference
 * keep their time.
 */
export const minimumSegmentTimePolicy: AdjustmentPolicy = {
  name: 'minimum-segment-time',
  newTimePlayed({ oldTimePlayed, refTicks, segmentTicks }) {
    const missing = Math.ceil(refTicks - segmentTicks);
    return missing > 0 ? oldTimePlayed + missing : oldTimePlayed;
  }
};

export interface RowAdjustment {
  cpId: number;
  oldTimePlayed: number;
  newTimePlayed: number;
  /** newTimePlayed - oldTimePlayed */
  adjustment: number;
}

export interface RunAdjustment {
  run: AffectedRun;
  rows: RowAdjustment[];
}

/**
 * Applies a policy to one row and checks the result is usable
 *
 * @throws ConsistencyError if the policy returns a negative or non-finite time
 */
export function adjustRow(
  policy: AdjustmentPolicy,
  ctx: AdjustmentContext,
  cpId: number
): RowAdjustment {
  const newTimePlayed = policy.newTimePlayed(ctx);
  if (!Number.isFinite(newTimePlayed) || newTimePlayed < 0) {
    throw new ConsistencyError(
      `Policy ${policy.name} produced an invalid time_played ${newTimePlayed} for cp ${cpId}`
    );
  }
  return {
    cpId,
    oldTimePlayed: ctx.oldTimePlayed,
    newTimePlayed,
    adjustment: newTimePlayed - ctx.oldTimePlayed
  };
}

/**
 * Computes the adjustment of every row of every run
 *
 * Rows whose time would not change are left out.
 */
export function computeAdjustments(
  runs: AffectedRun[],
  refTicks: number,
  policy: AdjustmentPolicy = minimumSegmentTimePolicy
): RunAdjustment[] {
  return runs
    .map(run => ({
      run,
      rows: run.rows
        .map(row => adjustRow(
          policy,
          { oldTimePlayed: row.timePlayed, fps: run.fps, refTicks, segmentTicks: run.segmentTicks },
          row.cpId
        ))
        .filter(row => row.adjustment !== 0)
    }))
    .filter(adjustment => adjustment.rows.length > 0);
}
