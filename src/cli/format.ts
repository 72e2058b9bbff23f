/**
 * Operator-facing text for the adjustment plan and its results
 */

import type { RunAdjustment } from '../services/adjustment.js';
import type { AuditRecord } from '../services/auditLog.js';
import { formatPlayerSummary, summarizePlayers } from '../services/summary.js';
import { formatSeconds, formatTicks, secondsToTicks } from '../util/timeFormat.js';
import type { AdjustmentInput } from '../util/validation.js';

const RULE = '='.repeat(80);

export function formatHeading(title: string): string {
  return `${RULE}\n${title}\n${RULE}`;
}

function signed(ticks: number, ticksPerSecond: number): string {
  const seconds = formatSeconds(ticks, ticksPerSecond);
  return ticks >= 0 ? `+${seconds}s` : `${seconds}s`;
}

/**
 * Describes what a live run would change, one block per run
 */
export function formatPlan(
  input: AdjustmentInput,
  adjustments: RunAdjustment[],
  ticksPerSecond: number
): string {
  const lines = [
    `Analyzing runs from CP ${input.fromCpId} to CP ${input.toCpId}`,
    `Reference time: ${input.refTimeSeconds} seconds (${secondsToTicks(input.refTimeSeconds, ticksPerSecond)} ticks)`,
    '-'.repeat(80),
    `Found ${adjustments.length} cheated run(s):`,
    ''
  ];

  adjustments.forEach(({ run, rows }, i) => {
    lines.push(
      `${i + 1}. Run ID: ${run.runId}`,
      `   Player: ${run.playerName} (ID: ${run.playerId})`,
      `   Map: ${run.mapName} (ID: ${run.mapid})`,
      `   FPS: ${run.fps}`,
      `   Segment time: ${formatSeconds(run.segmentTicks, ticksPerSecond)}s`,
      `   Final time: ${formatTicks(run.finalTime, ticksPerSecond)}`,
      `   Checkpoints to update: ${rows.length}`
    );
    for (const row of rows) {
      lines.push(
        `     cp ${row.cpId}: ${formatTicks(row.oldTimePlayed, ticksPerSecond)} -> ` +
        `${formatTicks(row.newTimePlayed, ticksPerSecond)} (${signed(row.adjustment, ticksPerSecond)})`
      );
    }
    lines.push('');
  });

  return lines.join('\n');
}

/**
 * Lists affected players grouped by fps
 */
export function formatSummary(records: AuditRecord[]): string {
  return [formatHeading('AFFECTED PLAYERS SUMMARY'), ...summarizePlayers(records).map(formatPlayerSummary)].join('\n');
}
