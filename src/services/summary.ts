/**
 * Affected Players Summary
 *
 * Groups audit records per player and frame rate so the operator can see
 * who was touched, at a glance.
 */

import type { AuditRecord } from './auditLog.js';

export interface PlayerSummary {
  playerId: number;
  playerName: string;
  /** Distinct runs per fps, ascending by fps */
  runsByFps: Array<{ fps: number; runs: number }>;
}

/**
 * Summarizes records, players ordered by id
 */
export function summarizePlayers(records: AuditRecord[]): PlayerSummary[] {
  const players = new Map<number, { name: string; runs: Map<number, Set<number>> }>();

  for (const record of records) {
    const player = players.get(record.playerId) ?? { name: record.playerName, runs: new Map<number, Set<number>>() };
    const runs = player.runs.get(record.fps) ?? new Set<number>();
    runs.add(record.runId);
    player.runs.set(record.fps, runs);
    players.set(record.playerId, player);
  }

  return [...players.entries()]
    .sort(([a], [b]) => a - b)
    .map(([playerId, { name, runs }]) => ({
      playerId,
      playerName: name,
      runsByFps: [...runs.entries()]
        .sort(([a], [b]) => a - b)
        .map(([fps, ids]) => ({ fps, runs: ids.size }))
    }));
}

/**
 * Renders one summary line, e.g. `racer(id:7, fps:125, runs:2, fps:333, runs:1)`
 */
export function formatPlayerSummary(summary: PlayerSummary): string {
  const fps = summary.runsByFps.map(({ fps, runs }) => `fps:${fps}, runs:${runs}`).join(', ');
  return `${summary.playerName}(id:${summary.playerId}, ${fps})`;
}
