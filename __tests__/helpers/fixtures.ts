import { pino } from 'pino';
import type { MemoryData } from './memoryStore.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * Two maps, times in ticks at 20 ticks/s.
 *
 * Map 1 "Canyon": 100 -> 101 -> 102 -> 103 (finish).
 * Segment 100 -> 101 with a 5s (100 tick) reference:
 * - run 1 (racer, 333 fps): 50 ticks, short by 50
 * - run 2 (drifter, 125 fps): 200 ticks, legal
 * - run 3 (racer, 125 fps): 80 ticks, short by 20
 * - run 4 (ghost, 250 fps): 20 ticks, but never finished the map
 * - run 5 (quitter, 333 fps): 40 ticks, no finishing checkpoint recorded
 *
 * Map 2 "Harbor": 200 -> 201.
 */
export function canyonData(): MemoryData {
  return {
    checkpoints: [
      { cpId: 100, mapid: 1 },
      { cpId: 101, mapid: 1 },
      { cpId: 102, mapid: 1 },
      { cpId: 103, mapid: 1, isEnd: true },
      { cpId: 200, mapid: 2 },
      { cpId: 201, mapid: 2, isEnd: true }
    ],
    connections: [
      { cpId: 100, childCpId: 101, mapid: 1 },
      { cpId: 101, childCpId: 102, mapid: 1 },
      { cpId: 102, childCpId: 103, mapid: 1 },
      { cpId: 200, childCpId: 201, mapid: 2 }
    ],
    maps: [
      { mapid: 1, name: 'Canyon' },
      { mapid: 2, name: 'Harbor' }
    ],
    runs: [
      { runId: 1, mapid: 1, playerId: 7, playerName: 'racer', fps: 333 },
      { runId: 2, mapid: 1, playerId: 8, playerName: 'drifter', fps: 125 },
      { runId: 3, mapid: 1, playerId: 7, playerName: 'racer', fps: 125 },
      { runId: 4, mapid: 1, playerId: 9, playerName: 'ghost', fps: 250, finished: false },
      { runId: 5, mapid: 1, playerId: 10, playerName: 'quitter', fps: 333 }
    ],
    statistics: [
      { runId: 1, cpId: 100, timePlayed: 100 },
      { runId: 1, cpId: 101, timePlayed: 150 },
      { runId: 1, cpId: 102, timePlayed: 400 },
      { runId: 1, cpId: 103, timePlayed: 1000 },
      { runId: 2, cpId: 100, timePlayed: 100 },
      { runId: 2, cpId: 101, timePlayed: 300 },
      { runId: 2, cpId: 102, timePlayed: 500 },
      { runId: 2, cpId: 103, timePlayed: 1200 },
      { runId: 3, cpId: 100, timePlayed: 50 },
      { runId: 3, cpId: 101, timePlayed: 130 },
      { runId: 3, cpId: 102, timePlayed: 300 },
      { runId: 3, cpId: 103, timePlayed: 900 },
      { runId: 4, cpId: 100, timePlayed: 0 },
      { runId: 4, cpId: 101, timePlayed: 20 },
      { runId: 5, cpId: 100, timePlayed: 0 },
      { runId: 5, cpId: 101, timePlayed: 40 },
      { runId: 5, cpId: 102, timePlayed: 200 }
    ]
  };
}
