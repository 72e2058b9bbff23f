import { describe, it, expect } from 'vitest';
import { findAffectedRuns } from '../../src/services/runFinder.js';
import { MemoryStore } from '../helpers/memoryStore.js';
import { canyonData, silentLogger } from '../helpers/fixtures.js';

const search = { fromCpId: 100, toCpId: 101, mapid: 1, refTicks: 100 };

describe('runFinder', () => {
  describe('findAffectedRuns', () => {
    it('should collect finished runs that beat the reference, ordered by fps then final time', async () => {
      const store = new MemoryStore(canyonData());

      const runs = await findAffectedRuns(store, silentLogger, search);

      expect(runs.map(r => r.runId)).toEqual([3, 1]);
      expect(runs[0]).toEqual({
        runId: 3,
        playerId: 7,
        playerName: 'racer',
        mapid: 1,
        mapName: 'Canyon',
        fps: 125,
        segmentTicks: 80,
        finalTime: 900,
        rows: [
          { runId: 3, cpId: 101, timePlayed: 130 },
          { runId: 3, cpId: 102, timePlayed: 300 },
          { runId: 3, cpId: 103, timePlayed: 900 }
        ]
      });
    });

    it('should skip runs without a finishing checkpoint', async () => {
      const store = new MemoryStore(canyonData());

      const runs = await findAffectedRuns(store, silentLogger, search);

      expect(runs.some(r => r.runId === 5)).toBe(false);
    });

    it('should fall back to Unknown for unnamed maps', async () => {
      const data = canyonData();
      data.maps = [];
      const store = new MemoryStore(data);

      const runs = await findAffectedRuns(store, silentLogger, search);

      expect(runs.map(r => r.mapName)).toEqual(['Unknown', 'Unknown']);
    });

    it('should order runs with equal fps by final time', async () => {
      const data = canyonData();
      data.runs = data.runs.map(run => (run.runId === 1 ? { ...run, fps: 125 } : run));
      const store = new MemoryStore(data);

      const runs = await findAffectedRuns(store, silentLogger, search);

      // run 3 finishes at 900, run 1 at 1000
      expect(runs.map(r => r.runId)).toEqual([3, 1]);
    });

    it('should return nothing when no run beats the reference', async () => {
      const store = new MemoryStore(canyonData());

      const runs = await findAffectedRuns(store, silentLogger, { ...search, refTicks: 20 });

      expect(runs).toEqual([]);
      expect(store.calls).toEqual(['findSegmentRuns']);
    });
  });
});
