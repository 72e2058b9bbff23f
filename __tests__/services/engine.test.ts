import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AdjustmentEngine, type EngineOptions } from '../../src/services/engine.js';
import { readAuditFile } from '../../src/services/auditLog.js';
import { ConnectivityError, ConsistencyError, ValidationError } from '../../src/errors/index.js';
import { MemoryStore, type MemoryData } from '../helpers/memoryStore.js';
import { ScriptedInput } from '../helpers/scriptedInput.js';
import { canyonData, silentLogger } from '../helpers/fixtures.js';

const NOW = new Date(2024, 2, 1, 12, 0, 0);
const APPLY_QUESTION = 'Do you want to apply these changes?';

/**
 * One run on a two-checkpoint map: 2.0s at cp 100, 12.0s at cp 105 (the finish)
 */
function sprintData(): MemoryData {
  return {
    checkpoints: [{ cpId: 100, mapid: 1 }, { cpId: 105, mapid: 1, isEnd: true }],
    connections: [{ cpId: 100, childCpId: 105, mapid: 1 }],
    maps: [{ mapid: 1, name: 'Sprint' }],
    runs: [{ runId: 42, mapid: 1, playerId: 7, playerName: 'racer', fps: 250 }],
    statistics: [
      { runId: 42, cpId: 100, timePlayed: 40 },
      { runId: 42, cpId: 105, timePlayed: 240 }
    ]
  };
}

describe('AdjustmentEngine', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'checkpoint-fixer-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function setup(data: MemoryData, confirms: boolean[] = [], options: Partial<EngineOptions> = {}) {
    const store = new MemoryStore(data);
    const input = new ScriptedInput({ confirms });
    const output: string[] = [];
    const engine = new AdjustmentEngine(
      { store, input, logger: silentLogger, print: (text) => output.push(text) },
      {
        ticksPerSecond: 20,
        verifyTolerance: 1e-6,
        exportDir: dir,
        preview: 'never',
        assumeYes: false,
        now: () => NOW,
        ...options
      }
    );
    return { store, input, output, engine };
  }

  describe('adjust', () => {
    it('should fix a single run end to end', async () => {
      const { store, input, engine } = setup(sprintData(), [true]);

      const outcome = await engine.adjust({ fromCpId: '100', toCpId: '105', refTimeSeconds: '15.5' });

      expect(outcome.status).toBe('applied');
      if (outcome.status !== 'applied') return;
      expect(outcome.rowsWritten).toBe(1);
      expect(outcome.auditPath).toBe(join(dir, 'cheated_runs_fixed_20240301_120000.csv'));
      expect(outcome.records).toHaveLength(1);
      expect(outcome.records[0]).toMatchObject({
        runId: 42,
        fps: 250,
        cpId: 105,
        oldTimePlayed: 240,
        oldTimeFormatted: '00:12.00',
        newTimePlayed: 350,
        newTimeFormatted: '00:17.50',
        adjustmentSeconds: 5.5
      });
      expect(store.timeOf(42, 105)).toBe(350);
      expect(store.timeOf(42, 100)).toBe(40);
      expect(input.questions).toEqual([APPLY_QUESTION]);
      expect(engine.state).toBe('DONE');

      const lines = readFileSync(outcome.auditPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[1]).toBe('42,7,racer,1,Sprint,250,100,105,105,240,00:12.00,350,00:17.50,5.50');
    });

    it('should export a preview, apply, and summarize affected players', async () => {
      const { store, input, output, engine } = setup(canyonData(), [true, true], { preview: 'ask' });

      const outcome = await engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 });

      expect(outcome.status).toBe('applied');
      if (outcome.status !== 'applied') return;
      expect(input.questions).toEqual(['Export preview CSV?', APPLY_QUESTION]);
      expect(outcome.previewPath).toBe(join(dir, 'cheated_runs_preview_20240301_120000.csv'));
      expect(outcome.records.map(r => [r.runId, r.cpId, r.newTimePlayed])).toEqual([
        [3, 101, 150], [3, 102, 320], [3, 103, 920],
        [1, 101, 200], [1, 102, 450], [1, 103, 1050]
      ]);
      expect(readAuditFile(outcome.auditPath)).toEqual(outcome.records);
      expect(store.timeOf(2, 101)).toBe(300);
      expect(store.timeOf(5, 101)).toBe(40);
      expect(output).toContain(
        ['='.repeat(80), 'AFFECTED PLAYERS SUMMARY', '='.repeat(80), 'racer(id:7, fps:125, runs:1, fps:333, runs:1)'].join('\n')
      );
    });

    it('should stop cleanly when the operator declines', async () => {
      const { store, engine } = setup(canyonData(), [false, false], { preview: 'ask' });
      const before = store.snapshot();

      const outcome = await engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 });

      expect(outcome.status).toBe('declined');
      expect(store.snapshot()).toEqual(before);
      expect(store.calls).not.toContain('setTimePlayed');
      expect(readdirSync(dir)).toEqual([]);
      expect(engine.state).toBe('DONE');
    });

    it('should skip the confirmation with assumeYes', async () => {
      const { input, engine } = setup(canyonData(), [], { assumeYes: true, preview: 'always' });

      const outcome = await engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 });

      expect(outcome.status).toBe('applied');
      expect(input.questions).toEqual([]);
      expect(readdirSync(dir).sort()).toEqual([
        'cheated_runs_fixed_20240301_120000.csv',
        'cheated_runs_preview_20240301_120000.csv'
      ]);
    });

    it('should finish without writes when no run beats the reference', async () => {
      const { input, engine } = setup(canyonData(), [true]);

      const outcome = await engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 1 });

      expect(outcome.status).toBe('no-runs');
      expect(input.questions).toEqual([]);
      expect(readdirSync(dir)).toEqual([]);
    });

    it('should reject invalid input before touching the store', async () => {
      const { store, engine } = setup(canyonData(), [true]);

      await expect(engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 0.04 }))
        .rejects.toThrow(ValidationError);
      await expect(engine.adjust({ fromCpId: 10, toCpId: 10, refTimeSeconds: 5 }))
        .rejects.toThrow(ValidationError);
      expect(store.calls).toEqual([]);
      expect(engine.state).toBe('ABORTED');
    });

    it('should reject a cross-map pair without looking for runs', async () => {
      const { store, engine } = setup(canyonData(), [true]);

      await expect(engine.adjust({ fromCpId: 100, toCpId: 201, refTimeSeconds: 5 }))
        .rejects.toThrow(ConsistencyError);
      expect(store.calls).not.toContain('findSegmentRuns');
      expect(engine.state).toBe('ABORTED');
    });

    it('should refuse to write without UPDATE privilege', async () => {
      const { store, engine } = setup(canyonData(), [true]);
      store.privilege = false;
      const before = store.snapshot();

      await expect(engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 }))
        .rejects.toThrow(ConnectivityError);
      expect(store.snapshot()).toEqual(before);
    });

    it('should roll back everything and export nothing when verification fails', async () => {
      const { store, engine } = setup(canyonData(), [true]);
      const before = store.snapshot();
      // Storage drops writes to the finish line
      store.writeFilter = (value) => (value > 1000 ? 1000 : value);

      await expect(engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 }))
        .rejects.toThrow('Post-update verification failed for run 1, cp 103: expected 1050, got 1000');
      expect(store.snapshot()).toEqual(before);
      expect(store.rollbacks).toBe(1);
      expect(readdirSync(dir)).toEqual([]);
      expect(engine.state).toBe('ABORTED');
    });

    it('should roll back the writes when the audit file cannot be written', async () => {
      const { store, engine } = setup(canyonData(), [], { assumeYes: true, exportDir: join(dir, 'missing') });
      const before = store.snapshot();

      await expect(engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 })).rejects.toThrow(/ENOENT/);

      expect(store.snapshot()).toEqual(before);
      expect(store.commits).toBe(0);
      expect(store.rollbacks).toBe(1);
      expect(readdirSync(dir)).toEqual([]);
      expect(engine.state).toBe('ABORTED');
    });

    it('should keep one audit file per invocation within the same second', async () => {
      const first = setup(canyonData(), [], { assumeYes: true });
      const second = setup(sprintData(), [], { assumeYes: true });

      const a = await first.engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 });
      const b = await second.engine.adjust({ fromCpId: 100, toCpId: 105, refTimeSeconds: 15.5 });
      if (a.status !== 'applied' || b.status !== 'applied') throw new Error('expected both to apply');

      expect(a.auditPath).toBe(join(dir, 'cheated_runs_fixed_20240301_120000.csv'));
      expect(b.auditPath).toBe(join(dir, 'cheated_runs_fixed_20240301_120000_1.csv'));
      expect(readAuditFile(a.auditPath)).toEqual(a.records);
      expect(readAuditFile(b.auditPath)).toEqual(b.records);
    });

    it('should lengthen the segment to at least the reference with a one tick clock', async () => {
      const { store, engine } = setup(sprintData(), [], { assumeYes: true, ticksPerSecond: 1 });
      // Times in whole seconds: 40 at cp 100, 240 at cp 105, so segment 200 vs reference 215.5
      const outcome = await engine.adjust({ fromCpId: 100, toCpId: 105, refTimeSeconds: 215.5 });

      expect(outcome.status).toBe('applied');
      const end = store.timeOf(42, 105);
      expect(end).toBe(256);
      expect((end ?? 0) - 40).toBeGreaterThanOrEqual(215.5);
    });
  });

  describe('revert', () => {
    it('should restore the original times from the audit file', async () => {
      const { store, engine } = setup(canyonData(), [], { assumeYes: true });
      const original = store.snapshot();
      const outcome = await engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 });
      if (outcome.status !== 'applied') throw new Error(`expected applied, got ${outcome.status}`);

      const reverted = await engine.revert(outcome.auditPath);

      expect(reverted).toMatchObject({ status: 'reverted', runs: 2, rows: 6 });
      expect(store.snapshot()).toEqual(original);

      // A second revert changes nothing and still verifies
      await expect(engine.revert(outcome.auditPath)).resolves.toMatchObject({ status: 'reverted', rows: 6 });
      expect(store.snapshot()).toEqual(original);
    });

    it('should leave the store alone when the operator declines', async () => {
      const { store, engine } = setup(canyonData(), [true, false]);
      const outcome = await engine.adjust({ fromCpId: 100, toCpId: 101, refTimeSeconds: 5 });
      if (outcome.status !== 'applied') throw new Error(`expected applied, got ${outcome.status}`);
      const adjusted = store.snapshot();

      const reverted = await engine.revert(outcome.auditPath);

      expect(reverted.status).toBe('declined');
      expect(store.snapshot()).toEqual(adjusted);
    });

    it('should fail on a missing audit file', async () => {
      const { engine } = setup(canyonData(), [], { assumeYes: true });

      await expect(engine.revert(join(dir, 'nope.csv'))).rejects.toThrow(`File '${join(dir, 'nope.csv')}' not found`);
      expect(engine.state).toBe('ABORTED');
    });
  });
});
