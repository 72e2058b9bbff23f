/**
 * Adjustment Engine
 *
 * Drives one invocation through
 * VALIDATE_INPUT → RESOLVE_CHECKPOINTS → FIND_RUNS → COMPUTE_ADJUSTMENTS →
 * [PREVIEW_EXPORT] → CONFIRM → APPLY_VERIFY → EXPORT → DONE.
 * Any error moves it to ABORTED and is rethrown; only APPLY_VERIFY writes
 * to the store, and it does so atomically. EXPORT runs inside that
 * transaction, so a failed export rolls the writes back.
 */

import { rmSync } from 'fs';
import type { Logger } from '../core/logger.js';
import type { AdjustmentStore } from '../db/store.js';
import { ConnectivityError, ConsistencyError } from '../errors/index.js';
import type { InputProvider } from '../cli/prompts.js';
import { formatHeading, formatPlan, formatSummary } from '../cli/format.js';
import { secondsToTicks } from '../util/timeFormat.js';
import { validateInput, type AdjustmentInput, type RawAdjustmentInput } from '../util/validation.js';
import { computeAdjustments, minimumSegmentTimePolicy, type AdjustmentPolicy } from './adjustment.js';
import { buildAuditRecords, readAuditFile, writeAuditFile, type AuditRecord } from './auditLog.js';
import { resolveCheckpointPair } from './checkpointResolver.js';
import { revertRecords } from './revert.js';
import { findAffectedRuns } from './runFinder.js';
import { applyTimeUpdates } from './updater.js';

export type EngineState =
  | 'IDLE'
  | 'VALIDATE_INPUT'
  | 'RESOLVE_CHECKPOINTS'
  | 'FIND_RUNS'
  | 'COMPUTE_ADJUSTMENTS'
  | 'PREVIEW_EXPORT'
  | 'CONFIRM'
  | 'APPLY_VERIFY'
  | 'EXPORT'
  | 'DONE'
  | 'ABORTED';

export type PreviewMode = 'ask' | 'always' | 'never';

export interface EngineOptions {
  ticksPerSecond: number;
  verifyTolerance: number;
  exportDir: string;
  preview: PreviewMode;
  /** Skip the apply/revert confirmation */
  assumeYes: boolean;
  policy?: AdjustmentPolicy;
  now?: () => Date;
}

export interface EngineDeps {
  store: AdjustmentStore;
  input: InputProvider;
  logger: Logger;
  /** Operator-facing output */
  print: (text: string) => void;
}

export type AdjustmentOutcome =
  | { status: 'no-runs'; input: AdjustmentInput }
  | { status: 'declined'; input: AdjustmentInput; records: AuditRecord[]; previewPath: string | null }
  | {
      status: 'applied';
      input: AdjustmentInput;
      records: AuditRecord[];
      previewPath: string | null;
      auditPath: string;
      rowsWritten: number;
    };

export type RevertOutcome =
  | { status: 'declined'; records: AuditRecord[] }
  | { status: 'reverted'; records: AuditRecord[]; runs: number; rows: number };

export class AdjustmentEngine {
  private current: EngineState = 'IDLE';
  private readonly policy: AdjustmentPolicy;
  private readonly now: () => Date;

  constructor(private readonly deps: EngineDeps, private readonly options: EngineOptions) {
    this.policy = options.policy ?? minimumSegmentTimePolicy;
    this.now = options.now ?? (() => new Date());
  }

  get state(): EngineState {
    return this.current;
  }

  private transition(next: EngineState): void {
    this.deps.logger.debug({ from: this.current, to: next }, 'Engine state change');
    this.current = next;
  }

  private async guard<T>(work: () => Promise<T>): Promise<T> {
    try {
      const result = await work();
      this.transition('DONE');
      return result;
    } catch (err) {
      this.transition('ABORTED');
      throw err;
    }
  }

  private async confirm(question: string): Promise<boolean> {
    if (this.options.assumeYes) return true;
    return this.deps.input.confirm(question);
  }

  private async wantsPreview(): Promise<boolean> {
    switch (this.options.preview) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'ask':
        return this.deps.input.confirm('Export preview CSV?');
    }
  }

  private async ensureUpdatePrivilege(): Promise<void> {
    if (!(await this.deps.store.hasUpdatePrivilege())) {
      throw new ConnectivityError('Connected role lacks UPDATE privilege on checkpoint_statistics');
    }
  }

  /**
   * Finds, confirms, applies and exports an adjustment
   */
  adjust(raw: RawAdjustmentInput): Promise<AdjustmentOutcome> {
    return this.guard(() => this.runAdjustment(raw));
  }

  private async runAdjustment(raw: RawAdjustmentInput): Promise<AdjustmentOutcome> {
    const { store, logger, print } = this.deps;
    const { ticksPerSecond, verifyTolerance, exportDir } = this.options;

    this.transition('VALIDATE_INPUT');
    const input = validateInput(raw);

    this.transition('RESOLVE_CHECKPOINTS');
    const { mapid, reachable } = await resolveCheckpointPair(store, logger, input.fromCpId, input.toCpId);
    logger.info({ mapid, reachable }, 'Checkpoints valid');

    this.transition('FIND_RUNS');
    const refTicks = secondsToTicks(input.refTimeSeconds, ticksPerSecond);
    const runs = await findAffectedRuns(store, logger, {
      fromCpId: input.fromCpId,
      toCpId: input.toCpId,
      mapid,
      refTicks
    });

    this.transition('COMPUTE_ADJUSTMENTS');
    const adjustments = computeAdjustments(runs, refTicks, this.policy);
    if (adjustments.length === 0) {
      logger.info({ ...input }, 'No cheated runs found');
      print('No cheated runs found!');
      return { status: 'no-runs', input };
    }

    const records = buildAuditRecords(adjustments, input, ticksPerSecond);
    print(formatHeading('STEP 1: Dry Run (Analysis Only)'));
    print(formatPlan(input, adjustments, ticksPerSecond));

    this.transition('PREVIEW_EXPORT');
    let previewPath: string | null = null;
    if (await this.wantsPreview()) {
      previewPath = writeAuditFile(exportDir, 'preview', records, this.now());
      logger.info({ path: previewPath, rows: records.length }, 'Preview exported');
      print(formatSummary(records));
    }

    this.transition('CONFIRM');
    if (!(await this.confirm('Do you want to apply these changes?'))) {
      logger.info('Changes not applied');
      return { status: 'declined', input, records, previewPath };
    }

    this.transition('APPLY_VERIFY');
    print(formatHeading('STEP 2: Applying Changes'));
    await this.ensureUpdatePrivilege();

    // The audit file is written before the commit, so no committed row lacks a revert record
    const exported: string[] = [];
    let rowsWritten: number;
    try {
      rowsWritten = await applyTimeUpdates(
        store,
        logger,
        records.map(record => ({
          runId: record.runId,
          cpId: record.cpId,
          timePlayed: record.newTimePlayed,
          expectedCurrent: record.oldTimePlayed
        })),
        verifyTolerance,
        () => {
          this.transition('EXPORT');
          exported.push(writeAuditFile(exportDir, 'fixed', records, this.now()));
        }
      );
    } catch (err) {
      // Rolled back: an audit file written before a failed commit describes nothing
      for (const path of exported) rmSync(path, { force: true });
      throw err;
    }

    const [auditPath] = exported;
    if (auditPath === undefined) {
      throw new ConsistencyError('Changes were committed but no audit file was recorded');
    }
    logger.info({ path: auditPath, rows: records.length }, 'Audit file exported');
    print(formatSummary(records));

    return { status: 'applied', input, records, previewPath, auditPath, rowsWritten };
  }

  /**
   * Restores the old values recorded in an audit file
   */
  revert(filePath: string): Promise<RevertOutcome> {
    return this.guard(() => this.runRevert(filePath));
  }

  private async runRevert(filePath: string): Promise<RevertOutcome> {
    const { store, logger, print } = this.deps;

    this.transition('VALIDATE_INPUT');
    const records = readAuditFile(filePath);
    print(`Found ${records.length} row(s) to revert in '${filePath}'`);

    this.transition('CONFIRM');
    if (!(await this.confirm(`Are you sure you want to revert changes from '${filePath}'?`))) {
      logger.info('Revert cancelled');
      return { status: 'declined', records };
    }

    this.transition('APPLY_VERIFY');
    await this.ensureUpdatePrivilege();
    const { runs, rows } = await revertRecords(store, logger, records, this.options.verifyTolerance);
    logger.info({ runs, rows, path: filePath }, 'Revert applied');
    print(`Successfully reverted ${rows} row(s) across ${runs} run(s)`);

    return { status: 'reverted', records, runs, rows };
  }
}
