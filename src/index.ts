#!/usr/bin/env node
/**
 * Checkpoint Fixer - CLI Entry Point
 *
 * Adjusts time_played for runs that crossed a checkpoint segment faster than
 * a reference time, and reverts such adjustments from their audit CSV.
 *
 * Usage:
 *   checkpoint-fixer                                     (interactive)
 *   checkpoint-fixer <from_cp_id> <to_cp_id> <ref_time_seconds>
 *   checkpoint-fixer --revert <csv_file>
 */

import { Command } from 'commander';
import { loadConfig, type AppConfig } from './core/config.js';
import { createLogger, type Logger } from './core/logger.js';
import { openPgStore, type AdjustmentStore } from './db/store.js';
import { AppError, ValidationError } from './errors/index.js';
import { ReadlineInputProvider, type InputProvider } from './cli/prompts.js';
import { AdjustmentEngine, type PreviewMode } from './services/engine.js';
import { validateInput, type RawAdjustmentInput } from './util/validation.js';

interface CliOptions {
  revert?: string;
  yes: boolean;
  preview?: boolean;
  exportDir?: string;
}

const program = new Command();

program
  .name('checkpoint-fixer')
  .description('Fix time_played of runs that skipped part of a checkpoint segment')
  .version('1.0.0')
  .argument('[from_cp_id]', 'checkpoint the segment starts at')
  .argument('[to_cp_id]', 'checkpoint the segment ends at')
  .argument('[ref_time_seconds]', 'legal minimum time for the segment, in seconds')
  .option('--revert <csv_file>', 'restore the old values recorded in a fixed audit CSV')
  .option('-y, --yes', 'apply without asking for confirmation', false)
  .option('--preview', 'always export the preview CSV')
  .option('--no-preview', 'never export the preview CSV')
  .option('--export-dir <dir>', 'directory for exported CSV files (overrides EXPORT_DIR)');

async function gatherInput(args: string[], input: InputProvider): Promise<RawAdjustmentInput> {
  if (args.length === 3) {
    const [fromCpId, toCpId, refTimeSeconds] = args;
    return { fromCpId, toCpId, refTimeSeconds };
  }
  if (args.length !== 0) {
    throw new ValidationError(
      'Expected <from_cp_id> <to_cp_id> <ref_time_seconds>, or no arguments for interactive mode',
      'arguments'
    );
  }
  const { fromCpId, toCpId } = await input.getRange();
  const refTimeSeconds = await input.getReferenceTime();
  return { fromCpId, toCpId, refTimeSeconds };
}

function previewMode(flag: boolean | undefined): PreviewMode {
  if (flag === undefined) return 'ask';
  return flag ? 'always' : 'never';
}

async function run(cfg: AppConfig, logger: Logger, opts: CliOptions, args: string[]): Promise<void> {
  const input = new ReadlineInputProvider();
  let store: AdjustmentStore | null = null;

  try {
    // Validate before connecting, so bad input never touches the database
    let raw: RawAdjustmentInput | null = null;
    if (opts.revert === undefined) {
      raw = await gatherInput(args, input);
      validateInput(raw);
    } else if (args.length !== 0) {
      throw new ValidationError('--revert takes no positional arguments', 'arguments');
    }

    store = await openPgStore(cfg, logger);
    const engine = new AdjustmentEngine(
      { store, input, logger, print: (text) => console.log(text) },
      {
        ticksPerSecond: cfg.ticksPerSecond,
        verifyTolerance: cfg.verifyTolerance,
        exportDir: opts.exportDir ?? cfg.exportDir,
        preview: previewMode(opts.preview),
        assumeYes: opts.yes
      }
    );

    if (raw) {
      const outcome = await engine.adjust(raw);
      if (outcome.status === 'applied') {
        logger.info({ rows: outcome.rowsWritten, auditPath: outcome.auditPath }, 'All changes applied successfully');
      } else {
        logger.info({ status: outcome.status }, 'No changes applied');
      }
    } else if (opts.revert !== undefined) {
      await engine.revert(opts.revert);
    }
  } finally {
    input.close();
    if (store) await store.close();
  }
}

async function main(): Promise<void> {
  program.parse();
  const opts = program.opts<CliOptions>();

  let cfg: AppConfig;
  try {
    cfg = loadConfig();
  } catch (err) {
    createLogger('info').error({ err }, 'Invalid configuration');
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(cfg.logLevel);
  try {
    await run(cfg, logger, opts, program.args);
  } catch (err) {
    logger.error({ err }, 'Fatal error occurred');
    process.exitCode = err instanceof AppError ? err.exitCode : 1;
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
