/**
 * ctxscan compact — plan, and unless --dry-run apply, a compaction
 *
 * Archived units and the compaction record go to the SQLite ContextStore.
 * Files on disk are never touched; the store is the record of what a
 * session should stop loading.
 */

import { ContextStore } from '@contextstack/shared';
import type { CompactionRecord, Tier } from '@contextstack/shared';
import type { CompactionPlan, ThresholdEvaluation } from '@contextstack/ctxbudget';
import { formatConfigErrors, loadConfig, resolveDbPath } from '../config.js';
import type { BudgetConfig } from '../config.js';
import type { ScanFailure } from '../scanner.js';
import { exitCodeFor, loadWorkspace } from '../workspace.js';
import type { ExitCode } from '../workspace.js';

export interface CompactOptions {
  cwd?: string;
  config?: BudgetConfig;
  configPath?: string;
  dbPath?: string;
  /** Target utilization, 0-100. Defaults to the configured targetPercent. */
  target?: number;
  dryRun?: boolean;
  tier?: Tier;
  pattern?: string;
  files?: boolean;
  verbose?: boolean;
}

export interface CompactResult {
  plan: CompactionPlan | null;
  record: CompactionRecord | null;
  evaluation: ThresholdEvaluation | null;
  failures: ScanFailure[];
  exitCode: ExitCode;
  report: string;
}

const EMPTY: Omit<CompactResult, 'exitCode' | 'report'> = {
  plan: null,
  record: null,
  evaluation: null,
  failures: [],
};

export async function compact(opts?: CompactOptions): Promise<CompactResult> {
  const cwd = opts?.cwd || process.cwd();

  let config = opts?.config;
  if (!config) {
    const loaded = loadConfig(cwd, opts?.configPath);
    if (!loaded.ok) return { ...EMPTY, exitCode: 2, report: formatConfigErrors(loaded.errors) };
    config = loaded.config;
  }

  const target = opts?.target ?? config.targetPercent;
  if (!Number.isFinite(target) || target < 0 || target > 100) {
    return { ...EMPTY, exitCode: 2, report: `Invalid target: ${target} (expected 0-100)` };
  }

  const store = opts?.dryRun ? null : new ContextStore(resolveDbPath(cwd, opts?.dbPath));

  try {
    const workspace = await loadWorkspace({
      cwd,
      config,
      pattern: opts?.pattern,
      tier: opts?.tier,
      log: store ?? undefined,
      archiveStore: store ?? undefined,
    });

    if (workspace.unitCount === 0) {
      return { ...EMPTY, failures: workspace.failures, exitCode: 2, report: 'No files found matching criteria.' };
    }

    const { session } = workspace;
    const reportOpts = { files: opts?.files, verbose: opts?.verbose };

    if (opts?.dryRun) {
      const plan = await session.plan(target);
      const evaluation = session.evaluate();
      return {
        plan,
        record: null,
        evaluation,
        failures: workspace.failures,
        exitCode: exitCodeFor(evaluation.state),
        report: session.report({ ...reportOpts, plan, title: 'Compaction Plan (dry run)' }),
      };
    }

    const outcome = await session.compact(target);
    return {
      plan: outcome.plan,
      record: outcome.record.unitsAffected.length > 0 ? outcome.record : null,
      evaluation: outcome.evaluation,
      failures: workspace.failures,
      exitCode: exitCodeFor(outcome.evaluation.state),
      report: session.report({ ...reportOpts, plan: outcome.plan, title: 'Context Budget Report (after compaction)' }),
    };
  } finally {
    store?.close();
  }
}
