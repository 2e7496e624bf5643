/**
 * ctxscan estimate — how much of the context window the workspace takes
 *
 * Scans the configured roots (or a glob), registers every file and prints
 * the budget report. Exit code reflects the threshold band.
 */

import type { Tier } from '@contextstack/shared';
import type { ThresholdEvaluation } from '@contextstack/ctxbudget';
import { formatConfigErrors, loadConfig } from '../config.js';
import type { BudgetConfig } from '../config.js';
import type { ScanFailure } from '../scanner.js';
import { exitCodeFor, loadWorkspace } from '../workspace.js';
import type { ExitCode } from '../workspace.js';

export interface EstimateOptions {
  cwd?: string;
  config?: BudgetConfig;
  configPath?: string;
  tier?: Tier;
  pattern?: string;
  files?: boolean;
  verbose?: boolean;
}

export interface EstimateResult {
  unitCount: number;
  evaluation: ThresholdEvaluation | null;
  failures: ScanFailure[];
  exitCode: ExitCode;
  report: string;
}

export async function estimate(opts?: EstimateOptions): Promise<EstimateResult> {
  const cwd = opts?.cwd || process.cwd();

  let config = opts?.config;
  if (!config) {
    const loaded = loadConfig(cwd, opts?.configPath);
    if (!loaded.ok) {
      return { unitCount: 0, evaluation: null, failures: [], exitCode: 2, report: formatConfigErrors(loaded.errors) };
    }
    config = loaded.config;
  }

  const workspace = await loadWorkspace({ cwd, config, pattern: opts?.pattern, tier: opts?.tier });

  if (workspace.unitCount === 0) {
    return {
      unitCount: 0,
      evaluation: null,
      failures: workspace.failures,
      exitCode: 2,
      report: 'No files found matching criteria.',
    };
  }

  const evaluation = workspace.session.evaluate();
  const title = opts?.tier === undefined ? 'Context Budget Report' : `Context Budget Report (Tier ${opts.tier})`;

  return {
    unitCount: workspace.unitCount,
    evaluation,
    failures: workspace.failures,
    exitCode: exitCodeFor(evaluation.state),
    report: workspace.session.report({ files: opts?.files, verbose: opts?.verbose, title }),
  };
}
