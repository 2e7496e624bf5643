#!/usr/bin/env node

/**
 * ctxscan CLI — Context Budget Estimation & Compaction
 *
 * Usage:
 *   ctxscan [estimate]   Estimate token usage of the workspace's context files
 *   ctxscan compact      Plan and apply a compaction
 *   ctxscan history      Show past compactions
 */

import { estimate } from './commands/estimate.js';
import { compact } from './commands/compact.js';
import { history } from './commands/history.js';
import { parseArgs } from './args.js';
import type { ScanFailure } from './scanner.js';

const USAGE = `
ctxscan — Context Budget Estimation & Compaction

Usage:
  ctxscan [estimate] [options]     Estimate token usage of context files
  ctxscan compact [options]        Compact down to a target utilization
  ctxscan history [--limit N]      Show past compactions
  ctxscan help                     Show this help message

Options:
  --tier N          Only units classified at tier N (1-5)
  --pattern GLOB    Scan files matching GLOB under the working directory
  --files           Show per-file breakdown
  --verbose, -v     Breakdown plus detailed statistics
  --target PCT      Compaction target utilization (default from config)
  --dry-run         Plan the compaction without applying it
  --limit N         Number of history records to show
  --config PATH     Config file (default .contextstack/budget.yaml)
  --db PATH         Context store (default .contextstack/context.db)
  --help, -h        Show this help message

Exit codes:
  0  usage below the warning threshold
  1  usage at or above the warning threshold
  2  invalid arguments or configuration, or no files found

Version: 0.1.0
`;

function printFailures(failures: ScanFailure[]): void {
  for (const failure of failures) {
    console.error(`Skipped ${failure.identifier}: ${failure.message}`);
  }
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (!parsed.ok) {
    console.error(parsed.error);
    console.log(USAGE);
    process.exit(2);
  }

  const args = parsed.args;

  switch (args.command) {
    case 'estimate': {
      const result = await estimate({
        tier: args.tier,
        pattern: args.pattern,
        files: args.files,
        verbose: args.verbose,
        configPath: args.config,
      });
      printFailures(result.failures);
      console.log(result.report);
      process.exit(result.exitCode);
    }

    case 'compact': {
      const result = await compact({
        target: args.target,
        dryRun: args.dryRun,
        tier: args.tier,
        pattern: args.pattern,
        files: args.files,
        verbose: args.verbose,
        configPath: args.config,
        dbPath: args.db,
      });
      printFailures(result.failures);
      console.log(result.report);
      process.exit(result.exitCode);
    }

    case 'history': {
      const result = history({ limit: args.limit, dbPath: args.db });
      console.log(result.report);
      process.exit(result.exitCode);
    }

    case 'help':
      console.log(USAGE);
      break;
  }
}

main().catch((err: unknown) => {
  console.error('ctxscan error:', err instanceof Error ? err.message : String(err));
  process.exit(2);
});
