/**
 * Build a ContextSession from config and load the scanned workspace into it.
 */

import type { ArchiveStore, CompactionLog, ThresholdState, Tier } from '@contextstack/shared';
import { ContextSession, TierClassifier, createExtensionClassifier } from '@contextstack/ctxbudget';
import type { BatchFailure } from '@contextstack/ctxbudget';
import type { BudgetConfig } from './config.js';
import { scanFiles } from './scanner.js';
import type { ScanFailure } from './scanner.js';

/** 0 below warning, 1 at or above it, 2 for usage and configuration errors. */
export type ExitCode = 0 | 1 | 2;

export function exitCodeFor(state: ThresholdState): ExitCode {
  return state === 'warning' || state === 'critical' ? 1 : 0;
}

export interface WorkspaceOptions {
  cwd: string;
  config: BudgetConfig;
  pattern?: string;
  tier?: Tier;
  log?: CompactionLog;
  archiveStore?: ArchiveStore;
}

export interface LoadedWorkspace {
  session: ContextSession;
  unitCount: number;
  failures: ScanFailure[];
}

export function createSession(config: BudgetConfig, stores?: { log?: CompactionLog; archiveStore?: ArchiveStore }): ContextSession {
  return new ContextSession({
    totalCapacity: config.capacity,
    thresholds: config.thresholds,
    summaryRawSize: config.summaryRawSize,
    rounding: config.rounding,
    divisors: config.divisors,
    tierRules: config.tierRules,
    categorize: createExtensionClassifier(config.extensions),
    log: stores?.log,
    archiveStore: stores?.archiveStore,
  });
}

/**
 * Scan, filter by tier, and register everything. Registration is forced:
 * an estimate has to count every file, even past the critical line.
 */
export async function loadWorkspace(opts: WorkspaceOptions): Promise<LoadedWorkspace> {
  const { config } = opts;
  const scan = scanFiles({
    cwd: opts.cwd,
    roots: config.roots,
    include: config.include,
    pattern: opts.pattern,
  });

  const classifier = new TierClassifier(config.tierRules);
  const files = opts.tier === undefined
    ? scan.files
    : scan.files.filter(f => classifier.classify(f.identifier, f.declaredTier) === opts.tier);

  const session = createSession(config, { log: opts.log, archiveStore: opts.archiveStore });
  const batch = await session.registerBatch(
    files.map(f => ({ identifier: f.identifier, rawSize: f.rawSize, declaredTier: f.declaredTier })),
    { force: true },
  );

  return {
    session,
    unitCount: batch.registered.length,
    failures: [...scan.failures, ...batch.failed.map(toScanFailure)],
  };
}

function toScanFailure(failure: BatchFailure): ScanFailure {
  return { identifier: failure.identifier, message: failure.error.message };
}
