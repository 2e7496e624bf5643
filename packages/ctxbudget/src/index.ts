/**
 * ctxbudget — Context Budget Tracking & Compaction
 *
 * Components:
 * 1. Cost Estimator — characters → tokens, per content category
 * 2. Tier Classifier — declared tier or first matching rule, fallback tier 3
 * 3. Budget Ledger — units, consumption, utilization, snapshots
 * 4. Threshold Monitor — healthy / caution / warning / critical (+ hysteresis wrapper)
 * 5. Compaction Planner — archive tier 4-5, summarize tier 2-3, never tier 1
 * 6. Compaction Executor — all-or-nothing application of a plan
 * 7. Report Generator — fixed-section text report
 *
 * ContextSession ties them together and owns the live ledger.
 */
export { CostEstimator, estimateCost, categorizeByExtension, createExtensionClassifier, measure, DEFAULT_DIVISORS } from './cost-estimator.js';
export type { CategoryClassifier, CostEstimatorOptions, Rounding } from './cost-estimator.js';
export { TierClassifier, parseFrontmatterTier, DEFAULT_TIER_RULES, FALLBACK_TIER } from './tier-classifier.js';
export type { TierRule, TierRuleTable, Classification } from './tier-classifier.js';
export { BudgetLedger } from './budget-ledger.js';
export type { ReadonlyLedger, UnitInput, BudgetLedgerOptions } from './budget-ledger.js';
export { ThresholdMonitor, HysteresisMonitor, validateThresholds, stateRank, DEFAULT_THRESHOLDS } from './threshold-monitor.js';
export type { ThresholdEvaluation, HysteresisEvaluation, HysteresisOptions, BoundaryInfo } from './threshold-monitor.js';
export { CompactionPlanner, actionForTier, withinTarget, DEFAULT_SUMMARY_RAW_SIZE } from './compaction-planner.js';
export type { CompactionPlan, PlanEntry, PlanOptions, SkippedCandidate, SkipReason, CompactionPlannerOptions } from './compaction-planner.js';
export { CompactionExecutor } from './compaction-executor.js';
export type { ExecutionResult, ArchivedEntry, CompactionExecutorOptions } from './compaction-executor.js';
export { generateReport, formatHistory, formatNumber, formatPercent } from './report-generator.js';
export type { ReportOptions } from './report-generator.js';
export { ContextSession } from './context-session.js';
export type {
  ContextSessionConfig,
  RegisterInput,
  RegisterOptions,
  BatchResult,
  BatchFailure,
  CompactionOutcome,
} from './context-session.js';
export { MemoryArchiveStore, MemoryCompactionLog } from './memory-stores.js';
export {
  ContextBudgetError,
  InvalidInputError,
  UnknownUnitError,
  ProtectedUnitError,
  AlreadySummarizedError,
  CompactionRequiredError,
  ArchiveError,
} from './errors.js';
export type { ContextBudgetErrorCode } from './errors.js';
