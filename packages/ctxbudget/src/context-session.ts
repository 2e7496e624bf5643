/**
 * Context Session — the one owner of the live ledger
 *
 * Wires the pipeline together:
 *   estimate → classify → register → evaluate → plan → execute → report
 *
 * The ledger is only ever replaced whole: execute() builds the next ledger
 * from a clone and the session swaps it in after every action has applied.
 * Nothing else holds a mutable reference to it.
 *
 * Integration:
 * - Appends compaction records to a CompactionLog (ContextStore persists them)
 * - Archives units into an ArchiveStore
 * - Emits ledger.*, threshold.changed and compaction.* on the EventBus
 */

import { randomUUID } from 'crypto';
import { EventBus, createEvent } from '@contextstack/shared';
import type { ArchiveStore, Category, CompactionLog, CompactionRecord, ContentUnit, ThresholdPolicy, ThresholdState } from '@contextstack/shared';
import { BudgetLedger } from './budget-ledger.js';
import type { ReadonlyLedger } from './budget-ledger.js';
import { CostEstimator, categorizeByExtension } from './cost-estimator.js';
import type { CategoryClassifier, Rounding } from './cost-estimator.js';
import { TierClassifier, DEFAULT_TIER_RULES } from './tier-classifier.js';
import type { TierRuleTable } from './tier-classifier.js';
import { ThresholdMonitor, HysteresisMonitor, DEFAULT_THRESHOLDS } from './threshold-monitor.js';
import type { ThresholdEvaluation } from './threshold-monitor.js';
import { CompactionPlanner, DEFAULT_SUMMARY_RAW_SIZE } from './compaction-planner.js';
import type { CompactionPlan, PlanOptions } from './compaction-planner.js';
import { CompactionExecutor } from './compaction-executor.js';
import type { ArchivedEntry } from './compaction-executor.js';
import { generateReport, formatHistory } from './report-generator.js';
import type { ReportOptions } from './report-generator.js';
import { MemoryArchiveStore, MemoryCompactionLog } from './memory-stores.js';
import { CompactionRequiredError, ContextBudgetError } from './errors.js';

export interface ContextSessionConfig {
  sessionId?: string;
  totalCapacity: number;
  thresholds?: ThresholdPolicy;
  /** Percentage points; when set, threshold changes are debounced by HysteresisMonitor. */
  hysteresisMargin?: number;
  summaryRawSize?: number;
  rounding?: Rounding;
  divisors?: Record<string, number>;
  tierRules?: TierRuleTable;
  categorize?: CategoryClassifier;
  archiveStore?: ArchiveStore;
  log?: CompactionLog;
  bus?: EventBus;
}

export interface RegisterInput {
  identifier: string;
  rawSize: number;
  category?: Category;
  declaredTier?: number | null;
  lastTouched?: number;
}

export interface RegisterOptions {
  /** Register even while the budget is critical. */
  force?: boolean;
}

export interface BatchFailure {
  identifier: string;
  error: ContextBudgetError;
}

export interface BatchResult {
  registered: ContentUnit[];
  failed: BatchFailure[];
  evaluation: ThresholdEvaluation;
}

export interface CompactionOutcome {
  plan: CompactionPlan;
  record: CompactionRecord;
  archived: ArchivedEntry[];
  evaluation: ThresholdEvaluation;
}

export class ContextSession {
  readonly sessionId: string;
  private ledger: BudgetLedger;
  private estimator: CostEstimator;
  private classifier: TierClassifier;
  private categorize: CategoryClassifier;
  private monitor: ThresholdMonitor;
  private hysteresis: HysteresisMonitor | null;
  private planner: CompactionPlanner;
  private executor: CompactionExecutor;
  private log: CompactionLog;
  private bus: EventBus;
  private lastState: ThresholdState;

  constructor(config: ContextSessionConfig) {
    this.sessionId = config.sessionId ?? `ses_${randomUUID()}`;
    this.estimator = new CostEstimator({ divisors: config.divisors, rounding: config.rounding });
    this.ledger = new BudgetLedger({ totalCapacity: config.totalCapacity, estimator: this.estimator });
    this.classifier = new TierClassifier(config.tierRules ?? DEFAULT_TIER_RULES);
    this.categorize = config.categorize ?? categorizeByExtension;
    this.monitor = new ThresholdMonitor(config.thresholds ?? DEFAULT_THRESHOLDS);
    this.hysteresis = config.hysteresisMargin !== undefined
      ? new HysteresisMonitor(this.monitor, { margin: config.hysteresisMargin })
      : null;
    this.planner = new CompactionPlanner({ summaryRawSize: config.summaryRawSize ?? DEFAULT_SUMMARY_RAW_SIZE });
    this.executor = new CompactionExecutor({ archiveStore: config.archiveStore ?? new MemoryArchiveStore() });
    this.log = config.log ?? new MemoryCompactionLog();
    this.bus = config.bus ?? new EventBus();
    this.lastState = this.evaluate().state;
  }

  // ─── Registration ───────────────────────────────────────────────

  /**
   * Estimate, classify and register one unit. New identifiers are refused
   * while the budget is critical unless `force` is set; replacing an
   * existing unit is always allowed.
   */
  async register(input: RegisterInput, opts?: RegisterOptions): Promise<ContentUnit> {
    const unit = this.registerNow(input, opts);
    await this.bus.emit(createEvent(
      'ledger.unit_registered',
      'ctxbudget',
      { identifier: unit.identifier, tier: unit.tier, estimatedCost: unit.estimatedCost },
      { sessionId: this.sessionId },
    ));
    await this.publishThreshold();
    return unit;
  }

  /**
   * Register many units. A bad unit is reported and skipped; the rest of the
   * batch still goes in. Errors other than ContextBudgetError propagate.
   */
  async registerBatch(inputs: RegisterInput[], opts?: RegisterOptions): Promise<BatchResult> {
    const registered: ContentUnit[] = [];
    const failed: BatchFailure[] = [];

    for (const input of inputs) {
      try {
        registered.push(this.registerNow(input, opts));
      } catch (err) {
        if (!(err instanceof ContextBudgetError)) throw err;
        failed.push({ identifier: input.identifier, error: err });
      }
    }

    for (const unit of registered) {
      await this.bus.emit(createEvent(
        'ledger.unit_registered',
        'ctxbudget',
        { identifier: unit.identifier, tier: unit.tier, estimatedCost: unit.estimatedCost },
        { sessionId: this.sessionId },
      ));
    }

    const evaluation = await this.publishThreshold();
    return { registered, failed, evaluation };
  }

  async deregister(identifier: string): Promise<boolean> {
    const removed = this.ledger.deregister(identifier);
    if (removed) {
      await this.bus.emit(createEvent('ledger.unit_deregistered', 'ctxbudget', { identifier }, { sessionId: this.sessionId }));
      await this.publishThreshold();
    }
    return removed;
  }

  touch(identifier: string): ContentUnit {
    return this.ledger.touch(identifier);
  }

  // ─── Evaluation ─────────────────────────────────────────────────

  evaluate(): ThresholdEvaluation {
    return this.hysteresis
      ? this.hysteresis.evaluate(this.ledger)
      : this.monitor.evaluate(this.ledger);
  }

  getLedger(): ReadonlyLedger {
    return this.ledger.snapshot();
  }

  // ─── Compaction ─────────────────────────────────────────────────

  /**
   * Plan against a snapshot. `targetPercent` is 0-100.
   */
  async plan(targetPercent: number, opts?: PlanOptions): Promise<CompactionPlan> {
    const plan = this.planner.plan(this.ledger.snapshot(), targetPercent / 100, opts);
    await this.bus.emit(createEvent(
      'compaction.planned',
      'ctxbudget',
      {
        entries: plan.entries.length,
        projectedFreed: plan.projectedFreed,
        projectedUtilization: plan.projectedUtilization,
        targetReached: plan.targetReached,
      },
      { sessionId: this.sessionId },
    ));
    return plan;
  }

  /**
   * Apply a plan. The live ledger is swapped only after every action has
   * succeeded and the record is logged; a failure leaves it untouched,
   * removes any archive entries and rethrows.
   */
  async execute(plan: CompactionPlan): Promise<Omit<CompactionOutcome, 'plan'>> {
    const result = this.executor.execute(this.ledger, plan);
    const recorded = result.record.unitsAffected.length > 0;

    if (recorded) {
      try {
        this.log.append(result.record);
      } catch (err) {
        this.executor.discard(result.archived);
        throw err;
      }
    }
    this.ledger = result.ledger;

    if (recorded) {
      await this.bus.emit(createEvent(
        'compaction.executed',
        'ctxbudget',
        {
          recordId: result.record.recordId,
          tokensFreed: result.record.tokensFreed,
          resultingConsumed: result.record.resultingConsumed,
          archived: result.archived,
        },
        { sessionId: this.sessionId },
      ));
    }

    const evaluation = await this.publishThreshold();
    return { record: result.record, archived: result.archived, evaluation };
  }

  /**
   * Plan and execute in one step. Falling short of the target is reported,
   * not thrown.
   */
  async compact(targetPercent: number, opts?: PlanOptions): Promise<CompactionOutcome> {
    const plan = await this.plan(targetPercent, opts);

    if (!plan.targetReached) {
      console.warn(
        `[ContextSession] Compaction target ${targetPercent}% not reachable without touching tier 1; ` +
        `best achievable is ${(plan.projectedUtilization * 100).toFixed(1)}%`,
      );
      await this.bus.emit(createEvent(
        'compaction.insufficient',
        'ctxbudget',
        {
          targetUtilization: plan.targetUtilization,
          bestAchievable: plan.projectedUtilization,
          projectedFreed: plan.projectedFreed,
        },
        { sessionId: this.sessionId },
      ));
    }

    const outcome = await this.execute(plan);
    return { plan, ...outcome };
  }

  // ─── Reporting ──────────────────────────────────────────────────

  report(opts?: ReportOptions): string {
    return generateReport(this.ledger.snapshot(), this.evaluate(), opts);
  }

  history(limit?: number): CompactionRecord[] {
    return this.log.list(limit);
  }

  formatHistory(limit?: number): string {
    return formatHistory(this.history(limit));
  }

  // ─── Private ────────────────────────────────────────────────────

  private registerNow(input: RegisterInput, opts?: RegisterOptions): ContentUnit {
    const category = input.category ?? this.categorize(input.identifier);
    const tier = this.classifier.classify(input.identifier, input.declaredTier);

    if (!opts?.force && !this.ledger.has(input.identifier)) {
      const current = this.monitor.evaluate(this.ledger);
      if (current.state === 'critical') {
        throw new CompactionRequiredError(current.utilization);
      }
    }

    return this.ledger.register({
      identifier: input.identifier,
      category,
      rawSize: input.rawSize,
      tier,
      lastTouched: input.lastTouched,
    });
  }

  private async publishThreshold(): Promise<ThresholdEvaluation> {
    const evaluation = this.evaluate();
    if (evaluation.state !== this.lastState) {
      const previous = this.lastState;
      this.lastState = evaluation.state;
      await this.bus.emit(createEvent(
        'threshold.changed',
        'ctxbudget',
        { from: previous, to: evaluation.state, utilization: evaluation.utilization, action: evaluation.action },
        { sessionId: this.sessionId },
      ));
    }
    return evaluation;
  }
}
