/**
 * Compaction Planner — decide what to give up
 *
 * Works on a snapshot and returns plain data: discarding a plan has no
 * effect on anything.
 *
 * Order of sacrifice:
 * 1. Units the caller nominated (`prefer`), in the order given
 * 2. Tier 5 → tier 2, stalest first (`lastTouched` ascending) within a tier
 *
 * Tier 4-5 units are archived outright. Tier 2-3 units are summarized down to
 * a fixed residual. Tier 1 units are never planned.
 */

import type { CompactionActionType, ContentUnit, Tier } from '@contextstack/shared';
import type { ReadonlyLedger } from './budget-ledger.js';
import { InvalidInputError } from './errors.js';

/** ~ one short paragraph. */
export const DEFAULT_SUMMARY_RAW_SIZE = 2000;

const EVICTION_ORDER: Tier[] = [5, 4, 3, 2];

export interface PlanEntry {
  identifier: string;
  tier: Tier;
  action: CompactionActionType;
  /** Cost of the unit when the plan was made. */
  cost: number;
  /** Tokens this action frees. */
  freed: number;
  /** Size the unit is cut to; summarize only. */
  residualRawSize: number | null;
}

export type SkipReason = 'unknown' | 'protected' | 'summarized' | 'no_savings';

export interface SkippedCandidate {
  identifier: string;
  reason: SkipReason;
}

export interface CompactionPlan {
  entries: PlanEntry[];
  projectedFreed: number;
  consumedBefore: number;
  projectedConsumed: number;
  projectedUtilization: number;
  totalCapacity: number;
  targetUtilization: number;
  targetReached: boolean;
  /** Nominated units the planner could not use. */
  skipped: SkippedCandidate[];
}

export interface CompactionPlannerOptions {
  summaryRawSize?: number;
}

export interface PlanOptions {
  /** Identifiers to compact before anything else, if they are eligible. */
  prefer?: string[];
}

/**
 * Whether `consumed` sits at or under the target. The target is taken back to
 * a percentage (rounded past float noise, so 0.57 is 57) and compared as
 * consumed * 100 vs pct * capacity, the way threshold bands are.
 */
export function withinTarget(consumed: number, targetUtilization: number, totalCapacity: number): boolean {
  const pct = Math.round(targetUtilization * 100 * 1e9) / 1e9;
  return consumed * 100 <= pct * totalCapacity;
}

export function actionForTier(tier: Tier): CompactionActionType | null {
  if (tier === 1) return null;
  return tier >= 4 ? 'archive' : 'summarize';
}

export class CompactionPlanner {
  private summaryRawSize: number;

  constructor(opts?: CompactionPlannerOptions) {
    const size = opts?.summaryRawSize ?? DEFAULT_SUMMARY_RAW_SIZE;
    if (!Number.isInteger(size) || size < 0) {
      throw new InvalidInputError(`summaryRawSize must be a non-negative integer, got ${size}`);
    }
    this.summaryRawSize = size;
  }

  getSummaryRawSize(): number {
    return this.summaryRawSize;
  }

  /**
   * Greedy plan bringing utilization to `targetUtilization` (a fraction)
   * or as close as possible without touching tier 1.
   */
  plan(ledger: ReadonlyLedger, targetUtilization: number, opts?: PlanOptions): CompactionPlan {
    if (!Number.isFinite(targetUtilization) || targetUtilization < 0 || targetUtilization > 1) {
      throw new InvalidInputError(`targetUtilization must be a fraction between 0 and 1, got ${targetUtilization}`);
    }

    const capacity = ledger.totalCapacity;
    const consumedBefore = ledger.consumed;
    const entries: PlanEntry[] = [];
    const skipped: SkippedCandidate[] = [];
    let freed = 0;

    const reached = (): boolean => withinTarget(consumedBefore - freed, targetUtilization, capacity);

    if (!reached()) {
      const seen = new Set<string>();

      for (const identifier of opts?.prefer ?? []) {
        if (seen.has(identifier)) continue;
        seen.add(identifier);

        const unit = ledger.get(identifier);
        if (!unit) {
          console.warn(`[CompactionPlanner] Nominated unit ${identifier} is not in the ledger; excluded`);
          skipped.push({ identifier, reason: 'unknown' });
          continue;
        }
        if (reached()) continue;

        const entry = this.entryFor(unit, ledger);
        if (typeof entry === 'string') {
          skipped.push({ identifier, reason: entry });
          continue;
        }
        entries.push(entry);
        freed += entry.freed;
      }

      for (const unit of this.candidates(ledger)) {
        if (reached()) break;
        if (seen.has(unit.identifier)) continue;

        const entry = this.entryFor(unit, ledger);
        if (typeof entry === 'string') continue;
        entries.push(entry);
        freed += entry.freed;
      }
    }

    const projectedConsumed = consumedBefore - freed;

    return {
      entries,
      projectedFreed: freed,
      consumedBefore,
      projectedConsumed,
      projectedUtilization: projectedConsumed / capacity,
      totalCapacity: capacity,
      targetUtilization,
      targetReached: reached(),
      skipped,
    };
  }

  /**
   * Non-tier-1 units in eviction order.
   */
  candidates(ledger: ReadonlyLedger): Array<Readonly<ContentUnit>> {
    const byTier = new Map<Tier, Array<Readonly<ContentUnit>>>();
    for (const unit of ledger.units()) {
      if (unit.tier === 1) continue;
      const bucket = byTier.get(unit.tier) ?? [];
      bucket.push(unit);
      byTier.set(unit.tier, bucket);
    }

    const ordered: Array<Readonly<ContentUnit>> = [];
    for (const tier of EVICTION_ORDER) {
      const bucket = byTier.get(tier);
      if (!bucket) continue;
      bucket.sort((a, b) =>
        a.lastTouched - b.lastTouched || a.identifier.localeCompare(b.identifier),
      );
      ordered.push(...bucket);
    }
    return ordered;
  }

  private entryFor(unit: Readonly<ContentUnit>, ledger: ReadonlyLedger): PlanEntry | SkipReason {
    const action = actionForTier(unit.tier);
    if (action === null) return 'protected';

    if (action === 'archive') {
      if (unit.estimatedCost <= 0) return 'no_savings';
      return {
        identifier: unit.identifier,
        tier: unit.tier,
        action,
        cost: unit.estimatedCost,
        freed: unit.estimatedCost,
        residualRawSize: null,
      };
    }

    if (unit.summarized) return 'summarized';

    const residualRawSize = Math.min(this.summaryRawSize, unit.rawSize);
    const residualCost = ledger.getEstimator().estimate(residualRawSize, unit.category);
    const saving = unit.estimatedCost - residualCost;
    if (saving <= 0) return 'no_savings';

    return {
      identifier: unit.identifier,
      tier: unit.tier,
      action,
      cost: unit.estimatedCost,
      freed: saving,
      residualRawSize,
    };
  }
}
