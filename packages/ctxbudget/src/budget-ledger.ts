/**
 * Budget Ledger — what is in context and what it costs
 *
 * Units are keyed by identifier. Cost is never supplied by the caller: the
 * ledger derives it from rawSize and category through its estimator, so a
 * unit's cost can't drift from its size.
 *
 * `consumed` is cached and invalidated on every write. Going over capacity
 * is allowed; it is the signal the threshold monitor reads.
 */

import { isTier } from '@contextstack/shared';
import type { Category, ContentUnit, Tier } from '@contextstack/shared';
import { CostEstimator } from './cost-estimator.js';
import { InvalidInputError, UnknownUnitError } from './errors.js';

export interface UnitInput {
  identifier: string;
  category: Category;
  rawSize: number;
  tier: Tier;
  lastTouched?: number;
  summarized?: boolean;
}

/**
 * Read side of a ledger. Planning and reporting only ever need this.
 */
export interface ReadonlyLedger {
  readonly totalCapacity: number;
  readonly size: number;
  readonly consumed: number;
  get(identifier: string): Readonly<ContentUnit> | undefined;
  has(identifier: string): boolean;
  units(): ReadonlyArray<Readonly<ContentUnit>>;
  utilization(): number;
  displayUtilization(): number;
  freeCapacity(): number;
  getEstimator(): CostEstimator;
  clone(): BudgetLedger;
}

export interface BudgetLedgerOptions {
  totalCapacity: number;
  estimator?: CostEstimator;
}

export class BudgetLedger implements ReadonlyLedger {
  readonly totalCapacity: number;
  private estimator: CostEstimator;
  private entries: Map<string, ContentUnit> = new Map();
  private cachedConsumed: number | null = null;
  private clock = 0;

  constructor(opts: BudgetLedgerOptions) {
    if (!Number.isInteger(opts.totalCapacity) || opts.totalCapacity <= 0) {
      throw new InvalidInputError(`totalCapacity must be a positive integer, got ${opts.totalCapacity}`);
    }
    this.totalCapacity = opts.totalCapacity;
    this.estimator = opts.estimator ?? new CostEstimator();
  }

  // ─── Writes ─────────────────────────────────────────────────────

  /**
   * Add a unit, or replace the unit with the same identifier.
   */
  register(input: UnitInput): ContentUnit {
    if (!input.identifier) {
      throw new InvalidInputError('identifier must be a non-empty string');
    }
    if (!isTier(input.tier)) {
      throw new InvalidInputError(`Tier for ${input.identifier} must be an integer 1-5, got ${input.tier}`);
    }

    const estimatedCost = this.estimator.estimate(input.rawSize, input.category);
    const lastTouched = input.lastTouched ?? this.tick();
    if (lastTouched > this.clock) this.clock = lastTouched;

    const unit: ContentUnit = {
      identifier: input.identifier,
      category: input.category,
      rawSize: input.rawSize,
      estimatedCost,
      tier: input.tier,
      lastTouched,
      summarized: input.summarized ?? false,
    };

    this.entries.set(unit.identifier, unit);
    this.cachedConsumed = null;
    return { ...unit };
  }

  /**
   * Remove a unit. Absent identifiers are a no-op.
   */
  deregister(identifier: string): boolean {
    const removed = this.entries.delete(identifier);
    if (removed) this.cachedConsumed = null;
    return removed;
  }

  /**
   * Mark a unit as just used, moving it to the back of the eviction order.
   */
  touch(identifier: string): ContentUnit {
    const unit = this.require(identifier);
    unit.lastTouched = this.tick();
    return { ...unit };
  }

  /**
   * Explicit reclassification: the only way a unit's tier changes.
   */
  reclassify(identifier: string, tier: Tier): ContentUnit {
    if (!isTier(tier)) {
      throw new InvalidInputError(`Tier for ${identifier} must be an integer 1-5, got ${tier}`);
    }
    const unit = this.require(identifier);
    unit.tier = tier;
    return { ...unit };
  }

  /**
   * Change a unit's size or category. Cost is recomputed.
   */
  resize(identifier: string, rawSize: number, category?: Category): ContentUnit {
    const unit = this.require(identifier);
    const nextCategory = category ?? unit.category;
    unit.estimatedCost = this.estimator.estimate(rawSize, nextCategory);
    unit.rawSize = rawSize;
    unit.category = nextCategory;
    this.cachedConsumed = null;
    return { ...unit };
  }

  // ─── Reads ──────────────────────────────────────────────────────

  get consumed(): number {
    if (this.cachedConsumed === null) {
      let total = 0;
      for (const unit of this.entries.values()) total += unit.estimatedCost;
      this.cachedConsumed = total;
    }
    return this.cachedConsumed;
  }

  get size(): number {
    return this.entries.size;
  }

  get(identifier: string): Readonly<ContentUnit> | undefined {
    const unit = this.entries.get(identifier);
    return unit ? { ...unit } : undefined;
  }

  has(identifier: string): boolean {
    return this.entries.has(identifier);
  }

  /**
   * Units in registration order.
   */
  units(): ContentUnit[] {
    return Array.from(this.entries.values(), unit => ({ ...unit }));
  }

  /**
   * consumed / totalCapacity, unclamped: may exceed 1.
   */
  utilization(): number {
    return this.consumed / this.totalCapacity;
  }

  /**
   * Utilization clamped to [0, 1], for display only.
   */
  displayUtilization(): number {
    return Math.min(Math.max(this.utilization(), 0), 1);
  }

  /**
   * Remaining tokens; negative when over capacity.
   */
  freeCapacity(): number {
    return this.totalCapacity - this.consumed;
  }

  getEstimator(): CostEstimator {
    return this.estimator;
  }

  // ─── Copies ─────────────────────────────────────────────────────

  /**
   * Independent mutable copy sharing the estimator.
   */
  clone(): BudgetLedger {
    const copy = new BudgetLedger({ totalCapacity: this.totalCapacity, estimator: this.estimator });
    for (const unit of this.entries.values()) {
      copy.entries.set(unit.identifier, { ...unit });
    }
    copy.clock = this.clock;
    return copy;
  }

  /**
   * Immutable copy for planning. Later writes to this ledger are not
   * visible through it, and it cannot be written to.
   */
  snapshot(): ReadonlyLedger {
    return new LedgerSnapshot(this.clone());
  }

  // ─── Private ────────────────────────────────────────────────────

  private require(identifier: string): ContentUnit {
    const unit = this.entries.get(identifier);
    if (!unit) throw new UnknownUnitError(identifier);
    return unit;
  }

  private tick(): number {
    return ++this.clock;
  }
}

class LedgerSnapshot implements ReadonlyLedger {
  readonly totalCapacity: number;
  readonly size: number;
  readonly consumed: number;
  private readonly frozenUnits: ReadonlyArray<Readonly<ContentUnit>>;
  private readonly byId: ReadonlyMap<string, Readonly<ContentUnit>>;
  private readonly source: BudgetLedger;

  constructor(source: BudgetLedger) {
    this.source = source;
    this.totalCapacity = source.totalCapacity;
    this.size = source.size;
    this.consumed = source.consumed;
    this.frozenUnits = Object.freeze(source.units().map(unit => Object.freeze(unit)));
    this.byId = new Map(this.frozenUnits.map(unit => [unit.identifier, unit]));
    Object.freeze(this);
  }

  get(identifier: string): Readonly<ContentUnit> | undefined {
    return this.byId.get(identifier);
  }

  has(identifier: string): boolean {
    return this.byId.has(identifier);
  }

  units(): ReadonlyArray<Readonly<ContentUnit>> {
    return this.frozenUnits;
  }

  utilization(): number {
    return this.consumed / this.totalCapacity;
  }

  displayUtilization(): number {
    return Math.min(Math.max(this.utilization(), 0), 1);
  }

  freeCapacity(): number {
    return this.totalCapacity - this.consumed;
  }

  getEstimator(): CostEstimator {
    return this.source.getEstimator();
  }

  clone(): BudgetLedger {
    return this.source.clone();
  }
}
