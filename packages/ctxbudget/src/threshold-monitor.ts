/**
 * Threshold Monitor — map utilization onto a band
 *
 *   healthy   utilization <  safe
 *   caution   safe     <= utilization < warning    monitor, no action
 *   warning   warning  <= utilization < critical   compaction recommended
 *   critical  critical <= utilization              compaction required
 *
 * Stateless: every evaluation is a pure function of the current utilization.
 * For stability near a boundary, wrap it in HysteresisMonitor instead of
 * adding history here.
 */

import type { ThresholdAction, ThresholdPolicy, ThresholdState } from '@contextstack/shared';
import type { ReadonlyLedger } from './budget-ledger.js';
import { InvalidInputError } from './errors.js';

export const DEFAULT_THRESHOLDS: ThresholdPolicy = {
  safe: 70,
  warning: 75,
  critical: 80,
};

const STATE_ORDER: ThresholdState[] = ['healthy', 'caution', 'warning', 'critical'];

const STATE_ACTIONS: Record<ThresholdState, ThresholdAction> = {
  healthy: 'none',
  caution: 'monitor',
  warning: 'compact',
  critical: 'compact_required',
};

export interface BoundaryInfo {
  state: ThresholdState;
  utilization: number; // fraction where that band starts
  tokens: number;      // consumption where that band starts
}

export interface ThresholdEvaluation {
  state: ThresholdState;
  action: ThresholdAction;
  utilization: number;
  consumed: number;
  totalCapacity: number;
  policy: ThresholdPolicy;
  /** Next band up, or null when already critical. */
  nextBoundary: BoundaryInfo | null;
  /** Tokens left before entering the next band; 0 when critical. */
  tokensToNextBoundary: number;
  /** Tokens above the warning line (0 below it). */
  tokensOverWarning: number;
  /** Tokens above the safe line (0 below it). */
  tokensOverSafe: number;
}

export function validateThresholds(policy: ThresholdPolicy): ThresholdPolicy {
  const { safe, warning, critical } = policy;
  for (const [name, value] of Object.entries(policy)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidInputError(`Threshold "${name}" must be a number, got ${String(value)}`);
    }
  }
  if (!(safe > 0 && safe < warning && warning < critical && critical <= 100)) {
    throw new InvalidInputError(
      `Thresholds must satisfy 0 < safe < warning < critical <= 100, got ${safe}/${warning}/${critical}`,
    );
  }
  return { safe, warning, critical };
}

export function stateRank(state: ThresholdState): number {
  return STATE_ORDER.indexOf(state);
}

export class ThresholdMonitor {
  private policy: ThresholdPolicy;

  constructor(policy: ThresholdPolicy = DEFAULT_THRESHOLDS) {
    this.policy = validateThresholds(policy);
  }

  getPolicy(): ThresholdPolicy {
    return { ...this.policy };
  }

  /**
   * Band for a raw utilization fraction.
   */
  classify(utilization: number): ThresholdState {
    return this.bandFor(utilization, 1);
  }

  evaluate(ledger: ReadonlyLedger): ThresholdEvaluation {
    return this.evaluateUsage(ledger.consumed, ledger.totalCapacity);
  }

  evaluateUsage(consumed: number, totalCapacity: number): ThresholdEvaluation {
    if (!Number.isFinite(totalCapacity) || totalCapacity <= 0) {
      throw new InvalidInputError(`totalCapacity must be positive, got ${totalCapacity}`);
    }

    return this.evaluateInState(this.bandFor(consumed, totalCapacity), consumed, totalCapacity);
  }

  /**
   * Evaluation figures for a given band, whichever band the usage falls in.
   * Used by wrappers that hold a band longer than the raw value would.
   */
  evaluateInState(state: ThresholdState, consumed: number, totalCapacity: number): ThresholdEvaluation {
    const utilization = consumed / totalCapacity;
    const nextBoundary = this.boundaryAbove(state, totalCapacity);

    return {
      state,
      action: STATE_ACTIONS[state],
      utilization,
      consumed,
      totalCapacity,
      policy: { ...this.policy },
      nextBoundary,
      tokensToNextBoundary: nextBoundary ? Math.max(nextBoundary.tokens - consumed, 0) : 0,
      tokensOverWarning: Math.max(consumed - this.limitTokens('warning', totalCapacity), 0),
      tokensOverSafe: Math.max(consumed - this.limitTokens('safe', totalCapacity), 0),
    };
  }

  /**
   * Token count where a band's threshold sits, rounded down.
   */
  limitTokens(threshold: keyof ThresholdPolicy, totalCapacity: number): number {
    return Math.floor((totalCapacity * this.policy[threshold]) / 100);
  }

  // Compared as consumed * 100 vs pct * capacity so integer budgets land
  // exactly on their boundaries.
  private bandFor(consumed: number, totalCapacity: number): ThresholdState {
    const scaled = consumed * 100;
    if (scaled >= this.policy.critical * totalCapacity) return 'critical';
    if (scaled >= this.policy.warning * totalCapacity) return 'warning';
    if (scaled >= this.policy.safe * totalCapacity) return 'caution';
    return 'healthy';
  }

  private boundaryAbove(state: ThresholdState, totalCapacity: number): BoundaryInfo | null {
    const next = STATE_ORDER[stateRank(state) + 1];
    if (!next) return null;

    const pct = next === 'caution'
      ? this.policy.safe
      : next === 'warning' ? this.policy.warning : this.policy.critical;

    return {
      state: next,
      utilization: pct / 100,
      tokens: Math.ceil((totalCapacity * pct) / 100),
    };
  }
}

// ─── Hysteresis ───────────────────────────────────────────────────

export interface HysteresisOptions {
  /** Percentage points utilization must drop below a boundary before de-escalating. */
  margin?: number;
}

export interface HysteresisEvaluation extends ThresholdEvaluation {
  /** Band the pure monitor reports for the same utilization. */
  rawState: ThresholdState;
  previousState: ThresholdState | null;
  changed: boolean;
}

/**
 * Stateful wrapper around the pure monitor. Escalation is immediate;
 * de-escalation waits until utilization is `margin` points below the
 * boundary of the current band, so 74.9 / 75.1 / 74.9 stays in warning.
 */
export class HysteresisMonitor {
  private monitor: ThresholdMonitor;
  private margin: number;
  private current: ThresholdState | null = null;

  constructor(monitor: ThresholdMonitor, opts?: HysteresisOptions) {
    const margin = opts?.margin ?? 2;
    if (!Number.isFinite(margin) || margin < 0) {
      throw new InvalidInputError(`Hysteresis margin must be a non-negative number, got ${margin}`);
    }
    this.monitor = monitor;
    this.margin = margin;
  }

  evaluate(ledger: ReadonlyLedger): HysteresisEvaluation {
    return this.evaluateUsage(ledger.consumed, ledger.totalCapacity);
  }

  evaluateUsage(consumed: number, totalCapacity: number): HysteresisEvaluation {
    const raw = this.monitor.evaluateUsage(consumed, totalCapacity);
    const previous = this.current;
    let state = raw.state;

    if (previous !== null && stateRank(raw.state) < stateRank(previous)) {
      // Step down one band at a time, each only once clear of its margin.
      const pct = raw.utilization * 100;
      const policy = this.monitor.getPolicy();
      state = previous;
      while (stateRank(state) > stateRank(raw.state)) {
        const floor = bandFloor(state, policy);
        if (pct < floor - this.margin) {
          state = STATE_ORDER[stateRank(state) - 1];
        } else {
          break;
        }
      }
    }

    this.current = state;

    const evaluation = state === raw.state
      ? raw
      : this.monitor.evaluateInState(state, consumed, totalCapacity);

    return {
      ...evaluation,
      rawState: raw.state,
      previousState: previous,
      changed: previous !== state,
    };
  }

  getState(): ThresholdState | null {
    return this.current;
  }

  reset(): void {
    this.current = null;
  }
}

function bandFloor(state: ThresholdState, policy: ThresholdPolicy): number {
  switch (state) {
    case 'critical': return policy.critical;
    case 'warning': return policy.warning;
    case 'caution': return policy.safe;
    case 'healthy': return 0;
  }
}
