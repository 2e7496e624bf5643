/**
 * Report Generator — plain text with fixed section headers
 *
 * Summary, File Breakdown, Detailed Statistics, Compaction Plan,
 * Recommendations. Headers never change so calling tooling can grep them.
 *
 * Pure rendering: the recommendation comes from the evaluation's action,
 * decided by the threshold monitor.
 */

import type { CompactionRecord, ContentUnit, ThresholdAction, ThresholdState } from '@contextstack/shared';
import type { ReadonlyLedger } from './budget-ledger.js';
import type { CompactionPlan } from './compaction-planner.js';
import type { ThresholdEvaluation } from './threshold-monitor.js';

export interface ReportOptions {
  /** Per-unit breakdown. */
  files?: boolean;
  /** Distribution statistics; implies files. */
  verbose?: boolean;
  /** Plan to show, if compaction was attempted. */
  plan?: CompactionPlan;
  title?: string;
}

const RULE = '='.repeat(64);

const STATE_LABELS: Record<ThresholdState, string> = {
  healthy: '[HEALTHY] Well within context limits',
  caution: '[CAUTION] Approaching limits, keep monitoring',
  warning: '[WARNING] Past the warning threshold, compaction recommended',
  critical: '[CRITICAL] Past the critical threshold, compaction required',
};

const SIZE_BANDS: Array<{ label: string; max: number }> = [
  { label: '< 1K tokens: ', max: 1000 },
  { label: '1K - 3K:     ', max: 3000 },
  { label: '3K - 6K:     ', max: 6000 },
  { label: '6K - 10K:    ', max: 10000 },
  { label: '>= 10K:      ', max: Infinity },
];

export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function section(title: string): string[] {
  return [RULE, title, RULE, ''];
}

export function generateReport(
  ledger: ReadonlyLedger,
  evaluation: ThresholdEvaluation,
  opts?: ReportOptions,
): string {
  const units = ledger.units();
  const showFiles = opts?.files === true || opts?.verbose === true;

  const lines: string[] = [
    RULE,
    opts?.title ?? 'Context Budget Report',
    RULE,
    '',
    ...renderSummary(ledger, evaluation),
  ];

  if (showFiles) lines.push(...renderBreakdown(units, ledger.consumed));
  if (opts?.verbose) lines.push(...renderStatistics(units));
  if (opts?.plan) lines.push(...renderPlan(opts.plan));

  lines.push(...renderRecommendations(evaluation, units.length, ledger.consumed));
  lines.push(RULE);

  return lines.join('\n');
}

// ─── Sections ─────────────────────────────────────────────────────

function renderSummary(ledger: ReadonlyLedger, evaluation: ThresholdEvaluation): string[] {
  const over = ledger.utilization() > 1;
  const lines = [
    ...section('Summary'),
    `Total Units: ${ledger.size}`,
    `Estimated Tokens: ${formatNumber(ledger.consumed)}`,
    `Context Window: ${formatNumber(ledger.totalCapacity)} tokens`,
    `Usage: ${formatPercent(ledger.displayUtilization())}${over ? ' (over capacity)' : ''}`,
    `Status: ${STATE_LABELS[evaluation.state]}`,
    `Remaining Capacity: ${formatNumber(Math.max(ledger.freeCapacity(), 0))} tokens`,
  ];

  if (evaluation.nextBoundary) {
    lines.push(
      `Next Threshold: ${evaluation.nextBoundary.state} at ${formatPercent(evaluation.nextBoundary.utilization)} ` +
      `(${formatNumber(evaluation.tokensToNextBoundary)} tokens away)`,
    );
  } else {
    lines.push(`Over Warning Threshold By: ${formatNumber(evaluation.tokensOverWarning)} tokens`);
  }

  lines.push('');
  return lines;
}

function renderBreakdown(units: ReadonlyArray<Readonly<ContentUnit>>, consumed: number): string[] {
  const lines = section('File Breakdown');
  const sorted = [...units].sort((a, b) =>
    b.estimatedCost - a.estimatedCost || a.identifier.localeCompare(b.identifier),
  );

  for (const unit of sorted) {
    const share = consumed > 0 ? (unit.estimatedCost * 100) / consumed : 0;
    lines.push(
      `  ${formatNumber(unit.estimatedCost).padStart(7)} tokens (${share.toFixed(1).padStart(5)}%) ` +
      `[T${unit.tier}] ${unit.identifier}${unit.summarized ? ' (summarized)' : ''}`,
    );
  }

  lines.push('');
  return lines;
}

function renderStatistics(units: ReadonlyArray<Readonly<ContentUnit>>): string[] {
  const lines = section('Detailed Statistics');
  if (units.length === 0) {
    lines.push('No units registered.', '');
    return lines;
  }

  let min = units[0];
  let max = units[0];
  let total = 0;
  for (const unit of units) {
    total += unit.estimatedCost;
    if (unit.estimatedCost < min.estimatedCost) min = unit;
    if (unit.estimatedCost > max.estimatedCost) max = unit;
  }

  lines.push(
    `Average: ${formatNumber(Math.floor(total / units.length))} tokens/unit`,
    `Minimum: ${formatNumber(min.estimatedCost)} tokens (${min.identifier})`,
    `Maximum: ${formatNumber(max.estimatedCost)} tokens (${max.identifier})`,
    '',
    'Size Distribution:',
  );

  const counts = SIZE_BANDS.map(() => 0);
  for (const unit of units) {
    const band = SIZE_BANDS.findIndex(b => unit.estimatedCost < b.max);
    counts[band]++;
  }
  SIZE_BANDS.forEach((band, i) => lines.push(`  ${band.label} ${counts[i]} units`));

  lines.push('', 'Tier Distribution:');
  for (const tier of [1, 2, 3, 4, 5]) {
    const inTier = units.filter(u => u.tier === tier);
    if (inTier.length === 0) continue;
    const tokens = inTier.reduce((sum, u) => sum + u.estimatedCost, 0);
    lines.push(`  Tier ${tier}: ${inTier.length} units, ${formatNumber(tokens)} tokens`);
  }

  lines.push('');
  return lines;
}

function renderPlan(plan: CompactionPlan): string[] {
  const lines = section('Compaction Plan');
  lines.push(`Target: ${formatPercent(plan.targetUtilization)}`);

  if (plan.entries.length === 0) {
    lines.push('Planned Actions: none');
  } else {
    lines.push(`Planned Actions: ${plan.entries.length}`);
    for (const entry of plan.entries) {
      lines.push(`  ${entry.action} ${entry.identifier} (tier ${entry.tier}): frees ${formatNumber(entry.freed)} tokens`);
    }
  }

  for (const skip of plan.skipped) {
    lines.push(`  skipped ${skip.identifier} (${skip.reason})`);
  }

  lines.push(
    `Projected Freed: ${formatNumber(plan.projectedFreed)} tokens`,
    `Projected Usage: ${formatPercent(plan.projectedUtilization)}`,
    plan.targetReached
      ? 'Target Reached: yes'
      : `Target Reached: no (best achievable usage is ${formatPercent(plan.projectedUtilization)})`,
    '',
  );
  return lines;
}

function renderRecommendations(evaluation: ThresholdEvaluation, unitCount: number, consumed: number): string[] {
  const lines = section('Recommendations');
  const safePct = `${evaluation.policy.safe}%`;
  const action: ThresholdAction = evaluation.action;

  switch (action) {
    case 'none': {
      lines.push('Current usage is healthy. No action needed.', '');
      lines.push(`Headroom before ${safePct}: ${formatNumber(evaluation.tokensToNextBoundary)} tokens`);
      const average = unitCount > 0 ? Math.floor(consumed / unitCount) : 0;
      if (average > 0) {
        lines.push(`Approximately ${Math.floor(evaluation.tokensToNextBoundary / average)} more average-sized units`);
      }
      break;
    }
    case 'monitor':
      lines.push(
        'Approaching context limits. Consider:',
        '',
        '1. Load only tier 1 units at session start',
        '2. Load tier 3-5 units on demand',
        '3. Prefer quick references over full guides',
        '',
        `Headroom before ${evaluation.policy.warning}%: ${formatNumber(evaluation.tokensToNextBoundary)} tokens`,
      );
      break;
    case 'compact':
      lines.push(
        'Compaction recommended:',
        '',
        '1. Archive tier 4-5 units not needed right now',
        '2. Summarize large tier 2-3 units',
        '3. Keep tier 1 units loaded',
        '',
        `Need to reduce by: ${formatNumber(evaluation.tokensOverSafe)} tokens to return to ${safePct}`,
      );
      break;
    case 'compact_required':
      lines.push(
        'Context usage too high! Compact before registering more content:',
        '',
        '1. Keep only tier 1 units loaded',
        '2. Archive all tier 4-5 units',
        '3. Summarize tier 2-3 units',
        '',
        `Need to reduce by: ${formatNumber(evaluation.tokensOverSafe)} tokens to return to ${safePct}`,
      );
      break;
  }

  lines.push('');
  return lines;
}

// ─── History ──────────────────────────────────────────────────────

export function formatHistory(records: CompactionRecord[]): string {
  const lines: string[] = ['', '=== Compaction History ===', ''];

  if (records.length === 0) {
    lines.push('  No compactions recorded.');
    return lines.join('\n');
  }

  for (const record of records) {
    const archived = record.unitsAffected.filter(a => a.action === 'archive').length;
    const summarized = record.unitsAffected.length - archived;
    const resulting = formatPercent(record.resultingConsumed / record.totalCapacity);
    lines.push(
      `  ${record.timestamp}  ${record.recordId}`,
      `    freed ${formatNumber(record.tokensFreed)} tokens (${archived} archived, ${summarized} summarized), ` +
      `now ${formatNumber(record.resultingConsumed)} tokens (${resulting}), ` +
      `target ${formatPercent(record.targetUtilization)} ${record.targetReached ? 'reached' : 'not reached'}`,
    );
  }

  return lines.join('\n');
}
