/**
 * ctxscan configuration
 *
 * `.contextstack/budget.yaml` (or $CONTEXTSTACK_CONFIG), merged over the
 * defaults. Every problem in the file is collected and reported together.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { isTier } from '@contextstack/shared';
import type { ThresholdPolicy } from '@contextstack/shared';
import { DEFAULT_THRESHOLDS, DEFAULT_TIER_RULES, DEFAULT_SUMMARY_RAW_SIZE } from '@contextstack/ctxbudget';
import type { Rounding, TierRule, TierRuleTable } from '@contextstack/ctxbudget';

export interface BudgetConfig {
  capacity: number;
  thresholds: ThresholdPolicy;
  summaryRawSize: number;
  rounding: Rounding;
  targetPercent: number;
  roots: string[];
  include: string;
  tierRules: TierRuleTable;
  divisors: Record<string, number>;
  extensions: Record<string, string>;
}

export const DEFAULT_BUDGET_CONFIG: BudgetConfig = {
  capacity: 200_000,
  thresholds: DEFAULT_THRESHOLDS,
  summaryRawSize: DEFAULT_SUMMARY_RAW_SIZE,
  rounding: 'floor',
  targetPercent: 65,
  roots: ['.claude', 'docs', 'planning'],
  include: '*.md',
  tierRules: DEFAULT_TIER_RULES,
  divisors: {},
  extensions: {},
};

export type ConfigResult =
  | { ok: true; config: BudgetConfig; source: string | null }
  | { ok: false; errors: string[] };

export function resolveConfigPath(cwd: string, explicit?: string): string {
  return explicit || process.env.CONTEXTSTACK_CONFIG || join(cwd, '.contextstack', 'budget.yaml');
}

export function resolveDbPath(cwd: string, explicit?: string): string {
  return explicit || process.env.CONTEXTSTACK_DB || join(cwd, '.contextstack', 'context.db');
}

/**
 * Load config from disk. A missing file means defaults; an explicitly
 * named file that is missing is an error.
 */
export function loadConfig(cwd: string, explicit?: string): ConfigResult {
  const path = resolveConfigPath(cwd, explicit);

  if (!existsSync(path)) {
    if (explicit) return { ok: false, errors: [`Config file not found: ${path}`] };
    return { ok: true, config: DEFAULT_BUDGET_CONFIG, source: null };
  }

  const result = parseConfig(readFileSync(path, 'utf-8'));
  return result.ok ? { ...result, source: path } : result;
}

export function formatConfigErrors(errors: string[]): string {
  return ['Invalid configuration:', ...errors.map(e => `  - ${e}`)].join('\n');
}

export function parseConfig(yamlString: string): ConfigResult {
  let raw: unknown;
  try {
    raw = yaml.load(yamlString);
  } catch (err) {
    return { ok: false, errors: [`YAML parse error: ${(err as Error).message}`] };
  }

  // An empty file is a valid, empty config
  if (raw === undefined || raw === null) {
    return { ok: true, config: DEFAULT_BUDGET_CONFIG, source: null };
  }

  return validateConfig(raw);
}

export function validateConfig(raw: unknown): ConfigResult {
  if (!isRecord(raw)) {
    return { ok: false, errors: ['Config must be an object'] };
  }

  const errors: string[] = [];
  const config: BudgetConfig = {
    ...DEFAULT_BUDGET_CONFIG,
    thresholds: { ...DEFAULT_BUDGET_CONFIG.thresholds },
  };

  if (raw.capacity !== undefined) {
    if (isPositiveInteger(raw.capacity)) config.capacity = raw.capacity;
    else errors.push('"capacity" must be a positive integer');
  }

  if (raw.thresholds !== undefined) {
    if (!isRecord(raw.thresholds)) {
      errors.push('"thresholds" must be an object');
    } else {
      for (const key of ['safe', 'warning', 'critical'] as const) {
        const value = raw.thresholds[key];
        if (value === undefined) continue;
        if (typeof value === 'number' && Number.isFinite(value)) config.thresholds[key] = value;
        else errors.push(`"thresholds.${key}" must be a number`);
      }
      const { safe, warning, critical } = config.thresholds;
      if (!(safe > 0 && safe < warning && warning < critical && critical <= 100)) {
        errors.push('"thresholds" must satisfy 0 < safe < warning < critical <= 100');
      }
    }
  }

  if (raw.summaryRawSize !== undefined) {
    if (Number.isInteger(raw.summaryRawSize) && typeof raw.summaryRawSize === 'number' && raw.summaryRawSize >= 0) {
      config.summaryRawSize = raw.summaryRawSize;
    } else {
      errors.push('"summaryRawSize" must be a non-negative integer');
    }
  }

  if (raw.rounding !== undefined) {
    if (raw.rounding === 'floor' || raw.rounding === 'ceil') config.rounding = raw.rounding;
    else errors.push('"rounding" must be "floor" or "ceil"');
  }

  if (raw.targetPercent !== undefined) {
    if (typeof raw.targetPercent === 'number' && raw.targetPercent >= 0 && raw.targetPercent <= 100) {
      config.targetPercent = raw.targetPercent;
    } else {
      errors.push('"targetPercent" must be a number between 0 and 100');
    }
  }

  if (raw.roots !== undefined) {
    if (Array.isArray(raw.roots) && raw.roots.every(r => typeof r === 'string' && r.length > 0)) {
      config.roots = raw.roots.map(String);
    } else {
      errors.push('"roots" must be an array of non-empty strings');
    }
  }

  if (raw.include !== undefined) {
    if (typeof raw.include === 'string' && raw.include.length > 0) config.include = raw.include;
    else errors.push('"include" must be a non-empty string');
  }

  if (raw.tierRules !== undefined) {
    const table = validateTierRules(raw.tierRules, errors);
    if (table) config.tierRules = table;
  }

  if (raw.divisors !== undefined) {
    const divisors = validateNumberMap(raw.divisors, 'divisors', errors);
    if (divisors) config.divisors = divisors;
  }

  if (raw.extensions !== undefined) {
    if (!isRecord(raw.extensions)) {
      errors.push('"extensions" must be an object');
    } else {
      const extensions: Record<string, string> = {};
      for (const [ext, category] of Object.entries(raw.extensions)) {
        if (typeof category === 'string' && category.length > 0) extensions[ext] = category;
        else errors.push(`"extensions.${ext}" must be a category name`);
      }
      config.extensions = extensions;
    }
  }

  const knownCategories = new Set(['prose', 'structured', ...Object.keys(config.divisors)]);
  for (const [ext, category] of Object.entries(config.extensions)) {
    if (!knownCategories.has(category)) {
      errors.push(`"extensions.${ext}" refers to unknown category "${category}"`);
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, config, source: null };
}

function validateTierRules(raw: unknown, errors: string[]): TierRuleTable | null {
  if (!isRecord(raw)) {
    errors.push('"tierRules" must be an object with "version" and "rules"');
    return null;
  }

  const version = raw.version === undefined ? '1' : String(raw.version);
  if (!Array.isArray(raw.rules)) {
    errors.push('"tierRules.rules" must be an array');
    return null;
  }

  const rules: TierRule[] = [];
  raw.rules.forEach((rule: unknown, i: number) => {
    if (!isRecord(rule) || typeof rule.pattern !== 'string' || rule.pattern.length === 0) {
      errors.push(`"tierRules.rules[${i}].pattern" must be a non-empty string`);
      return;
    }
    if (!isTier(rule.tier)) {
      errors.push(`"tierRules.rules[${i}].tier" must be an integer 1-5`);
      return;
    }
    rules.push({
      pattern: rule.pattern,
      tier: rule.tier,
      description: typeof rule.description === 'string' ? rule.description : undefined,
    });
  });

  return { version, rules };
}

function validateNumberMap(raw: unknown, name: string, errors: string[]): Record<string, number> | null {
  if (!isRecord(raw)) {
    errors.push(`"${name}" must be an object`);
    return null;
  }
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) out[key] = value;
    else errors.push(`"${name}.${key}" must be a positive number`);
  }
  return out;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
