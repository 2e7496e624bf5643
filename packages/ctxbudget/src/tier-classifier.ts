/**
 * Tier Classifier — which content must stay, which can go first
 *
 * A unit's declared tier (frontmatter `tier: N`) wins. Otherwise the rule
 * table is walked in order and the first matching pattern decides. No match
 * means tier 3, working content.
 *
 * The rule table is data: ordered, versioned, passed in as configuration.
 */

import yaml from 'js-yaml';
import { isTier, matchesGlob } from '@contextstack/shared';
import type { Tier } from '@contextstack/shared';
import { InvalidInputError } from './errors.js';

export interface TierRule {
  pattern: string;
  tier: Tier;
  description?: string;
}

export interface TierRuleTable {
  version: string;
  rules: TierRule[];
}

export const FALLBACK_TIER: Tier = 3;

// ─── Default Rules ────────────────────────────────────────────────
// Session protocol and the non-negotiable rules load every session;
// subagent prompts load on demand only.

export const DEFAULT_TIER_RULES: TierRuleTable = {
  version: '2.0',
  rules: [
    { pattern: 'CLAUDE.md', tier: 1, description: 'Session protocol' },
    { pattern: 'start-here.md', tier: 1, description: 'Orientation' },
    { pattern: 'development-rules.md', tier: 1, description: 'Non-negotiable rules' },
    { pattern: 'READING-ORDER.md', tier: 1, description: 'Reading sequence' },
    { pattern: 'current-iteration.md', tier: 1, description: 'Current work' },
    { pattern: 'session-state.md', tier: 1, description: 'Session continuity' },
    { pattern: '**/subagents/**', tier: 5, description: 'On-demand subagents' },
    { pattern: '**/quick-ref/**', tier: 4, description: 'Quick references' },
    { pattern: '**/guides/**', tier: 4, description: 'Guides' },
    { pattern: '**/research/**', tier: 4, description: 'Research templates' },
    { pattern: 'session-checklist.md', tier: 2, description: 'Session procedures' },
    { pattern: 'context-priority.md', tier: 2, description: 'Context management' },
    { pattern: 'technical-decisions.md', tier: 2, description: 'Decision records' },
    { pattern: 'service-registry.md', tier: 2, description: 'Service catalog' },
    { pattern: '*-template.md', tier: 4, description: 'Templates' },
    { pattern: '**/templates/**', tier: 3, description: 'Working templates' },
  ],
};

export interface Classification {
  tier: Tier;
  source: 'declared' | 'rule' | 'fallback';
  rule: TierRule | null;
}

export class TierClassifier {
  private table: TierRuleTable;

  constructor(table: TierRuleTable = DEFAULT_TIER_RULES) {
    for (const rule of table.rules) {
      if (!rule.pattern) {
        throw new InvalidInputError('Tier rule pattern must be a non-empty string');
      }
      assertTier(rule.tier, `rule "${rule.pattern}"`);
    }
    this.table = { version: table.version, rules: table.rules.map(r => ({ ...r })) };
  }

  classify(identifier: string, declaredTier?: number | null): Tier {
    return this.explain(identifier, declaredTier).tier;
  }

  /**
   * Same decision as `classify`, plus where it came from.
   */
  explain(identifier: string, declaredTier?: number | null): Classification {
    if (declaredTier !== undefined && declaredTier !== null) {
      return { tier: assertTier(declaredTier, identifier), source: 'declared', rule: null };
    }

    for (const rule of this.table.rules) {
      if (matchesGlob(identifier, rule.pattern)) {
        return { tier: rule.tier, source: 'rule', rule };
      }
    }

    return { tier: FALLBACK_TIER, source: 'fallback', rule: null };
  }

  getRules(): TierRuleTable {
    return { version: this.table.version, rules: this.table.rules.map(r => ({ ...r })) };
  }
}

function assertTier(value: number, context: string): Tier {
  if (!isTier(value)) {
    throw new InvalidInputError(`Tier for ${context} must be an integer 1-5, got ${value}`);
  }
  return value;
}

/**
 * Read the `tier` key from a leading YAML frontmatter block.
 * Returns null when there is no frontmatter or no tier key; an unparseable
 * block or an out-of-range tier is an InvalidInputError.
 */
export function parseFrontmatterTier(text: string): Tier | null {
  const match = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/.exec(text);
  if (!match) return null;

  let meta: unknown;
  try {
    meta = yaml.load(match[1]);
  } catch (err) {
    throw new InvalidInputError(`Frontmatter parse error: ${(err as Error).message}`);
  }

  if (!meta || typeof meta !== 'object' || Array.isArray(meta) || !('tier' in meta)) {
    return null;
  }

  const tier = meta.tier;
  if (typeof tier !== 'number') {
    throw new InvalidInputError(`Frontmatter tier must be a number, got ${JSON.stringify(tier)}`);
  }
  return assertTier(tier, 'frontmatter');
}
