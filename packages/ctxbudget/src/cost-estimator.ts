/**
 * Cost Estimator — characters in, tokens out
 *
 * A heuristic, not an encoder. English prose runs about 4 characters per
 * token; code and other structured text about 3.5, because symbols and
 * indentation tokenize densely.
 *
 * Categories are a divisor table, and picking a category for an identifier is
 * a pluggable function, so new content kinds need no change here.
 */

import type { Category } from '@contextstack/shared';
import { InvalidInputError } from './errors.js';

export type Rounding = 'floor' | 'ceil';

export type CategoryClassifier = (identifier: string) => Category;

export const DEFAULT_DIVISORS: Readonly<Record<string, number>> = {
  prose: 4,
  structured: 3.5,
};

const PROSE_EXTENSIONS = new Set(['md', 'markdown', 'txt', 'rst', 'adoc']);

/**
 * Default category classifier: documentation extensions are prose,
 * everything else (code, config, data, no extension) is structured.
 */
export function categorizeByExtension(identifier: string): Category {
  const base = identifier.slice(identifier.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return 'structured';
  return PROSE_EXTENSIONS.has(base.slice(dot + 1).toLowerCase()) ? 'prose' : 'structured';
}

/**
 * Build a classifier from an extension → category table, falling back to
 * `categorizeByExtension` for extensions not in the table.
 */
export function createExtensionClassifier(overrides: Record<string, Category>): CategoryClassifier {
  const table = new Map(Object.entries(overrides).map(([ext, cat]) => [ext.replace(/^\./, '').toLowerCase(), cat]));
  return (identifier: string) => {
    const base = identifier.slice(identifier.lastIndexOf('/') + 1);
    const dot = base.lastIndexOf('.');
    if (dot > 0) {
      const hit = table.get(base.slice(dot + 1).toLowerCase());
      if (hit) return hit;
    }
    return categorizeByExtension(identifier);
  };
}

export interface CostEstimatorOptions {
  divisors?: Record<string, number>;
  rounding?: Rounding;
}

export class CostEstimator {
  private divisors: Map<string, number>;
  private rounding: Rounding;

  constructor(opts?: CostEstimatorOptions) {
    this.divisors = new Map(Object.entries({ ...DEFAULT_DIVISORS, ...opts?.divisors }));
    for (const [category, divisor] of this.divisors) {
      assertDivisor(category, divisor);
    }
    this.rounding = opts?.rounding ?? 'floor';
  }

  /**
   * Estimated token cost of `rawSize` characters of `category` content.
   */
  estimate(rawSize: number, category: Category): number {
    if (!Number.isInteger(rawSize) || rawSize < 0) {
      throw new InvalidInputError(`rawSize must be a non-negative integer, got ${rawSize}`);
    }
    const divisor = this.divisorFor(category);
    const tokens = rawSize / divisor;
    return this.rounding === 'ceil' ? Math.ceil(tokens) : Math.floor(tokens);
  }

  /**
   * Estimate straight from text. Size is counted in code points, matching
   * what a character count (`wc -m`) reports.
   */
  estimateText(text: string, category: Category): number {
    return this.estimate(measure(text), category);
  }

  divisorFor(category: Category): number {
    const divisor = this.divisors.get(category);
    if (divisor === undefined) {
      throw new InvalidInputError(`Unknown category "${category}"`);
    }
    return divisor;
  }

  /**
   * Register a new category or change a divisor.
   */
  addCategory(category: string, divisor: number): void {
    assertDivisor(category, divisor);
    this.divisors.set(category, divisor);
  }

  categories(): string[] {
    return Array.from(this.divisors.keys());
  }
}

/** Character count in code points. */
export function measure(text: string): number {
  return Array.from(text).length;
}

function assertDivisor(category: string, divisor: number): void {
  if (!Number.isFinite(divisor) || divisor <= 0) {
    throw new InvalidInputError(`Divisor for "${category}" must be a positive number, got ${divisor}`);
  }
}

const defaultEstimator = new CostEstimator();

/**
 * Estimate with the default divisor table and truncating rounding.
 */
export function estimateCost(rawSize: number, category: Category): number {
  return defaultEstimator.estimate(rawSize, category);
}
