/**
 * Workspace scanner — find content files, measure them, read declared tiers
 */

import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join, relative, sep } from 'path';
import { matchesGlob } from '@contextstack/shared';
import type { Tier } from '@contextstack/shared';
import { ContextBudgetError, measure, parseFrontmatterTier } from '@contextstack/ctxbudget';

const SKIP_DIRS = new Set(['node_modules', 'venv', 'dist']);

export interface ScanOptions {
  cwd: string;
  /** Directories searched for `include` matches when no pattern is given. */
  roots: string[];
  include: string;
  /** Search the whole working directory for this glob instead of the roots. */
  pattern?: string;
}

export interface ScannedFile {
  identifier: string;
  path: string;
  rawSize: number;
  declaredTier: Tier | null;
}

export interface ScanFailure {
  identifier: string;
  message: string;
}

export interface ScanResult {
  files: ScannedFile[];
  failures: ScanFailure[];
}

export function findFiles(opts: ScanOptions): string[] {
  const found = new Set<string>();

  if (opts.pattern) {
    const pattern = opts.pattern;
    walk(opts.cwd, opts.cwd, path => matchesGlob(path, pattern), found);
  } else {
    for (const root of opts.roots) {
      const dir = join(opts.cwd, root);
      if (!existsSync(dir) || !statSync(dir).isDirectory()) continue;
      walk(opts.cwd, dir, path => matchesGlob(path, opts.include), found);
    }
  }

  return Array.from(found).sort();
}

/**
 * Read every matching file. A file whose frontmatter is unreadable is
 * reported and left out; the rest are still scanned.
 */
export function scanFiles(opts: ScanOptions): ScanResult {
  const files: ScannedFile[] = [];
  const failures: ScanFailure[] = [];

  for (const identifier of findFiles(opts)) {
    const path = join(opts.cwd, identifier);
    try {
      const text = readFileSync(path, 'utf-8');
      files.push({
        identifier,
        path,
        rawSize: measure(text),
        declaredTier: parseFrontmatterTier(text),
      });
    } catch (err) {
      if (!(err instanceof ContextBudgetError) && !isFsError(err)) throw err;
      failures.push({ identifier, message: err.message });
    }
  }

  return { files, failures };
}

function walk(cwd: string, dir: string, accept: (identifier: string) => boolean, found: Set<string>): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (entry.name.startsWith('.') || SKIP_DIRS.has(entry.name)) continue;
      walk(cwd, full, accept, found);
    } else if (entry.isFile()) {
      const identifier = relative(cwd, full).split(sep).join('/');
      if (accept(identifier)) found.add(identifier);
    }
  }
}

function isFsError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}
