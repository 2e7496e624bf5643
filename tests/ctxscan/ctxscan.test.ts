/**
 * ctxscan Test Suite — workspace scanning and the CLI commands
 *
 * Every test builds its own workspace under a temp directory:
 *
 *   .claude/CLAUDE.md                800 chars  → 200 tokens, tier 1 (rule)
 *   .claude/subagents/reviewer.md   1200 chars  → 300 tokens, tier 5 (rule)
 *   docs/architecture.md             400 chars  → 100 tokens, tier 2 (frontmatter)
 *   docs/guides/setup.md            1600 chars  → 400 tokens, tier 4 (rule)
 *   docs/.hidden/secret.md, node_modules/pkg/readme.md, src/app.ts  (never scanned)
 *   README.md                         40 chars  →  10 tokens, only reached by --pattern
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

import { ContextStore } from '@contextstack/shared';
import {
  DEFAULT_BUDGET_CONFIG,
  compact,
  estimate,
  findFiles,
  history,
  loadConfig,
  parseArgs,
  parseConfig,
  scanFiles,
  validateConfig,
} from '@contextstack/ctxscan';
import type { BudgetConfig } from '@contextstack/ctxscan';

// ─── Test Helpers ─────────────────────────────────────────────────

let tempDir: string;

function write(relativePath: string, content: string): void {
  const full = join(tempDir, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
}

function seedWorkspace(): void {
  write('.claude/CLAUDE.md', 'c'.repeat(800));
  write('.claude/subagents/reviewer.md', 'r'.repeat(1200));
  write('docs/architecture.md', '---\ntier: 2\n---\n' + 'a'.repeat(384));
  write('docs/guides/setup.md', 's'.repeat(1600));
  write('docs/.hidden/secret.md', 'h'.repeat(400));
  write('node_modules/pkg/readme.md', 'n'.repeat(400));
  write('src/app.ts', 'const x = 1;\n');
  write('README.md', 'm'.repeat(40));
}

function withCapacity(capacity: number): BudgetConfig {
  return { ...DEFAULT_BUDGET_CONFIG, capacity };
}

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'ctxscan-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

// ─── Config ───────────────────────────────────────────────────────

describe('Config', () => {
  it('uses defaults when no file exists', () => {
    const result = loadConfig(tempDir);
    expect(result).toEqual({ ok: true, config: DEFAULT_BUDGET_CONFIG, source: null });
  });

  it('treats an empty file as an empty config', () => {
    const result = parseConfig('');
    expect(result.ok && result.config.capacity).toBe(200_000);
  });

  it('merges file values over defaults', () => {
    write('.contextstack/budget.yaml', [
      'capacity: 100000',
      'thresholds:',
      '  safe: 60',
      'rounding: ceil',
      'roots: [notes]',
      'divisors:',
      '  data: 3',
      'extensions:',
      '  json: data',
    ].join('\n'));

    const result = loadConfig(tempDir);
    if (!result.ok) throw new Error(result.errors.join('; '));

    expect(result.source).toBe(join(tempDir, '.contextstack', 'budget.yaml'));
    expect(result.config.capacity).toBe(100_000);
    expect(result.config.thresholds).toEqual({ safe: 60, warning: 75, critical: 80 });
    expect(result.config.rounding).toBe('ceil');
    expect(result.config.roots).toEqual(['notes']);
    expect(result.config.include).toBe('*.md');
    expect(result.config.divisors).toEqual({ data: 3 });
    expect(result.config.extensions).toEqual({ json: 'data' });
    expect(DEFAULT_BUDGET_CONFIG.thresholds.safe).toBe(70);
  });

  it('collects every problem in the file', () => {
    const result = validateConfig({
      capacity: -5,
      rounding: 'round',
      thresholds: { safe: 80 },
      extensions: { json: 'data' },
    });

    expect(result).toEqual({
      ok: false,
      errors: [
        '"capacity" must be a positive integer',
        '"thresholds" must satisfy 0 < safe < warning < critical <= 100',
        '"rounding" must be "floor" or "ceil"',
        '"extensions.json" refers to unknown category "data"',
      ],
    });
  });

  it('validates tier rules', () => {
    const good = validateConfig({
      tierRules: { version: 3, rules: [{ pattern: 'NOTES.md', tier: 1, description: 'Notes' }] },
    });
    expect(good.ok && good.config.tierRules).toEqual({
      version: '3',
      rules: [{ pattern: 'NOTES.md', tier: 1, description: 'Notes' }],
    });

    const bad = validateConfig({ tierRules: { rules: [{ pattern: '', tier: 1 }, { pattern: 'a.md', tier: 6 }] } });
    expect(bad).toEqual({
      ok: false,
      errors: [
        '"tierRules.rules[0].pattern" must be a non-empty string',
        '"tierRules.rules[1].tier" must be an integer 1-5',
      ],
    });
  });

  it('reports YAML syntax errors and non-object documents', () => {
    const broken = parseConfig('capacity: [1');
    expect(broken.ok).toBe(false);
    expect(!broken.ok && broken.errors[0].startsWith('YAML parse error:')).toBe(true);

    expect(parseConfig('just a string')).toEqual({ ok: false, errors: ['Config must be an object'] });
  });

  it('fails when an explicitly named file is missing', () => {
    const path = join(tempDir, 'missing.yaml');
    expect(loadConfig(tempDir, path)).toEqual({ ok: false, errors: [`Config file not found: ${path}`] });
  });
});

// ─── Args ─────────────────────────────────────────────────────────

describe('parseArgs', () => {
  it('defaults to estimate', () => {
    expect(parseArgs([])).toEqual({
      ok: true,
      args: { command: 'estimate', files: false, verbose: false, dryRun: false },
    });
  });

  it('reads estimate flags', () => {
    const result = parseArgs(['--tier', '2', '--files', '--pattern', '*.md']);
    expect(result.ok && result.args).toMatchObject({ command: 'estimate', tier: 2, files: true, pattern: '*.md' });
  });

  it('lets --verbose imply --files', () => {
    const result = parseArgs(['-v']);
    expect(result.ok && result.args).toMatchObject({ verbose: true, files: true });
  });

  it('reads compact and history flags', () => {
    const compactArgs = parseArgs(['compact', '--target', '65', '--dry-run', '--db', 'x.db']);
    expect(compactArgs.ok && compactArgs.args).toMatchObject({ command: 'compact', target: 65, dryRun: true, db: 'x.db' });

    const historyArgs = parseArgs(['history', '--limit', '5']);
    expect(historyArgs.ok && historyArgs.args).toMatchObject({ command: 'history', limit: 5 });
  });

  it('switches to help on --help anywhere', () => {
    const result = parseArgs(['estimate', '--tier', '1', '--help']);
    expect(result.ok && result.args.command).toBe('help');
  });

  it('rejects bad values and unknown input', () => {
    expect(parseArgs(['--tier', '7'])).toEqual({ ok: false, error: '--tier requires a number between 1 and 5' });
    expect(parseArgs(['--tier'])).toEqual({ ok: false, error: '--tier requires a number between 1 and 5' });
    expect(parseArgs(['compact', '--target', '150'])).toEqual({
      ok: false,
      error: '--target requires a percentage between 0 and 100',
    });
    expect(parseArgs(['history', '--limit', '0'])).toEqual({ ok: false, error: '--limit requires a positive integer' });
    expect(parseArgs(['bogus'])).toEqual({ ok: false, error: 'Unknown command: bogus' });
    expect(parseArgs(['--nope'])).toEqual({ ok: false, error: 'Unknown option: --nope' });
  });
});

// ─── Scanner ──────────────────────────────────────────────────────

describe('Scanner', () => {
  beforeEach(seedWorkspace);

  it('finds markdown under the configured roots', () => {
    const files = findFiles({ cwd: tempDir, roots: ['.claude', 'docs', 'planning'], include: '*.md' });
    expect(files).toEqual([
      '.claude/CLAUDE.md',
      '.claude/subagents/reviewer.md',
      'docs/architecture.md',
      'docs/guides/setup.md',
    ]);
  });

  it('searches the working directory for a pattern, skipping dot and dependency dirs', () => {
    const files = findFiles({ cwd: tempDir, roots: [], include: '*.md', pattern: '*.md' });
    expect(files).toEqual(['README.md', 'docs/architecture.md', 'docs/guides/setup.md']);

    expect(findFiles({ cwd: tempDir, roots: [], include: '*.md', pattern: 'src/*.ts' })).toEqual(['src/app.ts']);
  });

  it('measures files and reads declared tiers', () => {
    const result = scanFiles({ cwd: tempDir, roots: ['docs'], include: '*.md' });
    expect(result.failures).toEqual([]);
    expect(result.files.map(f => [f.identifier, f.rawSize, f.declaredTier])).toEqual([
      ['docs/architecture.md', 400, 2],
      ['docs/guides/setup.md', 1600, null],
    ]);
  });

  it('reports a file with a bad frontmatter tier and keeps scanning', () => {
    write('docs/broken.md', '---\ntier: 9\n---\nbody');
    const result = scanFiles({ cwd: tempDir, roots: ['docs'], include: '*.md' });

    expect(result.files.map(f => f.identifier)).toEqual(['docs/architecture.md', 'docs/guides/setup.md']);
    expect(result.failures).toEqual([
      { identifier: 'docs/broken.md', message: 'Tier for frontmatter must be an integer 1-5, got 9' },
    ]);
  });
});

// ─── estimate ─────────────────────────────────────────────────────

describe('ctxscan estimate', () => {
  it('reports a healthy workspace and exits 0', async () => {
    seedWorkspace();
    const result = await estimate({ cwd: tempDir, config: withCapacity(2000) });

    expect(result.unitCount).toBe(4);
    expect(result.evaluation?.consumed).toBe(1000);
    expect(result.evaluation?.state).toBe('healthy');
    expect(result.exitCode).toBe(0);

    const lines = result.report.split('\n');
    expect(lines[1]).toBe('Context Budget Report');
    expect(lines).toContain('Total Units: 4');
    expect(lines).toContain('Estimated Tokens: 1,000');
    expect(lines).toContain('Usage: 50.0%');
    expect(lines).not.toContain('File Breakdown');
  });

  it('exits 1 at or above the warning threshold', async () => {
    seedWorkspace();
    const result = await estimate({ cwd: tempDir, config: withCapacity(1250) });

    expect(result.evaluation?.state).toBe('critical');
    expect(result.exitCode).toBe(1);
    expect(result.report.split('\n')).toContain('Status: [CRITICAL] Past the critical threshold, compaction required');
  });

  it('reads capacity from the workspace config file', async () => {
    seedWorkspace();
    write('.contextstack/budget.yaml', 'capacity: 1250\n');

    const result = await estimate({ cwd: tempDir });
    expect(result.evaluation?.totalCapacity).toBe(1250);
    expect(result.exitCode).toBe(1);
  });

  it('shows the per-file breakdown with tiers', async () => {
    seedWorkspace();
    const result = await estimate({ cwd: tempDir, config: withCapacity(2000), files: true });
    const lines = result.report.split('\n');
    const start = lines.indexOf('File Breakdown');

    expect(lines.slice(start + 3, start + 7)).toEqual([
      '      400 tokens ( 40.0%) [T4] docs/guides/setup.md',
      '      300 tokens ( 30.0%) [T5] .claude/subagents/reviewer.md',
      '      200 tokens ( 20.0%) [T1] .claude/CLAUDE.md',
      '      100 tokens ( 10.0%) [T2] docs/architecture.md',
    ]);
  });

  it('restricts to one tier', async () => {
    seedWorkspace();
    const result = await estimate({ cwd: tempDir, config: withCapacity(2000), tier: 4 });

    expect(result.unitCount).toBe(1);
    expect(result.evaluation?.consumed).toBe(400);
    expect(result.report.split('\n')[1]).toBe('Context Budget Report (Tier 4)');
  });

  it('scans by pattern instead of the roots', async () => {
    seedWorkspace();
    const result = await estimate({ cwd: tempDir, config: withCapacity(2000), pattern: '*.md' });

    expect(result.unitCount).toBe(3);
    expect(result.evaluation?.consumed).toBe(510);
  });

  it('passes unreadable files through as failures', async () => {
    seedWorkspace();
    write('docs/broken.md', '---\ntier: [2\n---\n');

    const result = await estimate({ cwd: tempDir, config: withCapacity(2000) });
    expect(result.unitCount).toBe(4);
    expect(result.failures.map(f => f.identifier)).toEqual(['docs/broken.md']);
  });

  it('exits 2 when nothing matches', async () => {
    const result = await estimate({ cwd: tempDir, config: withCapacity(2000) });
    expect(result).toEqual({
      unitCount: 0,
      evaluation: null,
      failures: [],
      exitCode: 2,
      report: 'No files found matching criteria.',
    });
  });

  it('exits 2 on an invalid config file', async () => {
    seedWorkspace();
    write('.contextstack/budget.yaml', 'capacity: -5\nrounding: round\n');

    const result = await estimate({ cwd: tempDir });
    expect(result.exitCode).toBe(2);
    expect(result.report).toBe([
      'Invalid configuration:',
      '  - "capacity" must be a positive integer',
      '  - "rounding" must be "floor" or "ceil"',
    ].join('\n'));
  });
});

// ─── compact & history ────────────────────────────────────────────

describe('ctxscan compact', () => {
  it('archives the subagent prompt, stores the record and exits 0', async () => {
    seedWorkspace();
    const dbPath = join(tempDir, '.contextstack', 'context.db');

    const result = await compact({ cwd: tempDir, config: withCapacity(1250), target: 65, dbPath });

    expect(result.plan?.entries.map(e => `${e.action}:${e.identifier}`)).toEqual(['archive:.claude/subagents/reviewer.md']);
    expect(result.record?.tokensFreed).toBe(300);
    expect(result.record?.resultingConsumed).toBe(700);
    expect(result.evaluation?.state).toBe('healthy');
    expect(result.exitCode).toBe(0);
    expect(result.report.split('\n')[1]).toBe('Context Budget Report (after compaction)');
    expect(result.report.split('\n')).toContain('Target Reached: yes');

    const store = new ContextStore(dbPath);
    try {
      expect(store.list().map(r => r.recordId)).toEqual([result.record?.recordId]);
      expect(store.findArchived('.claude/subagents/reviewer.md')).toHaveLength(1);
    } finally {
      store.close();
    }

    const listed = history({ cwd: tempDir, dbPath });
    expect(listed.records).toHaveLength(1);
    expect(listed.exitCode).toBe(0);
    expect(listed.report).toContain('freed 300 tokens (1 archived, 0 summarized)');
  });

  it('plans without writing anything on --dry-run', async () => {
    seedWorkspace();
    const dbPath = join(tempDir, '.contextstack', 'context.db');

    const result = await compact({ cwd: tempDir, config: withCapacity(1250), target: 65, dryRun: true, dbPath });

    expect(result.plan?.entries).toHaveLength(1);
    expect(result.record).toBeNull();
    expect(result.exitCode).toBe(1);
    expect(result.report.split('\n')[1]).toBe('Compaction Plan (dry run)');
    expect(existsSync(dbPath)).toBe(false);
  });

  it('uses the configured target when none is given', async () => {
    seedWorkspace();
    const result = await compact({ cwd: tempDir, config: withCapacity(1250), dryRun: true });
    expect(result.plan?.targetUtilization).toBe(0.65);
  });

  it('exits 2 for a target outside 0-100', async () => {
    seedWorkspace();
    const result = await compact({ cwd: tempDir, config: withCapacity(1250), target: 150, dryRun: true });
    expect(result.exitCode).toBe(2);
    expect(result.report).toBe('Invalid target: 150 (expected 0-100)');
  });
});

describe('ctxscan history', () => {
  it('reports no compactions when the store does not exist', () => {
    const result = history({ cwd: tempDir });
    expect(result.records).toEqual([]);
    expect(result.report).toContain('No compactions recorded.');
    expect(existsSync(join(tempDir, '.contextstack', 'context.db'))).toBe(false);
  });
});
