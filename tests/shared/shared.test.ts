/**
 * Shared primitives — glob matching, event bus, SQLite context store
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { ContextStore, EventBus, createEvent, isTier, matchesGlob } from '@contextstack/shared';
import type { BusEvent, CompactionRecord, ContentUnit } from '@contextstack/shared';

function record(overrides: Partial<CompactionRecord> = {}): CompactionRecord {
  return {
    recordId: 'cmp_1',
    timestamp: '2026-01-01T00:00:00.000Z',
    unitsAffected: [{ identifier: 'docs/guides/setup.md', action: 'archive' }],
    tokensFreed: 1200,
    resultingConsumed: 8800,
    totalCapacity: 20000,
    targetUtilization: 0.5,
    targetReached: true,
    ...overrides,
  };
}

function unit(overrides: Partial<ContentUnit> = {}): ContentUnit {
  return {
    identifier: 'docs/guides/setup.md',
    category: 'prose',
    rawSize: 4800,
    estimatedCost: 1200,
    tier: 4,
    lastTouched: 3,
    summarized: false,
    ...overrides,
  };
}

// ─── Tier ─────────────────────────────────────────────────────────

describe('isTier', () => {
  it('accepts integers 1 through 5 only', () => {
    expect([1, 2, 3, 4, 5].every(isTier)).toBe(true);
    expect(isTier(0)).toBe(false);
    expect(isTier(6)).toBe(false);
    expect(isTier(2.5)).toBe(false);
    expect(isTier('2')).toBe(false);
  });
});

// ─── Glob ─────────────────────────────────────────────────────────

describe('matchesGlob', () => {
  it('matches slash-free patterns against the basename', () => {
    expect(matchesGlob('.claude/CLAUDE.md', 'CLAUDE.md')).toBe(true);
    expect(matchesGlob('docs/api-template.md', '*-template.md')).toBe(true);
    expect(matchesGlob('docs/notes.md', '*-template.md')).toBe(false);
  });

  it('lets ** span any number of directories, including none', () => {
    expect(matchesGlob('docs/guides/setup.md', '**/guides/**')).toBe(true);
    expect(matchesGlob('guides/setup.md', '**/guides/**')).toBe(true);
    expect(matchesGlob('a/b/c/guides/x/y.md', '**/guides/**')).toBe(true);
    expect(matchesGlob('docs/guidesx/setup.md', '**/guides/**')).toBe(false);
  });

  it('keeps * inside one path segment', () => {
    expect(matchesGlob('docs/a.md', 'docs/*.md')).toBe(true);
    expect(matchesGlob('docs/sub/a.md', 'docs/*.md')).toBe(false);
  });

  it('supports ? and brace alternatives', () => {
    expect(matchesGlob('ab.md', 'a?.md')).toBe(true);
    expect(matchesGlob('abc.md', 'a?.md')).toBe(false);
    expect(matchesGlob('src/app.tsx', '*.{ts,tsx}')).toBe(true);
    expect(matchesGlob('src/app.js', '*.{ts,tsx}')).toBe(false);
  });

  it('treats regex characters literally', () => {
    expect(matchesGlob('notes(1).md', 'notes(1).md')).toBe(true);
    expect(matchesGlob('aXmd', 'a.md')).toBe(false);
  });

  it('normalizes backslashes and a leading ./', () => {
    expect(matchesGlob('docs\\a.md', 'docs/*.md')).toBe(true);
    expect(matchesGlob('./docs/a.md', 'docs/*.md')).toBe(true);
    expect(matchesGlob('docs/a.md', './docs/*.md')).toBe(true);
  });
});

// ─── Event Bus ────────────────────────────────────────────────────

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  it('delivers to exact, prefix and wildcard subscribers', async () => {
    const seen: string[] = [];
    bus.on('compaction.executed', () => { seen.push('exact'); });
    bus.on('compaction.*', () => { seen.push('prefix'); });
    bus.on('*', () => { seen.push('all'); });
    bus.on('ledger.*', () => { seen.push('other'); });

    await bus.emit(createEvent('compaction.executed', 'ctxbudget', {}));

    expect(seen.sort()).toEqual(['all', 'exact', 'prefix']);
  });

  it('passes payload and session id through', async () => {
    let received: BusEvent<{ identifier: string }> | null = null;
    bus.on<{ identifier: string }>('ledger.unit_registered', (event) => { received = event; });

    await bus.emit(createEvent('ledger.unit_registered', 'ctxbudget', { identifier: 'a.md' }, { sessionId: 'ses_1' }));

    expect(received).toMatchObject({
      channel: 'ledger.unit_registered',
      sourceProduct: 'ctxbudget',
      sessionId: 'ses_1',
      payload: { identifier: 'a.md' },
    });
  });

  it('once handlers fire a single time', async () => {
    let count = 0;
    bus.once('threshold.changed', () => { count++; });

    await bus.emit(createEvent('threshold.changed', 'ctxbudget', {}));
    await bus.emit(createEvent('threshold.changed', 'ctxbudget', {}));

    expect(count).toBe(1);
    expect(bus.getStats()).toEqual({});
  });

  it('unsubscribes through the returned function', async () => {
    let count = 0;
    const off = bus.on('threshold.changed', () => { count++; });
    off();

    await bus.emit(createEvent('threshold.changed', 'ctxbudget', {}));
    expect(count).toBe(0);
  });

  it('logs a failing handler and keeps delivering', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    let delivered = false;
    bus.on('compaction.planned', () => { throw new Error('boom'); });
    bus.on('compaction.planned', () => { delivered = true; });

    await bus.emit(createEvent('compaction.planned', 'ctxbudget', {}));

    expect(delivered).toBe(true);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('[EventBus] Handler error on compaction.planned:');
    errorSpy.mockRestore();
  });

  it('keeps bounded, filterable history', async () => {
    const small = new EventBus({ maxHistory: 2 });
    await small.emit(createEvent('ledger.unit_registered', 'ctxbudget', { n: 1 }));
    await small.emit(createEvent('threshold.changed', 'ctxbudget', { n: 2 }));
    await small.emit(createEvent('ledger.unit_registered', 'ctxbudget', { n: 3 }));

    expect(small.getHistory().map(e => e.payload)).toEqual([{ n: 2 }, { n: 3 }]);
    expect(small.getHistory('ledger.unit_registered').map(e => e.payload)).toEqual([{ n: 3 }]);
  });
});

// ─── Context Store ────────────────────────────────────────────────

describe('ContextStore', () => {
  let tempDir: string;
  let store: ContextStore;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'contextstack-store-'));
    store = new ContextStore(join(tempDir, 'nested', 'context.db'));
  });

  afterEach(() => {
    store.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('round-trips compaction records, newest first', () => {
    store.append(record({ recordId: 'cmp_a' }));
    store.append(record({ recordId: 'cmp_b', targetReached: false }));

    const records = store.list();
    expect(records.map(r => r.recordId)).toEqual(['cmp_b', 'cmp_a']);
    expect(records[1]).toEqual(record({ recordId: 'cmp_a' }));
    expect(records[0].targetReached).toBe(false);
  });

  it('honors the list limit', () => {
    for (const id of ['cmp_1', 'cmp_2', 'cmp_3']) store.append(record({ recordId: id }));
    expect(store.list(2).map(r => r.recordId)).toEqual(['cmp_3', 'cmp_2']);
    expect(store.list(0)).toEqual([]);
    expect(store.list(-1)).toEqual([]);
  });

  it('refuses to update or delete records', () => {
    store.append(record());
    const db = store.getDb();

    expect(() => db.prepare('UPDATE compaction_records SET tokens_freed = 0').run())
      .toThrow('compaction records are append-only');
    expect(() => db.prepare('DELETE FROM compaction_records').run())
      .toThrow('compaction records are append-only');
    expect(store.list()).toHaveLength(1);
  });

  it('rejects a duplicate record id', () => {
    store.append(record());
    expect(() => store.append(record())).toThrow();
  });

  it('stores archived units retrievable by handle', () => {
    const handle = store.put('docs/guides/setup.md', unit());

    expect(handle.startsWith('arc_')).toBe(true);
    const archived = store.get(handle);
    expect(archived?.unit).toEqual(unit());
    expect(archived?.handle).toBe(handle);
    expect(store.findArchived('docs/guides/setup.md')).toHaveLength(1);

    store.remove(handle);
    expect(store.get(handle)).toBeNull();
    expect(store.findArchived('docs/guides/setup.md')).toEqual([]);
  });

  it('returns null for an unknown handle', () => {
    expect(store.get('arc_missing')).toBeNull();
  });

  it('throws on a corrupted archive row', () => {
    store.getDb()
      .prepare('INSERT INTO archived_units (handle, identifier, unit, archived_at) VALUES (?, ?, ?, ?)')
      .run('arc_bad', 'x.md', '{"identifier":"x.md"}', '2026-01-01T00:00:00.000Z');

    expect(() => store.get('arc_bad')).toThrow('Corrupted archived unit row');
  });

  it('keeps records across reopen', () => {
    store.append(record({ recordId: 'cmp_persist' }));
    store.close();

    store = new ContextStore(join(tempDir, 'nested', 'context.db'));
    expect(store.list().map(r => r.recordId)).toEqual(['cmp_persist']);
  });
});
