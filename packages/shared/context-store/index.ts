/**
 * Context Store — the persisted side of compaction
 *
 * SQLite via better-sqlite3 (synchronous, fast, zero-ops).
 * Holds two things and nothing else:
 * - compaction_records: append-only log of what each compaction did
 * - archived_units: units archived out of the ledger, retrievable by handle
 *
 * Ledger state is never rebuilt from here; it is always re-derived from the
 * currently registered units.
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { isTier } from '../types/index.js';
import type {
  ArchiveStore,
  ArchiveHandle,
  ArchivedUnit,
  CompactionAction,
  CompactionLog,
  CompactionRecord,
  ContentUnit,
} from '../types/index.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS compaction_records (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    record_id TEXT NOT NULL UNIQUE,
    timestamp TEXT NOT NULL,
    units_affected TEXT NOT NULL,
    tokens_freed INTEGER NOT NULL,
    resulting_consumed INTEGER NOT NULL,
    total_capacity INTEGER NOT NULL,
    target_utilization REAL NOT NULL,
    target_reached INTEGER NOT NULL
  );

  CREATE TRIGGER IF NOT EXISTS compaction_records_no_update
  BEFORE UPDATE ON compaction_records
  BEGIN
    SELECT RAISE(ABORT, 'compaction records are append-only');
  END;

  CREATE TRIGGER IF NOT EXISTS compaction_records_no_delete
  BEFORE DELETE ON compaction_records
  BEGIN
    SELECT RAISE(ABORT, 'compaction records are append-only');
  END;

  CREATE TABLE IF NOT EXISTS archived_units (
    handle TEXT PRIMARY KEY,
    identifier TEXT NOT NULL,
    unit TEXT NOT NULL,
    archived_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_archived_identifier ON archived_units(identifier);
`;

interface RecordRow {
  record_id: string;
  timestamp: string;
  units_affected: string;
  tokens_freed: number;
  resulting_consumed: number;
  total_capacity: number;
  target_utilization: number;
  target_reached: number;
}

interface ArchiveRow {
  handle: string;
  identifier: string;
  unit: string;
  archived_at: string;
}

export class ContextStore implements CompactionLog, ArchiveStore {
  private db: Database.Database;

  constructor(dbPath = ':memory:') {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
  }

  // ─── Compaction Log ─────────────────────────────────────────────

  append(record: CompactionRecord): void {
    this.db.prepare(`
      INSERT INTO compaction_records
        (record_id, timestamp, units_affected, tokens_freed, resulting_consumed,
         total_capacity, target_utilization, target_reached)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.recordId,
      record.timestamp,
      JSON.stringify(record.unitsAffected),
      record.tokensFreed,
      record.resultingConsumed,
      record.totalCapacity,
      record.targetUtilization,
      record.targetReached ? 1 : 0,
    );
  }

  /**
   * Most recent records first.
   */
  list(limit = 50): CompactionRecord[] {
    if (limit <= 0) return [];
    const rows = this.db.prepare<[number], RecordRow>(`
      SELECT * FROM compaction_records ORDER BY seq DESC LIMIT ?
    `).all(limit);
    return rows.map(row => this.mapRecord(row));
  }

  // ─── Archive Store ──────────────────────────────────────────────

  put(identifier: string, unit: ContentUnit): ArchiveHandle {
    const handle = `arc_${randomUUID()}`;
    this.db.prepare(`
      INSERT INTO archived_units (handle, identifier, unit, archived_at)
      VALUES (?, ?, ?, ?)
    `).run(handle, identifier, JSON.stringify(unit), new Date().toISOString());
    return handle;
  }

  get(handle: ArchiveHandle): ArchivedUnit | null {
    const row = this.db.prepare<[string], ArchiveRow>(`
      SELECT * FROM archived_units WHERE handle = ?
    `).get(handle);
    return row ? this.mapArchive(row) : null;
  }

  remove(handle: ArchiveHandle): void {
    this.db.prepare('DELETE FROM archived_units WHERE handle = ?').run(handle);
  }

  /**
   * Archive entries for an identifier, newest first.
   */
  findArchived(identifier: string): ArchivedUnit[] {
    const rows = this.db.prepare<[string], ArchiveRow>(`
      SELECT * FROM archived_units WHERE identifier = ? ORDER BY archived_at DESC, rowid DESC
    `).all(identifier);
    return rows.map(row => this.mapArchive(row));
  }

  close(): void {
    this.db.close();
  }

  getDb(): Database.Database {
    return this.db;
  }

  // ─── Row Mapping ────────────────────────────────────────────────

  private mapRecord(row: RecordRow): CompactionRecord {
    return {
      recordId: row.record_id,
      timestamp: row.timestamp,
      unitsAffected: parseActions(row.units_affected),
      tokensFreed: row.tokens_freed,
      resultingConsumed: row.resulting_consumed,
      totalCapacity: row.total_capacity,
      targetUtilization: row.target_utilization,
      targetReached: row.target_reached === 1,
    };
  }

  private mapArchive(row: ArchiveRow): ArchivedUnit {
    return {
      handle: row.handle,
      unit: parseUnit(row.unit),
      archivedAt: row.archived_at,
    };
  }
}

function parseActions(raw: string): CompactionAction[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];

  const actions: CompactionAction[] = [];
  for (const item of parsed) {
    if (!isRecord(item)) continue;
    const { identifier, action } = item;
    if (typeof identifier === 'string' && (action === 'archive' || action === 'summarize')) {
      actions.push({ identifier, action });
    }
  }
  return actions;
}

function parseUnit(raw: string): ContentUnit {
  const parsed: unknown = JSON.parse(raw);
  if (
    !isRecord(parsed) ||
    typeof parsed.identifier !== 'string' ||
    typeof parsed.category !== 'string' ||
    typeof parsed.rawSize !== 'number' ||
    typeof parsed.estimatedCost !== 'number' ||
    !isTier(parsed.tier) ||
    typeof parsed.lastTouched !== 'number'
  ) {
    throw new Error('Corrupted archived unit row');
  }

  return {
    identifier: parsed.identifier,
    category: parsed.category,
    rawSize: parsed.rawSize,
    estimatedCost: parsed.estimatedCost,
    tier: parsed.tier,
    lastTouched: parsed.lastTouched,
    summarized: parsed.summarized === true,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
