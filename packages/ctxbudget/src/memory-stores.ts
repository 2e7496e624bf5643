/**
 * In-process stores for sessions that don't persist anything.
 * ContextStore (@contextstack/shared) is the SQLite-backed equivalent.
 */

import type {
  ArchiveHandle,
  ArchiveStore,
  ArchivedUnit,
  CompactionLog,
  CompactionRecord,
  ContentUnit,
} from '@contextstack/shared';

export class MemoryCompactionLog implements CompactionLog {
  private records: CompactionRecord[] = [];

  append(record: CompactionRecord): void {
    this.records.push(Object.freeze({ ...record, unitsAffected: record.unitsAffected.map(a => ({ ...a })) }));
  }

  /**
   * Most recent records first.
   */
  list(limit = 50): CompactionRecord[] {
    if (limit <= 0) return [];
    return this.records.slice(-limit).reverse();
  }
}

export class MemoryArchiveStore implements ArchiveStore {
  private entries: Map<ArchiveHandle, ArchivedUnit> = new Map();
  private counter = 0;

  put(identifier: string, unit: ContentUnit): ArchiveHandle {
    const handle = `arc_${++this.counter}`;
    this.entries.set(handle, {
      handle,
      unit: { ...unit, identifier },
      archivedAt: new Date().toISOString(),
    });
    return handle;
  }

  get(handle: ArchiveHandle): ArchivedUnit | null {
    return this.entries.get(handle) ?? null;
  }

  remove(handle: ArchiveHandle): void {
    this.entries.delete(handle);
  }

  get size(): number {
    return this.entries.size;
  }
}
