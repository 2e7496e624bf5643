/**
 * Compaction Executor — apply a plan, all or nothing
 *
 * Every action is applied to a clone of the ledger. Only when all of them
 * succeed is the clone handed back for the caller to swap in; any failure
 * throws and the ledger that was passed in is exactly as it was.
 *
 * Archived units go to the injected ArchiveStore after the ledger-side work
 * succeeds. If a put fails, puts already made are removed again.
 */

import { randomUUID } from 'crypto';
import type { ArchiveHandle, ArchiveStore, CompactionAction, CompactionRecord, ContentUnit } from '@contextstack/shared';
import type { BudgetLedger, ReadonlyLedger } from './budget-ledger.js';
import { withinTarget } from './compaction-planner.js';
import type { CompactionPlan } from './compaction-planner.js';
import {
  AlreadySummarizedError,
  ArchiveError,
  InvalidInputError,
  ProtectedUnitError,
  UnknownUnitError,
} from './errors.js';

export interface ArchivedEntry {
  identifier: string;
  handle: ArchiveHandle;
}

export interface ExecutionResult {
  ledger: BudgetLedger;
  record: CompactionRecord;
  archived: ArchivedEntry[];
}

export interface CompactionExecutorOptions {
  archiveStore?: ArchiveStore;
  now?: () => Date;
}

export class CompactionExecutor {
  private archiveStore: ArchiveStore | null;
  private now: () => Date;

  constructor(opts?: CompactionExecutorOptions) {
    this.archiveStore = opts?.archiveStore ?? null;
    this.now = opts?.now ?? (() => new Date());
  }

  execute(ledger: ReadonlyLedger, plan: CompactionPlan): ExecutionResult {
    const next = ledger.clone();
    const consumedBefore = next.consumed;
    const toArchive: ContentUnit[] = [];
    const affected: CompactionAction[] = [];

    for (const entry of plan.entries) {
      const unit = next.get(entry.identifier);
      if (!unit) throw new UnknownUnitError(entry.identifier);
      if (unit.tier === 1) throw new ProtectedUnitError(entry.identifier);

      if (entry.action === 'archive') {
        toArchive.push({ ...unit });
        next.deregister(unit.identifier);
      } else {
        if (unit.summarized) throw new AlreadySummarizedError(unit.identifier);
        if (entry.residualRawSize === null) {
          throw new InvalidInputError(`Summarize entry for ${unit.identifier} has no residual size`);
        }
        next.register({
          identifier: unit.identifier,
          category: unit.category,
          rawSize: Math.min(entry.residualRawSize, unit.rawSize),
          tier: unit.tier,
          lastTouched: unit.lastTouched,
          summarized: true,
        });
      }

      affected.push({ identifier: entry.identifier, action: entry.action });
    }

    const archived = this.archiveAll(toArchive);

    const record: CompactionRecord = {
      recordId: `cmp_${randomUUID()}`,
      timestamp: this.now().toISOString(),
      unitsAffected: affected,
      tokensFreed: consumedBefore - next.consumed,
      resultingConsumed: next.consumed,
      totalCapacity: next.totalCapacity,
      targetUtilization: plan.targetUtilization,
      targetReached: withinTarget(next.consumed, plan.targetUtilization, next.totalCapacity),
    };

    return { ledger: next, record, archived };
  }

  private archiveAll(units: ContentUnit[]): ArchivedEntry[] {
    const store = this.archiveStore;
    if (!store) return [];

    const archived: ArchivedEntry[] = [];
    for (const unit of units) {
      try {
        archived.push({ identifier: unit.identifier, handle: store.put(unit.identifier, unit) });
      } catch (err) {
        this.rollback(store, archived);
        throw new ArchiveError(unit.identifier, err);
      }
    }
    return archived;
  }

  /**
   * Remove archive entries made by an execution whose result was not kept.
   */
  discard(archived: ArchivedEntry[]): void {
    if (this.archiveStore) this.rollback(this.archiveStore, archived);
  }

  private rollback(store: ArchiveStore, archived: ArchivedEntry[]): void {
    for (const entry of archived) {
      try {
        store.remove(entry.handle);
      } catch (err) {
        console.error(`[CompactionExecutor] Failed to roll back archive of ${entry.identifier}:`, err);
      }
    }
  }
}
