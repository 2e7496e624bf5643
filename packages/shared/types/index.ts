/**
 * ContextStack Shared Types
 *
 * The ledger of content units is the shared primitive. The budget engine
 * writes it, the scanner feeds it, the context store persists what compaction
 * did to it. These types define its shape across all packages.
 */

// ─── Content Units ────────────────────────────────────────────────

/** 1 = always retained, 5 = evicted first. */
export type Tier = 1 | 2 | 3 | 4 | 5;

export const TIERS: readonly Tier[] = [1, 2, 3, 4, 5];

export function isTier(value: unknown): value is Tier {
  return typeof value === 'number' && (TIERS as readonly number[]).includes(value);
}

/**
 * Built-in categories. Anything with a registered divisor is a category,
 * so the type stays open.
 */
export type BuiltinCategory = 'prose' | 'structured';
export type Category = BuiltinCategory | (string & {});

export interface ContentUnit {
  identifier: string;
  category: Category;
  rawSize: number;          // characters
  estimatedCost: number;    // tokens, derived from rawSize/category
  tier: Tier;
  lastTouched: number;      // logical ordinal
  summarized: boolean;
}

// ─── Thresholds ───────────────────────────────────────────────────

export type ThresholdState = 'healthy' | 'caution' | 'warning' | 'critical';

export type ThresholdAction = 'none' | 'monitor' | 'compact' | 'compact_required';

/** Percentages, 0 < safe < warning < critical <= 100. */
export interface ThresholdPolicy {
  safe: number;
  warning: number;
  critical: number;
}

// ─── Compaction ───────────────────────────────────────────────────

export type CompactionActionType = 'archive' | 'summarize';

export interface CompactionAction {
  identifier: string;
  action: CompactionActionType;
}

export interface CompactionRecord {
  recordId: string;
  timestamp: string; // ISO 8601
  unitsAffected: CompactionAction[];
  tokensFreed: number;
  resultingConsumed: number;
  totalCapacity: number;
  targetUtilization: number;
  targetReached: boolean;
}

/** Append-only record log. */
export interface CompactionLog {
  append(record: CompactionRecord): void;
  list(limit?: number): CompactionRecord[];
}

export type ArchiveHandle = string;

export interface ArchivedUnit {
  handle: ArchiveHandle;
  unit: ContentUnit;
  archivedAt: string;
}

/**
 * Where archived units go. Archive is a soft delete: the ledger forgets the
 * unit, the store keeps it retrievable by handle.
 */
export interface ArchiveStore {
  put(identifier: string, unit: ContentUnit): ArchiveHandle;
  get(handle: ArchiveHandle): ArchivedUnit | null;
  remove(handle: ArchiveHandle): void;
}

// ─── Event Bus ────────────────────────────────────────────────────

export type EventChannel =
  | 'ledger.unit_registered'
  | 'ledger.unit_deregistered'
  | 'threshold.changed'
  | 'compaction.planned'
  | 'compaction.executed'
  | 'compaction.insufficient';

export interface BusEvent<T = unknown> {
  channel: EventChannel;
  timestamp: string;
  sourceProduct: 'ctxbudget' | 'ctxscan' | 'system';
  sessionId: string | null;
  payload: T;
}

export type EventHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;
