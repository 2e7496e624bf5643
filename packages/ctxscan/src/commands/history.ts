/**
 * ctxscan history — compaction records from the ContextStore, newest first
 */

import { existsSync } from 'fs';
import { ContextStore } from '@contextstack/shared';
import type { CompactionRecord } from '@contextstack/shared';
import { formatHistory } from '@contextstack/ctxbudget';
import { resolveDbPath } from '../config.js';
import type { ExitCode } from '../workspace.js';

export interface HistoryOptions {
  cwd?: string;
  dbPath?: string;
  limit?: number;
}

export interface HistoryResult {
  records: CompactionRecord[];
  exitCode: ExitCode;
  report: string;
}

export function history(opts?: HistoryOptions): HistoryResult {
  const cwd = opts?.cwd || process.cwd();
  const dbPath = resolveDbPath(cwd, opts?.dbPath);

  if (!existsSync(dbPath)) {
    return { records: [], exitCode: 0, report: formatHistory([]) };
  }

  const store = new ContextStore(dbPath);
  try {
    const records = store.list(opts?.limit);
    return { records, exitCode: 0, report: formatHistory(records) };
  } finally {
    store.close();
  }
}
