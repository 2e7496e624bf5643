/**
 * Argument parsing for ctxscan. Flags are few and fixed, so this is a
 * plain walk over argv rather than a parser library.
 */

import { isTier } from '@contextstack/shared';
import type { Tier } from '@contextstack/shared';

export type CommandName = 'estimate' | 'compact' | 'history' | 'help';

export interface ParsedArgs {
  command: CommandName;
  tier?: Tier;
  pattern?: string;
  files: boolean;
  verbose: boolean;
  target?: number;
  dryRun: boolean;
  limit?: number;
  config?: string;
  db?: string;
}

export type ArgsResult =
  | { ok: true; args: ParsedArgs }
  | { ok: false; error: string };

const COMMANDS: ReadonlySet<string> = new Set(['estimate', 'compact', 'history', 'help']);

export function parseArgs(argv: string[]): ArgsResult {
  const args: ParsedArgs = { command: 'estimate', files: false, verbose: false, dryRun: false };
  let i = 0;

  const first = argv[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) return { ok: false, error: `Unknown command: ${first}` };
    args.command = first;
    i = 1;
  }

  for (; i < argv.length; i++) {
    const flag = argv[i];

    const value = (): string | null => {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) return null;
      i++;
      return next;
    };

    switch (flag) {
      case '--help':
      case '-h':
        args.command = 'help';
        return { ok: true, args };

      case '--files':
        args.files = true;
        break;

      case '--verbose':
      case '-v':
        args.verbose = true;
        args.files = true;
        break;

      case '--dry-run':
        args.dryRun = true;
        break;

      case '--tier': {
        const raw = value();
        const tier = raw === null ? NaN : Number(raw);
        if (!isTier(tier)) return { ok: false, error: '--tier requires a number between 1 and 5' };
        args.tier = tier;
        break;
      }

      case '--pattern': {
        const raw = value();
        if (raw === null) return { ok: false, error: '--pattern requires a glob' };
        args.pattern = raw;
        break;
      }

      case '--target': {
        const raw = value();
        const target = raw === null ? NaN : Number(raw);
        if (!Number.isFinite(target) || target < 0 || target > 100) {
          return { ok: false, error: '--target requires a percentage between 0 and 100' };
        }
        args.target = target;
        break;
      }

      case '--limit': {
        const raw = value();
        const limit = raw === null ? NaN : Number(raw);
        if (!Number.isInteger(limit) || limit <= 0) return { ok: false, error: '--limit requires a positive integer' };
        args.limit = limit;
        break;
      }

      case '--config': {
        const raw = value();
        if (raw === null) return { ok: false, error: '--config requires a path' };
        args.config = raw;
        break;
      }

      case '--db': {
        const raw = value();
        if (raw === null) return { ok: false, error: '--db requires a path' };
        args.db = raw;
        break;
      }

      default:
        return { ok: false, error: `Unknown option: ${flag}` };
    }
  }

  return { ok: true, args };
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.has(value);
}
