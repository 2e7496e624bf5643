/**
 * ctxscan — context budget estimation and compaction for a workspace
 */
export { estimate } from './commands/estimate.js';
export type { EstimateOptions, EstimateResult } from './commands/estimate.js';
export { compact } from './commands/compact.js';
export type { CompactOptions, CompactResult } from './commands/compact.js';
export { history } from './commands/history.js';
export type { HistoryOptions, HistoryResult } from './commands/history.js';
export { parseArgs } from './args.js';
export type { ArgsResult, CommandName, ParsedArgs } from './args.js';
export {
  DEFAULT_BUDGET_CONFIG,
  loadConfig,
  parseConfig,
  validateConfig,
  formatConfigErrors,
  resolveConfigPath,
  resolveDbPath,
} from './config.js';
export type { BudgetConfig, ConfigResult } from './config.js';
export { findFiles, scanFiles } from './scanner.js';
export type { ScanOptions, ScanResult, ScannedFile, ScanFailure } from './scanner.js';
export { createSession, loadWorkspace, exitCodeFor } from './workspace.js';
export type { ExitCode, LoadedWorkspace, WorkspaceOptions } from './workspace.js';
