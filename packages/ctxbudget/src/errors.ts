/**
 * Error taxonomy for the budget engine.
 *
 * Being over capacity is not an error: that is the `critical` threshold state.
 * Falling short of a compaction target is not an error either: that is
 * `plan.targetReached === false`.
 */

export type ContextBudgetErrorCode =
  | 'INVALID_INPUT'
  | 'UNKNOWN_UNIT'
  | 'PROTECTED_UNIT'
  | 'ALREADY_SUMMARIZED'
  | 'COMPACTION_REQUIRED'
  | 'ARCHIVE_FAILED';

export class ContextBudgetError extends Error {
  readonly code: ContextBudgetErrorCode;

  constructor(code: ContextBudgetErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed size, category, tier, policy or target. Always a caller bug. */
export class InvalidInputError extends ContextBudgetError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export class UnknownUnitError extends ContextBudgetError {
  readonly identifier: string;

  constructor(identifier: string) {
    super('UNKNOWN_UNIT', `Unknown unit: ${identifier}`);
    this.identifier = identifier;
  }
}

/** A plan tried to touch a tier-1 unit. */
export class ProtectedUnitError extends ContextBudgetError {
  readonly identifier: string;

  constructor(identifier: string) {
    super('PROTECTED_UNIT', `Unit ${identifier} is tier 1 and cannot be compacted`);
    this.identifier = identifier;
  }
}

export class AlreadySummarizedError extends ContextBudgetError {
  readonly identifier: string;

  constructor(identifier: string) {
    super('ALREADY_SUMMARIZED', `Unit ${identifier} has already been summarized`);
    this.identifier = identifier;
  }
}

/** Registration refused while the budget sits in the critical band. */
export class CompactionRequiredError extends ContextBudgetError {
  readonly utilization: number;

  constructor(utilization: number) {
    super(
      'COMPACTION_REQUIRED',
      `Context at ${(utilization * 100).toFixed(1)}% is critical: compact before registering more content`,
    );
    this.utilization = utilization;
  }
}

export class ArchiveError extends ContextBudgetError {
  readonly identifier: string;

  constructor(identifier: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('ARCHIVE_FAILED', `Archiving ${identifier} failed: ${reason}`);
    this.identifier = identifier;
  }
}
