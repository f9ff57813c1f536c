import type { ExecutionErrorCode, RenameOp } from '../types.js';

export type TransformErrorCode = 'INVALID_SPEC' | 'INVALID_PATTERN';

export type PlanBuildErrorCode =
  | TransformErrorCode
  | 'EMPTY_SOURCES'
  | 'DUPLICATE_SOURCE'
  | 'MISSING_SOURCE'
  | 'UNREADABLE_SOURCE'
  | 'STAGING_FAILED';

/** Base class for every error the engine reports. */
export class RnmError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RnmError';
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class TransformError extends RnmError {
  declare readonly code: TransformErrorCode;

  constructor(
    code: TransformErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = 'TransformError';
  }
}

export class PlanBuildError extends RnmError {
  declare readonly code: PlanBuildErrorCode;
  /** Offending paths, when the error is about specific sources. */
  readonly paths: string[];

  constructor(
    code: PlanBuildErrorCode,
    message: string,
    paths: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = 'PlanBuildError';
    this.paths = paths;
  }
}

/** Thrown when a plan that still carries conflicts is handed to the executor. */
export class PlanNotExecutableError extends RnmError {
  readonly conflictCount: number;

  constructor(conflictCount: number) {
    super(
      'PLAN_NOT_EXECUTABLE',
      `Plan has ${conflictCount} unresolved conflict(s) and cannot be executed.`,
    );
    this.name = 'PlanNotExecutableError';
    this.conflictCount = conflictCount;
  }
}

export class RenameExecutionError extends RnmError {
  declare readonly code: ExecutionErrorCode;
  readonly op: RenameOp;

  constructor(
    code: ExecutionErrorCode,
    op: RenameOp,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = 'RenameExecutionError';
    this.op = op;
  }
}

/** Source and target are on different devices; rename(2) cannot be atomic. */
export class CrossDeviceError extends RenameExecutionError {
  constructor(op: RenameOp, options?: { cause?: unknown }) {
    super(
      'CROSS_DEVICE',
      op,
      `Cannot move ${op.source} to ${op.target} atomically: different devices.`,
      options,
    );
    this.name = 'CrossDeviceError';
  }
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
