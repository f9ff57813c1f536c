import type {
  ExecutionErrorCode,
  ExecutionEvent,
  ExecutionResult,
  OpFailure,
  Plan,
  RenameOp,
} from '../types.js';
import { debug } from '../ui/logger.js';
import {
  CrossDeviceError,
  PlanNotExecutableError,
  RenameExecutionError,
  errorMessage,
  isErrnoException,
} from './errors.js';
import { isCaseOnlyAlias, nodeRenameFs, type RenameFs } from './fs-utils.js';

export interface ExecuteOptions {
  fs?: RenameFs;
  onProgress?: (event: ExecutionEvent) => void;
}

const ERRNO_CODES: Record<string, ExecutionErrorCode> = {
  ENOENT: 'SOURCE_MISSING',
  EEXIST: 'TARGET_EXISTS',
  ENOTEMPTY: 'TARGET_EXISTS',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
};

function classify(op: RenameOp, e: unknown): RenameExecutionError {
  if (e instanceof RenameExecutionError) return e;
  const errno = isErrnoException(e) ? e.code : undefined;
  if (errno === 'EXDEV') return new CrossDeviceError(op, { cause: e });
  const code =
    errno !== undefined && Object.hasOwn(ERRNO_CODES, errno)
      ? ERRNO_CODES[errno]
      : 'IO_ERROR';
  return new RenameExecutionError(
    code,
    op,
    `Cannot rename ${op.source} to ${op.target}: ${errorMessage(e)}`,
    { cause: e },
  );
}

/**
 * One rename(2), refusing to replace an existing file. The check and the
 * rename are separate calls, so this guards against stale plans, not
 * against a concurrent writer.
 */
function renameStep(fs: RenameFs, op: RenameOp): void {
  if (fs.stat(op.source) === null) {
    throw new RenameExecutionError(
      'SOURCE_MISSING',
      op,
      `Source vanished before rename: ${op.source}`,
    );
  }
  if (fs.stat(op.target) !== null && !isCaseOnlyAlias(fs, op.source, op.target)) {
    throw new RenameExecutionError(
      'TARGET_EXISTS',
      op,
      `Target already exists: ${op.target}`,
    );
  }
  try {
    fs.rename(op.source, op.target);
  } catch (e) {
    throw classify(op, e);
  }
}

function reverse(op: RenameOp): RenameOp {
  return { source: op.target, target: op.source, stage: op.stage };
}

/**
 * Apply a resolved plan op by op. The first failure stops execution and
 * every applied op is reversed, newest first. Rollback problems are
 * collected in the result, never thrown.
 *
 * Throws {@link PlanNotExecutableError} if the plan still has conflicts.
 */
export function executePlan(
  plan: Plan,
  options: ExecuteOptions = {},
): ExecutionResult {
  if (plan.conflicts.length > 0) {
    throw new PlanNotExecutableError(plan.conflicts.length);
  }
  const fs = options.fs ?? nodeRenameFs;
  const emit = options.onProgress ?? (() => {});

  const applied: RenameOp[] = [];
  let failed: OpFailure | null = null;

  for (const op of plan.ops) {
    try {
      renameStep(fs, op);
    } catch (e) {
      failed = { op, cause: classify(op, e) };
      debug(`execute: failed at ${op.source} → ${op.target}: ${failed.cause.message}`);
      emit({ event: 'failed', op });
      break;
    }
    applied.push(op);
    debug(`execute: ${op.stage} ${op.source} → ${op.target}`);
    emit({ event: 'applied', op });
  }

  const rolledBack: RenameOp[] = [];
  const rollbackFailures: OpFailure[] = [];
  if (failed) {
    for (const op of [...applied].reverse()) {
      try {
        renameStep(fs, reverse(op));
        rolledBack.push(op);
        emit({ event: 'rolledBack', op });
      } catch (e) {
        const cause = classify(reverse(op), e);
        debug(`rollback of ${op.source} → ${op.target} failed: ${cause.message}`);
        rollbackFailures.push({ op, cause });
        emit({ event: 'rollbackFailed', op });
      }
    }
  }

  return { applied, failed, rolledBack, rollbackFailures };
}
