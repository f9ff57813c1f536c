import { basename, resolve } from 'node:path';
import { MAX_NAME_BYTES } from '../constants.js';
import type { Conflict, Plan, RenameOp, TransformSpec } from '../types.js';
import { debug } from '../ui/logger.js';
import {
  errorMessage,
  isErrnoException,
  PlanBuildError,
  TransformError,
} from './errors.js';
import {
  type FileStat,
  isCaseOnlyAlias,
  nodeRenameFs,
  type RenameFs,
} from './fs-utils.js';
import { findCycles } from './graph.js';
import { nameWithinDir, siblingPath } from './paths.js';
import { resolvePlan } from './resolver.js';
import { compileTransform, type CompiledTransform } from './transform.js';

export type BuildOutcome =
  | { ok: true; plan: Plan }
  | { ok: false; error: PlanBuildError; plan: Plan };

export interface PlanOptions {
  fs?: RenameFs;
}

function fail(error: PlanBuildError): BuildOutcome {
  debug(`plan rejected: ${error.code} ${error.message}`);
  return { ok: false, error, plan: { ops: [], conflicts: [] } };
}

/** Why a computed filename cannot be used, or null when it can. */
export function invalidNameReason(name: string): string | null {
  if (name.length === 0) return 'empty filename';
  if (name === '.' || name === '..') return `reserved name "${name}"`;
  if (name.includes('/') || name.includes('\\')) {
    return 'filename contains a path separator';
  }
  if (name.includes('\0')) return 'filename contains a NUL byte';
  if (Buffer.byteLength(name, 'utf8') > MAX_NAME_BYTES) {
    return `name longer than ${MAX_NAME_BYTES} bytes`;
  }
  return null;
}

/**
 * Map every source to its transformed target and detect conflicts.
 * Never touches the filesystem beyond `stat`.
 */
export function buildPlan(
  sources: string[],
  spec: TransformSpec,
  options: PlanOptions = {},
): BuildOutcome {
  const fs = options.fs ?? nodeRenameFs;

  let transform: CompiledTransform;
  try {
    transform = compileTransform(spec);
  } catch (e) {
    if (e instanceof TransformError) {
      return fail(new PlanBuildError(e.code, e.message, [], { cause: e }));
    }
    throw e;
  }

  if (sources.length === 0) {
    return fail(new PlanBuildError('EMPTY_SOURCES', 'No files to rename.'));
  }

  const resolved = sources.map((s) => resolve(s));
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const path of resolved) {
    if (seen.has(path)) duplicates.push(path);
    seen.add(path);
  }
  if (duplicates.length > 0) {
    return fail(
      new PlanBuildError(
        'DUPLICATE_SOURCE',
        `Source listed more than once: ${duplicates.join(', ')}`,
        duplicates,
      ),
    );
  }

  let stats: (FileStat | null)[];
  try {
    stats = resolved.map((path) => fs.stat(path));
  } catch (e) {
    return fail(
      new PlanBuildError(
        'UNREADABLE_SOURCE',
        `Cannot read source: ${errorMessage(e)}`,
        [],
        { cause: e },
      ),
    );
  }
  const missing = resolved.filter((_, i) => stats[i] === null);
  if (missing.length > 0) {
    return fail(
      new PlanBuildError(
        'MISSING_SOURCE',
        `Source does not exist: ${missing.join(', ')}`,
        missing,
      ),
    );
  }

  const ops: RenameOp[] = resolved.map((source, i) => {
    const name = transform.apply(basename(source), i, {
      modified: stats[i]?.mtime,
    });
    return { source, target: siblingPath(source, name), stage: 'direct' };
  });

  const conflicts = detectConflicts(ops, fs);
  debug(
    `built plan: ${ops.length} op(s), ${conflicts.length} conflict(s) for ${transform.spec.mode}`,
  );
  return { ok: true, plan: { ops, conflicts } };
}

/** Conflicts of a plan whose ops are all still `direct`, in input order. */
export function detectConflicts(ops: RenameOp[], fs: RenameFs): Conflict[] {
  const conflicts: Conflict[] = [];
  const sources = new Set(ops.map((op) => op.source));
  const invalid = new Set<string>();

  for (const op of ops) {
    const name = nameWithinDir(op.source, op.target);
    const reason =
      name === null ? 'target leaves the source directory' : invalidNameReason(name);
    if (reason !== null) {
      invalid.add(op.source);
      conflicts.push({
        kind: 'invalidTarget',
        source: op.source,
        target: op.target,
        reason,
      });
    }
  }

  const byTarget = new Map<string, string[]>();
  for (const op of ops) {
    const owners = byTarget.get(op.target) ?? [];
    owners.push(op.source);
    byTarget.set(op.target, owners);
  }
  for (const [target, owners] of byTarget) {
    if (owners.length > 1) {
      conflicts.push({ kind: 'duplicateTarget', target, sources: owners });
    }
  }

  for (const op of ops) {
    if (op.target === op.source || sources.has(op.target)) continue;
    if (invalid.has(op.source)) continue;
    let occupied: boolean;
    try {
      occupied =
        fs.stat(op.target) !== null && !isCaseOnlyAlias(fs, op.source, op.target);
    } catch (e) {
      conflicts.push({
        kind: 'invalidTarget',
        source: op.source,
        target: op.target,
        reason: `cannot check target: ${isErrnoException(e) && e.code ? e.code : errorMessage(e)}`,
      });
      continue;
    }
    if (!occupied) continue;
    conflicts.push({
      kind: 'externalCollision',
      source: op.source,
      target: op.target,
    });
  }

  for (const paths of findCycles(ops)) {
    conflicts.push({ kind: 'cycle', paths });
  }

  return conflicts;
}

/**
 * Build and resolve in one step. Preview and execution both go through
 * here so they always agree.
 */
export function planRename(
  sources: string[],
  spec: TransformSpec,
  options: PlanOptions = {},
): BuildOutcome {
  const outcome = buildPlan(sources, spec, options);
  if (!outcome.ok) return outcome;
  try {
    return { ok: true, plan: resolvePlan(outcome.plan, options) };
  } catch (e) {
    return fail(
      new PlanBuildError('STAGING_FAILED', errorMessage(e), [], { cause: e }),
    );
  }
}

export function isExecutable(plan: Plan): boolean {
  return plan.conflicts.length === 0;
}

/**
 * Fold temporary/final pairs back into one `(source, target)` row per file
 * for display. Direct ops pass through.
 */
export function previewPairs(
  plan: Plan,
): { source: string; target: string; stage: RenameOp['stage'] }[] {
  const originOfTemp = new Map<string, string>();
  const pairs: { source: string; target: string; stage: RenameOp['stage'] }[] =
    [];
  for (const op of plan.ops) {
    if (op.stage === 'temporary') {
      originOfTemp.set(op.target, op.source);
    } else if (op.stage === 'final') {
      pairs.push({
        source: originOfTemp.get(op.source) ?? op.source,
        target: op.target,
        stage: 'final',
      });
    } else if (op.source !== op.target) {
      pairs.push({ source: op.source, target: op.target, stage: 'direct' });
    }
  }
  return pairs;
}
