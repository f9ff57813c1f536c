import { basename } from 'node:path';
import { MAX_NAME_BYTES, MAX_TEMP_ATTEMPTS, TEMP_SUFFIX } from '../constants.js';
import type { Conflict, Plan, RenameOp } from '../types.js';
import { debug } from '../ui/logger.js';
import { nodeRenameFs, type RenameFs } from './fs-utils.js';
import { findCycles, type OrderUnit, orderUnits } from './graph.js';
import { siblingPath } from './paths.js';

interface OpUnit extends OrderUnit {
  ops: RenameOp[];
}

export interface ResolveOptions {
  fs?: RenameFs;
}

/**
 * Whether a conflict can be settled by ordering or staging. Anything else
 * stays on the plan and blocks execution.
 */
function isResolvable(conflict: Conflict, movingSources: Set<string>): boolean {
  switch (conflict.kind) {
    case 'duplicateTarget':
    case 'invalidTarget':
      return false;
    case 'externalCollision':
      // Only fine if some op in this plan moves the occupant away first.
      return movingSources.has(conflict.target);
    case 'cycle':
      return true;
  }
}

/** Longest prefix of `s` that fits in `maxBytes` of UTF-8, whole code points only. */
function truncateToBytes(s: string, maxBytes: number): string {
  let out = '';
  let bytes = 0;
  for (const c of s) {
    bytes += Buffer.byteLength(c, 'utf8');
    if (bytes > maxBytes) break;
    out += c;
  }
  return out;
}

/**
 * A name beside `source` that is free on disk and unused by the plan:
 * `.<name>.rnm-tmp`, then `.<name>.rnm-tmp-1`, `-2`, … with `<name>`
 * shortened as needed so the whole name stays within MAX_NAME_BYTES.
 */
export function temporaryPath(
  source: string,
  reserved: Set<string>,
  fs: RenameFs,
): string {
  const name = basename(source);
  for (let attempt = 0; attempt < MAX_TEMP_ATTEMPTS; attempt++) {
    const suffix = attempt === 0 ? TEMP_SUFFIX : `${TEMP_SUFFIX}-${attempt}`;
    const room = MAX_NAME_BYTES - Buffer.byteLength(`.${suffix}`, 'utf8');
    const candidate = siblingPath(source, `.${truncateToBytes(name, room)}${suffix}`);
    if (!reserved.has(candidate) && fs.stat(candidate) === null) {
      reserved.add(candidate);
      return candidate;
    }
  }
  throw new Error(`No free temporary name for ${source}.`);
}

function cycleUnit(
  members: { op: RenameOp; index: number }[],
  reserved: Set<string>,
  fs: RenameFs,
): OpUnit {
  const temps = members.map(({ op }) => temporaryPath(op.source, reserved, fs));
  return {
    rank: Math.min(...members.map((m) => m.index)),
    sources: members.map(({ op }) => op.source),
    targets: members.map(({ op }) => op.target),
    ops: [
      ...members.map(({ op }, i) => ({
        source: op.source,
        target: temps[i],
        stage: 'temporary' as const,
      })),
      ...members.map(({ op }, i) => ({
        source: temps[i],
        target: op.target,
        stage: 'final' as const,
      })),
    ],
  };
}

/**
 * Consume what can be settled: order chains so targets are vacated before
 * they are claimed, and stage cycles through temporary names. Ops that
 * leave a name unchanged are dropped. If anything unresolvable remains,
 * the ops come back unordered with only those conflicts attached.
 */
export function resolvePlan(plan: Plan, options: ResolveOptions = {}): Plan {
  const fs = options.fs ?? nodeRenameFs;
  const moving = plan.ops.filter((op) => op.source !== op.target);
  const movingSources = new Set(moving.map((op) => op.source));

  const blocking = plan.conflicts.filter(
    (c) => !isResolvable(c, movingSources),
  );
  if (blocking.length > 0) {
    debug(`resolve: ${blocking.length} unresolvable conflict(s) remain`);
    return { ops: moving, conflicts: blocking };
  }

  const reserved = new Set<string>();
  for (const op of plan.ops) {
    reserved.add(op.source);
    reserved.add(op.target);
  }

  const cycleOf = new Map<string, number>();
  const cycles = findCycles(moving);
  cycles.forEach((paths, i) => {
    for (const path of paths) cycleOf.set(path, i);
  });

  const cycleMembers: { op: RenameOp; index: number }[][] = cycles.map(() => []);
  const units: OpUnit[] = [];
  moving.forEach((op, index) => {
    const cycle = cycleOf.get(op.source);
    if (cycle === undefined) {
      units.push({
        rank: index,
        sources: [op.source],
        targets: [op.target],
        ops: [{ ...op, stage: 'direct' }],
      });
    } else {
      cycleMembers[cycle].push({ op, index });
    }
  });
  for (const members of cycleMembers) {
    units.push(cycleUnit(members, reserved, fs));
  }

  const ops = orderUnits(units).flatMap((unit) => unit.ops);
  debug(
    `resolve: ${ops.length} op(s), ${cycles.length} cycle(s) staged through temporary names`,
  );
  return { ops, conflicts: [] };
}
