import type { RenameOp } from '../types.js';

/**
 * Follow source → target → (target as source) → … from each op in input
 * order; a walk that returns to a path on its own trail is a cycle.
 * Identity ops are not edges, so an unchanged name never forms a cycle.
 */
export function findCycles(ops: RenameOp[]): string[][] {
  const next = new Map<string, string>();
  for (const op of ops) {
    if (op.target !== op.source) next.set(op.source, op.target);
  }

  const cycles: string[][] = [];
  const done = new Set<string>();

  for (const op of ops) {
    if (done.has(op.source)) continue;
    const trail: string[] = [];
    const onTrail = new Map<string, number>();
    let current: string | undefined = op.source;

    while (current !== undefined && !done.has(current)) {
      const seenAt = onTrail.get(current);
      if (seenAt !== undefined) {
        cycles.push(trail.slice(seenAt));
        break;
      }
      onTrail.set(current, trail.length);
      trail.push(current);
      current = next.get(current);
    }

    for (const path of trail) done.add(path);
  }

  return cycles;
}

/** Something that frees the `sources` paths and claims the `targets` paths. */
export interface OrderUnit {
  /** Tie-breaker; lower runs first among units that are ready together. */
  rank: number;
  sources: string[];
  targets: string[];
}

function insertByRank<U extends OrderUnit>(queue: U[], unit: U): void {
  const at = queue.findIndex((u) => u.rank > unit.rank);
  if (at === -1) queue.push(unit);
  else queue.splice(at, 0, unit);
}

/**
 * Topologically sort units so that a unit claiming a path runs after the
 * unit that vacates it. A unit's own sources never hold it back. Among
 * ready units the lowest rank goes first, which keeps input order wherever
 * no dependency forces otherwise.
 *
 * Throws if the units still contain a dependency cycle.
 */
export function orderUnits<U extends OrderUnit>(units: U[]): U[] {
  const vacatedBy = new Map<string, U>();
  for (const unit of units) {
    for (const source of unit.sources) vacatedBy.set(source, unit);
  }

  const waitingOn = new Map<U, number>();
  const dependents = new Map<U, U[]>();
  for (const unit of units) {
    let count = 0;
    for (const target of unit.targets) {
      const occupant = vacatedBy.get(target);
      if (occupant === undefined || occupant === unit) continue;
      count++;
      const list = dependents.get(occupant) ?? [];
      list.push(unit);
      dependents.set(occupant, list);
    }
    waitingOn.set(unit, count);
  }

  const ready: U[] = [];
  for (const unit of units) {
    if (waitingOn.get(unit) === 0) insertByRank(ready, unit);
  }

  const ordered: U[] = [];
  let unit = ready.shift();
  while (unit !== undefined) {
    ordered.push(unit);
    for (const dependent of dependents.get(unit) ?? []) {
      const left = (waitingOn.get(dependent) ?? 0) - 1;
      waitingOn.set(dependent, left);
      if (left === 0) insertByRank(ready, dependent);
    }
    unit = ready.shift();
  }

  if (ordered.length !== units.length) {
    throw new Error(
      `Cannot order renames: ${units.length - ordered.length} op(s) wait on each other.`,
    );
  }
  return ordered;
}
