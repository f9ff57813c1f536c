import { basename } from 'node:path';
import ora, { type Ora } from 'ora';
import { PREVIEW_RULE_WIDTH, sanitizePath } from '../constants.js';
import { previewPairs } from '../core/planner.js';
import { RnmError } from '../core/errors.js';
import { describeTransform } from '../core/transform.js';
import type {
  Conflict,
  Config,
  ExecutionResult,
  OpFailure,
  Plan,
} from '../types.js';

export function createSpinner(text: string): Ora {
  return ora({ text, stream: process.stderr });
}

function name(path: string): string {
  return sanitizePath(basename(path));
}

export function formatPreview(plan: Plan, fileCount: number): string {
  const pairs = previewPairs(plan);
  if (pairs.length === 0) {
    return '\nNo changes.\n';
  }

  const rule = '-'.repeat(PREVIEW_RULE_WIDTH);
  const lines: string[] = ['', 'Preview:', rule];
  for (const p of pairs) {
    const via = p.stage === 'final' ? '  (via temporary name)' : '';
    lines.push(`  ${name(p.source)} → ${name(p.target)}${via}`);
  }
  lines.push(rule);
  lines.push(`${pairs.length} of ${fileCount} file(s) will be renamed.`);
  lines.push('');
  return lines.join('\n');
}

export function formatConflict(c: Conflict): string {
  switch (c.kind) {
    case 'duplicateTarget':
      return `Duplicate target ${name(c.target)} ← ${c.sources.map(name).join(', ')}`;
    case 'externalCollision':
      return `${name(c.target)} already exists (from ${name(c.source)})`;
    case 'invalidTarget':
      return `Invalid name for ${name(c.source)}: ${c.reason}`;
    case 'cycle':
      return `Cycle: ${[...c.paths, c.paths[0]].map(name).join(' → ')}`;
  }
}

export function formatConflicts(conflicts: Conflict[]): string {
  const lines: string[] = ['', 'Conflicts — nothing was renamed:', ''];
  for (const c of conflicts) {
    lines.push(`  ✗ ${formatConflict(c)}`);
  }
  lines.push('');
  return lines.join('\n');
}

/** Files moved into their final names; temporary hops are not counted. */
export function countRenamed(result: ExecutionResult): number {
  return result.applied.filter((op) => op.stage !== 'temporary').length;
}

export function formatExecutionResult(result: ExecutionResult): string {
  if (!result.failed) {
    return `Renamed ${countRenamed(result)} file(s).`;
  }

  const { op, cause } = result.failed;
  const lines: string[] = [
    '',
    `Rename failed at ${name(op.source)} → ${name(op.target)}: ${cause.message}`,
  ];

  if (result.rolledBack.length > 0) {
    lines.push('', 'Rolled back:');
    for (const r of result.rolledBack) {
      lines.push(`  ${name(r.target)} → ${name(r.source)}`);
    }
  }

  if (result.rollbackFailures.length > 0) {
    lines.push('', 'Could not roll back (check these files):');
    for (const f of result.rollbackFailures) {
      lines.push(`  ${name(f.op.target)} → ${name(f.op.source)}: ${f.cause.message}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

function failureJson(f: OpFailure): {
  source: string;
  target: string;
  code: string;
  message: string;
} {
  const code =
    f.cause instanceof RnmError ? f.cause.code : 'IO_ERROR';
  return { source: f.op.source, target: f.op.target, code, message: f.cause.message };
}

/** Machine-readable plan, plus the execution result when there is one. */
export function toJsonReport(plan: Plan, result?: ExecutionResult): string {
  const report: Record<string, unknown> = {
    ops: plan.ops,
    conflicts: plan.conflicts,
  };
  if (result) {
    report.result = {
      applied: result.applied,
      failed: result.failed ? failureJson(result.failed) : null,
      rolledBack: result.rolledBack,
      rollbackFailures: result.rollbackFailures.map(failureJson),
    };
  }
  return JSON.stringify(report, null, 2);
}

export function formatPresetList(config: Config): string {
  const names = Object.keys(config.presets).sort();
  if (names.length === 0) {
    return '\nNo presets saved. Save one with "rnm presets save <name> --search old --replace new".\n';
  }

  const lines: string[] = ['', 'Presets:', ''];
  for (const n of names) {
    const preset = config.presets[n];
    lines.push(`  \x1b[1m${n}\x1b[0m`);
    lines.push(`    ${describeTransform(preset.spec)}`);
    if (preset.sort) lines.push(`    Sort: ${preset.sort}`);
  }
  lines.push('');
  return lines.join('\n');
}
