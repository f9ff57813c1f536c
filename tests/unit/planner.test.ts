import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, sep } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildPlan,
  invalidNameReason,
  isExecutable,
  planRename,
  previewPairs,
} from '../../src/core/planner.js';
import { nodeRenameFs, type RenameFs } from '../../src/core/fs-utils.js';
import type { TransformSpec } from '../../src/types.js';

let dir: string;
const p = (name: string) => join(dir, name);

function touch(...names: string[]): void {
  for (const name of names) writeFileSync(p(name), name);
}

const swapByNumber: TransformSpec = { mode: 'numbering', pattern: 'x_#', start: 1 };

/** Real filesystem, except `stat` fails with EACCES where `denied` says so. */
function deniedFs(denied: (path: string) => boolean): RenameFs {
  return {
    stat(path) {
      if (denied(path)) {
        throw Object.assign(new Error(`EACCES: ${path}`), { code: 'EACCES' });
      }
      return nodeRenameFs.stat(path);
    },
    rename: (from, to) => nodeRenameFs.rename(from, to),
  };
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'rnm-planner-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('buildPlan errors', () => {
  it('rejects an empty source list', () => {
    const outcome = buildPlan([], { mode: 'case', style: 'upper' });
    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.code).toBe('EMPTY_SOURCES');
    expect(outcome.plan).toEqual({ ops: [], conflicts: [] });
  });

  it('rejects a source listed twice', () => {
    touch('a.txt');
    const outcome = buildPlan([p('a.txt'), p('a.txt')], { mode: 'case', style: 'upper' });
    expect(!outcome.ok && outcome.error.code).toBe('DUPLICATE_SOURCE');
    expect(!outcome.ok && outcome.error.paths).toEqual([p('a.txt')]);
  });

  it('rejects a missing source', () => {
    touch('a.txt');
    const outcome = buildPlan([p('a.txt'), p('gone.txt')], { mode: 'case', style: 'upper' });
    expect(!outcome.ok && outcome.error.code).toBe('MISSING_SOURCE');
    expect(!outcome.ok && outcome.error.message).toBe(
      `Source does not exist: ${p('gone.txt')}`,
    );
  });

  it('reports a source that cannot be checked', () => {
    touch('a.txt');
    const outcome = buildPlan([p('a.txt')], { mode: 'case', style: 'upper' }, {
      fs: deniedFs((path) => path === p('a.txt')),
    });
    expect(!outcome.ok && outcome.error.code).toBe('UNREADABLE_SOURCE');
  });

  it('reports a bad regex as INVALID_PATTERN', () => {
    touch('a.txt');
    const outcome = buildPlan([p('a.txt')], { mode: 'regex', pattern: '[', replacement: '' });
    expect(!outcome.ok && outcome.error.code).toBe('INVALID_PATTERN');
  });
});

describe('buildPlan', () => {
  it('maps each source to a sibling target in input order', () => {
    touch('b.txt', 'a.txt');
    const outcome = buildPlan([p('b.txt'), p('a.txt')], {
      mode: 'searchReplace',
      search: 'txt',
      replace: 'md',
    });
    expect(outcome).toEqual({
      ok: true,
      plan: {
        ops: [
          { source: p('b.txt'), target: p('b.md'), stage: 'direct' },
          { source: p('a.txt'), target: p('a.md'), stage: 'direct' },
        ],
        conflicts: [],
      },
    });
  });

  it('keeps unchanged names as ops without conflicts', () => {
    touch('a.txt');
    const outcome = buildPlan([p('a.txt')], {
      mode: 'searchReplace',
      search: 'zzz',
      replace: 'y',
    });
    expect(outcome.plan.ops).toEqual([
      { source: p('a.txt'), target: p('a.txt'), stage: 'direct' },
    ]);
    expect(outcome.plan.conflicts).toEqual([]);
  });

  it('detects two sources claiming one target', () => {
    touch('a1.txt', 'a2.txt');
    const { plan } = buildPlan([p('a1.txt'), p('a2.txt')], {
      mode: 'regex',
      pattern: '\\d',
      replacement: '',
    });
    expect(plan.conflicts).toEqual([
      { kind: 'duplicateTarget', target: p('a.txt'), sources: [p('a1.txt'), p('a2.txt')] },
    ]);
  });

  it('detects a target occupied by a file outside the plan', () => {
    touch('a.txt', 'b.txt');
    const { plan } = buildPlan([p('a.txt')], {
      mode: 'searchReplace',
      search: 'a',
      replace: 'b',
    });
    expect(plan.conflicts).toEqual([
      { kind: 'externalCollision', source: p('a.txt'), target: p('b.txt') },
    ]);
  });

  it('detects a swap as a cycle', () => {
    touch('x_1', 'x_2');
    const { plan } = buildPlan([p('x_2'), p('x_1')], swapByNumber);
    expect(plan.conflicts).toEqual([{ kind: 'cycle', paths: [p('x_2'), p('x_1')] }]);
  });

  it('flags a name with a path separator', () => {
    touch('a.txt');
    const { plan } = buildPlan([p('a.txt')], {
      mode: 'searchReplace',
      search: 'a',
      replace: '../a',
    });
    expect(plan.conflicts).toEqual([
      {
        kind: 'invalidTarget',
        source: p('a.txt'),
        target: `${dir}${sep}../a.txt`,
        reason: 'filename contains a path separator',
      },
    ]);
  });

  it('flags an empty name without also reporting a collision', () => {
    touch('a.txt');
    const { plan } = buildPlan([p('a.txt')], {
      mode: 'searchReplace',
      search: 'a.txt',
      replace: '',
    });
    expect(plan.conflicts).toHaveLength(1);
    expect(plan.conflicts[0]).toMatchObject({
      kind: 'invalidTarget',
      reason: 'empty filename',
    });
  });
});

describe('buildPlan name limits', () => {
  it('flags a name pushed past the length limit', () => {
    const long = `${'b'.repeat(250)}.txt`;
    touch(long);
    const outcome = buildPlan([p(long)], { mode: 'prefix', text: 'copy_', action: 'add' });
    expect(outcome.ok).toBe(true);
    expect(outcome.plan.conflicts).toEqual([
      {
        kind: 'invalidTarget',
        source: p(long),
        target: p(`copy_${long}`),
        reason: 'name longer than 255 bytes',
      },
    ]);
  });

  it('counts bytes, not characters', () => {
    expect(invalidNameReason('é'.repeat(127))).toBeNull();
    expect(invalidNameReason('é'.repeat(128))).toBe('name longer than 255 bytes');
  });

  it('flags a target whose existence cannot be checked', () => {
    touch('a.txt');
    const { plan } = buildPlan(
      [p('a.txt')],
      { mode: 'searchReplace', search: 'a', replace: 'b' },
      { fs: deniedFs((path) => path === p('b.txt')) },
    );
    expect(plan.conflicts).toEqual([
      {
        kind: 'invalidTarget',
        source: p('a.txt'),
        target: p('b.txt'),
        reason: 'cannot check target: EACCES',
      },
    ]);
  });
});

describe('invalidNameReason', () => {
  it('accepts ordinary names', () => {
    expect(invalidNameReason('photo.jpg')).toBeNull();
    expect(invalidNameReason('.hidden')).toBeNull();
  });

  it('rejects reserved and malformed names', () => {
    expect(invalidNameReason('..')).toBe('reserved name ".."');
    expect(invalidNameReason('a\\b')).toBe('filename contains a path separator');
    expect(invalidNameReason('a\0b')).toBe('filename contains a NUL byte');
  });
});

describe('planRename', () => {
  it('resolves a swap into four staged ops', () => {
    touch('x_1', 'x_2');
    const outcome = planRename([p('x_2'), p('x_1')], swapByNumber);
    expect(outcome.ok).toBe(true);
    expect(outcome.plan.ops).toEqual([
      { source: p('x_2'), target: p('.x_2.rnm-tmp'), stage: 'temporary' },
      { source: p('x_1'), target: p('.x_1.rnm-tmp'), stage: 'temporary' },
      { source: p('.x_2.rnm-tmp'), target: p('x_1'), stage: 'final' },
      { source: p('.x_1.rnm-tmp'), target: p('x_2'), stage: 'final' },
    ]);
    expect(isExecutable(outcome.plan)).toBe(true);
  });

  it('avoids a temporary name already on disk', () => {
    touch('x_1', 'x_2', '.x_2.rnm-tmp');
    const { plan } = planRename([p('x_2'), p('x_1')], swapByNumber);
    expect(plan.ops[0]).toEqual({
      source: p('x_2'),
      target: p('.x_2.rnm-tmp-1'),
      stage: 'temporary',
    });
  });

  it('stages a swap of names close to the length limit', () => {
    const base = 'a'.repeat(249);
    touch(`${base}1`, `${base}2`);
    const outcome = planRename([p(`${base}2`), p(`${base}1`)], {
      mode: 'numbering',
      pattern: `${base}#`,
      start: 1,
    });
    expect(outcome.ok).toBe(true);
    expect(outcome.plan.ops.slice(0, 2)).toEqual([
      {
        source: p(`${base}2`),
        target: p(`.${'a'.repeat(246)}.rnm-tmp`),
        stage: 'temporary',
      },
      {
        source: p(`${base}1`),
        target: p(`.${'a'.repeat(244)}.rnm-tmp-1`),
        stage: 'temporary',
      },
    ]);
  });

  it('returns an outcome when temporary names cannot be checked', () => {
    touch('x_1', 'x_2');
    const outcome = planRename([p('x_2'), p('x_1')], swapByNumber, {
      fs: deniedFs((path) => path.endsWith('.rnm-tmp')),
    });
    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.code).toBe('STAGING_FAILED');
    expect(outcome.plan).toEqual({ ops: [], conflicts: [] });
  });

  it('orders a shifting sequence', () => {
    touch('f1', 'f2');
    const { plan } = planRename([p('f1'), p('f2')], {
      mode: 'numbering',
      pattern: 'f#',
      start: 2,
    });
    expect(plan.ops).toEqual([
      { source: p('f2'), target: p('f3'), stage: 'direct' },
      { source: p('f1'), target: p('f2'), stage: 'direct' },
    ]);
  });

  it('leaves unresolvable conflicts on the plan', () => {
    touch('a1.txt', 'a2.txt');
    const { plan } = planRename([p('a1.txt'), p('a2.txt')], {
      mode: 'regex',
      pattern: '\\d',
      replacement: '',
    });
    expect(isExecutable(plan)).toBe(false);
    expect(plan.conflicts.map((c) => c.kind)).toEqual(['duplicateTarget']);
  });
});

describe('previewPairs', () => {
  it('folds staged ops back into one row per file', () => {
    touch('x_1', 'x_2');
    const { plan } = planRename([p('x_2'), p('x_1')], swapByNumber);
    expect(previewPairs(plan)).toEqual([
      { source: p('x_2'), target: p('x_1'), stage: 'final' },
      { source: p('x_1'), target: p('x_2'), stage: 'final' },
    ]);
  });

  it('skips unchanged names', () => {
    expect(
      previewPairs({
        ops: [
          { source: '/d/a', target: '/d/a', stage: 'direct' },
          { source: '/d/b', target: '/d/c', stage: 'direct' },
        ],
        conflicts: [],
      }),
    ).toEqual([{ source: '/d/b', target: '/d/c', stage: 'direct' }]);
  });
});
