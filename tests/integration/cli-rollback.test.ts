import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ExecutionResult, Plan } from '../../src/types.js';

// A rename that fails and cannot be undone is hard to stage on a real disk.
vi.mock('../../src/core/executor.js', () => ({
  executePlan: vi.fn(
    (plan: Plan): ExecutionResult => ({
      applied: [plan.ops[0]],
      failed: { op: plan.ops[0], cause: new Error('disk full') },
      rolledBack: [],
      rollbackFailures: [{ op: plan.ops[0], cause: new Error('stuck') }],
    }),
  ),
}));

const { createProgram } = await import('../../src/program.js');

let root: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'rnm-cli-rollback-'));
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  rmSync(root, { recursive: true, force: true });
});

describe('rnm run after a failed rollback', () => {
  it('warns about files left under new names', async () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderrSpy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);
    writeFileSync(join(root, 'a.txt'), 'a');

    await createProgram({ configPath: join(root, 'config.json') }).parseAsync([
      'node',
      'rnm',
      root,
      '--prefix',
      'new_',
      '-y',
    ]);

    const err = stderrSpy.mock.calls.map((call) => String(call[0])).join('');
    expect(err).toContain('  new_a.txt → a.txt: stuck\n');
    expect(err).toContain(
      '⚠ 1 file(s) could not be restored and keep their new or temporary names.\n',
    );
    expect(process.exitCode).toBe(1);
  });
});
