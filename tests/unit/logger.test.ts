import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { debug, error, success, warn } from '../../src/ui/logger.js';

describe('debug', () => {
  let stderrSpy: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    stderrSpy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);
  });

  afterEach(() => {
    stderrSpy.mockRestore();
    delete process.env.DEBUG;
  });

  it('outputs when DEBUG=1 is set at call time', () => {
    process.env.DEBUG = '1';
    debug('test message');
    expect(stderrSpy).toHaveBeenCalledWith('[debug] test message\n');
  });

  it('outputs when DEBUG=rnm is set at call time', () => {
    process.env.DEBUG = 'rnm';
    debug('test message');
    expect(stderrSpy).toHaveBeenCalledWith('[debug] test message\n');
  });

  it('ignores other DEBUG namespaces', () => {
    process.env.DEBUG = 'express';
    debug('test message');
    expect(stderrSpy).not.toHaveBeenCalled();
  });

  it('respects runtime changes to DEBUG env var', () => {
    delete process.env.DEBUG;
    debug('should not appear');
    expect(stderrSpy).not.toHaveBeenCalled();

    process.env.DEBUG = '1';
    debug('should appear');
    expect(stderrSpy).toHaveBeenCalledWith('[debug] should appear\n');
  });
});

describe('message prefixes', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes warnings and errors to stderr', () => {
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    warn('careful');
    error('broken');
    expect(spy).toHaveBeenNthCalledWith(1, '⚠ careful\n');
    expect(spy).toHaveBeenNthCalledWith(2, '✗ broken\n');
  });

  it('writes success to stdout', () => {
    const spy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    success('done');
    expect(spy).toHaveBeenCalledWith('✓ done\n');
  });
});
