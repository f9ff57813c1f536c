import { describe, expect, it } from 'vitest';
import { SAFE_ID_RE, sanitizePath } from '../../src/constants.js';

describe('SAFE_ID_RE', () => {
  it('accepts valid preset names', () => {
    expect(SAFE_ID_RE.test('photos')).toBe(true);
    expect(SAFE_ID_RE.test('tidy-v2.1')).toBe(true);
    expect(SAFE_ID_RE.test('my_preset')).toBe(true);
  });

  it('rejects names with slashes or spaces', () => {
    expect(SAFE_ID_RE.test('path/traversal')).toBe(false);
    expect(SAFE_ID_RE.test('my preset')).toBe(false);
  });

  it('rejects empty string', () => {
    expect(SAFE_ID_RE.test('')).toBe(false);
  });
});

describe('sanitizePath', () => {
  it('strips newlines and escape characters', () => {
    expect(sanitizePath('bad\nname\x1b[31m.txt')).toBe('badname[31m.txt');
  });

  it('keeps tabs', () => {
    expect(sanitizePath('a\tb.txt')).toBe('a\tb.txt');
  });
});
