import { type Command, InvalidArgumentError } from 'commander';
import { getPreset } from '../core/config.js';
import { parseDatePosition, parseModeName } from '../core/transform.js';
import type { Config, SortOrder, TransformSpec } from '../types.js';

export interface TransformFlags {
  search?: string;
  replace?: string;
  mode?: string;
  pattern?: string;
  start?: number;
  step?: number;
  prefix?: string;
  suffix?: string;
  removePrefix?: string;
  removeSuffix?: string;
  case?: string;
  date?: boolean;
  datePosition?: string;
  preset?: string;
}

export interface ResolvedTransform {
  spec: TransformSpec;
  /** Sort order stored with a preset, if any. */
  sort?: SortOrder;
}

const SORT_ORDERS: readonly SortOrder[] = ['name', 'modified', 'size'];

export function parseSortOrder(value: string): SortOrder {
  const match = SORT_ORDERS.find((s) => s === value.toLowerCase());
  if (!match) {
    throw new InvalidArgumentError(`Must be one of: ${SORT_ORDERS.join(', ')}.`);
  }
  return match;
}

export function parseWholeNumber(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a whole number.');
  }
  return Number(value);
}

/** Register the flags that describe a transform. */
export function addTransformOptions(cmd: Command): Command {
  return cmd
    .option('-s, --search <text>', 'Text (or regex with --mode regex) to find')
    .option('-r, --replace <text>', 'Replacement text', '')
    .option(
      '-m, --mode <mode>',
      'Rename mode: search, regex, numbering, prefix, suffix, date, upper, lower, title',
    )
    .option('--pattern <pattern>', 'Numbering pattern, one # per digit (e.g. "photo_###")')
    .option('--start <n>', 'First number for numbering', parseWholeNumber)
    .option('--step <n>', 'Increment between numbers', parseWholeNumber)
    .option('--prefix <text>', 'Add a prefix')
    .option('--suffix <text>', 'Add a suffix before the extension')
    .option('--remove-prefix <text>', 'Remove a prefix')
    .option('--remove-suffix <text>', 'Remove a suffix before the extension')
    .option('--case <style>', 'Change case: upper, lower, title')
    .option('--date', 'Insert the modification date (YYYYMMDD)')
    .option('--date-position <pos>', 'Where to put the date: prefix, suffix, replace', 'prefix')
    .option('-p, --preset <name>', 'Use a saved preset');
}

export function hasTransformFlags(flags: TransformFlags): boolean {
  return Boolean(
    flags.search !== undefined ||
      flags.mode ||
      flags.pattern !== undefined ||
      flags.prefix !== undefined ||
      flags.suffix !== undefined ||
      flags.removePrefix !== undefined ||
      flags.removeSuffix !== undefined ||
      flags.case ||
      flags.date ||
      flags.preset,
  );
}

function numbering(pattern: string, flags: TransformFlags): TransformSpec {
  const start = flags.start ?? 1;
  return flags.step === undefined
    ? { mode: 'numbering', pattern, start }
    : { mode: 'numbering', pattern, start, step: flags.step };
}

function requireSearch(flags: TransformFlags, what: string): string {
  if (!flags.search) throw new Error(`${what} needs --search.`);
  return flags.search;
}

/**
 * Turn parsed flags into a transform. Precedence: preset, date, prefix,
 * suffix, remove-prefix, remove-suffix, pattern, case, then --mode.
 */
export function transformFromFlags(
  flags: TransformFlags,
  config: Config,
): ResolvedTransform {
  if (flags.preset) {
    const preset = getPreset(config, flags.preset);
    if (!preset) throw new Error(`Preset "${flags.preset}" not found.`);
    return { spec: preset.spec, sort: preset.sort };
  }

  const position = parseDatePosition(flags.datePosition ?? 'prefix');
  if (!position) {
    throw new Error(
      `Unknown date position "${flags.datePosition}". Use prefix, suffix or replace.`,
    );
  }

  if (flags.date) return { spec: { mode: 'date', position } };
  if (flags.prefix !== undefined) {
    return { spec: { mode: 'prefix', text: flags.prefix, action: 'add' } };
  }
  if (flags.suffix !== undefined) {
    return { spec: { mode: 'suffix', text: flags.suffix, action: 'add' } };
  }
  if (flags.removePrefix !== undefined) {
    return { spec: { mode: 'prefix', text: flags.removePrefix, action: 'remove' } };
  }
  if (flags.removeSuffix !== undefined) {
    return { spec: { mode: 'suffix', text: flags.removeSuffix, action: 'remove' } };
  }
  if (flags.pattern !== undefined) {
    return { spec: numbering(flags.pattern, flags) };
  }
  if (flags.case) {
    const mode = parseModeName(flags.case);
    if (mode !== 'upper' && mode !== 'lower' && mode !== 'title') {
      throw new Error(`Unknown case "${flags.case}". Use upper, lower or title.`);
    }
    return { spec: { mode: 'case', style: mode } };
  }

  const mode = flags.mode ? parseModeName(flags.mode) : 'searchReplace';
  switch (mode) {
    case null:
      throw new Error(`Unknown mode "${flags.mode}".`);
    case 'searchReplace':
      return {
        spec: {
          mode,
          search: requireSearch(flags, 'Search & replace'),
          replace: flags.replace ?? '',
        },
      };
    case 'regex':
      return {
        spec: {
          mode,
          pattern: requireSearch(flags, 'Regex mode'),
          replacement: flags.replace ?? '',
        },
      };
    case 'numbering':
      throw new Error('Numbering needs --pattern.');
    case 'prefix':
    case 'suffix':
      return {
        spec: { mode, text: requireSearch(flags, `${mode} mode`), action: 'add' },
      };
    case 'date':
      return { spec: { mode, position } };
    case 'upper':
    case 'lower':
    case 'title':
      return { spec: { mode: 'case', style: mode } };
  }
}
