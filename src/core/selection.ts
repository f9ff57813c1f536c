import { readdirSync, type Stats, statSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { SortOrder } from '../types.js';
import { debug } from '../ui/logger.js';
import { errorMessage } from './errors.js';

export interface SelectOptions {
  sort?: SortOrder;
  includeHidden?: boolean;
}

export interface SelectionInput {
  directory: string;
  pattern: string | null;
}

const GLOB_CHARS = /[*?[]/;

/**
 * Split the CLI path argument into a directory and an optional filename
 * glob. Wildcards are only honoured in the last segment.
 */
export function parseSelectionInput(input: string): SelectionInput {
  if (!GLOB_CHARS.test(input)) return { directory: input, pattern: null };
  return { directory: dirname(input), pattern: basename(input) };
}

/** Translate `*`, `?` and `[...]` into an anchored RegExp. */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (let i = 0; i < glob.length; i++) {
    const c = glob[i];
    if (c === '*') {
      source += '[^/]*';
    } else if (c === '?') {
      source += '[^/]';
    } else if (c === '[') {
      const close = glob.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = glob.slice(i + 1, close).replace(/\\/g, '\\\\');
      if (body.startsWith('!')) body = `^${body.slice(1)}`;
      source += `[${body}]`;
      i = close;
    } else {
      source += c.replace(/[.+^${}()|\\\]]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

const collator = new Intl.Collator(undefined, { sensitivity: 'base' });

function compareEntries(
  sort: SortOrder,
  a: { name: string; stat: Stats },
  b: { name: string; stat: Stats },
): number {
  let byKey = 0;
  if (sort === 'modified') {
    byKey = a.stat.mtime.getTime() - b.stat.mtime.getTime();
  } else if (sort === 'size') {
    byKey = a.stat.size - b.stat.size;
  }
  return byKey !== 0 ? byKey : collator.compare(a.name, b.name);
}

/** Follows symlinks; a dangling or unreadable entry is skipped. */
function targetStat(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch (e) {
    debug(`select: skipping ${path}: ${errorMessage(e)}`);
    return undefined;
  }
}

/**
 * List the regular files a CLI path argument names, in the order they
 * should be numbered. Symlinks to regular files count as files. Does not
 * recurse.
 */
export function selectFiles(
  input: string,
  options: SelectOptions = {},
): string[] {
  const sort = options.sort ?? 'name';
  const { directory, pattern } = parseSelectionInput(input);
  const matcher = pattern === null ? null : globToRegExp(pattern);
  // a pattern that starts with a dot asks for hidden files explicitly
  const showHidden = options.includeHidden || pattern?.startsWith('.') === true;

  const entries: { name: string; stat: Stats }[] = [];
  for (const name of readdirSync(directory)) {
    if (name.startsWith('.') && !showHidden) continue;
    if (matcher && !matcher.test(name)) continue;
    const stat = targetStat(join(directory, name));
    if (!stat?.isFile()) continue;
    entries.push({ name, stat });
  }

  entries.sort((a, b) => compareEntries(sort, a, b));
  return entries.map((e) => join(directory, e.name));
}
