import { UNKNOWN_DATE } from '../constants.js';
import {
  type DatePosition,
  type TransformContext,
  type TransformSpec,
  TransformSpecSchema,
} from '../types.js';
import { TransformError, errorMessage } from './errors.js';

/** A validated spec, ready to run over many filenames. */
export interface CompiledTransform {
  readonly spec: TransformSpec;
  apply(filename: string, index: number, context?: TransformContext): string;
}

/** Runs of the numbering placeholder, e.g. `###`. */
const PLACEHOLDER_RUN = /#+/g;

/** Word separators for title case. */
const TITLE_BREAK = /[\s_-]/u;

/**
 * Split a filename at its last dot. The extension keeps the dot;
 * a name without a dot has an empty extension.
 */
export function splitExtension(filename: string): { stem: string; ext: string } {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) return { stem: filename, ext: '' };
  return { stem: filename.slice(0, dot), ext: filename.slice(dot) };
}

export function toTitleCase(s: string): string {
  let out = '';
  let capitalizeNext = true;
  for (const c of s) {
    if (TITLE_BREAK.test(c)) {
      out += c;
      capitalizeNext = true;
    } else if (capitalizeNext) {
      out += c.toUpperCase();
      capitalizeNext = false;
    } else {
      out += c.toLowerCase();
    }
  }
  return out;
}

/** `YYYYMMDD` in UTC. */
export function formatDate(date: Date): string {
  const y = String(date.getUTCFullYear()).padStart(4, '0');
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

function insertDate(
  filename: string,
  position: DatePosition,
  modified: Date | undefined,
): string {
  const date = modified ? formatDate(modified) : UNKNOWN_DATE;
  const { stem, ext } = splitExtension(filename);
  switch (position) {
    case 'prefix':
      return `${date}_${stem}${ext}`;
    case 'suffix':
      return `${stem}_${date}${ext}`;
    case 'replace':
      return `${date}${ext}`;
  }
}

function applyNumbering(
  filename: string,
  pattern: string,
  value: number,
): string {
  const { ext } = splitExtension(filename);
  // padStart never truncates, so numbers wider than the run come out whole
  const name = pattern.replace(PLACEHOLDER_RUN, (run) =>
    String(value).padStart(run.length, '0'),
  );
  return `${name}${ext}`;
}

function compileRegex(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'gu');
  } catch (e) {
    throw new TransformError(
      'INVALID_PATTERN',
      `Invalid regex /${pattern}/: ${errorMessage(e)}`,
      { cause: e },
    );
  }
}

/**
 * Validate a spec and prepare it for application. Invalid specs and
 * uncompilable regexes fail here, before any filename is seen.
 */
export function compileTransform(input: TransformSpec): CompiledTransform {
  const parsed = TransformSpecSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TransformError(
      'INVALID_SPEC',
      `Invalid transform: ${issue ? issue.message : 'unknown shape'}`,
      { cause: parsed.error },
    );
  }
  const spec = parsed.data;

  switch (spec.mode) {
    case 'searchReplace':
      return {
        spec,
        // split/join keeps `$` in the replacement literal
        apply: (filename) => filename.split(spec.search).join(spec.replace),
      };

    case 'regex': {
      const re = compileRegex(spec.pattern);
      return {
        spec,
        apply: (filename) => filename.replace(re, spec.replacement),
      };
    }

    case 'numbering': {
      const step = spec.step ?? 1;
      return {
        spec,
        apply: (filename, index) =>
          applyNumbering(filename, spec.pattern, spec.start + index * step),
      };
    }

    case 'prefix':
      return {
        spec,
        apply: (filename) => {
          if (spec.action === 'add') return `${spec.text}${filename}`;
          return filename.startsWith(spec.text)
            ? filename.slice(spec.text.length)
            : filename;
        },
      };

    case 'suffix':
      return {
        spec,
        apply: (filename) => {
          const { stem, ext } = splitExtension(filename);
          if (spec.action === 'add') return `${stem}${spec.text}${ext}`;
          return stem.endsWith(spec.text)
            ? `${stem.slice(0, stem.length - spec.text.length)}${ext}`
            : filename;
        },
      };

    case 'case':
      return {
        spec,
        apply: (filename) => {
          switch (spec.style) {
            case 'upper':
              return filename.toUpperCase();
            case 'lower':
              return filename.toLowerCase();
            case 'title': {
              const { stem, ext } = splitExtension(filename);
              return `${toTitleCase(stem)}${ext}`;
            }
          }
        },
      };

    case 'date':
      return {
        spec,
        apply: (filename, _index, context) =>
          insertDate(filename, spec.position, context?.modified),
      };
  }
}

/** One-shot form of {@link compileTransform}. */
export function applyTransform(
  filename: string,
  spec: TransformSpec,
  index: number,
  context?: TransformContext,
): string {
  return compileTransform(spec).apply(filename, index, context);
}

// ── Name parsing for flags and prompts ──

export type ModeName =
  | 'searchReplace'
  | 'regex'
  | 'numbering'
  | 'prefix'
  | 'suffix'
  | 'date'
  | 'upper'
  | 'lower'
  | 'title';

const MODE_ALIASES: Record<string, ModeName> = {
  search: 'searchReplace',
  searchreplace: 'searchReplace',
  'search-replace': 'searchReplace',
  s: 'searchReplace',
  regex: 'regex',
  r: 'regex',
  numbering: 'numbering',
  number: 'numbering',
  num: 'numbering',
  n: 'numbering',
  prefix: 'prefix',
  pre: 'prefix',
  suffix: 'suffix',
  suf: 'suffix',
  date: 'date',
  dateinsert: 'date',
  'date-insert': 'date',
  d: 'date',
  upper: 'upper',
  uppercase: 'upper',
  u: 'upper',
  lower: 'lower',
  lowercase: 'lower',
  l: 'lower',
  title: 'title',
  titlecase: 'title',
  t: 'title',
};

const DATE_POSITION_ALIASES: Record<string, DatePosition> = {
  prefix: 'prefix',
  pre: 'prefix',
  p: 'prefix',
  suffix: 'suffix',
  suf: 'suffix',
  s: 'suffix',
  replace: 'replace',
  rep: 'replace',
  r: 'replace',
};

function lookupAlias<T>(table: Record<string, T>, name: string): T | null {
  const key = name.toLowerCase();
  return Object.hasOwn(table, key) ? table[key] : null;
}

export function parseModeName(name: string): ModeName | null {
  return lookupAlias(MODE_ALIASES, name);
}

export function parseDatePosition(name: string): DatePosition | null {
  return lookupAlias(DATE_POSITION_ALIASES, name);
}

export function describeTransform(spec: TransformSpec): string {
  switch (spec.mode) {
    case 'searchReplace':
      return `Search '${spec.search}' → replace '${spec.replace}'`;
    case 'regex':
      return `Regex /${spec.pattern}/ → '${spec.replacement}'`;
    case 'numbering': {
      const step = spec.step ?? 1;
      return `Numbering '${spec.pattern}' from ${spec.start}${step === 1 ? '' : ` step ${step}`}`;
    }
    case 'prefix':
    case 'suffix':
      return `${spec.action === 'add' ? 'Add' : 'Remove'} ${spec.mode} '${spec.text}'`;
    case 'case':
      return `${spec.style[0].toUpperCase()}${spec.style.slice(1)} case`;
    case 'date':
      return `Modification date (YYYYMMDD) as ${spec.position}`;
  }
}
