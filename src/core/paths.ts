import { dirname, sep } from 'node:path';

function dirPrefix(path: string): string {
  const dir = dirname(path);
  return dir.endsWith(sep) ? dir : `${dir}${sep}`;
}

/**
 * Place `name` beside `path`. Unlike join() this never normalises, so a
 * name such as `../x` stays visible to validation.
 */
export function siblingPath(path: string, name: string): string {
  return `${dirPrefix(path)}${name}`;
}

/**
 * The part of `target` below `source`'s directory, or null when `target`
 * is somewhere else.
 */
export function nameWithinDir(source: string, target: string): string | null {
  const prefix = dirPrefix(source);
  return target.startsWith(prefix) ? target.slice(prefix.length) : null;
}
