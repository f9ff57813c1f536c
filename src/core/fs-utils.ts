import {
  lstatSync,
  renameSync,
  type Stats,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { isErrnoException } from './errors.js';

/**
 * Atomically write a file by writing to a temp file and renaming.
 * renameSync replaces a symlink at `path` rather than writing through it.
 */
export function safeWriteFile(
  path: string,
  content: string,
  options?: { mode?: number },
): void {
  const tmp = `${path}.tmp.${process.pid}`;
  try {
    writeFileSync(tmp, content, { encoding: 'utf-8', mode: options?.mode });
    renameSync(tmp, path);
  } catch (e) {
    // Clean up temp file on failure
    try {
      unlinkSync(tmp);
    } catch {
      /* tmp may never have been created */
    }
    throw e;
  }
}

export interface FileStat {
  dev: number;
  ino: number;
  size: number;
  mtime: Date;
  isFile: boolean;
}

/**
 * The slice of the filesystem the planner and executor touch.
 * `stat` does not follow symlinks and returns null for a missing path
 * (ENOENT, or ENOTDIR when a parent is not a directory); any other errno
 * is thrown.
 */
export interface RenameFs {
  stat(path: string): FileStat | null;
  rename(from: string, to: string): void;
}

export const nodeRenameFs: RenameFs = {
  stat(path) {
    let s: Stats;
    try {
      s = lstatSync(path);
    } catch (e) {
      if (isErrnoException(e) && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) {
        return null;
      }
      throw e;
    }
    return {
      dev: s.dev,
      ino: s.ino,
      size: s.size,
      mtime: s.mtime,
      isFile: s.isFile(),
    };
  },
  rename(from, to) {
    renameSync(from, to);
  },
};

/**
 * True when `target` is just `source` spelled with different case and both
 * resolve to the same file, i.e. a case-only rename on a case-insensitive
 * filesystem.
 */
export function isCaseOnlyAlias(
  fs: RenameFs,
  source: string,
  target: string,
): boolean {
  if (source === target || source.toLowerCase() !== target.toLowerCase()) {
    return false;
  }
  const a = fs.stat(source);
  const b = fs.stat(target);
  return a !== null && b !== null && a.dev === b.dev && a.ino === b.ino;
}
