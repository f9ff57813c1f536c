import { homedir } from 'node:os';
import { join } from 'node:path';

// ── XDG config ──

const xdgConfig = process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
export const CONFIG_DIR = join(xdgConfig, 'rnm');
export const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

/** Per-directory overrides, looked up in the working directory. */
export const PROJECT_CONFIG_FILE = '.rnm.json';

// ── File permissions ──

export const CONFIG_FILE_MODE = 0o600;

// ── Presets ──

export const SAFE_ID_RE = /^[a-zA-Z0-9._-]+$/;

// ── Transforms ──

/** Used by date insertion when a file's modification time is unknown. */
export const UNKNOWN_DATE = '00000000';

// ── Names ──

/** NAME_MAX on common filesystems, in UTF-8 bytes. */
export const MAX_NAME_BYTES = 255;

// ── Temporary names ──

/** Appended to `.<name>` while a file sits outside its final name. */
export const TEMP_SUFFIX = '.rnm-tmp';

/** Upper bound on `-N` attempts when looking for a free temporary name. */
export const MAX_TEMP_ATTEMPTS = 10_000;

// ── Display ──

export const PREVIEW_RULE_WIDTH = 60;

/** Strip control characters from a path before printing it.
 *  Preserves tab (0x09) but removes 0x00-0x08 and 0x0A-0x1F. */
export function sanitizePath(p: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: stripping control chars
  return p.replace(/[\x00-\x08\x0A-\x1F]/g, '');
}

// ── Version ──

export const VERSION = '0.1.0';
