import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import {
  CONFIG_FILE,
  CONFIG_FILE_MODE,
  PROJECT_CONFIG_FILE,
} from '../constants.js';
import { type Config, ConfigSchema, type Preset } from '../types.js';
import { errorMessage } from './errors.js';
import { safeWriteFile } from './fs-utils.js';

const DEFAULT_CONFIG: Config = {
  version: 1,
  defaults: {
    sort: 'name',
    includeHidden: false,
  },
  presets: {},
};

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new Error(
      `Invalid JSON in ${path}: ${errorMessage(e)}`,
    );
  }
}

export function loadConfig(globalPath?: string): Config {
  const path = globalPath ?? CONFIG_FILE;
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG, defaults: { ...DEFAULT_CONFIG.defaults } };
  }
  return ConfigSchema.parse(readJson(path));
}

/** Project config may set defaults, not presets. Fields are optional,
 *  not defaulted, so absent ones leave the global value in place. */
const ProjectConfigSchema = z.object({
  defaults: z
    .object({
      sort: z.enum(['name', 'modified', 'size']).optional(),
      includeHidden: z.boolean().optional(),
    })
    .optional(),
});

type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export function loadProjectConfig(cwd: string): ProjectConfig | null {
  const path = resolve(cwd, PROJECT_CONFIG_FILE);
  if (!existsSync(path)) return null;
  return ProjectConfigSchema.parse(readJson(path));
}

export function mergeConfigs(
  global: Config,
  project: ProjectConfig | null,
  cliFlags?: Partial<Config['defaults']>,
): Config {
  const merged: Config = {
    version: 1,
    defaults: { ...global.defaults },
    presets: { ...global.presets },
  };

  // Project configs can only override defaults, never inject presets.
  if (project?.defaults) {
    merged.defaults = { ...merged.defaults, ...project.defaults };
  }

  if (cliFlags) {
    merged.defaults = { ...merged.defaults, ...cliFlags };
  }

  return merged;
}

export function saveConfig(config: Config, path?: string): void {
  const filePath = path ?? CONFIG_FILE;
  mkdirSync(dirname(filePath), { recursive: true });
  safeWriteFile(filePath, `${JSON.stringify(config, null, 2)}\n`, {
    mode: CONFIG_FILE_MODE,
  });
}

// ── Presets ──

/** Add a preset, replacing any preset of the same name. */
export function addPresetToConfig(
  config: Config,
  name: string,
  preset: Preset,
): Config {
  return {
    ...config,
    presets: { ...config.presets, [name]: preset },
  };
}

export function removePresetFromConfig(config: Config, name: string): Config {
  const presets = { ...config.presets };
  delete presets[name];
  return { ...config, presets };
}

export function getPreset(config: Config, name: string): Preset | null {
  return Object.hasOwn(config.presets, name) ? config.presets[name] : null;
}

export function listPresetNames(config: Config): string[] {
  return Object.keys(config.presets).sort();
}
