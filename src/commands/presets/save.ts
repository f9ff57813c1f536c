import type { Command } from 'commander';
import { SAFE_ID_RE } from '../../constants.js';
import { addPresetToConfig, loadConfig, saveConfig } from '../../core/config.js';
import { errorMessage } from '../../core/errors.js';
import { compileTransform, describeTransform } from '../../core/transform.js';
import type { Preset, SortOrder } from '../../types.js';
import type { ProgramOptions } from '../../program.js';
import { error, info, success } from '../../ui/logger.js';
import {
  addTransformOptions,
  hasTransformFlags,
  parseSortOrder,
  type TransformFlags,
  transformFromFlags,
} from '../transform-options.js';

interface SaveFlags extends TransformFlags {
  sort?: SortOrder;
}

export function registerPresetSaveCommand(
  program: Command,
  options: ProgramOptions = {},
): void {
  const cmd = program
    .command('save <name>')
    .description('Save the given rename flags as a named preset')
    .option('--sort <order>', 'Sort order to store with the preset', parseSortOrder);

  addTransformOptions(cmd).action(async (name: string, opts: SaveFlags) => {
    if (!SAFE_ID_RE.test(name)) {
      error(
        `Invalid preset name "${name}". Use only letters, numbers, dots, hyphens, and underscores.`,
      );
      process.exitCode = 1;
      return;
    }

    if (!hasTransformFlags(opts)) {
      error('Nothing to save. Pass rename flags such as --search, --pattern or --prefix.');
      process.exitCode = 1;
      return;
    }

    try {
      const config = loadConfig(options.configPath);
      const resolved = transformFromFlags(opts, config);
      compileTransform(resolved.spec);

      const preset: Preset = { spec: resolved.spec };
      const sort = opts.sort ?? resolved.sort;
      if (sort) preset.sort = sort;

      const replacing = Object.hasOwn(config.presets, name);
      saveConfig(addPresetToConfig(config, name, preset), options.configPath);
      success(`${replacing ? 'Updated' : 'Saved'} preset "${name}".`);
      info(`  ${describeTransform(preset.spec)}`);
    } catch (e) {
      error(errorMessage(e));
      process.exitCode = 1;
    }
  });
}
