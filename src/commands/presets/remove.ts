import type { Command } from 'commander';
import {
  getPreset,
  loadConfig,
  removePresetFromConfig,
  saveConfig,
} from '../../core/config.js';
import { errorMessage } from '../../core/errors.js';
import type { ProgramOptions } from '../../program.js';
import { error, success } from '../../ui/logger.js';
import { confirmAction } from '../../ui/prompts.js';

export function registerPresetRemoveCommand(
  program: Command,
  options: ProgramOptions = {},
): void {
  program
    .command('remove <name>')
    .alias('rm')
    .description('Delete a saved preset')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (name: string, opts: { yes?: boolean }) => {
      try {
        const config = loadConfig(options.configPath);
        if (!getPreset(config, name)) {
          error(`Preset "${name}" not found.`);
          process.exitCode = 1;
          return;
        }

        if (!opts.yes) {
          const confirmed = await confirmAction(`Remove preset "${name}"?`);
          if (!confirmed) return;
        }

        saveConfig(removePresetFromConfig(config, name), options.configPath);
        success(`Removed preset "${name}".`);
      } catch (e) {
        error(errorMessage(e));
        process.exitCode = 1;
      }
    });
}
