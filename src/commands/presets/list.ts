import type { Command } from 'commander';
import { loadConfig } from '../../core/config.js';
import { errorMessage } from '../../core/errors.js';
import type { ProgramOptions } from '../../program.js';
import type { Config } from '../../types.js';
import { error, info } from '../../ui/logger.js';
import { formatPresetList } from '../../ui/output.js';

export function registerPresetListCommand(
  program: Command,
  options: ProgramOptions = {},
): void {
  program
    .command('list')
    .alias('ls')
    .description('List saved presets')
    .option('--json', 'Print presets as JSON')
    .action(async (opts: { json?: boolean }) => {
      let config: Config;
      try {
        config = loadConfig(options.configPath);
      } catch (e) {
        error(errorMessage(e));
        process.exitCode = 1;
        return;
      }

      if (opts.json) {
        info(JSON.stringify(config.presets, null, 2));
        return;
      }
      info(formatPresetList(config));
    });
}
