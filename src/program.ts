import { Command } from 'commander';
import { VERSION } from './constants.js';
import { registerPresetListCommand } from './commands/presets/list.js';
import { registerPresetRemoveCommand } from './commands/presets/remove.js';
import { registerPresetSaveCommand } from './commands/presets/save.js';
import { registerRunCommand } from './commands/run.js';

export interface ProgramOptions {
  /** Global config file; defaults to the XDG location. */
  configPath?: string;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('rnm')
    .description('Batch-rename files with a preview and all-or-nothing apply')
    .version(VERSION);

  registerRunCommand(program, options);

  const presets = program
    .command('presets')
    .description('Manage saved rename presets');

  registerPresetListCommand(presets, options);
  registerPresetSaveCommand(presets, options);
  registerPresetRemoveCommand(presets, options);

  return program;
}
