import { resolve } from 'node:path';
import type { Command } from 'commander';
import { loadConfig, loadProjectConfig, mergeConfigs } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { executePlan } from '../core/executor.js';
import { planRename, previewPairs } from '../core/planner.js';
import { selectFiles } from '../core/selection.js';
import { describeTransform } from '../core/transform.js';
import type { Config, SortOrder } from '../types.js';
import { error, info, success, warn } from '../ui/logger.js';
import {
  createSpinner,
  formatConflicts,
  formatExecutionResult,
  formatPreview,
  toJsonReport,
} from '../ui/output.js';
import { confirmAction, promptTransformSpec } from '../ui/prompts.js';
import type { ProgramOptions } from '../program.js';
import {
  addTransformOptions,
  hasTransformFlags,
  parseSortOrder,
  type ResolvedTransform,
  type TransformFlags,
  transformFromFlags,
} from './transform-options.js';

interface RunFlags extends TransformFlags {
  dryRun?: boolean;
  yes?: boolean;
  sort?: SortOrder;
  all?: boolean;
  json?: boolean;
}

function cliDefaults(opts: RunFlags): Partial<Config['defaults']> {
  const flags: Partial<Config['defaults']> = {};
  if (opts.sort) flags.sort = opts.sort;
  if (opts.all) flags.includeHidden = true;
  return flags;
}

export function registerRunCommand(
  program: Command,
  options: ProgramOptions = {},
): void {
  const cmd = program
    .command('run [path]', { isDefault: true })
    .description('Rename the files in a directory or matching a glob')
    .option('-n, --dry-run', 'Preview changes without renaming')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--sort <order>', 'File order for numbering: name, modified, size', parseSortOrder)
    .option('-a, --all', 'Include hidden files')
    .option('--json', 'Print the plan (and result) as JSON');

  addTransformOptions(cmd).action(
    async (pathArg: string | undefined, opts: RunFlags) => {
      const cwd = process.cwd();
      const input = pathArg ?? '.';

      let config: Config;
      let resolved: ResolvedTransform;
      try {
        config = mergeConfigs(
          loadConfig(options.configPath),
          loadProjectConfig(cwd),
          cliDefaults(opts),
        );

        if (hasTransformFlags(opts)) {
          resolved = transformFromFlags(opts, config);
        } else if (process.stdin.isTTY && process.stderr.isTTY) {
          resolved = { spec: await promptTransformSpec() };
        } else {
          error(
            'No rename mode given. Use --search, --mode, --pattern, --prefix, --suffix, --case, --date or --preset.',
          );
          process.exitCode = 1;
          return;
        }
      } catch (e) {
        error(errorMessage(e));
        process.exitCode = 1;
        return;
      }

      // CLI flag beats preset, preset beats config
      const sort = opts.sort ?? resolved.sort ?? config.defaults.sort;

      let files: string[];
      try {
        files = selectFiles(input, {
          sort,
          includeHidden: config.defaults.includeHidden,
        });
      } catch (e) {
        error(`Cannot read ${resolve(cwd, input)}: ${errorMessage(e)}`);
        process.exitCode = 1;
        return;
      }

      if (files.length === 0) {
        info('No files found.');
        return;
      }

      const outcome = planRename(files, resolved.spec);
      if (!outcome.ok) {
        error(outcome.error.message);
        process.exitCode = 1;
        return;
      }
      const { plan } = outcome;
      const unchanged = previewPairs(plan).length === 0;

      if (opts.json && (opts.dryRun || unchanged || plan.conflicts.length > 0)) {
        info(toJsonReport(plan));
        if (plan.conflicts.length > 0) process.exitCode = 1;
        return;
      }

      if (!opts.json) {
        info(`Directory: ${resolve(cwd, input)}`);
        info(`Mode: ${describeTransform(resolved.spec)}`);
        info(`Files: ${files.length}`);
      }

      if (plan.conflicts.length > 0) {
        error(formatConflicts(plan.conflicts));
        process.exitCode = 1;
        return;
      }

      if (!opts.json) info(formatPreview(plan, files.length));
      if (unchanged || opts.dryRun) {
        if (opts.dryRun) info('(dry run: no changes made)');
        return;
      }

      if (!opts.yes) {
        if (!process.stdin.isTTY) {
          error('Refusing to rename without confirmation. Pass --yes.');
          process.exitCode = 1;
          return;
        }
        const confirmed = await confirmAction('Rename these files?');
        if (!confirmed) {
          info('Aborted.');
          return;
        }
      }

      const spinner = createSpinner('Renaming…').start();
      let done = 0;
      const result = executePlan(plan, {
        onProgress: (event) => {
          if (event.event === 'applied') {
            done++;
            spinner.text = `Renaming… ${done}/${plan.ops.length}`;
          }
        },
      });
      spinner.stop();

      if (opts.json) {
        info(toJsonReport(plan, result));
      } else if (result.failed) {
        error(formatExecutionResult(result));
      } else {
        success(formatExecutionResult(result));
      }
      if (result.rollbackFailures.length > 0) {
        warn(
          `${result.rollbackFailures.length} file(s) could not be restored and keep their new or temporary names.`,
        );
      }
      if (result.failed) process.exitCode = 1;
    },
  );
}
