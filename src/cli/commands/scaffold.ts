import { Command } from 'commander';
import { ScaffoldService } from '../../core/services/ScaffoldService.js';
import { run } from '../utils/command-runner.js';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { formatScaffoldResult } from '../utils/report-formatter.js';
import { useColor, type CommandIO } from './lint.js';

export interface ScaffoldCommandOptions extends GlobalOptions {
  dryRun?: boolean;
  color?: boolean;
}

/**
 * Create the given pages and folders, or every missing link target when none are given
 */
export async function handleScaffold(
  paths: string[],
  options: ScaffoldCommandOptions,
  io: CommandIO = {}
): Promise<number> {
  const write = io.write ?? console.log;
  const { config, documents } = await createContext(options, io.config);
  const scaffolder = new ScaffoldService(documents, config.scaffold);

  const result =
    paths.length > 0
      ? await scaffolder.scaffoldPaths(paths, { dryRun: options.dryRun })
      : await scaffolder.scaffoldMissing({ dryRun: options.dryRun });

  write(formatScaffoldResult(result, { color: useColor(options, config) }));
  return 0;
}

export function createScaffoldCommand(): Command {
  const command = new Command('scaffold');

  command
    .description('create placeholder pages for missing link targets')
    .argument('[paths...]', 'pages (.md) or folders to create instead of the missing targets')
    .option('--dry-run', 'list what would be created', false)
    .action((paths: string[], _options: unknown, cmd: Command) =>
      run(() => handleScaffold(paths, cmd.optsWithGlobals<ScaffoldCommandOptions>()))
    );

  return command;
}
