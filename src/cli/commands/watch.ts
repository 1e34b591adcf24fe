import { Chalk } from 'chalk';
import { Command } from 'commander';
import { WatcherService } from '../../watcher/WatcherService.js';
import logger from '../../core/utils/logger.js';
import { run } from '../utils/command-runner.js';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { formatReport } from '../utils/report-formatter.js';
import { useColor } from './lint.js';

export interface WatchCommandOptions extends GlobalOptions {
  verbose?: boolean;
  color?: boolean;
}

async function handleWatch(options: WatchCommandOptions): Promise<void> {
  if (options.verbose) {
    logger.level = 'debug';
  }

  const { config, documents, root } = await createContext(options);
  const color = useColor(options, config);
  const chalk = new Chalk({ level: color ? 1 : 0 });

  const watcher = new WatcherService({
    documents,
    debounceMs: config.watch.debounceMs,
    ignored: config.corpus.ignore,
    lint: {
      requiredFields: config.corpus.requiredFields,
      disabledRules: config.corpus.disabledRules,
    },
    onReport: (report, event) => {
      console.log(chalk.gray(`\n${event.type}: ${event.relativePath}`));
      console.log(formatReport(report, { color }));
    },
  });

  console.log(chalk.cyan(`Watching ${root}`));
  console.log(chalk.gray('Press Ctrl+C to stop\n'));
  await watcher.start();

  await new Promise<void>((resolve, reject) => {
    process.once('SIGINT', () => {
      watcher.stop().then(resolve, reject);
    });
  });
}

export function createWatchCommand(): Command {
  const command = new Command('watch');

  command
    .description('lint pages again whenever they change')
    .option('-v, --verbose', 'enable verbose logging')
    .action((_options: unknown, cmd: Command) =>
      run(() => handleWatch(cmd.optsWithGlobals<WatchCommandOptions>()))
    );

  return command;
}
