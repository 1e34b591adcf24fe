import { Command, Option } from 'commander';
import { FixService } from '../../core/services/FixService.js';
import { run } from '../utils/command-runner.js';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { formatFixSummary, formatJson, type OutputFormat } from '../utils/report-formatter.js';
import { parseRuleIds, useColor, type CommandIO } from './lint.js';

export interface FixCommandOptions extends GlobalOptions {
  dryRun?: boolean;
  backup?: boolean;
  rule?: string[];
  format?: OutputFormat;
  color?: boolean;
}

export async function handleFix(options: FixCommandOptions, io: CommandIO = {}): Promise<number> {
  const write = io.write ?? console.log;
  const onlyRules = parseRuleIds(options.rule);
  const { config, documents } = await createContext(options, io.config);

  const summary = await new FixService(documents).fix({
    dryRun: options.dryRun,
    backup: options.backup,
    lint: {
      requiredFields: config.corpus.requiredFields,
      disabledRules: config.corpus.disabledRules,
      onlyRules,
    },
  });

  if (options.format === 'json') {
    // Rewritten content is left out; it can be large
    const results = summary.results.map(({ docId, applied, skipped, changed }) => ({ docId, applied, skipped, changed }));
    write(formatJson({ ...summary, results }));
  } else {
    write(formatFixSummary(summary, { color: useColor(options, config) }));
  }

  return 0;
}

export function createFixCommand(): Command {
  const command = new Command('fix');

  command
    .description('apply the fixes lint knows how to make')
    .option('--dry-run', 'show what would change without writing', false)
    .option('--backup', 'keep a .bak copy of every file that changes', false)
    .option('-r, --rule <ids...>', 'only apply fixes for these rules')
    .addOption(new Option('-f, --format <format>', 'output format').choices(['text', 'json']).default('text'))
    .action((_options: unknown, cmd: Command) =>
      run(() => handleFix(cmd.optsWithGlobals<FixCommandOptions>()))
    );

  return command;
}
