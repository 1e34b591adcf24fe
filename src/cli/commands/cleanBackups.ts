import { Command } from 'commander';
import { BackupService } from '../../core/services/BackupService.js';
import { run } from '../utils/command-runner.js';
import { createContext, type GlobalOptions } from '../utils/context.js';
import type { CommandIO } from './lint.js';

export interface CleanBackupsCommandOptions extends GlobalOptions {
  dryRun?: boolean;
}

export async function handleCleanBackups(
  options: CleanBackupsCommandOptions,
  io: CommandIO = {}
): Promise<number> {
  const write = io.write ?? console.log;
  const { documents } = await createContext(options, io.config);
  const result = await new BackupService(documents).cleanBackups({ dryRun: options.dryRun });

  for (const id of result.removed) write(id);
  return 0;
}

export function createCleanBackupsCommand(): Command {
  const command = new Command('clean-backups');

  command
    .description('delete *.bak, *.bk and *.original files under the root')
    .option('--dry-run', 'list the files without deleting them', false)
    .action((_options: unknown, cmd: Command) =>
      run(() => handleCleanBackups(cmd.optsWithGlobals<CleanBackupsCommandOptions>()))
    );

  return command;
}
