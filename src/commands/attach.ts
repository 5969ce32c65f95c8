import chalk from 'chalk';
import { Command } from 'commander';

import { listSavedSessions } from '~/commands/list.js';
import { resumeSession } from '~/commands/resume.js';
import { requireSession } from '~/store/sessionResolver.js';
import { loadConfig, toConfigOverrides } from '~/utils/config.js';
import { shortenPath } from '~/utils/format.js';
import { applyLogLevel } from '~/utils/logger.js';

export function createAttachCommand(): Command {
  const command = new Command('attach');

  command
    .description('Resume a saved session by list number or id fragment')
    .argument('<session>', 'Number from `list`, or part of a session id')
    .action(async (token: string, _options: unknown, cmd: Command) => {
      const config = loadConfig(toConfigOverrides(cmd.optsWithGlobals()));
      applyLogLevel(config);

      // ordinals refer to this listing, taken right before resolving
      const sessions = await listSavedSessions(config);
      const session = requireSession(token, sessions);

      console.log(
        chalk.dim(`Resuming ${session.id} in ${shortenPath(session.directory, config.homeDir)}`),
      );
      process.exitCode = await resumeSession(session, config.executableName);
    });

  return command;
}
