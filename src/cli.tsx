#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { render } from 'ink';
import React from 'react';

import type { SavedSession } from '~/types.js';
import { createAttachCommand } from '~/commands/attach.js';
import { createListCommand } from '~/commands/list.js';
import { resumeSession } from '~/commands/resume.js';
import { App } from '~/components/App.js';
import { createSessionSources } from '~/monitor.js';
import { loadConfig, toConfigOverrides } from '~/utils/config.js';
import { SessionMonitorError, SessionResolutionError } from '~/utils/errors.js';
import { applyLogLevel, logger } from '~/utils/logger.js';

async function runMonitor(cmd: Command): Promise<void> {
  const config = loadConfig(toConfigOverrides(cmd.optsWithGlobals()));
  applyLogLevel(config);

  const sources = createSessionSources(config);
  const outcome: { resume?: SavedSession; fatal?: Error } = {};

  const instance = render(
    <App
      sources={sources}
      homeDir={config.homeDir}
      periodMs={config.intervalSeconds * 1000}
      maxConsecutiveFailures={config.maxConsecutiveFailures}
      onResume={(session) => {
        outcome.resume = session;
      }}
      onFatal={(error) => {
        outcome.fatal = error;
      }}
    />,
  );

  // exit(error) inside the app rejects this with the loop's fatal error
  try {
    await instance.waitUntilExit();
  } finally {
    sources.dispose();
  }
  if (outcome.fatal) throw outcome.fatal;

  if (outcome.resume) {
    process.exitCode = await resumeSession(outcome.resume, config.executableName);
  } else {
    console.log(chalk.dim('Monitoring stopped.'));
  }
}

function reportError(error: unknown): void {
  if (error instanceof SessionResolutionError && error.result.kind === 'ambiguous') {
    console.error(chalk.red(`Session "${error.result.token}" matches more than one id:`));
    for (const id of error.result.matches) console.error(`  ${id}`);
    console.error(chalk.dim('Use a longer fragment or the list number.'));
  } else if (error instanceof SessionMonitorError) {
    console.error(chalk.red(error.message));
    logger.debug(`code=${error.code}`, error.details ?? {});
  } else {
    logger.error('Unexpected error:', error);
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('session-monitor')
  .description('Watch running agent sessions and resume saved ones')
  .option('-i, --interval <seconds>', 'Refresh period in seconds')
  .option('-s, --store <path>', 'Saved session store root')
  .option('-e, --executable <name>', 'Agent executable name to look for')
  .option('--idle-cpu <percent>', 'CPU percentage below which a session is idle')
  .option('--debug', 'Log diagnostics to stderr');

program.addCommand(
  new Command('monitor')
    .description('Show running sessions, refreshing periodically (default)')
    .action(async (_options: unknown, cmd: Command) => {
      await runMonitor(cmd);
    }),
  { isDefault: true },
);
program.addCommand(createListCommand());
program.addCommand(createAttachCommand());

program.parseAsync(process.argv).catch(reportError);
