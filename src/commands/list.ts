import chalk from 'chalk';
import { Command } from 'commander';

import type { SavedSession, SavedSessionRow } from '~/types.js';
import { listSessions } from '~/store/sessionStore.js';
import { type MonitorConfig, loadConfig, toConfigOverrides } from '~/utils/config.js';
import { truncate } from '~/utils/format.js';
import { applyLogLevel } from '~/utils/logger.js';
import { toSavedRows } from '~/utils/rows.js';

const COLUMNS = {
  ordinal: 4,
  id: 38,
  activity: 18,
  directory: 40,
} as const;

export function formatSavedSessionLines(rows: SavedSessionRow[]): string[] {
  const header = [
    '#'.padEnd(COLUMNS.ordinal),
    'Session'.padEnd(COLUMNS.id),
    'Last activity'.padEnd(COLUMNS.activity),
    'Directory'.padEnd(COLUMNS.directory),
    'Summary',
  ].join('');
  return [
    header,
    ...rows.map((row) =>
      [
        String(row.ordinal).padEnd(COLUMNS.ordinal),
        row.id.padEnd(COLUMNS.id),
        truncate(row.lastActivity, COLUMNS.activity - 1).padEnd(COLUMNS.activity),
        truncate(row.directory, COLUMNS.directory - 1).padEnd(COLUMNS.directory),
        row.summary,
      ]
        .join('')
        .trimEnd(),
    ),
  ];
}

export function toJsonRecords(sessions: SavedSession[]): Record<string, unknown>[] {
  return sessions.map((session, index) => ({
    ordinal: index + 1,
    id: session.id,
    directory: session.directory,
    lastActivity: session.lastActivity.toISOString(),
    summary: session.summary,
    messageCount: session.messageCount,
    gitBranch: session.gitBranch ?? null,
  }));
}

export async function listSavedSessions(config: MonitorConfig): Promise<SavedSession[]> {
  return await listSessions(config.storeRoot, {
    summaryLength: config.summaryLength,
    itemTimeoutMs: config.itemTimeoutMs,
  });
}

export function createListCommand(): Command {
  const command = new Command('list');

  command
    .description('List saved sessions, most recent first')
    .option('-n, --limit <count>', 'Show only the first <count> sessions')
    .option('--json', 'Print sessions as JSON')
    .action(async (options: { limit?: string; json?: boolean }, cmd: Command) => {
      const config = loadConfig(toConfigOverrides(cmd.optsWithGlobals()));
      applyLogLevel(config);

      const sessions = await listSavedSessions(config);
      const limit = options.limit ? Number.parseInt(options.limit, 10) : undefined;
      const shown = limit && limit > 0 ? sessions.slice(0, limit) : sessions;

      if (options.json) {
        console.log(JSON.stringify(toJsonRecords(shown), null, 2));
        return;
      }
      if (shown.length === 0) {
        console.log(chalk.dim(`No saved sessions in ${config.storeRoot}`));
        return;
      }
      const [header, ...lines] = formatSavedSessionLines(
        toSavedRows(shown, config.homeDir, new Date()),
      );
      console.log(chalk.bold(header));
      for (const line of lines) console.log(line);
      if (shown.length < sessions.length) {
        console.log(chalk.dim(`\n${sessions.length - shown.length} more not shown`));
      }
    });

  return command;
}
