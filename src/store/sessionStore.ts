import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';

import { z } from 'zod';

import type { SavedSession } from '~/types.js';
import { abortable, withTimeout } from '~/utils/abort.js';
import { DEFAULT_ITEM_TIMEOUT_MS, DEFAULT_SUMMARY_LENGTH } from '~/utils/config.js';
import { StoreError, errorCode, errorMessage } from '~/utils/errors.js';
import { truncate } from '~/utils/format.js';
import { logger } from '~/utils/logger.js';
import { decodeProjectDirName } from '~/utils/paths.js';

const RECORD_EXTENSION = '.jsonl';

// Fields are read leniently: a wrong type on one field drops the field, not
// the event.
const contentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional().catch(undefined),
  })
  .passthrough();

const eventSchema = z
  .object({
    type: z.string().optional().catch(undefined),
    cwd: z.string().optional().catch(undefined),
    timestamp: z.string().optional().catch(undefined),
    gitBranch: z.string().optional().catch(undefined),
    isMeta: z.boolean().optional().catch(undefined),
    message: z
      .object({
        content: z
          .union([z.string(), z.array(contentBlockSchema)])
          .optional()
          .catch(undefined),
      })
      .passthrough()
      .optional()
      .catch(undefined),
  })
  .passthrough();

type SessionEvent = z.infer<typeof eventSchema>;

export interface ListSessionsOptions {
  summaryLength?: number;
  itemTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface ParseRecordOptions {
  filePath: string;
  projectDirName: string;
  summaryLength: number;
  /** Used when no event carries a timestamp. */
  fallbackTime: () => Promise<Date>;
}

function parseEvents(content: string): SessionEvent[] | undefined {
  const lines = content.split('\n').filter((line) => line.trim() !== '');
  const events: SessionEvent[] = [];
  for (const [index, line] of lines.entries()) {
    let parsed: SessionEvent | undefined;
    try {
      const result = eventSchema.safeParse(JSON.parse(line));
      parsed = result.success ? result.data : undefined;
    } catch {
      parsed = undefined;
    }
    if (parsed) {
      events.push(parsed);
      continue;
    }
    // the agent may still be appending the last line
    if (index === lines.length - 1) break;
    return undefined;
  }
  return events;
}

function userText(event: SessionEvent): string | undefined {
  if (event.type !== 'user' || event.isMeta) return undefined;
  const content = event.message?.content;
  let text: string | undefined;
  if (typeof content === 'string') {
    text = content;
  } else if (Array.isArray(content)) {
    if (content.some((block) => block.type === 'tool_result')) return undefined;
    text = content.find((block) => block.type === 'text')?.text;
  }
  if (!text) return undefined;
  const trimmed = text.trim();
  // slash commands and their output are recorded as user events
  if (trimmed.startsWith('<command-') || trimmed.startsWith('<local-command-')) {
    return undefined;
  }
  return trimmed === '' ? undefined : trimmed;
}

function latestTimestamp(events: SessionEvent[]): Date | undefined {
  let latest: number | undefined;
  for (const event of events) {
    if (!event.timestamp) continue;
    const ms = Date.parse(event.timestamp);
    if (Number.isNaN(ms)) continue;
    if (latest === undefined || ms > latest) latest = ms;
  }
  return latest === undefined ? undefined : new Date(latest);
}

/**
 * Builds one SavedSession from a record file's content, or returns undefined
 * when the content is not a usable event log.
 */
export async function parseSessionRecord(
  content: string,
  options: ParseRecordOptions,
): Promise<SavedSession | undefined> {
  const events = parseEvents(content);
  if (!events || events.length === 0) return undefined;

  let directory: string | undefined;
  let gitBranch: string | undefined;
  let summary: string | undefined;
  let messageCount = 0;

  for (const event of events) {
    if (!directory && event.cwd) directory = event.cwd;
    if (event.type === 'user' || event.type === 'assistant') messageCount++;
    if (event.type === 'user' && event.gitBranch) gitBranch = event.gitBranch;
    if (summary === undefined) summary = userText(event);
  }

  const lastActivity = latestTimestamp(events) ?? (await options.fallbackTime());

  return {
    id: basename(options.filePath, RECORD_EXTENSION),
    directory: directory ?? decodeProjectDirName(options.projectDirName),
    lastActivity,
    summary: summary ? truncate(summary.replace(/\s+/g, ' '), options.summaryLength) : '',
    messageCount,
    gitBranch,
    filePath: options.filePath,
  };
}

/** Most recent first; equal timestamps fall back to id order. */
export function compareForDisplay(a: SavedSession, b: SavedSession): number {
  const byTime = b.lastActivity.getTime() - a.lastActivity.getTime();
  if (byTime !== 0) return byTime;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

export function sortSessionsForDisplay(sessions: readonly SavedSession[]): SavedSession[] {
  return [...sessions].sort(compareForDisplay);
}

async function readRecord(
  filePath: string,
  projectDirName: string,
  summaryLength: number,
  signal: AbortSignal,
): Promise<SavedSession | undefined> {
  try {
    const content = await readFile(filePath, { encoding: 'utf-8', signal });
    const session = await parseSessionRecord(content, {
      filePath,
      projectDirName,
      summaryLength,
      fallbackTime: async () => (await stat(filePath)).mtime,
    });
    if (!session) logger.debug(`${filePath}: malformed record, skipped`);
    return session;
  } catch (error) {
    logger.debug(`${filePath}: unreadable, skipped:`, errorMessage(error));
    return undefined;
  }
}

async function listRecordFiles(projectPath: string, signal: AbortSignal): Promise<string[]> {
  try {
    const entries = await abortable(readdir(projectPath, { withFileTypes: true }), signal);
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(RECORD_EXTENSION))
      .map((entry) => join(projectPath, entry.name));
  } catch (error) {
    logger.debug(`${projectPath}: cannot list, skipped:`, errorMessage(error));
    return [];
  }
}

/**
 * Reads every saved session under `rootPath` (one subdirectory per project),
 * sorted for display. A missing root yields an empty list; a root that exists
 * but cannot be listed throws StoreError. Unreadable or malformed records are
 * skipped one by one.
 */
export async function listSessions(
  rootPath: string,
  options: ListSessionsOptions = {},
): Promise<SavedSession[]> {
  const summaryLength = options.summaryLength ?? DEFAULT_SUMMARY_LENGTH;
  const itemTimeoutMs = options.itemTimeoutMs ?? DEFAULT_ITEM_TIMEOUT_MS;

  let projectDirs: string[];
  try {
    const entries = await abortable(
      readdir(rootPath, { withFileTypes: true }),
      withTimeout(itemTimeoutMs, options.signal),
    );
    projectDirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  } catch (error) {
    options.signal?.throwIfAborted();
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') return [];
    throw new StoreError(rootPath, error);
  }

  const recordFiles = await Promise.all(
    projectDirs.map(async (dirName) => {
      const files = await listRecordFiles(
        join(rootPath, dirName),
        withTimeout(itemTimeoutMs, options.signal),
      );
      return files.map((filePath) => ({ filePath, dirName }));
    }),
  );
  options.signal?.throwIfAborted();

  const reads = recordFiles
    .flat()
    .map(({ filePath, dirName }) =>
      readRecord(filePath, dirName, summaryLength, withTimeout(itemTimeoutMs, options.signal)),
    );

  const sessions = await Promise.all(reads);
  options.signal?.throwIfAborted();
  return sortSessionsForDisplay(
    sessions.filter((session): session is SavedSession => session !== undefined),
  );
}
