import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { SavedSession } from '~/types.js';
import {
  listSessions,
  parseSessionRecord,
  sortSessionsForDisplay,
} from '~/store/sessionStore.js';

function jsonl(...events: Record<string, unknown>[]): string {
  return events.map((event) => JSON.stringify(event)).join('\n') + '\n';
}

function userEvent(
  timestamp: string,
  content: unknown,
  extra: Record<string, unknown> = {},
): Record<string, unknown> {
  return { type: 'user', timestamp, message: { role: 'user', content }, ...extra };
}

function assistantEvent(timestamp: string, text: string): Record<string, unknown> {
  return {
    type: 'assistant',
    timestamp,
    message: { role: 'assistant', content: [{ type: 'text', text }] },
  };
}

const FALLBACK = new Date('2020-01-01T00:00:00.000Z');

function parse(content: string, summaryLength = 80, projectDirName = '-home-dev-gamma') {
  return parseSessionRecord(content, {
    filePath: `/store/${projectDirName}/sess-1.jsonl`,
    projectDirName,
    summaryLength,
    fallbackTime: async () => FALLBACK,
  });
}

describe('listSessions', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'session-store-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function writeRecord(project: string, file: string, content: string) {
    await mkdir(join(root, project), { recursive: true });
    await writeFile(join(root, project, file), content);
  }

  it('returns an empty list when the root does not exist', async () => {
    await expect(listSessions(join(root, 'missing'))).resolves.toEqual([]);
  });

  it('returns an empty list when the root is a file', async () => {
    const file = join(root, 'not-a-dir');
    await writeFile(file, 'x');

    await expect(listSessions(file)).resolves.toEqual([]);
  });

  it('reads valid records, skips a malformed one and sorts newest first', async () => {
    await writeRecord(
      '-home-dev-alpha',
      'aaaa1111.jsonl',
      jsonl(
        { type: 'summary', summary: 'Login fixes' },
        userEvent('2024-03-01T10:00:00.000Z', 'Fix the login bug', {
          cwd: '/home/dev/alpha',
          gitBranch: 'main',
        }),
        assistantEvent('2024-03-01T10:05:00.000Z', 'On it.'),
      ),
    );
    await writeRecord(
      '-home-dev-beta',
      'bbbb2222.jsonl',
      jsonl(
        userEvent('2024-03-02T09:00:00.000Z', [{ type: 'text', text: 'Add   tests\nfor parser' }], {
          cwd: '/home/dev/beta',
        }),
      ),
    );
    await writeRecord(
      '-home-dev-alpha',
      'cccc3333.jsonl',
      jsonl(
        userEvent('2024-02-28T08:00:00.000Z', 'Caveat: local command output', {
          cwd: '/home/dev/alpha',
          isMeta: true,
        }),
        userEvent('2024-02-28T08:00:01.000Z', '<command-name>/clear</command-name>'),
        userEvent('2024-02-28T08:00:02.000Z', [
          { type: 'tool_result', tool_use_id: 'toolu_1', content: 'done' },
        ]),
        userEvent('2024-02-28T08:00:03.000Z', 'Real question'),
      ),
    );
    await writeRecord('-home-dev-alpha', 'dddd4444.jsonl', 'not json at all\n{"type":"user"}\n');

    const sessions = await listSessions(root);

    expect(sessions.map((s) => s.id)).toEqual(['bbbb2222', 'aaaa1111', 'cccc3333']);
    expect(sessions[0]).toMatchObject({
      directory: '/home/dev/beta',
      lastActivity: new Date('2024-03-02T09:00:00.000Z'),
      summary: 'Add tests for parser',
      messageCount: 1,
      filePath: join(root, '-home-dev-beta', 'bbbb2222.jsonl'),
    });
    expect(sessions[1]).toMatchObject({
      directory: '/home/dev/alpha',
      lastActivity: new Date('2024-03-01T10:05:00.000Z'),
      summary: 'Fix the login bug',
      messageCount: 2,
      gitBranch: 'main',
    });
    expect(sessions[2]?.summary).toBe('Real question');
  });

  it('ignores files that are not session records', async () => {
    await writeRecord('-home-dev-alpha', 'notes.txt', 'hello');
    await writeRecord('-home-dev-alpha', 'sessions-index.json', '{"entries":[]}');
    await writeFile(join(root, 'stray.jsonl'), jsonl(userEvent('2024-03-01T10:00:00.000Z', 'x')));

    await expect(listSessions(root)).resolves.toEqual([]);
  });

  it('applies the summary length option', async () => {
    await writeRecord(
      '-home-dev-alpha',
      'aaaa1111.jsonl',
      jsonl(userEvent('2024-03-01T10:00:00.000Z', 'abcdefghijklmnop')),
    );

    const [session] = await listSessions(root, { summaryLength: 10 });

    expect(session?.summary).toBe('abcdefg...');
  });

  it('stops with the abort reason when cancelled', async () => {
    await writeRecord(
      '-home-dev-alpha',
      'aaaa1111.jsonl',
      jsonl(userEvent('2024-03-01T10:00:00.000Z', 'hello')),
    );
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));

    await expect(listSessions(root, { signal: controller.signal })).rejects.toThrow('cancelled');
  });
});

describe('parseSessionRecord', () => {
  it('tolerates a partially written last line', async () => {
    const content =
      jsonl(userEvent('2024-03-01T10:00:00.000Z', 'Still typing')) + '{"type":"assistant","timest';

    const session = await parse(content);

    expect(session?.summary).toBe('Still typing');
    expect(session?.lastActivity).toEqual(new Date('2024-03-01T10:00:00.000Z'));
  });

  it('rejects a record with a broken line before the end', async () => {
    const content =
      '{"type":"user",\n' + jsonl(userEvent('2024-03-01T10:00:00.000Z', 'hello'));

    await expect(parse(content)).resolves.toBeUndefined();
  });

  it('rejects an empty record', async () => {
    await expect(parse('')).resolves.toBeUndefined();
    await expect(parse('\n\n')).resolves.toBeUndefined();
  });

  it('rejects lines that are JSON but not events', async () => {
    await expect(parse('42\n"text"\n')).resolves.toBeUndefined();
  });

  it('derives the directory from the project folder when no event has a cwd', async () => {
    const session = await parse(jsonl(userEvent('2024-03-01T10:00:00.000Z', 'hi')));

    expect(session?.directory).toBe('/home/dev/gamma');
  });

  it('uses the file name as the session id', async () => {
    const session = await parse(
      jsonl(userEvent('2024-03-01T10:00:00.000Z', 'hi', { sessionId: 'other' })),
    );

    expect(session?.id).toBe('sess-1');
  });

  it('leaves the summary empty when there is no user message', async () => {
    const session = await parse(jsonl(assistantEvent('2024-03-01T10:00:00.000Z', 'Hello')));

    expect(session?.summary).toBe('');
    expect(session?.messageCount).toBe(1);
  });

  it('takes the latest timestamp even when events are out of order', async () => {
    const session = await parse(
      jsonl(
        userEvent('2024-03-01T10:00:00.000Z', 'first'),
        assistantEvent('2024-03-01T12:00:00.000Z', 'late'),
        assistantEvent('2024-03-01T11:00:00.000Z', 'middle'),
        assistantEvent('not a date', 'ignored'),
      ),
    );

    expect(session?.lastActivity).toEqual(new Date('2024-03-01T12:00:00.000Z'));
  });

  it('falls back to the file time when no event carries a timestamp', async () => {
    const session = await parse(jsonl({ type: 'user', message: { content: 'hi' } }));

    expect(session?.lastActivity).toBe(FALLBACK);
  });

  it('keeps an event whose fields have unexpected types', async () => {
    const session = await parse(
      jsonl(
        { type: 'user', timestamp: 12345, cwd: ['/x'], message: { content: 'typed badly' } },
        userEvent('2024-03-01T10:00:00.000Z', 'second'),
      ),
    );

    expect(session?.summary).toBe('typed badly');
    expect(session?.directory).toBe('/home/dev/gamma');
    expect(session?.messageCount).toBe(2);
  });
});

describe('sortSessionsForDisplay', () => {
  function saved(id: string, lastActivity: string): SavedSession {
    return {
      id,
      directory: '/home/dev',
      lastActivity: new Date(lastActivity),
      summary: '',
      messageCount: 0,
      gitBranch: undefined,
      filePath: `/store/${id}.jsonl`,
    };
  }

  it('orders by last activity, newest first', () => {
    const sorted = sortSessionsForDisplay([
      saved('old', '2024-01-01T00:00:00Z'),
      saved('new', '2024-03-01T00:00:00Z'),
      saved('mid', '2024-02-01T00:00:00Z'),
    ]);

    expect(sorted.map((s) => s.id)).toEqual(['new', 'mid', 'old']);
  });

  it('breaks ties by id, the same way every time', () => {
    const input = [
      saved('c', '2024-03-01T00:00:00Z'),
      saved('a', '2024-03-01T00:00:00Z'),
      saved('b', '2024-03-01T00:00:00Z'),
    ];

    expect(sortSessionsForDisplay(input).map((s) => s.id)).toEqual(['a', 'b', 'c']);
    expect(sortSessionsForDisplay([...input].reverse()).map((s) => s.id)).toEqual(['a', 'b', 'c']);
  });

  it('does not mutate its input', () => {
    const input = [saved('b', '2024-01-01T00:00:00Z'), saved('a', '2024-02-01T00:00:00Z')];

    sortSessionsForDisplay(input);

    expect(input.map((s) => s.id)).toEqual(['b', 'a']);
  });
});
