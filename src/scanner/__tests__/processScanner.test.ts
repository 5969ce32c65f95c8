import { describe, expect, it } from 'vitest';

import { createCpuClassifier } from '~/scanner/activityClassifier.js';
import { ProcessScanner, matchesExecutable } from '~/scanner/processScanner.js';
import type {
  ProcessDetails,
  ProcessEntry,
  ProcessSource,
} from '~/scanner/processTable.js';
import { ScanError } from '~/utils/errors.js';

type Behaviour = ProcessDetails | Error | 'hang';

class FakeProcessSource implements ProcessSource {
  constructor(
    private readonly processes: ProcessEntry[] | Error,
    private readonly details: Map<number, Behaviour> = new Map(),
  ) {}

  async listProcesses(): Promise<ProcessEntry[]> {
    if (this.processes instanceof Error) throw this.processes;
    return this.processes;
  }

  inspect(pid: number): Promise<ProcessDetails> {
    const behaviour = this.details.get(pid);
    if (behaviour === 'hang') return new Promise<ProcessDetails>(() => {});
    if (behaviour === undefined) return Promise.reject(new Error(`no such process ${pid}`));
    if (behaviour instanceof Error) return Promise.reject(behaviour);
    return Promise.resolve(behaviour);
  }
}

const NOW = 1_700_000_000_000;

function proc(pid: number, cmd: string | undefined, name = 'node'): ProcessEntry {
  return { pid, name, cmd };
}

function details(overrides: Partial<ProcessDetails> = {}): ProcessDetails {
  return {
    cwd: '/home/dev/project',
    terminal: 'ttys001',
    startTime: new Date(NOW - 60_000),
    cpu: 0,
    ...overrides,
  };
}

describe('matchesExecutable', () => {
  it('compares the base name of argv[0] exactly', () => {
    expect(matchesExecutable(proc(1, 'claude'), 'claude')).toBe(true);
    expect(matchesExecutable(proc(1, '/usr/local/bin/claude --resume abc'), 'claude')).toBe(true);
  });

  it('rejects prefixes, substrings and other casing', () => {
    expect(matchesExecutable(proc(1, 'claude-helper'), 'claude')).toBe(false);
    expect(matchesExecutable(proc(1, '/opt/myclaude'), 'claude')).toBe(false);
    expect(matchesExecutable(proc(1, 'Claude'), 'claude')).toBe(false);
  });

  it('ignores the executable name appearing only in arguments', () => {
    expect(matchesExecutable(proc(1, 'node /usr/lib/claude/cli.js'), 'claude')).toBe(false);
  });

  it('falls back to the process name when there is no command line', () => {
    expect(matchesExecutable(proc(1, undefined, 'claude'), 'claude')).toBe(true);
    expect(matchesExecutable(proc(1, '', 'claude'), 'claude')).toBe(true);
  });
});

describe('ProcessScanner', () => {
  it('returns only exact matches, in discovery order', async () => {
    const source = new FakeProcessSource(
      [
        proc(300, '/usr/local/bin/claude'),
        proc(101, 'claude-helper'),
        proc(102, 'vim notes.md'),
        proc(200, 'claude --continue'),
      ],
      new Map<number, Behaviour>([
        [300, details({ cwd: '/home/dev/a' })],
        [101, details()],
        [102, details()],
        [200, details({ cwd: '/home/dev/b' })],
      ]),
    );
    const scanner = new ProcessScanner({ source, executableName: 'claude', now: () => NOW });

    const sessions = await scanner.scan();

    expect(sessions.map((s) => s.pid)).toEqual([300, 200]);
    expect(sessions.map((s) => s.workingDirectory)).toEqual(['/home/dev/a', '/home/dev/b']);
  });

  it('fills in terminal, start time and uptime', async () => {
    const startTime = new Date(NOW - 90_000);
    const source = new FakeProcessSource(
      [proc(42, 'claude')],
      new Map<number, Behaviour>([[42, details({ terminal: 'pts/3', startTime })]]),
    );
    const scanner = new ProcessScanner({ source, executableName: 'claude', now: () => NOW });

    const [session] = await scanner.scan();

    expect(session).toEqual({
      pid: 42,
      workingDirectory: '/home/dev/project',
      terminal: 'pts/3',
      startTime,
      uptimeMs: 90_000,
      status: 'idle',
      cpu: 0,
    });
  });

  it('never reports a negative uptime', async () => {
    const source = new FakeProcessSource(
      [proc(42, 'claude')],
      new Map<number, Behaviour>([[42, details({ startTime: new Date(NOW + 5_000) })]]),
    );
    const scanner = new ProcessScanner({ source, executableName: 'claude', now: () => NOW });

    const [session] = await scanner.scan();

    expect(session?.uptimeMs).toBe(0);
  });

  it('reports a non-decreasing uptime for the same pid across scans', async () => {
    let clock = NOW;
    const source = new FakeProcessSource(
      [proc(42, 'claude')],
      new Map<number, Behaviour>([[42, details()]]),
    );
    const scanner = new ProcessScanner({ source, executableName: 'claude', now: () => clock });

    const [first] = await scanner.scan();
    clock += 3_000;
    const [second] = await scanner.scan();

    expect(first?.uptimeMs).toBe(60_000);
    expect(second?.uptimeMs).toBe(63_000);
  });

  it('skips processes that vanish or cannot be fully inspected', async () => {
    const source = new FakeProcessSource(
      [proc(1, 'claude'), proc(2, 'claude'), proc(3, 'claude'), proc(4, 'claude'), proc(5, 'claude')],
      new Map<number, Behaviour>([
        [1, details()],
        [2, new Error('EACCES')],
        [4, details({ cwd: undefined })],
        [5, details({ startTime: undefined })],
      ]),
    );
    const scanner = new ProcessScanner({ source, executableName: 'claude', now: () => NOW });

    const sessions = await scanner.scan();

    expect(sessions.map((s) => s.pid)).toEqual([1]);
  });

  it('skips a process whose inspection hangs past the item timeout', async () => {
    const source = new FakeProcessSource(
      [proc(1, 'claude'), proc(2, 'claude')],
      new Map<number, Behaviour>([
        [1, 'hang'],
        [2, details()],
      ]),
    );
    const scanner = new ProcessScanner({
      source,
      executableName: 'claude',
      itemTimeoutMs: 20,
      now: () => NOW,
    });

    const sessions = await scanner.scan();

    expect(sessions.map((s) => s.pid)).toEqual([2]);
  });

  it('returns an empty list when nothing matches', async () => {
    const source = new FakeProcessSource([proc(1, 'bash'), proc(2, 'node server.js')]);
    const scanner = new ProcessScanner({ source, executableName: 'claude' });

    await expect(scanner.scan()).resolves.toEqual([]);
  });

  it('throws ScanError when the process table is unavailable', async () => {
    const source = new FakeProcessSource(new Error('ps: command not found'));
    const scanner = new ProcessScanner({ source, executableName: 'claude' });

    const error = await scanner.scan().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScanError);
    expect(error).toMatchObject({
      code: 'PROCESS_TABLE_UNAVAILABLE',
      details: { cause: 'ps: command not found' },
    });
  });

  it('classifies status with the injected classifier', async () => {
    const source = new FakeProcessSource(
      [proc(1, 'claude'), proc(2, 'claude'), proc(3, 'claude')],
      new Map<number, Behaviour>([
        [1, details({ cpu: 12.5 })],
        [2, details({ cpu: 4 })],
        [3, details({ cpu: undefined })],
      ]),
    );
    const scanner = new ProcessScanner({
      source,
      executableName: 'claude',
      classifier: createCpuClassifier({ threshold: 5 }),
      now: () => NOW,
    });

    const sessions = await scanner.scan();

    expect(sessions.map((s) => s.status)).toEqual(['running', 'idle', 'idle']);
  });
});

describe('createCpuClassifier', () => {
  const classify = createCpuClassifier({ threshold: 1 });

  it('treats CPU at or above the threshold as running', () => {
    expect(classify({ pid: 1, cpu: 1, uptimeMs: 0 })).toBe('running');
    expect(classify({ pid: 1, cpu: 37.2, uptimeMs: 0 })).toBe('running');
  });

  it('defaults to idle without a usable sample', () => {
    expect(classify({ pid: 1, cpu: 0.5, uptimeMs: 0 })).toBe('idle');
    expect(classify({ pid: 1, cpu: undefined, uptimeMs: 0 })).toBe('idle');
    expect(classify({ pid: 1, cpu: Number.NaN, uptimeMs: 0 })).toBe('idle');
  });
});
