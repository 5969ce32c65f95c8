import { execFile } from 'node:child_process';
import { readlink } from 'node:fs/promises';
import { promisify } from 'node:util';

import pidusage from 'pidusage';
import psList from 'ps-list';

import { abortable } from '~/utils/abort.js';

const execFileAsync = promisify(execFile);

export interface ProcessEntry {
  pid: number;
  name: string;
  /** Full command line, when the platform exposes it. */
  cmd: string | undefined;
}

export interface ProcessDetails {
  cwd: string | undefined;
  terminal: string;
  startTime: Date | undefined;
  /** CPU percentage over the window since this pid was last sampled. */
  cpu: number | undefined;
}

/**
 * Read-only view of the OS process table. `listProcesses` failing means the
 * whole table is unavailable; `inspect` failing only concerns one pid.
 */
export interface ProcessSource {
  listProcesses(): Promise<ProcessEntry[]>;
  inspect(pid: number, signal: AbortSignal): Promise<ProcessDetails>;
  dispose?(): void;
}

async function readCwd(pid: number, signal: AbortSignal): Promise<string | undefined> {
  if (process.platform === 'linux') {
    // procfs already resolves the link to where the process is now
    return await abortable(readlink(`/proc/${pid}/cwd`), signal);
  }
  const { stdout } = await execFileAsync(
    'lsof',
    ['-a', '-p', String(pid), '-d', 'cwd', '-Fn'],
    { encoding: 'utf-8', signal },
  );
  return stdout.match(/^n(.+)$/m)?.[1];
}

async function readTerminal(pid: number, signal: AbortSignal): Promise<string> {
  const { stdout } = await execFileAsync('ps', ['-p', String(pid), '-o', 'tty='], {
    encoding: 'utf-8',
    signal,
  });
  const tty = stdout.trim();
  return tty === '?' || tty === '??' ? '' : tty;
}

async function sampleUsage(
  pid: number,
  signal: AbortSignal,
): Promise<{ cpu: number; startTime: Date }> {
  const stat = await abortable(pidusage(pid), signal);
  return {
    cpu: stat.cpu,
    startTime: new Date(stat.timestamp - stat.elapsed),
  };
}

export class SystemProcessSource implements ProcessSource {
  async listProcesses(): Promise<ProcessEntry[]> {
    const processes = await psList();
    return processes.map((proc) => ({
      pid: proc.pid,
      name: proc.name,
      cmd: proc.cmd,
    }));
  }

  async inspect(pid: number, signal: AbortSignal): Promise<ProcessDetails> {
    if (process.platform === 'win32') {
      throw new Error('Process details are not available on Windows');
    }
    const [cwd, terminal, usage] = await Promise.all([
      readCwd(pid, signal),
      // a missing tty is normal for detached processes
      readTerminal(pid, signal).catch(() => ''),
      sampleUsage(pid, signal),
    ]);
    return { cwd, terminal, startTime: usage.startTime, cpu: usage.cpu };
  }

  /** Drops pidusage's per-pid history and its internal timers. */
  dispose(): void {
    pidusage.clear();
  }
}
