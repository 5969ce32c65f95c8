import { basename } from 'node:path';

import type { LiveSession } from '~/types.js';
import {
  type ActivityClassifier,
  createCpuClassifier,
} from '~/scanner/activityClassifier.js';
import type { ProcessEntry, ProcessSource } from '~/scanner/processTable.js';
import { abortable, withTimeout } from '~/utils/abort.js';
import { DEFAULT_IDLE_CPU_PERCENT, DEFAULT_ITEM_TIMEOUT_MS } from '~/utils/config.js';
import { ScanError, errorMessage } from '~/utils/errors.js';
import { logger } from '~/utils/logger.js';

export interface ProcessScannerOptions {
  source: ProcessSource;
  /** Base name of the agent executable, compared case-sensitively. */
  executableName: string;
  classifier?: ActivityClassifier;
  itemTimeoutMs?: number;
  now?: () => number;
}

/**
 * The agent runs under node but sets its process title, so argv[0] carries
 * the executable name. Only the first token is considered and only its base
 * name must match, never a prefix or substring.
 */
export function matchesExecutable(proc: ProcessEntry, executableName: string): boolean {
  const argv0 = proc.cmd?.trim().split(/\s+/)[0];
  const command = argv0 ? argv0 : proc.name;
  return basename(command) === executableName;
}

export class ProcessScanner {
  private readonly source: ProcessSource;
  private readonly executableName: string;
  private readonly classifier: ActivityClassifier;
  private readonly itemTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: ProcessScannerOptions) {
    this.source = options.source;
    this.executableName = options.executableName;
    this.classifier =
      options.classifier ?? createCpuClassifier({ threshold: DEFAULT_IDLE_CPU_PERCENT });
    this.itemTimeoutMs = options.itemTimeoutMs ?? DEFAULT_ITEM_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Lists the agent's running sessions in discovery order. Throws ScanError
   * only when the process table itself cannot be read; a process that exits
   * or refuses inspection mid-scan is left out.
   */
  async scan(signal?: AbortSignal): Promise<LiveSession[]> {
    let processes: ProcessEntry[];
    try {
      processes = await this.source.listProcesses();
    } catch (error) {
      throw new ScanError('Cannot list processes', error);
    }

    const matches = processes.filter((proc) =>
      matchesExecutable(proc, this.executableName),
    );
    const inspected = await Promise.all(
      matches.map((proc) => this.inspect(proc.pid, signal)),
    );
    signal?.throwIfAborted();
    return inspected.filter((session): session is LiveSession => session !== undefined);
  }

  private async inspect(
    pid: number,
    parent: AbortSignal | undefined,
  ): Promise<LiveSession | undefined> {
    const signal = withTimeout(this.itemTimeoutMs, parent);

    try {
      const details = await abortable(this.source.inspect(pid, signal), signal);
      if (!details.cwd || !details.startTime) {
        logger.debug(`pid ${pid}: missing cwd or start time, skipped`);
        return undefined;
      }
      const uptimeMs = Math.max(0, this.now() - details.startTime.getTime());
      return {
        pid,
        workingDirectory: details.cwd,
        terminal: details.terminal,
        startTime: details.startTime,
        uptimeMs,
        status: this.classifier({ pid, cpu: details.cpu, uptimeMs }),
        cpu: details.cpu,
      };
    } catch (error) {
      logger.debug(`pid ${pid}: inspection failed, skipped:`, errorMessage(error));
      return undefined;
    }
  }
}
