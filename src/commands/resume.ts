import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';

import type { SavedSession } from '~/types.js';
import { SessionMonitorError } from '~/utils/errors.js';
import { logger } from '~/utils/logger.js';

export interface ResumeCommand {
  command: string;
  args: string[];
  cwd: string | undefined;
}

/**
 * The agent looks sessions up per project, so it has to start in the
 * session's directory when that still exists.
 */
export function buildResumeCommand(
  session: SavedSession,
  executableName: string,
  directoryExists: (path: string) => boolean = existsSync,
): ResumeCommand {
  return {
    command: executableName,
    args: ['--resume', session.id],
    cwd: directoryExists(session.directory) ? session.directory : undefined,
  };
}

/** Runs the agent in the foreground and resolves with its exit code. */
export function resumeSession(
  session: SavedSession,
  executableName: string,
): Promise<number> {
  const { command, args, cwd } = buildResumeCommand(session, executableName);
  logger.debug(`Resuming ${session.id}: ${command} ${args.join(' ')} in ${cwd ?? process.cwd()}`);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: 'inherit' });
    child.on('error', (error) => {
      reject(
        new SessionMonitorError(`Failed to launch ${command}: ${error.message}`, 'RESUME_FAILED', {
          sessionId: session.id,
        }),
      );
    });
    child.on('exit', (code, signal) => {
      resolve(code ?? (signal ? 1 : 0));
    });
  });
}
