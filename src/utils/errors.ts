import type { ResolveResult } from '~/types.js';

/**
 * Base error for everything the monitor raises on purpose.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class SessionMonitorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SessionMonitorError';
  }
}

export class ConfigurationError extends SessionMonitorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/** The process table as a whole could not be read. */
export class ScanError extends SessionMonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PROCESS_TABLE_UNAVAILABLE', {
      cause: errorMessage(cause),
    });
    this.name = 'ScanError';
  }
}

/** The session store root exists but could not be listed. */
export class StoreError extends SessionMonitorError {
  constructor(rootPath: string, cause?: unknown) {
    super(`Cannot read session store at ${rootPath}`, 'STORE_UNAVAILABLE', {
      rootPath,
      cause: errorMessage(cause),
    });
    this.name = 'StoreError';
  }
}

export class SessionResolutionError extends SessionMonitorError {
  constructor(
    public result: Exclude<ResolveResult, { kind: 'found' }>,
  ) {
    super(
      result.kind === 'ambiguous'
        ? `Session "${result.token}" is ambiguous, it matches: ${result.matches.join(', ')}`
        : `No saved session matches "${result.token}"`,
      result.kind === 'ambiguous' ? 'SESSION_AMBIGUOUS' : 'SESSION_NOT_FOUND',
      result.kind === 'ambiguous' ? { matches: result.matches } : undefined,
    );
    this.name = 'SessionResolutionError';
  }
}

export class RefreshLoopFatalError extends SessionMonitorError {
  constructor(failures: number, lastError: unknown) {
    super(
      `Giving up after ${failures} consecutive failed refreshes: ${errorMessage(lastError)}`,
      'REFRESH_LOOP_FATAL',
      { failures },
    );
    this.name = 'RefreshLoopFatalError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Node system errors carry a string `code` such as ENOENT. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}
