export type SessionStatus = 'running' | 'idle';

export interface LiveSession {
  readonly pid: number;
  readonly workingDirectory: string;
  readonly terminal: string;
  readonly startTime: Date;
  readonly uptimeMs: number;
  readonly status: SessionStatus;
  readonly cpu: number | undefined;
}

/** Signals handed to an activity classifier for one process. */
export interface LiveSessionFacts {
  pid: number;
  cpu: number | undefined;
  uptimeMs: number;
}

export interface SavedSession {
  readonly id: string;
  readonly directory: string;
  readonly lastActivity: Date;
  readonly summary: string;
  readonly messageCount: number;
  readonly gitBranch: string | undefined;
  readonly filePath: string;
}

export interface LiveSessionRow {
  pid: number;
  directory: string;
  terminal: string;
  uptime: string;
  status: string;
}

export interface SavedSessionRow {
  ordinal: number;
  id: string;
  directory: string;
  lastActivity: string;
  summary: string;
}

export interface MonitorSnapshot {
  live: LiveSession[];
  saved: SavedSession[];
  updatedAt: Date;
  error?: string;
}

export type ResolveResult =
  | { kind: 'found'; session: SavedSession; ordinal: number }
  | { kind: 'not-found'; token: string }
  | { kind: 'ambiguous'; token: string; matches: string[] };
