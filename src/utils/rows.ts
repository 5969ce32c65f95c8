import type {
  LiveSession,
  LiveSessionRow,
  MonitorSnapshot,
  SavedSession,
  SavedSessionRow,
  SessionStatus,
} from '~/types.js';
import {
  formatLastActivity,
  formatTerminal,
  formatUptime,
  shortenPath,
} from '~/utils/format.js';

export const STATUS_LABELS: Record<SessionStatus, string> = {
  running: 'Running',
  idle: 'Idle',
};

export function toLiveRows(
  sessions: readonly LiveSession[],
  homeDir: string,
): LiveSessionRow[] {
  return sessions.map((session) => ({
    pid: session.pid,
    directory: shortenPath(session.workingDirectory, homeDir),
    terminal: formatTerminal(session.terminal),
    uptime: formatUptime(session.uptimeMs),
    status: STATUS_LABELS[session.status],
  }));
}

/**
 * Ordinals are positions in the list as given, so callers must pass the
 * display ordering and resolve against that same list.
 */
export function toSavedRows(
  sessions: readonly SavedSession[],
  homeDir: string,
  now: Date,
): SavedSessionRow[] {
  return sessions.map((session, index) => ({
    ordinal: index + 1,
    id: session.id,
    directory: shortenPath(session.directory, homeDir),
    lastActivity: formatLastActivity(session.lastActivity, now),
    summary: session.summary,
  }));
}

export interface MonitorView {
  live: LiveSessionRow[];
  saved: SavedSessionRow[];
  liveCount: number;
  savedCount: number;
  updatedAt: Date;
  error?: string;
}

export function toMonitorView(
  snapshot: MonitorSnapshot,
  homeDir: string,
): MonitorView {
  return {
    live: toLiveRows(snapshot.live, homeDir),
    saved: toSavedRows(snapshot.saved, homeDir, snapshot.updatedAt),
    liveCount: snapshot.live.length,
    savedCount: snapshot.saved.length,
    updatedAt: snapshot.updatedAt,
    error: snapshot.error,
  };
}
