import { formatDistanceStrict } from 'date-fns';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

// Lengths count code points so a cut never splits a surrogate pair.
export function truncate(str: string, maxLen: number): string {
  const chars = Array.from(str);
  if (chars.length <= maxLen) return str;
  return chars.slice(0, maxLen - 3).join('') + '...';
}

/** Keeps the tail of a path, which is the part that tells projects apart. */
export function truncateStart(str: string, maxLen: number): string {
  const chars = Array.from(str);
  if (chars.length <= maxLen) return str;
  return '...' + chars.slice(chars.length - (maxLen - 3)).join('');
}

export function shortenPath(
  path: string | undefined,
  homeDir: string,
  maxLen = 50,
): string {
  if (!path) return 'N/A';
  let display = path;
  if (homeDir && (path === homeDir || path.startsWith(homeDir + '/'))) {
    display = '~' + path.slice(homeDir.length);
  }
  return truncateStart(display, maxLen);
}

export function formatUptime(uptimeMs: number): string {
  const elapsed = Math.max(0, uptimeMs);
  const days = Math.floor(elapsed / DAY);
  const hours = Math.floor((elapsed % DAY) / HOUR);
  const minutes = Math.floor((elapsed % HOUR) / MINUTE);

  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

export function formatTerminal(terminal: string): string {
  const name = terminal.replace(/^\/dev\//, '');
  return name === '' || name === '?' || name === '??' ? 'N/A' : name;
}

export function formatLastActivity(lastActivity: Date, now: Date): string {
  if (now.getTime() - lastActivity.getTime() < MINUTE) return 'just now';
  return formatDistanceStrict(lastActivity, now) + ' ago';
}
