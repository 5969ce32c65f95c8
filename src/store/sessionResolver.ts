import type { ResolveResult, SavedSession } from '~/types.js';
import { SessionResolutionError } from '~/utils/errors.js';

const ORDINAL_PATTERN = /^\d+$/;

/**
 * Picks one session for a user token: an ordinal into `sessions` as
 * currently displayed, or else a case-sensitive fragment of the session id.
 *
 * Ordinals only mean something against the list the user just saw, so
 * callers should list sessions right before resolving. An all-digit token
 * is always an ordinal: outside the list's range it is not found.
 */
export function resolveSession(
  token: string,
  sessions: readonly SavedSession[],
): ResolveResult {
  const trimmed = token.trim();
  if (sessions.length === 0 || trimmed === '') {
    return { kind: 'not-found', token: trimmed };
  }

  if (ORDINAL_PATTERN.test(trimmed)) {
    const ordinal = Number(trimmed);
    const session = sessions[ordinal - 1];
    if (ordinal >= 1 && session) {
      return { kind: 'found', session, ordinal };
    }
    return { kind: 'not-found', token: trimmed };
  }

  const matches: { session: SavedSession; ordinal: number }[] = [];
  sessions.forEach((session, index) => {
    if (session.id.includes(trimmed)) matches.push({ session, ordinal: index + 1 });
  });

  const [first] = matches;
  if (!first) return { kind: 'not-found', token: trimmed };
  if (matches.length > 1) {
    return {
      kind: 'ambiguous',
      token: trimmed,
      matches: matches.map((match) => match.session.id),
    };
  }
  return { kind: 'found', session: first.session, ordinal: first.ordinal };
}

/** Like resolveSession, but throws SessionResolutionError on failure. */
export function requireSession(
  token: string,
  sessions: readonly SavedSession[],
): SavedSession {
  const result = resolveSession(token, sessions);
  if (result.kind !== 'found') throw new SessionResolutionError(result);
  return result.session;
}
