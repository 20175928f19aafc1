/**
 * INPUT: UserSession (language + conversation turns)
 * OUTPUT: get/find/update/reset/delete session operations
 * POS: core module, in-memory session store shared by the HTTP API and the LINE handler
 */

import { Language, UserSession } from '../models/types';

/** Idle time before a session expires (30 minutes) */
export const SESSION_TTL_MS = 30 * 60 * 1000;

const DEFAULT_LANGUAGE: Language = 'fr';

const sessions = new Map<string, UserSession>();

function createEmptySession(userId: string, language: Language = DEFAULT_LANGUAGE): UserSession {
  const now = Date.now();
  return { userId, language, turns: [], createdAt: now, updatedAt: now };
}

function isExpired(session: UserSession, now = Date.now()): boolean {
  return now - session.updatedAt > SESSION_TTL_MS;
}

/** Session of the user; a fresh one when missing or expired */
export function getSession(userId: string): UserSession {
  const session = sessions.get(userId);
  if (!session || isExpired(session)) {
    const fresh = createEmptySession(userId);
    sessions.set(userId, fresh);
    return fresh;
  }
  return session;
}

/** Live session of the user without creating one */
export function findSession(userId: string): UserSession | null {
  const session = sessions.get(userId);
  if (!session || isExpired(session)) return null;
  return session;
}

/** False once the session was deleted, reset or replaced after expiry */
export function isCurrentSession(session: UserSession): boolean {
  return sessions.get(session.userId) === session;
}

export function updateSession(session: UserSession): void {
  session.updatedAt = Date.now();
  sessions.set(session.userId, session);
}

/** Clears the history, keeps the language */
export function resetSession(userId: string): UserSession {
  const fresh = createEmptySession(userId, findSession(userId)?.language);
  sessions.set(userId, fresh);
  return fresh;
}

export function deleteSession(userId: string): boolean {
  return sessions.delete(userId);
}

export function cleanExpiredSessions(now = Date.now()): number {
  let removed = 0;
  for (const [userId, session] of sessions) {
    if (isExpired(session, now)) {
      sessions.delete(userId);
      removed++;
    }
  }
  return removed;
}

// sweep every 10 minutes; unref so the timer never holds the process open
setInterval(cleanExpiredSessions, 10 * 60 * 1000).unref();
