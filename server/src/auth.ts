/**
 * Password hashing, bearer-token sessions and the Express guard that
 * resolves them.
 */
import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export const DEFAULT_HASH_ITERATIONS = 210_000;
const KEY_LENGTH = 32;

/** Hash a password as `pbkdf2$<iterations>$<salt>$<hash>` (base64 parts). */
export function hashPassword(password: string, iterations: number = DEFAULT_HASH_ITERATIONS): string {
  const salt = randomBytes(16);
  const hash = pbkdf2Sync(password, salt, iterations, KEY_LENGTH, 'sha256');
  return `pbkdf2$${iterations}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

export function verifyPassword(password: string, stored: string | null): boolean {
  if (stored === null) return false;

  const parts = stored.split('$');
  if (parts.length !== 4 || parts[0] !== 'pbkdf2') return false;

  const iterations = Number(parts[1]);
  if (!Number.isInteger(iterations) || iterations <= 0) return false;

  const salt = Buffer.from(parts[2], 'base64');
  const expected = Buffer.from(parts[3], 'base64');
  const actual = pbkdf2Sync(password, salt, iterations, expected.length, 'sha256');
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

interface Session {
  username: string;
  expiresAt: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private nextPruneAt = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  create(username: string): string {
    const now = this.now();
    // sweep at most once per TTL
    if (now >= this.nextPruneAt) {
      this.prune();
      this.nextPruneAt = now + this.ttlMs;
    }
    const token = randomBytes(24).toString('base64url');
    this.sessions.set(token, { username, expiresAt: now + this.ttlMs });
    return token;
  }

  /** Username for a live token; expired tokens are dropped. */
  resolve(token: string): string | undefined {
    const session = this.sessions.get(token);
    if (!session) return undefined;
    if (session.expiresAt <= this.now()) {
      this.sessions.delete(token);
      return undefined;
    }
    return session.username;
  }

  /** Drop every expired session; returns how many went. */
  prune(): number {
    const now = this.now();
    let dropped = 0;
    for (const [token, session] of this.sessions) {
      if (session.expiresAt <= now) {
        this.sessions.delete(token);
        dropped++;
      }
    }
    if (dropped > 0) console.log(`[Session] Pruned ${dropped} expired sessions`);
    return dropped;
  }

  revoke(token: string): void {
    this.sessions.delete(token);
  }

  /** Drop every session of a user, optionally sparing one token. */
  revokeUser(username: string, except?: string): void {
    for (const [token, session] of this.sessions) {
      if (session.username === username && token !== except) {
        this.sessions.delete(token);
      }
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * Require `Authorization: Bearer <token>`.
 * On success `res.locals.username` and `res.locals.token` are set.
 */
export function requireSession(sessions: SessionStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.header('Authorization');
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const token = header.slice(7);
    const username = sessions.resolve(token);
    if (username === undefined) {
      console.warn('[Auth] Rejected expired or unknown session token');
      res.status(401).json({ error: 'Session expired or invalid' });
      return;
    }

    res.locals.username = username;
    res.locals.token = token;
    next();
  };
}

/** Read the session set by requireSession. */
export function sessionOf(res: Response): { username: string; token: string } {
  const { username, token } = res.locals;
  if (typeof username !== 'string' || typeof token !== 'string') {
    throw new Error('requireSession must run before this handler');
  }
  return { username, token };
}
