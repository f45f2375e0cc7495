/**
 * Session Pool - Long-lived authenticated browser sessions shared across requests
 *
 * Features:
 * - One live session per identity, reused until released or idle past the TTL
 * - Pinned (keep-alive) sessions are exempt from TTL eviction
 * - Check, authenticate, re-check: the slow login never runs inside a critical
 *   section, and a duplicate login that loses the race is discarded
 * - Every evicted session has its driver closed exactly once
 *
 * All map mutations happen synchronously between awaits, which makes them
 * atomic on the Node.js event loop.
 */

import { randomUUID } from 'crypto';
import type { PageDriver } from '../types/page-driver.js';
import type {
  AcquireResult,
  Authenticator,
  Credentials,
  EvictionReason,
  Session,
  SessionSummary,
} from '../types/session.js';
import { AuthenticationError, SessionInvalidError } from './errors.js';
import { logger } from '../utils/logger.js';

const log = logger.sessionPool;

/** Default idle TTL: 30 minutes */
export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;

export interface SessionPoolOptions {
  /** Idle time after which an unpinned session is evicted */
  ttlMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
  generateId?: () => string;
}

export class SessionPool {
  private sessions: Map<string, Session> = new Map();
  private byIdentity: Map<string, string> = new Map();
  private closedDrivers: WeakSet<Session> = new WeakSet();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(
    private readonly authenticator: Authenticator,
    options: SessionPoolOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Return the live session for `identity`, or log in and pool a new one.
   *
   * @throws AuthenticationError when the login fails. The authenticator has
   *   already closed any driver it opened.
   */
  async acquire(identity: string, credentials: Credentials, pin: boolean = false): Promise<AcquireResult> {
    const before = this.claim(identity, pin);
    await this.closeStale(before.stale);
    if (before.live) {
      log.debug('Reusing pooled session', { identity, sessionId: before.live.id });
      return { sessionId: before.live.id, reused: true };
    }

    const startTime = Date.now();
    let driver: PageDriver;
    try {
      driver = await this.authenticator.login(identity, credentials);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new AuthenticationError(identity, 'unknown', detail, { cause: error });
    }

    // Another caller may have logged the same identity in while we waited.
    // The re-check and the insert below run without an await between them.
    const after = this.claim(identity, pin);
    if (after.live) {
      log.info('Discarding duplicate login; another session won the race', {
        identity,
        sessionId: after.live.id,
      });
      await this.closeQuietly(driver, identity);
      return { sessionId: after.live.id, reused: true };
    }

    const now = this.now();
    const session: Session = {
      id: this.generateId(),
      identity,
      driver,
      createdAt: now,
      lastUsedAt: now,
      pinned: pin,
      status: 'active',
    };
    this.sessions.set(session.id, session);
    this.byIdentity.set(identity, session.id);
    await this.closeStale(after.stale);

    log.timed('Session created', startTime, { identity, sessionId: session.id, pinned: pin });
    return { sessionId: session.id, reused: false };
  }

  /**
   * Look up a pooled session by id
   */
  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Look up a pooled session by id, failing when it is gone
   */
  require(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionInvalidError(sessionId);
    }
    return session;
  }

  /**
   * Record activity on a session. Returns false when the session is gone.
   */
  touch(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.lastUsedAt = this.now();
    return true;
  }

  /**
   * Evict and close every unpinned session idle longer than the TTL.
   *
   * @returns ids of the evicted sessions
   */
  async sweep(): Promise<string[]> {
    const now = this.now();
    const expired = [...this.sessions.values()].filter(s => this.isExpired(s, now));
    if (expired.length === 0) return [];

    // Detach everything first so no acquire can hand these out mid-close
    for (const session of expired) {
      this.detach(session, 'expired');
    }
    await Promise.all(expired.map(s => this.closeDriver(s, 'ttl_expired')));

    log.info('Swept idle sessions', { evicted: expired.length, remaining: this.sessions.size });
    return expired.map(s => s.id);
  }

  /**
   * Release a session. keepAlive=false closes it now regardless of TTL;
   * keepAlive=true leaves it pooled.
   *
   * @throws SessionInvalidError when the session is not pooled
   */
  async release(sessionId: string, keepAlive: boolean): Promise<void> {
    const session = this.require(sessionId);
    if (keepAlive) {
      session.lastUsedAt = this.now();
      log.debug('Session released to pool', { sessionId, identity: session.identity });
      return;
    }
    await this.evict(session, 'released');
  }

  /**
   * Evict a session whose driver lost authentication, so the next acquire for
   * the identity logs in afresh. Returns false when the session was already gone.
   */
  async invalidate(sessionId: string, reason: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    log.warn('Session lost authentication; evicting', {
      sessionId,
      identity: session.identity,
      reason,
    });
    await this.evict(session, 'auth_lost');
    return true;
  }

  /**
   * Driver-free view of every pooled session
   */
  list(): SessionSummary[] {
    const now = this.now();
    return [...this.sessions.values()].map(s => ({
      id: s.id,
      identity: s.identity,
      createdAt: s.createdAt,
      lastUsedAt: s.lastUsedAt,
      pinned: s.pinned,
      status: s.status,
      idleMs: now - s.lastUsedAt,
    }));
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Run sweep() on an interval. The timer does not keep the process alive.
   */
  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    if (intervalMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        log.error('Session sweep failed', { error });
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Close every session and stop the sweeper (process shutdown, test teardown)
   */
  async closeAll(): Promise<void> {
    this.stopSweeper();
    const all = [...this.sessions.values()];
    for (const session of all) {
      this.detach(session, 'closed');
    }
    await Promise.all(all.map(s => this.closeDriver(s, 'shutdown')));
    if (all.length > 0) {
      log.info('Closed all sessions', { count: all.length });
    }
  }

  // ============================================
  // INTERNALS
  // ============================================

  private isExpired(session: Session, now: number): boolean {
    return !session.pinned && now - session.lastUsedAt > this.ttlMs;
  }

  /**
   * Synchronously look up the identity's session. A live one is touched (and
   * pinned if asked); an expired one is detached and handed back for closing.
   */
  private claim(identity: string, pin: boolean): { live: Session | null; stale: Session | null } {
    const sessionId = this.byIdentity.get(identity);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session) return { live: null, stale: null };

    const now = this.now();
    if (this.isExpired(session, now)) {
      this.detach(session, 'expired');
      return { live: null, stale: session };
    }

    session.lastUsedAt = now;
    if (pin) session.pinned = true;
    return { live: session, stale: null };
  }

  private async closeStale(session: Session | null): Promise<void> {
    if (session) {
      await this.closeDriver(session, 'ttl_expired');
    }
  }

  private async evict(session: Session, reason: EvictionReason): Promise<void> {
    this.detach(session, reason === 'ttl_expired' ? 'expired' : 'closed');
    await this.closeDriver(session, reason);
  }

  /**
   * Remove a session from both indexes. Synchronous, so it is atomic.
   */
  private detach(session: Session, status: Session['status']): void {
    if (this.sessions.get(session.id) === session) {
      this.sessions.delete(session.id);
    }
    if (this.byIdentity.get(session.identity) === session.id) {
      this.byIdentity.delete(session.identity);
    }
    session.status = status;
  }

  private async closeDriver(session: Session, reason: EvictionReason): Promise<void> {
    if (this.closedDrivers.has(session)) return;
    this.closedDrivers.add(session);

    try {
      await session.driver.close();
      log.info('Session closed', { sessionId: session.id, identity: session.identity, reason });
    } catch (error) {
      log.warn('Driver close failed; session dropped anyway', {
        sessionId: session.id,
        reason,
        err: error instanceof Error ? error.message : String(error),
      });
    } finally {
      session.status = 'closed';
    }
  }

  private async closeQuietly(driver: PageDriver, identity: string): Promise<void> {
    try {
      await driver.close();
    } catch (error) {
      log.warn('Failed to close discarded driver', {
        identity,
        err: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
