/**
 * Session Pool Types
 */

import type { PageDriver } from './page-driver.js';

export type SessionStatus = 'active' | 'expired' | 'closed';

/**
 * Portal login credentials. Never logged (see REDACT_PATHS in utils/logger).
 */
export interface Credentials {
  username: string;
  password: string;
}

/**
 * A pooled, authenticated browser session for one identity.
 * The session is the sole owner of its driver.
 */
export interface Session {
  readonly id: string;
  readonly identity: string;
  readonly driver: PageDriver;
  readonly createdAt: number;
  lastUsedAt: number;
  /** Pinned sessions are exempt from TTL eviction */
  pinned: boolean;
  status: SessionStatus;
}

/**
 * Driver-free view of a session, safe to hand to callers
 */
export interface SessionSummary {
  id: string;
  identity: string;
  createdAt: number;
  lastUsedAt: number;
  pinned: boolean;
  status: SessionStatus;
  idleMs: number;
}

export interface AcquireResult {
  sessionId: string;
  reused: boolean;
}

/**
 * Logs an identity into the portal and hands back the authenticated driver.
 * Implementations close any driver they opened before throwing.
 */
export interface Authenticator {
  login(identity: string, credentials: Credentials): Promise<PageDriver>;
}

/**
 * Why a session was removed from the pool
 */
export type EvictionReason = 'released' | 'ttl_expired' | 'auth_lost' | 'shutdown';
