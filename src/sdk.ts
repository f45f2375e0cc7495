/**
 * Portal Workflow Engine SDK
 *
 * Programmatic facade over the session pool, the workflow phase engine and
 * the container workflows. The request-handling layer calls this and never
 * touches drivers directly.
 *
 * Every method resolves to an EngineResult: either the value, or a
 * StructuredError with a stable code, category and disposition.
 *
 * Usage:
 * ```typescript
 * import { createPortalEngine } from 'portal-workflow-engine';
 *
 * const engine = createPortalEngine();
 * const session = await engine.acquireSession('ops-desk', { username: 'ops', password: 'test-secret' });
 * if (session.ok) {
 *   const step = await engine.startAppointment(session.value.sessionId, 'check', { terminal: 'North' });
 * }
 * await engine.shutdown();
 * ```
 */

import type { AcquireResult, Authenticator, Credentials, Session, SessionSummary } from './types/session.js';
import type { ClassifyResult } from './types/progress.js';
import type { AdvanceResult, FieldValues, WorkflowRun } from './types/workflow.js';
import type { LoadResult } from './types/content-load.js';
import { buildStructuredError, type ErrorContext, type StructuredError } from './types/errors.js';
import { BrowserManager } from './core/browser-manager.js';
import { PortalAuthenticator, type ChallengeSolver } from './core/portal-authenticator.js';
import { SessionPool } from './core/session-pool.js';
import { WorkflowEngine } from './core/workflow-engine.js';
import { detectAuthenticationLoss } from './core/session-health.js';
import { AuthenticationError, SessionExpiredError } from './core/errors.js';
import { readStepOrdinal } from './core/step-indicator.js';
import { APPOINTMENT_WORKFLOWS, createAppointmentWorkflow, type AppointmentMode } from './workflows/appointment.js';
import {
  bookingNumberLookup,
  containerMilestoneStatus,
  countContainers,
  findContainer,
  type BookingNumberResult,
  type ContainerMilestoneResult,
  type ContainerWorkflowOptions,
  type FindContainerResult,
} from './workflows/containers.js';
import {
  listAppointments,
  type AppointmentListOptions,
  type AppointmentListRequest,
  type AppointmentListResult,
} from './workflows/appointment-list.js';
import { parseAppConfig } from './utils/env-parser.js';
import type { AppConfig } from './utils/config-schemas.js';
import { logger } from './utils/logger.js';

const log = logger.engine;

// =============================================================================
// SDK CONFIGURATION
// =============================================================================

export interface PortalEngineOptions {
  /** Validated configuration (default: parsed from process.env) */
  config?: AppConfig;
  /** Replaces the Playwright login (tests, other drivers) */
  authenticator?: Authenticator;
  /** Plugged into the default authenticator's login form */
  challengeSolver?: ChallengeSolver;
}

export type EngineResult<T> = { ok: true; value: T } | { ok: false; error: StructuredError };

export interface SessionRequest {
  identity: string;
  credentials: Credentials;
  keepAlive?: boolean;
}

export interface BatchAcquireItem {
  /** Position in the request list */
  index: number;
  identity: string;
  result: EngineResult<AcquireResult>;
}

export interface BatchAcquireResult {
  items: BatchAcquireItem[];
  summary: { total: number; succeeded: number; failed: number };
}

export interface BulkInfoRequest {
  /** Checked against the Pregate milestone */
  importContainers?: string[];
  /** Looked up for their booking number */
  exportContainers?: string[];
}

export interface ImportContainerInfo {
  found: boolean;
  /** Null when the row or the Pregate milestone could not be found */
  pregatePassed: boolean | null;
  classification: ClassifyResult | null;
}

export interface ExportContainerInfo {
  found: boolean;
  bookingNumber: string | null;
}

export type BulkItem<T> = { containerId: string } & EngineResult<T>;

export interface BulkInfoResult {
  importResults: BulkItem<ImportContainerInfo>[];
  exportResults: BulkItem<ExportContainerInfo>[];
  summary: {
    totalImport: number;
    importSucceeded: number;
    importFailed: number;
    totalExport: number;
    exportSucceeded: number;
    exportFailed: number;
  };
}

function portalUrl(config: AppConfig, path: string): string {
  return new URL(path, config.portal.baseUrl).toString();
}

// =============================================================================
// SDK CLIENT
// =============================================================================

export class PortalEngine {
  private readonly config: AppConfig;
  private readonly browserManager: BrowserManager;
  private readonly pool: SessionPool;
  private readonly workflows: WorkflowEngine;
  private readonly containerOptions: ContainerWorkflowOptions;
  private readonly appointmentListOptions: AppointmentListOptions;
  private runSweepTimer: NodeJS.Timeout | null = null;

  constructor(options: PortalEngineOptions = {}) {
    const config = options.config ?? parseAppConfig();
    this.config = config;

    this.browserManager = new BrowserManager(config.browser);
    const authenticator =
      options.authenticator ??
      new PortalAuthenticator({
        openDriver: () => this.browserManager.openDriver(),
        loginUrl: portalUrl(config, config.portal.loginPath),
        challengeSolver: options.challengeSolver,
      });

    this.pool = new SessionPool(authenticator, { ttlMs: config.pool.sessionTtlMs });
    this.workflows = new WorkflowEngine(this.pool, {
      maxRetries: config.workflow.maxRetries,
      settleMs: config.workflow.settleMs,
      entrySettleMs: config.workflow.entrySettleMs,
      unreadableSignalPolicy: config.workflow.unreadableSignalPolicy,
      runTtlMs: config.pool.runTtlMs,
      verify: readStepOrdinal,
    });

    const appointmentUrl = portalUrl(config, config.portal.appointmentPath);
    for (const mode of ['check', 'book'] as const) {
      this.workflows.register(
        createAppointmentWorkflow(mode, {
          appointmentUrl,
          uiSettleMs: config.workflow.uiSettleMs,
          bootSettleMs: config.workflow.bootSettleMs,
        })
      );
    }

    this.containerOptions = {
      containersUrl: portalUrl(config, config.portal.containersPath),
      loader: config.loader,
      bootSettleMs: config.workflow.bootSettleMs,
      uiSettleMs: config.workflow.uiSettleMs,
    };
    this.appointmentListOptions = {
      appointmentListUrl: portalUrl(config, config.portal.appointmentListPath),
      loader: config.loader,
      bootSettleMs: config.workflow.bootSettleMs,
    };
  }

  /**
   * Start the background sweepers for idle sessions and runs
   */
  start(): void {
    const interval = this.config.pool.sweepIntervalMs;
    this.pool.startSweeper(interval);
    if (interval > 0 && !this.runSweepTimer) {
      this.runSweepTimer = setInterval(() => this.workflows.sweepRuns(), interval);
      this.runSweepTimer.unref();
    }
  }

  // ============================================
  // SESSIONS
  // ============================================

  async acquireSession(
    identity: string,
    credentials: Credentials,
    options: { keepAlive?: boolean } = {}
  ): Promise<EngineResult<AcquireResult>> {
    return this.attempt({}, () => this.pool.acquire(identity, credentials, options.keepAlive ?? false));
  }

  /**
   * Acquire sessions for several identities one after another. Each item
   * reports its own result; incomplete credentials fail that item only.
   */
  async acquireSessions(requests: readonly SessionRequest[]): Promise<BatchAcquireResult> {
    const items: BatchAcquireItem[] = [];
    for (const [index, request] of requests.entries()) {
      const result = hasCredentials(request.credentials)
        ? await this.acquireSession(request.identity, request.credentials, { keepAlive: request.keepAlive })
        : this.reject(new AuthenticationError(request.identity, 'invalid_credentials', 'missing username or password'));
      items.push({ index, identity: request.identity, result });
    }

    const succeeded = items.filter(item => item.result.ok).length;
    log.info('Batch acquire finished', { total: items.length, succeeded });
    return { items, summary: { total: items.length, succeeded, failed: items.length - succeeded } };
  }

  async releaseSession(sessionId: string, keepAlive: boolean = false): Promise<EngineResult<{ released: true }>> {
    return this.attempt({ sessionId }, async () => {
      await this.pool.release(sessionId, keepAlive);
      return { released: true as const };
    });
  }

  listSessions(): SessionSummary[] {
    return this.pool.list();
  }

  // ============================================
  // APPOINTMENTS
  // ============================================

  /**
   * Start an appointment run and advance it as far as the fields allow
   */
  async startAppointment(
    sessionId: string,
    mode: AppointmentMode,
    fields: FieldValues = {}
  ): Promise<EngineResult<AdvanceResult>> {
    return this.attempt({ sessionId }, async () => {
      const run = this.workflows.startRun(APPOINTMENT_WORKFLOWS[mode], sessionId);
      return this.advanceUntilBlocked(run.id, fields);
    });
  }

  /**
   * Resume a run with more fields
   */
  async continueAppointment(runId: string, fields: FieldValues = {}): Promise<EngineResult<AdvanceResult>> {
    return this.attempt({ runId }, () => this.advanceUntilBlocked(runId, fields));
  }

  getRun(runId: string): EngineResult<WorkflowRun> {
    try {
      return { ok: true, value: this.workflows.getRun(runId) };
    } catch (error) {
      return { ok: false, error: buildStructuredError(error, { runId }) };
    }
  }

  /**
   * Keep advancing while phases advance; stop at anything else
   */
  private async advanceUntilBlocked(runId: string, fields: FieldValues): Promise<AdvanceResult> {
    let result = await this.workflows.advance(runId, fields);
    while (result.kind === 'advanced') {
      result = await this.workflows.advance(runId);
    }
    return result;
  }

  /**
   * List existing appointments, up to `targetCount` rows or all of them
   */
  async listAppointments(
    sessionId: string,
    request: AppointmentListRequest = {}
  ): Promise<EngineResult<AppointmentListResult>> {
    return this.withSession(sessionId, (session) =>
      listAppointments(session.driver, request, this.appointmentListOptions)
    );
  }

  // ============================================
  // CONTAINERS
  // ============================================

  async findContainer(sessionId: string, containerId: string): Promise<EngineResult<FindContainerResult>> {
    return this.withSession(sessionId, (session) => findContainer(session.driver, containerId, this.containerOptions));
  }

  async countContainers(sessionId: string, expected?: number): Promise<EngineResult<LoadResult>> {
    return this.withSession(sessionId, (session) => countContainers(session.driver, this.containerOptions, expected));
  }

  async containerMilestoneStatus(
    sessionId: string,
    containerId: string
  ): Promise<EngineResult<ContainerMilestoneResult>> {
    return this.withSession(sessionId, (session) =>
      containerMilestoneStatus(session.driver, containerId, this.containerOptions)
    );
  }

  async bookingNumber(sessionId: string, containerId: string): Promise<EngineResult<BookingNumberResult>> {
    return this.withSession(sessionId, (session) =>
      bookingNumberLookup(session.driver, containerId, this.containerOptions)
    );
  }

  /**
   * Pregate status for import containers and booking numbers for export
   * containers, over one pooled session. A failing container is reported in
   * its own item; a lost login fails the whole call.
   */
  async containerInfoBulk(sessionId: string, request: BulkInfoRequest): Promise<EngineResult<BulkInfoResult>> {
    return this.withSession(sessionId, async (session) => {
      const importResults: BulkItem<ImportContainerInfo>[] = [];
      for (const containerId of request.importContainers ?? []) {
        importResults.push(
          await this.bulkItem(session, containerId, async () => {
            const status = await containerMilestoneStatus(session.driver, containerId, this.containerOptions);
            const classification = status.classification;
            return {
              found: classification !== null,
              pregatePassed:
                classification === null || classification.status === 'reference_not_found'
                  ? null
                  : classification.status === 'after',
              classification,
            };
          })
        );
      }

      const exportResults: BulkItem<ExportContainerInfo>[] = [];
      for (const containerId of request.exportContainers ?? []) {
        exportResults.push(
          await this.bulkItem(session, containerId, async () => {
            const lookup = await bookingNumberLookup(session.driver, containerId, this.containerOptions);
            return { found: lookup.found, bookingNumber: lookup.bookingNumber };
          })
        );
      }

      const importSucceeded = importResults.filter(item => item.ok).length;
      const exportSucceeded = exportResults.filter(item => item.ok).length;
      return {
        importResults,
        exportResults,
        summary: {
          totalImport: importResults.length,
          importSucceeded,
          importFailed: importResults.length - importSucceeded,
          totalExport: exportResults.length,
          exportSucceeded,
          exportFailed: exportResults.length - exportSucceeded,
        },
      };
    });
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Close every session and the browser
   */
  async shutdown(): Promise<void> {
    if (this.runSweepTimer) {
      clearInterval(this.runSweepTimer);
      this.runSweepTimer = null;
    }
    await this.pool.closeAll();
    await this.browserManager.cleanup();
    log.info('Portal engine shut down');
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async attempt<T>(context: ErrorContext, action: () => Promise<T>): Promise<EngineResult<T>> {
    try {
      return { ok: true, value: await action() };
    } catch (error) {
      return this.reject(error, context);
    }
  }

  private reject(error: unknown, context: ErrorContext = {}): { ok: false; error: StructuredError } {
    const structured = buildStructuredError(error, context);
    log.warn('Engine call failed', { code: structured.code, ...context });
    return { ok: false, error: structured };
  }

  /**
   * One bulk item. Errors stay in the item unless the session lost its
   * login, which is rethrown for withSession to handle.
   */
  private async bulkItem<T>(session: Session, containerId: string, action: () => Promise<T>): Promise<BulkItem<T>> {
    try {
      return { containerId, ok: true, value: await action() };
    } catch (error) {
      if ((await detectAuthenticationLoss(session.driver)).lost) throw error;
      return { containerId, ...this.reject(error, { sessionId: session.id }) };
    }
  }

  /**
   * Run a single-shot workflow on a pooled session. A failure that turns out
   * to be a lost login evicts the session and reports SESSION_EXPIRED.
   */
  private async withSession<T>(sessionId: string, action: (session: Session) => Promise<T>): Promise<EngineResult<T>> {
    return this.attempt({ sessionId }, async () => {
      const session = this.pool.require(sessionId);
      this.pool.touch(sessionId);
      try {
        return await action(session);
      } catch (error) {
        const health = await detectAuthenticationLoss(session.driver);
        if (health.lost) {
          const reason = health.reason ?? 'authentication lost';
          await this.pool.invalidate(sessionId, reason);
          throw new SessionExpiredError(sessionId, reason);
        }
        throw error;
      } finally {
        this.pool.touch(sessionId);
      }
    });
  }
}

function hasCredentials(credentials: Credentials): boolean {
  return credentials.username.trim() !== '' && credentials.password !== '';
}

/**
 * Create an engine and start its sweepers
 */
export function createPortalEngine(options: PortalEngineOptions = {}): PortalEngine {
  const engine = new PortalEngine(options);
  engine.start();
  return engine;
}
