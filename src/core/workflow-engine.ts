/**
 * Workflow Phase Engine
 *
 * Resumable multi-phase form submission over a pooled session. Each advance()
 * call validates the current phase's inputs, runs its actions, fires the
 * transition and verifies the result through the step indicator. A caller
 * that lacks inputs gets ContinuationNeeded back and resumes later with the
 * same run id; nothing already accumulated is lost.
 *
 * Outcomes the caller is expected to handle (continuation, stuck, ambiguous)
 * are AdvanceResult values. Exceptions are reserved for failures: a phase
 * action that threw, a lost session, an unknown or busy run.
 */

import { randomUUID } from 'crypto';
import type { PageDriver } from '../types/page-driver.js';
import type {
  AdvanceResult,
  FieldValues,
  OrdinalProbe,
  PhaseContext,
  PhaseSpec,
  TransitionPhaseSpec,
  UnreadableSignalPolicy,
  WorkflowDefinition,
  WorkflowRun,
} from '../types/workflow.js';
import {
  EngineError,
  PhaseActionFailedError,
  RunBusyError,
  RunClosedError,
  RunNotFoundError,
  SessionExpiredError,
  SessionInvalidError,
  WorkflowDefinitionError,
} from './errors.js';
import type { SessionPool } from './session-pool.js';
import { detectAuthenticationLoss, type AuthLossReport } from './session-health.js';
import { readStepOrdinal } from './step-indicator.js';
import {
  initialTransitionState,
  isTerminal,
  nextTransitionState,
  type TerminalTransitionState,
  type TransitionConfig,
} from './transition-machine.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, sleep } from '../utils/timeouts.js';

const log = logger.workflowEngine;

export interface WorkflowEngineOptions {
  /** Extra transition attempts after the first (default 2) */
  maxRetries?: number;
  /** Wait between firing a transition and reading the indicator */
  settleMs?: number;
  /** Wait after entering a phase when the phase sets none */
  entrySettleMs?: number;
  unreadableSignalPolicy?: UnreadableSignalPolicy;
  /** Idle time after which sweepRuns() drops a run */
  runTtlMs?: number;
  /** Default verification probe for transition phases */
  verify?: OrdinalProbe;
  /** Consulted after a phase action fails */
  healthProbe?: (driver: PageDriver) => Promise<AuthLossReport>;
  now?: () => number;
  generateId?: () => string;
}

/** Field name reported when the entry step fails */
export const ENTRY_ACTION = 'enter';
/** Field name reported when a terminal phase's result action fails */
export const RESULT_ACTION = 'result';

export class WorkflowEngine {
  private definitions: Map<string, WorkflowDefinition> = new Map();
  private runs: Map<string, WorkflowRun> = new Map();
  private busy: Set<string> = new Set();

  private readonly maxRetries: number;
  private readonly settleMs: number;
  private readonly entrySettleMs: number;
  private readonly unreadableSignalPolicy: UnreadableSignalPolicy;
  private readonly runTtlMs: number;
  private readonly verify: OrdinalProbe;
  private readonly healthProbe: (driver: PageDriver) => Promise<AuthLossReport>;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(
    private readonly pool: SessionPool,
    options: WorkflowEngineOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 2;
    this.settleMs = options.settleMs ?? TIMEOUTS.PHASE_TRANSITION;
    this.entrySettleMs = options.entrySettleMs ?? TIMEOUTS.PHASE_ENTRY;
    this.unreadableSignalPolicy = options.unreadableSignalPolicy ?? 'assume_advanced';
    this.runTtlMs = options.runTtlMs ?? 30 * 60 * 1000;
    this.verify = options.verify ?? readStepOrdinal;
    this.healthProbe = options.healthProbe ?? ((driver) => detectAuthenticationLoss(driver));
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  // ============================================
  // DEFINITIONS
  // ============================================

  /**
   * Register a workflow. Ordinals must run 1..N and only the last phase may
   * be terminal.
   */
  register(definition: WorkflowDefinition): void {
    validateDefinition(definition);
    if (this.definitions.has(definition.name)) {
      throw new WorkflowDefinitionError(definition.name, 'a workflow with this name is already registered');
    }
    this.definitions.set(definition.name, definition);
    log.debug('Workflow registered', { workflow: definition.name, phases: definition.phases.length });
  }

  hasWorkflow(name: string): boolean {
    return this.definitions.has(name);
  }

  // ============================================
  // RUNS
  // ============================================

  /**
   * Create a pending run at phase 1 bound to a pooled session
   */
  startRun(workflow: string, sessionId: string): WorkflowRun {
    if (!this.definitions.has(workflow)) {
      throw new WorkflowDefinitionError(workflow, 'no workflow with this name is registered');
    }
    if (!this.pool.get(sessionId)) {
      throw new SessionInvalidError(sessionId);
    }

    const now = this.now();
    const run: WorkflowRun = {
      id: this.generateId(),
      sessionId,
      workflow,
      currentPhase: 1,
      accumulated: {},
      status: 'pending',
      createdAt: now,
      lastUsedAt: now,
    };
    this.runs.set(run.id, run);
    log.info('Workflow run started', { runId: run.id, workflow, sessionId });
    return snapshot(run);
  }

  /**
   * Copy of the run's current state
   */
  getRun(runId: string): WorkflowRun {
    return snapshot(this.requireRun(runId));
  }

  listRuns(): WorkflowRun[] {
    return [...this.runs.values()].map(snapshot);
  }

  /**
   * Drop a run. The session stays pooled. Returns false for unknown runs.
   */
  abandon(runId: string): boolean {
    const removed = this.runs.delete(runId);
    if (removed) log.info('Workflow run abandoned', { runId });
    return removed;
  }

  /**
   * Drop runs idle longer than the run TTL, skipping any mid-advance
   */
  sweepRuns(): string[] {
    const now = this.now();
    const stale = [...this.runs.values()].filter(
      run => !this.busy.has(run.id) && now - run.lastUsedAt > this.runTtlMs
    );
    for (const run of stale) {
      this.runs.delete(run.id);
    }
    if (stale.length > 0) {
      log.info('Swept idle workflow runs', { evicted: stale.length });
    }
    return stale.map(run => run.id);
  }

  // ============================================
  // ADVANCE
  // ============================================

  /**
   * Run the current phase with the supplied fields merged into the run's
   * accumulated values.
   *
   * @throws RunNotFoundError, RunClosedError, RunBusyError, SessionInvalidError
   * @throws PhaseActionFailedError when an entry, fill, transition or result
   *   action throws (the run stays pending and may be retried)
   * @throws SessionExpiredError when that failure turns out to be a lost login
   */
  async advance(runId: string, supplied: FieldValues = {}): Promise<AdvanceResult> {
    const run = this.requireRun(runId);
    if (run.status !== 'pending') {
      throw new RunClosedError(runId, run.status);
    }
    if (this.busy.has(runId)) {
      throw new RunBusyError(runId);
    }
    const session = this.pool.get(run.sessionId);
    if (!session) {
      throw new SessionInvalidError(run.sessionId);
    }
    const definition = this.definitions.get(run.workflow);
    if (!definition) {
      throw new WorkflowDefinitionError(run.workflow, 'no workflow with this name is registered');
    }

    this.busy.add(runId);
    try {
      return await this.advanceCurrentPhase(run, definition, session.driver, supplied);
    } catch (error) {
      if (error instanceof PhaseActionFailedError) {
        await this.checkSessionHealth(run, session.driver, error);
      }
      throw error;
    } finally {
      this.busy.delete(runId);
    }
  }

  private async advanceCurrentPhase(
    run: WorkflowRun,
    definition: WorkflowDefinition,
    driver: PageDriver,
    supplied: FieldValues
  ): Promise<AdvanceResult> {
    const spec = definition.phases[run.currentPhase - 1];
    if (!spec) {
      throw new EngineError('INTERNAL_ERROR', `Run ${run.id} points at missing phase ${run.currentPhase}`, {
        runId: run.id,
        phase: run.currentPhase,
      });
    }

    const merged: FieldValues = { ...run.accumulated, ...supplied };
    const missingFields = spec.requiredFields.filter(field => isBlank(merged[field]));
    this.markUsed(run);

    if (missingFields.length > 0) {
      log.info('Phase needs more input', { runId: run.id, phase: spec.ordinal, missingFields });
      return { kind: 'continuation_needed', runId: run.id, phase: spec.ordinal, missingFields };
    }

    run.accumulated = merged;
    const ctx: PhaseContext = {
      driver,
      phase: spec.ordinal,
      values: withDefaults(merged, spec.defaults),
      log: log.child({ runId: run.id, workflow: run.workflow, phase: spec.ordinal }),
    };

    if (spec.enter) {
      const enter = spec.enter;
      await this.runAction(run, ENTRY_ACTION, () => enter(ctx));
    }
    await sleep(spec.settleMs ?? this.entrySettleMs);
    await this.runFills(run, spec, ctx);

    if (spec.kind === 'terminal') {
      const payload = await this.runAction(run, RESULT_ACTION, () => spec.collect(ctx));
      run.status = 'completed';
      this.markUsed(run);
      ctx.log.info('Workflow run completed');
      return { kind: 'completed', runId: run.id, payload };
    }

    const outcome = await this.transition(run, spec, ctx);
    return this.applyOutcome(run, spec, outcome);
  }

  private async transition(
    run: WorkflowRun,
    spec: TransitionPhaseSpec,
    ctx: PhaseContext
  ): Promise<TerminalTransitionState> {
    const config: TransitionConfig = {
      phase: spec.ordinal,
      maxRetries: this.maxRetries,
      unreadableSignalPolicy: this.unreadableSignalPolicy,
    };
    const verify = spec.verify ?? this.verify;
    let state = initialTransitionState();
    let baseline = spec.ordinal;

    while (!isTerminal(state)) {
      switch (state.kind) {
        case 'attempting':
          baseline = (await verify(ctx.driver)) ?? spec.ordinal;
          await this.runAction(run, spec.transition.name, () => spec.transition.run(ctx));
          state = nextTransitionState(config, state, { type: 'transition_fired' });
          break;

        case 'verifying': {
          await sleep(this.settleMs);
          const observed = await verify(ctx.driver);
          ctx.log.debug('Step indicator read', { attempt: state.attempt, observed, baseline });
          state = nextTransitionState(config, state, { type: 'signal_read', observed, baseline });
          break;
        }

        case 'retry_fill':
          ctx.log.warn('Phase did not advance; re-filling before retry', { attempt: state.attempt });
          await this.runFills(run, spec, ctx);
          state = nextTransitionState(config, state, { type: 'refilled' });
          break;
      }
    }
    return state;
  }

  private applyOutcome(run: WorkflowRun, spec: TransitionPhaseSpec, outcome: TerminalTransitionState): AdvanceResult {
    const runId = run.id;
    this.markUsed(run);

    switch (outcome.kind) {
      case 'advanced':
      case 'unverified': {
        const confidence = outcome.kind === 'advanced' ? 'verified' : 'unverified';
        run.currentPhase = spec.ordinal + 1;
        run.lastConfidence = confidence;
        log.info('Phase advanced', { runId, from: spec.ordinal, to: run.currentPhase, confidence });
        return { kind: 'advanced', runId, phase: run.currentPhase, confidence, attempts: outcome.attempts };
      }

      case 'ambiguous':
        log.warn('Ambiguous phase transition', { runId, phase: spec.ordinal, observed: outcome.observed });
        return {
          kind: 'ambiguous_transition',
          runId,
          phase: spec.ordinal,
          expected: spec.ordinal + 1,
          observed: outcome.observed,
        };

      case 'stuck':
        run.status = 'failed';
        run.failureReason = `Phase ${spec.ordinal} (${spec.name}) did not advance after ${outcome.attempts} attempts`;
        log.warn('Phase stuck; run failed', { runId, phase: spec.ordinal, attempts: outcome.attempts });
        return { kind: 'phase_stuck', runId, phase: spec.ordinal, attempts: outcome.attempts };
    }
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async runFills(run: WorkflowRun, spec: PhaseSpec, ctx: PhaseContext): Promise<void> {
    const optional = spec.optionalFields ?? [];
    for (const fill of spec.fills) {
      if (optional.includes(fill.field) && isBlank(ctx.values[fill.field])) {
        continue;
      }
      await this.runAction(run, fill.field, () => fill.run(ctx));
    }
  }

  private async runAction<T>(run: WorkflowRun, field: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw new PhaseActionFailedError(run.id, run.currentPhase, field, error);
    }
  }

  /**
   * After a failed action, find out whether the real cause is a lost login.
   * If so the session is evicted and the run cannot continue.
   */
  private async checkSessionHealth(run: WorkflowRun, driver: PageDriver, cause: PhaseActionFailedError): Promise<void> {
    let report: AuthLossReport;
    try {
      report = await this.healthProbe(driver);
    } catch (probeError) {
      log.warn('Session health probe failed', {
        runId: run.id,
        err: probeError instanceof Error ? probeError.message : String(probeError),
      });
      return;
    }
    if (!report.lost) return;

    const reason = report.reason ?? 'authentication lost';
    await this.pool.invalidate(run.sessionId, reason);
    run.status = 'failed';
    run.failureReason = `Session expired during phase ${cause.phase}: ${reason}`;
    throw new SessionExpiredError(run.sessionId, reason);
  }

  private requireRun(runId: string): WorkflowRun {
    const run = this.runs.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    return run;
  }

  private markUsed(run: WorkflowRun): void {
    run.lastUsedAt = this.now();
    this.pool.touch(run.sessionId);
  }
}

// ============================================
// HELPERS
// ============================================

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function withDefaults(values: FieldValues, defaults: Readonly<FieldValues> = {}): FieldValues {
  const filled: FieldValues = { ...values };
  for (const [field, value] of Object.entries(defaults)) {
    if (isBlank(filled[field])) filled[field] = value;
  }
  return filled;
}

function snapshot(run: WorkflowRun): WorkflowRun {
  return { ...run, accumulated: { ...run.accumulated } };
}

export function validateDefinition(definition: WorkflowDefinition): void {
  const { name, phases } = definition;
  if (!name.trim()) {
    throw new WorkflowDefinitionError(name, 'name must not be empty');
  }
  if (phases.length === 0) {
    throw new WorkflowDefinitionError(name, 'at least one phase is required');
  }
  phases.forEach((phase, i) => {
    if (phase.ordinal !== i + 1) {
      throw new WorkflowDefinitionError(name, `phase at position ${i + 1} has ordinal ${phase.ordinal}`);
    }
    const isLast = i === phases.length - 1;
    if (isLast && phase.kind !== 'terminal') {
      throw new WorkflowDefinitionError(name, 'the last phase must be terminal');
    }
    if (!isLast && phase.kind === 'terminal') {
      throw new WorkflowDefinitionError(name, `phase ${phase.ordinal} is terminal but is not the last phase`);
    }
  });
}
