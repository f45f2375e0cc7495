import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SessionPool } from '../../src/core/session-pool.js';
import { WorkflowEngine, validateDefinition, type WorkflowEngineOptions } from '../../src/core/workflow-engine.js';
import {
  PhaseActionFailedError,
  RunBusyError,
  RunClosedError,
  RunNotFoundError,
  SessionExpiredError,
  SessionInvalidError,
  WorkflowDefinitionError,
} from '../../src/core/errors.js';
import type { FieldAction, PhaseContext, WorkflowDefinition } from '../../src/types/workflow.js';
import { FakeAuthenticator, FakePageDriver, TEST_CREDENTIALS } from '../helpers/fake-driver.js';

// Mock the logger to avoid noise in tests
vi.mock('../../src/utils/logger.js', () => {
  const mockLogger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    timed: vi.fn(),
    child: vi.fn(),
  };
  mockLogger.child.mockReturnValue(mockLogger);
  return {
    logger: {
      sessionPool: mockLogger,
      workflowEngine: mockLogger,
      create: vi.fn(() => mockLogger),
    },
  };
});

function typeInto(field: string): FieldAction {
  return {
    field,
    async run(ctx: PhaseContext) {
      const ref = await ctx.driver.find(`#${field}`);
      if (!ref) throw new Error(`#${field} not rendered`);
      await ctx.driver.type(ref, ctx.values[field] ?? '');
    },
  };
}

async function clickNext(ctx: PhaseContext): Promise<void> {
  const ref = await ctx.driver.find('#next');
  if (!ref) throw new Error('#next not rendered');
  await ctx.driver.click(ref);
}

const THREE_PHASES: WorkflowDefinition = {
  name: 'permit',
  phases: [
    {
      kind: 'transition',
      ordinal: 1,
      name: 'applicant',
      requiredFields: ['a'],
      fills: [typeInto('a')],
      transition: { name: 'next', run: clickNext },
    },
    {
      kind: 'transition',
      ordinal: 2,
      name: 'details',
      requiredFields: ['b'],
      optionalFields: ['c'],
      fills: [typeInto('b'), typeInto('c')],
      transition: { name: 'next', run: clickNext },
    },
    {
      kind: 'terminal',
      ordinal: 3,
      name: 'review',
      requiredFields: [],
      fills: [],
      collect: async (ctx) => ({ a: ctx.values.a, b: ctx.values.b }),
    },
  ],
};

describe('WorkflowEngine', () => {
  let auth: FakeAuthenticator;
  let pool: SessionPool;
  let driver: FakePageDriver;
  let sessionId: string;
  let now: number;
  /** Step the fake stepper shows; null when unreadable */
  let step: number | null;

  function createEngine(options: WorkflowEngineOptions = {}): WorkflowEngine {
    let ids = 0;
    const engine = new WorkflowEngine(pool, {
      settleMs: 0,
      entrySettleMs: 0,
      verify: async () => step,
      healthProbe: async () => ({ lost: false }),
      now: () => now,
      generateId: () => `run-${++ids}`,
      ...options,
    });
    engine.register(THREE_PHASES);
    return engine;
  }

  function typedInto(selector: string): string[] {
    return driver.typed.filter(t => t.selector === selector).map(t => t.text);
  }

  beforeEach(async () => {
    now = 0;
    step = 1;
    auth = new FakeAuthenticator();
    pool = new SessionPool(auth, { ttlMs: 60_000, now: () => now });
    ({ sessionId } = await pool.acquire('alice', TEST_CREDENTIALS));
    driver = auth.drivers[0];
    driver.set('#a', {}).set('#b', {}).set('#c', {}).set('#next', {});
    driver.onClick('#next', () => {
      if (step !== null) step += 1;
    });
  });

  afterEach(async () => {
    await pool.closeAll();
  });

  describe('startRun', () => {
    it('should create a pending run at phase 1', () => {
      const run = createEngine().startRun('permit', sessionId);

      expect(run).toEqual({
        id: 'run-1',
        sessionId,
        workflow: 'permit',
        currentPhase: 1,
        accumulated: {},
        status: 'pending',
        createdAt: 0,
        lastUsedAt: 0,
      });
    });

    it('should reject unknown workflows and sessions', () => {
      const engine = createEngine();

      expect(() => engine.startRun('unknown', sessionId)).toThrow(WorkflowDefinitionError);
      expect(() => engine.startRun('permit', 'no-such-session')).toThrow(SessionInvalidError);
    });
  });

  describe('advance', () => {
    it('should ask for missing fields without touching the page', async () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);

      const result = await engine.advance(run.id, { a: '   ' });

      expect(result).toEqual({ kind: 'continuation_needed', runId: run.id, phase: 1, missingFields: ['a'] });
      expect(driver.typed).toEqual([]);
      expect(driver.clicks).toEqual([]);
      expect(engine.getRun(run.id).accumulated).toEqual({});
    });

    it('should drive a run through every phase to completion', async () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);

      const first = await engine.advance(run.id, { a: 'alpha' });
      const second = await engine.advance(run.id, { b: 'beta' });
      const last = await engine.advance(run.id);

      expect(first).toEqual({ kind: 'advanced', runId: run.id, phase: 2, confidence: 'verified', attempts: 1 });
      expect(second).toEqual({ kind: 'advanced', runId: run.id, phase: 3, confidence: 'verified', attempts: 1 });
      expect(last).toEqual({ kind: 'completed', runId: run.id, payload: { a: 'alpha', b: 'beta' } });
      expect(engine.getRun(run.id).status).toBe('completed');
    });

    it('should keep earlier phases\' values and drop a paused call\'s input', async () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);
      await engine.advance(run.id, { a: 'alpha' });

      const pause = await engine.advance(run.id, { c: 'gamma' });
      const resumed = await engine.advance(run.id, { b: 'beta' });

      expect(pause).toEqual({ kind: 'continuation_needed', runId: run.id, phase: 2, missingFields: ['b'] });
      expect(resumed.kind).toBe('advanced');
      expect(engine.getRun(run.id).accumulated).toEqual({ a: 'alpha', b: 'beta' });
      expect(typedInto('#c')).toEqual([]);
    });

    it('should fill an optional field when it is supplied', async () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);
      await engine.advance(run.id, { a: 'alpha' });

      await engine.advance(run.id, { b: 'beta', c: 'gamma' });

      expect(typedInto('#c')).toEqual(['gamma']);
    });

    it('should skip the fill of a blank optional field', async () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);
      await engine.advance(run.id, { a: 'alpha' });

      await engine.advance(run.id, { b: 'beta' });

      expect(typedInto('#b')).toEqual(['beta']);
      expect(typedInto('#c')).toEqual([]);
    });

    it('should reject a closed run', async () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);
      await engine.advance(run.id, { a: 'alpha' });
      await engine.advance(run.id, { b: 'beta' });
      await engine.advance(run.id);

      await expect(engine.advance(run.id)).rejects.toThrow(RunClosedError);
    });

    it('should reject unknown runs', async () => {
      await expect(createEngine().advance('missing')).rejects.toThrow(RunNotFoundError);
    });
  });

  describe('transition verification', () => {
    it('should advance unverified when the indicator cannot be read', async () => {
      step = null;
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);

      const result = await engine.advance(run.id, { a: 'alpha' });

      expect(result).toEqual({ kind: 'advanced', runId: run.id, phase: 2, confidence: 'unverified', attempts: 1 });
      expect(engine.getRun(run.id).lastConfidence).toBe('unverified');
    });

    it('should report an unreadable indicator as ambiguous under the strict policy', async () => {
      step = null;
      const engine = createEngine({ unreadableSignalPolicy: 'ambiguous' });
      const run = engine.startRun('permit', sessionId);

      const result = await engine.advance(run.id, { a: 'alpha' });

      expect(result).toEqual({ kind: 'ambiguous_transition', runId: run.id, phase: 1, expected: 2, observed: null });
      expect(engine.getRun(run.id)).toMatchObject({ currentPhase: 1, status: 'pending' });
    });

    it('should report a jump past the next phase as ambiguous', async () => {
      driver.onClick('#next', () => {
        step = 4;
      });
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);

      const result = await engine.advance(run.id, { a: 'alpha' });

      expect(result).toEqual({ kind: 'ambiguous_transition', runId: run.id, phase: 1, expected: 2, observed: 4 });
    });

    it('should re-fill and retry when the page does not move', async () => {
      let clicks = 0;
      driver.onClick('#next', () => {
        clicks += 1;
        if (clicks === 2 && step !== null) step += 1;
      });
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);

      const result = await engine.advance(run.id, { a: 'alpha' });

      expect(result).toEqual({ kind: 'advanced', runId: run.id, phase: 2, confidence: 'verified', attempts: 2 });
      expect(typedInto('#a')).toEqual(['alpha', 'alpha']);
    });

    it('should fail the run as stuck after the retry budget', async () => {
      driver.onClick('#next', () => undefined);
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);

      const result = await engine.advance(run.id, { a: 'alpha' });

      expect(result).toEqual({ kind: 'phase_stuck', runId: run.id, phase: 1, attempts: 3 });
      expect(driver.clicks).toHaveLength(3);
      expect(typedInto('#a')).toHaveLength(3);
      expect(engine.getRun(run.id)).toMatchObject({
        status: 'failed',
        failureReason: 'Phase 1 (applicant) did not advance after 3 attempts',
      });
    });
  });

  describe('failures', () => {
    it('should raise PhaseActionFailed and leave the run pending', async () => {
      driver.failOn('#a', new Error('element detached'));
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);

      const error = await engine.advance(run.id, { a: 'alpha' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PhaseActionFailedError);
      expect(error).toMatchObject({ code: 'PHASE_ACTION_FAILED', phase: 1, field: 'a' });
      expect(engine.getRun(run.id)).toMatchObject({ currentPhase: 1, status: 'pending' });
      expect(pool.get(sessionId)).toBeDefined();
    });

    it('should evict the session when the failure was a lost login', async () => {
      driver.failOn('#a', new Error('element detached'));
      const engine = createEngine({ healthProbe: async () => ({ lost: true, reason: 'login_url' }) });
      const run = engine.startRun('permit', sessionId);

      await expect(engine.advance(run.id, { a: 'alpha' })).rejects.toThrow(SessionExpiredError);

      expect(pool.get(sessionId)).toBeUndefined();
      expect(driver.closeCount).toBe(1);
      expect(engine.getRun(run.id)).toMatchObject({
        status: 'failed',
        failureReason: 'Session expired during phase 1: login_url',
      });
    });

    it('should reject a second advance while one is in flight', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const engine = createEngine({
        verify: async () => {
          await gate;
          return step;
        },
      });
      const run = engine.startRun('permit', sessionId);

      const first = engine.advance(run.id, { a: 'alpha' });
      await expect(engine.advance(run.id, { a: 'alpha' })).rejects.toThrow(RunBusyError);

      release();
      expect((await first).kind).toBe('advanced');
    });

    it('should reject advancing on a released session', async () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);
      await pool.release(sessionId, false);

      await expect(engine.advance(run.id, { a: 'alpha' })).rejects.toThrow(SessionInvalidError);
    });
  });

  describe('run lifecycle', () => {
    it('should sweep idle runs and keep recent ones', async () => {
      const engine = createEngine({ runTtlMs: 100 });
      const idle = engine.startRun('permit', sessionId);
      now = 50;
      const recent = engine.startRun('permit', sessionId);

      now = 120;
      expect(engine.sweepRuns()).toEqual([idle.id]);
      expect(engine.listRuns().map(r => r.id)).toEqual([recent.id]);
    });

    it('should abandon a run without closing its session', () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);

      expect(engine.abandon(run.id)).toBe(true);
      expect(engine.abandon(run.id)).toBe(false);
      expect(() => engine.getRun(run.id)).toThrow(RunNotFoundError);
      expect(pool.get(sessionId)).toBeDefined();
    });

    it('should return copies, not live state', async () => {
      const engine = createEngine();
      const run = engine.startRun('permit', sessionId);
      run.accumulated.a = 'tampered';

      expect(engine.getRun(run.id).accumulated).toEqual({});
    });
  });

  describe('definitions', () => {
    it('should refuse a duplicate name', () => {
      expect(() => createEngine().register(THREE_PHASES)).toThrow(WorkflowDefinitionError);
    });

    it('should require ordinals 1..N ending in a single terminal phase', () => {
      const [first, second, last] = THREE_PHASES.phases;

      expect(() => validateDefinition({ name: 'x', phases: [] })).toThrow(WorkflowDefinitionError);
      expect(() => validateDefinition({ name: 'x', phases: [first, second] })).toThrow(
        /the last phase must be terminal/
      );
      expect(() => validateDefinition({ name: 'x', phases: [first, last] })).toThrow(
        /phase at position 2 has ordinal 3/
      );
      expect(() => validateDefinition({ name: 'x', phases: [{ ...last, ordinal: 1 }, { ...last, ordinal: 2 }] })).toThrow(
        /phase 1 is terminal but is not the last phase/
      );
    });
  });
});
