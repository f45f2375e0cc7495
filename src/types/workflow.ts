/**
 * Workflow Phase Types
 *
 * Types for resumable multi-phase form submissions. A workflow is an ordered
 * list of phases; each non-terminal phase ends in a transition whose effect is
 * verified through an external progress signal (the step indicator), and the
 * terminal phase retrieves a result instead of transitioning.
 */

import type { PageDriver } from './page-driver.js';
import type { Logger } from '../utils/logger.js';

/**
 * Field values supplied by callers, keyed by field name
 */
export type FieldValues = Record<string, string>;

/**
 * Result data returned by a terminal phase
 */
export type WorkflowPayload = Record<string, unknown>;

export type RunStatus = 'pending' | 'completed' | 'failed';

/**
 * How much the last transition was trusted
 * - verified: the step indicator reported the expected ordinal
 * - unverified: the indicator was unreadable and success was assumed
 */
export type TransitionConfidence = 'verified' | 'unverified';

/**
 * What to do when the step indicator cannot be read after a transition
 */
export type UnreadableSignalPolicy = 'assume_advanced' | 'ambiguous';

/**
 * Resumable record of progress through one workflow
 */
export interface WorkflowRun {
  readonly id: string;
  /** Weak reference to the pooled session; the run never owns it */
  readonly sessionId: string;
  readonly workflow: string;
  /** 1-based ordinal of the phase waiting to run */
  currentPhase: number;
  accumulated: FieldValues;
  status: RunStatus;
  readonly createdAt: number;
  lastUsedAt: number;
  lastConfidence?: TransitionConfidence;
  failureReason?: string;
}

/**
 * Everything a phase action can see
 */
export interface PhaseContext {
  readonly driver: PageDriver;
  readonly phase: number;
  /** Merged field values (accumulated plus the ones just supplied) */
  readonly values: Readonly<FieldValues>;
  readonly log: Logger;
}

/**
 * Fills one field. Throwing aborts the advance call with PhaseActionFailed.
 */
export interface FieldAction {
  field: string;
  run(ctx: PhaseContext): Promise<void>;
}

/**
 * Fires the transition to the next phase (e.g. clicks "Next")
 */
export interface TransitionAction {
  name: string;
  run(ctx: PhaseContext): Promise<void>;
}

/**
 * Reads the observed phase ordinal, or null when the signal is unreadable
 */
export type OrdinalProbe = (driver: PageDriver) => Promise<number | null>;

interface PhaseSpecBase {
  ordinal: number;
  name: string;
  requiredFields: string[];
  /** Fields consumed when present but never demanded */
  optionalFields?: string[];
  /** Values filled in for optional fields the caller leaves blank */
  defaults?: Readonly<FieldValues>;
  /** Runs before the fills on every advance into this phase */
  enter?: (ctx: PhaseContext) => Promise<void>;
  /** Wait after entering, before filling */
  settleMs?: number;
  fills: FieldAction[];
}

export interface TransitionPhaseSpec extends PhaseSpecBase {
  kind: 'transition';
  transition: TransitionAction;
  /** Overrides the engine's default step-indicator probe */
  verify?: OrdinalProbe;
}

export interface TerminalPhaseSpec extends PhaseSpecBase {
  kind: 'terminal';
  collect(ctx: PhaseContext): Promise<WorkflowPayload>;
}

export type PhaseSpec = TransitionPhaseSpec | TerminalPhaseSpec;

export interface WorkflowDefinition {
  name: string;
  phases: PhaseSpec[];
}

/**
 * Outcome of one advance() call
 */
export type AdvanceResult =
  | {
      kind: 'advanced';
      runId: string;
      /** Phase the run is now waiting in */
      phase: number;
      confidence: TransitionConfidence;
      attempts: number;
    }
  | {
      kind: 'continuation_needed';
      runId: string;
      phase: number;
      missingFields: string[];
    }
  | {
      kind: 'phase_stuck';
      runId: string;
      phase: number;
      attempts: number;
    }
  | {
      kind: 'ambiguous_transition';
      runId: string;
      phase: number;
      expected: number;
      /** null when the signal was unreadable under the 'ambiguous' policy */
      observed: number | null;
    }
  | {
      kind: 'completed';
      runId: string;
      payload: WorkflowPayload;
    };

export type AdvanceResultKind = AdvanceResult['kind'];
