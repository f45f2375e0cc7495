/**
 * Engine Error Classes
 *
 * Every genuine failure thrown by the engine is an EngineError carrying a
 * stable code from the taxonomy in types/errors. Expected outcomes
 * (continuation, stuck or ambiguous transitions, loader limits, a missing
 * reference milestone) are result values and never appear here.
 */

import type { ErrorCode, ErrorContext } from '../types/errors.js';
import {
  loginFailedError,
  sessionExpiredError,
  sessionNotFoundError,
  phaseActionFailedError,
  runNotFoundError,
  runBusyError,
  runClosedError,
  invalidWorkflowError,
  playwrightNotInstalledError,
} from '../utils/error-messages.js';

export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.context = context;
    this.name = 'EngineError';
  }
}

/**
 * Why a login attempt failed
 */
export type LoginFailureReason =
  | 'invalid_credentials'
  | 'login_form_not_found'
  | 'challenge_failed'
  | 'page_load_error'
  | 'unknown';

export class AuthenticationError extends EngineError {
  readonly identity: string;
  readonly reason: LoginFailureReason;

  constructor(identity: string, reason: LoginFailureReason, detail?: string, options?: { cause?: unknown }) {
    super('AUTH_FAILED', loginFailedError(identity, detail ?? reason.replace(/_/g, ' ')), {}, options);
    this.identity = identity;
    this.reason = reason;
    this.name = 'AuthenticationError';
  }
}

export class SessionExpiredError extends EngineError {
  constructor(sessionId: string, reason: string) {
    super('SESSION_EXPIRED', sessionExpiredError(sessionId, reason), { sessionId });
    this.name = 'SessionExpiredError';
  }
}

export class SessionInvalidError extends EngineError {
  constructor(sessionId: string) {
    super('SESSION_INVALID', sessionNotFoundError(sessionId), { sessionId });
    this.name = 'SessionInvalidError';
  }
}

export class PhaseActionFailedError extends EngineError {
  readonly phase: number;
  readonly field: string;

  constructor(runId: string, phase: number, field: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PHASE_ACTION_FAILED', phaseActionFailedError(phase, field, detail), { runId, phase, field }, { cause });
    this.phase = phase;
    this.field = field;
    this.name = 'PhaseActionFailedError';
  }
}

export class RunNotFoundError extends EngineError {
  constructor(runId: string) {
    super('RUN_NOT_FOUND', runNotFoundError(runId), { runId });
    this.name = 'RunNotFoundError';
  }
}

export class RunBusyError extends EngineError {
  constructor(runId: string) {
    super('RUN_BUSY', runBusyError(runId), { runId });
    this.name = 'RunBusyError';
  }
}

export class RunClosedError extends EngineError {
  constructor(runId: string, status: string) {
    super('RUN_CLOSED', runClosedError(runId, status), { runId });
    this.name = 'RunClosedError';
  }
}

export class WorkflowDefinitionError extends EngineError {
  constructor(workflow: string, problem: string) {
    super('CONFIG_INVALID', invalidWorkflowError(workflow, problem));
    this.name = 'WorkflowDefinitionError';
  }
}

export class BrowserUnavailableError extends EngineError {
  constructor(detail?: string) {
    super('BROWSER_NOT_INSTALLED', playwrightNotInstalledError(detail));
    this.name = 'BrowserUnavailableError';
  }
}
