/**
 * Error Taxonomy Types and Classification
 *
 * Provides structured error responses with:
 * - Error categories for high-level classification
 * - Stable error codes for programmatic handling
 * - A disposition telling callers whether to retry, supply input, or give up
 * - Recommended actions for recovery
 */

/**
 * High-level error categories for classification
 */
export type ErrorCategory =
  | 'auth'       // Login failures
  | 'session'    // Pooled session gone or logged out
  | 'workflow'   // Phase execution and transition verification
  | 'content'    // Loader and classifier outcomes
  | 'browser'    // Playwright / driver issues
  | 'config'     // Configuration errors
  | 'internal';  // Anything else

/**
 * Machine-readable error codes for programmatic handling
 */
export type ErrorCode =
  // Auth
  | 'AUTH_FAILED'
  // Session
  | 'SESSION_EXPIRED'
  | 'SESSION_INVALID'
  // Workflow
  | 'CONTINUATION_NEEDED'
  | 'PHASE_ACTION_FAILED'
  | 'PHASE_STUCK'
  | 'AMBIGUOUS_TRANSITION'
  | 'RUN_NOT_FOUND'
  | 'RUN_BUSY'
  | 'RUN_CLOSED'
  // Content
  | 'REFERENCE_NOT_FOUND'
  | 'LOADER_EXCEEDED'
  // Browser
  | 'BROWSER_NOT_INSTALLED'
  | 'BROWSER_TIMEOUT'
  // Config
  | 'CONFIG_INVALID'
  // Internal
  | 'INTERNAL_ERROR';

/**
 * What the caller should do next
 * - transient: the same request may succeed if retried
 * - needs_input: resume with the missing fields
 * - fatal: retrying the same request will not help
 */
export type ErrorDisposition = 'transient' | 'needs_input' | 'fatal';

/**
 * Actionable recommendation for callers
 */
export interface RecommendedAction {
  /** Action identifier (e.g., "retry", "reacquire_session") */
  action: string;

  /** Human-readable description of what to do */
  description: string;

  /** Suggested wait time in milliseconds before action */
  suggestedDelayMs?: number;

  /** Priority of this action (lower = try first) */
  priority: number;
}

/**
 * Context about the error
 */
export interface ErrorContext {
  sessionId?: string;
  runId?: string;
  phase?: number;
  field?: string;
  attempts?: number;
}

/**
 * Structured error response with taxonomy and recommendations
 */
export interface StructuredError {
  /** Human-readable error message */
  error: string;

  /** High-level error category */
  category: ErrorCategory;

  /** Specific error code for programmatic handling */
  code: ErrorCode;

  disposition: ErrorDisposition;

  /** Shorthand for disposition === 'transient' */
  retryable: boolean;

  /** Recommended actions for recovery */
  recommendedActions: RecommendedAction[];

  /** Additional context about the error */
  context?: ErrorContext;
}

/**
 * Result of error classification
 */
export interface ErrorClassification {
  category: ErrorCategory;
  code: ErrorCode;
}

const CODE_CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  AUTH_FAILED: 'auth',
  SESSION_EXPIRED: 'session',
  SESSION_INVALID: 'session',
  CONTINUATION_NEEDED: 'workflow',
  PHASE_ACTION_FAILED: 'workflow',
  PHASE_STUCK: 'workflow',
  AMBIGUOUS_TRANSITION: 'workflow',
  RUN_NOT_FOUND: 'workflow',
  RUN_BUSY: 'workflow',
  RUN_CLOSED: 'workflow',
  REFERENCE_NOT_FOUND: 'content',
  LOADER_EXCEEDED: 'content',
  BROWSER_NOT_INSTALLED: 'browser',
  BROWSER_TIMEOUT: 'browser',
  CONFIG_INVALID: 'config',
  INTERNAL_ERROR: 'internal',
};

/**
 * Category for a known code
 */
export function categoryOf(code: ErrorCode): ErrorCategory {
  return CODE_CATEGORIES[code];
}

/**
 * Narrow an arbitrary string to a known error code
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(CODE_CATEGORIES, value);
}

/**
 * Classify an error into category and code.
 *
 * Errors carrying a known `code` property (everything thrown by this package)
 * classify directly; anything else falls back to message patterns.
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string' && isErrorCode(error.code)) {
    return { category: categoryOf(error.code), code: error.code };
  }

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();

  if (message.includes('playwright') && (message.includes('not installed') || message.includes('not available'))) {
    return { category: 'browser', code: 'BROWSER_NOT_INSTALLED' };
  }
  if (message.includes('timeout') || message.includes('timed out')) {
    return { category: 'browser', code: 'BROWSER_TIMEOUT' };
  }
  if (message.includes('session') && (message.includes('expired') || message.includes('logged out'))) {
    return { category: 'session', code: 'SESSION_EXPIRED' };
  }
  if (message.includes('login failed') || message.includes('invalid credentials')) {
    return { category: 'auth', code: 'AUTH_FAILED' };
  }
  if (message.includes('configuration validation failed')) {
    return { category: 'config', code: 'CONFIG_INVALID' };
  }

  return { category: 'internal', code: 'INTERNAL_ERROR' };
}

/**
 * Determine what the caller should do about an error code
 */
export function dispositionOf(code: ErrorCode): ErrorDisposition {
  switch (code) {
    case 'CONTINUATION_NEEDED':
      return 'needs_input';
    case 'SESSION_EXPIRED':
    case 'SESSION_INVALID':
    case 'RUN_BUSY':
    case 'AMBIGUOUS_TRANSITION':
    case 'LOADER_EXCEEDED':
    case 'BROWSER_TIMEOUT':
      return 'transient';
    default:
      return 'fatal';
  }
}

/**
 * Get recommended actions based on error code
 */
export function getRecommendedActions(code: ErrorCode): RecommendedAction[] {
  const actions: RecommendedAction[] = [];

  switch (code) {
    case 'SESSION_EXPIRED':
    case 'SESSION_INVALID':
      actions.push({
        action: 'reacquire_session',
        description: 'Acquire a new session for this identity and start a new run',
        priority: 1,
      });
      break;

    case 'CONTINUATION_NEEDED':
      actions.push({
        action: 'supply_fields',
        description: 'Call again with the run id and the missing fields',
        priority: 1,
      });
      break;

    case 'RUN_BUSY':
      actions.push({
        action: 'retry',
        description: 'Wait for the in-flight step of this run to finish, then retry',
        suggestedDelayMs: 5000,
        priority: 1,
      });
      break;

    case 'AMBIGUOUS_TRANSITION':
      actions.push({
        action: 'inspect_run',
        description: 'The portal landed on an unexpected step; inspect the run before continuing',
        priority: 1,
      });
      break;

    case 'BROWSER_TIMEOUT':
    case 'LOADER_EXCEEDED':
      actions.push({
        action: 'retry',
        description: 'Retry after a brief delay; the portal may be slow',
        suggestedDelayMs: 2000,
        priority: 1,
      });
      break;

    case 'PHASE_STUCK':
      actions.push({
        action: 'restart_run',
        description: 'The form refused to advance; check the supplied values and start a new run',
        priority: 1,
      });
      break;

    case 'PHASE_ACTION_FAILED':
      actions.push({
        action: 'check_values',
        description: 'A field could not be filled; verify the value exists in the portal',
        priority: 1,
      });
      break;

    case 'AUTH_FAILED':
      actions.push({
        action: 'check_credentials',
        description: 'Verify the username and password for this identity',
        priority: 1,
      });
      break;

    case 'RUN_NOT_FOUND':
    case 'RUN_CLOSED':
      actions.push({
        action: 'restart_run',
        description: 'Start a new run without a run id',
        priority: 1,
      });
      break;

    case 'BROWSER_NOT_INSTALLED':
      actions.push({
        action: 'install_browser',
        description: 'Install Playwright browsers: npx playwright install chromium',
        priority: 1,
      });
      break;

    case 'CONFIG_INVALID':
      actions.push({
        action: 'fix_config',
        description: 'Correct the environment variables named in the message',
        priority: 1,
      });
      break;

    default:
      actions.push({
        action: 'report_issue',
        description: 'If the error persists, report this issue for investigation',
        priority: 1,
      });
      break;
  }

  return actions;
}

/**
 * Build a structured error response from any thrown value
 */
export function buildStructuredError(error: unknown, errorContext?: ErrorContext): StructuredError {
  const message = error instanceof Error ? error.message : String(error);
  const classification = classifyError(error);
  const disposition = dispositionOf(classification.code);

  return {
    error: message,
    category: classification.category,
    code: classification.code,
    disposition,
    retryable: disposition === 'transient',
    recommendedActions: getRecommendedActions(classification.code),
    ...(errorContext && { context: errorContext }),
  };
}
