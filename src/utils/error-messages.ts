/**
 * Error Messages with Actionable Suggestions
 *
 * Provides user-friendly error messages that include:
 * - Clear description of what went wrong
 * - Actionable suggestions for resolution
 * - Alternative approaches when available
 */

/**
 * Error message builder for consistent formatting
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Command to run (e.g., npx playwright install) */
  command?: string;
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.command) {
    parts.push(`Run: ${options.command}`);
  }

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach(a => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// DEPENDENCY ERRORS
// =============================================================================

/**
 * Error when Playwright or its browsers are missing
 */
export function playwrightNotInstalledError(detail?: string): string {
  return buildErrorMessage({
    message: 'Playwright is not installed.',
    command: 'npm install playwright && npx playwright install chromium',
    suggestions: detail ? [detail] : undefined,
  });
}

// =============================================================================
// AUTHENTICATION & SESSION ERRORS
// =============================================================================

/**
 * Error when the portal rejects a login
 */
export function loginFailedError(identity: string, reason: string): string {
  return buildErrorMessage({
    message: `Login failed for "${identity}": ${reason}.`,
    suggestions: [
      'Verify the username and password',
      'Check that the portal is reachable from this host',
    ],
  });
}

/**
 * Error when a pooled session lost its authentication
 */
export function sessionExpiredError(sessionId: string, reason: string): string {
  return buildErrorMessage({
    message: `Session ${sessionId} is no longer authenticated (${reason}).`,
    suggestions: [
      'The session was evicted; acquire a new one for the same identity',
    ],
  });
}

/**
 * Error when a session id is unknown to the pool
 */
export function sessionNotFoundError(sessionId: string): string {
  return buildErrorMessage({
    message: `Session ${sessionId} was not found or has already been released.`,
    suggestions: [
      'Sessions idle past the TTL are evicted unless pinned with keep-alive',
    ],
  });
}

// =============================================================================
// WORKFLOW ERRORS
// =============================================================================

/**
 * Error when a field fill or element lookup fails inside a phase
 */
export function phaseActionFailedError(phase: number, field: string, detail: string): string {
  return buildErrorMessage({
    message: `Phase ${phase} could not fill "${field}": ${detail}`,
    suggestions: [
      'Verify the value is offered by the portal (dropdown options are matched by text)',
      'Retry the same run id once the value is corrected',
    ],
  });
}

/**
 * Error when a run id is unknown
 */
export function runNotFoundError(runId: string): string {
  return buildErrorMessage({
    message: `Workflow run ${runId} was not found or has expired.`,
    suggestions: ['Start a new run without a run id'],
  });
}

/**
 * Error when a second advance arrives while one is in flight
 */
export function runBusyError(runId: string): string {
  return buildErrorMessage({
    message: `Workflow run ${runId} is already advancing.`,
    suggestions: ['Phases of one run execute strictly in order; wait for the current call'],
  });
}

/**
 * Error when advancing a finished run
 */
export function runClosedError(runId: string, status: string): string {
  return buildErrorMessage({
    message: `Workflow run ${runId} is ${status} and cannot advance.`,
    suggestions: ['Start a new run without a run id'],
  });
}

/**
 * Error when a workflow definition is malformed
 */
export function invalidWorkflowError(workflow: string, problem: string): string {
  return buildErrorMessage({
    message: `Workflow "${workflow}" is invalid: ${problem}.`,
  });
}
