/**
 * Central Timeout Configuration
 *
 * All timeout values should be imported from this module to ensure
 * consistent behavior across the codebase.
 *
 * Timeout categories:
 * - APP_BOOT: Full application load after login or navigation
 * - UI_SETTLE: Short waits for the UI to react to an action
 * - PHASE: Phase-level waits in the workflow engine
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Full application boot (single-page portal after login)
   */
  APP_BOOT: 45000,

  /**
   * UI settle delay after clicks, typing and dropdown selection
   */
  UI_SETTLE: 1000,

  /**
   * Wait after entering a phase before filling its fields
   */
  PHASE_ENTRY: 5000,

  /**
   * Wait after firing a phase transition before reading the step indicator
   */
  PHASE_TRANSITION: 15000,

  /**
   * Wait after submitting the login form before judging the outcome
   */
  LOGIN_SETTLE: 5000,

  /**
   * Wait between scroll steps for virtualized content to render
   */
  SCROLL_SETTLE: 700,
} as const;

/**
 * Promise-based delay. A zero delay still yields to the event loop.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
