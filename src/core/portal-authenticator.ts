/**
 * Portal Authenticator
 *
 * Logs an identity into the portal's sign-in form and hands back the
 * authenticated driver. Any driver opened for a failed attempt is closed
 * before the AuthenticationError propagates.
 *
 * Challenge solving (reCAPTCHA and friends) is out of scope; a ChallengeSolver
 * can be plugged in and runs between filling the form and submitting it.
 */

import type { PageDriver } from '../types/page-driver.js';
import type { Authenticator, Credentials } from '../types/session.js';
import { AuthenticationError, type LoginFailureReason } from './errors.js';
import { anyOfProbe, probeFirst, textSelector, type ElementProbe } from './element-probes.js';
import { LOGIN_URL_PATTERNS } from './session-health.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, sleep } from '../utils/timeouts.js';

const log = logger.auth;

export interface ChallengeSolver {
  /** Resolve false when the challenge could not be solved */
  solve(driver: PageDriver): Promise<boolean>;
}

export interface PortalAuthenticatorOptions {
  /** Opens a fresh, unauthenticated driver */
  openDriver: () => Promise<PageDriver>;
  loginUrl: string;
  challengeSolver?: ChallengeSolver;
  /** Wait after submitting before judging the outcome */
  settleMs?: number;
}

export const USERNAME_PROBES: readonly ElementProbe[] = [
  anyOfProbe('username', ['input[name="Username"]', 'input[name="username"]', '#username', 'input[type="email"]']),
];

export const PASSWORD_PROBES: readonly ElementProbe[] = [
  anyOfProbe('password', ['input[name="Password"]', 'input[name="password"]', 'input[type="password"]']),
];

export const SUBMIT_PROBES: readonly ElementProbe[] = [
  anyOfProbe('submit', ['button[type="submit"]', 'xpath=//*[@type="submit"]']),
];

export const CREDENTIAL_ERROR_TEXT: readonly string[] = ['Invalid', 'incorrect', 'Login failed'];

/**
 * Failure raised inside a login step, carrying its classification
 */
class LoginStepError extends Error {
  constructor(
    readonly reason: LoginFailureReason,
    message: string
  ) {
    super(message);
    this.name = 'LoginStepError';
  }
}

export class PortalAuthenticator implements Authenticator {
  private readonly settleMs: number;

  constructor(private readonly options: PortalAuthenticatorOptions) {
    this.settleMs = options.settleMs ?? TIMEOUTS.LOGIN_SETTLE;
  }

  async login(identity: string, credentials: Credentials): Promise<PageDriver> {
    const startTime = Date.now();
    const driver = await this.options.openDriver();

    try {
      await this.submitLoginForm(driver, credentials);
      await this.verifyLoggedIn(driver);
      log.timed('Login succeeded', startTime, { identity });
      return driver;
    } catch (error) {
      await closeAfterFailure(driver, identity);
      if (error instanceof LoginStepError) {
        log.warn('Login failed', { identity, reason: error.reason });
        throw new AuthenticationError(identity, error.reason, error.message);
      }
      const detail = error instanceof Error ? error.message : String(error);
      log.error('Login aborted by an unexpected error', { identity, error });
      throw new AuthenticationError(identity, 'unknown', detail, { cause: error });
    }
  }

  private async submitLoginForm(driver: PageDriver, credentials: Credentials): Promise<void> {
    try {
      await driver.navigate(this.options.loginUrl);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new LoginStepError('page_load_error', `Login page did not load: ${detail}`);
    }

    const username = await probeFirst(driver, USERNAME_PROBES);
    const password = await probeFirst(driver, PASSWORD_PROBES);
    if (!username || !password) {
      throw new LoginStepError('login_form_not_found', 'Username or password field not found');
    }
    await driver.type(username.ref, credentials.username);
    await driver.type(password.ref, credentials.password);

    if (this.options.challengeSolver) {
      const solved = await this.options.challengeSolver.solve(driver);
      if (!solved) {
        throw new LoginStepError('challenge_failed', 'Login challenge was not solved');
      }
    }

    const submit = await probeFirst(driver, SUBMIT_PROBES);
    if (!submit) {
      throw new LoginStepError('login_form_not_found', 'Login button not found');
    }
    await driver.click(submit.ref);
    await sleep(this.settleMs);
  }

  /**
   * Still on a sign-in URL after submitting means the portal rejected us
   */
  private async verifyLoggedIn(driver: PageDriver): Promise<void> {
    const url = await driver.currentUrl();
    if (!LOGIN_URL_PATTERNS.some(pattern => pattern.test(url))) {
      return;
    }
    const errorText = await probeFirst(driver, [
      anyOfProbe('credential_error', CREDENTIAL_ERROR_TEXT.map(text => textSelector('*', text))),
    ]);
    if (errorText) {
      throw new LoginStepError('invalid_credentials', 'Portal rejected the credentials');
    }
    throw new LoginStepError('unknown', `Still on the sign-in page after submitting (${url})`);
  }
}

async function closeAfterFailure(driver: PageDriver, identity: string): Promise<void> {
  try {
    await driver.close();
  } catch (error) {
    log.warn('Failed to close driver after login failure', {
      identity,
      err: error instanceof Error ? error.message : String(error),
    });
  }
}
