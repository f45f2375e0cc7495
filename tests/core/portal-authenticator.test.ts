import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PortalAuthenticator, type ChallengeSolver } from '../../src/core/portal-authenticator.js';
import { AuthenticationError } from '../../src/core/errors.js';
import { textSelector } from '../../src/core/element-probes.js';
import { FakePageDriver, TEST_CREDENTIALS } from '../helpers/fake-driver.js';

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
  return {
    logger: {
      auth: mockLogger,
      create: vi.fn(() => mockLogger),
    },
  };
});

const LOGIN_URL = 'https://portal.test/account/login';

/**
 * A sign-in page that lands on `landing` once submitted
 */
function loginPage(landing: string = 'https://portal.test/dashboard'): FakePageDriver {
  const driver = new FakePageDriver()
    .set('input[name="username"]', {})
    .set('input[type="password"]', {})
    .set('button[type="submit"]', {});
  driver.onClick('button[type="submit"]', () => {
    driver.url = landing;
  });
  return driver;
}

async function loginError(promise: Promise<unknown>): Promise<AuthenticationError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof AuthenticationError)) {
    throw new Error(`Expected AuthenticationError, got ${String(error)}`);
  }
  return error;
}

describe('PortalAuthenticator', () => {
  let driver: FakePageDriver;

  function authenticator(challengeSolver?: ChallengeSolver): PortalAuthenticator {
    return new PortalAuthenticator({ openDriver: async () => driver, loginUrl: LOGIN_URL, challengeSolver, settleMs: 0 });
  }

  beforeEach(() => {
    driver = loginPage();
  });

  it('should fill the form, submit and return the driver', async () => {
    const result = await authenticator().login('alice', TEST_CREDENTIALS);

    expect(result).toBe(driver);
    expect(driver.navigations).toEqual([LOGIN_URL]);
    expect(driver.typed).toEqual([
      { selector: 'input[name="username"]', text: 'test-user' },
      { selector: 'input[type="password"]', text: 'test-secret' },
    ]);
    expect(driver.closeCount).toBe(0);
  });

  it('should fail with login_form_not_found and close the driver', async () => {
    driver.remove('input[type="password"]');

    const error = await loginError(authenticator().login('alice', TEST_CREDENTIALS));

    expect(error.reason).toBe('login_form_not_found');
    expect(error.code).toBe('AUTH_FAILED');
    expect(driver.closeCount).toBe(1);
  });

  it('should classify a rejected login as invalid_credentials', async () => {
    driver = loginPage(LOGIN_URL);
    driver.set(textSelector('*', 'Invalid'), { text: 'Invalid username or password' });

    const error = await loginError(authenticator().login('alice', TEST_CREDENTIALS));

    expect(error.reason).toBe('invalid_credentials');
    expect(driver.closeCount).toBe(1);
  });

  it('should report unknown when it stays on the sign-in page without an error message', async () => {
    driver = loginPage(LOGIN_URL);

    const error = await loginError(authenticator().login('alice', TEST_CREDENTIALS));

    expect(error.reason).toBe('unknown');
  });

  it('should fail with challenge_failed when the solver gives up', async () => {
    const solver: ChallengeSolver = { solve: vi.fn(async () => false) };

    const error = await loginError(authenticator(solver).login('alice', TEST_CREDENTIALS));

    expect(error.reason).toBe('challenge_failed');
    expect(solver.solve).toHaveBeenCalledWith(driver);
    expect(driver.clicks).toEqual([]);
  });

  it('should report page_load_error when navigation throws', async () => {
    vi.spyOn(driver, 'navigate').mockRejectedValue(new Error('net::ERR_NAME_NOT_RESOLVED'));

    const error = await loginError(authenticator().login('alice', TEST_CREDENTIALS));

    expect(error.reason).toBe('page_load_error');
    expect(driver.closeCount).toBe(1);
  });

  it('should wrap unexpected errors as unknown, keeping the cause', async () => {
    const cause = new Error('target closed');
    driver.failOn('button[type="submit"]', cause);

    const error = await loginError(authenticator().login('alice', TEST_CREDENTIALS));

    expect(error.reason).toBe('unknown');
    expect(error.cause).toBe(cause);
    expect(driver.closeCount).toBe(1);
  });
});
