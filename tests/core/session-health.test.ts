import { describe, it, expect } from 'vitest';
import { detectAuthenticationLoss, type AuthLossProbe } from '../../src/core/session-health.js';
import { textSelector } from '../../src/core/element-probes.js';
import { FakePageDriver } from '../helpers/fake-driver.js';

describe('detectAuthenticationLoss', () => {
  it('should report a healthy session when no probe fires', async () => {
    const driver = new FakePageDriver();

    expect(await detectAuthenticationLoss(driver)).toEqual({ lost: false });
  });

  it('should detect a redirect to the sign-in page', async () => {
    const driver = new FakePageDriver();
    driver.url = 'https://portal.test/Account/Login?ReturnUrl=%2F';

    expect(await detectAuthenticationLoss(driver)).toEqual({ lost: true, reason: 'login_url' });
  });

  it('should detect an expiry message on the page', async () => {
    const driver = new FakePageDriver().set(textSelector('*', 'Session expired'), { text: 'Session expired' });

    expect(await detectAuthenticationLoss(driver)).toEqual({ lost: true, reason: 'expiry_message' });
  });

  it('should detect a visible password field', async () => {
    const driver = new FakePageDriver().set('input[type="password"]', {});

    expect(await detectAuthenticationLoss(driver)).toEqual({ lost: true, reason: 'password_field' });
  });

  it('should ignore a hidden password field', async () => {
    const driver = new FakePageDriver().set('input[type="password"]', { visible: false });

    expect(await detectAuthenticationLoss(driver)).toEqual({ lost: false });
  });

  it('should skip probes that throw and keep checking', async () => {
    const broken: AuthLossProbe = {
      name: 'broken',
      detect: async () => {
        throw new Error('target closed');
      },
    };
    const always: AuthLossProbe = { name: 'always', detect: async () => true };

    expect(await detectAuthenticationLoss(new FakePageDriver(), [broken, always])).toEqual({
      lost: true,
      reason: 'always',
    });
  });
});
