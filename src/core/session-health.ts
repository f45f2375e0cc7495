/**
 * Session Health Probe
 *
 * Detects a pooled driver that has silently lost authentication (portal-side
 * timeout, logout in another tab). Runs ordered probes and stops at the first
 * one that reports a loss.
 */

import type { PageDriver } from '../types/page-driver.js';
import { anyOfProbe, probeFirst, textSelector } from './element-probes.js';

export interface AuthLossReport {
  lost: boolean;
  /** Which probe fired */
  reason?: string;
}

export interface AuthLossProbe {
  name: string;
  detect(driver: PageDriver): Promise<boolean>;
}

/** URL fragments that only appear on sign-in pages */
export const LOGIN_URL_PATTERNS: readonly RegExp[] = [
  /\/login\b/i,
  /\/signin\b/i,
  /\/account\/log-?in/i,
  /\/connect\/authorize/i,
];

export const EXPIRY_MESSAGES: readonly string[] = [
  'Session expired',
  'session has expired',
  'Please log in again',
  'You have been logged out',
];

export const loginUrlProbe: AuthLossProbe = {
  name: 'login_url',
  async detect(driver) {
    const url = await driver.currentUrl();
    return LOGIN_URL_PATTERNS.some(pattern => pattern.test(url));
  },
};

export const expiryMessageProbe: AuthLossProbe = {
  name: 'expiry_message',
  async detect(driver) {
    const probe = anyOfProbe(
      'expiry_message',
      EXPIRY_MESSAGES.map(message => textSelector('*', message))
    );
    return (await probeFirst(driver, [probe])) !== null;
  },
};

export const passwordFieldProbe: AuthLossProbe = {
  name: 'password_field',
  async detect(driver) {
    return (await driver.find('input[type="password"]')) !== null;
  },
};

export const DEFAULT_AUTH_LOSS_PROBES: readonly AuthLossProbe[] = [
  loginUrlProbe,
  expiryMessageProbe,
  passwordFieldProbe,
];

/**
 * Run the probes in order. A probe that throws counts as "not detected":
 * a driver too broken to answer is reported by the caller's own error.
 */
export async function detectAuthenticationLoss(
  driver: PageDriver,
  probes: readonly AuthLossProbe[] = DEFAULT_AUTH_LOSS_PROBES
): Promise<AuthLossReport> {
  for (const probe of probes) {
    let detected: boolean;
    try {
      detected = await probe.detect(driver);
    } catch {
      continue;
    }
    if (detected) {
      return { lost: true, reason: probe.name };
    }
  }
  return { lost: false };
}
