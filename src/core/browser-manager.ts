/**
 * Browser Manager - Handles Playwright browser lifecycle
 *
 * One shared Chromium process; every pooled session gets its own isolated
 * BrowserContext (cookies, storage) and page, wrapped as a PageDriver.
 * Closing the driver closes its context.
 *
 * Playwright is loaded lazily so the engine (and its tests) can be imported
 * without a browser installed.
 */

import type { Browser, BrowserContext } from 'playwright';
import type { PageDriver } from '../types/page-driver.js';
import { BrowserUnavailableError } from './errors.js';
import { PlaywrightPageDriver } from './playwright-page-driver.js';
import { logger } from '../utils/logger.js';

const log = logger.browser;

// Lazy-loaded Playwright reference
let playwrightModule: typeof import('playwright') | null = null;
let playwrightLoadAttempted = false;
let playwrightLoadError: string | null = null;

/**
 * Try to load Playwright dynamically
 */
async function tryLoadPlaywright(): Promise<typeof import('playwright') | null> {
  if (playwrightLoadAttempted) {
    return playwrightModule;
  }

  playwrightLoadAttempted = true;

  try {
    playwrightModule = await import('playwright');
    return playwrightModule;
  } catch (error) {
    playwrightLoadError = error instanceof Error ? error.message : 'Failed to load Playwright';
    log.error('Playwright not available', { error });
    return null;
  }
}

export interface BrowserManagerConfig {
  headless: boolean;
  /** Default timeout for every page action */
  timeout: number;
  /** Slow down actions for debugging */
  slowMo: number;
}

const DEFAULT_CONFIG: BrowserManagerConfig = {
  headless: true,
  timeout: 30000,
  slowMo: 0,
};

export class BrowserManager {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private contexts: Set<BrowserContext> = new Set();
  private config: BrowserManagerConfig;

  constructor(config: Partial<BrowserManagerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Whether Playwright can be loaded
   */
  static async isPlaywrightAvailable(): Promise<boolean> {
    return (await tryLoadPlaywright()) !== null;
  }

  /**
   * Get the Playwright load error if any
   */
  static getPlaywrightError(): string | null {
    return playwrightLoadError;
  }

  /**
   * Ensure Playwright is available, throwing a helpful error if not
   */
  private async ensurePlaywright(): Promise<typeof import('playwright')> {
    const pw = await tryLoadPlaywright();
    if (!pw) {
      throw new BrowserUnavailableError(playwrightLoadError ?? undefined);
    }
    return pw;
  }

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser) return this.browser;
    // Concurrent first logins share one launch
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<Browser> {
    const pw = await this.ensurePlaywright();
    const startTime = Date.now();
    const browser = await pw.chromium.launch({
      headless: this.config.headless,
      slowMo: this.config.slowMo,
    });
    this.browser = browser;
    log.timed('Browser launched', startTime, { headless: this.config.headless });
    return browser;
  }

  /**
   * Open an isolated context and page, wrapped as a PageDriver
   */
  async openDriver(): Promise<PageDriver> {
    const browser = await this.ensureBrowser();
    const context = await browser.newContext({
      viewport: { width: 1920, height: 1080 },
    });
    this.contexts.add(context);

    try {
      const page = await context.newPage();
      page.setDefaultTimeout(this.config.timeout);
      page.setDefaultNavigationTimeout(this.config.timeout);
      return new PlaywrightPageDriver(page, async () => {
        this.contexts.delete(context);
        await context.close();
      });
    } catch (error) {
      this.contexts.delete(context);
      await context.close();
      throw error;
    }
  }

  get openContexts(): number {
    return this.contexts.size;
  }

  /**
   * Close every context and the browser
   */
  async cleanup(): Promise<void> {
    const contexts = [...this.contexts];
    this.contexts.clear();

    try {
      const results = await Promise.allSettled(contexts.map(context => context.close()));
      const errors = results.flatMap(result => (result.status === 'rejected' ? [String(result.reason)] : []));
      if (errors.length > 0) {
        log.warn('Browser contexts failed to close', { failed: errors.length, errors });
      }
    } finally {
      const browser = this.browser;
      this.browser = null;
      if (browser) {
        await browser.close();
        log.info('Browser closed');
      }
    }
  }

  /**
   * Get current configuration
   */
  getConfig(): BrowserManagerConfig {
    return { ...this.config };
  }
}
