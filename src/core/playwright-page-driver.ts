/**
 * Playwright-backed PageDriver
 *
 * Selectors are passed straight to Playwright locators, so CSS and the
 * `xpath=` / `text=` engines all work. An ElementRef is re-resolved on every
 * use (selector + nth), which tolerates the DOM being re-rendered between
 * calls.
 */

import type { Locator, Page } from 'playwright';
import type { ElementRef, PageDriver } from '../types/page-driver.js';

export class PlaywrightPageDriver implements PageDriver {
  private closed = false;

  constructor(
    private readonly page: Page,
    private readonly onClose: () => Promise<void>
  ) {}

  private locate(ref: ElementRef): Locator {
    return this.page.locator(ref.selector).nth(ref.nth);
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async find(selector: string): Promise<ElementRef | null> {
    const matches = this.page.locator(selector);
    const count = await matches.count();
    for (let nth = 0; nth < count; nth++) {
      if (await matches.nth(nth).isVisible()) {
        return { selector, nth };
      }
    }
    return null;
  }

  async findAll(selector: string): Promise<ElementRef[]> {
    const count = await this.page.locator(selector).count();
    return Array.from({ length: count }, (_, nth) => ({ selector, nth }));
  }

  async click(ref: ElementRef): Promise<void> {
    await this.locate(ref).click();
  }

  async type(ref: ElementRef, text: string): Promise<void> {
    await this.locate(ref).fill(text);
  }

  async readText(ref: ElementRef): Promise<string> {
    return this.locate(ref).innerText();
  }

  async getAttribute(ref: ElementRef, name: string): Promise<string | null> {
    return this.locate(ref).getAttribute(name);
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  async executeScript(script: string): Promise<unknown> {
    return this.page.evaluate<unknown>(script);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.onClose();
  }
}
