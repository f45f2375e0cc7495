/**
 * Scroll Target Discovery
 *
 * Virtualized lists usually scroll inside a container rather than the window.
 * The container is found through ordered strategies: a known id, an attribute
 * marker, a class name, then a heuristic scan for the first element whose
 * content is taller than its box. When nothing matches, the window scrolls.
 */

import type { PageDriver } from '../types/page-driver.js';
import { logger } from '../utils/logger.js';

const log = logger.contentLoader;

/** Attribute the heuristic stamps on the container it picks */
export const HEURISTIC_MARKER = 'data-convergence-scroll';

/**
 * Where scrolling happens. selector null means the window.
 */
export interface ScrollTarget {
  strategy: string;
  selector: string | null;
}

export interface ScrollTargetStrategy {
  name: string;
  /** CSS selector of the container, or null when this strategy finds nothing */
  resolve(driver: PageDriver): Promise<string | null>;
}

export const WINDOW_TARGET: ScrollTarget = { strategy: 'window', selector: null };

async function existing(driver: PageDriver, selector: string): Promise<string | null> {
  return (await driver.find(selector)) ? selector : null;
}

export function byId(id: string): ScrollTargetStrategy {
  return { name: `id:${id}`, resolve: (driver) => existing(driver, `#${id}`) };
}

export function byAttribute(attribute: string): ScrollTargetStrategy {
  return { name: `attribute:${attribute}`, resolve: (driver) => existing(driver, `[${attribute}]`) };
}

export function byClass(className: string): ScrollTargetStrategy {
  return { name: `class:${className}`, resolve: (driver) => existing(driver, `.${className}`) };
}

/**
 * Page script: tag the first element that overflows vertically and can scroll.
 * Evaluates to true when one was tagged.
 */
export const OVERFLOW_SCAN_SCRIPT = `(() => {
  const candidates = Array.from(document.querySelectorAll('*'));
  for (const el of candidates) {
    const style = window.getComputedStyle(el);
    const scrollable = style.overflowY === 'auto' || style.overflowY === 'scroll';
    if (scrollable && el.scrollHeight > el.clientHeight + 10) {
      el.setAttribute('${HEURISTIC_MARKER}', '1');
      return true;
    }
  }
  return false;
})()`;

export const overflowHeuristic: ScrollTargetStrategy = {
  name: 'overflow_heuristic',
  async resolve(driver) {
    const tagged = await driver.executeScript(OVERFLOW_SCAN_SCRIPT);
    return tagged === true ? `[${HEURISTIC_MARKER}="1"]` : null;
  },
};

/**
 * Default order for Angular Material portals
 */
export const DEFAULT_SCROLL_STRATEGIES: readonly ScrollTargetStrategy[] = [
  byId('scroll-container'),
  byAttribute('cdk-scrollable'),
  byClass('mat-drawer-content'),
  overflowHeuristic,
];

/**
 * Run strategies in order; fall back to the window.
 */
export async function discoverScrollTarget(
  driver: PageDriver,
  strategies: readonly ScrollTargetStrategy[] = DEFAULT_SCROLL_STRATEGIES
): Promise<ScrollTarget> {
  for (const strategy of strategies) {
    const selector = await strategy.resolve(driver);
    if (selector) {
      log.debug('Scroll target found', { strategy: strategy.name, selector });
      return { strategy: strategy.name, selector };
    }
  }
  log.debug('No scroll container found; scrolling the window');
  return WINDOW_TARGET;
}

/**
 * Page script that scrolls the target to its bottom edge
 */
export function scrollToBottomScript(target: ScrollTarget): string {
  if (target.selector === null) {
    return 'window.scrollTo(0, document.body.scrollHeight)';
  }
  const selector = JSON.stringify(target.selector);
  return `(() => {
  const el = document.querySelector(${selector});
  if (el) { el.scrollTop = el.scrollHeight; } else { window.scrollTo(0, document.body.scrollHeight); }
})()`;
}
