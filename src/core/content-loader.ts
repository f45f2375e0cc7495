/**
 * Convergence Content Loader
 *
 * Drives a virtualized / infinite-scroll list until one of:
 * - the target is met (exact count reached, or the wanted item is rendered)
 * - the visible count stops growing for `stabilityThreshold` consecutive scrolls
 * - the cycle budget runs out (best-effort result plus a diagnostic)
 *
 * The target is re-probed right after every scroll, so a FindId search stops
 * the moment the item renders. Not finding something is a result, never an
 * exception.
 */

import type {
  ContentLoadState,
  ContentSource,
  LoadResult,
  LoadTarget,
  LoaderOptions,
  StopReason,
} from '../types/content-load.js';
import type { PageDriver } from '../types/page-driver.js';
import { discoverScrollTarget, scrollToBottomScript, type ScrollTargetStrategy } from './scroll-target.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, sleep } from '../utils/timeouts.js';

const log = logger.contentLoader;

export const DEFAULT_LOADER_OPTIONS: LoaderOptions = {
  stabilityThreshold: 6,
  maxCycles: 200,
  settleMs: TIMEOUTS.SCROLL_SETTLE,
};

export interface LoadHooks {
  /** Called after every scroll cycle with the current state */
  onCycle?: (state: Readonly<ContentLoadState>) => void;
}

async function targetMet(target: LoadTarget, visibleCount: number): Promise<StopReason | null> {
  switch (target.kind) {
    case 'exact_count':
      return visibleCount >= target.count ? 'target_reached' : null;
    case 'find_id':
      return (await target.predicate()) ? 'found' : null;
    case 'exhaustive':
      return null;
  }
}

function describeTarget(target: LoadTarget): string {
  switch (target.kind) {
    case 'exact_count':
      return `count=${target.count}`;
    case 'find_id':
      return `id=${target.id}`;
    case 'exhaustive':
      return 'exhaustive';
  }
}

/**
 * Scroll `source` until the target is met or the content converges.
 */
export async function loadUntilConverged(
  source: ContentSource,
  target: LoadTarget,
  options: Partial<LoaderOptions> = {},
  hooks: LoadHooks = {}
): Promise<LoadResult> {
  const { stabilityThreshold, maxCycles, settleMs } = { ...DEFAULT_LOADER_OPTIONS, ...options };
  const startTime = Date.now();
  const state: ContentLoadState = {
    visibleCount: await source.countVisible(),
    streak: 0,
    cycles: 0,
    target,
  };

  const finish = (stopReason: StopReason): LoadResult => {
    state.stopReason = stopReason;
    log.timed('Content load finished', startTime, {
      target: describeTarget(target),
      stopReason,
      visibleCount: state.visibleCount,
      cycles: state.cycles,
    });
    const result: LoadResult = { visibleCount: state.visibleCount, cycles: state.cycles, stopReason };
    if (stopReason === 'max_cycles_exceeded') {
      result.diagnostic = {
        code: 'LOADER_EXCEEDED',
        message: `Content did not converge within ${maxCycles} scroll cycles; ${state.visibleCount} items visible`,
      };
    }
    return result;
  };

  const initial = await targetMet(target, state.visibleCount);
  if (initial) return finish(initial);

  for (;;) {
    if (state.cycles >= maxCycles) {
      log.warn('Content loader hit its cycle budget', { maxCycles, visibleCount: state.visibleCount });
      return finish('max_cycles_exceeded');
    }

    await source.scrollStep();
    await sleep(settleMs);
    const visible = await source.countVisible();

    state.streak = visible > state.visibleCount ? 0 : state.streak + 1;
    state.visibleCount = visible;
    state.cycles += 1;
    hooks.onCycle?.(state);

    const met = await targetMet(target, state.visibleCount);
    if (met) return finish(met);

    if (state.streak >= stabilityThreshold) {
      return finish('exhausted');
    }
  }
}

// ============================================
// PAGE-BACKED SOURCE
// ============================================

export interface PageSourceOptions {
  /** Selector matching one rendered list item */
  itemSelector: string;
  scrollStrategies?: readonly ScrollTargetStrategy[];
}

/**
 * ContentSource over a live page: counts `itemSelector` matches and scrolls
 * the discovered container to its bottom edge.
 */
export async function createPageContentSource(
  driver: PageDriver,
  options: PageSourceOptions
): Promise<ContentSource> {
  const target = await discoverScrollTarget(driver, options.scrollStrategies);
  const script = scrollToBottomScript(target);
  return {
    countVisible: async () => (await driver.findAll(options.itemSelector)).length,
    scrollStep: async () => {
      await driver.executeScript(script);
    },
  };
}
