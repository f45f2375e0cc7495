/**
 * Container List Workflows
 *
 * The containers page renders a virtualized list, so every lookup goes
 * through the convergence loader: scroll until the wanted row renders, the
 * expected count is reached or the list stops growing.
 */

import type { LoadResult, LoadTarget, LoaderOptions } from '../types/content-load.js';
import type { PageDriver } from '../types/page-driver.js';
import type { ClassifyResult } from '../types/progress.js';
import { createPageContentSource, loadUntilConverged } from '../core/content-loader.js';
import { classifyMilestone } from '../core/progress-classifier.js';
import { readTimeline, type TimelineSelectors } from '../core/timeline-reader.js';
import type { ScrollTargetStrategy } from '../core/scroll-target.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, sleep } from '../utils/timeouts.js';

const log = logger.create('ContainerWorkflows');

export interface ContainerPageSelectors {
  /** Every rendered container row */
  row: string;
  /** The rendered row mentioning `containerId`; derived from `row` when omitted */
  rowWithText?: (containerId: string) => string;
  /** Expanded row body holding the container's details */
  details: string;
  timeline: TimelineSelectors;
}

export const DEFAULT_CONTAINER_SELECTORS: ContainerPageSelectors = {
  row: 'mat-row, tr.mat-row',
  details: '.container-details, .mat-expansion-panel-body',
  timeline: {
    item: '.timeline-item, .mat-step-header',
    name: '.timeline-title, .mat-step-label',
    state: '.timeline-icon, .mat-step-icon',
  },
};

/** Milestone whose passage the status lookup reports */
export const PREGATE_MILESTONE = 'Pregate';

/** Milestones that only happen after Pregate */
export const AFTER_PREGATE_MILESTONES: readonly string[] = ['Ready for pick up', 'Gate out', 'Departed Terminal'];

export interface ContainerWorkflowOptions {
  containersUrl: string;
  selectors?: ContainerPageSelectors;
  loader?: Partial<LoaderOptions>;
  scrollStrategies?: readonly ScrollTargetStrategy[];
  /** Wait after loading the containers page */
  bootSettleMs?: number;
  uiSettleMs?: number;
}

export interface FindContainerResult {
  containerId: string;
  found: boolean;
  load: LoadResult;
}

export interface BookingNumberResult {
  containerId: string;
  found: boolean;
  /** Null when the row shows no booking number */
  bookingNumber: string | null;
  load: LoadResult;
}

export interface ContainerMilestoneResult {
  containerId: string;
  /** Null when the container row never rendered */
  classification: ClassifyResult | null;
  load: LoadResult;
}

/**
 * Selector for the row mentioning `containerId`
 */
export function containerRowSelector(containerId: string, selectors: ContainerPageSelectors): string {
  if (selectors.rowWithText) return selectors.rowWithText(containerId);
  return `:is(${selectors.row}):has-text(${JSON.stringify(containerId)})`;
}

async function openContainersPage(driver: PageDriver, options: ContainerWorkflowOptions): Promise<void> {
  await driver.navigate(options.containersUrl);
  await sleep(options.bootSettleMs ?? TIMEOUTS.APP_BOOT);
}

async function expandRow(driver: PageDriver, containerId: string, options: ContainerWorkflowOptions): Promise<void> {
  const selectors = options.selectors ?? DEFAULT_CONTAINER_SELECTORS;
  const row = await driver.find(containerRowSelector(containerId, selectors));
  if (row) {
    await driver.click(row);
    await sleep(options.uiSettleMs ?? TIMEOUTS.UI_SETTLE);
  }
}

async function loadRows(driver: PageDriver, target: LoadTarget, options: ContainerWorkflowOptions): Promise<LoadResult> {
  const selectors = options.selectors ?? DEFAULT_CONTAINER_SELECTORS;
  const source = await createPageContentSource(driver, {
    itemSelector: selectors.row,
    scrollStrategies: options.scrollStrategies,
  });
  return loadUntilConverged(source, target, options.loader);
}

/**
 * Scroll the container list until `containerId` renders or the list is exhausted
 */
export async function findContainer(
  driver: PageDriver,
  containerId: string,
  options: ContainerWorkflowOptions
): Promise<FindContainerResult> {
  const selectors = options.selectors ?? DEFAULT_CONTAINER_SELECTORS;
  const rowSelector = containerRowSelector(containerId, selectors);
  await openContainersPage(driver, options);

  const load = await loadRows(
    driver,
    { kind: 'find_id', id: containerId, predicate: async () => (await driver.find(rowSelector)) !== null },
    options
  );
  const found = load.stopReason === 'found';
  log.info('Container lookup finished', { containerId, found, stopReason: load.stopReason, cycles: load.cycles });
  return { containerId, found, load };
}

/**
 * Load the whole list (or up to `expected` rows) and report how many rendered
 */
export async function countContainers(
  driver: PageDriver,
  options: ContainerWorkflowOptions,
  expected?: number
): Promise<LoadResult> {
  await openContainersPage(driver, options);
  const target: LoadTarget = expected === undefined ? { kind: 'exhaustive' } : { kind: 'exact_count', count: expected };
  return loadRows(driver, target, options);
}

/**
 * Find the container, expand its row and classify it against Pregate
 */
export async function containerMilestoneStatus(
  driver: PageDriver,
  containerId: string,
  options: ContainerWorkflowOptions
): Promise<ContainerMilestoneResult> {
  const selectors = options.selectors ?? DEFAULT_CONTAINER_SELECTORS;
  const lookup = await findContainer(driver, containerId, options);
  if (!lookup.found) {
    return { containerId, classification: null, load: lookup.load };
  }

  await expandRow(driver, containerId, options);
  const markers = await readTimeline(driver, selectors.timeline);
  const classification = classifyMilestone(markers, PREGATE_MILESTONE, AFTER_PREGATE_MILESTONES);
  return { containerId, classification, load: lookup.load };
}

// ============================================
// BOOKING NUMBER
// ============================================

const BOOKING_LABEL = /booking\s*(?:#|no\.?|number)/i;

/** 8-12 uppercase letters and digits with at least one digit, so status words never match */
const BOOKING_TOKEN = /\b(?=[A-Z]*\d)[A-Z0-9]{8,12}\b/;

/** Lines after the label searched for the number (a status line may sit in between) */
const BOOKING_LOOKAHEAD_LINES = 5;

/**
 * Pull the booking number out of an export container's detail text.
 * Only text after a "Booking #" label counts.
 */
export function extractBookingNumber(text: string): string | null {
  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const label = BOOKING_LABEL.exec(line);
    if (!label) continue;

    const sameLine = line.slice(label.index + label[0].length);
    const candidates = [sameLine, ...lines.slice(i + 1, i + 1 + BOOKING_LOOKAHEAD_LINES)];
    for (const candidate of candidates) {
      const match = BOOKING_TOKEN.exec(candidate);
      if (match) return match[0];
    }
  }
  return null;
}

/**
 * Find an export container, expand its row and read its booking number
 */
export async function bookingNumberLookup(
  driver: PageDriver,
  containerId: string,
  options: ContainerWorkflowOptions
): Promise<BookingNumberResult> {
  const selectors = options.selectors ?? DEFAULT_CONTAINER_SELECTORS;
  const lookup = await findContainer(driver, containerId, options);
  if (!lookup.found) {
    return { containerId, found: false, bookingNumber: null, load: lookup.load };
  }

  await expandRow(driver, containerId, options);
  const holder =
    (await driver.find(selectors.details)) ?? (await driver.find(containerRowSelector(containerId, selectors)));
  const text = holder ? await driver.readText(holder) : '';
  const bookingNumber = extractBookingNumber(text);
  log.info('Booking number lookup finished', { containerId, found: bookingNumber !== null });
  return { containerId, found: true, bookingNumber, load: lookup.load };
}
