/**
 * Existing Appointments Listing
 *
 * The "my appointments" page is another virtualized list. It is loaded until
 * `targetCount` rows render, or until it stops growing when no count is given.
 */

import type { LoadResult, LoadTarget, LoaderOptions } from '../types/content-load.js';
import type { PageDriver } from '../types/page-driver.js';
import { createPageContentSource, loadUntilConverged } from '../core/content-loader.js';
import type { ScrollTargetStrategy } from '../core/scroll-target.js';
import { readAllText } from './ui-actions.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, sleep } from '../utils/timeouts.js';

const log = logger.create('AppointmentList');

export const DEFAULT_APPOINTMENT_ROW = 'mat-row, tr.mat-row';

export interface AppointmentListOptions {
  appointmentListUrl: string;
  row?: string;
  loader?: Partial<LoaderOptions>;
  scrollStrategies?: readonly ScrollTargetStrategy[];
  bootSettleMs?: number;
}

export interface AppointmentListRequest {
  /** Stop once this many rows render; load everything when omitted */
  targetCount?: number;
}

export interface AppointmentListResult {
  /** Text of each rendered row, one line per cell */
  appointments: string[];
  count: number;
  load: LoadResult;
}

export async function listAppointments(
  driver: PageDriver,
  request: AppointmentListRequest,
  options: AppointmentListOptions
): Promise<AppointmentListResult> {
  const row = options.row ?? DEFAULT_APPOINTMENT_ROW;
  await driver.navigate(options.appointmentListUrl);
  await sleep(options.bootSettleMs ?? TIMEOUTS.APP_BOOT);

  const target: LoadTarget =
    request.targetCount === undefined ? { kind: 'exhaustive' } : { kind: 'exact_count', count: request.targetCount };
  const source = await createPageContentSource(driver, { itemSelector: row, scrollStrategies: options.scrollStrategies });
  const load = await loadUntilConverged(source, target, options.loader);

  const rows = await readAllText(driver, row);
  const appointments = request.targetCount === undefined ? rows : rows.slice(0, request.targetCount);
  log.info('Appointments listed', { count: appointments.length, stopReason: load.stopReason, cycles: load.cycles });
  return { appointments, count: appointments.length, load };
}
