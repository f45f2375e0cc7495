/**
 * Step Indicator Probe
 *
 * Reads the 1-based ordinal of the active step from a Material stepper,
 * independently of whatever action just ran. Returns null when the indicator
 * is missing or its value cannot be parsed.
 */

import type { OrdinalProbe } from '../types/workflow.js';
import { probeFirst, selectorProbe, type ElementProbe } from './element-probes.js';

export const STEP_HEADER_PROBES: readonly ElementProbe[] = [
  selectorProbe('mat-step-header:has(.mat-step-icon-selected)', 'selected_icon'),
  selectorProbe('mat-step-header[aria-selected="true"]', 'aria_selected'),
];

/** Attributes carrying the step position, in preference order */
const ORDINAL_ATTRIBUTES = ['aria-posinset', 'data-step', 'aria-label'] as const;

export function parseOrdinal(value: string | null): number | null {
  if (value === null) return null;
  const match = /\d+/.exec(value);
  if (!match) return null;
  const ordinal = Number.parseInt(match[0], 10);
  return ordinal > 0 ? ordinal : null;
}

/**
 * Build an OrdinalProbe over the given header probes
 */
export function stepIndicatorProbe(probes: readonly ElementProbe[] = STEP_HEADER_PROBES): OrdinalProbe {
  return async (driver) => {
    const hit = await probeFirst(driver, probes);
    if (!hit) return null;
    for (const attribute of ORDINAL_ATTRIBUTES) {
      const ordinal = parseOrdinal(await driver.getAttribute(hit.ref, attribute));
      if (ordinal !== null) return ordinal;
    }
    return null;
  };
}

export const readStepOrdinal: OrdinalProbe = stepIndicatorProbe();
