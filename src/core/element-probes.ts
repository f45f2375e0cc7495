/**
 * Element Probe Strategies
 *
 * Portal markup shifts between releases, so every element the engine needs is
 * located through an ordered list of probes instead of one hard-coded
 * selector. Each probe returns an ElementRef or null; the first non-null
 * result wins. New UI variants are supported by appending probes, without
 * touching the code that consumes them.
 */

import type { ElementRef, PageDriver } from '../types/page-driver.js';

/**
 * One way of locating an element
 */
export interface ElementProbe {
  /** Short label recorded in logs and results */
  name: string;
  locate(driver: PageDriver): Promise<ElementRef | null>;
}

/**
 * Successful probe outcome
 */
export interface ProbeHit {
  ref: ElementRef;
  probe: string;
}

/**
 * Probe that resolves a selector
 */
export function selectorProbe(selector: string, name: string = selector): ElementProbe {
  return {
    name,
    locate: (driver) => driver.find(selector),
  };
}

/**
 * Probe that resolves the first match of several selectors, in order
 */
export function anyOfProbe(name: string, selectors: string[]): ElementProbe {
  return {
    name,
    async locate(driver) {
      for (const selector of selectors) {
        const ref = await driver.find(selector);
        if (ref) return ref;
      }
      return null;
    },
  };
}

/**
 * Run probes in order and return the first hit, or null when none match.
 * A probe that throws propagates: absence is null, not an exception.
 */
export async function probeFirst(driver: PageDriver, probes: readonly ElementProbe[]): Promise<ProbeHit | null> {
  for (const probe of probes) {
    const ref = await probe.locate(driver);
    if (ref) {
      return { ref, probe: probe.name };
    }
  }
  return null;
}

/**
 * Like probeFirst, but absence is an error (used where an element is mandatory)
 */
export async function requireElement(
  driver: PageDriver,
  probes: readonly ElementProbe[],
  description: string
): Promise<ElementRef> {
  const hit = await probeFirst(driver, probes);
  if (!hit) {
    throw new Error(`Element not found: ${description} (tried ${probes.map(p => p.name).join(', ')})`);
  }
  return hit.ref;
}

// ============================================
// SELECTOR HELPERS
// ============================================

/**
 * Quote a string for use inside an XPath expression
 */
export function xpathLiteral(value: string): string {
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"')) return `"${value}"`;
  const parts = value.split("'").map(part => `'${part}'`);
  return `concat(${parts.join(`, "'", `)})`;
}

/**
 * Selector for an element of `tag` whose text contains `text`
 */
export function textSelector(tag: string, text: string): string {
  return `xpath=//${tag}[contains(normalize-space(.), ${xpathLiteral(text)})]`;
}
