/**
 * Timeline Reader
 *
 * Extracts progress markers from a rendered milestone timeline in a single
 * script round-trip. The script output is untrusted page data and is
 * validated with zod before use.
 */

import { z } from 'zod';
import type { PageDriver } from '../types/page-driver.js';
import type { ProgressMarker, VisualState } from '../types/progress.js';

const rawMarkerSchema = z.object({
  /** Class names of the marker and of its state element, space-joined */
  classes: z.string(),
  text: z.string(),
  name: z.string().nullable(),
});

const rawTimelineSchema = z.array(rawMarkerSchema);

export type RawMarker = z.infer<typeof rawMarkerSchema>;

export interface TimelineSelectors {
  /** One match per milestone, in timeline order */
  item: string;
  /** Label element inside an item; the first text line is used when absent */
  name?: string;
  /** Element inside an item whose classes also carry the state (a step icon) */
  state?: string;
}

/**
 * Class-name words that mark a milestone visually. A class matches when one
 * of its `-`/`_` separated words equals a listed word, so `step-completed`
 * matches `completed` while `incomplete` does not match `complete`.
 */
export interface VisualStateRules {
  reached: readonly string[];
  neutral: readonly string[];
}

export const DEFAULT_VISUAL_RULES: VisualStateRules = {
  reached: ['completed', 'complete', 'done', 'reached', 'active', 'success', 'passed'],
  neutral: ['pending', 'inactive', 'incomplete', 'disabled', 'upcoming', 'future', 'grey', 'gray'],
};

/** Words that negate the state word after them: not-completed, no-done */
const NEGATIONS = new Set(['not', 'no', 'non']);

/** Dates as the portal renders them: 03/14/2025, optionally with a time */
const DATE_PATTERN = /\b\d{1,2}\/\d{1,2}\/\d{2,4}(?:\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*[AP]M)?)?/i;

/** Placeholder the portal shows for milestones without a date */
const NO_DATE = /^n\/?a$/i;

export function timelineScript(selectors: TimelineSelectors): string {
  const item = JSON.stringify(selectors.item);
  const name = JSON.stringify(selectors.name ?? null);
  const state = JSON.stringify(selectors.state ?? null);
  return `(() => {
  const nameSelector = ${name};
  const stateSelector = ${state};
  return Array.from(document.querySelectorAll(${item})).map((el) => {
    const stateEl = stateSelector ? el.querySelector(stateSelector) : null;
    const classes = [el.getAttribute('class') || '', stateEl ? stateEl.getAttribute('class') || '' : '']
      .join(' ')
      .trim();
    const label = nameSelector ? el.querySelector(nameSelector) : null;
    return {
      classes,
      text: el.innerText || el.textContent || '',
      name: label ? (label.textContent || '').trim() : null,
    };
  });
})()`;
}

type ClassVerdict = 'reached' | 'neutral' | null;

function classVerdict(className: string, rules: VisualStateRules): ClassVerdict {
  const words = className.split(/[-_]+/).filter(Boolean);
  for (let i = 0; i < words.length; i++) {
    const word = words[i] ?? '';
    const negated = i > 0 && NEGATIONS.has(words[i - 1] ?? '');
    if (rules.reached.includes(word)) return negated ? 'neutral' : 'reached';
    if (rules.neutral.includes(word) && !negated) return 'neutral';
  }
  return null;
}

/**
 * Visual state from a marker's class list. Reached wins over neutral so a
 * grey label on a completed marker does not hide its progress.
 */
export function visualStateOf(classes: string, rules: VisualStateRules = DEFAULT_VISUAL_RULES): VisualState {
  const verdicts = classes
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map(className => classVerdict(className, rules));

  if (verdicts.includes('reached')) return 'reached';
  if (verdicts.includes('neutral')) return 'neutral';
  return 'unknown';
}

export function extractDate(text: string): string | undefined {
  const match = DATE_PATTERN.exec(text);
  return match ? match[0] : undefined;
}

function firstLabelLine(text: string): string | undefined {
  return text
    .split('\n')
    .map(line => line.trim())
    .find(line => line.length > 0 && !DATE_PATTERN.test(line) && !NO_DATE.test(line));
}

/**
 * Turn validated script output into ordered markers
 */
export function toMarkers(raw: readonly RawMarker[], rules: VisualStateRules = DEFAULT_VISUAL_RULES): ProgressMarker[] {
  return raw.map((entry, index) => {
    const marker: ProgressMarker = {
      index,
      visualState: visualStateOf(entry.classes, rules),
    };
    const name = entry.name ?? firstLabelLine(entry.text);
    if (name) marker.name = name;
    const date = extractDate(entry.text);
    if (date) marker.date = date;
    return marker;
  });
}

/**
 * Read the timeline currently rendered on the page
 */
export async function readTimeline(
  driver: PageDriver,
  selectors: TimelineSelectors,
  rules: VisualStateRules = DEFAULT_VISUAL_RULES
): Promise<ProgressMarker[]> {
  const output = await driver.executeScript(timelineScript(selectors));
  const parsed = rawTimelineSchema.safeParse(output);
  if (!parsed.success) {
    throw new Error(`Timeline script returned unexpected data: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }
  return toMarkers(parsed.data, rules);
}
