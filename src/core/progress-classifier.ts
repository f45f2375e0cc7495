/**
 * Progress Classifier
 *
 * Infers whether an entity is past a reference milestone from an ordered row
 * of visual markers plus date evidence. Rules are checked in precedence order
 * and the first match wins:
 *
 * 1. reference_date     - the reference milestone itself carries a date
 * 2. class_progression  - some marker at or after the reference is reached
 * 3. date_fallback      - a later (corroborating) milestone carries a date
 * 4. class_progression  - none of the above: before
 *
 * A reference that cannot be located yields `reference_not_found`, never a
 * silent "before". Pure: no I/O.
 */

import type {
  ClassifyEvidence,
  ClassifyInput,
  ClassifyResult,
  CorroboratingMarker,
  ProgressMarker,
} from '../types/progress.js';
import { logger } from '../utils/logger.js';

const log = logger.classifier;

/**
 * Highest index of a reached marker, or -1 when none is reached
 */
export function maxReachedIndex(markers: readonly ProgressMarker[]): number {
  return markers.reduce(
    (max, marker) => (marker.visualState === 'reached' && marker.index > max ? marker.index : max),
    -1
  );
}

export function classifyProgress(input: ClassifyInput): ClassifyResult {
  const maxReached = maxReachedIndex(input.markers);
  const datedCorroborating = input.corroborating.filter(m => m.hasDate).map(m => m.name);
  const evidence: ClassifyEvidence = {
    markerCount: input.markers.length,
    maxReached,
    referenceIndex: input.referenceIndex,
    referenceHasDate: input.referenceHasDate,
    datedCorroborating,
  };
  const { referenceName } = input;

  let result: ClassifyResult;
  if (input.referenceIndex === null) {
    result = { status: 'reference_not_found', referenceName, evidence };
  } else if (input.referenceHasDate) {
    result = { status: 'after', method: 'reference_date', referenceName, evidence };
  } else if (maxReached >= input.referenceIndex) {
    result = { status: 'after', method: 'class_progression', referenceName, evidence };
  } else if (datedCorroborating.length > 0) {
    result = { status: 'after', method: 'date_fallback', referenceName, evidence };
  } else {
    result = { status: 'before', method: 'class_progression', referenceName, evidence };
  }

  log.debug('Progress classified', {
    referenceName,
    status: result.status,
    method: 'method' in result ? result.method : undefined,
    maxReached,
    referenceIndex: input.referenceIndex,
  });
  return result;
}

// ============================================
// NAME-BASED LOOKUP
// ============================================

function normalize(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * First marker whose name contains `name`, case-insensitively
 */
export function findMarker(markers: readonly ProgressMarker[], name: string): ProgressMarker | undefined {
  const wanted = normalize(name);
  return markers.find(m => m.name !== undefined && normalize(m.name).includes(wanted));
}

/**
 * Locate the reference and corroborating milestones by name, then classify.
 * Corroborating names missing from the row count as undated.
 */
export function classifyMilestone(
  markers: readonly ProgressMarker[],
  referenceName: string,
  corroboratingNames: readonly string[] = []
): ClassifyResult {
  const reference = findMarker(markers, referenceName);
  const corroborating: CorroboratingMarker[] = corroboratingNames.map(name => ({
    name,
    hasDate: Boolean(findMarker(markers, name)?.date),
  }));

  return classifyProgress({
    markers: [...markers],
    referenceName,
    referenceIndex: reference ? reference.index : null,
    referenceHasDate: Boolean(reference?.date),
    corroborating,
  });
}
