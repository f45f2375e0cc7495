/**
 * Progress Marker Types
 *
 * A progress indicator is an ordered row of milestone markers (a timeline,
 * a stepper). Each marker is visually "reached" or not and may carry the date
 * the milestone happened.
 */

export type VisualState = 'reached' | 'neutral' | 'unknown';

export interface ProgressMarker {
  /** Position along the milestone sequence, 0-based */
  index: number;
  visualState: VisualState;
  /** Milestone label as rendered */
  name?: string;
  /** Raw date text found on the marker, if any */
  date?: string;
}

/**
 * A milestone known to occur strictly after the reference in domain order
 */
export interface CorroboratingMarker {
  name: string;
  hasDate: boolean;
}

export interface ClassifyInput {
  markers: ProgressMarker[];
  referenceName: string;
  /** null when the reference milestone could not be located */
  referenceIndex: number | null;
  referenceHasDate: boolean;
  corroborating: CorroboratingMarker[];
}

export type ProgressStatus = 'after' | 'before';

/**
 * Which precedence rule produced the status
 */
export type ClassifyMethod = 'reference_date' | 'class_progression' | 'date_fallback';

export interface ClassifyEvidence {
  markerCount: number;
  maxReached: number;
  referenceIndex: number | null;
  referenceHasDate: boolean;
  datedCorroborating: string[];
}

export type ClassifyResult =
  | {
      status: ProgressStatus;
      method: ClassifyMethod;
      referenceName: string;
      evidence: ClassifyEvidence;
    }
  | {
      status: 'reference_not_found';
      referenceName: string;
      evidence: ClassifyEvidence;
    };
