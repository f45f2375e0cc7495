/**
 * Convergence Loader Types
 */

/**
 * Minimal capability the loader needs: count what is rendered, render more
 */
export interface ContentSource {
  countVisible(): Promise<number>;
  scrollStep(): Promise<void>;
}

export type LoadTarget =
  | { kind: 'exact_count'; count: number }
  | {
      kind: 'find_id';
      /** Label for logs and results */
      id: string;
      predicate: () => Promise<boolean>;
    }
  | { kind: 'exhaustive' };

export type StopReason = 'target_reached' | 'found' | 'exhausted' | 'max_cycles_exceeded';

export interface LoaderOptions {
  /** Consecutive no-growth cycles that count as exhaustion */
  stabilityThreshold: number;
  maxCycles: number;
  /** Wait after each scroll before counting */
  settleMs: number;
}

/**
 * Mutable loop state, exposed for progress callbacks
 */
export interface ContentLoadState {
  visibleCount: number;
  streak: number;
  cycles: number;
  target: LoadTarget;
  stopReason?: StopReason;
}

export interface LoadResult {
  visibleCount: number;
  cycles: number;
  stopReason: StopReason;
  /** Set only for max_cycles_exceeded: best-effort data, not an error */
  diagnostic?: {
    code: 'LOADER_EXCEEDED';
    message: string;
  };
}
