/**
 * Phase Transition State Machine
 *
 * Pure reducer for one verified transition with bounded retries:
 *
 *   attempting --transition_fired--> verifying
 *   verifying  --signal_read-->      advanced | unverified | ambiguous
 *                                    | retry_fill | stuck
 *   retry_fill --refilled-->         attempting
 *
 * The engine performs the side effects (fire, read, refill) and feeds the
 * observations back in as events.
 */

import type { UnreadableSignalPolicy } from '../types/workflow.js';

export interface TransitionConfig {
  /** Phase the transition starts from */
  phase: number;
  /** Extra attempts allowed after the first */
  maxRetries: number;
  unreadableSignalPolicy: UnreadableSignalPolicy;
}

export type TransitionState =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'verifying'; attempt: number }
  | { kind: 'retry_fill'; attempt: number }
  | { kind: 'advanced'; attempts: number; observed: number }
  | { kind: 'unverified'; attempts: number }
  | { kind: 'ambiguous'; attempts: number; observed: number | null }
  | { kind: 'stuck'; attempts: number };

export type TransitionEvent =
  | { type: 'transition_fired' }
  | {
      type: 'signal_read';
      /** Ordinal read after the transition; null when unreadable */
      observed: number | null;
      /** Ordinal before the transition; the phase itself when unreadable */
      baseline: number;
    }
  | { type: 'refilled' };

export type TerminalTransitionState = Extract<
  TransitionState,
  { kind: 'advanced' | 'unverified' | 'ambiguous' | 'stuck' }
>;

export function initialTransitionState(): TransitionState {
  return { kind: 'attempting', attempt: 1 };
}

export function isTerminal(state: TransitionState): state is TerminalTransitionState {
  return (
    state.kind === 'advanced' ||
    state.kind === 'unverified' ||
    state.kind === 'ambiguous' ||
    state.kind === 'stuck'
  );
}

function invalid(state: TransitionState, event: TransitionEvent): never {
  throw new Error(`Invalid transition event '${event.type}' in state '${state.kind}'`);
}

export function nextTransitionState(
  config: TransitionConfig,
  state: TransitionState,
  event: TransitionEvent
): TransitionState {
  switch (state.kind) {
    case 'attempting':
      if (event.type !== 'transition_fired') return invalid(state, event);
      return { kind: 'verifying', attempt: state.attempt };

    case 'verifying': {
      if (event.type !== 'signal_read') return invalid(state, event);
      const attempts = state.attempt;
      const { observed } = event;

      if (observed === null) {
        return config.unreadableSignalPolicy === 'assume_advanced'
          ? { kind: 'unverified', attempts }
          : { kind: 'ambiguous', attempts, observed: null };
      }
      if (observed === config.phase + 1) {
        return { kind: 'advanced', attempts, observed };
      }
      if (observed === event.baseline) {
        return attempts <= config.maxRetries
          ? { kind: 'retry_fill', attempt: attempts + 1 }
          : { kind: 'stuck', attempts };
      }
      return { kind: 'ambiguous', attempts, observed };
    }

    case 'retry_fill':
      if (event.type !== 'refilled') return invalid(state, event);
      return { kind: 'attempting', attempt: state.attempt };

    default:
      return invalid(state, event);
  }
}
