import { describe, it, expect } from 'vitest';
import {
  initialTransitionState,
  isTerminal,
  nextTransitionState,
  type TransitionConfig,
  type TransitionState,
} from '../../src/core/transition-machine.js';

const config: TransitionConfig = { phase: 2, maxRetries: 2, unreadableSignalPolicy: 'assume_advanced' };

function verifying(attempt: number): TransitionState {
  return { kind: 'verifying', attempt };
}

describe('transition machine', () => {
  it('should start attempting at attempt 1', () => {
    expect(initialTransitionState()).toEqual({ kind: 'attempting', attempt: 1 });
  });

  it('should move to verifying once the transition fires', () => {
    expect(nextTransitionState(config, initialTransitionState(), { type: 'transition_fired' })).toEqual(verifying(1));
  });

  describe('signal_read', () => {
    it('should advance when the indicator shows the next phase', () => {
      const state = nextTransitionState(config, verifying(1), { type: 'signal_read', observed: 3, baseline: 2 });

      expect(state).toEqual({ kind: 'advanced', attempts: 1, observed: 3 });
    });

    it('should retry when the indicator is unchanged', () => {
      const state = nextTransitionState(config, verifying(1), { type: 'signal_read', observed: 2, baseline: 2 });

      expect(state).toEqual({ kind: 'retry_fill', attempt: 2 });
    });

    it('should be stuck once retries are spent', () => {
      const state = nextTransitionState(config, verifying(3), { type: 'signal_read', observed: 2, baseline: 2 });

      expect(state).toEqual({ kind: 'stuck', attempts: 3 });
    });

    it('should compare against the baseline read before firing', () => {
      const state = nextTransitionState(config, verifying(1), { type: 'signal_read', observed: 1, baseline: 1 });

      expect(state).toEqual({ kind: 'retry_fill', attempt: 2 });
    });

    it('should report any other ordinal as ambiguous', () => {
      const state = nextTransitionState(config, verifying(1), { type: 'signal_read', observed: 5, baseline: 2 });

      expect(state).toEqual({ kind: 'ambiguous', attempts: 1, observed: 5 });
    });

    it('should assume an advance when the indicator is unreadable by default', () => {
      const state = nextTransitionState(config, verifying(1), { type: 'signal_read', observed: null, baseline: 2 });

      expect(state).toEqual({ kind: 'unverified', attempts: 1 });
    });

    it('should report an unreadable indicator as ambiguous under the strict policy', () => {
      const strict: TransitionConfig = { ...config, unreadableSignalPolicy: 'ambiguous' };

      const state = nextTransitionState(strict, verifying(1), { type: 'signal_read', observed: null, baseline: 2 });

      expect(state).toEqual({ kind: 'ambiguous', attempts: 1, observed: null });
    });
  });

  it('should go back to attempting after a refill, keeping the attempt number', () => {
    expect(nextTransitionState(config, { kind: 'retry_fill', attempt: 2 }, { type: 'refilled' })).toEqual({
      kind: 'attempting',
      attempt: 2,
    });
  });

  it('should run exactly maxRetries + 1 attempts against a page that never moves', () => {
    let state = initialTransitionState();
    let fired = 0;
    while (!isTerminal(state)) {
      if (state.kind === 'attempting') {
        fired += 1;
        state = nextTransitionState(config, state, { type: 'transition_fired' });
      } else if (state.kind === 'verifying') {
        state = nextTransitionState(config, state, { type: 'signal_read', observed: 2, baseline: 2 });
      } else {
        state = nextTransitionState(config, state, { type: 'refilled' });
      }
    }

    expect(fired).toBe(3);
    expect(state).toEqual({ kind: 'stuck', attempts: 3 });
  });

  it('should reject events that do not apply to the current state', () => {
    expect(() => nextTransitionState(config, initialTransitionState(), { type: 'refilled' })).toThrow(
      "Invalid transition event 'refilled' in state 'attempting'"
    );
    expect(() => nextTransitionState(config, { kind: 'stuck', attempts: 3 }, { type: 'transition_fired' })).toThrow(
      "Invalid transition event 'transition_fired' in state 'stuck'"
    );
  });
});
