import { describe, it, expect } from 'vitest';
import { TRANSITIONS, assertTransition, canTransition, isTerminal } from './transitions.js';
import { NAV_STATES } from '../constants.js';
import { InvalidTransitionError } from '../utils/error-handler.js';

describe('transition table', () => {
  it('should let every non-terminal state time out', () => {
    for (const state of Object.values(NAV_STATES)) {
      if (!isTerminal(state)) {
        expect(canTransition(state, NAV_STATES.TIMED_OUT)).toBe(true);
      }
    }
  });

  it('should treat exits as terminal', () => {
    expect(isTerminal('parsed')).toBe(true);
    expect(isTerminal('captcha_failed')).toBe(true);
    expect(isTerminal('init')).toBe(false);
    expect(TRANSITIONS.timed_out).toEqual([]);
  });

  it('should allow a stale token to send the run back to the challenge', () => {
    expect(() => assertTransition('challenge_solved', 'challenge_presented')).not.toThrow();
  });

  it('should reject edges missing from the table', () => {
    expect(() => assertTransition('init', 'parsed')).toThrow(InvalidTransitionError);
    expect(() => assertTransition('parsed', 'init')).toThrow('Illegal navigation transition parsed -> init');
  });
});
