import { NAV_STATES, type NavStateValue } from '../constants.js';
import { InvalidTransitionError } from '../utils/error-handler.js';

const {
  INIT,
  SEARCH_SUBMITTED,
  CHALLENGE_PRESENTED,
  CHALLENGE_SOLVED,
  RESULTS_LOADED,
  PARSED,
  NOT_FOUND,
  RATE_LIMITED,
  SITE_CHANGED,
  CAPTCHA_FAILED,
  PARSE_ERROR,
  TIMED_OUT
} = NAV_STATES;

export const TRANSITIONS: Readonly<Record<NavStateValue, readonly NavStateValue[]>> = {
  [INIT]: [SEARCH_SUBMITTED, RATE_LIMITED, SITE_CHANGED, TIMED_OUT],
  [SEARCH_SUBMITTED]: [CHALLENGE_PRESENTED, RESULTS_LOADED, NOT_FOUND, RATE_LIMITED, SITE_CHANGED, TIMED_OUT],
  [CHALLENGE_PRESENTED]: [CHALLENGE_SOLVED, SEARCH_SUBMITTED, CAPTCHA_FAILED, RATE_LIMITED, SITE_CHANGED, TIMED_OUT],
  [CHALLENGE_SOLVED]: [RESULTS_LOADED, CHALLENGE_PRESENTED, CAPTCHA_FAILED, RATE_LIMITED, SITE_CHANGED, TIMED_OUT],
  [RESULTS_LOADED]: [PARSED, NOT_FOUND, RATE_LIMITED, SITE_CHANGED, PARSE_ERROR, TIMED_OUT],
  [PARSED]: [],
  [NOT_FOUND]: [],
  [RATE_LIMITED]: [],
  [SITE_CHANGED]: [],
  [CAPTCHA_FAILED]: [],
  [PARSE_ERROR]: [],
  [TIMED_OUT]: []
};

export function isTerminal(state: NavStateValue): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: NavStateValue, to: NavStateValue): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: NavStateValue, to: NavStateValue): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(`Illegal navigation transition ${from} -> ${to}`, { from, to });
  }
}
