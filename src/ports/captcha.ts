import type { Challenge, SolvedToken } from '../domain/models.js';
import type { Deadline } from '../core/deadline.js';

export interface CaptchaPort {
  /**
   * Solves one challenge within the run deadline. A challenge may be passed
   * here once only; a new attempt needs a fresh challenge from the site.
   */
  solve(challenge: Challenge, deadline: Deadline): Promise<SolvedToken>;
  /** Tells the service the site refused a token it issued, within what is left of the run. */
  reportRejected(token: SolvedToken, deadline: Deadline): Promise<void>;
}
