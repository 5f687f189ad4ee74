import type { BrowserPort, CaptchaPort } from '../ports/index.js';
import type {
  Challenge,
  EntityRecord,
  NavigationResult,
  PageSnapshot,
  RunRequest,
  SolvedToken,
  TransitionEvent
} from '../domain/models.js';
import { CHALLENGE_KINDS, NAV_STATES, PAGE_KINDS, type NavStateValue } from '../constants.js';
import { getConfig, type Config } from '../config.js';
import type { Deadline } from './deadline.js';
import { assertTransition, isTerminal } from './transitions.js';
import { classifyPage, type ChallengeMaterial } from './page-classifier.js';
import { normalize } from './normalizer.js';
import {
  CaptchaServiceUnavailable,
  CaptchaSolveError,
  InvalidTransitionError,
  ParseError,
  SiteChangedError,
  errorMessage,
  isDeadlineError
} from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export interface NavigatorOptions {
  maxSolveAttempts: number;
  maxTokenRejections: number;
  navTimeoutMs: number;
}

export function navigatorOptionsFromConfig(config: Config = getConfig()): NavigatorOptions {
  return {
    maxSolveAttempts: config.maxSolveAttempts,
    maxTokenRejections: config.maxTokenRejections,
    navTimeoutMs: config.navTimeoutMs
  };
}

export type TransitionListener = (event: TransitionEvent) => Promise<void>;

/** Issues challenge ids unique across every navigation of one run. */
export type ChallengeIdSource = () => string;

export function challengeIdSequence(requestId: string): ChallengeIdSource {
  let seq = 0;
  return () => `${requestId}-challenge-${++seq}`;
}

interface Step {
  to: NavStateValue;
  detail?: string;
}

/**
 * Drives one registry lookup from the search form to a terminal state. Every
 * edge is checked against the transition table and reported to the listener
 * before the next step runs.
 */
export class RegistryNavigator {
  private state: NavStateValue = NAV_STATES.INIT;
  private page: PageSnapshot | null = null;
  private challenge: Challenge | null = null;
  private token: SolvedToken | null = null;
  private record: EntityRecord | null = null;
  private reason: string | undefined;
  private retryable = false;
  private searchAttempts = 0;
  private solveAttempts = 0;
  private tokenRejections = 0;

  constructor(
    private readonly request: RunRequest,
    private readonly browser: BrowserPort,
    private readonly solver: CaptchaPort,
    private readonly deadline: Deadline,
    private readonly options: NavigatorOptions = navigatorOptionsFromConfig(),
    private readonly onTransition?: TransitionListener,
    private readonly nextChallengeId: ChallengeIdSource = challengeIdSequence(request.requestId)
  ) {}

  get currentState(): NavStateValue {
    return this.state;
  }

  progress(): { search: number; solve: number } {
    return { search: this.searchAttempts, solve: this.solveAttempts };
  }

  async run(): Promise<NavigationResult> {
    while (!isTerminal(this.state)) {
      const step = await this.nextStep();
      await this.transition(step);
    }

    return {
      state: this.state,
      record: this.record,
      reason: this.reason,
      retryable: this.retryable,
      searchAttempts: this.searchAttempts,
      solveAttempts: this.solveAttempts
    };
  }

  private async nextStep(): Promise<Step> {
    if (this.deadline.expired()) {
      return { to: NAV_STATES.TIMED_OUT, detail: `Run deadline reached in ${this.state}` };
    }

    try {
      return await this.handle(this.state);
    } catch (error) {
      if (isDeadlineError(error) || this.deadline.expired()) {
        return { to: NAV_STATES.TIMED_OUT, detail: errorMessage(error) };
      }
      if (error instanceof SiteChangedError) {
        return { to: NAV_STATES.SITE_CHANGED, detail: error.message };
      }
      throw error;
    }
  }

  private handle(state: NavStateValue): Promise<Step> {
    switch (state) {
      case NAV_STATES.INIT:
        return this.onInit();
      case NAV_STATES.SEARCH_SUBMITTED:
        return this.onSearchSubmitted();
      case NAV_STATES.CHALLENGE_PRESENTED:
        return this.onChallengePresented();
      case NAV_STATES.CHALLENGE_SOLVED:
        return this.onChallengeSolved();
      case NAV_STATES.RESULTS_LOADED:
        return Promise.resolve(this.onResultsLoaded());
      default:
        throw new InvalidTransitionError(`No handler for state ${state}`, { state });
    }
  }

  private async onInit(): Promise<Step> {
    return this.search();
  }

  private async onSearchSubmitted(): Promise<Step> {
    const page = this.requirePage();
    const classification = classifyPage(page);

    switch (classification.kind) {
      case PAGE_KINDS.NOT_FOUND:
        return { to: NAV_STATES.NOT_FOUND, detail: `No entity with file number ${this.request.fileNumber}` };
      case PAGE_KINDS.RATE_LIMITED:
        this.retryable = true;
        return { to: NAV_STATES.RATE_LIMITED, detail: 'Registry throttled the search' };
      case PAGE_KINDS.CHALLENGE:
        this.challenge = await this.buildChallenge(classification.challenge, page);
        return { to: NAV_STATES.CHALLENGE_PRESENTED, detail: this.challenge.kind };
      case PAGE_KINDS.RESULTS:
        return { to: NAV_STATES.RESULTS_LOADED };
      default:
        return { to: NAV_STATES.SITE_CHANGED, detail: 'Search response matches no known page' };
    }
  }

  private async onChallengePresented(): Promise<Step> {
    const challenge = this.challenge;
    if (!challenge) {
      throw new InvalidTransitionError('Entered challenge_presented without a challenge');
    }
    // A challenge is good for one solve; retries need a fresh one from the site
    this.challenge = null;
    this.solveAttempts++;

    try {
      this.token = await this.solver.solve(challenge, this.deadline);
      return { to: NAV_STATES.CHALLENGE_SOLVED, detail: `Solved on attempt ${this.solveAttempts}` };
    } catch (error) {
      if (!(error instanceof CaptchaSolveError || error instanceof CaptchaServiceUnavailable)) {
        throw error;
      }

      logger.warn('Challenge solve failed', {
        attempt: this.solveAttempts,
        maxAttempts: this.options.maxSolveAttempts,
        error: error.message
      }, 'NAVIGATOR');

      if (this.solveAttempts < this.options.maxSolveAttempts) {
        const retry = await this.search();
        return retry.to === NAV_STATES.SEARCH_SUBMITTED
          ? { to: NAV_STATES.SEARCH_SUBMITTED, detail: `Solve attempt ${this.solveAttempts} failed: ${error.message}` }
          : retry;
      }

      this.retryable = error instanceof CaptchaServiceUnavailable;
      return {
        to: NAV_STATES.CAPTCHA_FAILED,
        detail: `Gave up after ${this.solveAttempts} solve attempts: ${error.message}`
      };
    }
  }

  private async onChallengeSolved(): Promise<Step> {
    const token = this.token;
    if (!token) {
      throw new InvalidTransitionError('Entered challenge_solved without a token');
    }
    this.token = null;

    const timeout = this.deadline.callTimeout(this.options.navTimeoutMs, 'solution submit');
    const page = await this.browser.submitSolution(token, timeout);
    this.page = page;

    const classification = classifyPage(page);
    if (classification.kind === PAGE_KINDS.RATE_LIMITED) {
      this.retryable = true;
      return { to: NAV_STATES.RATE_LIMITED, detail: 'Registry throttled the solution submit' };
    }

    if (classification.kind === PAGE_KINDS.CHALLENGE) {
      // Report explicit refusals only; a bare new challenge means the token went stale
      if (classification.rejected) {
        await this.solver.reportRejected(token, this.deadline);
      }
      const mayReenter = this.tokenRejections < this.options.maxTokenRejections
        && this.solveAttempts < this.options.maxSolveAttempts;
      this.tokenRejections++;
      logger.warn(classification.rejected ? 'Registry rejected the solved token' : 'Registry presented a new challenge after submit', {
        jobId: token.jobId,
        rejections: this.tokenRejections
      }, 'NAVIGATOR');

      if (mayReenter) {
        this.challenge = await this.buildChallenge(classification.challenge, page);
        return {
          to: NAV_STATES.CHALLENGE_PRESENTED,
          detail: classification.rejected ? 'Token rejected, solving the new challenge' : 'Token stale, solving the new challenge'
        };
      }
      return { to: NAV_STATES.CAPTCHA_FAILED, detail: `Registry rejected ${this.tokenRejections} solved token(s)` };
    }

    return { to: NAV_STATES.RESULTS_LOADED };
  }

  private onResultsLoaded(): Step {
    const page = this.requirePage();
    const classification = classifyPage(page);

    if (classification.kind === PAGE_KINDS.RATE_LIMITED) {
      this.retryable = true;
      return { to: NAV_STATES.RATE_LIMITED, detail: 'Registry throttled the results page' };
    }
    if (classification.kind === PAGE_KINDS.NOT_FOUND) {
      return { to: NAV_STATES.NOT_FOUND, detail: `No entity with file number ${this.request.fileNumber}` };
    }

    try {
      this.record = normalize(page.html);
      return { to: NAV_STATES.PARSED, detail: this.record.businessName };
    } catch (error) {
      if (error instanceof SiteChangedError) {
        return { to: NAV_STATES.SITE_CHANGED, detail: error.message };
      }
      if (error instanceof ParseError) {
        return { to: NAV_STATES.PARSE_ERROR, detail: error.message };
      }
      throw error;
    }
  }

  /** Loads the form and submits the file number; shared by init and solve retries. */
  private async search(): Promise<Step> {
    const timeout = this.deadline.callTimeout(this.options.navTimeoutMs, 'search');
    this.searchAttempts++;
    const submission = await this.browser.submitSearch(this.request.fileNumber, timeout);
    this.page = submission.page;

    if (submission.formFound) {
      return { to: NAV_STATES.SEARCH_SUBMITTED, detail: `Search attempt ${this.searchAttempts}` };
    }
    if (classifyPage(submission.page).kind === PAGE_KINDS.RATE_LIMITED) {
      this.retryable = true;
      return { to: NAV_STATES.RATE_LIMITED, detail: 'Registry throttled the search form' };
    }
    return { to: NAV_STATES.SITE_CHANGED, detail: 'Search form not found' };
  }

  private async buildChallenge(material: ChallengeMaterial, page: PageSnapshot): Promise<Challenge> {
    let imageBase64 = material.imageBase64;
    if (material.kind === CHALLENGE_KINDS.IMAGE && !imageBase64) {
      const timeout = this.deadline.callTimeout(this.options.navTimeoutMs, 'challenge image capture');
      imageBase64 = (await this.browser.captureChallengeImage(timeout)) ?? undefined;
    }

    return {
      id: this.nextChallengeId(),
      kind: material.kind,
      siteKey: material.siteKey,
      imageBase64,
      pageUrl: page.url,
      discoveredAt: new Date().toISOString()
    };
  }

  private requirePage(): PageSnapshot {
    if (!this.page) {
      throw new InvalidTransitionError(`Entered ${this.state} without a page`);
    }
    return this.page;
  }

  private async transition(step: Step): Promise<void> {
    const from = this.state;
    assertTransition(from, step.to);
    this.state = step.to;

    if (isTerminal(step.to) && step.to !== NAV_STATES.PARSED) {
      this.reason = step.detail;
    }

    logger.info(`${from} -> ${step.to}`, step.detail ? { detail: step.detail } : undefined, 'NAVIGATOR');

    await this.onTransition?.({
      from,
      to: step.to,
      at: new Date().toISOString(),
      elapsedMs: this.deadline.elapsedMs(),
      detail: step.detail,
      page: this.page
    });
  }
}
