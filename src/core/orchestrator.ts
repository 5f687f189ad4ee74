import type { BrowserPort, CaptchaPort } from '../ports/index.js';
import type { EntityRecord, NavigationResult, RunRequest, RunResult } from '../domain/models.js';
import { NAV_STATES, RUN_STATUSES, type NavStateValue, type RunStatusValue } from '../constants.js';
import { getConfig, type Config } from '../config.js';
import { Deadline } from './deadline.js';
import {
  RegistryNavigator,
  challengeIdSequence,
  navigatorOptionsFromConfig,
  type ChallengeIdSource,
  type NavigatorOptions
} from './navigator.js';
import { RunDiagnosticsRecorder } from '../services/run-diagnostics.js';
import { writeArtifact } from '../services/artifact-writer.js';
import { errorMessage, formatErrorForLogging } from '../utils/error-handler.js';
import { formatDuration } from '../utils/date.js';
import { logger } from '../utils/logger.js';

export interface OrchestratorOptions {
  outputDir: string;
  logDir: string;
  saveHtmlSnapshots: boolean;
  screenshotTimeoutMs: number;
  browserCloseTimeoutMs: number;
  deadlineGraceMs: number;
  maxRunAttempts: number;
  retryCooldownMs: number;
  navigator: NavigatorOptions;
}

export function orchestratorOptionsFromConfig(config: Config = getConfig()): OrchestratorOptions {
  return {
    outputDir: config.outputDir,
    logDir: config.logDir,
    saveHtmlSnapshots: config.saveHtmlSnapshots,
    screenshotTimeoutMs: config.screenshotTimeoutMs,
    browserCloseTimeoutMs: config.browserCloseTimeoutMs,
    deadlineGraceMs: config.deadlineGraceMs,
    maxRunAttempts: config.maxRunAttempts,
    retryCooldownMs: config.retryCooldownMs,
    navigator: navigatorOptionsFromConfig(config)
  };
}

export interface RunDependencies {
  browser: BrowserPort;
  solver: CaptchaPort;
}

const STATUS_BY_STATE: Partial<Record<NavStateValue, RunStatusValue>> = {
  [NAV_STATES.PARSED]: RUN_STATUSES.SUCCESS,
  [NAV_STATES.NOT_FOUND]: RUN_STATUSES.NOT_FOUND,
  [NAV_STATES.CAPTCHA_FAILED]: RUN_STATUSES.CAPTCHA_FAILED,
  [NAV_STATES.TIMED_OUT]: RUN_STATUSES.TIMEOUT,
  [NAV_STATES.PARSE_ERROR]: RUN_STATUSES.PARSE_ERROR,
  [NAV_STATES.SITE_CHANGED]: RUN_STATUSES.SITE_CHANGED,
  [NAV_STATES.RATE_LIMITED]: RUN_STATUSES.RATE_LIMITED
};

export function statusForState(state: NavStateValue): RunStatusValue {
  return STATUS_BY_STATE[state] ?? RUN_STATUSES.ERROR;
}

type NavigationOutcome =
  | { kind: 'finished'; result: NavigationResult }
  | { kind: 'failed'; error: unknown }
  | { kind: 'overrun' };

interface Attempts {
  search: number;
  solve: number;
}

interface Outcome {
  status: RunStatusValue;
  record: EntityRecord | null;
  error: string | null;
}

/**
 * Runs one registry lookup end to end under a single deadline and always
 * leaves exactly one artifact behind, whatever the outcome.
 */
export class RunOrchestrator {
  private current: RegistryNavigator | null = null;
  private finished: Attempts = { search: 0, solve: 0 };

  constructor(
    private readonly deps: RunDependencies,
    private readonly options: OrchestratorOptions = orchestratorOptionsFromConfig()
  ) {}

  /** Resolves with the run result; rejects only when the artifact cannot be written. */
  async run(request: RunRequest): Promise<RunResult> {
    const deadline = new Deadline(request.deadlineMs);
    const diagnostics = new RunDiagnosticsRecorder(request.requestId, this.deps.browser, {
      logDir: this.options.logDir,
      saveHtmlSnapshots: this.options.saveHtmlSnapshots,
      screenshotTimeoutMs: this.options.screenshotTimeoutMs
    });
    this.current = null;
    this.finished = { search: 0, solve: 0 };

    logger.info('Run started', {
      requestId: request.requestId,
      fileNumber: request.fileNumber,
      budget: formatDuration(request.deadlineMs)
    }, 'ORCHESTRATOR');
    await diagnostics.start(request);

    const challengeIds = challengeIdSequence(request.requestId);
    const navigation: Promise<NavigationOutcome> = this.navigate(request, deadline, diagnostics, challengeIds).then(
      (result): NavigationOutcome => ({ kind: 'finished', result }),
      (error: unknown): NavigationOutcome => ({ kind: 'failed', error })
    );
    const overrun = deadline.whenOverrun(this.options.deadlineGraceMs).then((): NavigationOutcome => ({ kind: 'overrun' }));

    const outcome = this.resolveOutcome(await Promise.race([navigation, overrun]), deadline);
    deadline.abort('Run finished');
    deadline.dispose();

    const attempts = this.attempts();
    const result: RunResult = {
      requestId: request.requestId,
      fileNumber: request.fileNumber,
      status: outcome.status,
      record: outcome.record,
      error: outcome.error,
      attempts,
      elapsedMs: deadline.elapsedMs(),
      completedAt: new Date().toISOString(),
      diagnostics: diagnostics.summary()
    };

    await diagnostics.finish(result.status, result.error);
    logger.info('Run finished', {
      status: result.status,
      elapsed: formatDuration(result.elapsedMs),
      searchAttempts: attempts.search,
      solveAttempts: attempts.solve
    }, 'ORCHESTRATOR');

    try {
      await writeArtifact(this.options.outputDir, result);
    } finally {
      await this.closeBrowser();
    }
    return result;
  }

  private async navigate(
    request: RunRequest,
    deadline: Deadline,
    diagnostics: RunDiagnosticsRecorder,
    challengeIds: ChallengeIdSource
  ): Promise<NavigationResult> {
    await this.deps.browser.open();

    for (let attempt = 1; ; attempt++) {
      const navigator = new RegistryNavigator(
        request,
        this.deps.browser,
        this.deps.solver,
        deadline,
        this.options.navigator,
        event => diagnostics.recordTransition(event),
        challengeIds
      );
      this.current = navigator;
      const result = await navigator.run();
      this.finished = this.attempts();
      this.current = null;

      if (!result.retryable || attempt >= this.options.maxRunAttempts) {
        return result;
      }
      if (deadline.remainingMs() <= this.options.retryCooldownMs) {
        logger.warn('No budget left for another attempt', { state: result.state }, 'ORCHESTRATOR');
        return result;
      }

      logger.warn('Retrying run after cooldown', {
        state: result.state,
        attempt,
        cooldown: formatDuration(this.options.retryCooldownMs)
      }, 'ORCHESTRATOR');
      if (!(await deadline.sleep(this.options.retryCooldownMs))) {
        return result;
      }
    }
  }

  private resolveOutcome(outcome: NavigationOutcome, deadline: Deadline): Outcome {
    switch (outcome.kind) {
      case 'finished': {
        const status = statusForState(outcome.result.state);
        return {
          status,
          record: status === RUN_STATUSES.SUCCESS ? outcome.result.record : null,
          error: status === RUN_STATUSES.SUCCESS ? null : outcome.result.reason ?? outcome.result.state
        };
      }
      case 'failed':
        if (deadline.expired()) {
          return { status: RUN_STATUSES.TIMEOUT, record: null, error: errorMessage(outcome.error) };
        }
        logger.error('Run failed', { error: formatErrorForLogging(outcome.error) }, 'ORCHESTRATOR');
        return { status: RUN_STATUSES.ERROR, record: null, error: errorMessage(outcome.error) };
      case 'overrun':
        logger.error('Navigation overran the deadline', {
          state: this.current?.currentState ?? null,
          budgetMs: deadline.budgetMs
        }, 'ORCHESTRATOR');
        return {
          status: RUN_STATUSES.TIMEOUT,
          record: null,
          error: `Run deadline of ${formatDuration(deadline.budgetMs)} exceeded`
        };
    }
  }

  private attempts(): Attempts {
    const progress = this.current?.progress() ?? { search: 0, solve: 0 };
    return {
      search: this.finished.search + progress.search,
      solve: this.finished.solve + progress.solve
    };
  }

  /** Closes the browser, waiting at most the close timeout. */
  private async closeBrowser(): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(true), this.options.browserCloseTimeoutMs);
    });
    const closed = this.deps.browser.close().then(
      () => false,
      (error: unknown) => {
        logger.warn('Browser close failed', { error: errorMessage(error) }, 'ORCHESTRATOR');
        return false;
      }
    );

    if (await Promise.race([closed, timedOut])) {
      logger.warn('Browser close timed out', { timeoutMs: this.options.browserCloseTimeoutMs }, 'ORCHESTRATOR');
    }
    clearTimeout(timer);
  }
}
