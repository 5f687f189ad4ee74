import axios from 'axios';
import { z } from 'zod';
import type { CaptchaPort } from '../ports/captcha.js';
import type { Challenge, SolvedToken } from '../domain/models.js';
import type { Deadline } from '../core/deadline.js';
import { CHALLENGE_KINDS, SOLVER_CODES } from '../constants.js';
import { getConfig, type Config } from '../config.js';
import {
  CaptchaServiceUnavailable,
  CaptchaSolveError,
  CaptchaTimeoutError,
  ConfigurationError,
  errorMessage
} from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export interface SolveCaptchaOptions {
  apiKey: string;
  baseUrl: string;
  initialPollMs: number;
  maxPollMs: number;
  backoffFactor: number;
  requestTimeoutMs: number;
  maxTransportFailures: number;
  tokenTtlMs: number;
}

export function solverOptionsFromConfig(config: Config = getConfig()): SolveCaptchaOptions {
  return {
    apiKey: config.solvecaptchaApiKey,
    baseUrl: config.solverBaseUrl,
    initialPollMs: config.solverInitialPollMs,
    maxPollMs: config.solverMaxPollMs,
    backoffFactor: config.solverBackoffFactor,
    requestTimeoutMs: config.solverRequestTimeoutMs,
    maxTransportFailures: config.solverMaxTransportFailures,
    tokenTtlMs: config.tokenTtlMs
  };
}

const ReplySchema = z.object({
  status: z.coerce.number().optional(),
  request: z.string(),
  error_text: z.string().optional()
});

type SolverReply = z.infer<typeof ReplySchema>;

const ERROR_MESSAGES: Record<string, string> = {
  ERROR_CAPTCHA_UNSOLVABLE: 'CAPTCHA could not be solved',
  ERROR_ZERO_BALANCE: 'Solving service balance is empty',
  ERROR_WRONG_USER_KEY: 'Solving service rejected the API key',
  ERROR_KEY_DOES_NOT_EXIST: 'Solving service rejected the API key',
  ERROR_WRONG_GOOGLEKEY: 'Solving service rejected the site key',
  ERROR_BAD_PARAMETERS: 'Solving service rejected the task parameters',
  ERROR_ZERO_CAPTCHA_FILESIZE: 'Challenge image is empty'
};

function describeReply(reply: SolverReply): string {
  return ERROR_MESSAGES[reply.request] || reply.error_text || reply.request || 'Unknown solving service error';
}

interface SolveJob {
  challenge: Challenge;
  transportFailures: number;
}

/**
 * Client for the 2captcha-compatible in.php/res.php API: submit the challenge,
 * then poll on a growing delay until a token, an explicit failure, or the run
 * deadline.
 */
export class SolveCaptchaAdapter implements CaptchaPort {
  private readonly submitted = new Set<string>();

  constructor(private readonly options: SolveCaptchaOptions = solverOptionsFromConfig()) {}

  async solve(challenge: Challenge, deadline: Deadline): Promise<SolvedToken> {
    // A missing key fails only runs that meet a challenge
    if (!this.options.apiKey) {
      throw new ConfigurationError('SOLVECAPTCHA_API_KEY not configured');
    }
    if (this.submitted.has(challenge.id)) {
      throw new CaptchaSolveError('Challenge was already submitted for solving', {
        code: 'CHALLENGE_REUSED',
        challengeId: challenge.id
      });
    }
    const form = this.buildSubmitForm(challenge);
    this.submitted.add(challenge.id);

    const job: SolveJob = { challenge, transportFailures: 0 };
    const jobId = await this.submit(job, form, deadline);
    logger.info('Challenge submitted', { jobId, kind: challenge.kind }, 'CAPTCHA');

    const value = await this.poll(job, jobId, deadline);
    const issued = Date.now();
    logger.info('Challenge solved', { jobId, kind: challenge.kind }, 'CAPTCHA');

    return {
      value,
      challengeId: challenge.id,
      challengeKind: challenge.kind,
      jobId,
      issuedAt: new Date(issued).toISOString(),
      expiresAt: new Date(issued + this.options.tokenTtlMs).toISOString()
    };
  }

  async reportRejected(token: SolvedToken, deadline: Deadline): Promise<void> {
    if (deadline.expired()) {
      logger.warn('Run deadline reached, rejected token not reported', { jobId: token.jobId }, 'CAPTCHA');
      return;
    }
    try {
      await axios.get(`${this.options.baseUrl}/res.php`, {
        params: { key: this.options.apiKey, action: 'reportbad', id: token.jobId, json: 1 },
        timeout: Math.min(this.options.requestTimeoutMs, deadline.remainingMs()),
        signal: deadline.signal
      });
      logger.info('Reported rejected token', { jobId: token.jobId }, 'CAPTCHA');
    } catch (error) {
      // Reporting only affects billing; the run goes on either way
      logger.warn('Failed to report rejected token', { jobId: token.jobId, error: errorMessage(error) }, 'CAPTCHA');
    }
  }

  /** Next poll delay: grows by the backoff factor up to the cap. */
  nextDelay(current: number): number {
    return Math.min(Math.round(current * this.options.backoffFactor), this.options.maxPollMs);
  }

  private buildSubmitForm(challenge: Challenge): URLSearchParams {
    const form = new URLSearchParams({ key: this.options.apiKey, json: '1' });

    if (challenge.kind === CHALLENGE_KINDS.IMAGE) {
      if (!challenge.imageBase64) {
        throw new CaptchaSolveError('Image challenge has no picture to submit', { code: 'MISSING_IMAGE' });
      }
      form.set('method', 'base64');
      form.set('body', challenge.imageBase64);
      return form;
    }

    if (!challenge.siteKey) {
      throw new CaptchaSolveError(`${challenge.kind} challenge requires a site key`, { code: 'MISSING_SITEKEY' });
    }
    form.set('pageurl', challenge.pageUrl);
    if (challenge.kind === CHALLENGE_KINDS.RECAPTCHA_V2) {
      form.set('method', 'userrecaptcha');
      form.set('googlekey', challenge.siteKey);
    } else {
      form.set('method', challenge.kind);
      form.set('sitekey', challenge.siteKey);
    }
    return form;
  }

  private async submit(job: SolveJob, form: URLSearchParams, deadline: Deadline): Promise<string> {
    let delay = this.options.initialPollMs;

    for (;;) {
      const reply = await this.request(job, 'submit', deadline, (timeout) =>
        axios.post(`${this.options.baseUrl}/in.php`, form, { timeout, signal: deadline.signal })
      );

      if (reply?.status === 1 && reply.request) {
        return reply.request;
      }
      if (reply && reply.request !== SOLVER_CODES.NO_SLOT) {
        throw new CaptchaSolveError(describeReply(reply), { code: reply.request, challengeId: job.challenge.id });
      }

      logger.debug('Solving service busy, retrying submit', { delay }, 'CAPTCHA');
      await this.pause(delay, deadline, 'submit');
      delay = this.nextDelay(delay);
    }
  }

  private async poll(job: SolveJob, jobId: string, deadline: Deadline): Promise<string> {
    let delay = this.options.initialPollMs;

    for (;;) {
      await this.pause(delay, deadline, jobId);
      delay = this.nextDelay(delay);

      const reply = await this.request(job, 'poll', deadline, (timeout) =>
        axios.get(`${this.options.baseUrl}/res.php`, {
          params: { key: this.options.apiKey, action: 'get', id: jobId, json: 1 },
          timeout,
          signal: deadline.signal
        })
      );

      if (!reply || reply.request === SOLVER_CODES.NOT_READY) {
        continue;
      }
      if (reply.status === 1 && reply.request) {
        return reply.request;
      }
      throw new CaptchaSolveError(describeReply(reply), { code: reply.request, jobId });
    }
  }

  /** One HTTP exchange; null when it failed in transport and may be retried. */
  private async request(
    job: SolveJob,
    step: string,
    deadline: Deadline,
    send: (timeoutMs: number) => Promise<{ data: unknown }>
  ): Promise<SolverReply | null> {
    if (deadline.expired()) {
      throw new CaptchaTimeoutError(`Run deadline reached before solver ${step}`, { challengeId: job.challenge.id });
    }
    const timeout = Math.min(this.options.requestTimeoutMs, deadline.remainingMs());

    let data: unknown;
    try {
      ({ data } = await send(timeout));
    } catch (error) {
      return this.transportFailure(job, step, deadline, errorMessage(error));
    }

    const reply = ReplySchema.safeParse(data);
    if (!reply.success) {
      return this.transportFailure(job, step, deadline, 'malformed reply');
    }
    job.transportFailures = 0;
    return reply.data;
  }

  private transportFailure(job: SolveJob, step: string, deadline: Deadline, reason: string): null {
    if (deadline.expired()) {
      throw new CaptchaTimeoutError(`Run deadline reached during solver ${step}`, { challengeId: job.challenge.id });
    }

    job.transportFailures++;
    logger.warn('Solving service request failed', {
      step,
      reason,
      failures: job.transportFailures
    }, 'CAPTCHA');

    if (job.transportFailures >= this.options.maxTransportFailures) {
      throw new CaptchaServiceUnavailable(`Solving service unreachable after ${job.transportFailures} attempts`, {
        reason,
        challengeId: job.challenge.id
      });
    }
    return null;
  }

  private async pause(ms: number, deadline: Deadline, context: string): Promise<void> {
    const completed = await deadline.sleep(ms);
    if (!completed) {
      throw new CaptchaTimeoutError('Run deadline reached while waiting on the solving service', { context });
    }
  }
}
