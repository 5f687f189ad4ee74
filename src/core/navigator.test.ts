import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RegistryNavigator, challengeIdSequence, type NavigatorOptions } from './navigator.js';
import { Deadline } from './deadline.js';
import { loadFixture } from './__fixtures__/load.js';
import type { BrowserPort, CaptchaPort } from '../ports/index.js';
import type { PageSnapshot, RunRequest, SolvedToken, TransitionEvent } from '../domain/models.js';
import { CaptchaServiceUnavailable, CaptchaSolveError, CaptchaTimeoutError } from '../utils/error-handler.js';

const REQUEST: RunRequest = { fileNumber: '09853537', requestId: 'req-1', deadlineMs: 60_000 };

const OPTIONS: NavigatorOptions = { maxSolveAttempts: 3, maxTokenRejections: 1, navTimeoutMs: 30_000 };

const TOKEN: SolvedToken = {
  value: 'token-abc',
  challengeId: 'req-1-challenge-1',
  challengeKind: 'recaptcha_v2',
  jobId: 'job-1',
  issuedAt: '2026-10-18T12:00:00.000Z',
  expiresAt: '2026-10-18T12:01:50.000Z'
};

function snapshot(fixture: string): PageSnapshot {
  return { url: 'https://registry.test/llcarprg/search', html: loadFixture(fixture), status: 200 };
}

function submission(fixture: string, formFound = true) {
  return { formFound, page: snapshot(fixture) };
}

describe('RegistryNavigator', () => {
  let browser: BrowserPort;
  let solver: CaptchaPort;
  let deadline: Deadline;
  let events: TransitionEvent[];

  const navigator = (options: NavigatorOptions = OPTIONS) =>
    new RegistryNavigator(REQUEST, browser, solver, deadline, options, async (event) => {
      events.push(event);
    });

  const visited = () => events.map(e => e.to);

  beforeEach(() => {
    vi.clearAllMocks();
    events = [];
    deadline = new Deadline(60_000);

    browser = {
      open: vi.fn().mockResolvedValue(undefined),
      close: vi.fn().mockResolvedValue(undefined),
      submitSearch: vi.fn().mockResolvedValue(submission('recaptcha-challenge')),
      submitSolution: vi.fn().mockResolvedValue(snapshot('results-acme')),
      captureChallengeImage: vi.fn().mockResolvedValue(null),
      screenshot: vi.fn().mockResolvedValue(undefined)
    };

    solver = {
      solve: vi.fn().mockResolvedValue(TOKEN),
      reportRejected: vi.fn().mockResolvedValue(undefined)
    };
  });

  afterEach(() => {
    deadline.dispose();
  });

  it('should walk from search through the challenge to a parsed record', async () => {
    const result = await navigator().run();

    expect(result).toEqual({
      state: 'parsed',
      record: {
        businessName: 'Acme LLC',
        businessAddress: '123 Main St',
        status: 'ACTIVE',
        managers: [
          { name: 'Jane Doe', address: '1 Oak Ave, Springfield, IL 62701', role: 'Manager' },
          { name: 'John Roe', address: '2 Elm St', role: 'Manager' }
        ]
      },
      reason: undefined,
      retryable: false,
      searchAttempts: 1,
      solveAttempts: 1
    });
    expect(visited()).toEqual(['search_submitted', 'challenge_presented', 'challenge_solved', 'results_loaded', 'parsed']);
    expect(browser.submitSearch).toHaveBeenCalledWith('09853537', 30_000);
    expect(solver.solve).toHaveBeenCalledWith(
      expect.objectContaining({
        id: 'req-1-challenge-1',
        kind: 'recaptcha_v2',
        siteKey: 'test-site-key',
        pageUrl: 'https://registry.test/llcarprg/search'
      }),
      deadline
    );
    expect(browser.submitSolution).toHaveBeenCalledWith(TOKEN, 30_000);
  });

  it('should report each transition with its origin and page', async () => {
    await navigator().run();

    expect(events[0]).toMatchObject({ from: 'init', to: 'search_submitted', detail: 'Search attempt 1' });
    expect(events[0].page?.html).toContain('g-recaptcha');
    expect(events[4]).toMatchObject({ from: 'results_loaded', to: 'parsed', detail: 'Acme LLC' });
  });

  it('should parse results served without a challenge', async () => {
    browser.submitSearch = vi.fn().mockResolvedValue(submission('results-acme'));

    const result = await navigator().run();

    expect(result.state).toBe('parsed');
    expect(visited()).toEqual(['search_submitted', 'results_loaded', 'parsed']);
    expect(solver.solve).not.toHaveBeenCalled();
  });

  it('should stop at not_found without solving anything', async () => {
    browser.submitSearch = vi.fn().mockResolvedValue(submission('not-found'));

    const result = await navigator().run();

    expect(result.state).toBe('not_found');
    expect(result.record).toBeNull();
    expect(result.reason).toBe('No entity with file number 09853537');
    expect(solver.solve).not.toHaveBeenCalled();
  });

  it('should call the solver exactly maxSolveAttempts times before giving up', async () => {
    solver.solve = vi.fn().mockRejectedValue(new CaptchaSolveError('CAPTCHA could not be solved'));

    const result = await navigator().run();

    expect(result.state).toBe('captcha_failed');
    expect(result.retryable).toBe(false);
    expect(result.solveAttempts).toBe(3);
    expect(result.searchAttempts).toBe(3);
    expect(solver.solve).toHaveBeenCalledTimes(3);
    expect(vi.mocked(solver.solve).mock.calls.map(([challenge]) => challenge.id)).toEqual([
      'req-1-challenge-1',
      'req-1-challenge-2',
      'req-1-challenge-3'
    ]);
    expect(result.reason).toBe('Gave up after 3 solve attempts: CAPTCHA could not be solved');
  });

  it('should mark an unreachable solving service as retryable', async () => {
    solver.solve = vi.fn().mockRejectedValue(new CaptchaServiceUnavailable('Solving service unreachable after 3 attempts'));

    const result = await navigator({ ...OPTIONS, maxSolveAttempts: 1 }).run();

    expect(result.state).toBe('captcha_failed');
    expect(result.retryable).toBe(true);
  });

  it('should re-enter the challenge once when the registry rejects a token', async () => {
    browser.submitSolution = vi.fn()
      .mockResolvedValueOnce(snapshot('token-rejected'))
      .mockResolvedValueOnce(snapshot('results-acme'));

    const result = await navigator().run();

    expect(result.state).toBe('parsed');
    expect(visited()).toEqual([
      'search_submitted',
      'challenge_presented',
      'challenge_solved',
      'challenge_presented',
      'challenge_solved',
      'results_loaded',
      'parsed'
    ]);
    expect(solver.reportRejected).toHaveBeenCalledWith(TOKEN, deadline);
    expect(solver.solve).toHaveBeenCalledTimes(2);
    expect(browser.submitSearch).toHaveBeenCalledTimes(1);
  });

  it('should fail the challenge when tokens keep being rejected', async () => {
    browser.submitSolution = vi.fn().mockResolvedValue(snapshot('token-rejected'));

    const result = await navigator().run();

    expect(result.state).toBe('captcha_failed');
    expect(result.reason).toBe('Registry rejected 2 solved token(s)');
    expect(solver.reportRejected).toHaveBeenCalledTimes(2);
    expect(solver.solve).toHaveBeenCalledTimes(2);
  });

  it('should re-solve a fresh challenge after submit without reporting the token', async () => {
    browser.submitSolution = vi.fn()
      .mockResolvedValueOnce(snapshot('recaptcha-challenge'))
      .mockResolvedValueOnce(snapshot('results-acme'));

    const result = await navigator().run();

    expect(result.state).toBe('parsed');
    expect(events[3].detail).toBe('Token stale, solving the new challenge');
    expect(solver.reportRejected).not.toHaveBeenCalled();
    expect(solver.solve).toHaveBeenCalledTimes(2);
  });

  it('should report not found when the search reply also shows the challenge widget', async () => {
    const page = snapshot('not-found');
    browser.submitSearch = vi.fn().mockResolvedValue({
      formFound: true,
      page: { ...page, html: page.html.replace('</form>', '<div class="g-recaptcha" data-sitekey="test-site-key"></div></form>') }
    });

    const result = await navigator().run();

    expect(result.state).toBe('not_found');
    expect(solver.solve).not.toHaveBeenCalled();
  });

  it('should keep challenge ids unique across navigators sharing an id source', async () => {
    const ids = challengeIdSequence('req-1');
    const run = () => new RegistryNavigator(REQUEST, browser, solver, deadline, OPTIONS, undefined, ids).run();

    await run();
    await run();

    expect(vi.mocked(solver.solve).mock.calls.map(([challenge]) => challenge.id)).toEqual([
      'req-1-challenge-1',
      'req-1-challenge-2'
    ]);
  });

  it('should report throttling after the search', async () => {
    browser.submitSearch = vi.fn().mockResolvedValue(submission('rate-limited'));

    const result = await navigator().run();

    expect(result.state).toBe('rate_limited');
    expect(result.retryable).toBe(true);
    expect(visited()).toEqual(['search_submitted', 'rate_limited']);
  });

  it('should report throttling when the search form never appears', async () => {
    browser.submitSearch = vi.fn().mockResolvedValue(submission('rate-limited', false));

    const result = await navigator().run();

    expect(visited()).toEqual(['rate_limited']);
    expect(result.reason).toBe('Registry throttled the search form');
  });

  it('should report a site change when the search form is missing', async () => {
    browser.submitSearch = vi.fn().mockResolvedValue(submission('unknown-layout', false));

    const result = await navigator().run();

    expect(result.state).toBe('site_changed');
    expect(result.reason).toBe('Search form not found');
  });

  it('should report a site change for an unrecognised search response', async () => {
    browser.submitSearch = vi.fn().mockResolvedValue(submission('unknown-layout'));

    const result = await navigator().run();

    expect(visited()).toEqual(['search_submitted', 'site_changed']);
    expect(result.reason).toBe('Search response matches no known page');
  });

  it('should report a parse error when the results lack a name', async () => {
    browser.submitSearch = vi.fn().mockResolvedValue(submission('results-missing-name'));

    const result = await navigator().run();

    expect(result.state).toBe('parse_error');
    expect(result.reason).toBe('Business name missing from results page');
  });

  it('should time out when the solver runs into the deadline', async () => {
    solver.solve = vi.fn().mockRejectedValue(new CaptchaTimeoutError('Run deadline reached while waiting on the solving service'));

    const result = await navigator().run();

    expect(result.state).toBe('timed_out');
    expect(visited()).toEqual(['search_submitted', 'challenge_presented', 'timed_out']);
  });

  it('should time out before doing anything once the deadline has passed', async () => {
    deadline.abort('test');

    const result = await navigator().run();

    expect(result.state).toBe('timed_out');
    expect(result.reason).toBe('Run deadline reached in init');
    expect(browser.submitSearch).not.toHaveBeenCalled();
  });

  it('should capture image challenges that are not inlined', async () => {
    const html = '<html><body><form><img src="/llcarprg/captcha.jpg"><input name="captcha"></form></body></html>';
    browser.submitSearch = vi.fn().mockResolvedValue({
      formFound: true,
      page: { url: 'https://registry.test/llcarprg/search', html, status: 200 }
    });
    browser.captureChallengeImage = vi.fn().mockResolvedValue('Y2FwdHVyZWQ=');

    await navigator().run();

    expect(solver.solve).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'image', imageBase64: 'Y2FwdHVyZWQ=' }),
      deadline
    );
  });
});
