import { createRequire } from 'module';
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

export const VERSION = pkg.version;

export const NAV_STATES = {
  INIT: 'init',
  SEARCH_SUBMITTED: 'search_submitted',
  CHALLENGE_PRESENTED: 'challenge_presented',
  CHALLENGE_SOLVED: 'challenge_solved',
  RESULTS_LOADED: 'results_loaded',
  PARSED: 'parsed',
  NOT_FOUND: 'not_found',
  RATE_LIMITED: 'rate_limited',
  SITE_CHANGED: 'site_changed',
  CAPTCHA_FAILED: 'captcha_failed',
  PARSE_ERROR: 'parse_error',
  TIMED_OUT: 'timed_out'
} as const;

export type NavStateValue = (typeof NAV_STATES)[keyof typeof NAV_STATES];

export const RUN_STATUSES = {
  SUCCESS: 'success',
  NOT_FOUND: 'not_found',
  CAPTCHA_FAILED: 'captcha_failed',
  TIMEOUT: 'timeout',
  PARSE_ERROR: 'parse_error',
  SITE_CHANGED: 'site_changed',
  RATE_LIMITED: 'rate_limited',
  ERROR: 'error'
} as const;

export type RunStatusValue = (typeof RUN_STATUSES)[keyof typeof RUN_STATUSES];

export const CHALLENGE_KINDS = {
  RECAPTCHA_V2: 'recaptcha_v2',
  HCAPTCHA: 'hcaptcha',
  TURNSTILE: 'turnstile',
  IMAGE: 'image'
} as const;

export type ChallengeKindValue = (typeof CHALLENGE_KINDS)[keyof typeof CHALLENGE_KINDS];

export const PAGE_KINDS = {
  CHALLENGE: 'challenge',
  RESULTS: 'results',
  NOT_FOUND: 'not_found',
  RATE_LIMITED: 'rate_limited',
  UNKNOWN: 'unknown'
} as const;

// Reply codes of the 2captcha-compatible in.php/res.php protocol
export const SOLVER_CODES = {
  NOT_READY: 'CAPCHA_NOT_READY',
  NO_SLOT: 'ERROR_NO_SLOT_AVAILABLE'
} as const;

export const REGISTRY_SELECTORS = {
  SEARCH_INPUT: 'input[name="fileNumber"], input#fileNumber, input[name="srchFileNbr"]',
  SEARCH_SUBMIT: 'form button[type="submit"], form input[type="submit"]',
  CAPTCHA_INPUT: 'input[name="captcha"], input#captcha, input[name="captchaText"]',
  CAPTCHA_IMAGE: 'img#captchaImage, img[src*="captcha"], img[alt*="CAPTCHA"]'
} as const;

export const DEFAULTS = {
  REGISTRY_URL: 'https://apps.ilsos.gov/llcarprg/',
  SOLVER_BASE_URL: 'https://api.solvecaptcha.com',
  SOLVER_INITIAL_POLL_MS: 5000,
  SOLVER_MAX_POLL_MS: 20000,
  SOLVER_BACKOFF_FACTOR: 1.5,
  SOLVER_REQUEST_TIMEOUT_MS: 15000,
  SOLVER_MAX_TRANSPORT_FAILURES: 3,
  TOKEN_TTL_MS: 110000,
  MAX_SOLVE_ATTEMPTS: 3,
  MAX_TOKEN_REJECTIONS: 1,
  MAX_RUN_ATTEMPTS: 1,
  RETRY_COOLDOWN_MS: 30000,
  // The calling workflow kills the container at 900s
  RUN_DEADLINE_MS: 840000,
  DEADLINE_GRACE_MS: 5000,
  NAV_TIMEOUT_MS: 30000,
  SCREENSHOT_TIMEOUT_MS: 5000,
  BROWSER_CLOSE_TIMEOUT_MS: 10000,
  USER_AGENT: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/142.0.0.0 Safari/537.36',
  VIEWPORT_WIDTH: 1280,
  VIEWPORT_HEIGHT: 720,
  ARTIFACT_PREFIX: 'processed_data_',
  RUN_LOG_FILE: 'run.jsonl'
} as const;
