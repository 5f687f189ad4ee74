import { z } from 'zod';
import fs from 'fs';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { DEFAULTS, REGISTRY_SELECTORS } from './constants.js';
import { ConfigurationError } from './utils/error-handler.js';

// Load .env file first if it exists
if (fs.existsSync('.env')) {
  dotenv.config();
}

const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'NONE'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = (fallback: boolean) =>
  z.enum(['true', 'false', '1', '0']).optional().transform(v => (v === undefined ? fallback : v === 'true' || v === '1'));

/**
 * Centralized configuration schema.
 * Every environment variable and secret is validated here at startup.
 */
const ConfigSchema = z.object({
  // Run inputs (normally supplied by the calling workflow)
  fileNumber: z.string().default(''),
  requestId: z.string().default(''),
  runDeadlineMs: z.coerce.number().int().positive().default(DEFAULTS.RUN_DEADLINE_MS),
  deadlineGraceMs: z.coerce.number().int().min(0).default(DEFAULTS.DEADLINE_GRACE_MS),

  // Output locations
  outputDir: z.string().default('.'),
  logDir: z.string().default('logs'),
  saveHtmlSnapshots: booleanFlag(false),

  // Registry
  registryUrl: z.string().url().default(DEFAULTS.REGISTRY_URL),
  searchInputSelector: z.string().default(REGISTRY_SELECTORS.SEARCH_INPUT),
  searchSubmitSelector: z.string().default(REGISTRY_SELECTORS.SEARCH_SUBMIT),
  captchaInputSelector: z.string().default(REGISTRY_SELECTORS.CAPTCHA_INPUT),
  captchaImageSelector: z.string().default(REGISTRY_SELECTORS.CAPTCHA_IMAGE),
  navTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.NAV_TIMEOUT_MS),
  screenshotTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.SCREENSHOT_TIMEOUT_MS),
  browserCloseTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.BROWSER_CLOSE_TIMEOUT_MS),

  // Retry policy
  maxSolveAttempts: z.coerce.number().int().min(1).default(DEFAULTS.MAX_SOLVE_ATTEMPTS),
  maxTokenRejections: z.coerce.number().int().min(0).default(DEFAULTS.MAX_TOKEN_REJECTIONS),
  maxRunAttempts: z.coerce.number().int().min(1).default(DEFAULTS.MAX_RUN_ATTEMPTS),
  retryCooldownMs: z.coerce.number().int().min(0).default(DEFAULTS.RETRY_COOLDOWN_MS),

  // Browser (Puppeteer) configuration
  executablePath: z.string().default('/usr/lib/chromium/chromium'),
  proxyServer: z.string().default(''),
  headless: booleanFlag(true),

  // CAPTCHA solver configuration
  solvecaptchaApiKey: z.string().default(''),
  solverBaseUrl: z.string().url().default(DEFAULTS.SOLVER_BASE_URL),
  solverInitialPollMs: z.coerce.number().int().positive().default(DEFAULTS.SOLVER_INITIAL_POLL_MS),
  solverMaxPollMs: z.coerce.number().int().positive().default(DEFAULTS.SOLVER_MAX_POLL_MS),
  solverBackoffFactor: z.coerce.number().min(1).default(DEFAULTS.SOLVER_BACKOFF_FACTOR),
  solverRequestTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.SOLVER_REQUEST_TIMEOUT_MS),
  solverMaxTransportFailures: z.coerce.number().int().min(1).default(DEFAULTS.SOLVER_MAX_TRANSPORT_FAILURES),
  tokenTtlMs: z.coerce.number().int().positive().default(DEFAULTS.TOKEN_TTL_MS),

  // Logging
  logLevel: z.enum(LOG_LEVELS).default('INFO')
});

export type Config = z.infer<typeof ConfigSchema>;

// Load secrets from YAML if available
function loadSecretsFromYaml(): Record<string, string> {
  const secretsPath = 'secrets.yaml';
  if (!fs.existsSync(secretsPath)) {
    return {};
  }

  try {
    const content = fs.readFileSync(secretsPath, 'utf-8');
    const data: unknown = YAML.parse(content);
    if (!data || typeof data !== 'object') {
      return {};
    }

    const secrets: Record<string, string> = {};
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === 'string') {
        secrets[key] = value;
      }
    }
    return secrets;
  } catch (error) {
    console.warn('[CONFIG] Failed to load secrets.yaml:', error instanceof Error ? error.message : error);
    return {};
  }
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

// Map environment variable names (supporting legacy names)
function mapEnvVars(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const secrets = loadSecretsFromYaml();

  const raw: Record<string, string | undefined> = {
    fileNumber: env.FILE_NUMBER,
    requestId: env.REQUEST_ID,
    runDeadlineMs: env.RUN_DEADLINE_MS,
    deadlineGraceMs: env.DEADLINE_GRACE_MS,

    outputDir: env.OUTPUT_DIR,
    logDir: env.LOG_DIR,
    saveHtmlSnapshots: env.SAVE_HTML_SNAPSHOTS?.toLowerCase(),

    registryUrl: env.REGISTRY_URL,
    searchInputSelector: env.SEARCH_INPUT_SELECTOR,
    searchSubmitSelector: env.SEARCH_SUBMIT_SELECTOR,
    captchaInputSelector: env.CAPTCHA_INPUT_SELECTOR,
    captchaImageSelector: env.CAPTCHA_IMAGE_SELECTOR,
    navTimeoutMs: env.NAV_TIMEOUT_MS,
    screenshotTimeoutMs: env.SCREENSHOT_TIMEOUT_MS,
    browserCloseTimeoutMs: env.BROWSER_CLOSE_TIMEOUT_MS,

    maxSolveAttempts: env.MAX_SOLVE_ATTEMPTS,
    maxTokenRejections: env.MAX_TOKEN_REJECTIONS,
    maxRunAttempts: env.MAX_RUN_ATTEMPTS,
    retryCooldownMs: env.RETRY_COOLDOWN_MS,

    // Browser - support legacy PUPPETEER_EXECUTABLE_PATH
    executablePath: env.EXECUTABLE_PATH || env.PUPPETEER_EXECUTABLE_PATH,
    proxyServer: env.PROXY_SERVER || env.HTTP_PROXY,
    headless: env.HEADLESS?.toLowerCase(),

    solvecaptchaApiKey: env.SOLVECAPTCHA_API_KEY || secrets.solvecaptcha,
    solverBaseUrl: env.SOLVER_BASE_URL,
    solverInitialPollMs: env.SOLVER_INITIAL_POLL_MS,
    solverMaxPollMs: env.SOLVER_MAX_POLL_MS,
    solverBackoffFactor: env.SOLVER_BACKOFF_FACTOR,
    solverRequestTimeoutMs: env.SOLVER_REQUEST_TIMEOUT_MS,
    solverMaxTransportFailures: env.SOLVER_MAX_TRANSPORT_FAILURES,
    tokenTtlMs: env.TOKEN_TTL_MS,

    logLevel: env.LOG_LEVEL?.toUpperCase()
  };

  // Workflow inputs arrive as empty strings when unset
  return Object.fromEntries(Object.entries(raw).map(([key, value]) => [key, emptyToUndefined(value)]));
}

export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(mapEnvVars(env));
  if (parsed.success) {
    return parsed.data;
  }

  const messages = parsed.error.issues
    .map(issue => `${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
  console.error('[CONFIG] Validation failed:\n' + messages);
  throw new ConfigurationError(`Configuration validation failed:\n${messages}`);
}

// Initialize config
let config: Config | null = null;

export function initConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (config !== null) {
    return config;
  }

  config = parseConfig(env);
  return config;
}

export function getConfig(): Config {
  if (config === null) {
    throw new Error('Config not initialized. Call initConfig() first.');
  }
  return config;
}

export function getLogLevel(): LogLevel {
  if (config !== null) {
    return config.logLevel;
  }
  // The logger may run before initConfig(), e.g. while reporting a config error
  const fromEnv = process.env.LOG_LEVEL?.toUpperCase();
  return LOG_LEVELS.find(level => level === fromEnv) ?? 'INFO';
}
