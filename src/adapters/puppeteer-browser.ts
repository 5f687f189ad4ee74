import puppeteer, { Browser, HTTPResponse, Page } from 'puppeteer-core';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { BrowserPort, ScreenshotPath, SearchSubmission } from '../ports/browser.js';
import type { PageSnapshot, SolvedToken } from '../domain/models.js';
import { CHALLENGE_KINDS, DEFAULTS, type ChallengeKindValue } from '../constants.js';
import { getConfig, type Config } from '../config.js';
import { NetworkError, SiteChangedError, errorMessage } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export interface RegistrySelectors {
  searchInput: string;
  searchSubmit: string;
  captchaInput: string;
  captchaImage: string;
}

export interface PuppeteerBrowserOptions {
  registryUrl: string;
  executablePath: string;
  proxyServer: string;
  headless: boolean;
  launchTimeoutMs: number;
  selectors: RegistrySelectors;
}

export function browserOptionsFromConfig(config: Config = getConfig()): PuppeteerBrowserOptions {
  return {
    registryUrl: config.registryUrl,
    executablePath: config.executablePath,
    proxyServer: config.proxyServer,
    headless: config.headless,
    launchTimeoutMs: config.navTimeoutMs,
    selectors: {
      searchInput: config.searchInputSelector,
      searchSubmit: config.searchSubmitSelector,
      captchaInput: config.captchaInputSelector,
      captchaImage: config.captchaImageSelector
    }
  };
}

// Hidden form fields the widget scripts fill in after a human passes the check
const TOKEN_FIELDS: Record<Exclude<ChallengeKindValue, 'image'>, string> = {
  [CHALLENGE_KINDS.RECAPTCHA_V2]: 'g-recaptcha-response',
  [CHALLENGE_KINDS.HCAPTCHA]: 'h-captcha-response',
  [CHALLENGE_KINDS.TURNSTILE]: 'cf-turnstile-response'
};

interface BrowserSession {
  browser: Browser;
  page: Page;
  userDataDir: string;
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number, step: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new NetworkError(`${step} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

function parseProxy(proxyServer: string): { hostPort: string; auth: { username: string; password: string } | null } | null {
  try {
    const proxyUrl = new URL(proxyServer);
    return {
      hostPort: `${proxyUrl.hostname}:${proxyUrl.port || '80'}`,
      auth: proxyUrl.username && proxyUrl.password
        ? { username: decodeURIComponent(proxyUrl.username), password: decodeURIComponent(proxyUrl.password) }
        : null
    };
  } catch (e) {
    logger.warn('Failed to parse proxy URL', { error: String(e) }, 'BROWSER');
    return null;
  }
}

/**
 * One Chromium session against the registry search form. Launched with a
 * throwaway profile directory which is removed again on close.
 */
export class PuppeteerBrowserAdapter implements BrowserPort {
  private session: BrowserSession | null = null;

  constructor(private readonly options: PuppeteerBrowserOptions = browserOptionsFromConfig()) {}

  async open(): Promise<void> {
    if (this.session) return;

    const userDataDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'puppeteer-user-data-'));
    const proxy = this.options.proxyServer ? parseProxy(this.options.proxyServer) : null;
    if (proxy) {
      logger.debug('Browser launching with proxy', { proxy: proxy.hostPort }, 'BROWSER');
    }

    let browser: Browser | null = null;
    try {
      browser = await puppeteer.launch({
        executablePath: this.options.executablePath,
        headless: this.options.headless,
        userDataDir,
        args: this.buildLaunchArgs(proxy?.hostPort),
        timeout: this.options.launchTimeoutMs
      });

      const page = await browser.newPage();
      if (proxy?.auth) {
        await page.authenticate(proxy.auth);
      }
      page.on('console', msg => {
        logger.debug(`Page console: ${msg.text()}`, undefined, 'BROWSER');
      });
      await page.setUserAgent(DEFAULTS.USER_AGENT);
      await page.setViewport({ width: DEFAULTS.VIEWPORT_WIDTH, height: DEFAULTS.VIEWPORT_HEIGHT });

      this.session = { browser, page, userDataDir };
    } catch (error) {
      // Cleanup on failure to prevent resource leaks
      if (browser) {
        await browser.close().catch(e => logger.debug('Browser close failed', { error: String(e) }, 'BROWSER'));
      }
      await this.removeProfile(userDataDir);
      throw new NetworkError(`Failed to launch browser: ${errorMessage(error)}`, { originalError: error });
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;

    try {
      await session.browser.close();
    } catch (e) {
      logger.debug('Browser close failed (may already be closed)', { error: String(e) }, 'BROWSER');
    }
    await this.removeProfile(session.userDataDir);
  }

  async submitSearch(fileNumber: string, timeoutMs: number): Promise<SearchSubmission> {
    const page = this.requirePage();
    const { selectors, registryUrl } = this.options;

    const response = await page.goto(registryUrl, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    const input = await page.$(selectors.searchInput);
    if (!input) {
      logger.warn('Search input not found', { url: page.url() }, 'BROWSER');
      return { formFound: false, page: await this.snapshot(page, response) };
    }

    await input.evaluate(el => {
      if (el instanceof HTMLInputElement) el.value = '';
    });
    await input.type(fileNumber);
    logger.debug('Search form filled', { fileNumber }, 'BROWSER');

    return { formFound: true, page: await this.submitForm(page, timeoutMs) };
  }

  async submitSolution(token: SolvedToken, timeoutMs: number): Promise<PageSnapshot> {
    const page = this.requirePage();

    if (token.challengeKind === CHALLENGE_KINDS.IMAGE) {
      const input = await page.$(this.options.selectors.captchaInput);
      if (!input) {
        throw new SiteChangedError('Image challenge answer field not found', { url: page.url() });
      }
      await input.type(token.value);
    } else {
      await page.evaluate((fieldName: string, value: string) => {
        let fields = Array.from(document.querySelectorAll<HTMLInputElement | HTMLTextAreaElement>(`[name="${fieldName}"]`));
        const form = document.querySelector('form');
        if (fields.length === 0 && form) {
          const hidden = document.createElement('input');
          hidden.type = 'hidden';
          hidden.name = fieldName;
          form.appendChild(hidden);
          fields = [hidden];
        }
        for (const field of fields) {
          field.value = value;
        }
      }, TOKEN_FIELDS[token.challengeKind], token.value);
    }

    logger.debug('Challenge answer placed', { kind: token.challengeKind, jobId: token.jobId }, 'BROWSER');
    return this.submitForm(page, timeoutMs);
  }

  async captureChallengeImage(timeoutMs: number): Promise<string | null> {
    const page = this.requirePage();
    const image = await page.$(this.options.selectors.captchaImage);
    if (!image) return null;
    return withTimeout(image.screenshot({ encoding: 'base64' }), timeoutMs, 'Challenge image capture');
  }

  async screenshot(filePath: ScreenshotPath, timeoutMs: number): Promise<void> {
    const page = this.requirePage();
    await withTimeout(page.screenshot({ path: filePath, fullPage: true }), timeoutMs, 'Screenshot');
  }

  private async submitForm(page: Page, timeoutMs: number): Promise<PageSnapshot> {
    const submit = await page.$(this.options.selectors.searchSubmit);
    if (!submit) {
      throw new SiteChangedError('Form submit control not found', { url: page.url() });
    }
    const [response] = await Promise.all([
      page.waitForNavigation({ waitUntil: 'domcontentloaded', timeout: timeoutMs }),
      submit.click()
    ]);
    return this.snapshot(page, response);
  }

  private async snapshot(page: Page, response: HTTPResponse | null): Promise<PageSnapshot> {
    return {
      url: page.url(),
      html: await page.content(),
      status: response ? response.status() : null
    };
  }

  private requirePage(): Page {
    if (!this.session) {
      throw new NetworkError('Browser session is not open');
    }
    return this.session.page;
  }

  private async removeProfile(userDataDir: string): Promise<void> {
    try {
      await fs.promises.rm(userDataDir, { recursive: true, force: true });
    } catch (e) {
      logger.debug('User data dir cleanup failed', { error: String(e) }, 'BROWSER');
    }
  }

  private buildLaunchArgs(proxyHostPort?: string): string[] {
    const args = [
      // Security/sandbox
      '--no-sandbox',
      '--disable-setuid-sandbox',

      // Performance
      '--disable-dev-shm-usage',
      '--disable-accelerated-2d-canvas',
      '--disable-gpu',

      // Display
      `--window-size=${DEFAULTS.VIEWPORT_WIDTH},${DEFAULTS.VIEWPORT_HEIGHT}`,
      '--font-render-hinting=none',

      '--disable-background-networking',
      '--disable-default-apps',
      '--disable-sync',
      '--disable-translate',
      '--disable-notifications',
      '--no-first-run',
      '--no-default-browser-check'
    ];

    if (proxyHostPort) {
      // Credentials go through page.authenticate, never the flag
      args.push(`--proxy-server=${proxyHostPort}`);
    }
    return args;
  }
}
