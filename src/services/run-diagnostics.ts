import fs from 'fs/promises';
import path from 'path';
import type { BrowserPort, ScreenshotPath } from '../ports/browser.js';
import type { DiagnosticLogEntry, RunDiagnostics, RunRequest, TransitionEvent } from '../domain/models.js';
import type { RunStatusValue } from '../constants.js';
import { DEFAULTS } from '../constants.js';
import { utcNow } from '../utils/date.js';
import { errorMessage } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export interface RunDiagnosticsOptions {
  logDir: string;
  saveHtmlSnapshots: boolean;
  screenshotTimeoutMs: number;
}

function sequencePrefix(seq: number): string {
  return String(seq).padStart(2, '0');
}

/**
 * Per-run diagnostics under `<logDir>/<requestId>/`: a JSONL trail of every
 * transition plus a screenshot (and optionally the HTML) of the page at each one.
 * Failures here are logged and never end the run.
 */
export class RunDiagnosticsRecorder {
  readonly dir: string;
  readonly logPath: string;
  private readonly screenshots: string[] = [];
  private readonly htmlSnapshots: string[] = [];
  private seq = 0;
  private finished = false;

  constructor(
    private readonly requestId: string,
    private readonly browser: BrowserPort,
    private readonly options: RunDiagnosticsOptions
  ) {
    this.dir = path.join(options.logDir, requestId);
    this.logPath = path.join(this.dir, DEFAULTS.RUN_LOG_FILE);
  }

  async start(request: RunRequest): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
    } catch (error) {
      logger.error('Failed to create diagnostics directory', { dir: this.dir, error: errorMessage(error) }, 'DIAGNOSTICS');
    }
    await this.append({
      ts: utcNow(),
      event: 'run_started',
      request_id: this.requestId,
      file_number: request.fileNumber
    });
  }

  async recordTransition(event: TransitionEvent): Promise<void> {
    // A navigation abandoned at the deadline may still report late transitions
    if (this.finished) return;

    const seq = ++this.seq;
    const base = path.join(this.dir, `${sequencePrefix(seq)}-${event.to}`);

    const screenshot = await this.captureScreenshot(`${base}.png`);
    if (this.options.saveHtmlSnapshots && event.page) {
      await this.saveHtml(`${base}.html`, event.page.html);
    }

    await this.append({
      ts: event.at,
      event: 'transition',
      request_id: this.requestId,
      seq,
      from: event.from,
      to: event.to,
      elapsed_ms: event.elapsedMs,
      detail: event.detail,
      screenshot
    });
  }

  async finish(status: RunStatusValue, error: string | null): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    await this.append({
      ts: utcNow(),
      event: 'run_finished',
      request_id: this.requestId,
      status,
      error
    });
  }

  summary(): RunDiagnostics {
    return {
      logPath: this.logPath,
      screenshotPaths: [...this.screenshots],
      htmlSnapshotPaths: [...this.htmlSnapshots]
    };
  }

  private async captureScreenshot(filePath: ScreenshotPath): Promise<string | null> {
    try {
      await this.browser.screenshot(filePath, this.options.screenshotTimeoutMs);
      this.screenshots.push(filePath);
      return filePath;
    } catch (error) {
      logger.warn('Screenshot failed', { filePath, error: errorMessage(error) }, 'DIAGNOSTICS');
      return null;
    }
  }

  private async saveHtml(filePath: string, html: string): Promise<void> {
    try {
      await fs.writeFile(filePath, html);
      this.htmlSnapshots.push(filePath);
    } catch (error) {
      logger.warn('HTML snapshot failed', { filePath, error: errorMessage(error) }, 'DIAGNOSTICS');
    }
  }

  private async append(entry: DiagnosticLogEntry): Promise<void> {
    try {
      await fs.appendFile(this.logPath, JSON.stringify(entry) + '\n');
    } catch (error) {
      logger.error('Failed to write diagnostics log', { logPath: this.logPath, error: errorMessage(error) }, 'DIAGNOSTICS');
    }
  }
}
