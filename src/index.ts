#!/usr/bin/env node
import fs from 'fs';

import { initConfig } from './config.js';
import { parseRunRequest } from './domain/index.js';
import { RunOrchestrator, orchestratorOptionsFromConfig } from './core/orchestrator.js';
import { PuppeteerBrowserAdapter, browserOptionsFromConfig } from './adapters/puppeteer-browser.js';
import { SolveCaptchaAdapter, solverOptionsFromConfig } from './adapters/solvecaptcha.js';
import { artifactPath } from './services/artifact-writer.js';
import { generateRequestId } from './utils/request-id.js';
import { formatErrorForLogging } from './utils/error-handler.js';
import { logger } from './utils/logger.js';
import { VERSION } from './constants.js';

process.on('uncaughtException', (error) => {
  console.error('[FATAL] Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('[FATAL] Unhandled Rejection at:', promise, 'Reason:', reason);
  process.exit(1);
});

async function main(): Promise<number> {
  // Initialize and validate all configuration at startup
  const config = initConfig();

  const request = parseRunRequest({
    fileNumber: process.argv[2] || config.fileNumber,
    requestId: config.requestId || generateRequestId(),
    deadlineMs: config.runDeadlineMs
  });

  try {
    await fs.promises.access(config.executablePath);
    logger.info(`Chromium found at: ${config.executablePath}`, undefined, 'CHROMIUM');
  } catch {
    logger.warn(`Chromium executable not found at: ${config.executablePath}`, undefined, 'CHROMIUM');
  }

  logger.info(`Registry extractor v${VERSION}`, { requestId: request.requestId });

  const orchestrator = new RunOrchestrator(
    {
      browser: new PuppeteerBrowserAdapter(browserOptionsFromConfig(config)),
      solver: new SolveCaptchaAdapter(solverOptionsFromConfig(config))
    },
    orchestratorOptionsFromConfig(config)
  );

  const result = await orchestrator.run(request);
  console.log(`${result.status}: ${artifactPath(config.outputDir, request.requestId)}`);
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Run aborted before an artifact was written', { error: formatErrorForLogging(error) });
    process.exitCode = 1;
  }
);
