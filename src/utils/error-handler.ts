// src/utils/error-handler.ts

interface ErrorDetails {
  originalError?: unknown;
  url?: string;
  code?: string;
  reason?: string;
  [key: string]: unknown;
}

/**
 * Base custom error class for the extractor.
 * Represents operational errors that a run is designed to handle.
 */
export class ScraperError extends Error {
  public details?: ErrorDetails;
  public timestamp: string;

  constructor(message: string, details?: ErrorDetails) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Keeps `instanceof` working for subclasses after transpilation.
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error specific to configuration issues and invalid run inputs.
 */
export class ConfigurationError extends ScraperError {}

/**
 * Error specific to browser navigation against the registry.
 */
export class NetworkError extends ScraperError {}

/**
 * Base class for failures of the challenge-solving service.
 */
export class CaptchaError extends ScraperError {}

/**
 * The solving service explicitly rejected the challenge or reported it unsolvable.
 */
export class CaptchaSolveError extends CaptchaError {}

/**
 * The run deadline elapsed while waiting on the solving service.
 */
export class CaptchaTimeoutError extends CaptchaError {}

/**
 * The solving service could not be reached after repeated transport failures.
 */
export class CaptchaServiceUnavailable extends CaptchaError {}

/**
 * A recognised results page lacks a mandatory field.
 */
export class ParseError extends ScraperError {}

/**
 * The registry served markup no known template describes.
 */
export class SiteChangedError extends ScraperError {}

/**
 * The shared run budget is exhausted.
 */
export class RunTimeoutError extends ScraperError {}

export class InvalidTransitionError extends ScraperError {}

export class ArtifactWriteError extends ScraperError {}

export function isDeadlineError(error: unknown): boolean {
  return error instanceof RunTimeoutError || error instanceof CaptchaTimeoutError;
}

export function formatErrorForLogging(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}\n${error.stack || ''}`;
  }
  return String(error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
