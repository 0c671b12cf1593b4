/**
 * Error types shared across the brief pipeline.
 */

/**
 * Extract error message from unknown error.
 * @param error - Unknown value from catch block
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Configuration could not be loaded or is invalid
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The current-events page could not be fetched.
 */
export class ScrapeError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ScrapeError';
  }
}

/**
 * The page was fetched but listed no events for the day.
 */
export class NoEventsError extends Error {
  constructor(readonly portalDate: string) {
    super(`No events found on Wikipedia for ${portalDate}`);
    this.name = 'NoEventsError';
  }
}

export type LlmResponseErrorKind = 'no-json' | 'invalid-json' | 'invalid-shape';

export class LlmResponseError extends Error {
  constructor(
    readonly kind: LlmResponseErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'LlmResponseError';
  }
}
