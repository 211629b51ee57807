/**
 * Errors raised by the browser session. Tool handlers turn these into the
 * text payloads returned to the MCP client.
 */

export type ScraperErrorCode =
  | 'INVALID_INPUT'
  | 'SESSION_NOT_READY'
  | 'NAVIGATION_FAILED'
  | 'NAVIGATION_TIMEOUT'
  | 'BROWSER_UNAVAILABLE';

export class ScraperError extends Error {
  readonly code: ScraperErrorCode;

  constructor(code: ScraperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends ScraperError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export class SessionNotReadyError extends ScraperError {
  constructor(message = 'No page loaded. Use navigate_to_url first.') {
    super('SESSION_NOT_READY', message);
  }
}

export class NavigationError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super('NAVIGATION_FAILED', message, { cause });
  }
}

export class NavigationTimeoutError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super('NAVIGATION_TIMEOUT', message, { cause });
  }
}

export class BrowserUnavailableError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super('BROWSER_UNAVAILABLE', message, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
