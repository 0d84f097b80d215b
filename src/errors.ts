/**
 * Base error class for iframe-scout.
 */
export class ScoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScoutError';
    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Network or navigation failure while loading a page. Retryable.
 */
export class TransportError extends ScoutError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = 'TransportError';
    this.url = url;
  }
}

/**
 * The page did not finish rendering within the configured timeout.
 */
export class RenderTimeoutError extends TransportError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Render of ${url} timed out after ${timeoutMs}ms`, url);
    this.name = 'RenderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The browser session itself is closed or disconnected and must be recreated.
 */
export class SessionInvalidError extends ScoutError {
  public readonly sessionId: number;

  constructor(message: string, sessionId: number) {
    super(message);
    this.name = 'SessionInvalidError';
    this.sessionId = sessionId;
  }
}

export class SitemapFetchError extends ScoutError {
  public readonly sitemapUrl: string;

  constructor(message: string, sitemapUrl: string) {
    super(`Failed to fetch/parse sitemap ${sitemapUrl}: ${message}`);
    this.name = 'SitemapFetchError';
    this.sitemapUrl = sitemapUrl;
  }
}

export class ConfigError extends ScoutError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
