import { chromium, errors, Browser, BrowserContext, Page } from 'playwright';
import { RenderTimeoutError, ScoutError, SessionInvalidError, TransportError, toErrorMessage } from './errors';
import { BrowserSession, RenderOptions, SessionFactory } from './types';
import { debug } from './utils';

// Playwright reports a dead browser/context/page this way
const CLOSED_TARGET = /Target (page, context or browser )?(has been )?closed|Browser has been closed|browser has disconnected/i;

let nextSessionId = 1;

export interface LaunchOptions {
  headless: boolean;
  userAgent?: string;
}

/**
 * One Chromium browser plus a single context. Pages are opened per render and
 * closed afterwards; the browser lives until the session is discarded.
 */
export class PlaywrightSession implements BrowserSession {
  readonly id: number;
  private browser: Browser;
  private context: BrowserContext;

  private constructor(browser: Browser, context: BrowserContext) {
    this.id = nextSessionId++;
    this.browser = browser;
    this.context = context;
  }

  static async launch(options: LaunchOptions): Promise<PlaywrightSession> {
    const browser = await chromium.launch({ headless: options.headless });
    try {
      const context = await browser.newContext(options.userAgent ? { userAgent: options.userAgent } : {});
      return new PlaywrightSession(browser, context);
    } catch (error) {
      await browser.close().catch((closeError: unknown) => debug(`browser close after failed launch: ${toErrorMessage(closeError)}`));
      throw error;
    }
  }

  async render(url: string, options: RenderOptions): Promise<string> {
    if (!this.browser.isConnected()) {
      throw new SessionInvalidError(`Browser session ${this.id} is disconnected`, this.id);
    }

    let page: Page;
    try {
      page = await this.context.newPage();
    } catch (error) {
      throw this.classify(error, url, options.timeoutMs);
    }

    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
      // Let scripts inject late content (embedded forms are often added after load)
      if (options.settleMs > 0) await page.waitForTimeout(options.settleMs);
      return await page.content();
    } catch (error) {
      throw this.classify(error, url, options.timeoutMs);
    } finally {
      await page.close().catch((closeError: unknown) => debug(`page close failed for ${url}: ${toErrorMessage(closeError)}`));
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }

  private classify(error: unknown, url: string, timeoutMs: number): ScoutError {
    if (error instanceof ScoutError) return error;
    if (error instanceof errors.TimeoutError) return new RenderTimeoutError(url, timeoutMs);

    const message = toErrorMessage(error);
    if (!this.browser.isConnected() || CLOSED_TARGET.test(message)) {
      return new SessionInvalidError(message, this.id);
    }
    return new TransportError(message, url);
  }
}

export function playwrightSessionFactory(options: LaunchOptions): SessionFactory {
  return () => PlaywrightSession.launch(options);
}
