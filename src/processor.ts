import { SessionInvalidError, toErrorMessage } from './errors';
import { extractIframes } from './extract';
import { SessionManager } from './session';
import { PageResult } from './types';
import { sleep } from './utils';

export interface ProcessorOptions {
  match: string;
  maxRetries: number;
  renderTimeoutMs: number;
  settleDelayMs: number;
  retryDelayMs: number;
  sessionRecoveryDelayMs: number;
}

export class PageProcessor {
  constructor(private readonly options: ProcessorOptions) {}

  /**
   * Renders `url` and classifies it as matched, no-match or failed. Never throws.
   *
   * Only errors consume retries: a page that renders without a qualifying
   * iframe is a final answer, and so is the first successful match.
   */
  async process(url: string, sessions: SessionManager, maxRetries = this.options.maxRetries): Promise<PageResult> {
    let lastError = 'no attempts made';

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const session = sessions.current() ?? (await sessions.create());
        const html = await session.render(url, {
          timeoutMs: this.options.renderTimeoutMs,
          settleMs: this.options.settleDelayMs,
        });

        const entries = extractIframes(html, url, this.options.match);
        if (entries.length > 0) {
          console.log(`Found ${entries.length} iframe(s) on ${url} (attempt ${attempt}/${maxRetries})`);
          return { status: 'matched', pageUrl: url, entries, attempts: attempt };
        }

        console.warn(`No matching iframe on ${url}`);
        return { status: 'no-match', pageUrl: url, html, attempts: attempt };
      } catch (error) {
        lastError = toErrorMessage(error);
        console.error(`Attempt ${attempt}/${maxRetries} failed for ${url}: ${lastError}`);

        const hasBudget = attempt < maxRetries;
        if (error instanceof SessionInvalidError) {
          await this.recoverSession(sessions);
          if (hasBudget) await sleep(this.options.sessionRecoveryDelayMs);
        }
        if (hasBudget) await sleep(this.options.retryDelayMs);
      }
    }

    console.error(`Skipping ${url} after ${maxRetries} failed attempts`);
    return { status: 'failed', pageUrl: url, attempts: maxRetries, error: lastError };
  }

  private async recoverSession(sessions: SessionManager): Promise<void> {
    try {
      const session = await sessions.create();
      console.log(`Recreated browser session (now #${session.id})`);
    } catch (error) {
      // The next attempt will try to create one again
      console.error(`Could not recreate browser session: ${toErrorMessage(error)}`);
    }
  }
}
