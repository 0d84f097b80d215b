import { toErrorMessage } from './errors';
import { BrowserSession, SessionFactory } from './types';
import { debug } from './utils';

/**
 * Owns the one live browser session. Only the sequential crawl loop touches it,
 * so there is no locking.
 */
export class SessionManager {
  private session: BrowserSession | undefined;

  constructor(private readonly factory: SessionFactory) {}

  /** Discards the current session (if any) and starts a fresh one. */
  async create(): Promise<BrowserSession> {
    await this.release();
    this.session = await this.factory();
    debug(`browser session ${this.session.id} created`);
    return this.session;
  }

  current(): BrowserSession | undefined {
    return this.session;
  }

  async close(): Promise<void> {
    await this.release();
  }

  // Close is best-effort: a broken session must never block its replacement
  private async release(): Promise<void> {
    const previous = this.session;
    this.session = undefined;
    if (!previous) return;

    try {
      await previous.close();
    } catch (error) {
      debug(`ignoring close failure for session ${previous.id}: ${toErrorMessage(error)}`);
    }
  }
}
