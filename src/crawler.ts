import { PageProcessor, ProcessorOptions } from './processor';
import { SessionManager } from './session';
import { ScanBuckets, SessionFactory } from './types';
import { sleep } from './utils';

export interface CrawlerOptions extends ProcessorOptions {
  requestDelayMs: number;
}

export class Crawler {
  private processor: PageProcessor;

  constructor(private readonly options: CrawlerOptions, private readonly sessionFactory: SessionFactory) {
    this.processor = new PageProcessor(options);
  }

  /**
   * Processes `urls` one at a time, in order, over a single browser session that
   * is opened on first use and always closed before returning.
   */
  async run(urls: string[]): Promise<ScanBuckets> {
    const buckets: ScanBuckets = { matched: [], noMatch: [], failed: [] };
    if (urls.length === 0) return buckets;

    const sessions = new SessionManager(this.sessionFactory);
    try {
      for (const [index, url] of urls.entries()) {
        if (index > 0) await sleep(this.options.requestDelayMs);
        console.log(`[${index + 1}/${urls.length}] Crawling: ${url}`);

        const result = await this.processor.process(url, sessions);
        switch (result.status) {
          case 'matched':
            buckets.matched.push(...result.entries);
            break;
          case 'no-match':
            buckets.noMatch.push(result);
            break;
          case 'failed':
            buckets.failed.push(result);
            break;
        }
      }
    } finally {
      await sessions.close();
    }

    return buckets;
  }
}
