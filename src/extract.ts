import * as cheerio from 'cheerio';
import { IframeRecord } from './types';

/**
 * Finds the iframes on a rendered page whose src contains `match`.
 *
 * `<noscript>` subtrees are dropped first, so inert fallback markup is never reported.
 */
export function extractIframes(html: string, pageUrl: string, match: string): IframeRecord[] {
  const $ = cheerio.load(html);
  $('noscript').remove();

  const records: IframeRecord[] = [];
  $('iframe[src]').each((_, iframe) => {
    const src = $(iframe).attr('src');
    if (src === undefined || !src.includes(match)) return;

    records.push({
      pageUrl,
      srcUrl: src,
      iframeHtml: $.html(iframe),
    });
  });

  return records;
}
