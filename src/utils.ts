import * as crypto from 'crypto';

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function debug(message: string, ...args: unknown[]): void {
  if (process.env.DEBUG) console.debug(`[debug] ${message}`, ...args);
}

export function getUrlHash(url: string): string {
  return crypto.createHash('md5').update(url).digest('hex');
}

const MAX_NAME_LENGTH = 150;

/**
 * Turns a page URL into a name usable as a file name or object key. The md5
 * suffix keeps URLs that flatten to the same characters apart.
 * e.g. https://www.example.com/contact/?a=1 -> www.example.com_contact_a_1_<md5-8>
 */
export function safeName(url: string): string {
  let name = url
    .replace(/^[a-z][a-z0-9+.-]*:\/\//i, '')
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (!name) name = 'index';
  return `${name.slice(0, MAX_NAME_LENGTH)}_${getUrlHash(url).slice(0, 8)}`;
}
