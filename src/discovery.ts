import axios from 'axios';
import { XMLParser } from 'fast-xml-parser';
import { URL } from 'url';
import { SitemapFetchError, toErrorMessage } from './errors';

const COMMON_SITEMAPS = ['/sitemap.xml', '/sitemap_index.xml', '/wp-sitemap.xml'];
const SITEMAP_TIMEOUT_MS = 10000;

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function locOf(entry: unknown): string | undefined {
  if (!isNode(entry) || typeof entry.loc !== 'string') return undefined;
  return entry.loc.trim() || undefined;
}

export class DiscoveryService {
  private parser = new XMLParser({ parseTagValue: false });

  /**
   * Every page URL listed by the sitemap, in document order. Sitemap indexes are
   * followed depth-first. Any failure is logged and yields an empty list.
   */
  async getUrlsFromSitemap(sitemapUrl: string): Promise<string[]> {
    try {
      return await this.fetchSitemap(sitemapUrl, new Set());
    } catch (e) {
      const error = e instanceof SitemapFetchError ? e : new SitemapFetchError(toErrorMessage(e), sitemapUrl);
      console.error(error.message);
      return [];
    }
  }

  /**
   * Looks for sitemaps of a site through robots.txt, then the usual locations.
   */
  async discover(siteUrl: string): Promise<string[]> {
    const baseUrl = new URL(siteUrl).origin;
    console.log(`Starting discovery for ${baseUrl}...`);

    const urls: string[] = [];
    for (const sitemapUrl of await this.getSitemapsFromRobotsTxt(baseUrl)) {
      urls.push(...(await this.getUrlsFromSitemap(sitemapUrl)));
    }

    if (urls.length === 0) {
      for (const path of COMMON_SITEMAPS) {
        urls.push(...(await this.getUrlsFromSitemap(`${baseUrl}${path}`)));
        if (urls.length > 0) break;
      }
    }

    console.log(`Discovery found ${urls.length} URLs.`);
    return urls;
  }

  private async getSitemapsFromRobotsTxt(baseUrl: string): Promise<string[]> {
    const robotsUrl = `${baseUrl}/robots.txt`;
    try {
      console.log(`Checking ${robotsUrl}...`);
      const response = await axios.get<string>(robotsUrl, {
        responseType: 'text',
        timeout: SITEMAP_TIMEOUT_MS,
        validateStatus: () => true,
      });
      if (response.status !== 200 || typeof response.data !== 'string') return [];

      return response.data
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.toLowerCase().startsWith('sitemap:'))
        .map((line) => line.slice('sitemap:'.length).trim())
        .filter((url) => url.length > 0);
    } catch (e) {
      console.warn(`Could not read ${robotsUrl}: ${toErrorMessage(e)}`);
      return [];
    }
  }

  private async fetchSitemap(url: string, seen: Set<string>): Promise<string[]> {
    if (seen.has(url)) return [];
    seen.add(url);

    console.log(`Fetching sitemap: ${url}`);
    let xml: string;
    try {
      const response = await axios.get<string>(url, { responseType: 'text', timeout: SITEMAP_TIMEOUT_MS });
      xml = response.data;
    } catch (e) {
      throw new SitemapFetchError(toErrorMessage(e), url);
    }

    const parsed: unknown = this.parser.parse(xml);
    const root: XmlNode = isNode(parsed) ? parsed : {};

    // Handle Sitemap Index
    if ('sitemapindex' in root) {
      const index = root.sitemapindex;
      const urls: string[] = [];
      for (const sitemap of isNode(index) ? asArray(index.sitemap) : []) {
        const loc = locOf(sitemap);
        if (!loc) continue;
        try {
          urls.push(...(await this.fetchSitemap(loc, seen)));
        } catch (e) {
          // Skip a broken child sitemap, keep the rest
          console.error(toErrorMessage(e));
        }
      }
      return urls;
    }

    // Handle Urlset
    if ('urlset' in root) {
      const urlset = root.urlset;
      const urls: string[] = [];
      for (const entry of isNode(urlset) ? asArray(urlset.url) : []) {
        const loc = locOf(entry);
        if (loc) urls.push(loc);
      }
      return urls;
    }

    throw new SitemapFetchError('document has no <urlset> or <sitemapindex>', url);
  }
}
