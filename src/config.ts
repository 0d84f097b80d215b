import * as path from 'path';
import { ConfigError } from './errors';
import { ScanRequest } from './types';

export const DEFAULT_MATCH = 'contact.sigma-rh.com';

export const USAGE =
  'Usage: node dist/index.js (--sitemap=<url> | --url=<site>) [--match=<substring>] [--retries=<n>] ' +
  '[--render-timeout=<ms>] [--settle=<ms>] [--retry-delay=<ms>] [--recovery-delay=<ms>] [--delay=<ms>] ' +
  '[--output-dir=<dir> | --bucket=<bucket>] [--snapshot-dir=<dir>] [--profile=<profile>] [--headed] [--user-agent=<ua>]';

type Env = Record<string, string | undefined>;

function flag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

function pick(...values: (string | undefined)[]): string | undefined {
  return values.find((v) => v !== undefined && v !== '');
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw.trim())) throw new ConfigError(`${name} must be a whole number, got "${raw}"`);
  const value = parseInt(raw, 10);
  if (value < min) throw new ConfigError(`${name} must be at least ${min}, got ${value}`);
  return value;
}

/**
 * Builds the scan settings from CLI flags, falling back to environment
 * variables and then to defaults.
 */
export function loadConfig(args: string[], env: Env = process.env): ScanRequest {
  const sitemapUrl = pick(flag(args, 'sitemap'), env.SITEMAP_URL);
  const siteUrl = pick(flag(args, 'url'), env.SITE_URL);
  if (!sitemapUrl && !siteUrl) throw new ConfigError('Either --sitemap or --url is required');

  for (const url of [sitemapUrl, siteUrl]) {
    if (url === undefined) continue;
    try {
      new URL(url);
    } catch {
      throw new ConfigError(`Not a valid URL: ${url}`);
    }
  }

  const matchFlag = flag(args, 'match');
  if (matchFlag === '') throw new ConfigError('The iframe match substring must not be empty');
  const match = pick(matchFlag, env.IFRAME_MATCH) ?? DEFAULT_MATCH;

  // Snapshots are written through the same sink as the other artifacts
  const snapshotDir = pick(flag(args, 'snapshot-dir'), env.SNAPSHOT_DIR);
  if (snapshotDir !== undefined && path.isAbsolute(snapshotDir)) {
    throw new ConfigError(`snapshot-dir must be relative to the output location, got "${snapshotDir}"`);
  }

  return {
    sitemapUrl,
    siteUrl,
    match,
    maxRetries: parseInteger('retries', pick(flag(args, 'retries'), env.MAX_RETRIES), 3, 1),
    renderTimeoutMs: parseInteger('render-timeout', pick(flag(args, 'render-timeout'), env.RENDER_TIMEOUT_MS), 30000, 1),
    settleDelayMs: parseInteger('settle', pick(flag(args, 'settle'), env.SETTLE_DELAY_MS), 2000, 0),
    retryDelayMs: parseInteger('retry-delay', pick(flag(args, 'retry-delay'), env.RETRY_DELAY_MS), 5000, 0),
    sessionRecoveryDelayMs: parseInteger(
      'recovery-delay',
      pick(flag(args, 'recovery-delay'), env.SESSION_RECOVERY_DELAY_MS),
      2000,
      0,
    ),
    requestDelayMs: parseInteger('delay', pick(flag(args, 'delay'), env.REQUEST_DELAY_MS), 0, 0),
    outputDir: pick(flag(args, 'output-dir'), env.OUTPUT_DIR) ?? '.',
    bucket: pick(flag(args, 'bucket'), env.S3_BUCKET),
    snapshotDir,
    profile: pick(flag(args, 'profile'), env.AWS_PROFILE),
    headless: !args.includes('--headed') && env.HEADLESS !== '0',
    userAgent: pick(flag(args, 'user-agent'), env.USER_AGENT),
  };
}
