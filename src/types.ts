export interface ScanRequest {
  sitemapUrl?: string;
  siteUrl?: string; // Used for robots.txt / well-known sitemap discovery when no sitemap is given
  match: string; // Substring an iframe src must contain to qualify
  maxRetries: number;
  renderTimeoutMs: number;
  settleDelayMs: number; // Extra wait after navigation for async DOM mutations
  retryDelayMs: number;
  sessionRecoveryDelayMs: number;
  requestDelayMs: number; // Pause between consecutive URLs
  outputDir: string;
  bucket?: string;
  snapshotDir?: string;
  profile?: string;
  headless: boolean;
  userAgent?: string;
}

export interface IframeRecord {
  pageUrl: string;
  srcUrl: string;
  iframeHtml: string; // Outer HTML of the iframe as rendered, noscript content removed
}

export interface MatchedResult {
  status: 'matched';
  pageUrl: string;
  entries: IframeRecord[];
  attempts: number;
}

export interface NoMatchResult {
  status: 'no-match';
  pageUrl: string;
  html: string;
  attempts: number;
}

export interface FailedResult {
  status: 'failed';
  pageUrl: string;
  attempts: number;
  error: string;
}

export type PageResult = MatchedResult | NoMatchResult | FailedResult;

export interface ScanBuckets {
  matched: IframeRecord[];
  noMatch: NoMatchResult[];
  failed: FailedResult[];
}

export interface RenderOptions {
  timeoutMs: number;
  settleMs: number;
}

export interface BrowserSession {
  readonly id: number;
  render(url: string, options: RenderOptions): Promise<string>;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<BrowserSession>;
