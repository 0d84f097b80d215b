import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import * as fs from 'fs';
import * as path from 'path';
import { ScanBuckets } from './types';
import { safeName } from './utils';

export const MATCHES_FILE = 'iframes.csv';
export const NO_MATCH_FILE = 'no_iframes.csv';
export const FAILED_FILE = 'failed_urls.txt';

export interface ArtifactSink {
  readonly location: string;
  write(key: string, body: string, contentType: string): Promise<void>;
}

export class LocalSink implements ArtifactSink {
  constructor(private readonly dir: string) {}

  get location(): string {
    return this.dir;
  }

  async write(key: string, body: string, _contentType?: string): Promise<void> {
    const filePath = path.join(this.dir, key);
    const fileDir = path.dirname(filePath);
    if (!fs.existsSync(fileDir)) fs.mkdirSync(fileDir, { recursive: true });
    fs.writeFileSync(filePath, body, 'utf-8');
  }
}

export class S3Sink implements ArtifactSink {
  private client: S3Client;

  constructor(private readonly bucket: string, client?: S3Client) {
    // Credentials come from AWS_PROFILE / the default provider chain
    this.client = client ?? new S3Client({ region: process.env.AWS_REGION || 'eu-central-1' });
  }

  get location(): string {
    return `s3://${this.bucket}`;
  }

  async write(key: string, body: string, contentType: string): Promise<void> {
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }));
      console.log(`Successfully uploaded ${key} to ${this.bucket}`);
    } catch (error) {
      console.error(`Error uploading ${key} to S3: ${error}`);
      throw error;
    }
  }
}

function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

export function toCsv(headers: string[], rows: string[][]): string {
  const lines = [headers, ...rows].map((row) => row.map(csvEscape).join(','));
  return `${lines.join('\n')}\n`;
}

export interface WriteOptions {
  snapshotDir?: string;
}

/**
 * Persists the three result sets. The matches file is always written (header
 * only when nothing matched); the other two only when they have entries.
 * Returns the keys written, in order.
 */
export async function writeResults(buckets: ScanBuckets, sink: ArtifactSink, options: WriteOptions = {}): Promise<string[]> {
  const written: string[] = [];

  const matchRows = buckets.matched.map((r) => [r.pageUrl, r.srcUrl, r.iframeHtml]);
  await sink.write(MATCHES_FILE, toCsv(['page_url', 'src_url', 'iframe_html'], matchRows), 'text/csv');
  written.push(MATCHES_FILE);

  if (buckets.noMatch.length > 0) {
    await sink.write(NO_MATCH_FILE, toCsv(['page_url'], buckets.noMatch.map((r) => [r.pageUrl])), 'text/csv');
    written.push(NO_MATCH_FILE);

    if (options.snapshotDir) {
      for (const result of buckets.noMatch) {
        const key = path.posix.join(options.snapshotDir, `${safeName(result.pageUrl)}.html`);
        await sink.write(key, result.html, 'text/html');
        written.push(key);
      }
    }
  }

  if (buckets.failed.length > 0) {
    const body = buckets.failed.map((r) => `${r.pageUrl}\n`).join('');
    await sink.write(FAILED_FILE, body, 'text/plain');
    written.push(FAILED_FILE);
  }

  return written;
}
