#!/usr/bin/env node
import * as dotenv from "dotenv";
import { playwrightSessionFactory } from "./browser";
import { loadConfig, USAGE } from "./config";
import { Crawler } from "./crawler";
import { DiscoveryService } from "./discovery";
import { ConfigError } from "./errors";
import { ArtifactSink, LocalSink, S3Sink, writeResults } from "./output";
import { ScanRequest } from "./types";

dotenv.config();

async function resolveUrls(request: ScanRequest): Promise<string[]> {
  const discovery = new DiscoveryService();
  if (request.sitemapUrl) return discovery.getUrlsFromSitemap(request.sitemapUrl);
  if (request.siteUrl) return discovery.discover(request.siteUrl);
  return [];
}

async function main() {
  let request: ScanRequest;
  try {
    request = loadConfig(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.error(error.message);
    console.error(USAGE);
    process.exit(1);
  }

  // Set AWS Profile
  if (request.profile) {
    process.env.AWS_PROFILE = request.profile;
    console.log(`Using AWS Profile: ${request.profile}`);
  }

  const urls = await resolveUrls(request);
  console.log(`Running in sequential mode. Processing ${urls.length} URLs (matching "${request.match}")...`);

  const crawler = new Crawler(
    request,
    playwrightSessionFactory({ headless: request.headless, userAgent: request.userAgent }),
  );
  const buckets = await crawler.run(urls);

  const sink: ArtifactSink = request.bucket ? new S3Sink(request.bucket) : new LocalSink(request.outputDir);
  console.log(`Saving results to ${sink.location}...`);
  await writeResults(buckets, sink, { snapshotDir: request.snapshotDir });

  if (buckets.failed.length > 0) {
    console.warn(`${buckets.failed.length} URLs failed due to errors.`);
  }
  if (buckets.noMatch.length > 0) {
    console.warn(`${buckets.noMatch.length} URLs had no matching iframe.`);
  }
  console.log(`Processing complete. ${buckets.matched.length} matching iframes found.`);
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
