#!/usr/bin/env node
import 'dotenv/config';
import path from 'node:path';
import { loadConfig } from './config.js';
import { LinkExtractor } from './extractor.js';
import { HttpClient } from './http.js';
import { Monitor } from './monitor.js';
import { PushoverNotifier } from './notifier.js';
import { LinkStore } from './storage.js';

async function main() {
  const config = loadConfig();
  const http = new HttpClient({
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs
  });

  const monitor = new Monitor({
    websiteUrl: config.websiteUrl,
    extractor: new LinkExtractor(http),
    store: new LinkStore(path.resolve(config.statePath)),
    notifier: new PushoverNotifier(http, config.pushover)
  });

  const outcome = await monitor.run();
  console.log(`[monitor] done: ${outcome.status}`);
}

// Failures are reported in the log only; the exit code stays 0.
main().catch((err) => {
  console.error('[monitor] failed', err);
});
