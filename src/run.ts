#!/usr/bin/env node
/**
 * Scheduled entry point: check every tracked product once.
 *
 * Prints the run summary as JSON, stores a copy under <DATA_DIR>/runs/ for the
 * report generator, and exits non-zero when the run failed as a whole.
 */

import { realpathSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, type PriceWatchConfig } from './config.js';
import { CostTracker, FileLedgerStore } from './cost/tracker.js';
import { ChangeDetector } from './detector/index.js';
import { PriceExtractor } from './extractor/index.js';
import { EmailChannel } from './notifications/channels/email.js';
import { SmsChannel } from './notifications/channels/sms.js';
import type { ChannelSender } from './notifications/channels/types.js';
import { NotificationDispatcher } from './notifications/dispatcher.js';
import { runPriceCheck } from './orchestrator/index.js';
import { OpenAIExtractionProvider } from './providers/openai/index.js';
import { HttpPageReader } from './providers/page/index.js';
import { TavilyExtractProvider, TavilySearchProvider } from './providers/tavily/index.js';
import { FileStateStore } from './store/state-store.js';
import type { RunSummary } from './types.js';

/**
 * Channels with complete credentials
 */
export function configuredChannels(config: PriceWatchConfig): ChannelSender[] {
  const channels: ChannelSender[] = [];
  if (config.email.apiKey) {
    channels.push(new EmailChannel({ apiKey: config.email.apiKey, from: config.email.from }));
  } else {
    console.warn('[run] RESEND_API_KEY not set, email alerts disabled');
  }
  if (config.sms.accountSid && config.sms.authToken && config.sms.fromNumber) {
    channels.push(new SmsChannel({ ...config.sms, timeoutMs: config.httpTimeoutMs }));
  } else {
    console.warn('[run] Twilio credentials not set, SMS alerts disabled');
  }
  return channels;
}

/**
 * Wire the pipeline from configuration and run it once
 */
export async function runOnce(config: PriceWatchConfig, signal?: AbortSignal): Promise<RunSummary> {
  const store = new FileStateStore(config.dataDir, { pendingClaimTimeoutMs: config.pendingClaimTimeoutMs });
  const costs = new CostTracker({
    ceiling: config.budget.ceiling,
    period: config.budget.period,
    store: new FileLedgerStore(config.dataDir),
  });
  await costs.load();

  const extractor = new PriceExtractor(
    {
      search: new TavilySearchProvider({ ...config.search, timeoutMs: config.httpTimeoutMs }),
      extraction: new OpenAIExtractionProvider({ ...config.llm, timeoutMs: config.httpTimeoutMs }),
      pages: new HttpPageReader(config.httpTimeoutMs),
      pageExtract:
        config.extraction.fullPageUrls > 0
          ? new TavilyExtractProvider({
              apiKey: config.search.apiKey,
              costPerUrl: config.pageExtract.costPerUrl,
              timeoutMs: config.httpTimeoutMs,
            })
          : undefined,
      costs,
    },
    config.extraction
  );
  const detector = new ChangeDetector(store, config.detection);
  const dispatcher = new NotificationDispatcher({ store, channels: configuredChannels(config) });

  try {
    return await runPriceCheck(
      { store, extractor, detector, dispatcher, costs },
      { concurrency: config.concurrency, signal }
    );
  } finally {
    await costs.flush();
    costs.logSummary();
  }
}

/**
 * Write the summary beside earlier runs
 */
export async function saveSummary(dataDir: string, summary: RunSummary): Promise<string> {
  const runsDir = path.join(dataDir, 'runs');
  await fs.mkdir(runsDir, { recursive: true });
  const filePath = path.join(runsDir, `${summary.startedAt.replace(/[:.]/g, '-')}.json`);
  await fs.writeFile(filePath, JSON.stringify(summary, null, 2));
  return filePath;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const signal = config.deadlineMs ? AbortSignal.timeout(config.deadlineMs) : undefined;

  const summary = await runOnce(config, signal);
  const filePath = await saveSummary(config.dataDir, summary);
  console.log(`[run] Summary written to ${filePath}`);
  console.log(JSON.stringify(summary, null, 2));

  if (summary.status === 'failure') {
    process.exitCode = 1;
  }
}

function isMainModule(): boolean {
  const scriptPath = process.argv[1];
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if this is the main module (directly or through the bin link)
if (isMainModule()) {
  main().catch(error => {
    console.error('Price check failed:', error);
    process.exit(1);
  });
}
