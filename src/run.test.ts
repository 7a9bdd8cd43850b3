import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from './config.js';
import { configuredChannels, saveSummary } from './run.js';
import type { RunSummary } from './types.js';

describe('configuredChannels', () => {
  it('should include only channels with complete credentials', () => {
    const emailOnly = loadConfig({ RESEND_API_KEY: 'test-secret', TWILIO_ACCOUNT_SID: 'AC-test' });
    expect(configuredChannels(emailOnly).map(c => c.channel)).toEqual(['EMAIL']);

    const both = loadConfig({
      RESEND_API_KEY: 'test-secret',
      TWILIO_ACCOUNT_SID: 'AC-test',
      TWILIO_AUTH_TOKEN: 'test-secret',
      TWILIO_FROM_NUMBER: '+15550002222',
    });
    expect(configuredChannels(both).map(c => c.channel)).toEqual(['EMAIL', 'SMS']);

    expect(configuredChannels(loadConfig({}))).toEqual([]);
  });
});

describe('saveSummary', () => {
  let dataDir: string | undefined;

  afterEach(async () => {
    if (dataDir) {
      await fs.rm(dataDir, { recursive: true, force: true });
    }
  });

  it('should write the summary under runs/', async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'price-watch-summary-'));
    const summary: RunSummary = {
      status: 'success',
      startedAt: '2026-03-01T12:00:00.000Z',
      finishedAt: '2026-03-01T12:00:05.000Z',
      total: 0,
      counts: { notified: 0, suppressed: 0, noChange: 0, extractionFailed: 0, budgetSkipped: 0, failed: 0, cancelled: 0 },
      totalSpend: 0,
      outcomes: [],
    };

    const filePath = await saveSummary(dataDir, summary);

    expect(filePath).toBe(path.join(dataDir, 'runs', '2026-03-01T12-00-00-000Z.json'));
    expect(JSON.parse(await fs.readFile(filePath, 'utf-8'))).toEqual(summary);
  });
});
