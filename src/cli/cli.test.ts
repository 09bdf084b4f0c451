/**
 * CLI Tests
 *
 * Program setup, option parsers, formatters, and full command runs
 * against in-memory services.
 *
 * @module cli/cli.test
 */

import { describe, it, expect, jest, beforeAll, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ChannelListError } from '../channels/index.js';
import { ConfigurationError, loadConfig } from '../config/index.js';
import { RecommendationExtractor, type CompletionModel } from '../extraction/index.js';
import type { PipelineDependencies, PipelineResult } from '../pipeline/index.js';
import { PriceLookupError, expirationDate, type PriceLookup } from '../purchasing/index.js';
import type { VideoFeedService } from '../youtube/index.js';
import { EXIT_CODES, exitCodeFor } from './base-command.js';
import {
  StageProgressDisplay,
  formatDuration,
  formatPurchaseRecords,
  formatRankedTable,
  formatRunSummary,
} from './formatters/index.js';
import { createProgram } from './index.js';
import {
  normalizeTickers,
  parseAmountList,
  parseNonNegativeInt,
  parsePositiveInt,
  parsePositiveNumber,
} from './options.js';
import type { CliServices } from './services.js';
import { VERSION, getVersionInfo } from './version.js';

beforeAll(() => {
  chalk.level = 0;
});

// ============================================================================
// Fakes
// ============================================================================

const priceLookup: PriceLookup = {
  async latestClose(symbol: string): Promise<number> {
    if (symbol === 'AAPL') {
      return 187.5;
    }
    throw new PriceLookupError(`No closing price for ${symbol}`, symbol);
  },
};

function pipelineDependencies(): PipelineDependencies {
  const publishedAt = new Date(Date.now() - 60 * 60 * 1000).toISOString();
  const feed: VideoFeedService = {
    async getUploadsPlaylistId(channelId: string) {
      return `UU${channelId}`;
    },
    async listPlaylistItems() {
      return { items: [{ videoId: 'v1', publishedAt, title: 'Picks' }] };
    },
  };
  const model: CompletionModel = {
    modelId: 'fake-model',
    async complete() {
      return {
        text: '{"recommended_stocks": ["MU", "AAPL"]}',
        modelId: 'fake-model',
        tokenUsage: { input: 50, output: 5 },
      };
    },
  };

  return {
    feed,
    transcripts: {
      async fetchSegments() {
        return [{ text: 'I am buying MU and AAPL', offset: 0, duration: 4 }];
      },
    },
    extractor: new RecommendationExtractor(model),
    loadChannels: async () => [{ name: 'Alpha', channelId: 'UC1', priority: 1 }],
  };
}

const services: CliServices = {
  loadConfig: () => loadConfig({}),
  createPipelineDependencies: async () => pipelineDependencies(),
  createPriceLookup: async () => priceLookup,
};

// ============================================================================
// Program
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram(services);

    expect(program.name()).toBe('creator-signals');
    expect(program.version()).toBe(VERSION);
    expect(getVersionInfo()).toBe('Creator Signals v0.1.0');
  });

  it('should have global options configured', () => {
    const optionNames = createProgram(services).options.map((o) => o.long);

    expect(optionNames).toEqual(expect.arrayContaining(['--verbose', '--quiet', '--no-color']));
  });

  it('should register the commands', () => {
    const commandNames = createProgram(services).commands.map((c) => c.name());

    expect(commandNames).toEqual(['recommend', 'purchase', 'run']);
  });

  it('should require an amount for run', () => {
    const run = createProgram(services).commands.find((c) => c.name() === 'run');
    const amount = run?.options.find((o) => o.long === '--amount');

    expect(amount?.mandatory).toBe(true);
    expect(run?.options.map((o) => o.long)).toContain('--window-days');
  });
});

// ============================================================================
// Option Parsers
// ============================================================================

describe('option parsers', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('abc')).toThrow(InvalidArgumentError);
  });

  it('should accept zero validity days', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(() => parseNonNegativeInt('-1')).toThrow('Expected a non-negative integer.');
  });

  it('should parse positive amounts', () => {
    expect(parsePositiveNumber('1000')).toBe(1000);
    expect(parsePositiveNumber('2.5')).toBe(2.5);
    expect(() => parsePositiveNumber('-1')).toThrow('Expected a positive number.');
  });

  it('should parse amount lists', () => {
    expect(parseAmountList('10, 2.5')).toEqual([10, 2.5]);
    expect(() => parseAmountList('10,,2')).toThrow(InvalidArgumentError);
    expect(() => parseAmountList('10,x')).toThrow('"x" is not a positive number.');
  });

  it('should normalize tickers', () => {
    expect(normalizeTickers([' aapl', 'MU', ''])).toEqual(['AAPL', 'MU']);
  });
});

describe('exitCodeFor', () => {
  it('should map configuration errors to the configuration exit code', () => {
    expect(exitCodeFor(new ConfigurationError('Missing key'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(new ChannelListError('Line 2: bad priority', 2))).toBe(2);
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_CODES.ERROR);
  });
});

// ============================================================================
// Formatters
// ============================================================================

describe('formatters', () => {
  it('should format durations', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(65000)).toBe('1m 5s');
  });

  it('should format the ranked table', () => {
    expect(
      formatRankedTable([
        { ticker: 'MU', count: 2 },
        { ticker: 'AAPL', count: 1 },
      ])
    ).toEqual(['RANK  TICKER    MENTIONS', '1     MU        2', '2     AAPL      1']);
    expect(formatRankedTable([])).toEqual(['No recommendations found.']);
  });

  it('should format purchase rows and flag missing prices', () => {
    expect(
      formatPurchaseRecords([
        { asset: 'AAPL', price: 187.5, quantity: 1000, expiration: '2026/03/14' },
        { asset: 'MU', price: -1, quantity: 2.5, expiration: '2026/03/14' },
      ])
    ).toEqual([
      'AAPL    x 1000.0    @ 187.5             expires 2026/03/14',
      'MU      x 2.5       price unavailable   expires 2026/03/14',
    ]);
  });

  it('should summarize a run', () => {
    const result: PipelineResult = {
      runId: '20260310-090000',
      startedAt: '2026-03-10T09:00:00.000Z',
      completedAt: '2026-03-10T09:00:02.500Z',
      durationMs: 2500,
      channels: [],
      discovery: {
        videos: [],
        channels: [
          { status: 'failed', id: 'UC1', reason: 'timeout' },
          { status: 'skipped', id: 'UC2', reason: 'quota exhausted' },
        ],
        window: { start: '2026-03-03T09:00:00.000Z', end: '2026-03-10T09:00:00.000Z' },
      },
      transcripts: { transcripts: [], outcomes: [] },
      extractions: [],
      ranked: [],
      topAssets: [],
      usage: { youtubeQuotaUnits: 3, llmTokens: { input: 0, output: 0 } },
      stageTimings: [],
    };

    expect(formatRunSummary(result)).toEqual([
      'Run: 20260310-090000',
      'Channels: 0 ok, 1 failed, 1 skipped',
      'Videos: 0',
      'Transcripts: 0 fetched, 0 unavailable, 0 failed',
      'Extractions: 0 ok, 0 unparseable, 0 failed',
      'YouTube quota: 3 unit(s)',
      'LLM tokens: 0 in / 0 out',
      'Duration: 2.5s',
    ]);
  });

  it('should print plain stage lines without a terminal', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    const progress = new StageProgressDisplay({ isTTY: false });

    progress.onStageStart('channels');
    progress.onStageComplete('channels', {
      stage: 'channels',
      startedAt: '2026-03-10T09:00:00.000Z',
      completedAt: '2026-03-10T09:00:00.012Z',
      durationMs: 12,
    });

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '[*] Load channels...',
      '[+] Load channels (12ms)',
    ]);
    expect(progress.getStages()[0]).toEqual({ name: 'channels', status: 'completed', durationMs: 12 });
    expect(progress.getStages()[1]).toEqual({ name: 'discovery', status: 'pending' });
    log.mockRestore();
  });
});

// ============================================================================
// Commands
// ============================================================================

describe('commands', () => {
  let tempDir: string;
  let ledgerPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-test-'));
    ledgerPath = path.join(tempDir, 'ledger.csv');
    jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const run = (...args: string[]) =>
    createProgram(services).parseAsync(['node', 'creator-signals', ...args]);

  function captureConsole() {
    return {
      log: jest.spyOn(console, 'log').mockImplementation(() => {}),
      warn: jest.spyOn(console, 'warn').mockImplementation(() => {}),
      error: jest.spyOn(console, 'error').mockImplementation(() => {}),
    };
  }

  it('should append purchases to the ledger', async () => {
    const { log, warn, error } = captureConsole();
    const expiration = expirationDate(new Date(), 2);

    await run('purchase', 'aapl', 'MU', '--amount', '1000', '--valid-days', '2', '--ledger', ledgerPath);

    expect(await fs.readFile(ledgerPath, 'utf-8')).toBe(
      `AAPL, 187.5, 1000.0, ${expiration}\nMU, -1.0, 1000.0, ${expiration}\n`
    );
    expect(warn.mock.calls.map((call) => call[0])).toEqual([
      'Warning: 1 price lookup(s) failed; recorded with price -1.0',
    ]);
    expect(error.mock.calls.map((call) => call[0])).toEqual([
      'Error: Unable to retrieve price for ticker MU: No closing price for MU',
    ]);
    expect(log.mock.calls.at(-1)?.[0]).toBe(`[OK] Appended 2 row(s) to ${ledgerPath}`);
  });

  it('should exit with the configuration code when no amount is given', async () => {
    const { error } = captureConsole();
    await expect(run('purchase', 'AAPL', '--ledger', ledgerPath)).rejects.toThrow('process.exit(2)');

    expect(error.mock.calls.map((call) => call[0])).toEqual([
      'Error: Asset purchaser: Either assetPurchaseAmounts or universalPurchaseAmount must be specified',
    ]);
    await expect(fs.access(ledgerPath)).rejects.toThrow();
  });

  it('should print the recommendation report as JSON', async () => {
    const { log } = captureConsole();
    await run('recommend', '--json', '--max-assets', '1');

    expect(log).toHaveBeenCalledTimes(1);
    const report: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(report).toMatchObject({
      ranked: [
        { ticker: 'MU', count: 1 },
        { ticker: 'AAPL', count: 1 },
      ],
      topAssets: ['MU'],
      usage: { youtubeQuotaUnits: 0, llmTokens: { input: 50, output: 5 } },
    });
  });

  it('should recommend then purchase the top assets', async () => {
    captureConsole();
    await run('--quiet', 'run', '--amount', '5', '--ledger', ledgerPath, '--max-assets', '2');

    const rows = (await fs.readFile(ledgerPath, 'utf-8')).trim().split('\n');
    expect(rows.map((row) => row.split(', ').slice(0, 3).join(', '))).toEqual([
      'MU, -1.0, 5.0',
      'AAPL, 187.5, 5.0',
    ]);
  });
});
