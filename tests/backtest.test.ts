import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import pino from 'pino';

import { loadBacktestBars, runBacktest } from '../src/app/backtest.js';
import { loadConfig } from '../src/config/index.js';
import { ReplayMarketDataFeed, loadRecordedBars } from '../src/data/replayFeed.js';
import { ConfigurationError } from '../src/domain/errors.js';
import type { Bar } from '../src/domain/models.js';

const T0 = Date.parse('2025-03-19T09:30:00Z');
const MINUTE = 60_000;
const config = { stopLossPercent: 0.001, takeProfitPercent: 0.002, maxHoldMs: 5 * MINUTE };

function bar(minute: number, close: number): Bar {
  return { symbol: 'TEST', interval: '1m', timestamp: T0 + minute * MINUTE, open: close, high: close, low: close, close, volume: 1 };
}

const session = [
  bar(0, 100),
  bar(1, 99.95),
  bar(2, 99.9),
  bar(3, 99.9),
  bar(4, 100),
  bar(5, 99.85),
  bar(6, 100.05),
  bar(7, 99.9),
  bar(8, 99.95),
  bar(9, 100)
];

describe('runBacktest', () => {
  it('replays bars in time order and summarizes the round trips', () => {
    const result = runBacktest([...session].reverse(), config);

    expect(result.events).toEqual([
      { kind: 'BUY', price: 100, timestamp: T0 },
      { kind: 'SELL', price: 99.9, timestamp: T0 + 2 * MINUTE, profit: -0.1, reason: 'StopLoss' },
      { kind: 'BUY', price: 99.9, timestamp: T0 + 3 * MINUTE },
      { kind: 'SELL', price: 99.95, timestamp: T0 + 8 * MINUTE, profit: 0.05, reason: 'TimeExit' },
      { kind: 'BUY', price: 100, timestamp: T0 + 9 * MINUTE }
    ]);
    expect(result.trades.map((trade) => trade.holdMs)).toEqual([2 * MINUTE, 5 * MINUTE]);
    expect(result.summary).toEqual({
      completedTrades: 2,
      wins: 1,
      losses: 1,
      winRate: 0.5,
      totalProfit: -0.05,
      exitsByReason: { StopLoss: 1, TakeProfit: 0, TimeExit: 1, ManualStop: 0 },
      openPosition: { entryPrice: 100, entryTimestamp: T0 + 9 * MINUTE }
    });
  });

  it('closes the final position at the last bar when asked', () => {
    const result = runBacktest(session, config, { closeAtEnd: true });

    expect(result.events.at(-1)).toEqual({
      kind: 'SELL',
      price: 100,
      timestamp: T0 + 9 * MINUTE,
      profit: 0,
      reason: 'ManualStop'
    });
    expect(result.summary.openPosition).toBeNull();
  });

  it('returns nothing for an empty bar set', () => {
    expect(runBacktest([], config, { closeAtEnd: true }).events).toEqual([]);
  });
});

describe('recorded bars', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'backtest-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('loads a recorded session from the configured file', async () => {
    const file = path.join(directory, 'bars.json');
    await writeFile(file, JSON.stringify(session.slice(0, 3)), 'utf8');

    const bars = await loadBacktestBars(loadConfig({ BACKTEST_BARS_FILE: file }), pino({ enabled: false }));

    expect(bars).toEqual(session.slice(0, 3));
  });

  it('rejects recorded bars with invalid fields', async () => {
    const file = path.join(directory, 'bars.json');
    await writeFile(file, JSON.stringify([{ ...bar(0, 100), close: 0 }]), 'utf8');

    await expect(loadRecordedBars(file)).rejects.toThrow();
  });

  it('requires a file or a date window', async () => {
    await expect(loadBacktestBars(loadConfig({}), pino({ enabled: false }))).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('ReplayMarketDataFeed', () => {
  it('reveals one more bar per fetch and then repeats the full history', async () => {
    const feed = new ReplayMarketDataFeed(session.slice(0, 2), { initiallyRevealed: 1 });

    expect(feed.isExhausted()).toBe(false);
    await expect(feed.fetch('TEST', '1m')).resolves.toHaveLength(2);
    expect(feed.isExhausted()).toBe(true);
    await expect(feed.fetch('TEST', '1m')).resolves.toHaveLength(2);
    await expect(feed.fetch('OTHER', '1m')).resolves.toEqual([]);
  });
});
