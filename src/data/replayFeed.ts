import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { barSchema, type Bar, type Interval } from '../domain/models.js';

import type { MarketDataFeed } from './marketDataFeed.js';

/**
 * Serves a recorded bar sequence as if it were arriving live: every fetch
 * reveals one more bar. Once everything is revealed it keeps returning the
 * full history.
 */
export class ReplayMarketDataFeed implements MarketDataFeed {
  private readonly bars: readonly Bar[];
  private revealed = 0;

  constructor(bars: readonly Bar[], options: { initiallyRevealed?: number } = {}) {
    this.bars = [...bars].sort((left, right) => left.timestamp - right.timestamp);
    this.revealed = Math.min(this.bars.length, Math.max(0, options.initiallyRevealed ?? 0));
  }

  async fetch(symbol: string, interval: Interval): Promise<Bar[]> {
    if (this.revealed < this.bars.length) {
      this.revealed += 1;
    }

    return this.bars
      .slice(0, this.revealed)
      .filter((bar) => bar.symbol === symbol && bar.interval === interval);
  }

  isExhausted(): boolean {
    return this.revealed >= this.bars.length;
  }
}

const recordedBarsSchema = z.array(barSchema);

export async function loadRecordedBars(filePath: string): Promise<Bar[]> {
  const raw = await readFile(filePath, 'utf8');
  return recordedBarsSchema.parse(JSON.parse(raw));
}
