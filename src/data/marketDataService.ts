import { FetchError } from '../domain/errors.js';
import { toPriceTick, type Bar, type Interval, type PriceTick } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';

import type { MarketDataFeed } from './marketDataFeed.js';

export type StartFrom = 'latest' | 'all';

type MarketDataServiceOptions = {
  feed: MarketDataFeed;
  eventBus: EventBus;
  symbol: string;
  interval: Interval;
  startFrom?: StartFrom;
  now?: () => number;
};

export type TickCursor = {
  timestamp: number;
  closePrice: number;
};

/**
 * Fetches bars for one symbol and hands back only the ticks the state
 * machine has not seen yet.
 */
export class MarketDataService {
  private readonly feed: MarketDataFeed;
  private readonly eventBus: EventBus;
  private readonly symbol: string;
  private readonly interval: Interval;
  private readonly startFrom: StartFrom;
  private readonly now: () => number;
  private cursor: TickCursor | null = null;
  private latestBars: Bar[] = [];

  constructor(options: MarketDataServiceOptions) {
    this.feed = options.feed;
    this.eventBus = options.eventBus;
    this.symbol = options.symbol;
    this.interval = options.interval;
    this.startFrom = options.startFrom ?? 'latest';
    this.now = options.now ?? Date.now;
  }

  async poll(): Promise<PriceTick[]> {
    const raw = await this.feed.fetch(this.symbol, this.interval);
    const integrityError = this.checkIntegrity(raw);

    if (integrityError) {
      throw new FetchError(integrityError, { symbol: this.symbol, interval: this.interval });
    }

    const bars = dedupeByTimestamp(raw);
    if (bars.length === 0) {
      return [];
    }

    this.latestBars = bars;
    this.eventBus.emit('bars.fetched', {
      symbol: this.symbol,
      interval: this.interval,
      bars,
      fetchedAt: this.now()
    });

    const ticks = selectNewTicks(bars, this.cursor, this.startFrom);
    const last = ticks.at(-1);
    if (last) {
      this.cursor = { timestamp: last.timestamp, closePrice: last.closePrice };
    }

    return ticks;
  }

  getLatestBars(): readonly Bar[] {
    return this.latestBars;
  }

  getCursor(): TickCursor | null {
    return this.cursor;
  }

  private checkIntegrity(bars: Bar[]): string | null {
    for (let index = 1; index < bars.length; index += 1) {
      const previous = bars[index - 1];
      const current = bars[index];
      if (!previous || !current) {
        continue;
      }

      if (current.timestamp < previous.timestamp) {
        return `Out-of-order bar timestamp detected: ${previous.timestamp} -> ${current.timestamp}`;
      }
    }

    return null;
  }
}

/** Equal timestamps are the same bar revised; the last copy wins. */
export function dedupeByTimestamp(bars: Bar[]): Bar[] {
  const result: Bar[] = [];

  for (const bar of bars) {
    const previous = result.at(-1);
    if (previous && previous.timestamp === bar.timestamp) {
      result[result.length - 1] = bar;
      continue;
    }

    result.push(bar);
  }

  return result;
}

/**
 * Before the first tick only the newest bar counts. After that every bar past
 * the cursor is new, and so is a changed close on the cursor's own bar.
 */
export function selectNewTicks(bars: Bar[], cursor: TickCursor | null, startFrom: StartFrom): PriceTick[] {
  if (!cursor) {
    if (startFrom === 'all') {
      return bars.map(toPriceTick);
    }

    const latest = bars.at(-1);
    return latest ? [toPriceTick(latest)] : [];
  }

  return bars
    .filter(
      (bar) =>
        bar.timestamp > cursor.timestamp ||
        (bar.timestamp === cursor.timestamp && bar.close !== cursor.closePrice)
    )
    .map(toPriceTick);
}
