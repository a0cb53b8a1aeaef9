import { FetchError } from '../domain/errors.js';
import { barSchema, type Bar, type Interval } from '../domain/models.js';
import type { ChartQuery, ChartResult, YahooChartClient } from '../yahoo/client.js';

export type MarketDataFeed = {
  fetch(symbol: string, interval: Interval): Promise<Bar[]>;
};

export type YahooMarketDataFeedOptions = {
  client: YahooChartClient;
  range?: string;
};

export type HistoryWindow = {
  from: Date;
  to: Date;
};

const DEFAULT_RANGE = '1d';

/** Intraday bars from the Yahoo chart endpoint. Every failure surfaces as a FetchError. */
export class YahooMarketDataFeed implements MarketDataFeed {
  private readonly client: YahooChartClient;
  private readonly range: string;

  constructor(options: YahooMarketDataFeedOptions) {
    this.client = options.client;
    this.range = options.range ?? DEFAULT_RANGE;
  }

  async fetch(symbol: string, interval: Interval): Promise<Bar[]> {
    return this.load(symbol, interval, { interval, range: this.range });
  }

  async fetchHistory(symbol: string, interval: Interval, window: HistoryWindow): Promise<Bar[]> {
    return this.load(symbol, interval, {
      interval,
      period1: Math.floor(window.from.getTime() / 1000),
      period2: Math.floor(window.to.getTime() / 1000)
    });
  }

  private async load(symbol: string, interval: Interval, query: ChartQuery): Promise<Bar[]> {
    try {
      const response = await this.client.getChart(symbol, query);

      if (response.chart.error) {
        throw new FetchError(`Yahoo chart error ${response.chart.error.code}: ${response.chart.error.description}`, {
          symbol,
          interval
        });
      }

      const result = response.chart.result?.[0];
      return result ? normalizeChartResult(symbol, interval, result) : [];
    } catch (error: unknown) {
      if (error instanceof FetchError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Failed to fetch ${interval} bars for ${symbol}: ${message}`, {
        symbol,
        interval,
        cause: error
      });
    }
  }
}

/** Zips the column arrays into bars, skipping slots without a usable close (null, zero, negative). */
export function normalizeChartResult(symbol: string, interval: Interval, result: ChartResult): Bar[] {
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  if (!quote) {
    return [];
  }

  const bars: Bar[] = [];
  for (let index = 0; index < timestamps.length; index += 1) {
    const seconds = timestamps[index];
    const close = quote.close?.[index];
    if (seconds === undefined || close === null || close === undefined) {
      continue;
    }

    const parsed = barSchema.safeParse({
      symbol,
      interval,
      timestamp: seconds * 1000,
      open: quote.open?.[index] ?? close,
      high: quote.high?.[index] ?? close,
      low: quote.low?.[index] ?? close,
      close,
      volume: quote.volume?.[index] ?? 0
    });
    if (parsed.success) {
      bars.push(parsed.data);
    }
  }

  return bars;
}
