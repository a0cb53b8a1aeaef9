import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import Decimal from 'decimal.js';
import type { Logger } from 'pino';

import type { ExitRuleConfig } from '../config/schema.js';
import type { Bar, Interval, Position, TradeEvent } from '../domain/models.js';
import type { CycleCompletedPayload } from '../events/events.js';
import type { EventBus } from '../events/eventBus.js';
import { computeExitThresholds } from '../portfolio/exitRules.js';

export type ChartMarker = {
  timestamp: number;
  price: number;
};

export type ChartSnapshot = {
  title: string;
  symbol: string;
  interval: Interval;
  generatedAt: number;
  bars: Bar[];
  buys: ChartMarker[];
  sells: ChartMarker[];
  levels: { stopLoss: number; takeProfit: number } | null;
};

export type ChartSnapshotInput = {
  symbol: string;
  interval: Interval;
  bars: readonly Bar[];
  events: readonly TradeEvent[];
  position: Position | null;
  config: ExitRuleConfig;
  generatedAt: number;
  barLimit?: number;
  markerLimit?: number;
};

const DEFAULT_BAR_LIMIT = 50;
const DEFAULT_MARKER_LIMIT = 10;

/** Rolling window of recent bars with BUY/SELL markers that land inside it. */
export function buildChartSnapshot(input: ChartSnapshotInput): ChartSnapshot {
  const bars = input.bars.slice(-(input.barLimit ?? DEFAULT_BAR_LIMIT));
  const markerLimit = input.markerLimit ?? DEFAULT_MARKER_LIMIT;
  const visible = new Set(bars.map((bar) => bar.timestamp));

  const markersFor = (kind: TradeEvent['kind']): ChartMarker[] =>
    input.events
      .filter((event) => event.kind === kind)
      .slice(-markerLimit)
      .filter((event) => visible.has(event.timestamp))
      .map((event) => ({ timestamp: event.timestamp, price: event.price }));

  let levels: ChartSnapshot['levels'] = null;
  if (input.position) {
    const thresholds = computeExitThresholds(input.position, input.config);
    levels = {
      stopLoss: thresholds.stopLossPrice.toNumber(),
      takeProfit: thresholds.takeProfitPrice.toNumber()
    };
  }

  return {
    title: `${input.symbol} - ${input.interval} Live (SL: ${toPercent(input.config.stopLossPercent)}%, TP: ${toPercent(input.config.takeProfitPercent)}%)`,
    symbol: input.symbol,
    interval: input.interval,
    generatedAt: input.generatedAt,
    bars,
    buys: markersFor('BUY'),
    sells: markersFor('SELL'),
    levels
  };
}

function toPercent(fraction: number): string {
  return new Decimal(fraction).times(100).toString();
}

export type ChartSnapshotWriterOptions = {
  directory: string;
  config: ExitRuleConfig;
  events: () => readonly TradeEvent[];
  position: () => Position | null;
  logger: Logger;
};

/** Rewrites `{symbol}_{interval}_live_chart.json` after every completed poll cycle. */
export class ChartSnapshotWriter {
  private readonly options: ChartSnapshotWriterOptions;

  constructor(options: ChartSnapshotWriterOptions) {
    this.options = options;
  }

  subscribe(eventBus: EventBus): () => void {
    return eventBus.on('cycle.completed', async (payload) => {
      await this.write(payload);
    });
  }

  async write(payload: Pick<CycleCompletedPayload, 'symbol' | 'interval' | 'bars' | 'completedAt'>): Promise<string> {
    const snapshot = buildChartSnapshot({
      symbol: payload.symbol,
      interval: payload.interval,
      bars: payload.bars,
      events: this.options.events(),
      position: this.options.position(),
      config: this.options.config,
      generatedAt: payload.completedAt
    });

    const filePath = path.join(this.options.directory, `${payload.symbol}_${payload.interval}_live_chart.json`);
    await mkdir(this.options.directory, { recursive: true });
    await writeFile(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
    this.options.logger.debug({ filePath, bars: snapshot.bars.length }, 'chart snapshot written');
    return filePath;
  }
}
