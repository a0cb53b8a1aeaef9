import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { Interval, TradeEvent } from '../domain/models.js';

import type { TradeEventSink } from './tradeEventSink.js';

export const CSV_HEADER = ['type', 'price', 'timestamp', 'profit', 'reason'] as const;

export type CsvTradeSinkOptions = {
  directory: string;
  symbol: string;
  interval: Interval;
  startedAt: Date;
};

/** One row per event, appended in emission order. */
export class CsvTradeSink implements TradeEventSink {
  readonly filePath: string;
  private readonly directory: string;
  private headerWritten = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: CsvTradeSinkOptions) {
    this.directory = options.directory;
    this.filePath = path.join(
      options.directory,
      buildTradesFilename(options.symbol, options.interval, options.startedAt)
    );
  }

  record(event: TradeEvent): Promise<void> {
    const write = this.pending.then(() => this.append(event));
    // Later writes still run after a failed one; the caller sees the failure through `write`.
    this.pending = write.catch(() => undefined);
    return write;
  }

  private async append(event: TradeEvent): Promise<void> {
    let chunk = '';

    if (!this.headerWritten) {
      await mkdir(this.directory, { recursive: true });
      chunk += `${CSV_HEADER.join(',')}\n`;
    }

    chunk += `${formatTradeRow(event)}\n`;
    await appendFile(this.filePath, chunk, 'utf8');
    this.headerWritten = true;
  }
}

export function formatTradeRow(event: TradeEvent): string {
  const cells =
    event.kind === 'SELL'
      ? [event.kind, String(event.price), new Date(event.timestamp).toISOString(), String(event.profit), event.reason]
      : [event.kind, String(event.price), new Date(event.timestamp).toISOString(), '', ''];

  return cells.map(escapeCsvCell).join(',');
}

export function buildTradesFilename(symbol: string, interval: Interval, startedAt: Date): string {
  return `${symbol}_${formatFileTimestamp(startedAt)}_${interval}_trades.csv`;
}

function formatFileTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}

function escapeCsvCell(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}
