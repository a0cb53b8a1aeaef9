import Decimal from 'decimal.js';

import { StateInvariantViolation } from '../domain/errors.js';
import type { ExitReason, Position, RoundTrip, TradeEvent } from '../domain/models.js';
import type { TradeEventSink } from '../sinks/tradeEventSink.js';

export type TradeSummary = {
  completedTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  totalProfit: number;
  exitsByReason: Record<ExitReason, number>;
  openPosition: Position | null;
};

/**
 * Append-only record of every BUY/SELL in a run. Refuses anything that would
 * break the BUY, SELL, BUY, ... alternation or move time backwards.
 */
export class TradeJournal implements TradeEventSink {
  private readonly events: TradeEvent[] = [];

  record(event: TradeEvent): void {
    const previous = this.events.at(-1);

    if (previous && event.timestamp < previous.timestamp) {
      throw new StateInvariantViolation(
        `${event.kind} at ${event.timestamp} precedes previous ${previous.kind} at ${previous.timestamp}`
      );
    }

    const expected = !previous || previous.kind === 'SELL' ? 'BUY' : 'SELL';
    if (event.kind !== expected) {
      throw new StateInvariantViolation(`Expected ${expected} but received ${event.kind}`);
    }

    this.events.push(event);
  }

  getEvents(): readonly TradeEvent[] {
    return this.events;
  }

  getCompletedTradeCount(): number {
    return this.events.filter((event) => event.kind === 'SELL').length;
  }

  getOpenPosition(): Position | null {
    const last = this.events.at(-1);
    if (!last || last.kind === 'SELL') {
      return null;
    }

    return { entryPrice: last.price, entryTimestamp: last.timestamp };
  }

  getCompletedTrades(): RoundTrip[] {
    const trades: RoundTrip[] = [];
    let entry: Position | null = null;

    for (const event of this.events) {
      if (event.kind === 'BUY') {
        entry = { entryPrice: event.price, entryTimestamp: event.timestamp };
        continue;
      }

      if (!entry) {
        continue;
      }

      trades.push({
        entryPrice: entry.entryPrice,
        entryTimestamp: entry.entryTimestamp,
        exitPrice: event.price,
        exitTimestamp: event.timestamp,
        profit: event.profit,
        reason: event.reason,
        holdMs: event.timestamp - entry.entryTimestamp
      });
      entry = null;
    }

    return trades;
  }

  summarize(): TradeSummary {
    const trades = this.getCompletedTrades();
    const exitsByReason: Record<ExitReason, number> = {
      StopLoss: 0,
      TakeProfit: 0,
      TimeExit: 0,
      ManualStop: 0
    };

    let wins = 0;
    let losses = 0;
    let totalProfit = new Decimal(0);

    for (const trade of trades) {
      exitsByReason[trade.reason] += 1;
      totalProfit = totalProfit.plus(trade.profit);

      if (trade.profit > 0) {
        wins += 1;
      } else if (trade.profit < 0) {
        losses += 1;
      }
    }

    return {
      completedTrades: trades.length,
      wins,
      losses,
      winRate: trades.length > 0 ? wins / trades.length : 0,
      totalProfit: totalProfit.toNumber(),
      exitsByReason,
      openPosition: this.getOpenPosition()
    };
  }
}
