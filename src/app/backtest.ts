#!/usr/bin/env node
import type { Logger } from 'pino';

import { loadConfig, toStrategyConfig } from '../config/index.js';
import { createLogger } from '../config/logger.js';
import type { AppConfig, ExitRuleConfig } from '../config/schema.js';
import { YahooMarketDataFeed } from '../data/marketDataFeed.js';
import { dedupeByTimestamp } from '../data/marketDataService.js';
import { loadRecordedBars } from '../data/replayFeed.js';
import { ConfigurationError } from '../domain/errors.js';
import { toPriceTick, type Bar, type RoundTrip, type TradeEvent } from '../domain/models.js';
import { PositionStateMachine } from '../portfolio/stateMachine.js';
import { TradeJournal, type TradeSummary } from '../portfolio/tradeJournal.js';
import { YahooChartClient } from '../yahoo/client.js';

export type BacktestOptions = {
  /** Close a position still open after the last bar as a manual stop at that bar. */
  closeAtEnd?: boolean;
};

export type BacktestResult = {
  events: TradeEvent[];
  trades: RoundTrip[];
  summary: TradeSummary;
};

/** Replays bars through a fresh state machine, one tick per bar close. */
export function runBacktest(bars: readonly Bar[], config: ExitRuleConfig, options: BacktestOptions = {}): BacktestResult {
  const ordered = dedupeByTimestamp([...bars].sort((left, right) => left.timestamp - right.timestamp));
  const stateMachine = new PositionStateMachine(config);
  const journal = new TradeJournal();

  for (const bar of ordered) {
    const event = stateMachine.evaluate(toPriceTick(bar));
    if (event) {
      journal.record(event);
    }
  }

  const last = ordered.at(-1);
  if (options.closeAtEnd && last) {
    const event = stateMachine.cancel(last.close, last.timestamp);
    if (event) {
      journal.record(event);
    }
  }

  return {
    events: [...journal.getEvents()],
    trades: journal.getCompletedTrades(),
    summary: journal.summarize()
  };
}

export async function loadBacktestBars(config: AppConfig, logger: Logger): Promise<Bar[]> {
  if (config.BACKTEST_BARS_FILE) {
    return loadRecordedBars(config.BACKTEST_BARS_FILE);
  }

  if (!config.BACKTEST_FROM || !config.BACKTEST_TO) {
    throw new ConfigurationError(['BACKTEST_BARS_FILE or both BACKTEST_FROM and BACKTEST_TO are required']);
  }

  const feed = new YahooMarketDataFeed({
    client: new YahooChartClient({
      baseUrl: config.YAHOO_BASE_URL,
      userAgent: config.YAHOO_USER_AGENT,
      logger: logger.child({ service: 'yahoo' })
    })
  });

  return feed.fetchHistory(config.SYMBOL, config.INTERVAL, {
    from: config.BACKTEST_FROM,
    to: config.BACKTEST_TO
  });
}

export async function main(): Promise<BacktestResult> {
  const config = loadConfig();
  const strategy = toStrategyConfig(config);
  const logger = createLogger(config);

  const bars = await loadBacktestBars(config, logger);
  logger.info({ symbol: strategy.symbol, interval: strategy.interval, rows: bars.length }, 'backtest bars loaded');

  const result = runBacktest(bars, strategy);
  for (const trade of result.trades) {
    logger.info(
      {
        buyTime: new Date(trade.entryTimestamp).toISOString(),
        buyPrice: trade.entryPrice,
        sellTime: new Date(trade.exitTimestamp).toISOString(),
        sellPrice: trade.exitPrice,
        profit: trade.profit,
        reason: trade.reason
      },
      'trade'
    );
  }
  logger.info({ summary: result.summary }, 'backtest finished');
  return result;
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof ConfigurationError ? error.message : error);
    process.exit(1);
  });
}
