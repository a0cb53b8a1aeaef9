import type { Logger } from 'pino';
import type { Dispatcher } from 'undici';

import { loadConfig, toStrategyConfig } from '../config/index.js';
import { createLogger } from '../config/logger.js';
import type { AppConfig, StrategyConfig } from '../config/schema.js';
import { YahooMarketDataFeed, type MarketDataFeed } from '../data/marketDataFeed.js';
import { MarketDataService, type StartFrom } from '../data/marketDataService.js';
import { EventBus } from '../events/eventBus.js';
import { PositionStateMachine } from '../portfolio/stateMachine.js';
import { TradeJournal } from '../portfolio/tradeJournal.js';
import { ChartSnapshotWriter } from '../sinks/chartSnapshot.js';
import { CsvTradeSink } from '../sinks/csvTradeSink.js';
import { CompositeTradeSink, type TradeEventSink } from '../sinks/tradeEventSink.js';
import { YahooChartClient } from '../yahoo/client.js';

import { PollingScheduler, type Sleep } from './scheduler.js';
import { StatusReporter } from './statusReporter.js';

export type RuntimeOptions = {
  config?: AppConfig;
  logger?: Logger;
  feed?: MarketDataFeed;
  dispatcher?: Dispatcher;
  persist?: boolean;
  startFrom?: StartFrom;
  extraSinks?: TradeEventSink[];
  sleep?: Sleep;
  now?: () => number;
};

export type RuntimeContext = {
  config: AppConfig;
  strategy: StrategyConfig;
  logger: Logger;
  eventBus: EventBus;
  feed: MarketDataFeed;
  marketData: MarketDataService;
  stateMachine: PositionStateMachine;
  journal: TradeJournal;
  csvSink: CsvTradeSink | null;
  chartWriter: ChartSnapshotWriter | null;
  scheduler: PollingScheduler;
  statusReporter: StatusReporter;
};

export function bootRuntime(options: RuntimeOptions = {}): RuntimeContext {
  const config = options.config ?? loadConfig();
  // An injected logger keeps the level its owner gave it.
  const logger = options.logger ?? createLogger(config);
  const now = options.now ?? Date.now;
  const persist = options.persist ?? true;

  const boot = (step: string) => logger.info({ step }, `boot: ${step}`);

  try {
    boot('1.ConfigLoader');
    const strategy = toStrategyConfig(config);

    boot('2.EventBus');
    const eventBus = new EventBus({ queueEmits: true });

    boot('3.MarketDataFeed');
    const feed =
      options.feed ??
      new YahooMarketDataFeed({
        client: new YahooChartClient({
          baseUrl: config.YAHOO_BASE_URL,
          dispatcher: options.dispatcher,
          userAgent: config.YAHOO_USER_AGENT,
          logger: logger.child({ service: 'yahoo' })
        }),
        range: config.YAHOO_RANGE
      });
    const marketData = new MarketDataService({
      feed,
      eventBus,
      symbol: strategy.symbol,
      interval: strategy.interval,
      startFrom: options.startFrom,
      now
    });

    boot('4.PositionStateMachine');
    const stateMachine = new PositionStateMachine(strategy);

    boot('5.TradeSinks');
    const journal = new TradeJournal();
    const csvSink = persist
      ? new CsvTradeSink({
          directory: config.TRADES_DIR,
          symbol: strategy.symbol,
          interval: strategy.interval,
          startedAt: new Date(now())
        })
      : null;
    const sinks: TradeEventSink[] = [journal, ...(csvSink ? [csvSink] : []), ...(options.extraSinks ?? [])];

    const chartWriter = persist
      ? new ChartSnapshotWriter({
          directory: config.TRADES_DIR,
          config: strategy,
          events: () => journal.getEvents(),
          position: () => stateMachine.getOpenPosition(),
          logger: logger.child({ service: 'chart' })
        })
      : null;
    chartWriter?.subscribe(eventBus);

    boot('6.PollingScheduler');
    const scheduler = new PollingScheduler({
      config: strategy,
      marketData,
      stateMachine,
      sink: new CompositeTradeSink(sinks),
      eventBus,
      logger: logger.child({ service: 'scheduler' }),
      sleep: options.sleep,
      now
    });

    boot('7.StatusReporter');
    const statusReporter = new StatusReporter({
      intervalMs: strategy.statusIntervalMs,
      source: {
        latestPrice: () => scheduler.getLastTick()?.closePrice ?? null,
        positionState: () => stateMachine.getPositionLabel(),
        completedTradeCount: () => journal.getCompletedTradeCount()
      },
      eventBus,
      logger: logger.child({ service: 'status' }),
      now
    });

    eventBus.on('trade.executed', ({ symbol, event }) => {
      if (event.kind === 'BUY') {
        logger.info({ symbol, price: event.price, timestamp: new Date(event.timestamp).toISOString() }, 'BUY executed');
        return;
      }

      logger.info(
        {
          symbol,
          price: event.price,
          timestamp: new Date(event.timestamp).toISOString(),
          profit: event.profit,
          reason: event.reason
        },
        'SELL executed'
      );
    });

    eventBus.on('bars.fetched', (payload) => {
      logger.debug({ symbol: payload.symbol, interval: payload.interval, rows: payload.bars.length }, 'bars.fetched');
    });

    eventBus.on('audit.event', (audit) => {
      logger.warn({ step: audit.step, message: audit.message, metadata: audit.metadata }, 'event handler failed');
    });

    return {
      config,
      strategy,
      logger,
      eventBus,
      feed,
      marketData,
      stateMachine,
      journal,
      csvSink,
      chartWriter,
      scheduler,
      statusReporter
    };
  } catch (error) {
    logger.error({ err: error }, 'runtime boot failed');
    throw error;
  }
}
