import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from 'pino';

import type { StrategyConfig } from '../config/schema.js';
import { FetchError } from '../domain/errors.js';
import type { PriceTick, TradeEvent } from '../domain/models.js';
import type { MarketDataService } from '../data/marketDataService.js';
import type { EventBus } from '../events/eventBus.js';
import type { PositionStateMachine } from '../portfolio/stateMachine.js';
import type { TradeEventSink } from '../sinks/tradeEventSink.js';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type PollingSchedulerOptions = {
  config: Pick<StrategyConfig, 'symbol' | 'interval' | 'pollIntervalMs' | 'retryBackoffMs'>;
  marketData: MarketDataService;
  stateMachine: PositionStateMachine;
  sink: TradeEventSink;
  eventBus: EventBus;
  logger: Logger;
  sleep?: Sleep;
  now?: () => number;
};

export type SchedulerResult = {
  cycles: number;
  fetchFailures: number;
  closingEvent: TradeEvent | null;
};

/** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
export const abortableSleep: Sleep = async (ms, signal) => {
  if (ms <= 0 || signal.aborted) {
    return;
  }

  try {
    await delay(ms, undefined, { signal });
  } catch (error: unknown) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

export function nextPollBoundary(previousBoundary: number, now: number, intervalMs: number): number {
  const elapsed = Math.max(0, now - previousBoundary);
  return previousBoundary + (Math.floor(elapsed / intervalMs) + 1) * intervalMs;
}

/**
 * Drives the fetch -> evaluate -> record cycle at a fixed cadence. Fetch
 * failures back off and retry the same cycle forever; cancellation is
 * cooperative and ends with exactly one close of any open position.
 */
export class PollingScheduler {
  private readonly config: PollingSchedulerOptions['config'];
  private readonly marketData: MarketDataService;
  private readonly stateMachine: PositionStateMachine;
  private readonly sink: TradeEventSink;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly controller = new AbortController();
  private runPromise: Promise<SchedulerResult> | null = null;
  private finalizePromise: Promise<SchedulerResult> | null = null;
  private lastTick: PriceTick | null = null;
  private cycles = 0;
  private fetchFailures = 0;

  constructor(options: PollingSchedulerOptions) {
    this.config = options.config;
    this.marketData = options.marketData;
    this.stateMachine = options.stateMachine;
    this.sink = options.sink;
    this.eventBus = options.eventBus;
    this.logger = options.logger;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? Date.now;
  }

  start(): Promise<SchedulerResult> {
    if (!this.runPromise) {
      this.logger.info(
        { symbol: this.config.symbol, interval: this.config.interval, pollIntervalMs: this.config.pollIntervalMs },
        'polling started'
      );
      this.runPromise = this.loop();
    }

    return this.runPromise;
  }

  /** Requests cancellation. Safe to call any number of times. */
  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.logger.info({ symbol: this.config.symbol }, 'cancellation requested');
      this.controller.abort();
    }
  }

  /** Cancels and waits for the loop (or, if it never started, the final close) to finish. */
  stop(): Promise<SchedulerResult> {
    this.cancel();
    return this.runPromise ?? this.finalize();
  }

  isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  getLastTick(): PriceTick | null {
    return this.lastTick;
  }

  private async loop(): Promise<SchedulerResult> {
    const { signal } = this.controller;
    let boundary = this.now();

    try {
      while (!signal.aborted) {
        const ticks = await this.fetchWithRetry(signal);
        if (ticks === null) {
          break;
        }

        await this.processTicks(ticks);

        boundary = nextPollBoundary(boundary, this.now(), this.config.pollIntervalMs);
        await this.sleep(boundary - this.now(), signal);
      }
    } catch (error: unknown) {
      this.logger.error({ err: error }, 'polling loop failed; closing open position');
      await this.finalize();
      throw error;
    }

    return this.finalize();
  }

  private async fetchWithRetry(signal: AbortSignal): Promise<PriceTick[] | null> {
    let attempt = 0;

    while (!signal.aborted) {
      try {
        return await this.marketData.poll();
      } catch (error: unknown) {
        if (!(error instanceof FetchError)) {
          throw error;
        }

        attempt += 1;
        this.fetchFailures += 1;
        this.logger.warn(
          { attempt, retryInMs: this.config.retryBackoffMs, errorMessage: error.message },
          'market data fetch failed; retrying'
        );
        this.eventBus.emit('fetch.failed', {
          symbol: this.config.symbol,
          interval: this.config.interval,
          attempt,
          message: error.message,
          retryInMs: this.config.retryBackoffMs
        });

        await this.sleep(this.config.retryBackoffMs, signal);
      }
    }

    return null;
  }

  private async processTicks(ticks: PriceTick[]): Promise<void> {
    const trades: TradeEvent[] = [];

    for (const tick of ticks) {
      const event = this.stateMachine.evaluate(tick);
      this.lastTick = tick;

      if (event) {
        await this.emitTrade(event);
        trades.push(event);
      }
    }

    this.cycles += 1;
    this.eventBus.emit('cycle.completed', {
      symbol: this.config.symbol,
      interval: this.config.interval,
      bars: this.marketData.getLatestBars(),
      ticksEvaluated: ticks.length,
      trades,
      completedAt: this.now()
    });
  }

  private async emitTrade(event: TradeEvent): Promise<void> {
    await this.sink.record(event);
    this.eventBus.emit('trade.executed', { symbol: this.config.symbol, event });
  }

  private finalize(): Promise<SchedulerResult> {
    if (!this.finalizePromise) {
      this.finalizePromise = this.closeOpenPosition();
    }

    return this.finalizePromise;
  }

  private async closeOpenPosition(): Promise<SchedulerResult> {
    let closingEvent: TradeEvent | null = null;

    if (this.lastTick) {
      const timestamp = Math.max(this.now(), this.lastTick.timestamp);
      closingEvent = this.stateMachine.cancel(this.lastTick.closePrice, timestamp);
      if (closingEvent) {
        await this.emitTrade(closingEvent);
      }
    }

    const result: SchedulerResult = {
      cycles: this.cycles,
      fetchFailures: this.fetchFailures,
      closingEvent
    };

    this.logger.info({ symbol: this.config.symbol, ...result }, 'polling stopped');
    this.eventBus.emit('scheduler.stopped', { symbol: this.config.symbol, ...result });
    return result;
  }
}
