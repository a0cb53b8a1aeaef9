import type { TradeEvent } from '../domain/models.js';

export type TradeEventSink = {
  record(event: TradeEvent): void | Promise<void>;
};

/** Records into each sink in order; a sink only sees an event after the previous one accepted it. */
export class CompositeTradeSink implements TradeEventSink {
  private readonly sinks: readonly TradeEventSink[];

  constructor(sinks: readonly TradeEventSink[]) {
    this.sinks = sinks;
  }

  async record(event: TradeEvent): Promise<void> {
    for (const sink of this.sinks) {
      await sink.record(event);
    }
  }
}
