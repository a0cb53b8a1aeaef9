import type { AuditEvent, Bar, Interval, TradeEvent } from '../domain/models.js';

export type BarsFetchedPayload = {
  symbol: string;
  interval: Interval;
  bars: Bar[];
  fetchedAt: number;
};

export type CycleCompletedPayload = {
  symbol: string;
  interval: Interval;
  bars: readonly Bar[];
  ticksEvaluated: number;
  trades: TradeEvent[];
  completedAt: number;
};

export type TradeExecutedPayload = {
  symbol: string;
  event: TradeEvent;
};

export type FetchFailedPayload = {
  symbol: string;
  interval: Interval;
  attempt: number;
  message: string;
  retryInMs: number;
};

export type StatusReport = {
  currentTime: number;
  latestPrice: number | null;
  positionState: 'None' | 'LONG';
  completedTradeCount: number;
};

export type SchedulerStoppedPayload = {
  symbol: string;
  cycles: number;
  fetchFailures: number;
  closingEvent: TradeEvent | null;
};

export type TradingEventMap = {
  'bars.fetched': BarsFetchedPayload;
  'cycle.completed': CycleCompletedPayload;
  'trade.executed': TradeExecutedPayload;
  'fetch.failed': FetchFailedPayload;
  'status.reported': StatusReport;
  'scheduler.stopped': SchedulerStoppedPayload;
  'audit.event': AuditEvent;
};

export type TradingEventName = keyof TradingEventMap;
export type EventHandler<TPayload> = (payload: TPayload) => void | Promise<void>;
