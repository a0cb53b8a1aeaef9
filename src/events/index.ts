export { EventBus, type EventBusOptions } from './eventBus.js';

export type {
  BarsFetchedPayload,
  CycleCompletedPayload,
  EventHandler,
  FetchFailedPayload,
  SchedulerStoppedPayload,
  StatusReport,
  TradeExecutedPayload,
  TradingEventMap,
  TradingEventName
} from './events.js';
