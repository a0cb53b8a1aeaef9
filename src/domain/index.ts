export {
  INTERVAL_MS,
  auditEventSchema,
  auditLevelSchema,
  barSchema,
  buyEventSchema,
  exitReasonSchema,
  intervalSchema,
  intervalToMs,
  positionSchema,
  priceTickSchema,
  sellEventSchema,
  toPriceTick,
  tradeEventSchema
} from './models.js';

export type {
  AuditEvent,
  Bar,
  BuyEvent,
  ExitReason,
  Interval,
  Position,
  PriceTick,
  RoundTrip,
  SellEvent,
  TradeEvent
} from './models.js';

export { ConfigurationError, FetchError, StateInvariantViolation } from './errors.js';
