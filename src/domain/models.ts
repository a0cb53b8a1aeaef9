import { z } from 'zod';

const finiteNonNegativeNumber = z.number().finite().nonnegative();
const finitePositiveNumber = z.number().finite().positive();
const epochMsSchema = z.number().int().nonnegative();
const nonEmptyString = z.string().min(1);

export const intervalSchema = z.enum(['1m', '15m']);

export const INTERVAL_MS: Record<Interval, number> = {
  '1m': 60_000,
  '15m': 900_000
};

/**
 * Example:
 * {
 *   "symbol": "RELIANCE.NS",
 *   "interval": "1m",
 *   "timestamp": 1742376600000,
 *   "open": 2849.9,
 *   "high": 2851.2,
 *   "low": 2849.5,
 *   "close": 2850.25,
 *   "volume": 10412
 * }
 */
export const barSchema = z
  .object({
    symbol: nonEmptyString,
    interval: intervalSchema,
    timestamp: epochMsSchema,
    open: finiteNonNegativeNumber,
    high: finiteNonNegativeNumber,
    low: finiteNonNegativeNumber,
    close: finitePositiveNumber,
    volume: finiteNonNegativeNumber
  })
  .strict();

export const priceTickSchema = z
  .object({
    timestamp: epochMsSchema,
    closePrice: finitePositiveNumber
  })
  .strict();

export const exitReasonSchema = z.enum(['StopLoss', 'TakeProfit', 'TimeExit', 'ManualStop']);

export const positionSchema = z
  .object({
    entryPrice: finitePositiveNumber,
    entryTimestamp: epochMsSchema
  })
  .strict();

export const buyEventSchema = z
  .object({
    kind: z.literal('BUY'),
    price: finitePositiveNumber,
    timestamp: epochMsSchema
  })
  .strict();

/**
 * Example:
 * {
 *   "kind": "SELL",
 *   "price": 2847.4,
 *   "timestamp": 1742376720000,
 *   "profit": -2.85,
 *   "reason": "StopLoss"
 * }
 */
export const sellEventSchema = z
  .object({
    kind: z.literal('SELL'),
    price: finitePositiveNumber,
    timestamp: epochMsSchema,
    profit: z.number().finite(),
    reason: exitReasonSchema
  })
  .strict();

export const tradeEventSchema = z.discriminatedUnion('kind', [buyEventSchema, sellEventSchema]);

export const auditLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const auditEventSchema = z
  .object({
    id: nonEmptyString,
    ts: epochMsSchema,
    step: nonEmptyString,
    level: auditLevelSchema,
    message: nonEmptyString,
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type Interval = z.infer<typeof intervalSchema>;
export type Bar = z.infer<typeof barSchema>;
export type PriceTick = z.infer<typeof priceTickSchema>;
export type ExitReason = z.infer<typeof exitReasonSchema>;
export type Position = z.infer<typeof positionSchema>;
export type BuyEvent = z.infer<typeof buyEventSchema>;
export type SellEvent = z.infer<typeof sellEventSchema>;
export type TradeEvent = z.infer<typeof tradeEventSchema>;
export type AuditEvent = z.infer<typeof auditEventSchema>;

export type RoundTrip = {
  entryPrice: number;
  entryTimestamp: number;
  exitPrice: number;
  exitTimestamp: number;
  profit: number;
  reason: ExitReason;
  holdMs: number;
};

export function toPriceTick(bar: Bar): PriceTick {
  return { timestamp: bar.timestamp, closePrice: bar.close };
}

export function intervalToMs(interval: Interval): number {
  return INTERVAL_MS[interval];
}
