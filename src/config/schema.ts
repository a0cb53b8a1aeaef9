import { z } from 'zod';

import { intervalSchema } from '../domain/models.js';

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SYMBOL: z.string().trim().default('RELIANCE.NS'),
  INTERVAL: intervalSchema.default('1m'),
  STOP_LOSS_PERCENT: z.coerce.number().finite().default(0.001),
  TAKE_PROFIT_PERCENT: z.coerce.number().finite().default(0.002),
  MAX_HOLD_MINUTES: z.coerce.number().finite().default(5),
  RETRY_BACKOFF_MS: z.coerce.number().int().positive().default(60_000),
  STATUS_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  TRADES_DIR: z.string().min(1).default('trades'),
  YAHOO_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com'),
  YAHOO_RANGE: z.string().min(1).default('1d'),
  YAHOO_USER_AGENT: z.string().min(1).optional(),
  BACKTEST_FROM: z.coerce.date().optional(),
  BACKTEST_TO: z.coerce.date().optional(),
  BACKTEST_BARS_FILE: z.string().min(1).optional()
});

export type AppConfig = z.infer<typeof envSchema>;

export const strategyConfigSchema = z
  .object({
    symbol: z.string().min(1, 'symbol must not be empty'),
    interval: intervalSchema,
    pollIntervalMs: z.number().int().positive(),
    stopLossPercent: z
      .number()
      .gt(0, 'stopLossPercent must be greater than 0')
      .lt(1, 'stopLossPercent must be less than 1'),
    takeProfitPercent: z.number().gt(0, 'takeProfitPercent must be greater than 0'),
    maxHoldMs: z.number().gt(0, 'maxHoldDuration must be positive'),
    retryBackoffMs: z.number().int().positive(),
    statusIntervalMs: z.number().int().positive()
  })
  .strict();

export type StrategyConfig = Readonly<z.infer<typeof strategyConfigSchema>>;

/** The subset the exit rules read. */
export type ExitRuleConfig = Pick<StrategyConfig, 'stopLossPercent' | 'takeProfitPercent' | 'maxHoldMs'>;
