import dotenv from 'dotenv';
import type { ZodError } from 'zod';

import { ConfigurationError } from '../domain/errors.js';
import { intervalToMs } from '../domain/models.js';

import { envSchema, strategyConfigSchema, type AppConfig, type StrategyConfig } from './schema.js';

dotenv.config();

const MINUTE_MS = 60_000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }

  return result.data;
}

export function toStrategyConfig(config: AppConfig): StrategyConfig {
  const result = strategyConfigSchema.safeParse({
    symbol: config.SYMBOL,
    interval: config.INTERVAL,
    pollIntervalMs: intervalToMs(config.INTERVAL),
    stopLossPercent: config.STOP_LOSS_PERCENT,
    takeProfitPercent: config.TAKE_PROFIT_PERCENT,
    maxHoldMs: config.MAX_HOLD_MINUTES * MINUTE_MS,
    retryBackoffMs: config.RETRY_BACKOFF_MS,
    statusIntervalMs: config.STATUS_INTERVAL_MS
  });

  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }

  return Object.freeze(result.data);
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export { envSchema, strategyConfigSchema } from './schema.js';
export type { AppConfig, ExitRuleConfig, StrategyConfig } from './schema.js';
