import Decimal from 'decimal.js';

import type { ExitRuleConfig } from '../config/schema.js';
import type { ExitReason, Position, PriceTick } from '../domain/models.js';

export type ExitThresholds = {
  stopLossPrice: Decimal;
  takeProfitPrice: Decimal;
  expiresAt: number;
};

export function computeExitThresholds(position: Position, config: ExitRuleConfig): ExitThresholds {
  const entry = new Decimal(position.entryPrice);

  return {
    stopLossPrice: entry.times(new Decimal(1).minus(config.stopLossPercent)),
    takeProfitPrice: entry.times(new Decimal(1).plus(config.takeProfitPercent)),
    expiresAt: position.entryTimestamp + config.maxHoldMs
  };
}

/**
 * Checks the exit rules in priority order: stop-loss, take-profit, then time.
 * Comparisons are inclusive, so a tick sitting exactly on a threshold exits.
 */
export function checkExit(position: Position, tick: PriceTick, config: ExitRuleConfig): ExitReason | null {
  const thresholds = computeExitThresholds(position, config);
  const price = new Decimal(tick.closePrice);

  if (price.lte(thresholds.stopLossPrice)) {
    return 'StopLoss';
  }

  if (price.gte(thresholds.takeProfitPrice)) {
    return 'TakeProfit';
  }

  if (tick.timestamp >= thresholds.expiresAt) {
    return 'TimeExit';
  }

  return null;
}

export function computeProfit(entryPrice: number, exitPrice: number): number {
  return new Decimal(exitPrice).minus(entryPrice).toNumber();
}
