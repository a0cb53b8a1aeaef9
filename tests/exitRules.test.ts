import { checkExit, computeExitThresholds, computeProfit } from '../src/portfolio/exitRules.js';

const T0 = Date.parse('2025-03-19T14:30:00+05:30');
const MINUTE = 60_000;

const config = {
  stopLossPercent: 0.001,
  takeProfitPercent: 0.002,
  maxHoldMs: 5 * MINUTE
};

describe('exit rules', () => {
  const position = { entryPrice: 2850.25, entryTimestamp: T0 };

  it('computes exact decimal thresholds from the entry price', () => {
    const thresholds = computeExitThresholds(position, config);

    expect(thresholds.stopLossPrice.toString()).toBe('2847.39975');
    expect(thresholds.takeProfitPrice.toString()).toBe('2855.9505');
    expect(thresholds.expiresAt).toBe(T0 + 5 * MINUTE);
  });

  it('triggers stop-loss at and below the threshold, not above it', () => {
    expect(checkExit(position, { timestamp: T0 + MINUTE, closePrice: 2847.39975 }, config)).toBe('StopLoss');
    expect(checkExit(position, { timestamp: T0 + MINUTE, closePrice: 2847.3975 }, config)).toBe('StopLoss');
    expect(checkExit(position, { timestamp: T0 + MINUTE, closePrice: 2847.4 }, config)).toBeNull();
  });

  it('triggers take-profit at and above the threshold', () => {
    expect(checkExit(position, { timestamp: T0 + MINUTE, closePrice: 2855.9505 }, config)).toBe('TakeProfit');
    expect(checkExit(position, { timestamp: T0 + MINUTE, closePrice: 2860 }, config)).toBe('TakeProfit');
    expect(checkExit(position, { timestamp: T0 + MINUTE, closePrice: 2855.95 }, config)).toBeNull();
  });

  it('triggers a time exit once the hold duration has fully elapsed', () => {
    expect(checkExit(position, { timestamp: T0 + 5 * MINUTE - 1, closePrice: 2850 }, config)).toBeNull();
    expect(checkExit(position, { timestamp: T0 + 5 * MINUTE, closePrice: 2850 }, config)).toBe('TimeExit');
  });

  it('prefers stop-loss over time exit when both hold', () => {
    const reason = checkExit(
      { entryPrice: 100, entryTimestamp: T0 },
      { timestamp: T0 + 10 * MINUTE, closePrice: 99.89 },
      config
    );

    expect(reason).toBe('StopLoss');
  });

  it('prefers take-profit over time exit when both hold', () => {
    const reason = checkExit(
      { entryPrice: 100, entryTimestamp: T0 },
      { timestamp: T0 + 10 * MINUTE, closePrice: 100.5 },
      config
    );

    expect(reason).toBe('TakeProfit');
  });

  it('computes profit as a signed price difference', () => {
    expect(computeProfit(2850.25, 2847.4)).toBe(-2.85);
    expect(computeProfit(100, 100.25)).toBe(0.25);
    expect(computeProfit(100.3, 100.3)).toBe(0);
  });
});
