import { loadConfig, toStrategyConfig } from '../src/config/index.js';
import { ConfigurationError } from '../src/domain/errors.js';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('config', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      SYMBOL: 'RELIANCE.NS',
      INTERVAL: '1m',
      STOP_LOSS_PERCENT: 0.001,
      TAKE_PROFIT_PERCENT: 0.002,
      MAX_HOLD_MINUTES: 5,
      RETRY_BACKOFF_MS: 60_000,
      TRADES_DIR: 'trades'
    });
  });

  it('derives a frozen strategy config with poll interval and hold duration in ms', () => {
    const strategy = toStrategyConfig(loadConfig({}));

    expect(strategy).toEqual({
      symbol: 'RELIANCE.NS',
      interval: '1m',
      pollIntervalMs: 60_000,
      stopLossPercent: 0.001,
      takeProfitPercent: 0.002,
      maxHoldMs: 300_000,
      retryBackoffMs: 60_000,
      statusIntervalMs: 60_000
    });
    expect(Object.isFrozen(strategy)).toBe(true);
  });

  it('polls every fifteen minutes on the 15m interval', () => {
    expect(toStrategyConfig(loadConfig({ INTERVAL: '15m' })).pollIntervalMs).toBe(900_000);
  });

  it('rejects unsupported intervals while loading', () => {
    expect(() => loadConfig({ INTERVAL: '5m' })).toThrow(ConfigurationError);
  });

  it('rejects a negative stop-loss percent', () => {
    const issues = issuesOf(() => toStrategyConfig(loadConfig({ STOP_LOSS_PERCENT: '-0.1' })));

    expect(issues).toEqual(['stopLossPercent: stopLossPercent must be greater than 0']);
  });

  it('rejects a zero hold duration', () => {
    const issues = issuesOf(() => toStrategyConfig(loadConfig({ MAX_HOLD_MINUTES: '0' })));

    expect(issues).toEqual(['maxHoldMs: maxHoldDuration must be positive']);
  });

  it('rejects a blank symbol', () => {
    const issues = issuesOf(() => toStrategyConfig(loadConfig({ SYMBOL: '   ' })));

    expect(issues).toEqual(['symbol: symbol must not be empty']);
  });

  it('reports every invalid field at once', () => {
    const issues = issuesOf(() =>
      toStrategyConfig(loadConfig({ STOP_LOSS_PERCENT: '1.5', TAKE_PROFIT_PERCENT: '0' }))
    );

    expect(issues).toEqual([
      'stopLossPercent: stopLossPercent must be less than 1',
      'takeProfitPercent: takeProfitPercent must be greater than 0'
    ]);
  });
});
