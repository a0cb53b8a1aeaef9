import { StateInvariantViolation } from '../src/domain/errors.js';
import type { TradeEvent } from '../src/domain/models.js';
import { PositionStateMachine, closeOnCancel, nextState, type PositionState } from '../src/portfolio/stateMachine.js';

const T0 = Date.parse('2025-03-19T14:30:00+05:30');
const MINUTE = 60_000;

const config = {
  stopLossPercent: 0.001,
  takeProfitPercent: 0.002,
  maxHoldMs: 5 * MINUTE
};

describe('nextState', () => {
  it('opens a position on any tick while flat', () => {
    const flat: PositionState = { kind: 'Flat' };
    const transition = nextState(flat, { timestamp: T0, closePrice: 2850.25 }, config);

    expect(transition.event).toEqual({ kind: 'BUY', price: 2850.25, timestamp: T0 });
    expect(transition.state).toEqual({ kind: 'Long', position: { entryPrice: 2850.25, entryTimestamp: T0 } });
    expect(flat).toEqual({ kind: 'Flat' });
  });

  it('keeps the same state object while no exit rule matches', () => {
    const long: PositionState = { kind: 'Long', position: { entryPrice: 100, entryTimestamp: T0 } };
    const transition = nextState(long, { timestamp: T0 + MINUTE, closePrice: 100.1 }, config);

    expect(transition.event).toBeNull();
    expect(transition.state).toBe(long);
  });

  it('does nothing on cancellation while flat', () => {
    expect(closeOnCancel({ kind: 'Flat' }, 100, T0)).toEqual({ state: { kind: 'Flat' }, event: null });
  });
});

describe('PositionStateMachine', () => {
  it('sells on time exit with the price difference as profit', () => {
    const machine = new PositionStateMachine(config);

    machine.evaluate({ timestamp: T0, closePrice: 2850.25 });
    const sell = machine.evaluate({ timestamp: T0 + 5 * MINUTE, closePrice: 2847.4 });

    expect(sell).toEqual({
      kind: 'SELL',
      price: 2847.4,
      timestamp: T0 + 5 * MINUTE,
      profit: -2.85,
      reason: 'TimeExit'
    });
    expect(machine.getPositionLabel()).toBe('None');
    expect(machine.getOpenPosition()).toBeNull();
  });

  it('reports stop-loss rather than time exit for a late losing tick', () => {
    const machine = new PositionStateMachine(config);

    machine.evaluate({ timestamp: T0, closePrice: 100 });
    const sell = machine.evaluate({ timestamp: T0 + 6 * MINUTE, closePrice: 99.89 });

    expect(sell?.kind).toBe('SELL');
    expect(sell?.kind === 'SELL' && sell.reason).toBe('StopLoss');
  });

  it('buys again on the first tick after a sell', () => {
    const machine = new PositionStateMachine(config);

    machine.evaluate({ timestamp: T0, closePrice: 100 });
    machine.evaluate({ timestamp: T0 + MINUTE, closePrice: 100.2 });
    const rebuy = machine.evaluate({ timestamp: T0 + 2 * MINUTE, closePrice: 100.3 });

    expect(rebuy).toEqual({ kind: 'BUY', price: 100.3, timestamp: T0 + 2 * MINUTE });
    expect(machine.getOpenPosition()).toEqual({ entryPrice: 100.3, entryTimestamp: T0 + 2 * MINUTE });
  });

  it('closes with ManualStop on cancel and ignores repeated cancels', () => {
    const machine = new PositionStateMachine(config);
    machine.evaluate({ timestamp: T0, closePrice: 100 });

    const first = machine.cancel(100.05, T0 + MINUTE);
    const second = machine.cancel(100.05, T0 + MINUTE);

    expect(first).toEqual({ kind: 'SELL', price: 100.05, timestamp: T0 + MINUTE, profit: 0.05, reason: 'ManualStop' });
    expect(second).toBeNull();
  });

  it('produces no event when cancelled while flat', () => {
    const machine = new PositionStateMachine(config);

    expect(machine.cancel(100, T0)).toBeNull();
    expect(machine.cancel(100, T0)).toBeNull();
  });

  it('treats equal timestamps as a price update on the same bar', () => {
    const machine = new PositionStateMachine(config);
    machine.evaluate({ timestamp: T0, closePrice: 100 });

    const sell = machine.evaluate({ timestamp: T0, closePrice: 99.9 });

    expect(sell).toEqual({ kind: 'SELL', price: 99.9, timestamp: T0, profit: -0.1, reason: 'StopLoss' });
  });

  it('rejects a tick older than the last evaluated one', () => {
    const machine = new PositionStateMachine(config);
    machine.evaluate({ timestamp: T0 + MINUTE, closePrice: 100 });

    expect(() => machine.evaluate({ timestamp: T0, closePrice: 100 })).toThrow(StateInvariantViolation);
  });

  it('alternates BUY and SELL with non-decreasing timestamps over a long random walk', () => {
    const machine = new PositionStateMachine(config);
    const events: TradeEvent[] = [];

    let seed = 42;
    const random = () => {
      seed = (seed * 1_103_515_245 + 12_345) % 2_147_483_648;
      return seed / 2_147_483_648;
    };

    let price = 1000;
    let timestamp = T0;
    for (let index = 0; index < 500; index += 1) {
      price = Math.round((price + (random() - 0.5) * 4) * 100) / 100;
      timestamp += random() < 0.2 ? 0 : MINUTE;
      const event = machine.evaluate({ timestamp, closePrice: price });
      if (event) {
        events.push(event);
      }
    }

    expect(events[0]?.kind).toBe('BUY');
    events.forEach((event, index) => {
      expect(event.kind).toBe(index % 2 === 0 ? 'BUY' : 'SELL');
      const previous = events[index - 1];
      if (previous) {
        expect(event.timestamp).toBeGreaterThanOrEqual(previous.timestamp);
      }
    });
  });
});
