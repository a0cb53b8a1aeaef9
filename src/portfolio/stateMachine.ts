import type { ExitRuleConfig } from '../config/schema.js';
import { StateInvariantViolation } from '../domain/errors.js';
import type { Position, PriceTick, SellEvent, TradeEvent } from '../domain/models.js';

import { checkExit, computeProfit } from './exitRules.js';

export type PositionState = { kind: 'Flat' } | { kind: 'Long'; position: Position };

export type PositionLabel = 'None' | 'LONG';

export type Transition = {
  state: PositionState;
  event: TradeEvent | null;
};

const FLAT: PositionState = Object.freeze({ kind: 'Flat' });

/**
 * Pure transition for one tick. Flat always buys at the tick; Long either
 * stays put or sells on the first exit rule that matches.
 */
export function nextState(state: PositionState, tick: PriceTick, config: ExitRuleConfig): Transition {
  if (state.kind === 'Flat') {
    const position: Position = { entryPrice: tick.closePrice, entryTimestamp: tick.timestamp };
    return {
      state: { kind: 'Long', position },
      event: { kind: 'BUY', price: tick.closePrice, timestamp: tick.timestamp }
    };
  }

  const reason = checkExit(state.position, tick, config);
  if (!reason) {
    return { state, event: null };
  }

  return {
    state: FLAT,
    event: buildSell(state.position, tick.closePrice, tick.timestamp, reason)
  };
}

export function closeOnCancel(state: PositionState, price: number, timestamp: number): Transition {
  if (state.kind === 'Flat') {
    return { state, event: null };
  }

  return {
    state: FLAT,
    event: buildSell(state.position, price, timestamp, 'ManualStop')
  };
}

function buildSell(position: Position, price: number, timestamp: number, reason: SellEvent['reason']): SellEvent {
  return {
    kind: 'SELL',
    price,
    timestamp,
    profit: computeProfit(position.entryPrice, price),
    reason
  };
}

/**
 * Owns the single optional position of one run. All timing decisions use
 * tick timestamps, so a recorded tick sequence always replays the same way.
 */
export class PositionStateMachine {
  private readonly config: ExitRuleConfig;
  private state: PositionState = FLAT;
  private lastTimestamp: number | null = null;

  constructor(config: ExitRuleConfig) {
    this.config = config;
  }

  evaluate(tick: PriceTick): TradeEvent | null {
    this.assertChronological(tick.timestamp);

    const transition = nextState(this.state, tick, this.config);
    this.state = transition.state;
    this.lastTimestamp = tick.timestamp;
    return transition.event;
  }

  /** Manual stop: closes at the caller's price, or does nothing when flat. */
  cancel(price: number, timestamp: number): TradeEvent | null {
    if (this.state.kind === 'Long') {
      this.assertChronological(timestamp);
    }

    const transition = closeOnCancel(this.state, price, timestamp);
    this.state = transition.state;
    if (transition.event) {
      this.lastTimestamp = timestamp;
    }
    return transition.event;
  }

  getState(): PositionState {
    return this.state;
  }

  getOpenPosition(): Position | null {
    return this.state.kind === 'Long' ? { ...this.state.position } : null;
  }

  getPositionLabel(): PositionLabel {
    return this.state.kind === 'Long' ? 'LONG' : 'None';
  }

  private assertChronological(timestamp: number): void {
    if (this.lastTimestamp !== null && timestamp < this.lastTimestamp) {
      throw new StateInvariantViolation(
        `Tick at ${timestamp} is older than the last evaluated tick at ${this.lastTimestamp}`
      );
    }
  }
}
