export { checkExit, computeExitThresholds, computeProfit, type ExitThresholds } from './exitRules.js';
export {
  PositionStateMachine,
  closeOnCancel,
  nextState,
  type PositionLabel,
  type PositionState,
  type Transition
} from './stateMachine.js';
export { TradeJournal, type TradeSummary } from './tradeJournal.js';
