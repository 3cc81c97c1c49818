/**
 * Rule Engine Module
 *
 * The War ruleset: battles, wagers, discard recycling and the
 * end-of-game check.
 */
export const RULE_ENGINE_VERSION = '0.1.0';

export type {
  RecycleMode,
  RecycleStrategy,
  BattleResult,
  GameOverCheck,
} from './WarRules';
export {
  RECYCLE_MODES,
  RECYCLE_STRATEGIES,
  isRecycleMode,
  isDeterministicRecycle,
  recycleOrder,
  compareCards,
  wagerCount,
  canWager,
  checkGameOver,
} from './WarRules';
