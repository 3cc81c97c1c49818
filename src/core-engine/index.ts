/**
 * Core Engine Module
 *
 * Game state, seedable randomness, lifecycle events and the error
 * types shared by the War engine.
 */
export const ENGINE_VERSION = '0.1.0';

// Game state types and factory
export type {
  PlayerIndex,
  PlayerInfo,
  PlayerState,
  GameState,
  GameStateOptions,
} from './GameState';
export {
  PLAYER_COUNT,
  PLAYER_INDICES,
  createPlayerState,
  createGameState,
  cardCount,
  isOutOfCards,
} from './GameState';

// Random sources
export type { RandomSource } from './Random';
export { createSeededRng } from './Random';

// Errors
export {
  ConfigurationError,
  OutOfCardsError,
  UnsupportedOperationError,
} from './errors';

// Game event system
export type {
  TurnResolvedPayload,
  WarDeclaredPayload,
  DiscardRecycledPayload,
  GameEndedPayload,
  GameResetPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';
