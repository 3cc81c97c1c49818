/**
 * Player and game state types for the War simulator.
 *
 * GameState is the whole mutable state of one game: both players'
 * hands and discard piles plus the shared winnings pool. The engine
 * replaces it in a single assignment when a game is reset.
 */

import type { Card } from '../card-system/Card';
import { Pile } from '../card-system/Pile';

/** Number of players in a War game. */
export const PLAYER_COUNT = 2;

/** Index of a player: 0 for player 1, 1 for player 2. */
export type PlayerIndex = 0 | 1;

/** Both player indices, in seating order. */
export const PLAYER_INDICES: readonly PlayerIndex[] = [0, 1] as const;

/**
 * Identifies a player by name.
 */
export interface PlayerInfo {
  /** Display name for the player. */
  readonly name: string;
}

/**
 * Per-player card state.
 */
export interface PlayerState {
  /** Draw order; the front card is played next. */
  readonly hand: Pile;
  /** Won cards, oldest first. */
  readonly discard: Pile;
}

/**
 * Full mutable state of a War game.
 */
export interface GameState {
  /** Information about each player, indexed by player index. */
  readonly players: readonly [PlayerInfo, PlayerInfo];
  /** Per-player cards, parallel to `players`. */
  readonly playerStates: readonly [PlayerState, PlayerState];
  /** Cards at stake in the current (possibly chained) battle. */
  readonly winnings: Pile;
  /** Number of turns resolved so far. */
  turnNumber: number;
}

/**
 * Options for creating a new GameState.
 */
export interface GameStateOptions {
  /** Player names (defaults to "Player 1" and "Player 2"). */
  playerNames?: readonly [string, string];
  /** Starting hands for player 1 and player 2. */
  hands: readonly [readonly Card[], readonly Card[]];
}

/**
 * Create a player state with the given hand and an empty discard pile.
 */
export function createPlayerState(hand: readonly Card[]): PlayerState {
  return { hand: new Pile(hand), discard: new Pile() };
}

/**
 * Create a fresh GameState from the starting hands.
 */
export function createGameState(options: GameStateOptions): GameState {
  const [name1, name2] = options.playerNames ?? ['Player 1', 'Player 2'];
  const [hand1, hand2] = options.hands;

  return {
    players: [{ name: name1 }, { name: name2 }],
    playerStates: [createPlayerState(hand1), createPlayerState(hand2)],
    winnings: new Pile(),
    turnNumber: 0,
  };
}

/**
 * Cards a player holds across hand and discard.
 */
export function cardCount(player: PlayerState): number {
  return player.hand.size() + player.discard.size();
}

/**
 * Whether a player has no cards left anywhere.
 */
export function isOutOfCards(player: PlayerState): boolean {
  return player.hand.isEmpty() && player.discard.isEmpty();
}
