/**
 * Pure War rules.
 *
 * Card comparison, wager sizes, discard recycling strategies and the
 * end-of-game predicate. Nothing here mutates game state; the engine
 * in games/war applies these rules to its piles.
 */

import type { Card, Rank } from '../card-system/Card';
import { sample } from '../card-system/Deck';
import type { PlayerIndex, PlayerState } from '../core-engine/GameState';
import { cardCount, isOutOfCards } from '../core-engine/GameState';
import type { RandomSource } from '../core-engine/Random';

// ── Recycle strategies ──────────────────────────────────────

/**
 * How a drained discard pile is returned to a player's hand.
 *
 * - `fifo`     -- oldest discard is drawn first.
 * - `filo`     -- newest discard is drawn first.
 * - `shuffled` -- discard is shuffled before it is appended.
 */
export type RecycleMode = 'fifo' | 'filo' | 'shuffled';

/** All recycle modes. */
export const RECYCLE_MODES = ['fifo', 'filo', 'shuffled'] as const satisfies readonly RecycleMode[];

/** Orders a discard pile (oldest first) for appending to a hand. */
export type RecycleStrategy = (
  discard: readonly Card[],
  rng: RandomSource,
) => Card[];

/** Strategy table, one entry per recycle mode. */
export const RECYCLE_STRATEGIES: Readonly<Record<RecycleMode, RecycleStrategy>> = {
  fifo: (discard) => [...discard],
  filo: (discard) => [...discard].reverse(),
  shuffled: (discard, rng) => sample(discard, rng),
};

/**
 * Whether a value names a recycle mode.
 */
export function isRecycleMode(value: unknown): value is RecycleMode {
  return RECYCLE_MODES.some((mode) => mode === value);
}

/**
 * Whether a recycle mode keeps a stable order that can be laid out
 * ahead of time (every mode except `shuffled`).
 */
export function isDeterministicRecycle(mode: RecycleMode): boolean {
  return mode !== 'shuffled';
}

/**
 * Order a discard pile for appending to a hand under the given mode.
 */
export function recycleOrder(
  mode: RecycleMode,
  discard: readonly Card[],
  rng: RandomSource,
): Card[] {
  return RECYCLE_STRATEGIES[mode](discard, rng);
}

// ── Battles ─────────────────────────────────────────────────

/** Outcome of comparing two face-up cards. */
export type BattleResult = PlayerIndex | 'war';

/**
 * Compare player 1's card against player 2's card.
 */
export function compareCards(first: Card, second: Card): BattleResult {
  if (first > second) return 0;
  if (first < second) return 1;
  return 'war';
}

/** Face-down cards wagered per player when a war breaks out over a rank. */
const WAR_WAGERS: Partial<Record<Rank, number>> = {
  14: 4,
  13: 3,
  12: 2,
};

/**
 * Cards each player must wager after tying on `rank`:
 * 4 for Aces, 3 for Kings, 2 for Queens, 1 for everything else.
 * Ranks: Ace 14, King 13, Queen 12.
 */
export function wagerCount(rank: Card): number {
  return WAR_WAGERS[rank] ?? 1;
}

/**
 * Whether a player can put another card into a war. A player always
 * keeps at least one card back.
 */
export function canWager(player: PlayerState): boolean {
  return cardCount(player) > 1;
}

// ── End of game ─────────────────────────────────────────────

/** Result of the end-of-game check. */
export type GameOverCheck =
  | { readonly over: false }
  | { readonly over: true; readonly finished: boolean };

/**
 * Decide whether play stops before the next turn.
 *
 * A player with no cards left ends the game as finished; otherwise
 * reaching the turn cap ends it unfinished.
 */
export function checkGameOver(
  players: readonly PlayerState[],
  turnsPlayed: number,
  maxHands: number,
): GameOverCheck {
  if (players.some(isOutOfCards)) {
    return { over: true, finished: true };
  }
  if (turnsPlayed >= maxHands) {
    return { over: true, finished: false };
  }
  return { over: false };
}
