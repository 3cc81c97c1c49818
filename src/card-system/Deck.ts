/**
 * Deck operations for the War simulator.
 *
 * A deck is a plain Card array. The helpers here build the War deck,
 * shuffle and sample arrays with an injectable random source, and
 * split a deck into the two starting hands.
 */

import { Card, RANKS, COPIES_PER_RANK } from './Card';

/** Size of a standard War deck. */
export const STANDARD_DECK_SIZE = RANKS.length * COPIES_PER_RANK;

/**
 * Create the 52-card War deck: each rank from 2 to 14, four times.
 *
 * Cards are ordered rank-ascending, repeated once per suit.
 */
export function createStandardDeck(): Card[] {
  const deck: Card[] = [];
  for (let copy = 0; copy < COPIES_PER_RANK; copy++) {
    deck.push(...RANKS);
  }
  return deck;
}

/**
 * Shuffle an array in place using the Fisher-Yates algorithm.
 *
 * The generator must return a value in [0, 1) (same contract as
 * Math.random).
 *
 * @returns The same array reference (mutated).
 */
export function shuffle<T>(items: T[], rng: () => number = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

/**
 * Return a uniformly random permutation of `items` as a new array.
 * The input is left untouched.
 */
export function sample<T>(
  items: readonly T[],
  rng: () => number = Math.random,
): T[] {
  return shuffle([...items], rng);
}

/**
 * Split a deck into two hands: the first half to player 1,
 * the remainder to player 2.
 */
export function dealHands(deck: readonly Card[]): [Card[], Card[]] {
  const half = Math.floor(deck.length / 2);
  return [deck.slice(0, half), deck.slice(half)];
}

/**
 * Shuffle a fresh War deck and deal it into two 26-card hands.
 */
export function dealRandomHands(
  rng: () => number = Math.random,
): [Card[], Card[]] {
  return dealHands(shuffle(createStandardDeck(), rng));
}
