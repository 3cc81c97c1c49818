/**
 * Card types for the War simulator.
 *
 * War only compares ranks, so a card is represented by its rank alone:
 * an integer from 2 to 14, with the face cards numbered above the 10
 * (Jack 11, Queen 12, King 13, Ace 14).
 */

/** Card ranks used by War (Ace high). */
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;

/** A War card. Suits play no part in the rules and are not tracked. */
export type Card = Rank;

/** All ranks in order (Ace high). */
export const RANKS: readonly Rank[] = [
  2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14,
] as const;

export const JACK: Rank = 11;
export const QUEEN: Rank = 12;
export const KING: Rank = 13;
export const ACE: Rank = 14;

/** Copies of each rank in a standard deck (one per suit). */
export const COPIES_PER_RANK = 4;

/**
 * Whether a value is a valid War card.
 */
export function isCard(value: unknown): value is Card {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 2 &&
    value <= 14
  );
}

const FACE_LABELS: Partial<Record<Rank, string>> = {
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A',
};

/**
 * Short label for a card: the number for pip cards, a letter for faces.
 */
export function cardLabel(card: Card): string {
  return FACE_LABELS[card] ?? String(card);
}
