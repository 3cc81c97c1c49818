/**
 * Card System Module
 *
 * War cards, the War deck, and the ordered Pile used for hands,
 * discard piles and the winnings pool.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types
export type { Card, Rank } from './Card';
export {
  RANKS,
  JACK,
  QUEEN,
  KING,
  ACE,
  COPIES_PER_RANK,
  isCard,
  cardLabel,
} from './Card';

// Deck factory and operations
export {
  STANDARD_DECK_SIZE,
  createStandardDeck,
  shuffle,
  sample,
  dealHands,
  dealRandomHands,
} from './Deck';

// Pile abstraction
export { Pile } from './Pile';
