import { describe, it, expect } from 'vitest';
import {
  STANDARD_DECK_SIZE,
  createStandardDeck,
  shuffle,
  sample,
  dealHands,
  dealRandomHands,
} from '../../src/card-system/Deck';
import { RANKS } from '../../src/card-system/Card';
import type { Card } from '../../src/card-system/Card';

// Deterministic RNG for testing (simple LCG)
function createTestRng(seed: number = 42): () => number {
  let s = seed;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

function sorted(cards: readonly Card[]): Card[] {
  return [...cards].sort((a, b) => a - b);
}

describe('Deck', () => {
  describe('createStandardDeck', () => {
    it('should create a deck of 52 cards', () => {
      expect(createStandardDeck()).toHaveLength(52);
      expect(STANDARD_DECK_SIZE).toBe(52);
    });

    it('should contain every rank exactly four times', () => {
      const deck = createStandardDeck();
      for (const rank of RANKS) {
        expect(deck.filter((c) => c === rank)).toHaveLength(4);
      }
    });

    it('should order ranks ascending within each suit block', () => {
      const deck = createStandardDeck();
      expect(deck.slice(0, 13)).toEqual([...RANKS]);
      expect(deck.slice(39)).toEqual([...RANKS]);
    });
  });

  describe('shuffle', () => {
    it('should change the order of cards', () => {
      const deck = createStandardDeck();
      const original = [...deck];
      shuffle(deck, createTestRng());
      expect(deck).not.toEqual(original);
    });

    it('should preserve the multiset of cards', () => {
      const deck = createStandardDeck();
      shuffle(deck, createTestRng(7));
      expect(sorted(deck)).toEqual(sorted(createStandardDeck()));
    });

    it('should return the same array reference', () => {
      const deck = createStandardDeck();
      expect(shuffle(deck, createTestRng())).toBe(deck);
    });

    it('should be deterministic for a given seed', () => {
      const a = shuffle(createStandardDeck(), createTestRng(99));
      const b = shuffle(createStandardDeck(), createTestRng(99));
      expect(a).toEqual(b);
    });

    it('should swap each position with the front when rng always returns 0', () => {
      // j is always 0: each step swaps position i with the front
      expect(shuffle([2, 3, 4], () => 0)).toEqual([3, 4, 2]);
    });
  });

  describe('sample', () => {
    it('should leave the input untouched', () => {
      const cards: Card[] = [3, 5, 7];
      const result = sample(cards, createTestRng());
      expect(cards).toEqual([3, 5, 7]);
      expect(result).not.toBe(cards);
      expect(sorted(result)).toEqual([3, 5, 7]);
    });
  });

  describe('dealHands', () => {
    it('should give the first half to player 1 and the rest to player 2', () => {
      const [p1, p2] = dealHands([2, 3, 4, 5]);
      expect(p1).toEqual([2, 3]);
      expect(p2).toEqual([4, 5]);
    });

    it('should give the extra card of an odd deck to player 2', () => {
      const [p1, p2] = dealHands([2, 3, 4]);
      expect(p1).toEqual([2]);
      expect(p2).toEqual([3, 4]);
    });
  });

  describe('dealRandomHands', () => {
    it('should deal two 26-card hands covering the whole deck', () => {
      const [p1, p2] = dealRandomHands(createTestRng());
      expect(p1).toHaveLength(26);
      expect(p2).toHaveLength(26);
      expect(sorted([...p1, ...p2])).toEqual(sorted(createStandardDeck()));
    });
  });
});
