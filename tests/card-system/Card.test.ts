import { describe, it, expect } from 'vitest';
import {
  RANKS,
  ACE,
  KING,
  QUEEN,
  JACK,
  isCard,
  cardLabel,
} from '../../src/card-system/Card';

describe('Card', () => {
  describe('RANKS', () => {
    it('should contain 13 ranks from 2 to 14', () => {
      expect(RANKS).toHaveLength(13);
      expect(RANKS[0]).toBe(2);
      expect(RANKS[12]).toBe(14);
    });

    it('should number the face cards above 10', () => {
      expect(JACK).toBe(11);
      expect(QUEEN).toBe(12);
      expect(KING).toBe(13);
      expect(ACE).toBe(14);
    });
  });

  describe('isCard', () => {
    it('should accept every rank', () => {
      expect(RANKS.every((rank) => isCard(rank))).toBe(true);
    });

    it('should reject out-of-range and non-integer values', () => {
      expect(isCard(1)).toBe(false);
      expect(isCard(15)).toBe(false);
      expect(isCard(7.5)).toBe(false);
      expect(isCard('7')).toBe(false);
      expect(isCard(null)).toBe(false);
    });
  });

  describe('cardLabel', () => {
    it('should print pip cards as numbers', () => {
      expect(cardLabel(2)).toBe('2');
      expect(cardLabel(10)).toBe('10');
    });

    it('should print face cards as letters', () => {
      expect(cardLabel(11)).toBe('J');
      expect(cardLabel(12)).toBe('Q');
      expect(cardLabel(13)).toBe('K');
      expect(cardLabel(14)).toBe('A');
    });
  });
});
