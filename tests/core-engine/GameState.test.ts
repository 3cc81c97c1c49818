import { describe, it, expect } from 'vitest';
import {
  PLAYER_COUNT,
  PLAYER_INDICES,
  createGameState,
  createPlayerState,
  cardCount,
  isOutOfCards,
} from '../../src/core-engine/GameState';
import type { Card } from '../../src/card-system/Card';

describe('GameState', () => {
  describe('createGameState', () => {
    it('should create two players with default names', () => {
      const state = createGameState({ hands: [[2, 3], [4]] });
      expect(state.players).toEqual([{ name: 'Player 1' }, { name: 'Player 2' }]);
      expect(PLAYER_COUNT).toBe(2);
      expect(PLAYER_INDICES).toEqual([0, 1]);
    });

    it('should use supplied player names', () => {
      const state = createGameState({
        hands: [[2], [3]],
        playerNames: ['Alice', 'Bob'],
      });
      expect(state.players[0].name).toBe('Alice');
      expect(state.players[1].name).toBe('Bob');
    });

    it('should start with the dealt hands, empty discards and an empty pool', () => {
      const state = createGameState({ hands: [[14, 2], [13, 2]] });
      expect(state.playerStates[0].hand.toArray()).toEqual([14, 2]);
      expect(state.playerStates[1].hand.toArray()).toEqual([13, 2]);
      expect(state.playerStates[0].discard.isEmpty()).toBe(true);
      expect(state.playerStates[1].discard.isEmpty()).toBe(true);
      expect(state.winnings.isEmpty()).toBe(true);
      expect(state.turnNumber).toBe(0);
    });

    it('should copy the dealt hands', () => {
      const hand: Card[] = [5, 6];
      const state = createGameState({ hands: [hand, [7]] });
      hand.push(8);
      state.playerStates[0].hand.shift();
      expect(hand).toEqual([5, 6, 8]);
      expect(state.playerStates[0].hand.toArray()).toEqual([6]);
    });
  });

  describe('cardCount / isOutOfCards', () => {
    it('should count hand and discard together', () => {
      const player = createPlayerState([2, 3]);
      player.discard.push(9, 10, 11);
      expect(cardCount(player)).toBe(5);
      expect(isOutOfCards(player)).toBe(false);
    });

    it('should treat a player with only discards as still in the game', () => {
      const player = createPlayerState([]);
      player.discard.push(4);
      expect(isOutOfCards(player)).toBe(false);
    });

    it('should report a player with no cards as out', () => {
      const player = createPlayerState([]);
      expect(cardCount(player)).toBe(0);
      expect(isOutOfCards(player)).toBe(true);
    });
  });
});
