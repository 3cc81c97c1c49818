/**
 * Pile abstraction for the War simulator.
 *
 * A Pile is an ordered sequence of cards read front to back. Hands draw
 * from the front; discard piles and the winnings pool grow at the back.
 */

import type { Card } from './Card';

export class Pile {
  private readonly cards: Card[];

  /**
   * Create a Pile, optionally pre-populated with cards.
   * The first element of the array is the front of the pile.
   */
  constructor(cards: readonly Card[] = []) {
    this.cards = [...cards];
  }

  /** Append one or more cards to the back of the pile. */
  push(...newCards: Card[]): void {
    this.cards.push(...newCards);
  }

  /**
   * Remove and return the front card.
   * @returns The front card, or `undefined` if the pile is empty.
   */
  shift(): Card | undefined {
    return this.cards.shift();
  }

  /**
   * Remove and return the front card, throwing if the pile is empty.
   */
  shiftOrThrow(): Card {
    const card = this.cards.shift();
    if (card === undefined) {
      throw new Error('Cannot draw from an empty pile');
    }
    return card;
  }

  /**
   * Look at the front card without removing it.
   */
  peek(): Card | undefined {
    return this.cards[0];
  }

  /**
   * Remove every card and return them front to back.
   */
  drain(): Card[] {
    return this.cards.splice(0, this.cards.length);
  }

  /** Whether the pile contains no cards. */
  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  /** The number of cards in the pile. */
  size(): number {
    return this.cards.length;
  }

  /**
   * Return a shallow copy of all cards in the pile (front to back).
   */
  toArray(): Card[] {
    return [...this.cards];
  }

  /** Clear all cards from the pile. */
  clear(): void {
    this.cards.length = 0;
  }
}
