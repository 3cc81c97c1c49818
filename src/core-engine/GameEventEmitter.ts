/**
 * Typed Event Emitter for the War simulator.
 *
 * Provides a type-safe, zero-dependency event emitter for game lifecycle
 * events. The engine emits these events as it resolves turns; tools
 * (transcripts, logging, tests) subscribe to them.
 */

import type { Card } from '../card-system/Card';
import type { PlayerIndex } from './GameState';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted after each battle has been resolved.
 */
export interface TurnResolvedPayload {
  /** 1-based number of the turn that was resolved. */
  readonly turnNumber: number;
  /** Face-up cards played by player 1 and player 2. */
  readonly cards: readonly [Card, Card];
  /** Player who took the pool, or `null` when the battle was a war. */
  readonly winnerIndex: PlayerIndex | null;
  /** Cards each player wagered face-down (empty unless a war). */
  readonly wagers: readonly [readonly Card[], readonly Card[]];
  /** Cards left in the winnings pool after the turn. */
  readonly poolSize: number;
  /** Cards held by each player (hand + discard) after the turn. */
  readonly cardCounts: readonly [number, number];
}

/**
 * Emitted when a battle ties and both players wager.
 */
export interface WarDeclaredPayload {
  /** 1-based number of the turn that tied. */
  readonly turnNumber: number;
  /** The tied rank. */
  readonly rank: Card;
  /** Cards each player was asked to wager for that rank. */
  readonly wagerCount: number;
}

/**
 * Emitted when a player's discard pile is moved into its hand.
 */
export interface DiscardRecycledPayload {
  readonly playerIndex: PlayerIndex;
  /** Cards appended to the hand, in the order they were appended. */
  readonly cards: readonly Card[];
}

/**
 * Emitted when a game stops.
 */
export interface GameEndedPayload {
  /** Turns resolved when the game stopped. */
  readonly handsPlayed: number;
  /** `true` if a player ran out of cards, `false` if the turn cap hit first. */
  readonly finished: boolean;
  /** Index of the player holding more cards, or `null` for a tie. */
  readonly leaderIndex: PlayerIndex | null;
  /** Human-readable reason (e.g. "Player 2 ran out of cards"). */
  readonly reason: string;
}

/**
 * Emitted when a game is restored to its original deal.
 */
export interface GameResetPayload {
  /** Turns that had been resolved before the reset. */
  readonly handsPlayedBefore: number;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'turn-resolved': TurnResolvedPayload;
  'war-declared': WarDeclaredPayload;
  'discard-recycled': DiscardRecycledPayload;
  'game-ended': GameEndedPayload;
  'game-reset': GameResetPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const game = new WarGame({ maxHands: 100 });
 * game.events.on('war-declared', (payload) => {
 *   console.log(`War on turn ${payload.turnNumber} over rank ${payload.rank}`);
 * });
 * game.playGame();
 * ```
 */
export class GameEventEmitter {
  private listeners: {
    [K in GameEventName]?: Array<GameEventListener<K>>;
  } = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    let list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list) {
      list = [];
      (this.listeners as Record<string, unknown>)[event] = list;
    }
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list) return;

    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list || list.length === 0) return;

    // Listeners may unsubscribe while being called
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: GameEventName): void {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: GameEventName): number {
    const list = this.listeners[event];
    return list ? list.length : 0;
  }
}
