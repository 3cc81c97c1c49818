/**
 * Game transcript types and recorder for War.
 *
 * Records a JSON-serializable transcript of a game: the deal, every
 * battle, and the final result. Useful for debugging and for regression
 * fixtures.
 *
 * The recorder listens to the game's events, so it only needs to be
 * attached before play starts and finalized once play stops.
 */

import type { Card } from '../../src/card-system/Card';
import type { PlayerIndex } from '../../src/core-engine/GameState';
import type {
  GameEndedPayload,
  TurnResolvedPayload,
} from '../../src/core-engine/GameEventEmitter';
import type { RecycleMode } from '../../src/rule-engine/WarRules';
import type { WarGame } from './WarGame';

// ── Transcript types ────────────────────────────────────────

/** Record of a single battle. */
export interface TurnRecord {
  /** 1-based turn number. */
  turnNumber: number;
  /** Face-up cards played by player 1 and player 2. */
  cards: [Card, Card];
  /** Player who took the pool, or `null` for a war. */
  winnerIndex: PlayerIndex | null;
  /** Face-down cards each player wagered. */
  wagers: [Card[], Card[]];
  /** Cards still in the winnings pool after the turn. */
  poolSize: number;
  /** Cards each player holds after the turn. */
  cardCounts: [number, number];
}

/** Metadata about the game. */
export interface GameMetadata {
  /** ISO 8601 timestamp of recording start. */
  startedAt: string;
  /** ISO 8601 timestamp of recording end (set on finalize). */
  endedAt: string;
  players: Array<{ name: string }>;
  recycleMode: RecycleMode;
  randomizeWinnings: boolean;
  maxHands: number;
}

/** Final results after the game stops. */
export interface GameResults {
  handsPlayed: number;
  /** Whether a player ran out of cards (as opposed to hitting the cap). */
  finished: boolean;
  /** Player holding more cards, or `null` on equal counts. */
  winnerIndex: PlayerIndex | null;
  winnerName: string | null;
  reason: string;
  /** Cards each player holds at the end. */
  cardCounts: [number, number];
  /** Cards left unclaimed in the winnings pool. */
  unclaimed: number;
}

/** A complete game transcript. */
export interface WarTranscript {
  /** Format version for future compatibility. */
  version: 1;
  metadata: GameMetadata;
  /** The deal, before the first turn. */
  initialState: {
    hands: [Card[], Card[]];
  };
  /** All turns in order. */
  turns: TurnRecord[];
  /** Final results (set on finalize). */
  results: GameResults | null;
}

// ── TranscriptRecorder ──────────────────────────────────────

/**
 * Records a transcript from a game's events.
 *
 * Usage:
 *   const recorder = new TranscriptRecorder(game);
 *   game.playGame();
 *   const transcript = recorder.finalize();
 *
 * A reset of the game clears the recorded turns.
 */
export class TranscriptRecorder {
  private readonly transcript: WarTranscript;
  private readonly game: WarGame;
  private readonly unsubscribers: Array<() => void>;
  private lastEnd: GameEndedPayload | null = null;

  constructor(game: WarGame) {
    this.game = game;

    const summary = game.getSummary();
    this.transcript = {
      version: 1,
      metadata: {
        startedAt: new Date().toISOString(),
        endedAt: '',
        players: [{ name: game.getPlayer(0).name }, { name: game.getPlayer(1).name }],
        recycleMode: summary.recycleMode,
        randomizeWinnings: summary.randomizeWinnings,
        maxHands: game.maxHands,
      },
      initialState: {
        hands: [summary.p1Dealt, summary.p2Dealt],
      },
      turns: [],
      results: null,
    };

    this.unsubscribers = [
      game.events.on('turn-resolved', (payload) => this.recordTurn(payload)),
      game.events.on('game-ended', (payload) => {
        this.lastEnd = payload;
      }),
      game.events.on('game-reset', () => {
        this.transcript.turns = [];
        this.transcript.results = null;
        this.lastEnd = null;
      }),
    ];
  }

  /**
   * Finalize the transcript and stop listening to the game.
   *
   * @throws If the game has not been played to a stopping point.
   */
  finalize(): WarTranscript {
    const end = this.lastEnd;
    if (end === null) {
      throw new Error('Cannot finalize a transcript before the game has stopped');
    }

    this.transcript.metadata.endedAt = new Date().toISOString();

    const winnerIndex = end.leaderIndex;
    this.transcript.results = {
      handsPlayed: end.handsPlayed,
      finished: end.finished,
      winnerIndex,
      winnerName:
        winnerIndex === null ? null : this.transcript.metadata.players[winnerIndex].name,
      reason: end.reason,
      cardCounts: [this.game.cardCount(0), this.game.cardCount(1)],
      unclaimed: this.game.getWinnings().length,
    };

    this.dispose();
    return this.transcript;
  }

  /**
   * Get the transcript in its current state (may not be finalized).
   */
  getTranscript(): WarTranscript {
    return this.transcript;
  }

  /** Stop listening to the game. */
  dispose(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers.length = 0;
  }

  private recordTurn(payload: TurnResolvedPayload): void {
    this.transcript.turns.push({
      turnNumber: payload.turnNumber,
      cards: [payload.cards[0], payload.cards[1]],
      winnerIndex: payload.winnerIndex,
      wagers: [[...payload.wagers[0]], [...payload.wagers[1]]],
      poolSize: payload.poolSize,
      cardCounts: [payload.cardCounts[0], payload.cardCounts[1]],
    });
  }
}
