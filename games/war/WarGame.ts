/**
 * War game engine -- owns both players' hands, discard piles and the
 * winnings pool, and plays the game a turn at a time.
 *
 * Provides:
 *   - Construction from options (random deal or fixed starting hands)
 *   - Turn resolution, including war wagers
 *   - Discard recycling under the configured recycle mode
 *   - Full-game play with a turn cap and a per-turn card history
 *   - seek / skip / reset controls and a tabular hand view
 *
 * A war is not settled in the turn that ties: the wagered cards stay in
 * the winnings pool and go to whoever wins the next battle, which may
 * itself tie and carry the pool further.
 */

import type { Card } from '../../src/card-system/Card';
import { dealRandomHands, shuffle } from '../../src/card-system/Deck';
import type { GameState, PlayerIndex } from '../../src/core-engine/GameState';
import {
  PLAYER_INDICES,
  cardCount,
  createGameState,
  isOutOfCards,
} from '../../src/core-engine/GameState';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { OutOfCardsError, UnsupportedOperationError } from '../../src/core-engine/errors';
import type { RandomSource } from '../../src/core-engine/Random';
import { createSeededRng } from '../../src/core-engine/Random';
import type { BattleResult, GameOverCheck, RecycleMode } from '../../src/rule-engine/WarRules';
import {
  canWager,
  checkGameOver,
  compareCards,
  isDeterministicRecycle,
  recycleOrder,
  wagerCount,
} from '../../src/rule-engine/WarRules';
import type { HandTable } from '../../src/table/HandTable';
import { renderTable, toTable } from '../../src/table/HandTable';
import type { WarGameOptions } from './WarConfig';
import { parseWarConfig } from './WarConfig';

// ── Public types ────────────────────────────────────────────

/** Aggregated record of a game, updated by `playGame()`. */
export interface GameSummary {
  /** Turns resolved so far. */
  handsPlayed: number;
  /**
   * `true` once a player has run out of cards, `false` when play stopped
   * at the turn cap, `null` while no stopping point has been reached.
   */
  finished: boolean | null;
  /** Player 1's card count at the start and after every turn. */
  history: number[];
  p1Dealt: Card[];
  p2Dealt: Card[];
  recycleMode: RecycleMode;
  randomizeWinnings: boolean;
}

/** What happened in one call to `resolveTurn()`. */
export interface TurnOutcome {
  /** Face-up cards played by player 1 and player 2. */
  cards: [Card, Card];
  /** Winning player, or `'war'` when the cards tied. */
  result: BattleResult;
  /** Face-down cards each player wagered (empty unless a war). */
  wagers: [Card[], Card[]];
  /** Cards left in the winnings pool afterwards. */
  poolSize: number;
}

/** Read-only copy of one player's cards. */
export interface PlayerSnapshot {
  name: string;
  hand: Card[];
  discard: Card[];
}

const TABLE_COLUMN_NAMES = ['P1', 'P2'] as const;

// ── Engine ──────────────────────────────────────────────────

export class WarGame {
  /** Lifecycle events: turns, wars, recycles, resets and game end. */
  readonly events = new GameEventEmitter();

  readonly maxHands: number;
  readonly recycleMode: RecycleMode;
  readonly randomizeWinnings: boolean;

  private readonly rng: RandomSource;
  private readonly verbose: boolean;
  private readonly playerNames: readonly [string, string];
  private readonly dealt: readonly [readonly Card[], readonly Card[]];

  private state: GameState;
  private summary: GameSummary;

  /**
   * @throws {ConfigurationError} If the options fail validation.
   */
  constructor(options: WarGameOptions = {}) {
    const { rng, ...rest } = options;
    const config = parseWarConfig(rest);

    this.maxHands = config.maxHands;
    this.recycleMode = config.recycleMode;
    this.randomizeWinnings = config.randomizeWinnings;
    this.verbose = config.verbose;
    this.playerNames = config.playerNames ?? ['Player 1', 'Player 2'];
    this.rng =
      rng ??
      (config.seed !== undefined ? createSeededRng(config.seed) : Math.random);

    const [hand1, hand2] = config.startingHands ?? dealRandomHands(this.rng);
    this.dealt = [[...hand1], [...hand2]];

    this.state = this.createInitialState();
    this.summary = this.createInitialSummary();
  }

  // ── Play ────────────────────────────────────────────────

  /**
   * Resolve turns until a player runs out of cards or `maxHands` turns
   * have been played in total, recording player 1's card count after
   * each turn.
   *
   * @returns A copy of the summary.
   */
  playGame(maxHands: number = this.maxHands): GameSummary {
    let hand = this.state.turnNumber;
    let finished: boolean;

    for (;;) {
      const check = this.isGameOver(hand, maxHands);
      if (check.over) {
        finished = check.finished;
        break;
      }

      try {
        this.resolveTurn();
      } catch (err) {
        if (!(err instanceof OutOfCardsError)) {
          throw err;
        }
        finished = true;
        break;
      }

      hand++;
      this.state.turnNumber = hand;
      this.summary.history.push(this.cardCount(0));
    }

    this.summary.handsPlayed = hand;
    this.summary.finished = finished;
    this.announceEnd(finished, maxHands);

    return this.getSummary();
  }

  /**
   * Play one battle.
   *
   * Both players draw their top card into the winnings pool. Unequal
   * cards send the whole pool to the higher card's discard pile. Equal
   * cards start a war: each player adds up to `wagerCount(rank)` more
   * cards to the pool, stopping early rather than giving up its last
   * card, and the pool waits for the next battle.
   *
   * Does not touch the summary; `playGame()` does that.
   *
   * @throws {OutOfCardsError} If either player has no cards. Nothing is
   *         drawn in that case.
   */
  resolveTurn(): TurnOutcome {
    for (const index of PLAYER_INDICES) {
      if (isOutOfCards(this.state.playerStates[index])) {
        throw new OutOfCardsError(
          `${this.playerNames[index]} has no cards left to play`,
          index,
        );
      }
    }

    const turnNumber = this.state.turnNumber + 1;
    const cards: [Card, Card] = [this.drawTopCard(0), this.drawTopCard(1)];
    this.addToWinnings([[cards[0]], [cards[1]]]);

    const result = compareCards(cards[0], cards[1]);
    const wagers: [Card[], Card[]] = [[], []];

    if (result === 'war') {
      const count = wagerCount(cards[0]);
      this.events.emit('war-declared', {
        turnNumber,
        rank: cards[0],
        wagerCount: count,
      });

      for (const index of PLAYER_INDICES) {
        const player = this.state.playerStates[index];
        while (wagers[index].length < count && canWager(player)) {
          wagers[index].push(this.drawTopCard(index));
        }
      }
      this.addToWinnings(wagers);
    } else {
      const won = this.state.winnings.drain();
      this.state.playerStates[result].discard.push(...won);
    }

    const poolSize = this.state.winnings.size();
    this.events.emit('turn-resolved', {
      turnNumber,
      cards,
      winnerIndex: result === 'war' ? null : result,
      wagers: [[...wagers[0]], [...wagers[1]]],
      poolSize,
      cardCounts: [this.cardCount(0), this.cardCount(1)],
    });

    return { cards, result, wagers, poolSize };
  }

  /**
   * Remove and return the front card of a player's hand, first
   * recycling the discard pile into an empty hand.
   *
   * @throws {OutOfCardsError} If the hand and discard are both empty.
   */
  drawTopCard(playerIndex: PlayerIndex): Card {
    const player = this.state.playerStates[playerIndex];

    if (player.hand.isEmpty()) {
      if (player.discard.isEmpty()) {
        throw new OutOfCardsError(
          `${this.playerNames[playerIndex]} has no cards left to draw`,
          playerIndex,
        );
      }
      this.recycleDiscard(playerIndex);
    }

    return player.hand.shiftOrThrow();
  }

  /**
   * Move a player's discard pile to the back of its hand, ordered by the
   * recycle mode, leaving the discard pile empty.
   */
  recycleDiscard(playerIndex: PlayerIndex): void {
    const player = this.state.playerStates[playerIndex];
    const cards = recycleOrder(this.recycleMode, player.discard.drain(), this.rng);
    if (cards.length === 0) return;

    player.hand.push(...cards);
    this.events.emit('discard-recycled', { playerIndex, cards: [...cards] });
  }

  /**
   * Append player 1's and player 2's card groups to the winnings pool.
   * With `randomizeWinnings` the two groups are put in random order
   * first.
   */
  addToWinnings(groups: readonly [readonly Card[], readonly Card[]]): void {
    const ordered = this.randomizeWinnings
      ? shuffle([...groups], this.rng)
      : groups;
    for (const group of ordered) {
      this.state.winnings.push(...group);
    }
  }

  /**
   * Whether play stops before the next turn, given the turns played so
   * far and the turn cap. Does not change any state.
   */
  isGameOver(turnsPlayed: number, maxHands: number): GameOverCheck {
    return checkGameOver(this.state.playerStates, turnsPlayed, maxHands);
  }

  // ── Navigation ──────────────────────────────────────────

  /**
   * Play to turn `turn`, restarting from the deal if the game is already
   * past it.
   */
  playTo(turn: number): GameSummary {
    assertTurnCount(turn);
    if (this.state.turnNumber > turn) {
      this.reset();
    }
    return this.playGame(turn);
  }

  /**
   * Go to turn `turn` and return the hand table.
   *
   * @throws {UnsupportedOperationError} In `shuffled` mode. The game is
   *         left untouched.
   */
  seek(turn: number): HandTable {
    this.assertTabular('seek');
    this.playTo(turn);
    return this.toTable();
  }

  /**
   * Play `turns` more turns and return the hand table.
   *
   * @throws {UnsupportedOperationError} In `shuffled` mode. The game is
   *         left untouched.
   */
  skip(turns: number = 1): HandTable {
    this.assertTabular('skip');
    assertTurnCount(turns);
    this.playGame(this.state.turnNumber + turns);
    return this.toTable();
  }

  /**
   * Restore the original deal: hands as dealt, empty discard piles and
   * winnings pool, and a fresh summary.
   */
  reset(): void {
    const handsPlayedBefore = this.state.turnNumber;

    this.state = this.createInitialState();
    this.summary = this.createInitialSummary();

    this.log(`Reset to the deal after ${handsPlayedBefore} turns`);
    this.events.emit('game-reset', { handsPlayedBefore });
  }

  // ── Inspection ──────────────────────────────────────────

  /** A copy of the summary. */
  getSummary(): GameSummary {
    return {
      ...this.summary,
      history: [...this.summary.history],
      p1Dealt: [...this.summary.p1Dealt],
      p2Dealt: [...this.summary.p2Dealt],
    };
  }

  /** Turns resolved so far. */
  get handsPlayed(): number {
    return this.state.turnNumber;
  }

  /** A copy of one player's hand and discard pile. */
  getPlayer(playerIndex: PlayerIndex): PlayerSnapshot {
    const player = this.state.playerStates[playerIndex];
    return {
      name: this.playerNames[playerIndex],
      hand: player.hand.toArray(),
      discard: player.discard.toArray(),
    };
  }

  /** A copy of the cards currently in the winnings pool. */
  getWinnings(): Card[] {
    return this.state.winnings.toArray();
  }

  /** Cards a player holds across hand and discard. */
  cardCount(playerIndex: PlayerIndex): number {
    return cardCount(this.state.playerStates[playerIndex]);
  }

  /** Every card in play: both players' hands and discards plus the pool. */
  totalCards(): number {
    return this.cardCount(0) + this.cardCount(1) + this.state.winnings.size();
  }

  /**
   * Both players' combined hands as a table.
   *
   * @throws {UnsupportedOperationError} In `shuffled` mode.
   */
  toTable(): HandTable {
    return toTable(
      PLAYER_INDICES.map((index) => ({
        name: TABLE_COLUMN_NAMES[index],
        hand: this.state.playerStates[index].hand.toArray(),
        discard: this.state.playerStates[index].discard.toArray(),
      })),
      this.recycleMode,
    );
  }

  /**
   * The hand table as aligned text.
   *
   * @throws {UnsupportedOperationError} In `shuffled` mode.
   */
  toString(): string {
    return renderTable(this.toTable());
  }

  // ── Internals ───────────────────────────────────────────

  private createInitialState(): GameState {
    return createGameState({
      playerNames: this.playerNames,
      hands: this.dealt,
    });
  }

  private createInitialSummary(): GameSummary {
    return {
      handsPlayed: 0,
      finished: null,
      history: [this.dealt[0].length],
      p1Dealt: [...this.dealt[0]],
      p2Dealt: [...this.dealt[1]],
      recycleMode: this.recycleMode,
      randomizeWinnings: this.randomizeWinnings,
    };
  }

  private announceEnd(finished: boolean, maxHands: number): void {
    const counts = [this.cardCount(0), this.cardCount(1)];
    const leaderIndex: PlayerIndex | null =
      counts[0] === counts[1] ? null : counts[0] > counts[1] ? 0 : 1;

    let reason: string;
    if (finished) {
      const loser = PLAYER_INDICES.find((index) => counts[index] === 0);
      reason =
        loser === undefined
          ? 'A player could not draw'
          : `${this.playerNames[loser]} ran out of cards`;
    } else {
      reason = `Turn cap of ${maxHands} reached`;
    }

    this.log(`${reason} after ${this.state.turnNumber} turns`);
    this.events.emit('game-ended', {
      handsPlayed: this.state.turnNumber,
      finished,
      leaderIndex,
      reason,
    });
  }

  private assertTabular(operation: string): void {
    if (!isDeterministicRecycle(this.recycleMode)) {
      throw new UnsupportedOperationError(
        `Cannot ${operation} to a hand table with shuffled discard recycling`,
        operation,
      );
    }
  }

  private log(message: string): void {
    if (this.verbose) {
      console.info(`[WarGame] ${message}`);
    }
  }
}

function assertTurnCount(turns: number): void {
  if (!Number.isInteger(turns) || turns < 0) {
    throw new RangeError(`Turn count must be a non-negative integer, got ${turns}`);
  }
}
