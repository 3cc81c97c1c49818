/**
 * War game configuration.
 *
 * Options are plain objects with defaults. They are validated once, when
 * a game is constructed, and any problem surfaces as a
 * ConfigurationError naming the offending field.
 */

import { z } from 'zod';
import type { Card } from '../../src/card-system/Card';
import { isCard } from '../../src/card-system/Card';
import { ConfigurationError } from '../../src/core-engine/errors';
import type { RandomSource } from '../../src/core-engine/Random';
import type { RecycleMode } from '../../src/rule-engine/WarRules';
import { RECYCLE_MODES } from '../../src/rule-engine/WarRules';

/** Turn cap used when none is configured. */
export const DEFAULT_MAX_HANDS = 5000;

// ── Schema ──────────────────────────────────────────────────

const CardZ = z.custom<Card>(isCard, {
  message: 'Cards must be integers from 2 to 14',
});

const HandZ = z.array(CardZ);

export const WarConfigZ = z
  .object({
    maxHands: z.number().int().nonnegative().default(DEFAULT_MAX_HANDS),
    recycleMode: z.enum(RECYCLE_MODES).default('fifo'),
    randomizeWinnings: z.boolean().default(false),
    startingHands: z.tuple([HandZ, HandZ]).optional(),
    seed: z.number().int().optional(),
    playerNames: z.tuple([z.string().min(1), z.string().min(1)]).optional(),
    verbose: z.boolean().default(false),
  })
  .strict();

/** Validated configuration with defaults applied. */
export type WarConfig = z.infer<typeof WarConfigZ>;

// ── Options ─────────────────────────────────────────────────

/**
 * Options accepted by the WarGame constructor.
 */
export interface WarGameOptions {
  /** Turn cap for `playGame()` (default 5000). */
  maxHands?: number;
  /** How discard piles return to hands (default `fifo`). */
  recycleMode?: RecycleMode;
  /** Randomize which player's cards land first in the winner's discard. */
  randomizeWinnings?: boolean;
  /** Fixed starting hands; a shuffled War deck is dealt when omitted. */
  startingHands?: readonly [readonly Card[], readonly Card[]];
  /** Seed for the built-in generator. Ignored when `rng` is given. */
  seed?: number;
  /** Random source in [0, 1) (default Math.random). */
  rng?: RandomSource;
  /** Player names (default "Player 1" and "Player 2"). */
  playerNames?: readonly [string, string];
  /** Log game lifecycle lines to the console. */
  verbose?: boolean;
}

/**
 * Validate raw configuration and apply defaults.
 *
 * @throws {ConfigurationError} If any field is missing its expected
 *         shape, including an unrecognized recycle mode.
 */
export function parseWarConfig(input: unknown): WarConfig {
  const parsed = WarConfigZ.safeParse(input ?? {});
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = issue.path.length > 0 ? issue.path.join('.') : undefined;
  throw new ConfigurationError(
    field ? `Invalid option "${field}": ${issue.message}` : issue.message,
    field,
  );
}
