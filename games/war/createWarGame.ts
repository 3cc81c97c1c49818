/**
 * Build a WarGame from untyped configuration, such as parsed JSON or
 * command-line flags.
 */

import type { RandomSource } from '../../src/core-engine/Random';
import { parseWarConfig } from './WarConfig';
import { WarGame } from './WarGame';

/**
 * @throws {ConfigurationError} If the configuration fails validation.
 */
export function createWarGame(config: unknown, rng?: RandomSource): WarGame {
  return new WarGame({ ...parseWarConfig(config), rng });
}
