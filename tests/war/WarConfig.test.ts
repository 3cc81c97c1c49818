import { describe, it, expect } from 'vitest';
import { DEFAULT_MAX_HANDS, parseWarConfig } from '../../games/war/WarConfig';
import { createWarGame } from '../../games/war/createWarGame';
import { WarGame } from '../../games/war/WarGame';
import { ConfigurationError } from '../../src/core-engine/errors';

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error('Expected a ConfigurationError');
}

describe('parseWarConfig', () => {
  it('applies defaults to an empty config', () => {
    expect(parseWarConfig({})).toEqual({
      maxHands: DEFAULT_MAX_HANDS,
      recycleMode: 'fifo',
      randomizeWinnings: false,
      verbose: false,
    });
  });

  it('treats a missing config as empty', () => {
    expect(parseWarConfig(undefined).maxHands).toBe(5000);
  });

  it('keeps valid values', () => {
    const config = parseWarConfig({
      maxHands: 12,
      recycleMode: 'filo',
      randomizeWinnings: true,
      startingHands: [[14, 2], [13, 2]],
      seed: 3,
      playerNames: ['Alice', 'Bob'],
    });
    expect(config.maxHands).toBe(12);
    expect(config.recycleMode).toBe('filo');
    expect(config.randomizeWinnings).toBe(true);
    expect(config.startingHands).toEqual([[14, 2], [13, 2]]);
    expect(config.seed).toBe(3);
    expect(config.playerNames).toEqual(['Alice', 'Bob']);
  });

  it('rejects an unknown recycle mode', () => {
    const err = configError(() => parseWarConfig({ recycleMode: 'lifo' }));
    expect(err.field).toBe('recycleMode');
    expect(err.message).toMatch(/^Invalid option "recycleMode": /);
  });

  it('rejects cards outside 2..14 and names the position', () => {
    const err = configError(() => parseWarConfig({ startingHands: [[2, 15], [3]] }));
    expect(err.field).toBe('startingHands.0.1');
    expect(err.message).toBe(
      'Invalid option "startingHands.0.1": Cards must be integers from 2 to 14',
    );
  });

  it('rejects a negative or fractional turn cap', () => {
    expect(configError(() => parseWarConfig({ maxHands: -1 })).field).toBe('maxHands');
    expect(configError(() => parseWarConfig({ maxHands: 2.5 })).field).toBe('maxHands');
  });

  it('rejects unknown options', () => {
    const err = configError(() => parseWarConfig({ discardRecycleMode: 'fifo' }));
    expect(err.field).toBeUndefined();
  });
});

describe('construction errors', () => {
  it('createWarGame surfaces ConfigurationError for a bad mode', () => {
    expect(() => createWarGame({ recycleMode: 'random' })).toThrow(ConfigurationError);
  });

  it('the constructor validates its options too', () => {
    expect(() => new WarGame({ maxHands: -5 })).toThrow(ConfigurationError);
  });

  it('createWarGame builds a game from plain config', () => {
    const game = createWarGame(
      { startingHands: [[14, 2], [13, 2]], recycleMode: 'filo', maxHands: 7 },
      () => 0.5,
    );
    expect(game.recycleMode).toBe('filo');
    expect(game.maxHands).toBe(7);
    expect(game.getPlayer(0).hand).toEqual([14, 2]);
  });
});
