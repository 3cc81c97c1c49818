import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  OutOfCardsError,
  UnsupportedOperationError,
} from '../../src/core-engine/errors';

describe('errors', () => {
  it('should name ConfigurationError and keep the field', () => {
    const err = new ConfigurationError('bad mode', 'recycleMode');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ConfigurationError');
    expect(err.message).toBe('bad mode');
    expect(err.field).toBe('recycleMode');
  });

  it('should name OutOfCardsError and keep the player index', () => {
    const err = new OutOfCardsError('no cards', 1);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('OutOfCardsError');
    expect(err.playerIndex).toBe(1);
  });

  it('should name UnsupportedOperationError and keep the operation', () => {
    const err = new UnsupportedOperationError('shuffled', 'toTable');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('UnsupportedOperationError');
    expect(err.operation).toBe('toTable');
  });
});
