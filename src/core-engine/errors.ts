/**
 * Error types raised by the War engine.
 */

/**
 * Thrown when game options fail validation (e.g. an unknown recycle mode).
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when a player must draw but has no cards in hand or discard.
 * Signals the end of a game rather than a fault.
 */
export class OutOfCardsError extends Error {
  constructor(
    message: string,
    public readonly playerIndex: number,
  ) {
    super(message);
    this.name = 'OutOfCardsError';
  }
}

/**
 * Thrown when an operation cannot be performed under the current
 * configuration (the tabular view of a shuffled-recycle game).
 */
export class UnsupportedOperationError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
  ) {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}
