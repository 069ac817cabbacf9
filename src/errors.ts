/** Error codes raised by the game core. */
export type GameErrorCode = 'INVALID_STATE' | 'INVALID_DATA';

/**
 * Raised when a core invariant is broken.  Collisions and food pickups are
 * ordinary game events and never surface as errors.
 */
export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GameErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
  }
}
