/**
 * Error taxonomy for the game.
 *
 * Collaborator (agent) failures are never thrown: the IO layer logs them and falls back.
 * Everything here is structural and propagates to the engine, which aborts the game.
 */
export class GameError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid configuration/credentials. Fatal before any game state exists. */
export class ConfigError extends GameError {}

/** Core state and an event module disagree (e.g. an effect aimed at a nonexistent player). */
export class GameInvariantError extends GameError {}

export class UnknownEffectError extends GameError {
  constructor(readonly effectType: string) {
    super(`Unknown effect type "${effectType}"`);
  }
}

/** Operator interruption. Not a failure: the CLI exits 0. */
export class GameAbortedError extends GameError {
  constructor(reason = 'interrupted by operator') {
    super(reason);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
