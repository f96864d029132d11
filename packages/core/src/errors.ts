/**
 * Domain errors shared by the engine and the game modules.
 *
 * - `InvalidMoveError`: the caller asked for something the rules do not allow
 *   right now (a target outside the legal-move map, a pass while moves exist,
 *   any action after the game finished). State is left untouched and the
 *   caller is expected to ask again.
 * - `InvariantViolationError`: internal bookkeeping went out of sync. Never
 *   expected in correct usage; it is thrown rather than repaired.
 *
 * Off-board reads are not errors anywhere in the engine.
 */

export enum GameErrorCode {
  INVALID_MOVE = "INVALID_MOVE",
  INVARIANT_VIOLATION = "INVARIANT_VIOLATION",
}

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: GameErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "GameError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidMoveError extends GameError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(GameErrorCode.INVALID_MOVE, message, details);
    this.name = "InvalidMoveError";
  }
}

export class InvariantViolationError extends GameError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(GameErrorCode.INVARIANT_VIOLATION, message, details);
    this.name = "InvariantViolationError";
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
