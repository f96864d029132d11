import { Game, GameOptions } from "./game";
import { Coord, CoordKey, PieceId } from "./state";
import { MoveCandidate } from "./moveFinder";

// Functional surface over Game for drivers that prefer plain calls.
// Every function mutates and returns the same Game instance.

export function newGame(options?: GameOptions): Game {
  return Game.create(options);
}

/** An empty map means the mover must skip */
export function legalMoves(state: Game): ReadonlyMap<CoordKey, MoveCandidate> {
  return state.legalMoves();
}

/** Throws InvalidMoveError, with `state` unchanged, for a target outside legalMoves */
export function applyMove(state: Game, coord: Coord): Game {
  return state.applyMove(coord);
}

export function skipTurn(state: Game): Game {
  return state.skipTurn();
}

export function isFinished(state: Game): boolean {
  return state.isFinished();
}

export function scores(state: Game): Map<PieceId, number> {
  return state.scores();
}
