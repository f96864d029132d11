import { Action, GameState } from "@flipside/core";
import { ReversiData } from "./types";

/** A Reversi action: place a piece at (col, row) */
export interface PlaceAction extends Action {
  type: "place";
  data: { col: number; row: number };
}

/** A Reversi action: pass (only when no legal placements exist) */
export interface PassAction extends Action {
  type: "pass";
  data: Record<string, never>;
}

export function isPlaceAction(action: Action): action is PlaceAction {
  return (
    action.type === "place" &&
    typeof action.data.col === "number" &&
    typeof action.data.row === "number"
  );
}

export function isPassAction(action: Action): action is PassAction {
  return action.type === "pass";
}

export function placeAction(col: number, row: number): PlaceAction {
  return { type: "place", data: { col, row } };
}

export function passAction(): PassAction {
  return { type: "pass", data: {} };
}

export function getLegalActionsForPlayer(
  state: GameState<ReversiData>,
  playerId: string
): Action[] {
  const { game } = state.data;

  // Not this player's turn or game is over
  if (state.currentPlayer !== playerId || game.isFinished()) {
    return [];
  }

  const actions: Action[] = Array.from(game.legalMoves().values(), (move) =>
    placeAction(move.target.col, move.target.row)
  ).sort((a, b) => a.data.row - b.data.row || a.data.col - b.data.col);

  // If no placements available, the only legal action is to pass
  if (actions.length === 0) {
    return [passAction()];
  }

  return actions;
}
