import { GameState, Observation } from "@flipside/core";
import { ReversiData, ReversiPublicData } from "./types";
import { compareCoords } from "./state";

/**
 * Reversi is a perfect information game, so the observation
 * is the full state for all players, plus the mover's legal targets.
 */
export function getObservationForPlayer(
  state: GameState<ReversiData>,
  _playerId: string
): Observation<ReversiPublicData> {
  const { game, seats } = state.data;
  const scores = game.scores();

  return {
    gameId: state.gameId,
    players: state.players,
    currentPlayer: state.currentPlayer,
    turnNumber: state.turnNumber,
    publicData: {
      width: game.board.width,
      height: game.board.height,
      rows: game.board.rows(),
      seats: { ...seats },
      mover: game.mover.id,
      hints: Array.from(game.legalMoves().values(), (m) => ({ ...m.target })).sort(
        compareCoords
      ),
      skipped: {
        b: game.getPlayer("b").skippedLastTurn,
        w: game.getPlayer("w").skippedLastTurn,
      },
      status: game.status,
      scores: { b: scores.get("b") ?? 0, w: scores.get("w") ?? 0 },
      lastMove: game.lastMove,
    },
  };
}
