import {
  GameConfig,
  GameState,
  Action,
  Outcome,
  Observation,
  InvalidMoveError,
} from "@flipside/core";
import { IGameModule } from "@flipside/engine";
import { ReversiUI } from "./ui";
import { Game } from "./game";
import { PieceId, isPieceId } from "./state";
import { ReversiData, ReversiPublicData } from "./types";
import {
  isPlaceAction,
  isPassAction,
  getLegalActionsForPlayer,
} from "./actions";
import { getObservationForPlayer } from "./observation";

/**
 * Build the starting game from config settings:
 * - `width` / `height`: board dimensions (default 8)
 * - `position`: optional board diagram rows (see Board.fromRows)
 * - `firstMover`: piece to move first with a custom position (default "b")
 */
function gameFromSettings(settings: Record<string, unknown> = {}): Game {
  const { position } = settings;

  if (position !== undefined) {
    if (!Array.isArray(position) || !position.every((r): r is string => typeof r === "string")) {
      throw new TypeError("settings.position must be an array of strings");
    }
    const firstMover = settings.firstMover ?? "b";
    if (!isPieceId(firstMover)) {
      throw new TypeError('settings.firstMover must be "b" or "w"');
    }
    return Game.fromRows(position, firstMover);
  }

  return Game.create({
    width: readDimension(settings, "width"),
    height: readDimension(settings, "height"),
  });
}

function readDimension(settings: Record<string, unknown>, name: "width" | "height"): number | undefined {
  const value = settings[name];
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new TypeError(`settings.${name} must be a number`);
  }
  return value;
}

function seatOf(seats: Record<string, PieceId>, piece: PieceId): string {
  const entry = Object.entries(seats).find(([_, p]) => p === piece);
  if (!entry) {
    throw new Error(`No player is seated as ${piece}`);
  }
  return entry[0];
}

export const ReversiModule: IGameModule<ReversiData, ReversiPublicData> = {
  gameId: "reversi",
  name: "Reversi",
  description: "Outflank your opponent's pieces to flip them. Most pieces wins.",
  minPlayers: 2,
  maxPlayers: 2,
  ui: ReversiUI,

  init(config: GameConfig, players: string[]): GameState<ReversiData> {
    if (players.length !== 2 || players[0] === players[1]) {
      throw new Error("Reversi requires exactly 2 distinct players");
    }

    const game = gameFromSettings(config.settings);
    const seats: Record<string, PieceId> = {
      [players[0]]: "b",
      [players[1]]: "w",
    };

    return {
      gameId: config.gameId,
      players,
      currentPlayer: seatOf(seats, game.mover.id),
      turnNumber: 0,
      data: { game, seats },
    };
  },

  validateAction(
    state: GameState<ReversiData>,
    playerId: string,
    action: Action
  ): boolean {
    if (state.currentPlayer !== playerId) {
      return false;
    }

    const { game } = state.data;
    if (game.isFinished()) {
      return false;
    }

    if (isPlaceAction(action)) {
      return game.isLegal(action.data);
    }

    if (isPassAction(action)) {
      // Pass is only legal if the player has no legal placements
      return game.legalMoves().size === 0;
    }

    return false;
  },

  applyAction(
    state: GameState<ReversiData>,
    playerId: string,
    action: Action
  ): GameState<ReversiData> {
    if (state.currentPlayer !== playerId) {
      throw new InvalidMoveError(`It is not ${playerId}'s turn`, { playerId });
    }

    const game = state.data.game.clone();

    if (isPlaceAction(action)) {
      game.applyMove(action.data);
    } else if (isPassAction(action)) {
      game.skipTurn();
    } else {
      throw new InvalidMoveError(`Unknown action type "${action.type}"`);
    }

    return {
      gameId: state.gameId,
      players: state.players,
      currentPlayer: seatOf(state.data.seats, game.mover.id),
      turnNumber: state.turnNumber + 1,
      data: { game, seats: { ...state.data.seats } },
    };
  },

  isTerminal(state: GameState<ReversiData>): boolean {
    return state.data.game.isFinished();
  },

  getOutcome(state: GameState<ReversiData>): Outcome {
    const { game, seats } = state.data;

    if (!game.isFinished()) {
      return {
        winner: null,
        draw: false,
        scores: {},
        reason: "game_in_progress",
      };
    }

    const leaders = game.leaders();
    const scores: Record<string, number> = {};

    if (leaders.length > 1) {
      for (const player of state.players) {
        scores[player] = 0.5;
      }
      return { winner: null, draw: true, scores, reason: "double_pass" };
    }

    const winner = seatOf(seats, leaders[0]);
    for (const player of state.players) {
      scores[player] = player === winner ? 1 : 0;
    }

    return { winner, draw: false, scores, reason: "double_pass" };
  },

  getObservation(state: GameState<ReversiData>, playerId: string): Observation<ReversiPublicData> {
    return getObservationForPlayer(state, playerId);
  },

  getLegalActions(state: GameState<ReversiData>, playerId: string): Action[] {
    return getLegalActionsForPlayer(state, playerId);
  },
};
