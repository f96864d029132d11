export { ReversiModule } from "./rules";
export { ReversiUI, HINT_MARKER } from "./ui";
export { Game } from "./game";
export type { GameOptions, GameSnapshot, GameStatus } from "./game";
export {
  Board,
  Player,
  EMPTY,
  OFF_BOARD,
  PIECE_IDS,
  DEFAULT_BOARD_SIZE,
  MIN_BOARD_SIZE,
  MAX_BOARD_SIZE,
  coordKey,
  compareCoords,
  isPieceId,
  startingPieces,
} from "./state";
export type { BoardView, Coord, CoordKey, Owner, OffBoard, PieceId } from "./state";
export { findLegalMoves, walkToMover, NEIGHBOR_OFFSETS } from "./moveFinder";
export type { LegalMoveMap, MoveCandidate } from "./moveFinder";
export { newGame, legalMoves, applyMove, skipTurn, isFinished, scores } from "./api";
export {
  isPlaceAction,
  isPassAction,
  placeAction,
  passAction,
  getLegalActionsForPlayer,
} from "./actions";
export type { PlaceAction, PassAction } from "./actions";
export type { ReversiData, ReversiPublicData } from "./types";
