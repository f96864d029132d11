import { Game, GameStatus } from "./game";
import { Coord, Owner, PieceId } from "./state";

/** The game-specific data stored in GameState.data */
export interface ReversiData {
  game: Game;
  /** Maps player id to the piece they play */
  seats: Record<string, PieceId>;
}

/** Everything a renderer needs; Reversi has no hidden information */
export interface ReversiPublicData {
  width: number;
  height: number;
  /** Cell owners indexed [row][col] */
  rows: Owner[][];
  seats: Record<string, PieceId>;
  /** Piece of the player whose turn it is */
  mover: PieceId;
  /** Legal targets for the mover, top-to-bottom; a display overlay only */
  hints: Coord[];
  skipped: Record<PieceId, boolean>;
  status: GameStatus;
  scores: Record<PieceId, number>;
  lastMove: Coord | null;
}
