import { InvalidMoveError } from "@flipside/core";
import {
  Board,
  BoardView,
  Coord,
  CoordKey,
  DEFAULT_BOARD_SIZE,
  Owner,
  PieceId,
  Player,
  coordKey,
  startingPieces,
} from "./state";
import { LegalMoveMap, MoveCandidate, findLegalMoves } from "./moveFinder";

export type GameStatus = "in_progress" | "finished";

export interface GameOptions {
  width?: number;
  height?: number;
}

/** Plain snapshot of a game, used for hashing and logging */
export interface GameSnapshot {
  width: number;
  height: number;
  rows: Owner[][];
  mover: PieceId;
  skipped: Record<PieceId, boolean>;
  status: GameStatus;
  lastMove: Coord | null;
  moveCount: number;
  version: number;
}

type Seat = 0 | 1;

/**
 * Turn state machine over a Board and two Players.
 *
 * The mover is `players[moverIndex]`; each placement or forced skip hands the
 * turn to the other seat. Every mutation bumps `version`, which keys the
 * memoised legal-move map. The game finishes when both players' latest turns
 * were skips, which can only happen on consecutive turns since a placement
 * clears the mover's flag.
 */
export class Game {
  /** Read-only; every write goes through applyMove or skipTurn */
  readonly board: BoardView;
  private readonly grid: Board;
  private readonly players: readonly [Player, Player];
  private moverIndex: Seat;
  private stateVersion = 0;
  private cachedMoves: { version: number; moves: LegalMoveMap } | null = null;
  private lastPlaced: Coord | null = null;
  private placements = 0;

  private constructor(board: Board, players: readonly [Player, Player], moverIndex: Seat) {
    this.grid = board;
    this.board = board.view();
    this.players = players;
    this.moverIndex = moverIndex;
  }

  /** A new game in the classic starting position; "b" moves first. */
  static create(options: GameOptions = {}): Game {
    const width = options.width ?? DEFAULT_BOARD_SIZE;
    const height = options.height ?? DEFAULT_BOARD_SIZE;
    const start = startingPieces(width, height);
    const board = new Board(width, height);
    const black = new Player("b", start.b);
    const white = new Player("w", start.w);
    for (const player of [black, white]) {
      for (const piece of player.pieces()) board.place(player, piece);
    }
    return new Game(board, [black, white], 0);
  }

  /** A game set up from a board diagram (see Board.fromRows). */
  static fromRows(rows: string[], mover: PieceId = "b"): Game {
    const board = Board.fromRows(rows);
    const players = [Player.fromBoard("b", board), Player.fromBoard("w", board)] as const;
    return new Game(board, players, mover === "b" ? 0 : 1);
  }

  get mover(): Player {
    return this.players[this.moverIndex];
  }

  get opponent(): Player {
    return this.players[this.moverIndex === 0 ? 1 : 0];
  }

  get version(): number {
    return this.stateVersion;
  }

  get status(): GameStatus {
    return this.isFinished() ? "finished" : "in_progress";
  }

  /** Last placed coordinate; null at the start and after a skip */
  get lastMove(): Coord | null {
    return this.lastPlaced ? { ...this.lastPlaced } : null;
  }

  /** Number of placements made so far (skips excluded) */
  get moveCount(): number {
    return this.placements;
  }

  getPlayer(id: PieceId): Player {
    return this.players[0].id === id ? this.players[0] : this.players[1];
  }

  /** Legal moves for the current mover, keyed by coordKey */
  legalMoves(): ReadonlyMap<CoordKey, MoveCandidate> {
    if (!this.cachedMoves || this.cachedMoves.version !== this.stateVersion) {
      this.cachedMoves = {
        version: this.stateVersion,
        moves: this.isFinished()
          ? new Map()
          : findLegalMoves(this.grid, this.mover, this.opponent),
      };
    }
    return this.cachedMoves.moves;
  }

  isLegal(target: Coord): boolean {
    return this.legalMoves().has(coordKey(target));
  }

  /**
   * Place the mover's piece at `target` and capture its chain. Throws
   * InvalidMoveError, leaving the game untouched, when `target` is not a
   * current legal move.
   */
  applyMove(target: Coord): this {
    if (this.isFinished()) {
      throw new InvalidMoveError("The game is finished", { ...target });
    }
    const move = this.legalMoves().get(coordKey(target));
    if (!move) {
      throw new InvalidMoveError(
        `(${target.col}, ${target.row}) is not a legal move for ${this.mover.id}`,
        { col: target.col, row: target.row, player: this.mover.id }
      );
    }

    const mover = this.mover;
    const opponent = this.opponent;
    const placed: Coord = { col: target.col, row: target.row };

    this.grid.place(mover, placed);
    mover.addPiece(placed);
    for (const { col, row } of move.chain) {
      const cell = { col, row };
      opponent.removePiece(cell);
      this.grid.place(mover, cell);
      mover.addPiece(cell);
    }

    mover.skippedLastTurn = false;
    this.lastPlaced = placed;
    this.placements++;
    this.advance();
    return this;
  }

  /**
   * Forced pass. Only allowed when the mover has no legal move; finishes the
   * game when the other player skipped its previous turn too.
   */
  skipTurn(): this {
    if (this.isFinished()) {
      throw new InvalidMoveError("The game is finished");
    }
    if (this.legalMoves().size > 0) {
      throw new InvalidMoveError(`${this.mover.id} has legal moves and cannot pass`, {
        player: this.mover.id,
        legalMoves: this.legalMoves().size,
      });
    }

    this.mover.skippedLastTurn = true;
    this.lastPlaced = null;
    this.advance();
    return this;
  }

  isFinished(): boolean {
    return this.players[0].skippedLastTurn && this.players[1].skippedLastTurn;
  }

  /** Occupied cells per player; both players are always present */
  scores(): Map<PieceId, number> {
    return new Map(this.players.map((p) => [p.id, this.board.count(p.id)] as const));
  }

  /** Ids holding the highest score; two ids on a tie */
  leaders(): PieceId[] {
    const scores = this.scores();
    const best = Math.max(...scores.values());
    return this.players.map((p) => p.id).filter((id) => scores.get(id) === best);
  }

  clone(): Game {
    const copy = new Game(
      this.grid.clone(),
      [this.players[0].clone(), this.players[1].clone()],
      this.moverIndex
    );
    copy.stateVersion = this.stateVersion;
    copy.lastPlaced = this.lastMove;
    copy.placements = this.placements;
    return copy;
  }

  toJSON(): GameSnapshot {
    return {
      width: this.board.width,
      height: this.board.height,
      rows: this.board.rows(),
      mover: this.mover.id,
      skipped: {
        b: this.getPlayer("b").skippedLastTurn,
        w: this.getPlayer("w").skippedLastTurn,
      },
      status: this.status,
      lastMove: this.lastMove,
      moveCount: this.placements,
      version: this.stateVersion,
    };
  }

  private advance(): void {
    this.moverIndex = this.moverIndex === 0 ? 1 : 0;
    this.stateVersion++;
  }
}
