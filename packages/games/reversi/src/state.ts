import { InvariantViolationError } from "@flipside/core";

/** Piece identifiers: "b" moves first, "w" second */
export type PieceId = "b" | "w";

export const PIECE_IDS: readonly PieceId[] = ["b", "w"];

/** Owner value of an unoccupied cell */
export const EMPTY = "-";

export type Owner = PieceId | typeof EMPTY;

/** Returned by Board.ownerAt for any coordinate outside the grid */
export const OFF_BOARD: unique symbol = Symbol("off-board");

export type OffBoard = typeof OFF_BOARD;

/** Column/row coordinate; (0,0) is the top-left cell and rows grow downward */
export interface Coord {
  col: number;
  row: number;
}

/** "col,row" string identifying a coordinate inside maps and sets */
export type CoordKey = string;

export const DEFAULT_BOARD_SIZE = 8;
export const MIN_BOARD_SIZE = 4;
export const MAX_BOARD_SIZE = 26;

export function coordKey(coord: Coord): CoordKey {
  return `${coord.col},${coord.row}`;
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.col === b.col && a.row === b.row;
}

export function offset(coord: Coord, dc: number, dr: number): Coord {
  return { col: coord.col + dc, row: coord.row + dr };
}

/** Order coordinates top-to-bottom, then left-to-right */
export function compareCoords(a: Coord, b: Coord): number {
  return a.row - b.row || a.col - b.col;
}

export function isPieceId(value: unknown): value is PieceId {
  return value === "b" || value === "w";
}

/**
 * A player's identity, the set of cells it owns and whether its last turn
 * was a forced skip. Kept in step with the Board by Game.
 */
export class Player {
  readonly id: PieceId;
  skippedLastTurn = false;
  private readonly owned = new Map<CoordKey, Coord>();

  constructor(id: PieceId, pieces: Iterable<Coord> = []) {
    this.id = id;
    for (const piece of pieces) {
      this.addPiece(piece);
    }
  }

  /** Collect every cell of `board` owned by `id` */
  static fromBoard(id: PieceId, board: Board): Player {
    const pieces: Coord[] = [];
    for (let row = 0; row < board.height; row++) {
      for (let col = 0; col < board.width; col++) {
        if (board.ownerAt({ col, row }) === id) pieces.push({ col, row });
      }
    }
    return new Player(id, pieces);
  }

  get pieceCount(): number {
    return this.owned.size;
  }

  owns(coord: Coord): boolean {
    return this.owned.has(coordKey(coord));
  }

  addPiece(coord: Coord): void {
    this.owned.set(coordKey(coord), { col: coord.col, row: coord.row });
  }

  removePiece(coord: Coord): void {
    if (!this.owned.delete(coordKey(coord))) {
      throw new InvariantViolationError(
        `Player ${this.id} does not own (${coord.col}, ${coord.row})`,
        { player: this.id, col: coord.col, row: coord.row }
      );
    }
  }

  pieces(): Coord[] {
    return Array.from(this.owned.values(), (c) => ({ ...c }));
  }

  clone(): Player {
    const copy = new Player(this.id, this.owned.values());
    copy.skippedLastTurn = this.skippedLastTurn;
    return copy;
  }
}

/** The reading half of Board, handed out where callers must not write */
export interface BoardView {
  readonly width: number;
  readonly height: number;
  contains(coord: Coord): boolean;
  ownerAt(coord: Coord): Owner | OffBoard;
  count(owner: Owner): number;
  occupiedCount(): number;
  rows(): Owner[][];
}

/**
 * Fixed-size grid of cell owners, stored row-major. Coordinates outside the
 * grid are never stored; reading one yields OFF_BOARD.
 */
export class Board implements BoardView {
  readonly width: number;
  readonly height: number;
  private readonly cells: Owner[][];

  constructor(width: number, height: number) {
    assertDimension("width", width);
    assertDimension("height", height);
    this.width = width;
    this.height = height;
    this.cells = [];
    for (let r = 0; r < height; r++) {
      this.cells.push(new Array<Owner>(width).fill(EMPTY));
    }
  }

  /**
   * Build a board from a text diagram, one string per row using "-", "b"
   * and "w" (whitespace ignored).
   */
  static fromRows(rows: string[]): Board {
    const parsed = rows.map((line) => line.replace(/\s+/g, "").split(""));
    const width = parsed[0]?.length ?? 0;
    if (parsed.some((line) => line.length !== width)) {
      throw new RangeError("Board rows must all have the same length");
    }
    const board = new Board(width, parsed.length);
    parsed.forEach((line, row) => {
      line.forEach((ch, col) => {
        if (isPieceId(ch)) {
          board.cells[row][col] = ch;
        } else if (ch !== EMPTY) {
          throw new RangeError(`Unknown cell "${ch}" at (${col}, ${row})`);
        }
      });
    });
    return board;
  }

  contains(coord: Coord): boolean {
    return (
      Number.isInteger(coord.col) &&
      Number.isInteger(coord.row) &&
      coord.col >= 0 &&
      coord.col < this.width &&
      coord.row >= 0 &&
      coord.row < this.height
    );
  }

  ownerAt(coord: Coord): Owner | OffBoard {
    if (!this.contains(coord)) return OFF_BOARD;
    return this.cells[coord.row][coord.col];
  }

  place(player: Player, coord: Coord): void {
    this.write(coord, player.id);
  }

  clear(coord: Coord): void {
    this.write(coord, EMPTY);
  }

  count(owner: Owner): number {
    let n = 0;
    for (const line of this.cells) {
      for (const cell of line) {
        if (cell === owner) n++;
      }
    }
    return n;
  }

  occupiedCount(): number {
    return this.width * this.height - this.count(EMPTY);
  }

  /** Copy of the grid, indexed [row][col] */
  rows(): Owner[][] {
    return this.cells.map((line) => [...line]);
  }

  /** Live read-only facade; later writes to this board show through it */
  view(): BoardView {
    return {
      width: this.width,
      height: this.height,
      contains: (coord) => this.contains(coord),
      ownerAt: (coord) => this.ownerAt(coord),
      count: (owner) => this.count(owner),
      occupiedCount: () => this.occupiedCount(),
      rows: () => this.rows(),
    };
  }

  clone(): Board {
    const copy = new Board(this.width, this.height);
    this.cells.forEach((line, row) => {
      copy.cells[row] = [...line];
    });
    return copy;
  }

  private write(coord: Coord, owner: Owner): void {
    if (!this.contains(coord)) {
      throw new InvariantViolationError(
        `Cannot write off-board cell (${coord.col}, ${coord.row})`,
        { col: coord.col, row: coord.row }
      );
    }
    this.cells[coord.row][coord.col] = owner;
  }
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > MAX_BOARD_SIZE) {
    throw new RangeError(
      `Board ${name} must be an integer between 1 and ${MAX_BOARD_SIZE}, got ${value}`
    );
  }
}

/**
 * Classic opening: the four centre cells split diagonally, "w" on the
 * top-left/bottom-right pair and "b" on the other two.
 */
export function startingPieces(width: number, height: number): Record<PieceId, Coord[]> {
  for (const [name, value] of [["width", width], ["height", height]] as const) {
    if (
      !Number.isInteger(value) ||
      value % 2 !== 0 ||
      value < MIN_BOARD_SIZE ||
      value > MAX_BOARD_SIZE
    ) {
      throw new RangeError(
        `Board ${name} must be an even number between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}, got ${value}`
      );
    }
  }
  const cx = width / 2;
  const cy = height / 2;
  return {
    b: [
      { col: cx, row: cy - 1 },
      { col: cx - 1, row: cy },
    ],
    w: [
      { col: cx - 1, row: cy - 1 },
      { col: cx, row: cy },
    ],
  };
}
