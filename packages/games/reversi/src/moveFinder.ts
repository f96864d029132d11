import {
  BoardView,
  Coord,
  CoordKey,
  EMPTY,
  OFF_BOARD,
  Player,
  coordKey,
  offset,
  sameCoord,
} from "./state";

/** A legal placement and every opponent cell it would capture. Frozen. */
export interface MoveCandidate {
  readonly target: Readonly<Coord>;
  readonly chain: readonly Readonly<Coord>[];
}

export type LegalMoveMap = Map<CoordKey, MoveCandidate>;

/** All 8 neighbour offsets */
export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0],           [1, 0],
  [-1, 1],  [0, 1],  [1, 1],
];

/**
 * Compute every legal move for `mover`.
 *
 * Candidates are the empty neighbours of the opponent's pieces. For a target
 * found next to opponent piece `p`, the scan runs from the target through `p`
 * and onward in the same line; it captures when the run of opponent pieces is
 * closed by one of the mover's own. Runs reaching an empty cell or the edge
 * capture nothing. Captures for the same target from different lines are
 * merged without duplicates.
 */
export function findLegalMoves(
  board: BoardView,
  mover: Player,
  opponent: Player
): LegalMoveMap {
  const found = new Map<CoordKey, { target: Coord; chain: Coord[] }>();
  const seen = new Map<CoordKey, Set<CoordKey>>();

  for (const piece of opponent.pieces()) {
    for (const [dc, dr] of NEIGHBOR_OFFSETS) {
      const target = offset(piece, dc, dr);
      if (sameCoord(target, piece)) continue;
      if (board.ownerAt(target) !== EMPTY) continue;

      const chain = walkToMover(board, mover, opponent, target, -dc, -dr);
      if (chain === null || chain.length === 0) continue;

      const key = coordKey(target);
      let move = found.get(key);
      let captured = seen.get(key);
      if (!move || !captured) {
        move = { target, chain: [] };
        captured = new Set();
        found.set(key, move);
        seen.set(key, captured);
      }
      for (const cell of chain) {
        const cellKey = coordKey(cell);
        if (captured.has(cellKey)) continue;
        captured.add(cellKey);
        move.chain.push(cell);
      }
    }
  }

  const moves: LegalMoveMap = new Map();
  for (const [key, { target, chain }] of found) {
    moves.set(
      key,
      Object.freeze({
        target: Object.freeze(target),
        chain: Object.freeze(chain.map((cell) => Object.freeze(cell))),
      })
    );
  }
  return moves;
}

/**
 * Step from `from` by (dc, dr), collecting opponent cells until a mover cell
 * closes the run. Returns null when the run hits an empty cell or leaves the
 * board; an empty array means the mover's piece sits right next to `from`.
 */
export function walkToMover(
  board: BoardView,
  mover: Player,
  opponent: Player,
  from: Coord,
  dc: number,
  dr: number
): Coord[] | null {
  const chain: Coord[] = [];
  let cursor = offset(from, dc, dr);

  for (;;) {
    const owner = board.ownerAt(cursor);
    if (owner === OFF_BOARD || owner === EMPTY) return null;
    if (owner === mover.id) return chain;
    if (owner !== opponent.id) return null;
    chain.push(cursor);
    cursor = offset(cursor, dc, dr);
  }
}
