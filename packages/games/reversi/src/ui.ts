import { Action } from "@flipside/core";
import { GameUISpec } from "@flipside/engine";
import { EMPTY, coordKey } from "./state";
import { ReversiPublicData } from "./types";
import { passAction, placeAction } from "./actions";

/** Drawn over empty cells the mover may play; never stored on the board */
export const HINT_MARKER = "?";

const PAIR_RE = /^(\d+)\s*[,\s]\s*(\d+)$/;
const LETTER_RE = /^([a-z])(\d+)$/;

export const ReversiUI: GameUISpec<ReversiPublicData> = {
  inputHint: "Enter <col> <row> (e.g. 2 3), a letter and row (e.g. c4), or pass",

  renderBoard(publicData: ReversiPublicData): string {
    const { width, height, rows, hints } = publicData;
    const hinted = new Set(hints.map(coordKey));
    const pad = String(Math.max(width, height) - 1).length;
    const lines: string[] = [];

    // Column header
    const header: string[] = [];
    for (let c = 0; c < width; c++) header.push(String(c).padStart(pad));
    lines.push(" ".repeat(pad + 1) + header.join(" "));

    for (let r = 0; r < height; r++) {
      const cells: string[] = [];
      for (let c = 0; c < width; c++) {
        const owner = rows[r][c];
        const shown =
          owner === EMPTY && hinted.has(coordKey({ col: c, row: r })) ? HINT_MARKER : owner;
        cells.push(shown.padStart(pad));
      }
      lines.push(`${String(r).padStart(pad)} ${cells.join(" ")}`);
    }

    return lines.join("\n");
  },

  renderStatus(publicData: ReversiPublicData): string | null {
    const { scores, status } = publicData;
    const tally = `b: ${scores.b}  w: ${scores.w}`;
    return status === "finished" ? `Game over. ${tally}` : tally;
  },

  parseInput(raw: string, publicData: ReversiPublicData): Action | null {
    const trimmed = raw.trim().toLowerCase().replace(/[()]/g, "").trim();

    if (trimmed === "pass") {
      return passAction();
    }

    let col: number;
    let row: number;
    const pair = PAIR_RE.exec(trimmed);
    const letter = LETTER_RE.exec(trimmed);
    if (pair) {
      col = parseInt(pair[1], 10);
      row = parseInt(pair[2], 10);
    } else if (letter) {
      // "c4" → col 2, row 3
      col = letter[1].charCodeAt(0) - "a".charCodeAt(0);
      row = parseInt(letter[2], 10) - 1;
    } else {
      return null;
    }

    if (col < 0 || col >= publicData.width || row < 0 || row >= publicData.height) {
      return null;
    }
    return placeAction(col, row);
  },

  formatAction(action: Action): string {
    const { col, row } = action.data;
    if (action.type === "place" && typeof col === "number" && typeof row === "number") {
      return `(${col}, ${row})`;
    }
    return "pass";
  },

  getPlayerLabel(playerId: string, publicData: ReversiPublicData): string {
    const piece = publicData.seats[playerId];
    if (piece === "b") return "Black";
    if (piece === "w") return "White";
    return "?";
  },
};
