import Logger from "bunyan";
import { Outcome, GameErrorCode, isGameError } from "@flipside/core";
import { MatchOrchestrator, GameUISpec } from "@flipside/engine";
import {
  ReversiData,
  ReversiPublicData,
  PieceId,
  PIECE_IDS,
  isPassAction,
} from "@flipside/game-reversi";

export const INVALID_MOVE_NOTICE = "this is an invalid move. Please try again.";

/** Terminal side of a session; swapped for a scripted stand-in in tests */
export interface SessionIO {
  ask(prompt: string): Promise<string | null>;
  print(text: string): void;
  clear(): void;
}

export interface HotSeatSessionOptions {
  match: MatchOrchestrator<ReversiData, ReversiPublicData>;
  ui: GameUISpec<ReversiPublicData>;
  io: SessionIO;
  logger: Logger;
  showHints?: boolean;
}

/**
 * Two people sharing one terminal. Each turn redraws the board, passes
 * automatically for a player without moves, and re-prompts on bad input
 * until the match finishes or input closes.
 */
export class HotSeatSession {
  private readonly notices: string[] = [];

  constructor(private readonly opts: HotSeatSessionOptions) {}

  async run(): Promise<Outcome> {
    const { match, ui, io, logger } = this.opts;
    const showHints = this.opts.showHints ?? true;

    while (!match.isTerminal()) {
      const player = match.getCurrentPlayer();
      const { publicData } = match.getObservation(player);
      const legal = match.getLegalActions(player);

      if (legal.length === 1 && isPassAction(legal[0])) {
        match.submitAction(player, legal[0]);
        this.notices.push(`player '${publicData.mover}' cannot move, skipping...`);
        logger.debug({ player, piece: publicData.mover }, "forced skip");
        continue;
      }

      io.clear();
      this.flushNotices();
      io.print(ui.renderBoard(showHints ? publicData : { ...publicData, hints: [] }));
      const status = ui.renderStatus(publicData);
      if (status) io.print(status);

      const raw = await io.ask(`player '${publicData.mover}': please enter your move\n>>> `);
      if (raw === null) {
        logger.warn({ player }, "input closed before the game finished");
        return match.getOutcome();
      }

      const action = ui.parseInput(raw, publicData);
      if (!action) {
        this.notices.push(INVALID_MOVE_NOTICE);
        continue;
      }

      try {
        match.submitAction(player, action);
      } catch (err) {
        if (isGameError(err) && err.code === GameErrorCode.INVALID_MOVE) {
          logger.debug({ player, input: raw, reason: err.message }, "move rejected");
          this.notices.push(INVALID_MOVE_NOTICE);
          continue;
        }
        throw err;
      }
      logger.debug({ player, action: ui.formatAction(action) }, "move applied");
    }

    const outcome = match.getOutcome();
    this.printSummary(outcome);
    logger.info(
      { winner: outcome.winner, draw: outcome.draw, moves: match.getTranscript().entries.length },
      "game finished"
    );
    return outcome;
  }

  private flushNotices(): void {
    for (const notice of this.notices.splice(0)) {
      this.opts.io.print(notice);
    }
  }

  private printSummary(outcome: Outcome): void {
    const { match, ui, io } = this.opts;
    const { publicData } = match.getObservation(match.getCurrentPlayer());
    const names = new Map<PieceId, string>(
      Object.entries(publicData.seats).map(([name, piece]) => [piece, name] as const)
    );

    this.flushNotices();
    io.print(ui.renderBoard({ ...publicData, hints: [] }));
    io.print("");
    io.print("### GAME OVER ###");
    io.print("");
    io.print("final scores");
    io.print("============");

    const ranked = [...PIECE_IDS].sort(
      (a, b) => publicData.scores[b] - publicData.scores[a]
    );
    for (const piece of ranked) {
      io.print(`${piece} (${names.get(piece) ?? "?"}): ${publicData.scores[piece]}`);
    }

    io.print(outcome.draw ? "result: draw" : `result: ${outcome.winner} wins`);
  }
}
