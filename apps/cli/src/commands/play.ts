import { Command } from "commander";
import { randomUUID } from "node:crypto";
import { MatchOrchestrator } from "@flipside/engine";
import { ReversiModule, ReversiUI } from "@flipside/game-reversi";
import { resolveConfig, setCliOverride } from "../config";
import { createPrompter } from "../prompt";
import { HotSeatSession } from "../session/HotSeatSession";
import log from "../logger";

interface PlayOptions {
  width?: string;
  height?: string;
  hints: boolean;
  black: string;
  white: string;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play", { isDefault: true })
    .description("Play a two-player game in this terminal")
    .option("-W, --width <n>", "Board width (even, 4-26)")
    .option("-H, --height <n>", "Board height (even, 4-26)")
    .option("--no-hints", "Hide legal-move markers")
    .option("--black <name>", "Name of the player moving first", "black")
    .option("--white <name>", "Name of the player moving second", "white")
    .addHelpText("after", `\nMoves: ${ReversiUI.inputHint}`)
    .action(async (opts: PlayOptions, cmd: Command) => {
      if (opts.width) setCliOverride("boardWidth", opts.width);
      if (opts.height) setCliOverride("boardHeight", opts.height);
      if (cmd.getOptionValueSource("hints") === "cli") {
        setCliOverride("showHints", String(opts.hints));
      }

      const prompter = createPrompter();
      try {
        const config = await resolveConfig();
        log.level(config.logLevel);

        const match = new MatchOrchestrator({
          game: ReversiModule,
          players: [opts.black, opts.white],
          matchId: randomUUID(),
          settings: { width: config.boardWidth, height: config.boardHeight },
        });
        log.debug({ width: config.boardWidth, height: config.boardHeight }, "match created");

        const session = new HotSeatSession({
          match,
          ui: ReversiUI,
          io: {
            ask: (prompt) => prompter.ask(prompt),
            print: (text) => console.log(text),
            clear: () => console.clear(),
          },
          logger: log,
          showHints: config.showHints,
        });
        await session.run();
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      } finally {
        prompter.close();
      }
    });
}
