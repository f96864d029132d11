import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { ReversiModule } from "@flipside/game-reversi";
import { registerPlayCommand } from "./commands/play";
import { registerConfigCommand } from "./commands/config";

program
  .name("flipside")
  .description(`${ReversiModule.name} for two players sharing a terminal`)
  .version("0.1.0", "-v, --version");

registerPlayCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
