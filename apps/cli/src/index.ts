import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { exitWithError } from "./errors.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerPlayCommand } from "./commands/play.js";
import { registerSelfPlayCommand } from "./commands/selfplay.js";
import { registerHintCommand } from "./commands/hint.js";

program
  .name("othello")
  .description("Othello against a fixed-depth alpha-beta engine")
  .version("0.1.0", "-v, --version");

registerPlayCommand(program);
registerSelfPlayCommand(program);
registerHintCommand(program);
registerConfigCommand(program);

program.parseAsync().catch(exitWithError);
