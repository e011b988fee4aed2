import { Command } from "commander";

import { VERSION } from "../core/index.js";

import { registerDialectsCommand } from "./commands/dialects.js";
import { registerExtractCommand } from "./commands/extract.js";
import { registerGuessCommand } from "./commands/guess.js";

/**
 * Build the command tree
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("comment-sieve")
    .description("Extract comments from source code without tripping over string literals")
    .version(VERSION);

  registerExtractCommand(program);
  registerDialectsCommand(program);
  registerGuessCommand(program);

  return program;
}
