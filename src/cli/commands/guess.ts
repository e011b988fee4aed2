/**
 * Guess command - report which dialect a snippet most likely is
 */

import { readFile } from "fs/promises";
import { resolve } from "path";

import chalk from "chalk";

import { guessLanguage, scoreLanguages } from "../../core/detection/index.js";
import { tryCatchAsync } from "../../lib/index.js";
import { formatWarning } from "../formatters.js";
import { fail, readStream } from "../shared.js";

import type { Command } from "commander";

export function registerGuessCommand(program: Command): void {
  program
    .command("guess [file]")
    .description("Guess the dialect of a file, or of stdin when no file is given")
    .option("--scores", "Show the vote tally for every language")
    .action(async (file: string | undefined, options: Record<string, unknown>) => {
      const content = await tryCatchAsync(() =>
        file === undefined ? readStream(process.stdin) : readFile(resolve(file), "utf-8")
      );
      if (!content.success) {
        fail(content.error);
        return;
      }

      const scores = scoreLanguages(content.data);
      if (scores.every((score) => score.votes === 0)) {
        console.error(formatWarning("No language features found; falling back to the first language"));
      }

      console.log(guessLanguage(content.data));

      if (Boolean(options["scores"])) {
        for (const score of [...scores].sort((a, b) => b.votes - a.votes)) {
          console.log(chalk.gray(`  ${score.language.padEnd(8)} ${score.votes}`));
        }
      }
    });
}
