#!/usr/bin/env node
/**
 * comment-sieve CLI entry point
 *
 * Commands:
 * - extract  - Print the comments of files or stdin
 * - dialects - List supported dialects
 * - guess    - Guess the dialect of a snippet
 */

import { createProgram } from "./program.js";
import { fail } from "./shared.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    fail(error instanceof Error ? error : new Error(String(error)));
  });
