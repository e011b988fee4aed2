/**
 * Dialects command - list the registered dialects and their rules
 */

import { formatDialects, isValidOutputFormat, OUTPUT_FORMATS } from "../formatters.js";
import { createContext, fail, optionString } from "../shared.js";

import type { Command } from "commander";

export function registerDialectsCommand(program: Command): void {
  program
    .command("dialects")
    .description("List supported dialects with their literal and comment rules")
    .option("-o, --output <format>", `Output format: ${OUTPUT_FORMATS.join(", ")}`, "terminal")
    .option("-c, --config <path>", "Path to a config file")
    .action((options: Record<string, unknown>) => {
      const context = createContext(optionString(options, "config"), {});
      if (!context.success) {
        fail(context.error);
        return;
      }

      const outputFormat = optionString(options, "output") ?? "terminal";
      if (!isValidOutputFormat(outputFormat)) {
        fail(new Error(`Invalid output format: ${outputFormat}. Use: ${OUTPUT_FORMATS.join(", ")}`));
        return;
      }

      console.log(formatDialects(context.data.registry.toArray(), outputFormat));
    });
}
