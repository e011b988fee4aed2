import chalk from "chalk";

import { describeRule } from "../dialects/schema/index.js";

import type { FileExtraction } from "../core/scanner/index.js";
import type { Dialect } from "../dialects/registry/index.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json" | "text";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json", "text"];

/**
 * Colors per comment style in terminal output
 */
const STYLE_COLORS: Record<string, typeof chalk> = {
  line: chalk.green,
  block: chalk.cyan,
  "triple-quoted": chalk.magenta,
};

export interface FormatOptions {
  /** Include line/column positions */
  positions?: boolean;
}

/**
 * Format extractions for the terminal, grouped by file
 */
export function formatTerminal(extractions: FileExtraction[], options: FormatOptions = {}): string {
  const lines: string[] = [];

  for (const extraction of extractions) {
    const count = extraction.comments.length;
    lines.push(
      `${chalk.bold(extraction.filePath)} ${chalk.gray(`(${extraction.dialect}, ${count} ${count === 1 ? "comment" : "comments"})`)}`
    );

    if (count === 0) {
      lines.push(chalk.yellow("  No comments found."));
    }

    for (const comment of extraction.comments) {
      const color = STYLE_COLORS[comment.style] ?? chalk.white;
      const location = options.positions === true
        ? chalk.gray(`${comment.lineStart}:${comment.columnStart} `)
        : "";
      // Continuation lines of block comments stay under the first line
      const body = comment.text.split("\n").join("\n    ");
      lines.push(`  ${location}${color(body)}`);
    }
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

/**
 * Raw comment texts, one after another
 */
export function formatText(extractions: FileExtraction[]): string {
  return extractions
    .flatMap((extraction) => extraction.comments.map((comment) => comment.text))
    .join("\n");
}

/**
 * Format extractions as JSON; without positions each comment is its text
 */
export function formatJson(extractions: FileExtraction[], options: FormatOptions = {}): string {
  const payload = extractions.map((extraction) => ({
    file: extraction.filePath,
    dialect: extraction.dialect,
    comments: options.positions === true
      ? extraction.comments
      : extraction.comments.map((comment) => comment.text),
  }));
  return JSON.stringify(payload, null, 2);
}

/**
 * Format extractions in the specified output format
 */
export function formatExtractions(
  extractions: FileExtraction[],
  format: OutputFormat,
  options: FormatOptions = {}
): string {
  switch (format) {
    case "json":
      return formatJson(extractions, options);
    case "text":
      return formatText(extractions);
    case "terminal":
    default:
      return formatTerminal(extractions, options);
  }
}

/**
 * Format the dialect table
 */
export function formatDialects(dialects: Dialect[], format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(dialects, null, 2);
  }

  if (format === "text") {
    return dialects.map((dialect) => dialect.name).join("\n");
  }

  const lines: string[] = [chalk.bold.underline(`${dialects.length} dialects:`), ""];
  for (const dialect of dialects) {
    const aliases = dialect.aliases.length > 0 ? chalk.gray(` (also: ${dialect.aliases.join(", ")})`) : "";
    lines.push(`${chalk.white.bold(dialect.name)}${aliases}`);
    lines.push(`  skip: ${dialect.skip.map(describeRule).join("  ")}`);
    lines.push(`  keep: ${dialect.keep.map(describeRule).join("  ")}`);
    if (dialect.extensions.length > 0) {
      lines.push(chalk.gray(`  files: ${dialect.extensions.join(" ")}`));
    }
  }
  return lines.join("\n");
}

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((candidate) => candidate === format);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}
