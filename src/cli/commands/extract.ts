/**
 * Extract command - print the comments of source files or stdin
 */

import { readFile } from "fs/promises";
import { resolve } from "path";

import { logger, ParseError, tryCatchAsync } from "../../lib/index.js";
import { formatExtractions, isValidOutputFormat, OUTPUT_FORMATS } from "../formatters.js";
import { createContext, fail, optionString, readStream, resolveLanguage } from "../shared.js";

import type { Command } from "commander";
import type { FileExtraction } from "../../core/scanner/index.js";
import type { CliContext } from "../shared.js";

const STDIN_LABEL = "<stdin>";

async function extractStdin(context: CliContext, explicit: string | undefined): Promise<FileExtraction | Error> {
  const startTime = performance.now();
  const content = await readStream(process.stdin);
  const resolution = await resolveLanguage({
    filePath: null,
    explicit,
    config: context.config,
    registry: context.registry,
    readContent: async () => content,
  });
  logger.debug(`${STDIN_LABEL}: ${resolution.language} (${resolution.source})`);

  const dialect = context.registry.get(resolution.language);
  if (!dialect.success) {
    return dialect.error;
  }
  return {
    filePath: STDIN_LABEL,
    dialect: dialect.data.name,
    comments: context.extractor.collect(content, dialect.data),
    extractTimeMs: performance.now() - startTime,
  };
}

async function extractPath(
  context: CliContext,
  file: string,
  explicit: string | undefined
): Promise<FileExtraction | Error> {
  const startTime = performance.now();
  const absolutePath = resolve(file);
  // Filled only when the dialect has to be guessed from the content
  const read: { content?: string } = {};

  const resolution = await tryCatchAsync(() =>
    resolveLanguage({
      filePath: absolutePath,
      explicit,
      config: context.config,
      registry: context.registry,
      readContent: async () => {
        read.content = await readFile(absolutePath, "utf-8");
        return read.content;
      },
    })
  );
  if (!resolution.success) {
    return new ParseError(`Failed to read file: ${resolution.error.message}`, absolutePath);
  }
  logger.debug(`${file}: ${resolution.data.language} (${resolution.data.source})`);

  if (read.content === undefined) {
    const result = await context.extractor.extractFile(absolutePath, { language: resolution.data.language });
    return result.success ? result.data : result.error;
  }

  const dialect = context.registry.get(resolution.data.language);
  if (!dialect.success) {
    return dialect.error;
  }
  return {
    filePath: absolutePath,
    dialect: dialect.data.name,
    comments: context.extractor.collect(read.content, dialect.data),
    extractTimeMs: performance.now() - startTime,
  };
}

export function registerExtractCommand(program: Command): void {
  program
    .command("extract [files...]")
    .description("Extract comments from source files, or from stdin when no file is given")
    .option("-l, --language <name>", "Dialect: python, c, c++, java, c#, js, javascript, go, php")
    .option("-o, --output <format>", `Output format: ${OUTPUT_FORMATS.join(", ")}`)
    .option("--positions", "Include line and column positions")
    .option("-c, --config <path>", "Path to a config file")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (files: string[], options: Record<string, unknown>) => {
      const context = createContext(optionString(options, "config"), {
        verbose: Boolean(options["verbose"]),
        quiet: Boolean(options["quiet"]),
      });
      if (!context.success) {
        fail(context.error);
        return;
      }

      const outputFormat = optionString(options, "output") ?? context.data.config.output ?? "terminal";
      if (!isValidOutputFormat(outputFormat)) {
        fail(new Error(`Invalid output format: ${outputFormat}. Use: ${OUTPUT_FORMATS.join(", ")}`));
        return;
      }

      const explicit = optionString(options, "language");
      const extractions: FileExtraction[] = [];

      const outcomes = files.length === 0
        ? [await extractStdin(context.data, explicit)]
        : await Promise.all(files.map((file) => extractPath(context.data, file, explicit)));

      for (const outcome of outcomes) {
        if (outcome instanceof Error) {
          fail(outcome);
        } else {
          extractions.push(outcome);
        }
      }

      if (extractions.length > 0) {
        console.log(formatExtractions(extractions, outputFormat, { positions: Boolean(options["positions"]) }));
      }
    });
}
