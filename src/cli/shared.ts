/**
 * Shared CLI utilities
 */

import { extname } from "path";

import { guessLanguage } from "../core/detection/index.js";
import { createCommentExtractor } from "../core/scanner/index.js";
import { logger } from "../lib/logger.js";
import { ok } from "../lib/result.js";

import { loadConfig, registryFromConfig, resolveLogLevel } from "./config.js";
import { formatError } from "./formatters.js";

import type { Config } from "./config.js";
import type { CommentExtractor } from "../core/scanner/index.js";
import type { DialectRegistry } from "../dialects/registry/index.js";
import type { ConfigError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";

/**
 * How a dialect name was chosen
 */
export type LanguageSource = "flag" | "config-extension" | "extension" | "config-default" | "guess";

export interface LanguageResolution {
  language: string;
  source: LanguageSource;
}

/**
 * Pick the dialect for an input, in order: `--language`, the configured
 * extension map, the registry's extension map, the configured default,
 * then a guess from the content. `readContent` is only called for the
 * guess.
 */
export async function resolveLanguage(options: {
  filePath: string | null;
  explicit: string | undefined;
  config: Config;
  registry: DialectRegistry;
  readContent: () => Promise<string>;
}): Promise<LanguageResolution> {
  const { filePath, explicit, config, registry } = options;

  if (explicit !== undefined) {
    return { language: explicit, source: "flag" };
  }

  if (filePath !== null) {
    const ext = extname(filePath).toLowerCase();
    const mapped = ext === "" ? undefined : config.extensions?.[ext];
    if (mapped !== undefined) {
      return { language: mapped, source: "config-extension" };
    }
    const dialect = ext === "" ? undefined : registry.forExtension(ext);
    if (dialect !== undefined) {
      return { language: dialect.name, source: "extension" };
    }
  }

  if (config.defaultLanguage !== undefined) {
    return { language: config.defaultLanguage, source: "config-default" };
  }

  return { language: guessLanguage(await options.readContent()), source: "guess" };
}

/**
 * Read all of a stream as UTF-8
 */
export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Configuration, registry and extractor shared by a command run
 */
export interface CliContext {
  config: Config;
  registry: DialectRegistry;
  extractor: CommentExtractor;
}

/**
 * Load configuration, build the registry and configure the logger
 */
export function createContext(
  configPath: string | undefined,
  flags: { verbose?: boolean; quiet?: boolean }
): Result<CliContext, ConfigError> {
  const config = loadConfig(configPath);
  if (!config.success) {
    return config;
  }

  logger.configure({ level: resolveLogLevel(config.data, flags) });

  const registry = registryFromConfig(config.data);
  if (!registry.success) {
    return registry;
  }

  return ok({
    config: config.data,
    registry: registry.data,
    extractor: createCommentExtractor(registry.data),
  });
}

/**
 * Read a string-valued commander option
 */
export function optionString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Print an error and mark the process as failed
 */
export function fail(error: Error): void {
  console.error(formatError(error));
  process.exitCode = 1;
}
