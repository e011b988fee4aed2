/**
 * Configuration Management
 *
 * Reads the optional project file `.comment-sieve.json` from the working
 * directory (or an explicit path). Environment variables take precedence
 * over the file.
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";

import { z } from "zod";

import { DialectDefinitionSchema } from "../dialects/schema/index.js";
import { createDialectRegistry } from "../dialects/registry/index.js";
import { ConfigError } from "../lib/errors.js";
import { isLogLevel } from "../lib/logger.js";
import { ok, err, tryCatch } from "../lib/result.js";

import type { DialectRegistry } from "../dialects/registry/index.js";
import type { LogLevel } from "../lib/logger.js";
import type { Result } from "../lib/result.js";

export const CONFIG_FILE_NAME = ".comment-sieve.json";

export const LOG_LEVEL_ENV = "COMMENT_SIEVE_LOG_LEVEL";

/**
 * Configuration schema
 */
export const ConfigSchema = z.object({
  /** Dialect used when nothing else resolves one */
  defaultLanguage: z.string().min(1).optional(),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  output: z.enum(["terminal", "json", "text"]).optional(),
  /** Extension (with dot) -> dialect name, consulted before the registry */
  extensions: z.record(z.string().min(1)).optional(),
  /** Extra dialects added to the built-ins */
  dialects: z.array(DialectDefinitionSchema).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Load configuration.
 *
 * A missing default file is an empty configuration; a missing explicit
 * file, unreadable JSON or a schema violation is a {@link ConfigError}.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): Result<Config, ConfigError> {
  const path = resolve(cwd, configPath ?? CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      return err(new ConfigError(`Config file not found: ${path}`, { path }));
    }
    return ok(applyEnvironment({}));
  }

  const content = tryCatch(() => readFileSync(path, "utf-8"));
  if (!content.success) {
    return err(new ConfigError(`Failed to read config: ${content.error.message}`, { path }));
  }

  const parsed = tryCatch((): unknown => JSON.parse(content.data));
  if (!parsed.success) {
    return err(new ConfigError(`Invalid JSON in ${path}: ${parsed.error.message}`, { path }));
  }

  const result = ConfigSchema.safeParse(parsed.data);
  if (!result.success) {
    return err(new ConfigError(`Invalid config in ${path}`, { path, issues: result.error.issues }));
  }

  return ok(applyEnvironment(result.data));
}

/**
 * Overlay environment variables onto a configuration
 */
export function applyEnvironment(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const level = env[LOG_LEVEL_ENV];
  if (level !== undefined && isLogLevel(level)) {
    return { ...config, logLevel: level };
  }
  return config;
}

/**
 * Registry of the built-ins plus the configured dialects
 */
export function registryFromConfig(config: Config): Result<DialectRegistry, ConfigError> {
  const registry = createDialectRegistry(config.dialects ?? []);
  if (!registry.success) {
    return err(new ConfigError(registry.error.message, registry.error.context));
  }
  return ok(registry.data);
}

/**
 * Level the CLI flags and configuration ask for
 */
export function resolveLogLevel(
  config: Config,
  flags: { verbose?: boolean; quiet?: boolean }
): LogLevel {
  if (flags.quiet === true) {
    return "error";
  }
  if (flags.verbose === true) {
    return "debug";
  }
  return config.logLevel ?? "info";
}
