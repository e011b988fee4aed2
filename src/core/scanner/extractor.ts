/**
 * Comment extractor - runs a dialect's compiled matcher over a text once,
 * dropping literal regions and collecting comment regions in source order.
 *
 * @example
 * ```typescript
 * extractComments('x = "a # b"  # real', "python");
 * // ["# real"]
 *
 * const extractor = new CommentExtractor();
 * const result = await extractor.extractFile("src/main.go");
 * if (result.success) {
 *   console.log(result.data.comments.map((c) => c.lineStart));
 * }
 * ```
 */

import { readFile } from "fs/promises";
import { extname, resolve } from "path";

import { defaultRegistry } from "../../dialects/registry/index.js";
import { ParseError, UnsupportedDialectError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err, tryCatchAsync } from "../../lib/result.js";
import { defaultCompiler } from "../compiler/index.js";

import { LineIndex } from "./line-index.js";

import type { CommentMatch, ExtractFileOptions, FileExtraction } from "./types.js";
import type { Dialect, DialectRegistry } from "../../dialects/registry/index.js";
import type { CommentSieveError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";
import type { Match, PatternCompiler } from "../compiler/index.js";

/**
 * Extracts comments using a dialect registry and a compiler cache.
 *
 * Each call is independent; the only state carried between calls is the
 * compiler's matcher cache.
 */
export class CommentExtractor {
  private readonly log = logger.child("[extractor]");

  constructor(
    readonly registry: DialectRegistry = defaultRegistry,
    private readonly compiler: PatternCompiler = defaultCompiler
  ) {}

  /**
   * Comment texts, delimiters included, in the order they appear.
   *
   * @throws {UnsupportedDialectError} when `language` is not registered
   */
  extract(text: string, language: string): string[] {
    const comments: string[] = [];
    for (const match of this.keepMatches(text, this.registry.lookup(language))) {
      comments.push(match.text);
    }
    return comments;
  }

  /**
   * Comments with offsets and line/column positions.
   *
   * @throws {UnsupportedDialectError} when `language` is not registered
   */
  extractMatches(text: string, language: string): CommentMatch[] {
    return this.collect(text, this.registry.lookup(language));
  }

  /**
   * Dialect for a file: the explicit language if given, otherwise the
   * one registered for its extension
   */
  resolveDialect(filePath: string, language?: string): Result<Dialect, UnsupportedDialectError> {
    if (language !== undefined) {
      return this.registry.get(language);
    }
    const ext = extname(filePath).toLowerCase();
    const dialect = this.registry.forExtension(ext);
    if (dialect === undefined) {
      return err(new UnsupportedDialectError(ext === "" ? filePath : ext));
    }
    return ok(dialect);
  }

  /**
   * Read a UTF-8 file and extract its comments
   */
  async extractFile(
    filePath: string,
    options: ExtractFileOptions = {}
  ): Promise<Result<FileExtraction, CommentSieveError>> {
    const startTime = performance.now();
    const absolutePath = resolve(options.basePath ?? process.cwd(), filePath);

    const dialect = this.resolveDialect(absolutePath, options.language);
    if (!dialect.success) {
      return dialect;
    }

    const contentResult = await tryCatchAsync(() => readFile(absolutePath, "utf-8"));
    if (!contentResult.success) {
      return err(new ParseError(`Failed to read file: ${contentResult.error.message}`, absolutePath));
    }

    const comments = this.collect(contentResult.data, dialect.data);
    this.log.debug(`${absolutePath}: ${comments.length} comments (${dialect.data.name})`);

    return ok({
      filePath: absolutePath,
      dialect: dialect.data.name,
      comments,
      extractTimeMs: performance.now() - startTime,
    });
  }

  /**
   * Position-annotated extraction for an already resolved dialect
   */
  collect(text: string, dialect: Dialect): CommentMatch[] {
    const lines = new LineIndex(text);
    const comments: CommentMatch[] = [];

    for (const match of this.keepMatches(text, dialect)) {
      const last = match.end - 1;
      comments.push({
        text: match.text,
        style: match.rule.kind,
        start: match.start,
        end: match.end,
        lineStart: lines.lineOf(match.start),
        lineEnd: lines.lineOf(last),
        columnStart: lines.columnOf(match.start),
        columnEnd: lines.columnOf(last) + 1,
      });
    }
    return comments;
  }

  private *keepMatches(text: string, dialect: Dialect): Generator<Match, void, undefined> {
    for (const match of this.compiler.compile(dialect).matchAll(text)) {
      if (match.kind === "keep") {
        yield match;
      }
    }
  }
}

/**
 * Create an extractor, optionally over a custom registry
 */
export function createCommentExtractor(
  registry?: DialectRegistry,
  compiler?: PatternCompiler
): CommentExtractor {
  return new CommentExtractor(registry, compiler);
}

const defaultExtractor = new CommentExtractor();

/**
 * Extract comments with the built-in dialects.
 *
 * `language` is one of python, c, c++, java, c#, js, javascript, go or
 * php, in any case.
 *
 * @throws {UnsupportedDialectError} for any other language
 */
export function extractComments(code: string, language: string): string[] {
  return defaultExtractor.extract(code, language);
}

/**
 * {@link extractComments} with positions
 */
export function extractCommentMatches(code: string, language: string): CommentMatch[] {
  return defaultExtractor.extractMatches(code, language);
}
