/**
 * Extraction result types
 */

import type { RuleKind } from "../../dialects/schema/index.js";

/**
 * A comment found in a text, with its position
 */
export interface CommentMatch {
  /** Comment text including its delimiters */
  text: string;
  /** Rule form that produced it */
  style: RuleKind;
  /** Start offset (inclusive) */
  start: number;
  /** End offset (exclusive) */
  end: number;
  /** Starting line number (1-indexed) */
  lineStart: number;
  /** Ending line number (1-indexed) */
  lineEnd: number;
  /** Column where the comment starts (0-indexed) */
  columnStart: number;
  /** Column just past the last character, on the ending line (0-indexed) */
  columnEnd: number;
}

/**
 * Options for extracting from a file
 */
export interface ExtractFileOptions {
  /** Dialect name; inferred from the file extension when omitted */
  language?: string;
  /** Base directory for relative paths */
  basePath?: string;
}

/**
 * Result of extracting comments from one file
 */
export interface FileExtraction {
  /** Absolute path to the file */
  filePath: string;
  /** Canonical name of the dialect used */
  dialect: string;
  /** Comments in source order */
  comments: CommentMatch[];
  /** Time taken in milliseconds */
  extractTimeMs: number;
}
