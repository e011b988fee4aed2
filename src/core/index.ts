/**
 * Core extraction engine
 *
 * This module contains:
 * - compiler/  - Merges dialect rules into priority-ordered matchers
 * - scanner/   - Single-pass comment extraction
 * - detection/ - Heuristic dialect guessing
 */

export const VERSION = "0.1.0";

// Compiler module
export {
  PatternCompiler,
  createPatternCompiler,
  defaultCompiler,
  compile,
  compileDialect,
  compileRule,
  NO_MATCH,
  UNTERMINATED,
  type Alternative,
  type Match,
  type Matcher,
  type RuleScanner,
} from "./compiler/index.js";

// Scanner module
export {
  CommentExtractor,
  createCommentExtractor,
  extractComments,
  extractCommentMatches,
  LineIndex,
  type CommentMatch,
  type ExtractFileOptions,
  type FileExtraction,
} from "./scanner/index.js";

// Detection module
export {
  guessLanguage,
  scoreLanguages,
  loadLanguageFeatures,
  compileFeatures,
  type LanguageFeatures,
  type LanguageScore,
  type CompiledFeatures,
} from "./detection/index.js";
