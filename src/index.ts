/**
 * comment-sieve - dialect-aware comment extraction
 *
 * @packageDocumentation
 */

// Dialects and schemas
export {
  // Schemas
  QuoteCharSchema,
  RuleClassSchema,
  QuotedRuleSchema,
  TripleQuotedRuleSchema,
  LineRuleSchema,
  BlockRuleSchema,
  RuleSchema,
  DialectDefinitionSchema,
  // Constants
  RULE_KINDS,
  BUILTIN_DIALECTS,
  describeRule,
  // Registry
  DialectRegistry,
  createDialectRegistry,
  defaultRegistry,
  lookupDialect,
  normalizeDialectName,
} from "./dialects/index.js";

export type {
  QuoteChar,
  RuleClass,
  QuotedRule,
  TripleQuotedRule,
  LineRule,
  BlockRule,
  Rule,
  RuleKind,
  DialectDefinition,
  DialectDefinitionInput,
  Dialect,
} from "./dialects/index.js";

// Library utilities
export {
  // Errors
  CommentSieveError,
  UnsupportedDialectError,
  ValidationError,
  ParseError,
  ConfigError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";

// Core exports
export {
  VERSION,
  PatternCompiler,
  createPatternCompiler,
  defaultCompiler,
  compile,
  compileDialect,
  CommentExtractor,
  createCommentExtractor,
  extractComments,
  extractCommentMatches,
  guessLanguage,
  scoreLanguages,
} from "./core/index.js";

export type {
  Alternative,
  Match,
  Matcher,
  CommentMatch,
  ExtractFileOptions,
  FileExtraction,
  LanguageScore,
} from "./core/index.js";
