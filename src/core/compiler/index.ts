export {
  PatternCompiler,
  createPatternCompiler,
  defaultCompiler,
  compile,
  compileDialect,
} from "./compiler.js";
export { compileRule } from "./rules.js";
export { NO_MATCH, UNTERMINATED } from "./types.js";
export type { Alternative, Match, Matcher, RuleScanner } from "./types.js";
