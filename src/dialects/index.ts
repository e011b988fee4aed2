// Schema exports
export {
  QuoteCharSchema,
  RuleClassSchema,
  QuotedRuleSchema,
  TripleQuotedRuleSchema,
  LineRuleSchema,
  BlockRuleSchema,
  RuleSchema,
  DialectDefinitionSchema,
  RULE_KINDS,
  describeRule,
} from "./schema/index.js";

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
} from "./schema/index.js";

// Registry
export {
  DialectRegistry,
  createDialectRegistry,
  defaultRegistry,
  lookupDialect,
  normalizeDialectName,
  BUILTIN_DIALECTS,
} from "./registry/index.js";
export type { Dialect } from "./registry/index.js";
