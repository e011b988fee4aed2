export {
  QuoteCharSchema,
  RuleClassSchema,
  QuotedRuleSchema,
  TripleQuotedRuleSchema,
  LineRuleSchema,
  BlockRuleSchema,
  RuleSchema,
  RULE_KINDS,
  describeRule,
} from "./rule.schema.js";
export { DialectDefinitionSchema } from "./dialect.schema.js";

export type {
  QuoteChar,
  RuleClass,
  QuotedRule,
  TripleQuotedRule,
  LineRule,
  BlockRule,
  Rule,
  RuleKind,
} from "./rule.schema.js";
export type { DialectDefinition, DialectDefinitionInput } from "./dialect.schema.js";
