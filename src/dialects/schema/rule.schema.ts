import { z } from "zod";

/**
 * Quote characters a literal can open with
 */
export const QuoteCharSchema = z.enum(['"', "'", "`"]);

/**
 * Which side of the match a rule belongs to
 * - skip: literal syntax whose content is ignored
 * - keep: comment syntax reported to the caller
 */
export const RuleClassSchema = z.enum(["skip", "keep"]);

const NO_LINE_BREAK = /^[^\r\n]+$/;

/**
 * Single-character quoted literal with backslash escapes
 */
export const QuotedRuleSchema = z.object({
  kind: z.literal("quoted"),
  quote: QuoteCharSchema,
  /** Refuse to match when the quote opens a triple-quoted block */
  excludeTriple: z.boolean().default(false),
});

/**
 * Triple-quoted block, no escape processing
 */
export const TripleQuotedRuleSchema = z.object({
  kind: z.literal("triple-quoted"),
  quote: z.enum(['"', "'"]),
});

/**
 * Comment running to the end of the line
 */
export const LineRuleSchema = z.object({
  kind: z.literal("line"),
  start: z.string().regex(NO_LINE_BREAK, "Line comment start must be non-empty and on one line"),
});

/**
 * Delimited comment that may span lines; never nested
 */
export const BlockRuleSchema = z.object({
  kind: z.literal("block"),
  open: z.string().min(1, "Block open token is required"),
  close: z.string().min(1, "Block close token is required"),
});

export const RuleSchema = z.discriminatedUnion("kind", [
  QuotedRuleSchema,
  TripleQuotedRuleSchema,
  LineRuleSchema,
  BlockRuleSchema,
]);

// Inferred types
export type QuoteChar = z.infer<typeof QuoteCharSchema>;
export type RuleClass = z.infer<typeof RuleClassSchema>;
export type QuotedRule = z.infer<typeof QuotedRuleSchema>;
export type TripleQuotedRule = z.infer<typeof TripleQuotedRuleSchema>;
export type LineRule = z.infer<typeof LineRuleSchema>;
export type BlockRule = z.infer<typeof BlockRuleSchema>;
export type Rule = z.infer<typeof RuleSchema>;
export type RuleKind = Rule["kind"];

/**
 * All available rule kinds
 */
export const RULE_KINDS: readonly RuleKind[] = ["quoted", "triple-quoted", "line", "block"];

/**
 * Short human-readable form of a rule, e.g. `"..."` or `// ...`
 */
export function describeRule(rule: Rule): string {
  switch (rule.kind) {
    case "quoted":
      return `${rule.quote}...${rule.quote}${rule.excludeTriple ? " (not triple)" : ""}`;
    case "triple-quoted":
      return `${rule.quote.repeat(3)}...${rule.quote.repeat(3)}`;
    case "line":
      return `${rule.start} ...`;
    case "block":
      return `${rule.open} ... ${rule.close}`;
  }
}
