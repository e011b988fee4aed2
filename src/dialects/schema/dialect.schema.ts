import { z } from "zod";

import { RuleSchema } from "./rule.schema.js";

/**
 * Dialect names are matched case-insensitively, so definitions must be
 * written in lower case
 */
const NAME_PATTERN = /^[a-z0-9][a-z0-9+#._-]*$/;

const DialectNameSchema = z
  .string()
  .regex(NAME_PATTERN, "Name must be lower case and contain no whitespace");

/**
 * File extensions are stored with their leading dot, lower case
 */
const ExtensionSchema = z
  .string()
  .regex(/^\.[a-z0-9+_-]+$/, "Extension must start with a dot, e.g. .py");

/**
 * Schema for a dialect definition: the literal syntax it skips and the
 * comment syntax it keeps, each in priority order
 */
export const DialectDefinitionSchema = z.object({
  /** Canonical name */
  name: DialectNameSchema,

  /** Additional names resolving to this dialect */
  aliases: z.array(DialectNameSchema).default([]),

  /** File extensions mapped to this dialect */
  extensions: z.array(ExtensionSchema).default([]),

  /** Literal forms, tried before any keep rule at the same offset */
  skip: z.array(RuleSchema),

  /** Comment forms reported by extraction */
  keep: z.array(RuleSchema).min(1, "A dialect needs at least one keep rule"),
});

export type DialectDefinitionInput = z.input<typeof DialectDefinitionSchema>;
export type DialectDefinition = z.infer<typeof DialectDefinitionSchema>;
