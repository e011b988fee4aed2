import type { DialectDefinitionInput, Rule } from "../schema/index.js";

const DOUBLE_QUOTED: Rule = { kind: "quoted", quote: '"', excludeTriple: false };
const SINGLE_QUOTED: Rule = { kind: "quoted", quote: "'", excludeTriple: false };
const BACKTICK_QUOTED: Rule = { kind: "quoted", quote: "`", excludeTriple: false };

// Python's plain strings must not swallow the first quote of """ or '''
const DOUBLE_QUOTED_NOT_TRIPLE: Rule = { kind: "quoted", quote: '"', excludeTriple: true };
const SINGLE_QUOTED_NOT_TRIPLE: Rule = { kind: "quoted", quote: "'", excludeTriple: true };

const SLASH_SLASH: Rule = { kind: "line", start: "//" };
const HASH: Rule = { kind: "line", start: "#" };
const SLASH_STAR: Rule = { kind: "block", open: "/*", close: "*/" };

const C_STYLE = {
  skip: [DOUBLE_QUOTED, SINGLE_QUOTED],
  keep: [SLASH_SLASH, SLASH_STAR],
};

const JS_STYLE = {
  skip: [DOUBLE_QUOTED, SINGLE_QUOTED, BACKTICK_QUOTED],
  keep: [SLASH_SLASH, SLASH_STAR],
};

/**
 * Built-in dialects in registration order
 */
export const BUILTIN_DIALECTS: readonly DialectDefinitionInput[] = [
  {
    name: "python",
    extensions: [".py", ".pyw", ".pyi"],
    skip: [DOUBLE_QUOTED_NOT_TRIPLE, SINGLE_QUOTED_NOT_TRIPLE],
    // Docstrings are reported alongside # comments
    keep: [HASH, { kind: "triple-quoted", quote: '"' }, { kind: "triple-quoted", quote: "'" }],
  },
  { name: "c", extensions: [".c", ".h"], ...C_STYLE },
  { name: "c++", extensions: [".cpp", ".cc", ".cxx", ".hpp", ".hh", ".hxx"], ...C_STYLE },
  { name: "java", extensions: [".java"], ...C_STYLE },
  { name: "c#", extensions: [".cs"], ...C_STYLE },
  { name: "js", aliases: ["javascript"], extensions: [".js", ".mjs", ".cjs", ".jsx"], ...JS_STYLE },
  { name: "go", extensions: [".go"], ...JS_STYLE },
  {
    name: "php",
    extensions: [".php", ".phtml"],
    skip: [DOUBLE_QUOTED, SINGLE_QUOTED],
    keep: [SLASH_SLASH, HASH, SLASH_STAR],
  },
];
