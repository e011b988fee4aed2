import { NO_MATCH, UNTERMINATED } from "./types.js";

import type { RuleScanner } from "./types.js";
import type { Rule } from "../../dialects/schema/index.js";

const BACKSLASH = "\\";

/**
 * `"..."` style literal. A backslash consumes the next character,
 * whatever it is, so an escaped quote never closes the literal.
 */
function scanQuoted(quote: string, excludeTriple: boolean): RuleScanner {
  return (text, offset) => {
    if (text.charAt(offset) !== quote) {
      return NO_MATCH;
    }
    if (excludeTriple && text.charAt(offset + 1) === quote && text.charAt(offset + 2) === quote) {
      return NO_MATCH;
    }

    let i = offset + 1;
    while (i < text.length) {
      const ch = text.charAt(i);
      if (ch === BACKSLASH) {
        i += 2;
      } else if (ch === quote) {
        return i + 1;
      } else {
        i++;
      }
    }
    return UNTERMINATED;
  };
}

/**
 * Scan from `open` to the first `close`; an unclosed region runs to the
 * end of the text
 */
function scanDelimited(open: string, close: string): RuleScanner {
  return (text, offset) => {
    if (!text.startsWith(open, offset)) {
      return NO_MATCH;
    }
    const closeAt = text.indexOf(close, offset + open.length);
    return closeAt === -1 ? text.length : closeAt + close.length;
  };
}

/**
 * Scan from `start` up to, not including, the next line break
 */
function scanLine(start: string): RuleScanner {
  return (text, offset) => {
    if (!text.startsWith(start, offset)) {
      return NO_MATCH;
    }
    for (let i = offset + start.length; i < text.length; i++) {
      const ch = text.charAt(i);
      if (ch === "\n" || ch === "\r") {
        return i;
      }
    }
    return text.length;
  };
}

/**
 * Build the scanner for a rule and the character it must start with
 */
export function compileRule(rule: Rule): { lead: string; scan: RuleScanner } {
  switch (rule.kind) {
    case "quoted":
      return { lead: rule.quote, scan: scanQuoted(rule.quote, rule.excludeTriple) };
    case "triple-quoted": {
      const delimiter = rule.quote.repeat(3);
      return { lead: rule.quote, scan: scanDelimited(delimiter, delimiter) };
    }
    case "line":
      return { lead: rule.start.charAt(0), scan: scanLine(rule.start) };
    case "block":
      return { lead: rule.open.charAt(0), scan: scanDelimited(rule.open, rule.close) };
  }
}
