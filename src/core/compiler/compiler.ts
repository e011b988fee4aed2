/**
 * Pattern compiler - merges a dialect's skip and keep rules into a single
 * priority-ordered matcher.
 *
 * Every skip alternative precedes every keep alternative, so a literal
 * always wins over a comment that would start at the same offset. Within
 * a class, the dialect's registration order decides.
 *
 * @example
 * ```typescript
 * const matcher = compile(lookupDialect("c"));
 * for (const match of matcher.matchAll('s = "a//b"; // note')) {
 *   console.log(match.kind, match.text);
 * }
 * // skip "a//b"
 * // keep // note
 * ```
 */

import { logger } from "../../lib/logger.js";

import { compileRule } from "./rules.js";
import { UNTERMINATED, NO_MATCH } from "./types.js";

import type { Alternative, Match, Matcher } from "./types.js";
import type { Dialect } from "../../dialects/registry/index.js";
import type { Rule, RuleClass } from "../../dialects/schema/index.js";

function toAlternative(kind: RuleClass, rule: Rule): Alternative {
  const { lead, scan } = compileRule(rule);
  return Object.freeze({ kind, rule, lead, scan });
}

class CompiledMatcher implements Matcher {
  /** Characters any alternative can start with */
  private readonly leads: ReadonlySet<string>;

  constructor(
    readonly dialect: string,
    readonly alternatives: readonly Alternative[]
  ) {
    this.leads = new Set(alternatives.map((alternative) => alternative.lead));
    Object.freeze(this);
  }

  exec(text: string, from: number = 0): Match | null {
    return this.search(text, from, new Set());
  }

  *matchAll(text: string): Generator<Match, void, undefined> {
    // Shared across the pass: an unterminated quoted literal stays
    // unterminated from any later opening quote of the same kind
    const exhausted = new Set<Alternative>();
    let offset = 0;

    while (offset < text.length) {
      const match = this.search(text, offset, exhausted);
      if (match === null) {
        return;
      }
      yield match;
      offset = match.end;
    }
  }

  private search(text: string, from: number, exhausted: Set<Alternative>): Match | null {
    for (let offset = Math.max(0, from); offset < text.length; offset++) {
      const ch = text.charAt(offset);
      if (!this.leads.has(ch)) {
        continue;
      }

      for (const alternative of this.alternatives) {
        if (alternative.lead !== ch || exhausted.has(alternative)) {
          continue;
        }

        const end = alternative.scan(text, offset);
        if (end === UNTERMINATED) {
          exhausted.add(alternative);
          continue;
        }
        if (end === NO_MATCH) {
          continue;
        }

        return {
          kind: alternative.kind,
          rule: alternative.rule,
          start: offset,
          end,
          text: text.slice(offset, end),
        };
      }
    }
    return null;
  }
}

/**
 * Compile a dialect without caching
 */
export function compileDialect(dialect: Dialect): Matcher {
  const alternatives = [
    ...dialect.skip.map((rule) => toAlternative("skip", rule)),
    ...dialect.keep.map((rule) => toAlternative("keep", rule)),
  ];
  return new CompiledMatcher(dialect.name, Object.freeze(alternatives));
}

/**
 * Compiler with a per-dialect matcher cache.
 *
 * Matchers depend only on the dialect's rules, which never change, so
 * cached entries are never invalidated. Two callers racing on a first
 * compile produce equal matchers; whichever is stored last is kept.
 */
export class PatternCompiler {
  private readonly cache = new Map<Dialect, Matcher>();
  private readonly log = logger.child("[compiler]");

  /**
   * Matcher for `dialect`, compiled on first use
   */
  compile(dialect: Dialect): Matcher {
    const cached = this.cache.get(dialect);
    if (cached !== undefined) {
      return cached;
    }

    const matcher = compileDialect(dialect);
    this.cache.set(dialect, matcher);
    this.log.debug(
      `Compiled ${dialect.name}: ${dialect.skip.length} skip, ${dialect.keep.length} keep alternatives`
    );
    return matcher;
  }

  /**
   * Number of cached matchers
   */
  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}

/**
 * Create a new compiler with an empty cache
 */
export function createPatternCompiler(): PatternCompiler {
  return new PatternCompiler();
}

/**
 * Process-wide compiler
 */
export const defaultCompiler = new PatternCompiler();

/**
 * Compile through the process-wide cache
 */
export function compile(dialect: Dialect): Matcher {
  return defaultCompiler.compile(dialect);
}
