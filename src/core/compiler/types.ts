import type { Rule, RuleClass } from "../../dialects/schema/index.js";

/**
 * Returned by a rule scanner when the rule does not start at the offset
 */
export const NO_MATCH = -1;

/**
 * Returned by a quoted-literal scanner that opened but never found its
 * closing delimiter
 */
export const UNTERMINATED = -2;

/**
 * Scans one rule form at `offset`, returning the end offset (exclusive)
 * of the match, {@link NO_MATCH} or {@link UNTERMINATED}
 */
export type RuleScanner = (text: string, offset: number) => number;

/**
 * One compiled rule inside a matcher
 */
export interface Alternative {
  /** Priority class of the rule */
  readonly kind: RuleClass;
  /** Source rule */
  readonly rule: Rule;
  /** First character of the opening token */
  readonly lead: string;
  readonly scan: RuleScanner;
}

/**
 * A single skip or keep region found in a text
 */
export interface Match {
  kind: RuleClass;
  rule: Rule;
  /** Start offset (inclusive) */
  start: number;
  /** End offset (exclusive) */
  end: number;
  /** `text.slice(start, end)` */
  text: string;
}

/**
 * Compiled, immutable matcher for one dialect
 */
export interface Matcher {
  /** Canonical name of the dialect it was compiled from */
  readonly dialect: string;
  /** Skip alternatives followed by keep alternatives, in priority order */
  readonly alternatives: readonly Alternative[];
  /**
   * Earliest match starting at or after `from`; at a tied offset the
   * first alternative in priority order wins
   */
  exec(text: string, from?: number): Match | null;
  /**
   * Every non-overlapping match from the start of `text`, left to right
   */
  matchAll(text: string): Generator<Match, void, undefined>;
}
