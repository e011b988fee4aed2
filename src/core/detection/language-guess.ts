/**
 * Language guessing by keyword and operator voting.
 *
 * Each identifier that is one of a language's keywords and each operator
 * that is one of its operators casts one vote for that language. The
 * language with the most votes wins; ties go to the one listed first in
 * the feature table.
 */

import { readFileSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

import { z } from "zod";

import { ConfigError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { err, ok, tryCatch, unwrap } from "../../lib/result.js";

import type { Result } from "../../lib/result.js";

const MODULE_DIR = dirname(fileURLToPath(import.meta.url));

/**
 * Same depth from src/ and dist/
 */
const FEATURES_PATH = resolve(MODULE_DIR, "../../../data/language-features.json");

const LanguageFeaturesSchema = z.object({
  language: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  operators: z.array(z.string().min(1)),
});

const FeatureTableSchema = z.array(LanguageFeaturesSchema).min(1);

export type LanguageFeatures = z.infer<typeof LanguageFeaturesSchema>;

/**
 * Vote tally for one language
 */
export interface LanguageScore {
  language: string;
  votes: number;
}

/**
 * Feature table indexed for voting
 */
export interface CompiledFeatures {
  languages: string[];
  keywords: Map<string, string[]>;
  operators: Map<string, string[]>;
  tokenizer: RegExp;
}

const log = logger.child("[guess]");

let compiled: CompiledFeatures | null = null;

/**
 * Read and validate a feature table
 */
export function loadLanguageFeatures(path: string = FEATURES_PATH): Result<LanguageFeatures[], ConfigError> {
  const content = tryCatch(() => readFileSync(path, "utf-8"));
  if (!content.success) {
    return err(new ConfigError(`Cannot read language features: ${content.error.message}`, { path }));
  }

  const parsed = tryCatch((): unknown => JSON.parse(content.data));
  if (!parsed.success) {
    return err(new ConfigError(`Invalid JSON in language features: ${parsed.error.message}`, { path }));
  }

  const validation = FeatureTableSchema.safeParse(parsed.data);
  if (!validation.success) {
    return err(new ConfigError("Invalid language features", { path, issues: validation.error.issues }));
  }
  return ok(validation.data);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function addTo(index: Map<string, string[]>, token: string, language: string): void {
  const languages = index.get(token) ?? [];
  languages.push(language);
  index.set(token, languages);
}

/**
 * Index a feature table by token
 */
export function compileFeatures(table: readonly LanguageFeatures[]): CompiledFeatures {
  const keywords = new Map<string, string[]>();
  const operators = new Map<string, string[]>();

  for (const entry of table) {
    for (const keyword of new Set(entry.keywords)) {
      addTo(keywords, keyword, entry.language);
    }
    for (const operator of new Set(entry.operators)) {
      addTo(operators, operator, entry.language);
    }
  }

  // Longest operators first so "===" is not read as "=" "=" "="
  const operatorAlternation = Array.from(operators.keys())
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");

  // 1: identifier, 2: trailing single colon (C++ access labels),
  // 3: operator; numbers and any other character are consumed silently
  const tokenizer = new RegExp(
    `([A-Za-z_][A-Za-z0-9_]*)(:(?!:))?|[0-9][A-Za-z0-9_]*` +
      (operatorAlternation.length > 0 ? `|(${operatorAlternation})` : "") +
      `|[\\s\\S]`,
    "g"
  );

  return {
    languages: table.map((entry) => entry.language),
    keywords,
    operators,
    tokenizer,
  };
}

function defaultFeatures(): CompiledFeatures {
  if (compiled === null) {
    compiled = compileFeatures(unwrap(loadLanguageFeatures()));
  }
  return compiled;
}

/**
 * Vote tally for every language, in feature table order
 */
export function scoreLanguages(text: string, features: CompiledFeatures = defaultFeatures()): LanguageScore[] {
  const votes = new Map<string, number>(features.languages.map((language) => [language, 0]));
  const vote = (languages: string[] | undefined): void => {
    for (const language of languages ?? []) {
      votes.set(language, (votes.get(language) ?? 0) + 1);
    }
  };

  for (const match of text.matchAll(features.tokenizer)) {
    const [, identifier, colon, operator] = match;
    if (identifier !== undefined) {
      vote(features.keywords.get(identifier));
      if (colon !== undefined) {
        vote(features.keywords.get(`${identifier}:`));
      }
    } else if (operator !== undefined) {
      vote(features.operators.get(operator));
    }
  }

  return features.languages.map((language) => ({ language, votes: votes.get(language) ?? 0 }));
}

/**
 * Best guess at the dialect a snippet is written in.
 *
 * Always returns a name; text with no votes at all resolves to the first
 * language in the table.
 */
export function guessLanguage(text: string, features: CompiledFeatures = defaultFeatures()): string {
  const scores = scoreLanguages(text, features);
  let best = scores[0] ?? { language: "", votes: 0 };
  for (const score of scores) {
    if (score.votes > best.votes) {
      best = score;
    }
  }
  log.debug(`Guessed ${best.language} (${best.votes} votes)`);
  return best.language;
}
