/**
 * Adversarial input tests.
 *
 * Extraction scans each input once; inputs built to force repeated
 * rescans of unterminated constructs must still finish quickly.
 */

import { describe, it, expect } from "vitest";

import { extractComments } from "@/core/scanner/index.js";
import { guessLanguage } from "@/core/detection/index.js";

const SIZE = 50_000;

// Generous bound; a quadratic scan of these inputs takes seconds
const TIMEOUT_MS = 1_000;

function timed<T>(fn: () => T): { value: T; elapsed: number } {
  const start = performance.now();
  const value = fn();
  return { value, elapsed: performance.now() - start };
}

describe("Adversarial input", () => {
  const payloads: Array<{ name: string; language: string; text: string }> = [
    { name: "escaped quotes after an open quote", language: "c", text: '"' + '\\"'.repeat(SIZE) },
    { name: "escaped single quotes after an open quote", language: "python", text: "'" + "\\'".repeat(SIZE) },
    { name: "lone backtick then escapes", language: "js", text: "`" + "\\`".repeat(SIZE) },
    { name: "repeated block openers", language: "java", text: "/*".repeat(SIZE) },
    { name: "repeated slashes", language: "go", text: "/".repeat(SIZE) },
    { name: "alternating quote kinds", language: "php", text: "\"'".repeat(SIZE) },
    { name: "two-quote runs", language: "python", text: '""x'.repeat(SIZE) },
    { name: "long line comment", language: "c#", text: "//" + "x".repeat(SIZE * 4) },
    { name: "unclosed triple quote", language: "python", text: '"""' + "'".repeat(SIZE) },
  ];

  for (const payload of payloads) {
    it(`handles ${payload.name}`, () => {
      const { elapsed } = timed(() => extractComments(payload.text, payload.language));
      expect(elapsed).toBeLessThan(TIMEOUT_MS);
    });
  }

  it("finds a comment after a long unterminated literal", () => {
    const text = '"' + '\\"'.repeat(SIZE) + "\n// tail";
    const { value, elapsed } = timed(() => extractComments(text, "c"));
    expect(value).toEqual(["// tail"]);
    expect(elapsed).toBeLessThan(TIMEOUT_MS);
  });

  it("reads an unclosed block comment to the end", () => {
    const text = "/* " + "*".repeat(SIZE);
    const { value } = timed(() => extractComments(text, "c"));
    expect(value).toEqual([text]);
  });

  it("guesses quickly on long inputs", () => {
    const text = "std::".repeat(SIZE) + "a".repeat(SIZE);
    const { value, elapsed } = timed(() => guessLanguage(text));
    expect(value).toBe("c++");
    expect(elapsed).toBeLessThan(TIMEOUT_MS * 2);
  });
});
