import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";

import { createProgram } from "../../src/cli/program.js";

import type { MockInstance } from "vitest";

// Count file reads while keeping the real implementation
vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return { ...actual, readFile: vi.fn(actual.readFile) };
});

describe("comment-sieve CLI", () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  async function run(...args: string[]): Promise<void> {
    await createProgram().exitOverride().parseAsync(args, { from: "user" });
  }

  function printed(): string[] {
    return log.mock.calls.map((call) => String(call[0]));
  }

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "comment-sieve-cli-"));
    await writeFile(join(dir, "main.c"), 'int a; // one\nchar* s = "// no";\n/* two */\n');
    await writeFile(join(dir, "tool.py"), "x = '# no'  # py\n");
    await writeFile(join(dir, "script.txt"), "x = 1  # py\n");
    await writeFile(join(dir, "notes.txt"), "def f():\n    return None  # note\n");
    await writeFile(join(dir, "server.go"), "func main() {\n\tx := <-ch // recv\n}\n");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    error = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("extract", () => {
    it("prints comment texts", async () => {
      await run("extract", join(dir, "main.c"), "-o", "text");
      expect(printed()).toEqual(["// one\n/* two */"]);
      expect(process.exitCode).toBeUndefined();
    });

    it("keeps file order across several files", async () => {
      await run("extract", join(dir, "main.c"), join(dir, "tool.py"), "-o", "text");
      expect(printed()).toEqual(["// one\n/* two */\n# py"]);
    });

    it("prints JSON per file", async () => {
      await run("extract", join(dir, "tool.py"), "-o", "json");
      expect(JSON.parse(printed()[0] ?? "")).toEqual([
        { file: join(dir, "tool.py"), dialect: "python", comments: ["# py"] },
      ]);
    });

    it("includes positions in JSON when asked", async () => {
      await run("extract", join(dir, "main.c"), "-o", "json", "--positions");
      expect(JSON.parse(printed()[0] ?? "")).toEqual([
        {
          file: join(dir, "main.c"),
          dialect: "c",
          comments: [
            {
              text: "// one",
              style: "line",
              start: 7,
              end: 13,
              lineStart: 1,
              lineEnd: 1,
              columnStart: 7,
              columnEnd: 13,
            },
            {
              text: "/* two */",
              style: "block",
              start: 33,
              end: 42,
              lineStart: 3,
              lineEnd: 3,
              columnStart: 0,
              columnEnd: 9,
            },
          ],
        },
      ]);
    });

    it("reads a file once when its dialect is guessed", async () => {
      const path = join(dir, "notes.txt");
      vi.mocked(readFile).mockClear();
      await run("extract", path, "-o", "text");
      expect(printed()).toEqual(["# note"]);
      expect(vi.mocked(readFile).mock.calls.filter((call) => call[0] === path)).toHaveLength(1);
    });

    it("reads a file once when its extension is known", async () => {
      const path = join(dir, "main.c");
      vi.mocked(readFile).mockClear();
      await run("extract", path, "-o", "text");
      expect(vi.mocked(readFile).mock.calls.filter((call) => call[0] === path)).toHaveLength(1);
    });

    it("uses --language over the extension", async () => {
      await run("extract", join(dir, "script.txt"), "-l", "python", "-o", "text");
      expect(printed()).toEqual(["# py"]);
    });

    it("guesses the dialect of an unknown extension", async () => {
      await run("extract", join(dir, "notes.txt"), "-o", "json");
      expect(JSON.parse(printed()[0] ?? "")).toEqual([
        { file: join(dir, "notes.txt"), dialect: "python", comments: ["# note"] },
      ]);
    });

    it("fails on an unknown language", async () => {
      await run("extract", join(dir, "main.c"), "-l", "cobol");
      expect(process.exitCode).toBe(1);
      expect(error).toHaveBeenCalledWith(expect.stringContaining("Unsupported language: cobol"));
      expect(log).not.toHaveBeenCalled();
    });

    it("fails on an invalid output format", async () => {
      await run("extract", join(dir, "main.c"), "-o", "xml");
      expect(process.exitCode).toBe(1);
      expect(error).toHaveBeenCalledWith(expect.stringContaining("Invalid output format: xml"));
    });

    it("reports a missing file and still prints the others", async () => {
      await run("extract", join(dir, "missing.c"), join(dir, "tool.py"), "-o", "text");
      expect(process.exitCode).toBe(1);
      expect(error).toHaveBeenCalledWith(expect.stringContaining("Failed to read file"));
      expect(printed()).toEqual(["# py"]);
    });

    it("fails on a missing config file", async () => {
      await run("extract", join(dir, "main.c"), "-c", join(dir, "nope.json"));
      expect(process.exitCode).toBe(1);
      expect(error).toHaveBeenCalledWith(expect.stringContaining("Config file not found"));
    });
  });

  describe("dialects", () => {
    it("lists dialect names", async () => {
      await run("dialects", "-o", "text");
      expect(printed()).toEqual(["python\nc\nc++\njava\nc#\njs\ngo\nphp"]);
    });

    it("rejects an invalid output format", async () => {
      await run("dialects", "-o", "yaml");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("guess", () => {
    it("prints the guessed dialect", async () => {
      await run("guess", join(dir, "server.go"));
      expect(printed()).toEqual(["go"]);
    });

    it("prints every language's score with --scores", async () => {
      await run("guess", join(dir, "server.go"), "--scores");
      const lines = printed();
      expect(lines[0]).toBe("go");
      expect(lines).toHaveLength(9);
    });

    it("fails on a missing file", async () => {
      await run("guess", join(dir, "missing.go"));
      expect(process.exitCode).toBe(1);
      expect(log).not.toHaveBeenCalled();
    });
  });
});
