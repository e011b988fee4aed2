import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";

import {
  applyEnvironment,
  CONFIG_FILE_NAME,
  loadConfig,
  LOG_LEVEL_ENV,
  registryFromConfig,
  resolveLogLevel,
} from "../../src/cli/config.js";
import { DialectDefinitionSchema } from "../../src/dialects/index.js";
import { ConfigError } from "../../src/lib/errors.js";
import { createTestDefinition } from "../fixtures/dialects.js";

describe("loadConfig", () => {
  let dir: string;
  let emptyDir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "comment-sieve-config-"));
    emptyDir = await mkdtemp(join(tmpdir(), "comment-sieve-empty-"));

    await writeFile(
      join(dir, CONFIG_FILE_NAME),
      JSON.stringify({
        defaultLanguage: "c",
        logLevel: "warn",
        output: "json",
        extensions: { ".inc": "php" },
        dialects: [createTestDefinition()],
      })
    );
    await writeFile(join(dir, "broken.json"), "{ nope");
    await writeFile(join(dir, "bad-output.json"), JSON.stringify({ output: "xml" }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
    await rm(emptyDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("treats a missing default file as empty configuration", () => {
    vi.stubEnv(LOG_LEVEL_ENV, "");
    const result = loadConfig(undefined, emptyDir);
    expect(result).toEqual({ success: true, data: {} });
  });

  it("reads the default file from the working directory", () => {
    vi.stubEnv(LOG_LEVEL_ENV, "");
    const result = loadConfig(undefined, dir);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.defaultLanguage).toBe("c");
      expect(result.data.logLevel).toBe("warn");
      expect(result.data.output).toBe("json");
      expect(result.data.extensions).toEqual({ ".inc": "php" });
      expect(result.data.dialects?.[0]?.name).toBe("test-sql");
    }
  });

  it("lets the environment override the log level", () => {
    vi.stubEnv(LOG_LEVEL_ENV, "debug");
    const result = loadConfig(undefined, dir);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.logLevel).toBe("debug");
    }
  });

  it("fails for a missing explicit file", () => {
    const result = loadConfig("nowhere.json", emptyDir);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toBe(`Config file not found: ${join(emptyDir, "nowhere.json")}`);
    }
  });

  it("fails for malformed JSON", () => {
    const result = loadConfig("broken.json", dir);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message.startsWith(`Invalid JSON in ${join(dir, "broken.json")}`)).toBe(true);
    }
  });

  it("fails for values outside the schema", () => {
    const result = loadConfig("bad-output.json", dir);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(`Invalid config in ${join(dir, "bad-output.json")}`);
      expect(result.error.code).toBe("CONFIG_ERROR");
    }
  });
});

describe("applyEnvironment", () => {
  it("applies a valid level", () => {
    expect(applyEnvironment({ logLevel: "warn" }, { [LOG_LEVEL_ENV]: "error" })).toEqual({ logLevel: "error" });
  });

  it("ignores unknown levels", () => {
    expect(applyEnvironment({ logLevel: "warn" }, { [LOG_LEVEL_ENV]: "loud" })).toEqual({ logLevel: "warn" });
    expect(applyEnvironment({}, {})).toEqual({});
  });
});

describe("registryFromConfig", () => {
  it("adds configured dialects to the built-ins", () => {
    const result = registryFromConfig({ dialects: [DialectDefinitionSchema.parse(createTestDefinition())] });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.has("test-sql")).toBe(true);
      expect(result.data.has("python")).toBe(true);
      expect(result.data.forExtension(".tsql")?.name).toBe("test-sql");
    }
  });

  it("rejects a dialect that shadows a built-in", () => {
    const result = registryFromConfig({
      dialects: [DialectDefinitionSchema.parse(createTestDefinition({ name: "python" }))],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toBe("Dialect name python is already registered");
    }
  });
});

describe("resolveLogLevel", () => {
  it("prefers quiet, then verbose, then configuration", () => {
    expect(resolveLogLevel({ logLevel: "debug" }, { quiet: true, verbose: true })).toBe("error");
    expect(resolveLogLevel({ logLevel: "warn" }, { verbose: true })).toBe("debug");
    expect(resolveLogLevel({ logLevel: "warn" }, {})).toBe("warn");
    expect(resolveLogLevel({}, {})).toBe("info");
  });
});
