import { UnsupportedDialectError, ValidationError } from "../../lib/errors.js";
import { ok, err, unwrap } from "../../lib/result.js";
import { DialectDefinitionSchema } from "../schema/index.js";

import { BUILTIN_DIALECTS } from "./builtins.js";

import type { Result } from "../../lib/result.js";
import type { DialectDefinitionInput, Rule } from "../schema/index.js";

/**
 * A resolved, immutable dialect
 */
export interface Dialect {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly extensions: readonly string[];
  readonly skip: readonly Rule[];
  readonly keep: readonly Rule[];
}

/**
 * Normalize a user-supplied dialect name for lookup
 */
export function normalizeDialectName(name: string): string {
  return name.toLowerCase();
}

function freezeDialect(dialect: Dialect): Dialect {
  return Object.freeze({
    name: dialect.name,
    aliases: Object.freeze([...dialect.aliases]),
    extensions: Object.freeze([...dialect.extensions]),
    skip: Object.freeze(dialect.skip.map((rule) => Object.freeze({ ...rule }))),
    keep: Object.freeze(dialect.keep.map((rule) => Object.freeze({ ...rule }))),
  });
}

/**
 * Read-only registry of dialects.
 *
 * Built once from a list of definitions; there is no way to add or
 * remove a dialect afterwards. Use {@link createDialectRegistry} to get a
 * registry extended with user definitions.
 *
 * @example
 * ```typescript
 * const python = defaultRegistry.lookup("Python");
 * python.keep.length; // 3
 *
 * const result = defaultRegistry.get("cobol");
 * result.success; // false
 * ```
 */
export class DialectRegistry {
  /** Dialects by canonical name, in registration order */
  private readonly dialects: ReadonlyMap<string, Dialect>;

  /** Canonical names and aliases */
  private readonly nameIndex: ReadonlyMap<string, Dialect>;

  /** Extension (with dot) -> dialect; later definitions win */
  private readonly extensionIndex: ReadonlyMap<string, Dialect>;

  private constructor(dialects: readonly Dialect[]) {
    const byName = new Map<string, Dialect>();
    const nameIndex = new Map<string, Dialect>();
    const extensionIndex = new Map<string, Dialect>();

    for (const dialect of dialects) {
      byName.set(dialect.name, dialect);
      nameIndex.set(dialect.name, dialect);
      for (const alias of dialect.aliases) {
        nameIndex.set(alias, dialect);
      }
      for (const ext of dialect.extensions) {
        extensionIndex.set(ext, dialect);
      }
    }

    this.dialects = byName;
    this.nameIndex = nameIndex;
    this.extensionIndex = extensionIndex;
    Object.freeze(this);
  }

  /**
   * Validate definitions and build a registry from them
   */
  static fromDefinitions(
    definitions: readonly DialectDefinitionInput[]
  ): Result<DialectRegistry, ValidationError> {
    const dialects: Dialect[] = [];
    const taken = new Set<string>();

    for (const definition of definitions) {
      const validation = DialectDefinitionSchema.safeParse(definition);
      if (!validation.success) {
        return err(
          new ValidationError("Invalid dialect definition", {
            dialect: definition.name,
            issues: validation.error.issues,
          })
        );
      }

      const dialect = validation.data;
      for (const name of [dialect.name, ...dialect.aliases]) {
        if (taken.has(name)) {
          return err(
            new ValidationError(`Dialect name ${name} is already registered`, {
              dialect: dialect.name,
              name,
            })
          );
        }
        taken.add(name);
      }

      dialects.push(freezeDialect(dialect));
    }

    return ok(new DialectRegistry(dialects));
  }

  /**
   * Number of dialects (aliases not counted)
   */
  get size(): number {
    return this.dialects.size;
  }

  /**
   * Resolve a dialect by name or alias, case-insensitively
   */
  get(name: string): Result<Dialect, UnsupportedDialectError> {
    const dialect = this.nameIndex.get(normalizeDialectName(name));
    if (dialect === undefined) {
      return err(new UnsupportedDialectError(name));
    }
    return ok(dialect);
  }

  /**
   * Resolve a dialect by name or alias, throwing
   * {@link UnsupportedDialectError} when it is unknown
   */
  lookup(name: string): Dialect {
    return unwrap(this.get(name));
  }

  has(name: string): boolean {
    return this.nameIndex.has(normalizeDialectName(name));
  }

  /**
   * Dialect for a file extension such as `.py` or `py`
   */
  forExtension(ext: string): Dialect | undefined {
    const normalized = ext.toLowerCase();
    return this.extensionIndex.get(normalized.startsWith(".") ? normalized : `.${normalized}`);
  }

  /**
   * Canonical names in registration order
   */
  names(): string[] {
    return Array.from(this.dialects.keys());
  }

  toArray(): Dialect[] {
    return Array.from(this.dialects.values());
  }
}

/**
 * Build a registry holding the built-in dialects followed by `definitions`
 */
export function createDialectRegistry(
  definitions: readonly DialectDefinitionInput[] = []
): Result<DialectRegistry, ValidationError> {
  return DialectRegistry.fromDefinitions([...BUILTIN_DIALECTS, ...definitions]);
}

/**
 * Registry of the built-in dialects
 */
export const defaultRegistry: DialectRegistry = unwrap(createDialectRegistry());

/**
 * Resolve a built-in dialect by name
 */
export function lookupDialect(name: string): Dialect {
  return defaultRegistry.lookup(name);
}
