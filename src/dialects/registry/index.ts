export {
  DialectRegistry,
  createDialectRegistry,
  defaultRegistry,
  lookupDialect,
  normalizeDialectName,
} from "./dialect-registry.js";
export type { Dialect } from "./dialect-registry.js";
export { BUILTIN_DIALECTS } from "./builtins.js";
