export { LanguageRegistry } from "./registry.js";
export type { LanguageEntry, RegisterOptions } from "./registry.js";
export {
  BUILTIN_GRAMMARS,
  QUERY_FILES,
  attachQueries,
  findGrammarsDir,
  registerBuiltinLanguages,
  registerGrammarDir,
} from "./builtin.js";
export type { BuiltinGrammar, QueryKind } from "./builtin.js";
export { SEXP_STRING, sexpScanner } from "./scanners/sexp.js";
