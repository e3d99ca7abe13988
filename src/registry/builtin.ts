/**
 * Built-in grammars
 *
 * Shipped as table blobs under grammars/<name>/ next to their editor
 * queries. Each grammar may pair with an external scanner written here.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadLanguage } from "../language/language.js";
import type { ExternalScanner } from "../language/types.js";
import type { LanguageRegistry } from "./registry.js";
import { sexpScanner } from "./scanners/sexp.js";

export interface BuiltinGrammar {
  extensions: string[];
  scanner?: ExternalScanner;
}

export const BUILTIN_GRAMMARS: Record<string, BuiltinGrammar> = {
  sexp: {
    extensions: [".sexp", ".sx"],
    scanner: sexpScanner,
  },
};

/** Query files looked for beside a grammar blob */
export const QUERY_FILES = {
  highlights: "highlights.scm",
  folds: "folds.scm",
  indents: "indents.scm",
  injections: "injections.scm",
} as const;

export type QueryKind = keyof typeof QUERY_FILES;

/**
 * The grammars/ directory, from sources or from the build output.
 */
export function findGrammarsDir(): string {
  const candidates = ["../../grammars/", "../../../grammars/"].map((rel) =>
    fileURLToPath(new URL(rel, import.meta.url))
  );
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0] ?? "grammars";
}

/**
 * Attach the query files given for a language. Missing paths are skipped.
 */
export function attachQueries(
  registry: LanguageRegistry,
  id: number,
  paths: Partial<Record<QueryKind, string>>
): void {
  const read = (path: string | undefined): string | null =>
    path !== undefined && existsSync(path) ? readFileSync(path, "utf-8") : null;

  const highlights = read(paths.highlights);
  if (highlights !== null) registry.setHighlightsQuery(id, highlights);
  const folds = read(paths.folds);
  if (folds !== null) registry.setFoldsQuery(id, folds);
  const indents = read(paths.indents);
  if (indents !== null) registry.setIndentsQuery(id, indents);
  const injections = read(paths.injections);
  if (injections !== null) registry.setInjectionsQuery(id, injections);
}

/**
 * Load grammars/<name>/grammar.json and its query files into `registry`.
 *
 * @returns the registered language id
 */
export function registerGrammarDir(
  registry: LanguageRegistry,
  name: string,
  dir: string,
  grammar: BuiltinGrammar
): number {
  const language = loadLanguage(readFileSync(join(dir, "grammar.json")), {
    externalScanner: grammar.scanner,
  });
  const id = registry.register(name, language, { extensions: grammar.extensions });
  attachQueries(registry, id, {
    highlights: join(dir, QUERY_FILES.highlights),
    folds: join(dir, QUERY_FILES.folds),
    indents: join(dir, QUERY_FILES.indents),
    injections: join(dir, QUERY_FILES.injections),
  });
  return id;
}

/**
 * Register every built-in grammar not already present.
 *
 * @returns ids of the languages registered by this call
 */
export function registerBuiltinLanguages(
  registry: LanguageRegistry,
  grammarsDir: string = findGrammarsDir()
): number[] {
  const ids: number[] = [];
  for (const [name, grammar] of Object.entries(BUILTIN_GRAMMARS)) {
    if (registry.getByName(name)) continue;
    ids.push(registerGrammarDir(registry, name, join(grammarsDir, name), grammar));
  }
  return ids;
}
