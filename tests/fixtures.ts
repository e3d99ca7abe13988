import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadLanguage, type Language } from "../src/language/language.js";
import { Parser } from "../src/parser/parser.js";
import { sexpScanner } from "../src/registry/scanners/sexp.js";
import type { Tree } from "../src/tree/tree.js";

export const GRAMMARS_DIR = fileURLToPath(new URL("../grammars/", import.meta.url));
export const SEXP_DIR = join(GRAMMARS_DIR, "sexp");

export function sexpBlob(): string {
  return readFileSync(join(SEXP_DIR, "grammar.json"), "utf-8");
}

export function loadSexp(): Language {
  return loadLanguage(sexpBlob(), { externalScanner: sexpScanner });
}

export function sexpQuery(name: string): string {
  return readFileSync(join(SEXP_DIR, name), "utf-8");
}

export function parseSexp(text: string, language: Language = loadSexp()): Tree {
  return new Parser().setLanguage(language).parse(text);
}
