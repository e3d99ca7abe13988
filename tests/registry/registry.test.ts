import { describe, it, expect } from "vitest";
import {
  DuplicateLanguageError,
  RangesQueryError,
  SylvanError,
  UnknownLanguageError,
} from "../../src/errors.js";
import { BUILTIN_GRAMMARS, registerBuiltinLanguages } from "../../src/registry/builtin.js";
import { LanguageRegistry } from "../../src/registry/registry.js";
import { GRAMMARS_DIR, loadSexp } from "../fixtures.js";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Nothing was thrown");
}

describe("LanguageRegistry", () => {
  it("should look languages up by id, name and extension", () => {
    const registry = new LanguageRegistry();
    const language = loadSexp();
    const id = registry.register("lisp", language, { extensions: [".LSP", ".el"] });

    expect(id).toBe(0);
    expect(registry.get(id)?.language).toBe(language);
    expect(registry.getByName("lisp")?.id).toBe(0);
    expect(registry.getByName("scheme")).toBeNull();
    expect(registry.forFile("/src/init.el")?.name).toBe("lisp");
    expect(registry.forFile("MAIN.lsp")?.name).toBe("lisp");
    expect(registry.forFile("Makefile")).toBeNull();
    expect(registry.forFile("a.txt")).toBeNull();
  });

  it("should start entries without queries", () => {
    const registry = new LanguageRegistry();
    const entry = registry.get(registry.register("lisp", loadSexp()));
    expect(entry?.extensions).toEqual([]);
    expect(entry?.highlights).toBeNull();
    expect(entry?.folds).toBeNull();
    expect(entry?.indents).toBeNull();
    expect(entry?.injections).toBeNull();
  });

  it("should refuse a duplicate name", () => {
    const registry = new LanguageRegistry();
    registry.register("lisp", loadSexp());
    expect(() => registry.register("lisp", loadSexp())).toThrow('Language "lisp" is already registered');

    const error = thrownBy(() => registry.register("lisp", loadSexp()));
    expect(error).toBeInstanceOf(DuplicateLanguageError);
    expect(error).toBeInstanceOf(SylvanError);
    expect(error instanceof DuplicateLanguageError && error.code).toBe("ERR_DUPLICATE_LANGUAGE");
    expect(error instanceof DuplicateLanguageError && error.language).toBe("lisp");
    expect(registry.languages()).toHaveLength(1);
  });

  it("should unregister without reusing ids", () => {
    const registry = new LanguageRegistry();
    const first = registry.register("a", loadSexp());
    expect(registry.unregister(first)).toBe(true);
    expect(registry.unregister(first)).toBe(false);
    expect(registry.register("b", loadSexp())).toBe(1);
    expect(registry.languages().map((entry) => entry.name)).toEqual(["b"]);
  });

  it("should attach queries and return their capture names", () => {
    const registry = new LanguageRegistry();
    const id = registry.register("lisp", loadSexp());

    expect(registry.setHighlightsQuery(id, "(number) @number (string) @string")).toEqual([
      "number",
      "string",
    ]);
    expect(registry.setFoldsQuery(id, "(list) @fold")).toEqual(["fold"]);
    expect(registry.setIndentsQuery(id, "(list) @indent")).toEqual(["indent"]);
    expect(
      registry.setInjectionsQuery(id, "((string) @injection.content (#set! injection.language \"json\"))")
    ).toEqual(["injection.content"]);

    const entry = registry.get(id);
    expect(entry?.highlights?.patternCount).toBe(2);
    expect(entry?.folds).not.toBeNull();
    expect(entry?.indents).not.toBeNull();
    expect(entry?.injections).not.toBeNull();
  });

  it("should reject queries for unknown ids", () => {
    const registry = new LanguageRegistry();
    expect(() => registry.setHighlightsQuery(4, "(number) @n")).toThrow(UnknownLanguageError);
    expect(() => registry.setFoldsQuery(4, "(list) @fold")).toThrow("Unknown language: 4");
  });

  it("should check range queries for their capture", () => {
    const registry = new LanguageRegistry();
    const id = registry.register("lisp", loadSexp());
    expect(() => registry.setFoldsQuery(id, "(list) @indent")).toThrow(RangesQueryError);
  });
});

describe("registerBuiltinLanguages", () => {
  it("should register the shipped grammars once", () => {
    const registry = new LanguageRegistry();
    expect(registerBuiltinLanguages(registry, GRAMMARS_DIR)).toEqual([0]);
    expect(registerBuiltinLanguages(registry, GRAMMARS_DIR)).toEqual([]);

    const entry = registry.getByName("sexp");
    expect(entry?.extensions).toEqual(BUILTIN_GRAMMARS.sexp?.extensions);
    expect(registry.forFile("a.sx")?.name).toBe("sexp");
    expect(entry?.language.externalScanner).not.toBeNull();
  });

  it("should load every query file beside the grammar", () => {
    const registry = new LanguageRegistry();
    registerBuiltinLanguages(registry, GRAMMARS_DIR);
    const entry = registry.getByName("sexp");
    expect(entry?.highlights?.captureNames).toEqual([
      "variable",
      "constant.builtin",
      "property",
      "function",
      "number",
      "string",
      "comment",
      "punctuation.bracket",
      "punctuation.delimiter",
    ]);
    expect(entry?.folds?.query.captureNames).toEqual(["start", "end", "fold"]);
    expect(entry?.indents?.query.captureNames).toEqual(["start", "end", "indent"]);
    expect(entry?.injections?.query.captureNames).toEqual(["injection.language", "injection.content"]);
  });
});
