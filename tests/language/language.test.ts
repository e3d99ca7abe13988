import { describe, expect, it } from "vitest";
import {
  END_SYMBOL,
  ERROR_SYMBOL,
  loadLanguage,
} from "../../src/language/language.js";
import {
  InvalidLanguageError,
  LanguageVersionMismatchError,
  ReleasedHandleError,
} from "../../src/errors.js";
import { Parser } from "../../src/parser/parser.js";
import { loadSexp, parseSexp, sexpBlob } from "../fixtures.js";

describe("Language", () => {
  describe("loading", () => {
    it("should load a table from JSON text", () => {
      const language = loadSexp();
      expect(language.name).toBe("sexp");
      expect(language.version).toBe(2);
      expect(language.symbolCount).toBe(13);
    });

    it("should load a table from UTF-8 bytes", () => {
      const language = loadLanguage(new TextEncoder().encode(sexpBlob()));
      expect(language.name).toBe("sexp");
    });

    it("should load an already parsed table", () => {
      const parsed: unknown = JSON.parse(sexpBlob());
      expect(loadLanguage(parsed).name).toBe("sexp");
    });

    it("should reject tables with an unsupported version", () => {
      const table: Record<string, unknown> = JSON.parse(sexpBlob());
      expect(() => loadLanguage({ ...table, version: 3 })).toThrow(LanguageVersionMismatchError);
      expect(() => loadLanguage({ ...table, version: 0 })).toThrow(LanguageVersionMismatchError);
    });

    it("should reject text that is not JSON", () => {
      expect(() => loadLanguage("{not json")).toThrow(InvalidLanguageError);
      expect(() => loadLanguage("{not json")).toThrow(/not valid JSON/);
    });

    it("should reject tables without a name", () => {
      const table: Record<string, unknown> = JSON.parse(sexpBlob());
      delete table.name;
      expect(() => loadLanguage(table)).toThrow("Invalid language table: missing name");
    });
  });

  describe("symbols and fields", () => {
    const language = loadSexp();

    it("should name symbols", () => {
      expect(language.symbolName(END_SYMBOL)).toBe("end");
      expect(language.symbolName(1)).toBe("identifier");
      expect(language.symbolName(9)).toBe("list");
      expect(language.symbolName(ERROR_SYMBOL)).toBe("ERROR");
    });

    it("should look up symbols by name and namedness", () => {
      expect(language.symbolForName("list", true)).toBe(9);
      expect(language.symbolForName("(", false)).toBe(4);
      expect(language.symbolForName("(", true)).toBeNull();
      expect(language.symbolForName("nope", true)).toBeNull();
    });

    it("should report visibility and namedness", () => {
      expect(language.isVisible(9)).toBe(true);
      expect(language.isVisible(11)).toBe(false);
      expect(language.isNamed(1)).toBe(true);
      expect(language.isNamed(4)).toBe(false);
      expect(language.isExtra(7)).toBe(true);
    });

    it("should map fields both ways", () => {
      expect(language.fieldIdForName("key")).toBe(0);
      expect(language.fieldIdForName("value")).toBe(1);
      expect(language.fieldIdForName("other")).toBeNull();
      expect(language.fieldNameForId(1)).toBe("value");
      expect(language.fieldNameForId(7)).toBeNull();
    });
  });

  describe("release", () => {
    it("should make parsers and trees throw once deleted", () => {
      const language = loadSexp();
      const tree = parseSexp("(a)", language);
      const parser = new Parser().setLanguage(language);
      language.delete();

      expect(language.isReleased).toBe(true);
      expect(() => parser.parse("(b)")).toThrow(ReleasedHandleError);
      expect(() => tree.rootNode).toThrow('Language "sexp" has been released');
    });
  });
});
