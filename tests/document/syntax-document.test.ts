import { describe, expect, it } from "vitest";
import { SyntaxDocument, buildEdit } from "../../src/document/syntax-document.js";
import { InvalidEditRangeError } from "../../src/errors.js";
import { registerBuiltinLanguages } from "../../src/registry/builtin.js";
import { LanguageRegistry, type LanguageEntry } from "../../src/registry/registry.js";
import { GRAMMARS_DIR, loadSexp, parseSexp } from "../fixtures.js";

function sexpEntry(): LanguageEntry {
  const registry = new LanguageRegistry();
  registerBuiltinLanguages(registry, GRAMMARS_DIR);
  const entry = registry.getByName("sexp");
  if (!entry) throw new Error("sexp is not registered");
  return entry;
}

const entry = sexpEntry();
const language = entry.language;

describe("buildEdit", () => {
  it("should convert UTF-16 indices to bytes", () => {
    expect(buildEdit("é(a)", 1, 1, "😀")).toEqual({
      startIndex: 2,
      oldEndIndex: 2,
      newEndIndex: 6,
      startPosition: { row: 0, column: 1 },
      oldEndPosition: { row: 0, column: 1 },
      newEndPosition: { row: 0, column: 3 },
    });
  });

  it("should track rows across inserted lines", () => {
    expect(buildEdit("a\nb", 2, 3, "x\ny")).toEqual({
      startIndex: 2,
      oldEndIndex: 3,
      newEndIndex: 5,
      startPosition: { row: 1, column: 0 },
      oldEndPosition: { row: 1, column: 1 },
      newEndPosition: { row: 2, column: 1 },
    });
  });

  it("should reject ranges that do not fit the text", () => {
    expect(() => buildEdit("(a b)", 4, 2, "")).toThrow(
      "Invalid edit: range [4, 2) does not fit a text of length 5"
    );
    expect(() => buildEdit("(a b)", 0, 6, "")).toThrow(InvalidEditRangeError);
    expect(() => buildEdit("(a b)", -1, 0, "")).toThrow(InvalidEditRangeError);
    expect(() => buildEdit("(a b)", 0.5, 1, "")).toThrow(InvalidEditRangeError);
  });
});

describe("SyntaxDocument", () => {
  it("should parse the initial text", () => {
    const document = new SyntaxDocument(entry, "(a b)");
    expect(document.text).toBe("(a b)");
    expect(document.entry).toBe(entry);
    expect(document.language).toBe(language);
    expect(document.tree.toString()).toBe(parseSexp("(a b)", language).toString());
  });

  it("should apply an edit and report the changed range", () => {
    const document = new SyntaxDocument(entry, "(a b)");
    expect(document.applyEdit(3, 4, "c")).toEqual([
      {
        startIndex: 3,
        endIndex: 4,
        startPosition: { row: 0, column: 3 },
        endPosition: { row: 0, column: 4 },
      },
    ]);
    expect(document.text).toBe("(a c)");
    expect(document.tree.rootNode.text).toBe("(a c)");
    expect(document.tree.toString()).toBe(parseSexp("(a c)", language).toString());
  });

  it("should leave the document alone when an edit is rejected", () => {
    const document = new SyntaxDocument(entry, "(a b)");
    expect(() => document.applyEdit(2, 9, "")).toThrow(InvalidEditRangeError);
    expect(document.text).toBe("(a b)");
  });

  it("should derive an edited copy", () => {
    const document = new SyntaxDocument(entry, "(a b)");
    const copy = document.withEdit(3, 4, "c");
    expect(document.text).toBe("(a b)");
    expect(copy.text).toBe("(a c)");
    expect(copy.entry).toBe(entry);
    expect(copy.changedRanges(document)).toEqual([
      {
        startIndex: 3,
        endIndex: 4,
        startPosition: { row: 0, column: 3 },
        endPosition: { row: 0, column: 4 },
      },
    ]);
  });

  it("should find no changes between identical documents", () => {
    const a = new SyntaxDocument(entry, "(a b)");
    const b = new SyntaxDocument(entry, "(a b)");
    expect(b.changedRanges(a)).toEqual([]);
  });

  describe("highlight", () => {
    const NUMBER = language.symbolForName("number", true);
    const LIST = language.symbolForName("list", true);
    const STRING = language.symbolForName("string", true);
    const OPEN = language.symbolForName("(", false);
    const CLOSE = language.symbolForName(")", false);
    const capture = (name: string): number => entry.highlights?.captureIndexForName(name) ?? -1;

    it("should measure tokens in UTF-16 units", () => {
      const document = new SyntaxDocument(entry, '("é" 1)');
      expect(document.highlight()).toEqual({
        start: 0,
        tokens: [
          { kindId: OPEN, captureId: capture("punctuation.bracket"), length: 1 },
          { kindId: STRING, captureId: capture("string"), length: 3 },
          { kindId: LIST, captureId: null, length: 1 },
          { kindId: NUMBER, captureId: capture("number"), length: 1 },
          { kindId: CLOSE, captureId: capture("punctuation.bracket"), length: 1 },
        ],
      });
    });

    it("should start a ranged request at a UTF-16 index", () => {
      const document = new SyntaxDocument(entry, '("é" 1)');
      expect(document.highlight({ startIndex: 5 })).toEqual({
        start: 5,
        tokens: [
          { kindId: NUMBER, captureId: capture("number"), length: 1 },
          { kindId: CLOSE, captureId: capture("punctuation.bracket"), length: 1 },
        ],
      });
    });

    it("should return null without a highlights query", () => {
      expect(new SyntaxDocument(loadSexp(), "(a)").highlight()).toBeNull();
    });
  });

  describe("ranges", () => {
    const text = "(a\n  (b c))";

    it("should fold lists", () => {
      const folds = new SyntaxDocument(entry, text).folds();
      expect(folds.map((fold) => [fold.range.startIndex, fold.range.endIndex])).toEqual([
        [0, 11],
        [5, 10],
      ]);
      expect(folds[0]?.collapsedText).toBe("...");
    });

    it("should fold inside the delimiters", () => {
      const [outer] = new SyntaxDocument(entry, text).folds({}, true);
      expect(outer?.range.startIndex).toBe(1);
      expect(outer?.range.endIndex).toBe(10);
    });

    it("should collect indents", () => {
      const indents = new SyntaxDocument(entry, text).indents();
      expect(indents.map((indent) => [indent.patternIndex, indent.range.startIndex])).toEqual([
        [0, 0],
        [0, 5],
      ]);
    });

    it("should be empty without queries", () => {
      const document = new SyntaxDocument(loadSexp(), text);
      expect(document.folds()).toEqual([]);
      expect(document.indents()).toEqual([]);
      expect(document.injections()).toEqual([]);
    });
  });

  it("should find injections across the document", () => {
    const document = new SyntaxDocument(entry, 'sql: "select 1"');
    const injections = document.injections();
    expect(injections.map((injection) => injection.language)).toEqual([{ type: "name", name: "sql" }]);
    expect(injections[0]?.enclosingRange).toEqual({ startIndex: 6, endIndex: 14 });
  });
});
