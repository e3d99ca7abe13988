import { describe, expect, it } from "vitest";
import { InjectionQueryError } from "../../src/errors.js";
import { InjectionQuery, type Injection } from "../../src/highlight/injections.js";
import { loadSexp, parseSexp, sexpQuery } from "../fixtures.js";

const language = loadSexp();

function collectAll(query: InjectionQuery, text: string): Injection[] {
  const tree = parseSexp(text, language);
  return query.collect(tree, [{ startIndex: 0, endIndex: tree.length }]);
}

function injectionError(source: string): InjectionQueryError {
  try {
    new InjectionQuery(language, source);
  } catch (error) {
    if (error instanceof InjectionQueryError) return error;
    throw error;
  }
  throw new Error(`Query accepted: ${source}`);
}

describe("InjectionQuery", () => {
  const injections = new InjectionQuery(language, sexpQuery("injections.scm"));

  it("should take the language from a capture and trim the content", () => {
    expect(collectAll(injections, 'sql: "select 1"')).toEqual([
      {
        patternIndex: 0,
        language: { type: "name", name: "sql" },
        enclosingRange: { startIndex: 6, endIndex: 14 },
        ranges: [
          {
            startIndex: 6,
            endIndex: 14,
            startPosition: { row: 0, column: 6 },
            endPosition: { row: 0, column: 14 },
          },
        ],
        combined: false,
        includeChildren: false,
      },
    ]);
  });

  it("should skip keys that are not languages", () => {
    expect(collectAll(injections, 'note: "hello"')).toEqual([]);
  });

  it("should only report injections near the requested ranges", () => {
    const tree = parseSexp('(sql: "a" json: "b")', language);
    const found = injections.collect(tree, [{ startIndex: 12, endIndex: 13 }]);
    expect(found.map((i) => i.language)).toEqual([{ type: "name", name: "json" }]);
  });

  it("should take a fixed language from #set!", () => {
    const query = new InjectionQuery(
      language,
      '((string) @injection.content (#set! injection.language "json") (#set! injection.combined))'
    );
    const [injection] = collectAll(query, '(a "x")');
    expect(injection?.language).toEqual({ type: "name", name: "json" });
    expect(injection?.enclosingRange).toEqual({ startIndex: 3, endIndex: 6 });
    expect(injection?.combined).toBe(true);
  });

  it("should read mimetypes", () => {
    const query = new InjectionQuery(
      language,
      "(pair key: (identifier) @injection.mimetype value: (string) @injection.content)"
    );
    const [injection] = collectAll(query, 'md: "# t"');
    expect(injection?.language).toEqual({ type: "mimetype", mimetype: "md" });
  });

  it("should skip matches without a language", () => {
    const query = new InjectionQuery(language, "(string) @injection.content");
    expect(collectAll(query, '"x"')).toEqual([]);
  });

  it("should reject unusable queries", () => {
    expect(injectionError("(string) @content").kind).toBe("missing_capture");
    expect(
      injectionError(
        "(list (identifier) @injection.language (identifier) @injection.mimetype (string) @injection.content)"
      ).kind
    ).toBe("duplicate_capture");
    expect(
      injectionError("((string) @injection.content (#set! injection.language))").kind
    ).toBe("invalid_property");
    expect(
      injectionError('((string) @injection.content (#set! injection.combined "yes"))').kind
    ).toBe("invalid_property");
    expect(
      injectionError(
        '((string) @injection.content (#set! injection.language "a") (#set! injection.language "b"))'
      ).kind
    ).toBe("language_conflict");
    expect(
      injectionError("((string) @injection.content (#frob! @injection.content))").kind
    ).toBe("invalid_predicate");
  });

  it("should name the pattern in errors", () => {
    const error = injectionError(
      '(string) @injection.content\n((string) @injection.content (#set! injection.language))'
    );
    expect(error.patternIndex).toBe(1);
    expect(error.message).toBe('Invalid property "injection.language" in pattern 1');
  });
});
