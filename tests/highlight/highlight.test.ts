import { describe, expect, it } from "vitest";
import { highlightTokens } from "../../src/highlight/highlight.js";
import { Query } from "../../src/query/query.js";
import { loadSexp, parseSexp, sexpQuery } from "../fixtures.js";

const language = loadSexp();
const highlights = new Query(language, sexpQuery("highlights.scm"));

const ID = language.symbolForName("identifier", true);
const LIST = language.symbolForName("list", true);
const PAIR = language.symbolForName("pair", true);
const STRING = language.symbolForName("string", true);
const OPEN = language.symbolForName("(", false);
const CLOSE = language.symbolForName(")", false);
const COLON = language.symbolForName(":", false);

function capture(name: string): number {
  return highlights.captureIndexForName(name);
}

describe("highlightTokens", () => {
  it("should name capture ids in order of appearance", () => {
    expect(highlights.captureNames).toEqual([
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
  });

  it("should cover a list with tokens and let later patterns win", () => {
    const result = highlightTokens(parseSexp("(f nil)", language), highlights);
    expect(result.start).toBe(0);
    expect(result.tokens).toEqual([
      { kindId: OPEN, captureId: capture("punctuation.bracket"), length: 1 },
      { kindId: ID, captureId: capture("function"), length: 1 },
      { kindId: LIST, captureId: null, length: 1 },
      { kindId: ID, captureId: capture("constant.builtin"), length: 3 },
      { kindId: CLOSE, captureId: capture("punctuation.bracket"), length: 1 },
    ]);
  });

  it("should fill gaps with the enclosing node", () => {
    const result = highlightTokens(parseSexp('x: "s"', language), highlights);
    expect(result.tokens).toEqual([
      { kindId: ID, captureId: capture("property"), length: 1 },
      { kindId: COLON, captureId: capture("punctuation.delimiter"), length: 1 },
      { kindId: PAIR, captureId: null, length: 1 },
      { kindId: STRING, captureId: capture("string"), length: 3 },
    ]);
  });

  it("should start at the node covering the requested start", () => {
    const result = highlightTokens(parseSexp('x: "s"', language), highlights, { startIndex: 3 });
    expect(result.start).toBe(3);
    expect(result.tokens).toEqual([
      { kindId: STRING, captureId: capture("string"), length: 3 },
    ]);
  });

  it("should measure tokens in bytes", () => {
    const result = highlightTokens(parseSexp('("é")', language), highlights);
    expect(result.tokens.map((t) => t.length)).toEqual([1, 4, 1]);
  });

  it("should skip captures starting with an underscore", () => {
    const query = new Query(language, "(identifier) @_skip\n(number) @number");
    const result = highlightTokens(parseSexp("(a 1)", language), query);
    expect(result.tokens.map((t) => t.captureId)).toEqual([null, null, null, 1, null]);
  });
});
