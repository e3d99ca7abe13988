import { afterEach, describe, expect, it, vi } from "vitest";
import { ParseCancelledError, ReleasedHandleError } from "../../src/errors.js";
import type { LogType } from "../../src/parser/logger.js";
import { Parser } from "../../src/parser/parser.js";
import { loadSexp, parseSexp } from "../fixtures.js";

const language = loadSexp();

describe("Parser", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("well-formed input", () => {
    it("should parse a flat list", () => {
      const tree = parseSexp("(a b c)", language);
      expect(tree.toString()).toBe("(source_file (list (identifier) (identifier) (identifier)))");
      expect(tree.rootNode.hasError).toBe(false);
    });

    it("should attach fields to pairs", () => {
      const tree = parseSexp("x: 1", language);
      expect(tree.toString()).toBe("(source_file (pair key: (identifier) value: (number)))");
    });

    it("should keep comments as extras inside lists", () => {
      const tree = parseSexp('(k: "v" ; note\n 42)', language);
      expect(tree.toString()).toBe(
        "(source_file (list (pair key: (identifier) value: (string)) (comment) (number)))"
      );
    });

    it("should parse nested lists and empty lists", () => {
      const tree = parseSexp("(a (b ()) c)", language);
      expect(tree.toString()).toBe(
        "(source_file (list (identifier) (list (identifier) (list)) (identifier)))"
      );
    });

    it("should parse empty input to an empty root", () => {
      const tree = parseSexp("", language);
      expect(tree.toString()).toBe("(source_file)");
      expect(tree.length).toBe(0);
    });

    it("should cover the whole input with the root", () => {
      const text = "  (a)\n; trailing\n";
      const tree = parseSexp(text, language);
      expect(tree.rootNode.startByte).toBe(0);
      expect(tree.length).toBe(text.length);
      expect(tree.text).toBe(text);
      expect(tree.toString()).toBe("(source_file (list (identifier)) (comment))");
    });

    it("should read input through a callback", () => {
      const source = "(alpha (beta 12))";
      const tree = new Parser()
        .setLanguage(language)
        .parse((offset) => source.slice(offset, offset + 3));
      expect(tree.toString()).toBe("(source_file (list (identifier) (list (identifier) (number))))");
      expect(tree.text).toBe(source);
    });
  });

  describe("error recovery", () => {
    it("should insert a missing closing paren", () => {
      const tree = parseSexp("(a b", language);
      expect(tree.toString()).toBe(
        '(source_file (list (identifier) (identifier) (MISSING ")")))'
      );
      expect(tree.rootNode.hasError).toBe(true);
      const missing = tree.rootNode.child(0)?.lastChild;
      expect(missing?.isMissing).toBe(true);
      expect(missing?.startByte).toBe(4);
      expect(missing?.endByte).toBe(4);
    });

    it("should skip an unexpected token into an ERROR node", () => {
      const tree = parseSexp("a)", language);
      expect(tree.toString()).toBe("(source_file (identifier) (ERROR))");
      const error = tree.rootNode.child(1);
      expect(error?.isError).toBe(true);
      expect(error?.text).toBe(")");
    });

    it("should wrap unrecognized characters in ERROR nodes", () => {
      const tree = parseSexp("a @ b", language);
      expect(tree.rootNode.hasError).toBe(true);
      const [error] = tree.rootNode.descendantsOfType("ERROR");
      expect(error?.text).toBe("@");
      expect(tree.rootNode.descendantsOfType("identifier").map((n) => n.text)).toEqual(["a", "b"]);
    });

    it("should always cover the input", () => {
      const text = "((a : ) ) ) :: (";
      const tree = parseSexp(text, language);
      expect(tree.rootNode.hasError).toBe(true);
      expect(tree.length).toBe(text.length);
      expect(tree.text).toBe(text);
    });
  });

  describe("logging", () => {
    it("should report lexing and parsing steps", () => {
      const logs: Array<[LogType, string]> = [];
      new Parser()
        .setLanguage(language)
        .setLogger((type, message) => logs.push([type, message]))
        .parse("(a)");

      expect(logs).toContainEqual(["parse", "accept"]);
      expect(logs.some(([type]) => type === "lex")).toBe(true);
      expect(logs.some(([, message]) => message.startsWith("shift state:"))).toBe(true);
      expect(logs.some(([, message]) => message.startsWith("reduce sym:list"))).toBe(true);
    });

    it("should prefer a per-call logger", () => {
      const fromParser: string[] = [];
      const fromCall: string[] = [];
      const parser = new Parser()
        .setLanguage(language)
        .setLogger((_type, message) => fromParser.push(message));
      parser.parse("a", null, { logger: (_type, message) => fromCall.push(message) });
      expect(fromParser).toEqual([]);
      expect(fromCall).toContain("accept");
    });
  });

  describe("cancellation", () => {
    it("should stop when the signal is already aborted", () => {
      const controller = new AbortController();
      controller.abort();
      const parser = new Parser().setLanguage(language);
      expect(() => parser.parse("(a b c)", null, { signal: controller.signal })).toThrow(
        ParseCancelledError
      );
    });

    it("should stop once the timeout has passed", () => {
      let now = 0;
      vi.spyOn(Date, "now").mockImplementation(() => (now += 1_000));
      const parser = new Parser().setLanguage(language);
      let caught: unknown = null;
      try {
        parser.parse("(a b c)", null, { timeoutMs: 10 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ParseCancelledError);
      expect(caught instanceof ParseCancelledError && caught.reason).toBe("timeout");
    });

    it("should still parse after a cancelled run", () => {
      const controller = new AbortController();
      controller.abort();
      const parser = new Parser().setLanguage(language);
      expect(() => parser.parse("(a)", null, { signal: controller.signal })).toThrow();
      expect(parser.parse("(a)").toString()).toBe("(source_file (list (identifier)))");
    });
  });

  describe("lifecycle", () => {
    it("should require a language", () => {
      expect(() => new Parser().parse("a")).toThrow(
        "Parser has no language; call setLanguage() first"
      );
    });

    it("should report its language", () => {
      const parser = new Parser();
      expect(parser.getLanguage()).toBeNull();
      parser.setLanguage(language);
      expect(parser.getLanguage()).toBe(language);
    });

    it("should throw once deleted", () => {
      const parser = new Parser().setLanguage(language);
      parser.delete();
      expect(() => parser.parse("a")).toThrow(ReleasedHandleError);
    });
  });
});
