import { describe, expect, it } from "vitest";
import { InvalidEditRangeError, ReleasedHandleError } from "../../src/errors.js";
import type { Edit } from "../../src/tree/edit.js";
import { loadSexp, parseSexp } from "../fixtures.js";

const language = loadSexp();

function replaceAt(start: number, oldEnd: number, newEnd: number): Edit {
  return {
    startIndex: start,
    oldEndIndex: oldEnd,
    newEndIndex: newEnd,
    startPosition: { row: 0, column: start },
    oldEndPosition: { row: 0, column: oldEnd },
    newEndPosition: { row: 0, column: newEnd },
  };
}

describe("Tree.edit", () => {
  it("should leave the original tree untouched", () => {
    const tree = parseSexp("(a b)", language);
    const edited = tree.edit(replaceAt(3, 4, 6));

    expect(edited.hasText).toBe(false);
    expect(edited.length).toBe(7);
    expect(tree.hasText).toBe(true);
    expect(tree.length).toBe(5);
    expect(tree.text).toBe("(a b)");
  });

  it("should shift nodes after the edit", () => {
    const edited = parseSexp("(a b)", language).edit(replaceAt(1, 1, 3));
    const list = edited.rootNode.child(0);
    expect(list?.endByte).toBe(7);
    expect(list?.child(2)?.startByte).toBe(5);
    expect(list?.child(2)?.hasChanges).toBe(false);
    expect(list?.hasChanges).toBe(true);
  });

  it("should reject edits that do not fit the tree", () => {
    const tree = parseSexp("(a b)", language);
    expect(() => tree.edit(replaceAt(4, 3, 4))).toThrow(InvalidEditRangeError);
    expect(() => tree.edit(replaceAt(3, 9, 9))).toThrow(
      "Invalid edit: old end 9 is past the end of the source (5 bytes)"
    );
    expect(() => tree.edit({ ...replaceAt(1, 2, 2), startIndex: -1 })).toThrow(
      "Invalid edit: byte offsets must be non-negative integers"
    );
  });

  it("should throw once the tree is deleted", () => {
    const tree = parseSexp("(a)", language);
    tree.delete();
    expect(() => tree.rootNode).toThrow(ReleasedHandleError);
  });
});

describe("Tree.changedRanges", () => {
  it("should report the replaced token", () => {
    const tree = parseSexp("(a b)", language);
    const edited = tree.edit(replaceAt(3, 4, 4));
    const reparsed = parseSexp("(a c)", language);
    expect(edited.changedRanges(reparsed)).toEqual([
      {
        startIndex: 3,
        endIndex: 4,
        startPosition: { row: 0, column: 3 },
        endPosition: { row: 0, column: 4 },
      },
    ]);
  });

  it("should report nothing between identical parses", () => {
    const first = parseSexp("(a (b c))", language);
    const second = parseSexp("(a (b c))", language);
    expect(first.changedRanges(second)).toEqual([]);
  });

  it("should report a node whose type changed", () => {
    const first = parseSexp("(a b)", language);
    const second = parseSexp("(a 1)", language);
    expect(first.changedRanges(second)).toEqual([
      {
        startIndex: 3,
        endIndex: 4,
        startPosition: { row: 0, column: 3 },
        endPosition: { row: 0, column: 4 },
      },
    ]);
  });
});
