import { describe, expect, it } from "vitest";
import { ReleasedHandleError } from "../../src/errors.js";
import { ZERO_LENGTH, lengthAdd } from "../../src/tree/length.js";
import { Subtree } from "../../src/tree/subtree.js";
import { Tree } from "../../src/tree/tree.js";
import { loadSexp, parseSexp } from "../fixtures.js";

const language = loadSexp();

function subtree(symbol: number, visible: boolean, bytes: number, children: Subtree[] = []): Subtree {
  const size = children.reduce((total, child) => lengthAdd(total, child.total), {
    bytes,
    row: 0,
    column: bytes,
  });
  return new Subtree({
    symbol,
    padding: ZERO_LENGTH,
    size,
    children,
    productionId: children.length > 0 ? 0 : -1,
    parseState: 0,
    lexMode: null,
    lookaheadBytes: 0,
    visible,
    named: visible,
    extra: false,
    missing: false,
    hasChanges: false,
  });
}

describe("TreeCursor", () => {
  it("should walk down, across and back up", () => {
    const cursor = parseSexp("(a x: 1)", language).walk();
    expect(cursor.currentNode.type).toBe("source_file");
    expect(cursor.currentDepth).toBe(0);

    expect(cursor.gotoFirstChild()).toBe(true);
    expect(cursor.currentNode.type).toBe("list");
    expect(cursor.gotoFirstChild()).toBe(true);
    expect(cursor.currentNode.type).toBe("(");
    expect(cursor.gotoNextSibling()).toBe(true);
    expect(cursor.currentNode.text).toBe("a");
    expect(cursor.gotoNextSibling()).toBe(true);
    expect(cursor.currentNode.type).toBe("pair");
    expect(cursor.currentFieldName).toBeNull();
    expect(cursor.currentDepth).toBe(2);

    expect(cursor.gotoFirstChild()).toBe(true);
    expect(cursor.currentNode.text).toBe("x");
    expect(cursor.currentFieldName).toBe("key");
    expect(cursor.currentFieldId).toBe(0);
    expect(cursor.gotoNextSibling()).toBe(true);
    expect(cursor.currentNode.type).toBe(":");
    expect(cursor.currentFieldName).toBeNull();
    expect(cursor.gotoNextSibling()).toBe(true);
    expect(cursor.currentFieldName).toBe("value");
    expect(cursor.gotoNextSibling()).toBe(false);
    expect(cursor.gotoPreviousSibling()).toBe(true);
    expect(cursor.currentNode.type).toBe(":");

    expect(cursor.gotoParent()).toBe(true);
    expect(cursor.currentNode.type).toBe("pair");
    expect(cursor.gotoParent()).toBe(true);
    expect(cursor.gotoParent()).toBe(true);
    expect(cursor.currentNode.type).toBe("source_file");
    expect(cursor.gotoParent()).toBe(false);
  });

  it("should go to the last child", () => {
    const cursor = parseSexp("(a x: 1)", language).walk();
    cursor.gotoFirstChild();
    expect(cursor.gotoLastChild()).toBe(true);
    expect(cursor.currentNode.type).toBe(")");
  });

  it("should return false below a leaf", () => {
    const cursor = parseSexp("a", language).walk();
    cursor.gotoFirstChild();
    expect(cursor.currentNode.type).toBe("identifier");
    expect(cursor.gotoFirstChild()).toBe(false);
  });

  it("should move to the first child extending past a byte", () => {
    const cursor = parseSexp("(a x: 1)", language).walk();
    cursor.gotoFirstChild();
    expect(cursor.gotoFirstChildForByte(3)).toBe(2);
    expect(cursor.currentNode.type).toBe("pair");

    const other = parseSexp("(a x: 1)", language).walk();
    other.gotoFirstChild();
    expect(other.gotoFirstChildForByte(100)).toBe(-1);
    expect(other.currentNode.type).toBe("list");
  });

  it("should seek to the smallest node containing a byte", () => {
    const tree = parseSexp("(a x: 1)", language);
    const cursor = tree.walk();
    expect(cursor.seekToByte(6)).toBe(true);
    expect(cursor.currentNode.text).toBe("1");
    expect(cursor.currentDepth).toBe(3);

    const between = tree.walk();
    expect(between.seekToByte(5)).toBe(true);
    expect(between.currentNode.type).toBe("pair");

    const outside = tree.walk();
    expect(outside.seekToByte(100)).toBe(false);
    expect(outside.currentNode.type).toBe("source_file");
  });

  it("should look past a hidden child that ends in invisible tokens", () => {
    // source_file: _items("a", <2 invisible bytes>), "b"
    const END = 0;
    const IDENTIFIER = 1;
    const SOURCE_FILE = 8;
    const ITEMS = 11;
    const root = subtree(SOURCE_FILE, true, 0, [
      subtree(ITEMS, false, 0, [subtree(IDENTIFIER, true, 1), subtree(END, false, 2)]),
      subtree(IDENTIFIER, true, 1),
    ]);
    const tree = new Tree(root, language, new TextEncoder().encode("a  b"));

    const cursor = tree.walk();
    expect(cursor.gotoFirstChildForByte(2)).toBe(1);
    expect(cursor.currentNode.startByte).toBe(3);
    expect(cursor.currentNode.text).toBe("b");

    const first = tree.walk();
    expect(first.gotoFirstChildForByte(0)).toBe(0);
    expect(first.currentNode.text).toBe("a");
  });

  it("should copy and reset independently", () => {
    const tree = parseSexp("(a b)", language);
    const cursor = tree.walk();
    cursor.gotoFirstChild();
    const copy = cursor.copy();
    copy.gotoFirstChild();
    expect(cursor.currentNode.type).toBe("list");
    expect(copy.currentNode.type).toBe("(");

    copy.reset(tree.rootNode);
    expect(copy.currentNode.type).toBe("source_file");
    expect(copy.currentDepth).toBe(0);
  });

  it("should throw once deleted", () => {
    const cursor = parseSexp("(a)", language).walk();
    cursor.delete();
    expect(() => cursor.gotoFirstChild()).toThrow(ReleasedHandleError);
  });
});
