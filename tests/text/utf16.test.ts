import { describe, expect, it } from "vitest";
import {
  advanceByBytes,
  byteOffsetAt,
  pointAt,
  pointAtByte,
  utf16IndexAt,
  utf8Length,
} from "../../src/text/utf16.js";

// a: 1 byte, é: 2 bytes, 😀: 4 bytes in two UTF-16 units
const text = "aé😀";

describe("utf16", () => {
  it("should measure UTF-8 length", () => {
    expect(utf8Length(text)).toBe(7);
    expect(utf8Length("")).toBe(0);
    expect(utf8Length("\ud800")).toBe(3);
  });

  it("should convert indices to byte offsets", () => {
    expect(byteOffsetAt(text, 0)).toBe(0);
    expect(byteOffsetAt(text, 2)).toBe(3);
    expect(byteOffsetAt(text, 4)).toBe(7);
    expect(byteOffsetAt(text, 99)).toBe(7);
    expect(byteOffsetAt(text, -1)).toBe(0);
  });

  it("should convert byte offsets to indices", () => {
    expect(utf16IndexAt(text, 1)).toBe(1);
    expect(utf16IndexAt(text, 3)).toBe(2);
    expect(utf16IndexAt(text, 7)).toBe(4);
  });

  it("should resolve offsets inside a character to its start", () => {
    expect(utf16IndexAt(text, 2)).toBe(1);
    expect(utf16IndexAt(text, 4)).toBe(2);
  });

  it("should find points by index and by byte", () => {
    expect(pointAt("ab\ncd", 4)).toEqual({ row: 1, column: 1 });
    expect(pointAt("ab\ncd", 2)).toEqual({ row: 0, column: 2 });
    expect(pointAt("ab\ncd", 3)).toEqual({ row: 1, column: 0 });
    expect(pointAtByte("é\n😀x", 7)).toEqual({ row: 1, column: 2 });
  });

  it("should advance by bytes", () => {
    expect(advanceByBytes("é", 0, 2)).toBe(1);
    expect(advanceByBytes(text, 1, 6)).toBe(4);
    expect(advanceByBytes(text, 0, 100)).toBe(4);
    expect(advanceByBytes(text, 2, 0)).toBe(2);
  });
});
