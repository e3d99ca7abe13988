/**
 * Conversions between UTF-16 string indices, UTF-8 byte offsets and
 * points. Trees count bytes; editors count UTF-16 code units.
 */

import type { Point } from "../tree/length.js";

/** UTF-8 width of the code point starting at `index` and its UTF-16 width */
function widths(text: string, index: number): [bytes: number, units: number] {
  const code = text.charCodeAt(index);
  if (code < 0x80) return [1, 1];
  if (code < 0x800) return [2, 1];
  if (code >= 0xd800 && code <= 0xdbff) {
    const next = text.charCodeAt(index + 1);
    if (next >= 0xdc00 && next <= 0xdfff) return [4, 2];
  }
  // Lone surrogates encode as U+FFFD.
  return [3, 1];
}

export function utf8Length(text: string): number {
  return byteOffsetAt(text, text.length);
}

/** Byte offset of a UTF-16 index. Indices past the end clamp to the end */
export function byteOffsetAt(text: string, index: number): number {
  const end = Math.min(Math.max(index, 0), text.length);
  let bytes = 0;
  for (let i = 0; i < end; ) {
    const [b, units] = widths(text, i);
    bytes += b;
    i += units;
  }
  return bytes;
}

/**
 * UTF-16 index of a byte offset. An offset inside a multi-byte character
 * resolves to the start of that character.
 */
export function utf16IndexAt(text: string, byteOffset: number): number {
  let bytes = 0;
  let i = 0;
  while (i < text.length) {
    const [b, units] = widths(text, i);
    if (bytes + b > byteOffset) break;
    bytes += b;
    i += units;
  }
  return i;
}

/** Row and UTF-16 column of an index */
export function pointAt(text: string, index: number): Point {
  const end = Math.min(Math.max(index, 0), text.length);
  let row = 0;
  let lineStart = 0;
  for (let i = text.indexOf("\n"); i >= 0 && i < end; i = text.indexOf("\n", i + 1)) {
    row++;
    lineStart = i + 1;
  }
  return { row, column: end - lineStart };
}

/** Row and UTF-16 column of a byte offset */
export function pointAtByte(text: string, byteOffset: number): Point {
  return pointAt(text, utf16IndexAt(text, byteOffset));
}

/**
 * UTF-16 index reached by moving `bytes` bytes forward from `index`.
 * Stops early at the end of the text.
 */
export function advanceByBytes(text: string, index: number, bytes: number): number {
  let i = index;
  let remaining = bytes;
  while (remaining > 0 && i < text.length) {
    const [b, units] = widths(text, i);
    remaining -= b;
    i += units;
  }
  return i;
}
