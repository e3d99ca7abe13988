/**
 * Byte sources for the lexer.
 *
 * Text is always read as UTF-8. A caller either hands over the whole
 * buffer or a callback that returns the chunk starting at a byte offset.
 */

export type ReadCallback = (byteOffset: number) => string | Uint8Array | null | undefined;

export type ParseInput = string | Uint8Array | ReadCallback;

const encoder = new TextEncoder();

export interface DecodedChar {
  codePoint: number;
  /** UTF-8 bytes consumed */
  byteLength: number;
  /** UTF-16 code units the code point occupies */
  utf16Length: number;
}

const END_OF_INPUT: DecodedChar = { codePoint: -1, byteLength: 0, utf16Length: 0 };

export class InputReader {
  private chunk: Uint8Array;
  private chunkStart = 0;
  private readonly callback: ReadCallback | null;

  constructor(input: ParseInput) {
    if (typeof input === "function") {
      this.callback = input;
      this.chunk = new Uint8Array(0);
    } else {
      this.callback = null;
      this.chunk = typeof input === "string" ? encoder.encode(input) : input;
    }
  }

  /** The whole buffer when the input was not a callback */
  get buffer(): Uint8Array | null {
    return this.callback ? null : this.chunk;
  }

  /** Byte at `offset`, or -1 past the end */
  byteAt(offset: number): number {
    const local = offset - this.chunkStart;
    if (local >= 0 && local < this.chunk.length) return this.chunk[local] ?? -1;
    if (!this.callback) return -1;
    if (!this.fetch(offset)) return -1;
    return this.chunk[offset - this.chunkStart] ?? -1;
  }

  private fetch(offset: number): boolean {
    const callback = this.callback;
    if (!callback) return false;
    const result = callback(offset);
    if (result === null || result === undefined || result.length === 0) return false;
    this.chunk = typeof result === "string" ? encoder.encode(result) : result;
    this.chunkStart = offset;
    return true;
  }

  /**
   * Decode the code point starting at `offset`. Malformed sequences decode
   * to U+FFFD and consume a single byte.
   */
  decode(offset: number): DecodedChar {
    const first = this.byteAt(offset);
    if (first < 0) return END_OF_INPUT;
    if (first < 0x80) return { codePoint: first, byteLength: 1, utf16Length: 1 };

    let needed: number;
    let codePoint: number;
    let min: number;
    if (first >= 0xc2 && first <= 0xdf) {
      needed = 1;
      codePoint = first & 0x1f;
      min = 0x80;
    } else if (first >= 0xe0 && first <= 0xef) {
      needed = 2;
      codePoint = first & 0x0f;
      min = 0x800;
    } else if (first >= 0xf0 && first <= 0xf4) {
      needed = 3;
      codePoint = first & 0x07;
      min = 0x10000;
    } else {
      return replacement();
    }

    for (let i = 1; i <= needed; i++) {
      const next = this.byteAt(offset + i);
      if (next < 0 || (next & 0xc0) !== 0x80) return replacement();
      codePoint = (codePoint << 6) | (next & 0x3f);
    }
    if (codePoint < min || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      return replacement();
    }
    return {
      codePoint,
      byteLength: needed + 1,
      utf16Length: codePoint >= 0x10000 ? 2 : 1,
    };
  }

  /** Read every byte up to end of input. Used to keep the tree's source text */
  readAll(): Uint8Array {
    if (!this.callback) return this.chunk;
    const parts: Uint8Array[] = [];
    let offset = 0;
    let total = 0;
    while (this.fetch(offset)) {
      parts.push(this.chunk);
      offset += this.chunk.length;
      total += this.chunk.length;
    }
    const out = new Uint8Array(total);
    let position = 0;
    for (const part of parts) {
      out.set(part, position);
      position += part.length;
    }
    return out;
  }
}

function replacement(): DecodedChar {
  return { codePoint: 0xfffd, byteLength: 1, utf16Length: 1 };
}
