/**
 * Byte and point arithmetic.
 *
 * A Length is a relative extent: how many bytes it spans and how far it
 * moves a point. Columns are counted in UTF-16 code units.
 */

export interface Point {
  row: number;
  column: number;
}

export interface Length {
  bytes: number;
  row: number;
  column: number;
}

export interface Range {
  startIndex: number;
  endIndex: number;
  startPosition: Point;
  endPosition: Point;
}

export const ZERO_LENGTH: Length = Object.freeze({ bytes: 0, row: 0, column: 0 });
export const ZERO_POINT: Point = Object.freeze({ row: 0, column: 0 });

export function lengthAdd(a: Length, b: Length): Length {
  if (b.row > 0) {
    return { bytes: a.bytes + b.bytes, row: a.row + b.row, column: b.column };
  }
  return { bytes: a.bytes + b.bytes, row: a.row, column: a.column + b.column };
}

/**
 * Extent from `b` to `a`, where `b` is a prefix of `a`.
 */
export function lengthSub(a: Length, b: Length): Length {
  const bytes = a.bytes - b.bytes;
  if (a.row > b.row) {
    return { bytes, row: a.row - b.row, column: a.column };
  }
  return { bytes, row: 0, column: a.column - b.column };
}

/**
 * Like lengthSub but clamps at zero instead of going negative.
 */
export function lengthSaturatingSub(a: Length, b: Length): Length {
  if (b.bytes >= a.bytes) return ZERO_LENGTH;
  return lengthSub(a, b);
}

export function lengthFromPoint(bytes: number, point: Point): Length {
  return { bytes, row: point.row, column: point.column };
}

export function lengthToPoint(length: Length): Point {
  return { row: length.row, column: length.column };
}

export function pointCompare(a: Point, b: Point): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.column - b.column;
}

export function pointEquals(a: Point, b: Point): boolean {
  return a.row === b.row && a.column === b.column;
}
