/**
 * Applying text edits to an existing tree.
 *
 * Editing copies only the subtrees whose extent or dependency range
 * touches the edit. Every other subtree is shared with the original tree.
 * Copied subtrees are flagged `hasChanges`, which keeps the parser from
 * reusing them.
 */

import { InvalidEditRangeError } from "../errors.js";
import {
  lengthAdd,
  lengthFromPoint,
  lengthSaturatingSub,
  lengthSub,
  pointCompare,
  type Length,
  type Point,
} from "./length.js";
import type { Subtree } from "./subtree.js";

export interface Edit {
  startIndex: number;
  oldEndIndex: number;
  newEndIndex: number;
  startPosition: Point;
  oldEndPosition: Point;
  newEndPosition: Point;
}

interface RelativeEdit {
  start: Length;
  oldEnd: Length;
  newEnd: Length;
}

/**
 * Check that an edit can apply to text of `length` bytes ending at `end`.
 */
export function validateEdit(edit: Edit, length: number, end: Point): void {
  const indexes = [edit.startIndex, edit.oldEndIndex, edit.newEndIndex];
  if (!indexes.every((i) => Number.isInteger(i) && i >= 0)) {
    throw new InvalidEditRangeError("byte offsets must be non-negative integers");
  }
  if (edit.startIndex > edit.oldEndIndex) {
    throw new InvalidEditRangeError(
      `start ${edit.startIndex} is after old end ${edit.oldEndIndex}`
    );
  }
  if (edit.oldEndIndex > length) {
    throw new InvalidEditRangeError(
      `old end ${edit.oldEndIndex} is past the end of the source (${length} bytes)`
    );
  }
  if (edit.startIndex > edit.newEndIndex) {
    throw new InvalidEditRangeError(
      `start ${edit.startIndex} is after new end ${edit.newEndIndex}`
    );
  }
  if (
    pointCompare(edit.startPosition, edit.oldEndPosition) > 0 ||
    pointCompare(edit.startPosition, edit.newEndPosition) > 0
  ) {
    throw new InvalidEditRangeError("start position is after an end position");
  }
  if (pointCompare(edit.oldEndPosition, end) > 0) {
    throw new InvalidEditRangeError("old end position is past the end of the source");
  }
}

export function editSubtree(root: Subtree, edit: Edit): Subtree {
  return applyEdit(root, {
    start: lengthFromPoint(edit.startIndex, edit.startPosition),
    oldEnd: lengthFromPoint(edit.oldEndIndex, edit.oldEndPosition),
    newEnd: lengthFromPoint(edit.newEndIndex, edit.newEndPosition),
  });
}

function applyEdit(tree: Subtree, edit: RelativeEdit): Subtree {
  const isNoop = edit.oldEnd.bytes === edit.start.bytes && edit.newEnd.bytes === edit.start.bytes;
  const isPureInsertion = edit.oldEnd.bytes === edit.start.bytes;

  let padding = tree.padding;
  let size = tree.size;
  const total = tree.total;
  const dependencyEnd = tree.dependencyEnd;
  if (edit.start.bytes > dependencyEnd || (isNoop && edit.start.bytes === dependencyEnd)) {
    return tree;
  }

  if (edit.oldEnd.bytes <= padding.bytes) {
    // Entirely inside the whitespace before the node: shift it.
    padding = lengthAdd(edit.newEnd, lengthSub(padding, edit.oldEnd));
  } else if (edit.start.bytes < padding.bytes) {
    // Starts in the whitespace and runs into the node: shrink the content.
    size = lengthSaturatingSub(size, lengthSub(edit.oldEnd, padding));
    padding = edit.newEnd;
  } else if (
    edit.start.bytes < total.bytes ||
    (edit.start.bytes === total.bytes && isPureInsertion)
  ) {
    size = lengthAdd(lengthSub(edit.newEnd, padding), lengthSaturatingSub(total, edit.oldEnd));
  }

  let children = tree.children;
  if (children.length > 0) {
    const current: RelativeEdit = { ...edit };
    const edited = [...children];
    let childRight: Length = { bytes: 0, row: 0, column: 0 };
    for (let i = 0; i < children.length; i++) {
      const child = children[i];
      if (!child) continue;
      const childLeft = childRight;
      childRight = lengthAdd(childLeft, child.total);

      if (childRight.bytes + child.lookaheadBytes < current.start.bytes) continue;
      if (
        childLeft.bytes > current.oldEnd.bytes ||
        (childLeft.bytes === current.oldEnd.bytes && child.total.bytes > 0 && i > 0)
      ) {
        break;
      }

      const childEdit: RelativeEdit = {
        start: lengthSaturatingSub(current.start, childLeft),
        oldEnd: lengthSaturatingSub(current.oldEnd, childLeft),
        newEnd: lengthSaturatingSub(current.newEnd, childLeft),
      };

      // Inserted text goes to the first child touching the edit; later
      // children are only shifted.
      if (
        childRight.bytes > current.start.bytes ||
        (childRight.bytes === current.start.bytes && isPureInsertion)
      ) {
        current.newEnd = current.start;
      } else {
        childEdit.oldEnd = childEdit.start;
        childEdit.newEnd = childEdit.start;
      }

      edited[i] = applyEdit(child, childEdit);
    }
    children = edited;
  }

  return tree.with({ padding, size, children, hasChanges: true });
}
