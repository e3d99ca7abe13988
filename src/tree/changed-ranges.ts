/**
 * Structural diff between two versions of a tree.
 *
 * Walks both trees together over their visible structure. Subtrees shared
 * by both trees are skipped without descending, so the cost follows the
 * size of the change rather than the size of the tree.
 */

import { lengthAdd, lengthToPoint, ZERO_LENGTH, type Length, type Range } from "./length.js";
import { visibleChildren, type ChildEntry } from "./node.js";
import type { Tree } from "./tree.js";

interface Span {
  start: Length;
  end: Length;
}

function spanOf(entry: ChildEntry): Span {
  return {
    start: lengthAdd(entry.position, entry.subtree.padding),
    end: lengthAdd(entry.position, entry.subtree.total),
  };
}

export function changedRanges(oldTree: Tree, newTree: Tree): Range[] {
  const spans: Span[] = [];
  const oldRoot: ChildEntry = { subtree: oldTree.root, position: ZERO_LENGTH, fieldId: null };
  const newRoot: ChildEntry = { subtree: newTree.root, position: ZERO_LENGTH, fieldId: null };

  const compare = (a: ChildEntry, b: ChildEntry): void => {
    if (a.subtree === b.subtree && a.position.bytes === b.position.bytes) return;
    if (a.subtree.isLeaf && b.subtree.isLeaf) {
      if (a.subtree.hasChanges || b.subtree.hasChanges) spans.push(spanOf(b));
      return;
    }
    const left = [...visibleChildren(oldTree.language, a.subtree, a.position)];
    const right = [...visibleChildren(newTree.language, b.subtree, b.position)];
    let i = 0;
    let j = 0;
    while (i < left.length || j < right.length) {
      const x = left[i];
      const y = right[j];
      if (x && y) {
        const sx = spanOf(x);
        const sy = spanOf(y);
        if (sx.start.bytes === sy.start.bytes && sx.end.bytes === sy.end.bytes) {
          if (
            x.subtree.symbol === y.subtree.symbol &&
            x.subtree.isMissing === y.subtree.isMissing &&
            x.fieldId === y.fieldId
          ) {
            compare(x, y);
          } else {
            spans.push(sy);
          }
          i++;
          j++;
        } else if (
          sx.start.bytes < sy.start.bytes ||
          (sx.start.bytes === sy.start.bytes && sx.end.bytes < sy.end.bytes)
        ) {
          spans.push(sx);
          i++;
        } else {
          spans.push(sy);
          j++;
        }
      } else if (x) {
        spans.push(spanOf(x));
        i++;
      } else if (y) {
        spans.push(spanOf(y));
        j++;
      }
    }
  };

  if (oldTree.root.symbol !== newTree.root.symbol) {
    spans.push(spanOf(newRoot));
  } else {
    compare(oldRoot, newRoot);
  }

  spans.sort((p, q) => p.start.bytes - q.start.bytes || p.end.bytes - q.end.bytes);
  const merged: Span[] = [];
  for (const span of spans) {
    const last = merged[merged.length - 1];
    if (last && span.start.bytes <= last.end.bytes) {
      if (span.end.bytes > last.end.bytes) last.end = span.end;
    } else {
      merged.push({ ...span });
    }
  }

  return merged.map((span) => ({
    startIndex: span.start.bytes,
    endIndex: span.end.bytes,
    startPosition: lengthToPoint(span.start),
    endPosition: lengthToPoint(span.end),
  }));
}
