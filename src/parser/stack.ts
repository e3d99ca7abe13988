/**
 * The LR parse stack.
 *
 * Each frame records the automaton state reached after pushing its
 * subtree. Extra frames (comments, ERROR nodes) repeat the state of the
 * frame below them, so they never affect which actions are valid.
 */

import { lengthAdd, ZERO_LENGTH, type Length } from "../tree/length.js";
import type { Subtree } from "../tree/subtree.js";

export interface StackFrame {
  state: number;
  subtree: Subtree | null;
  extra: boolean;
  /** Absolute position just after this frame's subtree */
  end: Length;
}

export interface PoppedChildren {
  children: Subtree[];
  trailingExtras: Subtree[];
}

export class ParseStack {
  private frames: StackFrame[] = [
    { state: 0, subtree: null, extra: false, end: ZERO_LENGTH },
  ];

  get top(): StackFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new Error("Parse stack underflow");
    return frame;
  }

  get state(): number {
    return this.top.state;
  }

  get position(): Length {
    return this.top.end;
  }

  get depth(): number {
    return this.frames.length;
  }

  push(state: number, subtree: Subtree, extra: boolean): void {
    this.frames.push({ state, subtree, extra, end: lengthAdd(this.position, subtree.total) });
  }

  /**
   * Pop the children of a reduction: `count` non-extra frames plus the
   * extras interleaved between them. Extras above the last child are
   * returned separately so they can be pushed back above the new node.
   */
  popForReduce(count: number): PoppedChildren {
    const trailingExtras: Subtree[] = [];
    if (count > 0) {
      while (this.frames.length > 1 && this.top.extra) {
        const frame = this.frames.pop();
        if (frame?.subtree) trailingExtras.unshift(frame.subtree);
      }
    }
    const children: Subtree[] = [];
    let remaining = count;
    while (remaining > 0 && this.frames.length > 1) {
      const frame = this.frames.pop();
      if (!frame?.subtree) break;
      children.unshift(frame.subtree);
      if (!frame.extra) remaining--;
    }
    return { children, trailingExtras };
  }

  /** States of the non-extra frames, bottom first */
  states(): number[] {
    return this.frames.filter((f) => !f.extra).map((f) => f.state);
  }

  /**
   * Pop `count` non-extra frames together with every extra frame above the
   * lowest of them. Returns the popped subtrees in document order.
   */
  popFrames(count: number): Subtree[] {
    const popped: Subtree[] = [];
    let remaining = count;
    while (remaining > 0 && this.frames.length > 1) {
      const frame = this.frames.pop();
      if (!frame?.subtree) break;
      popped.unshift(frame.subtree);
      if (!frame.extra) remaining--;
    }
    return popped;
  }

  /** Entry k is the number of tokens `popFrames(k)` would discard */
  popCosts(): number[] {
    const costs = [0];
    let cost = 0;
    for (let i = this.frames.length - 1; i > 0; i--) {
      const frame = this.frames[i];
      if (!frame?.subtree) break;
      cost += frame.subtree.tokenCount;
      if (!frame.extra) costs.push(cost);
    }
    return costs;
  }

  /** Pop the top frame when it holds an ERROR node pushed by recovery */
  popTopError(): Subtree | null {
    const top = this.top;
    if (this.frames.length > 1 && top.extra && top.subtree?.isError) {
      this.frames.pop();
      return top.subtree;
    }
    return null;
  }

  subtrees(): Subtree[] {
    const out: Subtree[] = [];
    for (const frame of this.frames) {
      if (frame.subtree) out.push(frame.subtree);
    }
    return out;
  }
}
