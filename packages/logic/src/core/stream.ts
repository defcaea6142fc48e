import type { Goal, Stream, Subst } from "./types.js";

export const emptyStream: Stream = { tag: "empty" };

export function unit(s: Subst): Stream {
  return { tag: "mature", head: s, tail: emptyStream };
}

export function suspension(force: () => Stream): Stream {
  return { tag: "suspended", force };
}

/**
 * Merges two streams. On reaching a suspension the operands swap, so a
 * branch that keeps suspending cannot starve the other one.
 */
export function mplus(s1: Stream, s2: Stream): Stream {
  switch (s1.tag) {
    case "empty":
      return s2;
    case "mature":
      return { tag: "mature", head: s1.head, tail: mplus(s1.tail, s2) };
    case "suspended":
      return suspension(() => mplus(s2, s1.force()));
  }
}

/**
 * Feeds every substitution of the stream through `goal`, merging the results.
 */
export function bind(stream: Stream, goal: Goal): Stream {
  switch (stream.tag) {
    case "empty":
      return emptyStream;
    case "mature":
      return mplus(goal(stream.head), bind(stream.tail, goal));
    case "suspended":
      return suspension(() => bind(stream.force(), goal));
  }
}
