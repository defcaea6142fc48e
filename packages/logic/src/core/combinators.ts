import { emptySubst, unify, unifyAll } from "./kernel.js";
import { bind, emptyStream, mplus, suspension, unit } from "./stream.js";
import type { Goal, Subst, Term } from "./types.js";

/**
 * Emitted by `run` each time it forces a suspended step. Consumers that only
 * want solutions drop it.
 */
export const NO_RESULT: unique symbol = Symbol("no-result");

export type RunItem = Subst | typeof NO_RESULT;

/**
 * A goal that always succeeds once, leaving the substitution unchanged.
 */
export const succeed: Goal = (s) => unit(s);

/**
 * A goal that never succeeds.
 */
export const fail: Goal = () => emptyStream;

/**
 * A goal that succeeds if two terms can be unified.
 */
export function eq(x: Term, y: Term): Goal {
  return (s) => {
    const s2 = unify(x, y, s);
    return s2 === null ? emptyStream : unit(s2);
  };
}

/**
 * Unifies two argument lists position by position.
 */
export function eqAll(xs: readonly Term[], ys: readonly Term[]): Goal {
  return (s) => {
    const s2 = unifyAll(xs, ys, s);
    return s2 === null ? emptyStream : unit(s2);
  };
}

/**
 * Logical conjunction (AND). `g2` runs on every state `g1` produces; when
 * `g1` fails, `g2` is never applied.
 */
export function conj(g1: Goal, g2: Goal): Goal {
  return (s) => bind(g1(s), g2);
}

/**
 * Logical disjunction (OR). Both branches contribute, interleaved.
 */
export function disj(g1: Goal, g2: Goal): Goal {
  return (s) => mplus(g1(s), g2(s));
}

/**
 * Helper for combining multiple goals with logical AND, folded from the
 * right. `and()` succeeds.
 */
export const and = (...goals: Goal[]): Goal =>
  goals.reduceRight<Goal>((rest, goal) => conj(goal, rest), succeed);

/**
 * Helper for combining multiple goals with logical OR, folded from the
 * right. `or()` fails.
 */
export const or = (...goals: Goal[]): Goal =>
  goals.reduceRight<Goal>((rest, goal) => disj(goal, rest), fail);

/**
 * Defers building the goal until the search driver forces this step.
 * Recursive relations must go through here, or building the goal would
 * unfold the recursion before any answer is produced.
 */
export function suspend(thunk: () => Goal): Goal {
  return (s) => suspension(() => thunk()(s));
}

/**
 * Drives a goal from `initial`, lazily. Every forced suspension yields
 * `NO_RESULT` before the step is taken, so a consumer that stops pulling
 * never causes extra search.
 */
export function* run(
  goal: Goal,
  initial: Subst = emptySubst,
): Generator<RunItem, void, undefined> {
  let stream = goal(initial);
  while (true) {
    switch (stream.tag) {
      case "empty":
        return;
      case "mature":
        yield stream.head;
        stream = stream.tail;
        break;
      case "suspended":
        yield NO_RESULT;
        stream = stream.force();
        break;
    }
  }
}

/**
 * Runs a goal and collects up to `limit` substitutions.
 */
export function solve(goal: Goal, limit = Infinity): Subst[] {
  const results: Subst[] = [];
  if (limit <= 0) return results;
  for (const item of run(goal)) {
    if (item === NO_RESULT) continue;
    results.push(item);
    if (results.length >= limit) break;
  }
  return results;
}
