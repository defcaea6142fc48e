// Core Types for the Relational Engine
// -----------------------------------------------------------------------------

/**
 * Represents a logic variable, a placeholder for a value.
 * Two variables are the same variable only if their ids match.
 */
export interface Var {
  readonly tag: "var";
  readonly id: string;
  readonly name: string;
}

/**
 * A symbol with no arguments.
 */
export interface Atom {
  readonly tag: "atom";
  readonly name: string;
}

/**
 * A symbol applied to one or more argument terms.
 */
export interface Compound {
  readonly tag: "compound";
  readonly functor: string;
  readonly args: readonly Term[];
}

/**
 * A `cons` cell, the building block of a logic list.
 */
export interface ConsNode {
  readonly tag: "cons";
  readonly head: Term;
  readonly tail: Term;
}

/**
 * The end of a logic list.
 */
export interface NilNode {
  readonly tag: "nil";
}

/**
 * A logic list is either a `cons` cell or `nil`.
 */
export type LogicList = ConsNode | NilNode;

/**
 * Opaque scalars, compared by value. Integers beyond the safe range are
 * bigints.
 */
export type Literal = number | bigint | string;

/**
 * Represents any term in the logic system.
 */
export type Term = Var | Atom | Compound | ConsNode | NilNode | Literal;

/**
 * A substitution map, holding variable bindings keyed by variable id.
 */
export type Subst = ReadonlyMap<string, Term>;

/**
 * A lazy stream of substitutions.
 *
 * `suspended` is an explicit deferred step: the driver calls `force` when it
 * needs more of the stream, and not before.
 */
export type Stream =
  | { readonly tag: "empty" }
  | { readonly tag: "mature"; readonly head: Subst; readonly tail: Stream }
  | { readonly tag: "suspended"; readonly force: () => Stream };

/**
 * A Goal maps one substitution to the stream of substitutions that satisfy it.
 */
export type Goal = (s: Subst) => Stream;
