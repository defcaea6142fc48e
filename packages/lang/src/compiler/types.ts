import type { Goal, Term, Var } from "@clausal/logic";

/** Source variable name to the logic variable of one clause activation. */
export type Environment = ReadonlyMap<string, Var>;

export type Relation = (...args: Term[]) => Goal;

/**
 * Where compiled calls find their target. Lookup happens when a suspended
 * call is forced, never at compile time.
 */
export interface Database {
  relation(symbol: string): Relation;
}

export type Evaluator<T> = (
  db: Database,
  args: readonly Term[],
  env: Environment,
) => T;

/**
 * A compiled piece of syntax: the source variables it mentions and the
 * function that evaluates it at run time.
 */
export interface Compiled<T> {
  readonly freeVars: ReadonlySet<string>;
  readonly evaluate: Evaluator<T>;
}

export interface CompiledQuery extends Compiled<Goal> {
  /** Predicate symbols the query calls directly, in order of first use. */
  readonly calls: readonly string[];
}
