import { conj, eqAll } from "@clausal/logic";
import type { Goal, Term } from "@clausal/logic";
import type { ClauseNode } from "../ast.js";
import { collect, compileCalls, compileTerm } from "./compile.js";
import type { Compiled, Database, Environment } from "./types.js";

interface ClauseBase {
  readonly symbol: string;
  readonly arity: number;
  readonly head: Compiled<Term[]>;
  /** Every variable name in head and body; one activation allocates them all. */
  readonly freeVars: ReadonlySet<string>;
}

/** A head with no body. */
export interface FactClause extends ClauseBase {
  readonly kind: "fact";
}

/** A head plus a conjunction of calls. */
export interface RuleClause extends ClauseBase {
  readonly kind: "rule";
  readonly body: Compiled<Goal>;
}

export type Clause = FactClause | RuleClause;

export function assembleClause(node: ClauseNode): Clause {
  const { symbol } = node.head;
  const head = collect(node.head.args.map(compileTerm));
  const arity = node.head.args.length;

  if (node.type === "fact") {
    return { kind: "fact", symbol, arity, head, freeVars: head.freeVars };
  }

  const body = compileCalls(node.body);
  return {
    kind: "rule",
    symbol,
    arity,
    head,
    body,
    freeVars: new Set([...head.freeVars, ...body.freeVars]),
  };
}

/**
 * Builds the goal for one activation of `clause` against the caller's
 * arguments. `env` must hold a fresh variable for each of `clause.freeVars`.
 * A rule's body runs only on states where the head matched.
 */
export function evaluateClause(
  clause: Clause,
  db: Database,
  args: readonly Term[],
  env: Environment,
): Goal {
  const matchHead = eqAll(args, clause.head.evaluate(db, args, env));
  switch (clause.kind) {
    case "fact":
      return matchHead;
    case "rule":
      return conj(matchHead, clause.body.evaluate(db, args, env));
  }
}
