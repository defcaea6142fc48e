import { and, compound, cons, lvar, nil, suspend } from "@clausal/logic";
import type { Goal, Term, Var } from "@clausal/logic";
import type { CallNode, QueryNode, TermNode } from "../ast.js";
import type { Compiled, CompiledQuery, Environment } from "./types.js";

const NO_VARS: ReadonlySet<string> = new Set();

function union(sets: readonly ReadonlySet<string>[]): ReadonlySet<string> {
  const out = new Set<string>();
  for (const set of sets) {
    for (const name of set) out.add(name);
  }
  return out;
}

/**
 * Builds one activation's environment: a new logic variable for each name.
 */
export function freshEnvironment(freeVars: Iterable<string>): Environment {
  const env = new Map<string, Var>();
  for (const name of freeVars) {
    env.set(name, lvar(name));
  }
  return env;
}

/**
 * Combines several compiled pieces into one whose evaluator runs each of
 * them in order and returns their results positionally.
 */
export function collect<T>(pairs: readonly Compiled<T>[]): Compiled<T[]> {
  const evaluators = pairs.map((pair) => pair.evaluate);
  return {
    freeVars: union(pairs.map((pair) => pair.freeVars)),
    evaluate: (db, args, env) => evaluators.map((ev) => ev(db, args, env)),
  };
}

const NIL_TERM: Compiled<Term> = { freeVars: NO_VARS, evaluate: () => nil };

function consTerm(first: Compiled<Term>, rest: Compiled<Term>): Compiled<Term> {
  return {
    freeVars: union([first.freeVars, rest.freeVars]),
    evaluate: (db, args, env) =>
      cons(first.evaluate(db, args, env), rest.evaluate(db, args, env)),
  };
}

export function compileTerm(node: TermNode): Compiled<Term> {
  switch (node.type) {
    case "variable": {
      const { name } = node;
      return {
        freeVars: new Set([name]),
        evaluate: (_db, _args, env) => {
          const v = env.get(name);
          // Internal invariant: every caller builds `env` from this term's
          // freeVars, so parsed input never reaches this branch.
          if (v === undefined) {
            throw new Error(`Variable '${name}' missing from its clause environment`);
          }
          return v;
        },
      };
    }
    case "anonymous": {
      const { name } = node;
      // A new variable per evaluation: two `_` never share a binding.
      return { freeVars: NO_VARS, evaluate: () => lvar(name) };
    }
    case "literal": {
      const { value } = node;
      return { freeVars: NO_VARS, evaluate: () => value };
    }
    case "compound": {
      const { symbol } = node;
      const args = collect(node.args.map(compileTerm));
      return {
        freeVars: args.freeVars,
        evaluate: (db, callArgs, env) =>
          compound(symbol, args.evaluate(db, callArgs, env)),
      };
    }
    case "list":
      return node.elements.map(compileTerm).reduceRight(
        (rest, first) => consTerm(first, rest),
        NIL_TERM,
      );
  }
}

/**
 * Compiles a call in a rule body or query. The relation is looked up and
 * invoked only when the search forces the suspension.
 */
export function compileCall(node: CallNode): Compiled<Goal> {
  const { symbol } = node;
  const args = collect(node.args.map(compileTerm));
  return {
    freeVars: args.freeVars,
    evaluate: (db, callArgs, env) =>
      suspend(() => db.relation(symbol)(...args.evaluate(db, callArgs, env))),
  };
}

/**
 * Conjunction of calls, left to right. No calls at all always succeeds.
 */
export function compileCalls(nodes: readonly CallNode[]): Compiled<Goal> {
  const calls = collect(nodes.map(compileCall));
  return {
    freeVars: calls.freeVars,
    evaluate: (db, args, env) => and(...calls.evaluate(db, args, env)),
  };
}

export function compileQuery(node: QueryNode): CompiledQuery {
  return {
    ...compileCalls(node.calls),
    calls: [...new Set(node.calls.map((call) => call.symbol))],
  };
}
