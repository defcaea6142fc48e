import { cons, isCompound, isCons, isVar, walkDeep } from "./kernel.js";
import type { Subst, Term, Var } from "./types.js";

export const REIFIED_VAR_PREFIX = "_.";

/**
 * Resolves `term` against `s` and renames every variable still unbound to
 * `_.0`, `_.1`, ... in order of first appearance. The same unbound variable
 * gets the same name wherever it occurs in the term.
 */
export function reify(term: Term, s: Subst): Term {
  return rename(walkDeep(term, s), new Map());
}

function rename(term: Term, names: Map<string, Var>): Term {
  if (isVar(term)) {
    let named = names.get(term.id);
    if (named === undefined) {
      const name = `${REIFIED_VAR_PREFIX}${names.size}`;
      named = { tag: "var", id: name, name };
      names.set(term.id, named);
    }
    return named;
  }
  if (isCons(term)) {
    const head = rename(term.head, names);
    return cons(head, rename(term.tail, names));
  }
  if (isCompound(term)) {
    return {
      tag: "compound",
      functor: term.functor,
      args: term.args.map((arg) => rename(arg, names)),
    };
  }
  return term;
}
