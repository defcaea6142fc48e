import type {
  Atom,
  Compound,
  ConsNode,
  Literal,
  LogicList,
  NilNode,
  Subst,
  Term,
  Var,
} from "./types.js";

/** Reserved symbol for a list pair. */
export const CONS_SYMBOL = "Cons";
/** Reserved symbol for the empty list. */
export const NIL_SYMBOL = "Nil";

let varCounter = 0;

/**
 * Creates a new, unique logic variable.
 * @param name A hint kept for debugging; it plays no part in identity.
 */
export function lvar(name = ""): Var {
  return {
    tag: "var",
    id: `${name}_${varCounter++}`,
    name,
  };
}

/**
 * Resets the global variable counter for deterministic tests.
 */
export function resetVarCounter(): void {
  varCounter = 0;
}

/**
 * The substitution in which nothing is bound yet.
 */
export const emptySubst: Subst = new Map<string, Term>();

/**
 * The canonical `nil` value, representing an empty logic list.
 */
export const nil: NilNode = { tag: "nil" };

/**
 * Creates a `cons` cell (a node in a logic list).
 */
export function cons(head: Term, tail: Term): ConsNode {
  return {
    tag: "cons",
    head,
    tail,
  };
}

export function atom(name: string): Atom | NilNode {
  return name === NIL_SYMBOL ? nil : { tag: "atom", name };
}

/**
 * Builds the term for `symbol` applied to `args`. The reserved list symbols
 * are folded into their list nodes, so `(Cons 5 Nil)` and `[5]` are the
 * same term.
 */
export function compound(
  symbol: string,
  args: readonly Term[],
): Atom | Compound | LogicList {
  if (args.length === 0) return atom(symbol);
  if (symbol === CONS_SYMBOL && args.length === 2) {
    return cons(args[0], args[1]);
  }
  return { tag: "compound", functor: symbol, args };
}

/**
 * Converts a JavaScript array into a logic list.
 */
export function arrayToLogicList(arr: readonly Term[]): LogicList {
  return arr.reduceRight<LogicList>((tail, head) => cons(head, tail), nil);
}

/**
 * A convenience function to create a logic list from arguments.
 */
export function logicList(...items: Term[]): LogicList {
  return arrayToLogicList(items);
}

/**
 * Type guard to check if a term is a logic variable.
 */
export function isVar(x: Term): x is Var {
  return typeof x === "object" && x.tag === "var";
}

export function isAtom(x: Term): x is Atom {
  return typeof x === "object" && x.tag === "atom";
}

export function isCompound(x: Term): x is Compound {
  return typeof x === "object" && x.tag === "compound";
}

/**
 * Type guard to check if a term is a `cons` cell.
 */
export function isCons(x: Term): x is ConsNode {
  return typeof x === "object" && x.tag === "cons";
}

/**
 * Type guard to check if a term is `nil`.
 */
export function isNil(x: Term): x is NilNode {
  return typeof x === "object" && x.tag === "nil";
}

export function isLiteral(x: Term): x is Literal {
  return typeof x === "number" || typeof x === "bigint" || typeof x === "string";
}

/**
 * A term is a proper list when its chain of `cons` tails ends in `nil`.
 */
export function isProperList(term: Term): boolean {
  let cur = term;
  while (isCons(cur)) {
    cur = cur.tail;
  }
  return isNil(cur);
}

/**
 * Converts a logic list to a JavaScript array. Stops at the first tail that
 * is not a `cons` cell, so callers wanting only proper lists should check
 * `isProperList` first.
 */
export function logicListToArray(list: Term): Term[] {
  const out: Term[] = [];
  let cur = list;
  while (isCons(cur)) {
    out.push(cur.head);
    cur = cur.tail;
  }
  return out;
}

/**
 * Follows variable bindings until reaching an unbound variable or a
 * non-variable term. Does not descend into structure.
 */
export function walk(u: Term, s: Subst): Term {
  let current = u;
  while (isVar(current)) {
    const bound = s.get(current.id);
    if (bound === undefined) break;
    current = bound;
  }
  return current;
}

/**
 * Resolves a term and everything inside it against the substitution.
 */
export function walkDeep(u: Term, s: Subst): Term {
  const current = walk(u, s);
  if (isCons(current)) {
    return cons(walkDeep(current.head, s), walkDeep(current.tail, s));
  }
  if (isCompound(current)) {
    return {
      tag: "compound",
      functor: current.functor,
      args: current.args.map((arg) => walkDeep(arg, s)),
    };
  }
  return current;
}

/**
 * Checks if a variable `v` occurs within a term `x` to prevent cyclic terms.
 */
function occursCheck(v: Var, x: Term, s: Subst): boolean {
  const resolved = walk(x, s);
  if (isVar(resolved)) {
    return v.id === resolved.id;
  }
  if (isCons(resolved)) {
    return occursCheck(v, resolved.head, s) || occursCheck(v, resolved.tail, s);
  }
  if (isCompound(resolved)) {
    return resolved.args.some((arg) => occursCheck(v, arg, s));
  }
  return false;
}

/**
 * Extends a substitution by binding a variable to a value, with an occurs check.
 */
export function extendSubst(v: Var, val: Term, s: Subst): Subst | null {
  if (occursCheck(v, val, s)) {
    return null;
  }
  const s2 = new Map(s);
  s2.set(v.id, val);
  return s2;
}

/**
 * The core unification algorithm. It attempts to make two terms structurally
 * equivalent, returning the extended substitution or `null`.
 */
export function unify(u: Term, v: Term, s: Subst): Subst | null {
  const uWalked = walk(u, s);
  const vWalked = walk(v, s);

  if (uWalked === vWalked) {
    return s;
  }

  if (isVar(uWalked)) {
    if (isVar(vWalked) && uWalked.id === vWalked.id) return s;
    return extendSubst(uWalked, vWalked, s);
  }
  if (isVar(vWalked)) return extendSubst(vWalked, uWalked, s);

  // Literals only unify with an identical literal, checked above.
  if (typeof uWalked !== "object" || typeof vWalked !== "object") {
    return null;
  }

  if (isNil(uWalked)) return isNil(vWalked) ? s : null;

  if (isAtom(uWalked)) {
    return isAtom(vWalked) && uWalked.name === vWalked.name ? s : null;
  }

  if (isCons(uWalked)) {
    if (!isCons(vWalked)) return null;
    const s1 = unify(uWalked.head, vWalked.head, s);
    if (s1 === null) return null;
    return unify(uWalked.tail, vWalked.tail, s1);
  }

  if (
    isCompound(uWalked) &&
    isCompound(vWalked) &&
    uWalked.functor === vWalked.functor
  ) {
    return unifyAll(uWalked.args, vWalked.args, s);
  }

  return null;
}

/**
 * Unifies two argument sequences position by position. Sequences of
 * different lengths never unify.
 */
export function unifyAll(
  us: readonly Term[],
  vs: readonly Term[],
  s: Subst,
): Subst | null {
  if (us.length !== vs.length) return null;
  let current: Subst | null = s;
  for (let i = 0; i < us.length; i++) {
    current = unify(us[i], vs[i], current);
    if (current === null) return null;
  }
  return current;
}
