import { CONS_SYMBOL, isProperList, logicListToArray } from "@clausal/logic";
import type { Term } from "@clausal/logic";

/**
 * Renders a term in source syntax. Proper lists print as `[a, b]`, atoms as
 * their bare name, other compounds as `(Name arg ...)`. Unbound variables
 * print under their id, which after reification is `_.0`, `_.1`, ...
 */
export function unparse(term: Term): string {
  if (typeof term === "number" || typeof term === "bigint") return String(term);
  if (typeof term === "string") return `"${term}"`;

  switch (term.tag) {
    case "var":
      return term.id;
    case "atom":
      return term.name;
    case "nil":
      return "[]";
    case "cons":
      if (isProperList(term)) {
        return `[${logicListToArray(term).map(unparse).join(", ")}]`;
      }
      return `(${CONS_SYMBOL} ${unparse(term.head)} ${unparse(term.tail)})`;
    case "compound":
      return `(${term.functor} ${term.args.map(unparse).join(" ")})`;
  }
}

/**
 * One solution as `name: value` pairs, sorted by name and joined by `; `.
 */
export function formatSolution(solution: Readonly<Record<string, Term>>): string {
  return Object.keys(solution)
    .sort()
    .map((name) => `${name}: ${unparse(solution[name])}`)
    .join("; ");
}
