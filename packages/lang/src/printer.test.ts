import { atom, compound, cons, lvar, logicList, nil, reify, resetVarCounter } from "@clausal/logic";
import type { Term } from "@clausal/logic";
import { beforeEach, describe, expect, it } from "vitest";
import { compileTerm } from "./compiler/index.js";
import { parseTerm } from "./parser/parser.js";
import { formatSolution, unparse } from "./printer.js";

const noRelations = {
  relation(symbol: string): never {
    throw new Error(`unexpected call to ${symbol}`);
  },
};

function readTerm(text: string): Term {
  return compileTerm(parseTerm(text)).evaluate(noRelations, [], new Map());
}

describe("unparse", () => {
  beforeEach(() => resetVarCounter());

  it("should print scalars", () => {
    expect(unparse(42)).toBe("42");
    expect(unparse("hi")).toBe('"hi"');
    expect(unparse(atom("Red"))).toBe("Red");
  });

  it("should print proper lists with brackets", () => {
    expect(unparse(nil)).toBe("[]");
    expect(unparse(logicList(1, atom("A"), "b"))).toBe('[1, A, "b"]');
    expect(unparse(logicList(logicList(1), nil))).toBe("[[1], []]");
  });

  it("should print improper lists as Cons cells", () => {
    expect(unparse(cons(1, lvar("t")))).toBe("(Cons 1 t_0)");
    expect(unparse(cons(1, cons(2, 3)))).toBe("(Cons 1 (Cons 2 3))");
  });

  it("should print compounds in prefix form", () => {
    expect(unparse(compound("Pair", [1, compound("Box", [atom("Red")])]))).toBe(
      "(Pair 1 (Box Red))",
    );
  });

  it("should print reified variables by their display name", () => {
    const x = lvar("x");
    const y = lvar("y");
    expect(unparse(reify(compound("Pair", [y, cons(x, y)]), new Map()))).toBe(
      "(Pair _.0 (Cons _.1 _.0))",
    );
  });

  it("should read back what it prints", () => {
    for (const text of [
      '(Pair 1 [A, "s", (Cons 2 Nil)])',
      "[[], [1, 2], (Box [])]",
      '(Tree (Leaf 1) (Node "x" []))',
    ]) {
      const term = readTerm(text);
      expect(readTerm(unparse(term))).toEqual(term);
    }
    expect(unparse(readTerm('(Pair 1 [A, "s", (Cons 2 Nil)])'))).toBe(
      '(Pair 1 [A, "s", [2]])',
    );
  });
});

describe("formatSolution", () => {
  it("should join sorted bindings", () => {
    expect(formatSolution({ y: 2, x: logicList(1) })).toBe("x: [1]; y: 2");
  });

  it("should print an empty solution as an empty line", () => {
    expect(formatSolution({})).toBe("");
  });
});
