import { readFileSync } from "node:fs";
import { logicList } from "@clausal/logic";
import { describe, expect, it } from "vitest";
import { compileProgram } from "./compiler/index.js";
import { ClausalSyntaxError, UndefinedRelationError } from "./errors.js";
import { Program } from "./program.js";

function fixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), "utf8");
}

const lists = Program.fromSource(fixture("lists.clausal"));
const family = Program.fromSource(fixture("family.clausal"));

describe("Program", () => {
  describe("loading", () => {
    it("should group clauses by symbol in order of first declaration", () => {
      expect(lists.symbols()).toEqual(["Member", "Append", "Left_of", "Next_to"]);
      expect(lists.clauseCount("Member")).toBe(2);
      expect(lists.clauseCount("Nope")).toBe(0);
      expect(lists.has("Append")).toBe(true);
      expect(lists.has("Nope")).toBe(false);
    });

    it("should reject malformed program text", () => {
      expect(() => Program.fromSource("Member x")).toThrow(ClausalSyntaxError);
    });

    it("should build from already assembled clauses", () => {
      const program = Program.fromClauses(compileProgram("Digit 1. Digit 2."));
      expect(program.q("Digit d")).toEqual(["d: 1", "d: 2"]);
    });

    it("should load an empty program", () => {
      expect(Program.fromSource("").symbols()).toEqual([]);
    });

    it("should throw for an undefined relation", () => {
      expect(() => lists.relation("Nope")).toThrow(UndefinedRelationError);
      expect(() => lists.relation("Nope")).toThrow("Undefined relation 'Nope'");
    });
  });

  describe("Member", () => {
    it("should enumerate list elements in order", () => {
      expect(lists.q("Member x [5, 7]")).toEqual(["x: 5", "x: 7"]);
    });

    it("should relate an element to a fresh head", () => {
      expect(lists.q("Member x [a]")).toEqual(["a: _.0; x: _.0"]);
    });

    it("should generate list skeletons for an unbound list", () => {
      expect(lists.q("Member x a", undefined, 3)).toEqual([
        "a: (Cons _.0 _.1); x: _.0",
        "a: (Cons _.0 (Cons _.1 _.2)); x: _.0",
        "a: (Cons _.0 (Cons _.1 (Cons _.2 _.3))); x: _.0",
      ]);
    });

    it("should intersect two lists through a conjunction", () => {
      expect(lists.q("Member x [5, 7], Member x [7, 8]")).toEqual(["x: 7"]);
    });

    it("should fail on the empty list", () => {
      expect(lists.q("Member q []")).toEqual([]);
    });

    it("should accept explicit Cons cells", () => {
      expect(lists.q("Member x (Cons 5 Nil)")).toEqual(["x: 5"]);
      expect(lists.q("Member x (Cons 5 [])")).toEqual(["x: 5"]);
    });

    it("should report nothing but still count answers for anonymous variables", () => {
      expect(lists.q("Member _ [1, 2]")).toEqual(["", ""]);
    });
  });

  describe("Append", () => {
    it("should concatenate forwards", () => {
      expect(lists.q("Append [1, 2] [3] zs")).toEqual(["zs: [1, 2, 3]"]);
    });

    it("should split a list backwards", () => {
      expect(lists.q("Append xs ys [1, 2]")).toEqual([
        "xs: []; ys: [1, 2]",
        "xs: [1]; ys: [2]",
        "xs: [1, 2]; ys: []",
      ]);
    });

    it("should return reified terms from ask", () => {
      expect([...lists.ask("Append xs ys [1]", "ys")]).toEqual([
        { ys: logicList(1) },
        { ys: logicList() },
      ]);
    });
  });

  describe("Next_to", () => {
    it("should find neighbours in either direction", () => {
      expect(lists.q("Next_to 2 n [1, 2, 3]", "n").sort()).toEqual(["n: 1", "n: 3"]);
    });
  });

  describe("family", () => {
    it("should join two facts through a rule", () => {
      expect(family.q('Grandparent "Ada" c')).toEqual(['c: "Dot"', 'c: "Eve"']);
    });

    it("should find every descendant through recursion", () => {
      const names = family.q('Ancestor "Ada" d').sort();
      expect(names).toEqual(['d: "Ben"', 'd: "Cy"', 'd: "Dot"', 'd: "Eve"']);
    });

    it("should fail for a name with no children", () => {
      expect(family.q('Grandparent "Eve" c')).toEqual([]);
    });
  });

  describe("large integers", () => {
    const identity = Program.fromSource("Id x x.");

    it("should print integers beyond the safe range unchanged", () => {
      expect(identity.q("Id 9007199254740993 y")).toEqual(["y: 9007199254740993"]);
    });

    it("should not unify neighbouring large integers", () => {
      expect(identity.q("Id 9007199254740993 9007199254740992")).toEqual([]);
      expect(identity.q("Id 9007199254740993 9007199254740993")).toEqual([""]);
    });
  });

  describe("clause order", () => {
    it("should not change the set of answers", () => {
      const forward = Program.fromSource("Color Red. Color Green. Color Blue.");
      const backward = Program.fromSource("Color Blue. Color Green. Color Red.");
      expect(forward.q("Color c")).toEqual(["c: Red", "c: Green", "c: Blue"]);
      expect(backward.q("Color c").sort()).toEqual(forward.q("Color c").sort());
    });

    it("should give each clause activation its own variables", () => {
      const program = Program.fromSource("Same x x. Pair a b <- Same a 1, Same b 2.");
      expect(program.q("Pair a b")).toEqual(["a: 1; b: 2"]);
    });
  });

  describe("undefined relations", () => {
    it("should throw when a query calls an unknown predicate", () => {
      expect(() => lists.query("Nope x")).toThrow(UndefinedRelationError);
      expect(() => lists.ask("Member x [1], Nope x")).toThrow(
        "Undefined relation 'Nope'",
      );
    });

    it("should throw from a rule body only when the call is reached", () => {
      const program = Program.fromSource("Pick 1. Pick x <- Missing x.");
      expect(program.q("Pick x", undefined, 1)).toEqual(["x: 1"]);
      expect(() => program.q("Pick x")).toThrow(UndefinedRelationError);
    });
  });
});
