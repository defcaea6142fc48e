import { parseProgram, parseQuery } from "../parser/parser.js";
import { assembleClause } from "./clause.js";
import type { Clause } from "./clause.js";
import { compileQuery } from "./compile.js";
import type { CompiledQuery } from "./types.js";

export * from "./types.js";
export * from "./compile.js";
export * from "./clause.js";

/**
 * Parses program text and assembles one clause per fact or rule, in
 * declaration order.
 */
export function compileProgram(text: string): Clause[] {
  return parseProgram(text).map(assembleClause);
}

export function compileQueryText(text: string): CompiledQuery {
  return compileQuery(parseQuery(text));
}
