/**
 * Parse tree produced by the parser and consumed by the compiler.
 * `position` is the character offset of the node's first token.
 */

import type { Literal } from "@clausal/logic";

export interface VariableNode {
  readonly type: "variable";
  readonly name: string;
  readonly position: number;
}

export interface AnonymousNode {
  readonly type: "anonymous";
  readonly name: string;
  readonly position: number;
}

export interface LiteralNode {
  readonly type: "literal";
  readonly value: Literal;
  readonly position: number;
}

/** A symbol with its arguments; a bare symbol has none. */
export interface CompoundNode {
  readonly type: "compound";
  readonly symbol: string;
  readonly args: readonly TermNode[];
  readonly position: number;
}

export interface ListNode {
  readonly type: "list";
  readonly elements: readonly TermNode[];
  readonly position: number;
}

export type TermNode =
  | VariableNode
  | AnonymousNode
  | LiteralNode
  | CompoundNode
  | ListNode;

/** A predicate applied to argument terms: a clause head or a call in a body. */
export interface CallNode {
  readonly type: "call";
  readonly symbol: string;
  readonly args: readonly TermNode[];
  readonly position: number;
}

export interface FactNode {
  readonly type: "fact";
  readonly head: CallNode;
}

export interface RuleNode {
  readonly type: "rule";
  readonly head: CallNode;
  readonly body: readonly CallNode[];
}

export type ClauseNode = FactNode | RuleNode;

export interface QueryNode {
  readonly type: "query";
  readonly calls: readonly CallNode[];
}
