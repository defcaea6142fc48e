import type {
  CallNode,
  ClauseNode,
  QueryNode,
  TermNode,
} from "../ast.js";
import { createSyntaxError } from "../errors.js";
import { Tokenizer } from "./tokenizer.js";
import type { Token, TokenType } from "./types.js";

const TERM_START: ReadonlySet<TokenType> = new Set<TokenType>([
  "LPAREN",
  "LBRACKET",
  "SYMBOL",
  "VARIABLE",
  "ANONVAR",
  "NUMBER",
  "STRING",
]);

/**
 * Parser for programs and queries
 *
 * Grammar:
 *   program   = rule* EOF
 *   query     = calls EOF
 *   rule      = predicate ('<-' calls)? '.'
 *   predicate = SYMBOL term*
 *   calls     = call (',' call)*
 *   call      = SYMBOL term*
 *   term      = '(' SYMBOL term* ')' | '[' (term (',' term)*)? ']'
 *             | SYMBOL | VARIABLE | ANONVAR | NUMBER | STRING
 */
export class Parser {
  private readonly tokens: Token[];
  private readonly input: string;
  private pos: number = 0;

  constructor(input: string) {
    this.input = input;
    this.tokens = new Tokenizer(input).tokenize();
  }

  parseProgram(): ClauseNode[] {
    const clauses: ClauseNode[] = [];
    while (this.current().type !== "EOF") {
      clauses.push(this.parseClause());
    }
    return clauses;
  }

  parseQuery(): QueryNode {
    const calls = this.parseCalls();
    this.expectEnd();
    return { type: "query", calls };
  }

  parseSingleTerm(): TermNode {
    const term = this.parseTerm();
    this.expectEnd();
    return term;
  }

  private current(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    const token = this.tokens[this.pos];
    if (token.type !== "EOF") this.pos++;
    return token;
  }

  private expect(type: TokenType, description: string): Token {
    const token = this.current();
    if (token.type !== type) {
      throw createSyntaxError(
        `Expected ${description} but found ${describe(token)}`,
        this.input,
        token.position,
      );
    }
    return this.advance();
  }

  private expectEnd(): void {
    const token = this.current();
    if (token.type !== "EOF") {
      throw createSyntaxError(
        `Unconsumed input starting with ${describe(token)}`,
        this.input,
        token.position,
      );
    }
  }

  private parseClause(): ClauseNode {
    const head = this.parseCall("predicate");
    if (this.current().type === "ARROW") {
      this.advance();
      const body = this.parseCalls();
      this.expect("DOT", "'.'");
      return { type: "rule", head, body };
    }
    this.expect("DOT", "'<-' or '.'");
    return { type: "fact", head };
  }

  private parseCalls(): CallNode[] {
    const calls = [this.parseCall("call")];
    while (this.current().type === "COMMA") {
      this.advance();
      calls.push(this.parseCall("call"));
    }
    return calls;
  }

  private parseCall(description: string): CallNode {
    const symbol = this.expect("SYMBOL", `a ${description} name`);
    return {
      type: "call",
      symbol: symbol.value,
      args: this.parseTerms(),
      position: symbol.position,
    };
  }

  private parseTerms(): TermNode[] {
    const terms: TermNode[] = [];
    while (TERM_START.has(this.current().type)) {
      terms.push(this.parseTerm());
    }
    return terms;
  }

  private parseTerm(): TermNode {
    const token = this.current();
    switch (token.type) {
      case "LPAREN": {
        this.advance();
        const symbol = this.expect("SYMBOL", "a symbol after '('");
        const args = this.parseTerms();
        this.expect("RPAREN", "')'");
        return { type: "compound", symbol: symbol.value, args, position: token.position };
      }
      case "LBRACKET": {
        this.advance();
        const elements: TermNode[] = [];
        if (this.current().type !== "RBRACKET") {
          elements.push(this.parseTerm());
          while (this.current().type === "COMMA") {
            this.advance();
            elements.push(this.parseTerm());
          }
        }
        this.expect("RBRACKET", "',' or ']'");
        return { type: "list", elements, position: token.position };
      }
      case "SYMBOL":
        this.advance();
        return { type: "compound", symbol: token.value, args: [], position: token.position };
      case "VARIABLE":
        this.advance();
        return { type: "variable", name: token.value, position: token.position };
      case "ANONVAR":
        this.advance();
        return { type: "anonymous", name: token.value, position: token.position };
      case "NUMBER":
        this.advance();
        return { type: "literal", value: integerValue(token.value), position: token.position };
      case "STRING":
        this.advance();
        return { type: "literal", value: token.value, position: token.position };
      default:
        throw createSyntaxError(
          `Expected a term but found ${describe(token)}`,
          this.input,
          token.position,
        );
    }
  }
}

function integerValue(digits: string): number | bigint {
  const value = BigInt(digits);
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
}

function describe(token: Token): string {
  return token.type === "EOF" ? "end of input" : `'${token.value}'`;
}

/**
 * Parses program text into its clauses, in declaration order.
 */
export function parseProgram(text: string): ClauseNode[] {
  return new Parser(text).parseProgram();
}

/**
 * Parses query text: one or more calls separated by commas.
 */
export function parseQuery(text: string): QueryNode {
  return new Parser(text).parseQuery();
}

/**
 * Parses a single term, as written in argument position.
 */
export function parseTerm(text: string): TermNode {
  return new Parser(text).parseSingleTerm();
}
