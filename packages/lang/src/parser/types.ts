export type TokenType =
  | "SYMBOL" // Member, Cons (capitalised)
  | "VARIABLE" // x, rest (lowercase)
  | "ANONVAR" // _, _ignored
  | "NUMBER" // 42
  | "STRING" // "text"
  | "ARROW" // <-
  | "LPAREN" // (
  | "RPAREN" // )
  | "LBRACKET" // [
  | "RBRACKET" // ]
  | "COMMA" // ,
  | "DOT" // .
  | "EOF";

export interface Token {
  type: TokenType;
  value: string;
  position: number;
}
