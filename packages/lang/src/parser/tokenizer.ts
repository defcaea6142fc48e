import { createSyntaxError } from "../errors.js";
import type { Token, TokenType } from "./types.js";

const WORD_CHAR = /\w/;

/**
 * Tokenizer for program and query text.
 * Whitespace and `#` comments (to end of line) separate tokens.
 */
export class Tokenizer {
  private readonly input: string;
  private pos: number = 0;
  private tokens: Token[] = [];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    while (this.pos < this.input.length) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.input.length) break;

      const char = this.input[this.pos];

      if (this.input.startsWith("<-", this.pos)) {
        this.addToken("ARROW", "<-");
        continue;
      }

      switch (char) {
        case "(": this.addToken("LPAREN", char); continue;
        case ")": this.addToken("RPAREN", char); continue;
        case "[": this.addToken("LBRACKET", char); continue;
        case "]": this.addToken("RBRACKET", char); continue;
        case ",": this.addToken("COMMA", char); continue;
        case ".": this.addToken("DOT", char); continue;
        case '"': this.readString(); continue;
      }

      if (/[0-9]/.test(char)) {
        this.readWhile("NUMBER", /[0-9]/);
        continue;
      }
      if (/[A-Z]/.test(char)) {
        this.readWhile("SYMBOL", WORD_CHAR);
        continue;
      }
      if (/[a-z]/.test(char)) {
        this.readWhile("VARIABLE", WORD_CHAR);
        continue;
      }
      if (char === "_") {
        this.readWhile("ANONVAR", WORD_CHAR);
        continue;
      }

      throw createSyntaxError(`Unexpected character '${char}'`, this.input, this.pos);
    }

    this.tokens.push({ type: "EOF", value: "", position: this.pos });
    return this.tokens;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.input.length) {
      const char = this.input[this.pos];
      if (/\s/.test(char)) {
        this.pos++;
      } else if (char === "#") {
        const end = this.input.indexOf("\n", this.pos);
        this.pos = end === -1 ? this.input.length : end + 1;
      } else {
        return;
      }
    }
  }

  private readWhile(type: TokenType, pattern: RegExp): void {
    const start = this.pos;
    this.pos++;
    while (this.pos < this.input.length && pattern.test(this.input[this.pos])) {
      this.pos++;
    }
    this.tokens.push({ type, value: this.input.slice(start, this.pos), position: start });
  }

  private readString(): void {
    const start = this.pos;
    const end = this.input.indexOf('"', start + 1);
    if (end === -1) {
      throw createSyntaxError("Unterminated string", this.input, start);
    }
    this.tokens.push({ type: "STRING", value: this.input.slice(start + 1, end), position: start });
    this.pos = end + 1;
  }

  private addToken(type: TokenType, value: string): void {
    this.tokens.push({ type, value, position: this.pos });
    this.pos += value.length;
  }
}
