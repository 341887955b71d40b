/**
 * Condition expressions — Lexical Analyzer
 *
 * Transforms condition source text into a stream of tokens.
 * Handles keywords, identifiers, strings (single/double quoted),
 * signed numbers, comparison operators and punctuation.
 *
 * String literals decode \n, \t, \r, \\, \/, both quotes and \uXXXX.
 * Any other escaped character keeps its backslash, so \d and \b reach
 * MATCHES patterns unchanged.
 */

import { ConditionSyntaxError } from "../errors.js";
import type { Token, TokenType } from "./types.js";

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "/": "/",
  "\\": "\\",
  '"': '"',
  "'": "'",
};

const KEYWORDS = new Set([
  "AND",
  "OR",
  "NOT",
  "IN",
  "CONTAINS",
  "MATCHES",
  "EXISTS",
  "TRUE",
  "FALSE",
  "NULL",
]);

export class ConditionLexer {
  private input: string;
  private pos = 0;
  private tokens: Token[] = [];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;

    while (this.pos < this.input.length) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) break;

      const ch = this.input[this.pos];

      if (ch === "'" || ch === '"') {
        this.readString(ch);
        continue;
      }

      if (this.isDigit(ch) || (ch === "-" && this.isDigit(this.peek(1) ?? ""))) {
        this.readNumber();
        continue;
      }

      // Two-character operators
      if ((ch === "!" || ch === "=" || ch === ">" || ch === "<") && this.peek(1) === "=") {
        // "==" is accepted as an alias of "="
        this.emit("OPERATOR", ch === "=" ? "=" : `${ch}=`, this.pos);
        this.pos += 2;
        continue;
      }

      if (ch === "=" || ch === ">" || ch === "<") {
        this.emit("OPERATOR", ch, this.pos);
        this.pos++;
        continue;
      }

      if (ch === "(") {
        this.emit("LPAREN", "(", this.pos);
        this.pos++;
        continue;
      }
      if (ch === ")") {
        this.emit("RPAREN", ")", this.pos);
        this.pos++;
        continue;
      }
      if (ch === ",") {
        this.emit("COMMA", ",", this.pos);
        this.pos++;
        continue;
      }
      if (ch === ".") {
        this.emit("DOT", ".", this.pos);
        this.pos++;
        continue;
      }

      if (this.isIdentStart(ch)) {
        this.readIdentifier();
        continue;
      }

      throw new ConditionSyntaxError(`Unexpected character '${ch}'`, this.pos, this.input);
    }

    this.emit("EOF", "", this.pos);
    return this.tokens;
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
      this.pos++;
    }
  }

  private readString(quote: string): void {
    const start = this.pos;
    this.pos++; // opening quote
    let value = "";
    while (this.pos < this.input.length && this.input[this.pos] !== quote) {
      if (this.input[this.pos] === "\\" && this.pos + 1 < this.input.length) {
        value += this.readEscape();
        continue;
      }
      value += this.input[this.pos];
      this.pos++;
    }
    if (this.pos >= this.input.length) {
      throw new ConditionSyntaxError("Unterminated string literal", start, this.input);
    }
    this.pos++; // closing quote
    this.emit("STRING", value, start);
  }

  /** Consumes a backslash and what follows it, returning the decoded text. */
  private readEscape(): string {
    const start = this.pos;
    const next = this.input[this.pos + 1];
    this.pos += 2;

    if (next === "u") {
      const hex = this.input.slice(this.pos, this.pos + 4);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        throw new ConditionSyntaxError("Invalid unicode escape", start, this.input);
      }
      this.pos += 4;
      return String.fromCharCode(parseInt(hex, 16));
    }

    return SIMPLE_ESCAPES[next] ?? `\\${next}`;
  }

  private readNumber(): void {
    const start = this.pos;
    let numStr = "";
    if (this.input[this.pos] === "-") {
      numStr = "-";
      this.pos++;
    }
    while (
      this.pos < this.input.length &&
      (this.isDigit(this.input[this.pos]) || this.input[this.pos] === ".")
    ) {
      numStr += this.input[this.pos];
      this.pos++;
    }
    if (Number.isNaN(Number(numStr))) {
      throw new ConditionSyntaxError(`Invalid number '${numStr}'`, start, this.input);
    }
    this.emit("NUMBER", numStr, start);
  }

  private readIdentifier(): void {
    const start = this.pos;
    let value = "";
    while (this.pos < this.input.length && this.isIdentPart(this.input[this.pos])) {
      value += this.input[this.pos];
      this.pos++;
    }
    const upper = value.toUpperCase();
    if (KEYWORDS.has(upper)) {
      this.emit("KEYWORD", upper, start);
    } else {
      this.emit("IDENTIFIER", value, start);
    }
  }

  private peek(offset: number): string | undefined {
    return this.input[this.pos + offset];
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isIdentStart(ch: string): boolean {
    return /[a-zA-Z_]/.test(ch);
  }

  private isIdentPart(ch: string): boolean {
    return /[a-zA-Z0-9_:-]/.test(ch);
  }

  private emit(type: TokenType, value: string, position: number): void {
    this.tokens.push({ type, value, position });
  }
}
