/**
 * Condition expressions — token types.
 */

export type TokenType =
  | "KEYWORD"
  | "IDENTIFIER"
  | "STRING"
  | "NUMBER"
  | "OPERATOR"
  | "LPAREN"
  | "RPAREN"
  | "COMMA"
  | "DOT"
  | "EOF";

export type Token = {
  type: TokenType;
  value: string;
  position: number;
};

export type ComparisonOp = "=" | "!=" | ">" | ">=" | "<" | "<=";
