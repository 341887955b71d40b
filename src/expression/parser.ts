/**
 * Condition expressions — Recursive Descent Parser
 *
 * Compiles a condition expression into the declarative `RuleCondition`
 * tree evaluated by the condition interpreter.
 *
 * Grammar:
 *   or_cond   → and_cond (OR and_cond)*
 *   and_cond  → unary (AND unary)*
 *   unary     → NOT unary | '(' or_cond ')' | primary
 *   primary   → TRUE | FALSE | field predicate
 *   predicate → EXISTS | NOT EXISTS | IN list | NOT IN list
 *             | CONTAINS literal | MATCHES string
 *             | op literal | ('=' | '!=') field
 *   field     → ident ('.' ident)*
 *   list      → '(' literal (',' literal)* ')'
 */

import { ConditionSyntaxError } from "../errors.js";
import type { ConditionLiteral, RuleCondition } from "../types.js";
import { ConditionLexer } from "./lexer.js";
import type { ComparisonOp, Token, TokenType } from "./types.js";

export class ConditionParser {
  private tokens: Token[];
  private pos = 0;
  private source: string;

  constructor(source: string) {
    this.source = source;
    this.tokens = new ConditionLexer(source).tokenize();
  }

  parse(): RuleCondition {
    if (this.peek().type === "EOF") {
      throw this.error("Empty condition");
    }
    const condition = this.parseOrCondition();
    this.expect("EOF");
    return condition;
  }

  // ---------------------------------------------------------------------------
  // Boolean structure
  // ---------------------------------------------------------------------------

  private parseOrCondition(): RuleCondition {
    const conditions = [this.parseAndCondition()];
    while (this.peekKeyword() === "OR") {
      this.consumeKeyword("OR");
      conditions.push(this.parseAndCondition());
    }
    return conditions.length === 1 ? conditions[0] : { type: "or", conditions };
  }

  private parseAndCondition(): RuleCondition {
    const conditions = [this.parseUnaryCondition()];
    while (this.peekKeyword() === "AND") {
      this.consumeKeyword("AND");
      conditions.push(this.parseUnaryCondition());
    }
    return conditions.length === 1 ? conditions[0] : { type: "and", conditions };
  }

  private parseUnaryCondition(): RuleCondition {
    if (this.peekKeyword() === "NOT") {
      this.consumeKeyword("NOT");
      return { type: "not", condition: this.parseUnaryCondition() };
    }
    if (this.peek().type === "LPAREN") {
      this.consume("LPAREN");
      const condition = this.parseOrCondition();
      this.consume("RPAREN");
      return condition;
    }
    return this.parsePrimaryCondition();
  }

  // ---------------------------------------------------------------------------
  // Predicates
  // ---------------------------------------------------------------------------

  private parsePrimaryCondition(): RuleCondition {
    const kw = this.peekKeyword();
    if (kw === "TRUE") {
      this.pos++;
      return { type: "always" };
    }
    if (kw === "FALSE") {
      this.pos++;
      return { type: "not", condition: { type: "always" } };
    }

    const field = this.parseFieldName();
    const next = this.peek();

    if (next.type === "OPERATOR") {
      this.pos++;
      return this.parseComparison(field, next.value);
    }

    switch (this.peekKeyword()) {
      case "EXISTS":
        this.pos++;
        return { type: "field_exists", field };
      case "IN":
        this.pos++;
        return { type: "field_in", field, values: this.parseLiteralList() };
      case "CONTAINS":
        this.pos++;
        return { type: "field_contains", field, value: this.parseLiteral() };
      case "MATCHES": {
        this.pos++;
        const pattern = this.consume("STRING").value;
        return { type: "field_matches", field, pattern };
      }
      case "NOT": {
        this.pos++;
        const negated = this.peekKeyword();
        if (negated === "IN") {
          this.pos++;
          return { type: "field_not_in", field, values: this.parseLiteralList() };
        }
        if (negated === "EXISTS") {
          this.pos++;
          return { type: "field_not_exists", field };
        }
        throw this.error("Expected IN or EXISTS after NOT");
      }
      default:
        throw this.error(
          `Expected operator (=, !=, >, >=, <, <=, IN, NOT IN, CONTAINS, MATCHES, EXISTS) after '${field}'`,
        );
    }
  }

  private parseComparison(field: string, op: string): RuleCondition {
    const operator = toComparisonOp(op);
    if (!operator) throw this.error(`Unknown operator '${op}'`);

    if (this.peek().type === "IDENTIFIER") {
      const otherField = this.parseFieldName();
      if (operator === "=") return { type: "attribute_equals", field, otherField };
      if (operator === "!=") return { type: "attribute_not_equals", field, otherField };
      throw this.error(`Attribute comparison supports only = and !=, got '${operator}'`);
    }

    if (operator === "=") return { type: "field_equals", field, value: this.parseLiteral() };
    if (operator === "!=") return { type: "field_not_equals", field, value: this.parseLiteral() };

    const value = this.parseNumber();
    switch (operator) {
      case ">":
        return { type: "field_gt", field, value };
      case ">=":
        return { type: "field_gte", field, value };
      case "<":
        return { type: "field_lt", field, value };
      case "<=":
        return { type: "field_lte", field, value };
    }
  }

  private parseFieldName(): string {
    let name = this.consume("IDENTIFIER").value;
    // Dotted paths: resource.tags.owner
    while (this.peek().type === "DOT") {
      this.consume("DOT");
      name += "." + this.consume("IDENTIFIER").value;
    }
    return name;
  }

  private parseLiteral(): ConditionLiteral {
    const token = this.peek();
    if (token.type === "STRING") {
      this.pos++;
      return token.value;
    }
    if (token.type === "NUMBER") {
      this.pos++;
      return Number(token.value);
    }
    if (token.type === "KEYWORD") {
      if (token.value === "TRUE" || token.value === "FALSE") {
        this.pos++;
        return token.value === "TRUE";
      }
      if (token.value === "NULL") {
        this.pos++;
        return null;
      }
    }
    throw this.error("Expected value (string, number, boolean or null)");
  }

  private parseNumber(): number {
    return Number(this.consume("NUMBER").value);
  }

  private parseLiteralList(): ConditionLiteral[] {
    this.consume("LPAREN");
    const values: ConditionLiteral[] = [];
    if (this.peek().type !== "RPAREN") {
      values.push(this.parseLiteral());
      while (this.peek().type === "COMMA") {
        this.consume("COMMA");
        values.push(this.parseLiteral());
      }
    }
    this.consume("RPAREN");
    return values;
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private peek(): Token {
    return this.tokens[this.pos] ?? { type: "EOF", value: "", position: this.source.length };
  }

  private peekKeyword(): string | null {
    const t = this.peek();
    return t.type === "KEYWORD" ? t.value : null;
  }

  private consume(expectedType: TokenType): Token {
    const token = this.peek();
    if (token.type !== expectedType) {
      throw this.error(`Expected ${expectedType}, got ${token.type} ('${token.value}')`);
    }
    this.pos++;
    return token;
  }

  private consumeKeyword(keyword: string): void {
    const token = this.peek();
    if (token.type !== "KEYWORD" || token.value !== keyword) {
      throw this.error(`Expected keyword '${keyword}', got '${token.value}'`);
    }
    this.pos++;
  }

  private expect(type: TokenType): void {
    const token = this.peek();
    if (token.type !== type) {
      throw this.error(`Expected ${type}, got ${token.type} ('${token.value}')`);
    }
  }

  private error(message: string): ConditionSyntaxError {
    return new ConditionSyntaxError(message, this.peek().position, this.source);
  }
}

function toComparisonOp(op: string): ComparisonOp | null {
  switch (op) {
    case "=":
    case "!=":
    case ">":
    case ">=":
    case "<":
    case "<=":
      return op;
    default:
      return null;
  }
}

/**
 * Parse a condition expression into a `RuleCondition`.
 * @throws ConditionSyntaxError on malformed input.
 */
export function parseCondition(source: string): RuleCondition {
  return new ConditionParser(source).parse();
}
