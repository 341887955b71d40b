/**
 * Policy Gate — Condition Interpreter
 *
 * Compiles raw condition input (expression strings or structured objects)
 * into `RuleCondition` trees and evaluates them against a context.
 * Evaluation is strict: comparing against a missing attribute or a value
 * of the wrong type raises EvaluationError instead of returning false.
 */

import { isDeepStrictEqual } from "node:util";
import { ConditionSyntaxError, ConfigurationError, EvaluationError } from "./errors.js";
import { parseCondition } from "./expression/parser.js";
import type { ConditionLiteral, EvaluationContext, RuleCondition } from "./types.js";

// ─── Attribute Lookup ──────────────────────────────────────────────────────────

export type AttributeLookup = { found: true; value: unknown } | { found: false };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function resolve(obj: Record<string, unknown>, parts: string[]): AttributeLookup {
  // Longest flat key first, so `{ "resource.type": "x" }` wins over nesting
  for (let i = parts.length; i >= 1; i--) {
    const key = parts.slice(0, i).join(".");
    if (!Object.hasOwn(obj, key)) continue;
    const value = obj[key];
    if (i === parts.length) return { found: true, value };
    if (isRecord(value)) {
      const nested = resolve(value, parts.slice(i));
      if (nested.found) return nested;
    }
  }
  return { found: false };
}

/** Look up a dotted attribute path. */
export function getAttribute(context: EvaluationContext, path: string): AttributeLookup {
  return resolve(context, path.split("."));
}

function requireAttribute(context: EvaluationContext, field: string): unknown {
  const lookup = getAttribute(context, field);
  if (!lookup.found || lookup.value === undefined) {
    throw new EvaluationError(`missing attribute '${field}'`, field);
  }
  return lookup.value;
}

function requireNumber(context: EvaluationContext, field: string): number {
  const value = requireAttribute(context, field);
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new EvaluationError(`attribute '${field}' is ${describeType(value)}, expected number`, field);
  }
  return value;
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return `a ${typeof value}`;
}

// ─── Evaluation ────────────────────────────────────────────────────────────────

/**
 * Evaluate a condition against a context.
 * @throws EvaluationError when an attribute is missing or mistyped.
 */
export function evaluateCondition(condition: RuleCondition, context: EvaluationContext): boolean {
  switch (condition.type) {
    case "field_equals":
      return requireAttribute(context, condition.field) === condition.value;
    case "field_not_equals":
      return requireAttribute(context, condition.field) !== condition.value;
    case "field_gt":
      return requireNumber(context, condition.field) > condition.value;
    case "field_gte":
      return requireNumber(context, condition.field) >= condition.value;
    case "field_lt":
      return requireNumber(context, condition.field) < condition.value;
    case "field_lte":
      return requireNumber(context, condition.field) <= condition.value;
    case "field_contains": {
      const val = requireAttribute(context, condition.field);
      if (typeof val === "string") return val.includes(String(condition.value));
      if (Array.isArray(val)) return val.includes(condition.value);
      throw new EvaluationError(
        `attribute '${condition.field}' is ${describeType(val)}, expected string or array`,
        condition.field,
      );
    }
    case "field_matches": {
      const val = requireAttribute(context, condition.field);
      if (typeof val !== "string") {
        throw new EvaluationError(
          `attribute '${condition.field}' is ${describeType(val)}, expected string`,
          condition.field,
        );
      }
      return new RegExp(condition.pattern).test(val);
    }
    case "field_in": {
      const val = toLiteral(requireAttribute(context, condition.field));
      return val !== undefined && condition.values.includes(val);
    }
    case "field_not_in": {
      const val = toLiteral(requireAttribute(context, condition.field));
      return val === undefined || !condition.values.includes(val);
    }
    case "field_exists": {
      const lookup = getAttribute(context, condition.field);
      return lookup.found && lookup.value !== undefined;
    }
    case "field_not_exists": {
      const lookup = getAttribute(context, condition.field);
      return !lookup.found || lookup.value === undefined;
    }
    case "attribute_equals":
      return isDeepStrictEqual(
        requireAttribute(context, condition.field),
        requireAttribute(context, condition.otherField),
      );
    case "attribute_not_equals":
      return !isDeepStrictEqual(
        requireAttribute(context, condition.field),
        requireAttribute(context, condition.otherField),
      );
    case "and":
      return condition.conditions.every((c) => evaluateCondition(c, context));
    case "or":
      return condition.conditions.some((c) => evaluateCondition(c, context));
    case "not":
      return !evaluateCondition(condition.condition, context);
    case "always":
      return true;
  }
}

/** Non-literal values never equal a literal list member. */
function toLiteral(value: unknown): ConditionLiteral | undefined {
  return isLiteral(value) ? value : undefined;
}

// ─── Compilation ───────────────────────────────────────────────────────────────

const FIELD_LITERAL_TYPES = ["field_equals", "field_not_equals", "field_contains"] as const;
const FIELD_NUMBER_TYPES = ["field_gt", "field_gte", "field_lt", "field_lte"] as const;
const FIELD_LIST_TYPES = ["field_in", "field_not_in"] as const;
const FIELD_ONLY_TYPES = ["field_exists", "field_not_exists"] as const;
const ATTRIBUTE_TYPES = ["attribute_equals", "attribute_not_equals"] as const;

function includes<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((item) => item === value);
}

function isLiteral(value: unknown): value is ConditionLiteral {
  return value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function requireString(raw: Record<string, unknown>, key: string, path: string): string {
  const value = raw[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigurationError(`condition at ${path} requires a non-empty string "${key}"`);
  }
  return value;
}

/**
 * Compile raw condition input into a validated `RuleCondition`.
 * Strings are parsed as expressions; objects are checked structurally.
 * @throws ConfigurationError on malformed conditions.
 */
export function compileCondition(raw: unknown, path = "condition"): RuleCondition {
  if (typeof raw === "string") {
    try {
      return compileCondition(parseCondition(raw), path);
    } catch (err) {
      if (err instanceof ConditionSyntaxError) {
        throw new ConfigurationError(`invalid condition expression: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  const type = isRecord(raw) && !Array.isArray(raw) ? raw.type : undefined;
  if (!isRecord(raw) || typeof type !== "string") {
    throw new ConfigurationError(`condition at ${path} must be an expression string or an object with a "type"`);
  }

  if (includes(FIELD_LITERAL_TYPES, type)) {
    const field = requireString(raw, "field", path);
    const value = raw.value;
    if (!isLiteral(value)) {
      throw new ConfigurationError(`condition at ${path} requires a literal "value"`);
    }
    return { type, field, value };
  }

  if (includes(FIELD_NUMBER_TYPES, type)) {
    const field = requireString(raw, "field", path);
    const value = raw.value;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ConfigurationError(`condition at ${path} requires a numeric "value"`);
    }
    return { type, field, value };
  }

  if (includes(FIELD_LIST_TYPES, type)) {
    const field = requireString(raw, "field", path);
    const values = raw.values;
    if (!Array.isArray(values) || !values.every(isLiteral)) {
      throw new ConfigurationError(`condition at ${path} requires a "values" array of literals`);
    }
    return { type, field, values: [...values] };
  }

  if (includes(FIELD_ONLY_TYPES, type)) {
    return { type, field: requireString(raw, "field", path) };
  }

  if (includes(ATTRIBUTE_TYPES, type)) {
    return {
      type,
      field: requireString(raw, "field", path),
      otherField: requireString(raw, "otherField", path),
    };
  }

  switch (type) {
    case "field_matches": {
      const field = requireString(raw, "field", path);
      const pattern = requireString(raw, "pattern", path);
      try {
        new RegExp(pattern);
      } catch (err) {
        throw new ConfigurationError(`condition at ${path} has an invalid pattern /${pattern}/`, { cause: err });
      }
      return { type, field, pattern };
    }
    case "and":
    case "or": {
      const conditions = raw.conditions;
      if (!Array.isArray(conditions) || conditions.length === 0) {
        throw new ConfigurationError(`condition at ${path} requires a non-empty "conditions" array`);
      }
      return {
        type,
        conditions: conditions.map((c: unknown, i) => compileCondition(c, `${path}.conditions[${i}]`)),
      };
    }
    case "not":
      return { type, condition: compileCondition(raw.condition, `${path}.condition`) };
    case "always":
      return { type };
    default:
      throw new ConfigurationError(`condition at ${path} has unknown type "${type}"`);
  }
}

// ─── Rendering ─────────────────────────────────────────────────────────────────

/** JSON quoting, except \b and \f, which condition strings read literally. */
function renderString(value: string): string {
  return JSON.stringify(value).replace(/\\(.)/g, (escape, ch: string) => {
    if (ch === "b") return "\\u0008";
    if (ch === "f") return "\\u000c";
    return escape;
  });
}

function renderLiteral(value: ConditionLiteral): string {
  return typeof value === "string" ? renderString(value) : JSON.stringify(value);
}

function renderOperand(condition: RuleCondition): string {
  const text = describeCondition(condition);
  return condition.type === "and" || condition.type === "or" ? `(${text})` : text;
}

/** Render a condition back to expression syntax. */
export function describeCondition(condition: RuleCondition): string {
  switch (condition.type) {
    case "field_equals":
      return `${condition.field} = ${renderLiteral(condition.value)}`;
    case "field_not_equals":
      return `${condition.field} != ${renderLiteral(condition.value)}`;
    case "field_gt":
      return `${condition.field} > ${condition.value}`;
    case "field_gte":
      return `${condition.field} >= ${condition.value}`;
    case "field_lt":
      return `${condition.field} < ${condition.value}`;
    case "field_lte":
      return `${condition.field} <= ${condition.value}`;
    case "field_contains":
      return `${condition.field} CONTAINS ${renderLiteral(condition.value)}`;
    case "field_matches":
      return `${condition.field} MATCHES ${renderString(condition.pattern)}`;
    case "field_in":
      return `${condition.field} IN (${condition.values.map(renderLiteral).join(", ")})`;
    case "field_not_in":
      return `${condition.field} NOT IN (${condition.values.map(renderLiteral).join(", ")})`;
    case "field_exists":
      return `${condition.field} EXISTS`;
    case "field_not_exists":
      return `${condition.field} NOT EXISTS`;
    case "attribute_equals":
      return `${condition.field} = ${condition.otherField}`;
    case "attribute_not_equals":
      return `${condition.field} != ${condition.otherField}`;
    case "and":
      return condition.conditions.map(renderOperand).join(" AND ");
    case "or":
      return condition.conditions.map(renderOperand).join(" OR ");
    case "not":
      return `NOT ${renderOperand(condition.condition)}`;
    case "always":
      return "TRUE";
  }
}
