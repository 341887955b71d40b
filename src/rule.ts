/**
 * Policy Gate — Rule
 *
 * A single weighted, severity-classified predicate over context attributes.
 * Rules are validated and deep-frozen on construction.
 */

import { compileCondition, evaluateCondition } from "./conditions.js";
import { ConfigurationError, EvaluationError } from "./errors.js";
import { CATEGORIES, EFFECTS, SEVERITIES } from "./types.js";
import type {
  EvaluationContext,
  RuleCategory,
  RuleCondition,
  RuleDefinition,
  RuleEffect,
  RulePredicate,
  RuleSeverity,
} from "./types.js";

export type RuleInput = {
  id: string;
  description?: string;
  category?: string;
  severity: string;
  weight: number;
  critical?: boolean;
  effect?: string;
  message?: string;
  /** Expression string or structured condition object. */
  condition?: unknown;
  /** Programmatic predicate; mutually exclusive with `condition`. */
  predicate?: RulePredicate;
};

function isOneOf<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((item) => item === value);
}

export function isSeverity(value: string): value is RuleSeverity {
  return isOneOf(SEVERITIES, value);
}

export function isCategory(value: string): value is RuleCategory {
  return isOneOf(CATEGORIES, value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class Rule {
  readonly id: string;
  readonly description: string;
  readonly category: RuleCategory;
  readonly severity: RuleSeverity;
  readonly weight: number;
  readonly critical: boolean;
  readonly effect: RuleEffect;
  readonly message?: string;
  readonly condition?: RuleCondition;
  private readonly predicate: RulePredicate;

  constructor(input: RuleInput) {
    if (typeof input.id !== "string" || input.id.trim() === "") {
      throw new ConfigurationError("rule id must be a non-empty string");
    }
    const ruleId = input.id;

    const severity = input.severity;
    if (!isSeverity(severity)) {
      throw new ConfigurationError(
        `invalid severity "${severity}" (expected one of ${SEVERITIES.join(", ")})`,
        { ruleId },
      );
    }
    const category = input.category ?? "general";
    if (!isCategory(category)) {
      throw new ConfigurationError(
        `invalid category "${category}" (expected one of ${CATEGORIES.join(", ")})`,
        { ruleId },
      );
    }
    const effect = input.effect ?? "deny";
    if (!isOneOf(EFFECTS, effect)) {
      throw new ConfigurationError(`invalid effect "${effect}" (expected deny or allow)`, { ruleId });
    }
    const weight = input.weight;
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight < 0) {
      throw new ConfigurationError(`weight must be a finite number >= 0, got ${String(weight)}`, { ruleId });
    }
    const critical = input.critical ?? false;
    if (critical && effect === "allow") {
      throw new ConfigurationError("allow rules cannot be critical", { ruleId });
    }

    if (input.predicate && input.condition !== undefined) {
      throw new ConfigurationError("set either a condition or a predicate, not both", { ruleId });
    }
    if (input.predicate) {
      this.predicate = input.predicate;
    } else if (input.condition !== undefined) {
      let condition: RuleCondition;
      try {
        condition = deepFreeze(compileCondition(input.condition));
      } catch (err) {
        if (err instanceof ConfigurationError) {
          throw new ConfigurationError(err.message, { ruleId, cause: err });
        }
        throw err;
      }
      this.condition = condition;
      this.predicate = (context) => evaluateCondition(condition, context);
    } else {
      throw new ConfigurationError("a condition or predicate is required", { ruleId });
    }

    this.id = ruleId;
    this.description = input.description ?? "";
    this.category = category;
    this.severity = severity;
    this.weight = weight;
    this.critical = critical;
    this.effect = effect;
    this.message = input.message;
    Object.freeze(this);
  }

  /** Build a rule from a serializable definition. */
  static fromDefinition(definition: RuleDefinition): Rule {
    return new Rule(definition);
  }

  /**
   * Decide whether the rule matches the context.
   * @throws EvaluationError when the predicate cannot be evaluated.
   */
  evaluate(context: EvaluationContext): boolean {
    const result = this.predicate(context);
    if (typeof result !== "boolean") {
      throw new EvaluationError(`predicate returned ${typeof result}, expected boolean`);
    }
    return result;
  }

  toDefinition(): RuleDefinition {
    return {
      id: this.id,
      description: this.description,
      category: this.category,
      severity: this.severity,
      weight: this.weight,
      critical: this.critical,
      effect: this.effect,
      ...(this.message !== undefined ? { message: this.message } : {}),
      ...(this.condition ? { condition: this.condition } : {}),
    };
  }
}
