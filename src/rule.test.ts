/**
 * Rule — Tests
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError, EvaluationError } from "./errors.js";
import { Rule } from "./rule.js";
import type { RuleInput } from "./rule.js";

function makeInput(overrides: Partial<RuleInput> = {}): RuleInput {
  return {
    id: "r1",
    severity: "high",
    weight: 10,
    condition: 'region != "us-west-2"',
    ...overrides,
  };
}

describe("Rule construction", () => {
  it("applies defaults", () => {
    const rule = new Rule(makeInput());
    expect(rule.category).toBe("general");
    expect(rule.effect).toBe("deny");
    expect(rule.critical).toBe(false);
    expect(rule.description).toBe("");
    expect(rule.condition).toEqual({ type: "field_not_equals", field: "region", value: "us-west-2" });
  });

  it("is frozen, including its condition", () => {
    const rule = new Rule(makeInput({ condition: { type: "field_in", field: "x", values: [1, 2] } }));
    expect(Object.isFrozen(rule)).toBe(true);
    expect(Object.isFrozen(rule.condition)).toBe(true);
  });

  it("rejects an unknown severity, naming the rule", () => {
    expect(() => new Rule(makeInput({ severity: "Critical" }))).toThrow(
      'Rule "r1": invalid severity "Critical" (expected one of critical, high, medium, low, info)',
    );
  });

  it("rejects an unknown category and effect", () => {
    expect(() => new Rule(makeInput({ category: "billing" }))).toThrow('invalid category "billing"');
    expect(() => new Rule(makeInput({ effect: "warn" }))).toThrow('invalid effect "warn" (expected deny or allow)');
  });

  it("rejects negative or non-finite weights", () => {
    expect(() => new Rule(makeInput({ weight: -1 }))).toThrow("weight must be a finite number >= 0, got -1");
    expect(() => new Rule(makeInput({ weight: Number.POSITIVE_INFINITY }))).toThrow(ConfigurationError);
    expect(() => new Rule(makeInput({ weight: Number.NaN }))).toThrow(ConfigurationError);
  });

  it("rejects critical allow rules", () => {
    expect(() => new Rule(makeInput({ effect: "allow", critical: true }))).toThrow("allow rules cannot be critical");
  });

  it("requires exactly one of condition and predicate", () => {
    expect(() => new Rule(makeInput({ condition: undefined }))).toThrow("a condition or predicate is required");
    expect(() => new Rule(makeInput({ predicate: () => true }))).toThrow(
      "set either a condition or a predicate, not both",
    );
  });

  it("reports condition errors with the rule id", () => {
    try {
      new Rule(makeInput({ id: "bad-cond", condition: "region ==" }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ ruleId: "bad-cond" });
      expect(err instanceof Error ? err.message : "").toMatch(/^Rule "bad-cond": invalid condition expression:/);
    }
  });

  it("rejects an empty id", () => {
    expect(() => new Rule(makeInput({ id: " " }))).toThrow("rule id must be a non-empty string");
  });
});

describe("Rule.evaluate", () => {
  it("evaluates a declarative condition", () => {
    const rule = new Rule(makeInput());
    expect(rule.evaluate({ region: "eu-west-1" })).toBe(true);
    expect(rule.evaluate({ region: "us-west-2" })).toBe(false);
  });

  it("evaluates a programmatic predicate", () => {
    const rule = new Rule({
      id: "p",
      severity: "low",
      weight: 1,
      predicate: (ctx) => typeof ctx.owner === "string",
    });
    expect(rule.evaluate({ owner: "team-a" })).toBe(true);
    expect(rule.evaluate({})).toBe(false);
  });

  it("raises when a predicate returns a non-boolean", () => {
    const rule = new Rule({ id: "p", severity: "low", weight: 1, predicate: (ctx) => Reflect.get(ctx, "flag") });
    expect(rule.evaluate({ flag: false })).toBe(false);
    expect(() => rule.evaluate({ flag: "yes" })).toThrow("predicate returned string, expected boolean");
  });

  it("surfaces missing attributes as EvaluationError", () => {
    const rule = new Rule(makeInput());
    expect(() => rule.evaluate({})).toThrow(EvaluationError);
  });
});

describe("Rule.toDefinition", () => {
  it("round-trips through fromDefinition", () => {
    const rule = new Rule(
      makeInput({ category: "network", critical: true, message: "Use the approved region.", severity: "critical" }),
    );
    const definition = rule.toDefinition();
    expect(definition).toEqual({
      id: "r1",
      description: "",
      category: "network",
      severity: "critical",
      weight: 10,
      critical: true,
      effect: "deny",
      message: "Use the approved region.",
      condition: { type: "field_not_equals", field: "region", value: "us-west-2" },
    });
    expect(Rule.fromDefinition(definition).toDefinition()).toEqual(definition);
  });
});
