/**
 * Policy — Tests
 *
 * Covers: construction invariants, copy-on-write edits, evaluation order,
 * error findings, fail-fast, deny-overrides and first-applicable combining.
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError } from "./errors.js";
import { Policy } from "./policy.js";
import { Rule } from "./rule.js";
import type { RuleInput } from "./rule.js";

function makeRule(id: string, overrides: Partial<RuleInput> = {}): Rule {
  return new Rule({ id, severity: "medium", weight: 10, condition: "TRUE", ...overrides });
}

describe("Policy construction", () => {
  it("rejects duplicate rule ids before any evaluation", () => {
    expect(() => new Policy({ id: "p" }, [{ rule: makeRule("r1") }, { rule: makeRule("r1") }])).toThrow(
      'Rule "r1": duplicate rule id in policy "p"',
    );
  });

  it("defaults name, version and options", () => {
    const policy = new Policy({ id: "p" });
    expect(policy.name).toBe("p");
    expect(policy.version).toBe("1");
    expect(policy.thresholds).toBeUndefined();
    expect(policy.options).toEqual({
      failFast: false,
      verbose: false,
      combining: "deny-overrides",
      requireExplicitAllow: false,
    });
  });

  it("validates thresholds and combining", () => {
    expect(() => new Policy({ id: "p", thresholds: { approval: 50, conditional: 70 } })).toThrow(
      "thresholds must satisfy 0 <= conditional <= approval <= 100 (got conditional=70, approval=50)",
    );
    expect(() => new Policy({ id: "p" }).withThresholds({ approval: 101, conditional: 0 })).toThrow(ConfigurationError);
  });

  it("rejects non-finite priorities", () => {
    expect(() => new Policy({ id: "p" }, [{ rule: makeRule("r1"), priority: Number.NaN }])).toThrow(
      'Rule "r1": priority must be a finite number, got NaN',
    );
  });
});

describe("Policy edits", () => {
  it("addRule returns a new policy and leaves the original untouched", () => {
    const empty = new Policy({ id: "p" });
    const one = empty.addRule(makeRule("r1"), 5);
    expect(empty.size).toBe(0);
    expect(one.size).toBe(1);
    expect(one.rules()).toEqual([{ rule: one.getRule("r1"), priority: 5 }]);
    expect(() => one.addRule(makeRule("r1"))).toThrow(ConfigurationError);
  });

  it("removeRule drops a rule and fails for unknown ids", () => {
    const policy = new Policy({ id: "p" }, [{ rule: makeRule("a") }, { rule: makeRule("b") }]);
    const without = policy.removeRule("a");
    expect(without.rules().map((e) => e.rule.id)).toEqual(["b"]);
    expect(policy.size).toBe(2);
    expect(() => policy.removeRule("zzz")).toThrow('Rule "zzz": rule not found in policy "p"');
  });

  it("withOptions merges over the current options", () => {
    const policy = new Policy({ id: "p", options: { failFast: true } }).withOptions({ verbose: true });
    expect(policy.options.failFast).toBe(true);
    expect(policy.options.verbose).toBe(true);
  });
});

describe("Policy.evaluate", () => {
  it("orders by priority descending, then insertion order", () => {
    const policy = new Policy({ id: "p" }, [
      { rule: makeRule("a") },
      { rule: makeRule("b"), priority: 10 },
      { rule: makeRule("c") },
      { rule: makeRule("d"), priority: 5 },
    ]);
    expect(policy.orderedRules().map((e) => e.rule.id)).toEqual(["b", "d", "a", "c"]);
    expect(policy.evaluate({}).findings.map((f) => f.ruleId)).toEqual(["b", "d", "a", "c"]);
  });

  it("records matched and unmatched findings with contributions", () => {
    const policy = new Policy({ id: "p" }, [
      { rule: makeRule("hit", { condition: "x = 1", weight: 15 }) },
      { rule: makeRule("miss", { condition: "x = 2", weight: 10 }) },
    ]);
    const { findings, effect, decidingRuleId } = policy.evaluate({ x: 1 });
    expect(findings.map((f) => [f.ruleId, f.matched, f.contribution])).toEqual([
      ["hit", true, 15],
      ["miss", false, 0],
    ]);
    expect(effect).toBe("deny");
    expect(decidingRuleId).toBe("hit");
  });

  it("turns a failing predicate into a critical error finding", () => {
    const policy = new Policy({ id: "p" }, [
      { rule: makeRule("needs-owner", { condition: 'owner = "x"', severity: "low", weight: 7 }) },
    ]);
    const [finding] = policy.evaluate({}).findings;
    expect(finding).toMatchObject({
      ruleId: "needs-owner",
      severity: "critical",
      critical: true,
      effect: "deny",
      matched: true,
      contribution: 7,
      error: "missing attribute 'owner'",
    });
  });

  it("catches exceptions thrown by programmatic predicates", () => {
    const policy = new Policy({ id: "p" }, [
      {
        rule: new Rule({
          id: "boom",
          severity: "info",
          weight: 1,
          predicate: () => {
            throw new Error("backend unavailable");
          },
        }),
      },
    ]);
    expect(policy.evaluate({}).findings[0].error).toBe("backend unavailable");
  });

  it("stops after the first matched critical finding when failFast is set", () => {
    const policy = new Policy({ id: "p", options: { failFast: true } }, [
      { rule: makeRule("crit", { severity: "critical", critical: true }), priority: 10 },
      { rule: makeRule("later") },
    ]);
    const outcome = policy.evaluate({});
    expect(outcome.findings.map((f) => f.ruleId)).toEqual(["crit"]);
    expect(outcome.shortCircuited).toBe(true);
  });

  it("does not report a short circuit when the critical rule is last", () => {
    const policy = new Policy({ id: "p", options: { failFast: true } }, [
      { rule: makeRule("first") },
      { rule: makeRule("crit", { severity: "critical", critical: true }) },
    ]);
    const outcome = policy.evaluate({});
    expect(outcome.findings).toHaveLength(2);
    expect(outcome.shortCircuited).toBe(false);
  });

  it("evaluates every rule when failFast is off", () => {
    const policy = new Policy({ id: "p" }, [
      { rule: makeRule("crit", { severity: "critical", critical: true }) },
      { rule: makeRule("later") },
    ]);
    expect(policy.evaluate({}).findings).toHaveLength(2);
  });
});

describe("effect resolution", () => {
  const allow = makeRule("allow-dept", { effect: "allow", weight: 0, condition: "dept = owner" });
  const deny = makeRule("deny-public", { condition: "public = true", weight: 20 });
  const critical = makeRule("deny-unencrypted", {
    condition: "encrypted = false",
    severity: "critical",
    critical: true,
    weight: 30,
  });

  it("deny-overrides: a matched deny wins over a matched allow", () => {
    const policy = new Policy({ id: "p" }, [{ rule: allow, priority: 10 }, { rule: deny }]);
    const outcome = policy.evaluate({ dept: "a", owner: "a", public: true });
    expect(outcome.effect).toBe("deny");
    expect(outcome.decidingRuleId).toBe("deny-public");
  });

  it("deny-overrides: allow applies when no deny matches", () => {
    const policy = new Policy({ id: "p" }, [{ rule: allow }, { rule: deny }]);
    const outcome = policy.evaluate({ dept: "a", owner: "a", public: false });
    expect(outcome.effect).toBe("allow");
    expect(outcome.decidingRuleId).toBe("allow-dept");
  });

  it("reports not_applicable when nothing matches", () => {
    const policy = new Policy({ id: "p" }, [{ rule: allow }, { rule: deny }]);
    const outcome = policy.evaluate({ dept: "a", owner: "b", public: false });
    expect(outcome.effect).toBe("not_applicable");
    expect(outcome.decidingRuleId).toBeNull();
  });

  it("first-applicable: a higher-priority allow overrides lower non-critical denies", () => {
    const policy = new Policy({ id: "p", options: { combining: "first-applicable" } }, [
      { rule: allow, priority: 10 },
      { rule: deny },
      { rule: critical },
    ]);
    const outcome = policy.evaluate({ dept: "a", owner: "a", public: true, encrypted: false });
    expect(outcome.effect).toBe("allow");
    expect(outcome.decidingRuleId).toBe("allow-dept");

    const byId = new Map(outcome.findings.map((f) => [f.ruleId, f]));
    expect(byId.get("deny-public")).toMatchObject({ matched: true, overridden: true, contribution: 0 });
    expect(byId.get("deny-unencrypted")).toMatchObject({ matched: true, overridden: false, contribution: 30 });
  });

  it("first-applicable: deny wins at equal priority", () => {
    const policy = new Policy({ id: "p", options: { combining: "first-applicable" } }, [
      { rule: allow, priority: 10 },
      { rule: deny, priority: 10 },
    ]);
    const outcome = policy.evaluate({ dept: "a", owner: "a", public: true });
    expect(outcome.effect).toBe("deny");
    expect(outcome.decidingRuleId).toBe("deny-public");
    expect(outcome.findings.every((f) => !f.overridden)).toBe(true);
  });

  it("first-applicable: a higher-priority deny decides", () => {
    const policy = new Policy({ id: "p", options: { combining: "first-applicable" } }, [
      { rule: allow },
      { rule: deny, priority: 1 },
    ]);
    const outcome = policy.evaluate({ dept: "a", owner: "a", public: true });
    expect(outcome.effect).toBe("deny");
    expect(outcome.decidingRuleId).toBe("deny-public");
  });
});
