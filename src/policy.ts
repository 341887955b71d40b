/**
 * Policy Gate — Policy
 *
 * An immutable, prioritized collection of rules. Every edit returns a new
 * Policy, so a snapshot shared between concurrent evaluations never changes
 * underneath them.
 *
 * Invariants:
 * - rules are evaluated by priority desc, then insertion order
 * - rule ids are unique within a policy
 * - a predicate failure becomes a critical, matched deny finding
 * - deny wins over allow at equal priority
 */

import { ConfigurationError, errorMessage } from "./errors.js";
import type { Rule } from "./rule.js";
import { validateThresholds } from "./scorer.js";
import type {
  EvaluationContext,
  Finding,
  PolicyMetadata,
  PolicyOptions,
  PolicyOutcome,
  ResolvedEffect,
  Thresholds,
} from "./types.js";

export const DEFAULT_POLICY_OPTIONS: Readonly<PolicyOptions> = Object.freeze({
  failFast: false,
  verbose: false,
  combining: "deny-overrides",
  requireExplicitAllow: false,
});

export type PolicyEntry = {
  readonly rule: Rule;
  readonly priority: number;
};

type SequencedEntry = PolicyEntry & { readonly sequence: number };

const byEvaluationOrder = (a: SequencedEntry, b: SequencedEntry): number => {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return a.sequence - b.sequence;
};

function resolveOptions(options: Partial<PolicyOptions> | undefined): Readonly<PolicyOptions> {
  const merged: PolicyOptions = { ...DEFAULT_POLICY_OPTIONS, ...options };
  if (merged.combining !== "deny-overrides" && merged.combining !== "first-applicable") {
    throw new ConfigurationError(
      `invalid combining algorithm "${String(merged.combining)}" (expected deny-overrides or first-applicable)`,
    );
  }
  return Object.freeze(merged);
}

export class Policy {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly thresholds?: Readonly<Thresholds>;
  readonly options: Readonly<PolicyOptions>;
  private readonly entries: readonly SequencedEntry[];
  private readonly ordered: readonly SequencedEntry[];

  constructor(metadata: PolicyMetadata, entries: ReadonlyArray<{ rule: Rule; priority?: number }> = []) {
    if (typeof metadata.id !== "string" || metadata.id.trim() === "") {
      throw new ConfigurationError("policy id must be a non-empty string");
    }
    this.id = metadata.id;
    this.name = metadata.name || metadata.id;
    this.version = metadata.version || "1";
    this.description = metadata.description ?? "";
    if (metadata.thresholds) {
      validateThresholds(metadata.thresholds);
      this.thresholds = Object.freeze({ ...metadata.thresholds });
    }
    this.options = resolveOptions(metadata.options);

    const seen = new Set<string>();
    const sequenced: SequencedEntry[] = [];
    entries.forEach((entry, sequence) => {
      const priority = entry.priority ?? 0;
      if (seen.has(entry.rule.id)) {
        throw new ConfigurationError(`duplicate rule id in policy "${this.id}"`, { ruleId: entry.rule.id });
      }
      if (!Number.isFinite(priority)) {
        throw new ConfigurationError(`priority must be a finite number, got ${priority}`, { ruleId: entry.rule.id });
      }
      seen.add(entry.rule.id);
      sequenced.push(Object.freeze({ rule: entry.rule, priority, sequence }));
    });

    this.entries = Object.freeze(sequenced);
    this.ordered = Object.freeze([...sequenced].sort(byEvaluationOrder));
    Object.freeze(this);
  }

  // ─── Copy-on-write edits ─────────────────────────────────────────────────────

  /** Return a new policy with `rule` appended at `priority`. */
  addRule(rule: Rule, priority = 0): Policy {
    return new Policy(this.metadata(), [...this.entries, { rule, priority }]);
  }

  /** Return a new policy without the rule `ruleId`. */
  removeRule(ruleId: string): Policy {
    if (!this.entries.some((e) => e.rule.id === ruleId)) {
      throw new ConfigurationError(`rule not found in policy "${this.id}"`, { ruleId });
    }
    return new Policy(
      this.metadata(),
      this.entries.filter((e) => e.rule.id !== ruleId),
    );
  }

  withOptions(options: Partial<PolicyOptions>): Policy {
    return new Policy({ ...this.metadata(), options: { ...this.options, ...options } }, this.entries);
  }

  withThresholds(thresholds: Thresholds): Policy {
    return new Policy({ ...this.metadata(), thresholds }, this.entries);
  }

  // ─── Accessors ───────────────────────────────────────────────────────────────

  get size(): number {
    return this.entries.length;
  }

  getRule(ruleId: string): Rule | undefined {
    return this.entries.find((e) => e.rule.id === ruleId)?.rule;
  }

  /** Entries in insertion order. */
  rules(): PolicyEntry[] {
    return this.entries.map(({ rule, priority }) => ({ rule, priority }));
  }

  /** Entries in evaluation order. */
  orderedRules(): PolicyEntry[] {
    return this.ordered.map(({ rule, priority }) => ({ rule, priority }));
  }

  metadata(): PolicyMetadata {
    return {
      id: this.id,
      name: this.name,
      version: this.version,
      description: this.description,
      ...(this.thresholds ? { thresholds: { ...this.thresholds } } : {}),
      options: { ...this.options },
    };
  }

  // ─── Evaluation ──────────────────────────────────────────────────────────────

  /** Evaluate every applicable rule and resolve the combined effect. */
  evaluate(context: EvaluationContext): PolicyOutcome {
    const findings: Finding[] = [];
    let shortCircuited = false;

    for (let i = 0; i < this.ordered.length; i++) {
      const { rule, priority } = this.ordered[i];
      const finding = evaluateRule(rule, priority, context);
      findings.push(finding);

      if (this.options.failFast && finding.matched && finding.critical && i < this.ordered.length - 1) {
        shortCircuited = true;
        break;
      }
    }

    const resolved =
      this.options.combining === "first-applicable" ? resolveFirstApplicable(findings) : resolveDenyOverrides(findings);

    return { ...resolved, shortCircuited };
  }
}

// ─── Per-rule evaluation ───────────────────────────────────────────────────────

function evaluateRule(rule: Rule, priority: number, context: EvaluationContext): Finding {
  const base = {
    ruleId: rule.id,
    description: rule.description,
    category: rule.category,
    weight: rule.weight,
    priority,
    overridden: false,
    ...(rule.message !== undefined ? { message: rule.message } : {}),
  };

  let matched: boolean;
  try {
    matched = rule.evaluate(context);
  } catch (err) {
    // A broken predicate must deny, never grant
    return {
      ...base,
      severity: "critical",
      critical: true,
      effect: "deny",
      matched: true,
      contribution: rule.weight,
      error: errorMessage(err),
    };
  }

  return {
    ...base,
    severity: rule.severity,
    critical: rule.critical,
    effect: rule.effect,
    matched,
    contribution: matched && rule.effect === "deny" ? rule.weight : 0,
  };
}

// ─── Effect resolution ─────────────────────────────────────────────────────────

type Resolution = { findings: Finding[]; effect: ResolvedEffect; decidingRuleId: string | null };

function resolveDenyOverrides(findings: Finding[]): Resolution {
  const deny = findings.find((f) => f.matched && f.effect === "deny");
  if (deny) return { findings, effect: "deny", decidingRuleId: deny.ruleId };
  const allow = findings.find((f) => f.matched && f.effect === "allow");
  if (allow) return { findings, effect: "allow", decidingRuleId: allow.ruleId };
  return { findings, effect: "not_applicable", decidingRuleId: null };
}

function resolveFirstApplicable(findings: Finding[]): Resolution {
  const first = findings.find((f) => f.matched);
  if (!first) return { findings, effect: "not_applicable", decidingRuleId: null };

  const level = findings.filter((f) => f.matched && f.priority === first.priority);
  const deny = level.find((f) => f.effect === "deny");
  if (deny) return { findings, effect: "deny", decidingRuleId: deny.ruleId };

  const allowed = findings.map((f) =>
    f.matched && f.effect === "deny" && !f.critical && f.priority < first.priority
      ? { ...f, overridden: true, contribution: 0 }
      : f,
  );
  return { findings: allowed, effect: "allow", decidingRuleId: first.ruleId };
}
