/**
 * Policy Gate — Evaluator
 *
 * Runs a policy against a context and produces a DecisionRecord. The
 * evaluator never throws: anything that goes wrong during evaluation is
 * recorded as a critical error finding and the decision is a deny.
 */

import { DecisionRecord } from "./decision.js";
import { errorMessage } from "./errors.js";
import { getGateLogger } from "./logging.js";
import type { GateLogger } from "./logging.js";
import type { Policy } from "./policy.js";
import { aggregate, DEFAULT_THRESHOLDS, validateThresholds } from "./scorer.js";
import type { EvaluationContext, Finding, PolicyOutcome, Thresholds } from "./types.js";

/** Rule id used for failures that do not belong to any rule. */
export const EVALUATION_RULE_ID = "<evaluation>";

export type EvaluatorOptions = {
  /** Overrides the policy's own thresholds. */
  thresholds?: Thresholds;
  clock?: () => Date;
  logger?: GateLogger;
};

function isContext(value: unknown): value is EvaluationContext {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function failureOutcome(message: string): PolicyOutcome {
  const finding: Finding = {
    ruleId: EVALUATION_RULE_ID,
    description: "Evaluation could not be completed",
    category: "general",
    severity: "critical",
    weight: 100,
    critical: true,
    effect: "deny",
    priority: 0,
    matched: true,
    contribution: 100,
    overridden: false,
    error: message,
  };
  return { findings: [finding], effect: "deny", decidingRuleId: EVALUATION_RULE_ID, shortCircuited: false };
}

export class PolicyEvaluator {
  private readonly thresholds?: Thresholds;
  private readonly clock: () => Date;
  private readonly logger: GateLogger;
  private sequence = 0;

  constructor(options: EvaluatorOptions = {}) {
    if (options.thresholds) {
      this.thresholds = { ...validateThresholds(options.thresholds) };
    }
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? getGateLogger("evaluator");
  }

  /** Thresholds in effect for `policy`: evaluator override, then policy, then defaults. */
  resolveThresholds(policy: Policy): Thresholds {
    return { ...(this.thresholds ?? policy.thresholds ?? DEFAULT_THRESHOLDS) };
  }

  evaluate(policy: Policy, context: unknown): DecisionRecord {
    const thresholds = this.resolveThresholds(policy);
    const evaluatedAt = this.clock().toISOString();
    const log = this.logger.withContext({ policyId: policy.id });

    let outcome: PolicyOutcome;
    let snapshotSource: EvaluationContext = {};
    if (!isContext(context)) {
      const kind = context === null ? "null" : Array.isArray(context) ? "array" : typeof context;
      outcome = failureOutcome(`context must be an object, got ${kind}`);
    } else {
      snapshotSource = context;
      try {
        outcome = policy.evaluate(context);
      } catch (err) {
        outcome = failureOutcome(errorMessage(err));
      }
    }

    const summary = aggregate(outcome.findings, {
      thresholds,
      requireExplicitAllow: policy.options.requireExplicitAllow,
    });

    const decision = new DecisionRecord({
      policyId: policy.id,
      policyVersion: policy.version,
      verbose: policy.options.verbose,
      thresholds,
      outcome,
      summary,
      context: snapshotSource,
      evaluatedAt,
      sequence: this.sequence++,
    });

    const decisionLog = log.withContext({ decisionId: decision.decisionId });
    for (const failure of summary.errors) {
      decisionLog.withContext({ ruleId: failure.ruleId }).warn("Rule evaluation failed", { error: failure.message });
    }
    decisionLog.debug("Decision reached", {
      verdict: decision.verdict,
      score: decision.score,
      matched: decision.findings.filter((f) => f.matched).length,
      shortCircuited: decision.shortCircuited,
    });

    return decision;
  }

  /** Evaluate independent contexts against one policy snapshot. */
  evaluateMany(policy: Policy, contexts: readonly unknown[]): DecisionRecord[] {
    return contexts.map((context) => this.evaluate(policy, context));
  }
}
