/**
 * Policy Gate — Scorer
 *
 * Folds findings into a weighted score, severity counts and a verdict.
 */

import { ConfigurationError } from "./errors.js";
import { SEVERITIES } from "./types.js";
import type { Finding, ScoreSummary, SeverityCounts, Thresholds, Verdict } from "./types.js";

export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = Object.freeze({ approval: 80, conditional: 60 });

export type AggregateOptions = {
  thresholds?: Thresholds;
  /** Deny unless at least one allow rule matched. */
  requireExplicitAllow?: boolean;
};

/**
 * Check `0 <= conditional <= approval <= 100`.
 * @throws ConfigurationError when the thresholds are out of range.
 */
export function validateThresholds(thresholds: Thresholds): Thresholds {
  const { approval, conditional } = thresholds;
  if (typeof approval !== "number" || !Number.isFinite(approval)) {
    throw new ConfigurationError(`approval threshold must be a finite number, got ${String(approval)}`);
  }
  if (typeof conditional !== "number" || !Number.isFinite(conditional)) {
    throw new ConfigurationError(`conditional threshold must be a finite number, got ${String(conditional)}`);
  }
  if (!(conditional >= 0 && conditional <= approval && approval <= 100)) {
    throw new ConfigurationError(
      `thresholds must satisfy 0 <= conditional <= approval <= 100 (got conditional=${conditional}, approval=${approval})`,
    );
  }
  return thresholds;
}

export function emptySeverityCounts(): SeverityCounts {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function scoreToGrade(score: number): string {
  if (score >= 90) return "A";
  if (score >= 80) return "B";
  if (score >= 70) return "C";
  if (score >= 60) return "D";
  return "F";
}

export function aggregate(findings: readonly Finding[], options: AggregateOptions = {}): ScoreSummary {
  const thresholds = validateThresholds(options.thresholds ?? DEFAULT_THRESHOLDS);
  const severityCounts = emptySeverityCounts();
  const weightBySeverity = emptySeverityCounts();
  const criticalViolations: string[] = [];
  const errors: Array<{ ruleId: string; message: string }> = [];
  let totalWeight = 0;
  let allowMatched = false;

  for (const finding of findings) {
    if (!finding.matched) continue;
    if (finding.error !== undefined) {
      errors.push({ ruleId: finding.ruleId, message: finding.error });
    }
    if (finding.effect === "allow") {
      allowMatched = true;
      continue;
    }
    if (finding.critical) criticalViolations.push(finding.ruleId);
    if (finding.overridden) continue;

    severityCounts[finding.severity]++;
    weightBySeverity[finding.severity] += finding.contribution;
    totalWeight += finding.contribution;
  }

  for (const severity of SEVERITIES) {
    weightBySeverity[severity] = round2(weightBySeverity[severity]);
  }

  const score = Math.max(0, round2(100 - totalWeight));
  const explicitAllowMissing = options.requireExplicitAllow === true && !allowMatched;

  let verdict: Verdict;
  if (criticalViolations.length > 0 || explicitAllowMissing) {
    verdict = "deny";
  } else if (score >= thresholds.approval) {
    verdict = "allow";
  } else if (score >= thresholds.conditional) {
    verdict = "conditional_approval";
  } else {
    verdict = "deny";
  }

  return {
    score,
    grade: scoreToGrade(score),
    verdict,
    severityCounts,
    weightBySeverity,
    criticalViolations,
    errors,
    explicitAllowMissing,
  };
}
