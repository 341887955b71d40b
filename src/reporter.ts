/**
 * Policy Gate — Reporter
 *
 * Markdown rendering of a decision and summaries of batch runs.
 */

import { SEVERITIES } from "./types.js";
import type { RuleSeverity, StorableDecision, Verdict } from "./types.js";

const VERDICT_TITLES: Record<Verdict, string> = {
  allow: "✅ Allow",
  deny: "⛔ Deny",
  conditional_approval: "⚠️ Conditional Approval",
};

export function severityIcon(severity: RuleSeverity): string {
  switch (severity) {
    case "critical": return "🔴";
    case "high": return "🟠";
    case "medium": return "🟡";
    case "low": return "🔵";
    case "info": return "⚪";
  }
}

// ---------------------------------------------------------------------------
// exportMarkdown — single decision report
// ---------------------------------------------------------------------------
export function exportMarkdown(decision: StorableDecision): string {
  const lines: string[] = [];

  lines.push(`# Policy Decision — ${decision.policyId} v${decision.policyVersion}`);
  lines.push("");
  lines.push(`**Decision**: ${decision.decisionId}`);
  lines.push(`**Evaluated**: ${decision.evaluatedAt}`);
  lines.push(`**Verdict**: ${VERDICT_TITLES[decision.verdict]}`);
  lines.push(`**Score**: ${decision.score}/100 (${decision.grade})`);
  lines.push(`**Thresholds**: approve >= ${decision.thresholds.approval}, conditional >= ${decision.thresholds.conditional}`);
  lines.push("");
  lines.push(`> ${decision.rationale}`);
  lines.push("");

  const hasSeverity = SEVERITIES.some((s) => decision.severityCounts[s] > 0);
  if (hasSeverity) {
    lines.push("## Violations by Severity");
    lines.push("");
    lines.push("| Severity | Count | Weight |");
    lines.push("|----------|------:|-------:|");
    for (const s of SEVERITIES) {
      if (decision.severityCounts[s] > 0) {
        lines.push(`| ${severityIcon(s)} ${s} | ${decision.severityCounts[s]} | ${decision.weightBySeverity[s]} |`);
      }
    }
    lines.push("");
  }

  const matched = decision.findings.filter((f) => f.matched);
  if (matched.length > 0) {
    lines.push("## Findings");
    lines.push("");
    for (const f of matched) {
      const icon = f.effect === "allow" ? "✅" : f.overridden ? "⏸️" : severityIcon(f.severity);
      lines.push(`### ${icon} ${f.ruleId}`);
      lines.push("");
      if (f.description) lines.push(`- **Description**: ${f.description}`);
      lines.push(`- **Category**: ${f.category}`);
      lines.push(`- **Severity**: ${f.severity}${f.critical ? " (critical)" : ""}`);
      lines.push(`- **Effect**: ${f.effect}`);
      lines.push(`- **Weight**: ${f.contribution}/${f.weight}${f.overridden ? " (overridden)" : ""}`);
      if (f.error) lines.push(`- **Error**: ${f.error}`);
      if (f.message) lines.push(`- **Remediation**: ${f.message}`);
      lines.push("");
    }
  }

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// summarizeBatch — aggregate view over many decisions
// ---------------------------------------------------------------------------
export type BatchSummary = {
  total: number;
  verdicts: Record<Verdict, number>;
  averageScore: number;
  minScore: number;
  /** Rule ids ordered by how many decisions they contributed to, most first. */
  topRules: Array<{ ruleId: string; count: number }>;
};

const VERDICT_SEVERITY: Record<Verdict, number> = { allow: 0, conditional_approval: 1, deny: 2 };

/** The most restrictive verdict in a batch; `allow` for an empty batch. */
export function mostRestrictiveVerdict(verdicts: readonly Verdict[]): Verdict {
  return verdicts.reduce<Verdict>((worst, v) => (VERDICT_SEVERITY[v] > VERDICT_SEVERITY[worst] ? v : worst), "allow");
}

export function summarizeBatch(decisions: readonly StorableDecision[], topN = 5): BatchSummary {
  const verdicts: Record<Verdict, number> = { allow: 0, deny: 0, conditional_approval: 0 };
  const ruleCounts = new Map<string, number>();
  let scoreSum = 0;
  let minScore = 100;

  for (const d of decisions) {
    verdicts[d.verdict]++;
    scoreSum += d.score;
    minScore = Math.min(minScore, d.score);
    for (const f of d.findings) {
      if (f.matched && f.effect === "deny" && !f.overridden) {
        ruleCounts.set(f.ruleId, (ruleCounts.get(f.ruleId) ?? 0) + 1);
      }
    }
  }

  const topRules = [...ruleCounts.entries()]
    .map(([ruleId, count]) => ({ ruleId, count }))
    .sort((a, b) => b.count - a.count || a.ruleId.localeCompare(b.ruleId))
    .slice(0, topN);

  return {
    total: decisions.length,
    verdicts,
    averageScore: decisions.length > 0 ? Math.round((scoreSum / decisions.length) * 100) / 100 : 100,
    minScore,
    topRules,
  };
}
