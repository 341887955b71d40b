/**
 * Policy Gate — Decision Record
 *
 * Immutable, auditable result of one evaluation: the context snapshot,
 * every finding, the score, the verdict and a generated rationale.
 */

import { createHash } from "node:crypto";
import { SerializationError } from "./errors.js";
import type {
  EvaluationContext,
  Finding,
  PolicyOutcome,
  ResolvedEffect,
  ScoreSummary,
  SeverityCounts,
  StorableDecision,
  Thresholds,
  Verdict,
} from "./types.js";

const VERDICT_LABELS: Record<Verdict, string> = {
  allow: "Allowed",
  deny: "Denied",
  conditional_approval: "Conditionally approved",
};

const MAX_RATIONALE_DRIVERS = 3;

export type DecisionInit = {
  policyId: string;
  policyVersion: string;
  verbose: boolean;
  thresholds: Thresholds;
  outcome: PolicyOutcome;
  summary: ScoreSummary;
  context: EvaluationContext;
  evaluatedAt: string;
  /** Position of this evaluation within its evaluator. */
  sequence: number;
};

// ─── Helpers ───────────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Define an own, enumerable member; plain assignment would treat `__proto__` as the prototype. */
function defineEntry(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Copy plain objects (keys sorted) and arrays, preserving cycles. Dates,
 * Maps and Sets are copied so later changes by the caller do not leak in;
 * other values are shared.
 */
function snapshot(value: unknown, seen = new WeakMap<object, unknown>()): unknown {
  if (typeof value !== "object" || value === null) return value;
  const existing = seen.get(value);
  if (existing !== undefined) return existing;

  if (value instanceof Date) {
    const copy = new Date(value.getTime());
    seen.set(value, copy);
    return copy;
  }
  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    for (const [key, child] of value) copy.set(snapshot(key, seen), snapshot(child, seen));
    return copy;
  }
  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    for (const child of value) copy.add(snapshot(child, seen));
    return copy;
  }
  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) copy.push(snapshot(item, seen));
    return Object.freeze(copy);
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    seen.set(value, copy);
    for (const key of Object.keys(value).sort()) defineEntry(copy, key, snapshot(value[key], seen));
    return Object.freeze(copy);
  }
  return value;
}

function snapshotContext(context: EvaluationContext): EvaluationContext {
  const copy = snapshot(context);
  return isPlainObject(copy) ? copy : Object.freeze({});
}

/**
 * Convert a value to its JSON-safe form.
 * @throws SerializationError for values JSON cannot represent faithfully.
 */
function toJsonSafe(value: unknown, path: string, ancestors: Set<object>): unknown {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) throw new SerializationError(`non-finite number ${value}`, path);
      return value;
    case "undefined":
      return null;
    case "bigint":
    case "function":
    case "symbol":
      throw new SerializationError(`unsupported ${typeof value} value`, path);
  }
  if (value === null) return null;
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new SerializationError("invalid date", path);
    return value.toISOString();
  }
  if (typeof value !== "object") return null;
  if (ancestors.has(value)) throw new SerializationError("circular reference", path);

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown, i) => toJsonSafe(item, `${path}[${i}]`, ancestors));
    }
    if (!isPlainObject(value)) {
      throw new SerializationError(`unsupported object type ${value.constructor?.name ?? "unknown"}`, path);
    }
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (child === undefined) continue;
      defineEntry(out, key, toJsonSafe(child, `${path}.${key}`, ancestors));
    }
    return out;
  } finally {
    ancestors.delete(value);
  }
}

/** Stable, never-throwing rendering used for decision ids. */
function canonicalize(value: unknown, ancestors = new Set<object>()): string {
  if (value === undefined) return "undefined";
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "function") return "[Function]";
  if (typeof value === "symbol") return String(value);
  if (typeof value !== "object" || value === null) return JSON.stringify(value);
  if (value instanceof Date) return `Date(${value.getTime()})`;
  if (ancestors.has(value)) return "[Circular]";

  ancestors.add(value);
  let out: string;
  if (Array.isArray(value)) {
    out = `[${value.map((item: unknown) => canonicalize(item, ancestors)).join(",")}]`;
  } else if (value instanceof Map) {
    out = `Map${canonicalize([...value.entries()], ancestors)}`;
  } else if (value instanceof Set) {
    out = `Set${canonicalize([...value.values()], ancestors)}`;
  } else {
    const record: Record<string, unknown> = { ...value };
    const keys = Object.keys(record).sort();
    out = `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalize(record[k], ancestors)}`).join(",")}}`;
  }
  ancestors.delete(value);
  return out;
}

/**
 * Content hash of an evaluation: policy id and version, timestamp and the
 * canonical context. Independent of context key order.
 */
export function computeFingerprint(
  policyId: string,
  policyVersion: string,
  context: EvaluationContext,
  evaluatedAt: string,
): string {
  return createHash("sha256")
    .update(`${policyId}\u0000${policyVersion}\u0000${evaluatedAt}\u0000${canonicalize(context)}`)
    .digest("hex");
}

/** Id of one evaluation; `sequence` separates evaluations with the same fingerprint. */
export function computeDecisionId(fingerprint: string, sequence: number): string {
  const digest = createHash("sha256").update(`${fingerprint}\u0000${sequence}`).digest("hex");
  return `dec-${digest.slice(0, 24)}`;
}

// ─── Rationale ─────────────────────────────────────────────────────────────────

/** Findings that drove the score, heaviest first (ties keep evaluation order). */
export function rankDrivers(findings: readonly Finding[]): Finding[] {
  return findings
    .filter((f) => f.matched && f.effect === "deny" && !f.overridden && f.contribution > 0)
    .map((f, index) => ({ f, index }))
    .sort((a, b) => b.f.contribution - a.f.contribution || a.index - b.index)
    .map(({ f }) => f);
}

export function buildRationale(
  summary: ScoreSummary,
  findings: readonly Finding[],
  thresholds: Thresholds,
): string {
  let text =
    `${VERDICT_LABELS[summary.verdict]} with score ${summary.score}/100 ` +
    `(approve >= ${thresholds.approval}, conditional >= ${thresholds.conditional}).`;

  if (summary.criticalViolations.length > 0) {
    text += ` Critical violations: ${summary.criticalViolations.join(", ")}.`;
  }
  if (summary.errors.length > 0) {
    text += ` Evaluation errors: ${summary.errors.map((e) => e.ruleId).join(", ")}.`;
  }
  if (summary.explicitAllowMissing) {
    text += " No allow rule matched.";
  }

  const drivers = rankDrivers(findings).slice(0, MAX_RATIONALE_DRIVERS);
  if (drivers.length > 0) {
    text += ` Top findings: ${drivers.map((f) => `${f.ruleId} (${f.severity}, -${f.contribution})`).join(", ")}.`;
  } else if (!findings.some((f) => f.matched)) {
    text += " No rules matched.";
  }
  return text;
}

// ─── Record ────────────────────────────────────────────────────────────────────

export class DecisionRecord {
  readonly decisionId: string;
  readonly fingerprint: string;
  readonly policyId: string;
  readonly policyVersion: string;
  readonly verdict: Verdict;
  readonly effect: ResolvedEffect;
  readonly decidingRuleId: string | null;
  readonly score: number;
  readonly grade: string;
  readonly thresholds: Readonly<Thresholds>;
  readonly severityCounts: Readonly<SeverityCounts>;
  readonly weightBySeverity: Readonly<SeverityCounts>;
  readonly criticalViolations: readonly string[];
  readonly errors: ReadonlyArray<Readonly<{ ruleId: string; message: string }>>;
  readonly findings: ReadonlyArray<Readonly<Finding>>;
  readonly context: EvaluationContext;
  readonly rationale: string;
  readonly shortCircuited: boolean;
  readonly verbose: boolean;
  readonly evaluatedAt: string;

  constructor(init: DecisionInit) {
    const { summary, outcome } = init;
    this.context = snapshotContext(init.context);
    this.policyId = init.policyId;
    this.policyVersion = init.policyVersion;
    this.evaluatedAt = init.evaluatedAt;
    this.fingerprint = computeFingerprint(init.policyId, init.policyVersion, this.context, init.evaluatedAt);
    this.decisionId = computeDecisionId(this.fingerprint, init.sequence);
    this.verdict = summary.verdict;
    this.effect = outcome.effect;
    this.decidingRuleId = outcome.decidingRuleId;
    this.score = summary.score;
    this.grade = summary.grade;
    this.thresholds = Object.freeze({ ...init.thresholds });
    this.severityCounts = Object.freeze({ ...summary.severityCounts });
    this.weightBySeverity = Object.freeze({ ...summary.weightBySeverity });
    this.criticalViolations = Object.freeze([...summary.criticalViolations]);
    this.errors = Object.freeze(summary.errors.map((e) => Object.freeze({ ...e })));
    this.findings = Object.freeze(outcome.findings.map((f) => Object.freeze({ ...f })));
    this.rationale = buildRationale(summary, outcome.findings, init.thresholds);
    this.shortCircuited = outcome.shortCircuited;
    this.verbose = init.verbose;
    Object.freeze(this);
  }

  matchedFindings(): Finding[] {
    return this.findings.filter((f) => f.matched).map((f) => ({ ...f }));
  }

  /**
   * JSON-safe form for persistence and output. Non-matching findings are
   * kept only in verbose mode.
   * @throws SerializationError when the context holds unrepresentable values.
   */
  toStorable(options: { verbose?: boolean } = {}): StorableDecision {
    const verbose = options.verbose ?? this.verbose;
    const context = toJsonSafe(this.context, "context", new Set());
    return {
      decisionId: this.decisionId,
      fingerprint: this.fingerprint,
      policyId: this.policyId,
      policyVersion: this.policyVersion,
      verdict: this.verdict,
      effect: this.effect,
      decidingRuleId: this.decidingRuleId,
      score: this.score,
      grade: this.grade,
      thresholds: { ...this.thresholds },
      severityCounts: { ...this.severityCounts },
      weightBySeverity: { ...this.weightBySeverity },
      criticalViolations: [...this.criticalViolations],
      errors: this.errors.map((e) => ({ ...e })),
      findings: (verbose ? this.findings : this.findings.filter((f) => f.matched)).map((f) => ({ ...f })),
      context: isPlainObject(context) ? context : {},
      rationale: this.rationale,
      shortCircuited: this.shortCircuited,
      verbose,
      evaluatedAt: this.evaluatedAt,
    };
  }

  serialize(options: { verbose?: boolean } = {}): string {
    return JSON.stringify(this.toStorable(options), null, 2);
  }
}
