/**
 * Policy Gate — Core Types
 *
 * Defines the rule/policy model, the declarative condition language,
 * evaluation contexts and the shapes of findings and decisions.
 */

// ─── Enumerations ──────────────────────────────────────────────────────────────

export const SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type RuleSeverity = (typeof SEVERITIES)[number];

export const CATEGORIES = [
  "encryption",
  "access_control",
  "network",
  "integrity",
  "data_classification",
  "logging",
  "vulnerability",
  "supply_chain",
  "compute",
  "general",
] as const;
export type RuleCategory = (typeof CATEGORIES)[number];

export const EFFECTS = ["deny", "allow"] as const;
export type RuleEffect = (typeof EFFECTS)[number];

export type Verdict = "allow" | "deny" | "conditional_approval";

/** Effect resolved from matched rules, independent of scoring. */
export type ResolvedEffect = "allow" | "deny" | "not_applicable";

export type CombiningAlgorithm = "deny-overrides" | "first-applicable";

// ─── Condition Language ────────────────────────────────────────────────────────

export type ConditionLiteral = string | number | boolean | null;

export type RuleCondition =
  | { type: "field_equals"; field: string; value: ConditionLiteral }
  | { type: "field_not_equals"; field: string; value: ConditionLiteral }
  | { type: "field_gt"; field: string; value: number }
  | { type: "field_gte"; field: string; value: number }
  | { type: "field_lt"; field: string; value: number }
  | { type: "field_lte"; field: string; value: number }
  | { type: "field_contains"; field: string; value: ConditionLiteral }
  | { type: "field_matches"; field: string; pattern: string }
  | { type: "field_in"; field: string; values: ConditionLiteral[] }
  | { type: "field_not_in"; field: string; values: ConditionLiteral[] }
  | { type: "field_exists"; field: string }
  | { type: "field_not_exists"; field: string }
  | { type: "attribute_equals"; field: string; otherField: string }
  | { type: "attribute_not_equals"; field: string; otherField: string }
  | { type: "and"; conditions: RuleCondition[] }
  | { type: "or"; conditions: RuleCondition[] }
  | { type: "not"; condition: RuleCondition }
  | { type: "always" };

export type ConditionType = RuleCondition["type"];

// ─── Context ───────────────────────────────────────────────────────────────────

/**
 * Attributes under evaluation. Conventionally partitioned into
 * `subject`, `resource`, `environment` and `action`, but any flat or
 * nested object is accepted.
 */
export type EvaluationContext = Readonly<Record<string, unknown>>;

export type RulePredicate = (context: EvaluationContext) => boolean;

// ─── Rules & Policies ──────────────────────────────────────────────────────────

export type RuleDefinition = {
  id: string;
  description: string;
  category: RuleCategory;
  severity: RuleSeverity;
  weight: number;
  critical: boolean;
  effect: RuleEffect;
  message?: string;
  /** Declarative condition; absent when the rule was built from a predicate. */
  condition?: RuleCondition;
};

export type Thresholds = {
  approval: number;
  conditional: number;
};

export type PolicyOptions = {
  /** Stop at the first matched critical deny finding. */
  failFast: boolean;
  /** Keep non-matching findings in the storable decision. */
  verbose: boolean;
  combining: CombiningAlgorithm;
  /** Deny unless at least one allow rule matched. */
  requireExplicitAllow: boolean;
};

export type PolicyMetadata = {
  id: string;
  name?: string;
  version?: string;
  description?: string;
  thresholds?: Thresholds;
  options?: Partial<PolicyOptions>;
};

// ─── Evaluation Output ─────────────────────────────────────────────────────────

export type Finding = {
  ruleId: string;
  description: string;
  category: RuleCategory;
  severity: RuleSeverity;
  weight: number;
  critical: boolean;
  effect: RuleEffect;
  priority: number;
  matched: boolean;
  /** Weight counted into the score (0 for allow rules, misses and overrides). */
  contribution: number;
  overridden: boolean;
  message?: string;
  error?: string;
};

export type PolicyOutcome = {
  findings: Finding[];
  effect: ResolvedEffect;
  decidingRuleId: string | null;
  shortCircuited: boolean;
};

export type SeverityCounts = Record<RuleSeverity, number>;

export type ScoreSummary = {
  score: number;
  grade: string;
  verdict: Verdict;
  severityCounts: SeverityCounts;
  weightBySeverity: SeverityCounts;
  criticalViolations: string[];
  errors: Array<{ ruleId: string; message: string }>;
  explicitAllowMissing: boolean;
};

/** JSON-safe form of a decision, as persisted and printed. */
export type StorableDecision = {
  decisionId: string;
  /** Content hash shared by evaluations of the same input at the same time. */
  fingerprint: string;
  policyId: string;
  policyVersion: string;
  verdict: Verdict;
  effect: ResolvedEffect;
  decidingRuleId: string | null;
  score: number;
  grade: string;
  thresholds: Thresholds;
  severityCounts: SeverityCounts;
  weightBySeverity: SeverityCounts;
  criticalViolations: string[];
  errors: Array<{ ruleId: string; message: string }>;
  findings: Finding[];
  context: Record<string, unknown>;
  rationale: string;
  shortCircuited: boolean;
  verbose: boolean;
  evaluatedAt: string;
};

// ─── Storage Interface ─────────────────────────────────────────────────────────

export type DecisionFilter = {
  policyId?: string;
  verdict?: Verdict;
  limit?: number;
};

export interface DecisionStore {
  initialize(): Promise<void>;
  save(decision: StorableDecision): Promise<void>;
  getById(id: string): Promise<StorableDecision | null>;
  list(filter?: DecisionFilter): Promise<StorableDecision[]>;
  count(): Promise<number>;
  delete(id: string): Promise<boolean>;
  close(): Promise<void>;
}
