/**
 * Policy Gate — Policy Loader
 *
 * TypeBox schemas for policy documents, and the functions that turn JSON
 * files into validated Policy objects and evaluation contexts.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, errorMessage } from "./errors.js";
import { Policy } from "./policy.js";
import { Rule } from "./rule.js";
import type { EvaluationContext } from "./types.js";

// ─── Schemas ───────────────────────────────────────────────────────────────────

export const RuleDocumentSchema = Type.Object({
  id: Type.String({ minLength: 1, description: "Unique rule id within the policy" }),
  description: Type.Optional(Type.String()),
  category: Type.Optional(Type.String({ description: "encryption | access_control | network | ..." })),
  severity: Type.String({ description: "critical | high | medium | low | info" }),
  weight: Type.Number({ minimum: 0 }),
  critical: Type.Optional(Type.Boolean()),
  priority: Type.Optional(Type.Number({ description: "Higher runs first" })),
  effect: Type.Optional(Type.Union([Type.Literal("deny"), Type.Literal("allow")])),
  message: Type.Optional(Type.String({ description: "Remediation hint shown with the finding" })),
  condition: Type.Unknown({ description: "Expression string or structured condition object" }),
});

export type RuleDocument = Static<typeof RuleDocumentSchema>;

export const PolicyDocumentSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
  version: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  thresholds: Type.Optional(
    Type.Object({
      approval: Type.Number(),
      conditional: Type.Number(),
    }),
  ),
  options: Type.Optional(
    Type.Object({
      failFast: Type.Optional(Type.Boolean()),
      verbose: Type.Optional(Type.Boolean()),
      combining: Type.Optional(Type.Union([Type.Literal("deny-overrides"), Type.Literal("first-applicable")])),
      requireExplicitAllow: Type.Optional(Type.Boolean()),
    }),
  ),
  rules: Type.Array(Type.Unknown()),
});

export type PolicyDocument = Omit<Static<typeof PolicyDocumentSchema>, "rules"> & { rules: RuleDocument[] };

function describeFirstError(schema: TSchema, value: unknown): string {
  const first = Value.Errors(schema, value).First();
  if (!first) return "invalid document";
  return first.path ? `${first.path}: ${first.message}` : first.message;
}

// ─── Parsing ───────────────────────────────────────────────────────────────────

function parseRule(raw: unknown, index: number): { rule: Rule; priority: number } {
  if (!Value.Check(RuleDocumentSchema, raw)) {
    const id =
      typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string" && raw.id !== ""
        ? raw.id
        : undefined;
    const where = id === undefined ? `rules[${index}]` : `rule "${id}"`;
    throw new ConfigurationError(`invalid ${where}: ${describeFirstError(RuleDocumentSchema, raw)}`);
  }
  const { priority, ...input } = raw;
  return { rule: new Rule(input), priority: priority ?? 0 };
}

/**
 * Build a Policy from an already-parsed JSON document.
 * @throws ConfigurationError naming the offending rule when validation fails.
 */
export function parsePolicyDocument(raw: unknown): Policy {
  if (!Value.Check(PolicyDocumentSchema, raw)) {
    throw new ConfigurationError(`invalid policy document: ${describeFirstError(PolicyDocumentSchema, raw)}`);
  }
  const entries = raw.rules.map((rule, index) => parseRule(rule, index));
  return new Policy(
    {
      id: raw.id,
      name: raw.name,
      version: raw.version,
      description: raw.description,
      thresholds: raw.thresholds,
      options: raw.options,
    },
    entries,
  );
}

/** Render a Policy back to its document form. Predicate-only rules cannot be exported. */
export function toPolicyDocument(policy: Policy): PolicyDocument {
  const rules = policy.rules().map(({ rule, priority }): RuleDocument => {
    const definition = rule.toDefinition();
    if (!definition.condition) {
      throw new ConfigurationError("rule has a programmatic predicate and cannot be exported", { ruleId: rule.id });
    }
    return { ...definition, condition: definition.condition, priority };
  });
  return { ...policy.metadata(), rules };
}

// ─── Files ─────────────────────────────────────────────────────────────────────

async function readJson(path: string, kind: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`cannot read ${kind} file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new ConfigurationError(`${kind} file ${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function loadPolicyFile(path: string): Promise<Policy> {
  const raw = await readJson(path, "policy");
  try {
    return parsePolicyDocument(raw);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(`${path}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

export async function loadContextFile(path: string): Promise<EvaluationContext> {
  const raw = await readJson(path, "context");
  if (!isRecord(raw)) {
    throw new ConfigurationError(`context file ${path} must contain a JSON object`);
  }
  return raw;
}

export async function loadContextsFile(path: string): Promise<EvaluationContext[]> {
  const raw = await readJson(path, "contexts");
  if (!Array.isArray(raw)) {
    throw new ConfigurationError(`contexts file ${path} must contain a JSON array`);
  }
  return raw.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new ConfigurationError(`contexts file ${path}: entry ${index} must be a JSON object`);
    }
    return item;
  });
}
