/**
 * Policy Loader — Tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { ConfigurationError } from "./errors.js";
import {
  loadContextFile,
  loadContextsFile,
  loadPolicyFile,
  parsePolicyDocument,
  toPolicyDocument,
} from "./loader.js";
import { Policy } from "./policy.js";
import { Rule } from "./rule.js";

const DOCUMENT = {
  id: "storage-baseline",
  name: "Storage Baseline",
  version: "2",
  thresholds: { approval: 85, conditional: 65 },
  options: { failFast: true },
  rules: [
    {
      id: "encrypted",
      severity: "critical",
      weight: 40,
      critical: true,
      category: "encryption",
      condition: "resource.encrypted = false",
    },
    {
      id: "tagged",
      severity: "low",
      weight: 5,
      priority: 10,
      message: "Add an owner tag.",
      condition: { type: "field_not_exists", field: "resource.tags.owner" },
    },
  ],
};

describe("parsePolicyDocument", () => {
  it("builds a policy with priorities, thresholds and options", () => {
    const policy = parsePolicyDocument(DOCUMENT);
    expect(policy.id).toBe("storage-baseline");
    expect(policy.version).toBe("2");
    expect(policy.thresholds).toEqual({ approval: 85, conditional: 65 });
    expect(policy.options.failFast).toBe(true);
    expect(policy.orderedRules().map((e) => [e.rule.id, e.priority])).toEqual([
      ["tagged", 10],
      ["encrypted", 0],
    ]);
    expect(policy.getRule("encrypted")?.condition).toEqual({
      type: "field_equals",
      field: "resource.encrypted",
      value: false,
    });
  });

  it("rejects documents that fail the schema", () => {
    expect(() => parsePolicyDocument({ name: "no id", rules: [] })).toThrow(/^invalid policy document: \/id/);
    expect(() => parsePolicyDocument([])).toThrow(ConfigurationError);
    expect(() => parsePolicyDocument({ id: "p", rules: [], options: { combining: "permit-overrides" } })).toThrow(
      /^invalid policy document: \/options\/combining/,
    );
  });

  it("names the rule that fails validation", () => {
    const missingSeverity = { id: "p", rules: [{ id: "r1", weight: 1, condition: "TRUE" }] };
    expect(() => parsePolicyDocument(missingSeverity)).toThrow(/^invalid rule "r1": \/severity/);

    const anonymous = { id: "p", rules: [{ severity: "low", weight: 1, condition: "TRUE" }] };
    expect(() => parsePolicyDocument(anonymous)).toThrow(/^invalid rules\[0\]: \/id/);

    const badCondition = { id: "p", rules: [{ id: "r2", severity: "low", weight: 1, condition: "x >" }] };
    expect(() => parsePolicyDocument(badCondition)).toThrow(/^Rule "r2": invalid condition expression:/);
  });

  it("rejects duplicate rule ids", () => {
    const rule = { id: "dup", severity: "low", weight: 1, condition: "TRUE" };
    expect(() => parsePolicyDocument({ id: "p", rules: [rule, rule] })).toThrow(
      'Rule "dup": duplicate rule id in policy "p"',
    );
  });
});

describe("toPolicyDocument", () => {
  it("round-trips a parsed document", () => {
    const document = toPolicyDocument(parsePolicyDocument(DOCUMENT));
    expect(document.rules.map((r) => [r.id, r.priority])).toEqual([
      ["encrypted", 0],
      ["tagged", 10],
    ]);
    expect(toPolicyDocument(parsePolicyDocument(document))).toEqual(document);
  });

  it("refuses predicate-only rules", () => {
    const policy = new Policy({ id: "p" }, [
      { rule: new Rule({ id: "code", severity: "low", weight: 1, predicate: () => true }) },
    ]);
    expect(() => toPolicyDocument(policy)).toThrow(
      'Rule "code": rule has a programmatic predicate and cannot be exported',
    );
  });
});

describe("file loaders", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "policy-gate-loader-"));
    await writeFile(join(dir, "policy.json"), JSON.stringify(DOCUMENT));
    await writeFile(join(dir, "bad-rule.json"), JSON.stringify({ id: "p", rules: [{ id: "r1" }] }));
    await writeFile(join(dir, "broken.json"), "{ not json");
    await writeFile(join(dir, "context.json"), JSON.stringify({ resource: { encrypted: true } }));
    await writeFile(join(dir, "contexts.json"), JSON.stringify([{ a: 1 }, { a: 2 }]));
    await writeFile(join(dir, "mixed.json"), JSON.stringify([{ a: 1 }, 7]));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a policy file", async () => {
    const policy = await loadPolicyFile(join(dir, "policy.json"));
    expect(policy.size).toBe(2);
  });

  it("prefixes validation errors with the file path", async () => {
    const path = join(dir, "bad-rule.json");
    await expect(loadPolicyFile(path)).rejects.toThrow(`${path}: invalid rule "r1":`);
  });

  it("reports unreadable and malformed files", async () => {
    const missing = join(dir, "missing.json");
    await expect(loadPolicyFile(missing)).rejects.toThrow(`cannot read policy file ${missing}:`);
    const broken = join(dir, "broken.json");
    await expect(loadContextFile(broken)).rejects.toThrow(`context file ${broken} is not valid JSON:`);
  });

  it("loads a single context and requires an object", async () => {
    await expect(loadContextFile(join(dir, "context.json"))).resolves.toEqual({ resource: { encrypted: true } });
    const path = join(dir, "contexts.json");
    await expect(loadContextFile(path)).rejects.toThrow(`context file ${path} must contain a JSON object`);
  });

  it("loads a list of contexts and checks every entry", async () => {
    await expect(loadContextsFile(join(dir, "contexts.json"))).resolves.toEqual([{ a: 1 }, { a: 2 }]);
    const single = join(dir, "context.json");
    await expect(loadContextsFile(single)).rejects.toThrow(`contexts file ${single} must contain a JSON array`);
    const mixed = join(dir, "mixed.json");
    await expect(loadContextsFile(mixed)).rejects.toThrow(`contexts file ${mixed}: entry 1 must be a JSON object`);
  });
});
