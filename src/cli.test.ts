/**
 * CLI — Tests
 *
 * Runs the command set in process against temp files, a fixed clock and an
 * in-memory decision store.
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, beforeEach, describe, it, expect } from "vitest";
import { EXIT_USAGE, runGateCli } from "./cli.js";
import type { GateCliDeps } from "./cli.js";
import { MemoryTransport } from "./logging.js";
import { InMemoryDecisionStore } from "./storage.js";

/** Survives `close()` so decisions stored by one run are visible to the next. */
class SharedStore extends InMemoryDecisionStore {
  override async close(): Promise<void> {}
}

const POLICY = {
  id: "bucket-policy",
  name: "Bucket Policy",
  version: "1",
  rules: [
    { id: "encrypted", severity: "critical", critical: true, weight: 30, priority: 10, condition: "encrypted = false" },
    { id: "versioned", severity: "medium", weight: 25, condition: "versioning = false" },
    { id: "public", severity: "high", weight: 10, condition: "public = true" },
  ],
};

const CLEAN = { encrypted: true, versioning: true, public: false };
const UNVERSIONED = { encrypted: true, versioning: false, public: false };
const UNENCRYPTED = { encrypted: false, versioning: true, public: false };

let dir: string;
const file = (name: string) => join(dir, name);

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "policy-gate-cli-"));
  await writeFile(file("policy.json"), JSON.stringify(POLICY));
  await writeFile(file("clean.json"), JSON.stringify(CLEAN));
  await writeFile(file("unversioned.json"), JSON.stringify(UNVERSIONED));
  await writeFile(file("unencrypted.json"), JSON.stringify(UNENCRYPTED));
  await writeFile(file("batch.json"), JSON.stringify([CLEAN, UNVERSIONED, UNENCRYPTED]));
  await writeFile(file("gate.json"), JSON.stringify({ approvalThreshold: 70 }));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("policy-gate CLI", () => {
  let out: string[];
  let err: string[];
  let store: SharedStore;
  let transport: MemoryTransport;
  let env: Record<string, string>;

  const deps = (): GateCliDeps => ({
    io: { out: (text) => out.push(text), err: (text) => err.push(text) },
    createStore: () => store,
    env,
    clock: () => new Date("2026-01-01T00:00:00.000Z"),
    transports: [transport],
  });

  const run = (...args: string[]) => runGateCli(["node", "policy-gate", ...args], deps());

  beforeEach(() => {
    out = [];
    err = [];
    store = new SharedStore();
    transport = new MemoryTransport();
    env = {};
  });

  describe("evaluate", () => {
    it("maps verdicts to exit codes", async () => {
      expect(await run("evaluate", file("policy.json"), file("clean.json"))).toBe(0);
      expect(await run("evaluate", file("policy.json"), file("unencrypted.json"))).toBe(1);
      expect(await run("evaluate", file("policy.json"), file("unversioned.json"))).toBe(2);
    });

    it("prints the decision as JSON", async () => {
      await run("evaluate", file("policy.json"), file("unversioned.json"));
      expect(out).toHaveLength(1);
      const decision: unknown = JSON.parse(out[0]);
      expect(decision).toMatchObject({
        policyId: "bucket-policy",
        verdict: "conditional_approval",
        score: 75,
        grade: "C",
        thresholds: { approval: 80, conditional: 60 },
        evaluatedAt: "2026-01-01T00:00:00.000Z",
        findings: [{ ruleId: "versioned", matched: true, contribution: 25 }],
      });
      expect(err).toEqual([]);
    });

    it("includes non-matching findings with --verbose", async () => {
      await run("evaluate", file("policy.json"), file("unversioned.json"), "--verbose");
      const decision: { findings: Array<{ ruleId: string }> } = JSON.parse(out[0]);
      expect(decision.findings.map((f) => f.ruleId)).toEqual(["encrypted", "versioned", "public"]);
    });

    it("renders markdown", async () => {
      await run("evaluate", file("policy.json"), file("unencrypted.json"), "--format", "markdown");
      const lines = out[0].split("\n");
      expect(lines[0]).toBe("# Policy Decision — bucket-policy v1");
      expect(lines).toContain("**Verdict**: ⛔ Deny");
    });

    it("applies threshold flags over the defaults", async () => {
      const code = await run("evaluate", file("policy.json"), file("unversioned.json"), "--approval-threshold", "70");
      expect(code).toBe(0);
      expect(JSON.parse(out[0])).toMatchObject({ verdict: "allow", thresholds: { approval: 70, conditional: 60 } });
    });

    it("takes thresholds from the config file", async () => {
      const code = await run("-c", file("gate.json"), "evaluate", file("policy.json"), file("unversioned.json"));
      expect(code).toBe(0);
    });

    it("lets a flag win over the environment", async () => {
      env.POLICY_GATE_APPROVAL_THRESHOLD = "70";
      const args = ["evaluate", file("policy.json"), file("unversioned.json")];
      expect(await run(...args)).toBe(0);
      expect(await run(...args, "--approval-threshold", "90")).toBe(2);
    });

    it("rejects inverted thresholds as a usage error", async () => {
      const code = await run(
        "evaluate",
        file("policy.json"),
        file("clean.json"),
        "--approval-threshold",
        "50",
        "--conditional-threshold",
        "70",
      );
      expect(code).toBe(EXIT_USAGE);
      expect(err).toEqual([
        "Error: thresholds must satisfy 0 <= conditional <= approval <= 100 (got conditional=70, approval=50)",
      ]);
    });

    it("rejects out-of-range threshold arguments", async () => {
      const code = await run("evaluate", file("policy.json"), file("clean.json"), "--approval-threshold", "120");
      expect(code).toBe(EXIT_USAGE);
      expect(err.join("\n")).toContain("Expected a number between 0 and 100.");
    });

    it("reports a missing policy file", async () => {
      const missing = file("missing.json");
      expect(await run("evaluate", missing, file("clean.json"))).toBe(EXIT_USAGE);
      expect(err).toHaveLength(1);
      expect(err[0].startsWith(`Error: cannot read policy file ${missing}:`)).toBe(true);
      expect(out).toEqual([]);
    });

    it("reports an invalid environment", async () => {
      env.POLICY_GATE_VERBOSE = "maybe";
      expect(await run("evaluate", file("policy.json"), file("clean.json"))).toBe(EXIT_USAGE);
      expect(err).toEqual(['Error: POLICY_GATE_VERBOSE must be true or false, got "maybe"']);
    });
  });

  describe("batch", () => {
    it("exits with the most restrictive verdict", async () => {
      expect(await run("batch", file("policy.json"), file("batch.json"))).toBe(1);
      const decisions: Array<{ verdict: string }> = JSON.parse(out[0]);
      expect(decisions.map((d) => d.verdict)).toEqual(["allow", "conditional_approval", "deny"]);
    });

    it("prints a summary", async () => {
      await run("batch", file("policy.json"), file("batch.json"), "--summary");
      expect(JSON.parse(out[0])).toEqual({
        policyId: "bucket-policy",
        verdict: "deny",
        total: 3,
        verdicts: { allow: 1, deny: 1, conditional_approval: 1 },
        averageScore: 81.67,
        minScore: 70,
        topRules: [
          { ruleId: "encrypted", count: 1 },
          { ruleId: "versioned", count: 1 },
        ],
      });
    });
  });

  describe("decisions", () => {
    it("stores evaluated decisions and lists them", async () => {
      env.POLICY_GATE_LOG_LEVEL = "info";
      await run("evaluate", file("policy.json"), file("unversioned.json"), "--store");
      const { decisionId }: { decisionId: string } = JSON.parse(out[0]);
      expect(transport.messages("info")).toEqual(["Decision stored"]);
      expect(transport.entries[0].subsystem).toBe("policy-gate/cli");

      out = [];
      expect(await run("decisions", "list")).toBe(0);
      expect(out).toEqual([
        "Decisions (1):",
        `  ⚠️ ${decisionId} conditional_approval score 75 (C)`,
        "    policy: bucket-policy@1 | evaluated: 2026-01-01T00:00:00.000Z",
      ]);

      out = [];
      expect(await run("decisions", "show", decisionId)).toBe(0);
      expect(JSON.parse(out[0])).toMatchObject({ decisionId, score: 75 });
    });

    it("filters the list", async () => {
      await run("batch", file("policy.json"), file("batch.json"), "--store");
      out = [];
      await run("decisions", "list", "--verdict", "deny", "--json");
      const found: Array<{ verdict: string }> = JSON.parse(out[0]);
      expect(found.map((d) => d.verdict)).toEqual(["deny"]);

      out = [];
      await run("decisions", "list", "--policy", "other");
      expect(out).toEqual(["No decisions found. Use 'evaluate --store' to record one."]);
    });

    it("stores every decision of a batch with repeated contexts", async () => {
      await writeFile(file("repeated.json"), JSON.stringify([CLEAN, CLEAN]));
      expect(await run("batch", file("policy.json"), file("repeated.json"), "--store")).toBe(0);
      expect(await store.count()).toBe(2);
    });

    it("refuses to overwrite a stored decision", async () => {
      await run("evaluate", file("policy.json"), file("clean.json"), "--store");
      const { decisionId }: { decisionId: string } = JSON.parse(out[0]);
      expect(await run("evaluate", file("policy.json"), file("clean.json"), "--store")).toBe(EXIT_USAGE);
      expect(err).toEqual([`Error: decision ${decisionId} is already stored`]);
      expect(await store.count()).toBe(1);
    });

    it("reports an unknown decision", async () => {
      expect(await run("decisions", "show", "dec-missing")).toBe(EXIT_USAGE);
      expect(err).toEqual(["Decision dec-missing not found."]);
    });

    it("rejects an unknown verdict filter", async () => {
      expect(await run("decisions", "list", "--verdict", "maybe")).toBe(EXIT_USAGE);
    });
  });

  describe("validate", () => {
    it("lists rules in evaluation order", async () => {
      expect(await run("validate", file("policy.json"))).toBe(0);
      expect(out).toEqual([
        "✓ Bucket Policy [bucket-policy] v1: 3 rule(s) valid",
        "  🔴 encrypted (deny, weight 30, priority 10): encrypted = false",
        "  🟡 versioned (deny, weight 25, priority 0): versioning = false",
        "  🟠 public (deny, weight 10, priority 0): public = true",
      ]);
    });
  });

  describe("library", () => {
    it("lists templates by category", async () => {
      expect(await run("library", "--category", "pipeline")).toBe(0);
      expect(out.slice(1)).toEqual([
        "  📋 Pipeline Security Gate [pipeline-security-gate]",
        "    Release gate on scan results, signing and review",
        "    category: pipeline | rules: 4",
      ]);
    });

    it("exports a template that validates", async () => {
      const target = file("exported.json");
      expect(await run("library-export", "compute-protection", "--out", target)).toBe(0);
      expect(out).toEqual([`Exported "Compute Protection" to ${target}`]);
      expect((await readFile(target, "utf8")).endsWith("}\n")).toBe(true);

      out = [];
      expect(await run("validate", target)).toBe(0);
      expect(out[0]).toBe("✓ Compute Protection [compute-protection] v1: 3 rule(s) valid");
    });

    it("reports an unknown template", async () => {
      expect(await run("library-export", "nope")).toBe(EXIT_USAGE);
      expect(err).toEqual(["Template \"nope\" not found. Use 'library' to list available templates."]);
    });
  });

  describe("program", () => {
    it("prints the version", async () => {
      expect(await run("--version")).toBe(0);
      expect(out).toEqual(["1.0.0"]);
    });

    it("treats an unknown command as a usage error", async () => {
      expect(await run("nope")).toBe(EXIT_USAGE);
    });
  });
});
