/**
 * Policy Gate — CLI Commands
 *
 * Commands: evaluate, batch, validate, library, library-export,
 * decisions list, decisions show
 *
 * Exit codes: 0 allow, 1 deny, 2 conditional approval, 3 configuration or
 * usage error. Decisions go to stdout; logs and errors go to stderr.
 */

import { writeFile } from "node:fs/promises";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { loadGateConfig } from "./config.js";
import type { GateConfig } from "./config.js";
import { describeCondition } from "./conditions.js";
import { GateError } from "./errors.js";
import { PolicyEvaluator } from "./evaluator.js";
import { getLibraryCategories, getLibraryPolicies, getLibraryPolicy } from "./library.js";
import { loadContextFile, loadContextsFile, loadPolicyFile, parsePolicyDocument, toPolicyDocument } from "./loader.js";
import { ConsoleTransport, createGateLogger } from "./logging.js";
import type { GateLogger, LogTransport } from "./logging.js";
import type { Policy } from "./policy.js";
import { exportMarkdown, mostRestrictiveVerdict, severityIcon, summarizeBatch } from "./reporter.js";
import { DEFAULT_THRESHOLDS } from "./scorer.js";
import type { DecisionStore, StorableDecision, Thresholds, Verdict } from "./types.js";

export const EXIT_USAGE = 3;

const VERDICT_EXIT: Record<Verdict, number> = { allow: 0, deny: 1, conditional_approval: 2 };

const VERDICT_BADGES: Record<Verdict, string> = { allow: "✅", deny: "⛔", conditional_approval: "⚠️" };

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
};

export type GateCliDeps = {
  io: CliIo;
  createStore: (config: GateConfig) => DecisionStore;
  env?: Readonly<Record<string, string | undefined>>;
  clock?: () => Date;
  /** Log transports; defaults to a console transport on `io.err`. */
  transports?: LogTransport[];
};

export type CliContext = {
  program: Command;
  setExitCode: (code: number) => void;
};

type Session = {
  config: GateConfig;
  logger: GateLogger;
  store: () => Promise<DecisionStore>;
  close: () => Promise<void>;
};

type EvaluationFlags = {
  verbose?: boolean;
  approvalThreshold?: number;
  conditionalThreshold?: number;
  store?: boolean;
};

function parseScore(value: string): number {
  const score = Number(value);
  if (value.trim() === "" || !Number.isFinite(score) || score < 0 || score > 100) {
    throw new InvalidArgumentError("Expected a number between 0 and 100.");
  }
  return score;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return limit;
}

function parseVerdict(value: string): Verdict {
  if (value === "allow" || value === "deny" || value === "conditional_approval") return value;
  throw new InvalidArgumentError("Expected allow, deny or conditional_approval.");
}

function formatOption(): Option {
  return new Option("-f, --format <format>", "Output format").choices(["json", "markdown"]).default("json");
}

/** Threshold override for the evaluator, or undefined when nothing overrides the policy. */
function resolveOverride(policy: Policy, config: GateConfig, flags: EvaluationFlags): Thresholds | undefined {
  const approval = flags.approvalThreshold ?? config.approvalThreshold;
  const conditional = flags.conditionalThreshold ?? config.conditionalThreshold;
  if (approval === undefined && conditional === undefined) return undefined;
  const base = policy.thresholds ?? DEFAULT_THRESHOLDS;
  return { approval: approval ?? base.approval, conditional: conditional ?? base.conditional };
}

export function createGateCli(deps: GateCliDeps) {
  return (ctx: CliContext) => {
    const { io } = deps;
    const program = ctx.program;

    program.option("-c, --config <file>", "JSON configuration file");

    const openSession = async (): Promise<Session> => {
      const config = await loadGateConfig({ env: deps.env, file: program.opts<{ config?: string }>().config });
      const logger = createGateLogger("cli", {
        level: config.logLevel,
        transports: deps.transports ?? [new ConsoleTransport({ stream: { write: (chunk: string) => io.err(chunk.trimEnd()) } })],
      });
      let store: DecisionStore | null = null;
      return {
        config,
        logger,
        store: async () => {
          if (!store) {
            store = deps.createStore(config);
            await store.initialize();
          }
          return store;
        },
        close: async () => {
          await store?.close();
        },
      };
    };

    /** Wrap an action: open a session, map the result to an exit code, report gate errors. */
    const run = <A extends unknown[]>(fn: (session: Session, ...args: A) => Promise<number | void>) => {
      return async (...args: A): Promise<void> => {
        let session: Session | null = null;
        try {
          session = await openSession();
          const code = await fn(session, ...args);
          ctx.setExitCode(code ?? 0);
        } catch (err) {
          if (!(err instanceof GateError)) throw err;
          session?.logger.debug("Command failed", { code: err.code });
          io.err(`Error: ${err.message}`);
          ctx.setExitCode(EXIT_USAGE);
        } finally {
          await session?.close();
        }
      };
    };

    const prepareEvaluation = (session: Session, loaded: Policy, flags: EvaluationFlags) => {
      const policy = flags.verbose || session.config.verbose ? loaded.withOptions({ verbose: true }) : loaded;
      const evaluator = new PolicyEvaluator({
        thresholds: resolveOverride(policy, session.config, flags),
        clock: deps.clock,
        logger: session.logger.child("evaluator"),
      });
      return { policy, evaluator };
    };

    const persist = async (session: Session, decisions: StorableDecision[]) => {
      const store = await session.store();
      for (const decision of decisions) {
        await store.save(decision);
        session.logger.info("Decision stored", { decisionId: decision.decisionId, verdict: decision.verdict });
      }
    };

    const withEvaluationOptions = (command: Command): Command =>
      command
        .option("-v, --verbose", "Include non-matching findings")
        .option("--approval-threshold <score>", "Minimum score for allow", parseScore)
        .option("--conditional-threshold <score>", "Minimum score for conditional approval", parseScore)
        .option("--store", "Persist the decision");

    // ── evaluate ────────────────────────────────────────────────
    withEvaluationOptions(
      program
        .command("evaluate")
        .description("Evaluate one context against a policy")
        .argument("<policyFile>", "Path to policy JSON file")
        .argument("<contextFile>", "Path to context JSON file")
        .addOption(formatOption()),
    ).action(
      run(async (session, policyFile: string, contextFile: string, opts: EvaluationFlags & { format: string }) => {
        const { policy, evaluator } = prepareEvaluation(session, await loadPolicyFile(policyFile), opts);
        const decision = evaluator.evaluate(policy, await loadContextFile(contextFile));
        const storable = decision.toStorable();

        io.out(opts.format === "markdown" ? exportMarkdown(storable) : JSON.stringify(storable, null, 2));
        if (opts.store) await persist(session, [storable]);
        return VERDICT_EXIT[decision.verdict];
      }),
    );

    // ── batch ───────────────────────────────────────────────────
    withEvaluationOptions(
      program
        .command("batch")
        .description("Evaluate a JSON array of contexts against a policy")
        .argument("<policyFile>", "Path to policy JSON file")
        .argument("<contextsFile>", "Path to JSON array of contexts")
        .option("--summary", "Print a batch summary instead of every decision"),
    ).action(
      run(async (session, policyFile: string, contextsFile: string, opts: EvaluationFlags & { summary?: boolean }) => {
        const { policy, evaluator } = prepareEvaluation(session, await loadPolicyFile(policyFile), opts);
        const decisions = evaluator.evaluateMany(policy, await loadContextsFile(contextsFile));
        const storables = decisions.map((d) => d.toStorable());
        const worst = mostRestrictiveVerdict(storables.map((d) => d.verdict));

        if (opts.summary) {
          io.out(JSON.stringify({ policyId: policy.id, verdict: worst, ...summarizeBatch(storables) }, null, 2));
        } else {
          io.out(JSON.stringify(storables, null, 2));
        }
        if (opts.store) await persist(session, storables);
        return VERDICT_EXIT[worst];
      }),
    );

    // ── validate ────────────────────────────────────────────────
    program
      .command("validate")
      .description("Check a policy file without evaluating it")
      .argument("<policyFile>", "Path to policy JSON file")
      .action(
        run(async (_session, policyFile: string) => {
          const policy = await loadPolicyFile(policyFile);
          io.out(`✓ ${policy.name} [${policy.id}] v${policy.version}: ${policy.size} rule(s) valid`);
          for (const { rule, priority } of policy.orderedRules()) {
            const condition = rule.condition ? describeCondition(rule.condition) : "<predicate>";
            io.out(`  ${severityIcon(rule.severity)} ${rule.id} (${rule.effect}, weight ${rule.weight}, priority ${priority}): ${condition}`);
          }
        }),
      );

    // ── library ─────────────────────────────────────────────────
    program
      .command("library")
      .description("Browse built-in policy templates")
      .option("--category <category>", "Filter by category")
      .option("--json", "Output as JSON")
      .action(
        run(async (_session, opts: { category?: string; json?: boolean }) => {
          let templates = getLibraryPolicies();
          if (opts.category) templates = templates.filter((t) => t.category === opts.category);

          if (opts.json) {
            io.out(JSON.stringify(templates, null, 2));
            return;
          }

          io.out(`Policy Library (${templates.length} templates, categories: ${getLibraryCategories().join(", ")})`);
          for (const t of templates) {
            io.out(`  📋 ${t.name} [${t.id}]`);
            io.out(`    ${t.description}`);
            io.out(`    category: ${t.category} | rules: ${t.template.rules.length}`);
          }
        }),
      );

    // ── library-export ──────────────────────────────────────────
    program
      .command("library-export")
      .description("Write a built-in template as a policy file")
      .argument("<templateId>", "Library template ID")
      .option("-o, --out <file>", "Write to a file instead of stdout")
      .action(
        run(async (session, templateId: string, opts: { out?: string }) => {
          const template = getLibraryPolicy(templateId);
          if (!template) {
            io.err(`Template "${templateId}" not found. Use 'library' to list available templates.`);
            return EXIT_USAGE;
          }
          const text = JSON.stringify(toPolicyDocument(parsePolicyDocument(template.template)), null, 2);
          if (opts.out) {
            await writeFile(opts.out, `${text}\n`, "utf8");
            session.logger.info("Template exported", { templateId, path: opts.out });
            io.out(`Exported "${template.name}" to ${opts.out}`);
          } else {
            io.out(text);
          }
        }),
      );

    // ── decisions ───────────────────────────────────────────────
    const decisions = program.command("decisions").description("Inspect stored decisions");

    decisions
      .command("list")
      .description("List stored decisions, newest first")
      .option("--verdict <verdict>", "Filter by verdict", parseVerdict)
      .option("--policy <policyId>", "Filter by policy id")
      .option("--limit <n>", "Maximum number of decisions", parseLimit)
      .option("--json", "Output as JSON")
      .action(
        run(async (session, opts: { verdict?: Verdict; policy?: string; limit?: number; json?: boolean }) => {
          const store = await session.store();
          const found = await store.list({ verdict: opts.verdict, policyId: opts.policy, limit: opts.limit });

          if (opts.json) {
            io.out(JSON.stringify(found, null, 2));
            return;
          }
          if (found.length === 0) {
            io.out("No decisions found. Use 'evaluate --store' to record one.");
            return;
          }
          io.out(`Decisions (${found.length}):`);
          for (const d of found) {
            io.out(`  ${VERDICT_BADGES[d.verdict]} ${d.decisionId} ${d.verdict} score ${d.score} (${d.grade})`);
            io.out(`    policy: ${d.policyId}@${d.policyVersion} | evaluated: ${d.evaluatedAt}`);
          }
        }),
      );

    decisions
      .command("show")
      .description("Show one stored decision")
      .argument("<decisionId>", "Decision ID")
      .addOption(formatOption())
      .action(
        run(async (session, decisionId: string, opts: { format: string }) => {
          const store = await session.store();
          const decision = await store.getById(decisionId);
          if (!decision) {
            io.err(`Decision ${decisionId} not found.`);
            return EXIT_USAGE;
          }
          io.out(opts.format === "markdown" ? exportMarkdown(decision) : JSON.stringify(decision, null, 2));
        }),
      );
  };
}

/**
 * Build the program, run it once and return the exit code.
 * Usage errors reported by commander map to exit code 3.
 */
export async function runGateCli(argv: readonly string[], deps: GateCliDeps): Promise<number> {
  let exitCode = 0;
  const program = new Command()
    .name("policy-gate")
    .description("Evaluate attribute contexts against declarative security policies")
    .version("1.0.0")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.out(text.trimEnd()),
      writeErr: (text) => deps.io.err(text.trimEnd()),
    });

  createGateCli(deps)({ program, setExitCode: (code) => (exitCode = code) });

  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : EXIT_USAGE;
    }
    throw err;
  }
  return exitCode;
}
