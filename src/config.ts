/**
 * Policy Gate configuration schema (TypeBox) and layered loading:
 * defaults, then an optional JSON file, then environment variables.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, errorMessage } from "./errors.js";
import { isLogLevel } from "./logging.js";
import type { GateLogLevel } from "./logging.js";

export const configSchema = Type.Object({
  approvalThreshold: Type.Optional(Type.Number({ description: "Minimum score for Allow (0-100)" })),
  conditionalThreshold: Type.Optional(Type.Number({ description: "Minimum score for ConditionalApproval (0-100)" })),
  verbose: Type.Optional(Type.Boolean({ description: "Keep non-matching findings in output" })),
  storePath: Type.Optional(Type.String({ description: "SQLite database for persisted decisions" })),
  logLevel: Type.Optional(
    Type.Union(
      [
        Type.Literal("trace"),
        Type.Literal("debug"),
        Type.Literal("info"),
        Type.Literal("warn"),
        Type.Literal("error"),
        Type.Literal("fatal"),
      ],
      { description: "Minimum level written to stderr" },
    ),
  ),
});

export type GateConfigInput = Static<typeof configSchema>;

export type GateConfig = {
  /** Unset means the policy's own threshold (or the default) applies. */
  approvalThreshold?: number;
  conditionalThreshold?: number;
  verbose: boolean;
  storePath: string;
  logLevel: GateLogLevel;
};

export const CONFIG_ENV = {
  file: "POLICY_GATE_CONFIG",
  approvalThreshold: "POLICY_GATE_APPROVAL_THRESHOLD",
  conditionalThreshold: "POLICY_GATE_CONDITIONAL_THRESHOLD",
  verbose: "POLICY_GATE_VERBOSE",
  storePath: "POLICY_GATE_DB",
  logLevel: "POLICY_GATE_LOG_LEVEL",
} as const;

export function getDefaultConfig(): GateConfig {
  return {
    verbose: false,
    storePath: "policy-gate.db",
    logLevel: "warn",
  };
}

// ─── Environment parsing ───────────────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>;

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function envBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  throw new ConfigurationError(`${key} must be true or false, got "${env[key]}"`);
}

function envLogLevel(env: Env, key: string): GateLogLevel | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  if (!isLogLevel(raw)) {
    throw new ConfigurationError(`${key} must be one of trace, debug, info, warn, error, fatal, got "${env[key]}"`);
  }
  return raw;
}

function fromEnv(env: Env): GateConfigInput {
  const storePath = env[CONFIG_ENV.storePath];
  return {
    approvalThreshold: envNumber(env, CONFIG_ENV.approvalThreshold),
    conditionalThreshold: envNumber(env, CONFIG_ENV.conditionalThreshold),
    verbose: envBoolean(env, CONFIG_ENV.verbose),
    storePath: storePath === undefined || storePath === "" ? undefined : storePath,
    logLevel: envLogLevel(env, CONFIG_ENV.logLevel),
  };
}

async function fromFile(path: string): Promise<GateConfigInput> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`cannot load config file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (!Value.Check(configSchema, parsed)) {
    const first = Value.Errors(configSchema, parsed).First();
    const detail = first ? `${first.path || "/"}: ${first.message}` : "invalid document";
    throw new ConfigurationError(`invalid config file ${path}: ${detail}`);
  }
  return parsed;
}

function merge(base: GateConfig, layer: GateConfigInput): GateConfig {
  const next = { ...base };
  if (layer.approvalThreshold !== undefined) next.approvalThreshold = layer.approvalThreshold;
  if (layer.conditionalThreshold !== undefined) next.conditionalThreshold = layer.conditionalThreshold;
  if (layer.verbose !== undefined) next.verbose = layer.verbose;
  if (layer.storePath !== undefined) next.storePath = layer.storePath;
  if (layer.logLevel !== undefined) next.logLevel = layer.logLevel;
  return next;
}

/**
 * Resolve the effective configuration.
 * @throws ConfigurationError on unreadable files or invalid values.
 */
export async function loadGateConfig(options: { env?: Env; file?: string } = {}): Promise<GateConfig> {
  const env = options.env ?? process.env;
  let config = getDefaultConfig();

  const file = options.file ?? env[CONFIG_ENV.file];
  if (file) config = merge(config, await fromFile(file));
  config = merge(config, fromEnv(env));

  for (const [name, value] of [
    ["approvalThreshold", config.approvalThreshold],
    ["conditionalThreshold", config.conditionalThreshold],
  ] as const) {
    if (value !== undefined && !(value >= 0 && value <= 100)) {
      throw new ConfigurationError(`${name} must be between 0 and 100, got ${value}`);
    }
  }
  return config;
}
