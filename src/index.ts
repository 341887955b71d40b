export { Rule, isCategory, isSeverity } from "./rule.js";
export type { RuleInput } from "./rule.js";
export { Policy, DEFAULT_POLICY_OPTIONS } from "./policy.js";
export type { PolicyEntry } from "./policy.js";
export { PolicyRef } from "./registry.js";
export { PolicyEvaluator, EVALUATION_RULE_ID } from "./evaluator.js";
export type { EvaluatorOptions } from "./evaluator.js";
export { aggregate, scoreToGrade, validateThresholds, DEFAULT_THRESHOLDS } from "./scorer.js";
export type { AggregateOptions } from "./scorer.js";
export { DecisionRecord, buildRationale, computeDecisionId, computeFingerprint, rankDrivers } from "./decision.js";
export { compileCondition, describeCondition, evaluateCondition, getAttribute } from "./conditions.js";
export { parseCondition, ConditionParser } from "./expression/parser.js";
export { ConditionLexer } from "./expression/lexer.js";
export {
  parsePolicyDocument,
  toPolicyDocument,
  loadPolicyFile,
  loadContextFile,
  loadContextsFile,
  PolicyDocumentSchema,
  RuleDocumentSchema,
} from "./loader.js";
export type { PolicyDocument, RuleDocument } from "./loader.js";
export { InMemoryDecisionStore, SQLiteDecisionStore } from "./storage.js";
export { exportMarkdown, summarizeBatch, mostRestrictiveVerdict, severityIcon } from "./reporter.js";
export type { BatchSummary } from "./reporter.js";
export { getLibraryPolicies, getLibraryPolicy, getLibraryByCategory, getLibraryCategories, POLICY_LIBRARY } from "./library.js";
export type { LibraryPolicy } from "./library.js";
export { getDefaultConfig, loadGateConfig, configSchema, CONFIG_ENV } from "./config.js";
export type { GateConfig, GateConfigInput } from "./config.js";
export {
  createGateLogger,
  getGateLogger,
  setGlobalGateLogger,
  ConsoleTransport,
  MemoryTransport,
  createDefaultFormatter,
} from "./logging.js";
export type { GateLogger, GateLogLevel, GateLogEntry, LogTransport } from "./logging.js";
export { createGateCli, runGateCli, EXIT_USAGE } from "./cli.js";
export type { CliIo, GateCliDeps, CliContext } from "./cli.js";
export {
  GateError,
  ConfigurationError,
  EvaluationError,
  SerializationError,
  StorageError,
  ConditionSyntaxError,
  errorMessage,
} from "./errors.js";
export * from "./types.js";
