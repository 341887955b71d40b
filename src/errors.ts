/**
 * Policy Gate — Error Taxonomy
 *
 * ConfigurationError is fatal and raised at load time. EvaluationError is
 * raised by condition evaluation and folded into the decision by the
 * policy. SerializationError is raised when a decision cannot be encoded,
 * StorageError when a store refuses it.
 */

export type GateErrorCode = "CONFIGURATION" | "EVALUATION" | "SERIALIZATION" | "STORAGE";

export abstract class GateError extends Error {
  abstract readonly code: GateErrorCode;
}

export class ConfigurationError extends GateError {
  readonly code = "CONFIGURATION" as const;
  readonly ruleId?: string;

  constructor(message: string, options?: { ruleId?: string; cause?: unknown }) {
    super(options?.ruleId ? `Rule "${options.ruleId}": ${message}` : message, { cause: options?.cause });
    this.name = "ConfigurationError";
    this.ruleId = options?.ruleId;
  }
}

export class EvaluationError extends GateError {
  readonly code = "EVALUATION" as const;
  readonly attribute?: string;

  constructor(message: string, attribute?: string) {
    super(message);
    this.name = "EvaluationError";
    this.attribute = attribute;
  }
}

export class SerializationError extends GateError {
  readonly code = "SERIALIZATION" as const;
  readonly path: string;

  constructor(message: string, path: string) {
    super(`Cannot serialize decision at ${path}: ${message}`);
    this.name = "SerializationError";
    this.path = path;
  }
}

export class StorageError extends GateError {
  readonly code = "STORAGE" as const;
  readonly decisionId: string;

  constructor(message: string, decisionId: string) {
    super(message);
    this.name = "StorageError";
    this.decisionId = decisionId;
  }
}

/**
 * Syntax error thrown by the condition lexer or parser.
 * Includes position and source context.
 */
export class ConditionSyntaxError extends Error {
  readonly position: number;
  readonly source: string;

  constructor(message: string, position: number, source: string) {
    const contextStart = Math.max(0, position - 20);
    const contextEnd = Math.min(source.length, position + 20);
    const context = source.slice(contextStart, contextEnd);
    super(`Condition syntax error at position ${position}: ${message}\n  near: ...${context}...`);
    this.name = "ConditionSyntaxError";
    this.position = position;
    this.source = source;
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
