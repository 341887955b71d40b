/**
 * Policy Gate — Logging
 *
 * Structured subsystem logger with levels, contextual children and
 * pluggable transports. The console transport writes to stderr so that
 * stdout carries only decision output.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type GateLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly GateLogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type GateLogEntry = {
  timestamp: Date;
  level: GateLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  policyId?: string;
  decisionId?: string;
  ruleId?: string;
};

export type LogFormatter = (entry: GateLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: GateLogEntry): void | Promise<void>;
}

/** Correlation fields copied onto every entry of a contextual logger. */
export type LogContext = {
  policyId?: string;
  decisionId?: string;
  ruleId?: string;
};

export interface GateLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): GateLogger;
  withContext(context: LogContext): GateLogger;
  setLevel(level: GateLogLevel): void;
  getLevel(): GateLogLevel;
  isLevelEnabled(level: GateLogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<GateLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function isLogLevel(value: string): value is GateLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function shouldLog(level: GateLogLevel, minLevel: GateLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<GateLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const { colors = process.stderr.isTTY ?? false, timestamps = true, includeMetadata = true } = options ?? {};
  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: GateLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const correlation: string[] = [];
    if (entry.policyId) correlation.push(`policy=${entry.policyId}`);
    if (entry.decisionId) correlation.push(`decision=${entry.decisionId}`);
    if (entry.ruleId) correlation.push(`rule=${entry.ruleId}`);
    if (correlation.length > 0) parts.push(paint(COLORS.dim, `(${correlation.join(" ")})`));

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

type Writable = { write(chunk: string): unknown };

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private stream: Writable;

  constructor(options?: { formatter?: LogFormatter; stream?: Writable }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.stream = options?.stream ?? process.stderr;
  }

  write(entry: GateLogEntry): void {
    this.stream.write(`${this.formatter(entry)}\n`);
  }
}

/** Keeps entries in memory; used by tests to assert on log output. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: GateLogEntry[] = [];

  write(entry: GateLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: GateLogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

function reportTransportFailure(transport: LogTransport, err: unknown): void {
  const reason = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[policy-gate] log transport "${transport.name}" failed: ${reason}\n`);
}

export class GateLoggerImpl implements GateLogger {
  readonly subsystem: string;
  private level: GateLogLevel;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: GateLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): GateLogger {
    return new GateLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
    });
  }

  withContext(context: LogContext): GateLogger {
    return new GateLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  setLevel(level: GateLogLevel): void {
    this.level = level;
  }

  getLevel(): GateLogLevel {
    return this.level;
  }

  isLevelEnabled(level: GateLogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: GateLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: GateLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      ...(meta ? { metadata: meta } : {}),
      ...this.context,
    };

    for (const transport of this.transports) {
      try {
        const pending = transport.write(entry);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => reportTransportFailure(transport, err));
        }
      } catch (err) {
        reportTransportFailure(transport, err);
      }
    }
  }
}

// =============================================================================
// Factory & Global Logger
// =============================================================================

export function createGateLogger(
  subsystem: string,
  options?: { level?: GateLogLevel; transports?: LogTransport[] },
): GateLogger {
  return new GateLoggerImpl({
    subsystem: `policy-gate/${subsystem}`,
    level: options?.level ?? "info",
    transports: options?.transports ?? [new ConsoleTransport()],
  });
}

let globalLogger: GateLogger | null = null;

/** Get or create the process-wide logger, optionally scoped to a subsystem. */
export function getGateLogger(subsystem?: string): GateLogger {
  if (!globalLogger) {
    globalLogger = createGateLogger("core");
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setGlobalGateLogger(logger: GateLogger | null): void {
  globalLogger = logger;
}
