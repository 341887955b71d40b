/**
 * Policy Gate — Decision Storage
 *
 * SQLite and InMemory stores for decision records. Stores are append-only:
 * saving a second record under an existing id raises StorageError.
 */

import { SerializationError, StorageError } from "./errors.js";
import type { DecisionFilter, DecisionStore, StorableDecision } from "./types.js";

function isStorableDecision(value: unknown): value is StorableDecision {
  if (typeof value !== "object" || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.decisionId === "string" &&
    typeof v.fingerprint === "string" &&
    typeof v.policyId === "string" &&
    typeof v.verdict === "string" &&
    typeof v.score === "number" &&
    Array.isArray(v.findings) &&
    typeof v.evaluatedAt === "string"
  );
}

function encode(decision: StorableDecision): string {
  try {
    return JSON.stringify(decision);
  } catch (err) {
    throw new SerializationError(err instanceof Error ? err.message : String(err), "decision");
  }
}

function decode(text: string, id: string): StorableDecision {
  const parsed: unknown = JSON.parse(text);
  if (!isStorableDecision(parsed)) {
    throw new SerializationError("stored record is malformed", `decisions[${id}]`);
  }
  return parsed;
}

function alreadyStored(id: string): StorageError {
  return new StorageError(`decision ${id} is already stored`, id);
}

function isPrimaryKeyConflict(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}

function byNewest(a: StorableDecision, b: StorableDecision): number {
  return b.evaluatedAt.localeCompare(a.evaluatedAt) || a.decisionId.localeCompare(b.decisionId);
}

// ── InMemory (for tests) ──────────────────────────────────────────

export class InMemoryDecisionStore implements DecisionStore {
  private decisions = new Map<string, string>();

  async initialize(): Promise<void> {}

  async save(decision: StorableDecision): Promise<void> {
    if (this.decisions.has(decision.decisionId)) throw alreadyStored(decision.decisionId);
    this.decisions.set(decision.decisionId, encode(decision));
  }

  async getById(id: string): Promise<StorableDecision | null> {
    const text = this.decisions.get(id);
    return text === undefined ? null : decode(text, id);
  }

  async list(filter?: DecisionFilter): Promise<StorableDecision[]> {
    let results = [...this.decisions.entries()].map(([id, text]) => decode(text, id));
    if (filter?.policyId) results = results.filter((d) => d.policyId === filter.policyId);
    if (filter?.verdict) results = results.filter((d) => d.verdict === filter.verdict);
    results.sort(byNewest);
    return filter?.limit !== undefined ? results.slice(0, filter.limit) : results;
  }

  async count(): Promise<number> {
    return this.decisions.size;
  }

  async delete(id: string): Promise<boolean> {
    return this.decisions.delete(id);
  }

  async close(): Promise<void> {
    this.decisions.clear();
  }
}

// ── SQLite ─────────────────────────────────────────────────────────

interface DecisionRow {
  id: string;
  record: string;
}

export class SQLiteDecisionStore implements DecisionStore {
  private db: import("better-sqlite3").Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  private requireDb(): import("better-sqlite3").Database {
    if (!this.db) throw new Error("Storage not initialized");
    return this.db;
  }

  async initialize(): Promise<void> {
    const Database = (await import("better-sqlite3")).default;
    this.db = new Database(this.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS decisions (
        id TEXT PRIMARY KEY,
        policy_id TEXT NOT NULL,
        policy_version TEXT NOT NULL,
        verdict TEXT NOT NULL,
        score REAL NOT NULL,
        evaluated_at TEXT NOT NULL,
        record TEXT NOT NULL
      )
    `);

    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_decisions_policy ON decisions(policy_id)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_decisions_verdict ON decisions(verdict)`);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_decisions_evaluated_at ON decisions(evaluated_at)`);
  }

  async save(decision: StorableDecision): Promise<void> {
    const db = this.requireDb();
    const record = encode(decision);

    const insert = db.prepare(
      `INSERT INTO decisions (id, policy_id, policy_version, verdict, score, evaluated_at, record)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );
    try {
      insert.run(
        decision.decisionId,
        decision.policyId,
        decision.policyVersion,
        decision.verdict,
        decision.score,
        decision.evaluatedAt,
        record,
      );
    } catch (err) {
      if (isPrimaryKeyConflict(err)) throw alreadyStored(decision.decisionId);
      throw err;
    }
  }

  async getById(id: string): Promise<StorableDecision | null> {
    const db = this.requireDb();
    const row = db.prepare("SELECT id, record FROM decisions WHERE id = ?").get(id) as DecisionRow | undefined;
    return row ? decode(row.record, row.id) : null;
  }

  async list(filter?: DecisionFilter): Promise<StorableDecision[]> {
    const db = this.requireDb();

    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter?.policyId) {
      clauses.push("policy_id = ?");
      params.push(filter.policyId);
    }
    if (filter?.verdict) {
      clauses.push("verdict = ?");
      params.push(filter.verdict);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    let sql = `SELECT id, record FROM decisions ${where} ORDER BY evaluated_at DESC, id ASC`;
    if (filter?.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(filter.limit);
    }
    const rows = db.prepare(sql).all(...params) as DecisionRow[];
    return rows.map((row) => decode(row.record, row.id));
  }

  async count(): Promise<number> {
    const db = this.requireDb();
    const row = db.prepare("SELECT COUNT(*) AS n FROM decisions").get() as { n: number };
    return row.n;
  }

  async delete(id: string): Promise<boolean> {
    const db = this.requireDb();
    const result = db.prepare("DELETE FROM decisions WHERE id = ?").run(id);
    return result.changes > 0;
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}
