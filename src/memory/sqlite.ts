/**
 * SQLite Provenance Store — durable record of converged runs and the
 * attempt lineage that produced them.
 *
 * Uses better-sqlite3 for zero-config, embedded, synchronous SQLite.
 * Manages forward-only schema migrations and a simple retention policy.
 */
import Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import type { ConvergenceResult, ProvenanceSink, RunStatus } from "../core/types.js";

/** Schema migration definition. */
export interface Migration {
    version: number;
    description: string;
    up: string;
}

const INITIAL_SCHEMA = `
-- Runs table: one row per terminated convergence run
CREATE TABLE IF NOT EXISTS Runs (
  id TEXT PRIMARY KEY,
  profile_id TEXT NOT NULL,
  scenario TEXT NOT NULL,
  status TEXT NOT NULL,
  threshold REAL NOT NULL,
  best_overall REAL,
  best_attempt INTEGER,
  successful_attempt INTEGER,
  total_attempts INTEGER NOT NULL,
  elapsed_ms INTEGER NOT NULL,
  reason TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Attempts table: the request lineage and outcome of every attempt
CREATE TABLE IF NOT EXISTS Attempts (
  id TEXT PRIMARY KEY,
  run_id TEXT NOT NULL,
  attempt_index INTEGER NOT NULL,
  generation INTEGER NOT NULL,
  strategy TEXT,
  prompt TEXT NOT NULL,
  directive TEXT,
  success INTEGER NOT NULL,
  content TEXT,
  error_kind TEXT,
  error_message TEXT,
  overall REAL,
  weakest_dimension TEXT,
  dimensions TEXT,
  tries INTEGER NOT NULL,
  input_tokens INTEGER NOT NULL DEFAULT 0,
  output_tokens INTEGER NOT NULL DEFAULT 0,
  latency_ms INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  FOREIGN KEY (run_id) REFERENCES Runs(id)
);

CREATE INDEX IF NOT EXISTS idx_runs_profile_status ON Runs(profile_id, status);
CREATE INDEX IF NOT EXISTS idx_attempts_run_index ON Attempts(run_id, attempt_index);
`;

const MIGRATIONS: Migration[] = [
    { version: 1, description: "Initial schema", up: INITIAL_SCHEMA },
];

export interface StoredRun {
    id: string;
    profileId: string;
    scenario: string;
    status: RunStatus;
    threshold: number;
    bestOverall: number | null;
    bestAttempt: number | null;
    successfulAttempt: number | null;
    totalAttempts: number;
    elapsedMs: number;
    reason: string;
    createdAt: string;
}

export interface StoredAttempt {
    index: number;
    generation: number;
    strategy: string | null;
    prompt: string;
    directive: string | null;
    success: boolean;
    content: string | null;
    errorKind: string | null;
    errorMessage: string | null;
    overall: number | null;
    weakestDimension: string | null;
    dimensions: Record<string, number> | null;
    tries: number;
    inputTokens: number;
    outputTokens: number;
    latencyMs: number;
}

export interface RunQuery {
    profileId?: string;
    status?: RunStatus;
    /** Default: 50 */
    limit?: number;
}

export interface RunStatistics {
    totalRuns: number;
    counts: Record<RunStatus, number>;
    successRate: number;
    meanAttemptsToConverge: number | null;
    meanBestOverall: number | null;
}

interface RunRow {
    id: string;
    profile_id: string;
    scenario: string;
    status: string;
    threshold: number;
    best_overall: number | null;
    best_attempt: number | null;
    successful_attempt: number | null;
    total_attempts: number;
    elapsed_ms: number;
    reason: string;
    created_at: string;
}

interface AttemptRow {
    attempt_index: number;
    generation: number;
    strategy: string | null;
    prompt: string;
    directive: string | null;
    success: number;
    content: string | null;
    error_kind: string | null;
    error_message: string | null;
    overall: number | null;
    weakest_dimension: string | null;
    dimensions: string | null;
    tries: number;
    input_tokens: number;
    output_tokens: number;
    latency_ms: number;
}

interface AggregateRow {
    status: string;
    runs: number;
    mean_attempts: number | null;
    mean_best: number | null;
}

function toRunStatus(value: string): RunStatus {
    if (value === "success" || value === "failure" || value === "error") return value;
    throw new Error(`Unknown run status in store: ${value}`);
}

function parseDimensions(json: string | null): Record<string, number> | null {
    if (json === null) return null;
    const parsed: unknown = JSON.parse(json);
    if (!parsed || typeof parsed !== "object") return null;
    const dimensions: Record<string, number> = {};
    for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === "number") dimensions[key] = value;
    }
    return dimensions;
}

function toStoredRun(row: RunRow): StoredRun {
    return {
        id: row.id,
        profileId: row.profile_id,
        scenario: row.scenario,
        status: toRunStatus(row.status),
        threshold: row.threshold,
        bestOverall: row.best_overall,
        bestAttempt: row.best_attempt,
        successfulAttempt: row.successful_attempt,
        totalAttempts: row.total_attempts,
        elapsedMs: row.elapsed_ms,
        reason: row.reason,
        createdAt: row.created_at,
    };
}

function toStoredAttempt(row: AttemptRow): StoredAttempt {
    return {
        index: row.attempt_index,
        generation: row.generation,
        strategy: row.strategy,
        prompt: row.prompt,
        directive: row.directive,
        success: row.success === 1,
        content: row.content,
        errorKind: row.error_kind,
        errorMessage: row.error_message,
        overall: row.overall,
        weakestDimension: row.weakest_dimension,
        dimensions: parseDimensions(row.dimensions),
        tries: row.tries,
        inputTokens: row.input_tokens,
        outputTokens: row.output_tokens,
        latencyMs: row.latency_ms,
    };
}

export class SqliteProvenanceStore implements ProvenanceSink {
    private db: Database.Database;

    constructor(dbPath: string = ":memory:") {
        this.db = new Database(dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.pragma("foreign_keys = ON");
        this.runMigrations();
    }

    /** Run pending migrations. Forward-only, with version tracking. */
    private runMigrations(): void {
        this.db.exec(`
      CREATE TABLE IF NOT EXISTS SchemaVersions (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now')),
        description TEXT NOT NULL
      );
    `);

        const current = this.db
            .prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM SchemaVersions")
            .get();
        const version = current?.v ?? 0;

        for (const migration of MIGRATIONS) {
            if (migration.version > version) {
                this.db.exec(migration.up);
                this.db
                    .prepare("INSERT INTO SchemaVersions (version, description) VALUES (?, ?)")
                    .run(migration.version, migration.description);
            }
        }
    }

    /** Latest applied schema version. */
    schemaVersion(): number {
        const row = this.db
            .prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM SchemaVersions")
            .get();
        return row?.v ?? 0;
    }

    /** Write a run and all of its attempts in one transaction. */
    persist(result: ConvergenceResult): void {
        const insertRun = this.db.prepare(
            `INSERT INTO Runs (id, profile_id, scenario, status, threshold, best_overall, best_attempt, successful_attempt, total_attempts, elapsed_ms, reason)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        );
        const insertAttempt = this.db.prepare(
            `INSERT INTO Attempts (id, run_id, attempt_index, generation, strategy, prompt, directive, success, content, error_kind, error_message, overall, weakest_dimension, dimensions, tries, input_tokens, output_tokens, latency_ms, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        );

        const write = this.db.transaction((run: ConvergenceResult) => {
            const best = run.bestAttempt;
            insertRun.run(
                run.runId,
                run.profileId,
                run.scenario,
                run.status,
                run.threshold,
                best?.breakdown?.overall ?? null,
                best?.index ?? null,
                run.successfulAttempt,
                run.totalAttempts,
                run.elapsedMs,
                run.reason,
            );
            for (const attempt of run.attempts) {
                const { outcome, breakdown, request } = attempt;
                insertAttempt.run(
                    uuidv4(),
                    run.runId,
                    attempt.index,
                    request.generation,
                    attempt.strategy,
                    request.prompt,
                    request.directive ?? null,
                    outcome.success ? 1 : 0,
                    outcome.success ? outcome.content : null,
                    outcome.success ? null : outcome.errorKind,
                    outcome.success ? null : outcome.message,
                    breakdown?.overall ?? null,
                    breakdown?.weakestDimension ?? null,
                    breakdown ? JSON.stringify(breakdown.dimensions) : null,
                    outcome.tries,
                    outcome.usage.inputTokens,
                    outcome.usage.outputTokens,
                    outcome.latencyMs,
                    attempt.timestamp,
                );
            }
        });
        write(result);
    }

    getRun(runId: string): (StoredRun & { attempts: StoredAttempt[] }) | null {
        const row = this.db.prepare<[string], RunRow>("SELECT * FROM Runs WHERE id = ?").get(runId);
        if (!row) return null;
        const attempts = this.db
            .prepare<[string], AttemptRow>("SELECT * FROM Attempts WHERE run_id = ? ORDER BY attempt_index ASC")
            .all(runId)
            .map(toStoredAttempt);
        return { ...toStoredRun(row), attempts };
    }

    /** Most recent runs first. */
    listRuns(query: RunQuery = {}): StoredRun[] {
        const clauses: string[] = [];
        const params: Array<string | number> = [];
        if (query.profileId !== undefined) {
            clauses.push("profile_id = ?");
            params.push(query.profileId);
        }
        if (query.status !== undefined) {
            clauses.push("status = ?");
            params.push(query.status);
        }
        const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
        params.push(query.limit ?? 50);

        return this.db
            .prepare<Array<string | number>, RunRow>(`SELECT * FROM Runs ${where} ORDER BY rowid DESC LIMIT ?`)
            .all(...params)
            .map(toStoredRun);
    }

    getStatistics(profileId?: string): RunStatistics {
        const where = profileId !== undefined ? "WHERE profile_id = ?" : "";
        const params = profileId !== undefined ? [profileId] : [];
        const rows = this.db
            .prepare<string[], AggregateRow>(
                `SELECT status, COUNT(*) AS runs, AVG(total_attempts) AS mean_attempts, AVG(best_overall) AS mean_best
         FROM Runs ${where} GROUP BY status`,
            )
            .all(...params);

        const counts: Record<RunStatus, number> = { success: 0, failure: 0, error: 0 };
        let totalRuns = 0;
        let meanAttemptsToConverge: number | null = null;
        let bestSum = 0;
        let bestRuns = 0;
        for (const row of rows) {
            const status = toRunStatus(row.status);
            counts[status] = row.runs;
            totalRuns += row.runs;
            if (status === "success") meanAttemptsToConverge = row.mean_attempts;
            if (row.mean_best !== null) {
                bestSum += row.mean_best * row.runs;
                bestRuns += row.runs;
            }
        }

        return {
            totalRuns,
            counts,
            successRate: totalRuns === 0 ? 0 : counts.success / totalRuns,
            meanAttemptsToConverge,
            meanBestOverall: bestRuns === 0 ? null : bestSum / bestRuns,
        };
    }

    /**
     * Retention: keep the `keep` most recent runs, delete the rest with
     * their attempts. Returns the number of runs removed.
     */
    pruneRuns(keep: number): number {
        if (!Number.isInteger(keep) || keep < 0) {
            throw new RangeError(`pruneRuns expects a non-negative integer, got ${keep}`);
        }
        const prune = this.db.transaction((retain: number): number => {
            const stale = `SELECT id FROM Runs ORDER BY rowid DESC LIMIT -1 OFFSET ?`;
            this.db.prepare(`DELETE FROM Attempts WHERE run_id IN (${stale})`).run(retain);
            return this.db.prepare(`DELETE FROM Runs WHERE id IN (${stale})`).run(retain).changes;
        });
        return prune(keep);
    }

    /** Close the database connection. */
    close(): void {
        this.db.close();
    }

    /** Expose raw db for advanced queries in tests. */
    get raw(): Database.Database {
        return this.db;
    }
}
