import Database from 'better-sqlite3';
import type { IntegrationReport, PackageSummary, RunRecord, Violation } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * One row per integration run plus its merges, violations and weights.
 */
const MIGRATION_V1 = `
-- Runs: integration session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  medpack_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  packages_json TEXT NOT NULL DEFAULT '[]',
  status TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Merges: superseded instances and their canonical entity
CREATE TABLE IF NOT EXISTS merges (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  kind TEXT NOT NULL,
  superseded_id TEXT NOT NULL,
  superseded_package TEXT NOT NULL,
  canonical_id TEXT NOT NULL,
  canonical_package TEXT NOT NULL,
  reason TEXT NOT NULL
);

-- Violations from the first validation and the export gate
CREATE TABLE IF NOT EXISTS violations (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  stage TEXT NOT NULL,
  code TEXT NOT NULL,
  kind TEXT NOT NULL,
  entity_id TEXT NOT NULL,
  message TEXT NOT NULL
);

-- Weights: normalized patient-generation weight per disease
CREATE TABLE IF NOT EXISTS weights (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  disease_id TEXT NOT NULL,
  department TEXT NOT NULL,
  raw REAL NOT NULL,
  normalized REAL NOT NULL,
  PRIMARY KEY (run_id, disease_id)
);

CREATE INDEX IF NOT EXISTS idx_merges_run ON merges(run_id);
CREATE INDEX IF NOT EXISTS idx_violations_run ON violations(run_id);
CREATE INDEX IF NOT EXISTS idx_violations_code ON violations(code);
`;

export type ViolationStage = 'initial' | 'final';

export interface MergeRow {
    run_id: number;
    kind: string;
    superseded_id: string;
    superseded_package: string;
    canonical_id: string;
    canonical_package: string;
    reason: string;
}

export interface ViolationRow {
    run_id: number;
    stage: ViolationStage;
    code: string;
    kind: string;
    entity_id: string;
    message: string;
}

export interface WeightRow {
    run_id: number;
    disease_id: string;
    department: string;
    raw: number;
    normalized: number;
}

/**
 * What the CLI hands the store after a run.
 */
export interface RunEntry {
    version: string;
    status: RunRecord['status'];
    config: unknown;
    packages: PackageSummary[];

    /** Absent when the run failed before a report existed */
    report: IntegrationReport | null;

    error?: string;
}

export interface RunDetails {
    run: RunRecord;
    merges: MergeRow[];
    violations: ViolationRow[];
    weights: WeightRow[];
}

export interface RunHistoryOptions {
    /** Refuse to create the database; read-only commands open existing history only */
    fileMustExist?: boolean;
}

/**
 * Run history database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and run records.
 */
export class RunHistoryDatabase {
    private db: Database.Database;

    constructor(dbPath: string, options: RunHistoryOptions = {}) {
        this.db = new Database(dbPath, { fileMustExist: options.fileMustExist ?? false });

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    /**
     * Record one integration run and everything its report lists,
     * in a single transaction. Returns the run id.
     */
    recordRun(entry: RunEntry): number {
        const runStmt = this.db.prepare<Omit<RunRecord, 'run_id'>>(`
      INSERT INTO runs (created_at, medpack_version, config_json, packages_json, status, stats_json)
      VALUES (@created_at, @medpack_version, @config_json, @packages_json, @status, @stats_json)
    `);
        const mergeStmt = this.db.prepare<MergeRow>(`
      INSERT INTO merges (run_id, kind, superseded_id, superseded_package, canonical_id, canonical_package, reason)
      VALUES (@run_id, @kind, @superseded_id, @superseded_package, @canonical_id, @canonical_package, @reason)
    `);
        const violationStmt = this.db.prepare<ViolationRow>(`
      INSERT INTO violations (run_id, stage, code, kind, entity_id, message)
      VALUES (@run_id, @stage, @code, @kind, @entity_id, @message)
    `);
        const weightStmt = this.db.prepare<WeightRow>(`
      INSERT INTO weights (run_id, disease_id, department, raw, normalized)
      VALUES (@run_id, @disease_id, @department, @raw, @normalized)
    `);

        const insertAll = this.db.transaction((e: RunEntry): number => {
            const result = runStmt.run({
                created_at: new Date().toISOString(),
                medpack_version: e.version,
                config_json: JSON.stringify(e.config),
                packages_json: JSON.stringify(e.packages),
                status: e.status,
                stats_json: JSON.stringify(runStats(e)),
            });
            const runId = Number(result.lastInsertRowid);
            const report = e.report;
            if (!report) return runId;

            for (const m of report.resolution.merges) {
                mergeStmt.run({
                    run_id: runId,
                    kind: m.kind,
                    superseded_id: m.supersededId,
                    superseded_package: m.supersededPackage,
                    canonical_id: m.canonicalId,
                    canonical_package: m.canonicalPackage,
                    reason: m.reason,
                });
            }

            const insertViolations = (stage: ViolationStage, violations: Violation[]) => {
                for (const v of violations) {
                    violationStmt.run({
                        run_id: runId,
                        stage,
                        code: v.code,
                        kind: v.kind,
                        entity_id: v.entityId,
                        message: v.message,
                    });
                }
            };
            insertViolations('initial', report.validation.violations);
            insertViolations('final', report.finalValidation?.violations ?? []);

            for (const w of report.weights?.changes ?? []) {
                weightStmt.run({
                    run_id: runId,
                    disease_id: w.diseaseId,
                    department: w.department,
                    raw: w.raw,
                    normalized: w.normalized,
                });
            }
            return runId;
        });

        const runId = insertAll(entry);
        getLogger().debug({ runId, status: entry.status }, 'Run recorded');
        return runId;
    }

    /**
     * Most recent runs first.
     */
    listRuns(limit = 20): RunRecord[] {
        return this.db
            .prepare<[number], RunRecord>('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?')
            .all(limit);
    }

    getRun(runId: number): RunDetails | undefined {
        const run = this.db.prepare<[number], RunRecord>('SELECT * FROM runs WHERE run_id = ?').get(runId);
        if (!run) return undefined;

        return {
            run,
            merges: this.db
                .prepare<[number], MergeRow>('SELECT * FROM merges WHERE run_id = ? ORDER BY rowid')
                .all(runId),
            violations: this.db
                .prepare<[number], ViolationRow>('SELECT * FROM violations WHERE run_id = ? ORDER BY rowid')
                .all(runId),
            weights: this.db
                .prepare<[number], WeightRow>('SELECT * FROM weights WHERE run_id = ? ORDER BY disease_id')
                .all(runId),
        };
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): { runs: number; runsByStatus: Record<string, number>; violationsByCode: Record<string, number> } {
        const runs = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM runs').get()?.count ?? 0;

        const runsByStatus: Record<string, number> = {};
        const statusRows = this.db
            .prepare<[], { status: string; count: number }>('SELECT status, COUNT(*) as count FROM runs GROUP BY status')
            .all();
        for (const row of statusRows) {
            runsByStatus[row.status] = row.count;
        }

        const violationsByCode: Record<string, number> = {};
        const codeRows = this.db
            .prepare<[], { code: string; count: number }>('SELECT code, COUNT(*) as count FROM violations GROUP BY code')
            .all();
        for (const row of codeRows) {
            violationsByCode[row.code] = row.count;
        }

        return { runs, runsByStatus, violationsByCode };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}

function runStats(entry: RunEntry): Record<string, unknown> {
    const report = entry.report;
    return {
        packages: entry.packages.length,
        merges: report?.resolution.merges.length ?? 0,
        nearDuplicates: report?.resolution.nearDuplicates.length ?? 0,
        violations: (report?.validation.violations.length ?? 0) + (report?.finalValidation?.violations.length ?? 0),
        reassignments: report?.reassignments.length ?? 0,
        weightedDiseases: report?.weights?.changes.length ?? 0,
        ...(entry.error ? { error: entry.error } : {}),
    };
}
