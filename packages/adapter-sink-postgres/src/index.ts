import { readFile } from "node:fs/promises";
import pg from "pg";
import type { Pool } from "pg";
import { childLogger } from "@logsift/core";
import type { DedupStorePort, Report, ReportSummary, SinkPort } from "@logsift/core";

const log = childLogger("postgres");

export type Row = Record<string, unknown>;

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

export interface PostgresOptions {
  pool?: SqlPool; // allow DI for tests
  connectionString?: string; // default: process.env.DATABASE_URL
}

export function fromPool(pool: Pool): SqlPool {
  return {
    query: (text, values) => pool.query(text, values),
    async connect() {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
  };
}

/** Create the tables from sql/schema.sql when they are missing */
export async function ensureSchema(db: SqlClient): Promise<void> {
  const ddl = await readFile(new URL("../sql/schema.sql", import.meta.url), "utf8");
  await db.query(ddl);
}

export function makePostgresDedupStore(opts: PostgresOptions = {}): DedupStorePort {
  const db = opts.pool ?? defaultPool(opts.connectionString);
  return {
    async has(key: string): Promise<boolean> {
      const res = await db.query("SELECT 1 FROM logsift_dedup WHERE key = $1", [key]);
      return res.rows.length > 0;
    },
    async set(key: string, value = ""): Promise<void> {
      await db.query(
        "INSERT INTO logsift_dedup (key, value) VALUES ($1, $2) ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value",
        [key, value],
      );
    },
  };
}

/**
 * Persist each report with its findings, and keep a running total per
 * signature in error_groups. One transaction per report.
 */
export function makePostgresSink(opts: PostgresOptions = {}): SinkPort {
  const pool = opts.pool ?? defaultPool(opts.connectionString);

  return {
    name: "postgres",
    async publish(r: Report, summary: ReportSummary): Promise<void> {
      const tx = await pool.connect();
      try {
        await tx.query("BEGIN");

        const report = await tx.query(
          `INSERT INTO reports (generated_at, source_files, total_events, overall_error_rate)
           VALUES ($1, $2, $3, $4) RETURNING id`,
          [r.generatedAt, [...r.sourceFiles], summary.totalEvents, summary.overallErrorRate],
        );
        const reportId = idOf(report.rows, "reports");

        for (const f of r.findings) {
          // Upsert ErrorGroup by signature
          const group = await tx.query(
            `INSERT INTO error_groups (signature, total_count, first_seen, last_seen)
             VALUES ($1, $2, $3, $3)
             ON CONFLICT (signature)
             DO UPDATE SET total_count = error_groups.total_count + EXCLUDED.total_count, last_seen = EXCLUDED.last_seen
             RETURNING id`,
            [f.signatureRef, f.totalEvents, r.generatedAt],
          );
          await tx.query(
            `INSERT INTO findings
               (report_id, group_id, total_events, error_rate, probable_root_cause, severity, recommendation, root_cause_source)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
            [
              reportId,
              idOf(group.rows, "error_groups"),
              f.totalEvents,
              f.errorRate,
              f.probableRootCause,
              f.severity ?? null,
              f.recommendation ?? null,
              f.rootCauseSource,
            ],
          );
        }

        await tx.query("COMMIT");
        log.info("report stored", { reportId, findings: r.findings.length });
      } catch (err) {
        await tx.query("ROLLBACK");
        throw err;
      } finally {
        tx.release();
      }
    },
  };
}

/* ---------------- helpers ---------------- */

function defaultPool(connectionString = process.env.DATABASE_URL): SqlPool {
  return fromPool(new pg.Pool({ connectionString }));
}

function idOf(rows: Row[], table: string): string | number {
  const id = rows[0]?.id;
  if (typeof id === "string" || typeof id === "number") return id;
  throw new Error(`INSERT INTO ${table} returned no id`);
}
