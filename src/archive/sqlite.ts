import Database from "better-sqlite3";
import type {
  DeviceEndpoint,
  DeviceKind,
  RunStatus,
  Sample,
  SamplingConfig,
  StatsSnapshot,
  TestRun,
} from "../types.js";
import { ArchiveError, errorMessage } from "../errors.js";
import { BaseArchive, assertStorable } from "./archive.js";
import type { RunQuery } from "./archive.js";

// ---------------------------------------------------------------------------
// Connection + schema
// ---------------------------------------------------------------------------

export function openDatabase(path: string): Database.Database {
  const db = new Database(path);

  // Pragmas
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");

  // Schema
  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      id           TEXT PRIMARY KEY,
      kind         TEXT NOT NULL
                     CHECK(kind IN ('greenlee','entes','circutor')),
      status       TEXT NOT NULL
                     CHECK(status IN ('completed','degraded','aborted','interrupted')),
      created_at   INTEGER NOT NULL,
      finished_at  INTEGER,
      endpoint     TEXT NOT NULL,
      config       TEXT NOT NULL,
      stats        TEXT NOT NULL,
      samples      TEXT NOT NULL DEFAULT '[]'
    );

    CREATE INDEX IF NOT EXISTS idx_runs_created
      ON runs(created_at DESC, id DESC);

    CREATE INDEX IF NOT EXISTS idx_runs_kind_created
      ON runs(kind, created_at DESC);
  `);

  console.log(`[archive] SQLite initialized at ${path}`);
  return db;
}

interface RunRow {
  id: string;
  kind: DeviceKind;
  status: RunStatus;
  created_at: number;
  finished_at: number | null;
  endpoint: string;
  config: string;
  stats: string;
  samples: string;
}

function fromRow(row: RunRow): TestRun {
  return {
    id: row.id,
    kind: row.kind,
    endpoint: JSON.parse(row.endpoint) as DeviceEndpoint,
    config: JSON.parse(row.config) as SamplingConfig,
    samples: JSON.parse(row.samples) as Sample[],
    status: row.status,
    stats: JSON.parse(row.stats) as StatsSnapshot,
    createdAt: row.created_at,
    finishedAt: row.finished_at,
  };
}

const PAGE_SIZE = 50;

/** Runs a driver call, reporting any failure as an ArchiveError. */
function guard<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ArchiveError) throw err;
    throw new ArchiveError(`failed to ${action}: ${errorMessage(err)}`, { cause: err });
  }
}

// ---------------------------------------------------------------------------
// SqliteArchive
// ---------------------------------------------------------------------------

export class SqliteArchive extends BaseArchive {
  constructor(private readonly db: Database.Database) {
    super();
  }

  static open(path: string): SqliteArchive {
    return new SqliteArchive(openDatabase(path));
  }

  async store(run: TestRun): Promise<void> {
    assertStorable(run);
    guard(`store run ${run.id}`, () => {
      const exists = this.db.prepare<[string], { id: string }>("SELECT id FROM runs WHERE id = ?").get(run.id);
      if (exists) throw new ArchiveError(`run ${run.id} is already archived`);

      this.db
        .prepare(
          `INSERT INTO runs (id, kind, status, created_at, finished_at, endpoint, config, stats, samples)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          run.id,
          run.kind,
          run.status,
          run.createdAt,
          run.finishedAt,
          JSON.stringify(run.endpoint),
          JSON.stringify(run.config),
          JSON.stringify(run.stats),
          JSON.stringify(run.samples)
        );
    });
  }

  async get(id: string): Promise<TestRun | null> {
    const row = guard(`read run ${id}`, () =>
      this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE id = ?").get(id)
    );
    return row ? fromRow(row) : null;
  }

  /**
   * Keyset-paged so no statement stays open across yields; callers may
   * store or delete while iterating.
   */
  async *query(filter: RunQuery = {}): AsyncIterable<TestRun> {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (filter.kind) {
      where.push("kind = ?");
      params.push(filter.kind);
    }
    if (filter.status) {
      where.push("status = ?");
      params.push(filter.status);
    }
    if (filter.from !== undefined) {
      where.push("created_at >= ?");
      params.push(filter.from);
    }
    if (filter.to !== undefined) {
      where.push("created_at <= ?");
      params.push(filter.to);
    }

    let cursor: { createdAt: number; id: string } | null = null;
    for (;;) {
      const clauses = [...where];
      const args = [...params];
      if (cursor) {
        clauses.push("(created_at < ? OR (created_at = ? AND id < ?))");
        args.push(cursor.createdAt, cursor.createdAt, cursor.id);
      }
      const sql =
        "SELECT * FROM runs" +
        (clauses.length ? ` WHERE ${clauses.join(" AND ")}` : "") +
        " ORDER BY created_at DESC, id DESC LIMIT ?";
      const rows = guard("query runs", () =>
        this.db.prepare<(string | number)[], RunRow>(sql).all(...args, PAGE_SIZE)
      );

      for (const row of rows) yield fromRow(row);
      if (rows.length < PAGE_SIZE) return;
      const last = rows[rows.length - 1];
      cursor = { createdAt: last.created_at, id: last.id };
    }
  }

  async delete(id: string): Promise<boolean> {
    return guard(`delete run ${id}`, () => this.db.prepare("DELETE FROM runs WHERE id = ?").run(id).changes > 0);
  }

  close(): void {
    this.db.close();
  }
}
