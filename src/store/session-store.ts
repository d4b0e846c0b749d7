import Database, { Statement } from "better-sqlite3";

/**
 * Key-value store for encoded bulk state, one row per actor. Rows past their
 * expiry are invisible to reads and removed by `purgeExpired`.
 */
export interface SessionStore {
  load(actorId: string): string | null;
  /** Insert-only: false when the actor already has an unexpired row. */
  create(actorId: string, state: string): boolean;
  save(actorId: string, state: string): void;
  delete(actorId: string): void;
  purgeExpired(): number;
}

export interface SqliteSessionStoreOptions {
  ttlSeconds: number;
  now?: () => number;
}

export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private stmtUpsert: Statement;
  private stmtCreate: Statement;
  private stmtGet: Statement;
  private stmtDelete: Statement;
  private stmtPurge: Statement;
  private stmtCount: Statement;

  constructor(dbPath: string, opts: SqliteSessionStoreOptions) {
    this.db = new Database(dbPath);
    this.ttlMs = opts.ttlSeconds * 1000;
    this.now = opts.now ?? Date.now;

    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS bulk_sessions (
        actor_id   TEXT PRIMARY KEY,
        state      TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      ) WITHOUT ROWID;

      CREATE INDEX IF NOT EXISTS idx_bulk_sessions_expiry ON bulk_sessions(expires_at);
    `);

    this.stmtUpsert = this.db.prepare(
      "INSERT OR REPLACE INTO bulk_sessions (actor_id, state, expires_at) VALUES (?, ?, ?)"
    );
    // An expired row left behind by a missed purge does not block a new session.
    this.stmtCreate = this.db.prepare(`
      INSERT INTO bulk_sessions (actor_id, state, expires_at) VALUES (?, ?, ?)
      ON CONFLICT(actor_id) DO UPDATE SET state = excluded.state, expires_at = excluded.expires_at
      WHERE bulk_sessions.expires_at <= ?
    `);
    this.stmtGet = this.db.prepare(
      "SELECT state FROM bulk_sessions WHERE actor_id = ? AND expires_at > ?"
    );
    this.stmtDelete = this.db.prepare("DELETE FROM bulk_sessions WHERE actor_id = ?");
    this.stmtPurge = this.db.prepare("DELETE FROM bulk_sessions WHERE expires_at <= ?");
    this.stmtCount = this.db.prepare(
      "SELECT COUNT(*) AS cnt FROM bulk_sessions WHERE expires_at > ?"
    );
  }

  load(actorId: string): string | null {
    const row = this.stmtGet.get(actorId, this.now()) as { state: string } | undefined;
    return row?.state ?? null;
  }

  create(actorId: string, state: string): boolean {
    const now = this.now();
    return this.stmtCreate.run(actorId, state, now + this.ttlMs, now).changes > 0;
  }

  /** Every save pushes the expiry out by one TTL. */
  save(actorId: string, state: string): void {
    this.stmtUpsert.run(actorId, state, this.now() + this.ttlMs);
  }

  delete(actorId: string): void {
    this.stmtDelete.run(actorId);
  }

  purgeExpired(): number {
    return this.stmtPurge.run(this.now()).changes;
  }

  countActive(): number {
    const row = this.stmtCount.get(this.now()) as { cnt: number };
    return row.cnt;
  }

  close(): void {
    this.db.close();
  }
}
