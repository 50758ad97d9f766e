import Database from "better-sqlite3";
import fs from "node:fs";

export interface BlobStore {
  get(key: string): Buffer | null;
  set(key: string, bytes: Buffer): void;
}

export type SqliteBlobStoreOptions = {
  /** Database file, or ":memory:". */
  path: string;
  freshStart?: boolean;
};

export class SqliteBlobStore implements BlobStore {
  private db: Database.Database | null = null;
  private didApplyFreshStart = false;

  constructor(private readonly options: SqliteBlobStoreOptions) {}

  get(key: string): Buffer | null {
    const row = this.ensureDb()
      .prepare("SELECT value FROM blobs WHERE key = ?")
      .get(key) as { value: Buffer } | undefined;
    return row ? row.value : null;
  }

  set(key: string, bytes: Buffer): void {
    this.ensureDb()
      .prepare(
        `
        INSERT INTO blobs (key, value, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
        `,
      )
      .run(key, bytes, new Date().toISOString());
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  private ensureDb(): Database.Database {
    if (this.db) return this.db;
    const dbPath = this.options.path;
    const inMemory = dbPath === ":memory:";
    if (!this.didApplyFreshStart) {
      this.didApplyFreshStart = true;
      if (this.options.freshStart && !inMemory) {
        fs.rmSync(dbPath, { force: true });
        fs.rmSync(`${dbPath}-wal`, { force: true });
        fs.rmSync(`${dbPath}-shm`, { force: true });
      }
    }
    const db = new Database(dbPath);
    if (!inMemory) {
      db.pragma("journal_mode = WAL");
    }
    db.exec(`
      CREATE TABLE IF NOT EXISTS blobs (
        key TEXT PRIMARY KEY,
        value BLOB NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
    this.db = db;
    return db;
  }
}
