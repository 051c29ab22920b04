import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import { sql } from "drizzle-orm";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "@shared/schema";

export type LedgerDatabase = BetterSQLite3Database<typeof schema>;

export interface OpenedDatabase {
  sqlite: Database.Database;
  db: LedgerDatabase;
}

export function openLedgerDatabase(dbFile: string): OpenedDatabase {
  if (dbFile !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(dbFile)), { recursive: true });
  }

  const sqlite = new Database(dbFile);
  sqlite.pragma("journal_mode = WAL");
  // Every committed record is on disk before record() returns
  sqlite.pragma("synchronous = FULL");
  sqlite.pragma("busy_timeout = 5000");

  const db = drizzle(sqlite, { schema });
  db.run(sql`
    CREATE TABLE IF NOT EXISTS downloads (
      location TEXT PRIMARY KEY NOT NULL,
      relative_path TEXT NOT NULL,
      local_path TEXT NOT NULL,
      completed_at INTEGER NOT NULL,
      byte_size INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'completed'
    )
  `);

  return { sqlite, db };
}
