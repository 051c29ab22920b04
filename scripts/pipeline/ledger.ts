import { eq, sql } from "drizzle-orm";
import { downloads, insertLedgerRecordSchema, type LedgerRecord } from "@shared/schema";
import { openLedgerDatabase, type OpenedDatabase } from "./db";
import { LedgerConflictError } from "./errors";

export type NewLedgerRecord = Omit<LedgerRecord, "status">;

export interface ILedger {
  contains(location: string): Promise<boolean>;
  lookup(location: string): Promise<LedgerRecord | null>;
  /**
   * Persist a completed transfer. Resolves true when the row was inserted and
   * false when the same location is already recorded with the same local path.
   * Rejects with LedgerConflictError when the recorded local path differs.
   */
  record(record: NewLedgerRecord): Promise<boolean>;
  close(): void;
}

/**
 * SQLite-backed ledger. All statements go through one synchronous connection
 * and every insert runs in an IMMEDIATE transaction, so the check-and-insert
 * for a location cannot interleave with another writer.
 */
export class DatabaseLedger implements ILedger {
  private constructor(private readonly handle: OpenedDatabase) {}

  static open(dbFile: string): DatabaseLedger {
    return new DatabaseLedger(openLedgerDatabase(dbFile));
  }

  async contains(location: string): Promise<boolean> {
    return (await this.lookup(location)) !== null;
  }

  async lookup(location: string): Promise<LedgerRecord | null> {
    const row = this.handle.db.select().from(downloads).where(eq(downloads.location, location)).get();
    return row ?? null;
  }

  async record(record: NewLedgerRecord): Promise<boolean> {
    const row = insertLedgerRecordSchema.parse({ ...record, status: "completed" });

    return this.handle.db.transaction(
      (tx) => {
        const result = tx.insert(downloads).values(row).onConflictDoNothing().run();
        if (result.changes > 0) return true;

        const existing = tx.select().from(downloads).where(eq(downloads.location, row.location)).get();
        if (existing && existing.localPath !== row.localPath) {
          throw new LedgerConflictError(row.location, existing.localPath, row.localPath);
        }
        return false;
      },
      { behavior: "immediate" },
    );
  }

  async count(): Promise<number> {
    const row = this.handle.db.select({ n: sql<number>`count(*)` }).from(downloads).get();
    return row?.n ?? 0;
  }

  close(): void {
    if (this.handle.sqlite.open) this.handle.sqlite.close();
  }
}
