import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const LEDGER_STATUSES = ["completed", "failed"] as const;

// One row per source URL; only completed transfers are ever written.
export const downloads = sqliteTable("downloads", {
  location: text("location").primaryKey(),
  relativePath: text("relative_path").notNull(),
  localPath: text("local_path").notNull(),
  completedAt: integer("completed_at", { mode: "timestamp_ms" }).notNull(),
  byteSize: integer("byte_size").notNull(),
  status: text("status", { enum: LEDGER_STATUSES }).notNull().default("completed"),
});

export const insertLedgerRecordSchema = createInsertSchema(downloads, {
  location: (schema) => schema.location.url(),
  relativePath: (schema) => schema.relativePath.min(1),
  localPath: (schema) => schema.localPath.min(1),
  byteSize: (schema) => schema.byteSize.int().nonnegative(),
});

export type LedgerRecord = typeof downloads.$inferSelect;
export type InsertLedgerRecord = z.infer<typeof insertLedgerRecordSchema>;
export type LedgerStatus = (typeof LEDGER_STATUSES)[number];
