import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, pgEnum, integer, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const reconciliationRunStatusEnum = pgEnum("reconciliation_run_status", [
  "running",
  "succeeded",
  "failed",
]);

export const reconciliationRuns = pgTable("reconciliation_runs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  rootExternalId: text("root_external_id").notNull(),
  status: reconciliationRunStatusEnum("status").notNull().default("running"),
  startedAt: timestamp("started_at").defaultNow().notNull(),
  finishedAt: timestamp("finished_at"),
  twinsCreated: integer("twins_created").notNull().default(0),
  twinsUpdated: integer("twins_updated").notNull().default(0),
  twinsDeleted: integer("twins_deleted").notNull().default(0),
  relationshipsCreated: integer("relationships_created").notNull().default(0),
  relationshipsUpdated: integer("relationships_updated").notNull().default(0),
  relationshipsDeleted: integer("relationships_deleted").notNull().default(0),
  ambiguities: integer("ambiguities").notNull().default(0),
  errorCode: text("error_code"),
  errorMessage: text("error_message"),
}, (table) => ({
  rootStartedIdx: index("reconciliation_runs_root_started_idx").on(table.rootExternalId, table.startedAt),
}));

// Insert schemas
export const insertReconciliationRunSchema = createInsertSchema(reconciliationRuns).pick({
  rootExternalId: true,
});

// Types
export type InsertReconciliationRun = z.infer<typeof insertReconciliationRunSchema>;
export type ReconciliationRun = typeof reconciliationRuns.$inferSelect;
export type ReconciliationRunStatus = ReconciliationRun["status"];
