import { randomUUID } from "crypto";
import { and, desc, eq } from "drizzle-orm";
import {
  insertReconciliationRunSchema,
  reconciliationRuns,
  type InsertReconciliationRun,
  type ReconciliationRun,
} from "@shared/schema";
import type { Database } from "./db";

export type RunCounts = Readonly<{
  twinsCreated: number;
  twinsUpdated: number;
  twinsDeleted: number;
  relationshipsCreated: number;
  relationshipsUpdated: number;
  relationshipsDeleted: number;
}>;

export const EMPTY_RUN_COUNTS: RunCounts = {
  twinsCreated: 0,
  twinsUpdated: 0,
  twinsDeleted: 0,
  relationshipsCreated: 0,
  relationshipsUpdated: 0,
  relationshipsDeleted: 0,
};

export type RunOutcome = Readonly<{
  status: "succeeded" | "failed";
  counts?: RunCounts;
  ambiguities?: number;
  errorCode?: string;
  errorMessage?: string;
}>;

export interface RunStore {
  createRun(data: InsertReconciliationRun): Promise<ReconciliationRun>;
  finishRun(id: string, outcome: RunOutcome): Promise<ReconciliationRun | undefined>;
  listRuns(rootExternalId: string, limit?: number): Promise<ReconciliationRun[]>;
  getLastSuccessfulRun(rootExternalId: string): Promise<ReconciliationRun | undefined>;
}

const DEFAULT_LIST_LIMIT = 20;

function outcomeColumns(outcome: RunOutcome, finishedAt: Date) {
  return {
    status: outcome.status,
    finishedAt,
    ...(outcome.counts ?? EMPTY_RUN_COUNTS),
    ambiguities: outcome.ambiguities ?? 0,
    errorCode: outcome.errorCode ?? null,
    errorMessage: outcome.errorMessage ?? null,
  };
}

export class DatabaseRunStore implements RunStore {
  constructor(private readonly db: Database) {}

  async createRun(data: InsertReconciliationRun): Promise<ReconciliationRun> {
    const values = insertReconciliationRunSchema.parse(data);
    const [run] = await this.db.insert(reconciliationRuns).values(values).returning();
    return run;
  }

  async finishRun(id: string, outcome: RunOutcome): Promise<ReconciliationRun | undefined> {
    const [run] = await this.db
      .update(reconciliationRuns)
      .set(outcomeColumns(outcome, new Date()))
      .where(eq(reconciliationRuns.id, id))
      .returning();
    return run;
  }

  async listRuns(rootExternalId: string, limit = DEFAULT_LIST_LIMIT): Promise<ReconciliationRun[]> {
    return this.db
      .select()
      .from(reconciliationRuns)
      .where(eq(reconciliationRuns.rootExternalId, rootExternalId))
      .orderBy(desc(reconciliationRuns.startedAt))
      .limit(limit);
  }

  async getLastSuccessfulRun(rootExternalId: string): Promise<ReconciliationRun | undefined> {
    const [run] = await this.db
      .select()
      .from(reconciliationRuns)
      .where(and(eq(reconciliationRuns.rootExternalId, rootExternalId), eq(reconciliationRuns.status, "succeeded")))
      .orderBy(desc(reconciliationRuns.finishedAt))
      .limit(1);
    return run;
  }
}

export class InMemoryRunStore implements RunStore {
  private readonly runs: ReconciliationRun[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createRun(data: InsertReconciliationRun): Promise<ReconciliationRun> {
    const values = insertReconciliationRunSchema.parse(data);
    const run: ReconciliationRun = {
      id: randomUUID(),
      rootExternalId: values.rootExternalId,
      status: "running",
      startedAt: this.now(),
      finishedAt: null,
      ...EMPTY_RUN_COUNTS,
      ambiguities: 0,
      errorCode: null,
      errorMessage: null,
    };
    this.runs.push(run);
    return run;
  }

  async finishRun(id: string, outcome: RunOutcome): Promise<ReconciliationRun | undefined> {
    const idx = this.runs.findIndex((r) => r.id === id);
    if (idx === -1) return undefined;
    const run: ReconciliationRun = { ...this.runs[idx], ...outcomeColumns(outcome, this.now()) };
    this.runs[idx] = run;
    return run;
  }

  async listRuns(rootExternalId: string, limit = DEFAULT_LIST_LIMIT): Promise<ReconciliationRun[]> {
    return this.runs
      .filter((r) => r.rootExternalId === rootExternalId)
      .reverse()
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit);
  }

  async getLastSuccessfulRun(rootExternalId: string): Promise<ReconciliationRun | undefined> {
    let last: ReconciliationRun | undefined;
    for (const run of this.runs) {
      if (run.rootExternalId !== rootExternalId || run.status !== "succeeded") continue;
      if (!last || (run.finishedAt?.getTime() ?? 0) >= (last.finishedAt?.getTime() ?? 0)) last = run;
    }
    return last;
  }
}
