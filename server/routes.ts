import type { Express } from "express";
import type { Server } from "http";
import { z } from "zod";
import { errorCode, errorMessage, ReconciliationInProgress } from "../platform/errors";
import type { RunStore } from "./runStore";
import { isSchedulerRunning } from "./services/schedulerService";
import type { ForwardReconciler } from "./sync/forwardReconciler";
import { decodeNotification } from "./sync/notificationDecoder";
import type { ApplyOutcome, ReverseApplier } from "./sync/reverseApplier";

export type RouteDeps = {
  reconciler: ForwardReconciler;
  applier: ReverseApplier;
  runStore: RunStore;
  rootExternalId: string;
};

type NotificationResult = ApplyOutcome | { status: "failed"; kind: null; message: string };

const runsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export async function registerRoutes(httpServer: Server, app: Express, deps: RouteDeps): Promise<Server> {
  const { reconciler, applier, runStore, rootExternalId } = deps;

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      rootExternalId,
      reconciling: reconciler.isRunning(),
      scheduler: isSchedulerRunning(),
    });
  });

  app.post("/api/reconcile", async (_req, res) => {
    try {
      const report = await reconciler.run();
      res.json({
        runId: report.runId,
        counts: report.counts,
        ambiguities: report.ambiguities,
        lossyIdentifiers: report.lossyIdentifiers,
      });
    } catch (err) {
      const status = err instanceof ReconciliationInProgress ? 409 : 500;
      res.status(status).json({ code: errorCode(err), message: errorMessage(err) });
    }
  });

  app.get("/api/runs", async (req, res) => {
    const parsed = runsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ message: "limit must be an integer between 1 and 100" });
    }
    try {
      res.json(await runStore.listRuns(rootExternalId, parsed.data.limit));
    } catch (err) {
      res.status(500).json({ code: errorCode(err), message: errorMessage(err) });
    }
  });

  app.post("/api/notifications", async (req, res) => {
    const body: unknown = req.body;
    const items: unknown[] = Array.isArray(body) ? body : [body];

    const outcomes: NotificationResult[] = [];
    for (const raw of items) {
      try {
        // apply() reports its own failures; only decoding throws here.
        outcomes.push(await applier.apply(decodeNotification(raw)));
      } catch (err) {
        outcomes.push({ status: "failed", kind: null, message: errorMessage(err) });
      }
    }
    res.json({ outcomes });
  });

  return httpServer;
}
