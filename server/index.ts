// The sync service reads its configuration from .env, so dotenv runs first,
// before config.ts or db.ts are imported. drizzle-kit reads it on its own.
import dotenv from "dotenv";
dotenv.config();

import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { createDevGraphs } from "../platform/core";
import { errorMessage } from "../platform/errors";
import { loadConfig } from "./config";
import { registerRoutes } from "./routes";
import { startScheduler, stopScheduler } from "./services/schedulerService";
import { createSyncRuntime } from "./syncRuntime";
import { createConsoleLogger } from "./sync/syncLogger";

const app = express();
const httpServer = createServer(app);

app.use(express.json({ limit: "5mb" }));

const httpLog = createConsoleLogger("http");
const serviceLog = createConsoleLogger("graph-sync");

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      httpLog.info(`${req.method} ${path} ${res.statusCode}`, { durationMs: duration });
    }
  });

  next();
});

(async () => {
  const config = loadConfig();

  // Graph store clients for real deployments plug in here; the dev stack is in-memory.
  const graphs = await createDevGraphs(config.rootExternalId);
  serviceLog.info("Using in-memory graph stores", { root: config.rootExternalId });

  const runtime = createSyncRuntime(config, graphs);
  await registerRoutes(httpServer, app, {
    reconciler: runtime.reconciler,
    applier: runtime.applier,
    runStore: runtime.runStore,
    rootExternalId: config.rootExternalId,
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    httpLog.error("Internal server error", { error: errorMessage(err) });

    if (res.headersSent) {
      return next(err);
    }

    return res.status(500).json({ message: errorMessage(err) });
  });

  startScheduler(runtime.reconciler, config.syncIntervalMs);

  const shutdown = () => {
    stopScheduler();
    httpServer.close();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    serviceLog.info("Serving", { port: config.port });
  });
})().catch((err: unknown) => {
  serviceLog.error("Startup failed", { error: errorMessage(err) });
  process.exit(1);
});
