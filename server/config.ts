import { z } from "zod";
import { ConfigError } from "../platform/errors";
import type { RetryPolicy } from "./sync/retry";
import { describeIssues } from "./sync/zodIssues";

export function parseIntervalMs(interval: string): number | null {
  const match = interval.match(/^(\d+)(s|m|h)$/);
  if (!match) return null;
  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case "s": return value * 1000;
    case "m": return value * 60_000;
    case "h": return value * 3_600_000;
    default: return null;
  }
}

const envSchema = z.object({
  ROOT_ASSET_EXTERNAL_ID: z.string().trim().min(1),
  SYNC_INTERVAL: z.string().regex(/^[1-9]\d*(s|m|h)$/, "expected <n>(s|m|h)").default("5m"),
  PORT: z.coerce.number().int().positive().max(65535).default(5000),
  DATABASE_URL: z.string().url().optional(),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
});

export interface AppConfig {
  rootExternalId: string;
  syncIntervalMs: number;
  port: number;
  /** Absent: the run ledger lives in memory. */
  databaseUrl?: string;
  retry: RetryPolicy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Unset and empty are the same to a shell.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ""));
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${describeIssues(result.error)}`);
  }
  const cfg = result.data;
  const syncIntervalMs = parseIntervalMs(cfg.SYNC_INTERVAL);
  if (syncIntervalMs === null) {
    throw new ConfigError(`invalid configuration: SYNC_INTERVAL: expected <n>(s|m|h)`);
  }

  return {
    rootExternalId: cfg.ROOT_ASSET_EXTERNAL_ID,
    syncIntervalMs,
    port: cfg.PORT,
    ...(cfg.DATABASE_URL ? { databaseUrl: cfg.DATABASE_URL } : {}),
    retry: { maxAttempts: cfg.RETRY_MAX_ATTEMPTS, baseDelayMs: cfg.RETRY_BASE_DELAY_MS },
  };
}
