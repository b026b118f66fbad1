export type LogValue = string | number | boolean | null | undefined | readonly string[];
export type LogFields = Readonly<Record<string, LogValue>>;

export interface SyncLogger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

function formatValue(value: LogValue): string {
  if (Array.isArray(value)) return `[${value.join(", ")}]`;
  return String(value);
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return parts.length > 0 ? ` | ${parts.join(" ")}` : "";
}

export function createConsoleLogger(source: string): SyncLogger {
  return {
    info: (message, fields) => console.log(`[${source}] ${message}${formatFields(fields)}`),
    warn: (message, fields) => console.warn(`[${source}] ${message}${formatFields(fields)}`),
    error: (message, fields) => console.error(`[${source}] ${message}${formatFields(fields)}`),
  };
}
