/**
 * Structured logging utility
 *
 * LOG_LEVEL picks the minimum level (debug|info|warn|error, default info).
 * DEBUG=1 is kept as a shortcut for LOG_LEVEL=debug.
 */

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function minLevel(): LogLevel {
  if (process.env.DEBUG) return "debug";
  const configured = process.env.LOG_LEVEL;
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel()];
}

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta) return "";
  return JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("debug")) {
      console.log(`[DEBUG] ${msg}`, formatMeta(meta));
    }
  },

  info: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("info")) {
      console.log(`[INFO] ${msg}`, formatMeta(meta));
    }
  },

  warn: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("warn")) {
      console.warn(`[WARN] ${msg}`, formatMeta(meta));
    }
  },

  error: (msg: string, error?: unknown) => {
    console.error(`[ERROR] ${msg}`, error);
  },
};
