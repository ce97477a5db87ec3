import type { BatchLogger } from "./types.js";

const PREFIX = "[livy-batch]";

export const consoleLogger: BatchLogger = {
  debug: (message) => console.debug(`${PREFIX} ${message}`),
  info: (message) => console.info(`${PREFIX} ${message}`),
  warn: (message) => console.warn(`${PREFIX} ${message}`),
  error: (message) => console.error(`${PREFIX} ${message}`),
};

export type CapturedLogger = BatchLogger & {
  entries: Array<{ level: "debug" | "info" | "warn" | "error"; message: string }>;
  messages: (level?: "debug" | "info" | "warn" | "error") => string[];
};

/** In-memory sink; lets callers inspect everything a lifecycle wrote. */
export function createCapturingLogger(): CapturedLogger {
  const entries: CapturedLogger["entries"] = [];
  return {
    entries,
    debug: (message) => entries.push({ level: "debug", message }),
    info: (message) => entries.push({ level: "info", message }),
    warn: (message) => entries.push({ level: "warn", message }),
    error: (message) => entries.push({ level: "error", message }),
    messages: (level) =>
      entries.filter((entry) => level == null || entry.level === level).map((entry) => entry.message),
  };
}
