// =============================================================================
// Logger — structured run events through an injectable sink
// =============================================================================

export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogEvent =
  | "run:start"
  | "chunk:start"
  | "iteration:retry"
  | "patch:rejected"
  | "chunk:forced"
  | "chunk:done"
  | "chunking:fallback"
  | "run:complete"
  | "run:cancelled";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: LogEvent;
  runId: string;
  chunkIndex?: number;
  data?: Record<string, unknown>;
}

export type Logger = (entry: LogEntry) => void;

export const consoleLogger: Logger = (entry) => {
  const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
  const where = entry.chunkIndex === undefined ? "" : ` chunk=${entry.chunkIndex}`;
  // eslint-disable-next-line no-console
  console.log(`${prefix} ${entry.event}${where}`, entry.data ?? "");
};

export const silentLogger: Logger = () => {};

/** Collects entries in memory; handy in tests. */
export function createMemoryLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const log: Logger = (entry) => {
    entries.push(entry);
  };
  return Object.assign(log, { entries });
}

export interface RunLogger {
  emit(level: LogLevel, event: LogEvent, data?: Record<string, unknown>, chunkIndex?: number): void;
}

export function createRunLogger(sink: Logger, runId: string): RunLogger {
  return {
    emit(level, event, data, chunkIndex) {
      sink({ timestamp: Date.now(), level, event, runId, chunkIndex, data });
    },
  };
}

export function describeError(error: unknown): Record<string, unknown> | string {
  return error instanceof Error ? { name: error.name, message: error.message } : String(error);
}
