/** Severity levels for log entries. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** A single structured log entry. */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Leveled logger accepted by the vault. Implementations must not expect
 * secrets in `data`: the vault only ever passes field names, states and counts.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

type Sink = (entry: LogEntry) => void;

function leveled(minLevel: LogLevel, sink: Sink): Logger {
  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const entry: LogEntry = { level, message, timestamp: new Date().toISOString() };
    if (data !== undefined) entry.data = data;
    sink(entry);
  };
  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data)
  };
}

export const silentLogger: Logger = leveled("error", () => {});

/**
 * Writes one line per entry to the console, prefixed with the timestamp and level.
 *
 * @example
 * ```ts
 * const vault = createCredentialVault({ store, logger: createConsoleLogger("debug") });
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = "info", sink: Pick<Console, LogLevel> = console): Logger {
  return leveled(minLevel, (entry) => {
    const line = `${entry.timestamp} [${entry.level}] ${entry.message}`;
    if (entry.data) sink[entry.level](line, entry.data);
    else sink[entry.level](line);
  });
}

/** In-memory logger keeping the last `capacity` entries. */
export interface MemoryLogger extends Logger {
  entries(): LogEntry[];
  clear(): void;
}

export function createMemoryLogger(capacity = 1000, minLevel: LogLevel = "debug"): MemoryLogger {
  const buf: LogEntry[] = [];
  const logger = leveled(minLevel, (entry) => {
    buf.push(entry);
    if (buf.length > capacity) buf.shift();
  });
  return {
    ...logger,
    entries: () => buf.slice(),
    clear: () => {
      buf.length = 0;
    }
  };
}
