import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

/** File-backed logger; one JSON object per line under `<stateDir>/logs`. */
export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

/** Merges `context` into the meta of every entry; per-call meta wins on key clashes. */
export function withContext(logger: Logger, context: LogMeta): Logger {
  const merge = (meta?: LogMeta): LogMeta => ({ ...context, ...meta });
  return {
    debug: (message, meta) => logger.debug(message, merge(meta)),
    info: (message, meta) => logger.info(message, merge(meta)),
    warn: (message, meta) => logger.warn(message, merge(meta)),
    error: (message, meta) => logger.error(message, merge(meta))
  };
}

export type LogRecord = {
  timestamp: string;
  level: "debug" | "info" | "warning" | "error";
  message: string;
  meta?: LogMeta;
};

type AppLoggerParams = {
  stateDir: string;
  label?: string;
  minLevel?: LogLevel;
};

export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const dir = path.join(params.stateDir, "logs");
  await mkdir(dir, { recursive: true });
  const startedAt = new Date().toISOString().replace(/[:.]/g, "-");
  const filePath = path.join(dir, `${params.label ?? "scan"}-${startedAt}.jsonl`);
  const threshold = LEVEL_ORDER[params.minLevel ?? "info"];
  const stream = createWriteStream(filePath, { flags: "a" });
  let closed = false;

  // A broken log file stops logging; the scan itself carries on.
  stream.on("error", () => {
    closed = true;
  });

  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (closed || LEVEL_ORDER[level] < threshold) return;
    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level: level === "warn" ? "warning" : level,
      message
    };
    if (meta && Object.keys(meta).length > 0) record.meta = meta;
    stream.write(`${JSON.stringify(record)}\n`);
  };

  return {
    path: filePath,
    close: async () => {
      if (closed) return;
      closed = true;
      await new Promise<void>((resolve) => stream.end(resolve));
    },
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}
