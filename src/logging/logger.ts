import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

export type AppLogger = Logger & {
  path: string;
  /** Flushes the file. Rejects with the first write error, if any occurred. */
  close: () => Promise<void>;
};

export interface LogRecord {
  time: string;
  level: LogLevel;
  scope: string;
  message: string;
  meta?: LogMeta;
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[minLevel];
}

export function formatLogRecord(record: LogRecord): string {
  return `${JSON.stringify(record)}\n`;
}

type AppLoggerParams = {
  stateDir: string;
  /** Names the log file and fills `scope` on every record. */
  label?: string;
  level?: LogLevel;
};

/** JSON-lines logger under `<stateDir>/logs/<label>-<timestamp>.jsonl`. */
export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const dir = path.join(params.stateDir, "logs");
  await mkdir(dir, { recursive: true });
  const scope = params.label ?? "mcpscan";
  const minLevel = params.level ?? "info";
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  const filePath = path.join(dir, `${scope}-${stamp}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  let failure: Error | null = null;
  let closed = false;

  stream.on("error", (err) => {
    failure ??= err;
  });

  const log = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (closed || failure || !isLevelEnabled(level, minLevel)) return;
    stream.write(formatLogRecord({ time: new Date().toISOString(), level, scope, message, meta }));
  };

  return {
    path: filePath,
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    close: async () => {
      if (!closed) {
        closed = true;
        if (!failure) await new Promise<void>((resolve) => stream.end(resolve));
      }
      if (failure) throw failure;
    }
  };
}

export interface ConsoleOptions {
  /** Drop info lines from stdout; warnings and errors still reach stderr. */
  quiet?: boolean;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/** Mirrors `logger` onto the terminal: info to stdout, warn/error to stderr in colour. */
export function withConsole(logger: Logger, options: ConsoleOptions = {}): Logger {
  const stdout = options.stdout ?? ((line: string) => console.log(line));
  const stderr = options.stderr ?? ((line: string) => console.error(line));
  return {
    debug: (message, meta) => logger.debug(message, meta),
    info: (message, meta) => {
      logger.info(message, meta);
      if (!options.quiet) stdout(message);
    },
    warn: (message, meta) => {
      logger.warn(message, meta);
      stderr(pc.yellow(message));
    },
    error: (message, meta) => {
      logger.error(message, meta);
      stderr(pc.red(message));
    }
  };
}
