export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const v = String(raw ?? "").trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") return v;
  return fallback;
}

export function createLogger(level: LogLevel = parseLogLevel(process.env.YAMLWEAVE_LOG_LEVEL), prefix = "[yamlweave]"): Logger {
  const min = LEVEL_RANK[level];
  const on = (l: LogLevel) => LEVEL_RANK[l] >= min;
  return {
    debug: (msg) => {
      if (on("debug")) console.log(`${prefix} ${msg}`);
    },
    info: (msg) => {
      if (on("info")) console.log(`${prefix} ${msg}`);
    },
    warn: (msg) => {
      if (on("warn")) console.warn(`${prefix} ${msg}`);
    },
    error: (msg) => {
      if (on("error")) console.error(`${prefix} ${msg}`);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
