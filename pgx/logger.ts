export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function resolveLevel(raw: string | undefined): LogLevel {
  const env = (raw ?? "info").toLowerCase();
  if (env === "debug" || env === "info" || env === "warn" || env === "error") return env;
  return "info";
}

const globalLevel = resolveLevel(process.env.LOG_LEVEL);

// ANSI color codes
const c = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
  gray: "\x1b[90m",
};

export { c as colors };

const levelColors: Record<LogLevel, string> = {
  debug: c.gray,
  info: c.cyan,
  warn: c.yellow,
  error: c.red,
};

/** Renders fields as ` key=value` pairs, skipping undefined values. */
export function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  return Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => ` ${c.dim}${k}=${c.reset}${String(v)}`)
    .join("");
}

function fmt(scope: string, level: LogLevel, msg: string, fields?: LogFields) {
  const ts = new Date().toISOString();
  const lc = levelColors[level];
  return `${c.dim}${ts}${c.reset} ${lc}${level.toUpperCase().padEnd(5)}${c.reset} ${c.magenta}${scope}${c.reset} ${msg}${formatFields(fields)}`;
}

export type Logger = {
  debug: (msg: string, fields?: LogFields) => void;
  info: (msg: string, fields?: LogFields) => void;
  warn: (msg: string, fields?: LogFields) => void;
  error: (msg: string, fields?: LogFields) => void;
};

export function createLogger(scope: string, level: LogLevel = globalLevel): Logger {
  const should = (l: LogLevel) => levelOrder[l] >= levelOrder[level];

  return {
    debug: (msg, fields) => {
      if (should("debug")) console.debug(fmt(scope, "debug", msg, fields));
    },
    info: (msg, fields) => {
      if (should("info")) console.log(fmt(scope, "info", msg, fields));
    },
    warn: (msg, fields) => {
      if (should("warn")) console.warn(fmt(scope, "warn", msg, fields));
    },
    error: (msg, fields) => {
      if (should("error")) console.error(fmt(scope, "error", msg, fields));
    },
  };
}

export const rootLogger = createLogger("genorisk");
