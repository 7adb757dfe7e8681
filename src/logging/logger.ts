export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export type LogSink = (level: LogLevel, line: string) => void;

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  child: (name: string) => SubsystemLogger;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const LOG_LEVEL_ENV = "ECHOCAST_LOG_LEVEL";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return "info";
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === "string") {
    return /\s|=|"/.test(value) ? JSON.stringify(value) : value;
  }
  return String(value);
}

export function formatLogLine(subsystem: string, message: string, fields?: LogFields): string {
  const parts = [`[${subsystem}]`, message];
  for (const [key, value] of Object.entries(fields ?? {})) {
    if (value === undefined) {
      continue;
    }
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(" ");
}

export function createSubsystemLogger(
  subsystem: string,
  opts: { sink?: LogSink; minLevel?: LogLevel } = {},
): SubsystemLogger {
  const sink = opts.sink ?? consoleSink;
  const minLevel = opts.minLevel ?? resolveLogLevel();
  const emit = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }
    sink(level, formatLogLine(subsystem, message, fields));
  };
  return {
    subsystem,
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`, { sink, minLevel }),
  };
}

export const silentLogger: SubsystemLogger = createSubsystemLogger("silent", {
  sink: () => undefined,
  minLevel: "error",
});
