export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (message: string, fields?: Record<string, unknown>) => void;
  info: (message: string, fields?: Record<string, unknown>) => void;
  warn: (message: string, fields?: Record<string, unknown>) => void;
  error: (message: string, fields?: Record<string, unknown>) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function resolveLogLevel(raw: string | undefined): LogLevel {
  if (raw === "debug" || raw === "warn" || raw === "error") {
    return raw;
  }
  return "info";
}

function write(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
  const event = {
    ts: new Date().toISOString(),
    level,
    message,
    ...(fields ?? {})
  };
  const line = `${JSON.stringify(event)}\n`;
  if (level === "error") {
    process.stderr.write(line);
    return;
  }
  process.stdout.write(line);
}

export function createLogger(service: string, minLevel: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  const emit = (level: LogLevel, message: string, fields?: Record<string, unknown>) => {
    if (levelRank[level] < levelRank[minLevel]) {
      return;
    }
    write(level, message, { service, ...(fields ?? {}) });
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
