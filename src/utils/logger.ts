export type Level = "debug" | "info" | "warn" | "error";

const LEVELS: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLevel(value: string | undefined): value is Level {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

type Sink = (line: string) => void;

// eslint-disable-next-line no-console
const consoleSink: Sink = (line) => console.log(line);

export type Logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => void;
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
  child: (component: string) => Logger;
};

export function createLogger(level: Level, sink: Sink = consoleSink, component?: string): Logger {
  const threshold = LEVELS[level] ?? LEVELS.info;

  const log = (lvl: Level, msg: string, meta?: Record<string, unknown>) => {
    if (LEVELS[lvl] < threshold) return;
    sink(
      JSON.stringify({
        level: lvl,
        msg,
        time: new Date().toISOString(),
        ...(component ? { component } : {}),
        ...meta,
      })
    );
  };

  return {
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (name) => createLogger(level, sink, component ? `${component}.${name}` : name),
  };
}

export const silentLogger: Logger = createLogger("error", () => undefined);
