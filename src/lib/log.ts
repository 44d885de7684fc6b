export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = "text" | "json";
export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(subsystem: string): Logger;
}

type Sink = Pick<Console, "log" | "warn" | "error">;

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  subsystem?: string;
  sink?: Sink;
  clock?: () => Date;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function formatText(subsystem: string | undefined, message: string, fields: LogFields): string {
  const prefix = subsystem ? `[${subsystem}] ` : "";
  const pairs = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === "string" && /\s/.test(v) ? JSON.stringify(v) : String(v)}`);
  return pairs.length > 0 ? `${prefix}${message} ${pairs.join(" ")}` : `${prefix}${message}`;
}

export function createLogger(opts: LoggerOptions): Logger {
  const sink = opts.sink ?? console;
  const clock = opts.clock ?? (() => new Date());
  const threshold = RANK[opts.level];

  function write(level: LogLevel, message: string, fields: LogFields = {}): void {
    if (RANK[level] < threshold) return;

    const line =
      opts.format === "json"
        ? JSON.stringify({ time: clock().toISOString(), level, subsystem: opts.subsystem, msg: message, ...fields })
        : formatText(opts.subsystem, message, fields);

    if (level === "error") sink.error(line);
    else if (level === "warn") sink.warn(line);
    else sink.log(line);
  }

  return {
    debug: (m, f) => write("debug", m, f),
    info: (m, f) => write("info", m, f),
    warn: (m, f) => write("warn", m, f),
    error: (m, f) => write("error", m, f),
    child: (subsystem) =>
      createLogger({ ...opts, subsystem: opts.subsystem ? `${opts.subsystem}/${subsystem}` : subsystem }),
  };
}

/** Logger that drops everything. Handy for scripts and tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
