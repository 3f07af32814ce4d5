import chalk from "chalk";

export type LogFormat = "human" | "jsonl";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LoggerOptions = {
  format?: LogFormat;
  verbose?: boolean;
  quiet?: boolean;
  /** Receives every rendered line. Defaults to stderr so stdout stays machine-readable. */
  output?: (line: string) => void;
};

const COLOURS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const { format = "human", verbose = false, quiet = false } = opts;
  const write = opts.output ?? ((line: string) => process.stderr.write(line + "\n"));

  function emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (level === "debug" && (!verbose || quiet)) return;
    if (level === "info" && quiet) return;

    if (format === "jsonl") {
      write(JSON.stringify({ level, message, ...data }));
      return;
    }
    // info payloads are noise unless asked for
    const showData = data !== undefined && (level !== "info" || verbose);
    const suffix = showData ? ` ${JSON.stringify(data)}` : "";
    write(COLOURS[level](`[${level}] ${message}${suffix}`));
  }

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
