import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

export const LOG_LEVEL_IDS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

export type LogLevelName = keyof typeof LOG_LEVEL_IDS;

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ["silly", "trace", "debug", "info", "warn", "error", "fatal"];

const DEFAULT_MIN_LEVEL = LOG_LEVEL_IDS.warn;

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LOG_LEVEL_IDS, value);
}

/**
 * Parses a level name (`debug`) or number (`2`, clamped to 0-6).
 * Returns undefined for blank or unknown values.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase() ?? "";
  if (normalized === "") {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return isLogLevelName(normalized) ? LOG_LEVEL_IDS[normalized] : undefined;
}

function parseEnvBoolean(value?: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for terminals, 'json' for machines
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   * @default "promptloom"
   */
  name?: string;

  /**
   * Write JSON lines to this file instead of the console.
   */
  logFile?: string;

  /**
   * Truncate the log file instead of appending to it.
   * @default false
   */
  logReset?: boolean;
}

/**
 * Create a new logger.
 *
 * Options win over the environment: `PROMPTLOOM_LOG_LEVEL` (name or 0-6),
 * `PROMPTLOOM_LOG_FILE` and `PROMPTLOOM_LOG_RESET`. With a log file, console
 * output is hidden and every record is appended to the file as one JSON line.
 * If the file cannot be written, the failure is reported once on stderr and
 * later records are dropped.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: 2 });
 * const quiet = createLogger({ type: "hidden" });
 * const toFile = createLogger({ logFile: "/tmp/promptloom.log", logReset: true });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const minLevel = options.minLevel ?? parseLogLevel(process.env.PROMPTLOOM_LOG_LEVEL) ?? DEFAULT_MIN_LEVEL;
  const logFile = options.logFile?.trim() || process.env.PROMPTLOOM_LOG_FILE?.trim() || "";
  const logReset = options.logReset ?? parseEnvBoolean(process.env.PROMPTLOOM_LOG_RESET) ?? false;

  let type: NonNullable<LoggerOptions["type"]> = options.type ?? "pretty";
  let fileStream: WriteStream | undefined;

  if (logFile) {
    try {
      mkdirSync(dirname(logFile), { recursive: true });
      fileStream = createWriteStream(logFile, { flags: logReset ? "w" : "a" });
      type = "hidden";
    } catch (error) {
      console.error(`Failed to open log file ${logFile}:`, error);
    }
  }

  const logger = new Logger<ILogObj>({
    name: options.name ?? "promptloom",
    minLevel,
    type,
    hideLogPositionForProduction: type !== "pretty",
    prettyLogTemplate:
      type === "pretty" ? "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}} {{logLevelName}} [{{name}}] " : undefined,
  });

  if (fileStream) {
    const stream = fileStream;
    let failed = false;

    // Open errors are emitted asynchronously, after the try block
    stream.on("error", (error) => {
      if (failed) return;
      failed = true;
      console.error(`Failed to write log file ${logFile}:`, error.message);
    });

    logger.attachTransport((logObj) => {
      if (failed) return;
      stream.write(`${JSON.stringify(logObj)}\n`);
    });
  }

  return logger;
}

/**
 * Logger used by components that are not handed one.
 */
export const defaultLogger = createLogger();
