import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const DEFAULT_MIN_LEVEL = 4;

function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

function parseEnvBoolean(value?: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

/**
 * Whether `logger` emits debug records. Lets callers skip building costly
 * log arguments.
 */
export function isDebugEnabled(logger: Logger<ILogObj>): boolean {
  return logger.settings.minLevel <= LEVEL_NAME_TO_ID.debug;
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for development, 'json' for production
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   * @default 'tasktree'
   */
  name?: string;

  /**
   * Truncate the log file instead of appending to it.
   * @default false
   */
  logReset?: boolean;
}

// All loggers in the process share one file stream.
let logFilePath: string | undefined;
let logFileStream: WriteStream | undefined;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Closes the shared log file stream. Used by tests.
 * @internal
 */
export function _resetFileLoggingState(): void {
  logFileStream?.end();
  logFileStream = undefined;
  logFilePath = undefined;
}

function openLogFile(path: string, reset: boolean): void {
  if (logFileStream && logFilePath === path) {
    return;
  }

  _resetFileLoggingState();

  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
    stream.on("error", (error) => {
      console.error(`[tasktree] Log file write error, file logging disabled: ${error.message}`);
      if (logFileStream === stream) {
        _resetFileLoggingState();
      }
    });
    logFileStream = stream;
    logFilePath = path;
  } catch (error) {
    console.error("Failed to initialize TASKTREE_LOG_FILE output:", error);
  }
}

/**
 * Create a logger.
 *
 * Options take precedence over the `TASKTREE_LOG_LEVEL`, `TASKTREE_LOG_FILE`
 * and `TASKTREE_LOG_RESET` environment variables. When a log file is set,
 * formatted lines go there with colors stripped instead of to the console.
 *
 * @example
 * ```typescript
 * // Show consume/terminate activity
 * const logger = createLogger({ minLevel: 2 });
 * const root = new TreeNode(null, { logger });
 *
 * // Silent logger for tests
 * const quiet = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const minLevel =
    options.minLevel ?? parseLogLevel(process.env.TASKTREE_LOG_LEVEL) ?? DEFAULT_MIN_LEVEL;
  const type = options.type ?? "pretty";
  const name = options.name ?? "tasktree";

  const logFile = process.env.TASKTREE_LOG_FILE?.trim();
  if (logFile) {
    const reset = options.logReset ?? parseEnvBoolean(process.env.TASKTREE_LOG_RESET) ?? false;
    openLogFile(logFile, reset);
  }

  const toFile = logFileStream !== undefined;

  return new Logger<ILogObj>({
    name,
    minLevel,
    type: toFile ? "pretty" : type,
    hideLogPositionForProduction: toFile || type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: toFile
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) => {
            if (!logFileStream) return;

            const args = logArgs.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            logFileStream.write(`${stripAnsi(logMetaMarkup)}${args.join(" ")}\n`);
          },
        }
      : undefined,
  });
}

/**
 * Default logger, used by nodes that were given none and have no parent to inherit one from.
 */
export const defaultLogger = createLogger();
