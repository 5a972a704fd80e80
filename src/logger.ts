import { appendFileSync } from "node:fs";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  logFile?: string;
  now?: () => Date;
  write?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "INFO"): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toUpperCase();
  if (isLogLevel(normalized)) return normalized;
  throw new Error(`Unknown log level "${value}". Expected one of ${LOG_LEVELS.join(", ")}.`);
}

export function createLogger({
  level = "INFO",
  logFile,
  now = () => new Date(),
  write = (line: string) => console.error(line),
}: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (messageLevel: LogLevel, message: string) => {
    if (LEVEL_RANK[messageLevel] < threshold) return;
    const line = `${now().toISOString()} ${messageLevel} ${message}`;
    write(line);
    if (logFile) appendFileSync(logFile, `${line}\n`, "utf8");
  };

  return {
    debug: (message) => emit("DEBUG", message),
    info: (message) => emit("INFO", message),
    warn: (message) => emit("WARNING", message),
    error: (message) => emit("ERROR", message),
  };
}

export const LOG_LEVEL_ENV = "PAGE_BBOX_QA_LOG_LEVEL";

/** Level named by the environment, or the fallback when it is unset or unknown. */
export function levelFromEnvironment(env: NodeJS.ProcessEnv = process.env, fallback: LogLevel = "INFO"): LogLevel {
  const value = env[LOG_LEVEL_ENV]?.trim().toUpperCase();
  return value !== undefined && isLogLevel(value) ? value : fallback;
}

export const defaultLogger: Logger = createLogger({ level: levelFromEnvironment() });
