import log from "loglevel";

export enum LoggerLevel {
  TRACE = "trace",
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  SILENT = "silent",
}

const DEFAULT_LOG_LEVEL = LoggerLevel.SILENT;
const LOGGER_LEVELS: readonly LoggerLevel[] = Object.values(LoggerLevel);

export const logger = log.getLogger("responses-sdk");
logger.setLevel(DEFAULT_LOG_LEVEL);

export function setLogLevel(level: LoggerLevel): void {
  logger.setLevel(level);
}

export function parseLoggerLevel(raw: string | undefined): LoggerLevel | undefined {
  const normalized = raw?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  return LOGGER_LEVELS.find((level) => level === normalized);
}
