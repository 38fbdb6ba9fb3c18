import { HashMap, Logger, Option, type LogLevel } from "effect";
import { STATUS_ANNOTATION } from "~/logging";
import { c } from "./colors";

export type StatusLabel = "INFO" | "SUCCESS" | "WARNING" | "ERROR" | "DEBUG";

export const statusLabel = (
  level: LogLevel.LogLevel,
  annotations: HashMap.HashMap<string, unknown>
): StatusLabel => {
  switch (level._tag) {
    case "Fatal":
    case "Error":
      return "ERROR";
    case "Warning":
      return "WARNING";
    case "Info":
      return Option.contains(HashMap.get(annotations, STATUS_ANNOTATION), "success") ? "SUCCESS" : "INFO";
    default:
      return "DEBUG";
  }
};

const LABEL_COLORS: Record<StatusLabel, (s: string) => string> = {
  INFO: c.blue,
  SUCCESS: c.green,
  WARNING: c.yellow,
  ERROR: c.red,
  DEBUG: c.dim,
};

export const messageText = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

export const formatLine = (
  level: LogLevel.LogLevel,
  annotations: HashMap.HashMap<string, unknown>,
  message: unknown
): string => {
  const label = statusLabel(level, annotations);
  return `${LABEL_COLORS[label](`[${label}]`)} ${messageText(message)}`;
};

/**
 * Colour-coded status lines for humans, one per log call.
 */
export const statusLogger = Logger.make(({ logLevel, annotations, message }) => {
  globalThis.console.log(formatLine(logLevel, annotations, message));
});

export const StatusLoggerLive = Logger.replace(Logger.defaultLogger, statusLogger);
