// ---------------------------------------------------------------------------
// Logging – pino root logger with per-subsystem children
// ---------------------------------------------------------------------------

import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";

export type SubsystemLogger = Logger;

function resolveLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (typeof envLevel === "string" && envLevel.trim().length > 0) {
    return envLevel.trim();
  }
  return "info";
}

function buildLoggerOptions(): LoggerOptions {
  return {
    level: resolveLevel(),
    base: { service: "gateway-bootstrap" },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
}

const rootLogger: Logger = pino(buildLoggerOptions());

export function getChildLogger(bindings: Record<string, unknown>): SubsystemLogger {
  return rootLogger.child(bindings);
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return getChildLogger({ subsystem });
}

/**
 * Short fingerprint for secrets that must show up in logs
 * (e.g. to tell whether two boots resolved the same token).
 */
export function fingerprintSecret(secret: string): string {
  if (secret.length <= 8) {
    return "***";
  }
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}
