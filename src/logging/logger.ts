import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const base: pino.LoggerOptions = { level, name: "phasewatch" };

  if (config?.file) {
    return pino(base, pino.destination(config.file));
  }

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  if (isJson) {
    return pino(base, pino.destination(2));
  }

  // stderr keeps stdout clean for --json output
  return pino({
    ...base,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
    },
  });
}

/** Logger that drops everything; for library callers and tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
