import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const STDERR = 2;

/**
 * Logs go to stderr (or a file) so that command output on stdout stays
 * clean for the host agent that parses it.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "warn";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const options: pino.LoggerOptions = { level, base: { app: "mindprint" } };

  if (level === "silent") {
    return pino(options);
  }

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  if (isJson) {
    return pino(options, pino.destination(STDERR));
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: STDERR },
    },
  });
}
