import pino from "pino";
import type { ServiceConfig } from "./config.js";

type LoggerConfig = Pick<ServiceConfig, "LOG_LEVEL">;

export function loggerOptions(config: LoggerConfig) {
  return {
    level: config.LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

export function createLogger(config: LoggerConfig) {
  return pino(loggerOptions(config));
}
