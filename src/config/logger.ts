import pino from "pino";
import type { LogLevel } from "./env.ts";

// stdout carries the MCP stdio channel, so everything goes to stderr
const logger = pino(
  {
    // Entry points switch to the configured level once config is loaded
    level: process.env.NODE_ENV === "test" ? "silent" : "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  },
  pino.destination(2),
);

export function setLogLevel(level: LogLevel | "silent"): void {
  logger.level = level;
}

export function getLogLevel(): string {
  return logger.level;
}

export function debug(message: string): void {
  logger.debug(message);
}

export function info(message: string): void {
  logger.info(message);
}

export function warn(message: string): void {
  logger.warn(message);
}

export function error(message: string): void {
  logger.error(message);
}
