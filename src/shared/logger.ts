import pino from "pino";
import type { LogLevel } from "./types.js";

export type Logger = pino.Logger;

export function createLogger(level: LogLevel): Logger {
  return pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
