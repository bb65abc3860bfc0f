import { createLogger, format, transports, type Logger } from "winston";
import { DEFAULT_CONFIG } from "./config";

export function createEngineLogger(level: string = DEFAULT_CONFIG.logLevel): Logger {
  return createLogger({
    level,
    silent: process.env.NODE_ENV === "test",
    format: format.combine(
      format.timestamp(),
      format.printf(({ timestamp, level, message }) => {
        return `${timestamp} [${level.toUpperCase()}] ${message}`;
      })
    ),
    transports: [new transports.Console()],
  });
}

export const logger = createEngineLogger();
