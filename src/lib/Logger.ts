import { createLogger, format, transports, type Logger } from "winston";

export function buildLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return createLogger({
    level,
    format: format.combine(
      format.timestamp(),
      format.printf(({ timestamp, level, message }) => `${timestamp} [${level.toUpperCase()}] ${message}`)
    ),
    transports: [new transports.Console()],
  });
}

export const logger = buildLogger();
