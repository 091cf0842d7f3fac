import winston from "winston";
import { logLevelSchema, type LogLevel } from "./config";

const lineFormat = winston.format.printf((info) => {
  const { timestamp, level, message, service, stack, ...extra } = info;
  let line = `${String(timestamp)} [${String(service ?? "slot-advisor")}] [${level.toUpperCase()}] ${String(message)}`;

  const context = Object.entries(extra)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => `${key}=${typeof value === "object" ? JSON.stringify(value) : String(value)}`)
    .join(" ");
  if (context) line += ` | ${context}`;
  if (stack) line += `\n${String(stack)}`;

  return line;
});

function buildLogger(level: LogLevel, defaultMeta?: { service: string }): winston.Logger {
  return winston.createLogger({
    level,
    silent: process.env.NODE_ENV === "test",
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSS[Z]" }),
      winston.format.errors({ stack: true }),
      lineFormat
    ),
    transports: [new winston.transports.Console()],
    ...(defaultMeta ? { defaultMeta } : {})
  });
}

export const logger = buildLogger(logLevelSchema.catch("info").parse(process.env.LOG_LEVEL));

export type Logger = winston.Logger;

/** A child of the root logger, or a standalone one when a level is given. */
export function createLogger(service: string, level?: LogLevel): Logger {
  return level ? buildLogger(level, { service }) : logger.child({ service });
}
