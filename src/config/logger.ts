import winston from "winston";
import { config, type LogLevel } from "./index.js";

/** Numeric priorities, most severe first. */
export const logLevels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  notice: 2,
  success: 3,
  info: 4,
  debug: 5,
};

winston.addColors({
  error: "red",
  warn: "yellow",
  notice: "cyan",
  success: "green",
  info: "white",
  debug: "gray",
});

const consoleFormat = winston.format.printf(({ timestamp, level, message, server, ...meta }) => {
  const tag = typeof server === "string" ? ` [${server}]` : "";
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level}${tag}: ${message}${extra}`;
});

export const logger = winston.createLogger({
  levels: logLevels,
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  format: winston.format.combine(winston.format.errors({ stack: true }), winston.format.splat()),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn"],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: "HH:mm:ss" }),
        consoleFormat,
      ),
    }),
  ],
});

type LogMeta = Record<string, unknown>;

/** Leveled logger bound to one server name. */
export interface ServerLog {
  success(message: string, meta?: LogMeta): void;
  notice(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  err(message: string, meta?: LogMeta): void;
}

export function createServerLog(server: string, base: winston.Logger = logger): ServerLog {
  const child = base.child({ server });
  const emit = (level: LogLevel) => (message: string, meta: LogMeta = {}) => {
    child.log(level, message, meta);
  };
  return {
    success: emit("success"),
    notice: emit("notice"),
    warn: emit("warn"),
    info: emit("info"),
    err: emit("error"),
  };
}
