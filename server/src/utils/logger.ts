import winston from "winston";

export type AppLogger = Pick<winston.Logger, "debug" | "info" | "warn" | "error">;

const lineFormat = winston.format.printf(
  ({ timestamp, level, message, stack, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    const trace = typeof stack === "string" ? `\n${stack}` : "";
    return `${timestamp} ${level.toUpperCase()}: ${message}${rest}${trace}`;
  },
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.LOG_SILENT === "true",
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.splat(),
    lineFormat,
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
