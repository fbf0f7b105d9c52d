import winston from "winston";

const { combine, timestamp, errors, splat, printf, colorize } = winston.format;

const lineFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${ts}] ${level}: ${stack ?? message}${extra}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.LOG_SILENT === "true",
  format: combine(
    errors({ stack: true }),
    timestamp(),
    splat(),
    process.stdout.isTTY ? colorize() : winston.format.uncolorize(),
    lineFormat,
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
