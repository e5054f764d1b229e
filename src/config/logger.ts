import winston from "winston";

const { combine, timestamp, errors, json } = winston.format;

/**
 * Process-wide structured logger.
 *
 * Reads LOG_LEVEL directly rather than through config so that config parse
 * failures can still be logged.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: "instance-runtime" },
  transports: [new winston.transports.Console({ silent: process.env.NODE_ENV === "test" })],
});
