import winston from "winston";

const level = process.env.LOG_LEVEL ?? "info";
const isProduction = process.env.NODE_ENV === "production";

/**
 * Process-wide logger. Call as `logger.info("message", { ...meta })`.
 *
 * Production writes one JSON object per line; everything else gets a
 * colourised single-line format. The Console transport is synchronous, so
 * messages logged right before `process.exit` are not lost.
 */
export const logger = winston.createLogger({
  level,
  format: isProduction
    ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: "HH:mm:ss.SSS" }),
        winston.format.errors({ stack: true }),
        winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
          const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
          return `${String(timestamp)} ${lvl}: ${String(message)}${rest}`;
        }),
      ),
  defaultMeta: { service: "mesh-collector" },
  transports: [new winston.transports.Console()],
});
