import winston from "winston";
import { config } from "./index.js";

/**
 * Process-wide structured logger: one JSON object per line, tagged with
 * service, version and env. Silent under NODE_ENV=test; tests that assert on
 * log calls mock this module instead.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  defaultMeta: {
    service: config.appName,
    version: config.appVersion,
    env: config.nodeEnv,
  },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [new winston.transports.Console()],
});
