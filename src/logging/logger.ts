// ---------------------------------------------------------------------------
// Pino logger factory for request-shield.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { AppConfig, LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

const SERVICE_NAME = "request-shield";

/**
 * Credentials a caller can put in front of the shield. Request context and
 * wrapped-operation arguments may carry them into a log line.
 */
const SECRET_PATHS: string[] = [
  "*.apiKey",
  "*.token",
  "*.password",
  "req.headers.authorization",
  "req.headers.cookie",
  'req.headers["x-api-key"]',
];

/** Logging settings implied by the application config. */
export function loggingConfigFrom(config: AppConfig): LoggingConfig {
  return {
    level: config.logLevel,
    env: config.env,
    prettyPrint: config.env === "development",
    redactSecrets: true,
  };
}

/**
 * Every line carries `service`, `version` and `env`, an ISO timestamp and the
 * level as a label. Development output goes through `pino-pretty`; an explicit
 * `destination` takes precedence over it.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: SERVICE_NAME,
      version: process.env["APP_VERSION"] ?? "dev",
      env: config.env,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    ...(config.redactSecrets
      ? { redact: { paths: SECRET_PATHS, censor: "[REDACTED]" } }
      : {}),
  };

  if (destination) {
    return pino(options, destination);
  }

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname,service,version" },
      },
    });
  }

  return pino(options);
}
