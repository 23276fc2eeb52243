import { describe, it, expect } from "vitest";

import { createLogger, loggingConfigFrom } from "../../../src/logging/logger.js";
import { loadConfig } from "../../../src/config/config.js";
import type { LoggingConfig } from "../../../src/core/types.js";

function capture(config: LoggingConfig) {
  const lines: string[] = [];
  const logger = createLogger(config, { write: (line: string) => lines.push(line) });
  const entries = (): unknown[] => lines.map((line): unknown => JSON.parse(line));
  return { logger, entries };
}

describe("createLogger", () => {
  it("applies the configured level", () => {
    const { logger } = capture({ level: "warn", env: "staging", prettyPrint: false, redactSecrets: true });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("writes service, env and the level label on every line", () => {
    const { logger, entries } = capture({
      level: "info",
      env: "staging",
      prettyPrint: false,
      redactSecrets: false,
    });

    logger.info({ module: "cache" }, "cache cleared");

    expect(entries()).toEqual([
      expect.objectContaining({
        level: "info",
        service: "request-shield",
        env: "staging",
        module: "cache",
        msg: "cache cleared",
        time: expect.any(String),
      }),
    ]);
  });

  it("redacts credentials when enabled", () => {
    const { logger, entries } = capture({
      level: "info",
      env: "production",
      prettyPrint: false,
      redactSecrets: true,
    });

    logger.info({ upstream: { apiKey: "test-key", region: "eu" } }, "lookup");

    expect(entries()).toEqual([
      expect.objectContaining({ upstream: { apiKey: "[REDACTED]", region: "eu" } }),
    ]);
  });
});

describe("loggingConfigFrom", () => {
  it("pretty-prints only in development", () => {
    expect(loggingConfigFrom(loadConfig({ SHIELD_LOG_LEVEL: "debug" }))).toEqual({
      level: "debug",
      env: "development",
      prettyPrint: true,
      redactSecrets: true,
    });
    expect(loggingConfigFrom(loadConfig({ SHIELD_ENV: "production" })).prettyPrint).toBe(false);
  });
});
