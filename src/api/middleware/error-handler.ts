// ---------------------------------------------------------------------------
// Hono error handler: maps errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { RequestValidationError } from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/**
 * Hono `onError` handler.
 *
 * - `RequestValidationError` -> 400 with its message (it only echoes caller input)
 * - everything else          -> 500, message hidden in production
 *
 * Rate-limit and quota denials never reach this handler: they are ordinary
 * responses produced by the middleware and routes.
 */
export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof RequestValidationError) {
    return c.json({ error: err.message, type: "validation_error" }, 400);
  }

  c.get("logger")?.error({ err: { name: err.name, message: err.message } }, "unhandled error");

  const isProduction = process.env["NODE_ENV"] === "production";
  const message = isProduction ? "Internal server error" : err.message;

  return c.json({ error: message, type: "internal_error" }, 500);
}
