// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { AppEnv } from "../env.js";

// SECURITY: a client-supplied id is only reused when it is short and plain,
// so that it cannot smuggle newlines or control characters into log lines.
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that tags every request with an id, stored as
 * `"requestId"` on the context and echoed in the `X-Request-ID` header.
 *
 * An incoming `X-Request-ID` is reused when it matches a safe format;
 * otherwise a fresh `randomUUID()` is generated.
 */
export function requestIdMiddleware(): (
  c: Context<AppEnv>,
  next: Next,
) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing)
        ? existing
        : randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
