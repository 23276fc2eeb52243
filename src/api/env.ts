// ---------------------------------------------------------------------------
// Typed Hono context variables shared by middleware and routes.
// ---------------------------------------------------------------------------

import type pino from "pino";

export interface AppEnv {
  Variables: {
    requestId: string;
    logger: pino.Logger;
    /** Caller identity resolved by the rate-limit middleware. */
    userId: string;
  };
}

/** Accepted shape for user ids and operation names arriving over HTTP. */
export const SAFE_IDENTIFIER_RE = /^[a-zA-Z0-9_-]{1,64}$/;
