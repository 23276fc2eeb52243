// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint (for deployment).
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";

const runtime = buildApp();

const server = serve({
  fetch: runtime.app.fetch,
  port: runtime.config.port,
});

async function stop(signal: string): Promise<void> {
  runtime.logger.info({ signal }, "shutting down");
  server.close();
  await runtime.shutdown();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    stop(signal).catch((err: unknown) => {
      runtime.logger.error({ err }, "shutdown failed");
      process.exitCode = 1;
    });
  });
}
