import { serve } from "@hono/node-server";
import { createApp } from "./app.ts";
import { loadEnv } from "./config/env.ts";
import { errorMessage } from "./lib/errors.ts";
import { openPipelineContext } from "./services/pipeline-context.ts";
import { logger } from "./services/structured-logger.ts";

const env = loadEnv();
const context = openPipelineContext(env);
const app = createApp(context);

const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    logger.info("server", `Signal API listening on port ${info.port}`);
  },
);

function shutdown(signal: string): void {
  logger.info("server", `Received ${signal}, shutting down`);
  server.close();
  context.close().catch((err: unknown) => {
    logger.error("server", "Failed to close pipeline context", new Error(errorMessage(err)));
    process.exitCode = 1;
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
