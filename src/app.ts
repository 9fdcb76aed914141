import { Hono } from "hono";
import type { PipelineConfig } from "./config/pipeline-config.ts";
import type { ClassificationRepository } from "./db/repository.ts";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";
import { createHealthRoutes } from "./routes/health.ts";
import { createSignalRoutes } from "./routes/signals.ts";

export interface AppDeps {
  repository: ClassificationRepository;
  config: Pick<PipelineConfig, "eventBaselineDays" | "controls" | "zeroVarianceSentinel">;
  ping: () => Promise<void>;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  // Health check (public)
  app.route("/health", createHealthRoutes(deps.ping));

  // Derived-table reads
  app.route("/api/v1", createSignalRoutes(deps));

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  return app;
}
