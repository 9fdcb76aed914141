import { Hono } from "hono";
import { errorMessage } from "../lib/errors.ts";

const startedAt = Date.now();

type StoreCheck =
  | { connected: true; latency: number }
  | { connected: false; error: string };

async function checkStore(ping: () => Promise<void>): Promise<StoreCheck> {
  const pingStart = Date.now();
  try {
    await ping();
    return { connected: true, latency: Date.now() - pingStart };
  } catch (err) {
    return { connected: false, error: errorMessage(err) };
  }
}

/**
 * GET /health: "ok" when the store answers a round-trip, "degraded"
 * otherwise, with uptime in ms and the round-trip result under `database`.
 */
export function createHealthRoutes(ping: () => Promise<void>) {
  const healthRoutes = new Hono();

  healthRoutes.get("/", async (c) => {
    const database = await checkStore(ping);
    return c.json({
      status: database.connected ? "ok" : "degraded",
      uptime: Date.now() - startedAt,
      database,
      timestamp: new Date().toISOString(),
    });
  });

  return healthRoutes;
}
