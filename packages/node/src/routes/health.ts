/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check: the notification log's hash chain is intact
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { SettlementService } from "../services/settlement-service.js";

export function createHealthRoutes(service: SettlementService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.eventStore.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      provers: service.provers.list().map((p) => ({ address: p.address, mechanism: p.mechanism })),
      events: service.eventStore.globalPosition(),
      chainErrors: integrity.errors.length,
    };
    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
