/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests can drive the app without starting an HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { SettlementService } from "./services/settlement-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createIntentRoutes } from "./routes/intents.js";
import { createProofRoutes } from "./routes/proofs.js";
import { createEventRoutes } from "./routes/events.js";

export interface CreateAppOptions {
  readonly service: SettlementService;
  /** Request and error logging. Default: silent */
  readonly logger?: Logger;
}

export function createApp(options: CreateAppOptions): Hono<AppEnv> {
  const { service } = options;
  const logger = options.logger ?? pino({ level: "silent" });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(logger));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/intents", createIntentRoutes());
  app.route("/api/v1/proofs", createProofRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return app;
}
