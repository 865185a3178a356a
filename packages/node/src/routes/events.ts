/**
 * Notification log route.
 *
 * GET /api/v1/events — Settlement events in global order (cursor pagination)
 *
 * Query: `afterPosition`, `type` (e.g. "intent.funded"), `intentHash`.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { toJson } from "../types/json.js";

const POSITION_WIDTH = 16;

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const query = parseQuery(c, ListEventsQuerySchema);

    const events = service.readEvents({
      ...(query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : {}),
      ...(query.type !== undefined ? { type: query.type } : {}),
      ...(query.intentHash !== undefined ? { intentHash: query.intentHash } : {}),
    });

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => String(e.globalPosition).padStart(POSITION_WIDTH, "0"),
      "globalPosition",
    );

    return c.json<{} | null>(toJson(result));
  });

  return routes;
}
