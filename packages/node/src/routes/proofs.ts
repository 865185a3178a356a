/**
 * Proof relay route.
 *
 * POST /api/v1/proofs/:prover — Deliver evidence to a registered prover
 *
 * The evidence `kind` must match the prover's mechanism. The response
 * lists each proven intent with "applied" or "duplicate".
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, EvidenceSchema } from "../types/dto.js";
import { parseBody, parseParam } from "../middleware/validate.js";
import { toJson } from "../types/json.js";

export function createProofRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/:prover", async (c) => {
    const service = c.get("service");
    const prover = parseParam(AddressSchema, c.req.param("prover"));
    const evidence = await parseBody(c, EvidenceSchema);

    const recorded = service.relayProof(prover, evidence);

    return c.json({ data: toJson(recorded) });
  });

  return routes;
}
