/**
 * Intent routes.
 *
 * POST /api/v1/intents/hash              — Intent hashes and vault address
 * POST /api/v1/intents                   — Publish an intent
 * POST /api/v1/intents/fund              — Fund a vault
 * POST /api/v1/intents/publish-and-fund  — Publish and fund in one call
 * POST /api/v1/intents/funded            — Whether a vault holds its full reward
 * GET  /api/v1/intents/:hash/status      — Claim status
 * GET  /api/v1/intents/:hash/vault       — Vault balances and funding completeness
 * POST /api/v1/intents/withdraw          — Pay the proven claimant
 * POST /api/v1/intents/batch-withdraw    — Withdraw several intents
 * POST /api/v1/intents/refund            — Return an expired reward to its creator
 * POST /api/v1/intents/recover           — Sweep a non-reward token to the creator
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  BatchWithdrawSchema,
  Bytes32Schema,
  FundSchema,
  IntentSchema,
  PublishAndFundSchema,
  RecoverTokenSchema,
  VaultKeySchema,
} from "../types/dto.js";
import { parseBody, parseParam } from "../middleware/validate.js";
import { toJson } from "../types/json.js";

export function createIntentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/hash", async (c) => {
    const service = c.get("service");
    const intent = await parseBody(c, IntentSchema);

    const hashes = service.getIntentHash(intent);
    const vault = service.intentVaultAddress(intent);

    return c.json({ data: { ...hashes, vault } });
  });

  routes.post("/", async (c) => {
    const service = c.get("service");
    const intent = await parseBody(c, IntentSchema);

    const record = service.publish(intent);

    return c.json({ data: toJson(record) }, 201);
  });

  routes.post("/fund", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, FundSchema);

    const result = service.fundFor(body.destination, body.routeHash, body.reward, body.funder, {
      allowPartial: body.allowPartial,
    });

    return c.json({ data: toJson(result) });
  });

  routes.post("/publish-and-fund", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, PublishAndFundSchema);

    const result = service.publishAndFundFor(body.intent, body.funder, {
      allowPartial: body.allowPartial,
    });

    return c.json({ data: toJson(result) }, 201);
  });

  routes.post("/funded", async (c) => {
    const service = c.get("service");
    const intent = await parseBody(c, IntentSchema);

    return c.json({ data: { funded: service.isIntentFunded(intent) } });
  });

  routes.get("/:hash/status", (c) => {
    const service = c.get("service");
    const intentHash = parseParam(Bytes32Schema, c.req.param("hash"));

    return c.json({ data: { intentHash, status: service.getRewardStatus(intentHash) } });
  });

  routes.get("/:hash/vault", (c) => {
    const service = c.get("service");
    const intentHash = parseParam(Bytes32Schema, c.req.param("hash"));

    return c.json({ data: toJson(service.getVaultState(intentHash)) });
  });

  routes.post("/withdraw", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, VaultKeySchema);

    const result = service.withdrawRewards(body.destination, body.routeHash, body.reward);

    return c.json({ data: toJson(result) });
  });

  routes.post("/batch-withdraw", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, BatchWithdrawSchema);

    const outcomes = service.batchWithdraw(body.destinations, body.routeHashes, body.rewards);

    return c.json({ data: toJson(outcomes) });
  });

  routes.post("/refund", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, VaultKeySchema);

    const result = service.refund(body.destination, body.routeHash, body.reward);

    return c.json({ data: toJson(result) });
  });

  routes.post("/recover", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, RecoverTokenSchema);

    const result = service.recoverToken(body.destination, body.routeHash, body.reward, body.token);

    return c.json({ data: toJson(result) });
  });

  return routes;
}
