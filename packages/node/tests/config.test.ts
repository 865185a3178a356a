/**
 * Tests for config.ts and the service bootstrap.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { loadConfig } from "../src/config.js";
import { createSettlementService } from "../src/services/bootstrap.js";
import { ATTESTER, HYPER_PROVER, HYPER_SENDER, INIT_CODE_HASH, MAILBOX, PORTAL, SELF_PROVER } from "./setup.js";

const BASE_ENV = {
  CHAIN_ID: "8453",
  PORTAL_ADDRESS: PORTAL.toLowerCase(),
  VAULT_INIT_CODE_HASH: INIT_CODE_HASH,
};

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults to a minimal environment", () => {
    const config = loadConfig(BASE_ENV);

    expect(config).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      CHAIN_ID: 8453n,
      PORTAL_ADDRESS: PORTAL,
      VAULT_INIT_CODE_HASH: INIT_CODE_HASH,
      CREATE2_PREFIX: "0xff",
      SELF_ATTESTERS: [],
      HYPER_WHITELIST: [],
    });
  });

  it("parses comma-separated lists and drops blank entries", () => {
    const config = loadConfig({
      ...BASE_ENV,
      SELF_ATTESTERS: ` ${ATTESTER.toLowerCase()} , ${SELF_PROVER} ,`,
    });

    expect(config.SELF_ATTESTERS).toEqual([ATTESTER, SELF_PROVER]);
  });

  it("coerces the port", () => {
    expect(loadConfig({ ...BASE_ENV, PORT: "8080" }).PORT).toBe(8080);
  });

  it("throws on an out-of-range port", () => {
    expect(() => loadConfig({ ...BASE_ENV, PORT: "0" })).toThrow();
  });

  it("throws when the portal is missing", () => {
    expect(() => loadConfig({ CHAIN_ID: "8453", VAULT_INIT_CODE_HASH: INIT_CODE_HASH })).toThrow();
  });

  it("throws on a malformed attester", () => {
    expect(() => loadConfig({ ...BASE_ENV, SELF_ATTESTERS: "0x1234" })).toThrow();
  });

  it("throws on a prefix longer than one byte", () => {
    expect(() => loadConfig({ ...BASE_ENV, CREATE2_PREFIX: "0xff41" })).toThrow();
  });

  it("requires a mailbox for the message-relay prover", () => {
    expect(() => loadConfig({ ...BASE_ENV, HYPER_PROVER_ADDRESS: HYPER_PROVER })).toThrow(
      "required when HYPER_PROVER_ADDRESS is set",
    );
  });
});

// =============================================================================
// createSettlementService
// =============================================================================

describe("createSettlementService", () => {
  const logger = pino({ level: "silent" });

  it("registers no provers by default", () => {
    const service = createSettlementService(loadConfig(BASE_ENV), logger);
    expect(service.provers.list()).toEqual([]);
  });

  it("registers the configured provers", () => {
    const config = loadConfig({
      ...BASE_ENV,
      SELF_PROVER_ADDRESS: SELF_PROVER,
      SELF_ATTESTERS: ATTESTER,
      HYPER_PROVER_ADDRESS: HYPER_PROVER,
      HYPER_MAILBOX: MAILBOX,
      HYPER_WHITELIST: HYPER_SENDER,
    });

    const service = createSettlementService(config, logger);

    expect(service.provers.list().map((p) => p.mechanism)).toEqual(["self", "hyperProver"]);
  });

  it("derives vaults from the configured portal", () => {
    const service = createSettlementService(loadConfig(BASE_ENV), logger);
    expect(service.registry.template.deployer).toBe(PORTAL);
  });
});
