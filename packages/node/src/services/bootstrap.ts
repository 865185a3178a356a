/**
 * Builds a SettlementService from validated configuration.
 *
 * Only the self and message-relay provers can be described by
 * environment variables; storage-proof provers need per-chain slot
 * layouts and are registered in code through `registerProver`.
 */

import type { Logger } from "pino";
import { createHyperVerifier, createSelfVerifier } from "@intentvault/proof";
import type { AppConfig } from "../config.js";
import { SettlementService } from "./settlement-service.js";

export function createSettlementService(config: AppConfig, logger: Logger): SettlementService {
  const service = new SettlementService({
    template: {
      deployer: config.PORTAL_ADDRESS,
      initCodeHash: config.VAULT_INIT_CODE_HASH,
      create2Prefix: config.CREATE2_PREFIX,
    },
    logger,
  });

  if (config.SELF_PROVER_ADDRESS !== undefined) {
    service.registerProver(
      config.SELF_PROVER_ADDRESS,
      createSelfVerifier({ attesters: config.SELF_ATTESTERS }),
    );
  }

  if (config.HYPER_PROVER_ADDRESS !== undefined && config.HYPER_MAILBOX !== undefined) {
    service.registerProver(
      config.HYPER_PROVER_ADDRESS,
      createHyperVerifier({ mailbox: config.HYPER_MAILBOX, whitelist: config.HYPER_WHITELIST }),
    );
  }

  return service;
}
