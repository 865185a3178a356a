/**
 * @intentvault/node — Settlement coordinator and HTTP API.
 *
 * @packageDocumentation
 */

export { SettlementService } from "./services/settlement-service.js";
export type {
  SettlementServiceConfig,
  VaultState,
  ReadEventsOptions,
} from "./services/settlement-service.js";
export { createSettlementService } from "./services/bootstrap.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions } from "./app.js";
export type { AppEnv } from "./types/api-contract.js";
export { createErrorEnvelope, RequestValidationError } from "./types/error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./types/error.js";
export { toJson } from "./types/json.js";
export type { Json } from "./types/json.js";
export * from "./types/dto.js";
