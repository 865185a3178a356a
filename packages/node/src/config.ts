/**
 * Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isHex, size } from "viem";
import type { Hex } from "@intentvault/types";
import { AddressSchema, Bytes32Schema } from "./types/dto.js";

// =============================================================================
// Field Schemas
// =============================================================================

const PrefixSchema = z
  .string()
  .refine((v): v is Hex => isHex(v, { strict: true }) && size(v) === 1, "must be one byte of hex");

/**
 * Comma-separated list; blank entries are dropped.
 */
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .string()
    .default("")
    .transform((raw) => raw.split(",").map((s) => s.trim()).filter((s) => s !== ""))
    .pipe(z.array(item));
}

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Source chain
  CHAIN_ID: z.coerce.bigint().min(1n),
  PORTAL_ADDRESS: AddressSchema,
  VAULT_INIT_CODE_HASH: Bytes32Schema,
  CREATE2_PREFIX: PrefixSchema.default("0xff"),

  // Self-attested proofs
  SELF_PROVER_ADDRESS: AddressSchema.optional(),
  SELF_ATTESTERS: listOf(AddressSchema),

  // Message-relay proofs
  HYPER_PROVER_ADDRESS: AddressSchema.optional(),
  HYPER_MAILBOX: AddressSchema.optional(),
  HYPER_WHITELIST: listOf(Bytes32Schema),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const config = ConfigSchema.parse(env);
  if (config.HYPER_PROVER_ADDRESS !== undefined && config.HYPER_MAILBOX === undefined) {
    throw new z.ZodError([
      {
        code: "custom",
        path: ["HYPER_MAILBOX"],
        message: "required when HYPER_PROVER_ADDRESS is set",
      },
    ]);
  }
  return config;
}
