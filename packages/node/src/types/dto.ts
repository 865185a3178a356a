/**
 * Request DTOs with Zod validation schemas.
 *
 * Quantities travel as decimal strings and leave these schemas as
 * bigint; addresses are checksummed on the way in.
 */

import { z } from "zod";
import { getAddress, isAddress, isHex, size } from "viem";
import { UINT64_MAX, UINT256_MAX } from "@intentvault/types";
import type { Address, Bytes32, Hex } from "@intentvault/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const UintSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "must be a non-negative decimal integer string")
  .transform((v) => BigInt(v));

export const Uint64Schema = UintSchema.refine((v) => v <= UINT64_MAX, "must fit in 64 bits");

export const Uint256Schema = UintSchema.refine((v) => v <= UINT256_MAX, "must fit in 256 bits");

export const AddressSchema = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "must be a 20-byte hex address")
  .transform((v): Address => getAddress(v));

export const HexSchema = z
  .string()
  .refine((v): v is Hex => isHex(v, { strict: true }), "must be 0x-prefixed hex");

export const Bytes32Schema = z
  .string()
  .refine((v): v is Bytes32 => isHex(v, { strict: true }) && size(v) === 32, "must be 32 bytes of hex");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Intent DTOs
// =============================================================================

export const TokenAmountSchema = z.object({
  token: AddressSchema,
  amount: Uint256Schema,
});

export const CallSchema = z.object({
  target: AddressSchema,
  data: HexSchema,
  value: Uint256Schema,
});

export const RouteSchema = z.object({
  salt: Bytes32Schema,
  deadline: Uint64Schema,
  portal: AddressSchema,
  nativeAmount: Uint256Schema,
  tokens: z.array(TokenAmountSchema),
  calls: z.array(CallSchema),
});

export const RewardSchema = z.object({
  deadline: Uint64Schema,
  creator: AddressSchema,
  prover: AddressSchema,
  nativeAmount: Uint256Schema,
  tokens: z.array(TokenAmountSchema),
});

export const IntentSchema = z.object({
  destination: Uint64Schema,
  route: RouteSchema,
  reward: RewardSchema,
});

export type IntentDto = z.infer<typeof IntentSchema>;

/**
 * Addresses a vault the way funding and distribution calls do.
 */
export const VaultKeySchema = z.object({
  destination: Uint64Schema,
  routeHash: Bytes32Schema,
  reward: RewardSchema,
});

export const FundSchema = VaultKeySchema.extend({
  funder: AddressSchema,
  allowPartial: z.boolean().optional(),
});

export type FundDto = z.infer<typeof FundSchema>;

export const PublishAndFundSchema = z.object({
  intent: IntentSchema,
  funder: AddressSchema,
  allowPartial: z.boolean().optional(),
});

export type PublishAndFundDto = z.infer<typeof PublishAndFundSchema>;

export const BatchWithdrawSchema = z.object({
  destinations: z.array(Uint64Schema),
  routeHashes: z.array(Bytes32Schema),
  rewards: z.array(RewardSchema),
});

export type BatchWithdrawDto = z.infer<typeof BatchWithdrawSchema>;

export const RecoverTokenSchema = VaultKeySchema.extend({
  token: AddressSchema,
});

export type RecoverTokenDto = z.infer<typeof RecoverTokenSchema>;

// =============================================================================
// Proof DTOs
// =============================================================================

const ProofNodesSchema = z.array(HexSchema);

const FulfillmentProofSchema = z.object({
  intentHash: Bytes32Schema,
  claimant: AddressSchema,
  storageProof: ProofNodesSchema,
});

const OutputRootPreimageSchema = z.object({
  version: Bytes32Schema,
  stateRoot: Bytes32Schema,
  messagePasserStorageRoot: Bytes32Schema,
  latestBlockHash: Bytes32Schema,
});

export const EvidenceSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("self"),
    attester: AddressSchema,
    destination: Uint64Schema,
    claims: z.array(z.object({ intentHash: Bytes32Schema, claimant: AddressSchema })),
  }),
  z.object({
    kind: z.literal("bedrock"),
    destination: Uint64Schema,
    settlementHeader: HexSchema,
    outputIndex: Uint256Schema,
    outputOracleAccountProof: ProofNodesSchema,
    outputRootStorageProof: ProofNodesSchema,
    output: OutputRootPreimageSchema,
    inboxAccountProof: ProofNodesSchema,
    fulfillments: z.array(FulfillmentProofSchema),
  }),
  z.object({
    kind: z.literal("cannon"),
    destination: Uint64Schema,
    settlementHeader: HexSchema,
    gameIndex: Uint256Schema,
    factoryAccountProof: ProofNodesSchema,
    gameListStorageProof: ProofNodesSchema,
    gameAccountProof: ProofNodesSchema,
    gameStatusStorageProof: ProofNodesSchema,
    rootClaimStorageProof: ProofNodesSchema,
    output: OutputRootPreimageSchema,
    inboxAccountProof: ProofNodesSchema,
    fulfillments: z.array(FulfillmentProofSchema),
  }),
  z.object({
    kind: z.literal("nitro"),
    destination: Uint64Schema,
    settlementHeader: HexSchema,
    nodeNumber: Uint64Schema,
    rollupAccountProof: ProofNodesSchema,
    latestConfirmedStorageProof: ProofNodesSchema,
    confirmDataStorageProof: ProofNodesSchema,
    destinationHeader: HexSchema,
    inboxAccountProof: ProofNodesSchema,
    fulfillments: z.array(FulfillmentProofSchema),
  }),
  z.object({
    kind: z.literal("hyperProver"),
    caller: AddressSchema,
    origin: Uint64Schema,
    sender: Bytes32Schema,
    body: HexSchema,
  }),
]);

export type EvidenceDto = z.infer<typeof EvidenceSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
  intentHash: Bytes32Schema.optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
