/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope. Every domain package throws an Error subclass with a
 * `code`; the code decides the HTTP status.
 */

import type { Context } from "hono";
import type { Logger } from "pino";
import { createErrorEnvelope, RequestValidationError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Request shape
  VALIDATION_ERROR: 400,
  ARRAY_LENGTH_MISMATCH: 400,
  INVALID_INTENT: 400,
  INVALID_AMOUNT: 400,

  // Lookups
  VAULT_NOT_FOUND: 404,
  UNKNOWN_PROVER: 404,

  // Terminal-state and duplicate conflicts
  DUPLICATE_INTENT: 409,
  DUPLICATE_PROVER: 409,
  ALREADY_FUNDED: 409,
  ALREADY_CLAIMED: 409,
  ALREADY_REFUNDED: 409,
  ALREADY_WITHDRAWN: 409,

  // Proof source
  UNAUTHORIZED_PROOF_SOURCE: 403,

  // Business rules
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  INSUFFICIENT_PERMIT: 422,
  TRANSFER_FAILED: 422,
  INVALID_DELEGATED_APPROVAL: 422,
  NOT_YET_EXPIRED: 422,
  NOT_CLAIMED: 422,
  TOKEN_NOT_RECOVERABLE: 422,
  INVALID_PROOF: 422,
  DESTINATION_MISMATCH: 422,
  UNSUPPORTED_DESTINATION: 422,
};

interface CodedError extends Error {
  readonly code: string;
}

function isCodedError(err: Error): err is CodedError {
  return "code" in err && typeof err.code === "string";
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Creates the handler registered with Hono's onError.
 *
 * Unmapped errors become 500 and are logged; their message is not
 * returned to the caller.
 */
export function createErrorHandler(logger: Logger): (err: Error, c: Context) => Response {
  return (err, c) => {
    const status = isCodedError(err) ? (STATUS_MAP[err.code] ?? 500) : 500;
    const code = isCodedError(err) && status !== 500 ? err.code : "INTERNAL_ERROR";

    if (status === 500) {
      logger.error({ err }, "Unhandled error");
      return c.json(createErrorEnvelope(code, "Internal server error"), status);
    }

    const details =
      err instanceof RequestValidationError ? { issues: err.issues } : undefined;
    return c.json(createErrorEnvelope(code, err.message, details), status);
  };
}
