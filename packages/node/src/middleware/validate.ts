/**
 * Zod request parsing.
 *
 * Failures throw RequestValidationError, which the error handler turns
 * into a 400 envelope listing the failing paths.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestValidationError } from "../types/error.js";

export async function parseBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }
  return parse(schema, body, "Request body validation failed");
}

export function parseQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  return parse(schema, c.req.query(), "Invalid query parameters");
}

export function parseParam<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
): T {
  return parse(schema, value, "Invalid path parameter");
}

function parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, message: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(message, formatZodErrors(result.error));
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
