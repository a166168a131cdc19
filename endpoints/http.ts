/**
 * Request parsing and error mapping shared by the TTS and STT routes.
 *
 * Responsibilities:
 * - Read an optional JSON body into a plain record
 * - Pull typed optional fields and query flags out of a request
 * - Map VoiceError codes onto HTTP responses
 */

import { AlreadyActiveError, InvalidInputError, InvalidParameterError, NotActiveError } from "../sidecar/errors.js";

import type { Context } from "hono";

// ============================================================================
// INTERFACES
// ============================================================================

export type JsonBody = Record<string, unknown>;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Hono error handler for the voice endpoints.
 * Misuse (already listening, not listening) is a normal `{ result }`,
 * bad input is 400, anything else 500.
 */
export function handleVoiceError(err: Error, c: Context): Response {
  if (err instanceof AlreadyActiveError || err instanceof NotActiveError) {
    return c.json({ result: err.message });
  }
  if (err instanceof InvalidInputError || err instanceof InvalidParameterError) {
    return c.json({ error: err.message }, 400);
  }
  console.error(`[endpoint] ${c.req.method} ${c.req.path} failed: ${err.message}`);
  return c.json({ error: err.message }, 500);
}

/**
 * Read the request body as a JSON object. An empty body is `{}`.
 *
 * @throws InvalidInputError if the body is not a JSON object
 */
export async function readJsonBody(c: Context): Promise<JsonBody> {
  const raw = await c.req.text();
  if (!raw.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new InvalidInputError("Request body must be valid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidInputError("Request body must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** @throws InvalidInputError if present and not a string */
export function optionalString(body: JsonBody, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new InvalidInputError(`'${key}' must be a string`);
  return value;
}

/** @throws InvalidInputError if present and not a finite number */
export function optionalNumber(body: JsonBody, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidInputError(`'${key}' must be a number`);
  }
  return value;
}

/** @throws InvalidInputError if present and not a boolean */
export function optionalBoolean(body: JsonBody, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new InvalidInputError(`'${key}' must be true or false`);
  return value;
}

/** "true"/"1" are true, "false"/"0" false, absent is the fallback */
export function queryFlag(raw: string | undefined, name: string, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new InvalidInputError(`'${name}' must be true or false`);
}

/** @throws InvalidInputError if present and not a number */
export function queryNumber(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new InvalidInputError(`'${name}' must be a number`);
  return value;
}
