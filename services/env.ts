/**
 * Environment file (.env) reader.
 *
 * Shared by the launcher and both endpoints:
 * - Parse raw .env content into key-value records
 * - Read .env from disk with a configurable path
 */

import { readFile } from "fs/promises";
import { join } from "path";

import { isErrnoError } from "../sidecar/errors.js";

// ============================================================================
// TYPES
// ============================================================================

/** Key-value record representing parsed .env contents */
export type EnvRecord = Record<string, string>;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Read and parse a .env file from disk.
 * Returns an empty record if the file does not exist.
 *
 * @param envPath - Absolute path to the .env file. Defaults to process.cwd()/.env
 * @returns Parsed key-value pairs from the .env file
 * @throws Error if the file exists but cannot be read
 */
export async function readEnv(envPath?: string): Promise<EnvRecord> {
  const filePath = envPath ?? join(process.cwd(), ".env");
  try {
    return parseEnvFile(await readFile(filePath, "utf-8"));
  } catch (err) {
    if (isErrnoError(err, "ENOENT")) return {};
    throw err;
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Parse a .env file string into a key-value record.
 * Handles lines in the format KEY=VALUE (optionally prefixed with "export"),
 * ignores empty lines and comments, and strips one pair of matching quotes.
 * Keeps empty values (KEY= produces { KEY: "" }).
 *
 * @param content - Raw .env file content
 * @returns Parsed key-value pairs
 */
export function parseEnvFile(content: string): EnvRecord {
  const result: EnvRecord = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, "");
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim();
    const value = unquote(trimmed.slice(eqIndex + 1).trim());
    result[key] = value;
  }
  return result;
}

function unquote(value: string): string {
  const quoted = value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0]);
  return quoted ? value.slice(1, -1) : value;
}
