/**
 * Named markers shared between the speaker and listener processes.
 *
 * Two backings share one interface: a directory of marker files for separate
 * processes, and an in-memory map when both endpoints live in one process.
 *
 * Responsibilities:
 * - Publish a marker with a timestamp and an optional payload
 * - Atomically test-and-clear a marker so exactly one consumer observes it
 * - Read a marker without consuming it
 */

import { mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { randomUUID } from "crypto";

import { systemClock } from "./clock.js";
import { isErrnoError } from "./errors.js";

import type { Clock } from "./clock.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** Stop requests and the speaker state record */
export type SignalKey = "stop" | "speaker";

export interface SignalRecord {
  /** Epoch milliseconds at which the marker was written */
  timestamp: number;
  payload: string;
}

export interface SignalStore {
  /** Publish (or overwrite) a marker */
  set(key: SignalKey, payload?: string): void;
  /** Remove a marker. Returns true only for the caller that removed it. */
  testAndClear(key: SignalKey): boolean;
  /** Read a marker without consuming it, null when absent */
  get(key: SignalKey): SignalRecord | null;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const FILE_NAMES: Record<SignalKey, string> = {
  stop: "stop.signal",
  speaker: "speaker.signal",
};

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a store backed by marker files in `dir`.
 *
 * Writes go to a temporary file that is renamed over the marker, so readers
 * never see a half-written record. testAndClear renames the marker to a
 * unique claim name before unlinking it; of several racing consumers only one
 * rename succeeds.
 *
 * @param dir - Directory for the marker files, created if missing
 * @param clock - Time source for marker timestamps
 */
export function createFileSignalStore(dir: string, clock: Clock = systemClock): SignalStore {
  mkdirSync(dir, { recursive: true });

  const pathFor = (key: SignalKey) => join(dir, FILE_NAMES[key]);

  function set(key: SignalKey, payload = ""): void {
    const target = pathFor(key);
    const tmp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    const record: SignalRecord = { timestamp: clock.now(), payload };
    writeFileSync(tmp, JSON.stringify(record), "utf-8");
    renameSync(tmp, target);
  }

  function testAndClear(key: SignalKey): boolean {
    const claim = `${pathFor(key)}.${randomUUID()}.claim`;
    try {
      renameSync(pathFor(key), claim);
    } catch (err) {
      if (isErrnoError(err, "ENOENT")) return false;
      throw err;
    }
    unlinkSync(claim);
    return true;
  }

  function get(key: SignalKey): SignalRecord | null {
    let raw: string;
    try {
      raw = readFileSync(pathFor(key), "utf-8");
    } catch (err) {
      if (isErrnoError(err, "ENOENT")) return null;
      throw err;
    }
    return parseRecord(raw);
  }

  return { set, testAndClear, get };
}

/**
 * Create a store backed by a Map, for endpoints that share one process.
 * Node runs these operations to completion, so each one is atomic.
 *
 * @param clock - Time source for marker timestamps
 */
export function createMemorySignalStore(clock: Clock = systemClock): SignalStore {
  const markers = new Map<SignalKey, SignalRecord>();

  return {
    set(key, payload = "") {
      markers.set(key, { timestamp: clock.now(), payload });
    },
    testAndClear(key) {
      return markers.delete(key);
    },
    get(key) {
      return markers.get(key) ?? null;
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Parse a marker file body. A file written by something other than this
 * store (e.g. `touch stop.signal`) still counts as present, stamped at 0.
 */
function parseRecord(raw: string): SignalRecord {
  const parsed = parseJson(raw);
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "timestamp" in parsed &&
    typeof parsed.timestamp === "number"
  ) {
    const payload = "payload" in parsed && typeof parsed.payload === "string" ? parsed.payload : "";
    return { timestamp: parsed.timestamp, payload };
  }
  return { timestamp: 0, payload: raw.trim() };
}

/** JSON.parse that yields undefined for non-JSON input */
function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
