/**
 * Single-instance endpoint lock using PID lock files.
 *
 * Only one speech queue may drive the speakers, and only one listener may own
 * the microphone. Each endpoint takes a lock file named after its role inside
 * the signal directory. Locks left behind by crashed processes are reclaimed.
 *
 * Responsibilities:
 * - Acquire a role lock by writing the current PID into <dir>/<role>.lock
 * - Reclaim lock files whose PID is no longer alive
 * - Release the lock file on shutdown or process exit
 */

import { mkdirSync, readFileSync, writeFileSync, unlinkSync } from "fs";
import { join } from "path";

import { isErrnoError } from "./errors.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Handle returned by acquireEndpointLock. Call release() to free the role.
 */
export interface EndpointLock {
  /** Release the lock (deletes the lock file) */
  release: () => void;
}

export type EndpointRole = "speaker" | "listener";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Acquire the lock for an endpoint role. Throws if a live process holds it.
 *
 * The lock file is created with the exclusive flag, so two processes racing
 * for a free role cannot both succeed. A stale file (dead PID or garbage
 * contents) is removed and the create is retried once.
 *
 * @param dir - Directory holding lock files (the signal directory)
 * @param role - Which endpoint is starting
 * @returns An EndpointLock handle with a release() method
 * @throws Error if another live process holds the role
 */
export function acquireEndpointLock(dir: string, role: EndpointRole): EndpointLock {
  mkdirSync(dir, { recursive: true });
  const lockFile = join(dir, `${role}.lock`);

  if (!tryCreate(lockFile)) {
    const holder = readHolder(lockFile);
    if (holder !== null && holder !== process.pid && isProcessAlive(holder)) {
      throw new Error(`The ${role} endpoint is already running (pid ${holder}).`);
    }
    // Stale lock file -- process is dead, clean it up
    removeIfPresent(lockFile);
    if (!tryCreate(lockFile)) {
      throw new Error(`Could not acquire the ${role} lock at ${lockFile}.`);
    }
  }

  let released = false;

  /** Delete the lock file if it hasn't been released yet */
  function release(): void {
    if (released) return;
    released = true;
    removeIfPresent(lockFile);
  }

  // Safety net: release on process exit
  process.on("exit", release);

  return { release };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Check if a process with the given PID is still alive.
 * Uses signal 0 which does not kill the process -- it only checks existence.
 * EPERM means the process exists but belongs to another user.
 *
 * @param pid - The process ID to check
 * @returns true if the process is alive, false otherwise
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return isErrnoError(err, "EPERM");
  }
}

/** Create the lock file exclusively. False if it already exists. */
function tryCreate(lockFile: string): boolean {
  try {
    writeFileSync(lockFile, String(process.pid), { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (err) {
    if (isErrnoError(err, "EEXIST")) return false;
    throw err;
  }
}

/** PID recorded in a lock file, null if unreadable */
function readHolder(lockFile: string): number | null {
  try {
    const pid = parseInt(readFileSync(lockFile, "utf-8").trim(), 10);
    return isNaN(pid) ? null : pid;
  } catch (err) {
    if (isErrnoError(err, "ENOENT")) return null;
    throw err;
  }
}

function removeIfPresent(path: string): void {
  try {
    unlinkSync(path);
  } catch (err) {
    if (!isErrnoError(err, "ENOENT")) throw err;
  }
}
