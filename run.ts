/**
 * Top-level launcher for the speech output and speech input endpoints.
 *
 * Responsibilities:
 * - Spawn the tts and stt endpoints as child processes sharing one signal
 *   directory, or a single combined child when VOICE_COLOCATED is set
 * - Prefix each child's output lines with its endpoint name
 * - Aggregate sox buffer underflow warnings into summary lines
 * - Forward SIGINT/SIGTERM and stop the remaining child when one exits
 */

import { spawn, type ChildProcess } from "child_process";
import { dirname, extname, join } from "path";
import { createInterface } from "readline";
import { fileURLToPath } from "url";

import { loadConfig } from "./services/config.js";
import { errorMessage } from "./sidecar/errors.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const UNDERFLOW = "buffer underflow";

/** Running from sources needs the tsx loader; the built tree does not */
const HERE = fileURLToPath(import.meta.url);
const FROM_SOURCE = extname(HERE) === ".ts";
const ENDPOINT_ENTRY = join(dirname(HERE), "endpoints", FROM_SOURCE ? "main.ts" : "main.js");

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

async function main(): Promise<void> {
  const config = await loadConfig();
  const modes = config.colocated ? ["both"] : ["tts", "stt"];
  console.log(`[run] signal directory: ${config.signalDir}`);

  const children = modes.map((mode) => spawnEndpoint(mode));
  let exiting = false;

  // Forward signals
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      exiting = true;
      for (const child of children) child.kill(signal);
    });
  }

  let remaining = children.length;
  let exitCode = 0;
  for (const [index, child] of children.entries()) {
    child.on("exit", (code) => {
      flushUnderflowCount();
      console.log(`[run] ${modes[index]} endpoint exited with code ${code ?? "null"}`);
      if (code !== 0) exitCode = code ?? 1;
      if (!exiting) {
        exiting = true;
        for (const other of children) if (other !== child) other.kill("SIGTERM");
      }
      if (--remaining === 0) process.exit(exitCode);
    });
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

let underflowCount = 0;
let underflowTimer: ReturnType<typeof setTimeout> | null = null;

/**
 * Flush accumulated underflow warnings as a single summary line.
 */
function flushUnderflowCount(): void {
  if (underflowTimer) clearTimeout(underflowTimer);
  underflowTimer = null;
  if (underflowCount > 0) {
    process.stderr.write(`[sox] buffer underflow x${underflowCount}\n`);
    underflowCount = 0;
  }
}

/**
 * Write a line of child output under its endpoint prefix, aggregating underflow warnings.
 *
 * @param prefix - Endpoint name, e.g. "tts"
 * @param line - A single line of output from the child process
 * @param dest - Destination stream (stdout or stderr)
 */
function filterLine(prefix: string, line: string, dest: NodeJS.WritableStream): void {
  if (line.includes(UNDERFLOW)) {
    underflowCount++;
    if (underflowTimer) clearTimeout(underflowTimer);
    underflowTimer = setTimeout(flushUnderflowCount, 2000);
    return;
  }
  flushUnderflowCount();
  dest.write(`[${prefix}] ${line}\n`);
}

/**
 * Spawn one endpoint child process with prefixed stdout/stderr.
 *
 * @param mode - "tts", "stt" or "both"
 */
function spawnEndpoint(mode: string): ChildProcess {
  const args = FROM_SOURCE ? ["--import", "tsx", ENDPOINT_ENTRY, mode] : [ENDPOINT_ENTRY, mode];
  const child = spawn(process.execPath, args, {
    stdio: ["ignore", "pipe", "pipe"],
    env: process.env,
  });

  if (child.stdout) createInterface({ input: child.stdout }).on("line", (l) => filterLine(mode, l, process.stdout));
  if (child.stderr) createInterface({ input: child.stderr }).on("line", (l) => filterLine(mode, l, process.stderr));

  return child;
}

// ============================================================================
// ENTRY POINT
// ============================================================================

main().catch((err: unknown) => {
  console.error(`[run] startup failed: ${errorMessage(err)}`);
  process.exit(1);
});
