/**
 * OS-native speech synthesizer, the fallback of last resort.
 *
 * macOS uses `say`, Linux uses `espeak-ng`. The synthesizer plays through its
 * own audio path, so this is a "direct" backend: it speaks instead of
 * returning PCM. Aborting kills the synthesizer process.
 *
 * Responsibilities:
 * - Build the platform command line (rate in words per minute, optional voice)
 * - Pad macOS speech with trailing silence so the last word is not clipped
 * - Kill the synthesizer on abort
 * - List installed voices
 */

import { execFile, spawn } from "child_process";
import { existsSync } from "fs";
import { delimiter, join } from "path";
import { promisify } from "util";

import { BackendUnavailableError, RequestRejectedError } from "./errors.js";

import type { DirectSynthesisBackend, SpeakRequest } from "./synthesis-backend.js";

const execFileAsync = promisify(execFile);

// ============================================================================
// CONSTANTS
// ============================================================================

/** Words per minute at speed 1.0 */
const BASE_WORDS_PER_MINUTE = 175;

/** macOS embedded command: 300ms of silence after the text */
const MACOS_TRAILING_SILENCE = "[[slnc 300]]";

/** How many voices listVoices returns */
const MAX_VOICES = 20;

// ============================================================================
// INTERFACES
// ============================================================================

export interface SpeechCommand {
  bin: string;
  args: string[];
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the OS-native synthesis backend for the given platform.
 *
 * @param platform - Defaults to the current process platform
 * @returns A direct backend named "system"
 */
export function createSystemTts(platform: NodeJS.Platform = process.platform): DirectSynthesisBackend {
  async function checkHealth(): Promise<boolean> {
    const command = buildSpeechCommand(platform, { text: "", speed: 1 });
    return command !== null && findOnPath(command.bin) !== null;
  }

  /**
   * Speak and resolve when the synthesizer exits.
   *
   * @throws BackendUnavailableError if the platform has no synthesizer or it fails
   * @throws RequestRejectedError if it fails while a voice override was given
   */
  function speak(request: SpeakRequest, signal: AbortSignal): Promise<void> {
    const command = buildSpeechCommand(platform, request);
    if (!command) {
      return Promise.reject(new BackendUnavailableError(`No native synthesizer on ${platform}`));
    }
    if (signal.aborted) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const proc = spawn(command.bin, command.args, { stdio: ["ignore", "ignore", "pipe"] });

      let stderr = "";
      proc.stderr?.on("data", (d: Buffer) => { stderr += d.toString(); });

      const onAbort = () => proc.kill("SIGTERM");
      signal.addEventListener("abort", onAbort, { once: true });

      proc.on("error", (err) => {
        signal.removeEventListener("abort", onAbort);
        reject(new BackendUnavailableError(`${command.bin} failed to start: ${err.message}`));
      });

      proc.on("close", (code) => {
        signal.removeEventListener("abort", onAbort);
        if (code === 0 || signal.aborted) {
          resolve();
        } else {
          reject(exitError(command.bin, code, stderr, request.voice));
        }
      });
    });
  }

  /**
   * List installed voices, one line per voice as the synthesizer prints it.
   *
   * @returns Up to 20 voice lines
   * @throws BackendUnavailableError if the platform has no synthesizer
   */
  async function listVoices(): Promise<string[]> {
    if (platform === "darwin") {
      const { stdout } = await execFileAsync("say", ["-v", "?"]);
      return parseVoiceList(stdout, false);
    }
    if (platform === "linux") {
      const { stdout } = await execFileAsync("espeak-ng", ["--voices"]);
      return parseVoiceList(stdout, true);
    }
    throw new BackendUnavailableError(`No native synthesizer on ${platform}`);
  }

  return { name: "system", kind: "direct", checkHealth, speak, listVoices };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Map a speed multiplier to synthesizer words per minute.
 */
export function wordsPerMinute(speed: number): number {
  return Math.round(speed * BASE_WORDS_PER_MINUTE);
}

/**
 * Build the synthesizer command line for a platform.
 *
 * @returns The command, or null on platforms without a supported synthesizer
 */
export function buildSpeechCommand(platform: NodeJS.Platform, request: SpeakRequest): SpeechCommand | null {
  const rate = String(wordsPerMinute(request.speed));
  const voiceArgs = request.voice ? ["-v", request.voice] : [];

  switch (platform) {
    case "darwin":
      return { bin: "say", args: ["-r", rate, ...voiceArgs, `${request.text} ${MACOS_TRAILING_SILENCE}`] };
    case "linux":
      return { bin: "espeak-ng", args: ["-s", rate, ...voiceArgs, request.text] };
    default:
      return null;
  }
}

/**
 * Classify a nonzero synthesizer exit. With a voice override in play the
 * override is the likely cause, so the failure is charged to the request.
 */
export function exitError(
  bin: string,
  code: number | null,
  stderr: string,
  voice: string | undefined,
): BackendUnavailableError | RequestRejectedError {
  const message = `${bin} exited with code ${code}: ${stderr.trim()}`;
  return voice ? new RequestRejectedError(message) : new BackendUnavailableError(message);
}

/**
 * Keep the first 20 non-empty lines of a voice listing.
 *
 * @param stdout - Raw listing
 * @param hasHeader - espeak-ng prints a column header first
 */
export function parseVoiceList(stdout: string, hasHeader: boolean): string[] {
  const lines = stdout.split("\n").map((line) => line.trimEnd()).filter((line) => line.trim().length > 0);
  return (hasHeader ? lines.slice(1) : lines).slice(0, MAX_VOICES);
}

/**
 * Locate an executable on PATH.
 *
 * @returns Absolute path, or null if not found
 */
export function findOnPath(bin: string, pathEnv: string = process.env.PATH ?? ""): string | null {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, bin);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}
