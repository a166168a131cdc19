/**
 * Local audio device via the sox command-line tools.
 *
 * Uses two kinds of child processes: a long-lived `rec` for mic capture and a
 * short-lived `play` per synthesized buffer. Both exchange raw 16-bit signed
 * mono PCM over stdio.
 *
 * Responsibilities:
 * - Spawn `rec` and cut its stdout into fixed-size frames
 * - Fail fast with a DeviceError when the mic produces no data
 * - Spawn `play` for each buffer and kill it on abort
 */

import { spawn, type ChildProcess } from "child_process";

import { DeviceError } from "./errors.js";
import { createFrameSplitter, createFrameTimestamper } from "./pcm.js";

import type { AudioDevice, CaptureHandle } from "./audio-adapter.js";
import type { AudioFrame, SynthesizedAudio } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Timeout for rec to produce its first data chunk (ms) */
const MIC_DATA_TIMEOUT_MS = 5_000;

/** sox raw format arguments shared by rec and play */
function rawFormatArgs(sampleRate: number): string[] {
  return ["-t", "raw", "-b", "16", "-e", "signed-integer", "-r", String(sampleRate), "-c", "1"];
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a local AudioDevice backed by sox.
 *
 * @param sampleRate - Mic sample rate in Hz (e.g. 16000 for VAD/STT)
 * @param frameMs - Frame duration in ms (e.g. 30)
 * @returns An AudioDevice for local mic and speaker I/O
 */
export function createLocalAudioDevice(sampleRate: number, frameMs: number): AudioDevice {
  const frameSamples = Math.round((sampleRate * frameMs) / 1000);

  /**
   * Start `rec` and wait for the first PCM chunk before reporting success.
   *
   * @param onFrame - Called with each captured frame
   * @throws DeviceError if rec is missing, exits early, or stays silent
   */
  async function openCapture(onFrame: (frame: AudioFrame) => void): Promise<CaptureHandle> {
    const proc = spawn("rec", ["-q", ...rawFormatArgs(sampleRate), "-"], {
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stopped = false;
    const stamp = createFrameTimestamper(sampleRate, Date.now());
    const push = createFrameSplitter(frameSamples, (pcm) => {
      onFrame({ pcm, sampleRate, timestamp: stamp(pcm.length) });
    });
    proc.stdout?.on("data", (chunk: Buffer) => {
      if (!stopped) push(chunk);
    });

    await waitForFirstData(proc);

    proc.on("exit", (code) => {
      if (!stopped) console.error(`[audio] rec exited unexpectedly (code ${code})`);
    });
    proc.on("error", (err) => console.error(`[audio] rec error: ${err.message}`));

    console.log(`[audio] mic open at ${sampleRate}Hz, ${frameSamples}-sample frames`);

    return {
      stop() {
        if (stopped) return;
        stopped = true;
        proc.kill("SIGTERM");
      },
    };
  }

  /**
   * Pipe a buffer into `play` and resolve when it exits.
   *
   * @param audio - PCM to play
   * @param signal - Aborting kills the player
   * @throws DeviceError if play is missing or exits with an error
   */
  function play(audio: SynthesizedAudio, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const proc = spawn("play", ["-q", ...rawFormatArgs(audio.sampleRate), "-"], {
        stdio: ["pipe", "ignore", "pipe"],
      });

      let stderr = "";
      proc.stderr?.on("data", (d: Buffer) => { stderr += d.toString(); });

      const onAbort = () => proc.kill("SIGTERM");
      signal.addEventListener("abort", onAbort, { once: true });

      proc.on("error", (err) => {
        signal.removeEventListener("abort", onAbort);
        reject(new DeviceError(`Speaker unavailable: ${err.message}`));
      });

      proc.on("close", (code) => {
        signal.removeEventListener("abort", onAbort);
        if (code === 0 || signal.aborted) {
          resolve();
        } else {
          reject(new DeviceError(`play exited with code ${code}: ${stderr.trim()}`));
        }
      });

      // EPIPE when the player is killed mid-write
      proc.stdin?.on("error", (err) => {
        if (!signal.aborted) console.error(`[audio] play stdin error: ${err.message}`);
      });
      proc.stdin?.end(audio.pcm);
    });
  }

  return { sampleRate, openCapture, play };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Wait for the capture process to emit its first stdout chunk.
 *
 * @param proc - The rec child process
 * @throws DeviceError on spawn error, early exit or timeout
 */
function waitForFirstData(proc: ChildProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const stdout = proc.stdout;
    if (!stdout) {
      reject(new DeviceError("rec has no stdout"));
      return;
    }

    let stderr = "";
    const onStderr = (d: Buffer) => { stderr += d.toString(); };
    proc.stderr?.on("data", onStderr);

    const cleanup = () => {
      clearTimeout(timeout);
      stdout.off("data", onData);
      proc.off("error", onError);
      proc.off("exit", onExit);
      proc.stderr?.off("data", onStderr);
    };

    const fail = (message: string) => {
      cleanup();
      proc.kill("SIGTERM");
      reject(new DeviceError(message));
    };

    const timeout = setTimeout(() => {
      fail(`Microphone produced no audio within ${MIC_DATA_TIMEOUT_MS}ms`);
    }, MIC_DATA_TIMEOUT_MS);

    const onData = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => fail(`Microphone unavailable: ${err.message}`);
    const onExit = (code: number | null) => fail(`rec exited with code ${code}: ${stderr.trim()}`);

    stdout.on("data", onData);
    proc.on("error", onError);
    proc.on("exit", onExit);
  });
}
