/**
 * Local neural text-to-speech via a persistent synthesis subprocess.
 *
 * Spawns the configured server command once (lazily, on first health check or
 * synthesis), waits for it to print READY on stderr, then sends one JSON
 * command per utterance on stdin. Audio comes back on stdout as
 * length-prefixed raw PCM chunks terminated by a 0-length frame.
 *
 * Responsibilities:
 * - Spawn and manage the synthesis subprocess lifecycle
 * - Read length-prefixed PCM chunks from the subprocess stdout
 * - On abort, send an interrupt command and drain the stale generation
 *   before the next utterance is sent
 * - Respawn the subprocess after it dies
 */

import { spawn, type ChildProcess } from "child_process";

import { BackendUnavailableError, errorMessage } from "./errors.js";

import type { Readable } from "stream";
import type { AudioSynthesisBackend, SpeakRequest } from "./synthesis-backend.js";
import type { SynthesizedAudio } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Sample rate of the PCM the server emits */
const DEFAULT_SAMPLE_RATE = 24000;

/** Timeout for waiting for the subprocess to be ready (ms) */
const READY_TIMEOUT_MS = 120_000;

// ============================================================================
// INTERFACES
// ============================================================================

export interface LocalTtsConfig {
  /** Command line of the synthesis server, e.g. ["tts-server", "--model", "voice.onnx"] */
  serverCommand: string[];
  sampleRate?: number;
  readyTimeoutMs?: number;
}

/** A running server with its pipes */
interface ServerProcess {
  proc: ChildProcess;
  stdin: NodeJS.WritableStream;
  stdout: Readable;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the local synthesis backend. Nothing is spawned until first use.
 *
 * @param config - Server command line and output sample rate
 * @returns An audio backend named "local"
 */
export function createLocalTts(config: LocalTtsConfig): AudioSynthesisBackend {
  const sampleRate = config.sampleRate ?? DEFAULT_SAMPLE_RATE;
  const readyTimeoutMs = config.readyTimeoutMs ?? READY_TIMEOUT_MS;

  let server: ServerProcess | null = null;
  let starting: Promise<ServerProcess> | null = null;
  let destroyed = false;

  // Settles once stdout has been read up to the end marker of the last generation
  let drained: Promise<void> = Promise.resolve();

  /** Spawn the server if it is not running and wait for READY */
  function ensureStarted(): Promise<ServerProcess> {
    if (server) return Promise.resolve(server);
    if (destroyed) return Promise.reject(new BackendUnavailableError("Local TTS has been destroyed"));
    if (!starting) {
      starting = startServer(config.serverCommand, readyTimeoutMs)
        .then((started) => {
          server = started;
          started.proc.on("exit", (code) => {
            console.log(`[tts] server exited (code ${code})`);
            if (server === started) server = null;
          });
          return started;
        })
        .finally(() => {
          starting = null;
        });
    }
    return starting;
  }

  async function checkHealth(): Promise<boolean> {
    try {
      await ensureStarted();
      return true;
    } catch (err) {
      console.error(`[tts] local server unavailable: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Generate audio for one utterance.
   *
   * @param request - Text, voice and speed
   * @param signal - Aborting sends an interrupt and rejects immediately
   * @returns The full PCM for the utterance
   * @throws Error if the server fails, dies mid-generation, or the signal aborts
   */
  async function synthesize(request: SpeakRequest, signal: AbortSignal): Promise<SynthesizedAudio> {
    await drained;
    if (signal.aborted) throw new Error("Synthesis aborted");

    const active = await ensureStarted();
    sendCommand(active, { cmd: "generate", text: request.text, voice: request.voice ?? null, speed: request.speed });

    const chunks: Buffer[] = [];
    const reading = (async () => {
      for await (const pcm of readPcmChunks(active.stdout)) {
        if (!signal.aborted) chunks.push(pcm);
      }
    })();

    drained = reading.catch((err) => {
      console.error(`[tts] lost sync with server, restarting: ${errorMessage(err)}`);
      active.proc.kill("SIGTERM");
      if (server === active) server = null;
    });

    const onAbort = () => sendCommand(active, { cmd: "interrupt" });
    signal.addEventListener("abort", onAbort, { once: true });
    try {
      await Promise.race([reading, abortPromise(signal)]);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }

    if (signal.aborted) throw new Error("Synthesis aborted");
    return { pcm: Buffer.concat(chunks), sampleRate };
  }

  /**
   * Free all resources: ask the server to quit, then kill it.
   */
  function destroy(): void {
    if (destroyed) return;
    destroyed = true;
    if (server) {
      sendCommand(server, { cmd: "quit" });
      server.proc.kill("SIGTERM");
      server = null;
    }
  }

  return { name: "local", kind: "audio", checkHealth, synthesize, destroy };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Spawn the server and wait for READY.
 *
 * @param command - argv of the server
 * @param timeoutMs - How long to wait for READY
 * @throws BackendUnavailableError if the command is empty, fails to spawn or never gets ready
 */
async function startServer(command: string[], timeoutMs: number): Promise<ServerProcess> {
  const [bin, ...args] = command;
  if (!bin) throw new BackendUnavailableError("No local TTS server command configured");

  const proc = spawn(bin, args, { stdio: ["pipe", "pipe", "pipe"] });
  const { stdin, stdout, stderr } = proc;
  if (!stdin || !stdout || !stderr) {
    proc.kill("SIGTERM");
    throw new BackendUnavailableError("TTS server was spawned without pipes");
  }
  stdin.on("error", (err) => console.error(`[tts] server stdin error: ${err.message}`));

  try {
    await waitForReady(proc, stderr, timeoutMs);
  } catch (err) {
    proc.kill("SIGTERM");
    throw err;
  }
  proc.on("error", (err) => console.error(`[tts] server error: ${err.message}`));
  return { proc, stdin, stdout };
}

/**
 * Wait for the subprocess to print READY on stderr. Keeps logging its
 * stderr afterwards.
 *
 * @param proc - The child process to monitor
 * @param stderr - Its stderr stream
 * @param timeoutMs - Ready timeout
 * @throws BackendUnavailableError if the subprocess exits or times out before READY
 */
function waitForReady(proc: ChildProcess, stderr: Readable, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let stderrBuffer = "";

    const logLines = (text: string) => {
      for (const line of text.split("\n")) {
        const trimmed = line.trim();
        if (trimmed && trimmed !== "READY") console.log(`[tts-server] ${trimmed}`);
      }
    };

    const cleanup = () => {
      clearTimeout(timeout);
      stderr.off("data", onData);
      proc.off("error", onError);
      proc.off("exit", onExit);
    };

    const onData = (data: Buffer) => {
      const text = data.toString();
      stderrBuffer += text;
      logLines(text);
      if (stderrBuffer.includes("READY")) {
        cleanup();
        stderr.on("data", (d: Buffer) => logLines(d.toString()));
        resolve();
      }
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new BackendUnavailableError(`TTS server failed to start: ${err.message}`));
    };
    const onExit = (code: number | null) => {
      cleanup();
      reject(new BackendUnavailableError(`TTS server exited with code ${code} before READY`));
    };

    const timeout = setTimeout(() => {
      cleanup();
      reject(new BackendUnavailableError(`TTS server did not become ready within ${timeoutMs}ms`));
    }, timeoutMs);

    stderr.on("data", onData);
    proc.on("error", onError);
    proc.on("exit", onExit);
  });
}

/**
 * Send a JSON command line to the subprocess stdin.
 */
function sendCommand(server: ServerProcess, cmd: Record<string, unknown>): void {
  server.stdin.write(JSON.stringify(cmd) + "\n");
}

/** Resolve when the signal aborts */
function abortPromise(signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Async generator that reads length-prefixed PCM chunks from the subprocess stdout.
 * Yields Buffer objects until a 0-length end marker is received.
 *
 * @param stdout - The subprocess stdout
 * @yields Buffer of raw 16-bit signed PCM audio
 */
async function* readPcmChunks(stdout: Readable): AsyncGenerator<Buffer> {
  while (true) {
    const header = await readExactly(stdout, 4);
    const length = header.readUInt32BE(0);

    if (length === 0) return;

    yield await readExactly(stdout, length);
  }
}

/**
 * Read exactly N bytes from a readable stream.
 *
 * @param stream - The readable stream (paused mode)
 * @param size - Number of bytes to read
 * @returns Buffer containing exactly size bytes
 * @throws Error if the stream ends or errors first
 */
function readExactly(stream: Readable, size: number): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const cleanup = () => {
      stream.removeListener("error", onError);
      stream.removeListener("end", onEnd);
      stream.removeListener("readable", tryRead);
    };

    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    const onEnd = () => {
      cleanup();
      reject(new Error("Stream ended before reading enough bytes"));
    };

    function tryRead(): void {
      while (received < size) {
        const chunk: unknown = stream.read(size - received);
        if (!Buffer.isBuffer(chunk)) {
          // Fewer bytes buffered than requested: take whatever is there
          const partial: unknown = stream.readableLength > 0 ? stream.read(stream.readableLength) : null;
          if (!Buffer.isBuffer(partial)) {
            stream.once("readable", tryRead);
            return;
          }
          chunks.push(partial);
          received += partial.length;
          continue;
        }
        chunks.push(chunk);
        received += chunk.length;
      }

      cleanup();
      resolve(Buffer.concat(chunks).subarray(0, size));
    }

    stream.once("error", onError);
    stream.once("end", onEnd);

    tryRead();
  });
}
