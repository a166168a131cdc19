/**
 * Endpoint process entry point.
 *
 * Serves the speech output endpoint, the speech input endpoint, or both from
 * one process. Separate processes coordinate through the file signal store in
 * VOICE_SIGNAL_DIR; a combined process uses an in-memory store and lets
 * interrupt() cancel the speech queue directly.
 *
 * Usage: node --import tsx endpoints/main.ts tts|stt|both
 *
 * Responsibilities:
 * - Load and validate configuration, refusing to start on errors
 * - Take the single-instance lock for each role served
 * - Wire backends, engine, audio device and coordination channel into the core
 * - Serve the Hono apps on 127.0.0.1 and shut down cleanly on SIGINT/SIGTERM
 */

import { serve } from "@hono/node-server";

import { sttRoutes } from "./routes/stt.js";
import { ttsRoutes } from "./routes/tts.js";
import { loadConfig, validateConfig } from "../services/config.js";
import { createCaptureController } from "../sidecar/capture-controller.js";
import { createCoordinationChannel, describeCoordination } from "../sidecar/coordination.js";
import { errorMessage } from "../sidecar/errors.js";
import { createLocalAudioDevice } from "../sidecar/local-audio.js";
import { acquireEndpointLock } from "../sidecar/session-lock.js";
import { createFileSignalStore, createMemorySignalStore } from "../sidecar/signal-store.js";
import { createSpeechQueue, describeOutcome } from "../sidecar/speech-queue.js";
import { createTranscriptionEngine } from "../sidecar/stt-provider.js";
import { createSynthesisBackends, listVoices } from "../sidecar/tts-provider.js";

import type { Hono } from "hono";
import type { EndpointRole } from "../sidecar/session-lock.js";
import type { PlaybackOutcome } from "../sidecar/types.js";
import type { SignalStore } from "../sidecar/signal-store.js";
import type { VoiceConfig } from "../sidecar/types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const HOSTNAME = "127.0.0.1";

const MODES = ["tts", "stt", "both"] as const;

// ============================================================================
// INTERFACES
// ============================================================================

type EndpointMode = (typeof MODES)[number];

/** Something to undo on shutdown, run in reverse order of creation */
type Cleanup = () => void | Promise<void>;

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

async function main(): Promise<void> {
  const config = await loadConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const error of errors) console.error(`[config] ${error}`);
    process.exit(1);
  }

  const mode = parseMode(process.argv[2], config);
  const cleanups: Cleanup[] = [];
  let stopping = false;

  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[endpoint] ${signal} received, shutting down`);
    for (const cleanup of cleanups.reverse()) {
      try {
        await cleanup();
      } catch (err) {
        console.error(`[endpoint] cleanup failed: ${errorMessage(err)}`);
      }
    }
    process.exit(0);
  };
  process.on("SIGINT", () => { void shutdown("SIGINT"); });
  process.on("SIGTERM", () => { void shutdown("SIGTERM"); });

  try {
    await startEndpoints(mode, config, cleanups);
  } catch (err) {
    stopping = true;
    for (const cleanup of cleanups.reverse()) await cleanup();
    throw err;
  }
}

/**
 * Build and serve the requested endpoints.
 *
 * @param cleanups - Receives one entry per resource that needs releasing
 */
async function startEndpoints(mode: EndpointMode, config: VoiceConfig, cleanups: Cleanup[]): Promise<void> {
  const combined = mode === "both";
  const store: SignalStore = combined ? createMemorySignalStore() : createFileSignalStore(config.signalDir);
  const device = createLocalAudioDevice(config.sampleRate, config.frameMs);
  const channelOptions = { store, speakingTtlMs: config.speakingTtlMs };

  let cancelSpeech: (() => number) | undefined;

  if (mode === "tts" || combined) {
    cleanups.push(takeLock(config.signalDir, "speaker"));

    const backends = createSynthesisBackends(config);
    const channel = createCoordinationChannel(channelOptions);
    console.log(`[endpoint] speaker coordination: ${describeCoordination(channel.snapshot())}`);
    const queue = createSpeechQueue({
      backends,
      device,
      channel,
      defaultSpeed: config.defaultSpeed,
      pollIntervalMs: config.pollIntervalMs,
      healthTtlMs: config.healthTtlMs,
    });
    cleanups.push(() => queue.close());
    cleanups.push(queue.onOutcome(logOutcome));
    if (combined) cancelSpeech = () => queue.cancelAll();

    console.log(`[endpoint] synthesis backends: ${backends.map((b) => b.name).join(" -> ")}`);
    const app = ttsRoutes({ queue, listVoices: () => listVoices(backends) });
    cleanups.push(await listen(app, config.ttsPort, "tts"));
  }

  if (mode === "stt" || combined) {
    cleanups.push(takeLock(config.signalDir, "listener"));

    const engine = createTranscriptionEngine(config);
    cleanups.push(() => engine.destroy?.());
    const channel = createCoordinationChannel(channelOptions);
    console.log(`[endpoint] listener coordination: ${describeCoordination(channel.snapshot())}`);
    const controller = createCaptureController({
      device,
      engine,
      channel,
      energyThreshold: config.energyThreshold,
      minSpeechFrames: config.minSpeechFrames,
      defaults: { silenceMs: config.silenceMs, echoDelayMs: config.echoDelayMs, hotkey: config.hotkey },
      cancelSpeech,
    });
    cleanups.push(() => { controller.stop(); });

    console.log(`[endpoint] transcription engine: ${engine.name}`);
    cleanups.push(await listen(sttRoutes(controller), config.sttPort, "stt"));
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function logOutcome(outcome: PlaybackOutcome): void {
  const line = `[speech-queue] ${describeOutcome(outcome)}`;
  if (outcome.type === "undeliverable") console.error(line);
  else console.log(line);
}

/**
 * Pick the mode from argv, falling back to "both" when colocated.
 *
 * @throws Error for an unknown or missing mode
 */
function parseMode(arg: string | undefined, config: VoiceConfig): EndpointMode {
  const mode = MODES.find((candidate) => candidate === arg);
  if (mode) return mode;
  if (arg === undefined && config.colocated) return "both";
  throw new Error(`Usage: endpoints/main.ts ${MODES.join("|")} (got ${arg ?? "nothing"})`);
}

function takeLock(dir: string, role: EndpointRole): Cleanup {
  const lock = acquireEndpointLock(dir, role);
  return () => lock.release();
}

/**
 * Serve an app on 127.0.0.1.
 *
 * @returns Cleanup that closes the server
 */
function listen(app: Hono, port: number, name: string): Promise<Cleanup> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port, hostname: HOSTNAME }, (info) => {
      console.log(`[endpoint] ${name} listening on http://${HOSTNAME}:${info.port}`);
      resolve(() => new Promise<void>((done) => { server.close(() => done()); }));
    });
    server.once("error", reject);
  });
}

// ============================================================================
// ENTRY POINT
// ============================================================================

main().catch((err: unknown) => {
  console.error(`[endpoint] startup failed: ${errorMessage(err)}`);
  process.exit(1);
});
