/**
 * Speech output API routes.
 *
 * Thin HTTP layer over the speech queue:
 * - POST /speak -- queue text and return immediately
 * - POST /speak-and-wait -- queue text and wait for its outcome
 * - POST /stop -- clear the queue and stop the current utterance
 * - POST /skip -- stop only the current utterance
 * - GET /status -- speaking flag and queue depth
 * - GET /voices -- installed voices of the native synthesizer
 */

import { Hono } from "hono";

import { handleVoiceError, optionalNumber, optionalString, readJsonBody } from "../http.js";
import { preview } from "../../sidecar/speech-queue.js";

import type { JsonBody } from "../http.js";
import type { SpeechQueue, WaitResult } from "../../sidecar/speech-queue.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface TtsRouteDeps {
  queue: SpeechQueue;
  listVoices: () => Promise<string[]>;
}

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Create Hono route group for speech output.
 *
 * @param deps - The speech queue and a voice lister
 * @returns Hono instance with the speak, stop, skip, status and voices routes
 */
export function ttsRoutes(deps: TtsRouteDeps): Hono {
  const { queue } = deps;
  const app = new Hono();
  app.onError(handleVoiceError);

  /** Queue text and return without waiting */
  app.post("/speak", async (c) => {
    const body = await readJsonBody(c);
    const text = readText(body);
    queue.enqueue(text, { voice: optionalString(body, "voice"), speed: optionalNumber(body, "speed") });
    return c.json({ result: `Added to queue: ${preview(text)}` });
  });

  /** Queue text and wait until it has been played, dropped or timed out */
  app.post("/speak-and-wait", async (c) => {
    const body = await readJsonBody(c);
    const result = await queue.enqueueAndWait(readText(body), {
      voice: optionalString(body, "voice"),
      speed: optionalNumber(body, "speed"),
      timeoutMs: optionalNumber(body, "timeoutMs"),
    });
    return c.json({ result: describeWait(result) });
  });

  /** Clear the queue and stop whatever is playing */
  app.post("/stop", (c) => {
    const wasSpeaking = queue.getStatus().speaking;
    const cleared = queue.cancelAll();
    const prefix = wasSpeaking ? "Stopped." : "Nothing playing.";
    return c.json({ result: `${prefix} ${cleared} message(s) cleared from queue.` });
  });

  /** Stop the current utterance and move on */
  app.post("/skip", (c) => {
    const skipped = queue.skip();
    return c.json({
      result: skipped ? "Current message skipped, moving to next." : "No message currently playing.",
    });
  });

  app.get("/status", (c) => {
    const status = queue.getStatus();
    return c.json({
      result: `Status: ${status.speaking ? "Speaking" : "Silent"}\nMessages in queue: ${status.pending}`,
      status,
    });
  });

  app.get("/voices", async (c) => {
    const voices = await deps.listVoices();
    if (voices.length === 0) {
      return c.json({ result: "No voices available." });
    }
    return c.json({ result: "Available voices:\n" + voices.map((line) => `- ${line.trim()}`).join("\n") });
  });

  return app;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** A missing text field is the same as empty text; the queue rejects both */
function readText(body: JsonBody): string {
  return optionalString(body, "text") ?? "";
}

function describeWait(result: WaitResult): string {
  if (result.status === "timeout") {
    return `Timed out waiting for speech; message ${result.utteranceId} has not finished.`;
  }
  const { outcome } = result;
  switch (outcome.type) {
    case "played":
      return "Speech completed";
    case "cancelled":
      return "Speech cancelled";
    case "skipped":
      return "Speech skipped";
    case "undeliverable":
      return `Speech failed: ${outcome.error ?? "no backend available"}`;
  }
}
