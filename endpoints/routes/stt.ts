/**
 * Speech input API routes.
 *
 * Thin HTTP layer over the capture controller:
 * - POST /start -- open the microphone and arm the listener
 * - POST /stop -- stop listening
 * - POST /toggle -- start or end a recording, as the hotkey does
 * - GET /status -- listener state and last result preview
 * - GET /result?wait=&timeoutMs= -- next transcript or a state marker
 * - POST /interrupt -- stop listening and silence the speaker
 */

import { Hono } from "hono";

import {
  handleVoiceError,
  optionalBoolean,
  optionalNumber,
  optionalString,
  queryFlag,
  queryNumber,
  readJsonBody,
} from "../http.js";

import type { CaptureController, CaptureStatus } from "../../sidecar/capture-controller.js";

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Create Hono route group for speech input.
 *
 * @param controller - The capture controller
 * @returns Hono instance with start, stop, toggle, status, result and interrupt routes
 */
export function sttRoutes(controller: CaptureController): Hono {
  const app = new Hono();
  app.onError(handleVoiceError);

  app.post("/start", async (c) => {
    const body = await readJsonBody(c);
    const result = await controller.start({
      key: optionalString(body, "key"),
      autoStop: optionalBoolean(body, "autoStop"),
      silenceMs: optionalNumber(body, "silenceMs"),
      autoResume: optionalBoolean(body, "autoResume"),
      echoDelayMs: optionalNumber(body, "echoDelayMs"),
    });
    return c.json({ result });
  });

  app.post("/stop", (c) => c.json({ result: controller.stop() }));

  app.post("/toggle", (c) => c.json({ result: controller.toggle() }));

  app.get("/status", (c) => {
    const status = controller.getStatus();
    return c.json({ result: describeStatus(status), status });
  });

  /** Blocks up to timeoutMs when wait=true */
  app.get("/result", async (c) => {
    const wait = queryFlag(c.req.query("wait"), "wait", false);
    const timeoutMs = queryNumber(c.req.query("timeoutMs"), "timeoutMs");
    return c.json({ result: await controller.getResult(wait, timeoutMs) });
  });

  app.post("/interrupt", async (c) => {
    const body = await readJsonBody(c);
    return c.json({ result: controller.interrupt(optionalString(body, "reason")) });
  });

  return app;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function describeStatus(status: CaptureStatus): string {
  const lines = [
    `Listening: ${status.state === "idle" ? "No" : "Yes"}`,
    `State: ${status.state}`,
    `Speaking (TTS): ${status.speaking ? "Yes" : "No"}`,
  ];
  if (status.lastResult) {
    lines.push(`Last transcription: "${status.lastResult.preview}"`);
    lines.push(`Language: ${status.lastResult.languageTag}`);
  }
  return lines.join("\n");
}
