/**
 * Route tests for the speech input endpoint.
 *
 * Requests go through app.request() against a real capture controller wired
 * to a fake microphone, a fake engine and a fake hotkey on a manual clock.
 *
 * Run: npx tsx --test endpoints/routes/stt.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { sttRoutes } from "./stt.js";
import { createCaptureController } from "../../sidecar/capture-controller.js";
import { createCoordinationChannel } from "../../sidecar/coordination.js";
import { parseHotkey } from "../../sidecar/hotkey.js";
import { createMemorySignalStore } from "../../sidecar/signal-store.js";
import { createFakeDevice, createFakeEngine, createManualClock, waitFor } from "../../sidecar/testing.js";

import type { TestContext } from "node:test";
import type { Hono } from "hono";

// ============================================================================
// HELPERS
// ============================================================================

function setup(t: TestContext) {
  const clock = createManualClock(10_000);
  const store = createMemorySignalStore(clock);
  const channel = createCoordinationChannel({ store, speakingTtlMs: 0, clock });
  const speaker = createCoordinationChannel({ store, speakingTtlMs: 0, clock });
  const device = createFakeDevice(clock, 320);
  const engine = createFakeEngine();

  const controller = createCaptureController({
    device,
    engine,
    channel,
    energyThreshold: 0.1,
    minSpeechFrames: 3,
    defaults: { silenceMs: 1500, echoDelayMs: 400, hotkey: "cmd_r" },
    createHotkey: (binding) => {
      parseHotkey(binding);
      return { binding, start: async () => {}, stop: () => {} };
    },
    clock,
  });
  t.after(() => { controller.stop(); });
  return { clock, device, engine, speaker, controller, app: sttRoutes(controller) };
}

async function call(app: Hono, method: string, path: string, body?: unknown) {
  const res = await app.request(path, {
    method,
    headers: { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: res.status, body: await res.json() };
}

// ============================================================================
// TESTS
// ============================================================================

test("POST /start arms the listener with the given settings", async (t) => {
  const { app } = setup(t);

  assert.deepEqual(await call(app, "POST", "/start", { autoStop: false, key: "F13" }), {
    status: 200,
    body: { result: "Listening started. Press F13 to start and stop recording." },
  });
  assert.deepEqual(await call(app, "POST", "/start"), {
    status: 200,
    body: { result: "Already listening (armed)." },
  });
});

test("POST /start with no body uses auto-stop and the default silence", async (t) => {
  const { app } = setup(t);

  const res = await app.request("/start", { method: "POST" });

  assert.deepEqual(await res.json(), {
    result: "Listening started. Speak now - I'll transcribe after 1.5s of silence.",
  });
});

test("invalid settings are a 400", async (t) => {
  const { app } = setup(t);

  assert.deepEqual(await call(app, "POST", "/start", { silenceMs: 50 }), {
    status: 400,
    body: { error: "silenceMs must be between 100 and 10000, got 50" },
  });
  assert.deepEqual(await call(app, "POST", "/start", { autoStop: "yes" }), {
    status: 400,
    body: { error: "'autoStop' must be true or false" },
  });
  assert.deepEqual(await call(app, "GET", "/result?wait=maybe"), {
    status: 400,
    body: { error: "'wait' must be true or false" },
  });
});

test("toggle and stop while idle answer with a status message", async (t) => {
  const { app } = setup(t);

  assert.deepEqual(await call(app, "POST", "/toggle"), { status: 200, body: { result: "Not currently listening." } });
  assert.deepEqual(await call(app, "POST", "/stop"), { status: 200, body: { result: "Not currently listening." } });
  assert.deepEqual((await call(app, "GET", "/result")).body, { result: "[Not listening]" });
});

test("a toggled recording comes back from GET /result", async (t) => {
  const { clock, device, engine, app } = setup(t);
  engine.responses.push("hello from the mic");
  await call(app, "POST", "/start", { autoStop: false });

  assert.deepEqual((await call(app, "POST", "/toggle")).body, { result: "Recording started." });
  for (let i = 0; i < 5; i++) {
    device.emit(0.5);
    await clock.advance(20);
  }
  assert.deepEqual((await call(app, "POST", "/toggle")).body, { result: "Recording stopped, transcribing." });

  assert.deepEqual((await call(app, "GET", "/result?wait=true&timeoutMs=5000")).body, {
    result: "hello from the mic",
  });
  assert.deepEqual(engine.calls, [5 * 320]);
});

test("GET /status describes the listener and the last transcript", async (t) => {
  const { clock, device, engine, controller, app } = setup(t);
  engine.responses.push("status check");
  await call(app, "POST", "/start", { autoStop: false });
  controller.toggle();
  device.emit(0.5);
  await clock.advance(20);
  controller.toggle();
  await waitFor(() => controller.getStatus().state === "armed");

  assert.deepEqual(await call(app, "GET", "/status"), {
    status: 200,
    body: {
      result: 'Listening: Yes\nState: armed\nSpeaking (TTS): No\nLast transcription: "status check"\nLanguage: en',
      status: {
        state: "armed",
        autoStopEnabled: false,
        autoResumeEnabled: false,
        speaking: false,
        hotkey: "cmd_r",
        lastResult: { preview: "status check", languageTag: "en" },
      },
    },
  });
});

test("POST /interrupt stops listening and raises the stop signal", async (t) => {
  const { speaker, app } = setup(t);
  await call(app, "POST", "/start");

  assert.deepEqual((await call(app, "POST", "/interrupt", { reason: "typed input" })).body, {
    result: "Interrupted: typed input. Listening stopped. Speech stop requested.",
  });
  assert.equal(speaker.consumeStopSignal(), true);
});

test("a microphone failure is a 500", async (t) => {
  const { device, app } = setup(t);
  device.failNextOpen("no microphone");

  assert.deepEqual(await call(app, "POST", "/start"), {
    status: 500,
    body: { error: "Device error: no microphone" },
  });
});
