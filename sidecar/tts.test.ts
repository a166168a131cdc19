/**
 * Unit tests for the local synthesis subprocess backend.
 *
 * Uses a mock TTS server so no model or audio hardware is needed. The mock
 * tags each generation's PCM bytes with a generation counter, which shows
 * whether stale audio from an aborted utterance leaks into the next one.
 *
 * Run: npx tsx --test sidecar/tts.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { createLocalTts } from "./tts.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const __dirname = dirname(fileURLToPath(import.meta.url));
const MOCK_SERVER = join(__dirname, "mock-tts-server.mjs");

// ============================================================================
// TESTS
// ============================================================================

test("synthesize concatenates every chunk of one generation", async () => {
  const backend = createLocalTts({ serverCommand: [process.execPath, MOCK_SERVER], sampleRate: 22050 });

  assert.equal(await backend.checkHealth(), true);
  const audio = await backend.synthesize({ text: "Hello there.", speed: 1 }, new AbortController().signal);

  assert.equal(audio.sampleRate, 22050);
  assert.equal(audio.pcm.length, 16);
  assert.ok(audio.pcm.every((b) => b === 1));

  backend.destroy?.();
});

test("audio from an aborted generation does not leak into the next one", async () => {
  const backend = createLocalTts({ serverCommand: [process.execPath, MOCK_SERVER] });
  await backend.checkHealth();

  const first = new AbortController();
  const pending = backend.synthesize({ text: "A slow first answer.", speed: 1 }, first.signal);
  setTimeout(() => first.abort(), 20);
  await assert.rejects(pending, { message: "Synthesis aborted" });

  const audio = await backend.synthesize({ text: "Second answer.", speed: 1 }, new AbortController().signal);

  assert.equal(audio.pcm.length, 16);
  assert.ok(audio.pcm.every((b) => b === 2), "second result must contain only generation-2 bytes");

  backend.destroy?.();
});

test("an already-aborted signal never reaches the server", async () => {
  const backend = createLocalTts({ serverCommand: [process.execPath, MOCK_SERVER] });
  await backend.checkHealth();

  const aborted = new AbortController();
  aborted.abort();
  await assert.rejects(backend.synthesize({ text: "Never sent.", speed: 1 }, aborted.signal));

  const audio = await backend.synthesize({ text: "Sent.", speed: 1 }, new AbortController().signal);
  assert.ok(audio.pcm.every((b) => b === 1));

  backend.destroy?.();
});

test("a missing server binary reports unhealthy", async () => {
  const backend = createLocalTts({ serverCommand: ["/nonexistent/tts-server"] });

  assert.equal(await backend.checkHealth(), false);
  backend.destroy?.();
});

test("an empty command reports unhealthy", async () => {
  const backend = createLocalTts({ serverCommand: [] });

  assert.equal(await backend.checkHealth(), false);
});
