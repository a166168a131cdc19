/**
 * Unit tests for the speech queue.
 *
 * Covers FIFO order, single playback, queue-join waits, cancellation, skip,
 * the cross-process stop signal, backend fallback and validation. Backends and
 * the audio device are in-process fakes; time runs on a manual clock.
 *
 * Run: npx tsx --test sidecar/speech-queue.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { createCoordinationChannel } from "./coordination.js";
import { InvalidInputError, InvalidParameterError } from "./errors.js";
import { createMemorySignalStore } from "./signal-store.js";
import { createSpeechQueue, describeOutcome, preview } from "./speech-queue.js";
import {
  createFakeAudioBackend,
  createFakeDevice,
  createFakeDirectBackend,
  createManualClock,
  flushMicrotasks,
  waitFor,
} from "./testing.js";

import type { TestContext } from "node:test";
import type { SynthesisBackend } from "./synthesis-backend.js";
import type { PlaybackOutcome } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

/** Queue wired to a memory store shared by a speaker and a listener channel */
function setup(t: TestContext, backends: SynthesisBackend[]) {
  const clock = createManualClock(1000);
  const store = createMemorySignalStore(clock);
  const speaker = createCoordinationChannel({ store, speakingTtlMs: 0, clock });
  const listener = createCoordinationChannel({ store, speakingTtlMs: 0, clock });
  const device = createFakeDevice(clock);
  const queue = createSpeechQueue({
    backends,
    device,
    channel: speaker,
    defaultSpeed: 1.1,
    pollIntervalMs: 50,
    healthTtlMs: 30_000,
    clock,
  });
  const outcomes: PlaybackOutcome[] = [];
  queue.onOutcome((outcome) => outcomes.push(outcome));
  t.after(() => queue.close());
  return { clock, listener, device, queue, outcomes };
}

/** Deterministic generator in [0, 1) so a failing sequence can be replayed */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ============================================================================
// TESTS
// ============================================================================

test("utterances play in enqueue order", async (t) => {
  const backend = createFakeDirectBackend("primary", "instant");
  const { queue, outcomes } = setup(t, [backend]);

  queue.enqueue("one");
  queue.enqueue("two");
  queue.enqueue("three");
  await waitFor(() => outcomes.length === 3);

  assert.deepEqual(backend.calls.map((c) => c.text), ["one", "two", "three"]);
  assert.deepEqual(outcomes.map((o) => [o.utteranceId, o.type, o.backend]), [
    [1, "played", "primary"],
    [2, "played", "primary"],
    [3, "played", "primary"],
  ]);
});

test("only one utterance plays at a time and the speaking flag covers it", async (t) => {
  const speakingDuringPlayback: boolean[] = [];
  let listenerView: () => boolean = () => false;
  const backend = createFakeDirectBackend("primary", "manual", () => {
    speakingDuringPlayback.push(listenerView());
  });
  const { queue, listener, outcomes } = setup(t, [backend]);
  listenerView = () => listener.isSpeaking();

  queue.enqueue("a");
  queue.enqueue("b");
  for (let i = 0; i < 5; i++) {
    await waitFor(() => backend.calls.length === i + 1);
    assert.equal(queue.getStatus().speaking, true);
    if (i < 3) queue.enqueue(`late ${i}`);
    backend.finish();
  }
  await waitFor(() => outcomes.length === 5);

  assert.equal(backend.maxActive, 1);
  assert.deepEqual(speakingDuringPlayback, [true, true, true, true, true]);
  assert.equal(listener.isSpeaking(), false);
  assert.equal(listener.lastFinishedAt(), 1000);
  assert.deepEqual(backend.calls.map((c) => c.text), ["a", "b", "late 0", "late 1", "late 2"]);
});

test("enqueueAndWait returns only after every earlier utterance", async (t) => {
  const backend = createFakeDirectBackend("primary", "manual");
  const { queue, outcomes } = setup(t, [backend]);

  queue.enqueue("first");
  let settled = false;
  const waiting = queue.enqueueAndWait("second").then((result) => {
    settled = true;
    return result;
  });

  await waitFor(() => backend.calls.length === 1);
  backend.finish();
  await waitFor(() => backend.calls.length === 2);
  assert.equal(settled, false);

  backend.finish();
  const result = await waiting;

  assert.equal(result.status, "completed");
  assert.equal(result.status === "completed" && result.outcome.type, "played");
  assert.deepEqual(outcomes.map((o) => o.utteranceId), [1, 2]);
});

test("stop with three queued clears the two waiting and cancels the one playing", async (t) => {
  const backend = createFakeDirectBackend("primary", "manual");
  const { queue, listener, outcomes } = setup(t, [backend]);

  queue.enqueue("a");
  queue.enqueue("b");
  queue.enqueue("c");
  await waitFor(() => backend.calls.length === 1);
  assert.deepEqual(queue.getStatus(), {
    speaking: true,
    pending: 2,
    currentBackend: "primary",
    currentPreview: "a",
    lastOutcome: null,
  });

  assert.equal(queue.cancelAll(), 2);
  await waitFor(() => outcomes.length === 3);

  assert.deepEqual(outcomes.map((o) => [o.utteranceId, o.type]), [
    [2, "cancelled"],
    [3, "cancelled"],
    [1, "cancelled"],
  ]);
  assert.equal(outcomes[2].backend, "primary");
  await waitFor(() => !queue.getStatus().speaking);
  assert.equal(listener.isSpeaking(), false);

  queue.enqueue("after");
  await waitFor(() => backend.calls.length === 2);
  backend.finish();
  await waitFor(() => outcomes.length === 4);
  assert.deepEqual([outcomes[3].utteranceId, outcomes[3].type], [4, "played"]);
});

test("cancelAll on an idle queue returns zero", (t) => {
  const { queue } = setup(t, [createFakeDirectBackend("primary", "instant")]);

  assert.equal(queue.cancelAll(), 0);
});

test("skip ends only the current utterance", async (t) => {
  const backend = createFakeDirectBackend("primary", "manual");
  const { queue, outcomes } = setup(t, [backend]);

  assert.equal(queue.skip(), false);

  queue.enqueue("a");
  queue.enqueue("b");
  await waitFor(() => backend.calls.length === 1);
  assert.equal(queue.skip(), true);
  await waitFor(() => backend.calls.length === 2);
  backend.finish();
  await waitFor(() => outcomes.length === 2);

  assert.deepEqual(outcomes.map((o) => [o.utteranceId, o.type]), [
    [1, "skipped"],
    [2, "played"],
  ]);
});

test("a stop signal from the listener aborts the utterance in flight", async (t) => {
  const backend = createFakeDirectBackend("primary", "manual");
  const { clock, queue, listener, outcomes } = setup(t, [backend]);

  queue.enqueue("a");
  queue.enqueue("b");
  await waitFor(() => backend.calls.length === 1);

  listener.signalStop();
  await clock.advance(50);
  await waitFor(() => outcomes.length === 1);
  assert.deepEqual([outcomes[0].utteranceId, outcomes[0].type], [1, "cancelled"]);

  await waitFor(() => backend.calls.length === 2);
  assert.equal(listener.snapshot().stopRequested, false);
  backend.finish();
  await waitFor(() => outcomes.length === 2);
  assert.equal(outcomes[1].type, "played");
});

test("a stop signal raised while idle does not cancel the next utterance", async (t) => {
  const backend = createFakeDirectBackend("primary", "instant");
  const { queue, listener, outcomes } = setup(t, [backend]);

  listener.signalStop();
  queue.enqueue("a");
  await waitFor(() => outcomes.length === 1);

  assert.equal(outcomes[0].type, "played");
  assert.equal(listener.snapshot().stopRequested, false);
});

test("a failing backend falls back and is skipped until its health expires", async (t) => {
  const primary = createFakeDirectBackend("primary", "fail");
  const system = createFakeDirectBackend("system", "instant");
  const { clock, queue, outcomes } = setup(t, [primary, system]);

  queue.enqueue("a");
  await waitFor(() => outcomes.length === 1);
  assert.deepEqual([outcomes[0].type, outcomes[0].backend], ["played", "system"]);

  queue.enqueue("b");
  await waitFor(() => outcomes.length === 2);
  assert.equal(primary.calls.length, 1);
  assert.equal(system.calls.length, 2);

  await clock.advance(30_000);
  queue.enqueue("c");
  await waitFor(() => outcomes.length === 3);
  assert.equal(primary.calls.length, 2);
  assert.equal(outcomes[2].backend, "system");
});

test("speak-and-wait with a failing primary makes exactly one fallback attempt", async (t) => {
  const primary = createFakeDirectBackend("primary", "fail");
  const system = createFakeDirectBackend("system", "instant");
  const { queue } = setup(t, [primary, system]);

  const result = await queue.enqueueAndWait("hello");

  assert.equal(result.status, "completed");
  assert.equal(result.status === "completed" && result.outcome.backend, "system");
  assert.equal(primary.calls.length, 1);
  assert.equal(system.calls.length, 1);
});

test("an unhealthy backend is never attempted", async (t) => {
  const primary = createFakeDirectBackend("primary", "instant");
  primary.healthy = false;
  const system = createFakeDirectBackend("system", "instant");
  const { queue, outcomes } = setup(t, [primary, system]);

  queue.enqueue("a");
  await waitFor(() => outcomes.length === 1);

  assert.equal(primary.calls.length, 0);
  assert.equal(outcomes[0].backend, "system");
});

test("when every backend fails the utterance is undeliverable", async (t) => {
  const primary = createFakeDirectBackend("primary", "fail");
  const system = createFakeDirectBackend("system", "fail");
  const { queue, outcomes } = setup(t, [primary, system]);

  queue.enqueue("a");
  await waitFor(() => outcomes.length === 1);

  assert.equal(outcomes[0].type, "undeliverable");
  assert.equal(outcomes[0].backend, null);
  assert.equal(outcomes[0].error, "primary: primary exploded; system: system exploded");
  assert.equal(queue.getStatus().lastOutcome, outcomes[0]);
});

test("a rejected voice is retried on the same backend without demoting it", async (t) => {
  const primary = createFakeDirectBackend("primary", "rejectVoice");
  const system = createFakeDirectBackend("system", "instant");
  const { queue, outcomes } = setup(t, [primary, system]);

  queue.enqueue("one", { voice: "Samantha" });
  queue.enqueue("two");
  queue.enqueue("three");
  await waitFor(() => outcomes.length === 3);

  assert.deepEqual(outcomes.map((o) => [o.utteranceId, o.type, o.backend]), [
    [1, "played", "primary"],
    [2, "played", "primary"],
    [3, "played", "primary"],
  ]);
  assert.deepEqual(primary.calls.map((c) => [c.text, c.voice]), [
    ["one", "Samantha"],
    ["one", undefined],
    ["two", undefined],
    ["three", undefined],
  ]);
  assert.equal(system.calls.length, 0);
});

test("the last-resort backend still speaks when it does not know the voice", async (t) => {
  const primary = createFakeDirectBackend("primary", "fail");
  const system = createFakeDirectBackend("system", "rejectVoice");
  const { queue, outcomes } = setup(t, [primary, system]);

  queue.enqueue("hello", { voice: "voice-id-123" });
  await waitFor(() => outcomes.length === 1);

  assert.deepEqual([outcomes[0].type, outcomes[0].backend], ["played", "system"]);
  assert.deepEqual(system.calls.map((c) => c.voice), ["voice-id-123", undefined]);

  queue.enqueue("again");
  await waitFor(() => outcomes.length === 2);
  assert.equal(outcomes[1].backend, "system");
  assert.equal(primary.calls.length, 1);
});

test("enqueueAndWait times out without removing the utterance", async (t) => {
  const backend = createFakeDirectBackend("primary", "manual");
  const { clock, queue, outcomes } = setup(t, [backend]);

  const waiting = queue.enqueueAndWait("long", { timeoutMs: 1000 });
  await waitFor(() => backend.calls.length === 1);
  await clock.advance(1000);

  assert.deepEqual(await waiting, { status: "timeout", utteranceId: 1 });
  assert.equal(queue.getStatus().speaking, true);

  backend.finish();
  await waitFor(() => outcomes.length === 1);
  assert.equal(outcomes[0].type, "played");
});

test("audio backends are played through the device with voice and speed", async (t) => {
  const local = createFakeAudioBackend("local");
  const { queue, device, outcomes } = setup(t, [local, createFakeDirectBackend("system", "instant")]);

  queue.enqueue("hi", { voice: " v1 ", speed: 1.5 });
  queue.enqueue("there");
  await waitFor(() => outcomes.length === 2);

  assert.equal(outcomes[0].backend, "local");
  assert.equal(local.calls[0].voice, "v1");
  assert.equal(local.calls[0].speed, 1.5);
  assert.equal(local.calls[1].voice, undefined);
  assert.equal(local.calls[1].speed, 1.1);
  assert.equal(device.played.length, 2);
  assert.equal(device.played[0].sampleRate, 24000);
});

test("invalid text, speed and timeout are rejected", async (t) => {
  const { queue } = setup(t, [createFakeDirectBackend("primary", "instant")]);

  assert.throws(() => queue.enqueue("   "), InvalidInputError);
  assert.throws(() => queue.enqueue("x", { speed: 2.5 }), InvalidParameterError);
  assert.throws(() => queue.enqueue("x", { speed: 0.4 }), InvalidParameterError);
  await assert.rejects(queue.enqueueAndWait("x", { timeoutMs: -1 }), InvalidParameterError);
  await assert.rejects(queue.enqueueAndWait(""), InvalidInputError);

  assert.equal(queue.enqueue("x", { speed: 0.5 }).speedFactor, 0.5);
  assert.equal(queue.enqueue("y", { speed: 2 }).speedFactor, 2);
});

test("close frees backends and refuses new utterances", async (t) => {
  const backend = createFakeDirectBackend("primary", "instant");
  const { queue } = setup(t, [backend]);

  await queue.close();

  assert.equal(backend.destroyed, true);
  assert.throws(() => queue.enqueue("x"), { message: "Speech queue is closed" });
});

test("random interleavings of enqueue, cancel, skip and stop keep one playback and an accurate flag", async (t) => {
  for (const seed of [1, 7, 42, 2024]) {
    const backend = createFakeDirectBackend("primary", "manual");
    const { clock, queue, listener, outcomes } = setup(t, [backend]);
    const random = seededRandom(seed);
    const texts: string[] = [];

    for (let step = 0; step < 80; step++) {
      const roll = random();
      if (roll < 0.35) {
        const text = `seed ${seed} step ${step}`;
        texts.push(text);
        queue.enqueue(text);
      } else if (roll < 0.45) {
        queue.cancelAll();
      } else if (roll < 0.55) {
        queue.skip();
      } else if (roll < 0.65) {
        listener.signalStop();
      } else if (roll < 0.85) {
        backend.finish();
      } else {
        await clock.advance(50);
      }
      await flushMicrotasks();
      await flushMicrotasks();

      const status = queue.getStatus();
      const where = `seed ${seed}, step ${step}`;
      assert.ok(backend.maxActive <= 1, where);
      assert.equal(backend.active, status.speaking ? 1 : 0, where);
      assert.equal(listener.isSpeaking(), status.speaking, where);
      assert.equal(status.currentPreview !== null, status.speaking, where);
      if (status.pending > 0) assert.equal(status.speaking, true, where);
    }

    queue.cancelAll();
    await waitFor(() => outcomes.length === texts.length);
    await waitFor(() => !queue.getStatus().speaking);

    const outcomeIds = outcomes.map((o) => o.utteranceId).sort((a, b) => a - b);
    assert.deepEqual(outcomeIds, texts.map((_, i) => i + 1));
    const startedOrder = backend.calls.map((c) => texts.indexOf(c.text));
    assert.deepEqual(startedOrder, [...startedOrder].sort((a, b) => a - b));
    assert.equal(new Set(startedOrder).size, startedOrder.length);
    assert.equal(listener.isSpeaking(), false);
  }
});

test("describeOutcome renders each outcome type as one log line", () => {
  const base = { utteranceId: 4, finishedAt: 1000 };

  assert.equal(describeOutcome({ ...base, type: "played", backend: "system" }), "#4 played via system");
  assert.equal(describeOutcome({ ...base, type: "skipped", backend: "local" }), "#4 skipped on local");
  assert.equal(describeOutcome({ ...base, type: "cancelled", backend: null }), "#4 cancelled before playback");
  assert.equal(
    describeOutcome({ ...base, type: "undeliverable", backend: null, error: "system: unavailable" }),
    "#4 undeliverable: system: unavailable",
  );
});

test("undeliverable outcomes reach outcome subscribers with every backend error", async (t) => {
  const { queue, outcomes } = setup(t, [createFakeDirectBackend("system", "fail")]);
  const lines: string[] = [];
  const unsubscribe = queue.onOutcome((outcome) => lines.push(describeOutcome(outcome)));

  queue.enqueue("lost");
  await waitFor(() => outcomes.length === 1);
  unsubscribe();
  queue.enqueue("unheard");
  await waitFor(() => outcomes.length === 2);

  assert.deepEqual(lines, ["#1 undeliverable: system: system exploded"]);
});

test("preview truncates long text to 50 characters", () => {
  assert.equal(preview("short"), "short");
  assert.equal(preview("x".repeat(60)), `${"x".repeat(50)}...`);
});
