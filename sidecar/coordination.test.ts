/**
 * Unit tests for the coordination channel.
 *
 * Covers exactly-once stop delivery, the speaking TTL cache, the
 * last-finished timestamp and stale speaking records from dead processes.
 *
 * Run: npx tsx --test sidecar/coordination.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import { createCoordinationChannel, describeCoordination } from "./coordination.js";
import { createFileSignalStore, createMemorySignalStore } from "./signal-store.js";
import { createManualClock } from "./testing.js";

// ============================================================================
// TESTS
// ============================================================================

test("stop signal is delivered to exactly one consumer", () => {
  const store = createMemorySignalStore();
  const speaker = createCoordinationChannel({ store, speakingTtlMs: 0 });
  const listener = createCoordinationChannel({ store, speakingTtlMs: 0 });

  listener.signalStop();
  listener.signalStop();

  const results = [speaker.consumeStopSignal(), speaker.consumeStopSignal(), listener.consumeStopSignal()];
  assert.deepEqual(results, [true, false, false]);
});

test("markSpeaking(false) records the finish time", () => {
  const clock = createManualClock(10_000);
  const channel = createCoordinationChannel({ store: createMemorySignalStore(clock), speakingTtlMs: 0, clock });

  assert.equal(channel.lastFinishedAt(), null);
  channel.markSpeaking(true);
  assert.equal(channel.lastFinishedAt(), null);
  channel.markSpeaking(false);
  assert.equal(channel.lastFinishedAt(), 10_000);
});

test("markSpeaking(true) keeps the previous finish time", async () => {
  const clock = createManualClock(0);
  const channel = createCoordinationChannel({ store: createMemorySignalStore(clock), speakingTtlMs: 0, clock });

  channel.markSpeaking(true);
  await clock.advance(100);
  channel.markSpeaking(false);
  await clock.advance(100);
  channel.markSpeaking(true);

  assert.equal(channel.isSpeaking(), true);
  assert.equal(channel.lastFinishedAt(), 100);
});

test("isSpeaking is served from cache within the TTL", async () => {
  const clock = createManualClock(0);
  const store = createMemorySignalStore(clock);
  const speaker = createCoordinationChannel({ store, speakingTtlMs: 0, clock });
  const listener = createCoordinationChannel({ store, speakingTtlMs: 250, clock });

  assert.equal(listener.isSpeaking(), false);
  speaker.markSpeaking(true);

  await clock.advance(249);
  assert.equal(listener.isSpeaking(), false);

  await clock.advance(1);
  assert.equal(listener.isSpeaking(), true);
});

test("a speaking record from a dead process is treated as stale", () => {
  const store = createMemorySignalStore();
  store.set("speaker", JSON.stringify({ state: "speaking", pid: 999_999, finishedAt: 42 }));

  const channel = createCoordinationChannel({ store, speakingTtlMs: 0, isProcessAlive: () => false });

  assert.equal(channel.isSpeaking(), false);
  assert.equal(channel.lastFinishedAt(), 42);
  assert.deepEqual(channel.snapshot(), { speaking: false, stopRequested: false, lastSpeechFinishedAt: 42 });
});

test("channels in separate stores over one directory share state", (t) => {
  const dir = mkdtempSync(join(tmpdir(), "coordination-"));
  t.after(() => rmSync(dir, { recursive: true, force: true }));

  const speaker = createCoordinationChannel({ store: createFileSignalStore(dir), speakingTtlMs: 0 });
  const listener = createCoordinationChannel({ store: createFileSignalStore(dir), speakingTtlMs: 0 });

  speaker.markSpeaking(true);
  assert.equal(listener.isSpeaking(), true);

  listener.signalStop();
  assert.equal(listener.snapshot().stopRequested, true);
  assert.equal(speaker.consumeStopSignal(), true);

  speaker.markSpeaking(false);
  assert.equal(listener.isSpeaking(), false);
  assert.equal(typeof listener.lastFinishedAt(), "number");
});

test("describeCoordination summarizes a snapshot for the startup log", () => {
  const clock = createManualClock(0);
  const channel = createCoordinationChannel({ store: createMemorySignalStore(clock), speakingTtlMs: 0, clock });

  assert.equal(describeCoordination(channel.snapshot()), "speaking=no, stop pending=no, last speech finished=never");

  channel.signalStop();
  assert.equal(
    describeCoordination({ ...channel.snapshot(), lastSpeechFinishedAt: 0 }),
    "speaking=no, stop pending=yes, last speech finished=1970-01-01T00:00:00.000Z",
  );
});
