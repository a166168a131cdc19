/**
 * Unit tests for the file and memory signal stores.
 *
 * Run: npx tsx --test sidecar/signal-store.test.ts
 */

import { test } from "node:test";
import type { TestContext } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import { createFileSignalStore, createMemorySignalStore } from "./signal-store.js";
import { createManualClock } from "./testing.js";

// ============================================================================
// HELPERS
// ============================================================================

/** Create a scratch directory removed when the test finishes */
function scratchDir(t: TestContext): string {
  const dir = mkdtempSync(join(tmpdir(), "signal-store-"));
  t.after(() => rmSync(dir, { recursive: true, force: true }));
  return dir;
}

// ============================================================================
// TESTS
// ============================================================================

test("file store: set then get returns the timestamp and payload", (t) => {
  const clock = createManualClock(1_000);
  const store = createFileSignalStore(scratchDir(t), clock);

  store.set("speaker", "hello");

  assert.deepEqual(store.get("speaker"), { timestamp: 1_000, payload: "hello" });
  assert.equal(store.get("stop"), null);
});

test("file store: testAndClear returns true exactly once per set", (t) => {
  const store = createFileSignalStore(scratchDir(t));

  store.set("stop");

  assert.equal(store.testAndClear("stop"), true);
  assert.equal(store.testAndClear("stop"), false);
  assert.equal(store.get("stop"), null);
});

test("file store: two stores on one directory see each other's markers", (t) => {
  const dir = scratchDir(t);
  const speaker = createFileSignalStore(dir);
  const listener = createFileSignalStore(dir);

  listener.set("stop");

  assert.equal(speaker.testAndClear("stop"), true);
  assert.equal(listener.testAndClear("stop"), false);
});

test("file store: no temporary or claim files are left behind", (t) => {
  const dir = scratchDir(t);
  const store = createFileSignalStore(dir);

  store.set("stop");
  store.set("speaker", "x");
  store.testAndClear("stop");

  assert.deepEqual(readdirSync(dir), ["speaker.signal"]);
});

test("file store: an externally touched marker counts as present", (t) => {
  const dir = scratchDir(t);
  const store = createFileSignalStore(dir);

  writeFileSync(join(dir, "stop.signal"), "");

  assert.deepEqual(store.get("stop"), { timestamp: 0, payload: "" });
  assert.equal(store.testAndClear("stop"), true);
});

test("memory store: behaves like the file store", () => {
  const clock = createManualClock(5);
  const store = createMemorySignalStore(clock);

  store.set("stop", "a");
  assert.deepEqual(store.get("stop"), { timestamp: 5, payload: "a" });
  assert.equal(store.testAndClear("stop"), true);
  assert.equal(store.testAndClear("stop"), false);
  assert.equal(store.get("stop"), null);
});
