/**
 * Unit tests for hotkey parsing and the key-down toggle handler. No global
 * keyboard hook is installed.
 *
 * Run: npx tsx --test sidecar/hotkey.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { InvalidParameterError } from "./errors.js";
import { createHotkeyListener, createKeyHandler, parseHotkey } from "./hotkey.js";

// ============================================================================
// TESTS
// ============================================================================

test("a single key needs no modifier", () => {
  assert.deepEqual(parseHotkey("cmd_r"), { source: "cmd_r", triggerKey: "RIGHT META", requiredModifierGroups: [] });
  assert.equal(parseHotkey("RightCmd").triggerKey, "RIGHT META");
  assert.equal(parseHotkey("f13").triggerKey, "F13");
});

test("combos put every token but the last into modifier groups", () => {
  assert.deepEqual(parseHotkey("Ctrl+Shift+Space"), {
    source: "Ctrl+Shift+Space",
    triggerKey: "SPACE",
    requiredModifierGroups: [
      ["LEFT CTRL", "RIGHT CTRL"],
      ["LEFT SHIFT", "RIGHT SHIFT"],
    ],
  });
  assert.deepEqual(parseHotkey("cmd_r+m").requiredModifierGroups, [["RIGHT META"]]);
});

test("unknown keys are invalid parameters", () => {
  assert.throws(() => parseHotkey("hyper"), InvalidParameterError);
  assert.throws(() => parseHotkey("nope+m"), InvalidParameterError);
  assert.throws(() => parseHotkey(" "), InvalidParameterError);
  assert.throws(() => createHotkeyListener("nope", () => {}), InvalidParameterError);
});

test("the handler toggles once per press", () => {
  let toggles = 0;
  const handle = createKeyHandler(parseHotkey("cmd_r"), () => toggles++);

  assert.equal(handle({ name: "RIGHT META", state: "DOWN" }, { "RIGHT META": true }), true);
  handle({ name: "RIGHT META", state: "DOWN" }, { "RIGHT META": true });
  handle({ name: "RIGHT META", state: "UP" }, {});
  handle({ name: "RIGHT META", state: "DOWN" }, { "RIGHT META": true });

  assert.equal(toggles, 2);
});

test("the handler ignores other keys and missing modifiers", () => {
  let toggles = 0;
  const handle = createKeyHandler(parseHotkey("ctrl+m"), () => toggles++);

  assert.equal(handle({ name: "A", state: "DOWN" }, { A: true }), false);
  handle({ name: "M", state: "DOWN" }, { M: true });
  handle({ name: "M", state: "UP" }, {});
  handle({ name: "M", state: "DOWN" }, { M: true, "RIGHT CTRL": true });

  assert.equal(toggles, 1);
});
