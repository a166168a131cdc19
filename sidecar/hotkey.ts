/**
 * Global toggle hotkey for the capture controller.
 *
 * A single key ("cmd_r", "F13") or a combo ("cmd_r+m", "Ctrl+Shift+Space")
 * toggles recording on key-down. Holding the key does not repeat the toggle;
 * the key has to be released first.
 *
 * Responsibilities:
 * - Parse a hotkey string into a trigger key and required modifiers
 * - Listen for global key events and fire the toggle callback
 */

import { GlobalKeyboardListener } from "node-global-key-listener";

import { InvalidParameterError, errorMessage } from "./errors.js";

import type { IGlobalKey, IGlobalKeyEvent } from "node-global-key-listener";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Names that match either side of a modifier */
const MODIFIER_ALIASES: Record<string, IGlobalKey[]> = {
  command: ["LEFT META", "RIGHT META"],
  cmd: ["LEFT META", "RIGHT META"],
  meta: ["LEFT META", "RIGHT META"],
  control: ["LEFT CTRL", "RIGHT CTRL"],
  ctrl: ["LEFT CTRL", "RIGHT CTRL"],
  shift: ["LEFT SHIFT", "RIGHT SHIFT"],
  alt: ["LEFT ALT", "RIGHT ALT"],
  option: ["LEFT ALT", "RIGHT ALT"],
};

/** Names of one specific key; usable as trigger or modifier */
const KEY_ALIASES: Record<string, IGlobalKey> = {
  cmd_r: "RIGHT META",
  cmd_l: "LEFT META",
  rightcmd: "RIGHT META",
  leftcmd: "LEFT META",
  alt_r: "RIGHT ALT",
  alt_l: "LEFT ALT",
  rightalt: "RIGHT ALT",
  leftalt: "LEFT ALT",
  ctrl_r: "RIGHT CTRL",
  ctrl_l: "LEFT CTRL",
  rightctrl: "RIGHT CTRL",
  leftctrl: "LEFT CTRL",
  shift_r: "RIGHT SHIFT",
  shift_l: "LEFT SHIFT",
  rightshift: "RIGHT SHIFT",
  leftshift: "LEFT SHIFT",
  space: "SPACE",
  enter: "RETURN",
  return: "RETURN",
  tab: "TAB",
  escape: "ESCAPE",
  esc: "ESCAPE",
};

const LETTER_AND_DIGIT_KEYS: IGlobalKey[] = [
  "A", "B", "C", "D", "E", "F", "G", "H", "I", "J", "K", "L", "M",
  "N", "O", "P", "Q", "R", "S", "T", "U", "V", "W", "X", "Y", "Z",
  "0", "1", "2", "3", "4", "5", "6", "7", "8", "9",
];

const FUNCTION_KEYS: IGlobalKey[] = [
  "F1", "F2", "F3", "F4", "F5", "F6", "F7", "F8", "F9", "F10", "F11", "F12",
  "F13", "F14", "F15", "F16", "F17", "F18", "F19", "F20", "F21", "F22", "F23", "F24",
];

// ============================================================================
// INTERFACES
// ============================================================================

export interface ParsedHotkey {
  source: string;
  triggerKey: IGlobalKey;
  /** Each group needs at least one of its keys held */
  requiredModifierGroups: IGlobalKey[][];
}

/** Keys currently held, as reported by the listener */
export type HeldKeys = Partial<Record<IGlobalKey, boolean>>;

export type KeyHandler = (event: Pick<IGlobalKeyEvent, "name" | "state">, down: HeldKeys) => boolean;

export interface HotkeySource {
  readonly binding: string;
  start(): Promise<void>;
  stop(): void;
}

export type HotkeyFactory = (accelerator: string, onToggle: () => void) => HotkeySource;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Parse a hotkey string. The last token is the trigger, earlier tokens are modifiers.
 *
 * @throws InvalidParameterError for unknown keys or an empty string
 */
export function parseHotkey(accelerator: string): ParsedHotkey {
  const tokens = accelerator
    .split("+")
    .map((token) => token.trim())
    .filter(Boolean);

  const triggerToken = tokens.pop();
  if (!triggerToken) {
    throw new InvalidParameterError(`Hotkey is empty: '${accelerator}'`);
  }

  const triggerKey = resolveKey(triggerToken);
  if (!triggerKey) {
    throw new InvalidParameterError(`Unsupported hotkey key '${triggerToken}' in '${accelerator}'`);
  }

  const requiredModifierGroups = tokens.map((token) => {
    const group = MODIFIER_ALIASES[token.toLowerCase()];
    if (group) return group;
    const single = resolveKey(token);
    if (!single) {
      throw new InvalidParameterError(`Unsupported hotkey modifier '${token}' in '${accelerator}'`);
    }
    return [single];
  });

  return { source: accelerator, triggerKey, requiredModifierGroups };
}

/**
 * Build the key event handler for a parsed hotkey.
 * Fires `onToggle` on the key-down edge while modifiers are held.
 *
 * @returns Handler that returns true when it consumed the event
 */
export function createKeyHandler(hotkey: ParsedHotkey, onToggle: () => void): KeyHandler {
  let held = false;

  return (event, down) => {
    if (event.name !== hotkey.triggerKey) return false;

    if (event.state === "UP") {
      held = false;
      return true;
    }

    const modifiersHeld = hotkey.requiredModifierGroups.every((group) => group.some((key) => down[key]));
    if (held || !modifiersHeld) return held;

    held = true;
    try {
      onToggle();
    } catch (err) {
      console.error(`[hotkey] toggle failed: ${errorMessage(err)}`);
    }
    return true;
  };
}

/**
 * Create a global hotkey listener.
 *
 * @param accelerator - Hotkey string, validated immediately
 * @param onToggle - Called once per key press
 * @throws InvalidParameterError if the hotkey cannot be parsed
 */
export function createHotkeyListener(accelerator: string, onToggle: () => void): HotkeySource {
  const hotkey = parseHotkey(accelerator);
  const handler = createKeyHandler(hotkey, onToggle);
  let listener: GlobalKeyboardListener | null = null;

  async function start(): Promise<void> {
    if (listener) return;
    const created = new GlobalKeyboardListener();
    listener = created;
    try {
      await created.addListener(handler);
    } catch (err) {
      listener = null;
      created.kill();
      throw err;
    }
    console.log(`[hotkey] listening for ${hotkey.source}`);
  }

  function stop(): void {
    if (!listener) return;
    listener.removeListener(handler);
    listener.kill();
    listener = null;
  }

  return { binding: hotkey.source, start, stop };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** Map one token onto a concrete key name */
function resolveKey(token: string): IGlobalKey | undefined {
  const alias = KEY_ALIASES[token.toLowerCase()];
  if (alias) return alias;
  const upper = token.toUpperCase();
  return LETTER_AND_DIGIT_KEYS.find((key) => key === upper) ?? FUNCTION_KEYS.find((key) => key === upper);
}
