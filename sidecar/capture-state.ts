/**
 * Capture state machine transitions.
 *
 * The controller owns side effects; this module only answers "given this
 * state and this event, where do we go?" so the legal transitions live in one
 * exhaustive switch.
 *
 *   idle --START--> armed --TRIGGER--> recording --FINISH--> transcribing
 *     ^               ^                                           |
 *     |               +----------------TRANSCRIBED----------------+
 *     +------ STOP / INTERRUPT from any state
 */

import type { CaptureState } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** What started a recording */
export type TriggerSource = "hotkey" | "speech" | "resume";

/** What ended a recording */
export type FinishSource = "hotkey" | "silence";

export type CaptureEvent =
  | { type: "START" }
  | { type: "TRIGGER"; source: TriggerSource }
  | { type: "FINISH"; source: FinishSource }
  | { type: "TRANSCRIBED" }
  | { type: "STOP" }
  | { type: "INTERRUPT" };

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Compute the next state.
 *
 * @returns The next state, or null when the event is not legal in `state`
 */
export function nextCaptureState(state: CaptureState, event: CaptureEvent): CaptureState | null {
  switch (event.type) {
    case "START":
      return state === "idle" ? "armed" : null;
    case "TRIGGER":
      return state === "armed" ? "recording" : null;
    case "FINISH":
      return state === "recording" ? "transcribing" : null;
    case "TRANSCRIBED":
      return state === "transcribing" ? "armed" : null;
    case "STOP":
    case "INTERRUPT":
      return "idle";
  }
}
