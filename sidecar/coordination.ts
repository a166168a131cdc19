/**
 * Coordination channel between the speech queue and the capture controller.
 *
 * Exactly two markers cross the process boundary: the stop request and the
 * speaker record. The speaker record says whether playback is in flight (and
 * by which process) and when the last utterance finished.
 *
 * Responsibilities:
 * - Publish and consume stop requests with exactly-once semantics
 * - Track the speaking flag and the last-finished timestamp
 * - Serve isSpeaking() from a short-TTL cache so per-frame checks stay cheap
 * - Treat a speaking record left by a dead process as stale
 */

import { systemClock } from "./clock.js";
import { isProcessAlive } from "./session-lock.js";

import type { Clock } from "./clock.js";
import type { SignalStore } from "./signal-store.js";
import type { CoordinationState } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface CoordinationChannel {
  /** Ask the speaker to abort the in-flight utterance */
  signalStop(): void;
  /** Test-and-clear the stop request. True for exactly one caller per signal. */
  consumeStopSignal(): boolean;
  /** Whether any process is playing speech. Cached for speakingTtlMs. */
  isSpeaking(): boolean;
  /** Called by the speech queue only, around each playback session */
  markSpeaking(speaking: boolean): void;
  /** Epoch ms at which the last utterance finished, null if none yet */
  lastFinishedAt(): number | null;
  snapshot(): CoordinationState;
}

export interface CoordinationOptions {
  store: SignalStore;
  /** How long an isSpeaking() answer may be reused */
  speakingTtlMs: number;
  clock?: Clock;
  /** Liveness check for the pid in a speaking record */
  isProcessAlive?: (pid: number) => boolean;
}

/** Body of the "speaker" marker */
interface SpeakerRecord {
  state: "speaking" | "idle";
  pid: number;
  finishedAt: number | null;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a coordination channel over a signal store.
 *
 * @param options - Store, cache TTL, clock and liveness check
 * @returns The channel shared by the speech queue and capture controller
 */
export function createCoordinationChannel(options: CoordinationOptions): CoordinationChannel {
  const { store, speakingTtlMs } = options;
  const clock = options.clock ?? systemClock;
  const alive = options.isProcessAlive ?? isProcessAlive;

  let cached: { value: boolean; at: number } | null = null;

  function signalStop(): void {
    store.set("stop");
  }

  function consumeStopSignal(): boolean {
    return store.testAndClear("stop");
  }

  function markSpeaking(speaking: boolean): void {
    const previous = readSpeakerRecord();
    const record: SpeakerRecord = speaking
      ? { state: "speaking", pid: process.pid, finishedAt: previous?.finishedAt ?? null }
      : { state: "idle", pid: process.pid, finishedAt: clock.now() };
    store.set("speaker", JSON.stringify(record));
    cached = { value: speaking, at: clock.now() };
  }

  function isSpeaking(): boolean {
    const now = clock.now();
    if (cached && now - cached.at < speakingTtlMs) return cached.value;

    const record = readSpeakerRecord();
    let speaking = record?.state === "speaking";
    if (record && speaking && record.pid !== process.pid && !alive(record.pid)) {
      console.log(`[coordination] speaker pid ${record.pid} is gone, clearing stale speaking flag`);
      store.set("speaker", JSON.stringify({ ...record, state: "idle" }));
      speaking = false;
    }

    cached = { value: speaking, at: now };
    return speaking;
  }

  function lastFinishedAt(): number | null {
    return readSpeakerRecord()?.finishedAt ?? null;
  }

  function snapshot(): CoordinationState {
    return {
      speaking: isSpeaking(),
      stopRequested: store.get("stop") !== null,
      lastSpeechFinishedAt: lastFinishedAt(),
    };
  }

  /** Read and validate the speaker marker */
  function readSpeakerRecord(): SpeakerRecord | null {
    const marker = store.get("speaker");
    if (!marker) return null;
    return parseSpeakerRecord(marker.payload);
  }

  return { signalStop, consumeStopSignal, isSpeaking, markSpeaking, lastFinishedAt, snapshot };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Render a coordination snapshot for the startup log.
 */
export function describeCoordination(state: CoordinationState): string {
  const finished = state.lastSpeechFinishedAt === null ? "never" : new Date(state.lastSpeechFinishedAt).toISOString();
  return `speaking=${state.speaking ? "yes" : "no"}, stop pending=${state.stopRequested ? "yes" : "no"}, last speech finished=${finished}`;
}

function parseSpeakerRecord(payload: string): SpeakerRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;
  const state = "state" in parsed ? parsed.state : undefined;
  const pid = "pid" in parsed ? parsed.pid : undefined;
  const finishedAt = "finishedAt" in parsed ? parsed.finishedAt : undefined;
  if ((state !== "speaking" && state !== "idle") || typeof pid !== "number") return null;
  return { state, pid, finishedAt: typeof finishedAt === "number" ? finishedAt : null };
}
