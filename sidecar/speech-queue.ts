/**
 * FIFO speech queue with a single playback worker.
 *
 * Callers enqueue utterances from any request handler; one worker loop takes
 * them in order and plays each through the first healthy synthesis backend,
 * falling back down the chain on failure. The worker is the only code that
 * starts playback, so at most one utterance is audible at a time, and the
 * speaking marker is set exactly while a PlaybackSession exists.
 *
 * Responsibilities:
 * - Validate and enqueue utterances, optionally awaiting their completion
 * - Play utterances in FIFO order with per-backend fallback
 * - Cancel everything (queue + in-flight) or skip just the in-flight utterance
 * - Abort the in-flight utterance when the listener raises the stop signal
 * - Discard a stop signal that was raised while nothing was playing
 */

import { systemClock } from "./clock.js";
import { InvalidInputError, InvalidParameterError, RequestRejectedError, errorMessage } from "./errors.js";
import { withHealthCache } from "./synthesis-backend.js";

import type { AudioDevice } from "./audio-adapter.js";
import type { Clock, ScheduledTask } from "./clock.js";
import type { CoordinationChannel } from "./coordination.js";
import type { RankedBackend, SpeakRequest, SynthesisBackend } from "./synthesis-backend.js";
import type { PlaybackOutcome, PlaybackOutcomeType, PlaybackSession, Utterance } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const MIN_SPEED = 0.5;
export const MAX_SPEED = 2.0;

/** Default enqueueAndWait timeout */
const DEFAULT_WAIT_TIMEOUT_MS = 120_000;

/** Characters of text shown in logs and status */
const PREVIEW_LENGTH = 50;

/** AbortSignal reasons, mapped onto outcome types */
const CANCEL_REASON = "cancelled";
const SKIP_REASON = "skipped";

// ============================================================================
// INTERFACES
// ============================================================================

export interface SpeechQueueOptions {
  /** Backends in preference order */
  backends: SynthesisBackend[];
  device: AudioDevice;
  channel: CoordinationChannel;
  defaultSpeed: number;
  /** How often the worker checks for a stop signal during playback */
  pollIntervalMs: number;
  /** How long a backend health answer is reused */
  healthTtlMs: number;
  clock?: Clock;
}

export interface EnqueueOptions {
  voice?: string;
  speed?: number;
}

export interface WaitOptions extends EnqueueOptions {
  timeoutMs?: number;
}

/** Result of enqueueAndWait. A timeout leaves the utterance queued. */
export type WaitResult =
  | { status: "completed"; outcome: PlaybackOutcome }
  | { status: "timeout"; utteranceId: number };

export interface SpeechQueueStatus {
  speaking: boolean;
  /** Utterances waiting behind the in-flight one */
  pending: number;
  currentBackend: string | null;
  /** First 50 characters of the in-flight utterance */
  currentPreview: string | null;
  lastOutcome: PlaybackOutcome | null;
}

export interface SpeechQueue {
  /**
   * Append an utterance. Returns immediately.
   * @throws InvalidInputError for empty text, InvalidParameterError for a bad speed
   */
  enqueue(text: string, options?: EnqueueOptions): Utterance;
  /**
   * Append an utterance and wait for its outcome or the timeout.
   * @throws InvalidInputError for empty text, InvalidParameterError for a bad speed
   */
  enqueueAndWait(text: string, options?: WaitOptions): Promise<WaitResult>;
  /** Drop every queued utterance and abort the in-flight one. Returns the number dropped from the queue. */
  cancelAll(): number;
  /** Abort only the in-flight utterance. False when nothing is playing. */
  skip(): boolean;
  getStatus(): SpeechQueueStatus;
  /** Subscribe to outcomes. Returns an unsubscribe function. */
  onOutcome(listener: (outcome: PlaybackOutcome) => void): () => void;
  /** Cancel everything, stop the worker and free backend resources */
  close(): Promise<void>;
}

/** How one backend handled one utterance */
type AttemptResult = { ok: true } | { ok: false; error: unknown };

/** A queued utterance and its completion latch */
interface QueueEntry {
  utterance: Utterance;
  done: Promise<PlaybackOutcome>;
  settle: (outcome: PlaybackOutcome) => void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a speech queue and start its worker.
 *
 * @param options - Backend chain, audio device, coordination channel and timings
 * @returns The queue
 */
export function createSpeechQueue(options: SpeechQueueOptions): SpeechQueue {
  const { device, channel, defaultSpeed, pollIntervalMs } = options;
  const clock = options.clock ?? systemClock;
  const chain: RankedBackend[] = options.backends.map((b) => withHealthCache(b, options.healthTtlMs, clock));

  validateSpeed(defaultSpeed);

  let pending: QueueEntry[] = [];
  let current: PlaybackSession | null = null;
  let lastOutcome: PlaybackOutcome | null = null;
  let nextId = 1;
  let closed = false;
  let wake: (() => void) | null = null;
  const listeners = new Set<(outcome: PlaybackOutcome) => void>();

  const worker = runWorker();

  // ==========================================================================
  // PUBLIC OPERATIONS
  // ==========================================================================

  function enqueue(text: string, opts: EnqueueOptions = {}): Utterance {
    return addEntry(text, opts, false).utterance;
  }

  async function enqueueAndWait(text: string, opts: WaitOptions = {}): Promise<WaitResult> {
    const timeoutMs = opts.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new InvalidParameterError(`timeoutMs must be a non-negative number, got ${timeoutMs}`);
    }

    const entry = addEntry(text, opts, true);

    let expire: (result: WaitResult) => void = () => {};
    const timedOut = new Promise<WaitResult>((resolve) => { expire = resolve; });
    const timer = clock.schedule(() => expire({ status: "timeout", utteranceId: entry.utterance.id }), timeoutMs);
    const completed = entry.done.then((outcome): WaitResult => ({ status: "completed", outcome }));

    const result = await Promise.race([completed, timedOut]);
    timer.cancel();
    return result;
  }

  function cancelAll(): number {
    const cleared = pending;
    pending = [];
    for (const entry of cleared) {
      finish(entry, makeOutcome(entry.utterance.id, "cancelled", null));
    }
    if (current) current.abort.abort(CANCEL_REASON);
    if (cleared.length > 0 || current) {
      console.log(`[speech-queue] cancelled: ${cleared.length} queued${current ? ", 1 in flight" : ""}`);
    }
    return cleared.length;
  }

  function skip(): boolean {
    if (!current) return false;
    console.log(`[speech-queue] skipping #${current.utterance.id}`);
    current.abort.abort(SKIP_REASON);
    return true;
  }

  function getStatus(): SpeechQueueStatus {
    return {
      speaking: current !== null,
      pending: pending.length,
      currentBackend: current?.backendInUse || null,
      currentPreview: current ? preview(current.utterance.text) : null,
      lastOutcome,
    };
  }

  function onOutcome(listener: (outcome: PlaybackOutcome) => void): () => void {
    listeners.add(listener);
    return () => { listeners.delete(listener); };
  }

  async function close(): Promise<void> {
    if (closed) return;
    closed = true;
    cancelAll();
    wake?.();
    await worker;
    for (const ranked of chain) ranked.backend.destroy?.();
  }

  // ==========================================================================
  // WORKER
  // ==========================================================================

  /** Take utterances one at a time until closed */
  async function runWorker(): Promise<void> {
    while (!closed) {
      const entry = pending.shift();
      if (!entry) {
        await new Promise<void>((resolve) => { wake = resolve; });
        wake = null;
        continue;
      }

      try {
        finish(entry, await playEntry(entry.utterance));
      } catch (err) {
        console.error(`[speech-queue] worker error on #${entry.utterance.id}: ${errorMessage(err)}`);
        finish(entry, makeOutcome(entry.utterance.id, "undeliverable", null, errorMessage(err)));
      }
    }
  }

  /**
   * Play one utterance inside a PlaybackSession. The speaking marker is set
   * for exactly the lifetime of the session.
   */
  async function playEntry(utterance: Utterance): Promise<PlaybackOutcome> {
    if (channel.consumeStopSignal()) {
      console.log("[speech-queue] discarded a stale stop signal");
    }

    const session: PlaybackSession = {
      utterance,
      backendInUse: "",
      startedAt: clock.now(),
      abort: new AbortController(),
    };
    current = session;
    channel.markSpeaking(true);
    const stopWatch = watchStopSignal(session);

    try {
      return await deliver(session);
    } finally {
      stopWatch.cancel();
      current = null;
      channel.markSpeaking(false);
    }
  }

  /** Try each backend in order until one plays the utterance */
  async function deliver(session: PlaybackSession): Promise<PlaybackOutcome> {
    const { utterance } = session;
    const { signal } = session.abort;
    const request: SpeakRequest = { text: utterance.text, voice: utterance.voiceOverride, speed: utterance.speedFactor };
    const failures: string[] = [];

    for (const ranked of chain) {
      const name = ranked.backend.name;
      if (signal.aborted) break;
      if (!(await ranked.isAvailable())) {
        failures.push(`${name}: unavailable`);
        continue;
      }
      if (signal.aborted) break;

      session.backendInUse = name;
      const result = await attemptWithDefaultVoice(ranked.backend, request, signal);
      if (signal.aborted) break;
      if (!result.ok) {
        // A rejected request leaves the backend's health alone
        if (!(result.error instanceof RequestRejectedError)) ranked.reportFailure();
        console.error(`[speech-queue] ${name} failed on #${utterance.id}, trying next backend: ${errorMessage(result.error)}`);
        failures.push(`${name}: ${errorMessage(result.error)}`);
        continue;
      }

      ranked.reportSuccess();
      return makeOutcome(utterance.id, "played", name);
    }

    if (signal.aborted) {
      const type: PlaybackOutcomeType = signal.reason === SKIP_REASON ? "skipped" : "cancelled";
      return makeOutcome(utterance.id, type, session.backendInUse || null);
    }

    return makeOutcome(utterance.id, "undeliverable", null, failures.join("; "));
  }

  /**
   * Attempt one backend. When it rejects the voice override, try it once more
   * on its own default voice before giving up on it.
   */
  async function attemptWithDefaultVoice(
    backend: SynthesisBackend,
    request: SpeakRequest,
    signal: AbortSignal,
  ): Promise<AttemptResult> {
    try {
      await attempt(backend, request, signal);
      return { ok: true };
    } catch (err) {
      if (signal.aborted || request.voice === undefined || !(err instanceof RequestRejectedError)) {
        return { ok: false, error: err };
      }
      console.log(`[speech-queue] ${backend.name} rejected voice "${request.voice}", retrying with its default voice`);
    }

    try {
      await attempt(backend, { ...request, voice: undefined }, signal);
      return { ok: true };
    } catch (err) {
      return { ok: false, error: err };
    }
  }

  /** One synthesis + playback attempt on one backend */
  async function attempt(backend: SynthesisBackend, request: SpeakRequest, signal: AbortSignal): Promise<void> {
    if (backend.kind === "direct") {
      await backend.speak(request, signal);
      return;
    }
    const audio = await backend.synthesize(request, signal);
    if (signal.aborted) return;
    await device.play(audio, signal);
  }

  /** Poll the stop signal while the session plays */
  function watchStopSignal(session: PlaybackSession): ScheduledTask {
    let task = clock.schedule(check, pollIntervalMs);

    function check(): void {
      if (channel.consumeStopSignal()) {
        console.log(`[speech-queue] stop signal received, aborting #${session.utterance.id}`);
        session.abort.abort(CANCEL_REASON);
        return;
      }
      task = clock.schedule(check, pollIntervalMs);
    }

    return { cancel: () => task.cancel() };
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  /** Validate, create the utterance and wake the worker */
  function addEntry(text: string, opts: EnqueueOptions, blocking: boolean): QueueEntry {
    if (closed) throw new InvalidInputError("Speech queue is closed");
    if (text.trim().length === 0) throw new InvalidInputError("Text must not be empty");
    const speed = opts.speed ?? defaultSpeed;
    validateSpeed(speed);

    const utterance: Utterance = {
      id: nextId++,
      text,
      voiceOverride: opts.voice?.trim() ? opts.voice.trim() : undefined,
      speedFactor: speed,
      blocking,
    };

    let settle: (outcome: PlaybackOutcome) => void = () => {};
    const done = new Promise<PlaybackOutcome>((resolve) => { settle = resolve; });
    const entry: QueueEntry = { utterance, done, settle };

    pending.push(entry);
    console.log(`[speech-queue] queued #${utterance.id} "${preview(text)}" (${pending.length} waiting)`);
    wake?.();
    return entry;
  }

  /** Deliver an outcome to the waiter and listeners */
  function finish(entry: QueueEntry, outcome: PlaybackOutcome): void {
    lastOutcome = outcome;
    entry.settle(outcome);
    for (const listener of listeners) listener(outcome);
  }

  function makeOutcome(id: number, type: PlaybackOutcomeType, backend: string | null, error?: string): PlaybackOutcome {
    return { utteranceId: id, type, backend, ...(error !== undefined ? { error } : {}), finishedAt: clock.now() };
  }

  return { enqueue, enqueueAndWait, cancelAll, skip, getStatus, onOutcome, close };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * @throws InvalidParameterError unless 0.5 <= speed <= 2.0
 */
export function validateSpeed(speed: number): void {
  if (!Number.isFinite(speed) || speed < MIN_SPEED || speed > MAX_SPEED) {
    throw new InvalidParameterError(`speed must be between ${MIN_SPEED} and ${MAX_SPEED}, got ${speed}`);
  }
}

/** One log line for a finished utterance */
export function describeOutcome(outcome: PlaybackOutcome): string {
  const id = `#${outcome.utteranceId}`;
  switch (outcome.type) {
    case "played":
      return `${id} played via ${outcome.backend ?? "unknown backend"}`;
    case "undeliverable":
      return `${id} undeliverable: ${outcome.error ?? "no backend available"}`;
    default:
      return outcome.backend ? `${id} ${outcome.type} on ${outcome.backend}` : `${id} ${outcome.type} before playback`;
  }
}

/** First 50 characters, with an ellipsis when truncated */
export function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}
