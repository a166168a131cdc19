/**
 * Listener side of the voice session: microphone capture, recording and
 * hand-off to the transcription engine.
 *
 * The controller is the only code that opens the microphone. Frames are read
 * continuously while listening but are dropped whenever the speaker is
 * talking, so played-back speech never reaches the activity detector or the
 * recording buffer.
 *
 * Responsibilities:
 * - Drive the capture state machine (idle, armed, recording, transcribing)
 * - Start recordings from the hotkey, detected speech or auto-resume
 * - End recordings on the hotkey or, in auto-stop mode, on silence
 * - Transcribe each finished recording exactly once and publish the result
 * - Raise the stop signal when the operator starts speaking
 * - Re-enter recording after the speaker finishes, past the echo guard
 */

import { createActivityDetector } from "./activity-detector.js";
import { nextCaptureState } from "./capture-state.js";
import { systemClock } from "./clock.js";
import { AlreadyActiveError, DeviceError, InvalidParameterError, NotActiveError, errorMessage } from "./errors.js";
import { createHotkeyListener } from "./hotkey.js";
import { concatenateChunks } from "./pcm.js";
import { preview } from "./speech-queue.js";

import type { ActivityDetector } from "./activity-detector.js";
import type { AudioDevice, CaptureHandle } from "./audio-adapter.js";
import type { CaptureEvent, FinishSource, TriggerSource } from "./capture-state.js";
import type { Clock, ScheduledTask } from "./clock.js";
import type { CoordinationChannel } from "./coordination.js";
import type { HotkeyFactory, HotkeySource } from "./hotkey.js";
import type { TranscriptionEngine } from "./transcription-engine.js";
import type { AudioFrame, CaptureSession, CaptureState, TranscriptionResult, VadEvent } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const MIN_SILENCE_MS = 100;
export const MAX_SILENCE_MS = 10_000;
export const MIN_ECHO_DELAY_MS = 0;
export const MAX_ECHO_DELAY_MS = 5_000;

/** Default getResult wait */
const DEFAULT_RESULT_TIMEOUT_MS = 30_000;

/** How often auto-resume checks whether the speaker has finished */
const DEFAULT_RESUME_POLL_MS = 50;

/** Markers returned by getResult instead of transcript text */
export const RESULT_MARKERS = {
  ready: "[Ready]",
  recording: "[Recording...]",
  transcribing: "[Transcribing...]",
  notListening: "[Not listening]",
  timeout: "[Timeout]",
  interrupted: "[Interrupted]",
  noSpeech: "[No speech detected]",
} as const;

// ============================================================================
// INTERFACES
// ============================================================================

export interface CaptureControllerOptions {
  device: AudioDevice;
  engine: TranscriptionEngine;
  channel: CoordinationChannel;
  energyThreshold: number;
  minSpeechFrames: number;
  /** Used when start() leaves a setting out */
  defaults: { silenceMs: number; echoDelayMs: number; hotkey: string };
  /** Hotkey listener factory, replaced in tests */
  createHotkey?: HotkeyFactory;
  /**
   * Cancel speech directly when speaker and listener share a process.
   * Returns the number of queued utterances dropped.
   */
  cancelSpeech?: () => number;
  resumePollMs?: number;
  clock?: Clock;
}

export interface CaptureStartOptions {
  key?: string;
  autoStop?: boolean;
  silenceMs?: number;
  autoResume?: boolean;
  echoDelayMs?: number;
}

export interface CaptureStatus {
  state: CaptureState;
  autoStopEnabled: boolean;
  autoResumeEnabled: boolean;
  /** Whether the speaker is playing speech right now */
  speaking: boolean;
  hotkey: string | null;
  lastResult: { preview: string; languageTag: string } | null;
}

export interface CaptureController {
  /**
   * Open the microphone and arm the listener.
   * @throws AlreadyActiveError unless idle, InvalidParameterError for bad settings, DeviceError if the microphone fails
   */
  start(options?: CaptureStartOptions): Promise<string>;
  /** Return to idle from any state. Idempotent. */
  stop(): string;
  /**
   * What the hotkey does: start a recording when armed, end it when recording.
   * @throws NotActiveError when idle
   */
  toggle(): string;
  getStatus(): CaptureStatus;
  /**
   * Next transcript, or a marker. An unread transcript is returned first.
   * @throws InvalidParameterError for a negative timeout
   */
  getResult(wait: boolean, timeoutMs?: number): Promise<string>;
  /** Stop listening and cancel speech. Idempotent. */
  interrupt(reason?: string): string;
}

/** Settings fixed for one start()..stop() period */
interface ListenSettings {
  autoStop: boolean;
  autoResume: boolean;
  silenceMs: number;
  echoDelayMs: number;
  hotkey: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a capture controller in the idle state.
 *
 * @param options - Device, engine, coordination channel, detector tuning and defaults
 */
export function createCaptureController(options: CaptureControllerOptions): CaptureController {
  const { device, engine, channel, energyThreshold, minSpeechFrames, defaults, cancelSpeech } = options;
  const clock = options.clock ?? systemClock;
  const createHotkey = options.createHotkey ?? createHotkeyListener;
  const resumePollMs = options.resumePollMs ?? DEFAULT_RESUME_POLL_MS;

  let state: CaptureState = "idle";
  let starting = false;
  // Bumped on every start and teardown; callbacks from an older period are ignored
  let generation = 0;

  let settings: ListenSettings | null = null;
  let capture: CaptureHandle | null = null;
  let hotkey: HotkeySource | null = null;
  let detector: ActivityDetector | null = null;
  let session: CaptureSession | null = null;
  let preRoll: AudioFrame[] = [];
  let resumeTask: ScheduledTask | null = null;

  let unread: string | null = null;
  let lastTranscript: TranscriptionResult | null = null;
  let waiters: ((text: string) => void)[] = [];

  // ==========================================================================
  // PUBLIC OPERATIONS
  // ==========================================================================

  async function start(opts: CaptureStartOptions = {}): Promise<string> {
    if (state !== "idle" || starting) {
      throw new AlreadyActiveError(`Already listening (${starting ? "starting" : state}).`);
    }

    const next = resolveSettings(opts, defaults);
    const source = createHotkey(next.hotkey, onHotkey);
    const gen = ++generation;

    starting = true;
    let handle: CaptureHandle;
    try {
      handle = await device.openCapture((frame) => onFrame(gen, frame));
    } catch (err) {
      console.error(`[capture] microphone failed to open: ${errorMessage(err)}`);
      throw new DeviceError(`Device error: ${errorMessage(err)}`);
    } finally {
      starting = false;
    }

    if (gen !== generation) {
      handle.stop();
      return "Listening stopped.";
    }

    capture = handle;
    settings = next;
    hotkey = source;
    if (next.autoStop) {
      detector = createActivityDetector(
        { energyThreshold, minSpeechFrames, silenceTimeoutMs: next.silenceMs },
        (event) => onVadEvent(gen, event),
        clock,
      );
    }
    transition({ type: "START" });

    source.start().catch((err: unknown) => {
      console.error(`[capture] hotkey unavailable, continuing without it: ${errorMessage(err)}`);
    });

    return next.autoStop
      ? `Listening started. Speak now - I'll transcribe after ${next.silenceMs / 1000}s of silence.`
      : `Listening started. Press ${next.hotkey} to start and stop recording.`;
  }

  function stop(): string {
    if (state === "idle" && !starting) return "Not currently listening.";
    teardown();
    return "Listening stopped.";
  }

  function toggle(): string {
    switch (state) {
      case "idle":
        throw new NotActiveError("Not currently listening.");
      case "armed":
        beginRecording("hotkey");
        return "Recording started.";
      case "recording":
        endRecording("hotkey");
        return "Recording stopped, transcribing.";
      case "transcribing":
        return "Still transcribing the previous recording.";
    }
  }

  function getStatus(): CaptureStatus {
    return {
      state,
      autoStopEnabled: settings?.autoStop ?? false,
      autoResumeEnabled: settings?.autoResume ?? false,
      speaking: channel.isSpeaking(),
      hotkey: settings?.hotkey ?? null,
      lastResult: lastTranscript
        ? { preview: preview(lastTranscript.text), languageTag: lastTranscript.languageTag }
        : null,
    };
  }

  function getResult(wait: boolean, timeoutMs: number = DEFAULT_RESULT_TIMEOUT_MS): Promise<string> {
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      return Promise.reject(new InvalidParameterError(`timeoutMs must be a non-negative number, got ${timeoutMs}`));
    }
    if (unread !== null) {
      const text = unread;
      unread = null;
      return Promise.resolve(text);
    }
    if (!wait || state === "idle") return Promise.resolve(stateMarker());

    return new Promise<string>((resolve) => {
      let settled = false;
      const deliver = (text: string) => {
        if (settled) return;
        settled = true;
        timer.cancel();
        waiters = waiters.filter((waiter) => waiter !== deliver);
        resolve(text);
      };
      waiters.push(deliver);
      const timer = clock.schedule(() => deliver(RESULT_MARKERS.timeout), timeoutMs);
    });
  }

  function interrupt(reason?: string): string {
    const wasListening = state !== "idle" || starting;
    if (wasListening) teardown();

    const label = reason?.trim() ? `Interrupted: ${reason.trim()}.` : "Interrupted.";
    console.log(`[capture] ${label}`);

    const listening = wasListening ? "Listening stopped." : "Not listening.";
    if (cancelSpeech) {
      const cleared = cancelSpeech();
      return `${label} ${listening} Speech cancelled, ${cleared} message(s) cleared.`;
    }
    channel.signalStop();
    return `${label} ${listening} Speech stop requested.`;
  }

  // ==========================================================================
  // FRAME AND EVENT HANDLING
  // ==========================================================================

  function onFrame(gen: number, frame: AudioFrame): void {
    if (gen !== generation || !settings) return;
    if (state !== "armed" && state !== "recording") return;
    // Turn-taking: never listen to our own speaker
    if (channel.isSpeaking() || withinEchoGuard(frame.timestamp, settings.echoDelayMs)) return;

    if (state === "armed") {
      if (!detector) return;
      preRoll.push(frame);
      if (preRoll.length > minSpeechFrames) preRoll.shift();
      detector.processFrame(frame);
      return;
    }

    session?.frames.push(frame);
    detector?.processFrame(frame);
  }

  function onVadEvent(gen: number, event: VadEvent): void {
    if (gen !== generation) return;

    if (event.type === "SPEECH_START") {
      channel.signalStop();
      if (state === "armed") beginRecording("speech");
      return;
    }

    if (state === "recording") endRecording("silence");
  }

  function onHotkey(): void {
    if (state === "idle") return;
    console.log(`[capture] hotkey: ${toggle()}`);
  }

  // ==========================================================================
  // RECORDING LIFECYCLE
  // ==========================================================================

  /** armed -> recording. Speech-triggered recordings keep the onset frames. */
  function beginRecording(source: TriggerSource): void {
    if (!settings || !transition({ type: "TRIGGER", source })) return;
    cancelResume();

    const frames = source === "speech" ? preRoll : [];
    preRoll = [];
    if (source !== "speech") detector?.reset();

    session = { frames, startedAt: clock.now(), mode: settings.autoStop ? "vadAutoStop" : "manual" };
  }

  /** recording -> transcribing, handing the frames over exactly once */
  function endRecording(source: FinishSource): void {
    const finished = session;
    if (!finished || !transition({ type: "FINISH", source })) return;
    session = null;
    detector?.reset();
    preRoll = [];

    transcribe(generation, finished).catch((err: unknown) => {
      console.error(`[capture] transcription hand-off failed: ${errorMessage(err)}`);
    });
  }

  async function transcribe(gen: number, finished: CaptureSession): Promise<void> {
    const samples = concatenateChunks(finished.frames.map((frame) => frame.pcm));
    const sampleRate = finished.frames[0]?.sampleRate ?? device.sampleRate;
    const seconds = (samples.length / sampleRate).toFixed(1);
    console.log(`[capture] transcribing ${seconds}s (${finished.frames.length} frames)`);

    let text: string;
    let result: TranscriptionResult | null = null;
    if (samples.length === 0) {
      text = RESULT_MARKERS.noSpeech;
    } else {
      try {
        result = await engine.transcribe(samples, sampleRate);
        text = result.text || RESULT_MARKERS.noSpeech;
      } catch (err) {
        console.error(`[capture] ${engine.name} transcription failed: ${errorMessage(err)}`);
        text = `[Transcription failed: ${errorMessage(err)}]`;
      }
    }

    // Stopped or interrupted while the engine was busy
    if (gen !== generation) return;

    if (result?.text) lastTranscript = result;
    const publishedAt = clock.now();
    publish(text);
    transition({ type: "TRANSCRIBED" });
    if (settings?.autoResume) scheduleResume(publishedAt);
  }

  /** Give the text to the oldest waiter, or keep it for the next getResult */
  function publish(text: string): void {
    const waiter = waiters[0];
    if (waiter) {
      waiter(text);
      return;
    }
    unread = text;
  }

  /**
   * Re-enter recording once the speaker has finished a reply that started
   * after `publishedAt`, no sooner than echoDelayMs after it finished.
   */
  function scheduleResume(publishedAt: number): void {
    const gen = generation;

    const check = () => {
      resumeTask = null;
      if (gen !== generation || state !== "armed" || !settings) return;

      const finishedAt = channel.lastFinishedAt();
      if (channel.isSpeaking() || finishedAt === null || finishedAt <= publishedAt) {
        resumeTask = clock.schedule(check, resumePollMs);
        return;
      }

      const resumeAt = finishedAt + settings.echoDelayMs;
      if (clock.now() < resumeAt) {
        resumeTask = clock.schedule(check, resumeAt - clock.now());
        return;
      }

      console.log("[capture] speaker finished, resuming recording");
      beginRecording("resume");
    };

    resumeTask = clock.schedule(check, resumePollMs);
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  /** Apply an event through the transition table */
  function transition(event: CaptureEvent): boolean {
    const next = nextCaptureState(state, event);
    if (next === null) {
      console.error(`[capture] ignored ${event.type} in state ${state}`);
      return false;
    }
    if (next !== state) console.log(`[capture] ${state} -> ${next} (${describeEvent(event)})`);
    state = next;
    return true;
  }

  /** Release everything and return to idle. Waiters get the interrupted marker. */
  function teardown(): void {
    generation++;
    cancelResume();
    capture?.stop();
    hotkey?.stop();
    detector?.destroy();
    capture = null;
    hotkey = null;
    detector = null;
    session = null;
    preRoll = [];
    settings = null;
    transition({ type: "STOP" });

    const released = waiters;
    waiters = [];
    for (const waiter of released) waiter(RESULT_MARKERS.interrupted);
  }

  function cancelResume(): void {
    resumeTask?.cancel();
    resumeTask = null;
  }

  function withinEchoGuard(timestamp: number, echoDelayMs: number): boolean {
    const finishedAt = channel.lastFinishedAt();
    return finishedAt !== null && timestamp < finishedAt + echoDelayMs;
  }

  function stateMarker(): string {
    switch (state) {
      case "idle":
        return RESULT_MARKERS.notListening;
      case "armed":
        return RESULT_MARKERS.ready;
      case "recording":
        return RESULT_MARKERS.recording;
      case "transcribing":
        return RESULT_MARKERS.transcribing;
    }
  }

  return { start, stop, toggle, getStatus, getResult, interrupt };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Merge start() options over the defaults and check ranges.
 *
 * @throws InvalidParameterError for out-of-range silence or echo delay
 */
function resolveSettings(opts: CaptureStartOptions, defaults: CaptureControllerOptions["defaults"]): ListenSettings {
  const silenceMs = opts.silenceMs ?? defaults.silenceMs;
  const echoDelayMs = opts.echoDelayMs ?? defaults.echoDelayMs;

  if (!Number.isFinite(silenceMs) || silenceMs < MIN_SILENCE_MS || silenceMs > MAX_SILENCE_MS) {
    throw new InvalidParameterError(`silenceMs must be between ${MIN_SILENCE_MS} and ${MAX_SILENCE_MS}, got ${silenceMs}`);
  }
  if (!Number.isFinite(echoDelayMs) || echoDelayMs < MIN_ECHO_DELAY_MS || echoDelayMs > MAX_ECHO_DELAY_MS) {
    throw new InvalidParameterError(
      `echoDelayMs must be between ${MIN_ECHO_DELAY_MS} and ${MAX_ECHO_DELAY_MS}, got ${echoDelayMs}`
    );
  }

  return {
    autoStop: opts.autoStop ?? true,
    autoResume: opts.autoResume ?? false,
    silenceMs,
    echoDelayMs,
    hotkey: opts.key?.trim() ? opts.key.trim() : defaults.hotkey,
  };
}

function describeEvent(event: CaptureEvent): string {
  return "source" in event ? `${event.type.toLowerCase()} by ${event.source}` : event.type.toLowerCase();
}
