/**
 * In-process test doubles shared by the unit tests.
 *
 * Responsibilities:
 * - A manual clock whose timers fire only when the test advances time
 * - Microtask flushing so async chains settle between steps
 * - Fake audio device, synthesis backends and transcription engine
 */

import { RequestRejectedError } from "./errors.js";

import type { AudioDevice, CaptureHandle } from "./audio-adapter.js";
import type { Clock, ScheduledTask } from "./clock.js";
import type { AudioSynthesisBackend, DirectSynthesisBackend, SpeakRequest } from "./synthesis-backend.js";
import type { TranscriptionEngine } from "./transcription-engine.js";
import type { AudioFrame, SynthesizedAudio, TranscriptionResult } from "./types.js";

// ============================================================================
// MANUAL CLOCK
// ============================================================================

export interface ManualClock extends Clock {
  /** Move time forward, firing due timers in order and letting promises settle after each */
  advance(ms: number): Promise<void>;
  /** Number of timers still pending */
  pendingCount(): number;
}

/**
 * Create a clock that only moves when advance() is called.
 *
 * @param start - Initial epoch milliseconds
 */
export function createManualClock(start = 0): ManualClock {
  let now = start;
  let nextSeq = 0;
  const tasks: { dueAt: number; seq: number; callback: () => void }[] = [];

  function schedule(callback: () => void, delayMs: number): ScheduledTask {
    const task = { dueAt: now + Math.max(0, delayMs), seq: nextSeq++, callback };
    tasks.push(task);
    return {
      cancel() {
        const index = tasks.indexOf(task);
        if (index !== -1) tasks.splice(index, 1);
      },
    };
  }

  async function advance(ms: number): Promise<void> {
    const target = now + ms;
    await flushMicrotasks();
    while (true) {
      const due = tasks
        .filter((task) => task.dueAt <= target)
        .sort((a, b) => a.dueAt - b.dueAt || a.seq - b.seq)[0];
      if (!due) break;
      tasks.splice(tasks.indexOf(due), 1);
      now = due.dueAt;
      due.callback();
      await flushMicrotasks();
    }
    now = target;
    await flushMicrotasks();
  }

  return {
    now: () => now,
    schedule,
    advance,
    pendingCount: () => tasks.length,
  };
}

/** Let every queued promise continuation run */
export function flushMicrotasks(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/**
 * Poll a condition between event-loop turns.
 *
 * @throws Error if the condition still fails after `turns` turns
 */
export async function waitFor(condition: () => boolean, turns = 200): Promise<void> {
  for (let i = 0; i < turns; i++) {
    if (condition()) return;
    await flushMicrotasks();
  }
  throw new Error("waitFor: condition not met");
}

// ============================================================================
// FAKE AUDIO DEVICE
// ============================================================================

export interface FakeDevice extends AudioDevice {
  readonly played: SynthesizedAudio[];
  /** True while a capture handle is open */
  readonly capturing: boolean;
  readonly openCount: number;
  /** Make the next openCapture() reject with this message */
  failNextOpen(message: string): void;
  /** Deliver one frame of constant amplitude, timestamped with the clock */
  emit(level: number): void;
}

/**
 * Create an in-memory audio device.
 *
 * @param clock - Frame timestamps come from this clock
 * @param frameSamples - Samples per emitted frame
 */
export function createFakeDevice(clock: Clock, frameSamples = 480): FakeDevice {
  const played: SynthesizedAudio[] = [];
  let onFrame: ((frame: AudioFrame) => void) | null = null;
  let openCount = 0;
  let openFailure: string | null = null;

  async function openCapture(handler: (frame: AudioFrame) => void): Promise<CaptureHandle> {
    if (openFailure !== null) {
      const message = openFailure;
      openFailure = null;
      throw new Error(message);
    }
    openCount++;
    onFrame = handler;
    return {
      stop: () => {
        if (onFrame === handler) onFrame = null;
      },
    };
  }

  async function play(audio: SynthesizedAudio): Promise<void> {
    played.push(audio);
  }

  return {
    sampleRate: 16000,
    openCapture,
    play,
    played,
    get capturing() { return onFrame !== null; },
    get openCount() { return openCount; },
    failNextOpen: (message) => { openFailure = message; },
    emit(level) {
      onFrame?.({ pcm: new Float32Array(frameSamples).fill(level), sampleRate: 16000, timestamp: clock.now() });
    },
  };
}

// ============================================================================
// FAKE SYNTHESIS BACKENDS
// ============================================================================

/**
 * instant: speak() resolves on the next tick.
 * manual: speak() resolves when finish() is called or the signal aborts.
 * fail: speak() rejects with "<name> exploded".
 * rejectVoice: like instant, but rejects the request when it names a voice.
 */
export type FakeSpeakMode = "instant" | "manual" | "fail" | "rejectVoice";

export interface FakeDirectBackend extends DirectSynthesisBackend {
  readonly calls: SpeakRequest[];
  /** Value returned by checkHealth() */
  healthy: boolean;
  /** speak() calls in progress */
  readonly active: number;
  /** Highest number of overlapping speak() calls seen */
  readonly maxActive: number;
  readonly destroyed: boolean;
  /** Resolve the oldest pending speak() in manual mode */
  finish(): void;
}

export function createFakeDirectBackend(
  name: string,
  mode: FakeSpeakMode,
  onSpeak?: (request: SpeakRequest) => void,
): FakeDirectBackend {
  const calls: SpeakRequest[] = [];
  const waiting: (() => void)[] = [];
  let active = 0;
  let maxActive = 0;
  let destroyed = false;

  async function speak(request: SpeakRequest, signal: AbortSignal): Promise<void> {
    calls.push(request);
    onSpeak?.(request);
    active++;
    maxActive = Math.max(maxActive, active);
    try {
      if (mode === "fail") {
        await flushMicrotasks();
        throw new Error(`${name} exploded`);
      }
      if (mode === "rejectVoice" && request.voice !== undefined) {
        await flushMicrotasks();
        throw new RequestRejectedError(`${name} has no voice ${request.voice}`);
      }
      if (mode === "instant" || mode === "rejectVoice") {
        await flushMicrotasks();
        return;
      }
      await new Promise<void>((resolve) => {
        waiting.push(resolve);
        signal.addEventListener("abort", () => {
          const index = waiting.indexOf(resolve);
          if (index >= 0) waiting.splice(index, 1);
          resolve();
        }, { once: true });
      });
    } finally {
      active--;
    }
  }

  const backend: FakeDirectBackend = {
    name,
    kind: "direct",
    healthy: true,
    calls,
    get active() { return active; },
    get maxActive() { return maxActive; },
    get destroyed() { return destroyed; },
    checkHealth: async () => backend.healthy,
    speak,
    destroy: () => { destroyed = true; },
    finish: () => { waiting.shift()?.(); },
  };
  return backend;
}

export interface FakeAudioBackend extends AudioSynthesisBackend {
  readonly calls: SpeakRequest[];
}

/** An audio backend that returns two bytes of PCM at 24kHz */
export function createFakeAudioBackend(name: string): FakeAudioBackend {
  const calls: SpeakRequest[] = [];
  return {
    name,
    kind: "audio",
    calls,
    checkHealth: async () => true,
    async synthesize(request) {
      calls.push(request);
      return { pcm: Buffer.from([1, 2]), sampleRate: 24000 };
    },
  };
}

// ============================================================================
// FAKE TRANSCRIPTION ENGINE
// ============================================================================

export interface FakeEngine extends TranscriptionEngine {
  /** Sample counts of every buffer handed over */
  readonly calls: number[];
  /** Next responses, consumed in order; an Error rejects */
  readonly responses: (string | Error)[];
  /** When true, transcribe() waits for release() */
  hold: boolean;
  release(): void;
}

export function createFakeEngine(responses: (string | Error)[] = []): FakeEngine {
  const calls: number[] = [];
  const held: (() => void)[] = [];

  const engine: FakeEngine = {
    name: "fake",
    calls,
    responses,
    hold: false,
    async transcribe(samples: Float32Array): Promise<TranscriptionResult> {
      calls.push(samples.length);
      if (engine.hold) await new Promise<void>((resolve) => held.push(resolve));
      const next = responses.shift() ?? "";
      if (next instanceof Error) throw next;
      return { text: next, languageTag: "en", confidence: 0.9 };
    },
    release: () => { held.shift()?.(); },
  };
  return engine;
}
