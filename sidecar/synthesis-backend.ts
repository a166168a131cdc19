/**
 * Synthesis backend contract and the cached health wrapper.
 *
 * A backend either returns audio for the shared audio device to play
 * ("audio") or speaks through its own output path ("direct", e.g. the OS
 * synthesizer). Both honor an AbortSignal so cancellation reaches whatever
 * process or request is producing sound.
 *
 * Responsibilities:
 * - Define the two backend shapes as a discriminated union
 * - Cache health checks for a TTL so the queue does not check per utterance
 * - Mark a backend unhealthy immediately when an attempt fails
 */

import { systemClock } from "./clock.js";
import { errorMessage } from "./errors.js";

import type { Clock } from "./clock.js";
import type { SynthesizedAudio } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** What to say and how */
export interface SpeakRequest {
  text: string;
  voice?: string;
  /** Playback speed multiplier, 0.5..2.0 */
  speed: number;
}

interface BackendBase {
  /** Short identifier used in logs and outcomes, e.g. "elevenlabs" */
  readonly name: string;
  /** Cheap readiness check (binary present, API key set, server up) */
  checkHealth(): Promise<boolean>;
  /** Free subprocesses and connections */
  destroy?(): void;
}

/** Produces PCM for the audio device to play */
export interface AudioSynthesisBackend extends BackendBase {
  readonly kind: "audio";
  /**
   * @throws Error on synthesis failure; an AbortError-like rejection after abort is fine
   */
  synthesize(request: SpeakRequest, signal: AbortSignal): Promise<SynthesizedAudio>;
}

/** Speaks through its own output path */
export interface DirectSynthesisBackend extends BackendBase {
  readonly kind: "direct";
  /**
   * Resolve once speech finishes, or promptly after `signal` aborts.
   * @throws Error if the synthesizer fails
   */
  speak(request: SpeakRequest, signal: AbortSignal): Promise<void>;
  listVoices?(): Promise<string[]>;
}

export type SynthesisBackend = AudioSynthesisBackend | DirectSynthesisBackend;

/** A backend plus its cached health state */
export interface RankedBackend {
  readonly backend: SynthesisBackend;
  isAvailable(): Promise<boolean>;
  reportSuccess(): void;
  reportFailure(): void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Wrap a backend with a TTL-cached health check.
 *
 * @param backend - The backend to wrap
 * @param ttlMs - How long a health answer (or a reported success/failure) stays valid
 * @param clock - Time source
 */
export function withHealthCache(backend: SynthesisBackend, ttlMs: number, clock: Clock = systemClock): RankedBackend {
  let cached: { healthy: boolean; at: number } | null = null;

  async function isAvailable(): Promise<boolean> {
    if (cached && clock.now() - cached.at < ttlMs) return cached.healthy;

    let healthy: boolean;
    try {
      healthy = await backend.checkHealth();
    } catch (err) {
      console.error(`[tts] ${backend.name} health check failed: ${errorMessage(err)}`);
      healthy = false;
    }
    cached = { healthy, at: clock.now() };
    return healthy;
  }

  return {
    backend,
    isAvailable,
    reportSuccess: () => { cached = { healthy: true, at: clock.now() }; },
    reportFailure: () => { cached = { healthy: false, at: clock.now() }; },
  };
}
