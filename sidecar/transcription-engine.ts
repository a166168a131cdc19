/**
 * Transcription engine contract.
 *
 * An engine takes one complete capture buffer and returns its text. Engines
 * hold no per-session state, so the capture controller can hand them any
 * buffer in any order.
 */

import type { TranscriptionResult } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface TranscriptionEngine {
  /** Short identifier used in logs, e.g. "elevenlabs" */
  readonly name: string;

  /**
   * Transcribe a complete buffer.
   *
   * @param samples - Mono samples normalized to -1.0..1.0
   * @param sampleRate - Sample rate of `samples` in Hz
   * @returns Recognized text; empty text when nothing was recognized
   * @throws BackendUnavailableError or a transport error when the engine fails
   */
  transcribe(samples: Float32Array, sampleRate: number): Promise<TranscriptionResult>;

  /** Free native resources */
  destroy?(): void;
}
