/**
 * AudioDevice interface for abstracting microphone and speaker access.
 *
 * The capture controller reads frames through it and the speech queue plays
 * synthesized buffers through it, so neither touches a platform API directly.
 * Implemented by local-audio.ts (sox) and by in-process fakes in tests.
 *
 * Responsibilities:
 * - Define a common contract for framed microphone input
 * - Define cancellable playback of synthesized PCM
 */

import type { AudioFrame, SynthesizedAudio } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** An open microphone. Frames stop arriving after stop(). */
export interface CaptureHandle {
  stop: () => void;
}

/**
 * Abstraction over audio I/O.
 */
export interface AudioDevice {
  /** Microphone sample rate in Hz */
  readonly sampleRate: number;

  /**
   * Open the microphone. Frames are delivered synchronously to `onFrame`,
   * each exactly one frame long (e.g. 480 samples = 30ms at 16kHz).
   *
   * @param onFrame - Called with each captured frame
   * @returns Handle for closing the microphone
   * @throws DeviceError if the microphone cannot be opened
   */
  openCapture: (onFrame: (frame: AudioFrame) => void) => Promise<CaptureHandle>;

  /**
   * Play a synthesized buffer to completion.
   * Resolves early, without error, when `signal` aborts.
   *
   * @param audio - 16-bit PCM and its sample rate
   * @param signal - Aborting stops playback immediately
   * @throws DeviceError if the speaker fails
   */
  play: (audio: SynthesizedAudio, signal: AbortSignal) => Promise<void>;
}
