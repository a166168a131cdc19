/**
 * Voice activity detection over fixed-size audio frames.
 *
 * Classifies each frame as speech or silence (RMS energy by default), debounces
 * onset with a minimum run of speech frames, and ends speech once no speech
 * frame has arrived for the silence timeout. The silence deadline is always
 * measured from the most recent speech frame, so a speech frame landing just
 * before the deadline pushes it out again.
 *
 * Responsibilities:
 * - Emit SPEECH_START after minSpeechFrames consecutive speech frames
 * - Emit SPEECH_END silenceTimeoutMs after the last speech frame
 * - Ignore stale timer callbacks after reset() or destroy()
 */

import { systemClock } from "./clock.js";

import type { Clock, ScheduledTask } from "./clock.js";
import type { ActivityDetectorConfig, AudioFrame, VadEvent } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** Callback invoked for each detected speech boundary. */
export type VadEventCallback = (event: VadEvent) => void;

/** Decides whether a single frame contains speech */
export type FrameClassifier = (frame: AudioFrame) => boolean;

export interface ActivityDetector {
  /**
   * Classify one frame and update the detector state. Events fire
   * synchronously from inside this call (onset) or from the silence timer.
   *
   * @returns true if the frame was classified as speech
   */
  processFrame(frame: AudioFrame): boolean;

  /** True between SPEECH_START and SPEECH_END */
  isInSpeech(): boolean;

  /**
   * Return to the initial state and cancel any pending silence timer.
   * Call between utterances.
   */
  reset(): void;

  /** Reset and stop emitting events for good */
  destroy(): void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create an activity detector.
 *
 * @param config - Threshold, onset debounce and silence timeout
 * @param onEvent - Callback for SPEECH_START / SPEECH_END
 * @param clock - Time source for the silence timer
 * @param classify - Frame classifier, RMS energy against the threshold by default
 */
export function createActivityDetector(
  config: ActivityDetectorConfig,
  onEvent: VadEventCallback,
  clock: Clock = systemClock,
  classify: FrameClassifier = (frame) => computeRms(frame.pcm) > config.energyThreshold,
): ActivityDetector {
  const { minSpeechFrames, silenceTimeoutMs } = config;

  let inSpeech = false;
  let consecutiveSpeech = 0;
  let lastSpeechAt = 0;
  let silenceTimer: ScheduledTask | null = null;
  let generation = 0;
  let destroyed = false;

  function processFrame(frame: AudioFrame): boolean {
    if (destroyed) return false;
    const isSpeech = classify(frame);

    if (isSpeech) {
      consecutiveSpeech++;
      lastSpeechAt = frame.timestamp;
      if (inSpeech) {
        cancelSilenceTimer();
      } else if (consecutiveSpeech >= minSpeechFrames) {
        inSpeech = true;
        onEvent({ type: "SPEECH_START", timestamp: frame.timestamp });
      }
      return true;
    }

    consecutiveSpeech = 0;
    if (!inSpeech) return false;

    if (frame.timestamp - lastSpeechAt >= silenceTimeoutMs) {
      endSpeech();
    } else if (!silenceTimer) {
      scheduleSilenceCheck();
    }
    return false;
  }

  /** Arm the timer for lastSpeechAt + silenceTimeoutMs */
  function scheduleSilenceCheck(): void {
    const token = generation;
    const deadline = lastSpeechAt + silenceTimeoutMs;
    silenceTimer = clock.schedule(() => {
      silenceTimer = null;
      if (token !== generation || !inSpeech) return;
      // A speech frame may have moved the deadline since this timer was armed
      if (clock.now() < lastSpeechAt + silenceTimeoutMs) {
        scheduleSilenceCheck();
        return;
      }
      endSpeech();
    }, deadline - clock.now());
  }

  function endSpeech(): void {
    cancelSilenceTimer();
    inSpeech = false;
    consecutiveSpeech = 0;
    onEvent({ type: "SPEECH_END", timestamp: clock.now() });
  }

  function cancelSilenceTimer(): void {
    silenceTimer?.cancel();
    silenceTimer = null;
  }

  function reset(): void {
    generation++;
    cancelSilenceTimer();
    inSpeech = false;
    consecutiveSpeech = 0;
    lastSpeechAt = 0;
  }

  function destroy(): void {
    reset();
    destroyed = true;
  }

  return { processFrame, isInSpeech: () => inSpeech, reset, destroy };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Root-mean-square energy of a frame.
 *
 * @param samples - Normalized samples
 * @returns RMS in 0..1, 0 for an empty frame
 */
export function computeRms(samples: Float32Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}
