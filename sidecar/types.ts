/**
 * Shared types for the turn-taking voice sidecar.
 *
 * Defines the DTOs passed between the speech queue, the capture controller
 * and the coordination channel:
 * - Audio frames and synthesized audio buffers
 * - Utterances, playback sessions and their outcomes
 * - Capture sessions, capture states and transcription results
 * - Activity detector events and configuration
 * - The resolved voice configuration
 */

// ============================================================================
// AUDIO
// ============================================================================

/**
 * A fixed-duration slice of microphone audio.
 * Samples are normalized to -1.0..1.0, mono.
 */
export interface AudioFrame {
  pcm: Float32Array;
  sampleRate: number;
  /** Capture time in epoch milliseconds */
  timestamp: number;
}

/**
 * Audio produced by a synthesis backend, ready for the audio device.
 * `pcm` holds 16-bit signed little-endian mono samples.
 */
export interface SynthesizedAudio {
  pcm: Buffer;
  sampleRate: number;
}

// ============================================================================
// SPEECH OUTPUT
// ============================================================================

/** A unit of text to speak. Immutable once enqueued. */
export interface Utterance {
  readonly id: number;
  readonly text: string;
  readonly voiceOverride?: string;
  /** Playback speed multiplier, 0.5..2.0 */
  readonly speedFactor: number;
  /** True when the caller awaits completion (enqueueAndWait) */
  readonly blocking: boolean;
}

/**
 * The single in-flight playback. At most one exists per process and it
 * exists exactly while the speaking marker is set.
 */
export interface PlaybackSession {
  utterance: Utterance;
  /** Name of the backend currently attempting the utterance, "" before the first attempt */
  backendInUse: string;
  startedAt: number;
  /** Aborting this controller terminates synthesis and playback */
  abort: AbortController;
}

export type PlaybackOutcomeType = "played" | "cancelled" | "skipped" | "undeliverable";

/** How an utterance left the queue. Every enqueued utterance gets exactly one. */
export interface PlaybackOutcome {
  utteranceId: number;
  type: PlaybackOutcomeType;
  /** Backend that played (or was playing) the utterance, null if none was reached */
  backend: string | null;
  /** Joined backend errors for undeliverable utterances */
  error?: string;
  finishedAt: number;
}

// ============================================================================
// SPEECH INPUT
// ============================================================================

export type CaptureMode = "manual" | "vadAutoStop";

/** Lifecycle of the listener. See capture-state.ts for legal transitions. */
export type CaptureState = "idle" | "armed" | "recording" | "transcribing";

/** Frames accumulated while Recording. Handed to the engine exactly once. */
export interface CaptureSession {
  frames: AudioFrame[];
  startedAt: number;
  mode: CaptureMode;
}

export interface TranscriptionResult {
  text: string;
  /** BCP-47-ish language code reported by the engine, e.g. "en" */
  languageTag: string;
  /** 0..1, engines that report no score use 1 */
  confidence: number;
}

// ============================================================================
// ACTIVITY DETECTION
// ============================================================================

export type VadEventType = "SPEECH_START" | "SPEECH_END";

export interface VadEvent {
  type: VadEventType;
  timestamp: number;
}

export interface ActivityDetectorConfig {
  /** RMS energy above which a frame counts as speech */
  energyThreshold: number;
  /** Consecutive speech frames required before SPEECH_START */
  minSpeechFrames: number;
  /** Silence after the last speech frame before SPEECH_END */
  silenceTimeoutMs: number;
}

// ============================================================================
// COORDINATION
// ============================================================================

/** Cross-process view of speaker/listener state. */
export interface CoordinationState {
  speaking: boolean;
  stopRequested: boolean;
  lastSpeechFinishedAt: number | null;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export type TtsBackendType = "local" | "elevenlabs" | "system";

export type SttEngineType = "local" | "elevenlabs" | "http";

/** Fully resolved configuration, built by services/config.ts. */
export interface VoiceConfig {
  /** Synthesis backends in preference order. "system" is always last. */
  ttsBackends: TtsBackendType[];
  sttEngine: SttEngineType;
  /** Directory holding the cross-process signal markers */
  signalDir: string;
  /** Run both endpoints in one process sharing an in-memory channel */
  colocated: boolean;
  pollIntervalMs: number;
  healthTtlMs: number;
  speakingTtlMs: number;
  silenceMs: number;
  echoDelayMs: number;
  minSpeechFrames: number;
  energyThreshold: number;
  frameMs: number;
  sampleRate: number;
  defaultSpeed: number;
  /** Hotkey accelerator, e.g. "RightCmd" or "Ctrl+Shift+Space" */
  hotkey: string;
  ttsPort: number;
  sttPort: number;
  localTtsCommand: string[] | null;
  elevenlabsApiKey: string;
  elevenlabsVoiceId: string;
  elevenlabsTtsModel: string;
  elevenlabsSttModel: string;
  localSttModelDir: string;
  transcriberUrl: string;
}
