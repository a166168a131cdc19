/**
 * ElevenLabs TTS backend via the streaming HTTP API.
 *
 * POSTs the utterance to the ElevenLabs text-to-speech streaming endpoint and
 * collects the raw 24kHz PCM response for the audio device to play. No
 * subprocess is needed.
 *
 * Responsibilities:
 * - POST text to the ElevenLabs TTS streaming API and receive chunked PCM audio
 * - Map the playback speed onto the voice_settings.speed parameter
 * - Cancel the in-flight request when the utterance is aborted
 */

import { BackendUnavailableError, RequestRejectedError } from "./errors.js";

import type { AudioSynthesisBackend, SpeakRequest } from "./synthesis-backend.js";
import type { SynthesizedAudio } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** ElevenLabs TTS streaming API base URL */
const ELEVENLABS_TTS_BASE_URL = "https://api.elevenlabs.io/v1/text-to-speech";

/** PCM output sample rate in Hz */
const TTS_SAMPLE_RATE = 24000;

/** Statuses that reject the request itself, e.g. an unknown voice ID */
const REJECTED_REQUEST_STATUSES = new Set([400, 404, 422]);

/** Range accepted by voice_settings.speed */
const MIN_API_SPEED = 0.7;
const MAX_API_SPEED = 1.2;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Configuration for the ElevenLabs TTS backend.
 */
export interface ElevenlabsTtsConfig {
  /** ElevenLabs API key for authentication */
  apiKey: string;
  /** Default ElevenLabs voice ID, overridden per utterance by the voice option */
  voiceId: string;
  /** ElevenLabs model ID (e.g. "eleven_turbo_v2_5") */
  modelId: string;
  /** fetch implementation, replaced in tests */
  fetch?: typeof fetch;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the ElevenLabs synthesis backend.
 *
 * @param config - API key, default voice and model
 * @returns An audio backend named "elevenlabs"
 */
export function createElevenlabsTts(config: ElevenlabsTtsConfig): AudioSynthesisBackend {
  const { apiKey, voiceId, modelId } = config;
  const fetchImpl = config.fetch ?? fetch;

  /** Healthy when credentials are configured; network errors surface per attempt */
  async function checkHealth(): Promise<boolean> {
    return apiKey.length > 0 && voiceId.length > 0;
  }

  /**
   * @param request - Text, optional voice ID override and speed
   * @param signal - Aborting cancels the HTTP request
   * @throws RequestRejectedError when the API refuses the request (400, 404, 422)
   * @throws BackendUnavailableError on any other non-2xx response
   */
  async function synthesize(request: SpeakRequest, signal: AbortSignal): Promise<SynthesizedAudio> {
    const voice = request.voice ?? voiceId;
    const url = `${ELEVENLABS_TTS_BASE_URL}/${voice}/stream?output_format=pcm_${TTS_SAMPLE_RATE}`;

    const response = await fetchImpl(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "xi-api-key": apiKey,
      },
      body: JSON.stringify({
        text: request.text,
        model_id: modelId,
        voice_settings: { speed: clampSpeed(request.speed) },
      }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "unknown error");
      const message = `ElevenLabs TTS API error ${response.status}: ${errorText}`;
      if (REJECTED_REQUEST_STATUSES.has(response.status)) throw new RequestRejectedError(message);
      throw new BackendUnavailableError(message);
    }

    const chunks: Buffer[] = [];
    for await (const chunk of readResponseChunks(response)) {
      chunks.push(Buffer.from(chunk));
    }

    return { pcm: Buffer.concat(chunks), sampleRate: TTS_SAMPLE_RATE };
  }

  return { name: "elevenlabs", kind: "audio", checkHealth, synthesize };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** The API takes a narrower speed range than the queue does */
export function clampSpeed(speed: number): number {
  return Math.min(MAX_API_SPEED, Math.max(MIN_API_SPEED, speed));
}

/**
 * Read chunks from a fetch Response body as an async iterable.
 *
 * @param response - The fetch Response to read from
 * @yields Uint8Array chunks of raw PCM audio data
 */
async function* readResponseChunks(response: Response): AsyncGenerator<Uint8Array> {
  const body = response.body;
  if (!body) throw new BackendUnavailableError("ElevenLabs TTS response has no body");

  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
