/**
 * ElevenLabs STT engine via the batch transcription API (Scribe).
 *
 * The capture buffer is encoded as a 16-bit mono WAV file and uploaded as
 * multipart/form-data in one request.
 *
 * Responsibilities:
 * - Encode the buffer as WAV for upload
 * - POST the WAV to the ElevenLabs batch STT API
 * - Parse text, language and its probability from the JSON response
 */

import { BackendUnavailableError } from "./errors.js";
import { encodeWav } from "./pcm.js";

import type { TranscriptionEngine } from "./transcription-engine.js";
import type { TranscriptionResult } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** ElevenLabs STT API endpoint */
const ELEVENLABS_STT_URL = "https://api.elevenlabs.io/v1/speech-to-text";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Configuration for the ElevenLabs STT engine.
 */
export interface ElevenlabsSttConfig {
  /** ElevenLabs API key for authentication */
  apiKey: string;
  /** ElevenLabs STT model ID (e.g. "scribe_v1") */
  modelId: string;
  /** fetch implementation, replaced in tests */
  fetch?: typeof fetch;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the ElevenLabs transcription engine.
 *
 * @param config - API key and model ID
 * @returns An engine named "elevenlabs"
 */
export function createElevenlabsStt(config: ElevenlabsSttConfig): TranscriptionEngine {
  const { apiKey, modelId } = config;
  const doFetch = config.fetch ?? fetch;

  /**
   * @throws BackendUnavailableError without an API key, Error on a non-2xx response
   */
  async function transcribe(samples: Float32Array, sampleRate: number): Promise<TranscriptionResult> {
    if (!apiKey) throw new BackendUnavailableError("ELEVENLABS_API_KEY is not set");
    if (samples.length === 0) return { text: "", languageTag: "", confidence: 0 };

    const wavBlob = new Blob([new Uint8Array(encodeWav(samples, sampleRate))], { type: "audio/wav" });
    const formData = new FormData();
    formData.append("file", wavBlob, "audio.wav");
    formData.append("model_id", modelId);

    const response = await doFetch(ELEVENLABS_STT_URL, {
      method: "POST",
      headers: { "xi-api-key": apiKey },
      body: formData,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "unknown error");
      throw new Error(`ElevenLabs STT API error ${response.status}: ${errorText}`);
    }

    return parseScribeResponse(await response.json());
  }

  return { name: "elevenlabs", transcribe };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Pull text, language_code and language_probability out of a Scribe response.
 *
 * @throws Error if the response has no text field
 */
export function parseScribeResponse(body: unknown): TranscriptionResult {
  if (typeof body !== "object" || body === null || !("text" in body) || typeof body.text !== "string") {
    throw new Error("ElevenLabs STT response has no text");
  }
  const language = "language_code" in body && typeof body.language_code === "string" ? body.language_code : "";
  const probability =
    "language_probability" in body && typeof body.language_probability === "number" ? body.language_probability : 1;

  return { text: body.text.trim(), languageTag: language, confidence: probability };
}
