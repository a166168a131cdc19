/**
 * HTTP client for a local transcriber microservice.
 *
 * The service takes base64-encoded float32 samples and answers with text,
 * language and confidence. Unlike a silent client, failures are thrown so the
 * capture controller can report them as a failure marker.
 */

import type { TranscriptionEngine } from "./transcription-engine.js";
import type { TranscriptionResult } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface HttpSttConfig {
  /** Service root, e.g. "http://localhost:8765" */
  baseUrl: string;
  /** fetch implementation, replaced in tests */
  fetch?: typeof fetch;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create an engine backed by the transcriber microservice.
 *
 * @param config - Service root URL
 * @returns An engine named "http"
 */
export function createHttpStt(config: HttpSttConfig): TranscriptionEngine {
  const baseUrl = config.baseUrl.replace(/\/+$/, "");
  const doFetch = config.fetch ?? fetch;

  async function transcribe(samples: Float32Array, sampleRate: number): Promise<TranscriptionResult> {
    if (samples.length === 0) return { text: "", languageTag: "", confidence: 0 };

    const response = await doFetch(`${baseUrl}/transcribe`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ audio: encodeSamples(samples), sample_rate: sampleRate }),
    });

    if (!response.ok) {
      throw new Error(`Transcriber service error ${response.status}`);
    }

    const body: unknown = await response.json();
    if (typeof body !== "object" || body === null || !("text" in body) || typeof body.text !== "string") {
      throw new Error("Transcriber service response has no text");
    }
    return {
      text: body.text.trim(),
      languageTag: "language" in body && typeof body.language === "string" ? body.language : "",
      confidence: "confidence" in body && typeof body.confidence === "number" ? body.confidence : 1,
    };
  }

  return { name: "http", transcribe };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** Base64 of the raw float32 bytes, in platform (little-endian) order */
export function encodeSamples(samples: Float32Array): string {
  return Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength).toString("base64");
}
