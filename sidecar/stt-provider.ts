/**
 * Transcription engine factory.
 *
 * Exactly one engine is chosen at startup; it does not change during a
 * session.
 */

import { createLocalStt } from "./stt.js";
import { createElevenlabsStt } from "./stt-elevenlabs.js";
import { createHttpStt } from "./stt-http.js";

import type { TranscriptionEngine } from "./transcription-engine.js";
import type { VoiceConfig } from "./types.js";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the configured transcription engine.
 *
 * @param config - Resolved configuration
 */
export function createTranscriptionEngine(config: VoiceConfig): TranscriptionEngine {
  switch (config.sttEngine) {
    case "local":
      return createLocalStt(config.localSttModelDir);
    case "elevenlabs":
      return createElevenlabsStt({ apiKey: config.elevenlabsApiKey, modelId: config.elevenlabsSttModel });
    case "http":
      return createHttpStt({ baseUrl: config.transcriberUrl });
  }
}
