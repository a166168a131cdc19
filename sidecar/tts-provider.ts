/**
 * Synthesis backend factory.
 *
 * Turns the configured backend list into concrete backends in preference
 * order. The OS-native synthesizer always closes the chain so an utterance
 * has a last resort even when every configured backend is down.
 *
 * Responsibilities:
 * - Create each configured synthesis backend from VoiceConfig
 * - Append the "system" backend when the list omits it
 * - List voices from the first backend that can enumerate them
 */

import { createLocalTts } from "./tts.js";
import { createElevenlabsTts } from "./tts-elevenlabs.js";
import { createSystemTts } from "./tts-system.js";

import type { SynthesisBackend } from "./synthesis-backend.js";
import type { TtsBackendType, VoiceConfig } from "./types.js";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the backend chain for the configured types.
 *
 * @param config - Resolved configuration
 * @returns Backends in preference order, "system" last
 */
export function createSynthesisBackends(config: VoiceConfig): SynthesisBackend[] {
  const order = withSystemLast(config.ttsBackends);
  return order.map((type) => createBackend(type, config));
}

/**
 * List voices from the first backend that supports it.
 *
 * @returns Voice lines, or an empty list when no backend can enumerate voices
 */
export async function listVoices(backends: SynthesisBackend[]): Promise<string[]> {
  for (const backend of backends) {
    if (backend.kind === "direct" && backend.listVoices) {
      return backend.listVoices();
    }
  }
  return [];
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function createBackend(type: TtsBackendType, config: VoiceConfig): SynthesisBackend {
  switch (type) {
    case "local":
      return createLocalTts({ serverCommand: config.localTtsCommand ?? [] });
    case "elevenlabs":
      return createElevenlabsTts({
        apiKey: config.elevenlabsApiKey,
        voiceId: config.elevenlabsVoiceId,
        modelId: config.elevenlabsTtsModel,
      });
    case "system":
      return createSystemTts();
  }
}

/**
 * Drop duplicates and make sure "system" closes the list.
 */
export function withSystemLast(types: TtsBackendType[]): TtsBackendType[] {
  const unique = [...new Set(types)].filter((type) => type !== "system");
  return [...unique, "system"];
}
