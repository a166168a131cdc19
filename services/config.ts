/**
 * Voice configuration, resolved once at startup.
 *
 * Values come from process.env layered over the project .env file. Every key
 * is prefixed with VOICE_; the ElevenLabs key also falls back to the plain
 * ELEVENLABS_API_KEY most setups already have.
 *
 * Responsibilities:
 * - Resolve raw key-value pairs into a typed VoiceConfig with defaults
 * - Validate numeric ranges, ports and the hotkey before anything starts
 */

import { homedir, tmpdir } from "os";
import { join } from "path";

import { readEnv } from "./env.js";
import { MAX_ECHO_DELAY_MS, MAX_SILENCE_MS, MIN_ECHO_DELAY_MS, MIN_SILENCE_MS } from "../sidecar/capture-controller.js";
import { InvalidParameterError, errorMessage } from "../sidecar/errors.js";
import { parseHotkey } from "../sidecar/hotkey.js";
import { MAX_SPEED, MIN_SPEED } from "../sidecar/speech-queue.js";
import { withSystemLast } from "../sidecar/tts-provider.js";

import type { EnvRecord } from "./env.js";
import type { SttEngineType, TtsBackendType, VoiceConfig } from "../sidecar/types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const TTS_BACKEND_TYPES: TtsBackendType[] = ["local", "elevenlabs", "system"];
const STT_ENGINE_TYPES: SttEngineType[] = ["local", "elevenlabs", "http"];

const DEFAULTS = {
  ttsBackends: "local,elevenlabs,system",
  sttEngine: "local",
  pollIntervalMs: 50,
  healthTtlMs: 30_000,
  speakingTtlMs: 250,
  silenceMs: 1500,
  echoDelayMs: 400,
  minSpeechFrames: 3,
  energyThreshold: 0.01,
  frameMs: 30,
  sampleRate: 16000,
  defaultSpeed: 1.1,
  hotkey: "cmd_r",
  ttsPort: 8123,
  sttPort: 8124,
  elevenlabsTtsModel: "eleven_turbo_v2_5",
  elevenlabsSttModel: "scribe_v1",
  transcriberUrl: "http://localhost:8765",
} as const;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Load the configuration from process.env over the .env file.
 *
 * @param envPath - Path to the .env file. Defaults to process.cwd()/.env
 * @throws InvalidParameterError for unknown backend or engine names
 */
export async function loadConfig(envPath?: string): Promise<VoiceConfig> {
  const fileEnv = await readEnv(envPath);
  const processEnv: EnvRecord = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) processEnv[key] = value;
  }
  return resolveConfig({ ...fileEnv, ...processEnv });
}

/**
 * Build a VoiceConfig from raw key-value pairs, applying defaults.
 * Numbers are parsed but not range-checked; see validateConfig.
 *
 * @throws InvalidParameterError for unknown backend or engine names
 */
export function resolveConfig(env: EnvRecord): VoiceConfig {
  const get = (key: string): string | undefined => {
    const value = env[`VOICE_${key}`]?.trim();
    return value ? value : undefined;
  };
  const num = (key: string, fallback: number): number => {
    const raw = get(key);
    return raw === undefined ? fallback : Number(raw);
  };

  const localTtsCommand = get("LOCAL_TTS_COMMAND")?.split(/\s+/) ?? null;

  return {
    ttsBackends: parseBackendList(get("TTS_BACKENDS") ?? DEFAULTS.ttsBackends),
    sttEngine: parseEngine(get("STT_ENGINE") ?? DEFAULTS.sttEngine),
    signalDir: get("SIGNAL_DIR") ?? join(tmpdir(), "turntalk"),
    colocated: parseFlag(get("COLOCATED")),
    pollIntervalMs: num("POLL_INTERVAL_MS", DEFAULTS.pollIntervalMs),
    healthTtlMs: num("HEALTH_TTL_MS", DEFAULTS.healthTtlMs),
    speakingTtlMs: num("SPEAKING_TTL_MS", DEFAULTS.speakingTtlMs),
    silenceMs: num("SILENCE_MS", DEFAULTS.silenceMs),
    echoDelayMs: num("ECHO_DELAY_MS", DEFAULTS.echoDelayMs),
    minSpeechFrames: num("MIN_SPEECH_FRAMES", DEFAULTS.minSpeechFrames),
    energyThreshold: num("ENERGY_THRESHOLD", DEFAULTS.energyThreshold),
    frameMs: num("FRAME_MS", DEFAULTS.frameMs),
    sampleRate: num("SAMPLE_RATE", DEFAULTS.sampleRate),
    defaultSpeed: num("DEFAULT_SPEED", DEFAULTS.defaultSpeed),
    hotkey: get("HOTKEY") ?? DEFAULTS.hotkey,
    ttsPort: num("TTS_PORT", DEFAULTS.ttsPort),
    sttPort: num("STT_PORT", DEFAULTS.sttPort),
    localTtsCommand,
    elevenlabsApiKey: get("ELEVENLABS_API_KEY") ?? env.ELEVENLABS_API_KEY?.trim() ?? "",
    elevenlabsVoiceId: get("ELEVENLABS_VOICE_ID") ?? "",
    elevenlabsTtsModel: get("ELEVENLABS_TTS_MODEL") ?? DEFAULTS.elevenlabsTtsModel,
    elevenlabsSttModel: get("ELEVENLABS_STT_MODEL") ?? DEFAULTS.elevenlabsSttModel,
    localSttModelDir: get("LOCAL_STT_MODEL_DIR") ?? join(homedir(), ".turntalk-models", "whisper-small"),
    transcriberUrl: get("TRANSCRIBER_URL") ?? DEFAULTS.transcriberUrl,
  };
}

/**
 * Check ranges and cross-field constraints.
 *
 * @returns One message per problem; empty when the config is usable
 */
export function validateConfig(config: VoiceConfig): string[] {
  const errors: string[] = [];
  const range = (name: string, value: number, min: number, max: number, integer = false) => {
    if (!Number.isFinite(value) || value < min || value > max || (integer && !Number.isInteger(value))) {
      errors.push(`VOICE_${name} must be ${integer ? "an integer " : ""}between ${min} and ${max}, got ${value}`);
    }
  };

  range("POLL_INTERVAL_MS", config.pollIntervalMs, 10, 1000);
  range("HEALTH_TTL_MS", config.healthTtlMs, 0, 3_600_000);
  range("SPEAKING_TTL_MS", config.speakingTtlMs, 0, 5000);
  range("SILENCE_MS", config.silenceMs, MIN_SILENCE_MS, MAX_SILENCE_MS);
  range("ECHO_DELAY_MS", config.echoDelayMs, MIN_ECHO_DELAY_MS, MAX_ECHO_DELAY_MS);
  range("MIN_SPEECH_FRAMES", config.minSpeechFrames, 1, 100, true);
  range("ENERGY_THRESHOLD", config.energyThreshold, 0, 1);
  range("FRAME_MS", config.frameMs, 10, 100, true);
  range("SAMPLE_RATE", config.sampleRate, 8000, 48000, true);
  range("DEFAULT_SPEED", config.defaultSpeed, MIN_SPEED, MAX_SPEED);
  range("TTS_PORT", config.ttsPort, 1, 65535, true);
  range("STT_PORT", config.sttPort, 1, 65535, true);

  if (config.ttsPort === config.sttPort) {
    errors.push(`VOICE_TTS_PORT and VOICE_STT_PORT must differ, both are ${config.ttsPort}`);
  }

  try {
    parseHotkey(config.hotkey);
  } catch (err) {
    errors.push(`VOICE_HOTKEY: ${errorMessage(err)}`);
  }

  if (config.sttEngine === "elevenlabs" && !config.elevenlabsApiKey) {
    errors.push("VOICE_STT_ENGINE=elevenlabs needs ELEVENLABS_API_KEY");
  }
  if (config.sttEngine === "http" && !/^https?:\/\//.test(config.transcriberUrl)) {
    errors.push(`VOICE_TRANSCRIBER_URL must be an http(s) URL, got ${config.transcriberUrl}`);
  }

  return errors;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Parse "local, elevenlabs" into backend types, "system" always last.
 *
 * @throws InvalidParameterError for an unknown name
 */
export function parseBackendList(raw: string): TtsBackendType[] {
  const names = raw
    .split(",")
    .map((name) => name.trim().toLowerCase())
    .filter(Boolean);

  const backends = names.map((name) => {
    const type = TTS_BACKEND_TYPES.find((candidate) => candidate === name);
    if (!type) {
      throw new InvalidParameterError(
        `Unknown TTS backend '${name}' in VOICE_TTS_BACKENDS (expected ${TTS_BACKEND_TYPES.join(", ")})`
      );
    }
    return type;
  });
  return withSystemLast(backends);
}

function parseEngine(raw: string): SttEngineType {
  const name = raw.toLowerCase();
  const type = STT_ENGINE_TYPES.find((candidate) => candidate === name);
  if (!type) {
    throw new InvalidParameterError(
      `Unknown STT engine '${raw}' in VOICE_STT_ENGINE (expected ${STT_ENGINE_TYPES.join(", ")})`
    );
  }
  return type;
}

function parseFlag(raw: string | undefined): boolean {
  return raw !== undefined && ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}
