/**
 * Unit tests for configuration resolution and validation.
 *
 * Run: npx tsx --test services/config.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { homedir, tmpdir } from "os";
import { join } from "path";

import { parseBackendList, resolveConfig, validateConfig } from "./config.js";
import { InvalidParameterError } from "../sidecar/errors.js";

// ============================================================================
// TESTS
// ============================================================================

test("an empty environment resolves to the defaults", () => {
  assert.deepEqual(resolveConfig({}), {
    ttsBackends: ["local", "elevenlabs", "system"],
    sttEngine: "local",
    signalDir: join(tmpdir(), "turntalk"),
    colocated: false,
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
    localTtsCommand: null,
    elevenlabsApiKey: "",
    elevenlabsVoiceId: "",
    elevenlabsTtsModel: "eleven_turbo_v2_5",
    elevenlabsSttModel: "scribe_v1",
    localSttModelDir: join(homedir(), ".turntalk-models", "whisper-small"),
    transcriberUrl: "http://localhost:8765",
  });
  assert.deepEqual(validateConfig(resolveConfig({})), []);
});

test("prefixed keys override the defaults", () => {
  const config = resolveConfig({
    VOICE_TTS_BACKENDS: "elevenlabs",
    VOICE_STT_ENGINE: "HTTP",
    VOICE_SIGNAL_DIR: "/var/run/voice",
    VOICE_COLOCATED: "1",
    VOICE_SILENCE_MS: "900",
    VOICE_HOTKEY: "ctrl+F13",
    VOICE_LOCAL_TTS_COMMAND: "tts-server  --model voice.onnx",
    VOICE_TRANSCRIBER_URL: "http://127.0.0.1:9000",
    SILENCE_MS: "5",
  });

  assert.deepEqual(config.ttsBackends, ["elevenlabs", "system"]);
  assert.equal(config.sttEngine, "http");
  assert.equal(config.signalDir, "/var/run/voice");
  assert.equal(config.colocated, true);
  assert.equal(config.silenceMs, 900);
  assert.equal(config.hotkey, "ctrl+F13");
  assert.deepEqual(config.localTtsCommand, ["tts-server", "--model", "voice.onnx"]);
  assert.equal(config.transcriberUrl, "http://127.0.0.1:9000");
});

test("the ElevenLabs key falls back to the unprefixed variable", () => {
  assert.equal(resolveConfig({ ELEVENLABS_API_KEY: "test-secret" }).elevenlabsApiKey, "test-secret");
  assert.equal(
    resolveConfig({ ELEVENLABS_API_KEY: "test-secret", VOICE_ELEVENLABS_API_KEY: "test-voice-secret" }).elevenlabsApiKey,
    "test-voice-secret",
  );
});

test("backend lists are deduplicated with system last", () => {
  assert.deepEqual(parseBackendList("system, local, local"), ["local", "system"]);
  assert.deepEqual(parseBackendList(""), ["system"]);
  assert.throws(() => parseBackendList("local,piper"), InvalidParameterError);
});

test("unknown engine names are rejected", () => {
  assert.throws(() => resolveConfig({ VOICE_STT_ENGINE: "cloud" }), InvalidParameterError);
});

test("validateConfig reports every out-of-range value", () => {
  const config = resolveConfig({
    VOICE_SILENCE_MS: "50",
    VOICE_ECHO_DELAY_MS: "abc",
    VOICE_MIN_SPEECH_FRAMES: "2.5",
    VOICE_DEFAULT_SPEED: "3",
    VOICE_TTS_PORT: "9000",
    VOICE_STT_PORT: "9000",
    VOICE_HOTKEY: "hyper+q",
  });

  assert.deepEqual(validateConfig(config), [
    "VOICE_SILENCE_MS must be between 100 and 10000, got 50",
    "VOICE_ECHO_DELAY_MS must be between 0 and 5000, got NaN",
    "VOICE_MIN_SPEECH_FRAMES must be an integer between 1 and 100, got 2.5",
    "VOICE_DEFAULT_SPEED must be between 0.5 and 2, got 3",
    "VOICE_TTS_PORT and VOICE_STT_PORT must differ, both are 9000",
    "VOICE_HOTKEY: Unsupported hotkey modifier 'hyper' in 'hyper+q'",
  ]);
});

test("the ElevenLabs engine needs an API key", () => {
  const config = resolveConfig({ VOICE_STT_ENGINE: "elevenlabs" });

  assert.deepEqual(validateConfig(config), ["VOICE_STT_ENGINE=elevenlabs needs ELEVENLABS_API_KEY"]);
  assert.deepEqual(validateConfig({ ...config, elevenlabsApiKey: "test-secret" }), []);
});
