/**
 * Local speech-to-text via sherpa-onnx with a Whisper ONNX model (offline/batch).
 *
 * Whisper models in sherpa-onnx are offline-only, which matches the capture
 * controller: it hands over one complete buffer per recording.
 *
 * Responsibilities:
 * - Validate the model directory before first use
 * - Load the sherpa-onnx offline recognizer lazily on the first transcription
 * - Batch-transcribe a buffer and report the detected language
 */

import { existsSync } from "fs";
import { join } from "path";

import { BackendUnavailableError } from "./errors.js";

import type { OfflineRecognizer } from "sherpa-onnx-node";
import type { TranscriptionEngine } from "./transcription-engine.js";
import type { TranscriptionResult } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Model file prefix (sherpa-onnx naming convention: "small.en", "tiny.en", etc.) */
const DEFAULT_MODEL_PREFIX = "small.en";

/** Required model file suffixes within the model directory */
const REQUIRED_SUFFIXES = ["-encoder.int8.onnx", "-decoder.int8.onnx", "-tokens.txt"];

/** Language reported when the model does not detect one (English-only models) */
const DEFAULT_LANGUAGE = "en";

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the local Whisper transcription engine.
 *
 * @param modelPath - Directory holding the encoder, decoder and tokens files
 * @returns An engine named "local"
 */
export function createLocalStt(modelPath: string): TranscriptionEngine {
  let recognizer: Promise<OfflineRecognizer> | null = null;

  async function transcribe(samples: Float32Array, sampleRate: number): Promise<TranscriptionResult> {
    if (samples.length === 0) {
      return { text: "", languageTag: DEFAULT_LANGUAGE, confidence: 1 };
    }

    recognizer ??= loadRecognizer(modelPath);
    let loaded: OfflineRecognizer;
    try {
      loaded = await recognizer;
    } catch (err) {
      // Allow a retry once the model files are installed
      recognizer = null;
      throw err;
    }

    const stream = loaded.createStream();
    stream.acceptWaveform({ sampleRate, samples });
    loaded.decode(stream);
    const result = loaded.getResult(stream);

    return {
      text: result.text.trim(),
      languageTag: normalizeLanguage(result.lang),
      confidence: 1,
    };
  }

  return { name: "local", transcribe };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Validate the model files and construct the recognizer.
 *
 * @throws BackendUnavailableError if files are missing
 */
async function loadRecognizer(modelPath: string): Promise<OfflineRecognizer> {
  validateModelFiles(modelPath);

  // Dynamic import keeps the native ONNX runtime out of processes that never transcribe locally
  const sherpa = (await import("sherpa-onnx-node")).default;
  console.log(`[stt] loading Whisper model from ${modelPath}`);

  return new sherpa.OfflineRecognizer({
    modelConfig: {
      whisper: {
        encoder: join(modelPath, `${DEFAULT_MODEL_PREFIX}-encoder.int8.onnx`),
        decoder: join(modelPath, `${DEFAULT_MODEL_PREFIX}-decoder.int8.onnx`),
      },
      tokens: join(modelPath, `${DEFAULT_MODEL_PREFIX}-tokens.txt`),
    },
  });
}

/**
 * Validates that all required model files exist in the given directory.
 *
 * @param modelPath - Path to the model directory
 * @throws BackendUnavailableError with details about which files are missing
 */
export function validateModelFiles(modelPath: string): void {
  if (!existsSync(modelPath)) {
    throw new BackendUnavailableError(
      `STT model directory not found: ${modelPath}. ` +
        `Download a Whisper ONNX model and place the encoder, decoder and tokens files in this directory.`
    );
  }

  const expectedFiles = REQUIRED_SUFFIXES.map((suffix) => `${DEFAULT_MODEL_PREFIX}${suffix}`);
  const missingFiles = expectedFiles.filter((file) => !existsSync(join(modelPath, file)));

  if (missingFiles.length > 0) {
    throw new BackendUnavailableError(
      `Missing STT model files in ${modelPath}: ${missingFiles.join(", ")}. ` +
        `Required files: ${expectedFiles.join(", ")}.`
    );
  }
}

/**
 * Whisper reports languages as "<|de|>"; reduce that to "de".
 */
export function normalizeLanguage(lang: string | undefined): string {
  const tag = (lang ?? "").replace(/[<|>]/g, "").trim();
  return tag || DEFAULT_LANGUAGE;
}
