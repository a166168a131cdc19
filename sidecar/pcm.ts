/**
 * PCM sample helpers shared by the audio device, backends and engines.
 *
 * Responsibilities:
 * - Convert between 16-bit signed PCM bytes and normalized Float32 samples
 * - Cut a byte stream into fixed-size frames
 * - Concatenate frame buffers and encode them as WAV for upload
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/** Size of the WAV file header in bytes */
const WAV_HEADER_SIZE = 44;

/** Bytes per 16-bit sample */
const BYTES_PER_SAMPLE = 2;

// ============================================================================
// CONVERSIONS
// ============================================================================

/**
 * Convert a Buffer of 16-bit signed little-endian PCM to Float32Array
 * normalized to -1.0..1.0. A trailing odd byte is ignored.
 *
 * @param buf - Raw PCM bytes
 */
export function bufferToFloat32(buf: Buffer): Float32Array {
  const sampleCount = Math.floor(buf.length / BYTES_PER_SAMPLE);
  const samples = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = buf.readInt16LE(i * BYTES_PER_SAMPLE) / 32768;
  }
  return samples;
}

/**
 * Convert normalized Float32 samples to 16-bit signed little-endian PCM.
 * Values outside -1.0..1.0 are clamped.
 */
export function float32ToPcm16(samples: Float32Array): Buffer {
  const buf = Buffer.alloc(samples.length * BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    const int16 = clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff;
    buf.writeInt16LE(Math.round(int16), i * BYTES_PER_SAMPLE);
  }
  return buf;
}

/**
 * Concatenate an array of Float32Array chunks into a single Float32Array.
 *
 * @param chunks - Array of Float32Array audio chunks
 * @returns Single concatenated Float32Array
 */
export function concatenateChunks(chunks: Float32Array[]): Float32Array {
  if (chunks.length === 0) return new Float32Array(0);
  if (chunks.length === 1) return chunks[0];

  const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Float32Array(totalLength);

  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }

  return result;
}

// ============================================================================
// FRAMING
// ============================================================================

/**
 * Create a push-style splitter that turns arbitrarily sized PCM byte chunks
 * into frames of exactly `frameSamples` samples. Leftover bytes carry over to
 * the next push.
 *
 * @param frameSamples - Samples per emitted frame (e.g. 480 = 30ms at 16kHz)
 * @param onFrame - Called once per complete frame
 * @returns A function to push raw PCM bytes into
 */
export function createFrameSplitter(
  frameSamples: number,
  onFrame: (samples: Float32Array) => void,
): (chunk: Buffer) => void {
  const frameBytes = frameSamples * BYTES_PER_SAMPLE;
  let pending: Buffer = Buffer.alloc(0);

  return (chunk: Buffer) => {
    pending = pending.length === 0 ? chunk : Buffer.concat([pending, chunk]);
    let offset = 0;
    while (pending.length - offset >= frameBytes) {
      onFrame(bufferToFloat32(pending.subarray(offset, offset + frameBytes)));
      offset += frameBytes;
    }
    pending = pending.subarray(offset);
  };
}

/**
 * Stamp consecutive frames by their position in the sample stream, so frames
 * cut from one chunk get distinct, evenly spaced times.
 *
 * @param sampleRate - Samples per second
 * @param startedAt - Epoch ms of the first sample
 * @returns Called once per frame with its sample count; returns the frame's start time
 */
export function createFrameTimestamper(sampleRate: number, startedAt: number): (frameSamples: number) => number {
  let delivered = 0;
  return (frameSamples: number) => {
    const timestamp = startedAt + (delivered * 1000) / sampleRate;
    delivered += frameSamples;
    return timestamp;
  };
}

// ============================================================================
// WAV
// ============================================================================

/**
 * Encode Float32Array audio samples as a mono 16-bit WAV file buffer.
 *
 * @param samples - Audio samples (normalized -1.0 to 1.0)
 * @param sampleRate - Sample rate written into the header
 * @returns Buffer containing a valid WAV file
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const data = float32ToPcm16(samples);
  const header = Buffer.alloc(WAV_HEADER_SIZE);
  let offset = 0;

  // RIFF header
  header.write("RIFF", offset); offset += 4;
  header.writeUInt32LE(WAV_HEADER_SIZE + data.length - 8, offset); offset += 4;
  header.write("WAVE", offset); offset += 4;

  // fmt sub-chunk
  header.write("fmt ", offset); offset += 4;
  header.writeUInt32LE(16, offset); offset += 4;             // Sub-chunk size (16 for PCM)
  header.writeUInt16LE(1, offset); offset += 2;              // Audio format (1 = PCM)
  header.writeUInt16LE(1, offset); offset += 2;              // Mono
  header.writeUInt32LE(sampleRate, offset); offset += 4;
  header.writeUInt32LE(sampleRate * BYTES_PER_SAMPLE, offset); offset += 4; // Byte rate
  header.writeUInt16LE(BYTES_PER_SAMPLE, offset); offset += 2; // Block align
  header.writeUInt16LE(16, offset); offset += 2;             // Bits per sample

  // data sub-chunk
  header.write("data", offset); offset += 4;
  header.writeUInt32LE(data.length, offset);

  return Buffer.concat([header, data]);
}
