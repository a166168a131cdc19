/**
 * Minimal typings for the parts of sherpa-onnx-node used by the local
 * transcription engine. The package ships no declarations.
 */

declare module "sherpa-onnx-node" {
  export interface OfflineRecognizerConfig {
    featConfig?: { sampleRate: number; featureDim: number };
    modelConfig: {
      whisper?: { encoder: string; decoder: string; language?: string; task?: string };
      tokens: string;
      numThreads?: number;
      provider?: string;
      debug?: number;
    };
  }

  export interface OfflineStream {
    acceptWaveform(input: { sampleRate: number; samples: Float32Array }): void;
  }

  export interface OfflineRecognizerResult {
    text: string;
    lang?: string;
  }

  export class OfflineRecognizer {
    constructor(config: OfflineRecognizerConfig);
    createStream(): OfflineStream;
    decode(stream: OfflineStream): void;
    getResult(stream: OfflineStream): OfflineRecognizerResult;
  }

  const sherpa: {
    OfflineRecognizer: typeof OfflineRecognizer;
  };
  export default sherpa;
}
