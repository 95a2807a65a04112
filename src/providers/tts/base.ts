// Synthesis engine interface
// Standardizes streamed speech synthesis as float32 sample chunks

export interface SynthesisChunk {
  sampleRate: number;
  samples: Float32Array;
}

export interface SynthesisEngine {
  name: string;
  type: 'piper' | 'openai';

  // Lazily synthesize one line; yields nothing for blank input
  synthesize(text: string): AsyncIterable<SynthesisChunk>;

  healthCheck(): Promise<boolean>;
}

/**
 * Convert little-endian signed 16-bit PCM to float32 in [-1, 1).
 */
export function pcm16ToFloat32(pcm: Buffer): Float32Array {
  const count = Math.floor(pcm.length / 2);
  const out = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = pcm.readInt16LE(i * 2) / 32768;
  }
  return out;
}
