import OpenAI from 'openai';
import { createLogger } from '../../utils/logger';
import { pcm16ToFloat32, type SynthesisChunk, type SynthesisEngine } from './base';

const log = createLogger('tts][openai');

type SpeechParams = Parameters<OpenAI['audio']['speech']['create']>[0];

// The slice of the SDK this engine touches
export interface SpeechClient {
  audio: {
    speech: {
      create(params: SpeechParams): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
  models: {
    list(): Promise<unknown>;
  };
}

export interface OpenAISynthesisOptions {
  apiKey?: string;
  client?: SpeechClient;
  model?: string;
  voice?: SpeechParams['voice'];
  // Samples per yielded chunk; lets the pipeline check for stop between chunks
  chunkSamples?: number;
}

// `response_format: 'pcm'` is raw 24kHz signed 16-bit little-endian mono
export const OPENAI_PCM_SAMPLE_RATE = 24000;

/**
 * OpenAI TTS adapter:
 * - Requests raw PCM via the audio.speech API.
 * - Yields the decoded audio in fixed-size float32 chunks.
 */
export class OpenAISynthesisEngine implements SynthesisEngine {
  name = 'OpenAI TTS';
  type = 'openai' as const;

  private client: SpeechClient;
  private model: string;
  private voice: SpeechParams['voice'];
  private chunkSamples: number;

  constructor(opts: OpenAISynthesisOptions) {
    this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey });
    this.model = opts.model || 'tts-1';
    this.voice = opts.voice || 'alloy';
    this.chunkSamples = opts.chunkSamples ?? OPENAI_PCM_SAMPLE_RATE;
  }

  async *synthesize(text: string): AsyncIterable<SynthesisChunk> {
    const input = text.trim();
    if (!input) return;

    log.debug('synthesize start model=', this.model, 'voice=', this.voice, 'text.len=', input.length);
    const res = await this.client.audio.speech.create({
      model: this.model,
      voice: this.voice,
      input,
      response_format: 'pcm',
    });

    const samples = pcm16ToFloat32(Buffer.from(await res.arrayBuffer()));
    log.debug('synthesize samples=', samples.length);

    for (let start = 0; start < samples.length; start += this.chunkSamples) {
      yield {
        sampleRate: OPENAI_PCM_SAMPLE_RATE,
        samples: samples.subarray(start, start + this.chunkSamples),
      };
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }
}
