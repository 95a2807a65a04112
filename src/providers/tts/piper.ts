import { spawn } from 'child_process';
import { createLogger } from '../../utils/logger';
import { pcm16ToFloat32, type SynthesisChunk, type SynthesisEngine } from './base';
import { readVoiceSampleRate } from './voice-catalog';

const log = createLogger('tts][piper');

export interface PiperSynthesisOptions {
  piperPath: string;
  modelPath: string;
  configPath?: string;
  // < 1 speaks faster, > 1 slower
  lengthScale?: number;
}

interface ExitResult {
  code: number | null;
  error?: Error;
}

/**
 * Piper CLI adapter. Each line runs `piper --output_raw`, with the text on
 * stdin and signed 16-bit mono PCM streamed back on stdout.
 */
export class PiperSynthesisEngine implements SynthesisEngine {
  name = 'Piper';
  type = 'piper' as const;

  private opts: PiperSynthesisOptions;
  private sampleRate: number | null = null;

  constructor(opts: PiperSynthesisOptions) {
    this.opts = opts;
  }

  private async getSampleRate(): Promise<number> {
    if (this.sampleRate === null) {
      this.sampleRate = await readVoiceSampleRate(this.opts.configPath ?? `${this.opts.modelPath}.json`);
    }
    return this.sampleRate;
  }

  async *synthesize(text: string): AsyncIterable<SynthesisChunk> {
    const input = text.trim();
    if (!input) return;

    const sampleRate = await this.getSampleRate();
    const args = ['--model', this.opts.modelPath, '--output_raw'];
    if (this.opts.lengthScale !== undefined && this.opts.lengthScale !== 1) {
      args.push('--length_scale', String(this.opts.lengthScale));
    }

    const proc = spawn(this.opts.piperPath, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    const stderr: string[] = [];
    proc.stderr.on('data', (data: Buffer) => {
      stderr.push(data.toString());
    });
    const exited = new Promise<ExitResult>((resolve) => {
      proc.once('error', (error) => resolve({ code: null, error }));
      proc.once('close', (code) => resolve({ code }));
    });

    proc.stdin.on('error', (e: Error) => log.debug('stdin error:', e.message));
    proc.stdin.end(`${input}\n`);

    // A 16-bit sample can straddle two stdout chunks
    let carry: Buffer = Buffer.alloc(0);
    try {
      for await (const data of proc.stdout) {
        if (!Buffer.isBuffer(data)) continue;
        const bytes = carry.length > 0 ? Buffer.concat([carry, data]) : data;
        const usable = bytes.length - (bytes.length % 2);
        carry = bytes.subarray(usable);
        if (usable > 0) {
          yield { sampleRate, samples: pcm16ToFloat32(bytes.subarray(0, usable)) };
        }
      }

      const result = await exited;
      if (result.error) throw result.error;
      if (result.code !== 0) {
        throw new Error(`piper exited with code ${result.code}: ${stderr.join('').trim()}`);
      }
    } finally {
      // Consumer stopped iterating early, or piper failed mid-stream
      if (proc.exitCode === null && !proc.killed) {
        log.debug('Killing piper process', proc.pid);
        proc.kill();
      }
    }
  }

  async healthCheck(): Promise<boolean> {
    const proc = spawn(this.opts.piperPath, ['--help'], { stdio: 'ignore' });
    const result = await new Promise<ExitResult>((resolve) => {
      proc.once('error', (error) => resolve({ code: null, error }));
      proc.once('close', (code) => resolve({ code }));
    });
    return !result.error && result.code === 0;
  }
}
