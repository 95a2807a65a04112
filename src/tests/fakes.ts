// In-process stand-ins for the synthesis engine and audio device

import type { AudioOutputDevice, OutputStreamHandle, OutputStreamOptions } from '../providers/audio/base';
import type { SynthesisChunk, SynthesisEngine } from '../providers/tts/base';
import { sleep } from '../streaming/control-state';

export type FakeScript = (text: string) => SynthesisChunk[] | Error;

export function zeros(count: number, sampleRate = 24000): SynthesisChunk {
  return { sampleRate, samples: new Float32Array(count) };
}

export class FakeEngine implements SynthesisEngine {
  name = 'fake engine';
  type = 'piper' as const;

  calls: string[] = [];
  // Lines whose iteration ended (normally, by error, or by the consumer breaking out)
  closed: string[] = [];

  constructor(
    private script: FakeScript = () => [zeros(4096)],
    private chunkDelayMs = 0,
  ) {}

  async *synthesize(text: string): AsyncIterable<SynthesisChunk> {
    this.calls.push(text);
    try {
      const result = this.script(text);
      if (result instanceof Error) throw result;
      for (const chunk of result) {
        if (this.chunkDelayMs > 0) await sleep(this.chunkDelayMs);
        yield chunk;
      }
    } finally {
      this.closed.push(text);
    }
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

export class FakeStream implements OutputStreamHandle {
  writes: Float32Array[] = [];
  startCalls = 0;
  stopCalls = 0;
  abortCalls = 0;
  closeCalls = 0;
  private pending = new Set<(err?: Error) => void>();
  private stopGate: Promise<void> = Promise.resolve();

  constructor(
    readonly sampleRate: number,
    private device: FakeDevice,
  ) {}

  get isClosed(): boolean {
    return this.closeCalls > 0;
  }

  async start(): Promise<void> {
    this.startCalls++;
  }

  write(samples: Float32Array): Promise<void> {
    if (this.isClosed) return Promise.reject(new Error('stream closed'));
    if (this.device.failWrites > 0) {
      this.device.failWrites--;
      return Promise.reject(new Error('device write failed'));
    }
    this.writes.push(samples);
    if (!this.device.blockWrites) return Promise.resolve();

    // Held until release() or close(), like a device that stopped draining
    return new Promise<void>((resolve, reject) => {
      const settle = (err?: Error) => {
        this.pending.delete(settle);
        if (err) reject(err);
        else resolve();
      };
      this.pending.add(settle);
    });
  }

  release(): void {
    for (const settle of Array.from(this.pending)) settle();
  }

  // Makes stop() wait, like a player still draining its buffer
  holdStop(gate: Promise<void>): void {
    this.stopGate = gate;
  }

  async stop(): Promise<void> {
    this.stopCalls++;
    await this.stopGate;
  }

  async abort(): Promise<void> {
    this.abortCalls++;
    for (const settle of Array.from(this.pending)) settle(new Error('stream closed'));
  }

  async close(): Promise<void> {
    this.closeCalls++;
    for (const settle of Array.from(this.pending)) settle(new Error('stream closed'));
  }
}

export class FakeDevice implements AudioOutputDevice {
  name = 'fake device';
  type = 'process' as const;

  streams: FakeStream[] = [];
  blockWrites = false;
  failWrites = 0;
  failOpen = false;

  get opens(): number[] {
    return this.streams.map((s) => s.sampleRate);
  }

  get current(): FakeStream | undefined {
    return this.streams[this.streams.length - 1];
  }

  get totalWrites(): number {
    return this.streams.reduce((n, s) => n + s.writes.length, 0);
  }

  async open(options: OutputStreamOptions): Promise<OutputStreamHandle> {
    if (this.failOpen) throw new Error('no such device');
    const stream = new FakeStream(options.sampleRate, this);
    this.streams.push(stream);
    return stream;
  }

  releaseWrites(): void {
    this.blockWrites = false;
    for (const s of this.streams) s.release();
  }
}

/**
 * Poll `predicate` until it holds or `timeoutMs` passes.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000, stepMs = 5): Promise<void> {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) throw new Error(`condition not met within ${timeoutMs}ms`);
    await sleep(stepMs);
  }
}
