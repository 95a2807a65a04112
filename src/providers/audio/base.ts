// Audio output device interface
// A device opens one mono float32 stream per sample rate

export interface OutputStreamOptions {
  sampleRate: number;
  channels: 1;
  format: 'f32le';
}

export interface OutputStreamHandle {
  readonly sampleRate: number;

  start(): Promise<void>;

  // Resolves once the device has accepted the samples
  write(samples: Float32Array): Promise<void>;

  // Stop accepting writes and let buffered audio finish playing
  stop(): Promise<void>;

  // Stop at once, discarding whatever the device still has buffered
  abort(): Promise<void>;

  // All three are safe to call more than once
  close(): Promise<void>;
}

export interface AudioOutputDevice {
  name: string;
  type: 'process' | 'wav';

  open(options: OutputStreamOptions): Promise<OutputStreamHandle>;
}

export function float32ToBuffer(samples: Float32Array): Buffer {
  const buf = Buffer.alloc(samples.length * 4);
  for (let i = 0; i < samples.length; i++) {
    buf.writeFloatLE(samples[i], i * 4);
  }
  return buf;
}
