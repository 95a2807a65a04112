import * as fsp from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../../utils/logger';
import { float32ToBuffer, type AudioOutputDevice, type OutputStreamHandle, type OutputStreamOptions } from './base';

const log = createLogger('audio][wav');

const HEADER_BYTES = 44;
const WAVE_FORMAT_IEEE_FLOAT = 3;

/**
 * RIFF/WAVE header for mono 32-bit float samples.
 */
export function wavHeader(sampleRate: number, dataBytes: number): Buffer {
  const header = Buffer.alloc(HEADER_BYTES);
  const blockAlign = 4;
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_IEEE_FLOAT, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(32, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataBytes, 40);
  return header;
}

class WavFileStream implements OutputStreamHandle {
  private file: fsp.FileHandle | null = null;
  private dataBytes = 0;
  private stopped = false;
  private closed = false;

  constructor(
    readonly sampleRate: number,
    readonly filePath: string,
  ) {}

  async start(): Promise<void> {
    if (this.file) return;
    await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
    this.file = await fsp.open(this.filePath, 'w');
    await this.file.write(wavHeader(this.sampleRate, 0), 0, HEADER_BYTES, 0);
  }

  async write(samples: Float32Array): Promise<void> {
    if (!this.file || this.stopped) throw new Error('stream is not running');
    const buf = float32ToBuffer(samples);
    await this.file.write(buf, 0, buf.length, HEADER_BYTES + this.dataBytes);
    this.dataBytes += buf.length;
  }

  // Samples are on disk once written, so there is nothing to drain
  async stop(): Promise<void> {
    this.stopped = true;
  }

  async abort(): Promise<void> {
    this.stopped = true;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.stopped = true;
    const file = this.file;
    this.file = null;
    if (!file) return;
    try {
      await file.write(wavHeader(this.sampleRate, this.dataBytes), 0, HEADER_BYTES, 0);
    } finally {
      await file.close();
    }
    log.info('Wrote', this.filePath, `(${this.dataBytes / 4} samples)`);
  }
}

/**
 * Writes each opened stream to its own numbered WAV file. Useful on
 * machines without a sound card and for checking what was played.
 */
export class WavFileDevice implements AudioOutputDevice {
  name = 'wav file';
  type = 'wav' as const;

  private streamsOpened = 0;

  constructor(
    private outputDir: string,
    private prefix = 'speech',
  ) {}

  async open(options: OutputStreamOptions): Promise<OutputStreamHandle> {
    this.streamsOpened++;
    const index = String(this.streamsOpened).padStart(3, '0');
    const filePath = path.join(this.outputDir, `${this.prefix}-${index}-${options.sampleRate}.wav`);
    return new WavFileStream(options.sampleRate, filePath);
  }
}
