import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { WavFileDevice, wavHeader } from '../audio/wav-device';

describe('wavHeader', () => {
  it('should describe mono 32-bit float audio', () => {
    const header = wavHeader(22050, 400);

    expect(header.length).toBe(44);
    expect(header.toString('ascii', 0, 4)).toBe('RIFF');
    expect(header.readUInt32LE(4)).toBe(436);
    expect(header.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(header.readUInt16LE(20)).toBe(3);
    expect(header.readUInt16LE(22)).toBe(1);
    expect(header.readUInt32LE(24)).toBe(22050);
    expect(header.readUInt32LE(28)).toBe(88200);
    expect(header.readUInt16LE(32)).toBe(4);
    expect(header.readUInt16LE(34)).toBe(32);
    expect(header.toString('ascii', 36, 40)).toBe('data');
    expect(header.readUInt32LE(40)).toBe(400);
  });
});

describe('WavFileDevice', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'wav-device-'));
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it('should write samples after the header and patch sizes on close', async () => {
    const device = new WavFileDevice(path.join(dir, 'out'));
    const stream = await device.open({ sampleRate: 24000, channels: 1, format: 'f32le' });
    await stream.start();
    await stream.write(Float32Array.from([0.5, -0.25]));
    await stream.write(Float32Array.from([1]));
    await stream.stop();
    await stream.close();
    await stream.close();

    const data = await fsp.readFile(path.join(dir, 'out', 'speech-001-24000.wav'));
    expect(data.length).toBe(44 + 12);
    expect(data.readUInt32LE(4)).toBe(48);
    expect(data.readUInt32LE(40)).toBe(12);
    expect([data.readFloatLE(44), data.readFloatLE(48), data.readFloatLE(52)]).toEqual([0.5, -0.25, 1]);
  });

  it('should number files per opened stream', async () => {
    const device = new WavFileDevice(dir, 'take');
    for (const sampleRate of [24000, 22050]) {
      const stream = await device.open({ sampleRate, channels: 1, format: 'f32le' });
      await stream.start();
      await stream.close();
    }

    expect((await fsp.readdir(dir)).sort()).toEqual(['take-001-24000.wav', 'take-002-22050.wav']);
  });

  it('should refuse writes after stop', async () => {
    const device = new WavFileDevice(dir);
    const stream = await device.open({ sampleRate: 16000, channels: 1, format: 'f32le' });
    await stream.start();
    await stream.stop();

    await expect(stream.write(Float32Array.from([0]))).rejects.toThrow('stream is not running');
    await stream.close();
  });
});
