/**
 * Split a sample buffer into fixed-size frames for device writes.
 * Frames are views over the source buffer; the last one may be shorter.
 */
export function* chunkFrames(samples: Float32Array, frameSize: number): Generator<Float32Array> {
  if (!Number.isInteger(frameSize) || frameSize <= 0) {
    throw new RangeError(`frameSize must be a positive integer, got ${frameSize}`);
  }
  for (let start = 0; start < samples.length; start += frameSize) {
    yield samples.subarray(start, Math.min(start + frameSize, samples.length));
  }
}

export function countFrames(sampleCount: number, frameSize: number): number {
  return Math.ceil(sampleCount / frameSize);
}
