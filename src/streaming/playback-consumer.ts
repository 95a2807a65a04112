/**
 * Playback Consumer
 * Drains the audio channel into the output device, tracks line transitions
 * and owns the device stream from open to release.
 */

import type { AudioOutputDevice, OutputStreamHandle } from '../providers/audio/base';
import { AudioDeviceError, toError } from '../types/errors';
import { createLogger } from '../utils/logger';
import type { BoundedChannel } from './bounded-channel';
import { sleep, type ControlState } from './control-state';
import type { AudioFrame, AudioItem, PipelineCallbacks, PipelineTimings } from './types';

const log = createLogger('consumer');

export interface ConsumerDeps {
  device: AudioOutputDevice;
  audioChannel: BoundedChannel<AudioItem>;
  state: ControlState;
  timings: Pick<PipelineTimings, 'pausePollMs' | 'lineEndDelayMs'>;
  callbacks?: PipelineCallbacks;
}

// Why run() returned: end of input, a stop request, or a failure the loop
// cannot continue past
export type ConsumerExit = 'terminate' | 'stopped' | 'failed';

// 'drain' lets buffered audio play out; 'abort' cuts it off
export type ReleaseMode = 'drain' | 'abort';

export class PlaybackConsumer {
  private deps: ConsumerDeps;
  private stream: OutputStreamHandle | null = null;
  private releasing: { stream: OutputStreamHandle; mode: ReleaseMode; done: Promise<void> } | null = null;
  private currentLine: string | null = null;
  private lastLineEnd = performance.now();
  private framesWritten = 0;
  private framesDropped = 0;
  private deviceOpens = 0;

  constructor(deps: ConsumerDeps) {
    this.deps = deps;
  }

  get stats(): { framesWritten: number; framesDropped: number; deviceOpens: number } {
    return { framesWritten: this.framesWritten, framesDropped: this.framesDropped, deviceOpens: this.deviceOpens };
  }

  get hasOpenStream(): boolean {
    return this.stream !== null;
  }

  async run(): Promise<ConsumerExit> {
    const { audioChannel, state, timings, callbacks } = this.deps;
    let exit: ConsumerExit = 'stopped';
    log.debug('Consumer started');

    try {
      while (!state.stopping) {
        const item = await audioChannel.pop();
        if (state.stopping) break;
        if (item.kind === 'terminate') {
          log.info('Terminate received');
          exit = 'terminate';
          break;
        }

        if (item.kind === 'end-of-line') {
          // Let device buffers drain before measuring the gap
          await sleep(timings.lineEndDelayMs);
          if (state.stopping) break;
          const now = performance.now();
          const gapMs = now - this.lastLineEnd;
          this.lastLineEnd = now;
          log.debug(`Line finished, gap since previous line end: ${gapMs.toFixed(1)}ms`);
          callbacks?.onLineEnd?.(item.line, gapMs);
          this.currentLine = null;
          continue;
        }

        if (!(await state.waitWhilePaused(timings.pausePollMs))) break;

        if (item.line !== this.currentLine) {
          this.currentLine = item.line;
          log.info('Now speaking:', item.line);
          callbacks?.onLineStart?.(item.line);
        }

        const stream = await this.ensureStream(item.frame.sampleRate);
        if (!stream) {
          if (!state.stopping) exit = 'failed';
          break;
        }
        await this.writeFrame(stream, item.frame, item.line);
      }
    } catch (e: unknown) {
      const error = toError(e);
      log.error('Consumer loop failed:', error.message);
      callbacks?.onError?.(error, 'consumer');
      exit = 'failed';
    } finally {
      await this.releaseStream(state.stopping ? 'abort' : 'drain');
    }

    log.info('Consumer exited:', exit, this.stats);
    return exit;
  }

  /**
   * Stop and close the open stream, if any. Concurrent callers share one
   * release, so the device is closed exactly once; an abort arriving while a
   * drain is in progress cuts the drain short.
   */
  releaseStream(mode: ReleaseMode = 'drain'): Promise<void> {
    const current = this.releasing;
    if (current) {
      if (mode === 'abort' && current.mode === 'drain') {
        current.mode = 'abort';
        return Promise.all([current.done, this.abortStream(current.stream)]).then(() => undefined);
      }
      return current.done;
    }

    const stream = this.stream;
    if (!stream) return Promise.resolve();
    this.stream = null;

    const done = this.closeStream(stream, mode).finally(() => {
      this.releasing = null;
    });
    this.releasing = { stream, mode, done };
    return done;
  }

  private async closeStream(stream: OutputStreamHandle, mode: ReleaseMode): Promise<void> {
    try {
      if (mode === 'abort') {
        await stream.abort();
      } else {
        await stream.stop();
      }
      await stream.close();
      log.debug('Stream closed at', stream.sampleRate, 'Hz', `(${mode})`);
    } catch (e: unknown) {
      this.reportCloseError(e);
    }
  }

  private async abortStream(stream: OutputStreamHandle): Promise<void> {
    try {
      await stream.abort();
    } catch (e: unknown) {
      this.reportCloseError(e);
    }
  }

  private reportCloseError(e: unknown): void {
    const error = new AudioDeviceError('close', toError(e));
    log.error(error.message);
    this.deps.callbacks?.onError?.(error, 'device');
  }

  /**
   * The only place the device is (re)opened: when no stream exists or the
   * frame's sample rate differs from the open stream's.
   */
  private async ensureStream(sampleRate: number): Promise<OutputStreamHandle | null> {
    if (this.stream && this.stream.sampleRate === sampleRate) return this.stream;

    await this.releaseStream();
    if (this.deps.state.stopping) return null;

    try {
      const stream = await this.deps.device.open({ sampleRate, channels: 1, format: 'f32le' });
      await stream.start();
      this.deviceOpens++;
      log.info('Opened', this.deps.device.name, 'stream at', sampleRate, 'Hz');
      if (this.deps.state.stopping) {
        // stop() ran while the device was opening; nothing else will close it
        await this.closeStream(stream, 'abort');
        return null;
      }
      this.stream = stream;
      return stream;
    } catch (e: unknown) {
      const error = new AudioDeviceError('open', toError(e));
      log.error(error.message);
      this.deps.callbacks?.onError?.(error, 'device');
      return null;
    }
  }

  private async writeFrame(stream: OutputStreamHandle, frame: AudioFrame, line: string): Promise<void> {
    try {
      await stream.write(frame.samples);
      this.framesWritten++;
      this.deps.callbacks?.onFrame?.(frame, line);
    } catch (e: unknown) {
      // Dropped, not retried: a resync is worse than a missing frame
      this.framesDropped++;
      if (this.deps.state.stopping) {
        log.debug('Write interrupted by stop');
        return;
      }
      const error = new AudioDeviceError('write', toError(e));
      log.warn(error.message);
      this.deps.callbacks?.onError?.(error, 'device');
    }
  }
}
