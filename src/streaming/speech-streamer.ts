/**
 * Speech Streamer
 * One pipeline instance: a synthesis producer and a playback consumer joined
 * by a bounded audio channel, plus the speak/pause/resume/stop surface.
 *
 * Lifecycle: running → stopping → stopped. A stopped streamer never runs
 * again; construct a new one to speak after stop().
 */

import type { PipelineStateName } from '@readaloud/types';
import type { AudioOutputDevice } from '../providers/audio/base';
import type { SynthesisEngine } from '../providers/tts/base';
import { PipelineClosedError } from '../types/errors';
import { createLogger, errorMessage } from '../utils/logger';
import { BoundedChannel } from './bounded-channel';
import { ControlState } from './control-state';
import { PlaybackConsumer } from './playback-consumer';
import { SynthesisProducer } from './synthesis-producer';
import { TextChannel } from './text-channel';
import type { AudioItem, PipelineCallbacks, PipelineTimings } from './types';
import { DEFAULT_TIMINGS, TERMINATE } from './types';

const log = createLogger('streamer');

export interface SpeechStreamerCallbacks extends PipelineCallbacks {
  onStateChange?: (state: PipelineStateName, paused: boolean) => void;
}

export interface SpeechStreamerOptions {
  engine: SynthesisEngine;
  device: AudioOutputDevice;
  timings?: Partial<PipelineTimings>;
  callbacks?: SpeechStreamerCallbacks;
}

export class SpeechStreamer {
  readonly timings: PipelineTimings;

  private state = new ControlState();
  private textChannel = new TextChannel();
  private audioChannel: BoundedChannel<AudioItem>;
  private producer: SynthesisProducer;
  private consumer: PlaybackConsumer;
  private callbacks: SpeechStreamerCallbacks;

  private lifecycle: PipelineStateName = 'running';
  private inputClosed = false;
  private pendingRelease: Promise<void> = Promise.resolve();
  private finished: Promise<void>;

  constructor(options: SpeechStreamerOptions) {
    this.timings = { ...DEFAULT_TIMINGS, ...options.timings };
    this.callbacks = options.callbacks ?? {};
    this.audioChannel = new BoundedChannel<AudioItem>(this.timings.audioQueueCapacity);

    this.producer = new SynthesisProducer({
      engine: options.engine,
      textChannel: this.textChannel,
      audioChannel: this.audioChannel,
      state: this.state,
      timings: this.timings,
      callbacks: this.callbacks,
    });
    this.consumer = new PlaybackConsumer({
      device: options.device,
      audioChannel: this.audioChannel,
      state: this.state,
      timings: this.timings,
      callbacks: this.callbacks,
    });

    // Both loops start right away and run until terminate or stop
    const producerDone = this.producer.run();
    const consumerDone = this.consumer.run().then((exit) => {
      // Without a consumer the producer would fill the channel and wait forever
      if (exit === 'failed') this.stop();
    });
    this.finished = Promise.all([producerDone, consumerDone])
      .catch((e: unknown) => {
        log.error('Pipeline loop rejected:', errorMessage(e));
      })
      .then(() => {
        this.setLifecycle('stopped');
        log.info('Pipeline stopped', this.stats);
      });

    log.info('Pipeline started', this.timings);
  }

  get status(): PipelineStateName {
    return this.lifecycle;
  }

  get paused(): boolean {
    return this.state.paused;
  }

  get stopping(): boolean {
    return this.state.stopping;
  }

  /**
   * Items buffered between producer and consumer.
   */
  get bufferedItems(): number {
    return this.audioChannel.size;
  }

  get pendingLines(): number {
    return this.textChannel.size;
  }

  get stats() {
    return { producer: this.producer.stats, consumer: this.consumer.stats };
  }

  speak(text: string): void {
    if (this.state.stopping || this.inputClosed) {
      throw new PipelineClosedError('speak');
    }
    this.textChannel.push({ kind: 'text', text });
  }

  speakAll(lines: Iterable<string>): number {
    let count = 0;
    for (const line of lines) {
      this.speak(line);
      count++;
    }
    return count;
  }

  pause(): void {
    if (this.state.paused || this.state.stopping) return;
    this.state.pause();
    log.info('Paused');
    this.callbacks.onStateChange?.(this.lifecycle, true);
  }

  resume(): void {
    if (!this.state.paused || this.state.stopping) return;
    this.state.resume();
    log.info('Resumed');
    this.callbacks.onStateChange?.(this.lifecycle, false);
  }

  /**
   * No more text will be spoken. Queued lines still play, then both loops
   * exit and the device is released.
   */
  finish(): void {
    if (this.inputClosed || this.state.stopping) return;
    this.inputClosed = true;
    this.textChannel.push(TERMINATE);
    log.info('Input closed, draining');
  }

  /**
   * Request shutdown without waiting for it. Pending text and audio are
   * dropped, waiting loops are woken and the device is released. Call
   * join() afterwards to wait for the loops.
   */
  stop(): void {
    if (this.state.stopping) return;
    this.state.requestStop();
    this.state.resume();
    if (this.lifecycle === 'running') this.setLifecycle('stopping');

    log.info('Clearing queues');
    this.textChannel.clear();
    this.audioChannel.clear();
    this.textChannel.push(TERMINATE);
    this.audioChannel.tryPush(TERMINATE);

    this.pendingRelease = this.consumer.releaseStream('abort');
  }

  /**
   * Wait for both loops to exit. With a timeout, resolves false if they are
   * still running when it elapses.
   */
  async join(timeoutMs?: number): Promise<boolean> {
    const done = Promise.all([this.finished, this.pendingRelease]).then(() => true);
    if (timeoutMs === undefined) return done;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([done, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * stop() followed by a bounded join.
   */
  async shutdown(timeoutMs: number): Promise<boolean> {
    this.stop();
    const joined = await this.join(timeoutMs);
    if (!joined) log.warn(`Loops still running after ${timeoutMs}ms, continuing`);
    return joined;
  }

  private setLifecycle(next: PipelineStateName): void {
    if (this.lifecycle === next) return;
    this.lifecycle = next;
    this.callbacks.onStateChange?.(next, this.state.paused);
  }
}
