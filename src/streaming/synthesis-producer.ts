/**
 * Synthesis Producer
 * Pulls text lines, synthesizes them and feeds frames into the bounded
 * audio channel, one end-of-line marker per line.
 */

import type { SynthesisEngine } from '../providers/tts/base';
import { SynthesisError, toError } from '../types/errors';
import { createLogger } from '../utils/logger';
import type { BoundedChannel } from './bounded-channel';
import type { ControlState } from './control-state';
import { chunkFrames } from './frame-chunker';
import type { TextChannel } from './text-channel';
import type { AudioItem, PipelineCallbacks, PipelineTimings } from './types';
import { TERMINATE } from './types';

const log = createLogger('producer');

export interface ProducerDeps {
  engine: SynthesisEngine;
  textChannel: TextChannel;
  audioChannel: BoundedChannel<AudioItem>;
  state: ControlState;
  timings: Pick<PipelineTimings, 'frameSize' | 'pushTimeoutMs' | 'pausePollMs'>;
  callbacks?: PipelineCallbacks;
}

export class SynthesisProducer {
  private deps: ProducerDeps;
  private activeRate: number | null = null;
  private linesProduced = 0;
  private framesProduced = 0;

  constructor(deps: ProducerDeps) {
    this.deps = deps;
  }

  get stats(): { linesProduced: number; framesProduced: number } {
    return { linesProduced: this.linesProduced, framesProduced: this.framesProduced };
  }

  async run(): Promise<void> {
    const { textChannel, audioChannel, state } = this.deps;
    log.debug('Producer started');

    try {
      while (!state.stopping) {
        const item = await textChannel.pop();
        if (item.kind === 'terminate') {
          if (!state.stopping) {
            // End of input: let the consumer finish what is queued, then exit
            await this.pushUntilAccepted(TERMINATE);
          }
          break;
        }
        if (state.stopping) break;

        const completed = await this.produceLine(item.text);
        if (!completed) break;

        const marked = await this.pushUntilAccepted({ kind: 'end-of-line', line: item.text });
        if (!marked) break;
        this.linesProduced++;
      }
    } catch (e: unknown) {
      const error = toError(e);
      log.error('Producer loop failed:', error.message);
      this.deps.callbacks?.onError?.(error, 'producer');
      // Unblock the consumer so it can release the device
      if (!state.stopping) audioChannel.tryPush(TERMINATE);
    }

    log.info('Producer exited', this.stats);
  }

  /**
   * Synthesize one line into frames. Resolves false when stopping was observed.
   * Synthesis failures skip the rest of the line and still resolve true.
   */
  private async produceLine(text: string): Promise<boolean> {
    const { engine, state, timings } = this.deps;
    const started = performance.now();

    try {
      for await (const chunk of engine.synthesize(text)) {
        if (state.stopping) return false;

        if (this.activeRate !== chunk.sampleRate) {
          log.debug('Sample rate change', this.activeRate, '→', chunk.sampleRate, '(consumer reopens device)');
          this.activeRate = chunk.sampleRate;
        }

        for (const samples of chunkFrames(chunk.samples, timings.frameSize)) {
          if (state.stopping) return false;
          if (!(await state.waitWhilePaused(timings.pausePollMs))) return false;

          const pushed = await this.pushUntilAccepted({
            kind: 'frame',
            frame: { samples, sampleRate: chunk.sampleRate },
            line: text,
          });
          if (!pushed) return false;
          this.framesProduced++;
        }
      }
    } catch (e: unknown) {
      const error = new SynthesisError(engine.name, text, toError(e));
      log.error('Skipping line:', error.message);
      this.deps.callbacks?.onError?.(error, 'synthesis');
      return !state.stopping;
    }

    log.debug(`Line synthesized in ${(performance.now() - started).toFixed(1)}ms:`, text);
    return !state.stopping;
  }

  /**
   * Retry short pushes until the item is accepted. Resolves false when
   * stopping was observed first.
   */
  private async pushUntilAccepted(item: AudioItem): Promise<boolean> {
    const { audioChannel, state, timings } = this.deps;
    while (!state.stopping) {
      const result = await audioChannel.push(item, timings.pushTimeoutMs);
      if (result === 'accepted') return true;
    }
    return false;
  }
}
