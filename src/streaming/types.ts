/**
 * Shared types for the synthesis → playback pipeline.
 */

export interface AudioFrame {
  samples: Float32Array;
  sampleRate: number;
}

// Items carried by the bounded audio channel. End-of-line and terminate are
// their own variants, never values that could collide with real text.
export type AudioItem =
  | { kind: 'frame'; frame: AudioFrame; line: string }
  | { kind: 'end-of-line'; line: string }
  | { kind: 'terminate' };

// Items carried by the text channel.
export type TextItem =
  | { kind: 'text'; text: string }
  | { kind: 'terminate' };

export const TERMINATE = { kind: 'terminate' } as const;

export interface PipelineTimings {
  frameSize: number;           // Samples per device write
  audioQueueCapacity: number;  // Max items buffered between producer and consumer
  pushTimeoutMs: number;       // Backpressure retry interval
  pausePollMs: number;         // Pause/stop check interval
  lineEndDelayMs: number;      // Settle time after a line before reporting the gap
}

export const DEFAULT_TIMINGS: PipelineTimings = {
  frameSize: 2048,
  audioQueueCapacity: 100,
  pushTimeoutMs: 20,
  pausePollMs: 50,
  lineEndDelayMs: 250,
};

export type PipelineErrorSource = 'synthesis' | 'device' | 'producer' | 'consumer';

// Observational hooks; nothing here feeds back into the pipeline.
export interface PipelineCallbacks {
  onLineStart?: (line: string) => void;
  onLineEnd?: (line: string, gapMs: number) => void;
  onFrame?: (frame: AudioFrame, line: string) => void;
  onError?: (error: Error, source: PipelineErrorSource) => void;
}
