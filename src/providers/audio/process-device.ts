import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { createLogger } from '../../utils/logger';
import type { AudioPlayer } from '../../streamer-config';
import { float32ToBuffer, type AudioOutputDevice, type OutputStreamHandle, type OutputStreamOptions } from './base';

const log = createLogger('audio][process');

/**
 * Command line for a player that reads raw mono float32 LE from stdin.
 */
export function playerCommand(player: AudioPlayer, sampleRate: number): { command: string; args: string[] } {
  const rate = String(sampleRate);
  switch (player) {
    case 'ffplay':
      return {
        command: 'ffplay',
        args: ['-nodisp', '-autoexit', '-loglevel', 'error', '-f', 'f32le', '-ar', rate, '-ch_layout', 'mono', '-i', '-'],
      };
    case 'sox':
      return {
        command: 'play',
        args: ['-q', '-t', 'raw', '-e', 'floating-point', '-b', '32', '-L', '-r', rate, '-c', '1', '-'],
      };
    case 'aplay':
    default:
      return {
        command: 'aplay',
        args: ['-q', '-t', 'raw', '-f', 'FLOAT_LE', '-r', rate, '-c', '1', '-'],
      };
  }
}

// How long a graceful stop waits for the player to play out its buffer
export const PLAYER_DRAIN_TIMEOUT_MS = 5000;

class ProcessStream implements OutputStreamHandle {
  private proc: ChildProcessWithoutNullStreams | null = null;
  private exited: Promise<void> | null = null;
  private draining: Promise<void> | null = null;
  private stopped = false;
  private closed = false;

  constructor(
    readonly sampleRate: number,
    private player: AudioPlayer,
    private drainTimeoutMs: number,
  ) {}

  async start(): Promise<void> {
    if (this.proc) return;
    const { command, args } = playerCommand(this.player, this.sampleRate);
    const proc = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

    // Surface a missing player binary as an open failure
    await new Promise<void>((resolve, reject) => {
      proc.once('spawn', () => resolve());
      proc.once('error', reject);
    });

    proc.on('error', (e: Error) => log.error('Player error:', e.message));
    proc.stdin.on('error', (e: Error) => log.debug('Player stdin error:', e.message));
    proc.stderr.on('data', (data: Buffer) => log.debug('Player stderr:', data.toString().trim()));
    this.exited = new Promise<void>((resolve) => {
      proc.once('close', (code) => {
        log.debug('Player exited with code', code);
        resolve();
      });
    });
    this.proc = proc;
    log.debug('Started', command, args.join(' '));
  }

  write(samples: Float32Array): Promise<void> {
    const proc = this.proc;
    if (!proc || this.stopped) {
      return Promise.reject(new Error('stream is not running'));
    }
    // The callback fires once the pipe takes the data, which the player
    // drains in real time
    return new Promise<void>((resolve, reject) => {
      proc.stdin.write(float32ToBuffer(samples), (err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * End the player's input and wait for it to exit, which it does once
   * everything piped so far has played. Killed if that takes longer than
   * the drain timeout.
   */
  stop(): Promise<void> {
    this.stopped = true;
    if (!this.draining) this.draining = this.drain();
    return this.draining;
  }

  async abort(): Promise<void> {
    this.stopped = true;
    const proc = this.proc;
    if (proc && isRunning(proc)) {
      proc.stdin.destroy();
      proc.kill();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (!this.draining) await this.abort();
    this.proc?.stdout.destroy();
    this.proc?.stderr.destroy();
    this.proc = null;
  }

  private async drain(): Promise<void> {
    const proc = this.proc;
    const exited = this.exited;
    if (!proc || !exited || !isRunning(proc)) return;

    proc.stdin.end();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.drainTimeoutMs);
    });
    try {
      if (await Promise.race([exited.then(() => false), timedOut])) {
        log.warn(`Player still running ${this.drainTimeoutMs}ms after end of input, killing it`);
        await this.abort();
      }
    } finally {
      clearTimeout(timer);
    }
  }
}

function isRunning(proc: ChildProcessWithoutNullStreams): boolean {
  return proc.exitCode === null && proc.signalCode === null && !proc.killed;
}

/**
 * Plays through an external player process (aplay, ffplay or sox).
 */
export class ProcessAudioDevice implements AudioOutputDevice {
  name: string;
  type = 'process' as const;

  constructor(
    private player: AudioPlayer = 'aplay',
    private drainTimeoutMs = PLAYER_DRAIN_TIMEOUT_MS,
  ) {
    this.name = `${player} player`;
  }

  async open(options: OutputStreamOptions): Promise<OutputStreamHandle> {
    return new ProcessStream(options.sampleRate, this.player, this.drainTimeoutMs);
  }
}
