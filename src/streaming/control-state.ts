export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Flags shared by the producer and consumer loops. Only the control side
 * writes them; `stopping` is one-way for the lifetime of a pipeline.
 */
export class ControlState {
  private _paused = false;
  private _stopping = false;

  get paused(): boolean {
    return this._paused;
  }

  get stopping(): boolean {
    return this._stopping;
  }

  pause(): void {
    this._paused = true;
  }

  resume(): void {
    this._paused = false;
  }

  requestStop(): void {
    this._stopping = true;
  }

  /**
   * Poll until resumed or stopping. Resolves false when stopping was observed.
   */
  async waitWhilePaused(pollMs: number): Promise<boolean> {
    while (this._paused && !this._stopping) {
      await sleep(pollMs);
    }
    return !this._stopping;
  }
}
