import type { TextItem } from './types';

/**
 * Unbounded FIFO of pending text. The bound on buffered work belongs to the
 * audio channel downstream, so `push` never waits.
 */
export class TextChannel {
  private items: TextItem[] = [];
  private resolvers: ((item: TextItem) => void)[] = [];

  push(item: TextItem): void {
    const resolver = this.resolvers.shift();
    if (resolver) {
      resolver(item);
    } else {
      this.items.push(item);
    }
  }

  async pop(): Promise<TextItem> {
    const item = this.items.shift();
    if (item !== undefined) {
      return item;
    }

    return new Promise<TextItem>((resolve) => {
      this.resolvers.push(resolve);
    });
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Drop pending text. A waiting `pop` keeps waiting for the next push.
   */
  clear(): void {
    this.items = [];
  }
}
