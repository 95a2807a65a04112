import { describe, it, expect } from 'vitest';
import { BoundedChannel } from '../bounded-channel';
import { sleep } from '../control-state';

describe('BoundedChannel', () => {
  it('should pop items in push order', async () => {
    const channel = new BoundedChannel<number>(3);
    channel.tryPush(1);
    channel.tryPush(2);
    channel.tryPush(3);

    expect(await channel.pop()).toBe(1);
    expect(await channel.pop()).toBe(2);
    expect(await channel.pop()).toBe(3);
    expect(channel.size).toBe(0);
  });

  it('should refuse tryPush when full', () => {
    const channel = new BoundedChannel<string>(2);

    expect(channel.tryPush('a')).toBe(true);
    expect(channel.tryPush('b')).toBe(true);
    expect(channel.tryPush('c')).toBe(false);
    expect(channel.size).toBe(2);
  });

  it('should report would-block when no space frees up before the timeout', async () => {
    const channel = new BoundedChannel<string>(1);
    channel.tryPush('a');

    const started = Date.now();
    expect(await channel.push('b', 20)).toBe('would-block');
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
    expect(channel.size).toBe(1);
  });

  it('should accept a waiting push as soon as a pop frees space', async () => {
    const channel = new BoundedChannel<string>(1);
    channel.tryPush('a');

    const pushed = channel.push('b', 1000);
    expect(await channel.pop()).toBe('a');

    expect(await pushed).toBe('accepted');
    expect(await channel.pop()).toBe('b');
  });

  it('should hand a pushed item straight to a waiting pop', async () => {
    const channel = new BoundedChannel<string>(1);
    const popped = channel.pop();
    await sleep(5);

    expect(channel.tryPush('late')).toBe(true);
    expect(await popped).toBe('late');
    expect(channel.size).toBe(0);
  });

  it('should wake a waiting push when cleared', async () => {
    const channel = new BoundedChannel<string>(2);
    channel.tryPush('a');
    channel.tryPush('b');

    const pushed = channel.push('c', 1000);
    channel.clear();

    expect(await pushed).toBe('accepted');
    expect(channel.size).toBe(1);
    expect(await channel.pop()).toBe('c');
  });

  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new BoundedChannel(0)).toThrow(RangeError);
    expect(() => new BoundedChannel(1.5)).toThrow('capacity must be a positive integer, got 1.5');
  });

  it('should default to a capacity of 100', () => {
    expect(new BoundedChannel<number>().capacity).toBe(100);
  });
});
