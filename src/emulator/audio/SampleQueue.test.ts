import { describe, it, expect, vi } from 'vitest';

import { SampleQueue } from './SampleQueue';

const chunk = (...samples: number[]) => ({ sampleRate: 8000, samples: Float32Array.from(samples) });

describe('SampleQueue', () => {
  it('should report ready only below half full', () => {
    const queue = new SampleQueue(4);
    expect(queue.isReady()).toBe(true);

    queue.write(chunk(0.1, 0.2, 0.3, 0.4));

    expect(queue.length).toBe(2);
    expect(queue.isReady()).toBe(false);
  });

  it('should refuse a chunk that would overflow and keep what it has', () => {
    const queue = new SampleQueue(2);
    expect(queue.write(chunk(0.5, 0.5, 0.25, 0.25))).toBe(true);
    expect(queue.write(chunk(1, 1))).toBe(false);
    expect(queue.length).toBe(2);
  });

  it('should deinterleave into left and right in order', () => {
    const queue = new SampleQueue(4);
    queue.write(chunk(0.5, -0.5));
    queue.write(chunk(0.25, -0.25));
    const left = new Float32Array(2);
    const right = new Float32Array(2);

    expect(queue.read(left, right)).toBe(2);

    expect(Array.from(left)).toEqual([0.5, 0.25]);
    expect(Array.from(right)).toEqual([-0.5, -0.25]);
  });

  it('should pad an underrun with silence and log it', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const queue = new SampleQueue(4);
    queue.write(chunk(0.5, 0.5));
    const left = Float32Array.of(9, 9, 9);
    const right = Float32Array.of(9, 9, 9);

    expect(queue.read(left, right)).toBe(1);

    expect(Array.from(left)).toEqual([0.5, 0, 0]);
    expect(log).toHaveBeenCalledWith('Buffer underrun (needed 3, got 1)');
  });

  it('should discard at most what it holds', () => {
    const queue = new SampleQueue(4);
    queue.write(chunk(1, 1, 1, 1));
    expect(queue.discard(5)).toBe(2);
    expect(queue.length).toBe(0);
  });
});
