import RingBuffer from "ringbufferjs";

import type { AudioChunk } from "../cores/EmulatorCore";
import type { AudioSink } from "./AudioSink";

/**
 * Interleaved stereo sample FIFO between the host loop and an audio device.
 * Reports not-ready above half full and refuses chunks that would overflow,
 * so the producer slows down instead of samples being evicted.
 */
export class SampleQueue implements AudioSink {
  private buffer: RingBuffer<number>;

  constructor(private bufferSize = 8192) {
    this.buffer = new RingBuffer(bufferSize * 2);
  }

  /** Buffered stereo frames. */
  get length(): number {
    return this.buffer.size() / 2;
  }

  isReady(): boolean {
    return this.length < this.bufferSize / 2;
  }

  write(chunk: AudioChunk): boolean {
    if (this.buffer.size() + chunk.samples.length > this.bufferSize * 2) {
      return false;
    }
    for (const sample of chunk.samples) {
      this.buffer.enq(sample);
    }
    return true;
  }

  /**
   * Fill `left`/`right` with the next frames; silence where the queue runs dry.
   * @returns frames actually taken from the queue
   */
  read(left: Float32Array, right: Float32Array): number {
    const size = left.length;
    const available = Math.min(this.length, size);
    const samples = available > 0 ? this.buffer.deqN(available * 2) : [];

    for (let i = 0; i < available; i++) {
      left[i] = samples[i * 2];
      right[i] = samples[i * 2 + 1];
    }
    for (let i = available; i < size; i++) {
      left[i] = 0;
      right[i] = 0;
    }

    if (available > 0 && available < size) {
      console.log(`Buffer underrun (needed ${size}, got ${available})`);
    }
    return available;
  }

  /** Drop up to `frames` stereo frames without playing them. */
  discard(frames: number): number {
    const count = Math.min(this.length, Math.floor(frames));
    if (count > 0) this.buffer.deqN(count * 2);
    return count;
  }

  clear(): void {
    this.discard(this.length);
  }
}
