import { clearInterval, setInterval } from 'node:timers';

import type { AudioChunk } from '../cores/EmulatorCore';
import type { AudioSink } from './AudioSink';
import { SampleQueue } from './SampleQueue';

/**
 * Audio sink without an output device. Consumes samples at the core's
 * sample rate so backpressure paces the loop the way a sound card would.
 */
export class ClockedSink implements AudioSink {
  private queue: SampleQueue;
  private timer: NodeJS.Timeout | null = null;
  private lastDrain = 0;
  private carry = 0;

  constructor(
    private sampleRate: number,
    bufferSize = 8192,
    private now: () => number = () => performance.now(),
  ) {
    this.queue = new SampleQueue(bufferSize);
  }

  get buffered(): number {
    return this.queue.length;
  }

  start(intervalMs = 10): void {
    if (this.timer) return;
    this.lastDrain = this.now();
    this.timer = setInterval(() => this.drain(), intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.queue.clear();
  }

  /** Play out whatever the elapsed time since the last drain covers. */
  drain(): number {
    const now = this.now();
    const frames = ((now - this.lastDrain) * this.sampleRate) / 1000 + this.carry;
    this.lastDrain = now;
    const whole = Math.floor(frames);
    this.carry = frames - whole;
    return this.queue.discard(whole);
  }

  isReady(): boolean {
    return this.queue.isReady();
  }

  write(chunk: AudioChunk): boolean {
    return this.queue.write(chunk);
  }
}
