import type { FrameBuffer } from '../cores/EmulatorCore';
import type { PresentationSurface } from './PresentationSurface';

/**
 * Surface without a display: keeps the latest frame and reports the
 * presented frame rate every `reportEvery` frames.
 */
export class HeadlessSurface implements PresentationSurface {
  private latest: FrameBuffer | null = null;
  private presented = 0;
  private windowStart: number | null = null;

  constructor(
    private reportEvery = 600,
    private now: () => number = () => performance.now(),
  ) {}

  get lastFrame(): FrameBuffer | null {
    return this.latest;
  }

  present(frame: FrameBuffer): void {
    this.latest = frame;
    this.presented++;

    const now = this.now();
    if (this.windowStart === null) {
      this.windowStart = now;
      return;
    }
    if (this.presented % this.reportEvery === 0) {
      const seconds = (now - this.windowStart) / 1000;
      if (seconds > 0) {
        console.log(`[HeadlessSurface] ${(this.reportEvery / seconds).toFixed(1)} fps presented`);
      }
      this.windowStart = now;
    }
  }
}
