import { DEFAULT_FPS } from "@/config/hostConfig";

export type PacerMode = "running" | "paused" | "catching-up";

interface FramePacerProps {
  fps?: number;
  catchUpCap?: number;
}

// Tolerance for float error when converting elapsed time into whole frames
const EPSILON = 1e-6;

/**
 * Converts wall-clock time into a number of emulated frames per host tick.
 *
 * Frames owed beyond the catch-up cap are dropped, not carried: after a long
 * stall the emulator falls behind real time instead of sprinting.
 */
export default class FramePacer {
  readonly fps: number;
  readonly catchUpCap: number;
  private debt = 0;
  private lastTime: number | null = null;
  private _mode: PacerMode = "running";

  constructor({ fps = DEFAULT_FPS, catchUpCap = 10 }: FramePacerProps = {}) {
    if (!(fps > 0)) throw new RangeError(`fps must be positive, got ${fps}`);
    if (!Number.isInteger(catchUpCap) || catchUpCap < 1) {
      throw new RangeError(`catchUpCap must be a positive integer, got ${catchUpCap}`);
    }
    this.fps = fps;
    this.catchUpCap = catchUpCap;
  }

  get mode(): PacerMode {
    return this._mode;
  }

  /** Owed frames not yet released, in frame units. */
  get owed(): number {
    return this.debt;
  }

  start(now: number) {
    this.lastTime = now;
    this.debt = 0;
    this._mode = "running";
  }

  /**
   * Frames to run on this host tick.
   * The first tick after construction only sets the baseline.
   */
  tick(now: number): number {
    if (this._mode === "paused") return 0;

    if (this.lastTime === null) {
      this.lastTime = now;
      return 0;
    }

    const elapsed = Math.max(0, now - this.lastTime);
    this.lastTime = now;
    this.debt += (elapsed * this.fps) / 1000;

    const whole = Math.floor(this.debt + EPSILON);
    const frames = Math.min(whole, this.catchUpCap);

    if (whole > this.catchUpCap) {
      console.log("[FramePacer] SKIP", whole - this.catchUpCap);
      this.debt -= whole;
    } else {
      this.debt -= frames;
    }
    if (this.debt < EPSILON) this.debt = 0;

    this._mode = frames > 1 ? "catching-up" : "running";
    return frames;
  }

  /** Move the baseline without accruing debt. */
  idle(now: number) {
    if (this._mode === "paused") return;
    this.lastTime = now;
    this.debt = 0;
  }

  /** Give back frames that were released but could not be stepped. */
  refund(frames: number) {
    if (frames <= 0) return;
    this.debt += frames;
  }

  pause() {
    this._mode = "paused";
  }

  /** Time spent paused is not owed. */
  resume(now: number) {
    this.debt = 0;
    this.lastTime = now;
    this._mode = "running";
  }
}
