import { handleError } from "./errorUtils";

export type TickCallback = (now: number) => void;

export interface TickDriver {
  start(): void;
  stop(): void;
  readonly running: boolean;
}

/**
 * Calls `onTick` from requestAnimationFrame. A throwing tick stops the
 * driver instead of re-scheduling a broken loop.
 */
export function animationFrameDriver(onTick: TickCallback): TickDriver {
  let requestID: number | null = null;

  const driver: TickDriver = {
    get running() {
      return requestID !== null;
    },
    start() {
      if (requestID !== null) return;
      requestID = window.requestAnimationFrame(onAnimationFrame);
    },
    stop() {
      if (requestID !== null) {
        window.cancelAnimationFrame(requestID);
        requestID = null;
      }
    },
  };

  function onAnimationFrame(time: number) {
    requestID = window.requestAnimationFrame(onAnimationFrame);
    try {
      onTick(time);
    } catch (error) {
      driver.stop();
      handleError(error, { driver: "animation-frame" });
    }
  }

  return driver;
}
