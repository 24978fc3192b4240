import { clearInterval, setInterval } from "node:timers";

import { handleError } from "./errorUtils";
import type { TickCallback, TickDriver } from "./tickDrivers";

/** Fixed-interval driver for Node.js, where there is no display refresh. */
export function timerDriver(
  onTick: TickCallback,
  intervalMs = 1000 / 120,
  now: () => number = () => performance.now(),
): TickDriver {
  let timer: NodeJS.Timeout | null = null;

  const driver: TickDriver = {
    get running() {
      return timer !== null;
    },
    start() {
      if (timer !== null) return;
      timer = setInterval(() => {
        try {
          onTick(now());
        } catch (error) {
          driver.stop();
          handleError(error, { driver: "timer" });
        }
      }, intervalMs);
    },
    stop() {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
    },
  };

  return driver;
}
