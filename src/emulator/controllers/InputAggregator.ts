import { mergeSnapshot, type InputSnapshot } from './buttons';
import type GamepadController from './GamepadController';
import type KeyboardController from './KeyboardController';

/**
 * Merges the keyboard table with the first connected gamepad into one frozen
 * snapshot per emulated frame.
 */
export class InputAggregator {
  constructor(
    private keyboard: KeyboardController,
    private gamepads: GamepadController,
  ) {}

  poll(): InputSnapshot {
    return mergeSnapshot(this.keyboard.getState(), this.gamepads.readFirstConnected());
  }
}
