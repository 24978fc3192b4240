import { describe, it, expect, vi, beforeEach } from 'vitest';

import { memoryStore } from './keyValueStore';
import GamepadController, { type GamepadLike } from './GamepadController';

function pad(index: number, pressed: number[] = [], axes: number[] = [0, 0], connected = true): GamepadLike {
  return {
    id: `pad-${index}`,
    index,
    connected,
    buttons: Array.from({ length: 16 }, (_, i) => ({ pressed: pressed.includes(i) })),
    axes,
  };
}

describe('GamepadController', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('should return null when no gamepad is connected', () => {
    const gamepads = new GamepadController(() => [null, pad(1, [0], [0, 0], false)]);
    expect(gamepads.readFirstConnected()).toBeNull();
  });

  it('should read only the lowest-index connected gamepad', () => {
    const gamepads = new GamepadController(() => [null, pad(3, [9]), pad(2, [0])]);

    const state = gamepads.readFirstConnected();

    expect(state?.a).toBe(true);
    expect(state?.start).toBe(false);
  });

  it('should map the left stick past the threshold to the d-pad', () => {
    const gamepads = new GamepadController(() => [pad(0, [], [-0.6, 0.5])]);

    const state = gamepads.readFirstConnected();

    expect(state?.left).toBe(true);
    expect(state?.right).toBe(false);
    expect(state?.down).toBe(true);
    expect(state?.up).toBe(false);
  });

  it('should ignore stick movement below the threshold', () => {
    const gamepads = new GamepadController(() => [pad(0, [], [0.49, -0.2])]);
    const state = gamepads.readFirstConnected();
    expect(state?.right).toBe(false);
    expect(state?.up).toBe(false);
  });

  it('should treat a throwing source as disconnected', () => {
    const gamepads = new GamepadController(() => {
      throw new Error('not allowed');
    });
    expect(gamepads.readFirstConnected()).toBeNull();
  });

  it('should use a stored button mapping', () => {
    const storage = memoryStore({
      gamepadConfig: JSON.stringify({ buttons: { '5': 'select' }, axisThreshold: 0.9 }),
    });
    const gamepads = new GamepadController(() => [pad(0, [0, 5], [0.8, 0])], storage);
    gamepads.loadGamepadConfig();

    const state = gamepads.readFirstConnected();

    expect(state?.select).toBe(true);
    expect(state?.a).toBe(false);
    expect(state?.right).toBe(false);
  });
});
