import { describe, it, expect, vi } from 'vitest';

import { RELEASED, releasedState } from './buttons';
import GamepadController, { noGamepads, type GamepadLike } from './GamepadController';
import { InputAggregator } from './InputAggregator';
import KeyboardController from './KeyboardController';

const startPressed: GamepadLike = {
  id: 'pad',
  index: 0,
  connected: true,
  buttons: Array.from({ length: 16 }, (_, i) => ({ pressed: i === 9 })),
  axes: [0, 0],
};

describe('InputAggregator', () => {
  it('should report everything released without any input', () => {
    const input = new InputAggregator(new KeyboardController(), new GamepadController(noGamepads));
    expect(input.poll()).toEqual(RELEASED);
  });

  it('should merge keyboard and gamepad', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const keyboard = new KeyboardController();
    keyboard.handleKeyDown({ code: 'ArrowUp' });
    const input = new InputAggregator(keyboard, new GamepadController(() => [startPressed]));

    expect(input.poll()).toEqual({ ...releasedState(), up: true, start: true });
  });

  it('should drop gamepad buttons once the gamepad is unplugged', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    let pads: GamepadLike[] = [startPressed];
    const input = new InputAggregator(new KeyboardController(), new GamepadController(() => pads));

    expect(input.poll().start).toBe(true);
    pads = [];
    expect(input.poll().start).toBe(false);
  });

  it('should return a new frozen snapshot on every poll', () => {
    const input = new InputAggregator(new KeyboardController(), new GamepadController(noGamepads));
    const first = input.poll();
    const second = input.poll();
    expect(first).not.toBe(second);
    expect(Object.isFrozen(first)).toBe(true);
  });
});
