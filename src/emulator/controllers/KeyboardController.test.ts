import { describe, it, expect, vi } from 'vitest';

import { releasedState } from './buttons';
import { memoryStore } from './keyValueStore';
import KeyboardController from './KeyboardController';

describe('KeyboardController', () => {
  it('should map held keys to buttons', () => {
    const keyboard = new KeyboardController();
    keyboard.handleKeyDown({ code: 'KeyX' });
    keyboard.handleKeyDown({ code: 'ArrowLeft' });
    keyboard.handleKeyUp({ code: 'ArrowLeft' });

    const state = keyboard.getState();
    expect(state.a).toBe(true);
    expect(state.left).toBe(false);
  });

  it('should keep a button held while any mapped key is down', () => {
    const keyboard = new KeyboardController();
    keyboard.handleKeyDown({ code: 'KeyZ' });
    keyboard.handleKeyDown({ code: 'KeyY' });
    keyboard.handleKeyUp({ code: 'KeyZ' });

    expect(keyboard.getState().b).toBe(true);
  });

  it('should only prevent default for mapped keys', () => {
    const keyboard = new KeyboardController();
    const mapped = vi.fn();
    const unmapped = vi.fn();

    keyboard.handleKeyDown({ code: 'Enter', preventDefault: mapped });
    keyboard.handleKeyDown({ code: 'KeyQ', preventDefault: unmapped });

    expect(mapped).toHaveBeenCalledTimes(1);
    expect(unmapped).not.toHaveBeenCalled();
  });

  it('should release everything on releaseAll', () => {
    const keyboard = new KeyboardController();
    keyboard.handleKeyDown({ code: 'Enter' });
    keyboard.releaseAll();
    expect(keyboard.getState().start).toBe(false);
  });

  it('should persist and reload a custom keymap', () => {
    const storage = memoryStore();
    new KeyboardController(storage).setKeys({ KeyJ: 'a' });

    const keyboard = new KeyboardController(storage);
    keyboard.loadKeys();
    keyboard.handleKeyDown({ code: 'KeyJ' });
    keyboard.handleKeyDown({ code: 'KeyX' });

    expect(keyboard.getState()).toEqual({ ...releasedState(), a: true });
    expect(storage.getItem('keys')).toBe('{"KeyJ":"a"}');
  });

  it('should fall back to defaults when the stored keymap is invalid', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const keyboard = new KeyboardController(memoryStore({ keys: '{"KeyJ":"turbo"}' }));
    keyboard.loadKeys();
    keyboard.handleKeyDown({ code: 'KeyJ' });
    keyboard.handleKeyDown({ code: 'ArrowUp' });
    expect(keyboard.getState()).toEqual({ ...releasedState(), up: true });
  });
});
