/**
 * Terminal keyboard for the native build.
 *
 * A terminal reports key presses but never key releases, so every press is
 * held for a fixed time and then released.
 */

import { clearTimeout, setTimeout } from 'node:timers';

import type KeyboardController from './KeyboardController';

export interface Keypress {
  name?: string;
  ctrl?: boolean;
}

const KEY_CODES: Record<string, string> = {
  up: 'ArrowUp',
  down: 'ArrowDown',
  left: 'ArrowLeft',
  right: 'ArrowRight',
  return: 'Enter',
  enter: 'Enter',
  x: 'KeyX',
  z: 'KeyZ',
  y: 'KeyY',
  space: 'ShiftRight',
};

export function keypressToCode(key: Keypress): string | null {
  if (!key.name || key.ctrl) return null;
  return KEY_CODES[key.name] ?? null;
}

export class TerminalKeys {
  private releaseTimers = new Map<string, NodeJS.Timeout>();

  constructor(
    private keyboard: KeyboardController,
    private holdMs = 150,
  ) {}

  /** @returns true when the key was a game key */
  press(key: Keypress): boolean {
    const code = keypressToCode(key);
    if (!code) return false;

    this.keyboard.handleKeyDown({ code });

    const previous = this.releaseTimers.get(code);
    if (previous !== undefined) clearTimeout(previous);
    this.releaseTimers.set(
      code,
      setTimeout(() => {
        this.releaseTimers.delete(code);
        this.keyboard.handleKeyUp({ code });
      }, this.holdMs),
    );
    return true;
  }

  dispose(): void {
    for (const timer of this.releaseTimers.values()) clearTimeout(timer);
    this.releaseTimers.clear();
    this.keyboard.releaseAll();
  }
}
