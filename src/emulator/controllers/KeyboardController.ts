import { KeymapSchema, type Keymap } from "@/config/hostConfig";

import { releasedState, type Button, type ButtonState } from "./buttons";
import type { KeyValueStore } from "./keyValueStore";

// Mapping KeyboardEvent.code to logical button
const DEFAULT_KEYS: Keymap = {
  ArrowUp: "up",
  ArrowDown: "down",
  ArrowLeft: "left",
  ArrowRight: "right",
  KeyX: "a",
  KeyZ: "b",
  KeyY: "b", // Central European keyboard
  Enter: "start",
  ShiftRight: "select",
  ControlRight: "select",
};

const STORAGE_KEY = "keys";

export interface KeyEventLike {
  code: string;
  preventDefault?: () => void;
}

export default class KeyboardController {
  private keys: Keymap = DEFAULT_KEYS;
  private down = new Set<string>();

  constructor(private storage?: KeyValueStore) {}

  loadKeys = (): void => {
    if (!this.storage) return;
    try {
      const storedKeys = this.storage.getItem(STORAGE_KEY);
      if (storedKeys) {
        this.keys = KeymapSchema.parse(JSON.parse(storedKeys));
        return;
      }
    } catch (e) {
      console.log("Failed to get keys from storage.", e);
    }
    this.keys = DEFAULT_KEYS;
  };

  setKeys = (newKeys: Keymap): void => {
    this.keys = newKeys;
    this.down.clear();
    try {
      this.storage?.setItem(STORAGE_KEY, JSON.stringify(newKeys));
    } catch (e) {
      console.log("Failed to set keys in storage", e);
    }
  };

  handleKeyDown = (e: KeyEventLike): void => {
    if (this.keys[e.code]) {
      this.down.add(e.code);
      e.preventDefault?.();
    }
  };

  handleKeyUp = (e: KeyEventLike): void => {
    if (this.keys[e.code]) {
      this.down.delete(e.code);
      e.preventDefault?.();
    }
  };

  /** Window lost focus: key-up events will never arrive. */
  releaseAll = (): void => {
    this.down.clear();
  };

  getState = (): ButtonState => {
    const state = releasedState();
    for (const code of this.down) {
      const button: Button | undefined = this.keys[code];
      if (button) state[button] = true;
    }
    return state;
  };
}
