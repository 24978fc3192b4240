import { GamepadConfigSchema, type GamepadConfig } from "@/config/hostConfig";

import { releasedState, type ButtonState } from "./buttons";
import type { KeyValueStore } from "./keyValueStore";

export interface GamepadLike {
  readonly id: string;
  readonly index: number;
  readonly connected: boolean;
  readonly buttons: ReadonlyArray<{ readonly pressed: boolean }>;
  readonly axes: ReadonlyArray<number>;
}

/** Opaque device enumeration, polled once per frame. */
export type GamepadSource = () => ReadonlyArray<GamepadLike | null>;

// Standard gamepad layout
export const DEFAULT_GAMEPAD_CONFIG: GamepadConfig = {
  buttons: {
    "0": "a",
    "1": "b",
    "2": "b",
    "3": "a",
    "8": "select",
    "9": "start",
    "12": "up",
    "13": "down",
    "14": "left",
    "15": "right",
  },
  axisThreshold: 0.5,
};

const STORAGE_KEY = "gamepadConfig";

export function browserGamepads(): GamepadSource {
  return () => {
    if (typeof navigator === "undefined" || !navigator.getGamepads) return [];
    return navigator.getGamepads();
  };
}

export const noGamepads: GamepadSource = () => [];

export default class GamepadController {
  private gamepadConfig: GamepadConfig = DEFAULT_GAMEPAD_CONFIG;
  private activeId: string | null = null;

  constructor(
    private source: GamepadSource,
    private storage?: KeyValueStore,
  ) {}

  loadGamepadConfig = (): void => {
    if (!this.storage) return;
    try {
      const stored = this.storage.getItem(STORAGE_KEY);
      if (stored) {
        this.gamepadConfig = GamepadConfigSchema.parse(JSON.parse(stored));
        return;
      }
    } catch (e) {
      console.log("Failed to get gamepadConfig from storage.", e);
    }
    this.gamepadConfig = DEFAULT_GAMEPAD_CONFIG;
  };

  setGamepadConfig = (gamepadConfig: GamepadConfig): void => {
    this.gamepadConfig = gamepadConfig;
    try {
      this.storage?.setItem(STORAGE_KEY, JSON.stringify(gamepadConfig));
    } catch (e) {
      console.log("Failed to set gamepadConfig in storage", e);
    }
  };

  /**
   * Button state of the lowest-index connected gamepad, or null when none is
   * connected. Other gamepads are not read.
   */
  readFirstConnected = (): ButtonState | null => {
    let gamepads: ReadonlyArray<GamepadLike | null>;
    try {
      gamepads = this.source();
    } catch (e) {
      console.log("[Gamepad] Enumeration failed, treating as disconnected", e);
      this.setActive(null);
      return null;
    }

    let first: GamepadLike | null = null;
    for (const gamepad of gamepads) {
      if (!gamepad || !gamepad.connected) continue;
      if (!first || gamepad.index < first.index) first = gamepad;
    }

    this.setActive(first);
    return first ? this.mapButtons(first) : null;
  };

  private setActive(gamepad: GamepadLike | null): void {
    const id = gamepad ? `${gamepad.index}:${gamepad.id}` : null;
    if (id === this.activeId) return;
    if (id) {
      console.log("[Gamepad] Reading", id);
    } else {
      console.log("[Gamepad] No gamepad connected");
    }
    this.activeId = id;
  }

  private mapButtons(gamepad: GamepadLike): ButtonState {
    const state = releasedState();
    const { buttons, axisThreshold } = this.gamepadConfig;

    for (const [code, button] of Object.entries(buttons)) {
      if (gamepad.buttons[Number(code)]?.pressed) state[button] = true;
    }

    const x = gamepad.axes[0] ?? 0;
    const y = gamepad.axes[1] ?? 0;
    if (x <= -axisThreshold) state.left = true;
    if (x >= axisThreshold) state.right = true;
    if (y <= -axisThreshold) state.up = true;
    if (y >= axisThreshold) state.down = true;

    return state;
  }
}
