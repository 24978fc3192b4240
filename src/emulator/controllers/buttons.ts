/**
 * Logical buttons and the per-frame input snapshot.
 */

export const BUTTONS = ['up', 'down', 'left', 'right', 'a', 'b', 'select', 'start'] as const;

export type Button = (typeof BUTTONS)[number];

export type ButtonState = Record<Button, boolean>;

/** Immutable, one per emulated frame. */
export type InputSnapshot = Readonly<ButtonState>;

export function releasedState(): ButtonState {
  return {
    up: false,
    down: false,
    left: false,
    right: false,
    a: false,
    b: false,
    select: false,
    start: false,
  };
}

export const RELEASED: InputSnapshot = Object.freeze(releasedState());

/** Per-button logical OR of every source, frozen. */
export function mergeSnapshot(...sources: ReadonlyArray<Readonly<ButtonState> | null>): InputSnapshot {
  const merged = releasedState();
  for (const source of sources) {
    if (!source) continue;
    for (const button of BUTTONS) {
      merged[button] = merged[button] || source[button];
    }
  }
  return Object.freeze(merged);
}
