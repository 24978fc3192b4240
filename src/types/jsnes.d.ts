declare module 'jsnes' {
  export type NESState = Record<string, unknown>;

  /** The audio unit; its fields and channels are plain numbers and arrays. */
  export type PAPU = Record<string, unknown>;

  export class NES {
    constructor(opts?: {
      onFrame?: (frameBuffer: ArrayLike<number>) => void;
      onAudioSample?: (left: number, right: number) => void;
      onStatusUpdate?: (status: string) => void;
      emulateSound?: boolean;
      sampleRate?: number;
      preferredFrameRate?: number;
    });
    loadROM(data: string): void;
    frame(): void;
    buttonDown(player: number, button: number): void;
    buttonUp(player: number, button: number): void;
    reset(): void;
    toJSON(): NESState;
    fromJSON(state: NESState): void;
    papu: PAPU;
    romData: string | null;
  }

  export const Controller: {
    readonly BUTTON_A: number;
    readonly BUTTON_B: number;
    readonly BUTTON_SELECT: number;
    readonly BUTTON_START: number;
    readonly BUTTON_UP: number;
    readonly BUTTON_DOWN: number;
    readonly BUTTON_LEFT: number;
    readonly BUTTON_RIGHT: number;
  };

  const jsnes: {
    NES: typeof NES;
    Controller: typeof Controller;
  };
  export default jsnes;
}
