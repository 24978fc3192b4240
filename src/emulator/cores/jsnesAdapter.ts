/**
 * jsnes Adapter
 *
 * Wraps the jsnes NES so the host can drive it one frame at a time.
 */

// jsnes ships a CommonJS bundle; only its default export survives ESM interop
import jsnes, { type NES, type NESState, type PAPU } from 'jsnes';

import { BUTTONS, releasedState, type Button, type ButtonState, type InputSnapshot } from '../controllers/buttons';
import { validateNESRom } from '../utils/rom';
import type { CoreFrame, EmulatorCore, FrameSpec, RomInfo } from './EmulatorCore';

const WIDTH = 256;
const HEIGHT = 240;

const { Controller } = jsnes;

const BUTTON_CODES: Record<Button, number> = {
  up: Controller.BUTTON_UP,
  down: Controller.BUTTON_DOWN,
  left: Controller.BUTTON_LEFT,
  right: Controller.BUTTON_RIGHT,
  a: Controller.BUTTON_A,
  b: Controller.BUTTON_B,
  select: Controller.BUTTON_SELECT,
  start: Controller.BUTTON_START,
};

// Convert Uint8Array to binary string for jsnes
function u8ToBinaryString(u8: Uint8Array): string {
  // chunk to avoid call stack / max arg issues
  const CHUNK = 0x8000;
  let res = '';
  for (let i = 0; i < u8.length; i += CHUNK) {
    res += String.fromCharCode(...u8.subarray(i, i + CHUNK));
  }
  return res;
}

function isNESState(value: unknown): value is NESState {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type NumericArray = Int8Array | Uint8Array | Int16Array | Uint16Array | Int32Array | Uint32Array | Float32Array | Float64Array;

function isNumericArray(value: unknown): value is NumericArray {
  return (
    value instanceof Int8Array ||
    value instanceof Uint8Array ||
    value instanceof Int16Array ||
    value instanceof Uint16Array ||
    value instanceof Int32Array ||
    value instanceof Uint32Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array
  );
}

function isNumberList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

// NES.toJSON leaves the APU out and fromJSON resets it, so its registers,
// timers and channel state are carried separately.
const APU_CHANNELS = ['square1', 'square2', 'triangle', 'noise', 'dmc'];

/** Plain fields of a jsnes component; references to other components are skipped. */
function captureFields(source: Record<string, unknown>): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string') {
      fields[key] = value;
    } else if (isNumberList(value)) {
      fields[key] = value.slice();
    } else if (isNumericArray(value)) {
      fields[key] = Array.from(value);
    }
  }
  return fields;
}

function restoreFields(target: Record<string, unknown>, fields: Record<string, unknown>): void {
  for (const [key, saved] of Object.entries(fields)) {
    const current = target[key];
    if (isNumberList(saved)) {
      if (isNumericArray(current)) current.set(saved);
      else if (Array.isArray(current)) target[key] = saved.slice();
    } else if (current === null || typeof saved === typeof current) {
      target[key] = saved;
    }
  }
}

function captureApu(papu: PAPU): Record<string, unknown> {
  const channels: Record<string, unknown> = {};
  for (const name of APU_CHANNELS) {
    const channel = papu[name];
    if (isNESState(channel)) channels[name] = captureFields(channel);
  }
  return { ...captureFields(papu), channels };
}

function restoreApu(papu: PAPU, state: NESState): void {
  restoreFields(papu, state);
  const channels = state.channels;
  if (!isNESState(channels)) return;
  for (const name of APU_CHANNELS) {
    const channel = papu[name];
    const saved = channels[name];
    if (isNESState(channel) && isNESState(saved)) restoreFields(channel, saved);
  }
}

const noop = () => {};

export class JsnesCore implements EmulatorCore {
  readonly id = 'jsnes';
  readonly stateVersion = 2;
  readonly frameSpec: FrameSpec = { width: WIDTH, height: HEIGHT };

  private nes: NES;
  private pixels = new Uint32Array(WIDTH * HEIGHT);
  private samples: number[] = [];
  private held: ButtonState = releasedState();
  private romData: string | null = null;

  constructor(
    readonly sampleRate = 44100,
    emulateSound = true,
  ) {
    console.log('[JsnesCore] constructing NES, sample rate', sampleRate);
    this.nes = new jsnes.NES({
      onFrame: this.onFrame,
      onAudioSample: this.onAudioSample,
      onStatusUpdate: (s: string) => console.log('[NES]', s),
      sampleRate,
      emulateSound,
    });
  }

  /** Header checks, then a dry run in a scratch NES to catch unsupported mappers. */
  inspectRom(rom: Uint8Array): RomInfo {
    const info = validateNESRom(rom);
    const scratch = new jsnes.NES({ onFrame: noop, onAudioSample: noop, onStatusUpdate: noop, emulateSound: false });
    scratch.loadROM(u8ToBinaryString(rom));
    return info;
  }

  loadRom(rom: Uint8Array): void {
    const data = u8ToBinaryString(rom);
    try {
      this.nes.loadROM(data);
    } catch (error) {
      // jsnes swaps its ROM before it finds out it cannot map it
      if (this.romData !== null) this.nes.loadROM(this.romData);
      throw error;
    }
    this.romData = data;
    this.held = releasedState();
    this.pixels.fill(0);
    this.samples = [];
  }

  setInput(input: InputSnapshot): void {
    for (const button of BUTTONS) {
      if (input[button] === this.held[button]) continue;
      if (input[button]) {
        this.nes.buttonDown(1, BUTTON_CODES[button]);
      } else {
        this.nes.buttonUp(1, BUTTON_CODES[button]);
      }
      this.held[button] = input[button];
    }
  }

  runFrame(): CoreFrame {
    this.samples = [];
    this.nes.frame();
    return {
      pixels: this.pixels.slice(),
      audio: Float32Array.from(this.samples),
    };
  }

  saveState(): Uint8Array {
    const state = { nes: this.nes.toJSON(), apu: captureApu(this.nes.papu), held: this.held };
    return new TextEncoder().encode(JSON.stringify(state));
  }

  loadState(state: Uint8Array): void {
    const parsed: unknown = JSON.parse(new TextDecoder().decode(state));
    if (!isNESState(parsed) || !isNESState(parsed.nes) || !isNESState(parsed.apu) || !isNESState(parsed.held)) {
      throw new Error('Not a jsnes state');
    }
    if (parsed.nes.romData !== this.romData) {
      throw new Error('Save state was made with a different ROM');
    }
    const held = releasedState();
    for (const button of BUTTONS) {
      held[button] = parsed.held[button] === true;
    }
    this.nes.fromJSON(parsed.nes);
    restoreApu(this.nes.papu, parsed.apu);
    this.held = held;
  }

  reset(): void {
    this.nes.reset();
    this.held = releasedState();
  }

  private onFrame = (frameBuffer: ArrayLike<number>): void => {
    // jsnes pixels are 0x00BBGGRR; add opaque alpha
    for (let i = 0; i < this.pixels.length; i++) {
      this.pixels[i] = 0xff000000 | frameBuffer[i];
    }
  };

  private onAudioSample = (left: number, right: number): void => {
    this.samples.push(left, right);
  };
}
