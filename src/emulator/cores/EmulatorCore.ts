/**
 * Emulator Core Interface
 *
 * The contract the host expects from an emulation core. The core owns the
 * instruction set, timing and memory map; the host only steps it.
 */

import type { InputSnapshot } from '../controllers/buttons';

export interface FrameSpec {
  width: number;
  height: number;
}

/** 32-bit little-endian RGBA pixels (0xAABBGGRR), row-major. */
export interface FrameBuffer {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint32Array;
}

/** Interleaved stereo PCM in [-1, 1]. */
export interface AudioChunk {
  readonly sampleRate: number;
  readonly samples: Float32Array;
}

export interface RomInfo {
  size: number;
  mapper: number;
  mapperName: string;
  prgBanks: number;
  chrBanks: number;
  hasBattery: boolean;
  hasTrainer: boolean;
}

export interface CoreFrame {
  pixels: Uint32Array;
  audio: Float32Array;
}

export interface EmulatorCore {
  /** Stable identifier written into save states. */
  readonly id: string;

  /** Bumped whenever the serialized state layout changes. */
  readonly stateVersion: number;

  readonly frameSpec: FrameSpec;

  readonly sampleRate: number;

  /**
   * Validate a ROM image without loading it
   * @throws when the header or size is invalid
   */
  inspectRom(rom: Uint8Array): RomInfo;

  /** Load a ROM and reset the machine. */
  loadRom(rom: Uint8Array): void;

  /** Button state for the next frame. */
  setInput(input: InputSnapshot): void;

  /** Run exactly one frame. Must not read the wall clock. */
  runFrame(): CoreFrame;

  saveState(): Uint8Array;

  /** @throws when the bytes cannot be applied */
  loadState(state: Uint8Array): void;

  reset(): void;
}
