/**
 * EmulationCoreHandle
 *
 * The host's only way into the core. Adds ROM validation, the versioned
 * save-state envelope, all-or-nothing state loads and the halted flag on top
 * of a bare EmulatorCore.
 */

import type { InputSnapshot } from '../controllers/buttons';
import {
  CoreHaltedError,
  CoreStepError,
  NoRomError,
  RomError,
  StateError,
  errorMessage,
} from '../errors';
import type { AudioChunk, EmulatorCore, FrameBuffer, RomInfo } from './EmulatorCore';
import { decodeSaveState, encodeSaveState } from './saveState';

export interface StepOutput {
  frame: FrameBuffer;
  audio: AudioChunk;
}

export class EmulationCoreHandle {
  private romLoaded = false;
  private halted = false;
  private lastGoodFrame: FrameBuffer | null = null;
  private frameCount = 0;

  constructor(private core: EmulatorCore) {}

  get hasRom(): boolean {
    return this.romLoaded;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  /** Most recent frame produced by a successful step. */
  get lastFrame(): FrameBuffer | null {
    return this.lastGoodFrame;
  }

  get frameSpec() {
    return this.core.frameSpec;
  }

  get frames(): number {
    return this.frameCount;
  }

  /**
   * Advance exactly one emulated frame
   * @throws CoreStepError when the core fails; the handle is halted afterwards
   */
  step(input: InputSnapshot): StepOutput {
    if (this.halted) throw new CoreHaltedError();
    if (!this.romLoaded) throw new NoRomError('step');

    let output: StepOutput;
    try {
      this.core.setInput(input);
      const { pixels, audio } = this.core.runFrame();
      const { width, height } = this.core.frameSpec;
      if (pixels.length !== width * height) {
        throw new Error(`Frame buffer size mismatch: expected ${width * height}, got ${pixels.length}`);
      }
      output = {
        frame: { width, height, pixels },
        audio: { sampleRate: this.core.sampleRate, samples: audio },
      };
    } catch (error) {
      this.halted = true;
      throw new CoreStepError(`Core failed on frame ${this.frameCount + 1}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.frameCount++;
    this.lastGoodFrame = output.frame;
    return output;
  }

  /**
   * Validate and load a ROM, starting a new session. A ROM the core rejects
   * leaves the running session as it was.
   * @throws RomError
   */
  loadRom(bytes: Uint8Array): RomInfo {
    let info: RomInfo;
    try {
      info = this.core.inspectRom(bytes);
    } catch (error) {
      throw new RomError(errorMessage(error), { cause: error });
    }

    const previous = this.romLoaded ? this.core.saveState() : null;
    try {
      this.core.loadRom(bytes);
    } catch (error) {
      this.rollBack(previous);
      throw new RomError(`Core rejected ROM: ${errorMessage(error)}`, { cause: error });
    }

    this.romLoaded = true;
    this.halted = false;
    this.lastGoodFrame = null;
    this.frameCount = 0;
    return info;
  }

  private rollBack(previous: Uint8Array | null): void {
    if (!previous) {
      this.romLoaded = false;
      return;
    }
    try {
      this.core.loadState(previous);
    } catch (error) {
      console.error('[EmulationCoreHandle] Could not restore the previous session:', errorMessage(error));
      this.romLoaded = false;
    }
  }

  /** Power-cycle the machine with the current ROM; clears a halt. */
  reset(): void {
    if (!this.romLoaded) throw new NoRomError('reset');
    this.core.reset();
    this.halted = false;
    this.frameCount = 0;
  }

  saveState(): Uint8Array {
    if (!this.romLoaded) throw new NoRomError('save state');
    return encodeSaveState({
      coreId: this.core.id,
      stateVersion: this.core.stateVersion,
      payload: this.core.saveState(),
    });
  }

  /**
   * Replace the core state. Either the whole state applies or the core is
   * left exactly as it was.
   * @throws StateError
   */
  loadState(blob: Uint8Array): void {
    if (!this.romLoaded) throw new NoRomError('load state');

    const envelope = decodeSaveState(blob);
    if (envelope.coreId !== this.core.id) {
      throw new StateError(`Save state belongs to core "${envelope.coreId}", not "${this.core.id}"`);
    }
    if (envelope.stateVersion !== this.core.stateVersion) {
      throw new StateError(
        `Save state version ${envelope.stateVersion} does not match core version ${this.core.stateVersion}`,
      );
    }

    const previous = this.core.saveState();
    try {
      this.core.loadState(envelope.payload);
    } catch (error) {
      this.core.loadState(previous);
      throw new StateError(`Core rejected save state: ${errorMessage(error)}`, { cause: error });
    }
  }
}
