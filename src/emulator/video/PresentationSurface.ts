import type { FrameBuffer } from '../cores/EmulatorCore';

/** Opaque display target; gets at most one frame per host tick. */
export interface PresentationSurface {
  present(frame: FrameBuffer): void;
}
