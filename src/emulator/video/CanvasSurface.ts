/**
 * Canvas Surface
 *
 * Blits frame buffers onto a 2D canvas through a single reused ImageData.
 */

import type { FrameBuffer, FrameSpec } from '../cores/EmulatorCore';
import type { PresentationSurface } from './PresentationSurface';

export class CanvasSurface implements PresentationSurface {
  private ctx: CanvasRenderingContext2D;
  private imageData: ImageData;
  private backingBuffer32: Uint32Array;
  private frameCount = 0;

  constructor(canvas: HTMLCanvasElement, { width, height }: FrameSpec) {
    const ctx = canvas.getContext('2d', { alpha: false });
    if (!ctx) {
      throw new Error('Failed to get 2D rendering context from canvas');
    }

    canvas.width = width;
    canvas.height = height;

    this.ctx = ctx;
    this.ctx.imageSmoothingEnabled = false; // Preserve pixel art
    this.imageData = this.ctx.createImageData(width, height);
    this.backingBuffer32 = new Uint32Array(this.imageData.data.buffer);

    console.log('[CanvasSurface] imageData', width, 'x', height);
  }

  present(frame: FrameBuffer): void {
    if (frame.width !== this.imageData.width || frame.height !== this.imageData.height) {
      console.error('[CanvasSurface] Frame size mismatch:', {
        expected: `${this.imageData.width}x${this.imageData.height}`,
        actual: `${frame.width}x${frame.height}`,
      });
      return;
    }

    this.backingBuffer32.set(frame.pixels);
    this.ctx.putImageData(this.imageData, 0, 0);

    // Log every 600th frame
    this.frameCount++;
    if (this.frameCount % 600 === 0) {
      console.log('[CanvasSurface] draw frame #', this.frameCount);
    }
  }
}
