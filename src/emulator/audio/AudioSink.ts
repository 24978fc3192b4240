import type { AudioChunk } from '../cores/EmulatorCore';

export interface AudioSink {
  /** False while the sink cannot take another chunk. */
  isReady(): boolean;
  /** Returns false when the chunk was refused; the caller keeps it. */
  write(chunk: AudioChunk): boolean;
}
