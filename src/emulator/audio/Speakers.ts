import type { AudioChunk } from "../cores/EmulatorCore";
import { handleError } from "../utils/errorUtils";
import type { AudioSink } from "./AudioSink";
import { SampleQueue } from "./SampleQueue";

type SpeakersOptions = {
  bufferSize?: number;
  onBufferUnderrun?: (currentSize: number, requiredSize: number) => void;
};

/** Web Audio output fed from a SampleQueue. */
export default class Speakers implements AudioSink {
  private queue: SampleQueue;
  private audioCtx: AudioContext | null = null;
  private scriptNode: ScriptProcessorNode | null = null;
  private onBufferUnderrun?: (currentSize: number, requiredSize: number) => void;

  constructor({ bufferSize = 8192, onBufferUnderrun }: SpeakersOptions = {}) {
    this.onBufferUnderrun = onBufferUnderrun;
    this.queue = new SampleQueue(bufferSize);
  }

  getSampleRate(): number {
    if (!window.AudioContext) {
      return 44100;
    }
    const myCtx = new window.AudioContext();
    const sampleRate = myCtx.sampleRate;
    myCtx.close().catch(handleError);
    return sampleRate;
  }

  start(): void {
    if (this.audioCtx || !window.AudioContext) return;

    this.audioCtx = new window.AudioContext();
    this.scriptNode = this.audioCtx.createScriptProcessor(1024, 0, 2);
    this.scriptNode.onaudioprocess = this.onaudioprocess;
    this.scriptNode.connect(this.audioCtx.destination);
  }

  stop(): void {
    if (this.scriptNode && this.audioCtx) {
      this.scriptNode.disconnect(this.audioCtx.destination);
      this.scriptNode.onaudioprocess = null;
      this.scriptNode = null;
    }

    if (this.audioCtx) {
      this.audioCtx.close().catch(handleError);
      this.audioCtx = null;
    }
    this.queue.clear();
  }

  /** Autoplay policy: the context starts suspended until a user gesture. */
  resume(): void {
    if (this.audioCtx?.state === "suspended") {
      this.audioCtx.resume().catch(handleError);
    }
  }

  isReady(): boolean {
    // Without a running device nothing drains the queue
    if (!this.audioCtx) return true;
    return this.queue.isReady();
  }

  write(chunk: AudioChunk): boolean {
    if (!this.audioCtx) return true;
    return this.queue.write(chunk);
  }

  onaudioprocess = (e: AudioProcessingEvent): void => {
    const left = e.outputBuffer.getChannelData(0);
    const right = e.outputBuffer.getChannelData(1);
    const size = left.length;

    if (this.queue.length < size && this.onBufferUnderrun) {
      this.onBufferUnderrun(this.queue.length, size);
    }

    this.queue.read(left, right);
  };
}
