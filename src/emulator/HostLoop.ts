/**
 * Host Loop
 *
 * One synchronous tick per display refresh:
 *   1. apply storage completions that became ready since the last tick
 *   2. decide whether stepping is possible at all
 *   3. step the core as many frames as the pacer releases, one fresh input
 *      snapshot per frame, audio delivered in order, last frame presented
 */

import type { AudioSink } from './audio/AudioSink';
import type { InputAggregator } from './controllers/InputAggregator';
import type { EmulationCoreHandle, StepOutput } from './cores/EmulationCoreHandle';
import type { AudioChunk, FrameBuffer, RomInfo } from './cores/EmulatorCore';
import { NoRomError, RomError, StateError, errorMessage } from './errors';
import type { RetroStore } from './state/retroStore';
import type {
  StorageBridge,
  StorageFailureReason,
  StorageHandle,
  StorageKind,
  StorageOutcome,
} from './storage/StorageBridge';
import { handleError } from './utils/errorUtils';
import type FramePacer from './utils/FramePacer';
import { sha256 } from './utils/rom';
import type { PresentationSurface } from './video/PresentationSurface';

export type StorageEvent =
  | { kind: 'load-rom'; status: 'applied'; name: string; info: RomInfo }
  | { kind: 'load-save-state' | 'persist-save-state'; status: 'applied'; name: string }
  | {
      kind: StorageKind;
      status: 'failed';
      reason: StorageFailureReason | 'rom-error' | 'state-error';
      message: string;
    };

export type SkipReason = 'paused' | 'halted' | 'no-rom' | 'rom-pending' | 'audio-backpressure';

export interface TickReport {
  stepped: number;
  presented: boolean;
  skipped: SkipReason | null;
}

export interface HostLoopOptions {
  core: EmulationCoreHandle;
  pacer: FramePacer;
  input: InputAggregator;
  storage: StorageBridge;
  surface: PresentationSurface;
  audio: AudioSink;
  store?: RetroStore;
  onStorageEvent?: (event: StorageEvent) => void;
}

export class HostLoop {
  private core: EmulationCoreHandle;
  private pacer: FramePacer;
  private input: InputAggregator;
  private storage: StorageBridge;
  private surface: PresentationSurface;
  private audio: AudioSink;
  private store?: RetroStore;
  private onStorageEvent?: (event: StorageEvent) => void;

  private handles = new Map<StorageKind, StorageHandle>();
  private withheld: AudioChunk[] = [];
  private paused = false;
  private romName: string | null = null;
  private romToken = 0;

  constructor(options: HostLoopOptions) {
    this.core = options.core;
    this.pacer = options.pacer;
    this.input = options.input;
    this.storage = options.storage;
    this.surface = options.surface;
    this.audio = options.audio;
    this.store = options.store;
    this.onStorageEvent = options.onStorageEvent;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get isHalted(): boolean {
    return this.core.isHalted;
  }

  /** Ask the storage bridge for a ROM; applied on a later tick. */
  requestRom(): StorageHandle {
    const handle = this.storage.request('load-rom');
    this.handles.set('load-rom', handle);
    if (!this.core.hasRom) this.store?.getState().setStatus('loading');
    return handle;
  }

  requestSaveState(): StorageHandle {
    if (!this.core.hasRom) throw new NoRomError('load a save state');
    const handle = this.storage.request('load-save-state');
    this.handles.set('load-save-state', handle);
    return handle;
  }

  /** Serialize the core now and hand the bytes to the storage bridge. */
  saveState(): StorageHandle {
    const bytes = this.core.saveState();
    const handle = this.storage.persist(bytes, `${stripExtension(this.romName ?? 'retrohost')}.state`);
    this.handles.set('persist-save-state', handle);
    return handle;
  }

  reset(): void {
    this.core.reset();
    this.withheld = [];
    console.log('[HostLoop] Reset');
    this.store?.getState().setStatus(this.paused ? 'paused' : 'running');
  }

  pause(): void {
    if (this.paused) return;
    console.log('[HostLoop] Paused');
    this.paused = true;
    this.pacer.pause();
    if (this.core.hasRom && !this.core.isHalted) this.store?.getState().setStatus('paused');
  }

  resume(now: number): void {
    if (!this.paused) return;
    console.log('[HostLoop] Resumed');
    this.paused = false;
    this.pacer.resume(now);
    if (this.core.hasRom && !this.core.isHalted) this.store?.getState().setStatus('running');
  }

  tick(now: number): TickReport {
    if (this.paused) return skip('paused');

    this.serviceStorage();

    if (this.core.isHalted) {
      this.pacer.idle(now);
      return skip('halted');
    }
    if (this.storage.isPending('load-rom')) {
      this.pacer.idle(now);
      return skip('rom-pending');
    }
    if (!this.core.hasRom) {
      this.pacer.idle(now);
      return skip('no-rom');
    }
    if (!this.flushWithheld()) {
      // The sink is the clock while it is full; wall time is not owed
      this.pacer.idle(now);
      return skip('audio-backpressure');
    }

    const owed = this.pacer.tick(now);
    let stepped = 0;
    let latest: FrameBuffer | null = null;

    while (stepped < owed && !this.core.isHalted && this.audio.isReady()) {
      const snapshot = this.input.poll();
      let output: StepOutput;
      try {
        output = this.core.step(snapshot);
      } catch (error) {
        this.halt(error);
        break;
      }
      stepped++;
      latest = output.frame;
      if (!this.audio.write(output.audio)) {
        this.withheld.push(output.audio);
        break;
      }
    }

    if (!this.core.isHalted) this.pacer.refund(owed - stepped);
    if (latest) this.surface.present(latest);

    return { stepped, presented: latest !== null, skipped: null };
  }

  private flushWithheld(): boolean {
    while (this.withheld.length > 0) {
      const chunk = this.withheld[0];
      if (!this.audio.isReady() || !this.audio.write(chunk)) return false;
      this.withheld.shift();
    }
    return true;
  }

  private halt(error: unknown): void {
    const message = errorMessage(error);
    console.error('[HostLoop] Core step failed, halting session:', message);
    this.store?.getState().setError(message);
    handleError(error, { frame: this.core.frames, rom: this.romName });
  }

  private serviceStorage(): void {
    for (const [kind, handle] of this.handles) {
      const result = this.storage.poll(handle);
      if (result.status === 'pending') continue;
      this.handles.delete(kind);
      this.complete(kind, result);
    }
  }

  private complete(kind: StorageKind, outcome: StorageOutcome): void {
    if (outcome.status === 'failed') {
      this.fail(kind, outcome.reason, outcome.message);
      return;
    }

    switch (kind) {
      case 'load-rom':
        this.applyRom(outcome.bytes, outcome.name);
        break;
      case 'load-save-state':
        this.applyState(outcome.bytes, outcome.name);
        break;
      case 'persist-save-state':
        console.log('[HostLoop] Save state written:', outcome.name);
        this.emit({ kind, status: 'applied', name: outcome.name });
        break;
    }
  }

  private applyRom(bytes: Uint8Array, name: string): void {
    let info: RomInfo;
    try {
      info = this.core.loadRom(bytes);
    } catch (error) {
      this.fail('load-rom', 'rom-error', errorMessage(error));
      if (!(error instanceof RomError)) handleError(error, { rom: name });
      return;
    }

    console.log('[HostLoop] ROM loaded:', name, `(${info.size} bytes)`);
    this.romName = name;
    this.withheld = [];
    const token = ++this.romToken;

    const store = this.store?.getState();
    store?.setRom(name, info);
    store?.setNotice(null);
    store?.setStatus(this.paused ? 'paused' : 'running');
    this.emit({ kind: 'load-rom', status: 'applied', name, info });

    if (this.store) {
      const target = this.store;
      sha256(bytes).then((hash) => {
        if (token === this.romToken) target.getState().setRomHash(hash);
      }, handleError);
    }
  }

  private applyState(bytes: Uint8Array, name: string): void {
    try {
      this.core.loadState(bytes);
    } catch (error) {
      const known = error instanceof StateError || error instanceof NoRomError;
      this.fail('load-save-state', 'state-error', errorMessage(error));
      if (!known) handleError(error, { state: name });
      return;
    }
    console.log('[HostLoop] Save state loaded:', name);
    this.emit({ kind: 'load-save-state', status: 'applied', name });
  }

  private fail(kind: StorageKind, reason: StorageFailureReason | 'rom-error' | 'state-error', message: string): void {
    console.warn(`[HostLoop] ${kind} failed (${reason}):`, message);
    const store = this.store?.getState();
    store?.setNotice({ source: reason === 'rom-error' || reason === 'state-error' ? 'core' : 'storage', message });
    if (kind === 'load-rom' && !this.core.hasRom) store?.setStatus('idle');
    this.emit({ kind, status: 'failed', reason, message });
  }

  private emit(event: StorageEvent): void {
    this.onStorageEvent?.(event);
  }
}

function skip(reason: SkipReason): TickReport {
  return { stepped: 0, presented: false, skipped: reason };
}

function stripExtension(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}
