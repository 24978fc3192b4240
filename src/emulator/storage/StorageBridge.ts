/**
 * Storage bridge
 *
 * One polling contract over two incompatible I/O models. The native variant
 * runs a dialog process and async filesystem calls; the browser variant is
 * driven by DOM events. Either way a completion only lands in the request's
 * slot, and the host loop observes it by calling `poll` at a tick boundary.
 */

import { StorageContractError, errorMessage } from '../errors';

export type StorageKind = 'load-rom' | 'load-save-state' | 'persist-save-state';

export type LoadKind = Exclude<StorageKind, 'persist-save-state'>;

export type StorageFailureReason = 'user-cancelled' | 'io-error' | 'invalid-data';

export interface StorageHandle {
  readonly id: number;
  readonly kind: StorageKind;
}

export type StorageOutcome =
  | { status: 'ready'; bytes: Uint8Array; name: string }
  | { status: 'failed'; reason: StorageFailureReason; message: string };

export type StorageResult = { status: 'pending' } | StorageOutcome;

export interface StorageBridge {
  readonly variant: 'native' | 'browser';
  request(kind: LoadKind): StorageHandle;
  persist(bytes: Uint8Array, suggestedName: string): StorageHandle;
  /** Terminal results are returned once; the handle is spent afterwards. */
  poll(handle: StorageHandle): StorageResult;
  isPending(kind: StorageKind): boolean;
}

export type Complete = (outcome: StorageOutcome) => void;

export function ready(bytes: Uint8Array, name: string): StorageOutcome {
  return { status: 'ready', bytes, name };
}

export function failure(reason: StorageFailureReason, message: string): StorageOutcome {
  return { status: 'failed', reason, message };
}

interface Slot {
  handle: StorageHandle;
  outcome: StorageOutcome | null;
}

const PENDING: StorageResult = Object.freeze({ status: 'pending' });

/**
 * Slot bookkeeping shared by both variants: single flight per kind, exactly
 * one completion per request, empty loads rejected as invalid data.
 */
export abstract class BaseStorage implements StorageBridge {
  abstract readonly variant: 'native' | 'browser';

  private nextId = 1;
  private slots = new Map<StorageKind, Slot>();

  /** Start the platform mechanism for a load. Must not block. */
  protected abstract beginLoad(kind: LoadKind, complete: Complete): void;

  /** Start the platform mechanism for writing a save state. Must not block. */
  protected abstract beginPersist(bytes: Uint8Array, suggestedName: string, complete: Complete): void;

  request(kind: LoadKind): StorageHandle {
    const { handle, complete } = this.open(kind);
    const checked: Complete = (outcome) => {
      if (outcome.status === 'ready' && outcome.bytes.length === 0) {
        complete(failure('invalid-data', `${outcome.name || 'Selected file'} is empty`));
        return;
      }
      complete(outcome);
    };
    this.start(handle, () => this.beginLoad(kind, checked), complete);
    return handle;
  }

  persist(bytes: Uint8Array, suggestedName: string): StorageHandle {
    const { handle, complete } = this.open('persist-save-state');
    this.start(handle, () => this.beginPersist(bytes, suggestedName, complete), complete);
    return handle;
  }

  poll(handle: StorageHandle): StorageResult {
    const slot = this.slots.get(handle.kind);
    if (!slot || slot.handle.id !== handle.id) {
      throw new StorageContractError(`Unknown or already consumed ${handle.kind} request #${handle.id}`);
    }
    if (!slot.outcome) return PENDING;
    this.slots.delete(handle.kind);
    return slot.outcome;
  }

  isPending(kind: StorageKind): boolean {
    return this.slots.has(kind);
  }

  private open(kind: StorageKind): { handle: StorageHandle; complete: Complete } {
    if (this.slots.has(kind)) {
      throw new StorageContractError(`A ${kind} request is already pending`);
    }

    const handle: StorageHandle = Object.freeze({ id: this.nextId++, kind });
    const slot: Slot = { handle, outcome: null };
    this.slots.set(kind, slot);

    const complete: Complete = (outcome) => {
      if (slot.outcome) {
        console.warn(`[Storage] Ignoring second completion for ${kind} #${handle.id}`);
        return;
      }
      slot.outcome = outcome;
      console.log(`[Storage] ${kind} #${handle.id} ${outcome.status}`, outcome.status === 'failed' ? outcome.reason : outcome.name);
    };

    return { handle, complete };
  }

  private start(handle: StorageHandle, begin: () => void, complete: Complete): void {
    console.log(`[Storage] ${this.variant} ${handle.kind} #${handle.id} started`);
    try {
      begin();
    } catch (error) {
      complete(failure('io-error', errorMessage(error)));
    }
  }
}
