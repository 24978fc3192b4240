import { describe, it, expect, vi, beforeEach } from 'vitest';

import { ManualStorage } from '@/test/fakes';

import { StorageContractError } from '../errors';
import { BaseStorage, failure, ready, type Complete } from './StorageBridge';

const bytes = (...values: number[]) => Uint8Array.from(values);

describe('StorageBridge', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('should report pending until the completion lands', () => {
    const storage = new ManualStorage();
    const handle = storage.request('load-rom');

    expect(storage.poll(handle)).toEqual({ status: 'pending' });
    expect(storage.isPending('load-rom')).toBe(true);

    storage.finish('load-rom', ready(bytes(1, 2), 'game.nes'));

    expect(storage.poll(handle)).toEqual({ status: 'ready', bytes: bytes(1, 2), name: 'game.nes' });
    expect(storage.isPending('load-rom')).toBe(false);
  });

  it('should refuse a second request of the same kind without starting it', () => {
    const storage = new ManualStorage();
    storage.request('load-rom');

    expect(() => storage.request('load-rom')).toThrow(StorageContractError);
    expect(storage.begun).toBe(1);
  });

  it('should run different kinds independently', () => {
    const storage = new ManualStorage();
    const rom = storage.request('load-rom');
    const state = storage.request('load-save-state');
    const persist = storage.persist(bytes(9), 'game.state');

    storage.finish('load-save-state', ready(bytes(7), 'game.state'));

    expect(storage.poll(rom).status).toBe('pending');
    expect(storage.poll(state).status).toBe('ready');
    expect(storage.poll(persist).status).toBe('pending');
  });

  it('should allow a new request once the previous result was consumed', () => {
    const storage = new ManualStorage();
    const first = storage.request('load-rom');
    storage.finish('load-rom', failure('user-cancelled', 'Open ROM cancelled'));
    storage.poll(first);

    const second = storage.request('load-rom');

    expect(second.id).not.toBe(first.id);
    expect(storage.poll(second).status).toBe('pending');
  });

  it('should reject unknown and consumed handles', () => {
    const storage = new ManualStorage();
    const handle = storage.request('load-save-state');
    storage.finish('load-save-state', ready(bytes(1), 'a.state'));
    storage.poll(handle);

    expect(() => storage.poll(handle)).toThrow(StorageContractError);
    expect(() => storage.poll({ id: 42, kind: 'load-rom' })).toThrow(StorageContractError);
  });

  it('should turn an empty load into invalid data', () => {
    const storage = new ManualStorage();
    const handle = storage.request('load-rom');
    storage.finish('load-rom', ready(new Uint8Array(0), 'empty.nes'));

    expect(storage.poll(handle)).toEqual({
      status: 'failed',
      reason: 'invalid-data',
      message: 'empty.nes is empty',
    });
  });

  it('should keep the first of two completions', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    let complete: Complete = () => {};
    class Twice extends BaseStorage {
      readonly variant = 'native';
      protected beginLoad(_kind: 'load-rom' | 'load-save-state', done: Complete): void {
        complete = done;
      }
      protected beginPersist(): void {}
    }
    const storage = new Twice();
    const handle = storage.request('load-rom');

    complete(ready(bytes(1), 'first.nes'));
    complete(ready(bytes(2), 'second.nes'));

    expect(storage.poll(handle)).toEqual({ status: 'ready', bytes: bytes(1), name: 'first.nes' });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should report a mechanism that throws on start as an io error', () => {
    class Broken extends BaseStorage {
      readonly variant = 'native';
      protected beginLoad(): void {
        throw new Error('no display');
      }
      protected beginPersist(): void {}
    }
    const storage = new Broken();
    const handle = storage.request('load-rom');

    expect(storage.poll(handle)).toEqual({ status: 'failed', reason: 'io-error', message: 'no display' });
  });
});
