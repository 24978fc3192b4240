// @vitest-environment jsdom
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { BrowserStorage } from './BrowserStorage';
import type { StorageBridge, StorageHandle, StorageResult } from './StorageBridge';

async function settle(storage: StorageBridge, handle: StorageHandle): Promise<StorageResult> {
  let result: StorageResult = { status: 'pending' };
  await vi.waitFor(() => {
    result = storage.poll(handle);
    expect(result.status).not.toBe('pending');
  });
  return result;
}

function fileInput(): HTMLInputElement {
  const input = document.querySelector<HTMLInputElement>('input[type=file]');
  if (!input) throw new Error('no file input');
  return input;
}

function choose(input: HTMLInputElement, files: File[]): void {
  Object.defineProperty(input, 'files', { value: files });
  input.dispatchEvent(new Event('change'));
}

describe('BrowserStorage', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    document.body.innerHTML = '';
  });

  it('should open a file input filtered by kind', () => {
    const click = vi.spyOn(HTMLInputElement.prototype, 'click').mockImplementation(() => {});
    const storage = new BrowserStorage();

    storage.request('load-save-state');

    expect(fileInput().accept).toBe('.state');
    expect(click).toHaveBeenCalledTimes(1);
  });

  it('should read the selected file', async () => {
    vi.spyOn(HTMLInputElement.prototype, 'click').mockImplementation(() => {});
    const storage = new BrowserStorage();
    const handle = storage.request('load-rom');

    choose(fileInput(), [new File([Uint8Array.of(1, 2, 3)], 'game.nes')]);

    const result = await settle(storage, handle);
    expect(result.status).toBe('ready');
    if (result.status !== 'ready') return;
    expect(result.name).toBe('game.nes');
    expect(Array.from(result.bytes)).toEqual([1, 2, 3]);
    expect(document.querySelector('input[type=file]')).toBeNull();
  });

  it('should report a change without a file as cancelled', async () => {
    vi.spyOn(HTMLInputElement.prototype, 'click').mockImplementation(() => {});
    const storage = new BrowserStorage();
    const handle = storage.request('load-rom');

    choose(fileInput(), []);

    expect(await settle(storage, handle)).toEqual({
      status: 'failed',
      reason: 'user-cancelled',
      message: 'No file selected',
    });
  });

  it('should report the cancel event', async () => {
    vi.spyOn(HTMLInputElement.prototype, 'click').mockImplementation(() => {});
    const storage = new BrowserStorage();
    const handle = storage.request('load-rom');

    fileInput().dispatchEvent(new Event('cancel'));

    expect(await settle(storage, handle)).toEqual({
      status: 'failed',
      reason: 'user-cancelled',
      message: 'File selection cancelled',
    });
  });

  it('should reject an empty file as invalid data', async () => {
    vi.spyOn(HTMLInputElement.prototype, 'click').mockImplementation(() => {});
    const storage = new BrowserStorage();
    const handle = storage.request('load-rom');

    choose(fileInput(), [new File([], 'empty.nes')]);

    expect(await settle(storage, handle)).toEqual({
      status: 'failed',
      reason: 'invalid-data',
      message: 'empty.nes is empty',
    });
  });

  it('should download a save state and complete afterwards', async () => {
    const createObjectURL = vi.fn(() => 'blob:test-state');
    const revokeObjectURL = vi.fn();
    URL.createObjectURL = createObjectURL;
    URL.revokeObjectURL = revokeObjectURL;
    let downloaded = '';
    vi.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(function (this: HTMLAnchorElement) {
      downloaded = this.download;
    });
    const storage = new BrowserStorage();

    const handle = storage.persist(Uint8Array.of(9, 9), 'game.state');

    expect(storage.poll(handle).status).toBe('pending');
    expect(downloaded).toBe('game.state');

    const result = await settle(storage, handle);
    expect(result.status).toBe('ready');
    expect(createObjectURL).toHaveBeenCalledTimes(1);
    expect(revokeObjectURL).toHaveBeenCalledWith('blob:test-state');
    expect(document.querySelector('a')).toBeNull();
  });
});
