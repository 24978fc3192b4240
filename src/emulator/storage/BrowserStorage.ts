/**
 * Browser storage: hidden file input and FileReader, download link for saves.
 *
 * Every step is an event callback; nothing here returns data directly.
 */

import { BaseStorage, failure, ready, type Complete, type LoadKind } from './StorageBridge';

export interface BrowserStorageOptions {
  document?: Document;
  accept?: Partial<Record<LoadKind, string>>;
}

const DEFAULT_ACCEPT: Record<LoadKind, string> = {
  'load-rom': '.nes',
  'load-save-state': '.state',
};

export class BrowserStorage extends BaseStorage {
  readonly variant = 'browser';

  private doc: Document;
  private accept: Record<LoadKind, string>;

  constructor(options: BrowserStorageOptions = {}) {
    super();
    this.doc = options.document ?? document;
    this.accept = { ...DEFAULT_ACCEPT, ...options.accept };
  }

  protected beginLoad(kind: LoadKind, complete: Complete): void {
    const input = this.doc.createElement('input');
    input.type = 'file';
    input.accept = this.accept[kind];
    input.style.display = 'none';

    const cleanup = () => {
      input.removeEventListener('change', onChange);
      input.removeEventListener('cancel', onCancel);
      input.remove();
    };

    const onChange = () => {
      const file = input.files?.[0];
      cleanup();
      if (!file) {
        complete(failure('user-cancelled', 'No file selected'));
        return;
      }
      this.readFile(file, complete);
    };

    const onCancel = () => {
      cleanup();
      complete(failure('user-cancelled', 'File selection cancelled'));
    };

    input.addEventListener('change', onChange);
    input.addEventListener('cancel', onCancel);
    this.doc.body.appendChild(input);
    input.click();
  }

  protected beginPersist(bytes: Uint8Array, suggestedName: string, complete: Complete): void {
    const blob = new Blob([bytes.slice()], { type: 'application/octet-stream' });
    const url = URL.createObjectURL(blob);

    const link = this.doc.createElement('a');
    link.href = url;
    link.download = suggestedName;
    link.style.display = 'none';
    this.doc.body.appendChild(link);
    link.click();
    link.remove();

    // Downloads report no completion; settle once the click has been handed off
    setTimeout(() => {
      URL.revokeObjectURL(url);
      complete(ready(bytes, suggestedName));
    }, 0);
  }

  private readFile(file: File, complete: Complete): void {
    const reader = new FileReader();
    reader.onload = () => {
      const result = reader.result;
      if (result === null || typeof result === 'string') {
        complete(failure('io-error', `Unexpected read result for ${file.name}`));
        return;
      }
      complete(ready(new Uint8Array(result), file.name));
    };
    reader.onerror = () => {
      complete(failure('io-error', reader.error?.message ?? `Could not read ${file.name}`));
    };
    reader.readAsArrayBuffer(file);
  }
}
