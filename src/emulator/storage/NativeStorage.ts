/**
 * Native storage: dialog process plus fs/promises.
 *
 * Nothing here runs on the tick path: the dialog is another process and file
 * reads/writes complete on the libuv pool. The result is parked in the slot
 * until the host loop polls it.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, resolve } from 'node:path';

import { DirectoryMemory } from '@/config/nativeConfig';

import { errorMessage } from '../errors';
import { ZenityDialog, type FileDialog, type FileFilter } from './fileDialog';
import { BaseStorage, failure, ready, type Complete, type LoadKind, type StorageOutcome } from './StorageBridge';

export interface NativeStorageOptions {
  dialog?: FileDialog;
  directories?: DirectoryMemory;
  /** ROM path given on the command line; served to the first `load-rom` without a dialog. */
  preselectRom?: string;
  romExtensions?: string[];
}

const TITLES: Record<LoadKind, string> = {
  'load-rom': 'Open ROM',
  'load-save-state': 'Open save state',
};

export class NativeStorage extends BaseStorage {
  readonly variant = 'native';

  private dialog: FileDialog;
  private directories: DirectoryMemory;
  private preselectRom: string | null;
  private romExtensions: string[];

  constructor(options: NativeStorageOptions = {}) {
    super();
    this.dialog = options.dialog ?? new ZenityDialog();
    this.directories = options.directories ?? new DirectoryMemory();
    this.preselectRom = options.preselectRom ?? null;
    this.romExtensions = options.romExtensions ?? ['nes'];
  }

  protected beginLoad(kind: LoadKind, complete: Complete): void {
    this.load(kind).then(complete, (error: unknown) => complete(failure('io-error', errorMessage(error))));
  }

  protected beginPersist(bytes: Uint8Array, suggestedName: string, complete: Complete): void {
    this.write(bytes, suggestedName).then(complete, (error: unknown) =>
      complete(failure('io-error', errorMessage(error))),
    );
  }

  private async load(kind: LoadKind): Promise<StorageOutcome> {
    const path = await this.pickForLoad(kind);
    if (!path) return failure('user-cancelled', `${TITLES[kind]} cancelled`);

    const bytes = await readFile(path);
    await this.rememberDirectory(path);
    return ready(new Uint8Array(bytes), basename(path));
  }

  private async write(bytes: Uint8Array, suggestedName: string): Promise<StorageOutcome> {
    const path = await this.dialog.save({
      title: 'Save state',
      directory: await this.directories.read(),
      defaultName: suggestedName,
    });
    if (!path) return failure('user-cancelled', 'Save state cancelled');

    await writeFile(path, bytes);
    await this.rememberDirectory(path);
    return ready(bytes, basename(path));
  }

  private async pickForLoad(kind: LoadKind): Promise<string | null> {
    if (kind === 'load-rom' && this.preselectRom) {
      const path = resolve(this.preselectRom);
      this.preselectRom = null;
      return path;
    }

    const filters: FileFilter[] =
      kind === 'load-rom'
        ? [{ name: 'ROM', extensions: this.romExtensions }]
        : [{ name: 'Save state', extensions: ['state'] }];
    filters.push({ name: 'All files', extensions: ['*'] });

    return this.dialog.open({
      title: TITLES[kind],
      directory: await this.directories.read(),
      filters,
    });
  }

  private async rememberDirectory(path: string): Promise<void> {
    try {
      await this.directories.remember(dirname(path));
    } catch (error) {
      console.warn('[NativeStorage] Could not save last used directory:', errorMessage(error));
    }
  }
}
