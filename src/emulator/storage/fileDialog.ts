/**
 * Native file dialogs, run as a separate `zenity` process so the host
 * loop never waits on them.
 */

import { execFile } from 'node:child_process';
import { join } from 'node:path';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface FileFilter {
  name: string;
  extensions: string[];
}

export interface OpenDialogOptions {
  title: string;
  directory: string | null;
  filters: FileFilter[];
}

export interface SaveDialogOptions {
  title: string;
  directory: string | null;
  defaultName: string;
}

/** Resolves to the chosen path, or null when the user cancels. */
export interface FileDialog {
  open(options: OpenDialogOptions): Promise<string | null>;
  save(options: SaveDialogOptions): Promise<string | null>;
}

function isCancelExit(error: unknown): boolean {
  // zenity exits with 1 when the dialog is closed or cancelled
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 1;
}

export class ZenityDialog implements FileDialog {
  constructor(private command = 'zenity') {}

  open(options: OpenDialogOptions): Promise<string | null> {
    const args = ['--file-selection', `--title=${options.title}`];
    if (options.directory) args.push(`--filename=${join(options.directory, '/')}`);
    for (const filter of options.filters) {
      const patterns = filter.extensions.map((ext) => (ext === '*' ? '*' : `*.${ext}`)).join(' ');
      args.push(`--file-filter=${filter.name} | ${patterns}`);
    }
    return this.run(args);
  }

  save(options: SaveDialogOptions): Promise<string | null> {
    const args = ['--file-selection', '--save', '--confirm-overwrite', `--title=${options.title}`];
    const start = options.directory ? join(options.directory, options.defaultName) : options.defaultName;
    args.push(`--filename=${start}`);
    return this.run(args);
  }

  private async run(args: string[]): Promise<string | null> {
    try {
      const { stdout } = await execFileAsync(this.command, args, { encoding: 'utf8' });
      const path = stdout.trim();
      return path || null;
    } catch (error) {
      if (isCancelExit(error)) return null;
      throw error;
    }
  }
}
