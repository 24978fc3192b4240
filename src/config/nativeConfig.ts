/**
 * Native config directory: `$XDG_CONFIG_HOME/retrohost` (or `~/.config/retrohost`).
 *
 *   last_directory.txt: folder of the last file picked in a dialog
 *   config.json: optional HostConfig overrides
 *   input.json: persisted keymap / gamepad mapping
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';

import type { KeyValueStore } from '@/emulator/controllers/keyValueStore';

const APP_DIR = 'retrohost';
const LAST_DIRECTORY_FILE = 'last_directory.txt';
const CONFIG_FILE = 'config.json';
const INPUT_FILE = 'input.json';

export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, APP_DIR);
}

/** Remembers where the last dialog ended up, so the next one starts there. */
export class DirectoryMemory {
  constructor(private dir: string = configDir()) {}

  /** The remembered directory, or null when unset or no longer present. */
  async read(): Promise<string | null> {
    let content: string;
    try {
      content = (await readFile(join(this.dir, LAST_DIRECTORY_FILE), 'utf8')).trim();
    } catch {
      return null;
    }
    if (!content) return null;
    try {
      return (await stat(content)).isDirectory() ? content : null;
    } catch {
      return null;
    }
  }

  async remember(directory: string): Promise<void> {
    if ((await this.read()) === directory) return;
    await mkdir(this.dir, { recursive: true });
    await writeFile(join(this.dir, LAST_DIRECTORY_FILE), directory, 'utf8');
  }
}

/** Parsed config.json, or `{}` when there is none. */
export async function readConfigFile(dir: string = configDir()): Promise<unknown> {
  const path = join(dir, CONFIG_FILE);
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`${path} is not valid JSON`, { cause: error });
  }
}

/** Synchronous JSON-file KeyValueStore; only touched on startup and remaps. */
export function fileStore(dir: string = configDir()): KeyValueStore {
  const path = join(dir, INPUT_FILE);

  const load = (): Record<string, string> => {
    if (!existsSync(path)) return {};
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null) return {};
    const items: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') items[key] = value;
    }
    return items;
  };

  return {
    getItem: (key) => load()[key] ?? null,
    setItem: (key, value) => {
      const items = load();
      items[key] = value;
      mkdirSync(dir, { recursive: true });
      writeFileSync(path, JSON.stringify(items, null, 2), 'utf8');
    },
  };
}
