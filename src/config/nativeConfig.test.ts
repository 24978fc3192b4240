import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { DirectoryMemory, configDir, fileStore, readConfigFile } from './nativeConfig';

describe('nativeConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'retrohost-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should prefer XDG_CONFIG_HOME', () => {
    expect(configDir({ XDG_CONFIG_HOME: '/tmp/xdg' })).toBe(join('/tmp/xdg', 'retrohost'));
  });

  describe('DirectoryMemory', () => {
    it('should return null when nothing was remembered', async () => {
      expect(await new DirectoryMemory(dir).read()).toBeNull();
    });

    it('should remember an existing directory', async () => {
      const roms = join(dir, 'roms');
      await mkdir(roms);
      const memory = new DirectoryMemory(join(dir, 'config'));

      await memory.remember(roms);

      expect(await memory.read()).toBe(roms);
    });

    it('should ignore a remembered directory that no longer exists', async () => {
      const memory = new DirectoryMemory(join(dir, 'config'));
      await memory.remember(join(dir, 'gone'));
      expect(await memory.read()).toBeNull();
    });
  });

  describe('readConfigFile', () => {
    it('should return an empty object when there is no file', async () => {
      expect(await readConfigFile(dir)).toEqual({});
    });

    it('should parse config.json', async () => {
      await writeFile(join(dir, 'config.json'), '{"fps":50}');
      expect(await readConfigFile(dir)).toEqual({ fps: 50 });
    });

    it('should reject invalid JSON', async () => {
      await writeFile(join(dir, 'config.json'), '{fps');
      await expect(readConfigFile(dir)).rejects.toThrow(`${join(dir, 'config.json')} is not valid JSON`);
    });
  });

  describe('fileStore', () => {
    it('should persist values across instances', () => {
      fileStore(join(dir, 'nested')).setItem('keys', '{"KeyJ":"a"}');

      const store = fileStore(join(dir, 'nested'));

      expect(store.getItem('keys')).toBe('{"KeyJ":"a"}');
      expect(store.getItem('gamepadConfig')).toBeNull();
    });
  });
});
